import { readdir, stat } from 'node:fs/promises';
import { join, extname, basename, dirname, relative, resolve, sep } from 'node:path';
import type { AudioFormat, AudiobookSet, Track } from './types.js';
import { AUDIO_FORMATS } from './types.js';
import { classifyPath, isDiscFolder } from './parser.js';
import { guessFromFolder } from './folder-heuristics.js';
import { probeAudio, emptyProbe, type AudioProber } from './metadata.js';
import { isSuspiciousDuration, validateTrackOrder } from './audiobook.js';
import { toError } from './errors.js';

export const SUPPORTED_EXTENSIONS: ReadonlyMap<string, AudioFormat> = new Map(
  AUDIO_FORMATS.map((format) => [`.${format}`, format])
);

export interface ScanOptions {
  recursive?: boolean;
  maxDepth?: number;
  probe?: AudioProber | false;
  signal?: AbortSignal;
  onError?: (path: string, error: Error) => void;
}

const DEFAULT_MAX_DEPTH = 5;

export interface ScanError {
  path: string;
  message: string;
}

export interface WalkResult {
  files: string[];
  errors: ScanError[];
}

export function audioFormatOf(filePath: string): AudioFormat | null {
  return SUPPORTED_EXTENSIONS.get(extname(filePath).toLowerCase()) ?? null;
}

async function walk(
  dir: string,
  depth: number,
  maxDepth: number,
  signal?: AbortSignal
): Promise<WalkResult> {
  const result: WalkResult = { files: [], errors: [] };

  if (signal?.aborted) {
    return result;
  }

  const entries = await readdir(dir, { withFileTypes: true }).catch((error: unknown) => {
    result.errors.push({ path: dir, message: toError(error).message });
    return null;
  });

  if (!entries) {
    return result;
  }

  const subdirectories: string[] = [];

  for (const entry of entries) {
    if (entry.name.startsWith('.')) {
      continue;
    }

    const fullPath = join(dir, entry.name);

    if (entry.isDirectory()) {
      subdirectories.push(fullPath);
      continue;
    }

    if (entry.isFile() && audioFormatOf(entry.name)) {
      result.files.push(fullPath);
    }
  }

  if (depth >= maxDepth) {
    return result;
  }

  // Sibling directories are independent, so they are walked concurrently.
  const nested = await Promise.all(
    subdirectories.map((subdirectory) => walk(subdirectory, depth + 1, maxDepth, signal))
  );

  for (const child of nested) {
    result.files.push(...child.files);
    result.errors.push(...child.errors);
  }

  return result;
}

function depthLimit(options: ScanOptions): number {
  return options.recursive === false ? 0 : options.maxDepth ?? DEFAULT_MAX_DEPTH;
}

export async function findAudioFiles(root: string, options: ScanOptions = {}): Promise<WalkResult> {
  const { files, errors } = await walk(resolve(root), 0, depthLimit(options), options.signal);

  return { files: files.sort(), errors };
}

/**
 * Resolves the directory that owns a file's audiobook set: its parent, lifted
 * past any disc folders (CD1, Disc 2, ...) but never above the scan root.
 */
export function findSetRoot(fileDir: string, root: string): string {
  let current = fileDir;

  while (current !== root && current.startsWith(root + sep) && isDiscFolder(basename(current))) {
    current = dirname(current);
  }

  return current;
}

export function groupFilesByAudiobook(files: string[], root: string): Map<string, string[]> {
  const groups = new Map<string, string[]>();
  const resolvedRoot = resolve(root);

  for (const file of files) {
    const setRoot = findSetRoot(dirname(file), resolvedRoot);
    const group = groups.get(setRoot);

    if (group) {
      group.push(file);
    } else {
      groups.set(setRoot, [file]);
    }
  }

  return groups;
}

async function buildTrack(
  filePath: string,
  setRoot: string,
  prober: AudioProber | null
): Promise<Track> {
  const fileStats = await stat(filePath);
  const probe = prober ? await prober(filePath) : emptyProbe();
  const classification = classifyPath(relative(setRoot, filePath), probe.tags);
  const audioFormat = audioFormatOf(filePath) ?? 'mp3';

  return {
    srcPath: filePath,
    disc: classification.disc,
    trackIndex: classification.trackIndex,
    duration: probe.duration,
    bitrate: probe.bitrate,
    channels: probe.channels,
    sampleRate: probe.sampleRate,
    fileSize: fileStats.size,
    audioFormat,
    existingTags: probe.tags,
    proposedName: null,
    proposedTags: null,
    status: 'pending',
    warnings: classification.warnings,
  };
}

function assignStatuses(set: AudiobookSet): void {
  const formats = new Set(set.tracks.map((track) => track.audioFormat));
  const seen = new Map<string, number>();

  for (const track of set.tracks) {
    if (track.trackIndex === null) {
      continue;
    }

    const key = `${track.disc}:${track.trackIndex}`;
    seen.set(key, (seen.get(key) ?? 0) + 1);
  }

  for (const track of set.tracks) {
    if (track.status === 'error') {
      continue;
    }

    if (track.trackIndex === null) {
      track.status = 'missing_number';
      track.warnings.push('No track number found in tags or filename');
    } else if (track.trackIndex !== null && (seen.get(`${track.disc}:${track.trackIndex}`) ?? 0) > 1) {
      track.status = 'duplicate';
      track.warnings.push(`Track number ${track.trackIndex} appears more than once on disc ${track.disc}`);
    } else if (isSuspiciousDuration(track.duration)) {
      track.status = 'suspicious_duration';
      track.warnings.push(`Unusual duration: ${track.duration} seconds`);
    } else if (formats.size > 1) {
      track.status = 'mixed_format';
    } else {
      track.status = 'valid';
    }
  }

  if (formats.size > 1) {
    set.warnings.push(`Mixed audio formats: ${[...formats].sort().join(', ')}`);
  }

  const unnumbered = set.tracks.filter((track) => track.status === 'missing_number').length;

  if (unnumbered > 0) {
    set.warnings.push(`${unnumbered} track(s) have no track number`);
  }
}

function sharedValue(values: Array<string | undefined>): string | null {
  const distinct = new Set(values.map((value) => value?.trim()).filter(Boolean));

  if (distinct.size !== 1 || values.some((value) => !value?.trim())) {
    return null;
  }

  return [...distinct][0] ?? null;
}

export async function buildAudiobookSet(
  setRoot: string,
  files: string[],
  prober: AudioProber | null
): Promise<AudiobookSet> {
  const warnings: string[] = [];
  const tracks: Track[] = [];

  for (const file of [...files].sort()) {
    try {
      const track = await buildTrack(file, setRoot, prober);
      tracks.push(track);

      for (const warning of track.warnings) {
        warnings.push(warning);
      }
    } catch (error) {
      warnings.push(`Skipped unreadable file ${basename(file)}: ${toError(error).message}`);
    }
  }

  const guess = guessFromFolder(basename(setRoot), tracks);
  const discCount = tracks.reduce((max, track) => Math.max(max, track.disc), 1);
  const durations = tracks.map((track) => track.duration).filter((value): value is number => value !== null);

  const set: AudiobookSet = {
    sourcePath: setRoot,
    rawTitleGuess: guess.title,
    authorGuess: guess.author,
    seriesGuess: guess.series ?? sharedValue(tracks.map((track) => track.existingTags.series)),
    volumeGuess: guess.volume,
    narratorGuess: sharedValue(tracks.map((track) => track.existingTags.narrator)),
    languageGuess: sharedValue(tracks.map((track) => track.existingTags.language)),
    yearGuess: guess.year,
    discCount,
    totalTracks: tracks.length,
    totalDuration: durations.length > 0 ? durations.reduce((sum, value) => sum + value, 0) : null,
    tracks,
    providerCandidates: [],
    chosenIdentity: null,
    skipped: false,
    warnings,
  };

  assignStatuses(set);
  set.warnings.push(...validateTrackOrder(set));

  return set;
}

function attachErrors(sets: AudiobookSet[], errors: ScanError[], options: ScanOptions): void {
  for (const error of errors) {
    const owner = sets
      .filter((set) => error.path === set.sourcePath || error.path.startsWith(set.sourcePath + sep))
      .sort((a, b) => b.sourcePath.length - a.sourcePath.length)[0];

    if (owner) {
      owner.warnings.push(`Could not read ${relative(owner.sourcePath, error.path) || '.'}: ${error.message}`);
      continue;
    }

    options.onError?.(error.path, new Error(error.message));
  }
}

/**
 * Discovers audiobook sets under root. Files are grouped by parent directory,
 * disc folders are merged into their parent set, and sets come back sorted by
 * source path. I/O problems become warnings instead of aborting the scan.
 */
export async function scanDirectory(root: string, options: ScanOptions = {}): Promise<AudiobookSet[]> {
  const resolvedRoot = resolve(root);
  const prober = options.probe === false ? null : options.probe ?? probeAudio;

  const { files, errors } = await findAudioFiles(resolvedRoot, options);
  const groups = groupFilesByAudiobook(files, resolvedRoot);
  const sets: AudiobookSet[] = [];

  for (const [setRoot, groupFiles] of groups) {
    if (options.signal?.aborted) {
      break;
    }

    const set = await buildAudiobookSet(setRoot, groupFiles, prober);

    if (set.tracks.length > 0) {
      sets.push(set);
    }
  }

  attachErrors(sets, errors, options);

  return sets.sort((a, b) => (a.sourcePath < b.sourcePath ? -1 : a.sourcePath > b.sourcePath ? 1 : 0));
}
