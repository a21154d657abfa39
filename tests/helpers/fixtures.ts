import { mkdir, mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { dirname, join } from 'node:path';
import type { AudiobookSet, ProviderIdentity, Track } from '../../src/types.js';
import { emptyIdentity } from '../../src/providers/types.js';

export function makeTrack(overrides: Partial<Track> = {}): Track {
  return {
    srcPath: '/library/Book/01.mp3',
    disc: 1,
    trackIndex: 1,
    duration: null,
    bitrate: null,
    channels: null,
    sampleRate: null,
    fileSize: 0,
    audioFormat: 'mp3',
    existingTags: { rawTags: {} },
    proposedName: null,
    proposedTags: null,
    status: 'valid',
    warnings: [],
    ...overrides,
  };
}

export function makeSet(overrides: Partial<AudiobookSet> = {}): AudiobookSet {
  const tracks = overrides.tracks ?? [makeTrack()];

  return {
    sourcePath: '/library/Book',
    rawTitleGuess: null,
    authorGuess: null,
    seriesGuess: null,
    volumeGuess: null,
    narratorGuess: null,
    languageGuess: null,
    yearGuess: null,
    discCount: 1,
    totalTracks: tracks.length,
    totalDuration: null,
    providerCandidates: [],
    chosenIdentity: null,
    skipped: false,
    warnings: [],
    ...overrides,
    tracks,
  };
}

export function makeIdentity(overrides: Partial<ProviderIdentity> = {}): ProviderIdentity {
  return {
    ...emptyIdentity('Test Provider', 'test-1', 'Untitled'),
    ...overrides,
  };
}

export async function createTempDir(prefix = 'audiobook-organizer-'): Promise<string> {
  return mkdtemp(join(tmpdir(), prefix));
}

export async function removeTempDir(dir: string): Promise<void> {
  await rm(dir, { recursive: true, force: true });
}

/** Creates files (with placeholder content) at the given paths below root. */
export async function createFiles(root: string, paths: string[], content = 'not really audio'): Promise<string[]> {
  const created: string[] = [];

  for (const path of paths) {
    const fullPath = join(root, path);
    await mkdir(dirname(fullPath), { recursive: true });
    await writeFile(fullPath, `${content}: ${path}`);
    created.push(fullPath);
  }

  return created;
}
