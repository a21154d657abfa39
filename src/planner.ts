import { randomUUID } from 'node:crypto';
import { basename, dirname, join } from 'node:path';
import type { AudioTags, AudiobookSet, ProviderIdentity, RenameOperation, RenamePlan, Track } from './types.js';
import {
  DEFAULT_FILENAME_TEMPLATE,
  DEFAULT_FOLDER_TEMPLATE,
  TemplateEngine,
  effectiveTrackIndex,
} from './templates.js';

export interface PlanOptions {
  engine?: TemplateEngine;
  folderTemplate?: string;
  filenameTemplate?: string;
  zeroPaddingWidth?: number;
  // Destination root; null renames each set beside its current folder.
  outputRoot?: string | null;
  sourcePath?: string;
  dryRun?: boolean;
  planId?: string;
  now?: Date;
  caseInsensitive?: boolean;
}

export interface ValidateOptions {
  caseInsensitive?: boolean;
}

export function isCaseInsensitivePlatform(platform: NodeJS.Platform = process.platform): boolean {
  return platform === 'darwin' || platform === 'win32';
}

export function tempPathFor(oldPath: string, planId: string): string {
  return join(dirname(oldPath), `.${basename(oldPath)}.${planId}.tmp`);
}

const tagEngine = new TemplateEngine({ casePolicy: 'as_is' });

/**
 * Tags a track should carry after the rename, taken from the chosen identity
 * where there is one and from the set's guesses otherwise.
 */
export function proposeTags(set: AudiobookSet, identity: ProviderIdentity | null, track: Track): AudioTags {
  const tokens = tagEngine.buildTokens(set, identity, track);
  const tags: AudioTags = {
    title: track.existingTags.title?.trim() || tokens.TrackTitle,
    album: tokens.Title,
    artist: tokens.Author,
    albumArtist: tokens.Author,
    track: effectiveTrackIndex(set, track),
    disc: track.disc,
    genre: 'Audiobook',
    rawTags: {},
  };

  if (tokens.Year) {
    tags.date = tokens.Year;
  }

  if (tokens.SeriesName) {
    tags.series = tokens.SeriesName;
  }

  if (tokens.SeriesIndex) {
    tags.seriesIndex = tokens.SeriesIndex;
  }

  if (tokens.Narrator) {
    tags.narrator = tokens.Narrator;
  }

  if (tokens.Language) {
    tags.language = tokens.Language;
  }

  if (tokens.ISBN) {
    tags.isbn = tokens.ISBN;
  }

  if (identity?.asin) {
    tags.asin = identity.asin;
  }

  return tags;
}

function countBy(values: string[]): Map<string, number> {
  const counts = new Map<string, number>();

  for (const value of values) {
    counts.set(value, (counts.get(value) ?? 0) + 1);
  }

  return counts;
}

/**
 * Re-checks a plan, replacing its conflicts and warnings. Returns false when
 * two operations target the same path, counting those that would leave a file
 * where it is; those no-ops are then dropped. Paths differing only in case
 * are reported as warnings when the filesystem is presumed case-insensitive.
 */
export function validatePlan(plan: RenamePlan, options: ValidateOptions = {}): boolean {
  const caseInsensitive = options.caseInsensitive ?? isCaseInsensitivePlatform();

  plan.conflicts = [];
  plan.warnings = [];

  for (const [path, count] of countBy(plan.operations.map((operation) => operation.newPath))) {
    if (count > 1) {
      plan.conflicts.push(`Duplicate target path: ${path}`);
    }
  }

  const kept: RenameOperation[] = [];

  for (const operation of plan.operations) {
    if (operation.oldPath === operation.newPath) {
      plan.warnings.push(`Already named correctly, skipping: ${operation.oldPath}`);
      continue;
    }

    kept.push(operation);
  }

  plan.operations = kept;

  if (caseInsensitive) {
    const byLowercase = new Map<string, Set<string>>();

    for (const operation of kept) {
      const key = operation.newPath.toLowerCase();
      const paths = byLowercase.get(key) ?? new Set<string>();
      paths.add(operation.newPath);
      byLowercase.set(key, paths);
    }

    for (const paths of byLowercase.values()) {
      if (paths.size > 1) {
        plan.warnings.push(`Paths differ only in case: ${[...paths].join(', ')}`);
      }
    }
  }

  for (const operation of kept) {
    if (operation.track.status === 'missing_number') {
      plan.warnings.push(`No track number for ${basename(operation.oldPath)}; placed after numbered tracks`);
    }
  }

  return plan.conflicts.length === 0;
}

/**
 * Renders destination paths for every track of every set the user did not
 * skip. The chosen identity is used when present, otherwise the folder
 * guesses. Invalid templates leave the plan empty with the template errors as
 * its conflicts.
 */
export function buildRenamePlan(sets: AudiobookSet[], options: PlanOptions = {}): RenamePlan {
  const engine = options.engine ?? new TemplateEngine();
  const folderTemplate = options.folderTemplate ?? DEFAULT_FOLDER_TEMPLATE;
  const filenameTemplate = options.filenameTemplate ?? DEFAULT_FILENAME_TEMPLATE;
  const planId = options.planId ?? randomUUID();
  const included = sets.filter((set) => !set.skipped);

  const plan: RenamePlan = {
    planId,
    createdAt: (options.now ?? new Date()).toISOString(),
    sourcePath: options.sourcePath ?? (sets.length > 0 ? dirname(sets[0].sourcePath) : ''),
    operations: [],
    audiobookSets: included,
    dryRun: options.dryRun ?? true,
    conflicts: [],
    warnings: [],
  };

  const templateErrors = [
    ...engine.validateTemplate(folderTemplate).errors.map((error) => `Folder template: ${error}`),
    ...engine.validateTemplate(filenameTemplate).errors.map((error) => `Filename template: ${error}`),
  ];

  if (templateErrors.length > 0) {
    plan.conflicts = templateErrors;
    return plan;
  }

  for (const set of included) {
    const identity = set.chosenIdentity;
    const root = options.outputRoot ?? dirname(set.sourcePath);
    const folder = join(root, engine.generateFolderName(set, identity, folderTemplate));

    for (const track of set.tracks) {
      const filename = engine.generateFilename(track, set, identity, filenameTemplate, options.zeroPaddingWidth ?? 0);

      track.proposedName = filename;
      track.proposedTags = proposeTags(set, identity, track);

      plan.operations.push({
        oldPath: track.srcPath,
        newPath: join(folder, filename),
        tempPath: tempPathFor(track.srcPath, planId),
        track,
      });
    }
  }

  validatePlan(plan, { caseInsensitive: options.caseInsensitive });

  return plan;
}
