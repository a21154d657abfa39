import type { AudiobookSet, Track } from './types.js';

const MIN_TRACK_SECONDS = 1;
const MAX_TRACK_SECONDS = 24 * 60 * 60;

export function hasMultiDisc(set: AudiobookSet): boolean {
  return set.discCount > 1;
}

export function trackCountByDisc(set: AudiobookSet): Map<number, number> {
  const counts = new Map<number, number>();

  for (const track of set.tracks) {
    counts.set(track.disc, (counts.get(track.disc) ?? 0) + 1);
  }

  return counts;
}

function compareTracks(a: Track, b: Track): number {
  if (a.trackIndex === null && b.trackIndex === null) {
    return a.srcPath.localeCompare(b.srcPath);
  }

  if (a.trackIndex === null) return 1;
  if (b.trackIndex === null) return -1;

  return a.trackIndex - b.trackIndex || a.srcPath.localeCompare(b.srcPath);
}

export function getTracksForDisc(set: AudiobookSet, disc: number): Track[] {
  return set.tracks.filter((track) => track.disc === disc).sort(compareTracks);
}

export function maxTrackIndex(set: AudiobookSet): number {
  let max = 0;

  for (const track of set.tracks) {
    if (track.trackIndex !== null && track.trackIndex > max) {
      max = track.trackIndex;
    }
  }

  return max;
}

/**
 * Checks every disc from 1 to discCount for missing discs, numbering that is
 * not a contiguous 1..N run, and duplicated numbers. Unnumbered tracks are
 * ignored here; the scanner flags them separately.
 */
export function validateTrackOrder(set: AudiobookSet): string[] {
  const issues: string[] = [];

  for (let disc = 1; disc <= set.discCount; disc++) {
    const discTracks = getTracksForDisc(set, disc);

    if (discTracks.length === 0) {
      issues.push(`Disc ${disc} has no tracks`);
      continue;
    }

    const numbers = discTracks
      .map((track) => track.trackIndex)
      .filter((index): index is number => index !== null);

    if (numbers.length === 0) {
      continue;
    }

    const contiguous = numbers.every((value, i) => value === i + 1);

    if (!contiguous) {
      const listed = numbers.join(', ');
      issues.push(`Disc ${disc} track numbers are not a contiguous 1..${numbers.length} run: [${listed}]`);
    }

    const present = new Set(numbers);
    const highest = Math.max(...numbers);
    const missing: number[] = [];

    for (let index = 1; index <= highest; index++) {
      if (!present.has(index)) {
        missing.push(index);
      }
    }

    if (missing.length > 0) {
      issues.push(`Disc ${disc} is missing track numbers: [${missing.join(', ')}]`);
    }

    const duplicates = numbers.filter((value, i) => i > 0 && numbers[i - 1] === value);

    if (duplicates.length > 0) {
      issues.push(`Disc ${disc} has duplicate track numbers: [${[...new Set(duplicates)].join(', ')}]`);
    }
  }

  return issues;
}

export function isSuspiciousDuration(duration: number | null): boolean {
  if (duration === null) {
    return false;
  }

  return duration < MIN_TRACK_SECONDS || duration > MAX_TRACK_SECONDS;
}

export function findSuspiciousTracks(set: AudiobookSet): Track[] {
  return set.tracks.filter((track) => isSuspiciousDuration(track.duration));
}
