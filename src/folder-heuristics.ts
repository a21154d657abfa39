import type { Track } from './types.js';
import { isDiscFolder } from './parser.js';

export interface FolderGuess {
  title: string | null;
  author: string | null;
  series: string | null;
  volume: string | null;
  year: number | null;
}

type FolderClassifier = (name: string) => Omit<FolderGuess, 'year'> | null;

const AUTHOR_TITLE_SEPARATOR = ' - ';
const SERIES_VOLUME_PATTERN = /^(.+?)\s+(?:book|volume|vol\.?)\s*(\d+)$/i;
const TRAILING_YEAR_PATTERN = /\s*[([](\d{4})[)\]]\s*$/;

function authorTitle(name: string): Omit<FolderGuess, 'year'> | null {
  const parts = name.split(AUTHOR_TITLE_SEPARATOR);

  if (parts.length !== 2) {
    return null;
  }

  const author = parts[0].trim();
  const title = parts[1].trim();

  if (!author || !title) {
    return null;
  }

  return { title, author, series: null, volume: null };
}

function seriesVolume(name: string): Omit<FolderGuess, 'year'> | null {
  const match = name.match(SERIES_VOLUME_PATTERN);

  if (!match) {
    return null;
  }

  return {
    title: name,
    author: null,
    series: match[1].trim(),
    volume: match[2],
  };
}

const FOLDER_CLASSIFIERS: FolderClassifier[] = [authorTitle, seriesVolume];

function sharedTag(tracks: Track[], pick: (track: Track) => string | undefined): string | null {
  const values = new Set<string>();

  for (const track of tracks) {
    const value = pick(track)?.trim();

    if (!value) {
      return null;
    }

    values.add(value);
  }

  return values.size === 1 ? [...values][0] : null;
}

/**
 * Best-effort guesses from a folder name. Tracks are only consulted when the
 * name itself is uninformative (empty, a disc folder or a bare number) and every
 * track agrees on the album or artist tag.
 */
export function guessFromFolder(folderName: string, tracks: Track[] = []): FolderGuess {
  let name = folderName.trim();
  let year: number | null = null;

  const yearMatch = name.match(TRAILING_YEAR_PATTERN);

  if (yearMatch && yearMatch.index !== undefined && yearMatch.index > 0) {
    year = Number.parseInt(yearMatch[1], 10);
    name = name.slice(0, yearMatch.index).trim();
  }

  for (const classify of FOLDER_CLASSIFIERS) {
    const guess = classify(name);

    if (guess) {
      return { ...guess, year };
    }
  }

  if (name && !isDiscFolder(name) && !/^\d+$/.test(name)) {
    return { title: name, author: null, series: null, volume: null, year };
  }

  return {
    title: sharedTag(tracks, (track) => track.existingTags.album) ?? (name || null),
    author: sharedTag(tracks, (track) => track.existingTags.artist),
    series: null,
    volume: null,
    year,
  };
}
