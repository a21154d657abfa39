import { basename, extname } from 'node:path';

export interface DiscHypothesis {
  disc: number;
  warning: string | null;
}

export interface PathClassification {
  trackIndex: number | null;
  disc: number;
  warnings: string[];
}

type NumberClassifier = (stem: string) => number | null;

function matchNumber(pattern: RegExp): NumberClassifier {
  return (text) => {
    const match = text.match(pattern);

    if (!match) {
      return null;
    }

    return Number.parseInt(match[1], 10);
  };
}

// Priority order matters: the first classifier that matches wins.
const TRACK_CLASSIFIERS: NumberClassifier[] = [
  matchNumber(/^(\d+)(?=[\s_.-]|$)/),
  matchNumber(/track\s*(\d+)/i),
  matchNumber(/chapter\s*(\d+)/i),
  matchNumber(/part\s*(\d+)/i),
];

const DISC_CLASSIFIERS: NumberClassifier[] = [
  matchNumber(/cd\s*(\d+)/i),
  matchNumber(/dis[ck]\s*(\d+)/i),
  matchNumber(/book\s*(\d+)/i),
  matchNumber(/volume\s*(\d+)/i),
];

const DISC_FOLDER_PATTERN = /^(?:cd|dis[ck])\s*[-_.]?\s*\d+$/i;

function firstMatch(classifiers: NumberClassifier[], text: string): number | null {
  for (const classify of classifiers) {
    const value = classify(text);

    if (value !== null) {
      return value;
    }
  }

  return null;
}

function isUsableNumber(value: number | undefined | null): value is number {
  return typeof value === 'number' && Number.isInteger(value) && value > 0;
}

export function fileStem(filePath: string): string {
  return basename(filePath, extname(filePath));
}

export function splitSegments(relativePath: string): string[] {
  return relativePath.split(/[\\/]/).filter(Boolean);
}

export function parseTrackNumber(filePath: string, tagTrack?: number | null): number | null {
  if (isUsableNumber(tagTrack)) {
    return tagTrack;
  }

  return firstMatch(TRACK_CLASSIFIERS, fileStem(filePath));
}

/**
 * Infers the disc number from the directory segments of a path relative to the
 * audiobook root. The segment nearest the file wins; when another segment also
 * names a different disc the hypothesis carries a warning.
 */
export function parseDiscNumber(relativePath: string, tagDisc?: number | null): DiscHypothesis {
  const directories = splitSegments(relativePath).slice(0, -1);
  const found: Array<{ segment: string; disc: number }> = [];

  for (let i = directories.length - 1; i >= 0; i--) {
    const disc = firstMatch(DISC_CLASSIFIERS, directories[i]);

    if (disc !== null) {
      found.push({ segment: directories[i], disc });
    }
  }

  if (found.length === 0) {
    return { disc: isUsableNumber(tagDisc) ? tagDisc : 1, warning: null };
  }

  const [nearest, ...others] = found;
  const conflicting = others.filter((entry) => entry.disc !== nearest.disc);

  if (conflicting.length === 0) {
    return { disc: nearest.disc, warning: null };
  }

  const segments = [nearest, ...conflicting].map((entry) => `"${entry.segment}"`).join(', ');

  return {
    disc: nearest.disc,
    warning: `Ambiguous disc folders ${segments} in ${relativePath}; using disc ${nearest.disc}`,
  };
}

export function isDiscFolder(name: string): boolean {
  return DISC_FOLDER_PATTERN.test(name.trim());
}

export function classifyPath(
  relativePath: string,
  tags: { track?: number; disc?: number } = {}
): PathClassification {
  const warnings: string[] = [];
  const { disc, warning } = parseDiscNumber(relativePath, tags.disc);

  if (warning) {
    warnings.push(warning);
  }

  return {
    trackIndex: parseTrackNumber(relativePath, tags.track),
    disc,
    warnings,
  };
}
