import levenshtein from 'fast-levenshtein';

export function normalizeForComparison(value: string): string {
  return value.toLowerCase().replace(/\s+/g, ' ').trim();
}

/**
 * Edit-distance similarity in [0, 1]: 1 - distance / longer length, compared
 * case-insensitively. Two empty strings are identical.
 */
export function similarityRatio(a: string, b: string): number {
  const left = normalizeForComparison(a);
  const right = normalizeForComparison(b);
  const maxLen = Math.max(left.length, right.length);

  if (maxLen === 0) {
    return 1;
  }

  return 1 - levenshtein.get(left, right) / maxLen;
}

export function bestSimilarity(value: string, candidates: string[]): number {
  let best = 0;

  for (const candidate of candidates) {
    best = Math.max(best, similarityRatio(value, candidate));
  }

  return best;
}

export function yearProximity(a: number, b: number): number {
  const diff = Math.abs(a - b);

  if (diff === 0) {
    return 1;
  }

  if (diff <= 2) {
    return 0.8;
  }

  if (diff <= 5) {
    return 0.5;
  }

  return 0;
}

const LANGUAGE_ALIASES: Record<string, string> = {
  english: 'en',
  eng: 'en',
  german: 'de',
  deutsch: 'de',
  ger: 'de',
  deu: 'de',
  french: 'fr',
  fre: 'fr',
  fra: 'fr',
  spanish: 'es',
  spa: 'es',
  italian: 'it',
  ita: 'it',
  dutch: 'nl',
  dut: 'nl',
  nld: 'nl',
};

export function normalizeLanguage(language: string): string {
  const key = language.trim().toLowerCase();
  return LANGUAGE_ALIASES[key] ?? key;
}
