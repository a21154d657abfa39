import type {
  AudiobookSet,
  MatchCandidate,
  MatchConfidence,
  ProviderIdentity,
  ScoringWeights,
} from './types.js';
import { bestSimilarity, normalizeLanguage, similarityRatio, yearProximity } from './similarity.js';
import type { MetadataProvider, SearchOptions, SearchQuery } from './providers/types.js';
import { toError } from './errors.js';

export const DEFAULT_WEIGHTS: ScoringWeights = {
  title: 0.4,
  author: 0.3,
  series: 0.2,
  narrator: 0.1,
  year: 0.05,
  language: 0.1,
  publicDomain: 0,
};

// Sources with sparse metadata lean harder on title and author.
export const PUBLIC_DOMAIN_WEIGHTS: ScoringWeights = {
  title: 0.5,
  author: 0.35,
  series: 0,
  narrator: 0,
  year: 0,
  language: 0.1,
  publicDomain: 0.05,
};

const HIGH_THRESHOLD = 0.85;
const MEDIUM_THRESHOLD = 0.65;

interface WeightedSignal {
  weight: number;
  score: number;
}

function collectSignals(
  set: AudiobookSet,
  identity: ProviderIdentity,
  weights: ScoringWeights
): WeightedSignal[] {
  const signals: WeightedSignal[] = [];

  if (weights.title > 0 && set.rawTitleGuess && identity.title) {
    signals.push({ weight: weights.title, score: similarityRatio(set.rawTitleGuess, identity.title) });
  }

  if (weights.author > 0 && set.authorGuess && identity.authors.length > 0) {
    signals.push({ weight: weights.author, score: bestSimilarity(set.authorGuess, identity.authors) });
  }

  if (weights.series > 0 && set.seriesGuess && identity.seriesName) {
    signals.push({ weight: weights.series, score: similarityRatio(set.seriesGuess, identity.seriesName) });
  }

  if (weights.narrator > 0 && set.narratorGuess && identity.narrator) {
    signals.push({ weight: weights.narrator, score: similarityRatio(set.narratorGuess, identity.narrator) });
  }

  if (weights.year > 0 && set.yearGuess !== null && identity.year !== null) {
    signals.push({ weight: weights.year, score: yearProximity(set.yearGuess, identity.year) });
  }

  if (weights.language > 0 && set.languageGuess && identity.language) {
    const same = normalizeLanguage(set.languageGuess) === normalizeLanguage(identity.language);
    signals.push({ weight: weights.language, score: same ? 1 : 0 });
  }

  if (weights.publicDomain > 0 && identity.rawData.publicDomain === true) {
    signals.push({ weight: weights.publicDomain, score: 1 });
  }

  return signals;
}

/**
 * Weighted similarity between a set's guesses and a provider identity. Only
 * signals present on both sides count, and the result is renormalised over the
 * weights actually applied.
 */
export function calculateMatchScore(
  set: AudiobookSet,
  identity: ProviderIdentity,
  weights: ScoringWeights = DEFAULT_WEIGHTS
): number {
  const signals = collectSignals(set, identity, weights);
  const totalWeight = signals.reduce((sum, signal) => sum + signal.weight, 0);

  if (totalWeight === 0) {
    return 0;
  }

  const score = signals.reduce((sum, signal) => sum + signal.score * signal.weight, 0) / totalWeight;

  return Math.min(1, Math.max(0, score));
}

export function getConfidenceLevel(score: number): MatchConfidence {
  if (score > HIGH_THRESHOLD) {
    return 'high';
  }

  if (score >= MEDIUM_THRESHOLD) {
    return 'medium';
  }

  return 'low';
}

function contains(haystack: string, needle: string): boolean {
  return haystack.toLowerCase().includes(needle.toLowerCase());
}

export function getMatchReasons(set: AudiobookSet, identity: ProviderIdentity, score: number): string[] {
  const reasons: string[] = [];

  if (set.rawTitleGuess && identity.title && contains(identity.title, set.rawTitleGuess)) {
    reasons.push('Title match');
  }

  const authorGuess = set.authorGuess;

  if (authorGuess && identity.authors.some((author) => contains(author, authorGuess))) {
    reasons.push('Author match');
  }

  if (set.seriesGuess && identity.seriesName && contains(identity.seriesName, set.seriesGuess)) {
    reasons.push('Series match');
  }

  const level = getConfidenceLevel(score);

  if (level === 'high') {
    reasons.push('High confidence match');
  } else if (level === 'medium') {
    reasons.push('Good match');
  } else {
    reasons.push('Possible match');
  }

  return reasons;
}

export type MatchScorer = (set: AudiobookSet, identity: ProviderIdentity) => number;

export function createCandidate(set: AudiobookSet, identity: ProviderIdentity, confidence: number): MatchCandidate {
  return {
    identity,
    confidence,
    confidenceLevel: getConfidenceLevel(confidence),
    matchReasons: getMatchReasons(set, identity, confidence),
  };
}

/**
 * Sorts by confidence, highest first. Array.prototype.sort is stable, so ties
 * keep the order the candidates were supplied in.
 */
export function sortCandidates(candidates: MatchCandidate[]): MatchCandidate[] {
  return [...candidates].sort((a, b) => b.confidence - a.confidence);
}

export function rankCandidates(
  set: AudiobookSet,
  identities: ProviderIdentity[],
  scorer: MatchScorer = calculateMatchScore
): MatchCandidate[] {
  return sortCandidates(identities.map((identity) => createCandidate(set, identity, scorer(set, identity))));
}

export function queryForSet(set: AudiobookSet): SearchQuery {
  const isbn = set.tracks.find((track) => track.existingTags.isbn)?.existingTags.isbn;

  return {
    title: set.rawTitleGuess ?? undefined,
    author: set.authorGuess ?? undefined,
    series: set.seriesGuess ?? undefined,
    isbn,
    year: set.yearGuess ?? undefined,
    language: set.languageGuess ?? undefined,
  };
}

/**
 * Searches one provider with the set's guesses and ranks the results. A failed
 * search is indistinguishable from a search with no results.
 */
export async function findMatches(
  set: AudiobookSet,
  provider: MetadataProvider,
  options: SearchOptions = {}
): Promise<MatchCandidate[]> {
  try {
    const identities = await provider.search(queryForSet(set), options);

    return rankCandidates(set, identities, (scored, identity) => provider.calculateMatchScore(scored, identity));
  } catch (error) {
    options.onError?.(toError(error));
    return [];
  }
}
