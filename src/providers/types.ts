import type { AudiobookSet, ProviderIdentity, ScoringWeights } from '../types.js';

export interface SearchQuery {
  title?: string;
  author?: string;
  series?: string;
  isbn?: string;
  year?: number;
  language?: string;
}

export interface SearchOptions {
  limit?: number;
  timeoutMs?: number;
  signal?: AbortSignal;
  onError?: (error: Error) => void;
}

/**
 * A bibliographic source. search resolves to an empty list when nothing
 * matches and rejects with ProviderTimeoutError when the caller's timeout
 * elapses first.
 */
export interface MetadataProvider {
  readonly id: string;
  readonly name: string;
  readonly weights: ScoringWeights;
  search(query: SearchQuery, options?: SearchOptions): Promise<ProviderIdentity[]>;
  getById(externalId: string, options?: SearchOptions): Promise<ProviderIdentity | null>;
  calculateMatchScore(set: AudiobookSet, identity: ProviderIdentity): number;
}

export function emptyIdentity(provider: string, externalId: string, title: string): ProviderIdentity {
  return {
    provider,
    externalId,
    title,
    authors: [],
    seriesName: null,
    seriesIndex: null,
    year: null,
    language: null,
    narrator: null,
    edition: null,
    publisher: null,
    isbn10: null,
    isbn13: null,
    asin: null,
    description: null,
    coverUrls: [],
    rawData: {},
  };
}
