import type { AudiobookSet, MatchCandidate, ProviderIdentity } from '../types.js';
import type { Config, ProviderId, ProviderSettings } from '../config.js';
import { PROVIDER_IDS } from '../config.js';
import { DEFAULT_WEIGHTS, PUBLIC_DOMAIN_WEIGHTS, queryForSet, rankCandidates, sortCandidates } from '../matcher.js';
import { getCachedEntry, setCacheEntry, type SearchCache } from '../cache.js';
import { toError } from '../errors.js';
import { OpenLibraryProvider } from './openlibrary.js';
import { LibriVoxProvider } from './librivox.js';
import type { MetadataProvider, SearchOptions } from './types.js';

export interface ProviderManagerOptions {
  cache?: SearchCache | null;
  cacheTtlMs?: number;
  limit?: number;
  signal?: AbortSignal;
  onError?: (provider: MetadataProvider, error: Error) => void;
}

export interface ProviderInfo {
  id: ProviderId;
  name: string;
  enabled: boolean;
  description: string;
}

const DESCRIPTIONS: Record<ProviderId, { name: string; description: string }> = {
  openlibrary: { name: 'Open Library', description: 'Free, comprehensive book database' },
  librivox: { name: 'LibriVox', description: 'Public domain audiobooks' },
};

function settingsFor(providers: Config['providers'], id: ProviderId): ProviderSettings {
  return id === 'openlibrary' ? providers.openLibrary : providers.librivox;
}

export function createProvider(id: ProviderId, settings: ProviderSettings): MetadataProvider {
  switch (id) {
    case 'openlibrary':
      return new OpenLibraryProvider({
        timeoutMs: settings.timeoutMs,
        rateLimitMs: settings.rateLimitMs,
        weights: { ...DEFAULT_WEIGHTS, ...settings.weights },
      });
    case 'librivox':
      return new LibriVoxProvider({
        timeoutMs: settings.timeoutMs,
        rateLimitMs: settings.rateLimitMs,
        weights: { ...PUBLIC_DOMAIN_WEIGHTS, ...settings.weights },
      });
  }
}

/**
 * Enabled providers, those named in priorityOrder first and any other enabled
 * provider after them.
 */
export function createProviders(providers: Config['providers']): MetadataProvider[] {
  const order = [...new Set([...providers.priorityOrder, ...PROVIDER_IDS])];

  return order
    .filter((id) => settingsFor(providers, id).enabled)
    .map((id) => createProvider(id, settingsFor(providers, id)));
}

export function listProviders(config: Config): ProviderInfo[] {
  return PROVIDER_IDS.map((id) => ({
    id,
    ...DESCRIPTIONS[id],
    enabled: settingsFor(config.providers, id).enabled,
  }));
}

export class ProviderManager {
  private readonly providers: MetadataProvider[];
  private readonly options: ProviderManagerOptions;

  constructor(providers: MetadataProvider[], options: ProviderManagerOptions = {}) {
    this.providers = providers;
    this.options = options;
  }

  static fromConfig(config: Config, options: ProviderManagerOptions = {}): ProviderManager {
    return new ProviderManager(createProviders(config.providers), {
      cacheTtlMs: config.cacheTtlHours * 60 * 60 * 1000,
      ...options,
    });
  }

  getEnabledProviders(): MetadataProvider[] {
    return [...this.providers];
  }

  getProvider(id: string): MetadataProvider | null {
    return this.providers.find((provider) => provider.id === id.toLowerCase()) ?? null;
  }

  getPrimaryProvider(): MetadataProvider | null {
    return this.providers[0] ?? null;
  }

  private async searchIdentities(provider: MetadataProvider, set: AudiobookSet): Promise<ProviderIdentity[]> {
    const { cache, cacheTtlMs = 0, limit, signal } = this.options;
    const query = queryForSet(set);

    if (cache && cacheTtlMs > 0) {
      const cached = getCachedEntry(cache, provider.id, query, cacheTtlMs);

      if (cached) {
        return cached;
      }
    }

    const searchOptions: SearchOptions = { limit, signal };
    const identities = await provider.search(query, searchOptions);

    if (cache) {
      setCacheEntry(cache, provider.id, query, identities);
    }

    return identities;
  }

  async searchProvider(provider: MetadataProvider, set: AudiobookSet): Promise<MatchCandidate[]> {
    try {
      const identities = await this.searchIdentities(provider, set);

      return rankCandidates(set, identities, (scored, identity) => provider.calculateMatchScore(scored, identity));
    } catch (error) {
      this.options.onError?.(provider, toError(error));
      return [];
    }
  }

  /**
   * Queries every provider concurrently and merges the candidates. The merge
   * keeps priority order before the stable sort, so equal scores favour the
   * higher-priority provider. A high-confidence leader becomes the set's chosen
   * identity unless one is already set.
   */
  async matchSet(set: AudiobookSet): Promise<MatchCandidate[]> {
    const perProvider = await Promise.all(this.providers.map((provider) => this.searchProvider(provider, set)));
    const candidates = sortCandidates(perProvider.flat());

    set.providerCandidates = candidates;

    const [top] = candidates;

    if (!set.chosenIdentity && top && top.confidenceLevel === 'high') {
      set.chosenIdentity = top.identity;
    }

    return candidates;
  }

  async matchSets(
    sets: AudiobookSet[],
    onProgress?: (completed: number, set: AudiobookSet) => void
  ): Promise<void> {
    let completed = 0;

    for (const set of sets) {
      if (this.options.signal?.aborted) {
        break;
      }

      await this.matchSet(set);
      completed++;
      onProgress?.(completed, set);
    }
  }
}
