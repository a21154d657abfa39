import { readFile, writeFile, mkdir } from 'node:fs/promises';
import { join, dirname } from 'node:path';
import { homedir } from 'node:os';
import type { ProviderIdentity } from './types.js';
import type { SearchQuery } from './providers/types.js';
import { SearchCacheSchema } from './schemas.js';

export const DEFAULT_CACHE_FILE = join(homedir(), '.audiobook-organizer', 'cache.json');

export interface CacheEntry {
  identities: ProviderIdentity[];
  storedAt: number;
}

export interface SearchCache {
  entries: Record<string, CacheEntry>;
}

function createEmptyCache(): SearchCache {
  return { entries: {} };
}

export async function loadCache(cacheFile: string = DEFAULT_CACHE_FILE): Promise<SearchCache> {
  try {
    const data = await readFile(cacheFile, 'utf-8');
    const parsed = SearchCacheSchema.safeParse(JSON.parse(data));

    return parsed.success ? parsed.data : createEmptyCache();
  } catch {
    return createEmptyCache();
  }
}

export async function saveCache(cache: SearchCache, cacheFile: string = DEFAULT_CACHE_FILE): Promise<void> {
  await mkdir(dirname(cacheFile), { recursive: true });
  await writeFile(cacheFile, JSON.stringify(cache, null, 2));
}

function normalizeValue(value: string | number | undefined): string {
  return String(value ?? '')
    .toLowerCase()
    .replace(/[^a-z0-9]/g, ' ')
    .replace(/\s+/g, ' ')
    .trim();
}

export function cacheKey(providerId: string, query: SearchQuery): string {
  const fields = [query.title, query.author, query.series, query.isbn, query.year, query.language];
  return [providerId, ...fields.map(normalizeValue)].join('|');
}

export function getCachedEntry(
  cache: SearchCache,
  providerId: string,
  query: SearchQuery,
  ttlMs: number,
  now: number = Date.now()
): ProviderIdentity[] | null {
  const entry = cache.entries[cacheKey(providerId, query)];

  if (!entry || now - entry.storedAt > ttlMs) {
    return null;
  }

  return entry.identities;
}

export function setCacheEntry(
  cache: SearchCache,
  providerId: string,
  query: SearchQuery,
  identities: ProviderIdentity[],
  now: number = Date.now()
): void {
  cache.entries[cacheKey(providerId, query)] = {
    identities,
    storedAt: now,
  };
}

export function pruneCache(cache: SearchCache, ttlMs: number, now: number = Date.now()): number {
  let removed = 0;

  for (const [key, entry] of Object.entries(cache.entries)) {
    if (now - entry.storedAt > ttlMs) {
      delete cache.entries[key];
      removed++;
    }
  }

  return removed;
}
