import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import {
  cacheKey,
  getCachedEntry,
  loadCache,
  pruneCache,
  saveCache,
  setCacheEntry,
  type SearchCache,
} from '../src/cache.js';
import { createTempDir, makeIdentity, removeTempDir } from './helpers/fixtures.js';

const HOUR = 60 * 60 * 1000;

describe('search cache', () => {
  it('normalises queries into keys', () => {
    expect(cacheKey('openlibrary', { title: 'The Way of Kings!', author: '  Brandon  Sanderson' })).toBe(
      'openlibrary|the way of kings|brandon sanderson||||'
    );
    expect(cacheKey('librivox', { title: 'Emma', year: 1815 })).toBe('librivox|emma||||1815|');
  });

  it('expires entries after the TTL', () => {
    const cache: SearchCache = { entries: {} };
    const identities = [makeIdentity({ title: 'Dune' })];

    setCacheEntry(cache, 'openlibrary', { title: 'Dune' }, identities, 1000);

    expect(getCachedEntry(cache, 'openlibrary', { title: 'dune' }, HOUR, 1000 + HOUR)).toEqual(identities);
    expect(getCachedEntry(cache, 'openlibrary', { title: 'dune' }, HOUR, 1001 + HOUR)).toBeNull();
    expect(getCachedEntry(cache, 'librivox', { title: 'dune' }, HOUR, 1000)).toBeNull();
  });

  it('prunes expired entries', () => {
    const cache: SearchCache = { entries: {} };

    setCacheEntry(cache, 'openlibrary', { title: 'Old' }, [], 0);
    setCacheEntry(cache, 'openlibrary', { title: 'New' }, [], 2 * HOUR);

    expect(pruneCache(cache, HOUR, 2 * HOUR + 1)).toBe(1);
    expect(Object.keys(cache.entries)).toEqual(['openlibrary|new|||||']);
  });

  describe('persistence', () => {
    let dir: string;

    beforeEach(async () => {
      dir = await createTempDir();
    });

    afterEach(async () => {
      await removeTempDir(dir);
    });

    it('saves and reloads entries', async () => {
      const file = join(dir, 'nested', 'cache.json');
      const cache: SearchCache = { entries: {} };
      setCacheEntry(cache, 'openlibrary', { title: 'Dune' }, [makeIdentity({ title: 'Dune' })], 5);

      await saveCache(cache, file);

      expect(await loadCache(file)).toEqual(cache);
    });

    it('starts empty when the file is missing or unreadable', async () => {
      const file = join(dir, 'cache.json');

      expect(await loadCache(file)).toEqual({ entries: {} });

      await writeFile(file, 'not json');
      expect(await loadCache(file)).toEqual({ entries: {} });

      await writeFile(file, JSON.stringify({ entries: { key: { storedAt: 'yesterday' } } }));
      expect(await loadCache(file)).toEqual({ entries: {} });
    });
  });
});
