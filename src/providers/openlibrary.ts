import { z } from 'zod';
import type { AudiobookSet, ProviderIdentity, ScoringWeights } from '../types.js';
import { DEFAULT_WEIGHTS, calculateMatchScore } from '../matcher.js';
import { fetchJson, RateLimiter } from './http.js';
import { emptyIdentity, type MetadataProvider, type SearchOptions, type SearchQuery } from './types.js';

const BASE_URL = 'https://openlibrary.org';
const COVERS_URL = 'https://covers.openlibrary.org/b/id';
const MAX_LIMIT = 100;
const SEARCH_FIELDS = 'key,title,author_name,first_publish_year,isbn,cover_i,publisher,language';

const SearchDocSchema = z.object({
  key: z.string(),
  title: z.string().optional(),
  author_name: z.array(z.string()).optional(),
  first_publish_year: z.number().int().optional(),
  isbn: z.array(z.string()).optional(),
  cover_i: z.number().int().optional(),
  publisher: z.array(z.string()).optional(),
  language: z.array(z.string()).optional(),
});

const SearchResponseSchema = z.object({
  docs: z.array(z.unknown()).default([]),
});

const BookDataSchema = z.object({
  title: z.string(),
  url: z.string().optional(),
  authors: z.array(z.object({ name: z.string() })).optional(),
  publishers: z.array(z.object({ name: z.string() })).optional(),
  publish_date: z.string().optional(),
  identifiers: z
    .object({
      isbn_10: z.array(z.string()).optional(),
      isbn_13: z.array(z.string()).optional(),
      openlibrary: z.array(z.string()).optional(),
    })
    .optional(),
  cover: z.object({ large: z.string().optional(), medium: z.string().optional(), small: z.string().optional() }).optional(),
});

const WorkSchema = z.object({
  key: z.string(),
  title: z.string(),
  description: z.union([z.string(), z.object({ value: z.string() })]).optional(),
  first_publish_date: z.string().optional(),
  covers: z.array(z.number().int()).optional(),
  subjects: z.array(z.string()).optional(),
  authors: z.array(z.object({ author: z.object({ key: z.string() }) })).optional(),
});

const EditionSchema = z.object({
  key: z.string().optional(),
  isbn_10: z.array(z.string()).optional(),
  isbn_13: z.array(z.string()).optional(),
  publish_date: z.string().optional(),
  publishers: z.array(z.string()).optional(),
  covers: z.array(z.number().int()).optional(),
  subtitle: z.string().optional(),
  physical_format: z.string().optional(),
  edition_name: z.string().optional(),
});

const EditionsResponseSchema = z.object({
  entries: z.array(z.unknown()).default([]),
});

const AuthorSchema = z.object({
  name: z.string(),
});

type SearchDoc = z.infer<typeof SearchDocSchema>;

export type Edition = z.infer<typeof EditionSchema>;

export interface OpenLibraryOptions {
  timeoutMs?: number;
  rateLimitMs?: number;
  weights?: ScoringWeights;
}

export function cleanIsbn(isbn: string): string {
  return isbn.toUpperCase().replace(/[^0-9X]/g, '');
}

function coverUrls(coverId: number | undefined): string[] {
  if (coverId === undefined) {
    return [];
  }

  return ['L', 'M', 'S'].map((size) => `${COVERS_URL}/${coverId}-${size}.jpg`);
}

function parseYear(text: string | undefined): number | null {
  const match = text?.match(/\b(\d{4})\b/);
  return match ? Number.parseInt(match[1], 10) : null;
}

function hasValue(value: string | unknown[] | undefined): boolean {
  return value !== undefined && value.length > 0;
}

function scoreEdition(edition: Edition): number {
  let score = 0;

  if (edition.isbn_13 || edition.isbn_10) {
    score += 10;
  }

  if (edition.publish_date !== undefined) {
    score += 5;
  }

  for (const value of [edition.subtitle, edition.publishers, edition.physical_format, edition.covers]) {
    if (hasValue(value)) {
      score += 1;
    }
  }

  return score;
}

/** Picks the edition with the most complete record; the first one wins ties. */
export function pickBestEdition(editions: Edition[]): Edition | null {
  let best: Edition | null = null;
  let bestScore = -1;

  for (const edition of editions) {
    const score = scoreEdition(edition);

    if (score > bestScore) {
      best = edition;
      bestScore = score;
    }
  }

  return best;
}

function applyEdition(identity: ProviderIdentity, edition: Edition): void {
  const isbn13 = edition.isbn_13?.[0];
  const isbn10 = edition.isbn_10?.[0];
  const publisher = edition.publishers?.[0];
  const year = parseYear(edition.publish_date);

  if (isbn13) identity.isbn13 = cleanIsbn(isbn13);
  if (isbn10) identity.isbn10 = cleanIsbn(isbn10);
  if (year !== null) identity.year = year;
  if (publisher) identity.publisher = publisher;
  if (edition.edition_name) identity.edition = edition.edition_name;

  if (edition.covers?.length) {
    identity.coverUrls = coverUrls(edition.covers[0]);
  }
}

export class OpenLibraryProvider implements MetadataProvider {
  readonly id = 'openlibrary';
  readonly name = 'Open Library';
  readonly weights: ScoringWeights;
  private readonly timeoutMs: number;
  private readonly limiter: RateLimiter;

  constructor(options: OpenLibraryOptions = {}) {
    this.timeoutMs = options.timeoutMs ?? 30000;
    this.limiter = new RateLimiter(options.rateLimitMs ?? 100);
    this.weights = options.weights ?? DEFAULT_WEIGHTS;
  }

  calculateMatchScore(set: AudiobookSet, identity: ProviderIdentity): number {
    return calculateMatchScore(set, identity, this.weights);
  }

  async search(query: SearchQuery, options: SearchOptions = {}): Promise<ProviderIdentity[]> {
    if (query.isbn) {
      const byIsbn = await this.searchByIsbn(query.isbn, options);

      if (byIsbn) {
        return [byIsbn];
      }
    }

    const parts: string[] = [];

    if (query.title) {
      parts.push(`title:"${query.title}"`);
    }

    if (query.author) {
      parts.push(`author:"${query.author}"`);
    }

    if (parts.length === 0) {
      return [];
    }

    await this.limiter.wait();

    const data = await fetchJson(`${BASE_URL}/search.json`, {
      provider: this.name,
      timeoutMs: options.timeoutMs ?? this.timeoutMs,
      signal: options.signal,
      params: {
        q: parts.join(' AND '),
        limit: Math.min(options.limit ?? 10, MAX_LIMIT),
        fields: SEARCH_FIELDS,
        language: query.language,
      },
    });

    const parsed = SearchResponseSchema.safeParse(data);

    if (!parsed.success) {
      return [];
    }

    const identities: ProviderIdentity[] = [];

    for (const raw of parsed.data.docs) {
      const doc = SearchDocSchema.safeParse(raw);

      if (!doc.success) {
        continue;
      }

      const identity = this.parseSearchDoc(doc.data);

      if (identity) {
        identities.push(identity);
      }
    }

    return identities;
  }

  async getById(externalId: string, options: SearchOptions = {}): Promise<ProviderIdentity | null> {
    const key = externalId.startsWith('/works/') ? externalId : `/works/${externalId}`;

    await this.limiter.wait();

    const data = await fetchJson(`${BASE_URL}${key}.json`, {
      provider: this.name,
      timeoutMs: options.timeoutMs ?? this.timeoutMs,
      signal: options.signal,
    });

    const work = WorkSchema.safeParse(data);

    if (!work.success) {
      return null;
    }

    const { description } = work.data;
    const identity = emptyIdentity(this.name, work.data.key, work.data.title);

    identity.year = parseYear(work.data.first_publish_date);
    identity.description = typeof description === 'string' ? description : description?.value ?? null;
    identity.coverUrls = coverUrls(work.data.covers?.[0]);
    identity.rawData = { subjects: work.data.subjects ?? [] };

    for (const { author } of work.data.authors ?? []) {
      const name = await this.fetchAuthorName(author.key, options);

      if (name) {
        identity.authors.push(name);
      }
    }

    const edition = pickBestEdition(await this.fetchEditions(key, options));

    if (edition) {
      applyEdition(identity, edition);
      identity.rawData.editionKey = edition.key ?? null;
    }

    return identity;
  }

  parseSearchDoc(doc: SearchDoc): ProviderIdentity | null {
    if (!doc.key.startsWith('/works/') || !doc.title) {
      return null;
    }

    const identity = emptyIdentity(this.name, doc.key, doc.title);

    for (const isbn of doc.isbn ?? []) {
      const clean = cleanIsbn(isbn);

      if (clean.length === 10) {
        identity.isbn10 = clean;
      } else if (clean.length === 13) {
        identity.isbn13 = clean;
      }
    }

    identity.authors = doc.author_name ?? [];
    identity.year = doc.first_publish_year ?? null;
    identity.publisher = doc.publisher?.[0] ?? null;
    identity.language = doc.language?.[0] ?? null;
    identity.coverUrls = coverUrls(doc.cover_i);
    identity.rawData = { ...doc };

    return identity;
  }

  private async fetchEditions(workKey: string, options: SearchOptions): Promise<Edition[]> {
    await this.limiter.wait();

    const data = await fetchJson(`${BASE_URL}${workKey}/editions.json`, {
      provider: this.name,
      timeoutMs: options.timeoutMs ?? this.timeoutMs,
      signal: options.signal,
    });

    const parsed = EditionsResponseSchema.safeParse(data);

    if (!parsed.success) {
      return [];
    }

    const editions: Edition[] = [];

    for (const raw of parsed.data.entries) {
      const edition = EditionSchema.safeParse(raw);

      if (edition.success) {
        editions.push(edition.data);
      }
    }

    return editions;
  }

  private async fetchAuthorName(authorKey: string, options: SearchOptions): Promise<string | null> {
    await this.limiter.wait();

    const data = await fetchJson(`${BASE_URL}${authorKey}.json`, {
      provider: this.name,
      timeoutMs: options.timeoutMs ?? this.timeoutMs,
      signal: options.signal,
    });

    const author = AuthorSchema.safeParse(data);

    return author.success ? author.data.name : null;
  }

  private async searchByIsbn(isbn: string, options: SearchOptions): Promise<ProviderIdentity | null> {
    const clean = cleanIsbn(isbn);

    if (!clean) {
      return null;
    }

    await this.limiter.wait();

    const data = await fetchJson(`${BASE_URL}/api/books`, {
      provider: this.name,
      timeoutMs: options.timeoutMs ?? this.timeoutMs,
      signal: options.signal,
      params: { bibkeys: `ISBN:${clean}`, format: 'json', jscmd: 'data' },
    });

    const books = z.record(z.unknown()).safeParse(data);

    if (!books.success) {
      return null;
    }

    const book = BookDataSchema.safeParse(books.data[`ISBN:${clean}`]);

    if (!book.success) {
      return null;
    }

    const workKey = book.data.identifiers?.openlibrary?.[0] ?? `ISBN:${clean}`;
    const identity = emptyIdentity(this.name, workKey, book.data.title);

    identity.authors = book.data.authors?.map((author) => author.name) ?? [];
    identity.publisher = book.data.publishers?.[0]?.name ?? null;
    identity.year = parseYear(book.data.publish_date);
    identity.isbn10 = book.data.identifiers?.isbn_10?.[0] ?? (clean.length === 10 ? clean : null);
    identity.isbn13 = book.data.identifiers?.isbn_13?.[0] ?? (clean.length === 13 ? clean : null);
    identity.coverUrls = [book.data.cover?.large, book.data.cover?.medium, book.data.cover?.small].filter(
      (url): url is string => Boolean(url)
    );
    identity.rawData = { url: book.data.url };

    return identity;
  }
}
