import { z } from 'zod';
import type { AudiobookSet, ProviderIdentity, ScoringWeights } from '../types.js';
import { PUBLIC_DOMAIN_WEIGHTS, calculateMatchScore } from '../matcher.js';
import { fetchJson, RateLimiter } from './http.js';
import { emptyIdentity, type MetadataProvider, type SearchOptions, type SearchQuery } from './types.js';

const FEED_URL = 'https://librivox.org/api/feed/audiobooks';
const MAX_LIMIT = 50;

const AuthorSchema = z.union([
  z.string(),
  z.object({
    first_name: z.string().optional(),
    last_name: z.string().optional(),
  }),
]);

const BookSchema = z.object({
  id: z.union([z.string(), z.number()]),
  title: z.string().optional(),
  description: z.string().optional(),
  language: z.string().optional(),
  copyright_year: z.union([z.string(), z.number()]).optional(),
  totaltimesecs: z.number().optional(),
  url_librivox: z.string().optional(),
  url_project: z.string().optional(),
  url_zip_file: z.string().optional(),
  authors: z.array(AuthorSchema).optional(),
  sections: z.array(z.object({ reader: z.string().optional() }).passthrough()).optional(),
});

const FeedSchema = z.object({
  books: z.array(z.unknown()).default([]),
});

type Book = z.infer<typeof BookSchema>;

export interface LibriVoxOptions {
  timeoutMs?: number;
  rateLimitMs?: number;
  weights?: ScoringWeights;
}

function authorName(author: z.infer<typeof AuthorSchema>): string {
  if (typeof author === 'string') {
    return author.trim();
  }

  return `${author.first_name ?? ''} ${author.last_name ?? ''}`.trim();
}

export class LibriVoxProvider implements MetadataProvider {
  readonly id = 'librivox';
  readonly name = 'LibriVox';
  readonly weights: ScoringWeights;
  private readonly timeoutMs: number;
  private readonly limiter: RateLimiter;

  constructor(options: LibriVoxOptions = {}) {
    this.timeoutMs = options.timeoutMs ?? 30000;
    this.limiter = new RateLimiter(options.rateLimitMs ?? 250);
    this.weights = options.weights ?? PUBLIC_DOMAIN_WEIGHTS;
  }

  calculateMatchScore(set: AudiobookSet, identity: ProviderIdentity): number {
    return calculateMatchScore(set, identity, this.weights);
  }

  async search(query: SearchQuery, options: SearchOptions = {}): Promise<ProviderIdentity[]> {
    const params: Record<string, string | number | undefined> = {
      format: 'json',
      limit: Math.min(options.limit ?? 10, MAX_LIMIT),
    };

    // The feed filters on one field at a time.
    if (query.title) {
      params.title = query.title;
    } else if (query.author) {
      params.author = query.author;
    } else if (query.series) {
      params.title = query.series;
    } else {
      return [];
    }

    return this.fetchBooks(params, options);
  }

  async getById(externalId: string, options: SearchOptions = {}): Promise<ProviderIdentity | null> {
    const books = await this.fetchBooks({ format: 'json', id: externalId }, options);
    return books[0] ?? null;
  }

  parseBook(book: Book): ProviderIdentity | null {
    if (!book.title) {
      return null;
    }

    const identity = emptyIdentity(this.name, String(book.id), book.title);
    const readers = new Set((book.sections ?? []).map((section) => section.reader).filter(Boolean));
    const copyrightYear = Number.parseInt(String(book.copyright_year ?? ''), 10);

    identity.authors = (book.authors ?? []).map(authorName).filter(Boolean);
    identity.year = Number.isNaN(copyrightYear) ? null : copyrightYear;
    identity.language = book.language ?? 'English';
    identity.description = book.description ?? null;
    identity.rawData = {
      publicDomain: true,
      urlLibrivox: book.url_librivox ?? null,
      urlProject: book.url_project ?? null,
      urlZipFile: book.url_zip_file ?? null,
      totalTimeSeconds: book.totaltimesecs ?? null,
      sectionCount: book.sections?.length ?? 0,
      readerCount: readers.size,
    };

    return identity;
  }

  private async fetchBooks(
    params: Record<string, string | number | undefined>,
    options: SearchOptions
  ): Promise<ProviderIdentity[]> {
    await this.limiter.wait();

    const data = await fetchJson(FEED_URL, {
      provider: this.name,
      timeoutMs: options.timeoutMs ?? this.timeoutMs,
      signal: options.signal,
      params,
    });

    const feed = FeedSchema.safeParse(data);

    if (!feed.success) {
      return [];
    }

    const identities: ProviderIdentity[] = [];

    for (const raw of feed.data.books) {
      const book = BookSchema.safeParse(raw);
      const identity = book.success ? this.parseBook(book.data) : null;

      if (identity) {
        identities.push(identity);
      }
    }

    return identities;
  }
}
