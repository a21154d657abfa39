import { setTimeout as sleep } from 'node:timers/promises';
import { ProviderError, ProviderTimeoutError } from '../errors.js';

const USER_AGENT = 'audiobook-organizer/0.1';

/**
 * Enforces a minimum delay between consecutive requests of one provider.
 */
export class RateLimiter {
  private lastRequestAt = 0;
  private queue: Promise<void> = Promise.resolve();

  constructor(private readonly minDelayMs: number) {}

  async wait(): Promise<void> {
    const turn = this.queue.then(async () => {
      const elapsed = Date.now() - this.lastRequestAt;

      if (elapsed < this.minDelayMs) {
        await sleep(this.minDelayMs - elapsed);
      }

      this.lastRequestAt = Date.now();
    });

    this.queue = turn;
    return turn;
  }
}

export interface FetchJsonOptions {
  provider: string;
  timeoutMs: number;
  signal?: AbortSignal;
  params?: Record<string, string | number | undefined>;
}

export function buildUrl(base: string, params: FetchJsonOptions['params'] = {}): string {
  const url = new URL(base);

  for (const [key, value] of Object.entries(params)) {
    if (value !== undefined && value !== '') {
      url.searchParams.set(key, String(value));
    }
  }

  return url.toString();
}

/**
 * GETs a JSON document. Resolves to null on a non-2xx status, rejects with
 * ProviderTimeoutError when timeoutMs elapses and with ProviderError on
 * network failures or unparseable bodies.
 */
export async function fetchJson(base: string, options: FetchJsonOptions): Promise<unknown> {
  const controller = new AbortController();
  let timedOut = false;

  const timer = setTimeout(() => {
    timedOut = true;
    controller.abort();
  }, options.timeoutMs);

  const forwardAbort = () => controller.abort();
  options.signal?.addEventListener('abort', forwardAbort, { once: true });

  if (options.signal?.aborted) {
    controller.abort();
  }

  try {
    const response = await fetch(buildUrl(base, options.params), {
      headers: {
        'User-Agent': USER_AGENT,
        Accept: 'application/json',
      },
      signal: controller.signal,
    });

    if (!response.ok) {
      return null;
    }

    return await response.json();
  } catch (error) {
    if (timedOut) {
      throw new ProviderTimeoutError(options.provider, options.timeoutMs);
    }

    const message = error instanceof Error ? error.message : String(error);
    throw new ProviderError(options.provider, message);
  } finally {
    clearTimeout(timer);
    options.signal?.removeEventListener('abort', forwardAbort);
  }
}
