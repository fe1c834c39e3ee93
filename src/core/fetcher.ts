import type { Logger } from './logger.js';
import { withRetry, RetryError } from './retry.js';

export type FetchOutcome =
  | { ok: true; html: string; attempts: number }
  | { ok: false; error: string; attempts: number };

export type FetchImpl = typeof fetch;

export interface PageFetcherOptions {
  timeoutMs: number;
  maxRetries: number;
  retryDelayMs: number;
  logger: Logger;
  fetchImpl?: FetchImpl;
  userAgents?: readonly string[];
}

// User agents for rotation
export const defaultUserAgents: readonly string[] = [
  'Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/122.0.0.0 Safari/537.36',
  'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/121.0.0.0 Safari/537.36',
  'Mozilla/5.0 (X11; Linux x86_64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36',
  'Mozilla/5.0 (Macintosh; Intel Mac OS X 10.15; rv:123.0) Gecko/20100101 Firefox/123.0',
  'Mozilla/5.0 (Windows NT 10.0; Win64; x64; rv:122.0) Gecko/20100101 Firefox/122.0',
  'Mozilla/5.0 (Macintosh; Intel Mac OS X 14_3) AppleWebKit/605.1.15 (KHTML, like Gecko) Version/17.3 Safari/605.1.15',
  'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/122.0.0.0 Safari/537.36 Edg/122.0.0.0',
];

/**
 * Single-GET page fetcher: randomized User-Agent, per-attempt timeout and a
 * bounded fixed-delay retry. Never throws; failures come back as `ok: false`.
 */
export class PageFetcher {
  private readonly fetchImpl: FetchImpl;
  private readonly userAgents: readonly string[];

  constructor(private readonly options: PageFetcherOptions) {
    this.fetchImpl = options.fetchImpl ?? fetch;
    this.userAgents = options.userAgents?.length ? options.userAgents : defaultUserAgents;
  }

  async fetch(url: string): Promise<FetchOutcome> {
    const { logger, maxRetries, retryDelayMs } = this.options;

    try {
      const { result, attempts } = await withRetry(
        () => this.get(url),
        { maxRetries, delayMs: retryDelayMs, label: url, logger }
      );
      return { ok: true, html: result, attempts };
    } catch (error) {
      const attempts = error instanceof RetryError ? error.attempts : maxRetries + 1;
      const cause = error instanceof RetryError ? error.lastError.message : String(error);
      logger.error(`Failed to fetch ${url} after ${attempts} attempts: ${cause}`);
      return { ok: false, error: cause, attempts };
    }
  }

  private async get(url: string): Promise<string> {
    const response = await this.fetchImpl(url, {
      headers: {
        'User-Agent': this.getRandomUserAgent(),
        'Accept': 'text/html,application/xhtml+xml',
        'Accept-Language': 'en-GB,en;q=0.9',
      },
      signal: AbortSignal.timeout(this.options.timeoutMs),
    });

    if (!response.ok) {
      // Release the connection; the error body is never read
      await response.body?.cancel();
      throw new Error(`HTTP ${response.status} ${response.statusText}`.trim());
    }

    return await response.text();
  }

  private getRandomUserAgent(): string {
    return this.userAgents[Math.floor(Math.random() * this.userAgents.length)];
  }
}
