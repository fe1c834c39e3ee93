import { vi } from 'vitest';
import type { Mock } from 'vitest';
import { createLogger } from '../src/core/logger.js';
import type { Logger } from '../src/core/logger.js';
import { PageFetcher } from '../src/core/fetcher.js';
import type { FetchImpl } from '../src/core/fetcher.js';

export const FIXED_NOW = new Date(2025, 2, 1, 9, 30, 0);
export const FIXED_TIMESTAMP = '2025-03-01 09:30:00';

export function silentLogger(): Logger {
  return createLogger({ level: 'debug', silent: true });
}

function requestUrl(input: Parameters<FetchImpl>[0]): string {
  if (typeof input === 'string') return input;
  if (input instanceof URL) return input.href;
  return input.url;
}

/** Serves the given HTML per URL; any other URL fails like a dropped connection. */
export function stubFetch(pages: Record<string, string>): Mock<FetchImpl> {
  return vi.fn<FetchImpl>(async input => {
    const url = requestUrl(input);
    const html = pages[url];
    if (html === undefined) {
      throw new TypeError('fetch failed');
    }
    return new Response(html, { status: 200, headers: { 'Content-Type': 'text/html' } });
  });
}

export function testFetcher(fetchImpl: FetchImpl, logger: Logger, maxRetries = 1): PageFetcher {
  return new PageFetcher({ timeoutMs: 1000, maxRetries, retryDelayMs: 0, logger, fetchImpl });
}

/**
 * Awaits `work` under fake timers: lets real I/O run between steps and jumps
 * the clock to the next pending timer until the promise settles.
 */
export async function settleWithFakeTimers<T>(work: Promise<T>): Promise<T> {
  let settled = false;
  void work.then(
    () => { settled = true; },
    () => { settled = true; }
  );
  while (!settled) {
    await new Promise<void>(resolve => setImmediate(resolve));
    await vi.advanceTimersToNextTimerAsync();
  }
  return work;
}
