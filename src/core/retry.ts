import type { Logger } from './logger.js';

export function sleep(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}

export class RetryError extends Error {
  constructor(readonly attempts: number, readonly lastError: Error) {
    super(`Failed after ${attempts} attempt${attempts === 1 ? '' : 's'}: ${lastError.message}`);
    this.name = 'RetryError';
  }
}

export interface RetryOptions {
  maxRetries: number;
  /** Fixed wait between attempts; no backoff. */
  delayMs: number;
  label: string;
  logger: Logger;
}

// Fixed-delay retry helper
export async function withRetry<T>(
  fn: (attempt: number) => Promise<T>,
  options: RetryOptions
): Promise<{ result: T; attempts: number }> {
  const { maxRetries, delayMs, label, logger } = options;

  let lastError = new Error('No attempt made');

  for (let attempt = 1; attempt <= maxRetries + 1; attempt++) {
    try {
      const result = await fn(attempt);
      return { result, attempts: attempt };
    } catch (error) {
      lastError = error instanceof Error ? error : new Error(String(error));
      logger.warn(`Attempt ${attempt} failed for ${label}: ${lastError.message}`);

      if (attempt <= maxRetries) {
        await sleep(delayMs);
      }
    }
  }

  throw new RetryError(maxRetries + 1, lastError);
}
