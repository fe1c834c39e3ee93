import { normalize, wholeWordPattern } from '../core/text.js';

const FALLBACK_LENGTH = 200;

/**
 * First period-delimited sentence mentioning the brand, normalized.
 * Falls back to the first 200 characters when no sentence contains it.
 */
export function extractReason(text: string, brand: string): string {
  const pattern = wholeWordPattern(brand);
  const sentence = text.split('.').find(candidate => pattern.test(candidate));
  return normalize(sentence ?? text.slice(0, FALLBACK_LENGTH));
}
