import { describe, it, expect } from 'vitest';
import { extractReason } from '../src/pipeline/reason.js';

describe('extractReason', () => {
  it('returns the first sentence mentioning the brand, normalized', () => {
    const text = "Had a Zappi before. Now I use an Ohme. It's great";
    expect(extractReason(text, 'Ohme')).toBe('Now I use an Ohme');
  });

  it('matches the brand case-insensitively', () => {
    expect(extractReason('got the OHME! love it', 'Ohme')).toBe('got the OHME love it');
  });

  it('uses the first matching sentence when the brand appears twice', () => {
    const text = 'Wallbox looked nice. Nope. The Wallbox app kept crashing.';
    expect(extractReason(text, 'Wallbox')).toBe('Wallbox looked nice');
  });

  it('falls back to the first 200 characters when no sentence contains the brand', () => {
    const text = 'word '.repeat(80);
    const reason = extractReason(text, 'Ohme');
    expect(reason).toBe(('word '.repeat(40)).trim());
    expect(reason.length).toBeLessThanOrEqual(200);
  });
});
