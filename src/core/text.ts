// Unicode word characters: letters, digits, underscore
const WORD_CHAR = String.raw`\p{L}\p{N}_`;

const STRIP_PATTERN = new RegExp(`[^${WORD_CHAR}\\s,.]`, 'gu');

/**
 * Strip everything except word characters, whitespace, commas and periods,
 * then collapse whitespace runs and trim. Idempotent.
 */
export function normalize(raw: string): string {
  return raw
    .replace(STRIP_PATTERN, '')
    .replace(/\s+/g, ' ')
    .trim();
}

function escapeRegExp(term: string): string {
  return term.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/** Case-insensitive pattern matching `term` only where bounded by non-word characters. */
export function wholeWordPattern(term: string): RegExp {
  return new RegExp(`(?<![${WORD_CHAR}])${escapeRegExp(term)}(?![${WORD_CHAR}])`, 'iu');
}
