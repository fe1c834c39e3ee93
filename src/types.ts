import type { ChargerBrand } from './pipeline/lexicon.js';
import type { TariffMatch } from './pipeline/vocabulary.js';

export type MentionSource = 'Reddit' | 'Forum';

/** One brand mention extracted from a single comment or forum post. */
export interface MentionRecord {
  source: MentionSource;
  threadUrl: string;
  threadTitle: string;
  /** Platform ID for Reddit, index-based for forums; unique within one thread only. */
  recordId: string;
  author: string;
  /** Extraction wall-clock time, not the post time. */
  capturedAt: string;
  brand: ChargerBrand;
  tariff: TariffMatch;
  reason: string;
  text: string;
}
