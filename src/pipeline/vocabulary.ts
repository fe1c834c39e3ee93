import { wholeWordPattern } from '../core/text.js';
import { chargerBrands, tariffs, UNKNOWN_BRAND, NO_TARIFF } from './lexicon.js';
import type { ChargerBrand, Tariff } from './lexicon.js';

interface VocabularyEntry<T extends string> {
  pattern: RegExp;
  value: T;
}

/**
 * Ordered first-match-wins term list. Entries are tested in declaration
 * order; the first whole-word match is returned, otherwise the sentinel.
 */
export class Vocabulary<T extends string, S extends string> {
  private readonly entries: readonly VocabularyEntry<T>[];

  constructor(terms: readonly T[], readonly sentinel: S) {
    this.entries = terms.map(value => ({ pattern: wholeWordPattern(value), value }));

    // A term shadowed by an earlier one could never be returned.
    this.entries.forEach((earlier, i) => {
      for (const later of this.entries.slice(i + 1)) {
        if (earlier.pattern.test(later.value)) {
          throw new Error(`Vocabulary term "${later.value}" is unreachable: "${earlier.value}" is listed before it`);
        }
      }
    });
  }

  match(text: string): T | S {
    for (const entry of this.entries) {
      if (entry.pattern.test(text)) return entry.value;
    }
    return this.sentinel;
  }

  get terms(): T[] {
    return this.entries.map(entry => entry.value);
  }
}

export const brandVocabulary = new Vocabulary<ChargerBrand, typeof UNKNOWN_BRAND>(chargerBrands, UNKNOWN_BRAND);
export const tariffVocabulary = new Vocabulary<Tariff, typeof NO_TARIFF>(tariffs, NO_TARIFF);

export type BrandMatch = ChargerBrand | typeof UNKNOWN_BRAND;
export type TariffMatch = Tariff | typeof NO_TARIFF;

export function matchBrand(text: string): BrandMatch {
  return brandVocabulary.match(text);
}

export function matchTariff(text: string): TariffMatch {
  return tariffVocabulary.match(text);
}

export function isKnownBrand(brand: BrandMatch): brand is ChargerBrand {
  return brand !== UNKNOWN_BRAND;
}
