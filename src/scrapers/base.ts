import * as cheerio from 'cheerio';
import type { AnyNode } from 'domhandler';
import type { PageFetcher } from '../core/fetcher.js';
import type { Logger } from '../core/logger.js';
import { normalize } from '../core/text.js';
import { matchBrand, matchTariff, isKnownBrand } from '../pipeline/vocabulary.js';
import { extractReason } from '../pipeline/reason.js';
import type { MentionRecord, MentionSource } from '../types.js';

export interface ScraperDeps {
  fetcher: PageFetcher;
  logger: Logger;
  /** Human-readable progress sink; stdout by default. */
  report?: (line: string) => void;
  now?: () => Date;
}

/** Raw fields a platform adapter pulls out of one comment/post node. */
export interface ThreadItem {
  text: string;
  author: string;
  id: string;
}

const NON_VISIBLE = 'script, style, template, noscript';

/** Text content of `node` without script, style, template or noscript bodies. */
export function visibleText(node: cheerio.Cheerio<AnyNode>): string {
  const copy = node.clone();
  copy.find(NON_VISIBLE).remove();
  return copy.text();
}

const pad = (value: number) => String(value).padStart(2, '0');

// YYYY-MM-DD HH:mm:ss, local time
export function formatTimestamp(date: Date): string {
  const day = `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}`;
  const time = `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`;
  return `${day} ${time}`;
}

export abstract class BaseScraper {
  protected abstract readonly source: MentionSource;
  /** e.g. "Reddit thread" */
  protected abstract readonly threadLabel: string;
  /** e.g. "comment" */
  protected abstract readonly itemLabel: string;

  protected readonly logger: Logger;
  protected readonly report: (line: string) => void;
  private readonly now: () => Date;

  constructor(protected readonly deps: ScraperDeps) {
    this.logger = deps.logger;
    this.report = deps.report ?? (line => console.log(line));
    this.now = deps.now ?? (() => new Date());
  }

  // Abstract methods to implement
  /** Candidate nodes for comments/posts, or null when the page has no usable structure. */
  protected abstract locateItems($: cheerio.CheerioAPI, url: string): AnyNode[] | null;
  protected abstract extractTitle($: cheerio.CheerioAPI): string;
  /** Null skips the node (empty, deleted, ...). */
  protected abstract readItem($: cheerio.CheerioAPI, node: AnyNode, index: number): ThreadItem | null;

  // Optional hook
  resolveUrl(url: string): string {
    return url;
  }

  async scrapeThread(inputUrl: string): Promise<MentionRecord[]> {
    const records: MentionRecord[] = [];
    const url = this.resolveUrl(inputUrl);

    try {
      this.logger.info(`Fetching ${this.threadLabel}: ${url}`);
      const page = await this.deps.fetcher.fetch(url);
      if (!page.ok) return records;

      const $ = cheerio.load(page.html);

      const nodes = this.locateItems($, url);
      if (!nodes) return records;

      const threadTitle = this.extractTitle($);
      this.report(`Processing ${this.threadLabel}: ${threadTitle}`);

      nodes.forEach((node, index) => {
        try {
          const record = this.toRecord($, node, index, url, threadTitle);
          if (!record) return;

          records.push(record);
          this.report(
            `Found ${this.itemLabel} by ${record.author}: Brand=${record.brand}, Tariff=${record.tariff}, Reason=${record.reason}`
          );
        } catch (error) {
          const errorMessage = error instanceof Error ? error.message : String(error);
          this.logger.error(`Error processing ${this.source} ${this.itemLabel} ${index} in ${url}: ${errorMessage}`);
        }
      });

      this.logger.info(`${this.source} thread ${url}: ${records.length} brand mentions from ${nodes.length} items`);
    } catch (error) {
      const errorMessage = error instanceof Error ? error.message : String(error);
      this.logger.error(`Error processing ${this.threadLabel} ${url}: ${errorMessage}`);
    }

    return records;
  }

  private toRecord(
    $: cheerio.CheerioAPI,
    node: AnyNode,
    index: number,
    threadUrl: string,
    threadTitle: string
  ): MentionRecord | null {
    const item = this.readItem($, node, index);
    if (!item) return null;

    const brand = matchBrand(item.text);
    if (!isKnownBrand(brand)) {
      this.logger.debug(`Skipping ${this.itemLabel} ${index}: No brand found`);
      return null;
    }

    return {
      source: this.source,
      threadUrl,
      threadTitle,
      recordId: item.id,
      author: item.author,
      capturedAt: formatTimestamp(this.now()),
      brand,
      tariff: matchTariff(item.text),
      reason: extractReason(item.text, brand),
      text: normalize(item.text),
    };
  }
}
