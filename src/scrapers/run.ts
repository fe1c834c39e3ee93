import fs from 'fs/promises';
import path from 'path';
import type { PageFetcher } from '../core/fetcher.js';
import type { Logger } from '../core/logger.js';
import { sleep } from '../core/retry.js';
import { saveToCsv } from '../core/csvExport.js';
import type { MentionRecord } from '../types.js';
import type { BaseScraper, ScraperDeps } from './base.js';
import { RedditScraper, isRedditUrl } from './reddit.js';
import { ForumScraper } from './forum.js';

export interface RunOptions {
  urlFile: string;
  outputFile: string;
  /** Politeness delay between consecutive URLs. */
  requestDelayMs: number;
  fetcher: PageFetcher;
  logger: Logger;
  report?: (line: string) => void;
  now?: () => Date;
}

export interface RunSummary {
  urls: number;
  records: MentionRecord[];
  written: boolean;
}

/** Newline-delimited URLs; blank lines ignored. A missing file yields an empty list. */
export async function readUrls(filePath: string, logger: Logger): Promise<string[]> {
  let content: string;
  try {
    content = await fs.readFile(filePath, 'utf-8');
  } catch (error) {
    const errorMessage = error instanceof Error ? error.message : String(error);
    logger.error(`URL file ${filePath} not found or unreadable: ${errorMessage}`);
    return [];
  }

  return content
    .split(/\r?\n/)
    .map(line => line.trim())
    .filter(Boolean);
}

export async function runScrape(options: RunOptions): Promise<RunSummary> {
  const { urlFile, outputFile, requestDelayMs, logger } = options;
  const report = options.report ?? ((line: string) => console.log(line));

  const urls = await readUrls(urlFile, logger);
  if (urls.length === 0) {
    report(`No URLs to process. Please create ${path.basename(urlFile)} with one URL per line.`);
    return { urls: 0, records: [], written: false };
  }

  const deps: ScraperDeps = { fetcher: options.fetcher, logger, report, now: options.now };
  const reddit = new RedditScraper(deps);
  const forum = new ForumScraper(deps);

  const records: MentionRecord[] = [];

  for (const [idx, url] of urls.entries()) {
    report(`Processing URL ${idx + 1}/${urls.length}: ${url}`);

    const scraper: BaseScraper = isRedditUrl(url) ? reddit : forum;
    try {
      records.push(...await scraper.scrapeThread(url));
    } catch (error) {
      const errorMessage = error instanceof Error ? error.message : String(error);
      logger.error(`Unexpected failure scraping ${url}: ${errorMessage}`);
    }

    if (idx < urls.length - 1) {
      await sleep(requestDelayMs);
    }
  }

  const written = await saveToCsv(records, outputFile, logger);
  report(
    written
      ? `Scraping complete. Data saved to ${outputFile} with ${records.length} entries.`
      : 'Scraping complete. No entries collected.'
  );

  return { urls: urls.length, records, written };
}
