/**
 * Reddit thread adapter.
 *
 * Reads the server-rendered old.reddit.com markup, so only comments present
 * in the initial HTML are seen; "load more comments" stubs are not expanded.
 */

import type * as cheerio from 'cheerio';
import type { AnyNode } from 'domhandler';
import { normalize } from '../core/text.js';
import { BaseScraper, visibleText } from './base.js';
import type { ThreadItem } from './base.js';

const OLD_REDDIT_HOST = 'old.reddit.com';

const SELECTORS = {
  commentArea: 'div.commentarea',
  comment: 'div.commentarea div.comment',
  title: 'a.title',
  body: 'div.usertext-body',
  author: 'a.author',
} as const;

const ID_ATTRIBUTE = 'data-fullname';

const REMOVED_PLACEHOLDERS = new Set(['[deleted]', '[removed]']);

export function isRedditUrl(url: string): boolean {
  return url.toLowerCase().includes('reddit.com');
}

/** Rewrite reddit.com / www.reddit.com (and other subdomains) to old.reddit.com. */
export function toOldRedditUrl(url: string): string {
  let parsed: URL;
  try {
    parsed = new URL(url);
  } catch {
    return url;
  }

  const host = parsed.hostname.toLowerCase();
  const isReddit = host === 'reddit.com' || host.endsWith('.reddit.com');
  if (!isReddit || host === OLD_REDDIT_HOST) return url;

  parsed.hostname = OLD_REDDIT_HOST;
  return parsed.toString();
}

export class RedditScraper extends BaseScraper {
  protected readonly source = 'Reddit' as const;
  protected readonly threadLabel = 'Reddit thread';
  protected readonly itemLabel = 'comment';

  override resolveUrl(url: string): string {
    return toOldRedditUrl(url);
  }

  protected locateItems($: cheerio.CheerioAPI, url: string): AnyNode[] | null {
    if ($(SELECTORS.commentArea).length === 0) {
      this.logger.warn(`No comment area found in ${url}. Page may be inaccessible or empty.`);
      return null;
    }

    const comments = $(SELECTORS.comment).toArray();
    this.logger.info(`Found ${comments.length} loaded comments in ${url}`);
    if (comments.length === 0) {
      this.logger.warn(`No comments found in ${url}. Check HTML structure or comment availability.`);
    }
    return comments;
  }

  protected extractTitle($: cheerio.CheerioAPI): string {
    const title = normalize($(SELECTORS.title).first().text());
    return title || 'Unknown Title';
  }

  protected readItem($: cheerio.CheerioAPI, node: AnyNode, index: number): ThreadItem | null {
    const comment = $(node);

    const text = visibleText(comment.find(SELECTORS.body).first()).trim();
    if (!text) {
      this.logger.debug(`Skipping comment ${index}: Empty text`);
      return null;
    }
    if (REMOVED_PLACEHOLDERS.has(text)) {
      this.logger.debug(`Skipping comment ${index}: Deleted or removed`);
      return null;
    }

    return {
      text,
      author: comment.find(SELECTORS.author).first().text().trim() || 'Unknown',
      id: comment.attr(ID_ATTRIBUTE) || `web_${index}`,
    };
  }
}
