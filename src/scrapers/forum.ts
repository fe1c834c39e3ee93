import type * as cheerio from 'cheerio';
import type { AnyNode } from 'domhandler';
import { normalize } from '../core/text.js';
import { BaseScraper, visibleText } from './base.js';
import type { ThreadItem } from './base.js';

export interface PostStrategy {
  name: string;
  find: ($: cheerio.CheerioAPI) => AnyNode[];
}

const bySelector = (selector: string): PostStrategy => ({
  name: selector,
  find: $ => $(selector).toArray(),
});

// Tried in order; the first strategy with any match wins.
export const postStrategies: readonly PostStrategy[] = [
  bySelector('article'),
  bySelector('div.post'),
  bySelector('div.message'),
  bySelector('div.post-body'),
  bySelector('div.forum-post'),
  bySelector('div.comment'),
];

const AUTHOR_SELECTORS = ['a.username', 'span.author', 'div.author'] as const;

export function findPosts(
  $: cheerio.CheerioAPI,
  strategies: readonly PostStrategy[] = postStrategies
): { strategy: string; posts: AnyNode[] } | null {
  for (const strategy of strategies) {
    const posts = strategy.find($);
    if (posts.length > 0) {
      return { strategy: strategy.name, posts };
    }
  }
  return null;
}

/** Best-effort adapter for generic forum software (XenForo, phpBB, Discourse-ish markup). */
export class ForumScraper extends BaseScraper {
  protected readonly source = 'Forum' as const;
  protected readonly threadLabel = 'forum thread';
  protected readonly itemLabel = 'forum post';

  protected locateItems($: cheerio.CheerioAPI, url: string): AnyNode[] {
    const match = findPosts($);
    if (!match) {
      this.logger.warn(`No posts found in ${url} with any known post selector`);
      return [];
    }

    this.logger.info(`Found ${match.posts.length} posts using selector ${match.strategy}`);
    return match.posts;
  }

  protected extractTitle($: cheerio.CheerioAPI): string {
    const heading = $('h1').first();
    const title = heading.length > 0 ? heading : $('title').first();
    return normalize(title.text()) || 'Unknown Title';
  }

  protected readItem($: cheerio.CheerioAPI, node: AnyNode, index: number): ThreadItem | null {
    const post = $(node);

    const text = visibleText(post).trim();
    if (!text) {
      this.logger.debug(`Skipping forum post ${index}: Empty text`);
      return null;
    }

    return {
      text,
      author: this.findAuthor(post),
      id: `forum_${index}`,
    };
  }

  private findAuthor(post: cheerio.Cheerio<AnyNode>): string {
    for (const selector of AUTHOR_SELECTORS) {
      const tag = post.find(selector).first();
      if (tag.length > 0) {
        return tag.text().trim() || 'Unknown';
      }
    }
    return 'Unknown';
  }
}
