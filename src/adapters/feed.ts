import type { SourceAdapter, ItemData } from './adapter.js';
import type { SourceConfig } from '../source/types.js';
import type { Fetcher } from '../crawl/fetcher.js';
import { extractArticle } from './article.js';
import { numberSetting, stringSetting } from './settings.js';
import { logger } from '../shared/logger.js';

/**
 * Discovers candidates from a source's RSS/Atom feed and parses each linked
 * article page.
 *
 * Settings: `feed_url` (defaults to `base_url`), `min_body_chars`.
 */
export class FeedAdapter implements SourceAdapter {
  readonly name = 'feed';

  constructor(private readonly fetcher: Fetcher) {}

  async listCandidates(source: SourceConfig, limit?: number): Promise<string[]> {
    const feedUrl = stringSetting(source.settings, 'feed_url') ?? source.base_url;
    const feed = await this.fetcher.fetchFeed(feedUrl);
    if (!feed) {
      logger.warn({ source: source.name, feedUrl }, 'Feed not found');
      return [];
    }

    const urls: string[] = [];
    const seen = new Set<string>();
    for (const entry of feed.entries) {
      if (!entry.link) continue;
      let absolute: string;
      try {
        absolute = new URL(entry.link, feedUrl).toString();
      } catch {
        logger.debug({ source: source.name, link: entry.link }, 'Skipping invalid feed link');
        continue;
      }
      if (seen.has(absolute)) continue;
      seen.add(absolute);
      urls.push(absolute);
    }

    logger.debug({ source: source.name, count: urls.length }, 'Feed candidates listed');
    return limit !== undefined ? urls.slice(0, limit) : urls;
  }

  async parseItem(identifier: string, source: SourceConfig): Promise<ItemData | null> {
    const html = await this.fetcher.fetchText(identifier);
    if (html === null) return null;
    return extractArticle(html, identifier, {
      minBodyChars: numberSetting(source.settings, 'min_body_chars'),
    });
  }
}
