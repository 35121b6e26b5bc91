import type { SourceAdapter, ItemData } from '../adapters/adapter.js';
import type { SourceConfig } from '../source/types.js';
import { mapWithConcurrency } from '../shared/concurrency.js';
import { sha256 } from '../shared/utils.js';
import { logger } from '../shared/logger.js';

/**
 * A parsed item tagged with its dedup key and owning source.
 */
export interface ItemResult extends ItemData {
  source_name: string;
  source_url: string;
  content_hash: string;
}

export interface CrawlOptions {
  /** Items fetched and parsed at the same time. */
  concurrency: number;
  /** Cap on candidates taken from discovery. */
  limit?: number;
}

export function contentHash(identifier: string): string {
  return sha256(identifier);
}

/**
 * Crawl one source: list candidates, then parse them under a concurrency
 * bound. Failures of individual items are logged and dropped; only a
 * failure of candidate discovery rejects.
 */
export async function crawlSource(
  source: SourceConfig,
  adapter: SourceAdapter,
  options: CrawlOptions,
): Promise<ItemResult[]> {
  const listed = await adapter.listCandidates(source, options.limit);
  const candidates = [...new Set(listed)].slice(0, options.limit ?? listed.length);

  if (candidates.length === 0) {
    logger.info({ source: source.name }, 'No candidates found');
    return [];
  }

  logger.debug(
    { source: source.name, candidates: candidates.length, concurrency: options.concurrency },
    'Crawling candidates',
  );

  const parsed = await mapWithConcurrency(candidates, options.concurrency, async (url) => {
    try {
      const data = await adapter.parseItem(url, source);
      if (!data) {
        logger.debug({ source: source.name, url }, 'Candidate produced no item');
        return null;
      }
      const result: ItemResult = {
        ...data,
        source_name: source.name,
        source_url: url,
        content_hash: contentHash(url),
      };
      return result;
    } catch (err) {
      logger.warn(
        { source: source.name, url, error: err instanceof Error ? err.message : String(err) },
        'Candidate failed',
      );
      return null;
    }
  });

  const results = parsed.filter((r): r is ItemResult => r !== null);
  logger.info(
    { source: source.name, candidates: candidates.length, parsed: results.length },
    'Source crawled',
  );
  return results;
}
