import type Database from 'better-sqlite3';
import type { ItemResult } from './orchestrator.js';
import { hashExists, insertItem } from '../source/itemDb.js';
import { setCrawlMarkers } from '../source/sourceDb.js';
import { toISO } from '../shared/utils.js';
import { logger } from '../shared/logger.js';

export interface CommitResult {
  saved: number;
  skipped: number;
  failed: number;
  savedIds: string[];
}

/**
 * Persist the new items of a batch. Items whose content hash is already
 * stored are counted as skipped. A write error on one item is logged and
 * counted as failed; the rest of the batch still commits.
 *
 * `onProgress` receives the running totals after every item so a caller can
 * report partial counts if something outside the gate fails.
 */
export function commitBatch(
  db: Database.Database,
  batch: readonly ItemResult[],
  opts: { at?: Date; onProgress?: (progress: CommitResult) => void } = {},
): CommitResult {
  const result: CommitResult = { saved: 0, skipped: 0, failed: 0, savedIds: [] };
  const crawledAt = toISO(opts.at ?? new Date());

  for (const item of batch) {
    try {
      if (hashExists(db, item.content_hash)) {
        result.skipped++;
      } else {
        const id = insertItem(db, {
          source_name: item.source_name,
          source_url: item.source_url,
          content_hash: item.content_hash,
          title: item.title,
          body: item.body,
          meta: item.meta,
          crawled_at: crawledAt,
        });
        if (id) {
          result.saved++;
          result.savedIds.push(id);
        } else {
          // Another writer stored the same hash between check and insert.
          result.skipped++;
        }
      }
    } catch (err) {
      result.failed++;
      logger.warn(
        { source: item.source_name, url: item.source_url, error: err instanceof Error ? err.message : String(err) },
        'Item write failed',
      );
    }
    opts.onProgress?.({ ...result, savedIds: [...result.savedIds] });
  }

  return result;
}

/**
 * Record that a crawl of `sourceName` finished at `at`. Manual runs move only
 * `last_crawl`; scheduled runs also move `last_scheduled_crawl`, which is
 * what due-ness is computed from.
 */
export function updateCrawlMarkers(
  db: Database.Database,
  sourceName: string,
  opts: { scheduled: boolean; at: Date },
): boolean {
  return setCrawlMarkers(db, sourceName, toISO(opts.at), opts.scheduled);
}
