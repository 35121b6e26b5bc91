import type Database from 'better-sqlite3';
import type { AdapterRegistry } from '../adapters/adapter.js';
import type { CrawlerSettings } from '../shared/config.js';
import { crawlSource } from './orchestrator.js';
import { commitBatch, updateCrawlMarkers } from './gate.js';
import { getSource } from '../source/sourceDb.js';
import {
  startRun,
  completeRun,
  failRun,
  getRun,
  emptyRunCounts,
  type CrawlRun,
} from '../ledger/runDb.js';
import { CrawlInProgressError, NotFoundError, DbError, errorMessage } from '../shared/errors.js';
import { systemClock, type Clock } from '../shared/utils.js';
import { logger } from '../shared/logger.js';

export interface CrawlContext {
  db: Database.Database;
  registry: AdapterRegistry;
  crawler: Pick<CrawlerSettings, 'max_concurrent' | 'candidate_limit'>;
  clock?: Clock;
}

export interface CrawlRequest {
  sourceName: string;
  /** Overrides the configured base address for this run only. */
  baseUrl?: string | null;
  /** Scheduler-triggered runs advance `last_scheduled_crawl`. */
  isScheduled: boolean;
}

export interface CrawlRunOutcome {
  success: boolean;
  run: CrawlRun;
  error?: string;
}

/**
 * Execute one crawl run end to end and record it in the ledger.
 *
 * The ledger entry is opened before any network activity and always closed,
 * as `completed` or `failed` with whatever counts were reached. Items
 * committed before a failure stay committed.
 *
 * @throws CrawlInProgressError when the source already has a running entry.
 */
export async function executeCrawlRun(ctx: CrawlContext, req: CrawlRequest): Promise<CrawlRunOutcome> {
  const clock = ctx.clock ?? systemClock;
  const run = startRun(ctx.db, req.sourceName, clock(), { scheduled: req.isScheduled });
  if (!run) {
    throw new CrawlInProgressError(req.sourceName);
  }

  logger.info(
    { source: req.sourceName, runId: run.id, scheduled: req.isScheduled },
    'Crawl run started',
  );

  let counts = emptyRunCounts();
  let failure: string | null = null;
  let sourceExists = false;

  try {
    const stored = getSource(ctx.db, req.sourceName);
    if (!stored) {
      throw new NotFoundError(`Source not found: ${req.sourceName}`, { source: req.sourceName });
    }
    sourceExists = true;

    const source = req.baseUrl ? { ...stored, base_url: req.baseUrl } : stored;
    const adapter = ctx.registry.resolve(source);

    const batch = await crawlSource(source, adapter, {
      concurrency: ctx.crawler.max_concurrent,
      limit: ctx.crawler.candidate_limit,
    });
    counts.found = batch.length;

    const committed = commitBatch(ctx.db, batch, {
      at: clock(),
      onProgress: (progress) => {
        counts = { ...counts, ...progress };
      },
    });
    counts = { ...counts, ...committed };
  } catch (err) {
    failure = errorMessage(err);
    logger.error(
      { source: req.sourceName, runId: run.id, error: failure, counts },
      'Crawl run failed',
    );
  } finally {
    const finishedAt = clock();
    const written =
      failure === null
        ? completeRun(ctx.db, run.id, counts, finishedAt)
        : failRun(ctx.db, run.id, counts, failure, finishedAt);
    if (!written) {
      logger.warn({ source: req.sourceName, runId: run.id }, 'Run was already finalized elsewhere');
    }
    if (sourceExists) {
      updateCrawlMarkers(ctx.db, req.sourceName, { scheduled: req.isScheduled, at: finishedAt });
    }
  }

  const finished = getRun(ctx.db, run.id);
  if (!finished) {
    throw new DbError(`Crawl run disappeared: ${run.id}`, { runId: run.id });
  }

  if (failure === null) {
    logger.info(
      {
        source: req.sourceName,
        runId: run.id,
        found: counts.found,
        saved: counts.saved,
        skipped: counts.skipped,
        failed: counts.failed,
        durationSeconds: finished.duration_seconds,
      },
      'Crawl run completed',
    );
    return { success: true, run: finished };
  }
  return { success: false, run: finished, error: failure };
}
