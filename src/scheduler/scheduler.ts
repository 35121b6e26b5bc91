/**
 * Scheduler: a recurring tick that dispatches crawl runs for due sources.
 *
 * Due-ness is computed from `last_scheduled_crawl` (falling back to
 * `last_crawl`). A source with a `running` ledger entry, or one this process
 * has already queued, is never dispatched again until that run finishes.
 */

import cron from 'node-cron';
import type Database from 'better-sqlite3';
import type { CrawlDispatcher } from '../crawl/dispatcher.js';
import type { SourceConfig } from '../source/types.js';
import { listSources } from '../source/sourceDb.js';
import { listRunningSourceNames, reconcileStaleRuns } from '../ledger/runDb.js';
import { ConfigError, errorMessage } from '../shared/errors.js';
import { systemClock, type Clock } from '../shared/utils.js';
import { logger } from '../shared/logger.js';

const MINUTE_MS = 60_000;

export interface TickSummary {
  checked: number;
  triggered: string[];
  skipped_running: string[];
  reconciled: number;
  errors: Array<{ source: string; error: string }>;
}

export interface SchedulerOptions {
  db: Database.Database;
  dispatcher: CrawlDispatcher;
  tickCron?: string;
  /** `running` entries older than this are failed at the start of a tick. */
  staleRunMinutes?: number;
  clock?: Clock;
}

function referenceTime(source: SourceConfig): number | null {
  const reference = source.last_scheduled_crawl ?? source.last_crawl;
  if (!reference) return null;
  const ms = Date.parse(reference);
  return Number.isNaN(ms) ? null : ms;
}

/**
 * A source is due when it has never been crawled, or when at least one
 * interval has elapsed since its reference crawl.
 */
export function isDue(source: SourceConfig, now: Date): boolean {
  const reference = referenceTime(source);
  if (reference === null) return true;
  return now.getTime() - reference >= source.crawl_interval_minutes * MINUTE_MS;
}

/**
 * Whole intervals skipped beyond the one that made the source due.
 */
export function missedIntervals(source: SourceConfig, now: Date): number {
  const reference = referenceTime(source);
  if (reference === null) return 0;
  const elapsed = now.getTime() - reference;
  return Math.max(0, Math.floor(elapsed / (source.crawl_interval_minutes * MINUTE_MS)) - 1);
}

export class CrawlScheduler {
  private readonly db: Database.Database;
  private readonly dispatcher: CrawlDispatcher;
  private readonly tickCron: string;
  private readonly staleRunMinutes: number;
  private readonly clock: Clock;
  private task: cron.ScheduledTask | null = null;

  constructor(options: SchedulerOptions) {
    this.db = options.db;
    this.dispatcher = options.dispatcher;
    this.tickCron = options.tickCron ?? '* * * * *';
    this.staleRunMinutes = options.staleRunMinutes ?? 30;
    this.clock = options.clock ?? systemClock;
  }

  get isRunning(): boolean {
    return this.task !== null;
  }

  /**
   * Evaluate every active source once and dispatch the due ones.
   */
  tick(now: Date = this.clock()): TickSummary {
    const summary: TickSummary = { checked: 0, triggered: [], skipped_running: [], reconciled: 0, errors: [] };

    try {
      summary.reconciled = reconcileStaleRuns(
        this.db,
        new Date(now.getTime() - this.staleRunMinutes * MINUTE_MS),
        now,
        this.dispatcher.inFlight(),
      );
      if (summary.reconciled > 0) {
        logger.warn({ reconciled: summary.reconciled }, 'Reconciled stale running crawl runs');
      }
    } catch (err) {
      logger.error({ error: errorMessage(err) }, 'Stale run reconciliation failed');
    }

    let sources: SourceConfig[];
    let running: Set<string>;
    try {
      sources = listSources(this.db, { activeOnly: true });
      running = new Set([...listRunningSourceNames(this.db), ...this.dispatcher.inFlight()]);
    } catch (err) {
      const error = errorMessage(err);
      logger.error({ error }, 'Scheduler tick could not load sources or running runs');
      summary.errors.push({ source: '*', error });
      return summary;
    }

    const dispatched = new Set<string>();
    for (const source of sources) {
      summary.checked++;
      try {
        if (running.has(source.name)) {
          summary.skipped_running.push(source.name);
          continue;
        }
        if (dispatched.has(source.name) || !isDue(source, now)) continue;

        const missed = missedIntervals(source, now);
        if (missed > 0) {
          logger.info({ source: source.name, missedIntervals: missed }, 'Source overdue, running once to catch up');
        }

        const handle = this.dispatcher.dispatch({
          sourceName: source.name,
          baseUrl: source.base_url,
          isScheduled: true,
        });
        dispatched.add(source.name);
        summary.triggered.push(source.name);
        logger.info({ source: source.name, handle }, 'Scheduled crawl dispatched');
      } catch (err) {
        const error = errorMessage(err);
        summary.errors.push({ source: source.name, error });
        logger.error({ source: source.name, error }, 'Scheduler failed to evaluate source');
      }
    }

    logger.debug(
      { checked: summary.checked, triggered: summary.triggered.length, skippedRunning: summary.skipped_running.length },
      'Scheduler tick complete',
    );
    return summary;
  }

  /**
   * Start ticking on the cron expression.
   */
  start(): void {
    if (this.task) return;
    if (!cron.validate(this.tickCron)) {
      throw new ConfigError(`Invalid scheduler tick_cron expression: ${this.tickCron}`, {
        tick_cron: this.tickCron,
      });
    }

    this.task = cron.schedule(this.tickCron, () => {
      this.runScheduledTick();
    });
    logger.info({ tick_cron: this.tickCron }, 'Scheduler started');
  }

  stop(): void {
    if (!this.task) return;
    this.task.stop();
    this.task = null;
    logger.info('Scheduler stopped');
  }

  private runScheduledTick(): void {
    try {
      this.tick();
    } catch (err) {
      logger.error({ error: errorMessage(err) }, 'Scheduler tick failed');
    }
  }
}
