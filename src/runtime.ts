import type Database from 'better-sqlite3';
import type { Config } from './shared/config.js';
import { Fetcher } from './crawl/fetcher.js';
import { createDefaultRegistry } from './adapters/index.js';
import type { AdapterRegistry } from './adapters/adapter.js';
import { LocalDispatcher } from './crawl/dispatcher.js';
import type { CrawlContext } from './crawl/runner.js';
import { CrawlScheduler } from './scheduler/scheduler.js';
import { systemClock, type Clock } from './shared/utils.js';

/**
 * Everything a long-running process or a one-off command needs, wired from
 * one config and one open database.
 */
export interface Runtime {
  db: Database.Database;
  config: Config;
  registry: AdapterRegistry;
  crawl: CrawlContext;
  dispatcher: LocalDispatcher;
  scheduler: CrawlScheduler;
}

export function createRuntime(
  db: Database.Database,
  config: Config,
  opts: { registry?: AdapterRegistry; clock?: Clock } = {},
): Runtime {
  const clock = opts.clock ?? systemClock;
  const registry = opts.registry ?? createDefaultRegistry(Fetcher.fromConfig(config.crawler));
  const crawl: CrawlContext = { db, registry, crawler: config.crawler, clock };
  const dispatcher = LocalDispatcher.forContext(crawl, config.scheduler.max_parallel_runs);
  const scheduler = new CrawlScheduler({
    db,
    dispatcher,
    tickCron: config.scheduler.tick_cron,
    staleRunMinutes: config.scheduler.stale_run_minutes,
    clock,
  });

  return { db, config, registry, crawl, dispatcher, scheduler };
}
