export { Fetcher, type FetcherOptions, type FeedDocument, type FeedEntry } from './crawl/fetcher.js';
export {
  AdapterRegistry,
  createDefaultRegistry,
  FeedAdapter,
  HtmlListAdapter,
  type ItemData,
  type SourceAdapter,
} from './adapters/index.js';
export { crawlSource, contentHash, type CrawlOptions, type ItemResult } from './crawl/orchestrator.js';
export { commitBatch, updateCrawlMarkers, type CommitResult } from './crawl/gate.js';
export {
  executeCrawlRun,
  type CrawlContext,
  type CrawlRequest,
  type CrawlRunOutcome,
} from './crawl/runner.js';
export { LocalDispatcher, type CrawlDispatcher, type RunExecutor } from './crawl/dispatcher.js';
export { CrawlScheduler, isDue, missedIntervals, type TickSummary } from './scheduler/scheduler.js';
export * from './ledger/runDb.js';
export * from './source/sourceDb.js';
export * from './source/itemDb.js';
export type { SourceConfig, SourceSettings, Item } from './source/types.js';
export { parseSourceFile, loadSourceFile, importSources, type SourceFile } from './source/sourceFile.js';
export { createRuntime, type Runtime } from './runtime.js';
export { createApp } from './api/server.js';
export { loadConfig, ConfigSchema, type Config } from './shared/config.js';
export * from './shared/errors.js';
export { openDb } from './db/db.js';
export { runMigrations } from './db/migrate.js';
