import { executeCrawlRun, type CrawlContext, type CrawlRequest, type CrawlRunOutcome } from './runner.js';
import { CrawlInProgressError, errorMessage } from '../shared/errors.js';
import { generateId } from '../shared/utils.js';
import { logger } from '../shared/logger.js';

/**
 * Hands crawl runs to something that executes them asynchronously.
 */
export interface CrawlDispatcher {
  /** Queue a run and return its handle without waiting for it. */
  dispatch(request: CrawlRequest): string;
  /**
   * Source names queued or executing in this process. Advisory only: the
   * ledger's running entries are authoritative.
   */
  inFlight(): ReadonlySet<string>;
}

export type RunExecutor = (request: CrawlRequest) => Promise<CrawlRunOutcome>;

interface Job {
  handle: string;
  request: CrawlRequest;
}

/**
 * In-process work queue that executes at most `maxParallel` runs at a time.
 */
export class LocalDispatcher implements CrawlDispatcher {
  private readonly queue: Job[] = [];
  private readonly active = new Map<string, Job>();
  private readonly sources = new Map<string, number>();
  private idleWaiters: Array<() => void> = [];

  constructor(
    private readonly execute: RunExecutor,
    private readonly maxParallel = 2,
  ) {}

  static forContext(ctx: CrawlContext, maxParallel: number): LocalDispatcher {
    return new LocalDispatcher((request) => executeCrawlRun(ctx, request), maxParallel);
  }

  dispatch(request: CrawlRequest): string {
    const job: Job = { handle: generateId(), request };
    this.queue.push(job);
    this.sources.set(request.sourceName, (this.sources.get(request.sourceName) ?? 0) + 1);
    logger.debug({ source: request.sourceName, handle: job.handle }, 'Crawl run queued');
    this.pump();
    return job.handle;
  }

  inFlight(): ReadonlySet<string> {
    return new Set(this.sources.keys());
  }

  size(): { queued: number; active: number } {
    return { queued: this.queue.length, active: this.active.size };
  }

  /**
   * Resolve once nothing is queued or executing.
   */
  drain(): Promise<void> {
    if (this.queue.length === 0 && this.active.size === 0) return Promise.resolve();
    return new Promise((resolve) => {
      this.idleWaiters.push(resolve);
    });
  }

  private pump(): void {
    while (this.active.size < this.maxParallel) {
      const job = this.queue.shift();
      if (!job) break;
      this.active.set(job.handle, job);
      void this.run(job);
    }

    if (this.queue.length === 0 && this.active.size === 0) {
      const waiters = this.idleWaiters;
      this.idleWaiters = [];
      for (const resolve of waiters) resolve();
    }
  }

  private async run(job: Job): Promise<void> {
    const { sourceName } = job.request;
    try {
      const outcome = await this.execute(job.request);
      logger.debug(
        { source: sourceName, handle: job.handle, runId: outcome.run.id, success: outcome.success },
        'Dispatched run finished',
      );
    } catch (err) {
      if (err instanceof CrawlInProgressError) {
        logger.info({ source: sourceName, handle: job.handle }, 'Skipped dispatch, run already in progress');
      } else {
        logger.error({ source: sourceName, handle: job.handle, error: errorMessage(err) }, 'Dispatched run errored');
      }
    } finally {
      this.active.delete(job.handle);
      const remaining = (this.sources.get(sourceName) ?? 1) - 1;
      if (remaining > 0) this.sources.set(sourceName, remaining);
      else this.sources.delete(sourceName);
      this.pump();
    }
  }
}
