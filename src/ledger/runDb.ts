import type Database from 'better-sqlite3';
import { generateId, toISO } from '../shared/utils.js';
import { parseJsonStringArray } from '../shared/json.js';
import { DbError } from '../shared/errors.js';

export type CrawlRunStatus = 'running' | 'completed' | 'failed';

export const CRAWL_RUN_STATUSES: readonly CrawlRunStatus[] = ['running', 'completed', 'failed'];

export function isCrawlRunStatus(value: string): value is CrawlRunStatus {
  return (CRAWL_RUN_STATUSES as readonly string[]).includes(value);
}

export interface CrawlRun {
  id: string;
  source_name: string;
  start_time: string;
  end_time: string | null;
  status: CrawlRunStatus;
  items_found: number;
  items_saved: number;
  items_skipped: number;
  items_failed: number;
  saved_item_ids: string[];
  error_message: string | null;
  duration_seconds: number | null;
  is_scheduled: boolean;
}

interface CrawlRunRow {
  id: string;
  source_name: string;
  start_time: string;
  end_time: string | null;
  status: CrawlRunStatus;
  items_found: number;
  items_saved: number;
  items_skipped: number;
  items_failed: number;
  saved_item_ids: string;
  error_message: string | null;
  duration_seconds: number | null;
  is_scheduled: number;
}

/**
 * Counts accumulated during a run, written with its terminal state.
 */
export interface RunCounts {
  found: number;
  saved: number;
  skipped: number;
  failed: number;
  savedIds: string[];
}

export function emptyRunCounts(): RunCounts {
  return { found: 0, saved: 0, skipped: 0, failed: 0, savedIds: [] };
}

export const STALE_RUN_MESSAGE = 'Run exceeded stale threshold and was reconciled';

function toRun(row: CrawlRunRow): CrawlRun {
  return {
    ...row,
    saved_item_ids: parseJsonStringArray(row.saved_item_ids),
    is_scheduled: row.is_scheduled === 1,
  };
}

function isUniqueViolation(err: unknown): boolean {
  return err instanceof Error && err.message.includes('UNIQUE');
}

/**
 * Open a ledger entry in `running` state. Returns null when the source
 * already has a running entry.
 */
export function startRun(
  db: Database.Database,
  sourceName: string,
  at: Date,
  opts: { scheduled?: boolean } = {},
): CrawlRun | null {
  const id = generateId();
  try {
    db.prepare(
      `INSERT INTO crawl_runs (id, source_name, start_time, status, is_scheduled)
       VALUES (?, ?, ?, 'running', ?)`,
    ).run(id, sourceName, toISO(at), opts.scheduled ? 1 : 0);
  } catch (err) {
    if (isUniqueViolation(err)) return null;
    throw new DbError(`Failed to start crawl run: ${err instanceof Error ? err.message : String(err)}`, {
      source: sourceName,
    });
  }
  return getRun(db, id) ?? null;
}

function finishRun(
  db: Database.Database,
  id: string,
  status: Exclude<CrawlRunStatus, 'running'>,
  counts: RunCounts,
  at: Date,
  errorMessage: string | null,
): boolean {
  const row = db.prepare('SELECT start_time FROM crawl_runs WHERE id = ?').get(id) as
    | { start_time: string }
    | undefined;
  if (!row) return false;

  const duration = Math.max(0, (at.getTime() - Date.parse(row.start_time)) / 1000);
  const result = db
    .prepare(
      `UPDATE crawl_runs
       SET status = ?, end_time = ?, items_found = ?, items_saved = ?, items_skipped = ?,
           items_failed = ?, saved_item_ids = ?, error_message = ?, duration_seconds = ?
       WHERE id = ? AND status = 'running'`,
    )
    .run(
      status,
      toISO(at),
      counts.found,
      counts.saved,
      counts.skipped,
      counts.failed,
      JSON.stringify(counts.savedIds),
      errorMessage,
      duration,
      id,
    );
  return result.changes > 0;
}

/**
 * Terminal write for a successful run. No-op (returns false) if the entry
 * already left `running`.
 */
export function completeRun(db: Database.Database, id: string, counts: RunCounts, at: Date): boolean {
  return finishRun(db, id, 'completed', counts, at, null);
}

export function failRun(
  db: Database.Database,
  id: string,
  counts: RunCounts,
  errorMessage: string,
  at: Date,
): boolean {
  return finishRun(db, id, 'failed', counts, at, errorMessage);
}

export function getRun(db: Database.Database, id: string): CrawlRun | undefined {
  const row = db.prepare('SELECT * FROM crawl_runs WHERE id = ?').get(id) as CrawlRunRow | undefined;
  return row ? toRun(row) : undefined;
}

export function listRuns(
  db: Database.Database,
  opts: { source?: string; status?: CrawlRunStatus; limit?: number; offset?: number } = {},
): CrawlRun[] {
  const where: string[] = [];
  const values: Array<string | number> = [];
  if (opts.source) {
    where.push('source_name = ?');
    values.push(opts.source);
  }
  if (opts.status) {
    where.push('status = ?');
    values.push(opts.status);
  }
  const clause = where.length > 0 ? `WHERE ${where.join(' AND ')}` : '';
  values.push(opts.limit ?? 50, opts.offset ?? 0);

  const rows = db
    .prepare(`SELECT * FROM crawl_runs ${clause} ORDER BY start_time DESC, rowid DESC LIMIT ? OFFSET ?`)
    .all(...values) as CrawlRunRow[];
  return rows.map(toRun);
}

export function listRunningSourceNames(db: Database.Database): string[] {
  const rows = db
    .prepare("SELECT DISTINCT source_name FROM crawl_runs WHERE status = 'running' ORDER BY source_name")
    .all() as Array<{ source_name: string }>;
  return rows.map((r) => r.source_name);
}

/**
 * Fail every `running` entry that started before `olderThan`, except those of
 * the sources in `exclude` (runs this process is still executing). Returns the
 * number of entries reconciled.
 */
export function reconcileStaleRuns(
  db: Database.Database,
  olderThan: Date,
  at: Date,
  exclude: Iterable<string> = [],
): number {
  const owned = new Set(exclude);
  const stale = db
    .prepare("SELECT id, source_name FROM crawl_runs WHERE status = 'running' AND start_time < ?")
    .all(toISO(olderThan)) as Array<{ id: string; source_name: string }>;

  let reconciled = 0;
  for (const { id, source_name } of stale) {
    if (owned.has(source_name)) continue;
    const run = getRun(db, id);
    if (!run) continue;
    const counts: RunCounts = {
      found: run.items_found,
      saved: run.items_saved,
      skipped: run.items_skipped,
      failed: run.items_failed,
      savedIds: run.saved_item_ids,
    };
    if (failRun(db, id, counts, STALE_RUN_MESSAGE, at)) reconciled++;
  }
  return reconciled;
}

export interface RunStats {
  total: number;
  running: number;
  completed: number;
  failed: number;
  items_saved: number;
  avg_duration_seconds: number | null;
  last_run: CrawlRun | null;
}

/**
 * Aggregate ledger figures, for one source or across all of them.
 */
export function getRunStats(db: Database.Database, source?: string): RunStats {
  const clause = source ? 'WHERE source_name = ?' : '';
  const params = source ? [source] : [];
  const row = db
    .prepare(
      `SELECT COUNT(*) AS total,
              COALESCE(SUM(status = 'running'), 0) AS running,
              COALESCE(SUM(status = 'completed'), 0) AS completed,
              COALESCE(SUM(status = 'failed'), 0) AS failed,
              COALESCE(SUM(items_saved), 0) AS items_saved,
              AVG(duration_seconds) AS avg_duration_seconds
       FROM crawl_runs ${clause}`,
    )
    .get(...params) as Omit<RunStats, 'last_run'>;

  const last = listRuns(db, { source, limit: 1 });
  return { ...row, last_run: last[0] ?? null };
}
