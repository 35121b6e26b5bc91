import type Database from 'better-sqlite3';
import type { SourceConfig, SourceRow, SourceSettings } from './types.js';
import { nowISO } from '../shared/utils.js';
import { parseJsonObject } from '../shared/json.js';
import { DbError, NotFoundError, SourceError } from '../shared/errors.js';

function toSource(row: SourceRow): SourceConfig {
  return {
    name: row.name,
    base_url: row.base_url,
    is_active: row.is_active === 1,
    crawl_interval_minutes: row.crawl_interval_minutes,
    settings: parseJsonObject(row.settings_json),
    last_crawl: row.last_crawl,
    last_scheduled_crawl: row.last_scheduled_crawl,
    created_at: row.created_at,
    updated_at: row.updated_at,
  };
}

function assertInterval(minutes: number): void {
  if (!Number.isInteger(minutes) || minutes <= 0) {
    throw new SourceError(`Crawl interval must be a positive integer, got ${minutes}`, {
      crawl_interval_minutes: minutes,
    });
  }
}

export interface NewSource {
  name: string;
  base_url: string;
  is_active?: boolean;
  crawl_interval_minutes?: number;
  settings?: SourceSettings;
}

/**
 * Insert a source. Returns null when the name is already taken.
 */
export function addSource(db: Database.Database, opts: NewSource): SourceConfig | null {
  const interval = opts.crawl_interval_minutes ?? 15;
  assertInterval(interval);
  if (!opts.name.trim()) {
    throw new SourceError('Source name must not be empty');
  }

  const now = nowISO();
  try {
    db.prepare(
      `INSERT INTO sources (name, base_url, is_active, crawl_interval_minutes, settings_json, created_at, updated_at)
       VALUES (?, ?, ?, ?, ?, ?, ?)`,
    ).run(
      opts.name,
      opts.base_url,
      opts.is_active === false ? 0 : 1,
      interval,
      JSON.stringify(opts.settings ?? {}),
      now,
      now,
    );
  } catch (err) {
    if (err instanceof Error && err.message.includes('UNIQUE')) {
      return null;
    }
    throw new DbError(`Failed to add source: ${err instanceof Error ? err.message : String(err)}`, {
      name: opts.name,
    });
  }

  return getSource(db, opts.name) ?? null;
}

export function listSources(
  db: Database.Database,
  opts: { activeOnly?: boolean } = {},
): SourceConfig[] {
  const where = opts.activeOnly ? 'WHERE is_active = 1' : '';
  const rows = db.prepare(`SELECT * FROM sources ${where} ORDER BY name`).all() as SourceRow[];
  return rows.map(toSource);
}

export function getSource(db: Database.Database, name: string): SourceConfig | undefined {
  const row = db.prepare('SELECT * FROM sources WHERE name = ?').get(name) as SourceRow | undefined;
  return row ? toSource(row) : undefined;
}

export function requireSource(db: Database.Database, name: string): SourceConfig {
  const source = getSource(db, name);
  if (!source) throw new NotFoundError(`Source not found: ${name}`, { source: name });
  return source;
}

export interface SourceUpdate {
  base_url?: string;
  is_active?: boolean;
  crawl_interval_minutes?: number;
  settings?: SourceSettings;
}

export function updateSource(db: Database.Database, name: string, updates: SourceUpdate): boolean {
  const sets: string[] = [];
  const values: Array<string | number> = [];

  if (updates.base_url !== undefined) {
    sets.push('base_url = ?');
    values.push(updates.base_url);
  }
  if (updates.is_active !== undefined) {
    sets.push('is_active = ?');
    values.push(updates.is_active ? 1 : 0);
  }
  if (updates.crawl_interval_minutes !== undefined) {
    assertInterval(updates.crawl_interval_minutes);
    sets.push('crawl_interval_minutes = ?');
    values.push(updates.crawl_interval_minutes);
  }
  if (updates.settings !== undefined) {
    sets.push('settings_json = ?');
    values.push(JSON.stringify(updates.settings));
  }

  if (sets.length === 0) return false;

  sets.push('updated_at = ?');
  values.push(nowISO());
  values.push(name);
  const result = db.prepare(`UPDATE sources SET ${sets.join(', ')} WHERE name = ?`).run(...values);
  return result.changes > 0;
}

/**
 * Advance the crawl markers after a run finishes. `last_scheduled_crawl`
 * moves only for scheduler-triggered runs.
 */
export function setCrawlMarkers(
  db: Database.Database,
  name: string,
  at: string,
  scheduled: boolean,
): boolean {
  const sql = scheduled
    ? 'UPDATE sources SET last_crawl = ?, last_scheduled_crawl = ? WHERE name = ?'
    : 'UPDATE sources SET last_crawl = ? WHERE name = ?';
  const result = scheduled ? db.prepare(sql).run(at, at, name) : db.prepare(sql).run(at, name);
  return result.changes > 0;
}

export function deleteSource(db: Database.Database, name: string): boolean {
  const result = db.prepare('DELETE FROM sources WHERE name = ?').run(name);
  return result.changes > 0;
}

export function countSources(db: Database.Database): { total: number; active: number } {
  const row = db
    .prepare('SELECT COUNT(*) AS total, COALESCE(SUM(is_active), 0) AS active FROM sources')
    .get() as { total: number; active: number };
  return { total: row.total, active: row.active };
}
