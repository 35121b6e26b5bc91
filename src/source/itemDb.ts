import type Database from 'better-sqlite3';
import type { Item, ItemRow } from './types.js';
import { generateId, nowISO } from '../shared/utils.js';
import { parseJsonObject } from '../shared/json.js';
import { DbError } from '../shared/errors.js';

function toItem(row: ItemRow): Item {
  return {
    id: row.id,
    source_name: row.source_name,
    source_url: row.source_url,
    content_hash: row.content_hash,
    title: row.title,
    body: row.body,
    meta: parseJsonObject(row.meta_json),
    crawled_at: row.crawled_at,
    is_processed: row.is_processed === 1,
  };
}

export interface InsertItemData {
  source_name: string;
  source_url: string;
  content_hash: string;
  title?: string | null;
  body?: string | null;
  meta?: Record<string, unknown>;
  crawled_at?: string;
}

/**
 * Insert an item. Returns null if an item with the same content hash
 * already exists.
 */
export function insertItem(db: Database.Database, item: InsertItemData): string | null {
  const id = generateId();
  try {
    const result = db
      .prepare(
        `INSERT OR IGNORE INTO items
         (id, source_name, source_url, content_hash, title, body, meta_json, crawled_at)
         VALUES (?, ?, ?, ?, ?, ?, ?, ?)`,
      )
      .run(
        id,
        item.source_name,
        item.source_url,
        item.content_hash,
        item.title ?? null,
        item.body ?? null,
        JSON.stringify(item.meta ?? {}),
        item.crawled_at ?? nowISO(),
      );
    return result.changes > 0 ? id : null;
  } catch (err) {
    throw new DbError(`Failed to insert item: ${err instanceof Error ? err.message : String(err)}`, {
      content_hash: item.content_hash,
    });
  }
}

export function hashExists(db: Database.Database, contentHash: string): boolean {
  const row = db.prepare('SELECT 1 FROM items WHERE content_hash = ?').get(contentHash);
  return row !== undefined;
}

export function findBySourceAndHash(
  db: Database.Database,
  sourceName: string,
  contentHash: string,
): Item | undefined {
  const row = db
    .prepare('SELECT * FROM items WHERE source_name = ? AND content_hash = ?')
    .get(sourceName, contentHash) as ItemRow | undefined;
  return row ? toItem(row) : undefined;
}

export function getItem(db: Database.Database, id: string): Item | undefined {
  const row = db.prepare('SELECT * FROM items WHERE id = ?').get(id) as ItemRow | undefined;
  return row ? toItem(row) : undefined;
}

export function listItems(
  db: Database.Database,
  opts: { source?: string; limit?: number; offset?: number } = {},
): Item[] {
  const limit = opts.limit ?? 50;
  const offset = opts.offset ?? 0;
  const rows = opts.source
    ? (db
        .prepare(
          'SELECT * FROM items WHERE source_name = ? ORDER BY crawled_at DESC, rowid DESC LIMIT ? OFFSET ?',
        )
        .all(opts.source, limit, offset) as ItemRow[])
    : (db
        .prepare('SELECT * FROM items ORDER BY crawled_at DESC, rowid DESC LIMIT ? OFFSET ?')
        .all(limit, offset) as ItemRow[]);
  return rows.map(toItem);
}

export interface ItemStats {
  total: number;
  processed: number;
  unprocessed: number;
}

export function getItemStats(db: Database.Database, source?: string): ItemStats {
  const row = (
    source
      ? db
          .prepare(
            'SELECT COUNT(*) AS total, COALESCE(SUM(is_processed), 0) AS processed FROM items WHERE source_name = ?',
          )
          .get(source)
      : db
          .prepare('SELECT COUNT(*) AS total, COALESCE(SUM(is_processed), 0) AS processed FROM items')
          .get()
  ) as { total: number; processed: number };
  return { total: row.total, processed: row.processed, unprocessed: row.total - row.processed };
}

export function countItemsBySource(db: Database.Database): Record<string, number> {
  const rows = db
    .prepare('SELECT source_name, COUNT(*) AS count FROM items GROUP BY source_name')
    .all() as Array<{ source_name: string; count: number }>;
  return Object.fromEntries(rows.map((r) => [r.source_name, r.count]));
}

export function listUnprocessedItems(db: Database.Database, limit = 50): Item[] {
  const rows = db
    .prepare('SELECT * FROM items WHERE is_processed = 0 ORDER BY crawled_at ASC, rowid ASC LIMIT ?')
    .all(limit) as ItemRow[];
  return rows.map(toItem);
}

export function markItemProcessed(db: Database.Database, id: string): boolean {
  const result = db.prepare('UPDATE items SET is_processed = 1 WHERE id = ?').run(id);
  return result.changes > 0;
}
