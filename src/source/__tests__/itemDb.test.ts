import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import Database from 'better-sqlite3';
import { runMigrations } from '../../db/migrate.js';
import {
  insertItem,
  hashExists,
  findBySourceAndHash,
  getItem,
  listItems,
  getItemStats,
  countItemsBySource,
  listUnprocessedItems,
  markItemProcessed,
} from '../itemDb.js';

let db: Database.Database;

beforeEach(() => {
  db = new Database(':memory:');
  runMigrations(db);
});

afterEach(() => {
  db.close();
});

function item(source: string, n: number, crawledAt: string) {
  return {
    source_name: source,
    source_url: `https://${source}.test/${n}`,
    content_hash: `hash-${source}-${n}`,
    title: `Item ${n}`,
    body: `Body ${n}`,
    meta: { n },
    crawled_at: crawledAt,
  };
}

describe('insertItem', () => {
  it('stores an item and returns its id', () => {
    const id = insertItem(db, item('alpha', 1, '2026-03-01T10:00:00.000Z'));
    expect(id).not.toBeNull();
    if (!id) return;

    const stored = getItem(db, id);
    expect(stored?.title).toBe('Item 1');
    expect(stored?.meta).toEqual({ n: 1 });
    expect(stored?.is_processed).toBe(false);
    expect(hashExists(db, 'hash-alpha-1')).toBe(true);
    expect(findBySourceAndHash(db, 'alpha', 'hash-alpha-1')?.id).toBe(id);
  });

  it('returns null when the content hash is already stored', () => {
    insertItem(db, item('alpha', 1, '2026-03-01T10:00:00.000Z'));
    expect(insertItem(db, item('alpha', 1, '2026-03-02T10:00:00.000Z'))).toBeNull();
    expect(getItemStats(db).total).toBe(1);
  });
});

describe('listItems', () => {
  it('returns newest first with source filter and paging', () => {
    insertItem(db, item('alpha', 1, '2026-03-01T10:00:00.000Z'));
    insertItem(db, item('alpha', 2, '2026-03-02T10:00:00.000Z'));
    insertItem(db, item('beta', 1, '2026-03-03T10:00:00.000Z'));

    expect(listItems(db).map((i) => i.content_hash)).toEqual(['hash-beta-1', 'hash-alpha-2', 'hash-alpha-1']);
    expect(listItems(db, { source: 'alpha' }).map((i) => i.content_hash)).toEqual(['hash-alpha-2', 'hash-alpha-1']);
    expect(listItems(db, { limit: 1, offset: 2 }).map((i) => i.content_hash)).toEqual(['hash-alpha-1']);
    expect(countItemsBySource(db)).toEqual({ alpha: 2, beta: 1 });
  });
});

describe('processed flag', () => {
  it('lists unprocessed items oldest first and tracks the flag', () => {
    const first = insertItem(db, item('alpha', 1, '2026-03-01T10:00:00.000Z'));
    insertItem(db, item('alpha', 2, '2026-03-02T10:00:00.000Z'));
    if (!first) throw new Error('insert failed');

    expect(listUnprocessedItems(db).map((i) => i.content_hash)).toEqual(['hash-alpha-1', 'hash-alpha-2']);
    expect(markItemProcessed(db, first)).toBe(true);
    expect(listUnprocessedItems(db).map((i) => i.content_hash)).toEqual(['hash-alpha-2']);
    expect(getItemStats(db, 'alpha')).toEqual({ total: 2, processed: 1, unprocessed: 1 });
    expect(markItemProcessed(db, 'missing')).toBe(false);
  });
});
