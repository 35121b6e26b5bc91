import fs from 'node:fs';
import path from 'node:path';
import type Database from 'better-sqlite3';
import { DbError, errorMessage } from '../shared/errors.js';
import { logger } from '../shared/logger.js';
import { getPackageRoot, sha256, systemClock, toISO, type Clock } from '../shared/utils.js';

export interface MigrationOptions {
  /** Directory of `NNN_name.sql` files, applied in file-name order. */
  dir?: string;
  clock?: Clock;
}

export interface MigrationResult {
  applied: string[];
  skipped: string[];
}

interface MigrationFile {
  name: string;
  sql: string;
  checksum: string;
}

const DEFAULT_MIGRATIONS_DIR = path.join(getPackageRoot(), 'src', 'db', 'migrations');

function readMigrationFiles(dir: string): MigrationFile[] {
  if (!fs.existsSync(dir)) {
    throw new DbError(`Migrations directory not found: ${dir}`, { dir });
  }
  return fs
    .readdirSync(dir)
    .filter((f) => f.endsWith('.sql'))
    .sort()
    .map((name) => {
      const sql = fs.readFileSync(path.join(dir, name), 'utf-8');
      return { name, sql, checksum: sha256(sql) };
    });
}

/**
 * Apply every migration not yet recorded in `_migrations`, each in its own
 * transaction. A recorded migration whose file has since changed is refused.
 */
export function runMigrations(db: Database.Database, opts: MigrationOptions = {}): MigrationResult {
  const clock = opts.clock ?? systemClock;

  db.exec(`
    CREATE TABLE IF NOT EXISTS _migrations (
      name       TEXT PRIMARY KEY,
      checksum   TEXT NOT NULL,
      applied_at TEXT NOT NULL
    );
  `);

  const recorded = new Map(
    (db.prepare('SELECT name, checksum FROM _migrations').all() as Array<{ name: string; checksum: string }>).map(
      (r) => [r.name, r.checksum],
    ),
  );

  const result: MigrationResult = { applied: [], skipped: [] };
  const record = db.prepare('INSERT INTO _migrations (name, checksum, applied_at) VALUES (?, ?, ?)');

  for (const file of readMigrationFiles(opts.dir ?? DEFAULT_MIGRATIONS_DIR)) {
    const checksum = recorded.get(file.name);
    if (checksum !== undefined) {
      if (checksum !== file.checksum) {
        throw new DbError(`Migration changed after it was applied: ${file.name}`, { migration: file.name });
      }
      result.skipped.push(file.name);
      continue;
    }

    try {
      db.transaction(() => {
        db.exec(file.sql);
        record.run(file.name, file.checksum, toISO(clock()));
      })();
    } catch (err) {
      throw new DbError(`Migration failed: ${file.name}`, { migration: file.name, cause: errorMessage(err) });
    }
    result.applied.push(file.name);
    logger.info({ migration: file.name }, 'Migration applied');
  }

  return result;
}
