import { z } from 'zod';
import fs from 'node:fs';
import type Database from 'better-sqlite3';
import { parse as yamlParse } from 'yaml';
import { addSource } from './sourceDb.js';
import { ConfigError } from '../shared/errors.js';
import { logger } from '../shared/logger.js';

const SourceEntrySchema = z.object({
  name: z.string().min(1),
  base_url: z.string().url(),
  is_active: z.boolean().default(true),
  crawl_interval_minutes: z.number().int().positive().default(15),
  settings: z.record(z.unknown()).default({}),
});

export const SourceFileSchema = z.object({
  sources: z.array(SourceEntrySchema).min(1),
});

export type SourceFile = z.infer<typeof SourceFileSchema>;
export type SourceEntry = z.infer<typeof SourceEntrySchema>;

export function parseSourceFile(yamlText: string, label = 'sources file'): SourceFile {
  let raw: unknown;
  try {
    raw = yamlParse(yamlText);
  } catch (err) {
    throw new ConfigError(`Invalid YAML in ${label}`, {
      cause: err instanceof Error ? err.message : String(err),
    });
  }

  const parsed = SourceFileSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigError(`Invalid ${label}`, {
      errors: parsed.error.flatten().fieldErrors,
    });
  }

  const names = parsed.data.sources.map((s) => s.name);
  const duplicate = names.find((name, i) => names.indexOf(name) !== i);
  if (duplicate) {
    throw new ConfigError(`Duplicate source name in ${label}: ${duplicate}`);
  }

  return parsed.data;
}

export function loadSourceFile(filePath: string): SourceFile {
  if (!fs.existsSync(filePath)) {
    throw new ConfigError(`Sources file not found: ${filePath}`);
  }
  return parseSourceFile(fs.readFileSync(filePath, 'utf-8'), filePath);
}

/**
 * Add every source in the file that does not exist yet. Existing sources
 * are left untouched.
 */
export function importSources(
  db: Database.Database,
  file: SourceFile,
): { added: string[]; existing: string[] } {
  const added: string[] = [];
  const existing: string[] = [];

  for (const entry of file.sources) {
    const created = addSource(db, entry);
    if (created) added.push(entry.name);
    else existing.push(entry.name);
  }

  logger.info({ added: added.length, existing: existing.length }, 'Sources imported');
  return { added, existing };
}
