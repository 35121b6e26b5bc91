import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import Database from 'better-sqlite3';
import path from 'node:path';
import { runMigrations } from '../../db/migrate.js';
import { parseSourceFile, loadSourceFile, importSources } from '../sourceFile.js';
import { getSource, listSources } from '../sourceDb.js';
import { ConfigError } from '../../shared/errors.js';
import { getPackageRoot } from '../../shared/utils.js';

const YAML = `
sources:
  - name: alpha
    base_url: https://alpha.test/
    crawl_interval_minutes: 30
    settings:
      adapter: feed
      feed_url: https://alpha.test/rss.xml
  - name: beta
    base_url: https://beta.test/
    is_active: false
`;

let db: Database.Database;

beforeEach(() => {
  db = new Database(':memory:');
  runMigrations(db);
});

afterEach(() => {
  db.close();
});

describe('parseSourceFile', () => {
  it('applies defaults', () => {
    const file = parseSourceFile(YAML);
    expect(file.sources).toHaveLength(2);
    expect(file.sources[0].settings).toEqual({ adapter: 'feed', feed_url: 'https://alpha.test/rss.xml' });
    expect(file.sources[1].crawl_interval_minutes).toBe(15);
    expect(file.sources[1].is_active).toBe(false);
    expect(file.sources[1].settings).toEqual({});
  });

  it('rejects an invalid base_url', () => {
    expect(() => parseSourceFile('sources:\n  - name: a\n    base_url: not a url\n')).toThrow(ConfigError);
  });

  it('rejects duplicate names', () => {
    const text = 'sources:\n  - name: a\n    base_url: https://a.test\n  - name: a\n    base_url: https://b.test\n';
    expect(() => parseSourceFile(text, 'dup.yaml')).toThrow('Duplicate source name in dup.yaml: a');
  });

  it('rejects malformed YAML', () => {
    expect(() => parseSourceFile('sources: [unclosed')).toThrow('Invalid YAML in sources file');
  });
});

describe('importSources', () => {
  it('adds new sources and reports existing ones', () => {
    const file = parseSourceFile(YAML);
    expect(importSources(db, file)).toEqual({ added: ['alpha', 'beta'], existing: [] });
    expect(importSources(db, file)).toEqual({ added: [], existing: ['alpha', 'beta'] });

    expect(listSources(db)).toHaveLength(2);
    expect(getSource(db, 'alpha')?.crawl_interval_minutes).toBe(30);
    expect(getSource(db, 'beta')?.is_active).toBe(false);
  });
});

describe('loadSourceFile', () => {
  it('loads the bundled example file', () => {
    const file = loadSourceFile(path.join(getPackageRoot(), 'examples', 'sources.yaml'));
    expect(file.sources.length).toBeGreaterThan(0);
  });

  it('throws for a missing file', () => {
    expect(() => loadSourceFile('/nonexistent/sources.yaml')).toThrow(ConfigError);
  });
});
