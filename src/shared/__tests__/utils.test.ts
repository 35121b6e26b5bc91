import { describe, it, expect } from 'vitest';
import { resolvePath, sha256, generateId, nowISO, toISO, getPackageRoot, getPackageVersion } from '../utils.js';
import { homedir } from 'node:os';
import fs from 'node:fs';
import path from 'node:path';

describe('resolvePath', () => {
  it('expands ~ to home directory', () => {
    const result = resolvePath('~/test');
    expect(result).toBe(path.join(homedir(), 'test'));
  });

  it('resolves relative paths', () => {
    const result = resolvePath('./foo/bar');
    expect(path.isAbsolute(result)).toBe(true);
  });

  it('returns absolute paths as-is', () => {
    expect(resolvePath('/absolute/path')).toBe('/absolute/path');
  });
});

describe('sha256', () => {
  it('produces a 64-char hex digest', () => {
    const hash = sha256('hello');
    expect(hash).toBe('2cf24dba5fb0a30e26e83b2ac5b9e29e1b161e5c1fa7425e73043362938b9824');
  });

  it('produces different hashes for different input', () => {
    expect(sha256('https://a.test/1')).not.toBe(sha256('https://a.test/2'));
  });
});

describe('generateId', () => {
  it('generates string of default length', () => {
    expect(generateId()).toHaveLength(21);
  });

  it('generates unique IDs', () => {
    expect(generateId()).not.toBe(generateId());
  });
});

describe('toISO / nowISO', () => {
  it('formats as ISO-8601 UTC with milliseconds', () => {
    expect(toISO(new Date(Date.UTC(2026, 2, 1, 10, 0, 0)))).toBe('2026-03-01T10:00:00.000Z');
    expect(nowISO()).toMatch(/^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}\.\d{3}Z$/);
  });
});

describe('getPackageRoot', () => {
  it('returns the directory holding package.json', () => {
    const root = getPackageRoot();
    expect(fs.existsSync(path.join(root, 'package.json'))).toBe(true);
    expect(fs.existsSync(path.join(root, 'src', 'db', 'migrations'))).toBe(true);
  });

  it('reads the package version', () => {
    expect(getPackageVersion()).toMatch(/^\d+\.\d+\.\d+/);
  });
});
