#!/usr/bin/env node

import { Command } from 'commander';
import fs from 'node:fs';
import path from 'node:path';
import { loadConfig, writeDefaultConfig, type Config } from '../shared/config.js';
import { getCrawlkeeperDir, getPackageVersion, resolvePath } from '../shared/utils.js';
import { initDb, closeDb } from '../db/db.js';
import { runMigrations } from '../db/migrate.js';
import { addSource, listSources, updateSource, deleteSource, requireSource } from '../source/sourceDb.js';
import { countItemsBySource } from '../source/itemDb.js';
import { loadSourceFile, importSources } from '../source/sourceFile.js';
import { listRuns, isCrawlRunStatus } from '../ledger/runDb.js';
import { executeCrawlRun } from '../crawl/runner.js';
import { createRuntime, type Runtime } from '../runtime.js';
import { startServer } from '../api/server.js';
import { CrawlInProgressError, NotFoundError, SourceError, errorMessage } from '../shared/errors.js';

const program = new Command();

program
  .name('crawlkeeper')
  .description('Scheduled article crawling with a run ledger')
  .version(getPackageVersion());

// === init ===
program
  .command('init')
  .description('Create the config file and database')
  .action(async () => {
    const configPath = path.join(getCrawlkeeperDir(), 'config.yaml');
    if (!fs.existsSync(configPath)) {
      writeDefaultConfig(configPath);
      log(`✓ ${configPath} created`);
    } else {
      log(`✓ ${configPath} already exists`);
    }

    const config = await loadConfig();
    const db = initDb(config.db.path);
    const { applied } = runMigrations(db);
    if (applied.length > 0) {
      log(`✓ ${resolvePath(config.db.path)} ready (${applied.length} migrations applied)`);
    } else {
      log(`✓ ${resolvePath(config.db.path)} already up to date`);
    }
    closeDb();
  });

// === source ===
const sourceCmd = program.command('source').description('Manage crawl sources');

sourceCmd
  .command('add <name> <baseUrl>')
  .description('Register a source')
  .option('-a, --adapter <adapter>', 'Adapter name (feed, html)')
  .option('-i, --interval <minutes>', 'Crawl interval in minutes', '15')
  .option('-s, --settings <json>', 'Adapter settings as a JSON object')
  .option('--inactive', 'Register the source disabled', false)
  .action(
    async (
      name: string,
      baseUrl: string,
      opts: { adapter?: string; interval: string; settings?: string; inactive: boolean },
    ) => {
      const { db, cleanup } = await openRuntimeDb();
      try {
        const settings: Record<string, unknown> = opts.settings ? parseSettingsOption(opts.settings) : {};
        if (opts.adapter) settings['adapter'] = opts.adapter;

        const source = addSource(db, {
          name,
          base_url: baseUrl,
          is_active: !opts.inactive,
          crawl_interval_minutes: parseInt(opts.interval, 10),
          settings,
        });
        if (!source) {
          log(`Source already exists: ${name}`);
          process.exitCode = 1;
          return;
        }
        log(`✓ Added ${name} (every ${source.crawl_interval_minutes} min)`);
      } finally {
        cleanup();
      }
    },
  );

sourceCmd
  .command('list')
  .description('List sources with item counts and last crawl times')
  .action(async () => {
    const { db, cleanup } = await openRuntimeDb();
    try {
      const sources = listSources(db);
      if (sources.length === 0) {
        log('No sources. Add one with: crawlkeeper source add <name> <url>');
        return;
      }
      const counts = countItemsBySource(db);
      for (const s of sources) {
        const state = s.is_active ? 'on ' : 'off';
        log(
          `  [${state}] ${s.name.padEnd(20)} ${String(counts[s.name] ?? 0).padStart(6)} items  ` +
            `every ${s.crawl_interval_minutes}m  last: ${s.last_crawl ?? 'never'}`,
        );
      }
    } finally {
      cleanup();
    }
  });

sourceCmd
  .command('import <file>')
  .description('Add the sources listed in a YAML file')
  .action(async (file: string) => {
    const { db, cleanup } = await openRuntimeDb();
    try {
      const { added, existing } = importSources(db, loadSourceFile(resolvePath(file)));
      log(`✓ ${added.length} added, ${existing.length} already present`);
    } finally {
      cleanup();
    }
  });

for (const [command, active] of [
  ['enable', true],
  ['disable', false],
] as const) {
  sourceCmd
    .command(`${command} <name>`)
    .description(`${active ? 'Enable' : 'Disable'} scheduled crawling of a source`)
    .action(async (name: string) => {
      const { db, cleanup } = await openRuntimeDb();
      try {
        if (!updateSource(db, name, { is_active: active })) {
          log(`Source not found: ${name}`);
          process.exitCode = 1;
          return;
        }
        log(`✓ ${name} ${active ? 'enabled' : 'disabled'}`);
      } finally {
        cleanup();
      }
    });
}

sourceCmd
  .command('remove <name>')
  .description('Delete a source (its items and runs are kept)')
  .action(async (name: string) => {
    const { db, cleanup } = await openRuntimeDb();
    try {
      if (!deleteSource(db, name)) {
        log(`Source not found: ${name}`);
        process.exitCode = 1;
        return;
      }
      log(`✓ Removed ${name}`);
    } finally {
      cleanup();
    }
  });

// === crawl ===
program
  .command('crawl <name>')
  .description('Crawl one source now')
  .option('-u, --base-url <url>', 'Crawl this address instead of the configured one')
  .action(async (name: string, opts: { baseUrl?: string }) => {
    const { runtime, cleanup } = await openRuntime();
    try {
      requireSource(runtime.db, name);
      const outcome = await executeCrawlRun(runtime.crawl, {
        sourceName: name,
        baseUrl: opts.baseUrl ?? null,
        isScheduled: false,
      });
      const { run } = outcome;

      log(`\nCrawl ${outcome.success ? 'complete' : 'failed'}: ${name}`);
      log(`  Run:      ${run.id}`);
      log(`  Found:    ${run.items_found}`);
      log(`  Saved:    ${run.items_saved}`);
      log(`  Skipped:  ${run.items_skipped}`);
      log(`  Failed:   ${run.items_failed}`);
      log(`  Duration: ${run.duration_seconds?.toFixed(1) ?? '?'}s`);
      if (!outcome.success) {
        log(`  Error:    ${outcome.error ?? run.error_message ?? 'unknown'}`);
        process.exitCode = 1;
      }
    } catch (err) {
      if (err instanceof NotFoundError) {
        log(err.message);
      } else if (err instanceof CrawlInProgressError) {
        log(`A crawl of ${name} is already running`);
      } else {
        throw err;
      }
      process.exitCode = 1;
    } finally {
      cleanup();
    }
  });

// === runs ===
program
  .command('runs')
  .description('Show recent crawl runs')
  .option('-s, --source <name>', 'Only runs of this source')
  .option('--status <status>', 'running | completed | failed')
  .option('-n, --limit <n>', 'Number of runs to show', '20')
  .action(async (opts: { source?: string; status?: string; limit: string }) => {
    if (opts.status !== undefined && !isCrawlRunStatus(opts.status)) {
      log(`Unknown status: ${opts.status}`);
      process.exitCode = 1;
      return;
    }
    const status = opts.status;

    const { db, cleanup } = await openRuntimeDb();
    try {
      const runs = listRuns(db, { source: opts.source, status, limit: parseInt(opts.limit, 10) });
      if (runs.length === 0) {
        log('No crawl runs recorded.');
        return;
      }
      for (const r of runs) {
        const kind = r.is_scheduled ? 'sched' : 'manual';
        log(
          `  ${r.start_time}  ${r.status.padEnd(9)} ${kind.padEnd(6)} ${r.source_name.padEnd(20)} ` +
            `found=${r.items_found} saved=${r.items_saved} skipped=${r.items_skipped} failed=${r.items_failed}`,
        );
        if (r.error_message) log(`      ${r.error_message}`);
      }
    } finally {
      cleanup();
    }
  });

// === tick ===
program
  .command('tick')
  .description('Run one scheduler tick and wait for the dispatched crawls')
  .action(async () => {
    const { runtime, cleanup } = await openRuntime();
    try {
      const summary = runtime.scheduler.tick();
      log(`Checked ${summary.checked} sources, dispatched ${summary.triggered.length}`);
      if (summary.reconciled > 0) log(`  Reconciled stale runs: ${summary.reconciled}`);
      if (summary.skipped_running.length > 0) {
        log(`  Still running: ${summary.skipped_running.join(', ')}`);
      }
      for (const e of summary.errors) log(`  ${e.source}: ${e.error}`);

      await runtime.dispatcher.drain();
      for (const name of summary.triggered) {
        const [last] = listRuns(runtime.db, { source: name, limit: 1 });
        if (last) log(`  ${name}: ${last.status} (saved ${last.items_saved})`);
      }
    } finally {
      cleanup();
    }
  });

// === server ===
program
  .command('server')
  .description('Start the HTTP API and the scheduler')
  .option('--port <port>', 'Port to listen on')
  .option('--no-scheduler', 'Serve the API without scheduled crawling')
  .action(async (opts: { port?: string; scheduler: boolean }) => {
    await startServer({
      port: opts.port ? parseInt(opts.port, 10) : undefined,
      scheduler: opts.scheduler ? undefined : false,
    });
  });

// === Helper to get a migrated DB connection ===
async function openRuntimeDb(): Promise<{
  db: ReturnType<typeof initDb>;
  config: Config;
  cleanup: () => void;
}> {
  const config = await loadConfig();
  const db = initDb(config.db.path);
  runMigrations(db);
  return { db, config, cleanup: () => closeDb() };
}

async function openRuntime(): Promise<{ runtime: Runtime; cleanup: () => void }> {
  const { db, config, cleanup } = await openRuntimeDb();
  return { runtime: createRuntime(db, config), cleanup };
}

function parseSettingsOption(raw: string): Record<string, unknown> {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (err) {
    throw new SourceError(`--settings is not valid JSON: ${errorMessage(err)}`);
  }
  if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
    throw new SourceError('--settings must be a JSON object');
  }
  return { ...parsed };
}

function log(msg: string): void {
  // eslint-disable-next-line no-console
  console.log(msg);
}

program.parseAsync().catch((err: unknown) => {
  // eslint-disable-next-line no-console
  console.error(`Error: ${errorMessage(err)}`);
  process.exitCode = 1;
});
