import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import Database from 'better-sqlite3';
import { runMigrations } from '../../db/migrate.js';
import { executeCrawlRun, type CrawlContext } from '../runner.js';
import { contentHash } from '../orchestrator.js';
import { AdapterRegistry } from '../../adapters/adapter.js';
import { addSource, getSource, setCrawlMarkers } from '../../source/sourceDb.js';
import { insertItem, getItemStats } from '../../source/itemDb.js';
import { startRun, getRun, listRuns } from '../../ledger/runDb.js';
import { CrawlInProgressError } from '../../shared/errors.js';
import { isDue } from '../../scheduler/scheduler.js';
import { ScriptedAdapter, urls, type CandidateBehavior } from './fakes.js';

let db: Database.Database;
let now: Date;
const T0 = new Date('2026-03-01T10:00:00.000Z');

function context(adapter: ScriptedAdapter): CrawlContext {
  return {
    db,
    registry: new AdapterRegistry().register(adapter),
    crawler: { max_concurrent: 3, candidate_limit: 50 },
    clock: () => now,
  };
}

beforeEach(() => {
  db = new Database(':memory:');
  runMigrations(db);
  now = T0;
  addSource(db, { name: 'alpha', base_url: 'https://alpha.test/', settings: { adapter: 'scripted' } });
});

afterEach(() => {
  db.close();
});

describe('executeCrawlRun', () => {
  it('records found, saved and skipped counts for a mixed batch', async () => {
    // 10 candidates: 7 parse, 3 do not; 2 of the parsed ones are already stored.
    const candidates = urls('https://alpha.test/a', 10);
    const script: Record<string, CandidateBehavior> = {};
    candidates.forEach((u, i) => {
      script[u] = i < 7 ? 'ok' : i === 7 ? 'throw' : 'null';
    });
    for (const known of candidates.slice(0, 2)) {
      insertItem(db, { source_name: 'alpha', source_url: known, content_hash: contentHash(known) });
    }

    const outcome = await executeCrawlRun(context(new ScriptedAdapter(script)), {
      sourceName: 'alpha',
      isScheduled: true,
    });

    expect(outcome.success).toBe(true);
    expect(outcome.run.status).toBe('completed');
    expect(outcome.run.items_found).toBe(7);
    expect(outcome.run.items_saved).toBe(5);
    expect(outcome.run.items_skipped).toBe(2);
    expect(outcome.run.items_failed).toBe(0);
    expect(outcome.run.saved_item_ids).toHaveLength(5);
    expect(outcome.run.is_scheduled).toBe(true);
    expect(getItemStats(db, 'alpha').total).toBe(7);
  });

  it('saves nothing new when the same content is crawled twice', async () => {
    const adapter = new ScriptedAdapter({
      'https://alpha.test/1': 'ok',
      'https://alpha.test/2': 'throw',
      'https://alpha.test/3': 'ok',
    });

    const first = await executeCrawlRun(context(adapter), { sourceName: 'alpha', isScheduled: true });
    expect(first.run.status).toBe('completed');
    expect(first.run.items_saved).toBe(2);

    now = new Date(T0.getTime() + 60_000);
    const second = await executeCrawlRun(context(adapter), { sourceName: 'alpha', isScheduled: true });
    expect(second.run.items_found).toBe(2);
    expect(second.run.items_saved).toBe(0);
    expect(second.run.items_skipped).toBe(2);
  });

  it('leaves due-ness untouched after a manual run', async () => {
    setCrawlMarkers(db, 'alpha', new Date(T0.getTime() - 20 * 60_000).toISOString(), true);
    const adapter = new ScriptedAdapter({ 'https://alpha.test/1': 'ok' });
    await executeCrawlRun(context(adapter), { sourceName: 'alpha', isScheduled: false });

    const source = getSource(db, 'alpha');
    if (!source) throw new Error('source missing');
    expect(source.last_crawl).toBe('2026-03-01T10:00:00.000Z');
    expect(isDue(source, T0)).toBe(true);
  });

  it('advances both markers for a scheduled run', async () => {
    const adapter = new ScriptedAdapter({ 'https://alpha.test/1': 'ok' });
    await executeCrawlRun(context(adapter), { sourceName: 'alpha', isScheduled: true });

    const source = getSource(db, 'alpha');
    expect(source?.last_crawl).toBe('2026-03-01T10:00:00.000Z');
    expect(source?.last_scheduled_crawl).toBe('2026-03-01T10:00:00.000Z');
  });

  it('does not advance last_scheduled_crawl for a manual run', async () => {
    const adapter = new ScriptedAdapter({ 'https://alpha.test/1': 'ok' });
    const outcome = await executeCrawlRun(context(adapter), { sourceName: 'alpha', isScheduled: false });

    expect(outcome.run.is_scheduled).toBe(false);
    const source = getSource(db, 'alpha');
    expect(source?.last_crawl).toBe('2026-03-01T10:00:00.000Z');
    expect(source?.last_scheduled_crawl).toBeNull();
  });

  it('records a discovery failure as a failed run and still advances markers', async () => {
    const adapter = new ScriptedAdapter({});
    adapter.listError = new Error('listing returned garbage');

    const outcome = await executeCrawlRun(context(adapter), { sourceName: 'alpha', isScheduled: true });

    expect(outcome.success).toBe(false);
    expect(outcome.error).toBe('listing returned garbage');
    expect(outcome.run.status).toBe('failed');
    expect(outcome.run.error_message).toBe('listing returned garbage');
    expect(outcome.run.end_time).toBe('2026-03-01T10:00:00.000Z');
    expect(getSource(db, 'alpha')?.last_scheduled_crawl).toBe('2026-03-01T10:00:00.000Z');
  });

  it('completes with zero counts when there are no candidates', async () => {
    const outcome = await executeCrawlRun(context(new ScriptedAdapter({})), {
      sourceName: 'alpha',
      isScheduled: false,
    });
    expect(outcome.success).toBe(true);
    expect(outcome.run.items_found).toBe(0);
    expect(outcome.run.items_saved).toBe(0);
  });

  it('fails the run when no adapter resolves', async () => {
    addSource(db, { name: 'beta', base_url: 'https://beta.test/', settings: { adapter: 'nope' } });

    const outcome = await executeCrawlRun(context(new ScriptedAdapter({})), {
      sourceName: 'beta',
      isScheduled: false,
    });
    expect(outcome.success).toBe(false);
    expect(outcome.run.error_message).toBe("No adapter registered for source beta (looked up 'nope')");
  });

  it('fails the run for an unknown source without touching any source', async () => {
    const outcome = await executeCrawlRun(context(new ScriptedAdapter({})), {
      sourceName: 'ghost',
      isScheduled: true,
    });
    expect(outcome.success).toBe(false);
    expect(outcome.run.source_name).toBe('ghost');
    expect(outcome.run.error_message).toBe('Source not found: ghost');
  });

  it('crawls the base URL override for this run only', async () => {
    const adapter = new ScriptedAdapter({});
    let seenBase = '';
    adapter.listCandidates = async (source) => {
      seenBase = source.base_url;
      return [];
    };

    await executeCrawlRun(context(adapter), {
      sourceName: 'alpha',
      baseUrl: 'https://mirror.alpha.test/',
      isScheduled: false,
    });
    expect(seenBase).toBe('https://mirror.alpha.test/');
    expect(getSource(db, 'alpha')?.base_url).toBe('https://alpha.test/');
  });

  it('throws CrawlInProgressError while another run is open', async () => {
    const open = startRun(db, 'alpha', T0);
    if (!open) throw new Error('run not started');
    const adapter = new ScriptedAdapter({ 'https://alpha.test/1': 'ok' });

    await expect(
      executeCrawlRun(context(adapter), { sourceName: 'alpha', isScheduled: true }),
    ).rejects.toBeInstanceOf(CrawlInProgressError);

    expect(adapter.parsed).toEqual([]);
    expect(listRuns(db, { source: 'alpha' })).toHaveLength(1);
    expect(getRun(db, open.id)?.status).toBe('running');
    expect(getSource(db, 'alpha')?.last_crawl).toBeNull();
  });

  it('computes the duration from the clock', async () => {
    const adapter = new ScriptedAdapter({});
    adapter.listCandidates = async () => {
      now = new Date(T0.getTime() + 4_000);
      return [];
    };

    const outcome = await executeCrawlRun(context(adapter), { sourceName: 'alpha', isScheduled: false });
    expect(outcome.run.start_time).toBe('2026-03-01T10:00:00.000Z');
    expect(outcome.run.duration_seconds).toBe(4);
  });
});
