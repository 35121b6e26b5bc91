import { describe, it, expect, vi } from 'vitest';
import { LocalDispatcher, type RunExecutor } from '../dispatcher.js';
import type { CrawlRequest, CrawlRunOutcome } from '../runner.js';
import { CrawlInProgressError } from '../../shared/errors.js';

interface Pending {
  request: CrawlRequest;
  finish: () => void;
}

function fakeOutcome(request: CrawlRequest): CrawlRunOutcome {
  return {
    success: true,
    run: {
      id: `run-${request.sourceName}`,
      source_name: request.sourceName,
      start_time: '2026-03-01T10:00:00.000Z',
      end_time: '2026-03-01T10:00:01.000Z',
      status: 'completed',
      items_found: 0,
      items_saved: 0,
      items_skipped: 0,
      items_failed: 0,
      saved_item_ids: [],
      error_message: null,
      duration_seconds: 1,
      is_scheduled: request.isScheduled,
    },
  };
}

/** Executor whose runs finish only when the test says so. */
function controlledExecutor(): { execute: RunExecutor; pending: Pending[] } {
  const pending: Pending[] = [];
  const execute: RunExecutor = (request) =>
    new Promise((resolve) => {
      pending.push({ request, finish: () => resolve(fakeOutcome(request)) });
    });
  return { execute, pending };
}

const flush = (): Promise<void> => new Promise((r) => setTimeout(r, 0));

describe('LocalDispatcher', () => {
  it('returns a handle immediately and starts the run', () => {
    const execute = vi.fn<RunExecutor>((request) => Promise.resolve(fakeOutcome(request)));
    const dispatcher = new LocalDispatcher(execute, 2);

    const handle = dispatcher.dispatch({ sourceName: 'alpha', isScheduled: true });
    expect(handle).toHaveLength(21);
    expect(execute).toHaveBeenCalledWith({ sourceName: 'alpha', isScheduled: true });
    expect(dispatcher.inFlight().has('alpha')).toBe(true);
  });

  it('runs at most maxParallel at a time and queues the rest', async () => {
    const { execute, pending } = controlledExecutor();
    const dispatcher = new LocalDispatcher(execute, 2);

    dispatcher.dispatch({ sourceName: 'a', isScheduled: true });
    dispatcher.dispatch({ sourceName: 'b', isScheduled: true });
    dispatcher.dispatch({ sourceName: 'c', isScheduled: true });

    expect(pending.map((p) => p.request.sourceName)).toEqual(['a', 'b']);
    expect(dispatcher.size()).toEqual({ queued: 1, active: 2 });
    expect([...dispatcher.inFlight()].sort()).toEqual(['a', 'b', 'c']);

    pending[0].finish();
    await flush();

    expect(pending.map((p) => p.request.sourceName)).toEqual(['a', 'b', 'c']);
    expect(dispatcher.inFlight().has('a')).toBe(false);
    expect(dispatcher.size()).toEqual({ queued: 0, active: 2 });
  });

  it('drain resolves once everything finished', async () => {
    const { execute, pending } = controlledExecutor();
    const dispatcher = new LocalDispatcher(execute, 1);
    dispatcher.dispatch({ sourceName: 'a', isScheduled: false });
    dispatcher.dispatch({ sourceName: 'b', isScheduled: false });

    let drained = false;
    const drain = dispatcher.drain().then(() => {
      drained = true;
    });

    pending[0].finish();
    await flush();
    expect(drained).toBe(false);

    pending[1].finish();
    await drain;
    expect(drained).toBe(true);
    expect(dispatcher.inFlight().size).toBe(0);
  });

  it('drain resolves immediately when idle', async () => {
    const dispatcher = new LocalDispatcher(vi.fn<RunExecutor>(), 2);
    await expect(dispatcher.drain()).resolves.toBeUndefined();
  });

  it('keeps going after a run rejects', async () => {
    const execute = vi
      .fn<RunExecutor>()
      .mockRejectedValueOnce(new CrawlInProgressError('a'))
      .mockRejectedValueOnce(new Error('database is locked'))
      .mockImplementation((request) => Promise.resolve(fakeOutcome(request)));
    const dispatcher = new LocalDispatcher(execute, 1);

    dispatcher.dispatch({ sourceName: 'a', isScheduled: true });
    dispatcher.dispatch({ sourceName: 'b', isScheduled: true });
    dispatcher.dispatch({ sourceName: 'c', isScheduled: true });
    await dispatcher.drain();

    expect(execute).toHaveBeenCalledTimes(3);
    expect(dispatcher.inFlight().size).toBe(0);
  });
});
