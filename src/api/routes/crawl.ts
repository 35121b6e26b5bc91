import { Hono } from 'hono';
import { z } from 'zod';
import type { AppContext } from '../server.js';
import { intQuery, readBody } from '../body.js';
import { executeCrawlRun } from '../../crawl/runner.js';
import { requireSource } from '../../source/sourceDb.js';
import { getItem, listItems } from '../../source/itemDb.js';
import type { Item } from '../../source/types.js';
import { getRun, listRuns, listRunningSourceNames, isCrawlRunStatus } from '../../ledger/runDb.js';
import { NotFoundError, SourceError } from '../../shared/errors.js';

const CrawlBody = z.object({
  source: z.string().min(1),
  base_url: z.string().url().optional(),
});

const BODY_PREVIEW_CHARS = 500;

function previewItem(item: Item): Item {
  if (item.body === null || item.body.length <= BODY_PREVIEW_CHARS) return item;
  return { ...item, body: `${item.body.slice(0, BODY_PREVIEW_CHARS)}…` };
}

export function crawlRoutes(ctx: AppContext): Hono {
  const app = new Hono();

  // POST /api/crawl: run a manual crawl and wait for its ledger entry
  app.post('/crawl', async (c) => {
    const body = await readBody(c, CrawlBody);
    requireSource(ctx.db, body.source);

    const outcome = await executeCrawlRun(ctx.crawl, {
      sourceName: body.source,
      baseUrl: body.base_url ?? null,
      isScheduled: false,
    });
    return c.json(outcome);
  });

  // POST /api/crawl/background: queue a manual crawl and return its handle
  app.post('/crawl/background', async (c) => {
    const body = await readBody(c, CrawlBody);
    requireSource(ctx.db, body.source);

    const handle = ctx.dispatcher.dispatch({
      sourceName: body.source,
      baseUrl: body.base_url ?? null,
      isScheduled: false,
    });
    return c.json({ handle, source: body.source }, 202);
  });

  app.get('/crawl/active', (c) => {
    return c.json({
      running: listRunningSourceNames(ctx.db),
      queued: [...ctx.dispatcher.inFlight()].sort(),
    });
  });

  // GET /api/runs?source=&status=&limit=&offset=
  app.get('/runs', (c) => {
    const status = c.req.query('status');
    if (status !== undefined && !isCrawlRunStatus(status)) {
      throw new SourceError(`Unknown run status: ${status}`, { status });
    }
    return c.json(
      listRuns(ctx.db, {
        source: c.req.query('source'),
        status,
        limit: intQuery(c.req.query('limit'), 50),
        offset: intQuery(c.req.query('offset'), 0, Number.MAX_SAFE_INTEGER),
      }),
    );
  });

  app.get('/runs/:id', (c) => {
    const id = c.req.param('id');
    const run = getRun(ctx.db, id);
    if (!run) throw new NotFoundError(`Crawl run not found: ${id}`, { runId: id });
    return c.json(run);
  });

  // GET /api/items?source=&limit=&offset=
  app.get('/items', (c) => {
    const items = listItems(ctx.db, {
      source: c.req.query('source'),
      limit: intQuery(c.req.query('limit'), 50),
      offset: intQuery(c.req.query('offset'), 0, Number.MAX_SAFE_INTEGER),
    });
    return c.json(items.map(previewItem));
  });

  app.get('/items/:id', (c) => {
    const id = c.req.param('id');
    const item = getItem(ctx.db, id);
    if (!item) throw new NotFoundError(`Item not found: ${id}`, { itemId: id });
    return c.json(c.req.query('full') === 'true' ? item : previewItem(item));
  });

  return app;
}
