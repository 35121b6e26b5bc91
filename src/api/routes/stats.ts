import { Hono } from 'hono';
import type { AppContext } from '../server.js';
import { countSources, requireSource } from '../../source/sourceDb.js';
import { getItemStats } from '../../source/itemDb.js';
import { getRunStats, listRunningSourceNames } from '../../ledger/runDb.js';
import { isDue } from '../../scheduler/scheduler.js';
import { systemClock } from '../../shared/utils.js';

export function statsRoutes(ctx: AppContext): Hono {
  const app = new Hono();

  // GET /api/stats/overview: sources, items and ledger totals
  app.get('/stats/overview', (c) => {
    return c.json({
      sources: countSources(ctx.db),
      items: getItemStats(ctx.db),
      runs: getRunStats(ctx.db),
      running: listRunningSourceNames(ctx.db),
      scheduler: { enabled: ctx.scheduler.isRunning, ...ctx.dispatcher.size() },
    });
  });

  app.get('/stats/sources/:name', (c) => {
    const name = c.req.param('name');
    const source = requireSource(ctx.db, name);

    const clock = ctx.crawl.clock ?? systemClock;
    return c.json({
      source,
      is_due: source.is_active && isDue(source, clock()),
      items: getItemStats(ctx.db, name),
      runs: getRunStats(ctx.db, name),
    });
  });

  return app;
}
