import { Hono } from 'hono';
import { z } from 'zod';
import type { AppContext } from '../server.js';
import { readBody } from '../body.js';
import { addSource, listSources, getSource, requireSource, updateSource, deleteSource } from '../../source/sourceDb.js';
import { countItemsBySource } from '../../source/itemDb.js';
import { listRunningSourceNames } from '../../ledger/runDb.js';
import { NotFoundError } from '../../shared/errors.js';

const NewSourceBody = z.object({
  name: z.string().trim().min(1),
  base_url: z.string().url(),
  is_active: z.boolean().optional(),
  crawl_interval_minutes: z.number().int().positive().optional(),
  settings: z.record(z.unknown()).optional(),
});

const SourcePatchBody = z
  .object({
    base_url: z.string().url().optional(),
    is_active: z.boolean().optional(),
    crawl_interval_minutes: z.number().int().positive().optional(),
    settings: z.record(z.unknown()).optional(),
  })
  .strict();

export function sourceRoutes(ctx: AppContext): Hono {
  const app = new Hono();

  // POST /api/sources: register a source
  app.post('/sources', async (c) => {
    const body = await readBody(c, NewSourceBody);
    const source = addSource(ctx.db, body);
    if (!source) {
      return c.json({ error: 'Source already exists', name: body.name }, 409);
    }
    return c.json(source, 201);
  });

  // GET /api/sources: list sources with item counts and running state
  app.get('/sources', (c) => {
    const activeOnly = c.req.query('active') === 'true';
    const counts = countItemsBySource(ctx.db);
    const running = new Set(listRunningSourceNames(ctx.db));

    const result = listSources(ctx.db, { activeOnly }).map((s) => ({
      ...s,
      item_count: counts[s.name] ?? 0,
      is_running: running.has(s.name),
    }));
    return c.json(result);
  });

  app.get('/sources/:name', (c) => {
    const name = c.req.param('name');
    return c.json(requireSource(ctx.db, name));
  });

  // PATCH /api/sources/:name: toggle, re-point, or re-interval a source
  app.patch('/sources/:name', async (c) => {
    const name = c.req.param('name');
    const body = await readBody(c, SourcePatchBody);
    requireSource(ctx.db, name);
    updateSource(ctx.db, name, body);
    return c.json(getSource(ctx.db, name));
  });

  app.delete('/sources/:name', (c) => {
    const name = c.req.param('name');
    if (!deleteSource(ctx.db, name)) {
      throw new NotFoundError(`Source not found: ${name}`, { source: name });
    }
    return c.json({ ok: true });
  });

  return app;
}
