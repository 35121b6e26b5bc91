import fs from 'node:fs';
import path from 'node:path';
import { Hono } from 'hono';
import { cors } from 'hono/cors';
import { serve } from '@hono/node-server';
import type { ContentfulStatusCode } from 'hono/utils/http-status';
import { CrawlkeeperError } from '../shared/errors.js';
import { logger } from '../shared/logger.js';
import { initDb, closeDb } from '../db/db.js';
import { runMigrations } from '../db/migrate.js';
import { loadConfig, writeDefaultConfig } from '../shared/config.js';
import { getCrawlkeeperDir } from '../shared/utils.js';
import { createRuntime, type Runtime } from '../runtime.js';
import { sourceRoutes } from './routes/sources.js';
import { crawlRoutes } from './routes/crawl.js';
import { statsRoutes } from './routes/stats.js';
import { systemRoutes } from './routes/system.js';

export type AppContext = Runtime;

export function errorCodeToHttpStatus(code: string): ContentfulStatusCode {
  switch (code) {
    case 'CONFIG_ERROR':
    case 'SOURCE_ERROR':
      return 400;
    case 'NOT_FOUND':
      return 404;
    case 'CRAWL_IN_PROGRESS':
      return 409;
    case 'ADAPTER_ERROR':
      return 422;
    case 'FETCH_ERROR':
      return 502;
    default:
      return 500;
  }
}

export function createApp(ctx: AppContext): Hono {
  const app = new Hono();

  app.use('*', cors());

  app.route('/api', sourceRoutes(ctx));
  app.route('/api', crawlRoutes(ctx));
  app.route('/api', statsRoutes(ctx));
  app.route('/api', systemRoutes(ctx));

  app.onError((err, c) => {
    if (err instanceof CrawlkeeperError) {
      return c.json({ error: err.message, code: err.code, details: err.details }, errorCodeToHttpStatus(err.code));
    }
    logger.error({ error: err.message, stack: err.stack }, 'Unhandled error');
    return c.json({ error: 'Internal server error' }, 500);
  });

  app.notFound((c) => c.json({ error: 'Not found' }, 404));

  return app;
}

/**
 * Write the default config on first run.
 */
function autoInit(): void {
  const configPath = path.join(getCrawlkeeperDir(), 'config.yaml');
  if (!process.env['CRAWLKEEPER_CONFIG'] && !fs.existsSync(configPath)) {
    writeDefaultConfig(configPath);
    logger.info({ configPath }, 'First run: created default config');
  }
}

export async function startServer(opts: { port?: number; scheduler?: boolean } = {}): Promise<void> {
  autoInit();

  const config = await loadConfig();
  const port = opts.port ?? config.server.port;
  const host = config.server.host;

  const db = initDb(config.db.path);
  runMigrations(db);

  const runtime = createRuntime(db, config);
  const app = createApp(runtime);

  const server = serve({ fetch: app.fetch, port, hostname: host }, (info) => {
    logger.info({ url: `http://${host}:${info.port}` }, 'crawlkeeper API listening');
  });

  if (opts.scheduler ?? config.scheduler.enabled) {
    runtime.scheduler.start();
  } else {
    logger.info('Scheduler disabled');
  }

  let shuttingDown = false;
  const shutdown = (): void => {
    if (shuttingDown) return;
    shuttingDown = true;
    logger.info('Shutting down, waiting for in-flight crawl runs');
    runtime.scheduler.stop();
    server.close();
    runtime.dispatcher
      .drain()
      .then(() => {
        closeDb();
        process.exit(0);
      })
      .catch((err: unknown) => {
        logger.error({ error: err instanceof Error ? err.message : String(err) }, 'Shutdown failed');
        process.exit(1);
      });
  };

  process.on('SIGINT', shutdown);
  process.on('SIGTERM', shutdown);
}
