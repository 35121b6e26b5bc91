import { Hono } from 'hono';
import type { AppContext } from '../server.js';
import { getPackageVersion } from '../../shared/utils.js';

export function systemRoutes(ctx: AppContext): Hono {
  const app = new Hono();

  // GET /api/health: basic health check
  app.get('/health', (c) => {
    return c.json({
      status: 'ok',
      version: getPackageVersion(),
      uptime: process.uptime(),
      scheduler: ctx.scheduler.isRunning ? 'running' : 'stopped',
    });
  });

  // POST /api/scheduler/tick: evaluate every source now instead of waiting for cron
  app.post('/scheduler/tick', (c) => {
    return c.json(ctx.scheduler.tick());
  });

  return app;
}
