import { Hono } from 'hono';
import { cors } from 'hono/cors';
import { HTTPException } from 'hono/http-exception';
import type { DbClient } from '@stakewatch/db';
import { createLogger, type Logger } from '@stakewatch/logging';
import { ScheduleValidationError, type ScheduleController } from '@stakewatch/scheduler';
import { createAuthMiddleware } from './middleware/auth.js';
import { createIngestRoute } from './routes/ingest.js';
import { createScheduleRoute } from './routes/schedule.js';
import { createSnapshotRoute } from './routes/snapshot.js';

export interface ApiDependencies {
  db: DbClient;
  controller: ScheduleController;
  /** Enqueue a manual ingestion run, resolving to its job id */
  enqueueRun: () => Promise<string>;
  token: string;
  log?: Logger;
}

/**
 * Hono app factory. CORS and bearer auth apply to every /api path.
 */
export function createApp(deps: ApiDependencies): Hono {
  const log = deps.log ?? createLogger('api');
  const app = new Hono();

  app.use(
    '/api/*',
    cors({
      origin: '*',
      allowHeaders: ['Authorization', 'Content-Type'],
      allowMethods: ['GET', 'POST', 'PUT', 'OPTIONS'],
    }),
  );
  app.use('/api/*', createAuthMiddleware(deps.token));

  app.route('/api/schedule', createScheduleRoute(deps.controller));
  app.route('/api/ingest', createIngestRoute(deps.enqueueRun));
  app.route('/api', createSnapshotRoute(deps.db));

  app.onError((err, c) => {
    if (err instanceof HTTPException) {
      return err.getResponse();
    }
    if (err instanceof ScheduleValidationError) {
      return c.json({ error: err.message }, 400);
    }
    log.error('Request failed', { method: c.req.method, path: c.req.path, error: err.message });
    return c.json({ error: 'Internal server error' }, 500);
  });

  return app;
}
