import 'dotenv/config';
import { serve } from '@hono/node-server';
import { z } from 'zod';
import { createDb, ensureSchema } from '@stakewatch/db';
import { buildDatabaseUrl, ConfigError, DEFAULT_REDIS_URL, loadEnvFile } from '@stakewatch/ingest';
import { createLogger, errorMessage } from '@stakewatch/logging';
import { createIngestQueue, enqueueIngestRun, INGEST_QUEUE, ScheduleController } from '@stakewatch/scheduler';
import { createApp } from './app.js';

/**
 * API server entry point. Listens on API_PORT (default 3001); every /api
 * route requires `Authorization: Bearer $API_TOKEN`.
 */
const log = createLogger('api');

const apiEnvSchema = z.object({
  API_PORT: z.coerce.number().int().min(1).max(65_535).default(3001),
  API_TOKEN: z.string().min(1, 'API_TOKEN is required'),
  REDIS_URL: z.string().min(1).default(DEFAULT_REDIS_URL),
});

async function main(): Promise<void> {
  loadEnvFile();
  const env = apiEnvSchema.safeParse(process.env);
  if (!env.success) {
    throw new ConfigError(env.error.issues.map((issue) => issue.message).join('; '));
  }
  const databaseUrl = buildDatabaseUrl(process.env);
  if (!databaseUrl) {
    throw new ConfigError('DATABASE_URL must be set, or DB_HOST with DB_USERNAME and DB_PASSWORD');
  }

  const { db, pool } = createDb(databaseUrl);
  await ensureSchema(db);
  const queue = createIngestQueue(INGEST_QUEUE, env.data.REDIS_URL);
  const controller = new ScheduleController(db, queue, log.child('schedule'));

  const app = createApp({
    db,
    controller,
    enqueueRun: () => enqueueIngestRun(queue),
    token: env.data.API_TOKEN,
    log,
  });

  const server = serve({ fetch: app.fetch, port: env.data.API_PORT });
  log.info(`Server listening on port ${env.data.API_PORT}`);

  const shutdown = (): void => {
    log.info('Shutting down...');
    server.close();
    Promise.all([queue.close(), pool.end()])
      .then(() => process.exit(0))
      .catch((err: unknown) => {
        log.error(`Error during shutdown: ${errorMessage(err)}`);
        process.exit(1);
      });
  };

  process.on('SIGTERM', shutdown);
  process.on('SIGINT', shutdown);
}

main().catch((err: unknown) => {
  log.error(`Fatal startup error: ${errorMessage(err)}`);
  process.exit(1);
});
