import 'dotenv/config';
import { createDb, ensureSchema } from '@stakewatch/db';
import { IngestRunner, loadEnvFile, loadIngestConfig } from '@stakewatch/ingest';
import { createLogger, errorMessage } from '@stakewatch/logging';
import { createIngestQueue, formatTime, INGEST_QUEUE, ScheduleController } from '@stakewatch/scheduler';
import { registerShutdownHandlers } from './shutdown.js';
import { createIngestWorker } from './worker.js';

/**
 * Worker process entry point.
 *
 * Startup sequence:
 * 1. Load and validate configuration (fails before any fetch)
 * 2. Open the Postgres pool and create missing tables
 * 3. Rebuild the daily trigger from the persisted schedule
 * 4. Start consuming ingestion jobs
 * 5. Register shutdown handlers
 */
const log = createLogger('worker');

async function main(): Promise<void> {
  loadEnvFile();
  const config = loadIngestConfig();

  const { db, pool } = createDb(config.databaseUrl);
  await ensureSchema(db);

  const queue = createIngestQueue(INGEST_QUEUE, config.redisUrl);
  const controller = new ScheduleController(db, queue, log.child('schedule'));
  const schedule = await controller.syncTrigger();

  const runner = new IngestRunner(db, config.sources, log.child('ingest'));
  const worker = createIngestWorker(runner, config.redisUrl, log);

  registerShutdownHandlers({ pool, worker, queue }, log.child('shutdown'));

  log.info('Worker started', {
    investors: config.sources.length,
    schedule: `${formatTime(schedule)} ${schedule.timezone}`,
  });
}

main().catch((err: unknown) => {
  log.error(`Fatal startup error: ${errorMessage(err)}`);
  process.exit(1);
});
