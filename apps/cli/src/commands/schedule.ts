import { Command } from 'commander';
import { createDb, ensureSchema } from '@stakewatch/db';
import { buildDatabaseUrl, ConfigError, DEFAULT_REDIS_URL, loadEnvFile } from '@stakewatch/ingest';
import { createLogger } from '@stakewatch/logging';
import {
  createIngestQueue,
  formatTime,
  INGEST_QUEUE,
  parseTime,
  ScheduleController,
} from '@stakewatch/scheduler';

/**
 * Open the database and queue, hand a controller to `fn`, then release both.
 */
async function withController<T>(fn: (controller: ScheduleController) => Promise<T>): Promise<T> {
  loadEnvFile();
  const databaseUrl = buildDatabaseUrl(process.env);
  if (!databaseUrl) {
    throw new ConfigError('DATABASE_URL must be set, or DB_HOST with DB_USERNAME and DB_PASSWORD');
  }

  const { db, shutdown } = createDb(databaseUrl);
  const queue = createIngestQueue(INGEST_QUEUE, process.env.REDIS_URL || DEFAULT_REDIS_URL);
  try {
    await ensureSchema(db);
    return await fn(new ScheduleController(db, queue, createLogger('schedule')));
  } finally {
    await queue.close();
    await shutdown();
  }
}

const showCommand = new Command('show')
  .description('Print the daily run time and the registered trigger')
  .action(async () => {
    await withController(async (controller) => {
      const schedule = await controller.getOrCreateSchedule();
      const trigger = await controller.getTrigger();
      console.log(`Daily run: ${formatTime(schedule)} ${schedule.timezone}`);
      if (trigger) {
        console.log(`Trigger:   ${trigger.pattern ?? '?'} (${trigger.timezone ?? 'UTC'})`);
        if (trigger.nextRunAt) console.log(`Next run:  ${trigger.nextRunAt}`);
      } else {
        console.log('Trigger:   not registered (start the worker to register it)');
      }
    });
  });

const setCommand = new Command('set')
  .argument('<time>', 'Time of day as HH:MM (24-hour clock)')
  .option('-t, --timezone <zone>', 'IANA timezone, e.g. Asia/Kolkata (defaults to the current one)')
  .description('Change the daily run time and reschedule the trigger')
  .action(async (time: string, options: { timezone?: string }) => {
    const { hour, minute } = parseTime(time);
    await withController(async (controller) => {
      const schedule = await controller.updateSchedule(hour, minute, options.timezone);
      console.log(`Daily run set to ${formatTime(schedule)} ${schedule.timezone}`);
    });
  });

export const scheduleCommand = new Command('schedule')
  .description('Inspect or change the daily ingestion schedule')
  .addCommand(showCommand)
  .addCommand(setCommand);
