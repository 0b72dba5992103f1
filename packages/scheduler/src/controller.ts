import { eq, ingestSchedule, SCHEDULE_ROW_ID } from '@stakewatch/db';
import type { DbClient, IngestSchedule } from '@stakewatch/db';
import { createLogger, type Logger } from '@stakewatch/logging';
import { INGEST_JOB_NAME, type TriggerInfo, type TriggerQueue } from './queue.js';
import {
  DEFAULT_SCHEDULE,
  INGEST_SCHEDULER_ID,
  toCronPattern,
  validateScheduleInput,
  type ScheduleConfig,
} from './schedule.js';

export interface TriggerStatus {
  pattern: string | null;
  timezone: string | null;
  /** ISO timestamp of the next firing, when the queue reports one */
  nextRunAt: string | null;
}

function toConfig(row: IngestSchedule): ScheduleConfig {
  return { hour: row.hour, minute: row.minute, timezone: row.timezone };
}

/**
 * Owns the persisted run time and keeps the queue's recurring trigger in step
 * with it. The ingest_schedule row is authoritative; the trigger is rebuilt
 * from it on startup (syncTrigger) and after every successful update.
 */
export class ScheduleController {
  constructor(
    private readonly db: DbClient,
    private readonly queue: TriggerQueue,
    private readonly log: Logger = createLogger('scheduler'),
  ) {}

  /**
   * Returns the persisted schedule, seeding the default (02:00 UTC) on first
   * use. Concurrent first calls converge on whichever insert landed.
   */
  async getOrCreateSchedule(): Promise<ScheduleConfig> {
    const existing = await this.readRow();
    if (existing) return toConfig(existing);

    await this.db
      .insert(ingestSchedule)
      .values({ id: SCHEDULE_ROW_ID, ...DEFAULT_SCHEDULE })
      .onConflictDoNothing({ target: ingestSchedule.id });

    const seeded = await this.readRow();
    if (!seeded) {
      throw new Error('ingest_schedule row missing after seeding');
    }
    this.log.info('Seeded default ingestion schedule', {
      hour: seeded.hour,
      minute: seeded.minute,
      timezone: seeded.timezone,
    });
    return toConfig(seeded);
  }

  /**
   * Validate, persist, then re-register the trigger. Invalid input throws
   * ScheduleValidationError before anything is written. Omitting the
   * timezone keeps the stored one.
   */
  async updateSchedule(hour: number, minute: number, timezone?: string): Promise<ScheduleConfig> {
    const input = validateScheduleInput({ hour, minute, timezone });
    const current = await this.getOrCreateSchedule();
    const next: ScheduleConfig = {
      hour: input.hour,
      minute: input.minute,
      timezone: input.timezone ?? current.timezone,
    };

    await this.db
      .insert(ingestSchedule)
      .values({ id: SCHEDULE_ROW_ID, ...next })
      .onConflictDoUpdate({
        target: ingestSchedule.id,
        set: { hour: next.hour, minute: next.minute, timezone: next.timezone, updatedAt: new Date() },
      });

    await this.configureTrigger(next);
    return next;
  }

  /** Register the trigger from the persisted schedule. Called at startup. */
  async syncTrigger(): Promise<ScheduleConfig> {
    const schedule = await this.getOrCreateSchedule();
    await this.configureTrigger(schedule);
    return schedule;
  }

  /** What the queue currently has registered, or null when no trigger exists. */
  async getTrigger(): Promise<TriggerStatus | null> {
    const info = await this.queue.getJobScheduler(INGEST_SCHEDULER_ID);
    if (!info) return null;
    return describeTrigger(info);
  }

  private async configureTrigger(schedule: ScheduleConfig): Promise<void> {
    const existing = await this.queue.getJobScheduler(INGEST_SCHEDULER_ID);
    const pattern = toCronPattern(schedule);

    await this.queue.upsertJobScheduler(
      INGEST_SCHEDULER_ID,
      { pattern, tz: schedule.timezone },
      { name: INGEST_JOB_NAME, data: { trigger: 'schedule' } },
    );

    this.log.info(existing ? 'Rescheduled daily ingestion' : 'Created daily ingestion trigger', {
      pattern,
      timezone: schedule.timezone,
    });
  }

  private async readRow(): Promise<IngestSchedule | undefined> {
    const [row] = await this.db
      .select()
      .from(ingestSchedule)
      .where(eq(ingestSchedule.id, SCHEDULE_ROW_ID))
      .limit(1);
    return row;
  }
}

function describeTrigger(info: TriggerInfo): TriggerStatus {
  return {
    pattern: info.pattern ?? null,
    timezone: info.tz ?? null,
    nextRunAt: info.next !== undefined ? new Date(info.next).toISOString() : null,
  };
}
