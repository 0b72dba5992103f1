import { afterEach, beforeEach, describe, it, expect } from 'vitest';
import { ingestSchedule } from '@stakewatch/db';
import { createLogger } from '@stakewatch/logging';
import {
  INGEST_JOB_NAME,
  INGEST_SCHEDULER_ID,
  ScheduleController,
  ScheduleValidationError,
} from '@stakewatch/scheduler';
import { createTestDb, type TestDb } from '../helpers/db.js';
import { FakeTriggerQueue } from '../helpers/fake-queue.js';

describe('ScheduleController', () => {
  let testDb: TestDb;
  let queue: FakeTriggerQueue;
  let lines: string[];
  let controller: ScheduleController;

  beforeEach(async () => {
    testDb = await createTestDb();
    queue = new FakeTriggerQueue(1_700_000_000_000);
    lines = [];
    controller = new ScheduleController(
      testDb.db,
      queue,
      createLogger('scheduler', { level: 'info', write: (line) => lines.push(line) }),
    );
  });

  afterEach(async () => {
    await testDb.close();
  });

  it('seeds 02:00 UTC once', async () => {
    expect(await controller.getOrCreateSchedule()).toEqual({ hour: 2, minute: 0, timezone: 'UTC' });
    expect(await controller.getOrCreateSchedule()).toEqual({ hour: 2, minute: 0, timezone: 'UTC' });

    const rows = await testDb.db.select().from(ingestSchedule);
    expect(rows).toHaveLength(1);
    expect(lines).toEqual(['[scheduler] Seeded default ingestion schedule hour=2 minute=0 timezone=UTC\n']);
  });

  it.each([
    [24, 0, 'hour must be between 0 and 23'],
    [5, 60, 'minute must be between 0 and 59'],
    [-1, 0, 'hour must be between 0 and 23'],
  ])('rejects %i:%i without touching state', async (hour, minute, message) => {
    await controller.updateSchedule(7, 45);
    const upsertsBefore = queue.upsertCalls;

    const attempt = controller.updateSchedule(hour, minute);
    await expect(attempt).rejects.toThrow(ScheduleValidationError);
    await expect(controller.updateSchedule(hour, minute)).rejects.toThrow(message);

    expect(await controller.getOrCreateSchedule()).toEqual({ hour: 7, minute: 45, timezone: 'UTC' });
    expect(queue.upsertCalls).toBe(upsertsBefore);
  });

  it('persists a valid time and re-registers the trigger', async () => {
    const updated = await controller.updateSchedule(9, 30);

    expect(updated).toEqual({ hour: 9, minute: 30, timezone: 'UTC' });
    expect(await controller.getOrCreateSchedule()).toEqual(updated);
    expect(queue.schedulers.get(INGEST_SCHEDULER_ID)).toEqual({
      pattern: '30 9 * * *',
      tz: 'UTC',
      next: 1_700_000_000_000,
      name: INGEST_JOB_NAME,
      data: { trigger: 'schedule' },
    });
  });

  it('keeps the stored timezone when none is given', async () => {
    await controller.updateSchedule(6, 0, 'Asia/Kolkata');
    const updated = await controller.updateSchedule(7, 15);

    expect(updated).toEqual({ hour: 7, minute: 15, timezone: 'Asia/Kolkata' });
  });

  it('rejects an unknown timezone', async () => {
    await expect(controller.updateSchedule(6, 0, 'Mars/Olympus')).rejects.toThrow('unknown timezone: Mars/Olympus');
    expect(queue.upsertCalls).toBe(0);
  });

  it('creates the trigger once, then reschedules it in place', async () => {
    await controller.syncTrigger();
    await controller.updateSchedule(3, 5);

    expect(queue.schedulers.size).toBe(1);
    expect(lines.slice(1)).toEqual([
      '[scheduler] Created daily ingestion trigger pattern="0 2 * * *" timezone=UTC\n',
      '[scheduler] Rescheduled daily ingestion pattern="5 3 * * *" timezone=UTC\n',
    ]);
  });

  it('reports the registered trigger', async () => {
    expect(await controller.getTrigger()).toBeNull();

    await controller.syncTrigger();

    expect(await controller.getTrigger()).toEqual({
      pattern: '0 2 * * *',
      timezone: 'UTC',
      nextRunAt: '2023-11-14T22:13:20.000Z',
    });
  });
});
