import { Queue } from 'bullmq';

export type IngestTrigger = 'schedule' | 'manual';

export interface IngestJobData {
  trigger: IngestTrigger;
}

/** Job name used for both scheduled and manual runs. */
export const INGEST_JOB_NAME = 'ingest';

export interface TriggerInfo {
  pattern?: string | null;
  tz?: string | null;
  /** Epoch millis of the next firing */
  next?: number;
}

/**
 * The part of a BullMQ queue the schedule controller and API rely on.
 * Tests substitute an in-memory implementation.
 */
export interface TriggerQueue {
  upsertJobScheduler(
    schedulerId: string,
    repeat: { pattern: string; tz?: string },
    template: { name: string; data: IngestJobData },
  ): Promise<unknown>;
  getJobScheduler(schedulerId: string): Promise<TriggerInfo | undefined>;
  add(name: string, data: IngestJobData): Promise<{ id?: string }>;
}

export function createIngestQueue(name: string, redisUrl: string): Queue<IngestJobData> {
  return new Queue<IngestJobData>(name, {
    connection: { url: redisUrl },
    defaultJobOptions: {
      // Keep successful runs for a day, failed runs until inspected.
      removeOnComplete: { age: 86_400 },
      removeOnFail: false,
    },
  });
}

/**
 * Enqueue a one-off ingestion run. The worker picks it up like a scheduled
 * firing; returns the BullMQ job id.
 */
export async function enqueueIngestRun(queue: TriggerQueue): Promise<string> {
  const job = await queue.add(INGEST_JOB_NAME, { trigger: 'manual' });
  if (job.id === undefined) {
    throw new Error('Queue did not assign a job id');
  }
  return job.id;
}
