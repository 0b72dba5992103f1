import { Worker } from 'bullmq';
import type { IngestRunner, IngestRunResult } from '@stakewatch/ingest';
import type { Logger } from '@stakewatch/logging';
import { INGEST_QUEUE, type IngestJobData } from '@stakewatch/scheduler';

/**
 * BullMQ worker consuming the ingestion queue.
 *
 * Concurrency 1: a scheduled firing and a manual run enqueued through the API
 * never overlap. A failed run is logged and left in the failed set; the
 * worker and the recurring trigger keep going.
 */
export function createIngestWorker(
  runner: IngestRunner,
  redisUrl: string,
  log: Logger,
): Worker<IngestJobData, IngestRunResult> {
  const worker = new Worker<IngestJobData, IngestRunResult>(
    INGEST_QUEUE,
    async (job) => runner.run(job.data.trigger),
    {
      connection: { url: redisUrl },
      concurrency: 1,
      removeOnComplete: { age: 86_400 },
    },
  );

  worker.on('completed', (job, result) => {
    log.info('Job completed', { job: job.id, trigger: job.data.trigger, status: result.status });
  });

  worker.on('failed', (job, err) => {
    log.error('Job failed', { job: job?.id ?? 'unknown', error: err.message });
  });

  worker.on('error', (err) => {
    log.error('Worker error', { error: err.message });
  });

  return worker;
}
