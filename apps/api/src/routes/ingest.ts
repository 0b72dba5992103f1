import { Hono } from 'hono';

/** POST / enqueues a manual run for the worker and answers 202 with its job id. */
export function createIngestRoute(enqueueRun: () => Promise<string>): Hono {
  const app = new Hono();

  app.post('/', async (c) => {
    const jobId = await enqueueRun();
    return c.json({ jobId }, 202);
  });

  return app;
}
