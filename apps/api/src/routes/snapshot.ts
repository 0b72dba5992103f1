import { Hono } from 'hono';
import { zValidator } from '@hono/zod-validator';
import { z } from 'zod';
import { listDeals, listHoldings, type DbClient } from '@stakewatch/db';

/**
 * Read-only views of the current snapshot.
 * GET /holdings      ordered by ticker, investor
 * GET /deals/:kind   bulk or block, newest first
 */
const dealParamSchema = z.object({ kind: z.enum(['bulk', 'block']) });

export function createSnapshotRoute(db: DbClient): Hono {
  const app = new Hono();

  app.get('/holdings', async (c) => c.json(await listHoldings(db)));

  app.get('/deals/:kind', zValidator('param', dealParamSchema), async (c) => {
    const { kind } = c.req.valid('param');
    return c.json(await listDeals(db, kind));
  });

  return app;
}
