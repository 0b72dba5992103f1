import { holdings, inArray, sql } from '@stakewatch/db';
import type { DbClient } from '@stakewatch/db';
import { createLogger, type Logger } from '@stakewatch/logging';
import type { HoldingRecord } from '@stakewatch/sources';
import { IdentityResolver } from './identity.js';
import { lockTable } from './lock.js';

export interface ReconcileSummary {
  table: string;
  /** Distinct keys in the batch, each inserted or overwritten */
  upserted: number;
  /** Persisted rows whose key was absent from the batch */
  removed: number;
}

interface DesiredHolding {
  investorId: number;
  stockId: number;
  record: HoldingRecord;
}

const holdingKey = (investorId: number, stockId: number): string => `${investorId}:${stockId}`;

/**
 * Make the holdings table an exact mirror of `records`.
 *
 * Within one transaction:
 * 1. resolve (or create) every investor and stock,
 * 2. collapse the batch by (investor, stock), later records winning,
 * 3. upsert each entry, refreshing updated_at,
 * 4. delete every row whose key is not in the batch.
 *
 * Any failure rolls back the whole call; the previous snapshot stays intact.
 * An investor with no records in the batch loses all of its holdings.
 */
export async function reconcileHoldings(
  db: DbClient,
  records: Iterable<HoldingRecord>,
  log: Logger = createLogger('sync'),
): Promise<ReconcileSummary> {
  const summary = await db.transaction(async (tx) => {
    await lockTable(tx, 'holdings');
    const identities = new IdentityResolver(tx);

    const desired = new Map<string, DesiredHolding>();
    for (const record of records) {
      const investorId = await identities.investor(record.investor, record.sourceUrl);
      const stockId = await identities.stock(record.ticker);
      desired.set(holdingKey(investorId, stockId), { investorId, stockId, record });
    }

    for (const { investorId, stockId, record } of desired.values()) {
      await tx
        .insert(holdings)
        .values({
          investorId,
          stockId,
          percentHolding: record.percentHolding,
          shares: record.shares,
          reportedDate: record.reportedDate,
        })
        .onConflictDoUpdate({
          target: [holdings.investorId, holdings.stockId],
          set: {
            percentHolding: sql`excluded.percent_holding`,
            shares: sql`excluded.shares`,
            reportedDate: sql`excluded.reported_date`,
            updatedAt: new Date(),
          },
        });
    }

    const existing = await tx
      .select({ id: holdings.id, investorId: holdings.investorId, stockId: holdings.stockId })
      .from(holdings);
    const stale = existing
      .filter((row) => !desired.has(holdingKey(row.investorId, row.stockId)))
      .map((row) => row.id);
    if (stale.length > 0) {
      await tx.delete(holdings).where(inArray(holdings.id, stale));
    }

    return { table: 'holdings', upserted: desired.size, removed: stale.length };
  });

  log.info('Synchronized holdings', { upserted: summary.upserted, removed: summary.removed });
  return summary;
}
