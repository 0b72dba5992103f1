import { dealTables, getTableName, inArray, sql } from '@stakewatch/db';
import type { DbClient } from '@stakewatch/db';
import { createLogger, type Logger } from '@stakewatch/logging';
import type { DealKind, DealRecord } from '@stakewatch/sources';
import type { ReconcileSummary } from './holdings.js';
import { IdentityResolver } from './identity.js';
import { lockTable } from './lock.js';

interface DesiredDeal {
  investorId: number;
  stockId: number;
  record: DealRecord;
}

const dealKey = (investorId: number, stockId: number, dealDate: string): string =>
  `${investorId}:${stockId}:${dealDate}`;

/** Buy-side deals of one kind; everything else is never persisted. */
export function selectBuyDeals(records: Iterable<DealRecord>, kind: DealKind): DealRecord[] {
  const selected: DealRecord[] = [];
  for (const record of records) {
    if (record.kind === kind && record.side === 'buy') selected.push(record);
  }
  return selected;
}

/**
 * Mirror the buy-side deals of `kind` from the full deal batch into that
 * kind's table. Same four steps as holdings, keyed by
 * (investor, stock, deal date), in one transaction.
 */
export async function reconcileDeals(
  db: DbClient,
  records: Iterable<DealRecord>,
  kind: DealKind,
  log: Logger = createLogger('sync'),
): Promise<ReconcileSummary> {
  const table = dealTables[kind];
  const tableName = getTableName(table);
  const batch = selectBuyDeals(records, kind);

  const summary = await db.transaction(async (tx) => {
    await lockTable(tx, kind === 'bulk' ? 'bulk_deals' : 'block_deals');
    const identities = new IdentityResolver(tx);

    const desired = new Map<string, DesiredDeal>();
    for (const record of batch) {
      const investorId = await identities.investor(record.investor, record.sourceUrl);
      const stockId = await identities.stock(record.ticker);
      desired.set(dealKey(investorId, stockId, record.dealDate), { investorId, stockId, record });
    }

    for (const { investorId, stockId, record } of desired.values()) {
      await tx
        .insert(table)
        .values({
          investorId,
          stockId,
          dealDate: record.dealDate,
          quantity: record.quantity,
          price: record.price,
        })
        .onConflictDoUpdate({
          target: [table.investorId, table.stockId, table.dealDate],
          set: {
            quantity: sql`excluded.quantity`,
            price: sql`excluded.price`,
            updatedAt: new Date(),
          },
        });
    }

    const existing = await tx
      .select({
        id: table.id,
        investorId: table.investorId,
        stockId: table.stockId,
        dealDate: table.dealDate,
      })
      .from(table);
    const stale = existing
      .filter((row) => !desired.has(dealKey(row.investorId, row.stockId, row.dealDate)))
      .map((row) => row.id);
    if (stale.length > 0) {
      await tx.delete(table).where(inArray(table.id, stale));
    }

    return { table: tableName, upserted: desired.size, removed: stale.length };
  });

  log.info(`Synchronized ${tableName}`, { upserted: summary.upserted, removed: summary.removed });
  return summary;
}
