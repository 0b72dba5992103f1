import { sql } from '@stakewatch/db';
import type { DbClient } from '@stakewatch/db';

/**
 * Advisory lock keys, one per reconciled table. Held for the duration of the
 * surrounding transaction, so two runs (worker and CLI, say) cannot interleave
 * their upsert and delete phases on the same table.
 */
const LOCK_KEYS = {
  holdings: 7_310_001,
  bulk_deals: 7_310_002,
  block_deals: 7_310_003,
} as const;

export type ReconciledTable = keyof typeof LOCK_KEYS;

export async function lockTable(tx: DbClient, table: ReconciledTable): Promise<void> {
  await tx.execute(sql`SELECT pg_advisory_xact_lock(${sql.raw(String(LOCK_KEYS[table]))})`);
}
