import {
  bigint,
  date,
  doublePrecision,
  integer,
  pgTable,
  timestamp,
  unique,
} from 'drizzle-orm/pg-core';
import { investors, stocks } from './entities.js';

/**
 * Bulk and block deals share one column layout but live in separate tables.
 * Only buy-side deals are stored, so neither kind nor side is a column.
 *
 * The table name is widened to `string` so both tables share a single type
 * and the reconciler can treat them interchangeably.
 */
function dealTable(name: string, constraintName: string) {
  return pgTable(
    name,
    {
      id: integer('id').primaryKey().generatedAlwaysAsIdentity(),
      investorId: integer('investor_id')
        .references(() => investors.id, { onDelete: 'cascade' })
        .notNull(),
      stockId: integer('stock_id')
        .references(() => stocks.id, { onDelete: 'cascade' })
        .notNull(),
      dealDate: date('deal_date', { mode: 'string' }).notNull(),
      quantity: bigint('quantity', { mode: 'number' }),
      price: doublePrecision('price'),
      createdAt: timestamp('created_at').defaultNow().notNull(),
      updatedAt: timestamp('updated_at').defaultNow().notNull(),
    },
    (t) => ({
      investorStockDate: unique(constraintName).on(t.investorId, t.stockId, t.dealDate),
    }),
  );
}

export const bulkDeals = dealTable('bulk_deals', 'uq_bulk_deal');
export const blockDeals = dealTable('block_deals', 'uq_block_deal');

export type DealTable = typeof bulkDeals;
export type DealRow = typeof bulkDeals.$inferSelect;
export type NewDealRow = typeof bulkDeals.$inferInsert;

export type DealTableKind = 'bulk' | 'block';

export const dealTables: Record<DealTableKind, DealTable> = {
  bulk: bulkDeals,
  block: blockDeals,
};
