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
 * Latest disclosed position of one investor in one stock.
 * The table mirrors the most recent successful scrape: rows missing from a
 * run's batch are deleted by the reconciler.
 */
export const holdings = pgTable(
  'holdings',
  {
    id: integer('id').primaryKey().generatedAlwaysAsIdentity(),
    investorId: integer('investor_id')
      .references(() => investors.id, { onDelete: 'cascade' })
      .notNull(),
    stockId: integer('stock_id')
      .references(() => stocks.id, { onDelete: 'cascade' })
      .notNull(),
    percentHolding: doublePrecision('percent_holding'),
    shares: bigint('shares', { mode: 'number' }),
    /** ISO date (YYYY-MM-DD) the disclosure refers to */
    reportedDate: date('reported_date', { mode: 'string' }),
    createdAt: timestamp('created_at').defaultNow().notNull(),
    updatedAt: timestamp('updated_at').defaultNow().notNull(),
  },
  (t) => ({
    investorStock: unique('uq_holdings_investor_stock').on(t.investorId, t.stockId),
  }),
);

export type Holding = typeof holdings.$inferSelect;
export type NewHolding = typeof holdings.$inferInsert;
