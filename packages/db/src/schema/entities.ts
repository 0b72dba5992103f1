import { integer, pgTable, timestamp, varchar } from 'drizzle-orm/pg-core';

/**
 * Investors are keyed by display name. The engine creates them on first
 * sighting and rewrites source_url when the configured location changes;
 * it never deletes them.
 */
export const investors = pgTable('investors', {
  id: integer('id').primaryKey().generatedAlwaysAsIdentity(),
  name: varchar('name', { length: 255 }).notNull().unique(),
  /** Page the investor's holdings and deals are scraped from */
  sourceUrl: varchar('source_url', { length: 1024 }).notNull(),
  createdAt: timestamp('created_at').defaultNow().notNull(),
  updatedAt: timestamp('updated_at').defaultNow().notNull(),
});

export type Investor = typeof investors.$inferSelect;
export type NewInvestor = typeof investors.$inferInsert;

/**
 * Stocks are looked up or inserted by ticker and never modified afterwards.
 */
export const stocks = pgTable('stocks', {
  id: integer('id').primaryKey().generatedAlwaysAsIdentity(),
  ticker: varchar('ticker', { length: 64 }).notNull().unique(),
});

export type Stock = typeof stocks.$inferSelect;
export type NewStock = typeof stocks.$inferInsert;
