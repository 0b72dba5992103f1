import { sql } from 'drizzle-orm';
import type { DbClient } from './client.js';

/**
 * DDL for the six tables, one statement per entry: PGlite runs statements
 * through the extended protocol, which rejects multi-statement strings.
 */
const SCHEMA_STATEMENTS: readonly string[] = [
  `CREATE TABLE IF NOT EXISTS investors (
    id integer GENERATED ALWAYS AS IDENTITY PRIMARY KEY,
    name varchar(255) NOT NULL UNIQUE,
    source_url varchar(1024) NOT NULL,
    created_at timestamp NOT NULL DEFAULT now(),
    updated_at timestamp NOT NULL DEFAULT now()
  )`,
  `CREATE TABLE IF NOT EXISTS stocks (
    id integer GENERATED ALWAYS AS IDENTITY PRIMARY KEY,
    ticker varchar(64) NOT NULL UNIQUE
  )`,
  `CREATE TABLE IF NOT EXISTS holdings (
    id integer GENERATED ALWAYS AS IDENTITY PRIMARY KEY,
    investor_id integer NOT NULL REFERENCES investors(id) ON DELETE CASCADE,
    stock_id integer NOT NULL REFERENCES stocks(id) ON DELETE CASCADE,
    percent_holding double precision,
    shares bigint,
    reported_date date,
    created_at timestamp NOT NULL DEFAULT now(),
    updated_at timestamp NOT NULL DEFAULT now(),
    CONSTRAINT uq_holdings_investor_stock UNIQUE (investor_id, stock_id)
  )`,
  ...(['bulk', 'block'] as const).map(
    (kind) => `CREATE TABLE IF NOT EXISTS ${kind}_deals (
    id integer GENERATED ALWAYS AS IDENTITY PRIMARY KEY,
    investor_id integer NOT NULL REFERENCES investors(id) ON DELETE CASCADE,
    stock_id integer NOT NULL REFERENCES stocks(id) ON DELETE CASCADE,
    deal_date date NOT NULL,
    quantity bigint,
    price double precision,
    created_at timestamp NOT NULL DEFAULT now(),
    updated_at timestamp NOT NULL DEFAULT now(),
    CONSTRAINT uq_${kind}_deal UNIQUE (investor_id, stock_id, deal_date)
  )`,
  ),
  `CREATE TABLE IF NOT EXISTS ingest_schedule (
    id integer PRIMARY KEY DEFAULT 1,
    hour integer NOT NULL,
    minute integer NOT NULL,
    timezone varchar(64) NOT NULL DEFAULT 'UTC',
    created_at timestamp NOT NULL DEFAULT now(),
    updated_at timestamp NOT NULL DEFAULT now()
  )`,
];

/**
 * Create any missing tables. Safe to call on every startup.
 */
export async function ensureSchema(db: DbClient): Promise<void> {
  for (const statement of SCHEMA_STATEMENTS) {
    await db.execute(sql.raw(statement));
  }
}
