import { drizzle } from 'drizzle-orm/node-postgres';
import type { PgDatabase, PgQueryResultHKT } from 'drizzle-orm/pg-core';
import pg from 'pg';
import type { Pool } from 'pg';

/**
 * Any drizzle Postgres database: node-postgres in production, PGlite in tests.
 * Transactions are assignable to it too, so helpers that take a DbClient can
 * run inside or outside a transaction.
 */
export type DbClient = PgDatabase<PgQueryResultHKT>;

export interface DbHandle {
  db: DbClient;
  pool: Pool;
  /**
   * Gracefully shut down the connection pool.
   * Call this before process exit to drain in-flight queries.
   */
  shutdown(): Promise<void>;
}

export function createDb(connectionString: string): DbHandle {
  const pool = new pg.Pool({
    connectionString,
    max: 10,
    idleTimeoutMillis: 30_000,
    connectionTimeoutMillis: 5_000,
  });

  const db = drizzle(pool);

  return {
    db,
    pool,
    shutdown: () => pool.end(),
  };
}
