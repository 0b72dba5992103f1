import { PGlite } from '@electric-sql/pglite';
import { drizzle } from 'drizzle-orm/pglite';
import { ensureSchema, type DbClient } from '@stakewatch/db';

export interface TestDb {
  db: DbClient;
  /** Underlying connection, for catalog queries outside drizzle */
  client: PGlite;
  close(): Promise<void>;
}

/** Fresh in-memory Postgres with the application schema applied. */
export async function createTestDb(): Promise<TestDb> {
  const client = new PGlite();
  const db = drizzle(client);
  await ensureSchema(db);
  return { db, client, close: () => client.close() };
}
