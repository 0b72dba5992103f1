import { afterEach, beforeEach, describe, it, expect } from 'vitest';
import { getTableConfig } from 'drizzle-orm/pg-core';
import {
  blockDeals,
  bulkDeals,
  ensureSchema,
  holdings,
  ingestSchedule,
  investors,
  stocks,
} from '@stakewatch/db';
import { createTestDb, type TestDb } from '../helpers/db.js';

interface ColumnShape {
  name: string;
  type: string;
  notNull: boolean;
}

interface CatalogColumn {
  column_name: string;
  data_type: string;
  max_length: number | null;
  is_nullable: string;
}

const tables = [investors, stocks, holdings, bulkDeals, blockDeals, ingestSchedule];

const byName = (a: ColumnShape, b: ColumnShape): number => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0);

/** information_schema spelling in drizzle's notation ("varchar(64)", "timestamp"). */
function catalogType(column: CatalogColumn): string {
  switch (column.data_type) {
    case 'character varying':
      return column.max_length === null ? 'varchar' : `varchar(${column.max_length})`;
    case 'timestamp without time zone':
      return 'timestamp';
    default:
      return column.data_type;
  }
}

describe('ensureSchema', () => {
  let testDb: TestDb;

  beforeEach(async () => {
    testDb = await createTestDb();
  });

  afterEach(async () => {
    await testDb.close();
  });

  it('can run again over an existing schema', async () => {
    await expect(ensureSchema(testDb.db)).resolves.toBeUndefined();
  });

  for (const table of tables) {
    const config = getTableConfig(table);
    const tableName = config.name;

    it(`creates ${tableName} with the columns the drizzle table declares`, async () => {
      const declared = config.columns
        .map((column) => ({ name: column.name, type: column.getSQLType(), notNull: column.notNull }))
        .sort(byName);

      const { rows } = await testDb.client.query<CatalogColumn>(
        `SELECT column_name::text AS column_name, data_type::text AS data_type,
                character_maximum_length::int AS max_length, is_nullable::text AS is_nullable
           FROM information_schema.columns
          WHERE table_schema = 'public' AND table_name = $1`,
        [tableName],
      );
      const created = rows
        .map((row) => ({ name: row.column_name, type: catalogType(row), notNull: row.is_nullable === 'NO' }))
        .sort(byName);

      expect(created).toEqual(declared);
    });

    it(`gives ${tableName} the named unique constraints and foreign keys the drizzle table declares`, async () => {
      const { rows } = await testDb.client.query<{ constraint_name: string; constraint_type: string }>(
        `SELECT constraint_name::text AS constraint_name, constraint_type::text AS constraint_type
           FROM information_schema.table_constraints
          WHERE table_schema = 'public' AND table_name = $1`,
        [tableName],
      );
      const uniqueNames = rows.filter((row) => row.constraint_type === 'UNIQUE').map((row) => row.constraint_name);
      const foreignKeys = rows.filter((row) => row.constraint_type === 'FOREIGN KEY');

      expect(uniqueNames).toEqual(expect.arrayContaining(config.uniqueConstraints.map((u) => u.getName())));
      expect(foreignKeys).toHaveLength(config.foreignKeys.length);
    });
  }
});
