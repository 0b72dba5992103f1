import { afterEach, beforeEach, describe, it, expect } from 'vitest';
import { investors, listHoldings, stocks } from '@stakewatch/db';
import { reconcileHoldings } from '@stakewatch/sync';
import { createTestDb, type TestDb } from '../helpers/db.js';
import { holding, silentLogger } from '../helpers/records.js';

describe('reconcileHoldings', () => {
  let testDb: TestDb;

  beforeEach(async () => {
    testDb = await createTestDb();
  });

  afterEach(async () => {
    await testDb.close();
  });

  const keys = async (): Promise<string[]> =>
    (await listHoldings(testDb.db)).map((row) => `${row.investor}:${row.ticker}`);

  it('persists exactly the batch key set, ordered by ticker then investor', async () => {
    const summary = await reconcileHoldings(
      testDb.db,
      [holding('Alpha Fund', 'XYZ', 1), holding('Alpha Fund', 'ABC', 2), holding('Beta Fund', 'XYZ', 3)],
      silentLogger,
    );

    expect(summary).toEqual({ table: 'holdings', upserted: 3, removed: 0 });
    expect(await keys()).toEqual(['Alpha Fund:ABC', 'Alpha Fund:XYZ', 'Beta Fund:XYZ']);
  });

  it('overwrites kept rows and deletes rows missing from the next batch', async () => {
    await reconcileHoldings(
      testDb.db,
      [holding('Alpha Fund', 'XYZ', 1), holding('Alpha Fund', 'ABC', 2), holding('Beta Fund', 'XYZ', 3)],
      silentLogger,
    );

    const summary = await reconcileHoldings(
      testDb.db,
      [
        holding('Alpha Fund', 'XYZ', 5, { shares: 900, reportedDate: '2024-06-30' }),
        holding('Beta Fund', 'QRS', 4),
      ],
      silentLogger,
    );

    expect(summary).toEqual({ table: 'holdings', upserted: 2, removed: 2 });
    expect(await listHoldings(testDb.db)).toEqual([
      { ticker: 'QRS', investor: 'Beta Fund', percentHolding: 4, shares: null, reportedDate: null },
      { ticker: 'XYZ', investor: 'Alpha Fund', percentHolding: 5, shares: 900, reportedDate: '2024-06-30' },
    ]);
  });

  it('is idempotent', async () => {
    const batch = [holding('Alpha Fund', 'XYZ', 1), holding('Beta Fund', 'ABC', 2)];

    await reconcileHoldings(testDb.db, batch, silentLogger);
    const before = await listHoldings(testDb.db);
    const second = await reconcileHoldings(testDb.db, batch, silentLogger);

    expect(second.removed).toBe(0);
    expect(await listHoldings(testDb.db)).toEqual(before);
  });

  it('keeps the last record when a key repeats within a batch', async () => {
    const summary = await reconcileHoldings(
      testDb.db,
      [holding('Alpha Fund', 'XYZ', 1), holding('Alpha Fund', 'XYZ', 9)],
      silentLogger,
    );

    expect(summary.upserted).toBe(1);
    const rows = await listHoldings(testDb.db);
    expect(rows.map((row) => row.percentHolding)).toEqual([9]);
  });

  it('empties the table for an empty batch', async () => {
    await reconcileHoldings(testDb.db, [holding('Alpha Fund', 'XYZ', 1)], silentLogger);

    const summary = await reconcileHoldings(testDb.db, [], silentLogger);

    expect(summary).toEqual({ table: 'holdings', upserted: 0, removed: 1 });
    expect(await listHoldings(testDb.db)).toEqual([]);
  });

  it('shares one stock row across investors and tracks source_url changes', async () => {
    await reconcileHoldings(
      testDb.db,
      [holding('Alpha Fund', 'XYZ', 1), holding('Beta Fund', 'XYZ', 2)],
      silentLogger,
    );
    await reconcileHoldings(
      testDb.db,
      [holding('Alpha Fund', 'XYZ', 1, { sourceUrl: 'https://trendlyne.com/portfolio/alpha/' })],
      silentLogger,
    );

    const stockRows = await testDb.db.select({ ticker: stocks.ticker }).from(stocks);
    expect(stockRows).toEqual([{ ticker: 'XYZ' }]);

    const investorRows = await testDb.db
      .select({ name: investors.name, sourceUrl: investors.sourceUrl })
      .from(investors)
      .orderBy(investors.name);
    expect(investorRows).toEqual([
      { name: 'Alpha Fund', sourceUrl: 'https://trendlyne.com/portfolio/alpha/' },
      { name: 'Beta Fund', sourceUrl: 'https://www.screener.in/people/1/beta-fund/' },
    ]);
  });

  it('leaves the previous snapshot untouched when a write fails', async () => {
    await reconcileHoldings(testDb.db, [holding('Alpha Fund', 'XYZ', 1)], silentLogger);

    const tooLong = 'T'.repeat(65);
    await expect(
      reconcileHoldings(testDb.db, [holding('Beta Fund', 'ABC', 2), holding('Beta Fund', tooLong, 3)], silentLogger),
    ).rejects.toThrow();

    expect(await keys()).toEqual(['Alpha Fund:XYZ']);
    const investorRows = await testDb.db.select({ name: investors.name }).from(investors);
    expect(investorRows).toEqual([{ name: 'Alpha Fund' }]);
  });

  it('stores the source URL of the last record naming an investor', async () => {
    const first = 'https://www.screener.in/people/1/alpha-fund/';
    const moved = 'https://trendlyne.com/portfolio/superstar-shareholders/9/alpha-fund/';

    await reconcileHoldings(
      testDb.db,
      [
        holding('Alpha Fund', 'XYZ', 1, { sourceUrl: first }),
        holding('Alpha Fund', 'ABC', 2, { sourceUrl: moved }),
        holding('Alpha Fund', 'DEF', 3, { sourceUrl: first }),
      ],
      silentLogger,
    );

    const rows = await testDb.db
      .select({ name: investors.name, sourceUrl: investors.sourceUrl })
      .from(investors);
    expect(rows).toEqual([{ name: 'Alpha Fund', sourceUrl: first }]);
    expect(await keys()).toHaveLength(3);
  });
});
