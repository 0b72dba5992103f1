import { investors, stocks, eq, sql } from '@stakewatch/db';
import type { DbClient } from '@stakewatch/db';

/**
 * Resolves investor names and tickers to row ids inside one reconciliation
 * transaction, creating rows on first sighting. Results are memoized for the
 * lifetime of the resolver; an investor is written again only when a later
 * record names a different source URL, so the last URL in the batch is stored.
 */
export class IdentityResolver {
  private readonly investorIds = new Map<string, { id: number; sourceUrl: string }>();
  private readonly stockIds = new Map<string, number>();

  constructor(private readonly db: DbClient) {}

  /**
   * Insert the investor, or point the existing row at `sourceUrl` when the
   * location changed. Unchanged rows keep their updated_at.
   */
  async investor(name: string, sourceUrl: string): Promise<number> {
    const cached = this.investorIds.get(name);
    if (cached?.sourceUrl === sourceUrl) return cached.id;

    const [written] = await this.db
      .insert(investors)
      .values({ name, sourceUrl })
      .onConflictDoUpdate({
        target: investors.name,
        set: { sourceUrl: sql`excluded.source_url`, updatedAt: new Date() },
        setWhere: sql`${investors.sourceUrl} IS DISTINCT FROM excluded.source_url`,
      })
      .returning({ id: investors.id });

    const id = written?.id ?? (await this.lookupInvestor(name));
    this.investorIds.set(name, { id, sourceUrl });
    return id;
  }

  /** Lookup-or-insert; the first writer of a ticker wins. */
  async stock(ticker: string): Promise<number> {
    const cached = this.stockIds.get(ticker);
    if (cached !== undefined) return cached;

    const [inserted] = await this.db
      .insert(stocks)
      .values({ ticker })
      .onConflictDoNothing({ target: stocks.ticker })
      .returning({ id: stocks.id });

    const id = inserted?.id ?? (await this.lookupStock(ticker));
    this.stockIds.set(ticker, id);
    return id;
  }

  private async lookupInvestor(name: string): Promise<number> {
    const [row] = await this.db
      .select({ id: investors.id })
      .from(investors)
      .where(eq(investors.name, name))
      .limit(1);
    if (!row) {
      throw new Error(`IdentityResolver: investor "${name}" vanished after upsert`);
    }
    return row.id;
  }

  private async lookupStock(ticker: string): Promise<number> {
    const [row] = await this.db
      .select({ id: stocks.id })
      .from(stocks)
      .where(eq(stocks.ticker, ticker))
      .limit(1);
    if (!row) {
      throw new Error(`IdentityResolver: stock "${ticker}" vanished after insert`);
    }
    return row.id;
  }
}
