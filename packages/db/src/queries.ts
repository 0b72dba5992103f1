import { asc, desc, eq } from 'drizzle-orm';
import type { DbClient } from './client.js';
import { investors, stocks } from './schema/entities.js';
import { holdings } from './schema/holdings.js';
import { dealTables, type DealTableKind } from './schema/deals.js';

/**
 * Read-only views consumed by the presentation side. They join on the same
 * investor_id / stock_id keys the reconciler maintains.
 */

export interface HoldingView {
  ticker: string;
  investor: string;
  percentHolding: number | null;
  shares: number | null;
  reportedDate: string | null;
}

export interface DealView {
  ticker: string;
  investor: string;
  dealDate: string;
  quantity: number | null;
  price: number | null;
}

/** Holdings ordered by ticker, then investor name. */
export async function listHoldings(db: DbClient): Promise<HoldingView[]> {
  return db
    .select({
      ticker: stocks.ticker,
      investor: investors.name,
      percentHolding: holdings.percentHolding,
      shares: holdings.shares,
      reportedDate: holdings.reportedDate,
    })
    .from(holdings)
    .innerJoin(investors, eq(holdings.investorId, investors.id))
    .innerJoin(stocks, eq(holdings.stockId, stocks.id))
    .orderBy(asc(stocks.ticker), asc(investors.name));
}

/** Deals of one kind, newest first, then by ticker and investor name. */
export async function listDeals(db: DbClient, kind: DealTableKind): Promise<DealView[]> {
  const table = dealTables[kind];
  return db
    .select({
      ticker: stocks.ticker,
      investor: investors.name,
      dealDate: table.dealDate,
      quantity: table.quantity,
      price: table.price,
    })
    .from(table)
    .innerJoin(investors, eq(table.investorId, investors.id))
    .innerJoin(stocks, eq(table.stockId, stocks.id))
    .orderBy(desc(table.dealDate), asc(stocks.ticker), asc(investors.name));
}
