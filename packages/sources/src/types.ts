/**
 * Normalized records every source adapter produces, independent of the page
 * family they were scraped from.
 */

export type DealKind = 'bulk' | 'block';
export type DealSide = 'buy' | 'sell';

export interface HoldingRecord {
  investor: string;
  /** Upper-cased exchange ticker */
  ticker: string;
  sourceUrl: string;
  percentHolding: number | null;
  shares: number | null;
  /** ISO date (YYYY-MM-DD) */
  reportedDate: string | null;
}

export interface DealRecord {
  investor: string;
  ticker: string;
  sourceUrl: string;
  /** ISO date (YYYY-MM-DD); part of the deal's identity */
  dealDate: string;
  quantity: number | null;
  price: number | null;
  kind: DealKind;
  side: DealSide;
}

/**
 * Capability contract implemented once per page family. Adapters share no
 * base class; adding a page family means adding an implementation and
 * registering it with the factory.
 *
 * Both operations fetch the page on every call. A failed fetch (non-2xx,
 * timeout, network error) rejects the iteration.
 */
export interface InvestorSource {
  readonly investor: string;
  readonly url: string;
  fetchHoldings(): AsyncGenerator<HoldingRecord>;
  fetchDeals(): AsyncGenerator<DealRecord>;
}

/** Returns the body of a page, rejecting on non-2xx responses. */
export type PageFetcher = (url: string) => Promise<string>;

export function isDealSide(value: string): value is DealSide {
  return value === 'buy' || value === 'sell';
}
