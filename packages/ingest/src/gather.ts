import { createLogger, errorMessage, type Logger } from '@stakewatch/logging';
import type { DealRecord, HoldingRecord, InvestorSource } from '@stakewatch/sources';

export interface GatheredRecords {
  holdings: HoldingRecord[];
  deals: DealRecord[];
  /** Investors that contributed nothing because a fetch failed */
  failedInvestors: string[];
}

async function collect<T>(iterable: AsyncIterable<T>): Promise<T[]> {
  const items: T[] = [];
  for await (const item of iterable) items.push(item);
  return items;
}

/**
 * Fetch every investor's holdings and deals concurrently.
 *
 * An investor is all-or-nothing: both lists are collected before either is
 * admitted, so a failure on the deals page also drops that investor's
 * holdings from the batch. Failures are logged and never rethrown.
 */
export async function gatherRecords(
  sources: readonly InvestorSource[],
  log: Logger = createLogger('ingest'),
): Promise<GatheredRecords> {
  const outcomes = await Promise.all(
    sources.map(async (source) => {
      try {
        const holdings = await collect(source.fetchHoldings());
        const deals = await collect(source.fetchDeals());
        log.debug('Fetched investor', {
          investor: source.investor,
          holdings: holdings.length,
          deals: deals.length,
        });
        return { ok: true as const, holdings, deals };
      } catch (err) {
        log.error('Failed to gather investor data', {
          investor: source.investor,
          url: source.url,
          error: errorMessage(err),
        });
        return { ok: false as const, investor: source.investor };
      }
    }),
  );

  const gathered: GatheredRecords = { holdings: [], deals: [], failedInvestors: [] };
  for (const outcome of outcomes) {
    if (outcome.ok) {
      gathered.holdings.push(...outcome.holdings);
      gathered.deals.push(...outcome.deals);
    } else {
      gathered.failedInvestors.push(outcome.investor);
    }
  }
  return gathered;
}
