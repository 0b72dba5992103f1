import { createPageFetcher } from './fetch-page.js';
import { cellText, dataRows, headerLabels, loadPage, textOf } from './html.js';
import type { CheerioAPI, Element } from './html.js';
import { parseDate, parseFloat, parseInt, tryParseDate } from './parse.js';
import {
  isDealSide,
  type DealKind,
  type DealRecord,
  type HoldingRecord,
  type InvestorSource,
  type PageFetcher,
} from './types.js';

/**
 * trendlyne.com superstar portfolio pages.
 *
 * Holdings come from the first table whose leading header names a stock or
 * company column; deals from <section> blocks headed (h2/h3) "bulk …" or
 * "block …". Tickers are taken from the first cell's link text, falling back
 * to the cell text.
 */
export class TrendlyneSource implements InvestorSource {
  constructor(
    readonly investor: string,
    readonly url: string,
    private readonly fetchPage: PageFetcher = createPageFetcher(),
  ) {}

  async *fetchHoldings(): AsyncGenerator<HoldingRecord> {
    const $ = loadPage(await this.fetchPage(this.url));
    const table = $('table')
      .toArray()
      .find((candidate) => {
        const lead = headerLabels($, candidate)[0];
        return lead !== undefined && (lead.includes('stock') || lead.includes('company'));
      });
    if (table === undefined) return;

    for (const cells of dataRows($, table)) {
      const ticker = tickerOf($, cells);
      if (ticker === null) continue;

      yield {
        investor: this.investor,
        ticker,
        sourceUrl: this.url,
        percentHolding: parseFloat(cellText($, cells, 1)),
        shares: parseInt(cellText($, cells, 2)),
        reportedDate: parseDate(cellText($, cells, 3)),
      };
    }
  }

  async *fetchDeals(): AsyncGenerator<DealRecord> {
    const $ = loadPage(await this.fetchPage(this.url));

    for (const section of $('section').toArray()) {
      const title = $(section).find('h2, h3').first();
      if (title.length === 0) continue;
      const heading = title.text().trim().toLowerCase();
      const kind: DealKind | null = heading.includes('bulk')
        ? 'bulk'
        : heading.includes('block')
          ? 'block'
          : null;
      if (kind === null) continue;

      const table = $(section).find('table').first().get(0);
      if (table === undefined) continue;
      yield* this.dealsFromTable($, table, kind);
    }
  }

  private *dealsFromTable($: CheerioAPI, table: Element, kind: DealKind): Generator<DealRecord> {
    for (const cells of dataRows($, table)) {
      const ticker = tickerOf($, cells);
      if (ticker === null) continue;

      const dealDate = tryParseDate(cellText($, cells, 1));
      const side = (cellText($, cells, 2) ?? '').toLowerCase();
      if (dealDate === null || !isDealSide(side)) continue;

      yield {
        investor: this.investor,
        ticker,
        sourceUrl: this.url,
        dealDate,
        quantity: parseInt(cellText($, cells, 3)),
        price: parseFloat(cellText($, cells, 4)),
        kind,
        side,
      };
    }
  }
}

function tickerOf($: CheerioAPI, cells: Element[]): string | null {
  const first = cells[0];
  if (first === undefined) return null;
  const anchor = $(first).find('a[href]').first();
  const text = anchor.length > 0 ? anchor.text().trim() : textOf($, first);
  return text === '' ? null : text.toUpperCase();
}
