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
 * screener.in "people" pages.
 *
 * Holdings: the first table whose headers include "company" plus a holding
 * percentage or share count column. Rows are Company | % held | Shares | Date;
 * only rows linking to a /company/<TICKER>/ page are taken.
 *
 * Deals: each <h2> mentioning "bulk deals" or "block deals" owns the next
 * table in the document. Rows are Company | Date | Buy/Sell | Quantity | Price.
 */
export class ScreenerSource implements InvestorSource {
  constructor(
    readonly investor: string,
    readonly url: string,
    private readonly fetchPage: PageFetcher = createPageFetcher(),
  ) {}

  async *fetchHoldings(): AsyncGenerator<HoldingRecord> {
    const $ = loadPage(await this.fetchPage(this.url));
    const table = $('table')
      .toArray()
      .find((candidate) => isHoldingsHeader(headerLabels($, candidate)));
    if (table === undefined) return;

    for (const cells of dataRows($, table)) {
      const first = cells[0];
      if (first === undefined) continue;
      const ticker = tickerFromCompanyLink($(first).find('a[href]').first().attr('href'));
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
    let pending: DealKind | null = null;

    // Selector groups come back in document order
    for (const el of $('h2, table').toArray()) {
      if (el.name === 'h2') {
        pending = dealKindFromHeading(textOf($, el)) ?? pending;
        continue;
      }
      if (pending === null) continue;
      const kind = pending;
      pending = null;
      yield* this.dealsFromTable($, el, kind);
    }
  }

  private *dealsFromTable($: CheerioAPI, table: Element, kind: DealKind): Generator<DealRecord> {
    for (const cells of dataRows($, table)) {
      const first = cells[0];
      if (first === undefined) continue;
      const anchor = $(first).find('a[href]').first();
      if (anchor.length === 0) continue;
      const ticker = anchor.text().trim().toUpperCase();
      if (ticker === '') continue;

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

function isHoldingsHeader(labels: string[]): boolean {
  return (
    labels.includes('company') &&
    (labels.some((label) => label.includes('holding')) || labels.includes('shares'))
  );
}

/** "/company/TCS/consolidated/" -> "TCS"; null for non-company links. */
function tickerFromCompanyLink(href: string | undefined): string | null {
  if (href === undefined) return null;
  const segments = href.split('/').filter((segment) => segment !== '');
  const index = segments.indexOf('company');
  const ticker = index === -1 ? undefined : segments[index + 1];
  return ticker === undefined ? null : decodeSegment(ticker).toUpperCase();
}

/** Percent-decodes a path segment, keeping it as written when it is malformed ("ABC%"). */
function decodeSegment(segment: string): string {
  try {
    return decodeURIComponent(segment);
  } catch (err) {
    if (err instanceof URIError) return segment;
    throw err;
  }
}

function dealKindFromHeading(heading: string): DealKind | null {
  const lower = heading.toLowerCase();
  if (lower.includes('bulk deals')) return 'bulk';
  if (lower.includes('block deals')) return 'block';
  return null;
}
