import { describe, it, expect } from 'vitest';
import { TrendlyneSource } from '@stakewatch/sources';
import { collect, readFixture, servePage } from '../helpers/fixtures.js';

const PAGE_URL = 'https://trendlyne.com/portfolio/superstar-shareholders/1/latest/test-holdings/';

describe('TrendlyneSource', () => {
  it('reads holdings, falling back to cell text for the ticker', async () => {
    const source = new TrendlyneSource('Test Holdings', PAGE_URL, servePage(readFixture('trendlyne-portfolio.html')));

    const holdings = await collect(source.fetchHoldings());

    expect(holdings).toEqual([
      {
        investor: 'Test Holdings',
        ticker: 'OMEGA',
        sourceUrl: PAGE_URL,
        percentHolding: 3.1,
        shares: 45000,
        reportedDate: '2023-12-31',
      },
      {
        investor: 'Test Holdings',
        ticker: 'SIGMA',
        sourceUrl: PAGE_URL,
        percentHolding: null,
        shares: null,
        reportedDate: null,
      },
    ]);
  });

  it('reads deals from bulk and block sections only', async () => {
    const source = new TrendlyneSource('Test Holdings', PAGE_URL, servePage(readFixture('trendlyne-portfolio.html')));

    const deals = await collect(source.fetchDeals());

    expect(deals).toEqual([
      {
        investor: 'Test Holdings',
        ticker: 'OMEGA',
        sourceUrl: PAGE_URL,
        dealDate: '2024-01-15',
        quantity: 10000,
        price: 99.9,
        kind: 'bulk',
        side: 'buy',
      },
      {
        investor: 'Test Holdings',
        ticker: 'SIGMA',
        sourceUrl: PAGE_URL,
        dealDate: '2024-02-01',
        quantity: 500,
        price: 10,
        kind: 'block',
        side: 'sell',
      },
    ]);
  });
});
