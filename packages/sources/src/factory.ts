import { UnsupportedSourceError } from './errors.js';
import { createPageFetcher } from './fetch-page.js';
import { ScreenerSource } from './screener.js';
import { TrendlyneSource } from './trendlyne.js';
import type { InvestorSource, PageFetcher } from './types.js';

interface SourceFamily {
  /** Host fragment the location must contain */
  host: string;
  create(investor: string, url: string, fetchPage: PageFetcher): InvestorSource;
}

const SOURCE_FAMILIES: readonly SourceFamily[] = [
  { host: 'screener.in', create: (investor, url, fetchPage) => new ScreenerSource(investor, url, fetchPage) },
  { host: 'trendlyne.com', create: (investor, url, fetchPage) => new TrendlyneSource(investor, url, fetchPage) },
];

/** Host fragments the factory recognizes, in match order. */
export function supportedHosts(): string[] {
  return SOURCE_FAMILIES.map((family) => family.host);
}

/**
 * Pick the adapter for a page location.
 * @throws UnsupportedSourceError when no known host fragment matches
 */
export function createSource(
  investor: string,
  url: string,
  fetchPage: PageFetcher = createPageFetcher(),
): InvestorSource {
  const family = SOURCE_FAMILIES.find((candidate) => url.includes(candidate.host));
  if (family === undefined) {
    throw new UnsupportedSourceError(url);
  }
  return family.create(investor, url, fetchPage);
}
