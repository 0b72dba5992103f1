/**
 * @stakewatch/sources — page adapters that turn investor disclosure pages
 * into normalized holding and deal records.
 */

export { createSource, supportedHosts } from './factory.js';
export { ScreenerSource } from './screener.js';
export { TrendlyneSource } from './trendlyne.js';
export { createPageFetcher, DEFAULT_FETCH_TIMEOUT_MS, type PageFetcherOptions } from './fetch-page.js';
export { parseDate, parseFloat, parseInt, tryParseDate } from './parse.js';
export { DateParseError, PageFetchError, UnsupportedSourceError } from './errors.js';
export {
  isDealSide,
  type DealKind,
  type DealRecord,
  type DealSide,
  type HoldingRecord,
  type InvestorSource,
  type PageFetcher,
} from './types.js';
