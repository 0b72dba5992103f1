import got from 'got';
import { PageFetchError } from './errors.js';
import type { PageFetcher } from './types.js';

export const DEFAULT_FETCH_TIMEOUT_MS = 30_000;

const USER_AGENT =
  'Mozilla/5.0 (X11; Linux x86_64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/124.0 Safari/537.36';

export interface PageFetcherOptions {
  /** Whole-request timeout; exceeding it rejects with got's TimeoutError. */
  timeoutMs?: number;
  userAgent?: string;
}

/**
 * HTTP page fetcher backed by got.
 *
 * - throwHttpErrors: false so the status check (and its error) is ours
 * - redirects followed, body always received as text
 * - no caching: every call hits the network
 */
export function createPageFetcher(options: PageFetcherOptions = {}): PageFetcher {
  const client = got.extend({
    timeout: { request: options.timeoutMs ?? DEFAULT_FETCH_TIMEOUT_MS },
    followRedirect: true,
    maxRedirects: 10,
    throwHttpErrors: false,
    retry: { limit: 0 },
    headers: {
      'user-agent': options.userAgent ?? USER_AGENT,
      accept: 'text/html,application/xhtml+xml',
    },
  });

  return async (url: string): Promise<string> => {
    const response = await client(url, { responseType: 'text' });
    if (response.statusCode < 200 || response.statusCode >= 300) {
      throw new PageFetchError(url, response.statusCode);
    }
    return response.body;
  };
}
