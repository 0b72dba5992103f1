import { readFileSync } from 'node:fs';
import type { PageFetcher } from '@stakewatch/sources';

export function readFixture(name: string): string {
  return readFileSync(new URL(`../fixtures/${name}`, import.meta.url), 'utf8');
}

/** Serves `html` for every URL and records what was requested. */
export function servePage(html: string): PageFetcher & { requested: string[] } {
  const requested: string[] = [];
  const fetchPage = async (url: string): Promise<string> => {
    requested.push(url);
    return html;
  };
  return Object.assign(fetchPage, { requested });
}

export async function collect<T>(iterable: AsyncIterable<T>): Promise<T[]> {
  const items: T[] = [];
  for await (const item of iterable) items.push(item);
  return items;
}
