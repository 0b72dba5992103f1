import * as cheerio from 'cheerio';
import type { CheerioAPI, Element } from 'cheerio';

export type { CheerioAPI, Element };

export function loadPage(html: string): CheerioAPI {
  return cheerio.load(html);
}

/** Whitespace-collapsed text of an element. */
export function textOf($: CheerioAPI, el: Element): string {
  return $(el).text().replace(/\s+/g, ' ').trim();
}

/** Text of the cell at `index`, or undefined when the row is too short. */
export function cellText($: CheerioAPI, cells: Element[], index: number): string | undefined {
  const cell = cells[index];
  return cell === undefined ? undefined : textOf($, cell);
}

/** Lower-cased header labels of a table. */
export function headerLabels($: CheerioAPI, table: Element): string[] {
  return $(table)
    .find('th')
    .toArray()
    .map((th) => textOf($, th).toLowerCase());
}

/** `<td>` cells of each data row; header-only rows are dropped. */
export function dataRows($: CheerioAPI, table: Element): Element[][] {
  return $(table)
    .find('tr')
    .toArray()
    .map((row) => $(row).find('td').toArray())
    .filter((cells) => cells.length > 0);
}
