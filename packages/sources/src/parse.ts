import { DateParseError } from './errors.js';

/**
 * Field parsers for scraped table cells. Every parser accepts a missing cell
 * (undefined/null/blank) and returns null for it.
 */

const PLAIN_NUMBER = /^[-+]?(\d+\.?\d*|\.\d+)([eE][-+]?\d+)?$/;

/**
 * Parse a percentage or decimal such as "12.34%", "1,234.5" or "₹ 98.10".
 * A direct parse is tried first; failing that, everything except digits and
 * the decimal point is stripped and the remainder parsed.
 */
export function parseFloat(value: string | null | undefined): number | null {
  if (!value) return null;
  const cleaned = value.trim().replace(/%/g, '');
  if (PLAIN_NUMBER.test(cleaned)) {
    return Number(cleaned);
  }
  const digits = cleaned.replace(/[^0-9.]/g, '');
  if (digits === '') return null;
  const parsed = Number(digits);
  return Number.isNaN(parsed) ? null : parsed;
}

/**
 * Parse a count such as "1,234" or "12,34,567" (lakh grouping) by dropping
 * every non-digit character.
 */
export function parseInt(value: string | null | undefined): number | null {
  if (!value) return null;
  const digits = value.replace(/[^0-9]/g, '');
  if (digits === '') return null;
  const parsed = Number.parseInt(digits, 10);
  // Counts past 2^53 would be stored rounded; treat them as absent instead
  return Number.isSafeInteger(parsed) ? parsed : null;
}

const MONTH_NAMES = [
  'january',
  'february',
  'march',
  'april',
  'may',
  'june',
  'july',
  'august',
  'september',
  'october',
  'november',
  'december',
];

const WEEKDAYS = new Set(['mon', 'tue', 'wed', 'thu', 'fri', 'sat', 'sun']);

/** "10:30", "10:30:15", "10:30 PM" at the end of a date cell. */
const TRAILING_TIME = /[\sT]+\d{1,2}:\d{2}(?::\d{2}(?:\.\d+)?)?(?:\s*[ap]\.?m\.?)?(?:\s*(?:z|utc|ist|gmt|[+-]\d{2}:?\d{2}))?$/i;

/** "5th", "1st", "22nd" */
const ORDINAL_DAY = /^(\d{1,2})(?:st|nd|rd|th)$/i;

/** Cells that stand for "no value" in the scraped tables. */
const PLACEHOLDERS = new Set(['-', '--', '—', '–', 'n/a', 'na']);

function expandYear(year: string): number {
  const n = Number(year);
  if (year.length > 2) return n;
  return n < 70 ? 2000 + n : 1900 + n;
}

function isValidDate(year: number, month: number, day: number): boolean {
  if (month < 1 || month > 12 || day < 1) return false;
  const daysInMonth = new Date(Date.UTC(year, month, 0)).getUTCDate();
  return day <= daysInMonth;
}

function toIsoDate(year: number, month: number, day: number): string {
  return `${String(year).padStart(4, '0')}-${String(month).padStart(2, '0')}-${String(day).padStart(2, '0')}`;
}

/** "Jan", "sept" and "January" all resolve; "marvel" does not. */
function monthFromName(token: string): number | undefined {
  if (token.length < 3) return undefined;
  const index = MONTH_NAMES.findIndex((name) => name.startsWith(token) || (token === 'sept' && name === 'september'));
  return index === -1 ? undefined : index + 1;
}

function parseNumericDate(first: string, second: string, third: string, input: string): string {
  if (first.length === 4) {
    const year = Number(first);
    const month = Number(second);
    const day = Number(third);
    if (isValidDate(year, month, day)) return toIsoDate(year, month, day);
    throw new DateParseError(input);
  }

  const year = expandYear(third);
  const day = Number(first);
  const month = Number(second);
  if (isValidDate(year, month, day)) return toIsoDate(year, month, day);
  // Day-first is only a preference: 01/13/2024 can only be January 13th
  if (isValidDate(year, day, month)) return toIsoDate(year, day, month);
  throw new DateParseError(input);
}

function parseTextualDate(tokens: string[], input: string): string {
  let month: number | undefined;
  const numbers: string[] = [];

  for (const token of tokens) {
    if (/^\d+$/.test(token)) {
      numbers.push(token);
      continue;
    }
    const ordinal = ORDINAL_DAY.exec(token);
    if (ordinal?.[1] !== undefined) {
      numbers.push(ordinal[1]);
      continue;
    }
    const lower = token.toLowerCase();
    if (month === undefined) {
      const candidate = monthFromName(lower);
      if (candidate !== undefined) {
        month = candidate;
        continue;
      }
    }
    if (WEEKDAYS.has(lower.slice(0, 3))) continue;
    throw new DateParseError(input);
  }

  const [a, b] = numbers;
  if (month === undefined || a === undefined) {
    throw new DateParseError(input);
  }
  // "March 2024" names the month only; pin it to the 1st so the value is stable
  if (numbers.length === 1 && a.length === 4) {
    return toIsoDate(Number(a), month, 1);
  }
  if (b === undefined || numbers.length !== 2) {
    throw new DateParseError(input);
  }
  // A four-digit token is the year wherever it sits; otherwise day comes first
  const [dayToken, yearToken] = a.length === 4 ? [b, a] : [a, b];
  const year = expandYear(yearToken);
  const day = Number(dayToken);
  if (!isValidDate(year, month, day)) throw new DateParseError(input);
  return toIsoDate(year, month, day);
}

/**
 * Parse a disclosure date into ISO form (YYYY-MM-DD), preferring day-first
 * order when the input is ambiguous: "05-01-2024" is 5 January 2024.
 *
 * Accepts numeric dates separated by `-`, `/`, `.` or spaces, ISO dates with
 * an optional time part, and dates with an English month name
 * ("5 Jan 2024", "Jan 5th, 2024", "05-Jan-24", "March 2024" as the 1st).
 * A trailing time of day on any of these is ignored.
 *
 * @throws DateParseError for a non-empty value matching none of these
 */
export function parseDate(value: string | null | undefined): string | null {
  if (!value) return null;
  const trimmed = value.trim();
  if (trimmed === '' || PLACEHOLDERS.has(trimmed.toLowerCase())) return null;

  const iso = /^(\d{4})-(\d{1,2})-(\d{1,2})(?:[T\s].*)?$/.exec(trimmed);
  if (iso) {
    const [, year, month, day] = iso;
    if (year === undefined || month === undefined || day === undefined) {
      throw new DateParseError(value);
    }
    return parseNumericDate(year, month, day, value);
  }

  const dateOnly = trimmed.replace(TRAILING_TIME, '');
  const numeric = /^(\d{1,4})[-/.\s](\d{1,2})[-/.\s](\d{1,4})$/.exec(dateOnly);
  if (numeric) {
    const [, first, second, third] = numeric;
    if (first === undefined || second === undefined || third === undefined) {
      throw new DateParseError(value);
    }
    return parseNumericDate(first, second, third, value);
  }

  const tokens = dateOnly.split(/[\s,\-/.]+/).filter((t) => t !== '');
  return parseTextualDate(tokens, value);
}

/**
 * parseDate for identity fields: an unparsable value yields null so the
 * caller can drop the row instead of failing the whole page.
 */
export function tryParseDate(value: string | null | undefined): string | null {
  try {
    return parseDate(value);
  } catch (err) {
    if (err instanceof DateParseError) return null;
    throw err;
  }
}
