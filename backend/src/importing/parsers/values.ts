import { Decimal } from 'decimal.js';

export const ZERO = new Decimal(0);

/**
 * Reads a broker-formatted number such as `$1,234.50` or `($13.20)`.
 * Blank or unreadable input yields zero.
 */
export function parseBrokerDecimal(raw: string | null | undefined): Decimal {
  if (raw == null) return ZERO;
  let text = raw.trim().replace(/[$,]/g, '');
  if (!text) return ZERO;

  let negative = false;
  if (text.startsWith('(') && text.endsWith(')')) {
    negative = true;
    text = text.slice(1, -1).trim();
  }

  try {
    const value = new Decimal(text);
    if (!value.isFinite()) return ZERO;
    return negative ? value.negated() : value;
  } catch {
    return ZERO;
  }
}

const US_DATE_PATTERN = /^(\d{1,2})\/(\d{1,2})\/(\d{2}|\d{4})$/;

// Two-digit years follow the POSIX pivot: 69-99 are 19xx, 00-68 are 20xx.
function expandYear(digits: string): number {
  const value = Number(digits);
  if (digits.length === 4) return value;
  return value < 69 ? 2000 + value : 1900 + value;
}

/** False for dates such as February 30th that `Date` would roll over. */
export function isCalendarDate(year: number, month: number, day: number): boolean {
  const date = new Date(Date.UTC(year, month - 1, day));
  return date.getUTCFullYear() === year && date.getUTCMonth() === month - 1 && date.getUTCDate() === day;
}

/**
 * Parses `MM/DD/YYYY` (and `MM/DD/YY` when allowed) into an ISO `YYYY-MM-DD`
 * date, or returns null when the text is not a real calendar date.
 */
export function parseUsDate(raw: string, options: { allowTwoDigitYear?: boolean } = {}): string | null {
  const match = raw.trim().match(US_DATE_PATTERN);
  if (!match) return null;
  const [, monthText, dayText, yearText] = match;
  if (yearText.length === 2 && !options.allowTwoDigitYear) return null;

  const year = expandYear(yearText);
  const month = Number(monthText);
  const day = Number(dayText);
  if (!isCalendarDate(year, month, day)) return null;

  return [String(year).padStart(4, '0'), String(month).padStart(2, '0'), String(day).padStart(2, '0')].join('-');
}
