/**
 * Date Normalizer
 *
 * Converts the dates found in article headers to YYYY-MM-DD. Two layouts
 * occur in exports: "1. Januar 2000" and "January 1, 2000", with German or
 * English month names in either.
 */

import { MONTHS, MONTH_LOOKUP } from '../config/months.js';
import type { ExtractionReporter } from '../types/index.js';

export type DateParseResult =
  | { ok: true; value: string }
  | { ok: false; value: string };

function escapeRegex(str: string): string {
  return str.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

const MONTH_ALTERNATION = MONTHS.map(([name]) => escapeRegex(name)).join('|');

/**
 * "DD. <month> YYYY"
 */
const DAY_FIRST = new RegExp(`(\\d+)\\. (${MONTH_ALTERNATION}) (\\d+)`, 'iu');

/**
 * "<month> DD, YYYY"
 */
const MONTH_FIRST = new RegExp(`(${MONTH_ALTERNATION}) (\\d+), (\\d+)`, 'iu');

function formatDate(year: string, monthName: string, day: string): string | null {
  const month = MONTH_LOOKUP.get(monthName.toLowerCase());
  if (month === undefined) {
    return null;
  }

  return `${year}-${String(month).padStart(2, '0')}-${String(Number(day)).padStart(2, '0')}`;
}

/**
 * Parse a raw date string. On failure the input comes back unchanged.
 */
export function parseDate(raw: string): DateParseResult {
  const dayFirst = DAY_FIRST.exec(raw);
  if (dayFirst) {
    const [, day = '', monthName = '', year = ''] = dayFirst;
    const value = formatDate(year, monthName, day);
    if (value) {
      return { ok: true, value };
    }
  }

  const monthFirst = MONTH_FIRST.exec(raw);
  if (monthFirst) {
    const [, monthName = '', day = '', year = ''] = monthFirst;
    const value = formatDate(year, monthName, day);
    if (value) {
      return { ok: true, value };
    }
  }

  return { ok: false, value: raw };
}

/**
 * Parse a raw date, reporting strings that match neither layout
 */
export function normalizeDate(raw: string, reporter?: ExtractionReporter): string {
  const result = parseDate(raw);

  if (!result.ok) {
    reporter?.report({ type: 'date-unparsed', raw });
  }

  return result.value;
}
