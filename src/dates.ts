/**
 * Calendar-date helpers on "YYYY-MM-DD" strings.
 *
 * Dates are plain calendar days with no time zone; they compare correctly as
 * strings, and arithmetic goes through UTC midnight.
 */

import { type Outcome, available, unavailable } from './outcome.js';

const YMD_REGEX = /^(\d{4})-(\d{2})-(\d{2})$/;
const MS_PER_DAY = 24 * 60 * 60 * 1000;

export type LedgerDateFormat = 'DD-MM-YYYY' | 'YYYY-MM-DD' | 'DD/MM/YYYY' | 'MM/DD/YYYY';

export const LEDGER_DATE_FORMATS: readonly LedgerDateFormat[] = [
  'DD-MM-YYYY',
  'YYYY-MM-DD',
  'DD/MM/YYYY',
  'MM/DD/YYYY',
];

export function isLedgerDateFormat(value: string): value is LedgerDateFormat {
  return (LEDGER_DATE_FORMATS as readonly string[]).includes(value);
}

/** Format a Date as "YYYY-MM-DD" (UTC). */
export function formatDateYMD(d: Date): string {
  return d.toISOString().slice(0, 10);
}

function ymd(year: number, month: number, day: number): string | null {
  const parsed = new Date(Date.UTC(year, month - 1, day));
  if (
    parsed.getUTCFullYear() !== year ||
    parsed.getUTCMonth() !== month - 1 ||
    parsed.getUTCDate() !== day
  ) {
    return null;
  }
  return formatDateYMD(parsed);
}

/** True when `value` is a real calendar date in "YYYY-MM-DD" form. */
export function isValidYmd(value: string): boolean {
  const match = YMD_REGEX.exec(value);
  if (match === null) return false;
  return ymd(Number(match[1]), Number(match[2]), Number(match[3])) !== null;
}

/**
 * Validate a user-supplied "YYYY-MM-DD" date.
 *
 * @throws {Error} when the value is not a real calendar date.
 */
export function parseYmdOrThrow(value: string, kind: string): string {
  const trimmed = value.trim();
  if (!isValidYmd(trimmed)) {
    throw new Error(`Invalid ${kind} date: ${value}`);
  }
  return trimmed;
}

function toUtc(value: string): Date {
  return new Date(value + 'T00:00:00Z');
}

export function addDays(value: string, days: number): string {
  const d = toUtc(value);
  d.setUTCDate(d.getUTCDate() + days);
  return formatDateYMD(d);
}

/** Whole days from `a` to `b` (negative when `b` is earlier). */
export function daysBetween(a: string, b: string): number {
  return Math.round((toUtc(b).getTime() - toUtc(a).getTime()) / MS_PER_DAY);
}

/** 0 = Sunday … 6 = Saturday. */
export function dayOfWeek(value: string): number {
  return toUtc(value).getUTCDay();
}

export function daysInMonth(year: number, month: number): number {
  return new Date(Date.UTC(year, month, 0)).getUTCDate();
}

export function monthEnd(value: string): string {
  const year = Number(value.slice(0, 4));
  const month = Number(value.slice(5, 7));
  return `${value.slice(0, 7)}-${String(daysInMonth(year, month)).padStart(2, '0')}`;
}

export function yearEnd(value: string): string {
  return `${value.slice(0, 4)}-12-31`;
}

/**
 * Parse a date as written in a ledger export into "YYYY-MM-DD".
 */
export function parseLedgerDate(raw: string, format: LedgerDateFormat): Outcome<string> {
  const trimmed = raw.trim();
  if (trimmed === '') {
    return unavailable('empty date');
  }

  let parts: RegExpExecArray | null;
  let year: number;
  let month: number;
  let day: number;
  switch (format) {
    case 'YYYY-MM-DD':
      parts = /^(\d{4})-(\d{1,2})-(\d{1,2})$/.exec(trimmed);
      if (parts === null) break;
      [year, month, day] = [Number(parts[1]), Number(parts[2]), Number(parts[3])];
      return checked(trimmed, year, month, day);
    case 'DD-MM-YYYY':
    case 'DD/MM/YYYY':
      parts = (format === 'DD-MM-YYYY' ? /^(\d{1,2})-(\d{1,2})-(\d{4})$/ : /^(\d{1,2})\/(\d{1,2})\/(\d{4})$/).exec(
        trimmed,
      );
      if (parts === null) break;
      [day, month, year] = [Number(parts[1]), Number(parts[2]), Number(parts[3])];
      return checked(trimmed, year, month, day);
    case 'MM/DD/YYYY':
      parts = /^(\d{1,2})\/(\d{1,2})\/(\d{4})$/.exec(trimmed);
      if (parts === null) break;
      [month, day, year] = [Number(parts[1]), Number(parts[2]), Number(parts[3])];
      return checked(trimmed, year, month, day);
  }
  return unavailable(`date '${trimmed}' does not match ${format}`);
}

function checked(raw: string, year: number, month: number, day: number): Outcome<string> {
  const value = ymd(year, month, day);
  return value === null ? unavailable(`not a calendar date: '${raw}'`) : available(value);
}
