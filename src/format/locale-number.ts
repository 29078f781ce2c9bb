/**
 * Parsing of locale-formatted numbers as found in brokerage exports.
 *
 * The exports write `,` as the decimal separator and `.` as an optional
 * thousands separator ("1.055,91", "-318,60"). Values are normalized to
 * point-decimal notation before conversion so that no row silently turns
 * into NaN.
 */

import { Decimal } from '../decimal.js';
import { type Outcome, available, unavailable } from '../outcome.js';

const LOCALE_NUMBER_REGEX = /^([+-]?)(\d{1,3}(?:\.\d{3})+|\d+)(?:,(\d+))?$/;

/**
 * Rewrite a locale-formatted number to point-decimal notation.
 *
 * Returns `null` when the input is blank or does not follow the locale
 * grammar: optional sign, integer digits with or without dot grouping, then
 * an optional comma fraction. Point-decimal input such as "1,234.56" does
 * not follow it and is rejected rather than guessed.
 */
export function normalizeLocaleNumber(raw: string): string | null {
  const compact = raw.trim().replace(/[\s ]/g, '');
  const match = LOCALE_NUMBER_REGEX.exec(compact);
  if (match === null) {
    return null;
  }
  const sign = match[1] === '-' ? '-' : '';
  const intPart = match[2].replace(/\./g, '');
  const fraction = match[3];
  return fraction === undefined ? `${sign}${intPart}` : `${sign}${intPart}.${fraction}`;
}

/** Parse a locale-formatted number into a Decimal. */
export function parseLocaleDecimal(raw: string): Outcome<Decimal> {
  if (raw.trim() === '') {
    return unavailable('empty value');
  }
  const normalized = normalizeLocaleNumber(raw);
  if (normalized === null) {
    return unavailable(`not a number: '${raw.trim()}'`);
  }
  return available(new Decimal(normalized));
}

/**
 * Parse a point-decimal number ("50.25", "-3", "1e3" is rejected).
 *
 * Used for price files, which are written with `.` decimals.
 */
export function parsePlainDecimal(raw: string): Outcome<Decimal> {
  const trimmed = raw.trim();
  if (trimmed === '') {
    return unavailable('empty value');
  }
  if (!/^[+-]?(\d+(\.\d*)?|\.\d+)$/.test(trimmed)) {
    return unavailable(`not a number: '${trimmed}'`);
  }
  return available(new Decimal(trimmed));
}
