/**
 * Decimal rendering for JSON and CSV output.
 *
 * Canonical output strings carry no trailing zeros ("1055.9", not
 * "1055.90"); display formatting is opt-in through `[display]` settings.
 */

import { Decimal } from '../decimal.js';
import type { DisplayConfig } from '../config.js';

/** Plain notation with trailing zeros stripped; "-0" becomes "0". */
export function decStr(d: Decimal): string {
  const s = d.toFixed();
  if (!s.includes('.')) return s === '-0' ? '0' : s;
  const trimmed = s.replace(/0+$/, '').replace(/\.$/, '');
  return trimmed === '-0' ? '0' : trimmed;
}

/** Round half-up to at most `dp` places, then {@link decStr}. */
export function decStrRounded(d: Decimal, dp: number | undefined): string {
  if (dp === undefined || !Number.isInteger(dp) || dp < 0) return decStr(d);
  return decStr(d.toDecimalPlaces(dp, Decimal.ROUND_HALF_UP));
}

/** Percentages are reported with two decimals. */
export function pctStr(d: Decimal | null): string | null {
  return d === null ? null : decStrRounded(d, 2);
}

function groupThousands(digits: string): string {
  return digits.replace(/\B(?=(\d{3})+(?!\d))/g, ',');
}

/**
 * Format a reporting-currency amount for people.
 *
 * Rounds to `currency_decimals`, pads to that many places when
 * `currency_fixed_decimals` is set, groups thousands with `,` when
 * `currency_grouping` is set, and puts the sign before the symbol
 * ("-€1,234.50").
 */
export function formatCurrencyDisplay(d: Decimal, opts: DisplayConfig): string {
  const dp = opts.currency_decimals;
  const rounded = dp !== undefined ? d.toDecimalPlaces(dp, Decimal.ROUND_HALF_UP) : d;
  const negative = rounded.isNeg() && !rounded.isZero();

  let s = opts.currency_fixed_decimals === true && dp !== undefined ? rounded.abs().toFixed(dp) : decStr(rounded.abs());
  if (opts.currency_grouping === true) {
    const dot = s.indexOf('.');
    s = dot === -1 ? groupThousands(s) : `${groupThousands(s.slice(0, dot))}${s.slice(dot)}`;
  }

  return `${negative ? '-' : ''}${opts.currency_symbol ?? ''}${s}`;
}
