/**
 * Formatting utilities for CLI output.
 *
 * Turns library results (Decimals, Outcomes, tagged issue records) into the
 * JSON shapes of `./types.ts` and into one-line warning messages.
 */

import type { Decimal } from '../decimal.js';
import type { DisplayConfig } from '../config.js';
import { decStr, decStrRounded } from '../format/decimal.js';
import type { MappingIssue } from '../ledger/instrument-mapping.js';
import type { ParseIssue } from '../ledger/models.js';
import type { PreloadFailure } from '../market-data/price-series.js';
import type { Outcome } from '../outcome.js';
import type { HoldingValuation, SeriesIssue } from '../portfolio/models.js';
import type { HoldingOutput, IssueOutput } from './types.js';

export type AnyIssue = SeriesIssue | ParseIssue | PreloadFailure | MappingIssue;

/** Receives one warning line per reportable issue. */
export type WarningSink = (message: string) => void;

// ---------------------------------------------------------------------------
// Money
// ---------------------------------------------------------------------------

/** Render a reporting-currency amount, honoring `display.currency_decimals`. */
export function money(d: Decimal, display: DisplayConfig): string {
  return decStrRounded(d, display.currency_decimals);
}

export function outcomeMoney(value: Outcome<Decimal>, display: DisplayConfig): string | null {
  return value.kind === 'value' ? money(value.value, display) : null;
}

function optionalStr(d: Decimal | undefined): string | null {
  return d === undefined ? null : decStr(d);
}

// ---------------------------------------------------------------------------
// Issues
// ---------------------------------------------------------------------------

export function issueOutput(issue: AnyIssue): IssueOutput {
  switch (issue.type) {
    case 'parse_error':
      return {
        type: issue.type,
        row: issue.row,
        message: issue.column !== undefined ? `${issue.column}: ${issue.message}` : issue.message,
      };
    case 'mapping_error':
      return { type: issue.type, instrument_key: issue.instrument_key, message: issue.message };
    case 'price_gap':
      return {
        type: issue.type,
        date: issue.date,
        instrument_key: issue.instrument_key,
        message: `${issue.ticker}: ${issue.reason}`,
      };
    case 'fx_gap':
      return { type: issue.type, date: issue.date, instrument_key: issue.instrument_key, message: issue.reason };
    case 'consistency_warning':
      return {
        type: issue.type,
        date: issue.date,
        message: `running balance ${decStr(issue.running_balance)} differs from delta sum ${decStr(issue.delta_sum)} by ${decStr(issue.difference)}`,
      };
    case 'preload_failure':
      return { type: issue.type, message: `${issue.key}: ${issue.message}` };
  }
}

/** One line per issue, e.g. "price_gap 2024-01-05 XYZ: no price series for XYZ". */
export function issueMessage(issue: IssueOutput): string {
  const parts: string[] = [issue.type];
  if (issue.row !== undefined) parts.push(`row ${String(issue.row)}`);
  if (issue.date !== undefined) parts.push(issue.date);
  if (issue.instrument_key !== undefined) parts.push(issue.instrument_key);
  return `${parts.join(' ')}: ${issue.message}`;
}

export function reportIssues(issues: readonly IssueOutput[], warn: WarningSink | undefined): void {
  if (warn === undefined) return;
  for (const issue of issues) {
    warn(issueMessage(issue));
  }
}

// ---------------------------------------------------------------------------
// Holdings
// ---------------------------------------------------------------------------

export function holdingOutput(h: HoldingValuation, display: DisplayConfig): HoldingOutput {
  return {
    instrument_key: h.instrument_key,
    ticker: h.ticker ?? null,
    quantity: decStr(h.quantity),
    price: optionalStr(h.price),
    priced_date: h.priced_date ?? null,
    currency: h.currency ?? null,
    fx_rate: optionalStr(h.fx_rate),
    fx_date: h.fx_date ?? null,
    value: outcomeMoney(h.value, display),
  };
}
