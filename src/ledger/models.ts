/**
 * Ledger event types produced by the parser.
 *
 * A `Ledger` is an immutable value: the calculator and the aggregator only
 * read it, and no component writes the ledger file back.
 */

import type { Decimal } from '../decimal.js';

// ---------------------------------------------------------------------------
// Classification
// ---------------------------------------------------------------------------

/** Category of a ledger line, derived from its description. */
export type CashEventKind =
  | 'deposit'
  | 'dividend'
  | 'tax'
  | 'fee'
  | 'interest'
  | 'fx'
  | 'transfer'
  | 'trade'
  | 'other';

export type TradeCurrency = 'reporting' | 'foreign';

// ---------------------------------------------------------------------------
// Events
// ---------------------------------------------------------------------------

export interface CashEvent {
  /** 1-based data row number in the source file (header excluded). */
  readonly row: number;
  /** "YYYY-MM-DD". */
  readonly date: string;
  readonly time?: string;
  readonly description: string;
  readonly instrument_key?: string;
  readonly order_id?: string;
  readonly currency: string;
  readonly amount: Decimal;
  /** Balance after this line as recorded by the broker. */
  readonly running_balance?: Decimal;
  readonly balance_currency?: string;
  readonly kind: CashEventKind;
}

export interface TradeEvent {
  readonly row: number;
  readonly date: string;
  readonly time?: string;
  readonly instrument_key: string;
  readonly isin?: string;
  readonly order_id?: string;
  readonly description: string;
  /** Positive for buys, negative for sells. */
  readonly quantity_delta: Decimal;
  /** Execution price per unit in `currency`, when the description states it. */
  readonly price?: Decimal;
  readonly currency: string;
  readonly trade_currency: TradeCurrency;
}

// ---------------------------------------------------------------------------
// Issues
// ---------------------------------------------------------------------------

export interface ParseIssue {
  readonly type: 'parse_error';
  readonly row: number;
  readonly column?: string;
  readonly message: string;
  readonly raw?: string;
}

// ---------------------------------------------------------------------------
// Ledger
// ---------------------------------------------------------------------------

export interface Ledger {
  readonly reporting_currency: string;
  /** Ascending by date; same-date events in chronological source order. */
  readonly cash_events: readonly CashEvent[];
  readonly trade_events: readonly TradeEvent[];
  /** Distinct instrument keys seen in trades, sorted. */
  readonly instrument_keys: readonly string[];
  readonly issues: readonly ParseIssue[];
  readonly total_rows: number;
  readonly skipped_rows: number;
}

/**
 * Thrown when an export has no usable rows at all.
 *
 * Row-level problems never throw; they are collected as `ParseIssue`s.
 */
export class LedgerParseError extends Error {
  readonly issues: readonly ParseIssue[];

  constructor(message: string, issues: readonly ParseIssue[] = []) {
    super(message);
    this.name = 'LedgerParseError';
    this.issues = issues;
  }
}
