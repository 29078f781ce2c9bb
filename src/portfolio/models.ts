/**
 * Portfolio model types.
 *
 * Snapshots and valuations are derived values: produced fresh per query
 * and never stored or mutated.
 */

import { Decimal } from '../decimal.js';
import type { MappingIssue } from '../ledger/instrument-mapping.js';
import type { PreloadFailure } from '../market-data/price-series.js';
import type { Outcome } from '../outcome.js';
import type { Frequency } from './date-grid.js';

// ---------------------------------------------------------------------------
// Snapshot
// ---------------------------------------------------------------------------

/** Where a snapshot's cash figure came from. */
export type CashSource = 'running_balance' | 'delta_sum' | 'empty';

export interface ConsistencyWarning {
  readonly type: 'consistency_warning';
  readonly date: string;
  readonly running_balance: Decimal;
  readonly delta_sum: Decimal;
  /** running_balance - delta_sum. */
  readonly difference: Decimal;
}

export interface PortfolioSnapshot {
  readonly date: string;
  readonly cash_balance: Decimal;
  readonly cash_source: CashSource;
  /** Sum of cash deltas through `date`, reported next to the authoritative figure. */
  readonly delta_cash: Decimal;
  /** Keys traded on or before `date`; a sold-out key stays with quantity 0. */
  readonly holdings: ReadonlyMap<string, Decimal>;
  readonly cumulative_deposits: Decimal;
  readonly warnings: readonly ConsistencyWarning[];
}

/** Quantity held of `key`; 0 for a key never traded by the snapshot date. */
export function holdingOf(snapshot: PortfolioSnapshot, key: string): Decimal {
  return snapshot.holdings.get(key) ?? new Decimal(0);
}

// ---------------------------------------------------------------------------
// Valuation
// ---------------------------------------------------------------------------

export interface PriceGap {
  readonly type: 'price_gap';
  readonly instrument_key: string;
  readonly ticker: string;
  readonly date: string;
  readonly reason: string;
}

export interface FxGap {
  readonly type: 'fx_gap';
  readonly instrument_key: string;
  readonly currency: string;
  readonly date: string;
  readonly reason: string;
}

export type ValuationIssue = MappingIssue | PriceGap | FxGap;

export interface HoldingValuation {
  readonly instrument_key: string;
  readonly ticker?: string;
  readonly quantity: Decimal;
  readonly price?: Decimal;
  readonly priced_date?: string;
  /** Quote currency of the instrument. */
  readonly currency?: string;
  readonly fx_rate?: Decimal;
  readonly fx_date?: string;
  /** Value in the reporting currency. */
  readonly value: Outcome<Decimal>;
}

export interface PortfolioValuation {
  readonly snapshot: PortfolioSnapshot;
  readonly holdings: readonly HoldingValuation[];
  /** Cash plus every holding's value; unavailable when any holding is. */
  readonly total_value: Outcome<Decimal>;
  readonly issues: readonly ValuationIssue[];
}

// ---------------------------------------------------------------------------
// Series
// ---------------------------------------------------------------------------

export type SeriesIssue = ValuationIssue | ConsistencyWarning;

export interface SeriesPoint {
  readonly date: string;
  readonly total_value: Outcome<Decimal>;
  readonly cash: Decimal;
  readonly deposits: Decimal;
  readonly holdings_breakdown: readonly HoldingValuation[];
  readonly issues: readonly SeriesIssue[];
  /** Percent change from the previous grid point; null when either total is unavailable. */
  readonly return_pct: Decimal | null;
  /** (total - deposits) / deposits * 100; null without a total or positive deposits. */
  readonly gain_on_deposits_pct: Decimal | null;
}

export interface SeriesSummary {
  readonly first_date: string | null;
  readonly first_value: Decimal | null;
  readonly last_date: string | null;
  readonly last_value: Decimal | null;
  readonly absolute_change: Decimal | null;
  readonly percentage_change: Decimal | null;
  readonly final_deposits: Decimal;
  /** Last available total minus deposits at that date. */
  readonly net_gain: Decimal | null;
  readonly gap_count: number;
  /** Chained product of the per-point returns, in percent. */
  readonly time_weighted_return_pct: Decimal | null;
}

export interface PortfolioSeries {
  readonly start: string;
  readonly end: string;
  readonly frequency: Frequency;
  readonly reporting_currency: string;
  readonly points: readonly SeriesPoint[];
  readonly summary: SeriesSummary;
  readonly mapping_errors: readonly MappingIssue[];
  readonly preload_failures: readonly PreloadFailure[];
  readonly warnings: readonly ConsistencyWarning[];
}
