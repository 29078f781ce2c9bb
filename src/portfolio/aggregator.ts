/**
 * Time-series aggregator.
 *
 * Drives the state calculator and the valuation step across a date grid.
 * Price and FX history is preloaded once for the whole range into sealed
 * stores; the per-date loop only reads them.
 */

import { Decimal } from '../decimal.js';
import { addDays, parseYmdOrThrow } from '../dates.js';
import {
  type InstrumentMapping,
  type MappingIssue,
  instrumentCurrency,
  lookupInstrument,
  validateCoverage,
} from '../ledger/instrument-mapping.js';
import type { Ledger } from '../ledger/models.js';
import { CurrencyNormalizer } from '../market-data/currency.js';
import {
  type PreloadFailure,
  type PriceRequest,
  type RejectedObservation,
  PriceSeriesStore,
} from '../market-data/price-series.js';
import type { HistorySource } from '../market-data/sources.js';
import { type CalculatorOptions, PortfolioStateCalculator } from './calculator.js';
import { type Frequency, buildDateGrid } from './date-grid.js';
import type {
  ConsistencyWarning,
  PortfolioSeries,
  PortfolioValuation,
  SeriesPoint,
  SeriesSummary,
} from './models.js';
import { type ValuationContext, valueSnapshot } from './valuation.js';

// ---------------------------------------------------------------------------
// Options
// ---------------------------------------------------------------------------

export interface AggregatorOptions extends CalculatorOptions {
  /** Quote currency of foreign instruments whose mapping names none. */
  foreign_currency: string;
  /** Days of history fetched before the first needed date. */
  lookback_days?: number;
  /** Prices and rates older than this at a query date count as missing. */
  max_age_days?: number;
}

/** Sealed stores plus what went wrong while filling them. */
export interface PreparedValuation {
  readonly context: ValuationContext;
  readonly mapping_errors: readonly MappingIssue[];
  readonly preload_failures: readonly PreloadFailure[];
  readonly rejected: readonly RejectedObservation[];
}

const HUNDRED = new Decimal(100);
const DEFAULT_LOOKBACK_DAYS = 7;

// ---------------------------------------------------------------------------
// TimeSeriesAggregator
// ---------------------------------------------------------------------------

export class TimeSeriesAggregator {
  private readonly ledger: Ledger;
  private readonly mapping: InstrumentMapping;
  private readonly source: HistorySource;
  private readonly options: AggregatorOptions;
  private readonly calculator: PortfolioStateCalculator;

  constructor(ledger: Ledger, mapping: InstrumentMapping, source: HistorySource, options: AggregatorOptions) {
    this.ledger = ledger;
    this.mapping = mapping;
    this.source = source;
    this.options = options;
    this.calculator = new PortfolioStateCalculator(ledger, options);
  }

  /**
   * Check mapping coverage, then preload and seal price and FX series
   * covering `start`..`end`.
   *
   * History is fetched from `lookback_days` before the first trade date
   * (or `start`, when earlier), so the first trade date and the first grid
   * point can carry an older close or rate forward.
   */
  async prepare(start: string, end: string): Promise<PreparedValuation> {
    const reporting = this.ledger.reporting_currency;
    const mappingErrors = validateCoverage(this.mapping, this.ledger.instrument_keys);

    const requests: PriceRequest[] = [];
    const currencies = new Set<string>();
    for (const key of this.ledger.instrument_keys) {
      const entry = lookupInstrument(this.mapping, key);
      if (entry === undefined) continue;
      const currency = instrumentCurrency(entry, reporting, this.options.foreign_currency);
      requests.push({ ticker: entry.ticker, currency });
      currencies.add(currency);
    }

    const firstTrade = this.ledger.trade_events[0]?.date;
    const firstNeeded = firstTrade !== undefined && firstTrade < start ? firstTrade : start;
    const from = addDays(firstNeeded, -(this.options.lookback_days ?? DEFAULT_LOOKBACK_DAYS));

    const storeOptions = { max_age_days: this.options.max_age_days };
    const prices = new PriceSeriesStore(storeOptions);
    const fx = new CurrencyNormalizer(reporting, storeOptions);
    const priceReport = await prices.preload(this.source, requests, from, end);
    const fxReport = await fx.preload(this.source, currencies, from, end);
    prices.seal();
    fx.seal();

    return {
      context: {
        mapping: this.mapping,
        prices,
        currency: fx,
        foreign_currency: this.options.foreign_currency,
      },
      mapping_errors: mappingErrors,
      preload_failures: [...priceReport.failures, ...fxReport.failures],
      rejected: [...priceReport.rejected, ...fxReport.rejected],
    };
  }

  /** Snapshot and valuation at a single date. */
  async valueAt(date: string): Promise<PortfolioValuation & Omit<PreparedValuation, 'context'>> {
    const asOf = parseYmdOrThrow(date, 'valuation');
    const prepared = await this.prepare(asOf, asOf);
    const valuation = valueSnapshot(this.calculator.snapshot(asOf), prepared.context);
    return {
      ...valuation,
      mapping_errors: prepared.mapping_errors,
      preload_failures: prepared.preload_failures,
      rejected: prepared.rejected,
    };
  }

  /**
   * Value the portfolio on every grid date between `start` and `end`.
   *
   * @throws {Error} for invalid dates or `start` after `end`.
   */
  async buildSeries(start: string, end: string, frequency: Frequency): Promise<PortfolioSeries> {
    const grid = buildDateGrid(start, end, frequency);
    const prepared = await this.prepare(grid[0], grid[grid.length - 1]);

    const points: SeriesPoint[] = [];
    const warnings: ConsistencyWarning[] = [];
    for (const date of grid) {
      const snapshot = this.calculator.snapshot(date);
      const valuation = valueSnapshot(snapshot, prepared.context);
      warnings.push(...snapshot.warnings);
      points.push(toPoint(valuation, points[points.length - 1]));
    }

    return {
      start: grid[0],
      end: grid[grid.length - 1],
      frequency,
      reporting_currency: this.ledger.reporting_currency,
      points,
      summary: summarize(points),
      mapping_errors: prepared.mapping_errors,
      preload_failures: prepared.preload_failures,
      warnings,
    };
  }
}

// ---------------------------------------------------------------------------
// Points and summary
// ---------------------------------------------------------------------------

function toPoint(valuation: PortfolioValuation, previous: SeriesPoint | undefined): SeriesPoint {
  const { snapshot, total_value: total } = valuation;
  const deposits = snapshot.cumulative_deposits;

  let returnPct: Decimal | null = null;
  if (
    total.kind === 'value' &&
    previous !== undefined &&
    previous.total_value.kind === 'value' &&
    !previous.total_value.value.isZero()
  ) {
    const prior = previous.total_value.value;
    const flow = deposits.minus(previous.deposits);
    returnPct = total.value.minus(prior).minus(flow).div(prior).mul(HUNDRED);
  }

  const gainOnDeposits =
    total.kind === 'value' && deposits.gt(0) ? total.value.minus(deposits).div(deposits).mul(HUNDRED) : null;

  return {
    date: snapshot.date,
    total_value: total,
    cash: snapshot.cash_balance,
    deposits,
    holdings_breakdown: valuation.holdings,
    issues: [...snapshot.warnings, ...valuation.issues],
    return_pct: returnPct,
    gain_on_deposits_pct: gainOnDeposits,
  };
}

export function summarize(points: readonly SeriesPoint[]): SeriesSummary {
  const valued: Array<{ point: SeriesPoint; value: Decimal }> = [];
  for (const point of points) {
    if (point.total_value.kind === 'value') {
      valued.push({ point, value: point.total_value.value });
    }
  }

  const first = valued[0];
  const last = valued[valued.length - 1];
  const finalDeposits = points[points.length - 1]?.deposits ?? new Decimal(0);

  let growth: Decimal | null = null;
  for (const point of points) {
    if (point.return_pct === null) continue;
    const factor = point.return_pct.div(HUNDRED).plus(1);
    growth = growth === null ? factor : growth.mul(factor);
  }

  return {
    first_date: first?.point.date ?? null,
    first_value: first?.value ?? null,
    last_date: last?.point.date ?? null,
    last_value: last?.value ?? null,
    absolute_change: first !== undefined && last !== undefined ? last.value.minus(first.value) : null,
    percentage_change:
      first !== undefined && last !== undefined && !first.value.isZero()
        ? last.value.minus(first.value).div(first.value).mul(HUNDRED)
        : null,
    final_deposits: finalDeposits,
    net_gain: last !== undefined ? last.value.minus(last.point.deposits) : null,
    gap_count: points.length - valued.length,
    time_weighted_return_pct: growth === null ? null : growth.minus(1).mul(HUNDRED),
  };
}
