/**
 * `snapshot` and `history` commands.
 */

import type { ResolvedConfig } from '../config.js';
import { type Clock, SystemClock } from '../clock.js';
import { parseYmdOrThrow } from '../dates.js';
import { durationToDays } from '../duration.js';
import { formatCurrencyDisplay, pctStr } from '../format/decimal.js';
import type { InstrumentMapping } from '../ledger/instrument-mapping.js';
import type { Ledger } from '../ledger/models.js';
import type { HistorySource } from '../market-data/sources.js';
import { type AggregatorOptions, TimeSeriesAggregator } from '../portfolio/aggregator.js';
import { calculatorOptionsFromConfig } from '../portfolio/calculator.js';
import { parseFrequency } from '../portfolio/date-grid.js';
import type { PortfolioSeries } from '../portfolio/models.js';
import { writeHistoryCsv } from './export.js';
import {
  type WarningSink,
  holdingOutput,
  issueOutput,
  money,
  outcomeMoney,
  reportIssues,
} from './format.js';
import { firstLedgerDate, loadLedger, loadMapping } from './ledger.js';
import type { HistoryOutput, IssueOutput, SnapshotOutput } from './types.js';

// ---------------------------------------------------------------------------
// Shared
// ---------------------------------------------------------------------------

export function aggregatorOptions(config: ResolvedConfig): AggregatorOptions {
  const maxAge = config.market_data.max_price_age;
  return {
    ...calculatorOptionsFromConfig(config.cash),
    foreign_currency: config.market_data.foreign_currency,
    lookback_days: durationToDays(config.market_data.lookback),
    max_age_days: maxAge !== undefined ? durationToDays(maxAge) : undefined,
  };
}

function hasDisplaySettings(config: ResolvedConfig): boolean {
  return Object.values(config.display).some((v) => v !== undefined);
}

async function loadInputs(
  config: ResolvedConfig,
): Promise<{ ledger: Ledger; mapping: InstrumentMapping; parseIssues: IssueOutput[] }> {
  const ledger = await loadLedger(config);
  const mapping = await loadMapping(config);
  return { ledger, mapping, parseIssues: ledger.issues.map(issueOutput) };
}

// ---------------------------------------------------------------------------
// snapshot
// ---------------------------------------------------------------------------

export interface SnapshotOptions {
  /** "YYYY-MM-DD"; defaults to today. */
  date?: string;
  warn?: WarningSink;
}

export async function portfolioSnapshot(
  config: ResolvedConfig,
  source: HistorySource,
  options: SnapshotOptions = {},
  clock?: Clock,
): Promise<SnapshotOutput> {
  const date = parseYmdOrThrow(options.date ?? (clock ?? new SystemClock()).today(), 'snapshot');
  const { ledger, mapping, parseIssues } = await loadInputs(config);

  const aggregator = new TimeSeriesAggregator(ledger, mapping, source, aggregatorOptions(config));
  const valuation = await aggregator.valueAt(date);
  const { snapshot } = valuation;

  // Coverage is checked for every ledger key, held on `date` or not.
  const issues: IssueOutput[] = [
    ...parseIssues,
    ...valuation.mapping_errors.map(issueOutput),
    ...valuation.preload_failures.map(issueOutput),
    ...snapshot.warnings.map(issueOutput),
    ...valuation.issues.filter((i) => i.type !== 'mapping_error').map(issueOutput),
  ];
  reportIssues(issues, options.warn);

  const output: SnapshotOutput = {
    date,
    currency: ledger.reporting_currency,
    cash_balance: money(snapshot.cash_balance, config.display),
    cash_source: snapshot.cash_source,
    delta_cash: money(snapshot.delta_cash, config.display),
    cumulative_deposits: money(snapshot.cumulative_deposits, config.display),
    total_value: outcomeMoney(valuation.total_value, config.display),
    holdings: valuation.holdings.map((h) => holdingOutput(h, config.display)),
    issues,
  };
  if (valuation.total_value.kind === 'value' && hasDisplaySettings(config)) {
    output.total_value_display = formatCurrencyDisplay(valuation.total_value.value, config.display);
  }
  return output;
}

// ---------------------------------------------------------------------------
// history
// ---------------------------------------------------------------------------

export interface HistoryOptions {
  /** Defaults to the first ledger date. */
  start?: string;
  /** Defaults to today. */
  end?: string;
  /** Defaults to `[history] frequency`. */
  frequency?: string;
  /** Also write the per-position CSV to this path. */
  csv?: string;
  warn?: WarningSink;
}

export async function portfolioHistory(
  config: ResolvedConfig,
  source: HistorySource,
  options: HistoryOptions = {},
  clock?: Clock,
): Promise<HistoryOutput> {
  const { ledger, mapping, parseIssues } = await loadInputs(config);
  const end = parseYmdOrThrow(options.end ?? (clock ?? new SystemClock()).today(), 'end');
  const startRaw = options.start ?? firstLedgerDate(ledger);
  if (startRaw === undefined) {
    throw new Error('Ledger has no events; pass --start');
  }
  const start = parseYmdOrThrow(startRaw, 'start');
  const frequency = parseFrequency(options.frequency ?? config.history.frequency);

  const aggregator = new TimeSeriesAggregator(ledger, mapping, source, aggregatorOptions(config));
  const series = await aggregator.buildSeries(start, end, frequency);

  const issues: IssueOutput[] = [
    ...parseIssues,
    ...series.mapping_errors.map(issueOutput),
    ...series.preload_failures.map(issueOutput),
    ...series.warnings.map(issueOutput),
  ];
  reportIssues(issues, options.warn);

  const output = historyOutput(series, config);
  output.issues = issues;
  if (options.csv !== undefined) {
    await writeHistoryCsv(options.csv, series);
    output.csv_file = options.csv;
  }
  return output;
}

export function historyOutput(series: PortfolioSeries, config: ResolvedConfig): HistoryOutput {
  const display = config.display;
  const s = series.summary;
  return {
    currency: series.reporting_currency,
    start: series.start,
    end: series.end,
    frequency: series.frequency,
    points: series.points.map((p) => {
      const gaps = p.holdings_breakdown.filter((h) => h.value.kind === 'unavailable').map((h) => h.instrument_key);
      return {
        date: p.date,
        total_value: outcomeMoney(p.total_value, display),
        cash: money(p.cash, display),
        deposits: money(p.deposits, display),
        return_pct: pctStr(p.return_pct),
        gain_on_deposits_pct: pctStr(p.gain_on_deposits_pct),
        ...(gaps.length > 0 ? { gaps } : {}),
      };
    }),
    summary: {
      first_date: s.first_date,
      first_value: s.first_value !== null ? money(s.first_value, display) : null,
      last_date: s.last_date,
      last_value: s.last_value !== null ? money(s.last_value, display) : null,
      absolute_change: s.absolute_change !== null ? money(s.absolute_change, display) : null,
      percentage_change: pctStr(s.percentage_change),
      final_deposits: money(s.final_deposits, display),
      net_gain: s.net_gain !== null ? money(s.net_gain, display) : null,
      gap_count: s.gap_count,
      time_weighted_return_pct: pctStr(s.time_weighted_return_pct),
    },
    issues: [],
  };
}
