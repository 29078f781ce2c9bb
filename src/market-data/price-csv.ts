/**
 * Import of downloaded history files (`Date,Close` CSV) into a
 * MarketDataStore.
 *
 * Dates are ISO ("YYYY-MM-DD") and values use point decimals, the way
 * market data downloads write them.
 */

import Papa from 'papaparse';

import type { Clock } from '../clock.js';
import { SystemClock } from '../clock.js';
import { isValidYmd } from '../dates.js';
import { parsePlainDecimal } from '../format/locale-number.js';
import type { FxRatePoint, PricePoint } from './models.js';
import type { MarketDataStore } from './store.js';

export interface HistoryCsvRow {
  readonly date: string;
  readonly value: string;
}

export interface HistoryCsvIssue {
  readonly row: number;
  readonly message: string;
}

export interface HistoryCsv {
  readonly rows: HistoryCsvRow[];
  readonly issues: HistoryCsvIssue[];
}

const VALUE_COLUMNS = ['close', 'adj close', 'price', 'rate'];

/**
 * Parse a history CSV with a `Date` column and a value column (`Close`,
 * `Adj Close`, `Price` or `Rate`, matched case-insensitively, first wins).
 *
 * @throws {Error} when either column is missing.
 */
export function parseHistoryCsv(text: string): HistoryCsv {
  const parsed = Papa.parse<Record<string, string | undefined>>(text, {
    header: true,
    skipEmptyLines: 'greedy',
    transformHeader: (h) => h.trim(),
  });
  const fields = parsed.meta.fields ?? [];
  const dateField = fields.find((f) => f.toLowerCase() === 'date');
  const valueField = VALUE_COLUMNS.map((name) => fields.find((f) => f.toLowerCase() === name)).find(
    (f) => f !== undefined,
  );
  if (dateField === undefined || valueField === undefined) {
    throw new Error(
      `History CSV needs a Date column and one of Close, Adj Close, Price, Rate. Found: ${fields.join(', ')}`,
    );
  }

  const rows: HistoryCsvRow[] = [];
  const issues: HistoryCsvIssue[] = [];
  parsed.data.forEach((record, i) => {
    const row = i + 1;
    const date = record[dateField]?.trim() ?? '';
    if (!isValidYmd(date)) {
      issues.push({ row, message: `invalid date: '${date}'` });
      return;
    }
    const raw = record[valueField]?.trim() ?? '';
    const value = parsePlainDecimal(raw);
    if (value.kind === 'unavailable') {
      issues.push({ row, message: value.reason });
      return;
    }
    if (!value.value.gt(0)) {
      issues.push({ row, message: `non-positive value: '${raw}'` });
      return;
    }
    rows.push({ date, value: value.value.toFixed() });
  });
  return { rows, issues };
}

export interface ImportResult {
  readonly imported: number;
  readonly issues: HistoryCsvIssue[];
}

export interface ImportOptions {
  source?: string;
  clock?: Clock;
}

/** Parse a price history CSV and append it to the store. */
export async function importPriceCsv(
  store: MarketDataStore,
  ticker: string,
  currency: string,
  text: string,
  options: ImportOptions = {},
): Promise<ImportResult> {
  const { rows, issues } = parseHistoryCsv(text);
  const timestamp = (options.clock ?? new SystemClock()).now();
  const points: PricePoint[] = rows.map((r) => ({
    ticker,
    as_of_date: r.date,
    timestamp,
    price: r.value,
    quote_currency: currency.trim().toUpperCase(),
    source: options.source ?? 'csv',
  }));
  await store.put_prices(points);
  return { imported: points.length, issues };
}

/** Parse an FX history CSV (units of `quote` per `base`) and append it. */
export async function importFxCsv(
  store: MarketDataStore,
  base: string,
  quote: string,
  text: string,
  options: ImportOptions = {},
): Promise<ImportResult> {
  const { rows, issues } = parseHistoryCsv(text);
  const timestamp = (options.clock ?? new SystemClock()).now();
  const points: FxRatePoint[] = rows.map((r) => ({
    base: base.trim().toUpperCase(),
    quote: quote.trim().toUpperCase(),
    as_of_date: r.date,
    timestamp,
    rate: r.value,
    source: options.source ?? 'csv',
  }));
  await store.put_fx_rates(points);
  return { imported: points.length, issues };
}
