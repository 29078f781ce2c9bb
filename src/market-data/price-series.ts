/**
 * Price series store.
 *
 * Holds per-key ascending observation series and answers as-of lookups:
 * the latest observation on or before a date, never a later one. The store
 * has two phases. During preload, history is fetched in bulk and loaded;
 * `seal()` then ends the write phase and every further write throws.
 *
 * `AsOfSeries` is the keyed implementation shared by close prices (keyed by
 * ticker) and FX rates (keyed by `BASE/QUOTE`).
 */

import { Decimal } from '../decimal.js';
import { daysBetween } from '../dates.js';
import { parsePlainDecimal } from '../format/locale-number.js';
import { type Outcome, available, unavailable } from '../outcome.js';
import type { PricePoint } from './models.js';
import type { HistorySource } from './sources.js';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface Observation {
  readonly date: string;
  readonly value: Decimal;
}

export interface ObservationInput {
  readonly date: string;
  readonly value: string | Decimal;
}

export interface RejectedObservation {
  readonly key: string;
  readonly date: string;
  readonly raw: string;
  readonly reason: string;
}

export interface PreloadFailure {
  readonly type: 'preload_failure';
  readonly key: string;
  readonly message: string;
}

export interface PreloadReport {
  /** Observations accepted per key. */
  readonly loaded: ReadonlyMap<string, number>;
  readonly rejected: readonly RejectedObservation[];
  readonly failures: readonly PreloadFailure[];
}

export interface SeriesStoreOptions {
  /** Observations older than this many days at lookup time are unavailable. */
  max_age_days?: number;
}

export class SealedStoreError extends Error {
  constructor(key: string) {
    super(`Cannot load '${key}': store is sealed`);
    this.name = 'SealedStoreError';
  }
}

// ---------------------------------------------------------------------------
// AsOfSeries
// ---------------------------------------------------------------------------

function validate(key: string, input: ObservationInput): Outcome<Decimal> {
  let value: Decimal;
  if (typeof input.value === 'string') {
    const parsed = parsePlainDecimal(input.value);
    if (parsed.kind === 'unavailable') return parsed;
    value = parsed.value;
  } else {
    value = input.value;
  }
  if (!value.isFinite()) {
    return unavailable(`non-finite value for ${key}`);
  }
  if (!value.gt(0)) {
    return unavailable(`non-positive value for ${key}`);
  }
  return available(value);
}

export class AsOfSeries {
  readonly #label: string;
  readonly #maxAgeDays: number | undefined;
  readonly #series = new Map<string, Observation[]>();
  #sealed = false;

  constructor(label: string, options: SeriesStoreOptions = {}) {
    this.#label = label;
    this.#maxAgeDays = options.max_age_days;
  }

  get sealed(): boolean {
    return this.#sealed;
  }

  seal(): void {
    this.#sealed = true;
  }

  has(key: string): boolean {
    return this.#series.has(key);
  }

  keys(): string[] {
    return [...this.#series.keys()].sort();
  }

  /** Observations for `key`, ascending by date. */
  observations(key: string): readonly Observation[] {
    return this.#series.get(key) ?? [];
  }

  /**
   * Merge observations into the series for `key`.
   *
   * Invalid values (unparseable, non-finite or non-positive) are returned
   * as rejections. For a repeated date the last write wins.
   *
   * @throws {SealedStoreError} after `seal()`.
   */
  load(key: string, observations: Iterable<ObservationInput>): RejectedObservation[] {
    if (this.#sealed) {
      throw new SealedStoreError(key);
    }

    const byDate = new Map<string, Decimal>();
    for (const obs of this.#series.get(key) ?? []) {
      byDate.set(obs.date, obs.value);
    }

    const rejected: RejectedObservation[] = [];
    for (const input of observations) {
      const value = validate(key, input);
      if (value.kind === 'unavailable') {
        rejected.push({ key, date: input.date, raw: input.value.toString(), reason: value.reason });
        continue;
      }
      byDate.set(input.date, value.value);
    }

    const series = [...byDate.entries()]
      .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
      .map(([date, value]) => Object.freeze({ date, value }));
    this.#series.set(key, series);
    return rejected;
  }

  /** Latest observation with `date <= on`. */
  asOf(key: string, on: string): Outcome<Observation> {
    const series = this.#series.get(key);
    if (series === undefined || series.length === 0) {
      return unavailable(`no ${this.#label} series for ${key}`);
    }

    let lo = 0;
    let hi = series.length - 1;
    let found = -1;
    while (lo <= hi) {
      const mid = (lo + hi) >> 1;
      if (series[mid].date <= on) {
        found = mid;
        lo = mid + 1;
      } else {
        hi = mid - 1;
      }
    }

    if (found === -1) {
      return unavailable(`no ${this.#label} for ${key} on or before ${on}`);
    }

    const obs = series[found];
    if (this.#maxAgeDays !== undefined) {
      const age = daysBetween(obs.date, on);
      if (age > this.#maxAgeDays) {
        return unavailable(
          `${this.#label} for ${key} is ${String(age)} days old (limit ${String(this.#maxAgeDays)})`,
        );
      }
    }
    return available(obs);
  }
}

// ---------------------------------------------------------------------------
// PriceSeriesStore
// ---------------------------------------------------------------------------

export interface PriceRequest {
  readonly ticker: string;
  /** Expected quote currency; a series quoted in another one is refused. */
  readonly currency?: string;
}

export interface PriceQuote {
  readonly price: Decimal;
  readonly priced_date: string;
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

export class PriceSeriesStore {
  readonly #series: AsOfSeries;

  constructor(options: SeriesStoreOptions = {}) {
    this.#series = new AsOfSeries('price', options);
  }

  get sealed(): boolean {
    return this.#series.sealed;
  }

  tickers(): string[] {
    return this.#series.keys();
  }

  /** @throws {SealedStoreError} after `seal()`. */
  load(ticker: string, observations: Iterable<ObservationInput>): RejectedObservation[] {
    return this.#series.load(ticker, observations);
  }

  /**
   * Fetch each requested ticker's history once and load it.
   *
   * A fetch failure, or a series quoted in a currency other than the
   * requested one, is recorded for that ticker, which then has no
   * observations; it never aborts the preload.
   *
   * @throws {SealedStoreError} after `seal()`.
   */
  async preload(
    source: HistorySource,
    requests: readonly PriceRequest[],
    start: string,
    end: string,
  ): Promise<PreloadReport> {
    if (this.sealed) {
      throw new SealedStoreError(requests[0]?.ticker ?? 'prices');
    }

    const loaded = new Map<string, number>();
    const rejected: RejectedObservation[] = [];
    const failures: PreloadFailure[] = [];
    const seen = new Set<string>();

    for (const request of requests) {
      if (seen.has(request.ticker)) continue;
      seen.add(request.ticker);

      let points: PricePoint[];
      try {
        points = await source.fetchHistory(request.ticker, start, end);
      } catch (err: unknown) {
        failures.push({ type: 'preload_failure', key: request.ticker, message: errorMessage(err) });
        continue;
      }

      if (request.currency !== undefined) {
        const expected = request.currency.trim().toUpperCase();
        const other = points.find((p) => p.quote_currency !== '' && p.quote_currency.toUpperCase() !== expected);
        if (other !== undefined) {
          failures.push({
            type: 'preload_failure',
            key: request.ticker,
            message: `quoted in ${other.quote_currency.toUpperCase()}, expected ${expected}`,
          });
          continue;
        }
      }

      const bad = this.load(
        request.ticker,
        points.map((p) => ({ date: p.as_of_date, value: p.price })),
      );
      rejected.push(...bad);
      loaded.set(request.ticker, points.length - bad.length);
    }

    return { loaded, rejected, failures };
  }

  seal(): void {
    this.#series.seal();
  }

  /** Latest close on or before `date`; later prices are never returned. */
  priceAsOf(ticker: string, date: string): Outcome<PriceQuote> {
    const obs = this.#series.asOf(ticker, date);
    if (obs.kind === 'unavailable') return obs;
    return available({ price: obs.value.value, priced_date: obs.value.date });
  }
}
