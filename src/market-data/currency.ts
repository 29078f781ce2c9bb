/**
 * Currency normalizer.
 *
 * Converts amounts into the reporting currency using as-of FX rates. Rates
 * live in an `AsOfSeries` keyed by `BASE/QUOTE`, with the same preload and
 * seal phases as the price store.
 */

import { Decimal } from '../decimal.js';
import { type Outcome, available, unavailable } from '../outcome.js';
import type { FxRatePoint } from './models.js';
import {
  type ObservationInput,
  type PreloadFailure,
  type PreloadReport,
  type RejectedObservation,
  type SeriesStoreOptions,
  AsOfSeries,
  SealedStoreError,
} from './price-series.js';
import type { HistorySource } from './sources.js';

export interface Conversion {
  readonly amount: Decimal;
  /** Reporting-currency units per unit of the source currency. */
  readonly rate: Decimal;
  readonly rate_date: string;
}

export function pairKey(base: string, quote: string): string {
  return `${base.trim().toUpperCase()}/${quote.trim().toUpperCase()}`;
}

export class CurrencyNormalizer {
  readonly reportingCurrency: string;
  readonly #rates: AsOfSeries;

  constructor(reportingCurrency: string, options: SeriesStoreOptions = {}) {
    this.reportingCurrency = reportingCurrency.trim().toUpperCase();
    this.#rates = new AsOfSeries('FX rate', options);
  }

  get sealed(): boolean {
    return this.#rates.sealed;
  }

  pairs(): string[] {
    return this.#rates.keys();
  }

  /**
   * Load rates quoted as units of `quote` per `base`.
   *
   * @throws {SealedStoreError} after `seal()`.
   */
  load(base: string, quote: string, observations: Iterable<ObservationInput>): RejectedObservation[] {
    return this.#rates.load(pairKey(base, quote), observations);
  }

  /**
   * Fetch FX history for each currency against the reporting currency.
   *
   * The direct pair `CUR/REPORTING` is tried first and the inverse pair
   * only when the direct one yields nothing. Failures are recorded, not
   * thrown, when neither pair produced data.
   *
   * @throws {SealedStoreError} after `seal()`.
   */
  async preload(
    source: HistorySource,
    currencies: Iterable<string>,
    start: string,
    end: string,
  ): Promise<PreloadReport> {
    if (this.sealed) {
      throw new SealedStoreError('fx');
    }

    const loaded = new Map<string, number>();
    const rejected: RejectedObservation[] = [];
    const failures: PreloadFailure[] = [];
    const wanted = new Set([...currencies].map((c) => c.trim().toUpperCase()));
    wanted.delete(this.reportingCurrency);

    for (const currency of [...wanted].sort()) {
      const attemptFailures: PreloadFailure[] = [];
      for (const [base, quote] of [
        [currency, this.reportingCurrency],
        [this.reportingCurrency, currency],
      ]) {
        const key = pairKey(base, quote);
        let points: FxRatePoint[];
        try {
          points = await source.fetchFxHistory(base, quote, start, end);
        } catch (err: unknown) {
          attemptFailures.push({
            type: 'preload_failure',
            key,
            message: err instanceof Error ? err.message : String(err),
          });
          continue;
        }
        if (points.length === 0) continue;

        const bad = this.load(
          base,
          quote,
          points.map((p) => ({ date: p.as_of_date, value: p.rate })),
        );
        rejected.push(...bad);
        loaded.set(key, points.length - bad.length);
        attemptFailures.length = 0;
        break;
      }
      failures.push(...attemptFailures);
    }

    return { loaded, rejected, failures };
  }

  seal(): void {
    this.#rates.seal();
  }

  /** As-of rate in reporting-currency units per unit of `sourceCurrency`. */
  rateAsOf(sourceCurrency: string, date: string): Outcome<{ rate: Decimal; rate_date: string }> {
    const source = sourceCurrency.trim().toUpperCase();
    if (source === this.reportingCurrency) {
      return available({ rate: new Decimal(1), rate_date: date });
    }

    const direct = this.#rates.asOf(pairKey(source, this.reportingCurrency), date);
    if (direct.kind === 'value') {
      return available({ rate: direct.value.value, rate_date: direct.value.date });
    }

    const inverse = this.#rates.asOf(pairKey(this.reportingCurrency, source), date);
    if (inverse.kind === 'value') {
      return available({
        rate: new Decimal(1).div(inverse.value.value),
        rate_date: inverse.value.date,
      });
    }

    return unavailable(`no FX rate ${source}/${this.reportingCurrency} on or before ${date}`);
  }

  /**
   * Convert `amount` into the reporting currency as of `date`.
   *
   * Same-currency input is returned unchanged without a lookup.
   */
  toReportingCurrency(amount: Decimal, sourceCurrency: string, date: string): Outcome<Conversion> {
    const rate = this.rateAsOf(sourceCurrency, date);
    if (rate.kind === 'unavailable') return rate;
    if (sourceCurrency.trim().toUpperCase() === this.reportingCurrency) {
      return available({ amount, rate: rate.value.rate, rate_date: rate.value.rate_date });
    }
    return available({
      amount: amount.mul(rate.value.rate),
      rate: rate.value.rate,
      rate_date: rate.value.rate_date,
    });
  }
}
