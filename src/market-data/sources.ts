/**
 * History source interface and routers.
 *
 * A `HistorySource` returns a ticker's (or a currency pair's) observations
 * over a date range in one call. The network client that downloads price
 * history lives outside this package; anything that implements the
 * interface can feed the price series store.
 */

import type { MarketDataStore } from './store.js';
import { type PricePoint, type FxRatePoint, latestPerDate } from './models.js';

// ---------------------------------------------------------------------------
// HistorySource interface
// ---------------------------------------------------------------------------

export interface HistorySource {
  /** Close prices for `ticker` with `start <= as_of_date <= end`. */
  fetchHistory(ticker: string, start: string, end: string): Promise<PricePoint[]>;

  /** Rates quoted as units of `quote` per `base`, same range rules. */
  fetchFxHistory(base: string, quote: string, start: string, end: string): Promise<FxRatePoint[]>;

  name(): string;
}

// ---------------------------------------------------------------------------
// StoreHistorySource
// ---------------------------------------------------------------------------

/** Serves history out of a MarketDataStore, one observation per date. */
export class StoreHistorySource implements HistorySource {
  readonly #store: MarketDataStore;

  constructor(store: MarketDataStore) {
    this.#store = store;
  }

  async fetchHistory(ticker: string, start: string, end: string): Promise<PricePoint[]> {
    const all = await this.#store.get_all_prices(ticker);
    return latestPerDate(all.filter((p) => p.as_of_date >= start && p.as_of_date <= end));
  }

  async fetchFxHistory(
    base: string,
    quote: string,
    start: string,
    end: string,
  ): Promise<FxRatePoint[]> {
    const all = await this.#store.get_all_fx_rates(base, quote);
    return latestPerDate(all.filter((r) => r.as_of_date >= start && r.as_of_date <= end));
  }

  name(): string {
    return 'store';
  }
}

// ---------------------------------------------------------------------------
// HistorySourceRouter
// ---------------------------------------------------------------------------

/**
 * Tries multiple history sources in order and returns the first non-empty
 * result. A source that throws is skipped; if no source returns data and at
 * least one threw, the last error is rethrown.
 */
export class HistorySourceRouter implements HistorySource {
  readonly #sources: HistorySource[];

  constructor(sources: HistorySource[]) {
    this.#sources = sources;
  }

  async fetchHistory(ticker: string, start: string, end: string): Promise<PricePoint[]> {
    return this.#firstNonEmpty((source) => source.fetchHistory(ticker, start, end));
  }

  async fetchFxHistory(
    base: string,
    quote: string,
    start: string,
    end: string,
  ): Promise<FxRatePoint[]> {
    return this.#firstNonEmpty((source) => source.fetchFxHistory(base, quote, start, end));
  }

  name(): string {
    return this.#sources.map((s) => s.name()).join('+');
  }

  async #firstNonEmpty<T>(fetch: (source: HistorySource) => Promise<T[]>): Promise<T[]> {
    let lastError: unknown;
    let failed = false;
    for (const source of this.#sources) {
      try {
        const result = await fetch(source);
        if (result.length > 0) {
          return result;
        }
      } catch (err: unknown) {
        lastError = err;
        failed = true;
      }
    }
    if (failed) {
      throw lastError;
    }
    return [];
  }
}
