/**
 * Market data store interface and the in-memory implementation.
 */

import type { PricePoint, FxRatePoint } from './models.js';

// ---------------------------------------------------------------------------
// MarketDataStore interface
// ---------------------------------------------------------------------------

/** Async store for close prices and FX rates. */
export interface MarketDataStore {
  get_all_prices(ticker: string): Promise<PricePoint[]>;

  put_prices(prices: PricePoint[]): Promise<void>;

  get_all_fx_rates(base: string, quote: string): Promise<FxRatePoint[]>;

  put_fx_rates(rates: FxRatePoint[]): Promise<void>;
}

// ---------------------------------------------------------------------------
// MemoryMarketDataStore
// ---------------------------------------------------------------------------

/**
 * In-memory store backed by Maps.
 *
 * Key schemes:
 * - Prices: `${TICKER}|${date}`
 * - FX rates: `${BASE}|${QUOTE}|${date}` (codes normalized to uppercase)
 *
 * A later put for the same key replaces the earlier one.
 */
export class MemoryMarketDataStore implements MarketDataStore {
  readonly #prices = new Map<string, PricePoint>();
  readonly #fxRates = new Map<string, FxRatePoint>();

  // -- Prices ---------------------------------------------------------------

  async get_all_prices(ticker: string): Promise<PricePoint[]> {
    const prefix = ticker.trim().toUpperCase() + '|';
    const results: PricePoint[] = [];
    for (const [key, point] of this.#prices) {
      if (key.startsWith(prefix)) {
        results.push(point);
      }
    }
    return results;
  }

  async put_prices(prices: PricePoint[]): Promise<void> {
    for (const p of prices) {
      this.#prices.set(`${p.ticker.trim().toUpperCase()}|${p.as_of_date}`, p);
    }
  }

  // -- FX rates -------------------------------------------------------------

  async get_all_fx_rates(base: string, quote: string): Promise<FxRatePoint[]> {
    const prefix = `${base.trim().toUpperCase()}|${quote.trim().toUpperCase()}|`;
    const results: FxRatePoint[] = [];
    for (const [key, point] of this.#fxRates) {
      if (key.startsWith(prefix)) {
        results.push(point);
      }
    }
    return results;
  }

  async put_fx_rates(rates: FxRatePoint[]): Promise<void> {
    for (const r of rates) {
      const normalized: FxRatePoint = {
        ...r,
        base: r.base.trim().toUpperCase(),
        quote: r.quote.trim().toUpperCase(),
      };
      this.#fxRates.set(`${normalized.base}|${normalized.quote}|${r.as_of_date}`, normalized);
    }
  }
}
