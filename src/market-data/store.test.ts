import { describe, it, expect, beforeEach } from 'vitest';
import type { PricePoint, FxRatePoint } from './models.js';
import { MemoryMarketDataStore } from './store.js';

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function makePricePoint(overrides: Partial<PricePoint> = {}): PricePoint {
  return {
    ticker: 'ACME',
    as_of_date: '2024-01-15',
    timestamp: new Date('2024-01-15T21:00:00Z'),
    price: '185.50',
    quote_currency: 'USD',
    source: 'csv',
    ...overrides,
  };
}

function makeFxRatePoint(overrides: Partial<FxRatePoint> = {}): FxRatePoint {
  return {
    base: 'USD',
    quote: 'EUR',
    as_of_date: '2024-01-15',
    timestamp: new Date('2024-01-15T18:00:00Z'),
    rate: '0.9150',
    source: 'csv',
    ...overrides,
  };
}

// ---------------------------------------------------------------------------
// MemoryMarketDataStore
// ---------------------------------------------------------------------------

describe('MemoryMarketDataStore', () => {
  let store: MemoryMarketDataStore;

  beforeEach(() => {
    store = new MemoryMarketDataStore();
  });

  it('returns nothing for an unknown ticker', async () => {
    expect(await store.get_all_prices('ACME')).toEqual([]);
    expect(await store.get_all_fx_rates('USD', 'EUR')).toEqual([]);
  });

  it('looks prices up case-insensitively', async () => {
    await store.put_prices([makePricePoint(), makePricePoint({ as_of_date: '2024-01-16' })]);
    const prices = await store.get_all_prices('acme');
    expect(prices.map((p) => p.as_of_date)).toEqual(['2024-01-15', '2024-01-16']);
  });

  it('does not match a ticker that only shares a prefix', async () => {
    await store.put_prices([makePricePoint({ ticker: 'ACMEX' })]);
    expect(await store.get_all_prices('ACME')).toEqual([]);
  });

  it('replaces a price put again for the same date', async () => {
    await store.put_prices([makePricePoint({ price: '1' })]);
    await store.put_prices([makePricePoint({ price: '2' })]);
    const prices = await store.get_all_prices('ACME');
    expect(prices.map((p) => p.price)).toEqual(['2']);
  });

  it('normalizes FX currency codes', async () => {
    await store.put_fx_rates([makeFxRatePoint({ base: 'usd', quote: ' eur' })]);
    const rates = await store.get_all_fx_rates('USD', 'eur');
    expect(rates).toHaveLength(1);
    expect(rates[0].base).toBe('USD');
    expect(rates[0].quote).toBe('EUR');
    expect(await store.get_all_fx_rates('EUR', 'USD')).toEqual([]);
  });
});
