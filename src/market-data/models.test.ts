import { describe, it, expect } from 'vitest';
import type { PricePoint } from './models.js';
import {
  fxRatePointFromJSON,
  fxRatePointToJSON,
  latestPerDate,
  pricePointFromJSON,
  pricePointToJSON,
} from './models.js';

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

describe('PricePoint JSON', () => {
  it('serializes the timestamp as ISO text', () => {
    const json = pricePointToJSON(makePricePoint());
    expect(json.timestamp).toBe('2024-01-15T21:00:00.000Z');
    expect(json.price).toBe('185.50');
    expect(pricePointFromJSON(json)).toEqual(makePricePoint());
  });
});

describe('FxRatePoint JSON', () => {
  it('restores a Date timestamp', () => {
    const restored = fxRatePointFromJSON({
      base: 'USD',
      quote: 'EUR',
      as_of_date: '2024-01-15',
      timestamp: '2024-01-15T18:00:00.000Z',
      rate: '0.9150',
      source: 'csv',
    });
    expect(restored.timestamp).toBeInstanceOf(Date);
    expect(fxRatePointToJSON(restored).timestamp).toBe('2024-01-15T18:00:00.000Z');
  });
});

describe('latestPerDate', () => {
  it('keeps the newest observation per date, sorted by date', () => {
    const result = latestPerDate([
      makePricePoint({ as_of_date: '2024-01-16', price: '190' }),
      makePricePoint({ price: '180', timestamp: new Date('2024-01-16T09:00:00Z') }),
      makePricePoint({ price: '185.50' }),
    ]);
    expect(result.map((p) => [p.as_of_date, p.price])).toEqual([
      ['2024-01-15', '180'],
      ['2024-01-16', '190'],
    ]);
  });

  it('lets the later of two equal timestamps win', () => {
    const result = latestPerDate([makePricePoint({ price: '1' }), makePricePoint({ price: '2' })]);
    expect(result.map((p) => p.price)).toEqual(['2']);
  });
});
