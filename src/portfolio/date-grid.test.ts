import { describe, it, expect } from 'vitest';
import { buildDateGrid, parseFrequency } from './date-grid.js';

describe('buildDateGrid', () => {
  it('lists every day for daily', () => {
    expect(buildDateGrid('2024-01-30', '2024-02-01', 'daily')).toEqual(['2024-01-30', '2024-01-31', '2024-02-01']);
  });

  it('skips weekends for business', () => {
    expect(buildDateGrid('2024-01-05', '2024-01-09', 'business')).toEqual(['2024-01-05', '2024-01-08', '2024-01-09']);
  });

  it('still ends on a weekend end date', () => {
    expect(buildDateGrid('2024-01-06', '2024-01-07', 'business')).toEqual(['2024-01-07']);
  });

  it('steps weekly and appends an off-cadence end', () => {
    expect(buildDateGrid('2024-01-01', '2024-01-20', 'weekly')).toEqual([
      '2024-01-01',
      '2024-01-08',
      '2024-01-15',
      '2024-01-20',
    ]);
  });

  it('uses month ends without repeating an aligned end', () => {
    expect(buildDateGrid('2024-01-15', '2024-04-30', 'monthly')).toEqual([
      '2024-01-31',
      '2024-02-29',
      '2024-03-31',
      '2024-04-30',
    ]);
  });

  it('uses year ends', () => {
    expect(buildDateGrid('2022-06-01', '2024-03-01', 'yearly')).toEqual(['2022-12-31', '2023-12-31', '2024-03-01']);
  });

  it('returns a single date when start equals end', () => {
    expect(buildDateGrid('2024-01-10', '2024-01-10', 'monthly')).toEqual(['2024-01-10']);
  });

  it('rejects a reversed range', () => {
    expect(() => buildDateGrid('2024-02-01', '2024-01-01', 'daily')).toThrow('Start date must be on or before end date');
    expect(() => buildDateGrid('2024-01-01', 'soon', 'daily')).toThrow('Invalid end date: soon');
  });
});

describe('parseFrequency', () => {
  it('normalizes case and whitespace', () => {
    expect(parseFrequency(' Weekly ')).toBe('weekly');
  });

  it('lists the valid names on error', () => {
    expect(() => parseFrequency('hourly')).toThrow(
      'Invalid frequency: hourly. Expected one of: daily, business, weekly, monthly, yearly',
    );
  });
});
