import { describe, expect, it } from 'vitest';
import {
  DEFAULT_CASH_CONFIG,
  DEFAULT_CONFIG,
  DEFAULT_LEDGER_COLUMNS,
  parseConfig,
  resolveDataDir,
  resolveDataFile,
} from './config.js';
import type { Config } from './config.js';

const MS_PER_DAY = 24 * 60 * 60 * 1000;

describe('DEFAULT_CONFIG', () => {
  it('reports in EUR', () => {
    expect(DEFAULT_CONFIG.reporting_currency).toBe('EUR');
  });

  it('has no data_dir', () => {
    expect(DEFAULT_CONFIG.data_dir).toBeUndefined();
  });

  it('leaves transfers out of cash', () => {
    expect(DEFAULT_CONFIG.cash).toEqual(DEFAULT_CASH_CONFIG);
  });
});

describe('parseConfig', () => {
  it('returns defaults for empty string', () => {
    const config = parseConfig('');
    expect(config.data_dir).toBeUndefined();
    expect(config.reporting_currency).toBe('EUR');
    expect(config.ledger_file).toBe('Account.csv');
    expect(config.mapping_file).toBe('tickers.csv');
    expect(config.ledger.date_format).toBe('DD-MM-YYYY');
    expect(config.ledger.source_order).toBe('auto');
    expect(config.ledger.columns).toEqual(DEFAULT_LEDGER_COLUMNS);
    expect(config.cash).toEqual({ consistency_tolerance: '0.01', exclude_patterns: ['overboeking', 'cash sweep'] });
    expect(config.market_data).toEqual({ foreign_currency: 'USD', lookback: 7 * MS_PER_DAY });
    expect(config.history.frequency).toBe('daily');
    expect(config.display).toEqual({});
  });

  it('parses every section', () => {
    const toml = String.raw`
data_dir = "./my-data"
reporting_currency = "usd"
ledger_file = "exports/Account.csv"

[ledger]
date_format = "YYYY-MM-DD"
source_order = "descending"
sell_pattern = '^sell\b'

[ledger.columns]
date = "Date"
quantity = "Qty"

[classification]
deposit = ["^cash in"]

[cash]
consistency_tolerance = "0.50"
exclude_patterns = []

[market_data]
foreign_currency = "gbp"
lookback = "30d"
max_price_age = "10d"

[history]
frequency = "weekly"
`;
    const config = parseConfig(toml);
    expect(config.data_dir).toBe('./my-data');
    expect(config.reporting_currency).toBe('USD');
    expect(config.ledger_file).toBe('exports/Account.csv');
    expect(config.ledger.date_format).toBe('YYYY-MM-DD');
    expect(config.ledger.source_order).toBe('descending');
    expect(config.ledger.sell_pattern).toBe('^sell\\b');
    expect(config.ledger.columns.date).toBe('Date');
    expect(config.ledger.columns.time).toBe('Tijd');
    expect(config.ledger.columns.quantity).toBe('Qty');
    expect(config.classification.deposit).toEqual(['^cash in']);
    expect(config.classification.dividend).toEqual(['dividend']);
    expect(config.cash).toEqual({ consistency_tolerance: '0.5', exclude_patterns: [] });
    expect(config.market_data).toEqual({
      foreign_currency: 'GBP',
      lookback: 30 * MS_PER_DAY,
      max_price_age: 10 * MS_PER_DAY,
    });
    expect(config.history.frequency).toBe('weekly');
  });

  it('parses display currency formatting options', () => {
    const toml = `
[display]
currency_grouping = true
currency_symbol = "€"
currency_fixed_decimals = true
currency_decimals = 2
`;
    const config = parseConfig(toml);
    expect(config.display.currency_grouping).toBe(true);
    expect(config.display.currency_symbol).toBe('€');
    expect(config.display.currency_fixed_decimals).toBe(true);
    expect(config.display.currency_decimals).toBe(2);
  });

  it('falls back to defaults for invalid values', () => {
    const toml = `
[ledger]
date_format = "DD.MM.YYYY"

[cash]
consistency_tolerance = -1

[history]
frequency = "hourly"

[display]
currency_decimals = 2.5
`;
    const config = parseConfig(toml);
    expect(config.ledger.date_format).toBe('DD-MM-YYYY');
    expect(config.cash.consistency_tolerance).toBe('0.01');
    expect(config.history.frequency).toBe('daily');
    expect(config.display.currency_decimals).toBeUndefined();
  });

  it('accepts a numeric tolerance', () => {
    expect(parseConfig('[cash]\nconsistency_tolerance = 0.25').cash.consistency_tolerance).toBe('0.25');
  });

  it('throws on an invalid regex', () => {
    expect(() => parseConfig('[cash]\nexclude_patterns = ["("]')).toThrow(
      /^Invalid cash\.exclude_patterns\[0\] regex: \(/,
    );
  });

  it('throws on an unparseable duration', () => {
    expect(() => parseConfig('[market_data]\nmax_price_age = "soon"')).toThrow(
      "Duration must end with d, h, m, or s, got 'n'",
    );
  });

  it('throws on invalid TOML', () => {
    expect(() => parseConfig('reporting_currency = ')).toThrow();
  });
});

describe('resolveDataDir', () => {
  const configDir = '/home/user/.local/share/portfolio-replay';

  it('returns configDir when no data_dir is set', () => {
    const config: Config = { ...DEFAULT_CONFIG };
    expect(resolveDataDir(config, configDir)).toBe(configDir);
  });

  it('joins relative data_dir with configDir', () => {
    const config: Config = { ...DEFAULT_CONFIG, data_dir: './my-data' };
    expect(resolveDataDir(config, configDir)).toBe(`${configDir}/my-data`);
  });

  it('uses absolute data_dir directly', () => {
    const config: Config = { ...DEFAULT_CONFIG, data_dir: '/opt/portfolio/data' };
    expect(resolveDataDir(config, configDir)).toBe('/opt/portfolio/data');
  });
});

describe('resolveDataFile', () => {
  it('joins relative files with the data directory', () => {
    expect(resolveDataFile('/data', 'exports/Account.csv')).toBe('/data/exports/Account.csv');
    expect(resolveDataFile('/data', '/tmp/Account.csv')).toBe('/tmp/Account.csv');
  });
});
