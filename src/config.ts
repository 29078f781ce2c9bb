/**
 * Configuration module.
 *
 * Parses TOML configuration and provides defaults. Durations such as
 * `market_data.lookback` and `market_data.max_price_age` are human-readable strings ("10d", "36h")
 * converted to milliseconds.
 */

import path from 'node:path';
import toml from 'toml';
import { MS_PER_DAY, parseDuration } from './duration.js';
import { Decimal } from './decimal.js';
import { type LedgerDateFormat, isLedgerDateFormat } from './dates.js';
import {
  type ClassificationPatterns,
  CLASSIFICATION_ORDER,
  DEFAULT_CLASSIFICATION,
  DEFAULT_SELL_PATTERN,
  compilePattern,
} from './ledger/classify.js';
import { type Frequency, isFrequency } from './portfolio/date-grid.js';

// ---------------------------------------------------------------------------
// Interfaces
// ---------------------------------------------------------------------------

/** Column names in the ledger export. */
export interface LedgerColumns {
  date: string;
  time: string;
  product: string;
  isin: string;
  description: string;
  /** Currency of the amount column. */
  currency: string;
  amount: string;
  balance_currency: string;
  balance: string;
  order_id: string;
  /** Optional explicit quantity column; otherwise read from the description. */
  quantity?: string;
}

export type SourceOrder = 'ascending' | 'descending' | 'auto';

export interface LedgerConfig {
  date_format: LedgerDateFormat;
  source_order: SourceOrder;
  columns: LedgerColumns;
  /** Regex marking a trade description as a sale. */
  sell_pattern: string;
}

export interface CashConfig {
  /** Largest tolerated gap between running balance and delta sum (decimal string). */
  consistency_tolerance: string;
  /** Descriptions excluded from the cash balance (internal sweeps and transfers). */
  exclude_patterns: string[];
}

export interface MarketDataConfig {
  /** Currency of instruments flagged as foreign that name no currency of their own. */
  foreign_currency: string;
  /** How far before the first needed date history is fetched (ms). */
  lookback: number;
  /** Oldest usable observation age (ms); unbounded when undefined. */
  max_price_age?: number;
}

export interface HistoryConfig {
  frequency: Frequency;
}

export interface DisplayConfig {
  /**
   * If set, values in the reporting currency are rounded to this many decimal
   * places before being rendered as strings. Presentation only.
   */
  currency_decimals?: number;

  /** When true, render values with thousands separators. */
  currency_grouping?: boolean;

  /** Optional currency symbol (e.g. "€") for display rendering. */
  currency_symbol?: string;

  /**
   * When true and `currency_decimals` is set, display values with exactly that
   * many decimal places.
   */
  currency_fixed_decimals?: boolean;
}

export interface Config {
  /** Optional path to the data directory. */
  data_dir?: string;
  /** Currency all values are normalized to. */
  reporting_currency: string;
  /** Ledger export, relative to the data directory unless absolute. */
  ledger_file: string;
  /** Instrument mapping CSV, relative to the data directory unless absolute. */
  mapping_file: string;
  ledger: LedgerConfig;
  classification: ClassificationPatterns;
  cash: CashConfig;
  market_data: MarketDataConfig;
  history: HistoryConfig;
  display: DisplayConfig;
}

export interface ResolvedConfig extends Omit<Config, 'data_dir'> {
  /** Resolved (absolute) path to the data directory. */
  data_dir: string;
}

// ---------------------------------------------------------------------------
// Defaults
// ---------------------------------------------------------------------------

export const DEFAULT_LEDGER_COLUMNS: LedgerColumns = {
  date: 'Datum',
  time: 'Tijd',
  product: 'Product',
  isin: 'ISIN',
  description: 'Omschrijving',
  currency: 'Mutatie',
  amount: 'MutatieAmount',
  balance_currency: 'Saldo',
  balance: 'SaldoAmount',
  order_id: 'Order Id',
};

const REQUIRED_COLUMN_KEYS = [
  'date',
  'time',
  'product',
  'isin',
  'description',
  'currency',
  'amount',
  'balance_currency',
  'balance',
  'order_id',
] as const satisfies ReadonlyArray<keyof LedgerColumns>;

export const DEFAULT_LEDGER_CONFIG: LedgerConfig = {
  date_format: 'DD-MM-YYYY',
  source_order: 'auto',
  columns: { ...DEFAULT_LEDGER_COLUMNS },
  sell_pattern: DEFAULT_SELL_PATTERN,
};

export const DEFAULT_CASH_CONFIG: CashConfig = {
  consistency_tolerance: '0.01',
  exclude_patterns: ['overboeking', 'cash sweep'],
};

export const DEFAULT_MARKET_DATA_CONFIG: MarketDataConfig = {
  foreign_currency: 'USD',
  lookback: 7 * MS_PER_DAY,
};

export const DEFAULT_HISTORY_CONFIG: HistoryConfig = {
  frequency: 'daily',
};

function defaultClassification(): ClassificationPatterns {
  const out = { ...DEFAULT_CLASSIFICATION };
  for (const kind of CLASSIFICATION_ORDER) {
    out[kind] = [...DEFAULT_CLASSIFICATION[kind]];
  }
  return out;
}

export const DEFAULT_CONFIG: Config = {
  data_dir: undefined,
  reporting_currency: 'EUR',
  ledger_file: 'Account.csv',
  mapping_file: 'tickers.csv',
  ledger: { ...DEFAULT_LEDGER_CONFIG, columns: { ...DEFAULT_LEDGER_COLUMNS } },
  classification: defaultClassification(),
  cash: {
    ...DEFAULT_CASH_CONFIG,
    exclude_patterns: [...DEFAULT_CASH_CONFIG.exclude_patterns],
  },
  market_data: { ...DEFAULT_MARKET_DATA_CONFIG },
  history: { ...DEFAULT_HISTORY_CONFIG },
  display: {},
};

// ---------------------------------------------------------------------------
// Parsing helpers
// ---------------------------------------------------------------------------

type Table = Record<string, unknown>;

function table(value: unknown): Table {
  return typeof value === 'object' && value !== null && !Array.isArray(value) ? (value as Table) : {};
}

function nonEmptyString(value: unknown): string | undefined {
  if (typeof value !== 'string') return undefined;
  const trimmed = value.trim();
  return trimmed === '' ? undefined : trimmed;
}

function stringList(value: unknown): string[] | undefined {
  if (!Array.isArray(value)) return undefined;
  return value.filter((v): v is string => typeof v === 'string');
}

function validatedPatterns(label: string, patterns: string[]): string[] {
  patterns.forEach((p, i) => compilePattern(`${label}[${String(i)}]`, p));
  return patterns;
}

function parseTolerance(value: unknown): string {
  const raw =
    typeof value === 'number' && Number.isFinite(value) ? String(value) : nonEmptyString(value);
  if (raw === undefined || !/^\d+(\.\d+)?$/.test(raw)) {
    return DEFAULT_CASH_CONFIG.consistency_tolerance;
  }
  return new Decimal(raw).toFixed();
}

// ---------------------------------------------------------------------------
// Parsing
// ---------------------------------------------------------------------------

/**
 * Parse a TOML configuration string into a `Config`.
 *
 * Missing or mistyped fields fall back to defaults. An invalid regex or an
 * unparseable duration throws.
 */
export function parseConfig(tomlStr: string): Config {
  // toml.parse throws on invalid TOML; an empty string yields an empty object.
  const raw: Table = tomlStr.trim().length === 0 ? {} : table(toml.parse(tomlStr));

  const ledgerRaw = table(raw.ledger);
  const columnsRaw = table(ledgerRaw.columns);
  const classificationRaw = table(raw.classification);
  const cashRaw = table(raw.cash);
  const marketRaw = table(raw.market_data);
  const historyRaw = table(raw.history);
  const displayRaw = table(raw.display);

  const columns: LedgerColumns = { ...DEFAULT_LEDGER_COLUMNS };
  for (const key of REQUIRED_COLUMN_KEYS) {
    const name = nonEmptyString(columnsRaw[key]);
    if (name !== undefined) {
      columns[key] = name;
    }
  }
  const quantityColumn = nonEmptyString(columnsRaw.quantity);
  if (quantityColumn !== undefined) {
    columns.quantity = quantityColumn;
  }

  const dateFormat = nonEmptyString(ledgerRaw.date_format);
  const sourceOrder = nonEmptyString(ledgerRaw.source_order);
  const sellPattern = nonEmptyString(ledgerRaw.sell_pattern) ?? DEFAULT_SELL_PATTERN;
  compilePattern('ledger.sell_pattern', sellPattern);

  const ledger: LedgerConfig = {
    date_format:
      dateFormat !== undefined && isLedgerDateFormat(dateFormat)
        ? dateFormat
        : DEFAULT_LEDGER_CONFIG.date_format,
    source_order:
      sourceOrder === 'ascending' || sourceOrder === 'descending' || sourceOrder === 'auto'
        ? sourceOrder
        : DEFAULT_LEDGER_CONFIG.source_order,
    columns,
    sell_pattern: sellPattern,
  };

  const classification = defaultClassification();
  for (const kind of CLASSIFICATION_ORDER) {
    const patterns = stringList(classificationRaw[kind]);
    if (patterns !== undefined) {
      classification[kind] = validatedPatterns(`classification.${kind}`, patterns);
    }
  }

  const excludePatterns = stringList(cashRaw.exclude_patterns);
  const cash: CashConfig = {
    consistency_tolerance: parseTolerance(cashRaw.consistency_tolerance),
    exclude_patterns:
      excludePatterns !== undefined
        ? validatedPatterns('cash.exclude_patterns', excludePatterns)
        : [...DEFAULT_CASH_CONFIG.exclude_patterns],
  };

  const market_data: MarketDataConfig = {
    foreign_currency:
      nonEmptyString(marketRaw.foreign_currency)?.toUpperCase() ??
      DEFAULT_MARKET_DATA_CONFIG.foreign_currency,
    lookback:
      typeof marketRaw.lookback === 'string'
        ? parseDuration(marketRaw.lookback)
        : DEFAULT_MARKET_DATA_CONFIG.lookback,
  };
  if (typeof marketRaw.max_price_age === 'string') {
    market_data.max_price_age = parseDuration(marketRaw.max_price_age);
  }

  const frequency = nonEmptyString(historyRaw.frequency);
  const history: HistoryConfig = {
    frequency:
      frequency !== undefined && isFrequency(frequency)
        ? frequency
        : DEFAULT_HISTORY_CONFIG.frequency,
  };

  const config: Config = {
    reporting_currency:
      nonEmptyString(raw.reporting_currency)?.toUpperCase() ?? DEFAULT_CONFIG.reporting_currency,
    ledger_file: nonEmptyString(raw.ledger_file) ?? DEFAULT_CONFIG.ledger_file,
    mapping_file: nonEmptyString(raw.mapping_file) ?? DEFAULT_CONFIG.mapping_file,
    ledger,
    classification,
    cash,
    market_data,
    history,
    display: {},
  };

  if (typeof raw.data_dir === 'string') {
    config.data_dir = raw.data_dir;
  }

  const currencyDecimals = displayRaw.currency_decimals;
  if (typeof currencyDecimals === 'number' && Number.isFinite(currencyDecimals)) {
    // TOML numbers may be floats; treat non-integers or negatives as invalid input.
    if (Number.isInteger(currencyDecimals) && currencyDecimals >= 0) {
      config.display.currency_decimals = currencyDecimals;
    }
  }

  if (typeof displayRaw.currency_grouping === 'boolean') {
    config.display.currency_grouping = displayRaw.currency_grouping;
  }

  const currencySymbol = nonEmptyString(displayRaw.currency_symbol);
  if (currencySymbol !== undefined) {
    config.display.currency_symbol = currencySymbol;
  }

  if (typeof displayRaw.currency_fixed_decimals === 'boolean') {
    config.display.currency_fixed_decimals = displayRaw.currency_fixed_decimals;
  }

  return config;
}

// ---------------------------------------------------------------------------
// Path resolution
// ---------------------------------------------------------------------------

/**
 * Resolve the data directory for a config.
 *
 * - If `config.data_dir` is set and absolute, return it directly.
 * - If `config.data_dir` is set and relative, join it with `configDir`.
 * - If `config.data_dir` is not set, return `configDir`.
 */
export function resolveDataDir(config: Config, configDir: string): string {
  if (config.data_dir == null) {
    return configDir;
  }
  if (path.isAbsolute(config.data_dir)) {
    return config.data_dir;
  }
  return path.join(configDir, config.data_dir);
}

/** Resolve a file setting against the data directory. */
export function resolveDataFile(dataDir: string, file: string): string {
  return path.isAbsolute(file) ? file : path.join(dataDir, file);
}
