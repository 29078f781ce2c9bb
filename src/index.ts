// Core values
export { Decimal } from './decimal.js';
export type { Outcome } from './outcome.js';
export { available, unavailable, isAvailable, valueOr, mapOutcome } from './outcome.js';
export type { Clock } from './clock.js';
export { SystemClock, FixedClock } from './clock.js';

// Configuration
export type {
  Config,
  ResolvedConfig,
  LedgerColumns,
  LedgerConfig,
  CashConfig,
  MarketDataConfig,
  HistoryConfig,
  DisplayConfig,
  SourceOrder,
} from './config.js';
export { parseConfig, resolveDataDir, resolveDataFile, DEFAULT_CONFIG } from './config.js';
export { parseDuration, formatDuration } from './duration.js';

// Ledger
export type {
  CashEvent,
  CashEventKind,
  TradeEvent,
  TradeCurrency,
  ParseIssue,
  Ledger,
} from './ledger/models.js';
export { LedgerParseError } from './ledger/models.js';
export type { LedgerParseOptions } from './ledger/parser.js';
export { parseLedger, normalizeHeader, ledgerOptionsFromConfig } from './ledger/parser.js';
export type { ClassificationPatterns } from './ledger/classify.js';
export { classifyDescription, compileClassifier, DEFAULT_CLASSIFICATION } from './ledger/classify.js';
export { parseLocaleDecimal, normalizeLocaleNumber } from './format/locale-number.js';
export type { InstrumentMapping, InstrumentMappingEntry, MappingIssue } from './ledger/instrument-mapping.js';
export {
  parseInstrumentMapping,
  serializeInstrumentMapping,
  validateCoverage,
  mergeInstrumentMapping,
} from './ledger/instrument-mapping.js';
export type { OrderSummary } from './ledger/orders.js';
export { summarizeOrders } from './ledger/orders.js';

// Market data
export type { PricePoint, FxRatePoint } from './market-data/models.js';
export type { MarketDataStore } from './market-data/store.js';
export { MemoryMarketDataStore } from './market-data/store.js';
export { JsonlMarketDataStore } from './market-data/jsonl-store.js';
export type { HistorySource } from './market-data/sources.js';
export { StoreHistorySource, HistorySourceRouter } from './market-data/sources.js';
export type { PriceQuote, PriceRequest, PreloadReport } from './market-data/price-series.js';
export { PriceSeriesStore, SealedStoreError } from './market-data/price-series.js';
export type { Conversion } from './market-data/currency.js';
export { CurrencyNormalizer } from './market-data/currency.js';
export { importPriceCsv, importFxCsv } from './market-data/price-csv.js';

// Portfolio
export type {
  PortfolioSnapshot,
  PortfolioValuation,
  PortfolioSeries,
  SeriesPoint,
  SeriesSummary,
  ConsistencyWarning,
  PriceGap,
  FxGap,
} from './portfolio/models.js';
export { holdingOf } from './portfolio/models.js';
export { PortfolioStateCalculator } from './portfolio/calculator.js';
export { valueSnapshot } from './portfolio/valuation.js';
export { TimeSeriesAggregator } from './portfolio/aggregator.js';
export type { Frequency } from './portfolio/date-grid.js';
export { buildDateGrid, parseFrequency } from './portfolio/date-grid.js';
export type { TransactionListing, TransactionRecord, TransactionType } from './portfolio/transactions.js';
export { collectTransactions } from './portfolio/transactions.js';
