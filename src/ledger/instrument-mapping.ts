/**
 * Instrument mapping: broker-local product names to ticker symbols.
 *
 * The mapping is kept in a small CSV (`Product,Ticker,Foreign,Currency`)
 * maintained outside the core. Coverage is checked eagerly against the
 * instrument keys of the trade stream so that a missing ticker surfaces
 * before any valuation runs.
 */

import Papa from 'papaparse';

export interface InstrumentMappingEntry {
  readonly ticker: string;
  readonly is_foreign_currency: boolean;
  /** Quote currency for foreign instruments; the configured default applies when absent. */
  readonly currency?: string;
}

export type InstrumentMapping = ReadonlyMap<string, InstrumentMappingEntry>;

export interface MappingIssue {
  readonly type: 'mapping_error';
  readonly instrument_key: string;
  readonly message: string;
}

const TRUTHY = new Set(['true', 't', 'yes', 'y', '1']);

function isTruthy(value: string | undefined): boolean {
  return value !== undefined && TRUTHY.has(value.trim().toLowerCase());
}

/**
 * Parse a mapping CSV.
 *
 * The foreign flag is read from `Foreign`, or from the legacy `USD` column.
 * Rows without a product are ignored; the last row for a product wins.
 */
export function parseInstrumentMapping(csv: string): Map<string, InstrumentMappingEntry> {
  const parsed = Papa.parse<Record<string, string | undefined>>(csv, {
    header: true,
    skipEmptyLines: 'greedy',
    transformHeader: (h) => h.trim(),
  });

  const mapping = new Map<string, InstrumentMappingEntry>();
  for (const row of parsed.data) {
    const product = row.Product?.trim() ?? '';
    if (product === '') continue;

    const currency = row.Currency?.trim().toUpperCase() ?? '';
    const entry: InstrumentMappingEntry = {
      ticker: row.Ticker?.trim() ?? '',
      is_foreign_currency: isTruthy(row.Foreign ?? row.USD),
      ...(currency !== '' ? { currency } : {}),
    };
    mapping.set(product, entry);
  }
  return mapping;
}

/** Write a mapping back as CSV, sorted by product. */
export function serializeInstrumentMapping(mapping: InstrumentMapping): string {
  const rows = [...mapping.entries()]
    .sort(([a], [b]) => a.localeCompare(b))
    .map(([product, entry]) => ({
      Product: product,
      Ticker: entry.ticker,
      Foreign: entry.is_foreign_currency ? 'true' : 'false',
      Currency: entry.currency ?? '',
    }));
  return Papa.unparse(rows, {
    columns: ['Product', 'Ticker', 'Foreign', 'Currency'],
    newline: '\n',
  }) + '\n';
}

/** Resolve a key to a usable entry; entries with a blank ticker do not count. */
export function lookupInstrument(
  mapping: InstrumentMapping,
  instrumentKey: string,
): InstrumentMappingEntry | undefined {
  const entry = mapping.get(instrumentKey);
  return entry !== undefined && entry.ticker !== '' ? entry : undefined;
}

/** Report every key that has no usable mapping entry. */
export function validateCoverage(
  mapping: InstrumentMapping,
  instrumentKeys: Iterable<string>,
): MappingIssue[] {
  const issues: MappingIssue[] = [];
  for (const key of instrumentKeys) {
    const entry = mapping.get(key);
    if (entry === undefined) {
      issues.push({ type: 'mapping_error', instrument_key: key, message: 'no mapping entry' });
    } else if (entry.ticker === '') {
      issues.push({ type: 'mapping_error', instrument_key: key, message: 'mapping entry has no ticker' });
    }
  }
  return issues;
}

/**
 * Add keys discovered in the ledger that the mapping does not know yet.
 *
 * New keys get a blank ticker so they show up for editing; existing entries
 * are kept unchanged.
 */
export function mergeInstrumentMapping(
  mapping: InstrumentMapping,
  discoveredKeys: Iterable<string>,
): { mapping: Map<string, InstrumentMappingEntry>; added: string[] } {
  const merged = new Map(mapping);
  const added: string[] = [];
  for (const key of discoveredKeys) {
    if (!merged.has(key)) {
      merged.set(key, { ticker: '', is_foreign_currency: false });
      added.push(key);
    }
  }
  return { mapping: merged, added: added.sort() };
}

/** Currency an instrument is quoted in. */
export function instrumentCurrency(
  entry: InstrumentMappingEntry,
  reportingCurrency: string,
  defaultForeignCurrency: string,
): string {
  if (!entry.is_foreign_currency) {
    return reportingCurrency;
  }
  return entry.currency ?? defaultForeignCurrency;
}
