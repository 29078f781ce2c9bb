/**
 * Loading of the ledger export and the instrument mapping from the data
 * directory.
 */

import fs from 'node:fs/promises';

import type { ResolvedConfig } from '../config.js';
import { type InstrumentMappingEntry, parseInstrumentMapping } from '../ledger/instrument-mapping.js';
import type { Ledger } from '../ledger/models.js';
import { ledgerOptionsFromConfig, parseLedger } from '../ledger/parser.js';
import { JsonlMarketDataStore } from '../market-data/jsonl-store.js';
import { StoreHistorySource } from '../market-data/sources.js';
import { dataFiles } from './config.js';

function isMissingFile(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}

/**
 * Read and parse the configured ledger export.
 *
 * @throws {Error} when the file cannot be read.
 * @throws {LedgerParseError} when it holds no usable rows.
 */
export async function loadLedger(config: ResolvedConfig): Promise<Ledger> {
  const file = dataFiles(config).ledger;
  let text: string;
  try {
    text = await fs.readFile(file, 'utf-8');
  } catch (err: unknown) {
    if (isMissingFile(err)) {
      throw new Error(`Ledger file not found: ${file}`);
    }
    throw err;
  }
  return parseLedger(text, ledgerOptionsFromConfig(config));
}

/** Read the instrument mapping; a missing file is an empty mapping. */
export async function loadMapping(config: ResolvedConfig): Promise<Map<string, InstrumentMappingEntry>> {
  try {
    return parseInstrumentMapping(await fs.readFile(dataFiles(config).mapping, 'utf-8'));
  } catch (err: unknown) {
    if (isMissingFile(err)) {
      return new Map();
    }
    throw err;
  }
}

/** History source backed by the market data directory. */
export function marketDataSource(config: ResolvedConfig): StoreHistorySource {
  return new StoreHistorySource(new JsonlMarketDataStore(dataFiles(config).market_data));
}

/** Earliest date with any ledger event. */
export function firstLedgerDate(ledger: Ledger): string | undefined {
  const firstCash = ledger.cash_events[0]?.date;
  const firstTrade = ledger.trade_events[0]?.date;
  if (firstCash === undefined) return firstTrade;
  if (firstTrade === undefined) return firstCash;
  return firstCash < firstTrade ? firstCash : firstTrade;
}
