/**
 * `tickers` command: instrument keys found in the ledger, merged with the
 * mapping file.
 */

import fs from 'node:fs/promises';
import path from 'node:path';

import type { ResolvedConfig } from '../config.js';
import {
  instrumentCurrency,
  mergeInstrumentMapping,
  serializeInstrumentMapping,
  validateCoverage,
} from '../ledger/instrument-mapping.js';
import { dataFiles } from './config.js';
import { type WarningSink, issueOutput, reportIssues } from './format.js';
import { loadLedger, loadMapping } from './ledger.js';
import type { TickersOutput } from './types.js';

export interface TickersOptions {
  /** Save the merged mapping back to the mapping file. */
  write?: boolean;
  warn?: WarningSink;
}

export async function listTickers(config: ResolvedConfig, options: TickersOptions = {}): Promise<TickersOutput> {
  const ledger = await loadLedger(config);
  const existing = await loadMapping(config);
  const { mapping, added } = mergeInstrumentMapping(existing, ledger.instrument_keys);
  const unmapped = validateCoverage(mapping, ledger.instrument_keys);
  reportIssues(unmapped.map(issueOutput), options.warn);

  const file = dataFiles(config).mapping;
  const write = options.write === true;
  if (write) {
    await fs.mkdir(path.dirname(file), { recursive: true });
    await fs.writeFile(file, serializeInstrumentMapping(mapping));
  }

  return {
    mapping_file: file,
    tickers: [...mapping.entries()]
      .sort(([a], [b]) => a.localeCompare(b))
      .map(([key, entry]) => ({
        instrument_key: key,
        ticker: entry.ticker === '' ? null : entry.ticker,
        is_foreign_currency: entry.is_foreign_currency,
        currency: instrumentCurrency(entry, ledger.reporting_currency, config.market_data.foreign_currency),
      })),
    added,
    unmapped: unmapped.map((i) => i.instrument_key),
    written: write,
  };
}
