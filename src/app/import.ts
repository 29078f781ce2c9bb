import fs from 'node:fs/promises';

import type { ResolvedConfig } from '../config.js';
import type { Clock } from '../clock.js';
import { JsonlMarketDataStore } from '../market-data/jsonl-store.js';
import { type HistoryCsvIssue, importFxCsv, importPriceCsv } from '../market-data/price-csv.js';
import { dataFiles } from './config.js';
import type { ImportOutput, IssueOutput } from './types.js';

function csvIssues(issues: HistoryCsvIssue[]): IssueOutput[] {
  return issues.map((i) => ({ type: 'parse_error', row: i.row, message: i.message }));
}

export async function importPrices(
  config: ResolvedConfig,
  ticker: string,
  file: string,
  options: { currency?: string; clock?: Clock } = {},
): Promise<ImportOutput> {
  const store = new JsonlMarketDataStore(dataFiles(config).market_data);
  const contents = await fs.readFile(file, 'utf8');
  const result = await importPriceCsv(
    store,
    ticker,
    options.currency ?? config.reporting_currency,
    contents,
    { clock: options.clock },
  );

  return {
    success: true,
    series: ticker,
    imported: result.imported,
    skipped: result.issues.length,
    issues: csvIssues(result.issues),
  };
}

export async function importFxRates(
  config: ResolvedConfig,
  base: string,
  quote: string,
  file: string,
  options: { clock?: Clock } = {},
): Promise<ImportOutput> {
  const store = new JsonlMarketDataStore(dataFiles(config).market_data);
  const contents = await fs.readFile(file, 'utf8');
  const result = await importFxCsv(store, base, quote, contents, { clock: options.clock });

  return {
    success: true,
    series: `${base.toUpperCase()}/${quote.toUpperCase()}`,
    imported: result.imported,
    skipped: result.issues.length,
    issues: csvIssues(result.issues),
  };
}
