/**
 * JSONL-based file-system implementation of MarketDataStore.
 *
 * Layout:
 *
 *   base_path/
 *     prices/
 *       {TICKER}/        e.g. "ASML_AS" for "ASML.AS"
 *         {year}.jsonl   e.g. "2024.jsonl"
 *     fx/
 *       {BASE}-{QUOTE}/  e.g. "USD-EUR"
 *         {year}.jsonl
 *
 * Files are append-only; readers keep the newest observation per date.
 */

import { mkdir, readdir, readFile, appendFile } from 'node:fs/promises';
import { join, dirname } from 'node:path';
import type { MarketDataStore } from './store.js';
import type { PricePoint, FxRatePoint, PricePointJSON, FxRatePointJSON } from './models.js';
import {
  pricePointToJSON,
  pricePointFromJSON,
  fxRatePointToJSON,
  fxRatePointFromJSON,
} from './models.js';

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

/**
 * Sanitize a ticker or currency code for use as a directory name.
 * Trims whitespace, replaces non-alphanumeric characters with '_',
 * and uppercases the result.
 */
export function sanitizeCode(value: string): string {
  return value
    .trim()
    .split('')
    .map((c) => (/[a-zA-Z0-9]/.test(c) ? c : '_'))
    .join('')
    .toUpperCase();
}

function yearFromDate(date: string): string {
  return date.slice(0, 4);
}

function isMissingFile(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}

/**
 * Read a JSONL file and deserialize each line.
 * Returns an empty array if the file does not exist.
 */
async function readJsonl<TJson, T>(path: string, deserialize: (json: TJson) => T): Promise<T[]> {
  let content: string;
  try {
    content = await readFile(path, 'utf-8');
  } catch (err: unknown) {
    if (isMissingFile(err)) {
      return [];
    }
    throw err;
  }

  const items: T[] = [];
  for (const line of content.split('\n')) {
    const trimmed = line.trim();
    if (trimmed === '') {
      continue;
    }
    const json: TJson = JSON.parse(trimmed);
    items.push(deserialize(json));
  }
  return items;
}

/** Read every `*.jsonl` file in a directory; a missing directory is empty. */
async function readJsonlDir<TJson, T>(dir: string, deserialize: (json: TJson) => T): Promise<T[]> {
  let entries: string[];
  try {
    entries = await readdir(dir);
  } catch (err: unknown) {
    if (isMissingFile(err)) {
      return [];
    }
    throw err;
  }

  const items: T[] = [];
  for (const entry of entries.filter((e) => e.endsWith('.jsonl')).sort()) {
    items.push(...(await readJsonl(join(dir, entry), deserialize)));
  }
  return items;
}

/**
 * Append items to a JSONL file, creating parent directories as needed.
 */
async function appendJsonl<TJson, T>(
  path: string,
  items: T[],
  serialize: (item: T) => TJson,
): Promise<void> {
  if (items.length === 0) {
    return;
  }

  await mkdir(dirname(path), { recursive: true });

  const lines = items.map((item) => JSON.stringify(serialize(item)) + '\n').join('');
  await appendFile(path, lines);
}

function groupBy<T>(items: T[], key: (item: T) => string): Map<string, T[]> {
  const grouped = new Map<string, T[]>();
  for (const item of items) {
    const k = key(item);
    const group = grouped.get(k);
    if (group) {
      group.push(item);
    } else {
      grouped.set(k, [item]);
    }
  }
  return grouped;
}

// ---------------------------------------------------------------------------
// JsonlMarketDataStore
// ---------------------------------------------------------------------------

export class JsonlMarketDataStore implements MarketDataStore {
  private readonly basePath: string;

  constructor(basePath: string) {
    this.basePath = basePath;
  }

  // -- Path helpers ---------------------------------------------------------

  private pricesDir(ticker: string): string {
    return join(this.basePath, 'prices', sanitizeCode(ticker));
  }

  private fxDir(base: string, quote: string): string {
    return join(this.basePath, 'fx', `${sanitizeCode(base)}-${sanitizeCode(quote)}`);
  }

  // -- Prices ---------------------------------------------------------------

  async get_all_prices(ticker: string): Promise<PricePoint[]> {
    const all = await readJsonlDir<PricePointJSON, PricePoint>(
      this.pricesDir(ticker),
      pricePointFromJSON,
    );
    // Sanitized directory names can collide; keep only this ticker's rows.
    const wanted = ticker.trim().toUpperCase();
    return all.filter((p) => p.ticker.trim().toUpperCase() === wanted);
  }

  async put_prices(prices: PricePoint[]): Promise<void> {
    const grouped = groupBy(prices, (p) => `${p.ticker}|${yearFromDate(p.as_of_date)}`);
    for (const items of grouped.values()) {
      const first = items[0];
      const path = join(this.pricesDir(first.ticker), `${yearFromDate(first.as_of_date)}.jsonl`);
      await appendJsonl<PricePointJSON, PricePoint>(path, items, pricePointToJSON);
    }
  }

  // -- FX rates -------------------------------------------------------------

  async get_all_fx_rates(base: string, quote: string): Promise<FxRatePoint[]> {
    return readJsonlDir<FxRatePointJSON, FxRatePoint>(this.fxDir(base, quote), fxRatePointFromJSON);
  }

  async put_fx_rates(rates: FxRatePoint[]): Promise<void> {
    const grouped = groupBy(
      rates,
      (r) => `${sanitizeCode(r.base)}|${sanitizeCode(r.quote)}|${yearFromDate(r.as_of_date)}`,
    );
    for (const items of grouped.values()) {
      const first = items[0];
      const path = join(this.fxDir(first.base, first.quote), `${yearFromDate(first.as_of_date)}.jsonl`);
      await appendJsonl<FxRatePointJSON, FxRatePoint>(
        path,
        items.map((r) => ({ ...r, base: sanitizeCode(r.base), quote: sanitizeCode(r.quote) })),
        fxRatePointToJSON,
      );
    }
  }
}
