/**
 * Ledger parser.
 *
 * Turns a brokerage account export (CSV) into the immutable `Ledger` value:
 * a cash event stream, a trade event stream, and the set of instrument keys
 * seen in trades. Row-level problems are collected as issues; only an export
 * without a single usable row is fatal.
 */

import Papa from 'papaparse';

import type { Decimal } from '../decimal.js';
import { type LedgerDateFormat, parseLedgerDate } from '../dates.js';
import { parseLocaleDecimal } from '../format/locale-number.js';
import {
  type Config,
  type LedgerColumns,
  type SourceOrder,
  DEFAULT_LEDGER_COLUMNS,
  DEFAULT_LEDGER_CONFIG,
} from '../config.js';
import {
  type ClassificationPatterns,
  DEFAULT_CLASSIFICATION,
  compileClassifier,
  compilePattern,
} from './classify.js';
import {
  type CashEvent,
  type Ledger,
  type ParseIssue,
  type TradeEvent,
  LedgerParseError,
} from './models.js';

// ---------------------------------------------------------------------------
// Options
// ---------------------------------------------------------------------------

export interface LedgerParseOptions {
  reporting_currency: string;
  date_format?: LedgerDateFormat;
  source_order?: SourceOrder;
  columns?: Partial<LedgerColumns>;
  classification?: ClassificationPatterns;
  sell_pattern?: string;
}

/** Build parser options from a loaded configuration. */
export function ledgerOptionsFromConfig(
  config: Pick<Config, 'reporting_currency' | 'ledger' | 'classification'>,
): LedgerParseOptions {
  return {
    reporting_currency: config.reporting_currency,
    date_format: config.ledger.date_format,
    source_order: config.ledger.source_order,
    columns: config.ledger.columns,
    classification: config.classification,
    sell_pattern: config.ledger.sell_pattern,
  };
}

// ---------------------------------------------------------------------------
// Header handling
// ---------------------------------------------------------------------------

/**
 * Name every header cell.
 *
 * Exports leave the amount column after a currency column unnamed
 * ("Mutatie,,Saldo,"); such a cell becomes `<previous>Amount`. Cells with no
 * named predecessor become `column<N>`.
 */
export function normalizeHeader(cells: readonly string[]): string[] {
  const names: string[] = [];
  let previous: string | undefined;
  cells.forEach((cell, i) => {
    const trimmed = cell.replace(/^\uFEFF/, '').trim();
    if (trimmed !== '') {
      names.push(trimmed);
      previous = trimmed;
    } else if (previous !== undefined) {
      names.push(`${previous}Amount`);
      previous = undefined;
    } else {
      names.push(`column${String(i + 1)}`);
    }
  });
  return names;
}

// ---------------------------------------------------------------------------
// Row helpers
// ---------------------------------------------------------------------------

interface AcceptedRow {
  date: string;
  cash?: CashEvent;
  trade?: TradeEvent;
}

const QUANTITY_IN_DESCRIPTION = /^\s*\S+\s+([+-]?[\d.,]+)/;
const PRICE_IN_DESCRIPTION = /@\s*([\d.,]+)/;

function optional(value: string): string | undefined {
  return value === '' ? undefined : value;
}

// ---------------------------------------------------------------------------
// Parser
// ---------------------------------------------------------------------------

/**
 * Parse a ledger export.
 *
 * @throws {LedgerParseError} when the text has no header, lacks the date,
 *   description or amount column, or yields no valid rows.
 */
export function parseLedger(text: string, options: LedgerParseOptions): Ledger {
  const reportingCurrency = options.reporting_currency.trim().toUpperCase();
  const columns: LedgerColumns = { ...DEFAULT_LEDGER_COLUMNS, ...options.columns };
  const dateFormat = options.date_format ?? DEFAULT_LEDGER_CONFIG.date_format;
  const classify = compileClassifier(options.classification ?? DEFAULT_CLASSIFICATION);
  const sellPattern = compilePattern(
    'ledger.sell_pattern',
    options.sell_pattern ?? DEFAULT_LEDGER_CONFIG.sell_pattern,
  );

  const parsed = Papa.parse<string[]>(text, { header: false, skipEmptyLines: 'greedy' });
  const issues: ParseIssue[] = [];
  // Papa reports rows 0-based including the header row, which makes its
  // index the 1-based data row number. Rows it flags are dropped.
  const malformed = new Set<number>();
  for (const err of parsed.errors) {
    if (err.row !== undefined && err.row > 0) {
      malformed.add(err.row);
      issues.push({ type: 'parse_error', row: err.row, message: err.message });
    }
  }

  const [headerRow, ...dataRows] = parsed.data;
  if (headerRow === undefined) {
    throw new LedgerParseError('Ledger export is empty');
  }
  const header = normalizeHeader(headerRow);
  const indexOf = (name: string | undefined): number => (name === undefined ? -1 : header.indexOf(name));

  for (const required of [columns.date, columns.description, columns.amount]) {
    if (indexOf(required) === -1) {
      throw new LedgerParseError(
        `Missing required column '${required}'. Available columns: ${header.join(', ')}`,
      );
    }
  }

  const idx = {
    date: indexOf(columns.date),
    time: indexOf(columns.time),
    product: indexOf(columns.product),
    isin: indexOf(columns.isin),
    description: indexOf(columns.description),
    currency: indexOf(columns.currency),
    amount: indexOf(columns.amount),
    balance_currency: indexOf(columns.balance_currency),
    balance: indexOf(columns.balance),
    order_id: indexOf(columns.order_id),
    quantity: indexOf(columns.quantity),
  };

  const accepted: AcceptedRow[] = [];
  let skipped = 0;

  dataRows.forEach((cells, i) => {
    const row = i + 1;
    if (malformed.has(row)) return;
    const cell = (index: number): string => (index === -1 ? '' : (cells[index] ?? '').trim());
    const reject = (column: string, message: string, raw: string): void => {
      issues.push({ type: 'parse_error', row, column, message, raw });
    };

    const rawDate = cell(idx.date);
    const date = parseLedgerDate(rawDate, dateFormat);
    if (date.kind === 'unavailable') {
      reject(columns.date, date.reason, rawDate);
      return;
    }

    const description = cell(idx.description);
    const instrumentKey = optional(cell(idx.product));
    const orderId = optional(cell(idx.order_id));
    const time = optional(cell(idx.time));
    const currency = cell(idx.currency).toUpperCase() || reportingCurrency;
    const kind = classify(description);

    let amount: Decimal | undefined;
    const rawAmount = cell(idx.amount);
    if (rawAmount !== '') {
      const parsedAmount = parseLocaleDecimal(rawAmount);
      if (parsedAmount.kind === 'unavailable') {
        reject(columns.amount, parsedAmount.reason, rawAmount);
        return;
      }
      amount = parsedAmount.value;
    }

    let runningBalance: Decimal | undefined;
    const rawBalance = cell(idx.balance);
    if (rawBalance !== '') {
      const parsedBalance = parseLocaleDecimal(rawBalance);
      if (parsedBalance.kind === 'unavailable') {
        reject(columns.balance, parsedBalance.reason, rawBalance);
        return;
      }
      runningBalance = parsedBalance.value;
    }

    let trade: TradeEvent | undefined;
    if (kind === 'trade') {
      if (instrumentKey === undefined) {
        reject(columns.product, 'trade row has no product', description);
        return;
      }
      const fromColumn = idx.quantity !== -1 && cell(idx.quantity) !== '';
      const rawQuantity = fromColumn
        ? cell(idx.quantity)
        : QUANTITY_IN_DESCRIPTION.exec(description)?.[1] ?? '';
      const quantityColumn =
        fromColumn && columns.quantity !== undefined ? columns.quantity : columns.description;
      const quantity = parseLocaleDecimal(rawQuantity);
      if (quantity.kind === 'unavailable') {
        reject(quantityColumn, `trade quantity: ${quantity.reason}`, rawQuantity || description);
        return;
      }

      const priceMatch = PRICE_IN_DESCRIPTION.exec(description);
      const price = priceMatch !== null ? parseLocaleDecimal(priceMatch[1]) : undefined;
      const magnitude = quantity.value.abs();

      trade = Object.freeze({
        row,
        date: date.value,
        time,
        instrument_key: instrumentKey,
        isin: optional(cell(idx.isin)),
        order_id: orderId,
        description,
        quantity_delta: sellPattern.test(description) ? magnitude.neg() : magnitude,
        price: price?.kind === 'value' ? price.value : undefined,
        currency,
        trade_currency: currency === reportingCurrency ? 'reporting' : 'foreign',
      } satisfies TradeEvent);
    }

    if (kind === 'interest' && amount !== undefined && amount.isZero() && trade === undefined) {
      skipped += 1;
      return;
    }

    let cash: CashEvent | undefined;
    if (amount !== undefined) {
      cash = Object.freeze({
        row,
        date: date.value,
        time,
        description,
        instrument_key: instrumentKey,
        order_id: orderId,
        currency,
        amount,
        running_balance: runningBalance,
        balance_currency: optional(cell(idx.balance_currency).toUpperCase()),
        kind,
      } satisfies CashEvent);
    }

    accepted.push({ date: date.value, cash, trade });
  });

  if (accepted.length === 0) {
    throw new LedgerParseError(
      `No valid rows in ledger export (${String(dataRows.length)} rows, ${String(issues.length)} errors)`,
      issues,
    );
  }

  const ordered = orient(accepted, options.source_order ?? DEFAULT_LEDGER_CONFIG.source_order);

  const cashEvents: CashEvent[] = [];
  const tradeEvents: TradeEvent[] = [];
  for (const r of ordered) {
    if (r.cash !== undefined) cashEvents.push(r.cash);
    if (r.trade !== undefined) tradeEvents.push(r.trade);
  }

  const instrumentKeys = [...new Set(tradeEvents.map((t) => t.instrument_key))].sort();

  return Object.freeze({
    reporting_currency: reportingCurrency,
    cash_events: Object.freeze(cashEvents),
    trade_events: Object.freeze(tradeEvents),
    instrument_keys: Object.freeze(instrumentKeys),
    issues: Object.freeze(issues.sort((a, b) => a.row - b.row)),
    total_rows: dataRows.length,
    skipped_rows: skipped,
  });
}

/**
 * Put rows in chronological order.
 *
 * Descending exports are reversed first so that same-date rows keep their
 * chronological order through the stable date sort.
 */
function orient(rows: AcceptedRow[], order: SourceOrder): AcceptedRow[] {
  const descending =
    order === 'descending' ||
    (order === 'auto' && rows.length > 1 && rows[0].date > rows[rows.length - 1].date);
  const chronological = descending ? [...rows].reverse() : [...rows];
  return chronological.sort((a, b) => (a.date < b.date ? -1 : a.date > b.date ? 1 : 0));
}
