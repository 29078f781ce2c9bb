/**
 * CSV exports.
 *
 * The history CSV has one row per date for cash, one per open position, and
 * a portfolio total row: `Date,Ticker,Name,Shares,Value_Per_Share,Total_Value`.
 * The transactions CSV has one row per trade or external cash movement.
 * Values are in the reporting currency; a value that could not be computed
 * is left empty.
 */

import fs from 'node:fs/promises';
import path from 'node:path';
import Papa from 'papaparse';

import { decStr, decStrRounded } from '../format/decimal.js';
import type { PortfolioSeries } from '../portfolio/models.js';
import type { TransactionRecord } from '../portfolio/transactions.js';

// ---------------------------------------------------------------------------
// History
// ---------------------------------------------------------------------------

export const HISTORY_CSV_COLUMNS = [
  'Date',
  'Ticker',
  'Name',
  'Shares',
  'Value_Per_Share',
  'Total_Value',
] as const;

type HistoryCsvRow = Record<(typeof HISTORY_CSV_COLUMNS)[number], string>;

export function historyCsvRows(series: PortfolioSeries): HistoryCsvRow[] {
  const rows: HistoryCsvRow[] = [];
  for (const point of series.points) {
    const cash = decStrRounded(point.cash, 2);
    rows.push({ Date: point.date, Ticker: 'CASH', Name: 'Cash', Shares: '1', Value_Per_Share: cash, Total_Value: cash });

    for (const h of point.holdings_breakdown) {
      if (h.quantity.isZero()) continue;
      const value = h.value.kind === 'value' ? h.value.value : undefined;
      rows.push({
        Date: point.date,
        Ticker: h.ticker ?? '',
        Name: h.instrument_key,
        Shares: decStr(h.quantity),
        Value_Per_Share: value !== undefined ? decStrRounded(value.div(h.quantity), 4) : '',
        Total_Value: value !== undefined ? decStrRounded(value, 2) : '',
      });
    }

    const total = point.total_value.kind === 'value' ? decStrRounded(point.total_value.value, 2) : '';
    rows.push({
      Date: point.date,
      Ticker: 'PORTFOLIO',
      Name: 'Total Portfolio',
      Shares: '1',
      Value_Per_Share: total,
      Total_Value: total,
    });
  }
  return rows;
}

export function historyCsv(series: PortfolioSeries): string {
  return Papa.unparse(historyCsvRows(series), { columns: [...HISTORY_CSV_COLUMNS], newline: '\n' }) + '\n';
}

export async function writeHistoryCsv(file: string, series: PortfolioSeries): Promise<void> {
  await fs.mkdir(path.dirname(path.resolve(file)), { recursive: true });
  await fs.writeFile(file, historyCsv(series));
}

// ---------------------------------------------------------------------------
// Transactions
// ---------------------------------------------------------------------------

/** Money columns carry the reporting currency as a suffix. */
export function transactionsCsvColumns(currency: string): string[] {
  return [
    'Date',
    'Transaction_Time',
    'Type',
    'Ticker',
    'Name',
    'Description',
    'Shares',
    `Price_Per_Share_${currency}`,
    `Amount_${currency}`,
    `Cash_Balance_${currency}`,
  ];
}

export function transactionsCsv(records: readonly TransactionRecord[], currency: string): string {
  const data = records.map((r) => [
    r.date,
    r.time,
    r.type,
    r.ticker ?? '',
    r.name,
    r.description,
    r.shares !== undefined ? decStr(r.shares) : '',
    r.price !== undefined ? decStrRounded(r.price, 4) : '',
    r.amount !== undefined ? decStrRounded(r.amount, 2) : '',
    r.cash_balance !== undefined ? decStrRounded(r.cash_balance, 2) : '',
  ]);
  return Papa.unparse({ fields: transactionsCsvColumns(currency), data }, { newline: '\n' }) + '\n';
}

export async function writeTransactionsCsv(
  file: string,
  records: readonly TransactionRecord[],
  currency: string,
): Promise<void> {
  await fs.mkdir(path.dirname(path.resolve(file)), { recursive: true });
  await fs.writeFile(file, transactionsCsv(records, currency));
}
