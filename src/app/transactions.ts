/**
 * `transactions` command.
 */

import type { ResolvedConfig } from '../config.js';
import { addDays } from '../dates.js';
import { decStr } from '../format/decimal.js';
import { CurrencyNormalizer } from '../market-data/currency.js';
import type { PreloadFailure } from '../market-data/price-series.js';
import type { HistorySource } from '../market-data/sources.js';
import { collectTransactions } from '../portfolio/transactions.js';
import { writeTransactionsCsv } from './export.js';
import { type WarningSink, issueOutput, money, reportIssues } from './format.js';
import { loadLedger, loadMapping } from './ledger.js';
import { aggregatorOptions } from './portfolio.js';
import type { IssueOutput, TransactionsOutput } from './types.js';

export interface TransactionsOptions {
  /** Also write the listing as CSV to this path. */
  csv?: string;
  warn?: WarningSink;
}

export async function listTransactions(
  config: ResolvedConfig,
  source: HistorySource,
  options: TransactionsOptions = {},
): Promise<TransactionsOutput> {
  const ledger = await loadLedger(config);
  const mapping = await loadMapping(config);
  const { lookback_days: lookbackDays = 7, max_age_days } = aggregatorOptions(config);

  const fx = new CurrencyNormalizer(ledger.reporting_currency, { max_age_days });
  const foreign = ledger.trade_events.filter((t) => t.trade_currency === 'foreign');
  let failures: readonly PreloadFailure[] = [];
  if (foreign.length > 0) {
    const report = await fx.preload(
      source,
      foreign.map((t) => t.currency),
      addDays(foreign[0].date, -lookbackDays),
      foreign[foreign.length - 1].date,
    );
    failures = report.failures;
  }
  fx.seal();

  const { records, issues: gaps } = collectTransactions(ledger, mapping, fx);
  const issues: IssueOutput[] = [
    ...ledger.issues.map(issueOutput),
    ...failures.map(issueOutput),
    ...gaps.map(issueOutput),
  ];
  reportIssues(issues, options.warn);

  const display = config.display;
  const output: TransactionsOutput = {
    currency: ledger.reporting_currency,
    transactions: records.map((r) => ({
      date: r.date,
      time: r.time,
      type: r.type,
      ticker: r.ticker,
      name: r.name,
      description: r.description,
      shares: r.shares !== undefined ? decStr(r.shares) : null,
      price: r.price !== undefined ? decStr(r.price) : null,
      amount: r.amount !== undefined ? money(r.amount, display) : null,
      cash_balance: r.cash_balance !== undefined ? money(r.cash_balance, display) : null,
    })),
    issues,
  };
  if (options.csv !== undefined) {
    await writeTransactionsCsv(options.csv, records, ledger.reporting_currency);
    output.csv_file = options.csv;
  }
  return output;
}
