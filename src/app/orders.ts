/**
 * `orders` command.
 */

import type { ResolvedConfig } from '../config.js';
import { decStr } from '../format/decimal.js';
import { summarizeOrders } from '../ledger/orders.js';
import { type WarningSink, issueOutput, money, reportIssues } from './format.js';
import { loadLedger, loadMapping } from './ledger.js';
import type { OrderOutput } from './types.js';

export async function listOrders(
  config: ResolvedConfig,
  options: { warn?: WarningSink } = {},
): Promise<OrderOutput[]> {
  const ledger = await loadLedger(config);
  const mapping = await loadMapping(config);
  reportIssues(ledger.issues.map(issueOutput), options.warn);

  const display = config.display;
  return summarizeOrders(ledger, mapping).map((o) => ({
    order_id: o.order_id,
    date: o.date,
    time: o.time ?? null,
    instrument_key: o.instrument_key,
    ticker: o.ticker,
    side: o.side,
    quantity: decStr(o.quantity),
    price: o.price !== null ? decStr(o.price) : null,
    currency: o.currency,
    amount: money(o.amount, display),
    transaction_costs: money(o.transaction_costs, display),
    transaction_tax: money(o.transaction_tax, display),
    total_costs: money(o.total_costs, display),
    total: money(o.total, display),
  }));
}
