/**
 * Per-order summary of trades, built from the rows sharing an order id.
 */

import { Decimal } from '../decimal.js';
import { type InstrumentMapping, lookupInstrument } from './instrument-mapping.js';
import type { CashEvent, Ledger, TradeEvent } from './models.js';

export type OrderSide = 'BUY' | 'SELL';

export interface OrderSummary {
  readonly order_id: string;
  readonly date: string;
  readonly time?: string;
  readonly instrument_key: string;
  readonly ticker: string | null;
  readonly side: OrderSide;
  /** Absolute number of units traded. */
  readonly quantity: Decimal;
  readonly price: Decimal | null;
  readonly currency: string;
  /** Traded amount in the reporting currency, absolute. */
  readonly amount: Decimal;
  readonly transaction_costs: Decimal;
  readonly transaction_tax: Decimal;
  readonly total_costs: Decimal;
  /** amount + costs for buys, amount - costs for sells. */
  readonly total: Decimal;
}

interface OrderRows {
  trade?: TradeEvent;
  cash: CashEvent[];
}

export function summarizeOrders(ledger: Ledger, mapping: InstrumentMapping): OrderSummary[] {
  const byOrder = new Map<string, OrderRows>();
  const rowsFor = (orderId: string): OrderRows => {
    let rows = byOrder.get(orderId);
    if (rows === undefined) {
      rows = { cash: [] };
      byOrder.set(orderId, rows);
    }
    return rows;
  };

  for (const trade of ledger.trade_events) {
    if (trade.order_id === undefined) continue;
    const rows = rowsFor(trade.order_id);
    // Partial fills share an id; the first execution describes the order.
    if (rows.trade === undefined) {
      rows.trade = trade;
    }
  }
  for (const event of ledger.cash_events) {
    if (event.order_id === undefined) continue;
    rowsFor(event.order_id).cash.push(event);
  }

  const summaries: OrderSummary[] = [];
  for (const [orderId, rows] of byOrder) {
    const trade = rows.trade;
    if (trade === undefined) continue;

    const sumAbs = (kind: CashEvent['kind']): Decimal =>
      rows.cash.filter((e) => e.kind === kind).reduce((acc, e) => acc.plus(e.amount), new Decimal(0)).abs();
    const costs = sumAbs('fee');
    const tax = sumAbs('tax');
    const totalCosts = costs.plus(tax);

    const tradeRow = rows.cash.find((e) => e.row === trade.row);
    const fxRow =
      trade.trade_currency === 'foreign'
        ? rows.cash.find((e) => e.kind === 'fx' && e.currency === ledger.reporting_currency)
        : undefined;
    const amount = (fxRow ?? tradeRow)?.amount.abs() ?? new Decimal(0);
    const side: OrderSide = trade.quantity_delta.isNegative() ? 'SELL' : 'BUY';

    summaries.push({
      order_id: orderId,
      date: trade.date,
      time: trade.time,
      instrument_key: trade.instrument_key,
      ticker: lookupInstrument(mapping, trade.instrument_key)?.ticker ?? null,
      side,
      quantity: trade.quantity_delta.abs(),
      price: trade.price ?? null,
      currency: trade.currency,
      amount,
      transaction_costs: costs,
      transaction_tax: tax,
      total_costs: totalCosts,
      total: side === 'BUY' ? amount.plus(totalCosts) : amount.minus(totalCosts),
    });
  }

  return summaries.sort((a, b) => {
    const ka = `${a.date} ${a.time ?? ''}`;
    const kb = `${b.date} ${b.time ?? ''}`;
    return ka < kb ? 1 : ka > kb ? -1 : 0;
  });
}
