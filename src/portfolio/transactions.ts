/**
 * Per-transaction view of the ledger.
 *
 * Trades are listed with their price and amount in the reporting currency;
 * cash movements that are not part of an order (deposits, withdrawals,
 * transfers, interest) are listed as `CASH` rows.
 */

import type { Decimal } from '../decimal.js';
import { type InstrumentMapping, lookupInstrument } from '../ledger/instrument-mapping.js';
import type { CashEvent, Ledger, TradeEvent } from '../ledger/models.js';
import type { CurrencyNormalizer } from '../market-data/currency.js';
import type { FxGap } from './models.js';

export type TransactionType = 'BUY' | 'SELL' | 'DEPOSIT' | 'WITHDRAWAL' | 'CASH_TRANSFER';

export interface TransactionRecord {
  readonly date: string;
  /** "HH:MM:SS"; midnight when the ledger row has no time. */
  readonly time: string;
  readonly type: TransactionType;
  /** `CASH` for cash movements; null for an unmapped instrument. */
  readonly ticker: string | null;
  readonly name: string;
  readonly description: string;
  /** Signed units; absent on cash rows. */
  readonly shares?: Decimal;
  /** Per unit, in the reporting currency. */
  readonly price?: Decimal;
  /** Absolute for trades, signed for cash movements. */
  readonly amount?: Decimal;
  readonly cash_balance?: Decimal;
}

export interface TransactionListing {
  readonly records: TransactionRecord[];
  /** Trades left without a price or an amount for want of an FX rate. */
  readonly issues: FxGap[];
}

/** Cash rows belonging to an order or a currency conversion. */
const ORDER_KINDS: ReadonlySet<CashEvent['kind']> = new Set(['trade', 'fx', 'fee', 'tax']);

export function clockTime(time: string | undefined): string {
  if (time === undefined) return '00:00:00';
  return /^\d{1,2}:\d{2}$/.test(time) ? `${time.padStart(5, '0')}:00` : time;
}

/**
 * List trades and external cash movements in chronological order.
 *
 * `fx` must hold the rates of every foreign trade currency; it is only
 * read.
 */
export function collectTransactions(
  ledger: Ledger,
  mapping: InstrumentMapping,
  fx: CurrencyNormalizer,
): TransactionListing {
  const reporting = ledger.reporting_currency;
  const byRow = new Map<number, CashEvent>();
  const conversions = new Map<string, CashEvent>();
  for (const event of ledger.cash_events) {
    byRow.set(event.row, event);
    if (
      event.kind === 'fx' &&
      event.currency === reporting &&
      event.order_id !== undefined &&
      !conversions.has(event.order_id)
    ) {
      conversions.set(event.order_id, event);
    }
  }

  const inReportingBalance = (event: CashEvent | undefined): Decimal | undefined =>
    event !== undefined && (event.balance_currency ?? reporting) === reporting ? event.running_balance : undefined;

  const records: TransactionRecord[] = [];
  const issues: FxGap[] = [];

  for (const trade of ledger.trade_events) {
    const tradeRow = byRow.get(trade.row);
    const conversion = trade.order_id !== undefined && trade.trade_currency === 'foreign'
      ? conversions.get(trade.order_id)
      : undefined;

    const gaps: string[] = [];
    const convert = (value: Decimal, currency: string): Decimal | undefined => {
      const converted = fx.toReportingCurrency(value, currency, trade.date);
      if (converted.kind === 'unavailable') {
        gaps.push(converted.reason);
        return undefined;
      }
      return converted.value.amount;
    };

    const amount =
      conversion !== undefined
        ? conversion.amount.abs()
        : tradeRow !== undefined
          ? convert(tradeRow.amount.abs(), tradeRow.currency)
          : undefined;
    let price = trade.price !== undefined ? convert(trade.price, trade.currency) : undefined;
    if (price === undefined && amount !== undefined && !trade.quantity_delta.isZero()) {
      price = amount.div(trade.quantity_delta.abs());
    }

    if (gaps.length > 0 && (price === undefined || amount === undefined)) {
      issues.push({ type: 'fx_gap', instrument_key: trade.instrument_key, currency: trade.currency, date: trade.date, reason: gaps[0] });
    }

    records.push(tradeRecord(trade, mapping, { price, amount, cash_balance: inReportingBalance(conversion ?? tradeRow) }));
  }

  for (const event of ledger.cash_events) {
    if (
      event.instrument_key !== undefined ||
      ORDER_KINDS.has(event.kind) ||
      event.currency !== reporting ||
      event.amount.isZero()
    ) {
      continue;
    }
    records.push({
      date: event.date,
      time: clockTime(event.time),
      type: cashType(event),
      ticker: 'CASH',
      name: 'Cash',
      description: event.description,
      amount: event.amount,
      cash_balance: inReportingBalance(event),
    });
  }

  // Stable: on the same date and time, trades stay ahead of cash rows.
  records.sort((a, b) => {
    const ka = `${a.date} ${a.time}`;
    const kb = `${b.date} ${b.time}`;
    return ka < kb ? -1 : ka > kb ? 1 : 0;
  });
  return { records, issues };
}

function tradeRecord(
  trade: TradeEvent,
  mapping: InstrumentMapping,
  values: Pick<TransactionRecord, 'price' | 'amount' | 'cash_balance'>,
): TransactionRecord {
  return {
    date: trade.date,
    time: clockTime(trade.time),
    type: trade.quantity_delta.isNegative() ? 'SELL' : 'BUY',
    ticker: lookupInstrument(mapping, trade.instrument_key)?.ticker ?? null,
    name: trade.instrument_key,
    description: trade.description,
    shares: trade.quantity_delta,
    ...values,
  };
}

function cashType(event: CashEvent): TransactionType {
  if (event.kind === 'deposit') {
    return event.amount.isPositive() ? 'DEPOSIT' : 'WITHDRAWAL';
  }
  return event.amount.isNegative() ? 'WITHDRAWAL' : 'CASH_TRANSFER';
}
