/**
 * Valuation of a portfolio snapshot.
 *
 * Prices each open holding as of the snapshot date, converts foreign quotes
 * into the reporting currency, and adds the result to cash. A holding that
 * cannot be priced makes the total unavailable; it is never counted as 0.
 */

import { Decimal } from '../decimal.js';
import {
  type InstrumentMapping,
  type MappingIssue,
  instrumentCurrency,
  lookupInstrument,
} from '../ledger/instrument-mapping.js';
import type { CurrencyNormalizer } from '../market-data/currency.js';
import type { PriceSeriesStore } from '../market-data/price-series.js';
import { available, unavailable } from '../outcome.js';
import type {
  HoldingValuation,
  PortfolioSnapshot,
  PortfolioValuation,
  ValuationIssue,
} from './models.js';

export interface ValuationContext {
  readonly mapping: InstrumentMapping;
  readonly prices: PriceSeriesStore;
  readonly currency: CurrencyNormalizer;
  /** Quote currency of foreign instruments whose mapping names none. */
  readonly foreign_currency: string;
}

export function valueSnapshot(snapshot: PortfolioSnapshot, context: ValuationContext): PortfolioValuation {
  const date = snapshot.date;
  const reporting = context.currency.reportingCurrency;
  const holdings: HoldingValuation[] = [];
  const issues: ValuationIssue[] = [];
  const unvalued: string[] = [];
  let total = snapshot.cash_balance;

  const keys = [...snapshot.holdings.keys()].sort();
  for (const key of keys) {
    const quantity = snapshot.holdings.get(key) ?? new Decimal(0);
    const entry = lookupInstrument(context.mapping, key);

    if (quantity.isZero()) {
      holdings.push({
        instrument_key: key,
        ticker: entry?.ticker,
        quantity,
        value: available(new Decimal(0)),
      });
      continue;
    }

    if (entry === undefined) {
      const issue: MappingIssue = {
        type: 'mapping_error',
        instrument_key: key,
        message: context.mapping.has(key) ? 'mapping entry has no ticker' : 'no mapping entry',
      };
      issues.push(issue);
      unvalued.push(key);
      holdings.push({ instrument_key: key, quantity, value: unavailable(issue.message) });
      continue;
    }

    const quote = context.prices.priceAsOf(entry.ticker, date);
    if (quote.kind === 'unavailable') {
      issues.push({ type: 'price_gap', instrument_key: key, ticker: entry.ticker, date, reason: quote.reason });
      unvalued.push(key);
      holdings.push({ instrument_key: key, ticker: entry.ticker, quantity, value: quote });
      continue;
    }

    const currency = instrumentCurrency(entry, reporting, context.foreign_currency);
    const gross = quantity.mul(quote.value.price);
    const converted = context.currency.toReportingCurrency(gross, currency, date);
    if (converted.kind === 'unavailable') {
      issues.push({ type: 'fx_gap', instrument_key: key, currency, date, reason: converted.reason });
      unvalued.push(key);
      holdings.push({
        instrument_key: key,
        ticker: entry.ticker,
        quantity,
        price: quote.value.price,
        priced_date: quote.value.priced_date,
        currency,
        value: converted,
      });
      continue;
    }

    total = total.plus(converted.value.amount);
    holdings.push({
      instrument_key: key,
      ticker: entry.ticker,
      quantity,
      price: quote.value.price,
      priced_date: quote.value.priced_date,
      currency,
      ...(currency !== reporting ? { fx_rate: converted.value.rate, fx_date: converted.value.rate_date } : {}),
      value: available(converted.value.amount),
    });
  }

  return {
    snapshot,
    holdings,
    total_value: unvalued.length === 0 ? available(total) : unavailable(`unvalued holdings: ${unvalued.join(', ')}`),
    issues,
  };
}
