/**
 * Portfolio state calculator.
 *
 * `snapshot(date)` replays the ledger through `date` and derives cash,
 * holdings and cumulative deposits. The ledger is never modified; each
 * snapshot is an independent value.
 */

import { Decimal } from '../decimal.js';
import { parseYmdOrThrow } from '../dates.js';
import { type CashConfig, DEFAULT_CASH_CONFIG } from '../config.js';
import { compilePatternList } from '../ledger/classify.js';
import type { CashEvent, Ledger, TradeEvent } from '../ledger/models.js';
import type { ConsistencyWarning, PortfolioSnapshot } from './models.js';

export interface CalculatorOptions {
  /** Largest accepted gap between running balance and delta sum. */
  consistency_tolerance?: Decimal | string;
  /** Descriptions that move cash between sub-accounts and are left out of cash. */
  exclude_patterns?: readonly string[];
}

export function calculatorOptionsFromConfig(cash: CashConfig): CalculatorOptions {
  return {
    consistency_tolerance: cash.consistency_tolerance,
    exclude_patterns: cash.exclude_patterns,
  };
}

export class PortfolioStateCalculator {
  private readonly ledger: Ledger;
  private readonly tolerance: Decimal;
  /** Reporting-currency cash lines that count towards the balance. */
  private readonly cashEvents: readonly CashEvent[];

  constructor(ledger: Ledger, options: CalculatorOptions = {}) {
    this.ledger = ledger;
    this.tolerance = new Decimal(options.consistency_tolerance ?? DEFAULT_CASH_CONFIG.consistency_tolerance);

    const excluded = compilePatternList(
      'cash.exclude_patterns',
      options.exclude_patterns ?? DEFAULT_CASH_CONFIG.exclude_patterns,
    );
    this.cashEvents = ledger.cash_events.filter(
      (e) => e.currency === ledger.reporting_currency && !excluded(e.description),
    );
  }

  /**
   * State of the portfolio at the end of `date`.
   *
   * @throws {Error} when `date` is not a valid "YYYY-MM-DD" date.
   */
  snapshot(date: string): PortfolioSnapshot {
    const asOf = parseYmdOrThrow(date, 'snapshot');
    const cash = this.cashAsOf(asOf);

    return Object.freeze({
      date: asOf,
      cash_balance: cash.balance,
      cash_source: cash.source,
      delta_cash: cash.deltaSum,
      holdings: this.holdingsAsOf(asOf),
      cumulative_deposits: this.depositsAsOf(asOf),
      warnings: Object.freeze(cash.warnings),
    });
  }

  // -- Cash -----------------------------------------------------------------

  private cashAsOf(date: string): {
    balance: Decimal;
    source: PortfolioSnapshot['cash_source'];
    deltaSum: Decimal;
    warnings: ConsistencyWarning[];
  } {
    let deltaSum = new Decimal(0);
    let latestBalance: Decimal | undefined;
    let seen = false;

    // Events are ascending; among same-date rows the later one wins.
    for (const event of this.cashEvents) {
      if (event.date > date) break;
      seen = true;
      deltaSum = deltaSum.plus(event.amount);
      if (event.running_balance !== undefined && this.isReportingBalance(event)) {
        latestBalance = event.running_balance;
      }
    }

    if (!seen) {
      return { balance: new Decimal(0), source: 'empty', deltaSum, warnings: [] };
    }
    if (latestBalance === undefined) {
      return { balance: deltaSum, source: 'delta_sum', deltaSum, warnings: [] };
    }

    const difference = latestBalance.minus(deltaSum);
    const warnings: ConsistencyWarning[] = difference.abs().gt(this.tolerance)
      ? [
          {
            type: 'consistency_warning',
            date,
            running_balance: latestBalance,
            delta_sum: deltaSum,
            difference,
          },
        ]
      : [];
    return { balance: latestBalance, source: 'running_balance', deltaSum, warnings };
  }

  private isReportingBalance(event: CashEvent): boolean {
    return event.balance_currency === undefined || event.balance_currency === this.ledger.reporting_currency;
  }

  // -- Holdings -------------------------------------------------------------

  private holdingsAsOf(date: string): ReadonlyMap<string, Decimal> {
    const holdings = new Map<string, Decimal>();
    for (const trade of this.ledger.trade_events) {
      if (trade.date > date) break;
      addTrade(holdings, trade);
    }
    return holdings;
  }

  // -- Deposits -------------------------------------------------------------

  private depositsAsOf(date: string): Decimal {
    let total = new Decimal(0);
    for (const event of this.ledger.cash_events) {
      if (event.date > date) break;
      if (event.kind === 'deposit' && event.currency === this.ledger.reporting_currency) {
        total = total.plus(event.amount);
      }
    }
    return total;
  }
}

function addTrade(holdings: Map<string, Decimal>, trade: TradeEvent): void {
  const current = holdings.get(trade.instrument_key) ?? new Decimal(0);
  holdings.set(trade.instrument_key, current.plus(trade.quantity_delta));
}
