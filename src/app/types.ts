/**
 * Output types for the CLI.
 *
 * All field names use snake_case. Decimal values are rendered as strings;
 * a value that could not be computed is `null`, never `"0"`.
 */

// ---------------------------------------------------------------------------
// Issues
// ---------------------------------------------------------------------------

export interface IssueOutput {
  type: string;
  message: string;
  date?: string;
  row?: number;
  instrument_key?: string;
}

// ---------------------------------------------------------------------------
// Snapshot
// ---------------------------------------------------------------------------

export interface HoldingOutput {
  instrument_key: string;
  ticker: string | null;
  quantity: string;
  price: string | null;
  priced_date: string | null;
  currency: string | null;
  fx_rate: string | null;
  fx_date: string | null;
  value: string | null;
}

export interface SnapshotOutput {
  date: string;
  currency: string;
  cash_balance: string;
  cash_source: string;
  delta_cash: string;
  cumulative_deposits: string;
  total_value: string | null;
  /** Present when `[display]` settings are configured. */
  total_value_display?: string;
  holdings: HoldingOutput[];
  issues: IssueOutput[];
}

// ---------------------------------------------------------------------------
// History
// ---------------------------------------------------------------------------

export interface HistoryPointOutput {
  date: string;
  total_value: string | null;
  cash: string;
  deposits: string;
  return_pct: string | null;
  gain_on_deposits_pct: string | null;
  /** Keys of holdings that could not be valued on this date. */
  gaps?: string[];
}

export interface HistorySummaryOutput {
  first_date: string | null;
  first_value: string | null;
  last_date: string | null;
  last_value: string | null;
  absolute_change: string | null;
  percentage_change: string | null;
  final_deposits: string;
  net_gain: string | null;
  gap_count: number;
  time_weighted_return_pct: string | null;
}

export interface HistoryOutput {
  currency: string;
  start: string;
  end: string;
  frequency: string;
  points: HistoryPointOutput[];
  summary: HistorySummaryOutput;
  issues: IssueOutput[];
  csv_file?: string;
}

// ---------------------------------------------------------------------------
// Orders
// ---------------------------------------------------------------------------

export interface OrderOutput {
  order_id: string;
  date: string;
  time: string | null;
  instrument_key: string;
  ticker: string | null;
  side: string;
  quantity: string;
  price: string | null;
  currency: string;
  amount: string;
  transaction_costs: string;
  transaction_tax: string;
  total_costs: string;
  total: string;
}

// ---------------------------------------------------------------------------
// Transactions
// ---------------------------------------------------------------------------

export interface TransactionOutput {
  date: string;
  time: string;
  type: string;
  ticker: string | null;
  name: string;
  description: string;
  shares: string | null;
  price: string | null;
  amount: string | null;
  cash_balance: string | null;
}

export interface TransactionsOutput {
  currency: string;
  transactions: TransactionOutput[];
  issues: IssueOutput[];
  csv_file?: string;
}

// ---------------------------------------------------------------------------
// Tickers and imports
// ---------------------------------------------------------------------------

export interface TickerOutput {
  instrument_key: string;
  ticker: string | null;
  is_foreign_currency: boolean;
  currency: string;
}

export interface TickersOutput {
  mapping_file: string;
  tickers: TickerOutput[];
  added: string[];
  unmapped: string[];
  written: boolean;
}

export interface ImportOutput {
  success: boolean;
  series: string;
  imported: number;
  skipped: number;
  issues: IssueOutput[];
}
