/**
 * Market data model types.
 *
 * Defines the close-price and FX-rate observations exchanged with history
 * sources and persisted by market data stores.
 */

// ---------------------------------------------------------------------------
// PricePoint
// ---------------------------------------------------------------------------

/** A closing price for a ticker on a given date. */
export interface PricePoint {
  readonly ticker: string;
  /** Date string in "YYYY-MM-DD" format. */
  readonly as_of_date: string;
  /** When the observation was recorded; the newest wins for a repeated date. */
  readonly timestamp: Date;
  /** Decimal price as a string to preserve precision. */
  readonly price: string;
  readonly quote_currency: string;
  readonly source: string;
}

// ---------------------------------------------------------------------------
// FxRatePoint
// ---------------------------------------------------------------------------

/** Units of `quote` per unit of `base` on a given date. */
export interface FxRatePoint {
  readonly base: string;
  readonly quote: string;
  /** Date string in "YYYY-MM-DD" format. */
  readonly as_of_date: string;
  readonly timestamp: Date;
  /** Decimal rate as a string to preserve precision. */
  readonly rate: string;
  readonly source: string;
}

// ---------------------------------------------------------------------------
// JSON serialization helpers
// ---------------------------------------------------------------------------

/** Plain-object shape of a serialized PricePoint. */
export interface PricePointJSON {
  ticker: string;
  as_of_date: string;
  timestamp: string;
  price: string;
  quote_currency: string;
  source: string;
}

export function pricePointToJSON(p: PricePoint): PricePointJSON {
  return {
    ticker: p.ticker,
    as_of_date: p.as_of_date,
    timestamp: p.timestamp.toISOString(),
    price: p.price,
    quote_currency: p.quote_currency,
    source: p.source,
  };
}

export function pricePointFromJSON(json: PricePointJSON): PricePoint {
  return {
    ticker: json.ticker,
    as_of_date: json.as_of_date,
    timestamp: new Date(json.timestamp),
    price: json.price,
    quote_currency: json.quote_currency,
    source: json.source,
  };
}

/** Plain-object shape of a serialized FxRatePoint. */
export interface FxRatePointJSON {
  base: string;
  quote: string;
  as_of_date: string;
  timestamp: string;
  rate: string;
  source: string;
}

export function fxRatePointToJSON(p: FxRatePoint): FxRatePointJSON {
  return {
    base: p.base,
    quote: p.quote,
    as_of_date: p.as_of_date,
    timestamp: p.timestamp.toISOString(),
    rate: p.rate,
    source: p.source,
  };
}

export function fxRatePointFromJSON(json: FxRatePointJSON): FxRatePoint {
  return {
    base: json.base,
    quote: json.quote,
    as_of_date: json.as_of_date,
    timestamp: new Date(json.timestamp),
    rate: json.rate,
    source: json.source,
  };
}

// ---------------------------------------------------------------------------
// Selection helpers
// ---------------------------------------------------------------------------

/**
 * Keep one observation per date: the one with the newest timestamp.
 * Returns the survivors sorted by date.
 */
export function latestPerDate<T extends { as_of_date: string; timestamp: Date }>(
  points: readonly T[],
): T[] {
  const byDate = new Map<string, T>();
  for (const p of points) {
    const existing = byDate.get(p.as_of_date);
    if (existing === undefined || existing.timestamp.getTime() <= p.timestamp.getTime()) {
      byDate.set(p.as_of_date, p);
    }
  }
  return [...byDate.values()].sort((a, b) => a.as_of_date.localeCompare(b.as_of_date));
}
