/**
 * Result records produced by MarketDataClient.
 *
 * Keys are snake_case: these objects are serialized as-is into MCP tool
 * responses and CLI output. Optional fields are omitted, never zeroed, when
 * the provider has no value for them.
 */

export const STOCK_SOURCE = "yahoo_finance" as const;
export const FX_SOURCE = "yahoo_finance_fx" as const;

export interface Fundamentals {
  trailing_pe?: number;
  forward_pe?: number;
  price_to_book?: number;
  market_cap?: number;
  sector?: string;
  trailing_eps?: number;
  /** Fraction, e.g. 0.025 for 2.5% */
  dividend_yield?: number;
}

export interface StockPriceSnapshot extends Fundamentals {
  source: typeof STOCK_SOURCE;
  code: string;
  ticker: string;
  /** Observation date of the latest row (YYYY-MM-DD) */
  date: string;
  close: number;
  open: number;
  high: number;
  low: number;
  volume: number;
  /** Max high over the fetched window (not strictly 52 weeks when dates are given) */
  week52_high: number;
  week52_low: number;
  avg_volume_30d?: number;
  avg_volume_90d?: number;
}

export interface PriceHistoryRow {
  date: string;
  open: number;
  high: number;
  low: number;
  close: number;
  volume: number;
}

export interface PriceHistory {
  source: typeof STOCK_SOURCE;
  ticker: string;
  start: string;
  end: string;
  rows: PriceHistoryRow[];
}

export interface FxRateSnapshot {
  source: typeof FX_SOURCE;
  rates: Record<string, number>;
}

export interface TickerSearchResult {
  symbol: string;
  short_name: string;
  long_name: string;
  exchange: string;
  type: string;
}

export interface StockPriceOptions {
  startDate?: string;
  endDate?: string;
}

export interface StockHistoryOptions {
  startDate: string;
  endDate?: string;
  /** "1d" | "1wk" | "1mo"; other values are left for the provider to reject */
  interval?: string;
}
