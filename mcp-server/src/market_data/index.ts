/**
 * Market data: client, provider boundary and result types.
 */

export {
  MarketDataClient,
  SEARCH_MAX_RESULTS,
  averageVolume,
  buildStockPrice,
  formatCalendarDate,
  toHistoryRows,
} from "./MarketDataClient.js";
export {
  ProviderError,
  classifyProviderError,
  type HistoryRequest,
  type MarketDataProvider,
  type OhlcvBar,
  type PriceSeries,
  type ProviderFaultKind,
  type TrailingPeriod,
} from "./provider.js";
export {
  YahooFinanceProvider,
  createYahooFinanceProvider,
  type YahooFinanceApi,
} from "./YahooFinanceProvider.js";
export { FX_PAIRS, FX_PAIR_NAMES, TSE_SUFFIX, resolveSymbol, selectFxPairs } from "./symbols.js";
export { extractFundamentals, normalizeDividendYield } from "./fundamentals.js";
export type {
  Fundamentals,
  FxRateSnapshot,
  PriceHistory,
  PriceHistoryRow,
  StockHistoryOptions,
  StockPriceOptions,
  StockPriceSnapshot,
  TickerSearchResult,
} from "./types.js";
