/**
 * Market data MCP server: tool definitions.
 * Each tool pairs a zod shape from ../schemas with a handler that takes the
 * shared MarketDataClient.
 */

export { getStockPriceSchema, getStockPriceHandler, type GetStockPriceInput } from "./stock_price.js";
export { getStockHistorySchema, getStockHistoryHandler, type GetStockHistoryInput } from "./stock_history.js";
export { getFxRatesSchema, getFxRatesHandler, type GetFxRatesInput } from "./fx_rates.js";
export { searchTickerSchema, searchTickerHandler, type SearchTickerInput } from "./search_ticker.js";
export { jsonResult, errorResult, type ToolResult } from "./result.js";
