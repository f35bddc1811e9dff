/**
 * MCP server wiring: registers the four market data tools on an McpServer
 * and serves them over stdio.
 *
 * For STDIO: log to stderr only; stdout is used for JSON-RPC.
 */

import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { getServerConfig, type ServerConfig } from "./config.js";
import { wrapWithToolCallLogging } from "./logging/toolCallMiddleware.js";
import { MarketDataClient, createYahooFinanceProvider } from "./market_data/index.js";
import {
  getFxRatesHandler,
  getFxRatesSchema,
  getStockHistoryHandler,
  getStockHistorySchema,
  getStockPriceHandler,
  getStockPriceSchema,
  searchTickerHandler,
  searchTickerSchema,
  type GetFxRatesInput,
  type GetStockHistoryInput,
  type GetStockPriceInput,
  type SearchTickerInput,
} from "./tools/index.js";

export const SERVER_NAME = "jp-market-data-mcp";
export const SERVER_VERSION = "0.1.0";

export function createMcpServer(client: MarketDataClient, config: ServerConfig): McpServer {
  const server = new McpServer({ name: SERVER_NAME, version: SERVER_VERSION });
  const logConfig = config.toolCallLog;

  server.tool(
    "get_stock_price",
    "Get the latest stock price and fundamentals for a TSE-listed stock: close/open/high/low, volume, 52-week high/low, 30/90-day average volume, P/E, P/B, market cap, sector, EPS and dividend yield. Returns {\"error\": ...} when no data is available.",
    getStockPriceSchema,
    wrapWithToolCallLogging<GetStockPriceInput>("get_stock_price", "StockQuote", logConfig, (args) =>
      getStockPriceHandler(args, client)
    )
  );

  server.tool(
    "get_stock_history",
    "Get OHLCV price history for a TSE-listed stock. Returns source, ticker, start, end, count and data (one row per period).",
    getStockHistorySchema,
    wrapWithToolCallLogging<GetStockHistoryInput>("get_stock_history", "PriceHistory", logConfig, (args) =>
      getStockHistoryHandler(args, client)
    )
  );

  server.tool(
    "get_fx_rates",
    "Get the latest JPY foreign exchange rates (USDJPY, EURJPY, GBPJPY, CNYJPY). Pairs that cannot be fetched are left out.",
    getFxRatesSchema,
    wrapWithToolCallLogging<GetFxRatesInput>("get_fx_rates", "FxRates", logConfig, (args) =>
      getFxRatesHandler(args, client)
    )
  );

  server.tool(
    "search_ticker",
    "Search Yahoo Finance for a ticker symbol by company name or keyword. Returns up to 10 matches with symbol, short_name, long_name, exchange and type.",
    searchTickerSchema,
    wrapWithToolCallLogging<SearchTickerInput>("search_ticker", "TickerSearch", logConfig, (args) =>
      searchTickerHandler(args, client)
    )
  );

  return server;
}

/** Start the server on stdio; by default with the Yahoo Finance provider and env config. */
export async function startStdioServer(
  client: MarketDataClient = new MarketDataClient(createYahooFinanceProvider())
): Promise<McpServer> {
  const server = createMcpServer(client, getServerConfig());
  const transport = new StdioServerTransport();
  await server.connect(transport);
  console.error(`${SERVER_NAME} v${SERVER_VERSION} running on stdio`);
  return server;
}
