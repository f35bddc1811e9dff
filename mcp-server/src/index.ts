/**
 * Market data MCP server entry point.
 *
 * Tokyo Stock Exchange prices, price history, JPY FX rates and ticker search
 * from Yahoo Finance, exposed as MCP tools:
 * - market_data/: MarketDataClient and the yahoo-finance2 provider
 * - schemas/: zod input schemas
 * - tools/: tool handlers
 * - logging/: JSONL tool-call logging
 */

import { startStdioServer } from "./server.js";

startStdioServer().catch((err) => {
  console.error("Fatal error:", err);
  process.exit(1);
});
