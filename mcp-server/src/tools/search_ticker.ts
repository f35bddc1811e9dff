import type { MarketDataClient } from "../market_data/MarketDataClient.js";
import { SearchTickerSchema, type SearchTickerInput } from "../schemas/tool-inputs.js";
import { jsonResult, type ToolResult } from "./result.js";

export type { SearchTickerInput };

export const searchTickerSchema = SearchTickerSchema.shape;

/**
 * search_ticker never reports an error: no matches (or a failed search)
 * come back as a one-element list carrying a message.
 */
export async function searchTickerHandler(args: SearchTickerInput, client: MarketDataClient): Promise<ToolResult> {
  const results = await client.searchTicker(args.query);
  if (results.length === 0) {
    return jsonResult([{ message: `No tickers found for query: ${args.query}` }]);
  }
  return jsonResult(results);
}
