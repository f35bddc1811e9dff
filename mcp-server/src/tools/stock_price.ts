import type { MarketDataClient } from "../market_data/MarketDataClient.js";
import { resolveSymbol } from "../market_data/symbols.js";
import { GetStockPriceSchema, type GetStockPriceInput } from "../schemas/tool-inputs.js";
import { errorResult, jsonResult, type ToolResult } from "./result.js";

export type { GetStockPriceInput };

export const getStockPriceSchema = GetStockPriceSchema.shape;

/**
 * get_stock_price: latest OHLCV, 52-week range, average volumes and
 * fundamentals for one TSE code.
 */
export async function getStockPriceHandler(
  args: GetStockPriceInput,
  client: MarketDataClient
): Promise<ToolResult> {
  const { code, start_date, end_date } = args;
  const result = await client.getStockPrice(code, { startDate: start_date, endDate: end_date });
  if (result === null) {
    return errorResult(`No data found for code=${code} (ticker ${resolveSymbol(code)})`);
  }
  return jsonResult(result);
}
