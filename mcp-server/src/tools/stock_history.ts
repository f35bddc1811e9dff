import type { MarketDataClient } from "../market_data/MarketDataClient.js";
import { GetStockHistorySchema, type GetStockHistoryInput } from "../schemas/tool-inputs.js";
import { errorResult, jsonResult, type ToolResult } from "./result.js";

export type { GetStockHistoryInput };

export const getStockHistorySchema = GetStockHistorySchema.shape;

export async function getStockHistoryHandler(
  args: GetStockHistoryInput,
  client: MarketDataClient
): Promise<ToolResult> {
  const { code, start_date, end_date, interval } = args;
  const result = await client.getStockHistory(code, {
    startDate: start_date,
    endDate: end_date,
    interval,
  });
  if (result === null) {
    return errorResult(`No history found for code=${code}`);
  }
  return jsonResult({
    source: result.source,
    ticker: result.ticker,
    start: result.start,
    end: result.end,
    count: result.rows.length,
    data: result.rows,
  });
}
