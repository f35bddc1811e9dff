import type { MarketDataClient } from "../market_data/MarketDataClient.js";
import { GetFxRatesSchema, type GetFxRatesInput } from "../schemas/tool-inputs.js";
import { errorResult, jsonResult, type ToolResult } from "./result.js";

export type { GetFxRatesInput };

export const getFxRatesSchema = GetFxRatesSchema.shape;

export async function getFxRatesHandler(args: GetFxRatesInput, client: MarketDataClient): Promise<ToolResult> {
  const result = await client.getFxRates(args.pairs);
  if (result === null) {
    return errorResult("Failed to fetch FX rates");
  }
  return jsonResult({ source: result.source, rates: result.rates });
}
