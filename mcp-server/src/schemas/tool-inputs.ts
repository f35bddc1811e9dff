import { z } from "zod";
import { FX_PAIR_NAMES } from "../market_data/symbols.js";

/**
 * Input schemas for the market data tools.
 * Codes, queries and pair names are opaque text kept as the caller typed them;
 * an unusable value reaches the client and comes back as a "no data" payload.
 * Resolution rules live in market_data/symbols.ts.
 */
export const MarketDataConstraints = {
  documentedIntervals: ["1d", "1wk", "1mo"] as const,
} as const;

const IsoDateSchema = z
  .string()
  .regex(/^\d{4}-\d{2}-\d{2}$/, "Date must be YYYY-MM-DD");

/** TSE code: text, never a number, so leading zeros survive */
const TseCodeSchema = z
  .string()
  .describe('Tokyo Stock Exchange code without suffix (e.g. "7203" for Toyota)');

export const GetStockPriceSchema = z.object({
  code: TseCodeSchema,
  start_date: IsoDateSchema.optional().describe("Optional window start (YYYY-MM-DD); default is the trailing year"),
  end_date: IsoDateSchema.optional().describe("Optional window end (YYYY-MM-DD)"),
});

export const GetStockHistorySchema = z.object({
  code: TseCodeSchema,
  start_date: IsoDateSchema.describe("Start date (YYYY-MM-DD)"),
  end_date: IsoDateSchema.optional().describe("End date (YYYY-MM-DD), defaults to today"),
  // Not an enum: values outside the documented set are left for the provider to reject
  interval: z
    .string()
    .default("1d")
    .describe(`Data interval: ${MarketDataConstraints.documentedIntervals.join(" / ")} (daily / weekly / monthly)`),
});

export const GetFxRatesSchema = z.object({
  pairs: z
    .array(z.string())
    .optional()
    .describe(`Pairs to fetch; available: ${FX_PAIR_NAMES.join(", ")}. Defaults to all.`),
});

export const SearchTickerSchema = z.object({
  query: z
    .string()
    .describe('Company name or keyword (e.g. "Toyota", "ソニー", "Nikkei ETF")'),
});

export type GetStockPriceInput = z.infer<typeof GetStockPriceSchema>;
export type GetStockHistoryInput = z.infer<typeof GetStockHistorySchema>;
export type GetFxRatesInput = z.infer<typeof GetFxRatesSchema>;
export type SearchTickerInput = z.infer<typeof SearchTickerSchema>;
