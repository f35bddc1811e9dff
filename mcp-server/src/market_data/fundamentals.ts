import type { Fundamentals } from "./types.js";

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function finiteNumber(value: unknown): number | undefined {
  return typeof value === "number" && Number.isFinite(value) ? value : undefined;
}

/**
 * Upstream reports dividend yield either as a fraction (0.0256) or as a
 * percentage (2.56). Values >= 1 are read as percentages.
 */
export function normalizeDividendYield(raw: unknown): number | undefined {
  const value = finiteNumber(raw);
  if (value === undefined || value <= 0) return undefined;
  return value >= 1 ? value / 100 : value;
}

const NUMERIC_FIELDS = [
  ["trailing_pe", "trailingPE"],
  ["forward_pe", "forwardPE"],
  ["price_to_book", "priceToBook"],
  ["trailing_eps", "trailingEps"],
] as const;

/** Pick the fundamentals present in an info map. Non-object input yields `{}`. */
export function extractFundamentals(info: unknown): Fundamentals {
  if (!isRecord(info)) return {};

  const out: Fundamentals = {};
  for (const [field, key] of NUMERIC_FIELDS) {
    const value = finiteNumber(info[key]);
    if (value !== undefined) out[field] = value;
  }

  const marketCap = finiteNumber(info.marketCap);
  if (marketCap !== undefined) out.market_cap = Math.trunc(marketCap);

  if (typeof info.sector === "string") out.sector = info.sector;

  const dividendYield = normalizeDividendYield(info.dividendYield);
  if (dividendYield !== undefined) out.dividend_yield = dividendYield;

  return out;
}
