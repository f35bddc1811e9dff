/** Yahoo Finance suffix for Tokyo Stock Exchange listings */
export const TSE_SUFFIX = ".T";

/**
 * Convert a TSE code ("7203") to the provider symbol ("7203.T").
 * Plain concatenation: the input is not trimmed, case-folded or checked for an
 * existing suffix, so "7203.T" becomes "7203.T.T".
 */
export function resolveSymbol(code: string): string {
  return `${code}${TSE_SUFFIX}`;
}

/** Supported JPY pairs and their provider symbols */
export const FX_PAIRS: Readonly<Record<string, string>> = Object.freeze({
  USDJPY: "USDJPY=X",
  EURJPY: "EURJPY=X",
  GBPJPY: "GBPJPY=X",
  CNYJPY: "CNYJPY=X",
});

export const FX_PAIR_NAMES = Object.keys(FX_PAIRS);

/**
 * Select catalog entries in catalog order. `undefined` selects every pair;
 * names outside the catalog (matched case-sensitively) are dropped.
 */
export function selectFxPairs(pairs?: readonly string[]): Array<[name: string, symbol: string]> {
  return Object.entries(FX_PAIRS).filter(([name]) => pairs === undefined || pairs.includes(name));
}
