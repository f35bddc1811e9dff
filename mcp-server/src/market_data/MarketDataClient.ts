/**
 * MarketDataClient: the four data operations behind the MCP tools and CLI.
 *
 * Every operation contains its own failures: provider faults and malformed
 * data are logged to stderr as warnings and come back as `null` (or `[]` for
 * search). Nothing here throws to the caller.
 *
 * The client holds no mutable state; one instance can serve concurrent calls.
 */

import { extractFundamentals, isRecord } from "./fundamentals.js";
import {
  ProviderError,
  classifyProviderError,
  describeError,
  type HistoryRequest,
  type MarketDataProvider,
  type OhlcvBar,
  type PriceSeries,
} from "./provider.js";
import { resolveSymbol, selectFxPairs } from "./symbols.js";
import {
  FX_SOURCE,
  STOCK_SOURCE,
  type FxRateSnapshot,
  type PriceHistory,
  type PriceHistoryRow,
  type StockHistoryOptions,
  type StockPriceOptions,
  type StockPriceSnapshot,
  type TickerSearchResult,
} from "./types.js";

export const SEARCH_MAX_RESULTS = 10;
const LOG_PREFIX = "[MarketDataClient]";

function warn(message: string, err?: unknown): void {
  if (err === undefined) {
    console.warn(`${LOG_PREFIX} ${message}`);
    return;
  }
  console.warn(`${LOG_PREFIX} ${message} (${classifyProviderError(err)}): ${describeError(err)}`);
}

function pad2(n: number): string {
  return String(n).padStart(2, "0");
}

/** Render a bar timestamp as YYYY-MM-DD in the exchange zone (UTC if unknown). */
export function formatCalendarDate(date: Date, timeZone?: string): string {
  if (Number.isNaN(date.getTime())) {
    throw new ProviderError("decode", "row has an invalid date");
  }
  if (!timeZone) {
    return `${date.getUTCFullYear()}-${pad2(date.getUTCMonth() + 1)}-${pad2(date.getUTCDate())}`;
  }
  const parts = new Intl.DateTimeFormat("en-US", {
    timeZone,
    year: "numeric",
    month: "2-digit",
    day: "2-digit",
  }).formatToParts(date);
  const part = (type: Intl.DateTimeFormatPartTypes) => parts.find((p) => p.type === type)?.value ?? "";
  return `${part("year")}-${part("month")}-${part("day")}`;
}

function requireNumber(value: number | null, field: string, date: string): number {
  if (value === null || !Number.isFinite(value)) {
    throw new ProviderError("decode", `missing ${field} in row ${date}`);
  }
  return value;
}

function toRow(bar: OhlcvBar, timeZone?: string): PriceHistoryRow {
  const date = formatCalendarDate(bar.date, timeZone);
  return {
    date,
    open: requireNumber(bar.open, "open", date),
    high: requireNumber(bar.high, "high", date),
    low: requireNumber(bar.low, "low", date),
    close: requireNumber(bar.close, "close", date),
    volume: Math.trunc(requireNumber(bar.volume, "volume", date)),
  };
}

/** Convert a series to typed rows; throws ProviderError("decode") on a malformed row. */
export function toHistoryRows(series: PriceSeries): PriceHistoryRow[] {
  return series.bars.map((bar) => toRow(bar, series.timeZone));
}

function finiteValues(bars: readonly OhlcvBar[], pick: (bar: OhlcvBar) => number | null): number[] {
  const values: number[] = [];
  for (const bar of bars) {
    const value = pick(bar);
    if (value !== null && Number.isFinite(value)) values.push(value);
  }
  return values;
}

/**
 * Mean volume of the trailing `window` bars, truncated to an integer.
 * Bars without a volume are skipped but still count toward the window.
 * Absent with fewer bars than the window, and also when the mean is zero.
 */
export function averageVolume(bars: readonly OhlcvBar[], window: number): number | undefined {
  if (bars.length < window) return undefined;
  const volumes = finiteValues(bars.slice(-window), (bar) => bar.volume);
  if (volumes.length === 0) return undefined;
  const mean = volumes.reduce((sum, volume) => sum + volume, 0) / volumes.length;
  return mean ? Math.trunc(mean) : undefined;
}

/**
 * Assemble a snapshot from a non-empty series and an (unvalidated) info map.
 * Only the latest bar must be complete; gaps in older bars are skipped by the
 * window statistics.
 */
export function buildStockPrice(code: string, ticker: string, series: PriceSeries, info: unknown): StockPriceSnapshot {
  const { bars } = series;
  const last = bars[bars.length - 1];
  if (!last) {
    throw new ProviderError("decode", `no rows for ${ticker}`);
  }
  const latest = toRow(last, series.timeZone);

  const snapshot: StockPriceSnapshot = {
    source: STOCK_SOURCE,
    code,
    ticker,
    date: latest.date,
    close: latest.close,
    open: latest.open,
    high: latest.high,
    low: latest.low,
    volume: latest.volume,
    week52_high: finiteValues(bars, (bar) => bar.high).reduce((max, high) => Math.max(max, high), -Infinity),
    week52_low: finiteValues(bars, (bar) => bar.low).reduce((min, low) => Math.min(min, low), Infinity),
  };

  const avg30 = averageVolume(bars, 30);
  if (avg30 !== undefined) snapshot.avg_volume_30d = avg30;
  const avg90 = averageVolume(bars, 90);
  if (avg90 !== undefined) snapshot.avg_volume_90d = avg90;

  return { ...snapshot, ...extractFundamentals(info) };
}

function projectSearchQuote(quote: unknown): TickerSearchResult {
  const record: Record<string, unknown> = isRecord(quote) ? quote : {};
  const text = (key: string): string => {
    const value = record[key];
    return typeof value === "string" ? value : "";
  };
  return {
    symbol: text("symbol"),
    short_name: text("shortname"),
    long_name: text("longname"),
    exchange: text("exchange"),
    type: text("quoteType"),
  };
}

export class MarketDataClient {
  constructor(private readonly provider: MarketDataProvider) {}

  async getStockPrice(code: string, options: StockPriceOptions = {}): Promise<StockPriceSnapshot | null> {
    const ticker = resolveSymbol(code);
    const { startDate, endDate } = options;
    const request: HistoryRequest =
      startDate || endDate
        ? {
            kind: "range",
            ...(startDate ? { start: startDate } : {}),
            ...(endDate ? { end: endDate } : {}),
          }
        : { kind: "period", period: "1y" };

    try {
      const series = await this.provider.history(ticker, request);
      if (series.bars.length === 0) {
        warn(`empty price data for ${ticker}`);
        return null;
      }
      const info = await this.fetchInfo(ticker);
      return buildStockPrice(code, ticker, series, info);
    } catch (err) {
      warn(`price fetch failed for ${ticker}`, err);
      return null;
    }
  }

  async getStockHistory(code: string, options: StockHistoryOptions): Promise<PriceHistory | null> {
    const ticker = resolveSymbol(code);
    const request: HistoryRequest = {
      kind: "range",
      start: options.startDate,
      ...(options.endDate ? { end: options.endDate } : {}),
      interval: options.interval ?? "1d",
    };

    try {
      const series = await this.provider.history(ticker, request);
      const rows = toHistoryRows(series);
      const first = rows[0];
      const last = rows[rows.length - 1];
      if (!first || !last) return null;
      return { source: STOCK_SOURCE, ticker, start: first.date, end: last.date, rows };
    } catch (err) {
      warn(`history fetch failed for ${ticker}`, err);
      return null;
    }
  }

  /**
   * Latest close per JPY pair. Pairs are fetched one after another; a pair
   * that fails is left out of `rates`. Returns null when no pair resolved,
   * including when the selection is empty (no provider call is made then).
   */
  async getFxRates(pairs?: readonly string[]): Promise<FxRateSnapshot | null> {
    const rates: Record<string, number> = {};
    for (const [name, symbol] of selectFxPairs(pairs)) {
      const rate = await this.fetchLatestClose(symbol);
      if (rate !== undefined) rates[name] = rate;
    }
    if (Object.keys(rates).length === 0) return null;
    return { source: FX_SOURCE, rates };
  }

  /** Up to ten matches. A provider fault is indistinguishable from no matches. */
  async searchTicker(query: string): Promise<TickerSearchResult[]> {
    try {
      const quotes = await this.provider.search(query, SEARCH_MAX_RESULTS);
      return quotes.slice(0, SEARCH_MAX_RESULTS).map(projectSearchQuote);
    } catch (err) {
      warn(`search failed for "${query}"`, err);
      return [];
    }
  }

  private async fetchInfo(ticker: string): Promise<unknown> {
    try {
      return await this.provider.info(ticker);
    } catch (err) {
      warn(`fundamentals unavailable for ${ticker}`, err);
      return {};
    }
  }

  private async fetchLatestClose(symbol: string): Promise<number | undefined> {
    try {
      const series = await this.provider.history(symbol, { kind: "period", period: "5d" });
      const close = series.bars[series.bars.length - 1]?.close;
      return typeof close === "number" && Number.isFinite(close) ? close : undefined;
    } catch (err) {
      warn(`fx fetch failed for ${symbol}`, err);
      return undefined;
    }
  }
}
