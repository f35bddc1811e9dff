/**
 * MarketDataProvider backed by yahoo-finance2.
 *
 * chart()        -> history (OHLCV bars + exchange time zone)
 * quoteSummary() -> info (summaryDetail, defaultKeyStatistics and assetProfile
 *                   flattened into one key/value map)
 * search()       -> search (raw quote matches)
 */

import YahooFinance from "yahoo-finance2";
import {
  ProviderError,
  type HistoryRequest,
  type MarketDataProvider,
  type PriceSeries,
  type TrailingPeriod,
} from "./provider.js";

export const CHART_INTERVALS = [
  "1m",
  "2m",
  "5m",
  "15m",
  "30m",
  "60m",
  "90m",
  "1h",
  "1d",
  "5d",
  "1wk",
  "1mo",
  "3mo",
] as const;

export type ChartInterval = (typeof CHART_INTERVALS)[number];

const INFO_MODULES = ["summaryDetail", "defaultKeyStatistics", "assetProfile"] as const;

/** Start used for ranges given only an end date */
const OPEN_ENDED_START = new Date(0);

/** The subset of the yahoo-finance2 API this provider calls. */
export interface YahooFinanceApi {
  chart(
    symbol: string,
    options: { period1: Date | string; period2?: Date | string; interval?: ChartInterval }
  ): Promise<{
    meta: { exchangeTimezoneName?: string };
    quotes: Array<{
      date: Date;
      open: number | null;
      high: number | null;
      low: number | null;
      close: number | null;
      volume: number | null;
    }>;
  }>;
  quoteSummary(
    symbol: string,
    options: { modules: Array<(typeof INFO_MODULES)[number]> }
  ): Promise<{
    summaryDetail?: object;
    defaultKeyStatistics?: object;
    assetProfile?: object;
  }>;
  search(query: string, options: { quotesCount?: number; newsCount?: number }): Promise<{ quotes: unknown[] }>;
}

export function isChartInterval(value: string): value is ChartInterval {
  return CHART_INTERVALS.some((interval) => interval === value);
}

export function periodStart(period: TrailingPeriod, now: Date): Date {
  const start = new Date(now.getTime());
  if (period === "1y") {
    start.setUTCFullYear(start.getUTCFullYear() - 1);
  } else {
    start.setUTCDate(start.getUTCDate() - 5);
  }
  return start;
}

export class YahooFinanceProvider implements MarketDataProvider {
  constructor(
    private readonly api: YahooFinanceApi,
    private readonly now: () => Date = () => new Date()
  ) {}

  async history(symbol: string, request: HistoryRequest): Promise<PriceSeries> {
    const interval = request.interval ?? "1d";
    if (!isChartInterval(interval)) {
      throw new ProviderError("rejected", `unsupported interval "${interval}"`);
    }

    const options =
      request.kind === "period"
        ? { period1: periodStart(request.period, this.now()), interval }
        : {
            period1: request.start ?? OPEN_ENDED_START,
            ...(request.end ? { period2: request.end } : {}),
            interval,
          };

    const result = await this.api.chart(symbol, options);
    const bars = result.quotes
      // Yahoo pads some ranges with all-null rows (holidays, halted sessions)
      .filter((q) => q.open !== null || q.high !== null || q.low !== null || q.close !== null)
      .map((q) => ({
        date: q.date,
        open: q.open,
        high: q.high,
        low: q.low,
        close: q.close,
        volume: q.volume,
      }));

    const timeZone = result.meta.exchangeTimezoneName;
    return timeZone ? { timeZone, bars } : { bars };
  }

  async info(symbol: string): Promise<Record<string, unknown>> {
    const summary = await this.api.quoteSummary(symbol, { modules: [...INFO_MODULES] });
    return {
      ...summary.assetProfile,
      ...summary.defaultKeyStatistics,
      ...summary.summaryDetail,
    };
  }

  async search(query: string, maxResults: number): Promise<unknown[]> {
    const result = await this.api.search(query, { quotesCount: maxResults, newsCount: 0 });
    return result.quotes;
  }
}

/** Provider on a fresh yahoo-finance2 instance. */
export function createYahooFinanceProvider(): YahooFinanceProvider {
  // The survey notice is printed on stdout, which carries JSON-RPC in stdio mode
  return new YahooFinanceProvider(new YahooFinance({ suppressNotices: ["yahooSurvey"] }));
}
