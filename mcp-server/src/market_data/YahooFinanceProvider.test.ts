import { beforeEach, describe, expect, it, vi } from "vitest";
import {
  YahooFinanceProvider,
  createYahooFinanceProvider,
  isChartInterval,
  periodStart,
  type YahooFinanceApi,
} from "./YahooFinanceProvider.js";
import { ProviderError } from "./provider.js";

const constructedWith = vi.hoisted(() => {
  const options: unknown[] = [];
  return options;
});

vi.mock("yahoo-finance2", () => ({
  default: class {
    constructor(options: unknown) {
      constructedWith.push(options);
    }
    chart = vi.fn();
    quoteSummary = vi.fn();
    search = vi.fn();
  },
}));

const NOW = new Date("2025-06-15T12:00:00Z");

function createApi() {
  return {
    chart: vi.fn<YahooFinanceApi["chart"]>().mockResolvedValue({ meta: {}, quotes: [] }),
    quoteSummary: vi.fn<YahooFinanceApi["quoteSummary"]>().mockResolvedValue({}),
    search: vi.fn<YahooFinanceApi["search"]>().mockResolvedValue({ quotes: [] }),
  };
}

describe("YahooFinanceProvider", () => {
  let api: ReturnType<typeof createApi>;
  let provider: YahooFinanceProvider;

  beforeEach(() => {
    api = createApi();
    provider = new YahooFinanceProvider(api, () => NOW);
  });

  describe("history", () => {
    it("requests a trailing period from now", async () => {
      await provider.history("7203.T", { kind: "period", period: "1y" });

      expect(api.chart).toHaveBeenCalledWith("7203.T", {
        period1: new Date("2024-06-15T12:00:00Z"),
        interval: "1d",
      });
    });

    it("requests an explicit range with its interval", async () => {
      await provider.history("7203.T", { kind: "range", start: "2025-01-01", end: "2025-02-01", interval: "1wk" });

      expect(api.chart).toHaveBeenCalledWith("7203.T", {
        period1: "2025-01-01",
        period2: "2025-02-01",
        interval: "1wk",
      });
    });

    it("starts an end-only range at the epoch", async () => {
      await provider.history("7203.T", { kind: "range", end: "2025-02-01" });

      expect(api.chart).toHaveBeenCalledWith("7203.T", {
        period1: new Date(0),
        period2: "2025-02-01",
        interval: "1d",
      });
    });

    it("rejects an unsupported interval without calling the library", async () => {
      const pending = provider.history("7203.T", { kind: "range", start: "2025-01-01", interval: "2y" });

      await expect(pending).rejects.toBeInstanceOf(ProviderError);
      await expect(pending).rejects.toMatchObject({ kind: "rejected" });
      expect(api.chart).not.toHaveBeenCalled();
    });

    it("drops all-null rows and carries the exchange time zone", async () => {
      const day1 = new Date("2025-01-06T00:00:00Z");
      const day2 = new Date("2025-01-07T00:00:00Z");
      api.chart.mockResolvedValue({
        meta: { exchangeTimezoneName: "Asia/Tokyo" },
        quotes: [
          { date: day1, open: 2500, high: 2550, low: 2480, close: 2530, volume: 12_000_000 },
          { date: day2, open: null, high: null, low: null, close: null, volume: null },
        ],
      });

      const result = await provider.history("7203.T", { kind: "range", start: "2025-01-06" });

      expect(result).toEqual({
        timeZone: "Asia/Tokyo",
        bars: [{ date: day1, open: 2500, high: 2550, low: 2480, close: 2530, volume: 12_000_000 }],
      });
    });

    it("omits the time zone when the library reports none", async () => {
      const result = await provider.history("USDJPY=X", { kind: "period", period: "5d" });

      expect(result).toEqual({ bars: [] });
      expect(api.chart).toHaveBeenCalledWith("USDJPY=X", {
        period1: new Date("2025-06-10T12:00:00Z"),
        interval: "1d",
      });
    });
  });

  describe("info", () => {
    it("flattens the summary modules into one map", async () => {
      api.quoteSummary.mockResolvedValue({
        assetProfile: { sector: "Consumer Cyclical", industry: "Auto Manufacturers" },
        defaultKeyStatistics: { priceToBook: 1.1, trailingEps: 365.9, forwardPE: 9.1 },
        summaryDetail: { trailingPE: 8.2, forwardPE: 9.4, marketCap: 40_000_000_000_000, dividendYield: 0.0281 },
      });

      const info = await provider.info("7203.T");

      expect(info).toEqual({
        sector: "Consumer Cyclical",
        industry: "Auto Manufacturers",
        priceToBook: 1.1,
        trailingEps: 365.9,
        forwardPE: 9.4,
        trailingPE: 8.2,
        marketCap: 40_000_000_000_000,
        dividendYield: 0.0281,
      });
      expect(api.quoteSummary).toHaveBeenCalledWith("7203.T", {
        modules: ["summaryDetail", "defaultKeyStatistics", "assetProfile"],
      });
    });

    it("returns an empty map when no module is present", async () => {
      expect(await provider.info("7203.T")).toEqual({});
    });
  });

  describe("search", () => {
    it("asks for quotes only and returns them as-is", async () => {
      const quotes = [{ symbol: "7203.T", shortname: "TOYOTA MOTOR CORP" }];
      api.search.mockResolvedValue({ quotes });

      expect(await provider.search("Toyota", 10)).toBe(quotes);
      expect(api.search).toHaveBeenCalledWith("Toyota", { quotesCount: 10, newsCount: 0 });
    });
  });
});

describe("isChartInterval", () => {
  it.each(["1d", "1wk", "1mo", "1h"])("accepts %s", (value) => {
    expect(isChartInterval(value)).toBe(true);
  });

  it.each(["2y", "daily", "", "1D"])("rejects %j", (value) => {
    expect(isChartInterval(value)).toBe(false);
  });
});

describe("periodStart", () => {
  it("goes back one calendar year for 1y", () => {
    expect(periodStart("1y", new Date("2024-02-29T00:00:00Z"))).toEqual(new Date("2023-03-01T00:00:00Z"));
  });
});

describe("createYahooFinanceProvider", () => {
  it("builds its own instance with the survey notice silenced", () => {
    const provider = createYahooFinanceProvider();

    expect(provider).toBeInstanceOf(YahooFinanceProvider);
    expect(constructedWith).toEqual([{ suppressNotices: ["yahooSurvey"] }]);
  });
});
