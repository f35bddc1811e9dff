import { vi, type Mock } from "vitest";
import type { HistoryRequest, MarketDataProvider, OhlcvBar, PriceSeries } from "../market_data/provider.js";

export interface FakeProvider extends MarketDataProvider {
  history: Mock<(symbol: string, request: HistoryRequest) => Promise<PriceSeries>>;
  info: Mock<(symbol: string) => Promise<unknown>>;
  search: Mock<(query: string, maxResults: number) => Promise<unknown[]>>;
}

/** In-memory provider; every method resolves to "nothing" until a test says otherwise. */
export function createFakeProvider(): FakeProvider {
  return {
    history: vi.fn<(symbol: string, request: HistoryRequest) => Promise<PriceSeries>>().mockResolvedValue({ bars: [] }),
    info: vi.fn<(symbol: string) => Promise<unknown>>().mockResolvedValue({}),
    search: vi.fn<(query: string, maxResults: number) => Promise<unknown[]>>().mockResolvedValue([]),
  };
}

export function bar(
  date: string,
  values: { open: number | null; high: number | null; low: number | null; close: number | null; volume: number | null }
): OhlcvBar {
  return { date: new Date(`${date}T00:00:00Z`), ...values };
}

/**
 * `count` consecutive daily bars from 2025-01-01 (UTC midnight).
 * Row i (1-based): open 1000+i, high 1100+i, low 900+i, close 1050+i, volume `volume(i)`.
 */
export function dailyBars(count: number, volume: (i: number) => number = () => 1_000_000): OhlcvBar[] {
  const start = Date.UTC(2025, 0, 1);
  return Array.from({ length: count }, (_, idx) => {
    const i = idx + 1;
    return {
      date: new Date(start + idx * 86_400_000),
      open: 1000 + i,
      high: 1100 + i,
      low: 900 + i,
      close: 1050 + i,
      volume: volume(i),
    };
  });
}

export function series(bars: OhlcvBar[], timeZone?: string): PriceSeries {
  return timeZone ? { timeZone, bars } : { bars };
}
