import { Client } from "@modelcontextprotocol/sdk/client/index.js";
import { InMemoryTransport } from "@modelcontextprotocol/sdk/inMemory.js";
import { CallToolResultSchema } from "@modelcontextprotocol/sdk/types.js";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import type { ServerConfig } from "./config.js";
import { MarketDataClient } from "./market_data/MarketDataClient.js";
import { SERVER_NAME, createMcpServer } from "./server.js";
import { createFakeProvider, dailyBars, series, type FakeProvider } from "./testing/fakeProvider.js";

const config: ServerConfig = {
  toolCallLog: { enabled: false, ephemeralPath: "", eventPath: "" },
};

describe("createMcpServer", () => {
  let provider: FakeProvider;
  let mcpClient: Client;

  beforeEach(async () => {
    vi.spyOn(console, "warn").mockImplementation(() => {});
    provider = createFakeProvider();
    const server = createMcpServer(new MarketDataClient(provider), config);
    const [clientTransport, serverTransport] = InMemoryTransport.createLinkedPair();
    mcpClient = new Client({ name: "test-client", version: "0.0.0" });
    await Promise.all([server.connect(serverTransport), mcpClient.connect(clientTransport)]);
  });

  afterEach(async () => {
    await mcpClient.close();
  });

  async function callTool(name: string, args: Record<string, unknown>) {
    const result = CallToolResultSchema.parse(await mcpClient.callTool({ name, arguments: args }));
    const first = result.content[0];
    if (first?.type !== "text") throw new Error(`expected text content from ${name}`);
    return { isError: result.isError, payload: JSON.parse(first.text) };
  }

  it("identifies itself and lists the four tools", async () => {
    const { tools } = await mcpClient.listTools();

    expect(mcpClient.getServerVersion()?.name).toBe(SERVER_NAME);
    expect(tools.map((t) => t.name).sort()).toEqual([
      "get_fx_rates",
      "get_stock_history",
      "get_stock_price",
      "search_ticker",
    ]);
  });

  it("serves get_fx_rates end to end", async () => {
    provider.history.mockResolvedValue(series(dailyBars(1)));

    const { isError, payload } = await callTool("get_fx_rates", { pairs: ["USDJPY", "AUDJPY"] });

    expect(isError).toBeFalsy();
    expect(payload).toEqual({ source: "yahoo_finance_fx", rates: { USDJPY: 1051 } });
  });

  it("applies the default interval for get_stock_history", async () => {
    await callTool("get_stock_history", { code: "7203", start_date: "2025-01-01" });

    expect(provider.history).toHaveBeenCalledWith("7203.T", { kind: "range", start: "2025-01-01", interval: "1d" });
  });

  it("keeps leading zeros of a code", async () => {
    const { isError, payload } = await callTool("get_stock_price", { code: "0001" });

    expect(isError).toBe(true);
    expect(payload).toEqual({ error: "No data found for code=0001 (ticker 0001.T)" });
  });

  it("answers an empty code with the no-data payload", async () => {
    const { isError, payload } = await callTool("get_stock_price", { code: "" });

    expect(isError).toBe(true);
    expect(payload).toEqual({ error: "No data found for code= (ticker .T)" });
    expect(provider.history).toHaveBeenCalledWith(".T", { kind: "period", period: "1y" });
  });

  it("passes an empty or long search query through to the client", async () => {
    const longQuery = "x".repeat(300);

    const empty = await callTool("search_ticker", { query: "" });
    const long = await callTool("search_ticker", { query: longQuery });

    expect(empty.isError).toBeFalsy();
    expect(empty.payload).toEqual([{ message: "No tickers found for query: " }]);
    expect(long.payload).toEqual([{ message: `No tickers found for query: ${longQuery}` }]);
    expect(provider.search).toHaveBeenCalledWith(longQuery, 10);
  });

  it("rejects a malformed date before reaching the client", async () => {
    // Depending on the SDK release, invalid arguments surface as an error result or a rejected call
    const rejected = await mcpClient
      .callTool({ name: "get_stock_history", arguments: { code: "7203", start_date: "2025/01/01" } })
      .then(
        (result) => CallToolResultSchema.parse(result).isError === true,
        () => true
      );

    expect(rejected).toBe(true);
    expect(provider.history).not.toHaveBeenCalled();
  });
});
