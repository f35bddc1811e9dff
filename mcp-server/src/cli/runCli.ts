/**
 * Command-line surface mirroring the MCP tools, plus a connectivity self-test
 * and a `serve` command that starts the stdio server.
 *
 * Exit codes: 0 success, 1 no data, 2 usage error.
 */

import { parseArgs } from "node:util";
import type { MarketDataClient } from "../market_data/MarketDataClient.js";

export interface CliIo {
  stdout: (text: string) => void;
  stderr: (text: string) => void;
}

export interface CliDeps {
  client: MarketDataClient;
  serve: () => Promise<unknown>;
}

export const USAGE = `Usage: jp-market-data-mcp <command> [options]

Commands:
  price <code> [--start YYYY-MM-DD] [--end YYYY-MM-DD]
                          Latest price and fundamentals for a TSE code (e.g. 7203)
  history <code> --start YYYY-MM-DD [--end YYYY-MM-DD] [--interval 1d|1wk|1mo]
                          OHLCV price history
  fx [--pairs USDJPY,EURJPY]
                          JPY FX rates (USDJPY, EURJPY, GBPJPY, CNYJPY)
  search <query>          Search for a ticker by company name
  test                    Quick connectivity test
  serve                   Start the MCP server on stdio`;

class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "UsageError";
  }
}

const consoleIo: CliIo = {
  stdout: (text) => console.log(text),
  stderr: (text) => console.error(text),
};

function toJson(value: unknown): string {
  return JSON.stringify(value, null, 2);
}

function requirePositional(positionals: string[], name: string): string {
  const value = positionals[0];
  if (value === undefined) throw new UsageError(`Missing argument <${name}>`);
  return value;
}

/** "USDJPY, EURJPY" -> ["USDJPY", "EURJPY"]; an absent or blank flag selects every pair */
export function parsePairList(raw: string | undefined): string[] | undefined {
  if (raw === undefined || raw.trim() === "") return undefined;
  return raw
    .split(",")
    .map((p) => p.trim())
    .filter((p) => p !== "");
}

async function price(args: string[], deps: CliDeps, io: CliIo): Promise<number> {
  const { values, positionals } = parseArgs({
    args,
    allowPositionals: true,
    options: { start: { type: "string" }, end: { type: "string" } },
  });
  const code = requirePositional(positionals, "code");
  const result = await deps.client.getStockPrice(code, { startDate: values.start, endDate: values.end });
  if (result === null) {
    io.stderr(`No data found for ${code}`);
    return 1;
  }
  io.stdout(toJson(result));
  return 0;
}

async function history(args: string[], deps: CliDeps, io: CliIo): Promise<number> {
  const { values, positionals } = parseArgs({
    args,
    allowPositionals: true,
    options: {
      start: { type: "string" },
      end: { type: "string" },
      interval: { type: "string", default: "1d" },
    },
  });
  const code = requirePositional(positionals, "code");
  if (values.start === undefined) throw new UsageError("Missing required option --start");

  const result = await deps.client.getStockHistory(code, {
    startDate: values.start,
    endDate: values.end,
    interval: values.interval,
  });
  if (result === null) {
    io.stderr(`No history found for ${code}`);
    return 1;
  }
  io.stdout(toJson({ ticker: result.ticker, start: result.start, end: result.end, data: result.rows }));
  return 0;
}

async function fx(args: string[], deps: CliDeps, io: CliIo): Promise<number> {
  const { values } = parseArgs({ args, options: { pairs: { type: "string" } } });
  const result = await deps.client.getFxRates(parsePairList(values.pairs));
  if (result === null) {
    io.stderr("Failed to fetch FX rates");
    return 1;
  }
  io.stdout(toJson(result));
  return 0;
}

async function search(args: string[], deps: CliDeps, io: CliIo): Promise<number> {
  const { positionals } = parseArgs({ args, allowPositionals: true, options: {} });
  const query = requirePositional(positionals, "query");
  io.stdout(toJson(await deps.client.searchTicker(query)));
  return 0;
}

async function selfTest(deps: CliDeps, io: CliIo): Promise<number> {
  let failures = 0;

  io.stdout("Testing stock price (Toyota 7203)...");
  const stock = await deps.client.getStockPrice("7203");
  if (stock) {
    io.stdout(`  ✓ close=${stock.close}, date=${stock.date}`);
  } else {
    io.stderr("  ✗ failed");
    failures += 1;
  }

  io.stdout("Testing FX rates...");
  const rates = await deps.client.getFxRates(["USDJPY"]);
  if (rates) {
    io.stdout(`  ✓ USDJPY=${rates.rates.USDJPY}`);
  } else {
    io.stderr("  ✗ failed");
    failures += 1;
  }

  return failures === 0 ? 0 : 1;
}

export async function runCli(argv: string[], deps: CliDeps, io: CliIo = consoleIo): Promise<number> {
  const [command, ...rest] = argv;
  try {
    switch (command) {
      case "price":
        return await price(rest, deps, io);
      case "history":
        return await history(rest, deps, io);
      case "fx":
        return await fx(rest, deps, io);
      case "search":
        return await search(rest, deps, io);
      case "test":
        return await selfTest(deps, io);
      case "serve":
        await deps.serve();
        return 0;
      case undefined:
      case "help":
      case "--help":
      case "-h":
        io.stdout(USAGE);
        return 0;
      default:
        throw new UsageError(`Unknown command: ${command}`);
    }
  } catch (err) {
    // parseArgs reports bad flags as TypeError with an ERR_PARSE_ARGS_* code
    const code: unknown = err instanceof Error ? Reflect.get(err, "code") : undefined;
    const parseError = typeof code === "string" && code.startsWith("ERR_PARSE_ARGS");
    if (err instanceof UsageError || parseError) {
      io.stderr(`${err instanceof Error ? err.message : String(err)}\n\n${USAGE}`);
      return 2;
    }
    throw err;
  }
}
