#!/usr/bin/env node
import { runCli } from "./cli/runCli.js";
import { MarketDataClient, createYahooFinanceProvider } from "./market_data/index.js";
import { startStdioServer } from "./server.js";

const client = new MarketDataClient(createYahooFinanceProvider());

runCli(process.argv.slice(2), { client, serve: () => startStdioServer(client) })
  .then((code) => {
    process.exitCode = code;
  })
  .catch((err) => {
    console.error("Fatal error:", err);
    process.exit(1);
  });
