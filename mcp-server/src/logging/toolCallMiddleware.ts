/**
 * Wraps a tool handler so every call is timed and logged (intent category +
 * outcome) to the JSONL streams. The handler's result is returned unchanged;
 * an exception from the handler is logged and rethrown for the SDK to turn
 * into a protocol error.
 */

import { randomUUID } from "node:crypto";
import type { ToolCallLogConfig } from "../config.js";
import type { ToolResult } from "../tools/result.js";
import { logToolCall, type ToolCallOutcome } from "./toolCallLog.js";

export type IntentCategory = "StockQuote" | "PriceHistory" | "FxRates" | "TickerSearch";

export function wrapWithToolCallLogging<A extends Record<string, unknown>>(
  toolName: string,
  intentCategory: IntentCategory,
  config: ToolCallLogConfig,
  handler: (args: A) => Promise<ToolResult>
): (args: A, _extra?: unknown) => Promise<ToolResult> {
  return async (args: A, _extra?: unknown) => {
    const start = Date.now();
    const record = (outcome: ToolCallOutcome, errorReason?: string) =>
      logToolCall(config, {
        eventType: "tool_call",
        timestamp: new Date(start).toISOString(),
        callId: `${toolName}-${randomUUID()}`,
        toolName,
        intentCategory,
        args,
        outcome,
        durationMs: Date.now() - start,
        ...(errorReason ? { errorReason } : {}),
      });

    let result: ToolResult;
    try {
      result = await handler(args);
    } catch (err) {
      await record("exception", err instanceof Error ? err.message : String(err));
      throw err;
    }
    await record(result.isError ? "error" : "ok");
    return result;
  };
}
