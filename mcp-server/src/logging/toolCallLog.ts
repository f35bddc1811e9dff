/**
 * Tool-call logging for the MCP server.
 *
 * - One record per tool invocation: tool, intent category, args, outcome
 * - ML-ready: JSONL format
 * - Two streams: ephemeral logs and immutable historical events
 */

import { promises as fs } from "node:fs";
import path from "node:path";
import type { ToolCallLogConfig } from "../config.js";

export type ToolCallOutcome = "ok" | "error" | "exception";

export interface ToolCallLog {
  eventType: "tool_call";
  timestamp: string;
  callId: string;
  toolName: string;
  intentCategory: string;
  args: Record<string, unknown>;
  outcome: ToolCallOutcome;
  durationMs: number;
  errorReason?: string;
}

async function appendJsonLine(filePath: string, record: ToolCallLog): Promise<void> {
  await fs.mkdir(path.dirname(filePath), { recursive: true });
  await fs.appendFile(filePath, `${JSON.stringify(record)}\n`, "utf8");
}

/** Write to both streams. Never throws: a write failure is reported on stderr. */
export async function logToolCall(config: ToolCallLogConfig, record: ToolCallLog): Promise<void> {
  if (!config.enabled) return;
  try {
    await Promise.all([
      appendJsonLine(config.ephemeralPath, record),
      appendJsonLine(config.eventPath, record),
    ]);
  } catch (err) {
    // stderr only (STDIO-safe)
    console.error("[toolCallLog] Failed to write logs:", err);
  }
}
