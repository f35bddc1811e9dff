import path from "node:path";

export interface ToolCallLogConfig {
  enabled: boolean;
  /** Rotatable working log */
  ephemeralPath: string;
  /** Append-only historical log */
  eventPath: string;
}

export interface ServerConfig {
  toolCallLog: ToolCallLogConfig;
}

const DISABLED_VALUES = new Set(["off", "false", "0", "no"]);

/**
 * Build config from env:
 * MCP_LOG_EPHEMERAL_PATH, MCP_LOG_EVENTS_PATH, MCP_TOOL_LOG (off/false/0/no disables)
 */
export function getServerConfig(
  env: NodeJS.ProcessEnv = process.env,
  cwd: string = process.cwd()
): ServerConfig {
  const toggle = env.MCP_TOOL_LOG?.trim().toLowerCase();
  return {
    toolCallLog: {
      enabled: toggle === undefined || !DISABLED_VALUES.has(toggle),
      ephemeralPath: env.MCP_LOG_EPHEMERAL_PATH?.trim() || path.join(cwd, "logs", "ephemeral.jsonl"),
      eventPath: env.MCP_LOG_EVENTS_PATH?.trim() || path.join(cwd, "logs", "events.jsonl"),
    },
  };
}
