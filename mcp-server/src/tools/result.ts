/** MCP tool result shape shared by every handler (matches the SDK's CallToolResult) */
export type ToolResult = {
  content: Array<{ type: "text"; text: string }>;
  isError?: boolean;
};

/** Serialize a payload as one JSON text block; non-ASCII is kept as-is. */
export function jsonResult(payload: unknown, isError = false): ToolResult {
  const result: ToolResult = {
    content: [{ type: "text", text: JSON.stringify(payload, null, 2) }],
  };
  return isError ? { ...result, isError: true } : result;
}

export function errorResult(message: string): ToolResult {
  return jsonResult({ error: message }, true);
}
