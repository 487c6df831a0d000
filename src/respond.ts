/** Shared MCP response helper: the ToolResult envelope as a single JSON text item. */
import type { ToolResult } from "./tool.js";

export function toCallToolResult(result: ToolResult) {
  const content = [{ type: "text" as const, text: JSON.stringify(result, null, 2) }];
  return result.success ? { content } : { content, isError: true as const };
}
