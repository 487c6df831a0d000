import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { CallToolRequestSchema } from "@modelcontextprotocol/sdk/types.js";
import type { ToolRegistry } from "./registry.js";
import { toCallToolResult } from "./respond.js";
import { success } from "./tool.js";

export const SERVER_NAME = "multi-tool-server";
export const SERVER_VERSION = "1.0.0";
export const STATUS_TOOL = "get_server_status";

function serverStatus(registry: ToolRegistry) {
  const { loaded, skipped, totalOperationCount } = registry.report;
  return success({
    loaded,
    skipped,
    total_operation_count: totalOperationCount,
    unavailable_tools: registry.unavailable(),
  });
}

/**
 * Expose every loaded operation as an MCP tool, plus `get_server_status`.
 * Every call, listed or not, is answered through `registry.invoke`, so the
 * caller always gets a ToolResult envelope: a skipped group's tool reports
 * the missing configuration and bad arguments report the failing fields.
 * `registry.build()` must have run first.
 */
export function createServer(registry: ToolRegistry): McpServer {
  const { loaded } = registry.report;

  const server = new McpServer({
    name: SERVER_NAME,
    version: SERVER_VERSION,
    description: `Notion, Todoist and Obsidian tools. Loaded: ${loaded.length > 0 ? loaded.join(", ") : "none"}. Use ${STATUS_TOOL} to see why a group is unavailable.`,
  });

  const callTool = async (name: string, args: unknown) =>
    name === STATUS_TOOL ? toCallToolResult(serverStatus(registry)) : toCallToolResult(await registry.invoke(name, args));

  // Schemas are registered for listing
  for (const op of registry.list()) {
    server.tool(op.name, op.description, op.schema, (args) => callTool(op.name, args));
  }

  // Tool: get_server_status
  server.tool(
    STATUS_TOOL,
    "Show which tool groups are loaded, and for each skipped group the missing configuration and the tools it would provide",
    () => callTool(STATUS_TOOL, {}),
  );

  // McpServer rejects unlisted names and schema failures with protocol errors
  // before any callback runs; the registry validates and explains both instead.
  server.server.setRequestHandler(CallToolRequestSchema, (request) =>
    callTool(request.params.name, request.params.arguments),
  );

  return server;
}
