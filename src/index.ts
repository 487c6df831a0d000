#!/usr/bin/env node

import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { config as loadDotenv } from "dotenv";
import { ToolRegistry } from "./registry.js";
import { createServer } from "./server.js";
import { createToolGroups } from "./tools/index.js";

// Main function
async function main() {
  loadDotenv();

  // Registration runs once, before the transport accepts any call
  const registry = new ToolRegistry(createToolGroups());
  registry.build(process.env);

  const server = createServer(registry);
  const transport = new StdioServerTransport();
  await server.connect(transport);
  console.error("[multi-tool] MCP server running on stdio");
}

main().catch((error) => {
  console.error("[multi-tool] Fatal error:", error);
  process.exit(1);
});
