#!/usr/bin/env node
/**
 * MCP server entry point (stdio transport). Clients spawn this process and
 * speak MCP JSON-RPC over stdin/stdout; diagnostics go to stderr.
 */
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { loadConfig } from "../config/load.js";
import { createServer } from "./server.js";
import { NAME, VERSION } from "../meta.js";

async function main(): Promise<void> {
  const config = loadConfig();
  const server = createServer(config);
  const transport = new StdioServerTransport();
  await server.connect(transport);
  console.error(`${NAME} MCP server v${VERSION} listening on stdio`);
}

main().catch((err) => {
  // Log to stderr and exit with non-zero code so supervising client can handle it
  console.error("MCP server failed:", err);
  process.exit(1);
});
