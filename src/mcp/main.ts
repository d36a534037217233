#!/usr/bin/env node
/**
 * MCP server entry point (stdio transport). Clients spawn this process and
 * talk JSON-RPC over stdin/stdout.
 */
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { loadConfig } from "../config/load.js";
import { createLogger } from "../utils/log.js";
import { SERVER_NAME, SERVER_VERSION, createServer } from "./server.js";

async function main(): Promise<void> {
  const cfg = loadConfig();
  const log = createLogger(SERVER_NAME, cfg.logLevel);
  const server = createServer({ logger: log });
  await server.connect(new StdioServerTransport());
  log.info("v%s ready (engine=%s, workspace=%s)", SERVER_VERSION, cfg.defaultEngine, cfg.workspaceRoot ?? "unrestricted");
}

main().catch((err) => {
  // stderr only; a non-zero exit lets the supervising client notice
  console.error("MCP server failed:", err);
  process.exit(1);
});
