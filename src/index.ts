#!/usr/bin/env node
/**
 * Purdue Brightspace MCP Server
 * Copyright (c) 2025 Rohan Muppa. All rights reserved.
 * Licensed under AGPL-3.0 — see LICENSE file for details.
 */

import dotenv from "dotenv";
import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { enableStdoutGuard, log, setLogLevel } from "./utils/logger.js";
import { loadConfig } from "./utils/config.js";
import { createSession } from "./api/index.js";
import { registerAllTools } from "./tools/index.js";

// CRITICAL: Enable stdout guard IMMEDIATELY to prevent corruption of stdio transport
enableStdoutGuard();

dotenv.config({ quiet: true });

// Unhandled rejection handler
process.on("unhandledRejection", (reason) => {
  log("ERROR", "Unhandled promise rejection", reason);
});

async function main(): Promise<void> {
  // Load configuration
  const config = loadConfig();
  setLogLevel(config.logLevel);
  log("DEBUG", "Configuration loaded", {
    baseUrl: config.baseUrl,
    domain: config.domain,
    rateLimit: config.rateLimit,
  });

  // Create MCP server instance
  const server = new McpServer({
    name: "iplicit",
    version: "0.1.0",
  });

  // No network call here: the first tool call opens the session
  const session = createSession(config);
  registerAllTools(server, session);
  log("DEBUG", "MCP tools registered");

  // Connect stdio transport
  const transport = new StdioServerTransport();
  await server.connect(transport);

  log("INFO", `iplicit MCP Server running on stdio (domain ${config.domain})`);
}

// Graceful shutdown
process.on("SIGINT", () => {
  log("INFO", "Shutting down MCP server");
  process.exit(0);
});
process.on("SIGTERM", () => {
  log("INFO", "Shutting down MCP server");
  process.exit(0);
});

main().catch((error: unknown) => {
  log("ERROR", "MCP Server failed to start", error);
  process.exit(1);
});
