/**
 * Purdue Brightspace MCP Server
 * Copyright (c) 2025 Rohan Muppa. All rights reserved.
 * Licensed under AGPL-3.0 — see LICENSE file for details.
 */

import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import type { CallToolResult } from "@modelcontextprotocol/sdk/types.js";
import type { AccountingSession } from "../api/index.js";
import { textResponse, sanitizeError } from "./tool-helpers.js";
import { log } from "../utils/logger.js";

export async function handleCheckAuth(
  session: AccountingSession,
  now: () => number = Date.now,
): Promise<CallToolResult> {
  try {
    log("DEBUG", "check_auth tool called");
    await session.tokenStore.getToken();

    const credential = session.tokenStore.current;
    const expiresIn = credential ? Math.round((credential.expiresAt - now()) / 1000 / 60) : 0;
    const quota = session.client.limiter;
    log("INFO", `check_auth: Session valid, expires in ~${expiresIn} minutes`);

    return textResponse(
      `Authenticated with iplicit. Session expires in ~${expiresIn} minutes. ` +
        `${quota.available} requests left in the current rate-limit window.`,
    );
  } catch (error) {
    return sanitizeError(error);
  }
}

/**
 * Register check_auth tool (no input schema needed for zero-argument tool)
 */
export function registerCheckAuth(server: McpServer, session: AccountingSession): void {
  server.registerTool(
    "check_auth",
    {
      title: "Check Authentication Status",
      description:
        "Check that the server can open an iplicit session with the configured credentials. " +
        "Use this when the user asks if the connection works, or when other tools return auth errors.",
    },
    async () => handleCheckAuth(session),
  );
}
