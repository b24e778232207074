/**
 * Purdue Brightspace MCP Server
 * Copyright (c) 2025 Rohan Muppa. All rights reserved.
 * Licensed under AGPL-3.0 — see LICENSE file for details.
 */

import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import type { CallToolResult } from "@modelcontextprotocol/sdk/types.js";
import type { AccountingSession } from "../api/index.js";
import { UpdateDocumentSchema } from "./schemas.js";
import { textResponse, sanitizeError } from "./tool-helpers.js";
import { formatDocument, render } from "../utils/formatters.js";
import { log } from "../utils/logger.js";

export async function handleUpdateDocument(
  session: AccountingSession,
  args: unknown,
): Promise<CallToolResult> {
  try {
    log("DEBUG", "update_document tool called");
    const { documentId, format, ...fields } = UpdateDocumentSchema.parse(args);

    const document = await session.update(documentId, "document", fields);
    log("INFO", `update_document: Updated ${String(document.id)}`);

    return textResponse(render(format, document, () => formatDocument(document, "Document Updated")));
  } catch (error) {
    return sanitizeError(error);
  }
}

/**
 * Register update_document tool
 */
export function registerUpdateDocument(server: McpServer, session: AccountingSession): void {
  server.registerTool(
    "update_document",
    {
      title: "Update Document",
      description:
        "Change fields of a draft document (description, references, dates, contact, lines). Posted or approved documents cannot be modified; iplicit's reason is returned as given.",
      inputSchema: UpdateDocumentSchema,
    },
    async (args: unknown) => handleUpdateDocument(session, args),
  );
}
