/**
 * Purdue Brightspace MCP Server
 * Copyright (c) 2025 Rohan Muppa. All rights reserved.
 * Licensed under AGPL-3.0 — see LICENSE file for details.
 */

import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import type { CallToolResult } from "@modelcontextprotocol/sdk/types.js";
import type { AccountingSession, TransitionAction, WritePayload } from "../api/index.js";
import { ApproveDocumentSchema, PostDocumentSchema, ReverseDocumentSchema } from "./schemas.js";
import { textResponse, sanitizeError } from "./tool-helpers.js";
import { formatDocument, render, type OutputFormat } from "../utils/formatters.js";
import { log } from "../utils/logger.js";

interface TransitionRequest {
  documentId: string;
  format: OutputFormat;
  body: WritePayload;
}

const HEADINGS: Record<TransitionAction, string> = {
  post: "Document Posted",
  approve: "Document Approved",
  reverse: "Document Reversed",
};

// Tool input -> request body in the API's field names
function parseTransition(action: TransitionAction, args: unknown): TransitionRequest {
  switch (action) {
    case "post": {
      const { documentId, format, postingDate } = PostDocumentSchema.parse(args);
      return { documentId, format, body: { postingDate } };
    }
    case "approve": {
      const { documentId, format, note } = ApproveDocumentSchema.parse(args);
      return { documentId, format, body: { note } };
    }
    case "reverse": {
      const { documentId, format, reversalDate, reason } = ReverseDocumentSchema.parse(args);
      return { documentId, format, body: { reversalDate, reason } };
    }
  }
}

export async function handleTransition(
  session: AccountingSession,
  action: TransitionAction,
  args: unknown,
): Promise<CallToolResult> {
  try {
    log("DEBUG", `${action}_document tool called`);
    const { documentId, format, body } = parseTransition(action, args);

    const document = await session.transition(documentId, "document", action, body);
    log("INFO", `${action}_document: ${String(document.id)} now has status ${String(document.status)}`);

    return textResponse(render(format, document, () => formatDocument(document, HEADINGS[action])));
  } catch (error) {
    return sanitizeError(error);
  }
}

/**
 * Register post_document, approve_document and reverse_document tools
 */
export function registerDocumentWorkflow(server: McpServer, session: AccountingSession): void {
  server.registerTool(
    "post_document",
    {
      title: "Post Document",
      description:
        "Post a draft document to the ledger. Only draft documents can be posted. Optionally set the posting date.",
      inputSchema: PostDocumentSchema,
    },
    async (args: unknown) => handleTransition(session, "post", args),
  );

  server.registerTool(
    "approve_document",
    {
      title: "Approve Document",
      description: "Approve a document in an approval workflow, with an optional note.",
      inputSchema: ApproveDocumentSchema,
    },
    async (args: unknown) => handleTransition(session, "approve", args),
  );

  server.registerTool(
    "reverse_document",
    {
      title: "Reverse Document",
      description:
        "Reverse a posted document by creating a reversing entry on the given date. A reason is recommended.",
      inputSchema: ReverseDocumentSchema,
    },
    async (args: unknown) => handleTransition(session, "reverse", args),
  );
}
