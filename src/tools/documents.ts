/**
 * Purdue Brightspace MCP Server
 * Copyright (c) 2025 Rohan Muppa. All rights reserved.
 * Licensed under AGPL-3.0 — see LICENSE file for details.
 */

import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import type { CallToolResult } from "@modelcontextprotocol/sdk/types.js";
import type { AccountingSession } from "../api/index.js";
import { GetDocumentSchema, SearchDocumentsSchema } from "./schemas.js";
import { textResponse, sanitizeError } from "./tool-helpers.js";
import { formatDocument, formatList, render } from "../utils/formatters.js";
import { log } from "../utils/logger.js";

// The document endpoint pages at 100
const MAX_PAGE_SIZE = 100;

export async function handleSearchDocuments(
  session: AccountingSession,
  args: unknown,
): Promise<CallToolResult> {
  try {
    log("DEBUG", "search_documents tool called", { args });
    const input = SearchDocumentsSchema.parse(args);

    const items = await session.list("document", {
      query: {
        fromDate: input.fromDate,
        toDate: input.toDate,
        docClass: input.docClass,
        status: input.status,
        contactAccount: input.contactAccount,
        pageSize: Math.min(input.limit, MAX_PAGE_SIZE),
      },
    });
    const documents = items.slice(0, input.limit);

    log("INFO", `search_documents: Retrieved ${documents.length} documents`);
    return textResponse(
      render(input.format, { items: documents, totalCount: documents.length }, () =>
        formatList("documents", documents),
      ),
    );
  } catch (error) {
    return sanitizeError(error);
  }
}

export async function handleGetDocument(
  session: AccountingSession,
  args: unknown,
): Promise<CallToolResult> {
  try {
    log("DEBUG", "get_document tool called", { args });
    const { documentId, format } = GetDocumentSchema.parse(args);

    const document = await session.fetchEntity(documentId, "document");
    return textResponse(render(format, document, () => formatDocument(document)));
  } catch (error) {
    return sanitizeError(error);
  }
}

/**
 * Register search_documents and get_document tools
 */
export function registerDocumentTools(server: McpServer, session: AccountingSession): void {
  server.registerTool(
    "search_documents",
    {
      title: "Search Documents",
      description:
        "Search iplicit documents (invoices, credit notes, journals, payments) by date range, document class, status or contact account. Returns a table of matching documents with key details.",
      inputSchema: SearchDocumentsSchema,
    },
    async (args: unknown) => handleSearchDocuments(session, args),
  );

  server.registerTool(
    "get_document",
    {
      title: "Get Document",
      description:
        "Retrieve one document by ID or document number, including header information and line items.",
      inputSchema: GetDocumentSchema,
    },
    async (args: unknown) => handleGetDocument(session, args),
  );
}
