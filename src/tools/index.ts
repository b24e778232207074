/**
 * Purdue Brightspace MCP Server
 * Copyright (c) 2025 Rohan Muppa. All rights reserved.
 * Licensed under AGPL-3.0 — see LICENSE file for details.
 */

import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import type { AccountingSession } from "../api/index.js";
import { registerCheckAuth } from "./check-auth.js";
import { registerDocumentTools } from "./documents.js";
import { registerContactAccountTools } from "./contact-accounts.js";
import { registerCatalogTools } from "./catalog.js";
import { registerOrderAndPaymentTools } from "./orders-payments.js";
import { registerCreateInvoiceTools } from "./create-invoice.js";
import { registerUpdateDocument } from "./update-document.js";
import { registerDocumentWorkflow } from "./document-workflow.js";

// Tool registration functions - barrel export
export {
  registerCheckAuth,
  registerDocumentTools,
  registerContactAccountTools,
  registerCatalogTools,
  registerOrderAndPaymentTools,
  registerCreateInvoiceTools,
  registerUpdateDocument,
  registerDocumentWorkflow,
};

export function registerAllTools(server: McpServer, session: AccountingSession): void {
  registerCheckAuth(server, session);
  registerDocumentTools(server, session);
  registerContactAccountTools(server, session);
  registerCatalogTools(server, session);
  registerOrderAndPaymentTools(server, session);
  registerCreateInvoiceTools(server, session);
  registerUpdateDocument(server, session);
  registerDocumentWorkflow(server, session);
}

// Re-export shared helpers and schemas for convenience
export { toolResponse, textResponse, errorResponse, sanitizeError, describeError } from "./tool-helpers.js";
export * from "./schemas.js";
