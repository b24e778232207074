/**
 * Purdue Brightspace MCP Server
 * Copyright (c) 2025 Rohan Muppa. All rights reserved.
 * Licensed under AGPL-3.0 — see LICENSE file for details.
 */

import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import type { CallToolResult } from "@modelcontextprotocol/sdk/types.js";
import { ENTITIES, type AccountingSession, type InvoiceKind } from "../api/index.js";
import { CreatePurchaseInvoiceSchema, CreateSaleInvoiceSchema } from "./schemas.js";
import { textResponse, sanitizeError } from "./tool-helpers.js";
import { formatDocument, render } from "../utils/formatters.js";
import { log } from "../utils/logger.js";

/**
 * Create a draft invoice. Codes in contactAccountId, projectId and the line
 * references are resolved to ids; docTypeId, legalEntityId and currency fall
 * back to defaults. The result is the invoice as read back from iplicit.
 */
export async function handleCreateInvoice(
  session: AccountingSession,
  kind: InvoiceKind,
  args: unknown,
): Promise<CallToolResult> {
  try {
    log("DEBUG", `create ${kind} tool called`);
    const { format, ...payload } = kind === "purchaseInvoice"
      ? CreatePurchaseInvoiceSchema.parse(args)
      : CreateSaleInvoiceSchema.parse(args);

    const invoice = await session.create(kind, payload);
    log("INFO", `Created ${ENTITIES[kind].label.toLowerCase()} ${String(invoice.id)}`);

    return textResponse(
      render(format, invoice, () => formatDocument(invoice, `${ENTITIES[kind].label} Created`)),
    );
  } catch (error) {
    return sanitizeError(error);
  }
}

/**
 * Register create_purchase_invoice and create_sale_invoice tools
 */
export function registerCreateInvoiceTools(server: McpServer, session: AccountingSession): void {
  server.registerTool(
    "create_purchase_invoice",
    {
      title: "Create Purchase Invoice",
      description:
        "Create a draft purchase invoice for a supplier. The supplier may be given by account code. Document type, legal entity and currency are filled in when omitted.",
      inputSchema: CreatePurchaseInvoiceSchema,
    },
    async (args: unknown) => handleCreateInvoice(session, "purchaseInvoice", args),
  );

  server.registerTool(
    "create_sale_invoice",
    {
      title: "Create Sales Invoice",
      description:
        "Create a draft sales invoice for a customer. The customer may be given by account code. Document type, legal entity and currency are filled in when omitted.",
      inputSchema: CreateSaleInvoiceSchema,
    },
    async (args: unknown) => handleCreateInvoice(session, "saleInvoice", args),
  );
}
