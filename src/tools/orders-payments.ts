/**
 * Purdue Brightspace MCP Server
 * Copyright (c) 2025 Rohan Muppa. All rights reserved.
 * Licensed under AGPL-3.0 — see LICENSE file for details.
 */

import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import type { CallToolResult } from "@modelcontextprotocol/sdk/types.js";
import { ENTITIES, type AccountingSession } from "../api/index.js";
import {
  GetOrderSchema,
  SearchBatchPaymentsSchema,
  SearchOrdersSchema,
  SearchPaymentsSchema,
} from "./schemas.js";
import { textResponse, sanitizeError } from "./tool-helpers.js";
import { formatDocument, formatList, render } from "../utils/formatters.js";
import { amountRange, applyFilters, textMatch } from "../utils/record-filter.js";
import { log } from "../utils/logger.js";

type OrderKind = "purchaseOrder" | "saleOrder";

const ORDER_CONTEXT = {
  purchaseOrder: { tool: "purchase_orders", context: "purchaseOrders", counterparty: "supplier" },
  saleOrder: { tool: "sale_orders", context: "saleOrders", counterparty: "customer" },
} as const;

export async function handleSearchOrders(
  session: AccountingSession,
  kind: OrderKind,
  args: unknown,
): Promise<CallToolResult> {
  const { tool, context, counterparty } = ORDER_CONTEXT[kind];
  try {
    log("DEBUG", `search_${tool} tool called`, { args });
    const input = SearchOrdersSchema.parse(args);

    const all = await session.list(ENTITIES[kind].path, {
      query: {
        fromDate: input.fromDate,
        toDate: input.toDate,
        status: input.status,
        projectId: input.projectId,
        maxRecordCount: input.limit,
      },
    });
    const orders = applyFilters(
      all,
      [textMatch(input.counterparty, ["contactAccountDescription", counterparty])],
      input.limit,
    );

    log("INFO", `search_${tool}: Retrieved ${orders.length} orders`);
    return textResponse(
      render(input.format, { items: orders, totalCount: orders.length }, () => formatList(context, orders)),
    );
  } catch (error) {
    return sanitizeError(error);
  }
}

export async function handleGetOrder(
  session: AccountingSession,
  kind: OrderKind,
  args: unknown,
): Promise<CallToolResult> {
  try {
    log("DEBUG", `get ${kind} tool called`, { args });
    const { orderId, format } = GetOrderSchema.parse(args);

    const order = await session.fetchEntity(orderId, kind);
    return textResponse(render(format, order, () => formatDocument(order, ENTITIES[kind].label)));
  } catch (error) {
    return sanitizeError(error);
  }
}

export async function handleSearchPayments(session: AccountingSession, args: unknown): Promise<CallToolResult> {
  try {
    log("DEBUG", "search_payments tool called", { args });
    const input = SearchPaymentsSchema.parse(args);

    const all = await session.list(ENTITIES.payment.path, {
      query: { fromDate: input.fromDate, toDate: input.toDate, maxRecordCount: input.limit },
    });
    const payments = applyFilters(
      all,
      [
        textMatch(input.contact, ["contactAccountDescription", "contact"]),
        amountRange(input.minAmount, input.maxAmount),
      ],
      input.limit,
    );

    log("INFO", `search_payments: Retrieved ${payments.length} payments`);
    return textResponse(
      render(input.format, { items: payments, totalCount: payments.length }, () =>
        formatList("payments", payments),
      ),
    );
  } catch (error) {
    return sanitizeError(error);
  }
}

export async function handleSearchBatchPayments(
  session: AccountingSession,
  args: unknown,
): Promise<CallToolResult> {
  try {
    log("DEBUG", "search_batch_payments tool called", { args });
    const input = SearchBatchPaymentsSchema.parse(args);

    const all = await session.list(ENTITIES.batchPayment.path, {
      query: {
        fromDate: input.fromDate,
        toDate: input.toDate,
        status: input.status,
        maxRecordCount: input.limit,
      },
    });
    const batches = all.slice(0, input.limit);

    log("INFO", `search_batch_payments: Retrieved ${batches.length} batch payments`);
    return textResponse(
      render(input.format, { items: batches, totalCount: batches.length }, () =>
        formatList("batchPayments", batches),
      ),
    );
  } catch (error) {
    return sanitizeError(error);
  }
}

/**
 * Register purchase/sales order and payment tools
 */
export function registerOrderAndPaymentTools(server: McpServer, session: AccountingSession): void {
  for (const kind of ["purchaseOrder", "saleOrder"] as const) {
    const { tool, counterparty } = ORDER_CONTEXT[kind];
    const label = ENTITIES[kind].label;

    server.registerTool(
      `search_${tool}`,
      {
        title: `Search ${label}s`,
        description: `Search ${label.toLowerCase()}s by date range, status or project, and by ${counterparty} name.`,
        inputSchema: SearchOrdersSchema,
      },
      async (args: unknown) => handleSearchOrders(session, kind, args),
    );

    server.registerTool(
      `get_${tool.replace(/s$/, "")}`,
      {
        title: `Get ${label}`,
        description: `Retrieve one ${label.toLowerCase()} by ID or order number, including its lines.`,
        inputSchema: GetOrderSchema,
      },
      async (args: unknown) => handleGetOrder(session, kind, args),
    );
  }

  server.registerTool(
    "search_payments",
    {
      title: "Search Payments",
      description: "Search payments and receipts by date range, contact name and amount range.",
      inputSchema: SearchPaymentsSchema,
    },
    async (args: unknown) => handleSearchPayments(session, args),
  );

  server.registerTool(
    "search_batch_payments",
    {
      title: "Search Batch Payments",
      description: "Search batch payment runs by date range and status.",
      inputSchema: SearchBatchPaymentsSchema,
    },
    async (args: unknown) => handleSearchBatchPayments(session, args),
  );
}
