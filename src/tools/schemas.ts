/**
 * Purdue Brightspace MCP Server
 * Copyright (c) 2025 Rohan Muppa. All rights reserved.
 * Licensed under AGPL-3.0 — see LICENSE file for details.
 */

import { z } from "zod";

/**
 * Zod schemas for MCP tool input validation.
 * Passed to the MCP SDK as inputSchema (it detects Zod v4 via the ._zod property).
 * Also used in tool handlers for runtime parsing via .parse(args).
 */

const isoDate = z.string().regex(/^\d{4}-\d{2}-\d{2}(T[\d:.]+Z?)?$/, "Expected an ISO date (YYYY-MM-DD)");

const format = z.enum(["json", "markdown"]).default("markdown")
  .describe("Response format: markdown for reading, json for the raw records");

const limit = (max: number, fallback = 50) =>
  z.number().int().min(1).max(max).default(fallback).describe("Maximum number of results");

const reference = (what: string) =>
  z.string().trim().min(1).describe(`${what} ID (UUID) or code`);

export const SearchDocumentsSchema = z.object({
  fromDate: isoDate.optional().describe("Start date filter (YYYY-MM-DD)"),
  toDate: isoDate.optional().describe("End date filter (YYYY-MM-DD)"),
  docClass: z.string().optional()
    .describe("Document class, e.g. PurchaseInvoice, SaleInvoice, Journal"),
  status: z.string().optional()
    .describe("Document status: draft, outstanding, posted, approved, reversed, abandoned"),
  contactAccount: z.string().optional().describe("Contact account code or ID to filter by"),
  limit: limit(100),
  format,
});

export const GetDocumentSchema = z.object({
  documentId: reference("Document").describe("Document ID (UUID) or document number"),
  format,
});

export const SearchContactAccountsSchema = z.object({
  searchTerm: z.string().optional().describe("Case-insensitive match on code or name"),
  accountType: z.enum(["supplier", "customer", "all"]).default("all")
    .describe("Only suppliers, only customers, or both"),
  activeOnly: z.boolean().default(true).describe("Only return active accounts"),
  limit: limit(500),
  format,
});

export const GetContactAccountSchema = z.object({
  accountId: reference("Contact account"),
  format,
});

export const SearchCatalogSchema = z.object({
  searchTerm: z.string().optional().describe("Case-insensitive match on code or description"),
  activeOnly: z.boolean().default(true).describe("Only return active records"),
  limit: limit(500),
  format,
});

export const SearchProjectsSchema = SearchCatalogSchema.extend({
  status: z.enum(["active", "inactive"]).optional()
    .describe("Filter by project status; overrides activeOnly"),
});

export const SearchProductsSchema = SearchCatalogSchema.extend({
  productType: z.string().optional().describe("Exact product type to filter by"),
});

export const GetCatalogItemSchema = z.object({
  id: reference("Record"),
  format,
});

export const SearchOrdersSchema = z.object({
  fromDate: isoDate.optional().describe("Start date filter (YYYY-MM-DD)"),
  toDate: isoDate.optional().describe("End date filter (YYYY-MM-DD)"),
  status: z.string().optional().describe("Filter by status, e.g. draft, approved, posted"),
  projectId: z.string().optional().describe("Project ID to filter by"),
  counterparty: z.string().optional()
    .describe("Case-insensitive match on the supplier or customer name"),
  limit: limit(500),
  format,
});

export const GetOrderSchema = z.object({
  orderId: reference("Order").describe("Order ID (UUID) or order number"),
  format,
});

export const SearchPaymentsSchema = z.object({
  fromDate: isoDate.optional().describe("Start date filter (YYYY-MM-DD)"),
  toDate: isoDate.optional().describe("End date filter (YYYY-MM-DD)"),
  contact: z.string().optional().describe("Case-insensitive match on the contact name"),
  minAmount: z.number().optional().describe("Minimum payment amount"),
  maxAmount: z.number().optional().describe("Maximum payment amount"),
  limit: limit(500),
  format,
});

export const SearchBatchPaymentsSchema = z.object({
  fromDate: isoDate.optional().describe("Start date filter (YYYY-MM-DD)"),
  toDate: isoDate.optional().describe("End date filter (YYYY-MM-DD)"),
  status: z.string().optional().describe("Filter by status, e.g. draft, posted"),
  limit: limit(500),
  format,
});

export const InvoiceLineSchema = z.object({
  description: z.string().min(1).describe("Line description"),
  quantity: z.number().positive().default(1),
  unitPrice: z.number().describe("Price per unit, excluding tax"),
  netAmount: z.number().optional().describe("Net line amount; the API computes it when omitted"),
  taxCodeId: z.string().optional().describe("Tax code ID"),
  productId: z.string().optional().describe("Product ID or code"),
  departmentId: z.string().optional().describe("Department ID or code"),
  costCentreId: z.string().optional().describe("Cost centre ID or code"),
  projectId: z.string().optional().describe("Project ID or code"),
});

const invoiceFields = {
  contactAccountId: reference("Contact account"),
  docDate: isoDate.describe("Document date (YYYY-MM-DD)"),
  dueDate: isoDate.describe("Payment due date (YYYY-MM-DD)"),
  currency: z.string().length(3).toUpperCase().optional()
    .describe("Currency code, e.g. GBP. Defaults to the configured currency."),
  docTypeId: z.string().optional()
    .describe("Document type ID. Defaults to the type of the most recent invoice."),
  legalEntityId: z.string().optional()
    .describe("Legal entity ID or code. Defaults to the first legal entity."),
  description: z.string().optional().describe("Invoice description"),
  paymentTermsId: z.string().optional().describe("Payment terms ID"),
  projectId: z.string().optional().describe("Project ID or code"),
  lines: z.array(InvoiceLineSchema).optional().describe("Invoice line items"),
  format,
};

export const CreatePurchaseInvoiceSchema = z.object({
  ...invoiceFields,
  theirDocNo: z.string().optional().describe("Supplier's invoice number"),
});

export const CreateSaleInvoiceSchema = z.object({
  ...invoiceFields,
  reference: z.string().optional().describe("Invoice reference"),
});

export const UpdateDocumentSchema = z.object({
  documentId: reference("Document").describe("Document ID (UUID) or document number to update"),
  description: z.string().optional(),
  theirDocNo: z.string().optional(),
  reference: z.string().optional(),
  docDate: isoDate.optional(),
  dueDate: isoDate.optional(),
  contactAccountId: z.string().optional().describe("Contact account ID or code"),
  lines: z.array(InvoiceLineSchema).optional().describe("Replacement line items"),
  format,
});

export const PostDocumentSchema = z.object({
  documentId: reference("Document").describe("Document ID (UUID) or document number to post"),
  postingDate: isoDate.optional().describe("Posting date; the document date when omitted"),
  format,
});

export const ApproveDocumentSchema = z.object({
  documentId: reference("Document").describe("Document ID (UUID) or document number to approve"),
  note: z.string().optional().describe("Approval note"),
  format,
});

export const ReverseDocumentSchema = z.object({
  documentId: reference("Document").describe("Document ID (UUID) or document number to reverse"),
  reversalDate: isoDate.describe("Reversal date (YYYY-MM-DD)"),
  reason: z.string().optional().describe("Reason for the reversal"),
  format,
});
