/**
 * Purdue Brightspace MCP Server
 * Copyright (c) 2025 Rohan Muppa. All rights reserved.
 * Licensed under AGPL-3.0 — see LICENSE file for details.
 */

// Entity kinds the server knows how to address. Paths are the API's
// singular-noun resources; codeField is what humans type instead of the id.
export interface EntityDefinition {
  path: string;
  label: string;
  codeField: string;
}

export const ENTITIES = {
  contactAccount: { path: "contactaccount", label: "Contact account", codeField: "code" },
  department: { path: "department", label: "Department", codeField: "code" },
  costCentre: { path: "costcentre", label: "Cost centre", codeField: "code" },
  project: { path: "project", label: "Project", codeField: "code" },
  product: { path: "product", label: "Product", codeField: "code" },
  legalEntity: { path: "legalentity", label: "Legal entity", codeField: "code" },
  document: { path: "document", label: "Document", codeField: "docNo" },
  purchaseInvoice: { path: "purchaseinvoice", label: "Purchase invoice", codeField: "docNo" },
  saleInvoice: { path: "saleinvoice", label: "Sales invoice", codeField: "docNo" },
  purchaseOrder: { path: "purchaseorder", label: "Purchase order", codeField: "docNo" },
  saleOrder: { path: "saleorder", label: "Sales order", codeField: "docNo" },
  payment: { path: "payment", label: "Payment", codeField: "docNo" },
  batchPayment: { path: "batchpayment", label: "Batch payment", codeField: "docNo" },
} as const satisfies Record<string, EntityDefinition>;

export type EntityKind = keyof typeof ENTITIES;

// Document classes whose creation needs a docTypeId and legalEntityId
export const INVOICE_KINDS = ["purchaseInvoice", "saleInvoice"] as const;
export type InvoiceKind = (typeof INVOICE_KINDS)[number];

export function isInvoiceKind(kind: EntityKind): kind is InvoiceKind {
  return kind === "purchaseInvoice" || kind === "saleInvoice";
}

export type TransitionAction = "post" | "approve" | "reverse";

// Payload fields that hold a reference to another entity
export const REFERENCE_FIELDS: Record<string, EntityKind> = {
  contactAccountId: "contactAccount",
  departmentId: "department",
  costCentreId: "costCentre",
  projectId: "project",
  productId: "product",
  legalEntityId: "legalEntity",
};

export function resourcePath(kind: EntityKind, id?: string, action?: string): string {
  const base = ENTITIES[kind].path;
  const parts: string[] = [base];
  if (id !== undefined) parts.push(encodeURIComponent(id));
  if (action !== undefined) parts.push(action);
  return parts.join("/");
}
