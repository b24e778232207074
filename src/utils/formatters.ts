/**
 * Purdue Brightspace MCP Server
 * Copyright (c) 2025 Rohan Muppa. All rights reserved.
 * Licensed under AGPL-3.0 — see LICENSE file for details.
 */

// Markdown rendering for tool results. Tool handlers pick "json" or
// "markdown"; JSON is the data as returned, markdown is for people.

import type { Resource } from "../types/index.js";

export type OutputFormat = "json" | "markdown";

interface Column {
  header: string;
  value: (item: Resource) => string;
}

// Numeric document statuses the API uses; others are shown as the number
const DOCUMENT_STATUS: Record<number, string> = {
  2: "Draft",
  160: "Posted",
};

export function formatStatus(status: unknown): string {
  if (typeof status === "number") {
    return DOCUMENT_STATUS[status] ?? String(status);
  }
  return text(status);
}

export function formatDate(value: unknown): string {
  if (typeof value !== "string" || !value) return "N/A";
  const match = /^(\d{4}-\d{2}-\d{2})/.exec(value);
  return match ? match[1] : value;
}

export function formatCurrency(amount: unknown, symbol = "£"): string {
  const num = typeof amount === "number" ? amount : typeof amount === "string" ? Number(amount) : NaN;
  if (amount === null || amount === undefined || amount === "") return "N/A";
  if (Number.isNaN(num)) return String(amount);
  return `${symbol}${num.toLocaleString("en-GB", { minimumFractionDigits: 2, maximumFractionDigits: 2 })}`;
}

function text(value: unknown, fallback = "N/A"): string {
  if (value === null || value === undefined || value === "") return fallback;
  if (typeof value === "object") return JSON.stringify(value);
  // Pipes would break the table
  return String(value).replace(/\|/g, "\\|");
}

function first(item: Resource, ...fields: string[]): unknown {
  for (const field of fields) {
    if (item[field] !== undefined && item[field] !== null) return item[field];
  }
  return undefined;
}

function nested(item: Resource, key: string): Resource | undefined {
  const value = item[key];
  return typeof value === "object" && value !== null && !Array.isArray(value)
    ? Object.fromEntries(Object.entries(value))
    : undefined;
}

export function contactType(contact: Resource): string {
  if (nested(contact, "supplier")) return "Supplier";
  if (nested(contact, "customer")) return "Customer";
  return "Contact";
}

export function isContactActive(contact: Resource): boolean {
  const role = nested(contact, "supplier") ?? nested(contact, "customer");
  return role?.isActive !== false;
}

const col = (header: string, ...fields: string[]): Column => ({
  header,
  value: (item) => text(first(item, ...fields)),
});

const DOCUMENT_COLUMNS: Column[] = [
  col("Doc Class", "docClass"),
  col("Doc No", "docNo", "number"),
  { header: "Date", value: (d) => formatDate(first(d, "docDate", "date")) },
  col("Contact", "contactAccountDescription", "contact"),
  { header: "Amount", value: (d) => formatCurrency(first(d, "total", "amount")) },
  { header: "Status", value: (d) => formatStatus(d.status) },
];

export interface ListLayout {
  title: string;
  noun: string;
  columns: readonly Column[];
}

export const LIST_LAYOUTS = {
  documents: { title: "Documents", noun: "documents", columns: DOCUMENT_COLUMNS },
  contacts: {
    title: "Contact Accounts",
    noun: "contacts",
    columns: [
      col("Code", "code"),
      col("Name", "description", "name"),
      { header: "Type", value: contactType },
      col("Country", "countryCode"),
      { header: "Active", value: (c) => (isContactActive(c) ? "✓" : "✗") },
    ],
  },
  projects: {
    title: "Projects",
    noun: "projects",
    columns: [
      col("Code", "code"),
      col("Description", "description"),
      { header: "Start Date", value: (p) => formatDate(p.dateFrom) },
      { header: "Status", value: (p) => (p.isActive === false ? "Inactive" : "Active") },
    ],
  },
  products: {
    title: "Products",
    noun: "products",
    columns: [
      col("Code", "code"),
      col("Description", "description", "name"),
      col("Type", "productType"),
      { header: "Price", value: (p) => formatCurrency(first(p, "salePrice", "price")) },
      { header: "Active", value: (p) => (p.isActive === false ? "✗" : "✓") },
    ],
  },
  departments: {
    title: "Departments",
    noun: "departments",
    columns: [
      col("Code", "code"),
      col("Name", "description", "name"),
      { header: "Active", value: (d) => (d.active === false ? "✗" : "✓") },
    ],
  },
  costCentres: {
    title: "Cost Centres",
    noun: "cost centres",
    columns: [
      col("Code", "code"),
      col("Name", "description", "name"),
      { header: "Active", value: (c) => (c.active === false ? "✗" : "✓") },
    ],
  },
  purchaseOrders: { title: "Purchase Orders", noun: "purchase orders", columns: DOCUMENT_COLUMNS },
  saleOrders: { title: "Sales Orders", noun: "sales orders", columns: DOCUMENT_COLUMNS },
  payments: { title: "Payments", noun: "payments", columns: DOCUMENT_COLUMNS },
  batchPayments: {
    title: "Batch Payments",
    noun: "batch payments",
    columns: [
      col("Doc No", "docNo", "number"),
      { header: "Date", value: (b) => formatDate(first(b, "docDate", "date")) },
      col("Description", "description"),
      { header: "Amount", value: (b) => formatCurrency(first(b, "total", "amount")) },
      { header: "Status", value: (b) => formatStatus(b.status) },
    ],
  },
} satisfies Record<string, ListLayout>;

export type ListContext = keyof typeof LIST_LAYOUTS;

/**
 * Render a list as a markdown table. `totalCount` above the item count adds
 * a "showing first N" note.
 */
export function formatList(context: ListContext, items: Resource[], totalCount = items.length): string {
  const layout: ListLayout = LIST_LAYOUTS[context];
  if (items.length === 0) {
    return `No ${layout.noun} found.`;
  }

  const lines = [`## ${layout.title}`, ""];
  let summary = `Found **${items.length}** ${layout.noun}`;
  if (totalCount > items.length) {
    summary += ` (showing first ${items.length} of ${totalCount} total)`;
  }
  lines.push(summary, "");

  lines.push(`| ${layout.columns.map((c) => c.header).join(" | ")} |`);
  lines.push(`|${layout.columns.map((c) => "-".repeat(c.header.length + 2)).join("|")}|`);
  for (const item of items) {
    lines.push(`| ${layout.columns.map((c) => c.value(item)).join(" | ")} |`);
  }
  return lines.join("\n");
}

function lineItems(doc: Resource): Resource[] {
  const raw = first(doc, "details", "lines");
  if (!Array.isArray(raw)) return [];
  return raw.filter(
    (line): line is Resource => typeof line === "object" && line !== null && !Array.isArray(line),
  );
}

// Header fields plus a line-item table when the document carries lines
export function formatDocument(doc: Resource, heading = "Document Details"): string {
  const lines = [
    `## ${heading}`,
    "",
    `**Document:** ${text(doc.docClass)} ${text(first(doc, "docNo", "number"))}`,
    "",
    `- **ID:** ${text(doc.id)}`,
    `- **Date:** ${formatDate(first(doc, "docDate", "date"))}`,
    `- **Contact:** ${text(doc.contactAccountDescription)}`,
    `- **Status:** ${formatStatus(doc.status)}`,
    `- **Total:** ${formatCurrency(first(doc, "total", "amount"))}`,
  ];
  if (doc.description) {
    lines.push(`- **Description:** ${text(doc.description)}`);
  }

  const details = lineItems(doc);
  if (details.length > 0) {
    lines.push("", `### Line Items (${details.length} items)`, "");
    lines.push("| Description | Quantity | Unit Price | Amount |");
    lines.push("|-------------|----------|------------|--------|");
    for (const line of details) {
      lines.push(
        `| ${text(line.description)} | ${text(line.quantity, "")} | ${formatCurrency(first(line, "unitPrice", "price"))} | ${formatCurrency(first(line, "amount", "netAmount", "total"))} |`,
      );
    }
  }
  return lines.join("\n");
}

export function formatContact(contact: Resource): string {
  const lines = [
    `## Contact Account: ${text(first(contact, "description", "name"))}`,
    "",
    `- **Code:** ${text(contact.code)}`,
    `- **Country:** ${text(contact.countryCode)}`,
    `- **ID:** ${text(contact.id)}`,
  ];
  for (const role of ["supplier", "customer"] as const) {
    const info = nested(contact, role);
    if (!info) continue;
    lines.push(
      "",
      `### ${role === "supplier" ? "Supplier" : "Customer"} Information`,
      "",
      `- **Active:** ${info.isActive ? "Yes" : "No"}`,
      `- **Currency:** ${text(info.currency)}`,
    );
  }
  return lines.join("\n");
}

// Scalar fields as a bullet list; nested objects and arrays are skipped
export function formatRecord(title: string, record: Resource): string {
  const lines = [`## ${title}`, ""];
  for (const [key, value] of Object.entries(record)) {
    if (typeof value === "object" && value !== null) continue;
    lines.push(`- **${key}:** ${text(value, "")}`);
  }
  return lines.join("\n");
}

export function render(format: OutputFormat, data: unknown, markdown: () => string): string {
  return format === "json" ? JSON.stringify(data, null, 2) : markdown();
}
