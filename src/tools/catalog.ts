/**
 * Purdue Brightspace MCP Server
 * Copyright (c) 2025 Rohan Muppa. All rights reserved.
 * Licensed under AGPL-3.0 — see LICENSE file for details.
 */

// Reference data: projects, products, departments and cost centres.
// Each has a search tool (list + client-side filters) and a get tool
// (id or code through the resolver).

import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import type { CallToolResult } from "@modelcontextprotocol/sdk/types.js";
import type { z } from "zod";
import { ENTITIES, type AccountingSession, type EntityKind } from "../api/index.js";
import {
  GetCatalogItemSchema,
  SearchCatalogSchema,
  SearchProductsSchema,
  SearchProjectsSchema,
} from "./schemas.js";
import { textResponse, sanitizeError } from "./tool-helpers.js";
import { formatList, formatRecord, render, type ListContext } from "../utils/formatters.js";
import { activeFlag, applyFilters, textMatch, type RecordPredicate } from "../utils/record-filter.js";
import { log } from "../utils/logger.js";

type CatalogKind = Extract<EntityKind, "project" | "product" | "department" | "costCentre">;
type SearchInput = z.infer<typeof SearchCatalogSchema>;

interface CatalogDefinition {
  kind: CatalogKind;
  plural: string; // tool name suffix
  context: ListContext;
  activeField: string;
}

export const CATALOGS: Record<CatalogKind, CatalogDefinition> = {
  project: { kind: "project", plural: "projects", context: "projects", activeField: "isActive" },
  product: { kind: "product", plural: "products", context: "products", activeField: "isActive" },
  department: { kind: "department", plural: "departments", context: "departments", activeField: "active" },
  costCentre: { kind: "costCentre", plural: "cost_centres", context: "costCentres", activeField: "active" },
};

async function searchCatalog(
  session: AccountingSession,
  catalog: CatalogDefinition,
  input: SearchInput,
  extra: Array<RecordPredicate | undefined> = [],
  activeOnly = input.activeOnly,
): Promise<CallToolResult> {
  const all = await session.list(ENTITIES[catalog.kind].path, {
    query: { maxRecordCount: input.limit },
  });
  const records = applyFilters(
    all,
    [
      textMatch(input.searchTerm, ["code"], ["description", "name"]),
      activeOnly ? activeFlag(catalog.activeField) : undefined,
      ...extra,
    ],
    input.limit,
  );

  log("INFO", `search_${catalog.plural}: ${records.length} of ${all.length} records matched`);
  return textResponse(
    render(input.format, { items: records, totalCount: records.length }, () =>
      formatList(catalog.context, records),
    ),
  );
}

export async function handleSearchProjects(session: AccountingSession, args: unknown): Promise<CallToolResult> {
  try {
    log("DEBUG", "search_projects tool called", { args });
    const input = SearchProjectsSchema.parse(args);

    // An explicit status wins over activeOnly
    const status: RecordPredicate | undefined = input.status
      ? (project) => (project.isActive !== false) === (input.status === "active")
      : undefined;
    return await searchCatalog(session, CATALOGS.project, input, [status], status ? false : input.activeOnly);
  } catch (error) {
    return sanitizeError(error);
  }
}

export async function handleSearchProducts(session: AccountingSession, args: unknown): Promise<CallToolResult> {
  try {
    log("DEBUG", "search_products tool called", { args });
    const input = SearchProductsSchema.parse(args);

    const productType: RecordPredicate | undefined = input.productType
      ? (product) => product.productType === input.productType
      : undefined;
    return await searchCatalog(session, CATALOGS.product, input, [productType]);
  } catch (error) {
    return sanitizeError(error);
  }
}

export async function handleSearchCatalog(
  session: AccountingSession,
  kind: "department" | "costCentre",
  args: unknown,
): Promise<CallToolResult> {
  try {
    log("DEBUG", `search_${CATALOGS[kind].plural} tool called`, { args });
    return await searchCatalog(session, CATALOGS[kind], SearchCatalogSchema.parse(args));
  } catch (error) {
    return sanitizeError(error);
  }
}

export async function handleGetCatalogItem(
  session: AccountingSession,
  kind: CatalogKind,
  args: unknown,
): Promise<CallToolResult> {
  try {
    const { id, format } = GetCatalogItemSchema.parse(args);
    const { label } = ENTITIES[kind];
    log("DEBUG", `get ${label.toLowerCase()} tool called`, { id });

    const record = await session.fetchEntity(id, kind);
    return textResponse(render(format, record, () => formatRecord(`${label}: ${String(record.code ?? id)}`, record)));
  } catch (error) {
    return sanitizeError(error);
  }
}

/**
 * Register search_/get_ tools for projects, products, departments and cost centres
 */
export function registerCatalogTools(server: McpServer, session: AccountingSession): void {
  server.registerTool(
    "search_projects",
    {
      title: "Search Projects",
      description: "Search projects by code or description, optionally by active or inactive status.",
      inputSchema: SearchProjectsSchema,
    },
    async (args: unknown) => handleSearchProjects(session, args),
  );

  server.registerTool(
    "search_products",
    {
      title: "Search Products",
      description: "Search the product catalogue by code or description, optionally by product type.",
      inputSchema: SearchProductsSchema,
    },
    async (args: unknown) => handleSearchProducts(session, args),
  );

  for (const kind of ["department", "costCentre"] as const) {
    const { plural } = CATALOGS[kind];
    const label = ENTITIES[kind].label;
    server.registerTool(
      `search_${plural}`,
      {
        title: `Search ${label}s`,
        description: `Search ${label.toLowerCase()}s by code or name. Use the code in invoice lines for cost allocation.`,
        inputSchema: SearchCatalogSchema,
      },
      async (args: unknown) => handleSearchCatalog(session, kind, args),
    );
  }

  for (const catalog of Object.values(CATALOGS)) {
    const { label } = ENTITIES[catalog.kind];
    const name = catalog.kind === "costCentre" ? "cost_centre" : catalog.kind;
    server.registerTool(
      `get_${name}`,
      {
        title: `Get ${label}`,
        description: `Retrieve one ${label.toLowerCase()} by ID or code.`,
        inputSchema: GetCatalogItemSchema,
      },
      async (args: unknown) => handleGetCatalogItem(session, catalog.kind, args),
    );
  }
}
