/**
 * Purdue Brightspace MCP Server
 * Copyright (c) 2025 Rohan Muppa. All rights reserved.
 * Licensed under AGPL-3.0 — see LICENSE file for details.
 */

import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import type { CallToolResult } from "@modelcontextprotocol/sdk/types.js";
import type { AccountingSession } from "../api/index.js";
import type { Resource } from "../types/index.js";
import { GetContactAccountSchema, SearchContactAccountsSchema } from "./schemas.js";
import { textResponse, sanitizeError } from "./tool-helpers.js";
import { contactType, formatContact, formatList, isContactActive, render } from "../utils/formatters.js";
import { applyFilters, textMatch, type RecordPredicate } from "../utils/record-filter.js";
import { log } from "../utils/logger.js";

function accountTypeFilter(type: "supplier" | "customer" | "all"): RecordPredicate | undefined {
  if (type === "all") return undefined;
  const wanted = type === "supplier" ? "Supplier" : "Customer";
  return (contact: Resource) => contactType(contact) === wanted;
}

export async function handleSearchContactAccounts(
  session: AccountingSession,
  args: unknown,
): Promise<CallToolResult> {
  try {
    log("DEBUG", "search_contact_accounts tool called", { args });
    const input = SearchContactAccountsSchema.parse(args);

    const all = await session.list("contactaccount", { query: { maxRecordCount: input.limit } });
    const contacts = applyFilters(
      all,
      [
        accountTypeFilter(input.accountType),
        input.activeOnly ? isContactActive : undefined,
        textMatch(input.searchTerm, ["description", "name"], ["code"]),
      ],
      input.limit,
    );

    log("INFO", `search_contact_accounts: ${contacts.length} of ${all.length} accounts matched`);
    return textResponse(
      render(input.format, { items: contacts, totalCount: contacts.length }, () =>
        formatList("contacts", contacts),
      ),
    );
  } catch (error) {
    return sanitizeError(error);
  }
}

export async function handleGetContactAccount(
  session: AccountingSession,
  args: unknown,
): Promise<CallToolResult> {
  try {
    log("DEBUG", "get_contact_account tool called", { args });
    const { accountId, format } = GetContactAccountSchema.parse(args);

    const contact = await session.fetchEntity(accountId, "contactAccount");
    return textResponse(render(format, contact, () => formatContact(contact)));
  } catch (error) {
    return sanitizeError(error);
  }
}

/**
 * Register search_contact_accounts and get_contact_account tools
 */
export function registerContactAccountTools(server: McpServer, session: AccountingSession): void {
  server.registerTool(
    "search_contact_accounts",
    {
      title: "Search Contact Accounts",
      description:
        "Search suppliers and customers by name or code. Filter to suppliers or customers only, and to active accounts.",
      inputSchema: SearchContactAccountsSchema,
    },
    async (args: unknown) => handleSearchContactAccounts(session, args),
  );

  server.registerTool(
    "get_contact_account",
    {
      title: "Get Contact Account",
      description:
        "Retrieve one supplier or customer by ID or account code, including supplier and customer settings.",
      inputSchema: GetContactAccountSchema,
    },
    async (args: unknown) => handleGetContactAccount(session, args),
  );
}
