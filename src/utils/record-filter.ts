/**
 * Purdue Brightspace MCP Server
 * Copyright (c) 2025 Rohan Muppa. All rights reserved.
 * Licensed under AGPL-3.0 — see LICENSE file for details.
 */

import type { Resource } from "../types/index.js";
import { log } from "./logger.js";

export type RecordPredicate = (record: Resource) => boolean;

/**
 * Case-insensitive substring match against the first present field of each
 * group, e.g. `["code"], ["description", "name"]`.
 */
export function textMatch(term: string | undefined, ...fieldGroups: string[][]): RecordPredicate | undefined {
  const needle = term?.trim().toLowerCase();
  if (!needle) return undefined;

  return (record) =>
    fieldGroups.some((fields) => {
      const field = fields.find((f) => typeof record[f] === "string");
      const value = field === undefined ? undefined : record[field];
      return typeof value === "string" && value.toLowerCase().includes(needle);
    });
}

// Records with the flag set to false are inactive; a missing flag counts as active
export function activeFlag(field: string): RecordPredicate {
  return (record) => record[field] !== false;
}

export function amountRange(min?: number, max?: number, field = "amount"): RecordPredicate | undefined {
  if (min === undefined && max === undefined) return undefined;
  return (record) => {
    const raw = record[field];
    const value = typeof raw === "number" ? raw : 0;
    return (min === undefined || value >= min) && (max === undefined || value <= max);
  };
}

/**
 * Apply every defined predicate, then cut to `limit`. Filtering happens
 * client-side because the list endpoints ignore most query filters.
 */
export function applyFilters(
  records: Resource[],
  predicates: Array<RecordPredicate | undefined>,
  limit: number,
): Resource[] {
  let filtered = records;
  for (const predicate of predicates) {
    if (predicate) filtered = filtered.filter(predicate);
  }

  if (filtered.length !== records.length) {
    log("DEBUG", `Record filter: ${records.length} -> ${filtered.length} records`);
  }

  return filtered.slice(0, limit);
}
