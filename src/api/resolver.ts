/**
 * Purdue Brightspace MCP Server
 * Copyright (c) 2025 Rohan Muppa. All rights reserved.
 * Licensed under AGPL-3.0 — see LICENSE file for details.
 */

import type { RequestExecutor } from "./types.js";
import type { Resource } from "../types/index.js";
import { ENTITIES, type EntityKind } from "./entities.js";
import { normalize } from "./normalizer.js";
import { AmbiguousReferenceError, NotFoundError, ValidationError } from "./errors.js";
import { log } from "../utils/logger.js";

const UUID_PATTERN = /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/i;

export function isIdentifier(value: string): boolean {
  return UUID_PATTERN.test(value.trim());
}

export interface ResolvedReference {
  input: string;
  id: string;
  kind: EntityKind;
  lookedUp: boolean;
}

/**
 * Turns "SUP001"-style codes into ids. Ids pass straight through without a
 * request. A code that matches several records is an error, never a guess.
 */
export class Resolver {
  constructor(
    private readonly client: RequestExecutor,
    private readonly lookupLimit: number = 500,
  ) {}

  async resolve(input: string, kind: EntityKind, signal?: AbortSignal): Promise<string> {
    const resolved = await this.resolveReference(input, kind, signal);
    return resolved.id;
  }

  async resolveReference(
    input: string,
    kind: EntityKind,
    signal?: AbortSignal,
  ): Promise<ResolvedReference> {
    const { label, path, codeField } = ENTITIES[kind];
    const reference = input.trim();

    if (!reference) {
      throw new ValidationError(`${label} reference must not be empty`);
    }

    if (isIdentifier(reference)) {
      return { input, id: reference, kind, lookedUp: false };
    }

    log("DEBUG", `Resolving ${label.toLowerCase()} code '${reference}'`);
    const raw = await this.client.execute("GET", path, {
      query: { maxRecordCount: this.lookupLimit },
      signal,
    });
    const records = normalize(raw, undefined, path);

    const matches = pickMatches(records, codeField, reference);
    if (matches.length === 0) {
      throw new NotFoundError(
        `${label} with ${codeField} '${reference}' not found`,
        kind,
        reference,
        { endpoint: path },
      );
    }

    const ids = matches.map(recordId);
    if (matches.length > 1) {
      throw new AmbiguousReferenceError(kind, reference, ids);
    }

    const [id] = ids;
    if (!id) {
      throw new NotFoundError(`${label} '${reference}' has no id`, kind, reference, { endpoint: path });
    }

    log("DEBUG", `Resolved ${label.toLowerCase()} '${reference}' to ${id}`);
    return { input, id, kind, lookedUp: true };
  }
}

// Exact match first; only when nothing matches exactly try ignoring case
function pickMatches(records: Resource[], codeField: string, reference: string): Resource[] {
  const exact = records.filter((r) => codeOf(r, codeField) === reference);
  if (exact.length > 0) return exact;

  const lower = reference.toLowerCase();
  return records.filter((r) => codeOf(r, codeField)?.toLowerCase() === lower);
}

function codeOf(record: Resource, codeField: string): string | undefined {
  const value = record[codeField];
  if (typeof value === "string") return value.trim();
  if (typeof value === "number") return String(value);
  return undefined;
}

function recordId(record: Resource): string {
  const id = record.id;
  return typeof id === "string" || typeof id === "number" ? String(id) : "";
}
