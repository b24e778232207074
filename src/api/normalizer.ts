/**
 * Purdue Brightspace MCP Server
 * Copyright (c) 2025 Rohan Muppa. All rights reserved.
 * Licensed under AGPL-3.0 — see LICENSE file for details.
 */

import { z } from "zod";
import type { Resource } from "../types/index.js";
import { UnexpectedResponseShapeError } from "./errors.js";
import { log } from "../utils/logger.js";

// iplicit wraps paged lists as { items: [...], totalCount }
export const DEFAULT_COLLECTION_FIELD = "items";

const ResourceSchema = z.record(z.string(), z.unknown());
const ResourceListSchema = z.array(ResourceSchema);

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * The shapes a response body can take. Anything that is not one of the first
 * four is "unknown" and means the API contract has moved.
 */
export type ResponseShape =
  | { kind: "empty" }
  | { kind: "sequence"; items: unknown[] }
  | { kind: "wrapped"; field: string; items: unknown[]; totalCount?: number }
  | { kind: "single"; resource: Resource }
  | { kind: "unknown"; description: string };

export function classifyShape(
  raw: unknown,
  collectionField: string = DEFAULT_COLLECTION_FIELD,
): ResponseShape {
  if (raw === null || raw === undefined) {
    return { kind: "empty" };
  }
  if (Array.isArray(raw)) {
    return { kind: "sequence", items: raw };
  }
  if (isRecord(raw)) {
    const collection = raw[collectionField];
    if (Array.isArray(collection)) {
      const totalCount = typeof raw.totalCount === "number" ? raw.totalCount : undefined;
      return { kind: "wrapped", field: collectionField, items: collection, totalCount };
    }
    return { kind: "single", resource: raw };
  }
  return { kind: "unknown", description: describe(raw) };
}

function describe(raw: unknown): string {
  if (typeof raw === "string") return `string "${raw.slice(0, 40)}"`;
  return typeof raw;
}

function shapeError(message: string, endpoint?: string): UnexpectedResponseShapeError {
  const error = new UnexpectedResponseShapeError(message, { endpoint });
  // Logged on its own: this means the remote API changed
  log("ERROR", `Unexpected response shape${endpoint ? ` from ${endpoint}` : ""}: ${message}`);
  return error;
}

function asResources(items: unknown[], endpoint?: string): Resource[] {
  const parsed = ResourceListSchema.safeParse(items);
  if (!parsed.success) {
    const bad = items.findIndex((item) => !isRecord(item));
    throw shapeError(`collection element ${bad} is not an object`, endpoint);
  }
  // Same object references, new array: items are never copied or altered
  return items.filter(isRecord);
}

/**
 * Turn a list response into a plain array, whether the API sent a bare
 * array or an object with a collection field. An empty body is an empty list.
 *
 * @throws UnexpectedResponseShapeError for a scalar, a single object without
 *   the collection field, or a non-object element
 */
export function normalize(
  raw: unknown,
  collectionField: string = DEFAULT_COLLECTION_FIELD,
  endpoint?: string,
): Resource[] {
  const shape = classifyShape(raw, collectionField);
  switch (shape.kind) {
    case "empty":
      return [];
    case "sequence":
    case "wrapped":
      return asResources(shape.items, endpoint);
    case "single":
      throw shapeError(
        `expected a list or an object with "${collectionField}", got an object with keys ${Object.keys(shape.resource).slice(0, 8).join(", ") || "(none)"}`,
        endpoint,
      );
    case "unknown":
      throw shapeError(`expected a list, got ${shape.description}`, endpoint);
  }
}

/**
 * Turn a single-entity response into one Resource. A one-element list is
 * accepted since some endpoints wrap single records.
 */
export function normalizeOne(raw: unknown, endpoint?: string): Resource {
  const shape = classifyShape(raw);
  switch (shape.kind) {
    case "single":
      return shape.resource;
    case "sequence":
    case "wrapped": {
      const items = asResources(shape.items, endpoint);
      if (items.length === 1) return items[0];
      throw shapeError(`expected one record, got ${items.length}`, endpoint);
    }
    case "empty":
      throw shapeError("expected one record, got an empty body", endpoint);
    case "unknown":
      throw shapeError(`expected an object, got ${shape.description}`, endpoint);
  }
}
