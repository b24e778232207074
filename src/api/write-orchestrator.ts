/**
 * Purdue Brightspace MCP Server
 * Copyright (c) 2025 Rohan Muppa. All rights reserved.
 * Licensed under AGPL-3.0 — see LICENSE file for details.
 */

import type { RequestExecutor } from "./types.js";
import type { Resource } from "../types/index.js";
import {
  ENTITIES,
  REFERENCE_FIELDS,
  isInvoiceKind,
  resourcePath,
  type EntityKind,
  type InvoiceKind,
  type TransitionAction,
} from "./entities.js";
import type { Resolver } from "./resolver.js";
import { DefaultsCache } from "./defaults-cache.js";
import { isRecord, normalize, normalizeOne } from "./normalizer.js";
import {
  BusinessRuleError,
  UnexpectedResponseShapeError,
  ValidationError,
  WriteConfirmationError,
  type WriteOperation,
} from "./errors.js";
import { toError } from "../utils/errors.js";
import { abortable } from "../utils/async.js";
import { log } from "../utils/logger.js";

export type WritePayload = Record<string, unknown>;

export interface WriteOrchestratorOptions {
  client: RequestExecutor;
  resolver: Resolver;
  defaults?: DefaultsCache;
  defaultCurrency?: string;
}

/**
 * Every write is two calls: the write itself, then a GET of the resource so
 * the caller sees what the API actually stored. A failed second call is
 * reported as WriteConfirmationError, never as success or as a failed write.
 */
export class WriteOrchestrator {
  private readonly client: RequestExecutor;
  private readonly resolver: Resolver;
  private readonly defaults: DefaultsCache;
  private readonly defaultCurrency: string;

  constructor(options: WriteOrchestratorOptions) {
    this.client = options.client;
    this.resolver = options.resolver;
    this.defaults = options.defaults ?? new DefaultsCache();
    this.defaultCurrency = options.defaultCurrency ?? "GBP";
  }

  /**
   * Create a resource. For invoices, docTypeId, legalEntityId and currency
   * are filled in when absent.
   */
  async create(kind: EntityKind, payload: WritePayload, signal?: AbortSignal): Promise<Resource> {
    const path = resourcePath(kind);
    let body = await this.prepare(payload, signal);
    if (isInvoiceKind(kind)) {
      body = await this.applyInvoiceDefaults(kind, body, signal);
    }

    log("INFO", `Creating ${ENTITIES[kind].label.toLowerCase()}`);
    const response = await this.client.execute("POST", path, { body, signal });
    const id = extractCreatedId(response, path);

    return this.confirm("create", kind, id, signal);
  }

  /**
   * Patch a resource. `id` may also be a human code; it goes through the
   * resolver first.
   * @throws ValidationError when the payload has no fields
   * @throws BusinessRuleError when the API refuses the change in the record's current state
   */
  async update(
    id: string,
    kind: EntityKind,
    payload: WritePayload,
    signal?: AbortSignal,
  ): Promise<Resource> {
    const fields = withoutUndefined(payload);
    if (Object.keys(fields).length === 0) {
      throw new ValidationError("At least one field must be provided to update");
    }

    const resolvedId = await this.resolver.resolve(id, kind, signal);
    const body = await this.prepare(fields, signal);

    log("INFO", `Updating ${ENTITIES[kind].label.toLowerCase()} ${resolvedId}`);
    await this.guardBusinessRules(kind, resolvedId, "update", signal, () =>
      this.client.execute("PATCH", resourcePath(kind, resolvedId), { body, signal }),
    );

    return this.confirm("update", kind, resolvedId, signal);
  }

  // Workflow action: post, approve or reverse
  async transition(
    id: string,
    kind: EntityKind,
    action: TransitionAction,
    payload: WritePayload = {},
    signal?: AbortSignal,
  ): Promise<Resource> {
    const resolvedId = await this.resolver.resolve(id, kind, signal);
    const body = withoutUndefined(payload);

    log("INFO", `Applying ${action} to ${ENTITIES[kind].label.toLowerCase()} ${resolvedId}`);
    await this.guardBusinessRules(kind, resolvedId, action, signal, () =>
      this.client.execute("POST", resourcePath(kind, resolvedId, action), { body, signal }),
    );

    return this.confirm("transition", kind, resolvedId, signal);
  }

  // Resolve reference fields (top level and per line) and rename lines to details
  private async prepare(payload: WritePayload, signal?: AbortSignal): Promise<WritePayload> {
    const { lines, ...rest } = withoutUndefined(payload);
    const body = await this.resolveReferences(rest, signal);

    if (lines !== undefined) {
      body.details = await this.resolveLines(lines, signal);
    } else if (Array.isArray(body.details)) {
      body.details = await this.resolveLines(body.details, signal);
    }
    return body;
  }

  private async resolveLines(lines: unknown, signal?: AbortSignal): Promise<unknown> {
    if (!Array.isArray(lines)) {
      throw new ValidationError("lines must be an array", { lines: ["expected an array"] });
    }
    const resolved: unknown[] = [];
    for (const line of lines) {
      resolved.push(isRecord(line) ? await this.resolveReferences(withoutUndefined(line), signal) : line);
    }
    return resolved;
  }

  private async resolveReferences(fields: WritePayload, signal?: AbortSignal): Promise<WritePayload> {
    const out: WritePayload = { ...fields };
    for (const [field, kind] of Object.entries(REFERENCE_FIELDS)) {
      const value = out[field];
      if (typeof value === "string" && value.trim() !== "") {
        out[field] = await this.resolver.resolve(value, kind, signal);
      }
    }
    return out;
  }

  // Default lookups are shared between callers, so they run without any
  // caller's signal; each caller only stops waiting when it aborts.
  private async applyInvoiceDefaults(
    kind: InvoiceKind,
    body: WritePayload,
    signal?: AbortSignal,
  ): Promise<WritePayload> {
    const out: WritePayload = { ...body };
    if (!isFilled(out.docTypeId)) {
      out.docTypeId = await abortable(
        this.defaults.getOrLoad(`docType:${kind}`, () => this.loadDefaultDocType(kind)),
        signal,
      );
    }
    if (!isFilled(out.legalEntityId)) {
      out.legalEntityId = await abortable(
        this.defaults.getOrLoad("legalEntity", () => this.loadDefaultLegalEntity()),
        signal,
      );
    }
    if (!isFilled(out.currency)) {
      out.currency = this.defaultCurrency;
    }
    return out;
  }

  // The docTypeId of the most recent existing document of the same class
  private async loadDefaultDocType(kind: InvoiceKind): Promise<string> {
    const path = resourcePath(kind);
    const raw = await this.client.execute("GET", path, { query: { maxRecordCount: 1 } });
    const docTypeId = stringField(normalize(raw, undefined, path)[0], "docTypeId");
    if (!docTypeId) {
      throw new ValidationError("Could not determine default document type. Please provide docTypeId.", {
        docTypeId: ["required when no existing document provides a default"],
      });
    }
    return docTypeId;
  }

  private async loadDefaultLegalEntity(): Promise<string> {
    const path = resourcePath("legalEntity");
    const raw = await this.client.execute("GET", path, { query: { maxRecordCount: 1 } });
    const legalEntityId = stringField(normalize(raw, undefined, path)[0], "id");
    if (!legalEntityId) {
      throw new ValidationError("Could not determine default legal entity. Please provide legalEntityId.", {
        legalEntityId: ["required when no legal entity exists"],
      });
    }
    return legalEntityId;
  }

  /**
   * Run a write against an existing record. A 4xx validation failure there
   * means the record's state forbids the action, so it is re-raised as a
   * BusinessRuleError with the record's current status when it can be read.
   */
  private async guardBusinessRules(
    kind: EntityKind,
    id: string,
    action: string,
    signal: AbortSignal | undefined,
    write: () => Promise<unknown>,
  ): Promise<void> {
    try {
      await write();
    } catch (error) {
      if (!(error instanceof ValidationError)) throw error;

      const status = await this.lastKnownStatus(kind, id, signal);
      log("WARN", `${action} rejected for ${kind} ${id} (status ${status ?? "unknown"}): ${error.upstreamMessage}`);
      throw new BusinessRuleError(
        error.upstreamMessage,
        kind,
        id,
        action,
        status,
        {
          status: error.status,
          endpoint: error.endpoint,
          responseBody: error.responseBody,
          cause: error,
        },
        error.fieldErrors,
      );
    }
  }

  private async lastKnownStatus(
    kind: EntityKind,
    id: string,
    signal?: AbortSignal,
  ): Promise<number | undefined> {
    try {
      const raw = await this.client.execute("GET", resourcePath(kind, id), { signal });
      const status = normalizeOne(raw, resourcePath(kind, id)).status;
      return typeof status === "number" ? status : undefined;
    } catch (error) {
      log("DEBUG", `Could not read status of ${kind} ${id} after rejected write: ${toError(error).message}`);
      return undefined;
    }
  }

  private async confirm(
    operation: WriteOperation,
    kind: EntityKind,
    id: string,
    signal?: AbortSignal,
  ): Promise<Resource> {
    const path = resourcePath(kind, id);
    try {
      const raw = await this.client.execute("GET", path, { signal });
      return normalizeOne(raw, path);
    } catch (error) {
      log("ERROR", `${operation} of ${kind} ${id} succeeded but confirmation read failed`, error);
      throw new WriteConfirmationError(operation, kind, id, toError(error));
    }
  }
}

/**
 * Creation responses carry the new id as a bare string, a JSON string
 * (already decoded by the client) or an object with `id`.
 */
export function extractCreatedId(response: unknown, endpoint?: string): string {
  if (typeof response === "string") {
    const id = response.trim().replace(/^"(.*)"$/, "$1");
    if (id) return id;
  }
  if (isRecord(response)) {
    const id = stringField(response, "id");
    if (id) return id;
  }
  throw new UnexpectedResponseShapeError(
    `creation response did not contain an id (got ${response === null ? "an empty body" : typeof response})`,
    { endpoint },
  );
}

function withoutUndefined(fields: Record<string, unknown>): WritePayload {
  const out: WritePayload = {};
  for (const [key, value] of Object.entries(fields)) {
    if (value !== undefined) out[key] = value;
  }
  return out;
}

function isFilled(value: unknown): boolean {
  return typeof value === "string" ? value.trim() !== "" : value !== undefined && value !== null;
}

function stringField(record: Resource | undefined, field: string): string | undefined {
  const value = record?.[field];
  if (typeof value === "string" && value.trim() !== "") return value;
  if (typeof value === "number") return String(value);
  return undefined;
}
