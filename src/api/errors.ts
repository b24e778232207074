/**
 * Purdue Brightspace MCP Server
 * Copyright (c) 2025 Rohan Muppa. All rights reserved.
 * Licensed under AGPL-3.0 — see LICENSE file for details.
 */

import { IplicitError } from "../utils/errors.js";

export interface ApiErrorDetails {
  status?: number;
  endpoint?: string;
  responseBody?: string;
  cause?: Error;
}

// Base class for failures reported by (or about) the remote API
export class ApiError extends IplicitError {
  public readonly status?: number;
  public readonly endpoint?: string;
  public readonly responseBody?: string;

  constructor(
    code: string,
    public readonly upstreamMessage: string,
    details: ApiErrorDetails = {},
  ) {
    const where = details.endpoint ? ` at ${details.endpoint}` : "";
    const status = details.status !== undefined ? ` (${details.status})` : "";
    super(code, `API error${status}${where}: ${upstreamMessage}`, details.cause);
    this.name = "ApiError";
    this.status = details.status;
    this.endpoint = details.endpoint;
    this.responseBody = details.responseBody;
  }
}

// 4xx other than 401/403/404/429, or input rejected before any call
export class ValidationError extends ApiError {
  constructor(
    message: string,
    public readonly fieldErrors: Record<string, string[]> = {},
    details: ApiErrorDetails = {},
  ) {
    super("IMCP-1101", message, details);
    this.name = "ValidationError";
  }
}

// 403 Forbidden
export class PermissionDeniedError extends ApiError {
  constructor(message: string, details: ApiErrorDetails = {}) {
    super("IMCP-1102", message, { status: 403, ...details });
    this.name = "PermissionDeniedError";
  }
}

// 404 from the API, or a human code that matched nothing
export class NotFoundError extends ApiError {
  constructor(
    message: string,
    public readonly kind?: string,
    public readonly reference?: string,
    details: ApiErrorDetails = {},
  ) {
    super("IMCP-1103", message, details);
    this.name = "NotFoundError";
  }
}

export type RateLimitSource = "local" | "upstream";

// Local sliding window full, or 429 after retries
export class RateLimitExceededError extends ApiError {
  constructor(
    public readonly source: RateLimitSource,
    public readonly retryAfterMs?: number,
    details: ApiErrorDetails = {},
  ) {
    const origin = source === "local" ? "Local request quota" : "iplicit API rate limit";
    const message = retryAfterMs !== undefined
      ? `${origin} exceeded, retry after ${Math.ceil(retryAfterMs / 1000)}s`
      : `${origin} exceeded`;
    super("IMCP-1104", message, details);
    this.name = "RateLimitExceededError";
  }
}

// 5xx, timeout or network failure after the retry budget is spent
export class TransientUpstreamError extends ApiError {
  constructor(
    message: string,
    public readonly attempts: number,
    details: ApiErrorDetails = {},
  ) {
    super("IMCP-1105", message, details);
    this.name = "TransientUpstreamError";
  }
}

export class AmbiguousReferenceError extends ApiError {
  constructor(
    public readonly kind: string,
    public readonly reference: string,
    public readonly candidates: string[],
  ) {
    super(
      "IMCP-1200",
      `${kind} reference '${reference}' matches ${candidates.length} records: ${candidates.join(", ")}`,
    );
    this.name = "AmbiguousReferenceError";
  }
}

// Remote state rule violated, e.g. updating a document that is no longer draft
export class BusinessRuleError extends ApiError {
  constructor(
    message: string,
    public readonly kind: string,
    public readonly resourceId: string,
    public readonly action: string,
    public readonly lastKnownStatus?: number,
    details: ApiErrorDetails = {},
    public readonly fieldErrors: Record<string, string[]> = {},
  ) {
    super("IMCP-1201", message, details);
    this.name = "BusinessRuleError";
  }
}

// The API answered with a shape this server does not know
export class UnexpectedResponseShapeError extends ApiError {
  constructor(message: string, details: ApiErrorDetails = {}) {
    super("IMCP-1300", message, details);
    this.name = "UnexpectedResponseShapeError";
  }
}

export type WriteOperation = "create" | "update" | "transition";

// The write call succeeded; only the follow-up read failed
export class WriteConfirmationError extends ApiError {
  constructor(
    public readonly operation: WriteOperation,
    public readonly kind: string,
    public readonly resourceId: string,
    cause: Error,
  ) {
    super(
      "IMCP-1301",
      `${operation} of ${kind} ${resourceId} succeeded but the confirmation read failed: ${cause.message}`,
      { cause },
    );
    this.name = "WriteSucceededConfirmationFailed";
  }
}
