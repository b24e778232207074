/**
 * Purdue Brightspace MCP Server
 * Copyright (c) 2025 Rohan Muppa. All rights reserved.
 * Licensed under AGPL-3.0 — see LICENSE file for details.
 */

import type { CallToolResult } from "@modelcontextprotocol/sdk/types.js";
import { ZodError } from "zod";
import {
  AmbiguousReferenceError,
  ApiError,
  BusinessRuleError,
  NotFoundError,
  PermissionDeniedError,
  RateLimitExceededError,
  TransientUpstreamError,
  UnexpectedResponseShapeError,
  ValidationError,
  WriteConfirmationError,
} from "../api/index.js";
import { AuthenticationError, ConfigError } from "../utils/errors.js";
import { formatStatus } from "../utils/formatters.js";
import { log } from "../utils/logger.js";

/**
 * Wrap data as MCP-compatible tool result
 */
export function toolResponse(data: unknown): CallToolResult {
  return textResponse(JSON.stringify(data, null, 2));
}

// Already-rendered text (markdown or JSON)
export function textResponse(text: string): CallToolResult {
  return {
    content: [
      {
        type: "text",
        text,
      },
    ],
  };
}

/**
 * Wrap error message as MCP-compatible tool result
 */
export function errorResponse(message: string): CallToolResult {
  return {
    content: [
      {
        type: "text",
        text: message,
      },
    ],
    isError: true,
  };
}

/**
 * Sanitize errors for user-friendly messages
 *
 * SECURITY: Never include stack traces, raw API responses, or token values
 */
export function sanitizeError(error: unknown): CallToolResult {
  // Log full error to stderr for debugging (token redaction handled by logger)
  log("ERROR", "Tool error", error);
  return errorResponse(describeError(error));
}

export function describeError(error: unknown): string {
  // Subclasses before ApiError
  if (error instanceof WriteConfirmationError) {
    return (
      `The ${error.operation} of ${error.kind} ${error.resourceId} was accepted by iplicit, ` +
      "but reading it back failed. Do not repeat the change; fetch the record to check its state."
    );
  }

  if (error instanceof BusinessRuleError) {
    const status = error.lastKnownStatus !== undefined
      ? ` (current status: ${formatStatus(error.lastKnownStatus)})`
      : "";
    return `iplicit refused to ${error.action} ${error.kind} ${error.resourceId}${status}: ${error.upstreamMessage}`;
  }

  if (error instanceof AmbiguousReferenceError) {
    return (
      `'${error.reference}' matches ${error.candidates.length} ${error.kind} records ` +
      `(${error.candidates.join(", ")}). Use the ID instead.`
    );
  }

  if (error instanceof NotFoundError) {
    if (error.kind && error.reference) {
      return `${error.upstreamMessage}. Use the matching search tool to find valid codes or IDs.`;
    }
    return "Resource not found. The record may not exist, or you may not have access.";
  }

  if (error instanceof PermissionDeniedError) {
    return "Access denied. Your iplicit user may not have permission for this action.";
  }

  if (error instanceof RateLimitExceededError) {
    const wait = error.retryAfterMs !== undefined
      ? ` Try again in ${Math.ceil(error.retryAfterMs / 1000)} seconds.`
      : " Please wait a moment and try again.";
    return error.source === "local"
      ? `Request quota for this server is used up.${wait}`
      : `Rate limited by iplicit.${wait}`;
  }

  if (error instanceof TransientUpstreamError) {
    return `Could not reach iplicit after ${error.attempts} attempts. Check your connection or try again later.`;
  }

  if (error instanceof ValidationError) {
    return `iplicit rejected the request: ${error.upstreamMessage}`;
  }

  if (error instanceof UnexpectedResponseShapeError) {
    return "iplicit returned a response this server does not understand. The API may have changed.";
  }

  if (error instanceof ApiError) {
    return `iplicit API error${error.status !== undefined ? ` (${error.status})` : ""}: ${error.upstreamMessage}`;
  }

  if (error instanceof AuthenticationError) {
    return "Authentication with iplicit failed. Check IPLICIT_USERNAME, IPLICIT_API_KEY and IPLICIT_DOMAIN.";
  }

  if (error instanceof ConfigError) {
    return error.message;
  }

  if (error instanceof ZodError) {
    const issues = error.issues.map((i) => `${i.path.join(".")}: ${i.message}`);
    return `Invalid input: ${issues.join(", ")}`;
  }

  // Default fallback
  return "An unexpected error occurred. Please try again.";
}
