/**
 * Purdue Brightspace MCP Server
 * Copyright (c) 2025 Rohan Muppa. All rights reserved.
 * Licensed under AGPL-3.0 — see LICENSE file for details.
 */

// iplicit API client and infrastructure - public exports

// Session facade and transport
export { AccountingSession, createSession } from "./session.js";
export type { ListOptions, SessionDependencies } from "./session.js";
export { IplicitClient, parseRetryAfter, extractUpstreamMessage } from "./client.js";

// Rate limiting, normalization, resolution, writes
export { SlidingWindowLimiter } from "./rate-limiter.js";
export { classifyShape, normalize, normalizeOne, isRecord } from "./normalizer.js";
export type { ResponseShape } from "./normalizer.js";
export { Resolver, isIdentifier } from "./resolver.js";
export type { ResolvedReference } from "./resolver.js";
export { WriteOrchestrator, extractCreatedId } from "./write-orchestrator.js";
export type { WritePayload } from "./write-orchestrator.js";
export { DefaultsCache } from "./defaults-cache.js";
export { ENTITIES, REFERENCE_FIELDS, resourcePath, isInvoiceKind } from "./entities.js";
export type { EntityKind, InvoiceKind, TransitionAction } from "./entities.js";

// Errors
export {
  ApiError,
  ValidationError,
  PermissionDeniedError,
  NotFoundError,
  RateLimitExceededError,
  TransientUpstreamError,
  AmbiguousReferenceError,
  BusinessRuleError,
  UnexpectedResponseShapeError,
  WriteConfirmationError,
} from "./errors.js";

// Types
export type {
  FetchLike,
  IplicitClientOptions,
  Query,
  RequestExecutor,
  RequestOptions,
} from "./types.js";
export { DEFAULT_QUOTA, DEFAULT_RETRY_POLICY } from "./types.js";
