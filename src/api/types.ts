/**
 * Purdue Brightspace MCP Server
 * Copyright (c) 2025 Rohan Muppa. All rights reserved.
 * Licensed under AGPL-3.0 — see LICENSE file for details.
 */

import type { HttpMethod, QuotaWindow, RateLimitMode, Resource, RetryPolicy } from "../types/index.js";
import type { TokenStore } from "../auth/token-store.js";
import type { SlidingWindowLimiter } from "./rate-limiter.js";
import type { Clock, Sleep } from "../utils/async.js";

// Global fetch, or a stand-in with the same call shape (tests)
export type FetchLike = (input: string, init?: RequestInit) => Promise<Response>;

export type QueryValue = string | number | boolean | undefined;
export type Query = Record<string, QueryValue>;

export interface RequestOptions {
  body?: unknown;
  query?: Query;
  signal?: AbortSignal;
}

// Transport constructor options
export interface IplicitClientOptions {
  baseUrl: string;
  domain: string;
  tokenStore: TokenStore; // from auth module
  rateLimiter?: SlidingWindowLimiter;
  rateLimitConfig?: QuotaWindow & { mode?: RateLimitMode };
  retry?: Partial<RetryPolicy>;
  timeoutMs?: number; // default 30_000
  fetch?: FetchLike;
  now?: Clock;
  sleep?: Sleep;
}

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  maxAttempts: 3,
  backoffBaseMs: 1000,
  backoffMultiplier: 2,
};

// iplicit publishes 1500 requests per 5 minutes
export const DEFAULT_QUOTA: QuotaWindow = {
  capacity: 1500,
  windowMs: 300_000,
};

// What a caller can send through the client
export interface RequestExecutor {
  execute(method: HttpMethod, path: string, options?: RequestOptions): Promise<unknown>;
}

export type { HttpMethod, Resource };
