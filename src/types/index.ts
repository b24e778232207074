/**
 * Purdue Brightspace MCP Server
 * Copyright (c) 2025 Rohan Muppa. All rights reserved.
 * Licensed under AGPL-3.0 — see LICENSE file for details.
 */

// Session credential issued by /session/create/api
export interface Credential {
  token: string;
  issuedAt: number; // Unix timestamp ms
  expiresAt: number; // Unix timestamp ms
}

// One remote entity. Domain-opaque: the core only reads `id` and, for documents, `status`.
export type Resource = Record<string, unknown>;

export type HttpMethod = "GET" | "POST" | "PATCH";

// "block" waits for a free slot, "reject" throws RateLimitExceededError
export type RateLimitMode = "block" | "reject";

export interface QuotaWindow {
  capacity: number; // requests per window
  windowMs: number;
}

export interface RetryPolicy {
  maxAttempts: number; // total attempts, including the first
  backoffBaseMs: number;
  backoffMultiplier: number;
}

// Application configuration
export interface AppConfig {
  apiKey: string;
  username: string;
  domain: string;
  baseUrl: string;
  rateLimit: QuotaWindow & { mode: RateLimitMode };
  timeoutMs: number;
  retry: RetryPolicy;
  tokenRefreshMarginMs: number;
  lookupLimit: number;
  defaultCurrency: string;
  logLevel: LogLevel;
}

// Log levels
export type LogLevel = "DEBUG" | "INFO" | "WARN" | "ERROR";
