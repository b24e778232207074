/**
 * Purdue Brightspace MCP Server
 * Copyright (c) 2025 Rohan Muppa. All rights reserved.
 * Licensed under AGPL-3.0 — see LICENSE file for details.
 */

import type {
  FetchLike,
  HttpMethod,
  IplicitClientOptions,
  Query,
  RequestExecutor,
  RequestOptions,
} from "./types.js";
import { DEFAULT_QUOTA, DEFAULT_RETRY_POLICY } from "./types.js";
import type { RetryPolicy } from "../types/index.js";
import { SlidingWindowLimiter } from "./rate-limiter.js";
import {
  ApiError,
  NotFoundError,
  PermissionDeniedError,
  RateLimitExceededError,
  TransientUpstreamError,
  ValidationError,
} from "./errors.js";
import { isRecord } from "./normalizer.js";
import type { TokenStore } from "../auth/token-store.js";
import { AuthenticationError, ConfigError, toError } from "../utils/errors.js";
import { abortable, sleep as defaultSleep, withTimeout } from "../utils/async.js";
import type { Clock, Sleep } from "../utils/async.js";
import { log } from "../utils/logger.js";

/**
 * iplicit REST client with session auth, rate limiting and retries.
 *
 * Every attempt takes a fresh token from the TokenStore and a slot from the
 * rate limiter, failed attempts included, since each one reaches the API.
 * The request timeout covers the whole attempt, body read included.
 *
 * - 401: refresh the session once and replay, then AuthenticationError
 * - 429: honour Retry-After, retry within maxAttempts, then RateLimitExceededError
 * - 5xx / timeout / network: exponential backoff within maxAttempts, then TransientUpstreamError
 * - 403 / 404 / other 4xx: no retry, typed error with the upstream message
 *
 * POST and PATCH are retried on 5xx like GET. The API offers no idempotency
 * keys, so a retried write may in rare cases be applied twice.
 */
export class IplicitClient implements RequestExecutor {
  private readonly baseUrl: string;
  private readonly domain: string;
  private readonly tokenStore: TokenStore;
  private readonly rateLimiter: SlidingWindowLimiter;
  private readonly retry: RetryPolicy;
  private readonly timeoutMs: number;
  private readonly fetchImpl: FetchLike;
  private readonly now: Clock;
  private readonly sleep: Sleep;

  constructor(options: IplicitClientOptions) {
    // HTTPS-only enforcement (plain HTTP allowed for localhost)
    if (options.baseUrl.startsWith("http://") && !isLocalhost(options.baseUrl)) {
      throw new ConfigError(
        "HTTPS is required for the iplicit API client. HTTP URLs are not allowed for security reasons.",
      );
    }

    // Strip trailing slash from baseUrl
    this.baseUrl = options.baseUrl.replace(/\/$/, "");
    this.domain = options.domain;
    this.tokenStore = options.tokenStore;
    this.timeoutMs = options.timeoutMs ?? 30_000;
    this.retry = { ...DEFAULT_RETRY_POLICY, ...options.retry };
    this.fetchImpl = options.fetch ?? fetch;
    this.now = options.now ?? Date.now;
    this.sleep = options.sleep ?? defaultSleep;

    this.rateLimiter =
      options.rateLimiter ??
      new SlidingWindowLimiter({
        ...(options.rateLimitConfig ?? DEFAULT_QUOTA),
        now: this.now,
        sleep: this.sleep,
      });

    log("DEBUG", `IplicitClient initialized for ${this.baseUrl} (domain ${this.domain})`);
  }

  /**
   * Send one logical request, retrying as described above.
   *
   * @param path - resource path, e.g. "document/<id>" or "contactaccount"
   * @returns Parsed JSON, the trimmed text of a non-JSON body, or null for an empty body
   */
  async execute(method: HttpMethod, path: string, options: RequestOptions = {}): Promise<unknown> {
    const endpoint = path.replace(/^\/+/, "");
    const url = this.buildUrl(endpoint, options.query);
    const { signal } = options;
    const { maxAttempts } = this.retry;

    let attempt = 0;
    let authRetried = false;

    for (;;) {
      await this.tokenStore.getToken(signal);
      await this.rateLimiter.acquire(signal);
      // The limiter may have waited past the token's expiry
      const token = await this.tokenStore.getToken(signal);

      log("DEBUG", `${attempt > 0 || authRetried ? "Retrying" : "Requesting"} ${method} ${endpoint}`);

      let response: ReceivedResponse;
      try {
        response = await this.send(method, url, token, options);
      } catch (error) {
        // Caller cancellation is final
        if (signal?.aborted) throw error;

        attempt++;
        const err = toError(error);
        if (attempt >= maxAttempts) {
          throw new TransientUpstreamError(
            `Request to ${endpoint} failed after ${attempt} attempts: ${err.message}`,
            attempt,
            { endpoint, cause: err },
          );
        }
        const delayMs = this.backoffDelay(attempt);
        log("WARN", `${method} ${endpoint} failed (${err.message}), retrying in ${delayMs}ms`);
        await this.sleep(delayMs, signal);
        continue;
      }

      if (response.status === 401) {
        if (authRetried) {
          log("DEBUG", "Second 401 response, invalidating credential");
          this.tokenStore.invalidate();
          throw new AuthenticationError(
            `Session token rejected at ${endpoint} after refresh`,
            401,
          );
        }
        log("DEBUG", "First 401 response, refreshing session and retrying");
        authRetried = true;
        await this.tokenStore.forceRefresh(token, signal);
        continue;
      }

      attempt++;

      if (response.ok) {
        return parseBody(response);
      }

      if (response.status === 429) {
        const text = response.body;
        const retryAfterMs = parseRetryAfter(response.headers.get("Retry-After"), this.now());
        if (attempt >= maxAttempts) {
          throw new RateLimitExceededError("upstream", retryAfterMs, {
            status: 429,
            endpoint,
            responseBody: text,
          });
        }
        const delayMs = retryAfterMs ?? this.backoffDelay(attempt);
        log("WARN", `429 from ${endpoint}, retrying in ${delayMs}ms (attempt ${attempt}/${maxAttempts})`);
        await this.sleep(delayMs, signal);
        continue;
      }

      if (response.status >= 500) {
        const text = response.body;
        if (attempt >= maxAttempts) {
          throw new TransientUpstreamError(
            `iplicit server error (${response.status}) after ${attempt} attempts: ${extractUpstreamMessage(text, response.statusText).message}`,
            attempt,
            { status: response.status, endpoint, responseBody: text },
          );
        }
        const delayMs = this.backoffDelay(attempt);
        log("WARN", `${response.status} from ${endpoint}, retrying in ${delayMs}ms (attempt ${attempt}/${maxAttempts})`);
        await this.sleep(delayMs, signal);
        continue;
      }

      throw toClientError(response, endpoint);
    }
  }

  private async send(
    method: HttpMethod,
    url: string,
    token: string,
    options: RequestOptions,
  ): Promise<ReceivedResponse> {
    const timeout = withTimeout(this.timeoutMs, options.signal);
    try {
      const response = await this.fetchImpl(url, {
        method,
        headers: this.buildHeaders(token),
        body: options.body === undefined ? undefined : JSON.stringify(options.body),
        signal: timeout.signal,
      });
      // A body that stalls after the headers times out like a hung connection
      const body = await abortable(response.text(), timeout.signal);
      return {
        status: response.status,
        ok: response.ok,
        statusText: response.statusText,
        headers: response.headers,
        body,
      };
    } finally {
      timeout.dispose();
    }
  }

  private buildHeaders(token: string): Record<string, string> {
    return {
      Domain: this.domain,
      Authorization: `Bearer ${token}`,
      "Content-Type": "application/json",
      Accept: "application/json",
    };
  }

  private buildUrl(endpoint: string, query?: Query): string {
    const url = `${this.baseUrl}/${endpoint}`;
    if (!query) return url;

    const params = new URLSearchParams();
    for (const [key, value] of Object.entries(query)) {
      if (value !== undefined) params.append(key, String(value));
    }
    const qs = params.toString();
    return qs ? `${url}?${qs}` : url;
  }

  // base * multiplier^(attempt - 1): 1s, 2s, 4s with the defaults
  private backoffDelay(attempt: number): number {
    const { backoffBaseMs, backoffMultiplier } = this.retry;
    return backoffBaseMs * Math.pow(backoffMultiplier, attempt - 1);
  }

  get limiter(): SlidingWindowLimiter {
    return this.rateLimiter;
  }
}

function isLocalhost(url: string): boolean {
  try {
    const { hostname } = new URL(url);
    return hostname === "localhost" || hostname === "127.0.0.1" || hostname === "[::1]";
  } catch {
    return false;
  }
}

// One attempt's response with its body already read
interface ReceivedResponse {
  status: number;
  ok: boolean;
  statusText: string;
  headers: Headers;
  body: string;
}

function parseBody(response: ReceivedResponse): unknown {
  if (response.status === 204) return null;
  const text = response.body.trim();
  if (!text) return null;
  try {
    return JSON.parse(text);
  } catch {
    // Creation endpoints may answer with the bare id
    return text;
  }
}

/**
 * Retry-After is either delay-seconds or an HTTP date.
 * @returns milliseconds to wait, or undefined when absent or unparseable
 */
export function parseRetryAfter(value: string | null, now: number): number | undefined {
  if (!value) return undefined;
  const trimmed = value.trim();
  if (/^\d+$/.test(trimmed)) {
    return parseInt(trimmed, 10) * 1000;
  }
  const date = Date.parse(trimmed);
  if (Number.isNaN(date)) return undefined;
  return Math.max(0, date - now);
}

export interface UpstreamMessage {
  message: string;
  fieldErrors: Record<string, string[]>;
}

/**
 * Pull a readable message out of an iplicit error body. Handles the
 * ASP.NET-style `{ errors: { field: [..] } }` shape as well as
 * `{ title }`, `{ message }` and `{ detail }`, falling back to the raw text.
 */
export function extractUpstreamMessage(text: string, fallback: string): UpstreamMessage {
  const fieldErrors: Record<string, string[]> = {};
  const trimmed = text.trim();
  if (!trimmed) return { message: fallback, fieldErrors };

  let body: unknown;
  try {
    body = JSON.parse(trimmed);
  } catch {
    return { message: trimmed.slice(0, 300), fieldErrors };
  }

  if (typeof body === "string") {
    return { message: body, fieldErrors };
  }
  if (!isRecord(body)) {
    return { message: trimmed.slice(0, 300), fieldErrors };
  }

  const record = body;
  const errors = record.errors;
  if (isRecord(errors)) {
    for (const [field, messages] of Object.entries(errors)) {
      if (Array.isArray(messages)) {
        fieldErrors[field] = messages.map(String);
      } else if (messages !== undefined && messages !== null) {
        fieldErrors[field] = [String(messages)];
      }
    }
  }

  const headline = [record.message, record.title, record.detail].find(
    (v): v is string => typeof v === "string" && v.length > 0,
  );
  const fieldSummary = Object.entries(fieldErrors)
    .map(([field, messages]) => `${field}: ${messages.join(", ")}`)
    .join("; ");

  const message = [headline, fieldSummary].filter(Boolean).join(" - ") || trimmed.slice(0, 300);
  return { message, fieldErrors };
}

function toClientError(response: ReceivedResponse, endpoint: string): ApiError {
  const text = response.body;
  const { message, fieldErrors } = extractUpstreamMessage(text, response.statusText);
  const details = { status: response.status, endpoint, responseBody: text };

  if (response.status === 403) {
    return new PermissionDeniedError(message, details);
  }
  if (response.status === 404) {
    return new NotFoundError(message || "Resource not found", undefined, endpoint, details);
  }
  return new ValidationError(message, fieldErrors, details);
}
