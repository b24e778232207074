/**
 * Purdue Brightspace MCP Server
 * Copyright (c) 2025 Rohan Muppa. All rights reserved.
 * Licensed under AGPL-3.0 — see LICENSE file for details.
 */

import { z } from "zod";
import type { Credential } from "../types/index.js";
import type { FetchLike } from "../api/types.js";
import { TransientUpstreamError } from "../api/errors.js";
import { AuthenticationError, toError } from "../utils/errors.js";
import { abortable, withTimeout } from "../utils/async.js";
import type { Clock } from "../utils/async.js";
import { log } from "../utils/logger.js";

// Used when the API omits tokenDue
const DEFAULT_TOKEN_LIFETIME_MS = 30 * 60 * 1000;

const SessionResponseSchema = z.object({
  sessionToken: z.string().optional(),
  tokenDue: z.string().optional(),
});

export type CredentialExchange = (signal?: AbortSignal) => Promise<Credential>;

export interface SessionExchangeOptions {
  baseUrl: string;
  domain: string;
  username: string;
  apiKey: string;
  timeoutMs?: number;
  fetch?: FetchLike;
  now?: Clock;
}

/**
 * Build the credential exchange against POST /session/create/api.
 *
 * 4xx responses mean the credentials are wrong and surface as
 * AuthenticationError. 5xx and network failures surface as
 * TransientUpstreamError so the caller may retry.
 */
export function createSessionExchange(options: SessionExchangeOptions): CredentialExchange {
  const url = `${options.baseUrl.replace(/\/$/, "")}/session/create/api`;
  const fetchImpl = options.fetch ?? fetch;
  const now = options.now ?? Date.now;
  const timeoutMs = options.timeoutMs ?? 30_000;

  return async (signal) => {
    const timeout = withTimeout(timeoutMs, signal);
    let response: Response;
    let text: string;
    try {
      log("DEBUG", `Creating iplicit session for ${options.username}@${options.domain}`);
      response = await fetchImpl(url, {
        method: "POST",
        headers: {
          Domain: options.domain,
          "Content-Type": "application/json",
          Accept: "application/json",
        },
        body: JSON.stringify({
          username: options.username,
          userApiKey: options.apiKey,
        }),
        signal: timeout.signal,
      });
      text = await abortable(response.text(), timeout.signal);
    } catch (error) {
      if (signal?.aborted) throw error;
      const err = toError(error);
      throw new TransientUpstreamError(`Session request failed: ${err.message}`, 1, {
        endpoint: "session/create/api",
        cause: err,
      });
    } finally {
      timeout.dispose();
    }

    if (response.status >= 500) {
      throw new TransientUpstreamError(
        `Identity service error: ${text.slice(0, 200) || response.statusText}`,
        1,
        { status: response.status, endpoint: "session/create/api", responseBody: text },
      );
    }
    if (!response.ok) {
      throw new AuthenticationError(
        text.slice(0, 300) || response.statusText || "credentials rejected",
        response.status,
      );
    }

    let body: unknown;
    try {
      body = JSON.parse(text);
    } catch {
      throw new AuthenticationError("Session response was not JSON", response.status);
    }

    const parsed = SessionResponseSchema.safeParse(body);
    if (!parsed.success || !parsed.data.sessionToken) {
      throw new AuthenticationError("No session token received from API", response.status);
    }

    const issuedAt = now();
    const due = parsed.data.tokenDue ? Date.parse(parsed.data.tokenDue) : Number.NaN;
    const expiresAt = Number.isNaN(due) ? issuedAt + DEFAULT_TOKEN_LIFETIME_MS : due;

    log("INFO", `iplicit session created, expires ${new Date(expiresAt).toISOString()}`);
    return { token: parsed.data.sessionToken, issuedAt, expiresAt };
  };
}
