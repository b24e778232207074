/**
 * Purdue Brightspace MCP Server
 * Copyright (c) 2025 Rohan Muppa. All rights reserved.
 * Licensed under AGPL-3.0 — see LICENSE file for details.
 */

import type { Credential } from "../types/index.js";
import type { CredentialExchange } from "./session-exchange.js";
import { TransientUpstreamError } from "../api/errors.js";
import { AuthenticationError } from "../utils/errors.js";
import { abortable, sleep as defaultSleep, throwIfAborted } from "../utils/async.js";
import type { Clock, Sleep } from "../utils/async.js";
import { log } from "../utils/logger.js";

/**
 * Refresh margin - credentials within this time of expiry are considered invalid.
 * This prevents using tokens that might expire during a request.
 */
const DEFAULT_REFRESH_MARGIN_MS = 60 * 1000;

// Pause before the single retry of a failed exchange
const DEFAULT_RETRY_DELAY_MS = 1000;

export interface TokenStoreOptions {
  exchange: CredentialExchange;
  refreshMarginMs?: number;
  retryDelayMs?: number;
  now?: Clock;
  sleep?: Sleep;
}

/**
 * TokenStore owns the single session credential for the process.
 *
 * Refresh is single-flight: every caller that finds the credential missing or
 * expiring joins the same in-flight exchange, and a failed exchange rejects
 * all of them. Nothing is persisted; a new process starts a new session.
 */
export class TokenStore {
  private credential: Credential | null = null;
  private inFlight: Promise<Credential> | null = null;
  private refreshes = 0;
  private readonly exchange: CredentialExchange;
  private readonly refreshMarginMs: number;
  private readonly retryDelayMs: number;
  private readonly now: Clock;
  private readonly sleep: Sleep;

  constructor(options: TokenStoreOptions) {
    this.exchange = options.exchange;
    this.refreshMarginMs = options.refreshMarginMs ?? DEFAULT_REFRESH_MARGIN_MS;
    this.retryDelayMs = options.retryDelayMs ?? DEFAULT_RETRY_DELAY_MS;
    this.now = options.now ?? Date.now;
    this.sleep = options.sleep ?? defaultSleep;
  }

  /**
   * Return a usable token, refreshing first if none is held or the current
   * one is inside the refresh margin.
   * Aborting `signal` detaches this caller only; the refresh carries on.
   * @throws AuthenticationError when the identity service refuses or stays down
   */
  async getToken(signal?: AbortSignal): Promise<string> {
    throwIfAborted(signal);

    if (this.credential && this.isValid(this.credential)) {
      return this.credential.token;
    }

    const credential = await abortable(this.refresh(), signal);
    return credential.token;
  }

  /**
   * Replace a token the API just rejected with 401.
   * If another caller already swapped it out, the newer token is returned
   * without a second exchange.
   */
  async forceRefresh(staleToken: string, signal?: AbortSignal): Promise<string> {
    throwIfAborted(signal);

    const current = this.credential;
    if (current && current.token !== staleToken && this.isValid(current)) {
      log("DEBUG", "Token already refreshed by another request");
      return current.token;
    }
    if (current?.token === staleToken) {
      this.credential = null;
    }

    const credential = await abortable(this.refresh(), signal);
    return credential.token;
  }

  // Drop the credential; the next getToken() starts a new session
  invalidate(): void {
    this.credential = null;
    log("DEBUG", "Credential invalidated");
  }

  /**
   * A credential is valid if it expires more than the refresh margin from now.
   */
  isValid(credential: Credential): boolean {
    const timeUntilExpiry = credential.expiresAt - this.now();
    const valid = timeUntilExpiry > this.refreshMarginMs;

    if (!valid) {
      log(
        "DEBUG",
        `Credential expiring: ${Math.round(timeUntilExpiry / 1000)}s left (margin: ${this.refreshMarginMs / 1000}s)`,
      );
    }

    return valid;
  }

  get current(): Credential | null {
    return this.credential;
  }

  // Number of successful exchanges since startup
  get refreshCount(): number {
    return this.refreshes;
  }

  get refreshing(): boolean {
    return this.inFlight !== null;
  }

  private refresh(): Promise<Credential> {
    if (this.inFlight) {
      log("DEBUG", "Joining in-flight session refresh");
      return this.inFlight;
    }

    this.inFlight = this.exchangeWithRetry()
      .then((credential) => {
        this.credential = credential;
        this.refreshes++;
        return credential;
      })
      .finally(() => {
        this.inFlight = null;
      });

    return this.inFlight;
  }

  private async exchangeWithRetry(): Promise<Credential> {
    try {
      return await this.exchange();
    } catch (error) {
      if (!(error instanceof TransientUpstreamError)) {
        throw error;
      }
      log("WARN", `Session refresh failed, retrying once in ${this.retryDelayMs}ms: ${error.message}`);
    }

    await this.sleep(this.retryDelayMs);

    try {
      return await this.exchange();
    } catch (error) {
      if (error instanceof TransientUpstreamError) {
        throw new AuthenticationError(
          `Identity service unavailable after retry: ${error.upstreamMessage}`,
          error.status,
          error,
        );
      }
      throw error;
    }
  }
}
