/**
 * Purdue Brightspace MCP Server
 * Copyright (c) 2025 Rohan Muppa. All rights reserved.
 * Licensed under AGPL-3.0 — see LICENSE file for details.
 */

// Sliding-window rate limiter - counts requests in the trailing window
// iplicit allows 1500 requests per 5 minutes per user

import type { QuotaWindow, RateLimitMode } from "../types/index.js";
import { RateLimitExceededError } from "./errors.js";
import { ConfigError } from "../utils/errors.js";
import { sleep as defaultSleep, throwIfAborted } from "../utils/async.js";
import type { Clock, Sleep } from "../utils/async.js";
import { log } from "../utils/logger.js";

export interface SlidingWindowOptions extends QuotaWindow {
  mode?: RateLimitMode;
  now?: Clock;
  sleep?: Sleep;
}

export class SlidingWindowLimiter {
  // Accepted request times, oldest first
  private readonly timestamps: number[] = [];
  private readonly capacity: number;
  private readonly windowMs: number;
  private readonly mode: RateLimitMode;
  private readonly now: Clock;
  private readonly sleep: Sleep;
  private waiters = 0;

  constructor(options: SlidingWindowOptions) {
    if (!Number.isInteger(options.capacity) || options.capacity < 0) {
      throw new ConfigError(`Rate limit capacity must be a non-negative integer, got ${options.capacity}`);
    }
    if (!(options.windowMs > 0)) {
      throw new ConfigError(`Rate limit window must be positive, got ${options.windowMs}ms`);
    }
    this.capacity = options.capacity;
    this.windowMs = options.windowMs;
    this.mode = options.mode ?? "block";
    this.now = options.now ?? Date.now;
    this.sleep = options.sleep ?? defaultSleep;
  }

  private prune(now: number): void {
    const cutoff = now - this.windowMs;
    while (this.timestamps.length > 0 && this.timestamps[0] <= cutoff) {
      this.timestamps.shift();
    }
  }

  /**
   * Take a slot now or fail. The prune-check-record sequence runs without an
   * await in between, so concurrent callers cannot both take the last slot.
   */
  tryAcquire(): boolean {
    const now = this.now();
    this.prune(now);
    if (this.timestamps.length < this.capacity) {
      this.timestamps.push(now);
      return true;
    }
    return false;
  }

  /**
   * Take a slot, waiting for one to free up in "block" mode.
   * A caller aborted while waiting records nothing.
   * @throws RateLimitExceededError in "reject" mode, or always when capacity is 0
   */
  async acquire(signal?: AbortSignal): Promise<void> {
    throwIfAborted(signal);

    if (this.capacity === 0) {
      throw new RateLimitExceededError("local");
    }

    for (;;) {
      if (this.tryAcquire()) {
        return;
      }

      const retryAfterMs = this.msUntilNextSlot();
      if (this.mode === "reject") {
        throw new RateLimitExceededError("local", retryAfterMs);
      }

      log(
        "WARN",
        `Request quota reached (${this.capacity}/${this.windowMs}ms), waiting ${retryAfterMs}ms`,
      );
      this.waiters++;
      try {
        await this.sleep(retryAfterMs, signal);
      } finally {
        this.waiters--;
      }
    }
  }

  private msUntilNextSlot(): number {
    if (this.timestamps.length === 0) return 0;
    return Math.max(0, this.timestamps[0] + this.windowMs - this.now());
  }

  // Free slots right now
  get available(): number {
    this.prune(this.now());
    return Math.max(0, this.capacity - this.timestamps.length);
  }

  // Slots taken inside the current window
  get used(): number {
    this.prune(this.now());
    return this.timestamps.length;
  }

  // Callers currently suspended in acquire()
  get pending(): number {
    return this.waiters;
  }
}
