/**
 * Purdue Brightspace MCP Server
 * Copyright (c) 2025 Rohan Muppa. All rights reserved.
 * Licensed under AGPL-3.0 — see LICENSE file for details.
 */

// Process-lifetime cache for smart defaults (document types, legal entity)
// No expiry and no disk persistence: a restart re-fetches

import { log } from "../utils/logger.js";

export class DefaultsCache<T = string> {
  private cache = new Map<string, Promise<T>>();

  /**
   * Return the cached value for `key`, loading it once. Concurrent callers
   * share the same load; a failed load is forgotten so the next call retries.
   */
  getOrLoad(key: string, load: () => Promise<T>): Promise<T> {
    const existing = this.cache.get(key);
    if (existing) {
      return existing;
    }

    log("DEBUG", `Loading default: ${key}`);
    const pending = load().catch((error: unknown) => {
      this.cache.delete(key);
      throw error;
    });
    this.cache.set(key, pending);
    return pending;
  }
}
