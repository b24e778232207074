/**
 * Purdue Brightspace MCP Server
 * Copyright (c) 2025 Rohan Muppa. All rights reserved.
 * Licensed under AGPL-3.0 — see LICENSE file for details.
 */

import { z } from "zod";
import type { AppConfig } from "../types/index.js";
import { ConfigError } from "./errors.js";

export const DEFAULT_BASE_URL = "https://api.iplicit.com/api";

const REQUIRED_VARS = ["IPLICIT_API_KEY", "IPLICIT_USERNAME", "IPLICIT_DOMAIN"] as const;

const intVar = (fallback: number, min: number) =>
  z.coerce.number().int().min(min).default(fallback);

const EnvSchema = z.object({
  IPLICIT_API_KEY: z.string().min(1),
  IPLICIT_USERNAME: z.string().min(1),
  IPLICIT_DOMAIN: z.string().min(1),
  IPLICIT_BASE_URL: z.string().url().default(DEFAULT_BASE_URL),
  IPLICIT_RATE_LIMIT_CAPACITY: intVar(1500, 0),
  IPLICIT_RATE_LIMIT_WINDOW_MS: intVar(300_000, 1),
  IPLICIT_RATE_LIMIT_MODE: z.enum(["block", "reject"]).default("block"),
  IPLICIT_TIMEOUT_MS: intVar(30_000, 1),
  IPLICIT_MAX_ATTEMPTS: intVar(3, 1),
  IPLICIT_BACKOFF_BASE_MS: intVar(1000, 0),
  IPLICIT_BACKOFF_MULTIPLIER: z.coerce.number().min(1).default(2),
  IPLICIT_TOKEN_REFRESH_MARGIN_MS: intVar(60_000, 0),
  IPLICIT_LOOKUP_LIMIT: intVar(500, 1),
  IPLICIT_DEFAULT_CURRENCY: z.string().length(3).default("GBP"),
  LOG_LEVEL: z.enum(["DEBUG", "INFO", "WARN", "ERROR"]).default("INFO"),
});

/**
 * Build the application config from environment variables.
 * Read once at startup; empty strings count as unset.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const missing = REQUIRED_VARS.filter((name) => !env[name]?.trim());
  if (missing.length > 0) {
    throw new ConfigError(
      `Missing required environment variables: ${missing.join(", ")}`,
      [...missing],
    );
  }

  const cleaned: Record<string, string> = {};
  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined && value.trim() !== "") {
      cleaned[key] = value.trim();
    }
  }

  const parsed = EnvSchema.safeParse(cleaned);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`);
    throw new ConfigError(`Invalid environment: ${issues.join("; ")}`);
  }
  const vars = parsed.data;

  return {
    apiKey: vars.IPLICIT_API_KEY,
    username: vars.IPLICIT_USERNAME,
    domain: vars.IPLICIT_DOMAIN,
    baseUrl: vars.IPLICIT_BASE_URL.replace(/\/$/, ""),
    rateLimit: {
      capacity: vars.IPLICIT_RATE_LIMIT_CAPACITY,
      windowMs: vars.IPLICIT_RATE_LIMIT_WINDOW_MS,
      mode: vars.IPLICIT_RATE_LIMIT_MODE,
    },
    timeoutMs: vars.IPLICIT_TIMEOUT_MS,
    retry: {
      maxAttempts: vars.IPLICIT_MAX_ATTEMPTS,
      backoffBaseMs: vars.IPLICIT_BACKOFF_BASE_MS,
      backoffMultiplier: vars.IPLICIT_BACKOFF_MULTIPLIER,
    },
    tokenRefreshMarginMs: vars.IPLICIT_TOKEN_REFRESH_MARGIN_MS,
    lookupLimit: vars.IPLICIT_LOOKUP_LIMIT,
    defaultCurrency: vars.IPLICIT_DEFAULT_CURRENCY.toUpperCase(),
    logLevel: vars.LOG_LEVEL,
  };
}

export type { AppConfig };
