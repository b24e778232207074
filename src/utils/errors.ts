/**
 * Purdue Brightspace MCP Server
 * Copyright (c) 2025 Rohan Muppa. All rights reserved.
 * Licensed under AGPL-3.0 — see LICENSE file for details.
 */

// Base class for every error raised by this server. The code prefix stays
// stable across releases so log lines can be grepped.
export class IplicitError extends Error {
  constructor(
    public readonly code: string,
    message: string,
    public readonly cause?: Error,
  ) {
    super(`[${code}] ${message}`);
    this.name = "IplicitError";
  }
}

export class ConfigError extends IplicitError {
  constructor(
    message: string,
    public readonly missing: string[] = [],
  ) {
    super("IMCP-1000", `Configuration error: ${message}`);
    this.name = "ConfigError";
  }
}

// Credential invalid or the identity endpoint refused to issue one
export class AuthenticationError extends IplicitError {
  constructor(
    message: string,
    public readonly status?: number,
    cause?: Error,
  ) {
    super(
      "IMCP-1001",
      status !== undefined
        ? `Authentication failed (${status}): ${message}`
        : `Authentication failed: ${message}`,
      cause,
    );
    this.name = "AuthenticationError";
  }
}

export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}
