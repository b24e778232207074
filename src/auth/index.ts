/**
 * Purdue Brightspace MCP Server
 * Copyright (c) 2025 Rohan Muppa. All rights reserved.
 * Licensed under AGPL-3.0 — see LICENSE file for details.
 */

export { TokenStore } from "./token-store.js";
export type { TokenStoreOptions } from "./token-store.js";
export { createSessionExchange } from "./session-exchange.js";
export type { CredentialExchange, SessionExchangeOptions } from "./session-exchange.js";
