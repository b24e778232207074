/**
 * Purdue Brightspace MCP Server
 * Copyright (c) 2025 Rohan Muppa. All rights reserved.
 * Licensed under AGPL-3.0 — see LICENSE file for details.
 */

import type { AppConfig, Resource } from "../types/index.js";
import type { FetchLike, HttpMethod, Query, RequestOptions } from "./types.js";
import { IplicitClient } from "./client.js";
import { SlidingWindowLimiter } from "./rate-limiter.js";
import { Resolver, type ResolvedReference } from "./resolver.js";
import { WriteOrchestrator, type WritePayload } from "./write-orchestrator.js";
import { DefaultsCache } from "./defaults-cache.js";
import { classifyShape, normalize, normalizeOne } from "./normalizer.js";
import { resourcePath, type EntityKind, type TransitionAction } from "./entities.js";
import { TokenStore } from "../auth/token-store.js";
import { createSessionExchange } from "../auth/session-exchange.js";
import type { Clock, Sleep } from "../utils/async.js";

export interface ListOptions {
  query?: Query;
  collectionField?: string;
  signal?: AbortSignal;
}

/**
 * The surface tool handlers talk to. Reads come back normalized, references
 * are resolved before writes, and every write is confirmed by a read.
 */
export class AccountingSession {
  constructor(
    readonly client: IplicitClient,
    readonly tokenStore: TokenStore,
    readonly resolver: Resolver,
    readonly writer: WriteOrchestrator,
  ) {}

  /**
   * Raw call with a normalized result: a list for list-shaped bodies, one
   * Resource for an object, null for an empty body.
   */
  async execute(
    method: HttpMethod,
    path: string,
    options: RequestOptions = {},
  ): Promise<Resource | Resource[] | null> {
    const raw = await this.client.execute(method, path, options);
    const shape = classifyShape(raw);
    switch (shape.kind) {
      case "empty":
        return null;
      case "sequence":
      case "wrapped":
        return normalize(raw, shape.kind === "wrapped" ? shape.field : undefined, path);
      case "single":
        return shape.resource;
      case "unknown":
        // Bare id strings from creation endpoints
        return typeof raw === "string" ? { id: raw } : normalizeOne(raw, path);
    }
  }

  async get(path: string, signal?: AbortSignal): Promise<Resource> {
    const raw = await this.client.execute("GET", path, { signal });
    return normalizeOne(raw, path);
  }

  async list(path: string, options: ListOptions = {}): Promise<Resource[]> {
    const raw = await this.client.execute("GET", path, {
      query: options.query,
      signal: options.signal,
    });
    return normalize(raw, options.collectionField, path);
  }

  // Look a record up by id or code and fetch it
  async fetchEntity(reference: string, kind: EntityKind, signal?: AbortSignal): Promise<Resource> {
    const id = await this.resolver.resolve(reference, kind, signal);
    return this.get(resourcePath(kind, id), signal);
  }

  resolve(input: string, kind: EntityKind, signal?: AbortSignal): Promise<string> {
    return this.resolver.resolve(input, kind, signal);
  }

  resolveReference(input: string, kind: EntityKind, signal?: AbortSignal): Promise<ResolvedReference> {
    return this.resolver.resolveReference(input, kind, signal);
  }

  create(kind: EntityKind, payload: WritePayload, signal?: AbortSignal): Promise<Resource> {
    return this.writer.create(kind, payload, signal);
  }

  update(id: string, kind: EntityKind, payload: WritePayload, signal?: AbortSignal): Promise<Resource> {
    return this.writer.update(id, kind, payload, signal);
  }

  transition(
    id: string,
    kind: EntityKind,
    action: TransitionAction,
    payload?: WritePayload,
    signal?: AbortSignal,
  ): Promise<Resource> {
    return this.writer.transition(id, kind, action, payload, signal);
  }
}

export interface SessionDependencies {
  fetch?: FetchLike;
  now?: Clock;
  sleep?: Sleep;
}

// Wire the token store, limiter, client, resolver and writer from config
export function createSession(config: AppConfig, deps: SessionDependencies = {}): AccountingSession {
  const exchange = createSessionExchange({
    baseUrl: config.baseUrl,
    domain: config.domain,
    username: config.username,
    apiKey: config.apiKey,
    timeoutMs: config.timeoutMs,
    fetch: deps.fetch,
    now: deps.now,
  });

  const tokenStore = new TokenStore({
    exchange,
    refreshMarginMs: config.tokenRefreshMarginMs,
    retryDelayMs: config.retry.backoffBaseMs,
    now: deps.now,
    sleep: deps.sleep,
  });

  const rateLimiter = new SlidingWindowLimiter({
    ...config.rateLimit,
    now: deps.now,
    sleep: deps.sleep,
  });

  const client = new IplicitClient({
    baseUrl: config.baseUrl,
    domain: config.domain,
    tokenStore,
    rateLimiter,
    retry: config.retry,
    timeoutMs: config.timeoutMs,
    fetch: deps.fetch,
    now: deps.now,
    sleep: deps.sleep,
  });

  const resolver = new Resolver(client, config.lookupLimit);
  const writer = new WriteOrchestrator({
    client,
    resolver,
    defaults: new DefaultsCache(),
    defaultCurrency: config.defaultCurrency,
  });

  return new AccountingSession(client, tokenStore, resolver, writer);
}
