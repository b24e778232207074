import type { FetchLike } from "../../src/api/types.js";
import type { AppConfig } from "../../src/types/index.js";
import { throwIfAborted } from "../../src/utils/async.js";

export const BASE_URL = "https://api.test/api";
export const START = Date.parse("2026-01-01T00:00:00Z");

export interface RecordedRequest {
  method: string;
  url: string;
  path: string;
  query: URLSearchParams;
  headers: Headers;
  body: unknown;
  signal?: AbortSignal;
}

export type Responder = Response | ((req: RecordedRequest) => Response | Promise<Response>);

export function json(body: unknown, status = 200, headers: Record<string, string> = {}): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { "Content-Type": "application/json", ...headers },
  });
}

export function text(body: string, status = 200, headers: Record<string, string> = {}): Response {
  return new Response(body, { status, headers });
}

export function empty(status = 204): Response {
  return new Response(null, { status });
}

// Headers arrive, then the body never finishes
export function stalled(status = 200): Response {
  async function* chunks(): AsyncGenerator<Uint8Array> {
    yield new TextEncoder().encode("[");
    await new Promise<never>(() => undefined);
  }
  return new Response(chunks(), { status, headers: { "Content-Type": "application/json" } });
}

// Never answers; fails once the request's own signal fires
export function hang(req: RecordedRequest): Promise<Response> {
  return new Promise<Response>((_resolve, reject) => {
    req.signal?.addEventListener("abort", () => reject(req.signal?.reason), { once: true });
  });
}

/**
 * In-process stand-in for the iplicit API. Routes are "METHOD path" with a
 * queue of responses; the last response of a route repeats.
 */
export class FakeApi {
  readonly requests: RecordedRequest[] = [];
  private readonly routes = new Map<string, Responder[]>();
  private sessions = 0;

  constructor() {
    this.on("POST", "session/create/api", () => {
      this.sessions++;
      return json({
        sessionToken: `session-${this.sessions}`,
        tokenDue: new Date(START + 30 * 60 * 1000).toISOString(),
      });
    });
  }

  on(method: string, path: string, ...responses: Responder[]): this {
    this.routes.set(`${method} ${path}`, responses);
    return this;
  }

  fetch: FetchLike = async (input, init) => {
    throwIfAborted(init?.signal ?? undefined);
    const url = new URL(input);
    const method = init?.method ?? "GET";
    const path = url.pathname.replace(/^\/api\//, "");
    const rawBody = typeof init?.body === "string" ? init.body : undefined;
    const req: RecordedRequest = {
      method,
      url: input,
      path,
      query: url.searchParams,
      headers: new Headers(init?.headers),
      body: rawBody === undefined ? undefined : JSON.parse(rawBody),
      signal: init?.signal ?? undefined,
    };
    this.requests.push(req);

    const queue = this.routes.get(`${method} ${path}`);
    if (!queue || queue.length === 0) {
      return json({ message: `No fake route for ${method} ${path}` }, 404);
    }
    const responder = queue.length > 1 ? queue.shift() : queue[0];
    if (responder === undefined) {
      throw new Error(`Empty route ${method} ${path}`);
    }
    // A Response body can only be read once; clone the repeating one
    if (responder instanceof Response) {
      return queue[0] === responder ? responder.clone() : responder;
    }
    return responder(req);
  };

  calls(method: string, path?: string): RecordedRequest[] {
    return this.requests.filter((r) => r.method === method && (path === undefined || r.path === path));
  }

  // Requests other than the session exchange
  get apiCalls(): RecordedRequest[] {
    return this.requests.filter((r) => r.path !== "session/create/api");
  }

  get sessionCount(): number {
    return this.sessions;
  }
}

/**
 * Manual clock. `sleep` advances time instantly and records the delay, so
 * backoff and rate-limit waits run without real timers.
 */
export class FakeClock {
  time = START;
  readonly sleeps: number[] = [];

  now = (): number => this.time;

  sleep = async (ms: number, signal?: AbortSignal): Promise<void> => {
    throwIfAborted(signal);
    this.sleeps.push(ms);
    this.time += ms;
  };

  advance(ms: number): void {
    this.time += ms;
  }
}

export function testConfig(overrides: Partial<AppConfig> = {}): AppConfig {
  return {
    apiKey: "test-secret",
    username: "tester",
    domain: "testco",
    baseUrl: BASE_URL,
    rateLimit: { capacity: 1500, windowMs: 300_000, mode: "block" },
    timeoutMs: 30_000,
    retry: { maxAttempts: 3, backoffBaseMs: 1000, backoffMultiplier: 2 },
    tokenRefreshMarginMs: 60_000,
    lookupLimit: 500,
    defaultCurrency: "GBP",
    logLevel: "ERROR",
    ...overrides,
  };
}
