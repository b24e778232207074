import { describe, it, expect } from "vitest";
import { IplicitClient, extractUpstreamMessage, parseRetryAfter } from "../../src/api/client.js";
import { createSession } from "../../src/api/session.js";
import {
  NotFoundError,
  PermissionDeniedError,
  RateLimitExceededError,
  TransientUpstreamError,
  ValidationError,
} from "../../src/api/errors.js";
import { TokenStore } from "../../src/auth/token-store.js";
import { AuthenticationError, ConfigError } from "../../src/utils/errors.js";
import type { AppConfig } from "../../src/types/index.js";
import type { Sleep } from "../../src/utils/async.js";
import {
  BASE_URL,
  FakeApi,
  FakeClock,
  START,
  empty,
  hang,
  json,
  stalled,
  testConfig,
  text,
} from "../helpers/fake-fetch.js";

function setup(overrides: Partial<AppConfig> = {}) {
  const api = new FakeApi();
  const clock = new FakeClock();
  const session = createSession(testConfig(overrides), {
    fetch: api.fetch,
    now: clock.now,
    sleep: clock.sleep,
  });
  return { api, clock, client: session.client, tokenStore: session.tokenStore };
}

describe("IplicitClient", () => {
  it("should send the Domain and Bearer headers and parse JSON", async () => {
    const { api, client } = setup();
    api.on("GET", "department", json([{ id: "d1", code: "SALES" }]));

    const result = await client.execute("GET", "department");

    expect(result).toEqual([{ id: "d1", code: "SALES" }]);
    const [request] = api.apiCalls;
    expect(request.headers.get("Domain")).toBe("testco");
    expect(request.headers.get("Authorization")).toBe("Bearer session-1");
    expect(request.headers.get("Accept")).toBe("application/json");
  });

  it("should leave undefined query values out of the URL", async () => {
    const { api, client } = setup();
    api.on("GET", "document", json([]));

    await client.execute("GET", "document", {
      query: { fromDate: "2026-01-01", status: undefined, pageSize: 10 },
    });

    expect(api.apiCalls[0].url).toBe(`${BASE_URL}/document?fromDate=2026-01-01&pageSize=10`);
  });

  it("should return null for an empty body and trimmed text for a bare id", async () => {
    const { api, client } = setup();
    api.on("PATCH", "document/doc-1", empty());
    api.on("POST", "purchaseinvoice", text("  doc-2\n", 201));

    expect(await client.execute("PATCH", "document/doc-1", { body: { description: "x" } })).toBeNull();
    expect(await client.execute("POST", "purchaseinvoice", { body: {} })).toBe("doc-2");
  });

  it("should refresh the session once on 401 and replay the request", async () => {
    const { api, client, tokenStore } = setup();
    api.on("GET", "document/doc-1", text("", 401), json({ id: "doc-1" }));

    const result = await client.execute("GET", "document/doc-1");

    expect(result).toEqual({ id: "doc-1" });
    expect(api.sessionCount).toBe(2);
    expect(tokenStore.refreshCount).toBe(2);
    expect(api.apiCalls.map((r) => r.headers.get("Authorization"))).toEqual([
      "Bearer session-1",
      "Bearer session-2",
    ]);
  });

  it("should raise AuthenticationError on a second 401", async () => {
    const { api, client, tokenStore } = setup();
    api.on("GET", "document/doc-1", text("", 401));

    await expect(client.execute("GET", "document/doc-1")).rejects.toBeInstanceOf(AuthenticationError);
    expect(api.apiCalls).toHaveLength(2);
    expect(tokenStore.current).toBeNull();
  });

  it("should stop after maxAttempts server errors", async () => {
    const { api, clock, client } = setup();
    api.on("GET", "document", text("Service Unavailable", 503));

    const error = await client.execute("GET", "document").catch((e: unknown) => e);

    expect(error).toBeInstanceOf(TransientUpstreamError);
    expect(error).toMatchObject({ status: 503, attempts: 3 });
    expect(api.apiCalls).toHaveLength(3);
    expect(clock.sleeps).toEqual([1000, 2000]);
  });

  it("should recover from a server error within the retry budget", async () => {
    const { api, clock, client } = setup();
    api.on("GET", "document", text("Bad Gateway", 502), json([{ id: "doc-1" }]));

    expect(await client.execute("GET", "document")).toEqual([{ id: "doc-1" }]);
    expect(clock.sleeps).toEqual([1000]);
    // Failed attempts use a rate-limit slot too
    expect(client.limiter.used).toBe(2);
  });

  it("should retry network failures with backoff", async () => {
    const { api, clock, client } = setup();
    api.on(
      "GET",
      "project",
      () => {
        throw new TypeError("fetch failed");
      },
      json([]),
    );

    expect(await client.execute("GET", "project")).toEqual([]);
    expect(clock.sleeps).toEqual([1000]);
  });

  it("should give up on a request that never answers after maxAttempts timeouts", async () => {
    const { api, clock, client } = setup({ timeoutMs: 20 });
    api.on("GET", "project", hang);

    const error = await client.execute("GET", "project").catch((e: unknown) => e);

    expect(error).toBeInstanceOf(TransientUpstreamError);
    expect(error).toMatchObject({ attempts: 3, cause: { name: "TimeoutError" } });
    expect(api.apiCalls).toHaveLength(3);
    expect(clock.sleeps).toEqual([1000, 2000]);
  });

  it("should time out a body that stalls after the headers and retry", async () => {
    const { api, clock, client } = setup({ timeoutMs: 20 });
    api.on("GET", "project", () => stalled(), json([{ id: "p1" }]));

    expect(await client.execute("GET", "project")).toEqual([{ id: "p1" }]);
    expect(api.apiCalls).toHaveLength(2);
    expect(clock.sleeps).toEqual([1000]);
  });

  it("should stop during a backoff wait when the caller aborts", async () => {
    const api = new FakeApi();
    const clock = new FakeClock();
    const controller = new AbortController();
    const sleep: Sleep = async (ms, signal) => {
      controller.abort(new Error("caller gone"));
      await clock.sleep(ms, signal);
    };
    const { client } = createSession(testConfig(), { fetch: api.fetch, now: clock.now, sleep });
    api.on("GET", "document", text("Service Unavailable", 503));

    await expect(client.execute("GET", "document", { signal: controller.signal })).rejects.toThrow("caller gone");
    expect(api.apiCalls).toHaveLength(1);
    expect(clock.sleeps).toEqual([]);
  });

  it("should take a new token when the rate-limit wait outlasts the current one", async () => {
    const { api, clock, client } = setup({ rateLimit: { capacity: 1, windowMs: 300_000, mode: "block" } });
    api.on(
      "POST",
      "session/create/api",
      json({ sessionToken: "session-1", tokenDue: new Date(START + 30 * 60_000).toISOString() }),
      json({ sessionToken: "session-2", tokenDue: new Date(START + 60 * 60_000).toISOString() }),
    );
    api.on("GET", "project", json([]));
    clock.advance(27 * 60_000);

    await client.execute("GET", "project");
    await client.execute("GET", "project");

    // The second call waited until 32 min, past the 30 min expiry of session-1
    expect(clock.sleeps).toEqual([300_000]);
    expect(api.calls("POST", "session/create/api")).toHaveLength(2);
    expect(api.apiCalls.map((r) => r.headers.get("Authorization"))).toEqual([
      "Bearer session-1",
      "Bearer session-2",
    ]);
  });

  it("should wait for Retry-After on 429", async () => {
    const { api, clock, client } = setup();
    api.on("GET", "product", text("", 429, { "Retry-After": "5" }), json([]));

    await client.execute("GET", "product");

    expect(clock.sleeps).toEqual([5000]);
  });

  it("should raise RateLimitExceededError after repeated 429s", async () => {
    const { api, client } = setup();
    api.on("GET", "product", text("", 429, { "Retry-After": "5" }));

    const error = await client.execute("GET", "product").catch((e: unknown) => e);

    expect(error).toBeInstanceOf(RateLimitExceededError);
    expect(error).toMatchObject({ source: "upstream", retryAfterMs: 5000, status: 429 });
    expect(api.apiCalls).toHaveLength(3);
  });

  it("should turn a 400 into ValidationError with field errors and no retry", async () => {
    const { api, client } = setup();
    api.on(
      "POST",
      "saleinvoice",
      json(
        {
          title: "One or more validation errors occurred.",
          errors: { docDate: ["The docDate field is required."] },
        },
        400,
      ),
    );

    const error = await client.execute("POST", "saleinvoice", { body: {} }).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(ValidationError);
    expect(error).toMatchObject({
      status: 400,
      upstreamMessage: "One or more validation errors occurred. - docDate: The docDate field is required.",
      fieldErrors: { docDate: ["The docDate field is required."] },
    });
    expect(api.apiCalls).toHaveLength(1);
  });

  it("should map 403 and 404 to their own errors", async () => {
    const { api, client } = setup();
    api.on("GET", "payment", json({ message: "Not allowed" }, 403));
    api.on("GET", "payment/p-1", json({ message: "Payment not found" }, 404));

    await expect(client.execute("GET", "payment")).rejects.toBeInstanceOf(PermissionDeniedError);
    await expect(client.execute("GET", "payment/p-1")).rejects.toBeInstanceOf(NotFoundError);
  });

  it("should fail at once for an aborted caller", async () => {
    const { api, client } = setup();
    const controller = new AbortController();
    controller.abort(new Error("stop"));

    await expect(client.execute("GET", "document", { signal: controller.signal })).rejects.toThrow("stop");
    expect(api.requests).toHaveLength(0);
  });

  it("should refuse a plain HTTP base URL except for localhost", () => {
    const tokenStore = new TokenStore({ exchange: async () => ({ token: "t", issuedAt: 0, expiresAt: 0 }) });

    expect(() => new IplicitClient({ baseUrl: "http://api.test/api", domain: "testco", tokenStore })).toThrow(
      ConfigError,
    );
    expect(
      () => new IplicitClient({ baseUrl: "http://localhost:8080/api", domain: "testco", tokenStore }),
    ).not.toThrow();
  });
});

describe("parseRetryAfter", () => {
  it("should read delay-seconds", () => {
    expect(parseRetryAfter("120", START)).toBe(120_000);
  });

  it("should read an HTTP date relative to now", () => {
    expect(parseRetryAfter(new Date(START + 3000).toUTCString(), START)).toBe(3000);
  });

  it("should ignore missing or unreadable values", () => {
    expect(parseRetryAfter(null, START)).toBeUndefined();
    expect(parseRetryAfter("soon", START)).toBeUndefined();
  });
});

describe("extractUpstreamMessage", () => {
  it("should prefer the message field", () => {
    expect(extractUpstreamMessage('{"message":"Document is not in draft status"}', "Bad Request")).toEqual({
      message: "Document is not in draft status",
      fieldErrors: {},
    });
  });

  it("should fall back to the raw text and then the status text", () => {
    expect(extractUpstreamMessage("Something broke", "Bad Request").message).toBe("Something broke");
    expect(extractUpstreamMessage("", "Bad Request").message).toBe("Bad Request");
  });
});
