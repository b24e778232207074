import { describe, it, expect } from "vitest";
import { createSessionExchange } from "../../src/auth/session-exchange.js";
import { TransientUpstreamError } from "../../src/api/errors.js";
import { AuthenticationError } from "../../src/utils/errors.js";
import { BASE_URL, FakeApi, FakeClock, START, json, stalled, text } from "../helpers/fake-fetch.js";

function setup(timeoutMs?: number) {
  const api = new FakeApi();
  const clock = new FakeClock();
  const exchange = createSessionExchange({
    baseUrl: BASE_URL,
    domain: "testco",
    username: "tester",
    apiKey: "test-secret",
    timeoutMs,
    fetch: api.fetch,
    now: clock.now,
  });
  return { api, exchange };
}

describe("createSessionExchange", () => {
  it("should post the API key with the Domain header and read the expiry", async () => {
    const { api, exchange } = setup();
    api.on("POST", "session/create/api", json({
      sessionToken: "session-abc",
      tokenDue: "2026-01-01T00:20:00Z",
    }));

    const credential = await exchange();

    expect(credential).toEqual({
      token: "session-abc",
      issuedAt: START,
      expiresAt: Date.parse("2026-01-01T00:20:00Z"),
    });
    const [request] = api.requests;
    expect(request.url).toBe(`${BASE_URL}/session/create/api`);
    expect(request.headers.get("Domain")).toBe("testco");
    expect(request.body).toEqual({ username: "tester", userApiKey: "test-secret" });
  });

  it("should default the expiry to 30 minutes when tokenDue is absent", async () => {
    const { api, exchange } = setup();
    api.on("POST", "session/create/api", json({ sessionToken: "session-abc" }));

    const credential = await exchange();

    expect(credential.expiresAt).toBe(START + 30 * 60 * 1000);
  });

  it("should raise AuthenticationError with the status for rejected credentials", async () => {
    const { api, exchange } = setup();
    api.on("POST", "session/create/api", text("Invalid credentials", 401));

    const error = await exchange().catch((e: unknown) => e);

    expect(error).toBeInstanceOf(AuthenticationError);
    expect(error).toMatchObject({
      status: 401,
      message: "[IMCP-1001] Authentication failed (401): Invalid credentials",
    });
  });

  it("should raise AuthenticationError when no session token comes back", async () => {
    const { api, exchange } = setup();
    api.on("POST", "session/create/api", json({ tokenDue: "2026-01-01T00:20:00Z" }));

    await expect(exchange()).rejects.toThrow("No session token received from API");
  });

  it("should time out a response whose body never completes", async () => {
    const { api, exchange } = setup(20);
    api.on("POST", "session/create/api", () => stalled());

    const error = await exchange().catch((e: unknown) => e);

    expect(error).toBeInstanceOf(TransientUpstreamError);
    expect(error).toMatchObject({
      message: "[IMCP-1105] API error at session/create/api: Session request failed: Request timed out after 20ms",
    });
  });

  it("should report a server error as transient", async () => {
    const { api, exchange } = setup();
    api.on("POST", "session/create/api", text("Service Unavailable", 503));

    const error = await exchange().catch((e: unknown) => e);

    expect(error).toBeInstanceOf(TransientUpstreamError);
    expect(error).toMatchObject({ status: 503 });
  });
});
