import { describe, it, expect } from "vitest";
import { loadConfig, DEFAULT_BASE_URL } from "../../src/utils/config.js";
import { ConfigError } from "../../src/utils/errors.js";

const REQUIRED = {
  IPLICIT_API_KEY: "test-secret",
  IPLICIT_USERNAME: "tester",
  IPLICIT_DOMAIN: "testco",
};

describe("loadConfig", () => {
  it("should list every missing required variable", () => {
    let caught: unknown;
    try {
      loadConfig({});
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(ConfigError);
    expect(caught).toMatchObject({
      message:
        "[IMCP-1000] Configuration error: Missing required environment variables: IPLICIT_API_KEY, IPLICIT_USERNAME, IPLICIT_DOMAIN",
      missing: ["IPLICIT_API_KEY", "IPLICIT_USERNAME", "IPLICIT_DOMAIN"],
    });
  });

  it("should treat a blank value as missing", () => {
    expect(() => loadConfig({ ...REQUIRED, IPLICIT_API_KEY: "   " })).toThrow(
      "Missing required environment variables: IPLICIT_API_KEY",
    );
  });

  it("should apply defaults for everything optional", () => {
    expect(loadConfig(REQUIRED)).toEqual({
      apiKey: "test-secret",
      username: "tester",
      domain: "testco",
      baseUrl: DEFAULT_BASE_URL,
      rateLimit: { capacity: 1500, windowMs: 300_000, mode: "block" },
      timeoutMs: 30_000,
      retry: { maxAttempts: 3, backoffBaseMs: 1000, backoffMultiplier: 2 },
      tokenRefreshMarginMs: 60_000,
      lookupLimit: 500,
      defaultCurrency: "GBP",
      logLevel: "INFO",
    });
  });

  it("should coerce numeric overrides and normalize strings", () => {
    const config = loadConfig({
      ...REQUIRED,
      IPLICIT_BASE_URL: "http://localhost:8080/api/",
      IPLICIT_RATE_LIMIT_CAPACITY: "10",
      IPLICIT_RATE_LIMIT_MODE: "reject",
      IPLICIT_MAX_ATTEMPTS: "5",
      IPLICIT_DEFAULT_CURRENCY: "eur",
      LOG_LEVEL: "DEBUG",
    });

    expect(config.baseUrl).toBe("http://localhost:8080/api");
    expect(config.rateLimit).toEqual({ capacity: 10, windowMs: 300_000, mode: "reject" });
    expect(config.retry.maxAttempts).toBe(5);
    expect(config.defaultCurrency).toBe("EUR");
    expect(config.logLevel).toBe("DEBUG");
  });

  it("should name the variable that fails validation", () => {
    expect(() => loadConfig({ ...REQUIRED, IPLICIT_RATE_LIMIT_MODE: "drop" })).toThrow(
      /Invalid environment: IPLICIT_RATE_LIMIT_MODE: /,
    );
    expect(() => loadConfig({ ...REQUIRED, IPLICIT_MAX_ATTEMPTS: "0" })).toThrow(ConfigError);
  });
});
