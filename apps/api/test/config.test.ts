import { describe, expect, it } from "vitest";
import { loadConfig, pluginNames } from "../src/config.js";
import { HttpError, statusCodeOf } from "../src/errors.js";

describe("loadConfig", () => {
  it("applies defaults for an empty environment", () => {
    const config = loadConfig({});

    expect(config.environment).toBe("development");
    expect(config.port).toBe(8000);
    expect(config.appName).toBe("SaaS Platform");
    expect(config.corsOrigins).toEqual(["http://localhost:3000", "http://localhost:8000"]);
    expect(config.payment).toEqual({
      provider: "mock",
      stripeSecretKey: null,
      stripeWebhookSecret: null,
      mockWebhookSecret: "mock-webhook-secret",
    });
    expect(config.rateLimit).toEqual({ provider: "memory", defaultLimit: 100, defaultWindowSeconds: 60 });
    expect(config.jwt.expirationMinutes).toBe(60);
    expect(config.enabledPlugins).toEqual([...pluginNames]);
    expect(Object.isFrozen(config)).toBe(true);
  });

  it("splits comma separated lists and drops blanks", () => {
    const config = loadConfig({
      CORS_ORIGINS: " https://app.example.test , ,https://admin.example.test",
      ANALYTICS_PROVIDERS: "internal,console",
      ENABLED_PLUGINS: "auth,webhooks",
    });

    expect(config.corsOrigins).toEqual(["https://app.example.test", "https://admin.example.test"]);
    expect(config.analyticsProviders).toEqual(["internal", "console"]);
    expect(config.enabledPlugins).toEqual(["auth", "webhooks"]);
  });

  it("coerces numbers from strings", () => {
    const config = loadConfig({ PORT: "9090", RATE_LIMIT_DEFAULT_LIMIT: "25", JWT_EXPIRATION_MINUTES: "15" });

    expect(config.port).toBe(9090);
    expect(config.rateLimit.defaultLimit).toBe(25);
    expect(config.jwt.expirationMinutes).toBe(15);
  });

  it("names every invalid variable", () => {
    expect(() => loadConfig({ PORT: "70000", PAYMENT_PROVIDER: "paypal" })).toThrow(/PORT: .*\nPAYMENT_PROVIDER: /);
  });

  it("rejects a frontend url that is not a url", () => {
    expect(() => loadConfig({ FRONTEND_URL: "localhost" })).toThrow("FRONTEND_URL: Invalid url");
  });
});

describe("statusCodeOf", () => {
  it("reads the status from http and framework errors", () => {
    expect(statusCodeOf(new HttpError(409, "Email already registered"))).toBe(409);
    expect(statusCodeOf(Object.assign(new Error("Request body is too large"), { statusCode: 413 }))).toBe(413);
    expect(statusCodeOf(Object.assign(new Error("odd"), { statusCode: 200 }))).toBeNull();
    expect(statusCodeOf(new Error("plain"))).toBeNull();
  });
});
