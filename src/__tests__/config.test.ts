import { describe, it, expect } from "vitest";
import { getApiUrl, loadConfig } from "../config.js";

describe("loadConfig", () => {
  it("applies defaults when nothing is set", () => {
    expect(loadConfig({})).toMatchObject({
      graphUrl: "https://graph.facebook.com",
      apiVersion: "v22.0",
      sessionId: "default",
      requestTimeoutMs: 180_000,
      maxPages: 25,
      tokenRefreshWindowDays: 10,
      requiredScopes: ["ads_read"],
      rateLimit: { quota: 200, windowSeconds: 3600, maxWaitSeconds: 60 },
      cache: { enabled: true, ttlSeconds: 300, maxEntries: 500 },
      retry: { maxAttempts: 3, baseDelayMs: 1000, maxDelayMs: 30_000 },
    });
  });

  it("reads overrides from the environment", () => {
    const config = loadConfig({
      MAX_REQUESTS_PER_HOUR: "50",
      ENABLE_CACHE: "FALSE",
      CACHE_TTL: "60",
      META_REQUIRED_SCOPES: "ads_read, ads_management",
      TOKEN_STORAGE_PATH: "/tmp/credentials.json",
      API_RETRY_COUNT: "5",
    });
    expect(config.rateLimit.quota).toBe(50);
    expect(config.cache).toMatchObject({ enabled: false, ttlSeconds: 60 });
    expect(config.requiredScopes).toEqual(["ads_read", "ads_management"]);
    expect(config.credentialsPath).toBe("/tmp/credentials.json");
    expect(config.retry.maxAttempts).toBe(5);
  });

  it("treats empty values as unset", () => {
    expect(loadConfig({ API_RETRY_COUNT: "  " }).retry.maxAttempts).toBe(3);
  });

  it("names the offending variable", () => {
    expect(() => loadConfig({ MAX_REQUESTS_PER_HOUR: "abc" })).toThrow(/^Invalid configuration: MAX_REQUESTS_PER_HOUR: /);
    expect(() => loadConfig({ ENABLE_CACHE: "yes" })).toThrow(/ENABLE_CACHE/);
    expect(() => loadConfig({ META_GRAPH_API_VERSION: "22" })).toThrow(
      "Invalid configuration: META_GRAPH_API_VERSION: must look like v22.0",
    );
  });
});

describe("getApiUrl", () => {
  it("joins the base URL and version", () => {
    expect(getApiUrl({ graphUrl: "https://graph.facebook.com/", apiVersion: "v22.0" })).toBe(
      "https://graph.facebook.com/v22.0",
    );
  });
});
