/**
 * Centralized configuration for the Meta Ads gateway MCP server
 *
 * Every setting comes from the environment; unset or empty variables fall
 * back to the defaults below.
 */

import { homedir } from "os";
import { join } from "path";
import { z } from "zod";

const DEFAULT_GRAPH_URL = "https://graph.facebook.com";
const DEFAULT_API_VERSION = "v22.0";

const positiveInt = (fallback: number) => z.coerce.number().int().positive().default(fallback);

const booleanFlag = (fallback: boolean) =>
  z
    .enum(["true", "false", "1", "0"])
    .transform((value) => value === "true" || value === "1")
    .default(fallback ? "true" : "false");

const scopeList = (fallback: string[]) =>
  z
    .string()
    .transform((value) =>
      value
        .split(",")
        .map((scope) => scope.trim())
        .filter(Boolean),
    )
    .default(fallback.join(","));

const configSchema = z.object({
  graphUrl: z.string().url().default(DEFAULT_GRAPH_URL),
  apiVersion: z
    .string()
    .regex(/^v\d+\.\d+$/, "must look like v22.0")
    .default(DEFAULT_API_VERSION),
  sessionId: z.string().min(1).default("default"),
  credentialsPath: z.string().min(1).default(join(homedir(), ".meta-ads-gateway", "credentials.json")),
  requestTimeoutMs: positiveInt(180_000),
  maxPages: positiveInt(25),
  tokenRefreshWindowDays: positiveInt(10),
  requiredScopes: scopeList(["ads_read"]),
  rateLimit: z.object({
    quota: positiveInt(200),
    windowSeconds: positiveInt(3600),
    maxWaitSeconds: z.coerce.number().int().nonnegative().default(60),
  }),
  cache: z.object({
    enabled: booleanFlag(true),
    ttlSeconds: positiveInt(300),
    maxEntries: positiveInt(500),
  }),
  retry: z.object({
    maxAttempts: positiveInt(3),
    baseDelayMs: positiveInt(1000),
    maxDelayMs: positiveInt(30_000),
  }),
});

export type GatewayConfig = z.infer<typeof configSchema>;

type Env = Record<string, string | undefined>;

function read(env: Env, name: string): string | undefined {
  const value = env[name]?.trim();
  return value ? value : undefined;
}

const ENV_NAMES: Record<string, string> = {
  graphUrl: "META_GRAPH_URL",
  apiVersion: "META_GRAPH_API_VERSION",
  sessionId: "META_SESSION_ID",
  credentialsPath: "TOKEN_STORAGE_PATH",
  requestTimeoutMs: "API_TIMEOUT_MS",
  maxPages: "MAX_PAGES",
  tokenRefreshWindowDays: "TOKEN_REFRESH_WINDOW_DAYS",
  requiredScopes: "META_REQUIRED_SCOPES",
  "rateLimit.quota": "MAX_REQUESTS_PER_HOUR",
  "rateLimit.windowSeconds": "RATE_LIMIT_WINDOW_SECONDS",
  "rateLimit.maxWaitSeconds": "RATE_LIMIT_MAX_WAIT_SECONDS",
  "cache.enabled": "ENABLE_CACHE",
  "cache.ttlSeconds": "CACHE_TTL",
  "cache.maxEntries": "CACHE_MAX_ENTRIES",
  "retry.maxAttempts": "API_RETRY_COUNT",
  "retry.baseDelayMs": "RETRY_BASE_DELAY_MS",
  "retry.maxDelayMs": "RETRY_MAX_DELAY_MS",
};

/**
 * Parse the gateway configuration from environment variables.
 * Throws with the offending variable names when a value is invalid.
 */
export function loadConfig(env: Env = process.env): GatewayConfig {
  const raw = {
    graphUrl: read(env, "META_GRAPH_URL"),
    apiVersion: read(env, "META_GRAPH_API_VERSION"),
    sessionId: read(env, "META_SESSION_ID"),
    credentialsPath: read(env, "TOKEN_STORAGE_PATH"),
    requestTimeoutMs: read(env, "API_TIMEOUT_MS"),
    maxPages: read(env, "MAX_PAGES"),
    tokenRefreshWindowDays: read(env, "TOKEN_REFRESH_WINDOW_DAYS"),
    requiredScopes: read(env, "META_REQUIRED_SCOPES"),
    rateLimit: {
      quota: read(env, "MAX_REQUESTS_PER_HOUR"),
      windowSeconds: read(env, "RATE_LIMIT_WINDOW_SECONDS"),
      maxWaitSeconds: read(env, "RATE_LIMIT_MAX_WAIT_SECONDS"),
    },
    cache: {
      enabled: read(env, "ENABLE_CACHE")?.toLowerCase(),
      ttlSeconds: read(env, "CACHE_TTL"),
      maxEntries: read(env, "CACHE_MAX_ENTRIES"),
    },
    retry: {
      maxAttempts: read(env, "API_RETRY_COUNT"),
      baseDelayMs: read(env, "RETRY_BASE_DELAY_MS"),
      maxDelayMs: read(env, "RETRY_MAX_DELAY_MS"),
    },
  };

  const parsed = configSchema.safeParse(raw);
  if (!parsed.success) {
    const problems = parsed.error.issues.map((issue) => {
      const key = issue.path.join(".");
      return `${ENV_NAMES[key] ?? key}: ${issue.message}`;
    });
    throw new Error(`Invalid configuration: ${problems.join("; ")}`);
  }
  return parsed.data;
}

/**
 * Versioned Graph API URL (e.g., "https://graph.facebook.com/v22.0").
 */
export function getApiUrl(config: Pick<GatewayConfig, "graphUrl" | "apiVersion">): string {
  return `${config.graphUrl.replace(/\/+$/, "")}/${config.apiVersion}`;
}
