#!/usr/bin/env node

import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";

import { loadConfig } from "./config.js";
import { bootstrapCredentialFromEnv, createSession } from "./session.js";
import { registerAuthTools } from "./tools/auth.js";
import { registerCoreTools } from "./tools/core.js";
import { logger } from "./utils.js";

// =============================================================================
// Type Exports
// =============================================================================
export type { Credential, ValidatedCredential } from "./auth/types.js";
export type { CredentialStore } from "./auth/storage.js";
export type { CredentialStatus } from "./auth/validator.js";
export type { EndpointDefinition, EndpointName, EndpointParams, EntityKind } from "./catalog.js";
export type { GatewayConfig } from "./config.js";
export type { ErrorKind, AttemptFailureKind } from "./errors.js";
export type { GatewayRequest, GatewayResult, GatewayFailure, InvocationMeta, Stage } from "./gateway.js";
export type { GraphTransport, GraphGetRequest, GraphPostRequest } from "./graph-client.js";
export type { NormalizeContext } from "./normalize/normalizer.js";
export type {
  AudienceEstimate,
  GeoLocation,
  InsightConsumer,
  InsightRow,
  Money,
  NormalizedAccount,
  NormalizedAd,
  NormalizedAdSet,
  NormalizedCampaign,
  NormalizedCreative,
  NormalizedEntity,
  TargetingOption,
  WriteResult,
} from "./normalize/types.js";
export type { RetryPolicy } from "./retry.js";
export type { SessionContext } from "./session.js";

// =============================================================================
// Gateway Components
// =============================================================================
export { FileCredentialStore, MemoryCredentialStore } from "./auth/storage.js";
export { ensureUsable, describeCredential, credentialIdOf } from "./auth/validator.js";
export { RequestCache } from "./cache/storage.js";
export { fingerprint } from "./cache/fingerprint.js";
export { getEndpoint, listEndpoints, normalizeAccountId } from "./catalog.js";
export { loadConfig, getApiUrl } from "./config.js";
export { GatewayError, RemoteCallError, isGatewayError } from "./errors.js";
export { ApiGateway } from "./gateway.js";
export { GraphClient, classifyGraphError } from "./graph-client.js";
export { normalize, normalizeMany } from "./normalize/normalizer.js";
export { formatInsightRow, formatMoney } from "./normalize/format.js";
export { SlidingWindowRateLimiter } from "./rate-limits.js";
export { executeWithRetry, decideRetry } from "./retry.js";
export { SingleFlight } from "./singleflight.js";
export { createSession, bootstrapCredentialFromEnv } from "./session.js";

// =============================================================================
// Tool Registration Exports
// =============================================================================
export { registerAuthTools } from "./tools/auth.js";
export { registerCoreTools } from "./tools/core.js";

// =============================================================================
// MCP Server Startup
// =============================================================================
async function main(): Promise<void> {
  const config = loadConfig();
  const session = createSession(config);

  if (await bootstrapCredentialFromEnv(session)) {
    logger.debug("[main] credential bootstrapped from environment");
  }

  const server = new McpServer({
    name: "meta-ads-gateway",
    version: "1.0.0",
  });

  // Register tool categories
  registerAuthTools(server, session);
  registerCoreTools(server, session);

  // Start server with stdio transport
  const transport = new StdioServerTransport();
  await server.connect(transport);

  logger.info("Meta Ads gateway MCP server running on stdio");
}

main().catch((error) => {
  logger.error("Failed to start server:", error);
  process.exit(1);
});
