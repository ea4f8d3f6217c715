import { FileCredentialStore, type CredentialStore } from "./auth/storage.js";
import type { Credential } from "./auth/types.js";
import { normalizeAccountId } from "./catalog.js";
import { type GatewayConfig, getApiUrl } from "./config.js";
import { ApiGateway } from "./gateway.js";
import { GraphClient, type GraphTransport } from "./graph-client.js";
import { logger, redactToken } from "./utils.js";

export interface SessionContext {
  config: GatewayConfig;
  sessionId: string;
  store: CredentialStore;
  gateway: ApiGateway;
}

export interface SessionOverrides {
  store?: CredentialStore;
  transport?: GraphTransport;
  now?: () => number;
}

/**
 * Wire the credential store, Graph client and gateway for one server process.
 */
export function createSession(config: GatewayConfig, overrides: SessionOverrides = {}): SessionContext {
  const store = overrides.store ?? new FileCredentialStore(config.credentialsPath);
  const transport =
    overrides.transport ?? new GraphClient({ apiUrl: getApiUrl(config), timeoutMs: config.requestTimeoutMs });

  logger.debug("[session] graph API:", getApiUrl(config));
  logger.debug("[session] session id:", config.sessionId);

  return {
    config,
    sessionId: config.sessionId,
    store,
    gateway: new ApiGateway({ config, store, transport, now: overrides.now }),
  };
}

function splitList(value: string | undefined): string[] {
  return (value ?? "")
    .split(",")
    .map((item) => item.trim())
    .filter(Boolean);
}

function readEnvToken(env: Record<string, string | undefined>): string | undefined {
  const token = env.META_ACCESS_TOKEN?.trim();
  // Unexpanded placeholders from MCP client configs ("${META_ACCESS_TOKEN}")
  if (!token || token.startsWith("${")) return undefined;
  return token;
}

/**
 * Store META_ACCESS_TOKEN as the session credential when none is stored yet.
 * Returns true when a credential was stored.
 */
export async function bootstrapCredentialFromEnv(
  session: SessionContext,
  env: Record<string, string | undefined> = process.env,
  now: number = Date.now(),
): Promise<boolean> {
  const token = readEnvToken(env);
  if (!token) return false;

  const existing = await session.store.get(session.sessionId);
  if (existing) {
    logger.debug("[session] credential already stored, ignoring META_ACCESS_TOKEN");
    return false;
  }

  const scopes = splitList(env.META_TOKEN_SCOPES);
  const credential: Credential = {
    token,
    expiresAt: null,
    scopes: scopes.length > 0 ? scopes : ["ads_read"],
    accountIds: splitList(env.META_ACCOUNT_IDS).map(normalizeAccountId),
    userId: null,
    createdAt: now,
  };
  await session.store.put(session.sessionId, credential);
  logger.info(`[session] stored credential ${redactToken(token)} from META_ACCESS_TOKEN`);
  return true;
}
