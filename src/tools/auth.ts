import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";

import type { Credential } from "../auth/types.js";
import { describeCredential } from "../auth/validator.js";
import { normalizeAccountId } from "../catalog.js";
import { isGatewayError } from "../errors.js";
import type { SessionContext } from "../session.js";
import { errorResponse, jsonResponse, logger, redactToken } from "../utils.js";

const connectCredentialSchema = {
  token: z.string().min(1).describe("Access token returned by the Facebook login flow"),
  scopes: z
    .array(z.string().min(1))
    .min(1)
    .describe("Permissions granted with the token (e.g., ['ads_read', 'ads_management'])"),
  account_ids: z.array(z.string().min(1)).optional().describe("Ad account ids the token can access"),
  expires_at: z.string().datetime().optional().describe("Expiry as ISO 8601 timestamp"),
  expires_in: z.number().int().positive().optional().describe("Expiry in seconds from now"),
  user_id: z.string().optional().describe("Facebook user id that owns the token"),
};

const resetSessionSchema = {
  clear_stored: z.boolean().optional().describe("If true, also invalidates the stored credential"),
  clear_cache: z.boolean().optional().describe("If true, also clears the response cache"),
};

type ConnectCredentialParams = z.infer<z.ZodObject<typeof connectCredentialSchema>>;
type ResetSessionParams = z.infer<z.ZodObject<typeof resetSessionSchema>>;

export function buildCredential(params: ConnectCredentialParams, now: number): Credential {
  let expiresAt: number | null = null;
  if (params.expires_at) {
    expiresAt = Date.parse(params.expires_at);
  } else if (params.expires_in) {
    expiresAt = now + params.expires_in * 1000;
  }

  return {
    token: params.token,
    expiresAt,
    scopes: [...new Set(params.scopes)],
    accountIds: (params.account_ids ?? []).map(normalizeAccountId),
    userId: params.user_id ?? null,
    createdAt: now,
  };
}

export function registerAuthTools(server: McpServer, session: SessionContext): void {
  const { config, gateway, sessionId, store } = session;

  server.tool(
    "connect_credential",
    "Store the access token produced by the Facebook login flow for this session. Replaces any previously stored credential. Call this after the user completes browser authentication.",
    connectCredentialSchema,
    async (params: ConnectCredentialParams) => {
      logger.debug("[connect_credential] storing token", redactToken(params.token));

      if (params.expires_at && params.expires_in) {
        return errorResponse("Use either expires_at or expires_in, not both", { kind: "InvalidRequest" });
      }

      const now = Date.now();
      const credential = buildCredential(params, now);
      try {
        await store.put(sessionId, credential);
      } catch (error) {
        if (isGatewayError(error)) {
          return errorResponse(error.message, { kind: error.kind, ...error.details });
        }
        throw error;
      }

      return jsonResponse({
        success: true,
        message: "Credential stored",
        credential: describeCredential(credential, now, config.tokenRefreshWindowDays),
      });
    },
  );

  server.tool(
    "token_status",
    "Show whether a credential is stored for this session, when it expires, its scopes, local rate-limit usage and cache statistics.",
    {},
    async () => {
      try {
        const status = await gateway.credentialStatus(sessionId);
        logger.debug("[token_status] present:", status.present);
        return jsonResponse({
          success: true,
          session_id: sessionId,
          credential: status,
          ...gateway.stats(),
          ...(!status.present && {
            action: "Complete the Facebook login flow, then call connect_credential()",
          }),
        });
      } catch (error) {
        if (isGatewayError(error)) {
          return errorResponse(error.message, { kind: error.kind, ...error.details });
        }
        throw error;
      }
    },
  );

  server.tool(
    "reset_session",
    "Reset local rate-limit state and optionally the response cache and the stored credential. Use clear_stored=true to switch Facebook users, then connect_credential() again.",
    resetSessionSchema,
    async (params: ResetSessionParams) => {
      logger.debug("[reset_session] called with:", params);

      gateway.resetRateLimits();
      const clearedItems: string[] = ["rate limits"];

      if (params.clear_cache) {
        gateway.clearCache();
        clearedItems.push("cache");
      }

      if (params.clear_stored) {
        try {
          await store.invalidate(sessionId);
        } catch (error) {
          if (isGatewayError(error)) {
            return errorResponse(error.message, { kind: error.kind, cleared: clearedItems });
          }
          throw error;
        }
        clearedItems.push("credential");
      }

      return jsonResponse({
        success: true,
        message: `Cleared: ${clearedItems.join(", ")}`,
      });
    },
  );
}
