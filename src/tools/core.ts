import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";

import { type EndpointDefinition, listEndpoints } from "../catalog.js";
import type { ErrorKind } from "../errors.js";
import type { GatewayResult } from "../gateway.js";
import { formatInsightRow } from "../normalize/format.js";
import type { InsightRow, NormalizedEntity } from "../normalize/types.js";
import type { SessionContext } from "../session.js";
import { errorResponse, jsonResponse, logger } from "../utils.js";

const ACTIONS: Partial<Record<ErrorKind, string>> = {
  CredentialExpired: "Complete the Facebook login flow, then call connect_credential()",
  CredentialInvalid: "The token was rejected by Facebook. Re-authenticate, then call connect_credential()",
  InsufficientScope: "Re-authenticate granting the missing permissions, then call connect_credential()",
  RateLimitExceeded: "Wait before retrying; token_status() shows current usage",
  InvalidRequest: "Check the id format and parameter values",
};

/** Name of the id argument a tool takes, or null for endpoints without one. */
export function idArgument(def: EndpointDefinition): string | null {
  if (def.idName && def.id !== "none") return def.idName;
  switch (def.id) {
    case "none":
      return null;
    case "account":
      return "account_id";
    case "object":
      return `${def.entity}_id`;
    case "account_or_object":
      return "object_id";
  }
}

function idDescription(def: EndpointDefinition): string {
  switch (def.id) {
    case "account":
      return "Ad account id (act_123 or 123)";
    case "object":
      return `${idArgument(def)?.replace(/_id$/, "") ?? def.entity} id`;
    default:
      return "Ad account id (act_...) or the id of a campaign, ad set or ad";
  }
}

function toolShape(def: EndpointDefinition): z.ZodRawShape {
  const idKey = idArgument(def);
  if (!idKey) return def.shape;
  return { [idKey]: z.string().min(1).describe(idDescription(def)), ...def.shape };
}

function isInsightRow(entity: NormalizedEntity): entity is InsightRow {
  return entity.kind === "insight";
}

/**
 * Tool response for a gateway result. Insight rows also get a display rendering.
 */
export function toolResult(result: GatewayResult): { content: [{ type: "text"; text: string }] } {
  if (!result.success) {
    const { kind, message, stage, details } = result.error;
    return errorResponse(message, {
      kind,
      stage,
      ...(details && { details }),
      ...(ACTIONS[kind] && { action: ACTIONS[kind] }),
    });
  }

  const { data, meta } = result;
  const rows = Array.isArray(data) ? data.filter(isInsightRow) : [];
  return jsonResponse({
    success: true,
    ...meta,
    ...(Array.isArray(data) && { count: data.length }),
    data,
    ...(rows.length > 0 && { display: rows.map(formatInsightRow) }),
  });
}

export function registerCoreTools(server: McpServer, session: SessionContext): void {
  const { gateway, sessionId } = session;

  for (const def of listEndpoints()) {
    const idKey = idArgument(def);

    server.tool(
      def.tool,
      def.description,
      toolShape(def),
      async (args: Record<string, unknown>, extra: { signal: AbortSignal }) => {
        const rawId = idKey ? args[idKey] : undefined;
        const params: Record<string, unknown> = {};
        for (const [key, value] of Object.entries(args)) {
          if (key !== idKey && value !== undefined) params[key] = value;
        }
        logger.debug(`[${def.tool}] called with:`, { id: rawId, params });

        const result = await gateway.invoke(
          sessionId,
          { endpoint: def.name, objectId: typeof rawId === "string" ? rawId : undefined, params },
          { signal: extra.signal },
        );
        return toolResult(result);
      },
    );
  }
}
