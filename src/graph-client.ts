import { z } from "zod";

import { type AttemptFailureKind, GatewayError, RemoteCallError } from "./errors.js";
import { logger, redactUrl } from "./utils.js";

// Graph API error codes (https://developers.facebook.com/docs/graph-api/guides/error-handling)
const AUTH_CODES = new Set([102, 190]);
const THROTTLE_CODES = new Set([
  4, 17, 32, 341, 613, 80000, 80001, 80002, 80003, 80004, 80005, 80006, 80008, 80009, 80014,
]);
const TRANSIENT_CODES = new Set([1, 2]);

const graphErrorSchema = z.object({
  error: z.object({
    message: z.string().optional(),
    type: z.string().optional(),
    code: z.number().optional(),
    error_subcode: z.number().optional(),
    is_transient: z.boolean().optional(),
    fbtrace_id: z.string().optional(),
  }),
});

export type GraphGetRequest = ({ path: string; params: Record<string, string> } | { url: string }) & {
  token: string;
  signal?: AbortSignal;
};

/** Form fields are sent in the body, never in the URL. */
export interface GraphPostRequest {
  path: string;
  params: Record<string, string>;
  token: string;
  signal?: AbortSignal;
}

/**
 * Outbound half of the gateway: one request against the Graph API. Failures
 * are thrown as RemoteCallError carrying their classification.
 */
export interface GraphTransport {
  get(request: GraphGetRequest): Promise<unknown>;
  post(request: GraphPostRequest): Promise<unknown>;
}

function classifyCode(code: number | undefined, status: number, isTransient: boolean): AttemptFailureKind {
  if (code !== undefined && AUTH_CODES.has(code)) return "auth";
  if ((code !== undefined && THROTTLE_CODES.has(code)) || status === 429) return "rate_limited";
  if (isTransient || (code !== undefined && TRANSIENT_CODES.has(code)) || status >= 500) return "transient";
  if (status === 401) return "auth";
  return "permanent";
}

function parseRetryAfter(value: string | null | undefined): number | undefined {
  if (!value) return undefined;
  const seconds = Number(value);
  return Number.isFinite(seconds) && seconds >= 0 ? seconds * 1000 : undefined;
}

/**
 * Map an HTTP status and Graph error body to a classified RemoteCallError.
 */
export function classifyGraphError(status: number, body: unknown, retryAfter?: string | null): RemoteCallError {
  const parsed = graphErrorSchema.safeParse(body);
  const graphError = parsed.success ? parsed.data.error : undefined;
  const kind = classifyCode(graphError?.code, status, graphError?.is_transient ?? false);
  const message = graphError?.message ?? `HTTP ${status}`;

  return new RemoteCallError(message, {
    kind,
    status,
    code: graphError?.code,
    subcode: graphError?.error_subcode,
    retryAfterMs: parseRetryAfter(retryAfter),
    traceId: graphError?.fbtrace_id,
  });
}

export interface GraphClientOptions {
  /** Versioned base URL, e.g. https://graph.facebook.com/v22.0 */
  apiUrl: string;
  timeoutMs: number;
  fetch?: typeof fetch;
}

export class GraphClient implements GraphTransport {
  private readonly fetchImpl: typeof fetch;

  constructor(private readonly options: GraphClientOptions) {
    this.fetchImpl = options.fetch ?? fetch;
  }

  buildUrl(path: string, params: Record<string, string>): string {
    const query = new URLSearchParams(params).toString();
    const base = `${this.options.apiUrl.replace(/\/+$/, "")}/${path.replace(/^\/+/, "")}`;
    return query ? `${base}?${query}` : base;
  }

  get(request: GraphGetRequest): Promise<unknown> {
    const url = "url" in request ? request.url : this.buildUrl(request.path, request.params);
    return this.send("GET", url, request);
  }

  post(request: GraphPostRequest): Promise<unknown> {
    const body = new URLSearchParams(request.params);
    return this.send("POST", this.buildUrl(request.path, {}), request, body);
  }

  private async send(
    method: "GET" | "POST",
    url: string,
    request: { token: string; signal?: AbortSignal },
    body?: URLSearchParams,
  ): Promise<unknown> {
    const controller = new AbortController();
    let timedOut = false;

    const onCallerAbort = () => controller.abort(request.signal?.reason);
    if (request.signal?.aborted) {
      throw new GatewayError("Cancelled", "Invocation was abandoned before the request was sent");
    }
    request.signal?.addEventListener("abort", onCallerAbort, { once: true });
    const timer = setTimeout(() => {
      timedOut = true;
      controller.abort();
    }, this.options.timeoutMs);

    logger.debug(`[graph] ${method}`, redactUrl(url));

    try {
      let response: Response;
      let text: string;
      try {
        response = await this.fetchImpl(url, {
          method,
          headers: { Authorization: `Bearer ${request.token}` },
          ...(body && { body }),
          signal: controller.signal,
        });
        text = await response.text();
      } catch (error) {
        if (timedOut) {
          throw new RemoteCallError(`Request timed out after ${this.options.timeoutMs}ms`, {
            kind: "transient",
            status: 0,
          });
        }
        if (request.signal?.aborted) {
          throw new GatewayError("Cancelled", "Invocation was abandoned during the request", undefined, {
            cause: error,
          });
        }
        throw new RemoteCallError(`Network error: ${error instanceof Error ? error.message : String(error)}`, {
          kind: "transient",
          status: 0,
        }, { cause: error });
      }

      logger.debug("[graph] response status:", response.status);

      let payload: unknown;
      try {
        payload = text ? JSON.parse(text) : null;
      } catch (error) {
        if (!response.ok) {
          throw classifyGraphError(response.status, null, response.headers.get("Retry-After"));
        }
        throw new GatewayError("MalformedResponse", "Graph API returned a body that is not JSON", {
          status: response.status,
        }, { cause: error });
      }

      if (!response.ok || graphErrorSchema.safeParse(payload).success) {
        throw classifyGraphError(response.status, payload, response.headers.get("Retry-After"));
      }
      return payload;
    } finally {
      clearTimeout(timer);
      request.signal?.removeEventListener("abort", onCallerAbort);
    }
  }
}
