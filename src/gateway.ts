import type { CredentialStore } from "./auth/storage.js";
import type { ValidatedCredential } from "./auth/types.js";
import { credentialIdOf, describeCredential, ensureUsable, type CredentialStatus } from "./auth/validator.js";
import { fingerprint } from "./cache/fingerprint.js";
import { RequestCache } from "./cache/storage.js";
import type { CacheStats } from "./cache/types.js";
import {
  buildGraphParams,
  type EndpointDefinition,
  type EndpointParams,
  getEndpoint,
  graphPath,
  resolveObjectId,
  validateParams,
} from "./catalog.js";
import { type GatewayConfig, getApiUrl } from "./config.js";
import { type ErrorKind, GatewayError, toGatewayError } from "./errors.js";
import type { GraphGetRequest, GraphTransport } from "./graph-client.js";
import { type NormalizeContext, normalize, normalizeMany, parsePage } from "./normalize/normalizer.js";
import type { NormalizedEntity } from "./normalize/types.js";
import { type RateLimitUsage, SlidingWindowRateLimiter } from "./rate-limits.js";
import { executeWithRetry } from "./retry.js";
import { SingleFlight } from "./singleflight.js";
import { deepFreeze, logger, redactUrl, sleep as defaultSleep, type Sleep } from "./utils.js";

// =============================================================================
// Types
// =============================================================================

/** Invocation stages, in order. A failure reports the stage it happened in. */
export type Stage = "validating" | "cache_check" | "rate_limiting" | "executing" | "normalizing";

export interface GatewayRequest {
  endpoint: string;
  /** Account (act_...) or object id, for endpoints addressed by one */
  objectId?: string;
  params?: Record<string, unknown>;
  /** Scopes required on top of the configured and endpoint defaults */
  requiredScopes?: readonly string[];
}

export type GatewayData = NormalizedEntity | NormalizedEntity[];

export interface InvocationMeta {
  endpoint: string;
  object_id: string | null;
  cached: boolean;
  cache_age_ms?: number;
  remote_calls: number;
  pages: number;
  truncated: boolean;
}

export interface GatewayFailure {
  kind: ErrorKind;
  message: string;
  stage: Stage;
  details?: Record<string, unknown>;
}

export type GatewayResult =
  | { success: true; data: GatewayData; meta: InvocationMeta }
  | { success: false; error: GatewayFailure };

export interface GatewayOptions {
  config: GatewayConfig;
  store: CredentialStore;
  transport: GraphTransport;
  now?: () => number;
  sleep?: Sleep;
  random?: () => number;
}

export interface GatewayStats {
  cache: CacheStats;
  in_flight: number;
}

type GraphTarget = { path: string; params: Record<string, string> } | { url: string };

/** Normalized response as cached and shared between concurrent callers. */
interface FetchedResponse {
  data: GatewayData;
  pages: number;
  truncated: boolean;
}

interface FlightResult {
  response: FetchedResponse;
  remoteCalls: number;
}

/** Carries the stage of a failure out of the shared flight. */
class StageFailure extends Error {
  constructor(
    readonly stage: Stage,
    readonly error: GatewayError,
  ) {
    super(error.message, { cause: error });
    this.name = "StageFailure";
  }
}

function failure(stage: Stage, error: GatewayError): GatewayResult {
  return {
    success: false,
    error: {
      kind: error.kind,
      message: error.message,
      stage,
      ...(error.details && { details: error.details }),
    },
  };
}

// =============================================================================
// Gateway
// =============================================================================

/**
 * Single choke point for every outbound Graph API call.
 *
 * Per invocation: validating -> cache_check -> (rate_limiting -> executing)
 * -> normalizing. A cache hit skips the remote stages. Concurrent invocations
 * with the same fingerprint share one remote execution. Writes skip the cache
 * and coalescing, and a successful write empties the cache.
 */
export class ApiGateway {
  private readonly config: GatewayConfig;
  private readonly store: CredentialStore;
  private readonly transport: GraphTransport;
  private readonly now: () => number;
  private readonly sleep: Sleep;
  private readonly random: () => number;
  private readonly limiter: SlidingWindowRateLimiter;
  private readonly cache: RequestCache<FetchedResponse>;
  private readonly flights = new SingleFlight<FlightResult>();
  private readonly apiOrigin: string;

  constructor(options: GatewayOptions) {
    this.config = options.config;
    this.store = options.store;
    this.transport = options.transport;
    this.now = options.now ?? Date.now;
    this.sleep = options.sleep ?? defaultSleep;
    this.random = options.random ?? Math.random;
    this.apiOrigin = new URL(getApiUrl(this.config)).origin;

    this.limiter = new SlidingWindowRateLimiter({
      quota: this.config.rateLimit.quota,
      windowMs: this.config.rateLimit.windowSeconds * 1000,
      maxWaitMs: this.config.rateLimit.maxWaitSeconds * 1000,
      now: this.now,
    });
    this.cache = new RequestCache<FetchedResponse>({
      enabled: this.config.cache.enabled,
      ttlMs: this.config.cache.ttlSeconds * 1000,
      maxEntries: this.config.cache.maxEntries,
      now: this.now,
    });
  }

  /**
   * Run one request for a session. Never throws: every outcome, including
   * cancellation, is reported in the result.
   */
  async invoke(sessionId: string, request: GatewayRequest, options: { signal?: AbortSignal } = {}): Promise<GatewayResult> {
    let stage: Stage = "validating";

    try {
      if (options.signal?.aborted) {
        throw new GatewayError("Cancelled", "Invocation was abandoned by the caller");
      }

      const def = getEndpoint(request.endpoint);
      if (!def) {
        throw new GatewayError("InvalidRequest", `Unknown endpoint: ${request.endpoint}`);
      }
      const objectId = resolveObjectId(def, request.objectId);
      const params = validateParams(def, request.params ?? {});
      const requiredScopes = [
        ...this.config.requiredScopes,
        ...def.requiredScopes,
        ...(request.requiredScopes ?? []),
      ];
      const credential = ensureUsable(await this.store.get(sessionId), requiredScopes, this.now());

      if (def.method === "POST") {
        stage = "executing";
        const written = await this.write(sessionId, def, objectId, params, credential, options.signal);
        return {
          success: true,
          data: written.response.data,
          meta: {
            endpoint: def.name,
            object_id: objectId,
            cached: false,
            remote_calls: written.remoteCalls,
            pages: 1,
            truncated: false,
          },
        };
      }

      stage = "cache_check";
      const key = fingerprint(
        { endpoint: def.name, objectId, params, credentialId: credential.credentialId },
        def.unorderedParams,
      );
      const cached = this.cache.lookup(key);
      if (cached.hit) {
        logger.debug(`[gateway] ${def.name}: cache hit (age ${cached.ageMs}ms)`);
        return {
          success: true,
          data: cached.value.data,
          meta: {
            endpoint: def.name,
            object_id: objectId,
            cached: true,
            cache_age_ms: cached.ageMs,
            remote_calls: 0,
            pages: cached.value.pages,
            truncated: cached.value.truncated,
          },
        };
      }

      stage = "executing";
      const result = await this.flights.run(
        key,
        async (signal) => {
          const fetched = await this.fetch(sessionId, def, objectId, params, credential, signal);
          // Every waiter of the flight receives this same object.
          deepFreeze(fetched.response);
          this.cache.store(key, fetched.response);
          return fetched;
        },
        options.signal,
      );

      return {
        success: true,
        data: result.response.data,
        meta: {
          endpoint: def.name,
          object_id: objectId,
          cached: false,
          remote_calls: result.remoteCalls,
          pages: result.response.pages,
          truncated: result.response.truncated,
        },
      };
    } catch (error) {
      if (error instanceof StageFailure) {
        logger.debug(`[gateway] ${request.endpoint} failed at ${error.stage}: ${error.error.kind}`);
        return failure(error.stage, error.error);
      }
      const gatewayError = toGatewayError(error);
      logger.debug(`[gateway] ${request.endpoint} failed at ${stage}: ${gatewayError.kind}`);
      return failure(stage, gatewayError);
    }
  }

  /**
   * One rate-limited, retried remote call. `onStage` follows the call between
   * waiting for a local slot and executing.
   */
  private call(
    sessionId: string,
    def: EndpointDefinition,
    credential: ValidatedCredential,
    send: () => Promise<unknown>,
    hooks: { signal?: AbortSignal; onStage: (stage: Stage) => void; onAttempt: () => void },
  ): Promise<unknown> {
    return executeWithRetry(
      async () => {
        hooks.onStage("rate_limiting");
        await this.limiter.acquire(credential.credentialId, { signal: hooks.signal, sleep: this.sleep });
        hooks.onStage("executing");
        hooks.onAttempt();
        return send();
      },
      {
        policy: this.config.retry,
        signal: hooks.signal,
        sleep: this.sleep,
        random: this.random,
        label: def.name,
        retryTransient: def.method === "GET",
        onAuthFailure: () => this.invalidateRejected(sessionId, credential.token),
      },
    );
  }

  /**
   * Remote part of a read: every page is rate limited and retried on its
   * own, then the collected payload is normalized.
   */
  private async fetch(
    sessionId: string,
    def: EndpointDefinition,
    objectId: string | null,
    params: EndpointParams,
    credential: ValidatedCredential,
    signal: AbortSignal,
  ): Promise<FlightResult> {
    let stage: Stage = "rate_limiting";
    let remoteCalls = 0;
    const context: NormalizeContext = { objectId };

    const get = (target: GraphTarget) =>
      this.call(
        sessionId,
        def,
        credential,
        () => {
          const request: GraphGetRequest = { ...target, token: credential.token, signal };
          return this.transport.get(request);
        },
        {
          signal,
          onStage: (next) => {
            stage = next;
          },
          onAttempt: () => {
            remoteCalls++;
          },
        },
      );

    try {
      const first = { path: graphPath(def, objectId), params: buildGraphParams(def, params, objectId) };

      if (!def.collection) {
        const body = await get(first);
        stage = "normalizing";
        return { response: { data: normalize(body, def.entity, context), pages: 1, truncated: false }, remoteCalls };
      }

      const items: unknown[] = [];
      let target: GraphTarget = first;
      let pages = 0;
      let truncated = false;

      for (;;) {
        const body = await get(target);
        pages++;
        stage = "normalizing";
        const page = parsePage(body);
        items.push(...page.items);
        if (!page.next || def.firstPageOnly) break;
        if (pages >= this.config.maxPages) {
          logger.warn(`[gateway] ${def.name}: stopped after ${pages} pages, result truncated`);
          truncated = true;
          break;
        }
        target = { url: this.checkPagingLink(def, page.next) };
      }

      stage = "normalizing";
      return { response: { data: normalizeMany(items, def.entity, context), pages, truncated }, remoteCalls };
    } catch (error) {
      throw new StageFailure(stage, toGatewayError(error));
    }
  }

  /** The credential is only ever sent to the configured Graph API origin. */
  private checkPagingLink(def: EndpointDefinition, next: string): string {
    if (!URL.canParse(next) || new URL(next).origin !== this.apiOrigin) {
      throw new GatewayError("MalformedResponse", `Paging link of ${def.name} points outside the Graph API`, {
        next: redactUrl(next),
      });
    }
    return next;
  }

  /**
   * Remote part of a write. Neither cached nor coalesced; cached reads may
   * be stale afterwards, so the cache is emptied.
   */
  private async write(
    sessionId: string,
    def: EndpointDefinition,
    objectId: string | null,
    params: EndpointParams,
    credential: ValidatedCredential,
    signal: AbortSignal | undefined,
  ): Promise<FlightResult> {
    let stage: Stage = "rate_limiting";
    let remoteCalls = 0;

    try {
      const body = await this.call(
        sessionId,
        def,
        credential,
        () =>
          this.transport.post({
            path: graphPath(def, objectId),
            params: buildGraphParams(def, params, objectId),
            token: credential.token,
            signal,
          }),
        {
          signal,
          onStage: (next) => {
            stage = next;
          },
          onAttempt: () => {
            remoteCalls++;
          },
        },
      );

      stage = "normalizing";
      const data = normalize(body, def.entity, { objectId });
      this.cache.clear();
      logger.info(`[gateway] ${def.name} applied to ${objectId ?? "(none)"}; response cache cleared`);
      return { response: deepFreeze({ data, pages: 1, truncated: false }), remoteCalls };
    } catch (error) {
      throw new StageFailure(stage, toGatewayError(error));
    }
  }

  /**
   * Drop the stored credential after the remote side rejected it, unless it
   * has been replaced in the meantime.
   */
  private async invalidateRejected(sessionId: string, token: string): Promise<void> {
    const stored = await this.store.get(sessionId);
    if (stored && stored.token === token) {
      await this.store.invalidate(sessionId);
      logger.warn(`[gateway] credential for session ${sessionId} was rejected and has been invalidated`);
    }
  }

  async credentialStatus(sessionId: string): Promise<CredentialStatus & { rate_limit?: RateLimitUsage }> {
    const credential = await this.store.get(sessionId);
    const status = describeCredential(credential, this.now(), this.config.tokenRefreshWindowDays);
    if (!credential) return status;
    return { ...status, rate_limit: this.limiter.usage(credentialIdOf(credential.token)) };
  }

  stats(): GatewayStats {
    return { cache: this.cache.stats(), in_flight: this.flights.inFlight };
  }

  clearCache(): void {
    this.cache.clear();
    logger.info("[gateway] response cache cleared");
  }

  resetRateLimits(): void {
    this.limiter.reset();
    logger.info("[gateway] rate-limit windows reset");
  }
}
