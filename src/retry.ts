import { type AttemptFailureKind, GatewayError, RemoteCallError } from "./errors.js";
import { logger, sleep as defaultSleep, type Sleep } from "./utils.js";

export interface RetryPolicy {
  /** Total attempts, including the first. */
  maxAttempts: number;
  baseDelayMs: number;
  maxDelayMs: number;
}

export type RetryDecision = { retry: false } | { retry: true; delayMs: number };

function isRetryable(kind: AttemptFailureKind, retryTransient: boolean): boolean {
  return kind === "rate_limited" || (retryTransient && kind === "transient");
}

/**
 * Exponential backoff with equal jitter: half the exponential step is fixed,
 * the other half is random. `attempt` is the 1-based number of the attempt
 * that just failed.
 */
export function backoffDelay(attempt: number, policy: RetryPolicy, random: () => number = Math.random): number {
  const exponential = Math.min(policy.maxDelayMs, policy.baseDelayMs * 2 ** (attempt - 1));
  const half = exponential / 2;
  return Math.round(half + random() * half);
}

/**
 * Pure retry policy: whether the attempt that just failed should be followed
 * by another one, and after how long. With `retryTransient: false` only
 * throttled attempts, which the remote side refused before doing any work,
 * are repeated.
 */
export function decideRetry(
  attempt: number,
  kind: AttemptFailureKind,
  policy: RetryPolicy,
  options: { random?: () => number; retryAfterMs?: number; retryTransient?: boolean } = {},
): RetryDecision {
  if (!isRetryable(kind, options.retryTransient ?? true) || attempt >= policy.maxAttempts) {
    return { retry: false };
  }
  const delayMs = backoffDelay(attempt, policy, options.random);
  if (kind === "rate_limited" && options.retryAfterMs !== undefined) {
    return { retry: true, delayMs: Math.min(policy.maxDelayMs, Math.max(delayMs, options.retryAfterMs)) };
  }
  return { retry: true, delayMs };
}

export interface ExecuteOptions {
  policy: RetryPolicy;
  signal?: AbortSignal;
  sleep?: Sleep;
  random?: () => number;
  /** Runs before CredentialInvalid is raised for a rejected credential. */
  onAuthFailure?: (error: RemoteCallError) => Promise<void>;
  label?: string;
  /** false for calls that must not be replayed after an unknown outcome */
  retryTransient?: boolean;
}

function exhausted(error: RemoteCallError, attempts: number): GatewayError {
  const details = { ...error.describe(), attempts };
  switch (error.kind) {
    case "rate_limited":
      return new GatewayError("RateLimitExceeded", `Remote API throttled the request: ${error.message}`, details, {
        cause: error,
      });
    case "transient":
      return new GatewayError(
        "Transient",
        `Remote API still failing after ${attempts} attempts: ${error.message}`,
        details,
        { cause: error },
      );
    case "permanent":
      return new GatewayError("PermanentFailure", error.message, details, { cause: error });
    case "auth":
      return new GatewayError("CredentialInvalid", `Remote API rejected the credential: ${error.message}`, details, {
        cause: error,
      });
  }
}

/**
 * Run `call` until it succeeds, fails permanently, or the attempt ceiling is
 * reached. Only RemoteCallError is classified; anything else is rethrown
 * untouched.
 */
export async function executeWithRetry<T>(
  call: (attempt: number) => Promise<T>,
  options: ExecuteOptions,
): Promise<T> {
  const sleep = options.sleep ?? defaultSleep;
  const label = options.label ?? "call";

  for (let attempt = 1; ; attempt++) {
    try {
      return await call(attempt);
    } catch (error) {
      if (!(error instanceof RemoteCallError)) throw error;

      if (error.kind === "auth") {
        logger.warn(`[retry] ${label}: credential rejected by remote API (code ${error.code ?? "n/a"})`);
        if (options.onAuthFailure) {
          await options.onAuthFailure(error);
        }
        throw exhausted(error, attempt);
      }

      const decision = decideRetry(attempt, error.kind, options.policy, {
        random: options.random,
        retryAfterMs: error.retryAfterMs,
        retryTransient: options.retryTransient,
      });
      if (!decision.retry) {
        if (error.kind !== "permanent") {
          logger.warn(`[retry] ${label}: giving up after ${attempt} attempts: ${error.message}`);
        }
        throw exhausted(error, attempt);
      }

      logger.debug(
        `[retry] ${label}: attempt ${attempt}/${options.policy.maxAttempts} failed (${error.kind}), retrying in ${decision.delayMs}ms`,
      );
      try {
        await sleep(decision.delayMs, options.signal);
      } catch (abortReason) {
        throw new GatewayError("Cancelled", "Invocation was abandoned during backoff", undefined, {
          cause: abortReason,
        });
      }
    }
  }
}
