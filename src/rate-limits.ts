import { GatewayError } from "./errors.js";
import { logger, sleep as defaultSleep, type Sleep } from "./utils.js";

export interface RateLimitOptions {
  quota: number;
  windowMs: number;
  /** Longest cumulative wait before a call is rejected instead of delayed. */
  maxWaitMs: number;
  now?: () => number;
}

export type Admission =
  | { outcome: "admitted"; remaining: number }
  | { outcome: "delay"; delayMs: number }
  | { outcome: "rejected"; retryAfterMs: number };

export interface RateLimitUsage {
  used: number;
  quota: number;
  window_seconds: number;
  next_slot_in_ms: number;
}

/**
 * Sliding-window request counter, one window per credential.
 *
 * `admit` purges, checks and records without awaiting anything, so two
 * concurrent callers can never both take the last slot.
 */
export class SlidingWindowRateLimiter {
  private readonly windows = new Map<string, number[]>();
  private readonly now: () => number;

  constructor(private readonly options: RateLimitOptions) {
    this.now = options.now ?? Date.now;
  }

  admit(key: string, maxWaitMs: number = this.options.maxWaitMs): Admission {
    const now = this.now();
    const active = this.purge(key, now);

    if (active.length < this.options.quota) {
      active.push(now);
      this.windows.set(key, active);
      return { outcome: "admitted", remaining: this.options.quota - active.length };
    }

    // Slots free up as the oldest timestamps leave the window.
    const oldest = active[active.length - this.options.quota];
    const waitMs = Math.max(1, oldest + this.options.windowMs - now);
    if (waitMs > maxWaitMs) {
      return { outcome: "rejected", retryAfterMs: waitMs };
    }
    return { outcome: "delay", delayMs: waitMs };
  }

  /**
   * Wait (bounded by maxWaitMs in total) until the key has a free slot.
   * Throws RateLimitExceeded when the wait would exceed the bound.
   */
  async acquire(key: string, options: { signal?: AbortSignal; sleep?: Sleep } = {}): Promise<void> {
    const sleep = options.sleep ?? defaultSleep;
    let waited = 0;

    for (;;) {
      const admission = this.admit(key, this.options.maxWaitMs - waited);
      switch (admission.outcome) {
        case "admitted":
          return;
        case "rejected":
          throw new GatewayError(
            "RateLimitExceeded",
            `Local request quota of ${this.options.quota} per ${Math.round(this.options.windowMs / 1000)}s exhausted`,
            { retry_after_ms: admission.retryAfterMs, waited_ms: waited },
          );
        case "delay":
          logger.debug(`[rate-limit] quota reached for ${key}, waiting ${admission.delayMs}ms`);
          try {
            await sleep(admission.delayMs, options.signal);
          } catch (abortReason) {
            throw new GatewayError("Cancelled", "Invocation was abandoned while waiting for quota", undefined, {
              cause: abortReason,
            });
          }
          waited += admission.delayMs;
          break;
      }
    }
  }

  usage(key: string): RateLimitUsage {
    const now = this.now();
    const active = this.purge(key, now);
    const full = active.length >= this.options.quota;
    return {
      used: active.length,
      quota: this.options.quota,
      window_seconds: Math.round(this.options.windowMs / 1000),
      next_slot_in_ms: full ? active[active.length - this.options.quota] + this.options.windowMs - now : 0,
    };
  }

  reset(key?: string): void {
    if (key === undefined) {
      this.windows.clear();
    } else {
      this.windows.delete(key);
    }
  }

  private purge(key: string, now: number): number[] {
    const windowStart = now - this.options.windowMs;
    const active = (this.windows.get(key) ?? []).filter((timestamp) => timestamp > windowStart);
    if (active.length === 0) {
      this.windows.delete(key);
    } else {
      this.windows.set(key, active);
    }
    return active;
  }
}
