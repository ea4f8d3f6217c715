import { describe, it, expect } from "vitest";
import { SlidingWindowRateLimiter } from "../rate-limits.js";
import { GatewayError } from "../errors.js";

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function makeClock(start = 1_000_000) {
  let now = start;
  return {
    now: () => now,
    advance: (ms: number) => {
      now += ms;
    },
  };
}

function makeLimiter(clock: ReturnType<typeof makeClock>, overrides: { quota?: number; maxWaitMs?: number } = {}) {
  return new SlidingWindowRateLimiter({
    quota: overrides.quota ?? 200,
    windowMs: 3_600_000,
    maxWaitMs: overrides.maxWaitMs ?? 3_600_000,
    now: clock.now,
  });
}

// ---------------------------------------------------------------------------
// Tests
// ---------------------------------------------------------------------------

describe("SlidingWindowRateLimiter.admit", () => {
  it("admits up to the quota and reports remaining slots", () => {
    const limiter = makeLimiter(makeClock(), { quota: 3 });
    expect(limiter.admit("cred")).toEqual({ outcome: "admitted", remaining: 2 });
    expect(limiter.admit("cred")).toEqual({ outcome: "admitted", remaining: 1 });
    expect(limiter.admit("cred")).toEqual({ outcome: "admitted", remaining: 0 });
  });

  it("delays the next call until the oldest timestamp leaves the window", () => {
    const clock = makeClock();
    const limiter = makeLimiter(clock, { quota: 2 });
    limiter.admit("cred");
    clock.advance(1000);
    limiter.admit("cred");
    clock.advance(1000);
    expect(limiter.admit("cred")).toEqual({ outcome: "delay", delayMs: 3_598_000 });
  });

  it("rejects when the wait would exceed the bound", () => {
    const clock = makeClock();
    const limiter = makeLimiter(clock, { quota: 1, maxWaitMs: 60_000 });
    limiter.admit("cred");
    expect(limiter.admit("cred")).toEqual({ outcome: "rejected", retryAfterMs: 3_600_000 });
  });

  it("keeps separate windows per credential", () => {
    const limiter = makeLimiter(makeClock(), { quota: 1 });
    limiter.admit("a");
    expect(limiter.admit("b")).toEqual({ outcome: "admitted", remaining: 0 });
  });

  it("frees a slot exactly when the oldest entry is one window old", () => {
    const clock = makeClock();
    const limiter = makeLimiter(clock, { quota: 1 });
    limiter.admit("cred");
    clock.advance(3_600_000);
    expect(limiter.admit("cred").outcome).toBe("admitted");
  });

  it("never admits more than the quota inside any trailing window", () => {
    const clock = makeClock();
    const limiter = makeLimiter(clock, { quota: 5, maxWaitMs: 0 });
    const admittedAt: number[] = [];
    for (let i = 0; i < 200; i++) {
      if (limiter.admit("cred").outcome === "admitted") admittedAt.push(clock.now());
      clock.advance(97_000);
    }
    for (const start of admittedAt) {
      const inWindow = admittedAt.filter((t) => t >= start && t < start + 3_600_000);
      expect(inWindow.length).toBeLessThanOrEqual(5);
    }
  });
});

describe("SlidingWindowRateLimiter.acquire", () => {
  it("delays the 201st request until a slot frees, then admits it", async () => {
    const clock = makeClock();
    const limiter = makeLimiter(clock);
    const slept: number[] = [];
    const sleep = async (ms: number) => {
      slept.push(ms);
      clock.advance(ms);
    };

    for (let i = 0; i < 200; i++) {
      await limiter.acquire("cred", { sleep });
      clock.advance(10);
    }
    expect(slept).toEqual([]);

    await limiter.acquire("cred", { sleep });
    // oldest at t0, now t0 + 2000
    expect(slept).toEqual([3_598_000]);
    expect(limiter.usage("cred").used).toBe(200);
  });

  it("throws RateLimitExceeded beyond the max wait without sleeping", async () => {
    const clock = makeClock();
    const limiter = makeLimiter(clock, { quota: 1, maxWaitMs: 60_000 });
    const slept: number[] = [];
    await limiter.acquire("cred", { sleep: async (ms) => void slept.push(ms) });

    const error = await limiter.acquire("cred", { sleep: async (ms) => void slept.push(ms) }).catch((e: unknown) => e);
    expect(error).toBeInstanceOf(GatewayError);
    expect(error).toMatchObject({ kind: "RateLimitExceeded", details: { retry_after_ms: 3_600_000, waited_ms: 0 } });
    expect(slept).toEqual([]);
  });

  it("admits only one of two concurrent callers for the last slot", async () => {
    const clock = makeClock();
    const limiter = makeLimiter(clock, { quota: 1, maxWaitMs: 0 });
    const results = await Promise.allSettled([limiter.acquire("cred"), limiter.acquire("cred")]);
    expect(results.map((r) => r.status).sort()).toEqual(["fulfilled", "rejected"]);
  });

  it("reports Cancelled when the wait is abandoned", async () => {
    const clock = makeClock();
    const limiter = makeLimiter(clock, { quota: 1 });
    await limiter.acquire("cred");
    const controller = new AbortController();
    controller.abort();

    const error = await limiter
      .acquire("cred", { signal: controller.signal, sleep: async (_ms, signal) => signal?.throwIfAborted() })
      .catch((e: unknown) => e);
    expect(error).toMatchObject({ kind: "Cancelled" });
  });
});

describe("SlidingWindowRateLimiter.usage", () => {
  it("reports the time until the next free slot when full", () => {
    const clock = makeClock();
    const limiter = makeLimiter(clock, { quota: 1 });
    limiter.admit("cred");
    clock.advance(600_000);
    expect(limiter.usage("cred")).toEqual({ used: 1, quota: 1, window_seconds: 3600, next_slot_in_ms: 3_000_000 });
  });

  it("is empty after reset", () => {
    const limiter = makeLimiter(makeClock());
    limiter.admit("cred");
    limiter.reset();
    expect(limiter.usage("cred").used).toBe(0);
  });
});
