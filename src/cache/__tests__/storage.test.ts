import { describe, it, expect } from "vitest";
import { RequestCache } from "../storage.js";

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function makeCache(overrides: { enabled?: boolean; maxEntries?: number } = {}) {
  let now = 0;
  const cache = new RequestCache<{ rows: number[] }>({
    enabled: overrides.enabled ?? true,
    ttlMs: 300_000,
    maxEntries: overrides.maxEntries ?? 10,
    now: () => now,
  });
  return {
    cache,
    at: (ms: number) => {
      now = ms;
    },
  };
}

// ---------------------------------------------------------------------------
// Tests
// ---------------------------------------------------------------------------

describe("RequestCache", () => {
  it("serves an entry verbatim at t0+299s and expires it at t0+301s", () => {
    const { cache, at } = makeCache();
    at(1_000);
    cache.store("key", { rows: [1, 2] });

    at(1_000 + 299_000);
    expect(cache.lookup("key")).toEqual({ hit: true, value: { rows: [1, 2] }, ageMs: 299_000 });

    at(1_000 + 301_000);
    expect(cache.lookup("key")).toEqual({ hit: false });
    expect(cache.size).toBe(0);
  });

  it("never serves an entry at exactly insertion time plus TTL", () => {
    const { cache, at } = makeCache();
    cache.store("key", { rows: [] });
    at(300_000);
    expect(cache.lookup("key").hit).toBe(false);
  });

  it("evicts the least recently used entry beyond capacity", () => {
    const { cache } = makeCache({ maxEntries: 2 });
    cache.store("a", { rows: [1] });
    cache.store("b", { rows: [2] });
    cache.lookup("a");
    cache.store("c", { rows: [3] });

    expect(cache.lookup("b").hit).toBe(false);
    expect(cache.lookup("a").hit).toBe(true);
    expect(cache.lookup("c").hit).toBe(true);
    expect(cache.stats().evictions).toBe(1);
  });

  it("freezes stored values", () => {
    const { cache } = makeCache();
    const value = { rows: [1] };
    cache.store("key", value);
    expect(Object.isFrozen(value)).toBe(true);
    expect(Object.isFrozen(value.rows)).toBe(true);
  });

  it("overwrites an entry on store", () => {
    const { cache, at } = makeCache();
    cache.store("key", { rows: [1] });
    at(200_000);
    cache.store("key", { rows: [2] });
    at(400_000);
    expect(cache.lookup("key")).toEqual({ hit: true, value: { rows: [2] }, ageMs: 200_000 });
  });

  it("misses every lookup and stores nothing when disabled", () => {
    const { cache } = makeCache({ enabled: false });
    cache.store("key", { rows: [1] });
    expect(cache.lookup("key")).toEqual({ hit: false });
    expect(cache.size).toBe(0);
  });

  it("counts hits and misses", () => {
    const { cache } = makeCache();
    cache.lookup("key");
    cache.store("key", { rows: [] });
    cache.lookup("key");
    expect(cache.stats()).toEqual({
      enabled: true,
      size: 1,
      max_entries: 10,
      ttl_seconds: 300,
      hits: 1,
      misses: 1,
      evictions: 0,
    });
  });

  it("drops everything on clear", () => {
    const { cache } = makeCache();
    cache.store("a", { rows: [] });
    cache.store("b", { rows: [] });
    cache.clear();
    expect(cache.size).toBe(0);
  });
});
