/**
 * In-process response cache keyed by request fingerprint
 */

import { deepFreeze, logger } from "../utils.js";
import type { CacheEntry, CacheLookup, CacheOptions, CacheStats } from "./types.js";

/**
 * TTL cache with a least-recently-used capacity bound.
 *
 * The Map's insertion order doubles as the recency list: a hit re-inserts the
 * entry at the end, eviction removes from the front. An entry is never served
 * at or after `insertedAt + ttlMs`. When disabled every lookup misses and
 * stores are ignored.
 */
export class RequestCache<T> {
  private readonly entries = new Map<string, CacheEntry<T>>();
  private readonly now: () => number;
  private hits = 0;
  private misses = 0;
  private evictions = 0;

  constructor(private readonly options: CacheOptions) {
    this.now = options.now ?? Date.now;
  }

  get size(): number {
    return this.entries.size;
  }

  lookup(key: string): CacheLookup<T> {
    if (!this.options.enabled) {
      this.misses++;
      return { hit: false };
    }

    const entry = this.entries.get(key);
    if (!entry) {
      this.misses++;
      return { hit: false };
    }

    const ageMs = this.now() - entry.insertedAt;
    if (ageMs >= entry.ttlMs) {
      this.entries.delete(key);
      this.misses++;
      return { hit: false };
    }

    this.entries.delete(key);
    this.entries.set(key, entry);
    this.hits++;
    return { hit: true, value: entry.value, ageMs };
  }

  store(key: string, value: T, ttlMs: number = this.options.ttlMs): void {
    if (!this.options.enabled) return;

    this.entries.delete(key);
    this.entries.set(key, { value: deepFreeze(value), insertedAt: this.now(), ttlMs });

    while (this.entries.size > this.options.maxEntries) {
      const oldest = this.entries.keys().next();
      if (oldest.done) break;
      this.entries.delete(oldest.value);
      this.evictions++;
      logger.debug("[cache] evicted least recently used entry");
    }
  }

  clear(): void {
    this.entries.clear();
  }

  stats(): CacheStats {
    return {
      enabled: this.options.enabled,
      size: this.entries.size,
      max_entries: this.options.maxEntries,
      ttl_seconds: Math.round(this.options.ttlMs / 1000),
      hits: this.hits,
      misses: this.misses,
      evictions: this.evictions,
    };
  }
}
