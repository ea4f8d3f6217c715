/**
 * Types for the in-process request cache
 */

export interface CacheOptions {
  enabled: boolean;
  ttlMs: number;
  maxEntries: number;
  now?: () => number;
}

/**
 * One cached response. Values are frozen on insert and never mutated;
 * a refresh replaces the whole entry.
 */
export interface CacheEntry<T> {
  value: T;
  insertedAt: number;
  ttlMs: number;
}

export type CacheLookup<T> = { hit: true; value: T; ageMs: number } | { hit: false };

export interface CacheStats {
  enabled: boolean;
  size: number;
  max_entries: number;
  ttl_seconds: number;
  hits: number;
  misses: number;
  evictions: number;
}

/**
 * Inputs that identify a request for caching and in-flight deduplication.
 */
export interface FingerprintInput {
  endpoint: string;
  objectId: string | null;
  params: object;
  credentialId: string;
}
