/**
 * src/core/collections/config.ts
 *
 * Typed configuration for the collection cache.
 */

export interface CollectionCacheConfig {
  /** How long a snapshot stays fresh. */
  ttlSeconds: number;
  /** Fetches per cache entry. Only a single in-flight fetch is supported. */
  maxConcurrentFetches: 1;
  /** A fetch running longer than this fails with a TimeoutError. */
  timeoutMs: number;
}

export const DEFAULT_COLLECTION_CACHE_CONFIG: Readonly<CollectionCacheConfig> = Object.freeze({
  ttlSeconds: 180,
  maxConcurrentFetches: 1,
  timeoutMs: 10_000,
});

export type CollectionCacheConfigOverrides = Partial<
  Omit<CollectionCacheConfig, 'maxConcurrentFetches'>
>;

const normalizePositive = (value: number | undefined, fallback: number): number => {
  if (value == null || !Number.isFinite(value) || value <= 0) {
    return fallback;
  }
  return Math.max(1, Math.floor(value));
};

export const resolveCollectionCacheConfig = (
  overrides: CollectionCacheConfigOverrides = {}
): CollectionCacheConfig => ({
  ttlSeconds: normalizePositive(overrides.ttlSeconds, DEFAULT_COLLECTION_CACHE_CONFIG.ttlSeconds),
  maxConcurrentFetches: 1,
  timeoutMs: normalizePositive(overrides.timeoutMs, DEFAULT_COLLECTION_CACHE_CONFIG.timeoutMs),
});
