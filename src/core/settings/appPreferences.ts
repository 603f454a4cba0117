/**
 * src/core/settings/appPreferences.ts
 *
 * Centralized preference cache for collection cache settings.
 * Values are persisted to localStorage and broadcast on the event bus when they change.
 */

import { eventBus } from '@/core/events';
import {
  resolveCollectionCacheConfig,
  DEFAULT_COLLECTION_CACHE_CONFIG,
  type CollectionCacheConfig,
} from '@/core/collections/config';

interface AppPreferences {
  collectionsTtlSeconds: number;
  collectionsFetchTimeoutMs: number;
}

const DEFAULT_PREFERENCES: AppPreferences = {
  collectionsTtlSeconds: DEFAULT_COLLECTION_CACHE_CONFIG.ttlSeconds,
  collectionsFetchTimeoutMs: DEFAULT_COLLECTION_CACHE_CONFIG.timeoutMs,
};

const STORAGE_KEYS = {
  ttlSeconds: 'collections:ttlSeconds',
  fetchTimeoutMs: 'collections:fetchTimeoutMs',
};

let preferenceCache: AppPreferences = { ...DEFAULT_PREFERENCES };
let hydrated = false;

const getStorage = (): Storage | null => {
  if (typeof window === 'undefined' || !window.localStorage) {
    return null;
  }
  return window.localStorage;
};

const readStoredNumber = (key: string): number | undefined => {
  const raw = getStorage()?.getItem(key);
  if (raw == null || raw.trim() === '') {
    return undefined;
  }
  const parsed = Number(raw);
  return Number.isFinite(parsed) ? parsed : undefined;
};

const writeStoredNumber = (key: string, value: number): void => {
  const storage = getStorage();
  if (!storage) {
    return;
  }
  try {
    storage.setItem(key, String(value));
  } catch (error) {
    console.error(`Failed to persist preference ${key}:`, error);
  }
};

const normalizeTtlSeconds = (value?: number): number =>
  resolveCollectionCacheConfig({ ttlSeconds: value }).ttlSeconds;

const normalizeTimeoutMs = (value?: number): number =>
  resolveCollectionCacheConfig({ timeoutMs: value }).timeoutMs;

const emitPreferenceChanges = (previous: AppPreferences, next: AppPreferences): void => {
  if (previous.collectionsTtlSeconds !== next.collectionsTtlSeconds) {
    eventBus.emit('settings:collections-ttl', next.collectionsTtlSeconds);
  }
  if (previous.collectionsFetchTimeoutMs !== next.collectionsFetchTimeoutMs) {
    eventBus.emit('settings:collections-timeout', next.collectionsFetchTimeoutMs);
  }
};

const updatePreferenceCache = (updates: Partial<AppPreferences>): void => {
  const next = { ...preferenceCache, ...updates };
  const previous = preferenceCache;
  preferenceCache = next;
  emitPreferenceChanges(previous, next);
};

export const hydrateAppPreferences = (options?: { force?: boolean }): AppPreferences => {
  if (hydrated && !options?.force) {
    return { ...preferenceCache };
  }

  hydrated = true;
  updatePreferenceCache({
    collectionsTtlSeconds: normalizeTtlSeconds(readStoredNumber(STORAGE_KEYS.ttlSeconds)),
    collectionsFetchTimeoutMs: normalizeTimeoutMs(readStoredNumber(STORAGE_KEYS.fetchTimeoutMs)),
  });

  return { ...preferenceCache };
};

export const getCollectionsTtlSeconds = (): number => {
  if (!hydrated) {
    hydrateAppPreferences();
  }
  return preferenceCache.collectionsTtlSeconds;
};

export const getCollectionsFetchTimeoutMs = (): number => {
  if (!hydrated) {
    hydrateAppPreferences();
  }
  return preferenceCache.collectionsFetchTimeoutMs;
};

export const setCollectionsTtlSeconds = (ttlSeconds: number): void => {
  const normalized = normalizeTtlSeconds(ttlSeconds);
  hydrated = true;
  updatePreferenceCache({ collectionsTtlSeconds: normalized });
  writeStoredNumber(STORAGE_KEYS.ttlSeconds, normalized);
};

export const setCollectionsFetchTimeoutMs = (timeoutMs: number): void => {
  const normalized = normalizeTimeoutMs(timeoutMs);
  hydrated = true;
  updatePreferenceCache({ collectionsFetchTimeoutMs: normalized });
  writeStoredNumber(STORAGE_KEYS.fetchTimeoutMs, normalized);
};

// getCollectionCacheConfig composes the current preferences into the store configuration.
export const getCollectionCacheConfig = (): CollectionCacheConfig =>
  resolveCollectionCacheConfig({
    ttlSeconds: getCollectionsTtlSeconds(),
    timeoutMs: getCollectionsFetchTimeoutMs(),
  });

// Test helper to reset cached values between test runs.
export const resetAppPreferencesCacheForTesting = (): void => {
  preferenceCache = { ...DEFAULT_PREFERENCES };
  hydrated = false;
};
