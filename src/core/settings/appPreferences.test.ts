/**
 * src/core/settings/appPreferences.test.ts
 *
 * Test suite for appPreferences hydration and persistence helpers.
 */

import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

import { eventBus } from '@/core/events';
import { resolveCollectionCacheConfig } from '@/core/collections/config';
import {
  getCollectionCacheConfig,
  getCollectionsFetchTimeoutMs,
  getCollectionsTtlSeconds,
  hydrateAppPreferences,
  resetAppPreferencesCacheForTesting,
  setCollectionsFetchTimeoutMs,
  setCollectionsTtlSeconds,
} from './appPreferences';

describe('appPreferences', () => {
  beforeEach(() => {
    resetAppPreferencesCacheForTesting();
    localStorage.clear();
  });

  afterEach(() => {
    eventBus.clear();
  });

  it('falls back to defaults when nothing is stored', () => {
    expect(getCollectionsTtlSeconds()).toBe(180);
    expect(getCollectionsFetchTimeoutMs()).toBe(10_000);
    expect(getCollectionCacheConfig()).toEqual({
      ttlSeconds: 180,
      maxConcurrentFetches: 1,
      timeoutMs: 10_000,
    });
  });

  it('hydrates stored values and ignores invalid ones', () => {
    localStorage.setItem('collections:ttlSeconds', '60');
    localStorage.setItem('collections:fetchTimeoutMs', 'soon');

    hydrateAppPreferences({ force: true });

    expect(getCollectionsTtlSeconds()).toBe(60);
    expect(getCollectionsFetchTimeoutMs()).toBe(10_000);
  });

  it('persists updates and broadcasts changes', () => {
    const ttlListener = vi.fn();
    const timeoutListener = vi.fn();
    eventBus.on('settings:collections-ttl', ttlListener);
    eventBus.on('settings:collections-timeout', timeoutListener);

    setCollectionsTtlSeconds(90.7);
    setCollectionsFetchTimeoutMs(2_500);
    setCollectionsFetchTimeoutMs(2_500);

    expect(localStorage.getItem('collections:ttlSeconds')).toBe('90');
    expect(localStorage.getItem('collections:fetchTimeoutMs')).toBe('2500');
    expect(ttlListener).toHaveBeenCalledWith(90);
    expect(timeoutListener).toHaveBeenCalledTimes(1);
    expect(getCollectionCacheConfig()).toEqual({
      ttlSeconds: 90,
      maxConcurrentFetches: 1,
      timeoutMs: 2_500,
    });
  });

  it('normalizes non-positive values back to defaults', () => {
    setCollectionsTtlSeconds(-5);
    expect(getCollectionsTtlSeconds()).toBe(180);
  });
});

describe('resolveCollectionCacheConfig', () => {
  it('floors fractional values and rejects invalid ones', () => {
    expect(resolveCollectionCacheConfig({ ttlSeconds: 12.9, timeoutMs: Number.NaN })).toEqual({
      ttlSeconds: 12,
      maxConcurrentFetches: 1,
      timeoutMs: 10_000,
    });
  });
});
