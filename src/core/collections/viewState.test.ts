/**
 * src/core/collections/viewState.test.ts
 *
 * Tests for per-screen view state that survives navigation.
 */

import { describe, expect, it, vi } from 'vitest';

import { NetworkError } from './errors';
import { ANONYMOUS_FINGERPRINT } from './scope';
import { MEMBER_RECORDS, PUBLIC_RECORDS } from './testing/controlledSource';
import type {
  CollectionRecord,
  CollectionSnapshot,
  CollectionsListener,
  CollectionsUpdate,
} from './types';
import { ViewStatePreserver, ViewStateRegistry } from './viewState';

const makeSnapshot = (records: readonly CollectionRecord[], epoch = 0): CollectionSnapshot =>
  Object.freeze({
    records,
    fingerprint: ANONYMOUS_FINGERPRINT,
    scopeKey: 'anonymous|public',
    fetchedAt: 1_000,
    epoch,
  });

const EMPTY: CollectionsUpdate = { snapshot: null, error: null, status: 'empty', reason: 'replay' };

const createUpdates = (initial: CollectionsUpdate = EMPTY) => {
  let latest = initial;
  const listeners = new Set<CollectionsListener>();
  return {
    subscribe: (listener: CollectionsListener) => {
      listeners.add(listener);
      listener({ ...latest, reason: 'replay' });
      return () => {
        listeners.delete(listener);
      };
    },
    push: (update: CollectionsUpdate) => {
      latest = update;
      listeners.forEach((listener) => listener(update));
    },
    get listenerCount() {
      return listeners.size;
    },
  };
};

describe('ViewStatePreserver', () => {
  it('renders the replayed snapshot as soon as the screen enters', () => {
    const snapshot = makeSnapshot(PUBLIC_RECORDS);
    const updates = createUpdates({ snapshot, error: null, status: 'fresh', reason: 'published' });
    const preserver = new ViewStatePreserver(updates);

    preserver.enter();

    expect(preserver.getState()).toEqual({
      snapshot,
      error: null,
      status: 'fresh',
      initialized: true,
    });
  });

  it('reuses the live subscription when entered twice', () => {
    const updates = createUpdates();
    const preserver = new ViewStatePreserver(updates);

    preserver.enter();
    preserver.enter();

    expect(updates.listenerCount).toBe(1);
    expect(preserver.active).toBe(true);
  });

  it('keeps the local copy after leaving', () => {
    const snapshot = makeSnapshot(PUBLIC_RECORDS);
    const updates = createUpdates();
    const preserver = new ViewStatePreserver(updates);
    preserver.enter();
    updates.push({ snapshot, error: null, status: 'fresh', reason: 'published' });

    preserver.leave();
    updates.push({ snapshot: makeSnapshot(MEMBER_RECORDS, 1), error: null, status: 'fresh', reason: 'published' });

    expect(updates.listenerCount).toBe(0);
    expect(preserver.getState().snapshot).toBe(snapshot);
  });

  it('replaces the copy with newer snapshots and notifies the screen', () => {
    const updates = createUpdates();
    const preserver = new ViewStatePreserver(updates);
    const listener = vi.fn();
    preserver.subscribe(listener);
    preserver.enter();

    const newer = makeSnapshot(MEMBER_RECORDS, 1);
    updates.push({ snapshot: newer, error: null, status: 'fresh', reason: 'published' });

    expect(listener).toHaveBeenCalledTimes(1);
    expect(preserver.getState().snapshot).toBe(newer);
  });

  it('keeps the snapshot while a failure is reported alongside it', () => {
    const snapshot = makeSnapshot(PUBLIC_RECORDS);
    const updates = createUpdates({ snapshot, error: null, status: 'fresh', reason: 'published' });
    const preserver = new ViewStatePreserver(updates);
    preserver.enter();

    const error = new NetworkError();
    updates.push({ snapshot, error, status: 'stale', reason: 'failed' });

    expect(preserver.getState()).toEqual({ snapshot, error, status: 'stale', initialized: true });
  });

  it('drops the copy when the cache is cleared or revoked', () => {
    const updates = createUpdates({
      snapshot: makeSnapshot(PUBLIC_RECORDS),
      error: null,
      status: 'fresh',
      reason: 'published',
    });
    const preserver = new ViewStatePreserver(updates);
    preserver.enter();

    updates.push({ snapshot: null, error: null, status: 'empty', reason: 'cleared' });
    expect(preserver.getState()).toEqual({
      snapshot: null,
      error: null,
      status: 'empty',
      initialized: false,
    });

    updates.push({ snapshot: makeSnapshot(PUBLIC_RECORDS, 2), error: null, status: 'fresh', reason: 'published' });
    updates.push({ snapshot: null, error: null, status: 'empty', reason: 'revoked' });
    expect(preserver.getState().snapshot).toBeNull();
  });

  it('forgets the copy when the cache was cleared while the screen was away', () => {
    const updates = createUpdates({
      snapshot: makeSnapshot(PUBLIC_RECORDS),
      error: null,
      status: 'fresh',
      reason: 'published',
    });
    const preserver = new ViewStatePreserver(updates);
    preserver.enter();
    preserver.leave();

    updates.push({ snapshot: null, error: null, status: 'empty', reason: 'cleared' });
    preserver.enter();

    expect(preserver.getState().snapshot).toBeNull();
  });

  it('counts a blocking failure as initialized', () => {
    const updates = createUpdates();
    const preserver = new ViewStatePreserver(updates);
    preserver.enter();
    expect(preserver.getState().initialized).toBe(false);

    updates.push({ snapshot: null, error: new NetworkError(), status: 'error', reason: 'failed' });

    expect(preserver.getState().initialized).toBe(true);
  });

  it('does not notify when nothing changed', () => {
    const snapshot = makeSnapshot(PUBLIC_RECORDS);
    const updates = createUpdates({ snapshot, error: null, status: 'fresh', reason: 'published' });
    const preserver = new ViewStatePreserver(updates);
    preserver.enter();
    const before = preserver.getState();
    const listener = vi.fn();
    preserver.subscribe(listener);

    preserver.leave();
    preserver.enter();

    expect(listener).not.toHaveBeenCalled();
    expect(preserver.getState()).toBe(before);
  });
});

describe('ViewStateRegistry', () => {
  it('keeps one preserver per screen until released', () => {
    const updates = createUpdates();
    const registry = new ViewStateRegistry(updates);

    const home = registry.preserverFor('home');
    expect(registry.preserverFor('home')).toBe(home);
    expect(registry.preserverFor('library')).not.toBe(home);
    expect(registry.size).toBe(2);

    home.enter();
    registry.release('home');

    expect(home.active).toBe(false);
    expect(registry.has('home')).toBe(false);
    expect(registry.preserverFor('home')).not.toBe(home);
  });

  it('detaches every screen on clear', () => {
    const updates = createUpdates();
    const registry = new ViewStateRegistry(updates);
    registry.preserverFor('home').enter();
    registry.preserverFor('library').enter();

    registry.clear();

    expect(updates.listenerCount).toBe(0);
    expect(registry.size).toBe(0);
  });
});
