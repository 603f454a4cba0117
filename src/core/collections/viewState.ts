/**
 * src/core/collections/viewState.ts
 *
 * Per-screen copy of the collection list that survives navigation. A screen
 * that comes back renders its last snapshot immediately and then follows the
 * notifier again. The copy is dropped only when the cache is cleared or the
 * data is revoked.
 */

import type { CollectionFetchError } from './errors';
import type {
  CacheStatus,
  CollectionSnapshot,
  CollectionsListener,
  CollectionsUpdate,
} from './types';

export interface ViewState {
  snapshot: CollectionSnapshot | null;
  error: CollectionFetchError | null;
  status: CacheStatus;
  initialized: boolean;
}

export interface CollectionUpdates {
  subscribe(listener: CollectionsListener): () => void;
}

const INITIAL_VIEW_STATE: ViewState = Object.freeze({
  snapshot: null,
  error: null,
  status: 'empty',
  initialized: false,
});

const sameViewState = (a: ViewState, b: ViewState): boolean =>
  a.snapshot === b.snapshot &&
  a.error === b.error &&
  a.status === b.status &&
  a.initialized === b.initialized;

export class ViewStatePreserver {
  private state: ViewState = INITIAL_VIEW_STATE;
  private subscription: (() => void) | null = null;
  private listeners = new Set<() => void>();

  constructor(private readonly updates: CollectionUpdates) {}

  /** Starts following the notifier; a live subscription is reused. */
  enter(): void {
    if (this.subscription) {
      return;
    }
    this.subscription = this.updates.subscribe((update) => this.apply(update));
  }

  /** Stops following the notifier. The local copy stays. */
  leave(): void {
    const unsubscribe = this.subscription;
    this.subscription = null;
    unsubscribe?.();
  }

  get active(): boolean {
    return this.subscription !== null;
  }

  getState(): ViewState {
    return this.state;
  }

  subscribe(listener: () => void): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  private apply(update: CollectionsUpdate): void {
    const next = this.reduce(update);
    if (sameViewState(this.state, next)) {
      return;
    }
    this.state = next;
    this.listeners.forEach((listener) => listener());
  }

  private reduce(update: CollectionsUpdate): ViewState {
    if (update.reason === 'cleared' || update.reason === 'revoked') {
      return { snapshot: null, error: update.error, status: update.status, initialized: false };
    }

    // A replay is authoritative: the cache may have been cleared while the screen was away.
    const snapshot =
      update.reason === 'replay' ? update.snapshot : (update.snapshot ?? this.state.snapshot);
    return {
      snapshot,
      error: update.error,
      status: update.status,
      initialized:
        snapshot !== null ||
        update.status === 'error' ||
        (this.state.initialized && update.reason !== 'replay'),
    };
  }
}

export class ViewStateRegistry {
  private preservers = new Map<string, ViewStatePreserver>();

  constructor(private readonly updates: CollectionUpdates) {}

  preserverFor(screenId: string): ViewStatePreserver {
    let preserver = this.preservers.get(screenId);
    if (!preserver) {
      preserver = new ViewStatePreserver(this.updates);
      this.preservers.set(screenId, preserver);
    }
    return preserver;
  }

  has(screenId: string): boolean {
    return this.preservers.has(screenId);
  }

  release(screenId: string): void {
    this.preservers.get(screenId)?.leave();
    this.preservers.delete(screenId);
  }

  clear(): void {
    this.preservers.forEach((preserver) => preserver.leave());
    this.preservers.clear();
  }

  get size(): number {
    return this.preservers.size;
  }
}
