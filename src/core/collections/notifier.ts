/**
 * src/core/collections/notifier.ts
 *
 * Publishes collection snapshots to the application. Subscribers receive the
 * latest state immediately and then every change of the store. Identity
 * changes reported by the detector invalidate the store and force one refresh.
 */

import { eventBus as defaultEventBus, type EventBus } from '@/core/events';
import { IdentityChangeDetector, type IdentityTransition } from '@/core/identity/identityChangeDetector';
import { logAppError, logAppInfo, logAppWarn } from '@/core/logging/appLogClient';
import { getCollectionCacheConfig } from '@/core/settings/appPreferences';
import { formatAge } from '@/utils/ageFormatter';
import { errorHandler, type ScopedErrorHandler } from '@/utils/errorHandler';

import { ANONYMOUS_FINGERPRINT, buildPermissionScope, describeFingerprint, isResolved } from './scope';
import { CollectionStore } from './store';
import type {
  CacheEntryState,
  CollectionMetrics,
  CollectionRecord,
  CollectionSnapshot,
  CollectionSource,
  CollectionsListener,
  CollectionsUpdate,
  IdentityProvider,
  RefreshOutcome,
  StoreChangeKind,
  UpdateReason,
} from './types';

const LOG_SOURCE = 'CollectionNotifier';

const REASON_BY_CHANGE: Record<StoreChangeKind, UpdateReason> = {
  loading: 'status',
  invalidated: 'status',
  published: 'published',
  failed: 'failed',
  revoked: 'revoked',
  cleared: 'cleared',
};

export interface CollectionNotifierOptions {
  store: CollectionStore;
  identity: IdentityProvider;
  detector?: IdentityChangeDetector;
  events?: EventBus;
  errors?: ScopedErrorHandler;
}

export interface CollectionDebugInfo extends CollectionMetrics {
  initialized: boolean;
  collectionsCount: number;
  lastUpdate: string | null;
  ageLabel: string;
  collections: Array<Pick<CollectionRecord, 'id' | 'displayName' | 'visibility' | 'itemCount'>>;
}

/** Only an empty cache with an error blocks a screen; anything else still has data to show. */
export const isBlockingFailure = (update: CollectionsUpdate): boolean =>
  update.status === 'error' && update.snapshot === null;

const toUpdate = (state: Readonly<CacheEntryState>, reason: UpdateReason): CollectionsUpdate => ({
  snapshot: state.snapshot,
  error: state.error,
  status: state.status,
  reason,
});

export class CollectionNotifier {
  private readonly store: CollectionStore;
  private readonly identity: IdentityProvider;
  private readonly detector: IdentityChangeDetector;
  private readonly events: EventBus;
  private readonly errors: ScopedErrorHandler;
  private readonly listeners = new Set<CollectionsListener>();
  private readonly teardown: Array<() => void> = [];
  private initialized = false;
  private connected = false;
  private disposed = false;
  private identityRefresh: Promise<RefreshOutcome> | null = null;
  private reevaluation: Promise<void> | null = null;

  constructor(options: CollectionNotifierOptions) {
    this.store = options.store;
    this.identity = options.identity;
    this.detector = options.detector ?? new IdentityChangeDetector(this.store.getFingerprint());
    this.events = options.events ?? defaultEventBus;
    this.errors = options.errors ?? errorHandler.createScoped('collections');

    this.teardown.push(
      this.store.subscribe((state, change) => this.handleStoreChange(state, change)),
      this.detector.onInvalidate((transition) => this.handleIdentityChange(transition)),
      this.events.on('settings:collections-ttl', (ttlSeconds) => this.store.setConfig({ ttlSeconds })),
      this.events.on('settings:collections-timeout', (timeoutMs) => this.store.setConfig({ timeoutMs }))
    );
  }

  /**
   * Connects to the identity provider and brings the cache up to date.
   * A fresh snapshot is published straight away; otherwise a fetch runs.
   */
  initialize(): Promise<RefreshOutcome> {
    if (this.disposed) {
      throw new Error('CollectionNotifier has been disposed');
    }
    if (!this.connected) {
      this.teardown.push(this.detector.connect(this.identity));
      this.connected = true;
    }
    this.initialized = true;

    const signal = this.identity.current();
    if (isResolved(signal)) {
      this.detector.observe(signal);
    }

    const state = this.store.getState();
    if (state.status === 'fresh' && state.snapshot) {
      this.publish(toUpdate(state, 'published'));
      return Promise.resolve({ kind: 'cached', snapshot: state.snapshot });
    }
    return this.refreshCollections(false);
  }

  get isInitialized(): boolean {
    return this.initialized;
  }

  /**
   * Registers the listener and replays the latest state to it synchronously,
   * even when the cache is still empty.
   */
  subscribe(listener: CollectionsListener): () => void {
    this.listeners.add(listener);
    this.deliver(listener, toUpdate(this.store.getState(), 'replay'));
    return () => {
      this.listeners.delete(listener);
    };
  }

  refreshCollections(force = false): Promise<RefreshOutcome> {
    return this.store.get(force);
  }

  refresh(force = false): Promise<RefreshOutcome> {
    return this.refreshCollections(force);
  }

  getCachedSnapshot(): CollectionSnapshot | null {
    return this.store.peek();
  }

  getCollectionById(id: string): CollectionRecord | null {
    return this.store.peek()?.records.find((record) => record.id === id) ?? null;
  }

  hasCollection(id: string): boolean {
    return this.getCollectionById(id) !== null;
  }

  get collectionsCount(): number {
    return this.store.peek()?.records.length ?? 0;
  }

  /**
   * Call after a collection was added, edited or deleted elsewhere. The list is
   * never patched locally; it is fetched again.
   */
  notifyCollectionsChanged(reason: string): Promise<RefreshOutcome> {
    logAppInfo(`Collections changed (${reason}); refreshing`, LOG_SOURCE);
    return this.refreshCollections(true);
  }

  metrics(): CollectionMetrics {
    const storeMetrics = this.store.getMetrics();
    const state = this.store.getState();
    return {
      state: storeMetrics.status,
      age: storeMetrics.ageMs,
      lastError: storeMetrics.lastError,
      fetchCount: storeMetrics.fetchCount,
      discardedCount: storeMetrics.discardedCount,
      lastFetchDurationMs: storeMetrics.lastFetchDurationMs,
      inFlight: state.inFlight !== null,
      epoch: state.epoch,
      scopeKey: buildPermissionScope(state.fingerprint).key,
    };
  }

  getDebugInfo(): CollectionDebugInfo {
    const metrics = this.metrics();
    const snapshot = this.store.peek();
    const records = snapshot?.records ?? [];
    return {
      ...metrics,
      initialized: this.initialized,
      collectionsCount: records.length,
      lastUpdate: snapshot ? new Date(snapshot.fetchedAt).toISOString() : null,
      ageLabel: snapshot ? formatAge(snapshot.fetchedAt, snapshot.fetchedAt + (metrics.age ?? 0)) : '-',
      collections: records.map(({ id, displayName, visibility, itemCount }) => ({
        id,
        displayName,
        visibility,
        itemCount,
      })),
    };
  }

  /** Resolves once the pending identity re-evaluation and refresh have finished. */
  async whenSettled(): Promise<void> {
    await this.reevaluation;
    await (this.identityRefresh ?? this.store.getPendingFetch());
  }

  /** Sign-out or explicit cache clear. */
  clear(): void {
    this.store.clear();
    this.events.emit('collections:cleared');
  }

  dispose(): void {
    if (this.disposed) {
      return;
    }
    this.disposed = true;
    this.teardown.splice(0).forEach((unsubscribe) => unsubscribe());
    this.detector.dispose();
    this.listeners.clear();
  }

  private handleStoreChange(state: Readonly<CacheEntryState>, change: StoreChangeKind): void {
    this.publish(toUpdate(state, REASON_BY_CHANGE[change]));

    if (change !== 'failed' || !state.error) {
      return;
    }
    this.errors.handle(state.error, {
      scopeKey: buildPermissionScope(state.fingerprint).key,
      status: state.status,
    });
    if (state.error.kind === 'permission') {
      this.requestReevaluation(state.error.message);
    }
  }

  private handleIdentityChange({ previous, next, changedFields }: IdentityTransition): void {
    logAppInfo(
      `Identity changed from ${describeFingerprint(previous)} to ${describeFingerprint(next)} (${changedFields.join(', ')})`,
      LOG_SOURCE
    );
    this.events.emit('identity:changed', { previous, next });

    if (this.store.setFingerprint(next) === 'unchanged') {
      return;
    }
    const refresh = this.store.get(true);
    this.identityRefresh = refresh;
    void refresh.then(() => {
      if (this.identityRefresh === refresh) {
        this.identityRefresh = null;
      }
    });
  }

  // Permission failures are answered with a fresh look at the identity, never a retry.
  private requestReevaluation(reason: string): void {
    this.events.emit('identity:reevaluate-requested', { reason });
    const reevaluate = this.identity.reevaluate?.bind(this.identity);
    if (!reevaluate) {
      logAppWarn('Permission denied and the identity provider cannot re-evaluate', LOG_SOURCE);
      return;
    }

    const pending = Promise.resolve()
      .then(() => reevaluate())
      .catch((error: unknown) => {
        logAppWarn(
          `Identity re-evaluation failed: ${error instanceof Error ? error.message : String(error)}`,
          LOG_SOURCE
        );
      })
      .finally(() => {
        if (this.reevaluation === pending) {
          this.reevaluation = null;
        }
      });
    this.reevaluation = pending;
  }

  private deliver(listener: CollectionsListener, update: CollectionsUpdate): void {
    try {
      listener(update);
    } catch (error) {
      logAppError(
        `Collections listener failed on ${update.reason}: ${error instanceof Error ? error.message : String(error)}`,
        LOG_SOURCE
      );
    }
  }

  private publish(update: CollectionsUpdate): void {
    this.listeners.forEach((listener) => this.deliver(listener, update));
    this.events.emit('collections:published', {
      status: update.status,
      count: update.snapshot?.records.length ?? 0,
      scopeKey: update.snapshot?.scopeKey ?? null,
    });
  }
}

export interface CreateCollectionNotifierOptions {
  source: CollectionSource;
  identity: IdentityProvider;
  events?: EventBus;
}

/**
 * Builds a store configured from the saved preferences and a notifier for it,
 * seeded with the provider's current identity.
 */
export const createCollectionNotifier = ({
  source,
  identity,
  events,
}: CreateCollectionNotifierOptions): CollectionNotifier => {
  const signal = identity.current();
  const store = new CollectionStore({
    source,
    events,
    config: getCollectionCacheConfig(),
    fingerprint: isResolved(signal) ? signal : ANONYMOUS_FINGERPRINT,
  });
  return new CollectionNotifier({ store, identity, events });
};
