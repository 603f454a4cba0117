/**
 * src/core/collections/store.ts
 *
 * TTL-bounded cache of the latest collection snapshot.
 * Every fetch is tagged with the epoch that was current when it started and its
 * result is dropped if the epoch has moved on by the time it completes.
 * Callers asking while a fetch for the current epoch is running join that fetch.
 */

import { eventBus as defaultEventBus, type EventBus } from '@/core/events';
import { logAppDebug, logAppError, logAppInfo, logAppWarn } from '@/core/logging/appLogClient';

import {
  resolveCollectionCacheConfig,
  type CollectionCacheConfig,
  type CollectionCacheConfigOverrides,
} from './config';
import {
  NetworkError,
  TimeoutError,
  toCollectionFetchError,
  type CollectionFetchError,
} from './errors';
import {
  ANONYMOUS_FINGERPRINT,
  buildPermissionScope,
  describeFingerprint,
  fingerprintsEqual,
  isScopeContained,
} from './scope';
import type {
  CacheEntryState,
  CollectionRecord,
  CollectionSnapshot,
  CollectionSource,
  FingerprintChange,
  IdentityFingerprint,
  PermissionScope,
  RefreshOutcome,
  StoreChangeKind,
  StoreListener,
  StoreMetrics,
} from './types';

const LOG_SOURCE = 'CollectionStore';

export interface CollectionStoreOptions {
  source: CollectionSource;
  config?: CollectionCacheConfigOverrides;
  fingerprint?: IdentityFingerprint;
  now?: () => number;
  events?: EventBus;
}

interface PendingFetch {
  epoch: number;
  promise: Promise<RefreshOutcome>;
}

const createEmptyState = (fingerprint: IdentityFingerprint, epoch: number): CacheEntryState => ({
  status: 'empty',
  snapshot: null,
  error: null,
  fingerprint,
  epoch,
  inFlight: null,
});

export class CollectionStore {
  private readonly source: CollectionSource;
  private readonly now: () => number;
  private readonly events: EventBus;
  private config: CollectionCacheConfig;
  private state: CacheEntryState;
  private pending: PendingFetch | null = null;
  private listeners = new Set<StoreListener>();
  private fetchCount = 0;
  private discardedCount = 0;
  private lastFetchDurationMs: number | null = null;

  constructor(options: CollectionStoreOptions) {
    this.source = options.source;
    this.now = options.now ?? (() => Date.now());
    this.events = options.events ?? defaultEventBus;
    this.config = resolveCollectionCacheConfig(options.config);
    this.state = createEmptyState(options.fingerprint ?? ANONYMOUS_FINGERPRINT, 0);
  }

  /**
   * Resolves with the cached snapshot while it is fresh, otherwise starts a fetch
   * or joins the one already running for the current epoch. Never rejects.
   */
  get(forceRefresh = false): Promise<RefreshOutcome> {
    this.evaluateFreshness();
    const { snapshot, status } = this.state;
    if (!forceRefresh && status === 'fresh' && snapshot) {
      return Promise.resolve({ kind: 'cached', snapshot });
    }
    if (this.pending && this.pending.epoch === this.state.epoch) {
      return this.pending.promise;
    }
    return this.startFetch(forceRefresh);
  }

  /**
   * Adopts a new identity. Value-equal fingerprints are ignored. Otherwise the
   * epoch moves on, any running fetch is orphaned and the entry is invalidated.
   * The snapshot survives only if the new scope is allowed to see all of it.
   */
  setFingerprint(next: IdentityFingerprint): FingerprintChange {
    const previous = this.state.fingerprint;
    if (fingerprintsEqual(previous, next)) {
      return 'unchanged';
    }

    const { snapshot } = this.state;
    const epoch = this.state.epoch + 1;
    this.pending = null;

    if (
      snapshot &&
      !isScopeContained(buildPermissionScope(snapshot.fingerprint), buildPermissionScope(next))
    ) {
      logAppInfo(
        `Revoked snapshot ${snapshot.scopeKey} after identity changed to ${describeFingerprint(next)}`,
        LOG_SOURCE
      );
      this.update(createEmptyState(next, epoch), 'revoked');
      return 'revoked';
    }

    logAppDebug(
      `Invalidated cache for ${describeFingerprint(next)} (was ${describeFingerprint(previous)})`,
      LOG_SOURCE
    );
    this.update(
      {
        status: snapshot ? 'stale' : 'empty',
        snapshot,
        error: null,
        fingerprint: next,
        epoch,
        inFlight: null,
      },
      'invalidated'
    );
    return 'retained';
  }

  /** Drops the snapshot and orphans any running fetch. */
  clear(): void {
    this.pending = null;
    this.update(createEmptyState(this.state.fingerprint, this.state.epoch + 1), 'cleared');
    logAppInfo('Cleared collection cache', LOG_SOURCE);
  }

  peek(): CollectionSnapshot | null {
    this.evaluateFreshness();
    return this.state.snapshot;
  }

  getState(): Readonly<CacheEntryState> {
    this.evaluateFreshness();
    return this.state;
  }

  getFingerprint(): IdentityFingerprint {
    return this.state.fingerprint;
  }

  /** The promise of the fetch running for the current epoch, if any. */
  getPendingFetch(): Promise<RefreshOutcome> | null {
    return this.pending?.promise ?? null;
  }

  getConfig(): CollectionCacheConfig {
    return { ...this.config };
  }

  setConfig(overrides: CollectionCacheConfigOverrides): void {
    this.config = resolveCollectionCacheConfig({
      ttlSeconds: overrides.ttlSeconds ?? this.config.ttlSeconds,
      timeoutMs: overrides.timeoutMs ?? this.config.timeoutMs,
    });
  }

  getMetrics(): StoreMetrics {
    this.evaluateFreshness();
    const { snapshot, status, error } = this.state;
    return {
      status,
      ageMs: snapshot ? Math.max(0, this.now() - snapshot.fetchedAt) : null,
      lastError: error,
      fetchCount: this.fetchCount,
      discardedCount: this.discardedCount,
      lastFetchDurationMs: this.lastFetchDurationMs,
    };
  }

  subscribe(listener: StoreListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  // fresh -> stale once the TTL has elapsed; checked on every read.
  private evaluateFreshness(): void {
    const { status, snapshot } = this.state;
    if (status !== 'fresh' || !snapshot) {
      return;
    }
    if (this.now() - snapshot.fetchedAt < this.config.ttlSeconds * 1000) {
      return;
    }
    this.state = { ...this.state, status: 'stale' };
  }

  private startFetch(force: boolean): Promise<RefreshOutcome> {
    const { epoch, fingerprint } = this.state;
    const scope = buildPermissionScope(fingerprint);
    const startedAt = this.now();
    this.fetchCount += 1;

    const promise = this.fetchWithTimeout(scope).then(
      (records) => this.complete(epoch, scope, fingerprint, records, startedAt),
      (error: unknown) => this.fail(epoch, scope, toCollectionFetchError(error), startedAt)
    );
    this.pending = { epoch, promise };

    logAppDebug(
      `Fetching collections for ${scope.key} (epoch ${epoch}${force ? ', forced' : ''})`,
      LOG_SOURCE
    );
    this.update(
      { ...this.state, status: 'loading', inFlight: { epoch, fingerprint, startedAt, force } },
      'loading'
    );
    this.events.emit('collections:refresh-start', { force, scopeKey: scope.key, epoch });

    return promise;
  }

  private async fetchWithTimeout(scope: PermissionScope): Promise<readonly CollectionRecord[]> {
    const controller = new AbortController();
    const timeoutMs = this.config.timeoutMs;
    let timer: ReturnType<typeof setTimeout> | undefined;
    const timeout = new Promise<never>((_, reject) => {
      timer = setTimeout(() => {
        reject(new TimeoutError(timeoutMs));
        controller.abort();
      }, timeoutMs);
    });

    try {
      return await Promise.race([this.source.fetch(scope, { signal: controller.signal }), timeout]);
    } finally {
      clearTimeout(timer);
    }
  }

  private complete(
    epoch: number,
    scope: PermissionScope,
    fingerprint: IdentityFingerprint,
    records: readonly CollectionRecord[],
    startedAt: number
  ): RefreshOutcome {
    this.finishFetch(epoch, startedAt);
    if (epoch !== this.state.epoch) {
      return this.discard(epoch, scope);
    }

    const snapshot: CollectionSnapshot = Object.freeze({
      records: Object.freeze([...records]),
      fingerprint,
      scopeKey: scope.key,
      fetchedAt: this.now(),
      epoch,
    });
    this.update({ ...this.state, status: 'fresh', snapshot, error: null, inFlight: null }, 'published');
    logAppInfo(`Published ${records.length} collections for ${scope.key}`, LOG_SOURCE);
    this.events.emit('collections:refresh-complete', { scopeKey: scope.key, epoch, outcome: 'fetched' });
    return { kind: 'fetched', snapshot };
  }

  private fail(
    epoch: number,
    scope: PermissionScope,
    error: CollectionFetchError,
    startedAt: number
  ): RefreshOutcome {
    this.finishFetch(epoch, startedAt);
    if (epoch !== this.state.epoch) {
      return this.discard(epoch, scope);
    }

    const snapshot = this.state.snapshot ?? this.restorePersisted(epoch, scope, error);
    this.update(
      { ...this.state, status: snapshot ? 'stale' : 'error', snapshot, error, inFlight: null },
      'failed'
    );
    logAppWarn(
      `Fetching collections for ${scope.key} failed (${error.kind}): ${error.message}`,
      LOG_SOURCE
    );
    this.events.emit('collections:refresh-complete', {
      scopeKey: scope.key,
      epoch,
      outcome: 'failed',
      errorKind: error.kind,
    });
    return { kind: 'failed', snapshot, error };
  }

  // Offline start-up: the persisted list keeps its original timestamp and is never fresh.
  private restorePersisted(
    epoch: number,
    scope: PermissionScope,
    error: CollectionFetchError
  ): CollectionSnapshot | null {
    if (!(error instanceof NetworkError)) {
      return null;
    }
    const persisted = this.source.restore?.(scope);
    if (!persisted) {
      return null;
    }
    logAppInfo(
      `Restored ${persisted.records.length} persisted collections for ${scope.key} (${error.message})`,
      LOG_SOURCE
    );
    return Object.freeze({
      records: Object.freeze([...persisted.records]),
      fingerprint: this.state.fingerprint,
      scopeKey: scope.key,
      fetchedAt: persisted.savedAt,
      epoch,
    });
  }

  private discard(epoch: number, scope: PermissionScope): RefreshOutcome {
    this.discardedCount += 1;
    logAppDebug(
      `Discarded result for ${scope.key}: epoch ${epoch} superseded by ${this.state.epoch}`,
      LOG_SOURCE
    );
    this.events.emit('collections:refresh-complete', {
      scopeKey: scope.key,
      epoch,
      outcome: 'superseded',
    });
    return { kind: 'superseded', snapshot: this.state.snapshot };
  }

  private finishFetch(epoch: number, startedAt: number): void {
    this.lastFetchDurationMs = this.now() - startedAt;
    if (this.pending?.epoch === epoch) {
      this.pending = null;
    }
  }

  private update(next: CacheEntryState, change: StoreChangeKind): void {
    this.state = next;
    // A failing listener must not stop the others or reject get().
    this.listeners.forEach((listener) => {
      try {
        listener(next, change);
      } catch (error) {
        logAppError(
          `Store listener failed on ${change}: ${error instanceof Error ? error.message : String(error)}`,
          LOG_SOURCE
        );
      }
    });
  }
}
