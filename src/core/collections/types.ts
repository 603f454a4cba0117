/**
 * src/core/collections/types.ts
 *
 * Shared types for the collection cache: records, identity fingerprints,
 * snapshots, cache entry state and the contracts of the external collaborators.
 */

import type { CollectionFetchError } from './errors';

export type VisibilityClass = 'public' | 'authenticated' | 'admin-only';

export interface CollectionRecord {
  readonly id: string;
  readonly displayName: string;
  readonly visibility: VisibilityClass;
  readonly itemCount: number;
  readonly lastModified: number; // epoch ms
}

export interface IdentityFingerprint {
  readonly userId: string | null; // null = anonymous
  readonly isAdmin: boolean;
  readonly isSuperAdmin: boolean;
}

// Providers may report 'unresolved' while identity is still loading at startup.
export type IdentitySignal = IdentityFingerprint | 'unresolved';

export interface PermissionScope {
  readonly key: string;
  readonly userId: string | null;
  readonly visibility: readonly VisibilityClass[];
}

export interface CollectionSnapshot {
  readonly records: readonly CollectionRecord[];
  readonly fingerprint: IdentityFingerprint;
  readonly scopeKey: string;
  readonly fetchedAt: number;
  readonly epoch: number;
}

export type CacheStatus = 'empty' | 'loading' | 'fresh' | 'stale' | 'error';

export interface InFlightFetch {
  readonly epoch: number;
  readonly fingerprint: IdentityFingerprint;
  readonly startedAt: number;
  readonly force: boolean;
}

export interface CacheEntryState {
  status: CacheStatus;
  snapshot: CollectionSnapshot | null;
  error: CollectionFetchError | null;
  fingerprint: IdentityFingerprint;
  epoch: number;
  inFlight: InFlightFetch | null;
}

export type RefreshOutcome =
  | { kind: 'cached'; snapshot: CollectionSnapshot }
  | { kind: 'fetched'; snapshot: CollectionSnapshot }
  | { kind: 'failed'; snapshot: CollectionSnapshot | null; error: CollectionFetchError }
  | { kind: 'superseded'; snapshot: CollectionSnapshot | null };

// 'revoked' means a snapshot was dropped because the new scope may not see it.
export type FingerprintChange = 'unchanged' | 'retained' | 'revoked';

export type StoreChangeKind = 'loading' | 'published' | 'failed' | 'invalidated' | 'revoked' | 'cleared';

export type StoreListener = (state: Readonly<CacheEntryState>, change: StoreChangeKind) => void;

export interface StoreMetrics {
  status: CacheStatus;
  ageMs: number | null;
  lastError: CollectionFetchError | null;
  fetchCount: number;
  discardedCount: number;
  lastFetchDurationMs: number | null;
}

export type UpdateReason = 'replay' | 'status' | 'published' | 'failed' | 'revoked' | 'cleared';

export interface CollectionsUpdate {
  snapshot: CollectionSnapshot | null;
  error: CollectionFetchError | null;
  status: CacheStatus;
  reason: UpdateReason;
}

export type CollectionsListener = (update: CollectionsUpdate) => void;

export interface CollectionMetrics {
  state: CacheStatus;
  age: number | null; // ms since fetchedAt
  lastError: CollectionFetchError | null;
  fetchCount: number;
  discardedCount: number;
  lastFetchDurationMs: number | null;
  inFlight: boolean;
  epoch: number;
  scopeKey: string;
}

export interface FetchOptions {
  signal: AbortSignal;
}

/** A list kept from an earlier session, with the time it was fetched. */
export interface PersistedCollections {
  readonly records: readonly CollectionRecord[];
  readonly savedAt: number; // epoch ms
}

/**
 * Remote collection source. Implementations reject with one of the
 * CollectionFetchError variants (anything else is treated as a network failure).
 */
export interface CollectionSource {
  fetch(scope: PermissionScope, options: FetchOptions): Promise<readonly CollectionRecord[]>;
  /**
   * Offline start-up: consulted only when a fetch fails with a network error
   * and nothing is cached yet.
   */
  restore?(scope: PermissionScope): PersistedCollections | null;
}

export interface IdentityProvider {
  current(): IdentitySignal;
  changes(listener: (signal: IdentitySignal) => void): () => void;
  reevaluate?(): void | Promise<void>;
}
