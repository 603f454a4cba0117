/**
 * src/core/collections/index.ts
 *
 * Barrel exports for the collection cache.
 * Re-exports public APIs for the core layer.
 */

export type * from './types';
export {
  CollectionFetchError,
  MalformedDataError,
  NetworkError,
  PermissionError,
  TimeoutError,
  toCollectionFetchError,
  type CollectionErrorKind,
} from './errors';
export {
  DEFAULT_COLLECTION_CACHE_CONFIG,
  resolveCollectionCacheConfig,
  type CollectionCacheConfig,
  type CollectionCacheConfigOverrides,
} from './config';
export {
  ANONYMOUS_FINGERPRINT,
  buildPermissionScope,
  createFingerprint,
  describeFingerprint,
  fingerprintsEqual,
  isScopeContained,
} from './scope';
export { parseCollectionRecords } from './validation';
export { CollectionStore, type CollectionStoreOptions } from './store';
export {
  CollectionNotifier,
  createCollectionNotifier,
  isBlockingFailure,
  type CollectionDebugInfo,
  type CollectionNotifierOptions,
  type CreateCollectionNotifierOptions,
} from './notifier';
export {
  ViewStatePreserver,
  ViewStateRegistry,
  type CollectionUpdates,
  type ViewState,
} from './viewState';
export {
  COLLECTIONS_PATH,
  SCOPE_HEADER,
  createHttpCollectionSource,
  type HttpCollectionSourceOptions,
} from './sources/httpCollectionSource';
export {
  clearPersistedCollections,
  createPersistentCollectionSource,
  persistedCollectionsKey,
  type PersistentCollectionSource,
  type PersistentCollectionSourceOptions,
} from './sources/persistentCollectionSource';
export { CollectionsProvider, useCollectionsContext } from './contexts/CollectionsContext';
export { useCollectionsView, type CollectionsView } from './hooks/useCollectionsView';
export { useCollectionMetrics } from './hooks/useCollectionMetrics';
