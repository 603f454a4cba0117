/**
 * src/core/collections/sources/persistentCollectionSource.ts
 *
 * Local-first wrapper around a remote collection source. Each successful
 * result is written to storage under its scope key. The store reads that copy
 * back through `restore` only when a network failure hits an empty cache, so
 * the app can start offline; remote failures themselves pass through unchanged.
 */

import { eventBus as defaultEventBus, type EventBus } from '@/core/events';
import { logAppWarn } from '@/core/logging/appLogClient';

import type {
  CollectionRecord,
  CollectionSource,
  FetchOptions,
  PermissionScope,
  PersistedCollections,
} from '../types';
import { parseCollectionRecords } from '../validation';

export const PERSISTED_COLLECTIONS_VERSION = 2;
const PERSISTED_COLLECTIONS_ROOT = 'collections:cache:';
export const PERSISTED_COLLECTIONS_PREFIX = `${PERSISTED_COLLECTIONS_ROOT}v${PERSISTED_COLLECTIONS_VERSION}:`;

const LOG_SOURCE = 'PersistentCollectionSource';

interface PersistedEntry {
  version: number;
  savedAt: number;
  records: readonly CollectionRecord[];
}

export interface PersistentCollectionSourceOptions {
  remote: CollectionSource;
  storage?: Storage | null;
  now?: () => number;
  /**
   * Persisted lists are wiped when this bus reports `collections:cleared`
   * (sign-out). Pass the bus the notifier publishes on.
   */
  events?: EventBus;
}

export interface PersistentCollectionSource extends CollectionSource {
  restore(scope: PermissionScope): PersistedCollections | null;
  /** Stops listening for `collections:cleared`. */
  dispose(): void;
}

const getDefaultStorage = (): Storage | null => {
  if (typeof window === 'undefined' || !window.localStorage) {
    return null;
  }
  return window.localStorage;
};

export const persistedCollectionsKey = (scopeKey: string): string =>
  `${PERSISTED_COLLECTIONS_PREFIX}${scopeKey}`;

const writePersisted = (
  storage: Storage,
  scope: PermissionScope,
  records: readonly CollectionRecord[],
  savedAt: number
): void => {
  const entry: PersistedEntry = {
    version: PERSISTED_COLLECTIONS_VERSION,
    savedAt,
    records,
  };
  try {
    storage.setItem(persistedCollectionsKey(scope.key), JSON.stringify(entry));
  } catch (error) {
    logAppWarn(
      `Failed to persist collections for ${scope.key}: ${error instanceof Error ? error.message : String(error)}`,
      LOG_SOURCE
    );
  }
};

const readPersisted = (
  storage: Storage,
  scope: PermissionScope
): PersistedCollections | null => {
  const raw = storage.getItem(persistedCollectionsKey(scope.key));
  if (!raw) {
    return null;
  }
  try {
    const entry: unknown = JSON.parse(raw);
    if (
      typeof entry !== 'object' ||
      entry === null ||
      !('version' in entry) ||
      entry.version !== PERSISTED_COLLECTIONS_VERSION ||
      !('records' in entry) ||
      !('savedAt' in entry) ||
      typeof entry.savedAt !== 'number' ||
      !Number.isFinite(entry.savedAt)
    ) {
      return null;
    }
    // Stored data goes through the same checks as a server response.
    return { records: parseCollectionRecords(entry.records, scope), savedAt: entry.savedAt };
  } catch (error) {
    logAppWarn(
      `Ignoring persisted collections for ${scope.key}: ${error instanceof Error ? error.message : String(error)}`,
      LOG_SOURCE
    );
    return null;
  }
};

export function createPersistentCollectionSource({
  remote,
  storage = getDefaultStorage(),
  now = Date.now,
  events = defaultEventBus,
}: PersistentCollectionSourceOptions): PersistentCollectionSource {
  const unsubscribe = events.on('collections:cleared', () => clearPersistedCollections(storage));

  return {
    async fetch(scope: PermissionScope, options: FetchOptions): Promise<readonly CollectionRecord[]> {
      const records = await remote.fetch(scope, options);
      if (storage) {
        writePersisted(storage, scope, records, now());
      }
      return records;
    },
    restore(scope: PermissionScope): PersistedCollections | null {
      return storage ? readPersisted(storage, scope) : null;
    },
    dispose: unsubscribe,
  };
}

/** Removes every persisted collection list. Called on sign-out. */
export const clearPersistedCollections = (storage: Storage | null = getDefaultStorage()): void => {
  if (!storage) {
    return;
  }
  const keys: string[] = [];
  for (let index = 0; index < storage.length; index += 1) {
    const key = storage.key(index);
    if (key?.startsWith(PERSISTED_COLLECTIONS_ROOT)) {
      keys.push(key);
    }
  }
  keys.forEach((key) => storage.removeItem(key));
};
