/**
 * src/core/collections/contexts/CollectionsContext.tsx
 *
 * Context provider for the collection notifier and the per-screen view state.
 */
import React, { createContext, useContext, useEffect, useMemo, type ReactNode } from 'react';

import { logAppError } from '@/core/logging/appLogClient';

import type { CollectionNotifier } from '../notifier';
import { ViewStateRegistry } from '../viewState';

interface CollectionsContextType {
  notifier: CollectionNotifier;
  registry: ViewStateRegistry;
}

const CollectionsContext = createContext<CollectionsContextType | undefined>(undefined);

export const useCollectionsContext = (): CollectionsContextType => {
  const context = useContext(CollectionsContext);
  if (!context) {
    throw new Error('useCollectionsContext must be used within CollectionsProvider');
  }
  return context;
};

interface CollectionsProviderProps {
  notifier: CollectionNotifier;
  /** Supplied by hosts that keep view state across provider remounts. */
  registry?: ViewStateRegistry;
  children: ReactNode;
}

/**
 * CollectionsProvider - Shares the notifier with screens and starts it on mount
 */
export const CollectionsProvider: React.FC<CollectionsProviderProps> = ({
  notifier,
  registry,
  children,
}) => {
  const viewStates = useMemo(() => registry ?? new ViewStateRegistry(notifier), [notifier, registry]);

  useEffect(() => {
    if (notifier.isInitialized) {
      return;
    }
    notifier.initialize().catch((error: unknown) => {
      logAppError(
        `Failed to initialize collections: ${error instanceof Error ? error.message : String(error)}`,
        'CollectionsProvider'
      );
    });
  }, [notifier]);

  // Registries created here belong to this provider.
  useEffect(() => {
    if (registry) {
      return undefined;
    }
    return () => viewStates.clear();
  }, [registry, viewStates]);

  const contextValue = useMemo(
    () => ({ notifier, registry: viewStates }),
    [notifier, viewStates]
  );

  return <CollectionsContext.Provider value={contextValue}>{children}</CollectionsContext.Provider>;
};
