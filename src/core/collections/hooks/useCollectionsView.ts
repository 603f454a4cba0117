/**
 * src/core/collections/hooks/useCollectionsView.ts
 *
 * Hook giving a screen its preserved collection list.
 */
import { useCallback, useEffect, useMemo, useSyncExternalStore } from 'react';

import { useCollectionsContext } from '../contexts/CollectionsContext';
import type { RefreshOutcome } from '../types';
import type { ViewState } from '../viewState';

export interface CollectionsView extends ViewState {
  refresh: (force?: boolean) => Promise<RefreshOutcome>;
}

/**
 * Follows the notifier while the screen is mounted. Coming back to a screen
 * renders its last list straight away; leaving keeps the copy for next time.
 */
export const useCollectionsView = (screenId: string): CollectionsView => {
  const { notifier, registry } = useCollectionsContext();
  const preserver = useMemo(() => registry.preserverFor(screenId), [registry, screenId]);

  const subscribe = useCallback(
    (onStoreChange: () => void) => preserver.subscribe(onStoreChange),
    [preserver]
  );
  const getSnapshot = useCallback(() => preserver.getState(), [preserver]);
  const state = useSyncExternalStore(subscribe, getSnapshot, getSnapshot);

  useEffect(() => {
    preserver.enter();
    return () => preserver.leave();
  }, [preserver]);

  // Pull-to-refresh bypasses the TTL unless told otherwise.
  const refresh = useCallback((force = true) => notifier.refresh(force), [notifier]);

  return { ...state, refresh };
};
