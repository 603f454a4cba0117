/**
 * src/core/collections/hooks/useCollectionMetrics.ts
 *
 * Hook exposing cache metrics for diagnostics panels.
 */
import { useEffect, useState } from 'react';

import { useCollectionsContext } from '../contexts/CollectionsContext';
import type { CollectionMetrics } from '../types';

export const useCollectionMetrics = (): CollectionMetrics => {
  const { notifier } = useCollectionsContext();
  const [metrics, setMetrics] = useState<CollectionMetrics>(() => notifier.metrics());

  useEffect(() => notifier.subscribe(() => setMetrics(notifier.metrics())), [notifier]);

  return metrics;
};
