/**
 * src/core/events/useEventBus.ts
 *
 * React hook for subscribing to event bus events with automatic cleanup.
 */

import { useEffect, useRef } from 'react';
import { eventBus as defaultEventBus, type AppEvents, type EventBus } from './eventBus';

type EventCallback<T> = (payload: T) => void;

/**
 * Subscribe to an event while the component is mounted. The latest callback is
 * always invoked, so callers do not need to memoise it.
 */
export function useEventBus<K extends keyof AppEvents>(
  event: K,
  callback: EventCallback<AppEvents[K]>,
  bus: EventBus = defaultEventBus
): void {
  // Track the latest callback to avoid stale closures
  const callbackRef = useRef(callback);
  callbackRef.current = callback;

  useEffect(
    () => bus.on(event, (payload: AppEvents[K]) => callbackRef.current(payload)),
    [bus, event]
  );
}
