/**
 * src/core/events/eventBus.ts
 *
 * Centralized event bus for type-safe communication between the collection
 * engine, identity handling, settings and any UI that wants to observe them.
 * Defines all app events and their payloads in one place.
 * Provides emit, on, once, and off methods for event management.
 * Errors thrown by one handler are logged and do not stop the others.
 */

import type { CollectionErrorKind } from '@/core/collections/errors';
import type { CacheStatus, IdentityFingerprint } from '@/core/collections/types';

// Event payload types
export interface AppEvents {
  // Collection cache events
  'collections:refresh-start': { force: boolean; scopeKey: string; epoch: number };
  'collections:refresh-complete': {
    scopeKey: string;
    epoch: number;
    outcome: 'fetched' | 'failed' | 'superseded';
    errorKind?: CollectionErrorKind;
  };
  'collections:published': { status: CacheStatus; count: number; scopeKey: string | null };
  'collections:cleared': void;

  // Identity events
  'identity:changed': { previous: IdentityFingerprint; next: IdentityFingerprint };
  'identity:reevaluate-requested': { reason: string };

  // Settings events
  'settings:collections-ttl': number;
  'settings:collections-timeout': number;
}

type EventCallback<T> = (payload: T) => void;
type UnsubscribeFn = () => void;

interface Subscription {
  callback: EventCallback<unknown>;
  once: boolean;
}

export class EventBus {
  private listeners = new Map<keyof AppEvents, Set<Subscription>>();

  emit<K extends keyof AppEvents>(
    event: K,
    ...args: AppEvents[K] extends void ? [] : [AppEvents[K]]
  ): void {
    const subs = this.listeners.get(event);
    if (!subs) return;

    const payload = args[0];
    const toRemove: Subscription[] = [];

    subs.forEach((sub) => {
      try {
        sub.callback(payload);
        if (sub.once) {
          toRemove.push(sub);
        }
      } catch (err) {
        console.error(`[EventBus] Error in handler for "${event}":`, err);
      }
    });

    toRemove.forEach((sub) => subs.delete(sub));
  }

  on<K extends keyof AppEvents>(event: K, callback: EventCallback<AppEvents[K]>): UnsubscribeFn {
    return this.subscribe(event, callback, false);
  }

  once<K extends keyof AppEvents>(event: K, callback: EventCallback<AppEvents[K]>): UnsubscribeFn {
    return this.subscribe(event, callback, true);
  }

  off<K extends keyof AppEvents>(event: K, callback: EventCallback<AppEvents[K]>): void {
    const subs = this.listeners.get(event);
    if (!subs) return;

    for (const sub of subs) {
      if (sub.callback === callback) {
        subs.delete(sub);
        break;
      }
    }
  }

  private subscribe<K extends keyof AppEvents>(
    event: K,
    callback: EventCallback<AppEvents[K]>,
    once: boolean
  ): UnsubscribeFn {
    let subs = this.listeners.get(event);
    if (!subs) {
      subs = new Set();
      this.listeners.set(event, subs);
    }

    const subscription: Subscription = {
      callback: callback as EventCallback<unknown>,
      once,
    };

    subs.add(subscription);

    return () => {
      this.listeners.get(event)?.delete(subscription);
    };
  }

  // For debugging/testing
  listenerCount(event: keyof AppEvents): number {
    return this.listeners.get(event)?.size ?? 0;
  }

  clear(): void {
    this.listeners.clear();
  }
}

// Singleton instance
export const eventBus = new EventBus();

// Re-export types for convenience
export type { UnsubscribeFn };
