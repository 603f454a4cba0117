/**
 * src/core/identity/identityChangeDetector.ts
 *
 * Turns a stream of identity signals into invalidations. Only a change in the
 * value of the fingerprint counts; repeated signals carrying the same values and
 * 'unresolved' signals are ignored.
 */

import { diffFingerprints, isResolved } from '@/core/collections/scope';
import type {
  IdentityFingerprint,
  IdentityProvider,
  IdentitySignal,
} from '@/core/collections/types';

export interface IdentityTransition {
  previous: IdentityFingerprint;
  next: IdentityFingerprint;
  changedFields: Array<keyof IdentityFingerprint>;
}

export type InvalidationListener = (transition: IdentityTransition) => void;

export class IdentityChangeDetector {
  private lastSeen: IdentityFingerprint | null;
  private listeners = new Set<InvalidationListener>();
  private disconnect: (() => void) | null = null;

  constructor(baseline: IdentityFingerprint | null = null) {
    this.lastSeen = baseline;
  }

  get lastFingerprint(): IdentityFingerprint | null {
    return this.lastSeen;
  }

  get connected(): boolean {
    return this.disconnect !== null;
  }

  /**
   * Compares the signal with the last resolved fingerprint and notifies
   * listeners when any field differs. Returns the transition, if any.
   */
  observe(signal: IdentitySignal): IdentityTransition | null {
    if (!isResolved(signal)) {
      return null;
    }

    const previous = this.lastSeen;
    this.lastSeen = signal;
    if (previous === null) {
      return null;
    }

    const changedFields = diffFingerprints(previous, signal);
    if (changedFields.length === 0) {
      return null;
    }

    const transition: IdentityTransition = { previous, next: signal, changedFields };
    this.listeners.forEach((listener) => listener(transition));
    return transition;
  }

  onInvalidate(listener: InvalidationListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  /** Subscribes to the provider's change stream. A second call replaces the first connection. */
  connect(provider: IdentityProvider): () => void {
    this.disconnectProvider();
    const unsubscribe = provider.changes((signal) => {
      this.observe(signal);
    });
    this.disconnect = unsubscribe;
    return () => {
      if (this.disconnect === unsubscribe) {
        this.disconnectProvider();
      }
    };
  }

  disconnectProvider(): void {
    const disconnect = this.disconnect;
    this.disconnect = null;
    disconnect?.();
  }

  dispose(): void {
    this.disconnectProvider();
    this.listeners.clear();
  }
}
