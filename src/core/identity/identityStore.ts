/**
 * src/core/identity/identityStore.ts
 *
 * Mutable identity provider for host shells and tests. Holds the current
 * identity signal and notifies subscribers on every update, including
 * updates that repeat the same values.
 */

import { ANONYMOUS_FINGERPRINT, createFingerprint } from '@/core/collections/scope';
import type {
  IdentityFingerprint,
  IdentityProvider,
  IdentitySignal,
} from '@/core/collections/types';
import { logAppInfo, logAppWarn } from '@/core/logging/appLogClient';

export type IdentityResolver = (current: IdentitySignal) => Promise<IdentitySignal>;

export interface IdentityStore extends IdentityProvider {
  setIdentity(input: Partial<IdentityFingerprint>): void;
  markUnresolved(): void;
  signOut(): void;
  reevaluate(): Promise<void>;
}

const LOG_SOURCE = 'IdentityStore';

export const createIdentityStore = (
  initial: IdentitySignal = ANONYMOUS_FINGERPRINT,
  resolver?: IdentityResolver
): IdentityStore => {
  let current: IdentitySignal = initial;
  const listeners = new Set<(signal: IdentitySignal) => void>();

  const publish = (next: IdentitySignal): void => {
    current = next;
    listeners.forEach((listener) => listener(next));
  };

  return {
    current: () => current,

    changes: (listener) => {
      listeners.add(listener);
      return () => {
        listeners.delete(listener);
      };
    },

    setIdentity: (input) => {
      publish(createFingerprint(input));
    },

    markUnresolved: () => {
      publish('unresolved');
    },

    signOut: () => {
      publish(ANONYMOUS_FINGERPRINT);
    },

    reevaluate: async () => {
      if (!resolver) {
        logAppWarn('Identity re-evaluation requested but no resolver is configured', LOG_SOURCE);
        return;
      }
      const resolved = await resolver(current);
      logAppInfo('Identity re-evaluated', LOG_SOURCE);
      publish(resolved);
    },
  };
};
