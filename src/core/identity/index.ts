/**
 * src/core/identity/index.ts
 *
 * Barrel exports for identity handling.
 */

export {
  IdentityChangeDetector,
  type IdentityTransition,
  type InvalidationListener,
} from './identityChangeDetector';
export { createIdentityStore, type IdentityResolver, type IdentityStore } from './identityStore';
