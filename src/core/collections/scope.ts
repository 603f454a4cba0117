/**
 * src/core/collections/scope.ts
 *
 * Helpers for identity fingerprints and the permission scopes derived from them.
 */

import type {
  IdentityFingerprint,
  IdentitySignal,
  PermissionScope,
  VisibilityClass,
} from './types';

const SCOPE_DELIMITER = '|';
const ANONYMOUS_TOKEN = 'anonymous';
const USER_TOKEN_PREFIX = 'user:';

export const ANONYMOUS_FINGERPRINT: IdentityFingerprint = Object.freeze({
  userId: null,
  isAdmin: false,
  isSuperAdmin: false,
});

export const FINGERPRINT_FIELDS: ReadonlyArray<keyof IdentityFingerprint> = [
  'userId',
  'isAdmin',
  'isSuperAdmin',
];

const normalizeUserId = (userId: string | null | undefined): string | null => {
  const trimmed = (userId ?? '').trim();
  return trimmed ? trimmed : null;
};

// createFingerprint trims the user id and treats a blank id as anonymous.
export const createFingerprint = (
  input: { userId?: string | null; isAdmin?: boolean; isSuperAdmin?: boolean } = {}
): IdentityFingerprint =>
  Object.freeze({
    userId: normalizeUserId(input.userId),
    isAdmin: Boolean(input.isAdmin),
    isSuperAdmin: Boolean(input.isSuperAdmin),
  });

export const isResolved = (signal: IdentitySignal): signal is IdentityFingerprint =>
  signal !== 'unresolved';

export const fingerprintsEqual = (a: IdentityFingerprint, b: IdentityFingerprint): boolean =>
  FINGERPRINT_FIELDS.every((field) => a[field] === b[field]);

export const diffFingerprints = (
  previous: IdentityFingerprint,
  next: IdentityFingerprint
): Array<keyof IdentityFingerprint> => FINGERPRINT_FIELDS.filter((field) => previous[field] !== next[field]);

export const describeFingerprint = (fingerprint: IdentityFingerprint): string => {
  const who = fingerprint.userId ? `${USER_TOKEN_PREFIX}${fingerprint.userId}` : ANONYMOUS_TOKEN;
  if (fingerprint.isSuperAdmin) {
    return `${who} (super-admin)`;
  }
  if (fingerprint.isAdmin) {
    return `${who} (admin)`;
  }
  return who;
};

// resolveVisibility lists the visibility classes a fingerprint may read, least privileged first.
export const resolveVisibility = (fingerprint: IdentityFingerprint): VisibilityClass[] => {
  const classes: VisibilityClass[] = ['public'];
  if (fingerprint.userId) {
    classes.push('authenticated');
  }
  if (fingerprint.isAdmin || fingerprint.isSuperAdmin) {
    classes.push('admin-only');
  }
  return classes;
};

// buildPermissionScope produces a stable scope key such as `user:42|public,authenticated`.
export const buildPermissionScope = (fingerprint: IdentityFingerprint): PermissionScope => {
  const visibility = resolveVisibility(fingerprint);
  const who = fingerprint.userId ? `${USER_TOKEN_PREFIX}${fingerprint.userId}` : ANONYMOUS_TOKEN;
  return Object.freeze({
    key: `${who}${SCOPE_DELIMITER}${visibility.join(',')}`,
    userId: fingerprint.userId,
    visibility: Object.freeze(visibility),
  });
};

/**
 * Data fetched under `from` may stay on screen under `to` only when it cannot
 * reveal more than `to` is allowed to see.
 */
export const isScopeContained = (from: PermissionScope, to: PermissionScope): boolean => {
  if (from.userId !== null && from.userId !== to.userId) {
    return false;
  }
  return from.visibility.every((visibility) => to.visibility.includes(visibility));
};
