/**
 * src/core/collections/testing/controlledSource.ts
 *
 * In-process collection source for tests. Each fetch stays pending until the
 * test resolves or rejects it.
 */

import type {
  CollectionRecord,
  CollectionSource,
  PermissionScope,
  VisibilityClass,
} from '../types';

export interface ControlledRequest {
  scope: PermissionScope;
  signal: AbortSignal;
  resolve: (records: readonly CollectionRecord[]) => void;
  reject: (error: unknown) => void;
}

export interface ControlledSource extends CollectionSource {
  readonly requests: ControlledRequest[];
  /** The most recent request; throws if none was made. */
  latest(): ControlledRequest;
}

export const createControlledSource = (): ControlledSource => {
  const requests: ControlledRequest[] = [];
  return {
    requests,
    fetch: (scope, { signal }) =>
      new Promise<readonly CollectionRecord[]>((resolve, reject) => {
        requests.push({ scope, signal, resolve, reject });
      }),
    latest: () => {
      const request = requests[requests.length - 1];
      if (!request) {
        throw new Error('no fetch has been requested');
      }
      return request;
    },
  };
};

export const makeRecord = (
  id: string,
  displayName: string,
  visibility: VisibilityClass = 'public',
  itemCount = 10
): CollectionRecord =>
  Object.freeze({ id, displayName, visibility, itemCount, lastModified: 1_700_000_000_000 });

export const PUBLIC_RECORDS: readonly CollectionRecord[] = [
  makeRecord('lpmi', 'LPMI'),
  makeRecord('srd', 'SRD'),
];

export const MEMBER_RECORDS: readonly CollectionRecord[] = [
  ...PUBLIC_RECORDS,
  makeRecord('members', 'Members Hymnal', 'authenticated'),
];

export const ADMIN_RECORDS: readonly CollectionRecord[] = [
  ...MEMBER_RECORDS,
  makeRecord('drafts', 'Drafts', 'admin-only'),
];
