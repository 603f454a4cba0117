/**
 * src/core/collections/validation.ts
 *
 * Validates collection payloads returned by a remote source and converts them
 * into frozen CollectionRecords. A payload is accepted whole or rejected whole.
 */

import { MalformedDataError } from './errors';
import type { CollectionRecord, PermissionScope, VisibilityClass } from './types';

const isPlainObject = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

// Access levels used by the collection service mapped onto visibility classes.
const ACCESS_LEVELS: Readonly<Record<string, VisibilityClass>> = {
  public: 'public',
  authenticated: 'authenticated',
  registered: 'authenticated',
  premium: 'authenticated',
  'admin-only': 'admin-only',
  admin: 'admin-only',
  superadmin: 'admin-only',
};

const pickField = (source: Record<string, unknown>, names: readonly string[]): unknown => {
  for (const name of names) {
    if (source[name] !== undefined && source[name] !== null) {
      return source[name];
    }
  }
  return undefined;
};

const readVisibility = (value: unknown): VisibilityClass | null => {
  if (value === undefined) {
    return 'public';
  }
  if (typeof value !== 'string') {
    return null;
  }
  return ACCESS_LEVELS[value.trim().toLowerCase()] ?? null;
};

const readItemCount = (value: unknown): number | null => {
  if (value === undefined) {
    return 0;
  }
  if (typeof value !== 'number' || !Number.isInteger(value) || value < 0) {
    return null;
  }
  return value;
};

const readTimestamp = (value: unknown): number | null => {
  if (value === undefined) {
    return 0;
  }
  if (typeof value === 'number') {
    return Number.isFinite(value) && value >= 0 ? value : null;
  }
  if (typeof value === 'string') {
    const parsed = Date.parse(value);
    return Number.isNaN(parsed) ? null : parsed;
  }
  return null;
};

// parseCollectionRecord returns the record or a description of what is wrong with it.
export const parseCollectionRecord = (
  value: unknown,
  index: number
): CollectionRecord | string => {
  if (!isPlainObject(value)) {
    return `record ${index} is not an object`;
  }

  const id = value.id;
  if (typeof id !== 'string' || !id.trim()) {
    return `record ${index} has no id`;
  }

  const displayName = pickField(value, ['displayName', 'display_name', 'name']);
  if (typeof displayName !== 'string' || !displayName.trim()) {
    return `record ${id} has no display name`;
  }

  const visibility = readVisibility(
    pickField(value, ['visibility', 'accessLevel', 'access_level'])
  );
  if (!visibility) {
    return `record ${id} has an unknown access level`;
  }

  const itemCount = readItemCount(
    pickField(value, ['itemCount', 'item_count', 'songCount', 'song_count'])
  );
  if (itemCount === null) {
    return `record ${id} has an invalid item count`;
  }

  const lastModified = readTimestamp(
    pickField(value, ['lastModified', 'last_modified', 'updatedAt', 'updated_at'])
  );
  if (lastModified === null) {
    return `record ${id} has an invalid modification time`;
  }

  return Object.freeze({
    id: id.trim(),
    displayName: displayName.trim(),
    visibility,
    itemCount,
    lastModified,
  });
};

const extractRecordList = (payload: unknown): unknown[] | null => {
  if (Array.isArray(payload)) {
    return payload;
  }
  if (isPlainObject(payload) && Array.isArray(payload.collections)) {
    return payload.collections;
  }
  return null;
};

/**
 * Converts a decoded payload into records visible under `scope`.
 * Throws MalformedDataError when the shape is wrong, when any record is invalid,
 * when ids repeat, or when a record is outside the requested scope.
 */
export const parseCollectionRecords = (
  payload: unknown,
  scope: PermissionScope
): readonly CollectionRecord[] => {
  const list = extractRecordList(payload);
  if (!list) {
    throw new MalformedDataError('Collection payload is not a list');
  }

  const records: CollectionRecord[] = [];
  const seen = new Set<string>();
  list.forEach((entry, index) => {
    const parsed = parseCollectionRecord(entry, index);
    if (typeof parsed === 'string') {
      throw new MalformedDataError(`Invalid collection payload: ${parsed}`);
    }
    if (seen.has(parsed.id)) {
      throw new MalformedDataError(`Invalid collection payload: duplicate id ${parsed.id}`);
    }
    if (!scope.visibility.includes(parsed.visibility)) {
      throw new MalformedDataError(
        `Invalid collection payload: record ${parsed.id} is ${parsed.visibility}, outside scope ${scope.key}`
      );
    }
    seen.add(parsed.id);
    records.push(parsed);
  });

  return Object.freeze(records);
};
