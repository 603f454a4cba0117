/**
 * src/core/collections/sources/permissionErrors.ts
 *
 * Helpers for parsing and formatting structured permission-denied payloads
 * returned by the collection service.
 */

export interface PermissionDeniedStatus {
  kind?: string;
  message?: string;
  reason?: string;
  code?: number;
  details?: {
    scope?: string;
    collection?: string;
    requiredRole?: string;
  };
}

const isPlainObject = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null;

const isOptionalString = (value: unknown): boolean =>
  value === undefined || typeof value === 'string';

// isPermissionDeniedStatus validates the Status-like shape used for access errors.
export const isPermissionDeniedStatus = (value: unknown): value is PermissionDeniedStatus => {
  if (!isPlainObject(value)) {
    return false;
  }
  if (!isOptionalString(value.kind) || !isOptionalString(value.message)) {
    return false;
  }
  if (!isOptionalString(value.reason)) {
    return false;
  }
  if (value.code !== undefined && typeof value.code !== 'number') {
    return false;
  }
  if (value.details !== undefined) {
    const details = value.details;
    if (!isPlainObject(details)) {
      return false;
    }
    if (
      !isOptionalString(details.scope) ||
      !isOptionalString(details.collection) ||
      !isOptionalString(details.requiredRole)
    ) {
      return false;
    }
  }

  return value.reason === 'Forbidden' || value.code === 403;
};

// formatPermissionDeniedStatus builds a user-facing message with available details.
export const formatPermissionDeniedStatus = (status: PermissionDeniedStatus): string => {
  const base =
    typeof status.message === 'string' && status.message.trim()
      ? status.message.trim()
      : 'Permission denied';

  const detailParts: string[] = [];
  const collection = status.details?.collection?.trim();
  const scope = status.details?.scope?.trim();
  const requiredRole = status.details?.requiredRole?.trim();

  if (collection && !base.includes(collection)) {
    detailParts.push(`collection ${collection}`);
  }
  if (scope && !base.includes(scope)) {
    detailParts.push(`scope ${scope}`);
  }
  if (requiredRole && !base.toLowerCase().includes(requiredRole.toLowerCase())) {
    detailParts.push(`requires ${requiredRole}`);
  }

  if (detailParts.length === 0) {
    return base;
  }
  return `${base} (${detailParts.join(', ')})`;
};

// resolvePermissionDeniedMessage prefers structured payloads when available.
export const resolvePermissionDeniedMessage = (
  fallback: string | null | undefined,
  status: unknown
): string | null => {
  if (isPermissionDeniedStatus(status)) {
    return formatPermissionDeniedStatus(status);
  }
  return fallback ?? null;
};
