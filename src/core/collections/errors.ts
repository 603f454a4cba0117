/**
 * src/core/collections/errors.ts
 *
 * Failure taxonomy for collection fetches.
 */

export type CollectionErrorKind = 'network' | 'timeout' | 'permission' | 'malformed';

export class CollectionFetchError extends Error {
  readonly kind: CollectionErrorKind;
  readonly retryable: boolean;

  constructor(kind: CollectionErrorKind, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'CollectionFetchError';
    this.kind = kind;
    this.retryable = kind === 'network' || kind === 'timeout';
  }
}

/** Transient transport failure. Retained data stays on screen; nothing retries on its own. */
export class NetworkError extends CollectionFetchError {
  constructor(message = 'Network request failed', options?: { cause?: unknown; kind?: 'timeout' }) {
    super(options?.kind ?? 'network', message, options);
    this.name = 'NetworkError';
  }
}

/** Raised when the fetch deadline passes or the request is aborted (`timeoutMs` is then null). */
export class TimeoutError extends NetworkError {
  readonly timeoutMs: number | null;

  constructor(timeoutMs: number | null, options?: { cause?: unknown }) {
    super(
      timeoutMs === null
        ? 'Collection request was aborted'
        : `Collection fetch timed out after ${timeoutMs}ms`,
      { ...options, kind: 'timeout' }
    );
    this.name = 'TimeoutError';
    this.timeoutMs = timeoutMs;
  }
}

/** The scope is no longer authorised; identity must be re-evaluated. */
export class PermissionError extends CollectionFetchError {
  constructor(message = 'Permission denied', options?: { cause?: unknown }) {
    super('permission', message, options);
    this.name = 'PermissionError';
  }
}

export class MalformedDataError extends CollectionFetchError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('malformed', message, options);
    this.name = 'MalformedDataError';
  }
}

export const isAbortError = (error: unknown): boolean =>
  typeof error === 'object' &&
  error !== null &&
  'name' in error &&
  (error.name === 'AbortError' || error.name === 'TimeoutError');

/**
 * Normalises anything a source throws into a CollectionFetchError.
 * Unknown failures are classified as network errors.
 */
export const toCollectionFetchError = (error: unknown): CollectionFetchError => {
  if (error instanceof CollectionFetchError) {
    return error;
  }
  if (isAbortError(error)) {
    return new TimeoutError(null, { cause: error });
  }
  if (error instanceof Error) {
    return new NetworkError(error.message || 'Network request failed', { cause: error });
  }
  return new NetworkError(typeof error === 'string' && error ? error : 'Unknown error', {
    cause: error,
  });
};
