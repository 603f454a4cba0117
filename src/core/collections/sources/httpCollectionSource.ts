/**
 * src/core/collections/sources/httpCollectionSource.ts
 *
 * Collection source backed by the collection service's REST API.
 */

import {
  MalformedDataError,
  NetworkError,
  PermissionError,
  TimeoutError,
  isAbortError,
} from '../errors';
import type { CollectionRecord, CollectionSource, FetchOptions, PermissionScope } from '../types';
import { parseCollectionRecords } from '../validation';
import {
  formatPermissionDeniedStatus,
  isPermissionDeniedStatus,
  resolvePermissionDeniedMessage,
} from './permissionErrors';

export const COLLECTIONS_PATH = '/api/v1/collections';
export const SCOPE_HEADER = 'X-Collection-Scope';

export interface HttpCollectionSourceOptions {
  baseURL: string;
  fetchImpl?: typeof fetch;
}

const parseJson = (text: string): unknown => (text.trim() ? JSON.parse(text) : null);

async function safeParseError(response: Response): Promise<unknown> {
  try {
    return parseJson(await response.text());
  } catch {
    // Error bodies are informational; the status decides the failure.
    return null;
  }
}

const toTransportError = (error: unknown, signal: AbortSignal): NetworkError => {
  if (signal.aborted || isAbortError(error)) {
    return new TimeoutError(null, { cause: error });
  }
  return new NetworkError(
    error instanceof Error && error.message ? error.message : 'Network request failed',
    { cause: error }
  );
};

const extractMessage = (payload: unknown): string | null => {
  if (typeof payload === 'object' && payload !== null && 'message' in payload) {
    const { message } = payload;
    return typeof message === 'string' && message.trim() ? message.trim() : null;
  }
  return null;
};

const describeStatus = (response: Response): string =>
  `${response.status} ${response.statusText}`.trim();

export function createHttpCollectionSource({
  baseURL,
  fetchImpl = (input, init) => fetch(input, init),
}: HttpCollectionSourceOptions): CollectionSource {
  return {
    async fetch(scope: PermissionScope, { signal }: FetchOptions): Promise<readonly CollectionRecord[]> {
      const url = new URL(COLLECTIONS_PATH, baseURL);
      url.searchParams.set('scope', scope.key);

      let response: Response;
      try {
        response = await fetchImpl(url.toString(), {
          signal,
          headers: { Accept: 'application/json', [SCOPE_HEADER]: scope.key },
        });
      } catch (error) {
        throw toTransportError(error, signal);
      }

      if (response.status === 401 || response.status === 403) {
        const payload = await safeParseError(response);
        const fallback =
          extractMessage(payload) ?? `Collection request was denied: ${describeStatus(response)}`;
        throw new PermissionError(resolvePermissionDeniedMessage(fallback, payload) ?? fallback);
      }

      if (!response.ok) {
        const payload = await safeParseError(response);
        throw new NetworkError(
          extractMessage(payload) ?? `Collection request failed: ${describeStatus(response)}`
        );
      }

      let body: string;
      try {
        body = await response.text();
      } catch (error) {
        throw toTransportError(error, signal);
      }

      let payload: unknown;
      try {
        payload = parseJson(body);
      } catch (error) {
        throw new MalformedDataError('Collection response is not valid JSON', { cause: error });
      }

      if (isPermissionDeniedStatus(payload)) {
        throw new PermissionError(formatPermissionDeniedStatus(payload));
      }
      return parseCollectionRecords(payload, scope);
    },
  };
}
