/**
 * @vitest-environment node
 *
 * src/core/collections/sources/httpCollectionSource.test.ts
 *
 * Tests for the REST-backed collection source.
 */

import { describe, expect, it, vi } from 'vitest';

import { MalformedDataError, NetworkError, PermissionError, TimeoutError } from '../errors';
import { ANONYMOUS_FINGERPRINT, buildPermissionScope, createFingerprint } from '../scope';
import { COLLECTIONS_PATH, SCOPE_HEADER, createHttpCollectionSource } from './httpCollectionSource';

const BASE_URL = 'https://collections.test';
const anonymousScope = buildPermissionScope(ANONYMOUS_FINGERPRINT);
const memberScope = buildPermissionScope(createFingerprint({ userId: 'u-1' }));

const jsonResponse = (body: unknown, init: ResponseInit = {}) =>
  new Response(JSON.stringify(body), {
    status: 200,
    headers: { 'Content-Type': 'application/json' },
    ...init,
  });

const setup = (respond: () => Promise<Response>) => {
  const fetchImpl = vi.fn<typeof fetch>(respond);
  const source = createHttpCollectionSource({ baseURL: BASE_URL, fetchImpl });
  const controller = new AbortController();
  return {
    fetchImpl,
    controller,
    load: (scope = anonymousScope) => source.fetch(scope, { signal: controller.signal }),
  };
};

describe('createHttpCollectionSource', () => {
  it('requests the collections of the scope and forwards the abort signal', async () => {
    const { fetchImpl, controller, load } = setup(async () => jsonResponse([]));

    await load(memberScope);

    expect(fetchImpl).toHaveBeenCalledTimes(1);
    const [input, init] = fetchImpl.mock.calls[0];
    const url = new URL(String(input));
    expect(url.origin).toBe(BASE_URL);
    expect(url.pathname).toBe(COLLECTIONS_PATH);
    expect(url.searchParams.get('scope')).toBe('user:u-1|public,authenticated');
    expect(init?.headers).toEqual({
      Accept: 'application/json',
      [SCOPE_HEADER]: 'user:u-1|public,authenticated',
    });
    expect(init?.signal).toBe(controller.signal);
  });

  it('parses the records in the response', async () => {
    const { load } = setup(async () =>
      jsonResponse({
        collections: [
          { id: 'lpmi', name: 'LPMI', access_level: 'public', song_count: 4, updated_at: 5_000 },
          { id: 'members', name: 'Members', access_level: 'registered' },
        ],
      })
    );

    await expect(load(memberScope)).resolves.toEqual([
      { id: 'lpmi', displayName: 'LPMI', visibility: 'public', itemCount: 4, lastModified: 5_000 },
      {
        id: 'members',
        displayName: 'Members',
        visibility: 'authenticated',
        itemCount: 0,
        lastModified: 0,
      },
    ]);
  });

  it('rejects records the scope may not see', async () => {
    const { load } = setup(async () =>
      jsonResponse([{ id: 'drafts', name: 'Drafts', access_level: 'admin' }])
    );

    const result = load();

    await expect(result).rejects.toBeInstanceOf(MalformedDataError);
    await expect(result).rejects.toThrow(
      'Invalid collection payload: record drafts is admin-only, outside scope anonymous|public'
    );
  });

  it('formats structured permission denials', async () => {
    const { load } = setup(async () =>
      jsonResponse(
        {
          reason: 'Forbidden',
          code: 403,
          message: 'permission denied',
          details: { collection: 'drafts' },
        },
        { status: 403, statusText: 'Forbidden' }
      )
    );

    const result = load();

    await expect(result).rejects.toBeInstanceOf(PermissionError);
    await expect(result).rejects.toThrow('permission denied (collection drafts)');
  });

  it('describes an unauthorised response without a body', async () => {
    const { load } = setup(async () =>
      new Response(null, { status: 401, statusText: 'Unauthorized' })
    );

    const result = load();

    await expect(result).rejects.toBeInstanceOf(PermissionError);
    await expect(result).rejects.toThrow('Collection request was denied: 401 Unauthorized');
  });

  it('treats a forbidden payload in a successful response as a permission failure', async () => {
    const { load } = setup(async () => jsonResponse({ reason: 'Forbidden', message: 'revoked' }));

    const result = load();

    await expect(result).rejects.toBeInstanceOf(PermissionError);
    await expect(result).rejects.toThrow('revoked');
  });

  it('reports server failures as retryable network errors', async () => {
    const { load } = setup(async () =>
      jsonResponse({ message: 'database offline' }, { status: 500, statusText: 'Server Error' })
    );

    const error = await load().catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(NetworkError);
    expect(error).toMatchObject({ kind: 'network', retryable: true, message: 'database offline' });
  });

  it('falls back to the status line when the failure body has no message', async () => {
    const { load } = setup(async () =>
      new Response('<html>bad gateway</html>', { status: 502, statusText: 'Bad Gateway' })
    );

    await expect(load()).rejects.toThrow('Collection request failed: 502 Bad Gateway');
  });

  it('rejects a body that is not JSON', async () => {
    const { load } = setup(async () => new Response('not json', { status: 200 }));

    const result = load();

    await expect(result).rejects.toBeInstanceOf(MalformedDataError);
    await expect(result).rejects.toThrow('Collection response is not valid JSON');
  });

  it('rejects an empty body as a payload that is not a list', async () => {
    const { load } = setup(async () => new Response('', { status: 200 }));

    await expect(load()).rejects.toThrow('Collection payload is not a list');
  });

  it('maps an aborted request to a timeout without a deadline', async () => {
    const { controller, load } = setup(async () => {
      controller.abort();
      throw new DOMException('The operation was aborted.', 'AbortError');
    });

    const error = await load().catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(TimeoutError);
    expect(error).toMatchObject({ kind: 'timeout', timeoutMs: null });
  });

  it('maps transport failures to network errors', async () => {
    const { load } = setup(async () => {
      throw new TypeError('fetch failed');
    });

    const error = await load().catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(NetworkError);
    expect(error).not.toBeInstanceOf(TimeoutError);
    expect(error).toMatchObject({ kind: 'network', message: 'fetch failed' });
  });
});
