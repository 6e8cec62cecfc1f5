import { afterEach, describe, expect, test, vi } from 'vitest';
import { ApiError, RequestTimeoutError } from '../errors.js';
import { RestApiClient } from './client.js';

const BASE_URL = new URL('http://127.0.0.1:8384');

function stubFetch(status: number, body: string) {
  const fetchMock = vi.fn(async (_url: URL, _init?: RequestInit) => new Response(body, { status }));
  vi.stubGlobal('fetch', fetchMock);
  return fetchMock;
}

function stubHangingFetch() {
  vi.stubGlobal(
    'fetch',
    vi.fn(
      (_url: URL, init?: RequestInit) =>
        new Promise<Response>((_resolve, reject) => {
          init?.signal?.addEventListener('abort', () => reject(init?.signal?.reason));
        })
    )
  );
}

function requestOf(fetchMock: ReturnType<typeof stubFetch>, index = 0) {
  const [url, init] = fetchMock.mock.calls[index];
  return { url: url.toString(), init };
}

afterEach(() => {
  vi.unstubAllGlobals();
});

describe('RestApiClient', () => {
  test('sends the API key and parses the response', async () => {
    const fetchMock = stubFetch(
      200,
      JSON.stringify({ myID: 'SELF', tilde: '/home/user', uptime: 3 })
    );
    const client = new RestApiClient(BASE_URL, 'test-secret');

    const info = await client.fetchSystemInfo();

    expect(info).toEqual({ myId: 'SELF', tilde: '/home/user', uptimeSec: 3 });
    const { url, init } = requestOf(fetchMock);
    expect(url).toBe('http://127.0.0.1:8384/rest/system/status');
    expect(init?.method).toBe('GET');
    expect(init?.headers).toEqual({ 'X-API-Key': 'test-secret', Accept: 'application/json' });
  });

  test('encodes query parameters and skips undefined ones', async () => {
    const fetchMock = stubFetch(200, '');
    const client = new RestApiClient(BASE_URL, 'test-secret');

    await client.scan('docs', 'notes/a b.md');
    await client.scan('docs');

    expect(requestOf(fetchMock, 0).url).toBe(
      'http://127.0.0.1:8384/rest/db/scan?folder=docs&sub=notes%2Fa+b.md'
    );
    expect(requestOf(fetchMock, 1).url).toBe('http://127.0.0.1:8384/rest/db/scan?folder=docs');
    expect(requestOf(fetchMock, 0).init?.method).toBe('POST');
  });

  test('long-polls events with since and timeout', async () => {
    const fetchMock = stubFetch(200, '[]');
    const client = new RestApiClient(BASE_URL, 'test-secret');

    const events = await client.fetchEvents({ since: 12, timeoutSec: 60 });

    expect(events).toEqual([]);
    expect(requestOf(fetchMock).url).toBe('http://127.0.0.1:8384/rest/events?since=12&timeout=60');
  });

  test('pause and resume address the device', async () => {
    const fetchMock = stubFetch(200, '');
    const client = new RestApiClient(BASE_URL, 'test-secret');

    await client.pauseDevice('DEV1');
    await client.resumeDevice('DEV1');

    expect(requestOf(fetchMock, 0).url).toBe('http://127.0.0.1:8384/rest/system/pause?device=DEV1');
    expect(requestOf(fetchMock, 1).url).toBe(
      'http://127.0.0.1:8384/rest/system/resume?device=DEV1'
    );
  });

  test('non-2xx responses raise ApiError', async () => {
    stubFetch(403, 'CSRF Error\n');
    const client = new RestApiClient(BASE_URL, 'test-secret');

    const error = await client.shutdown().then(
      () => null,
      (err: unknown) => err
    );

    expect(error).toBeInstanceOf(ApiError);
    if (!(error instanceof ApiError)) return;
    expect(error.status).toBe(403);
    expect(error.endpoint).toBe('/rest/system/shutdown');
    expect(error.isUnauthorized).toBe(true);
    expect(error.message).toBe('API error 403 from /rest/system/shutdown: CSRF Error');
  });

  test('invalid JSON raises ApiError', async () => {
    stubFetch(200, '<html>');
    const client = new RestApiClient(BASE_URL, 'test-secret');

    await expect(client.fetchVersion()).rejects.toThrow(
      'API error 200 from /rest/system/version: response was not valid JSON'
    );
  });

  test('an aborted signal cancels the request', async () => {
    stubHangingFetch();
    const client = new RestApiClient(BASE_URL, 'test-secret');
    const abort = new AbortController();

    const pending = client.ping(abort.signal);
    abort.abort(new Error('cancelled'));

    await expect(pending).rejects.toThrow('cancelled');
  });

  test('commands take the caller signal too', async () => {
    stubHangingFetch();
    const client = new RestApiClient(BASE_URL, 'test-secret');
    const abort = new AbortController();

    const pending = client.fetchConfig(abort.signal);
    abort.abort(new Error('service exited'));

    await expect(pending).rejects.toThrow('service exited');
  });

  test('a ping gives up after its own timeout', async () => {
    stubHangingFetch();
    const client = new RestApiClient(BASE_URL, 'test-secret');

    await expect(client.ping(undefined, 20)).rejects.toBeInstanceOf(RequestTimeoutError);
  });
});
