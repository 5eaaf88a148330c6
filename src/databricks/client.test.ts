import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { DatabricksClient } from './client.js';
import { DatabricksApiError, DatabricksTransportError } from './errors.js';

const fetchMock = vi.fn<typeof fetch>();

function jsonResponse(body: unknown, init: ResponseInit = {}): Response {
  return new Response(JSON.stringify(body), {
    status: 200,
    headers: { 'Content-Type': 'application/json' },
    ...init,
  });
}

function requestedUrl(call = 0): URL {
  return new URL(String(fetchMock.mock.calls[call]?.[0]));
}

function requestInit(call = 0): RequestInit {
  return fetchMock.mock.calls[call]?.[1] ?? {};
}

describe('DatabricksClient', () => {
  const client = new DatabricksClient({
    host: 'dbc-test.cloud.databricks.com/',
    token: 'test-token',
    requestTimeoutMs: 1000,
  });

  beforeEach(() => {
    fetchMock.mockReset();
    vi.stubGlobal('fetch', fetchMock);
  });

  afterEach(() => {
    vi.unstubAllGlobals();
    vi.useRealTimers();
  });

  it('normalizes the host to an https base URL', () => {
    expect(client.host).toBe('https://dbc-test.cloud.databricks.com/');
    expect(new DatabricksClient({ host: 'http://localhost:8080', token: 't' }).host).toBe(
      'http://localhost:8080/'
    );
  });

  it('sends GET requests with bearer auth and a query string', async () => {
    fetchMock.mockResolvedValue(jsonResponse({ clusters: [] }));

    const body = await client.get('/api/2.1/clusters/list', {
      query: { page_size: 50, page_token: undefined, filter: '', state: ['RUNNING', 'PENDING'] },
    });

    expect(body).toEqual({ clusters: [] });
    const url = requestedUrl();
    expect(url.pathname).toBe('/api/2.1/clusters/list');
    expect(url.searchParams.get('page_size')).toBe('50');
    expect(url.searchParams.has('page_token')).toBe(false);
    expect(url.searchParams.has('filter')).toBe(false);
    expect(url.searchParams.getAll('state')).toEqual(['RUNNING', 'PENDING']);

    const init = requestInit();
    expect(init.method).toBe('GET');
    expect(init.headers).toMatchObject({ Authorization: 'Bearer test-token' });
    expect(init.body).toBeUndefined();
  });

  it('sends POST bodies as JSON', async () => {
    fetchMock.mockResolvedValue(jsonResponse({}));

    await client.post('/api/2.1/clusters/start', { cluster_id: 'c-1' });

    const init = requestInit();
    expect(init.method).toBe('POST');
    expect(init.body).toBe('{"cluster_id":"c-1"}');
    expect(init.headers).toMatchObject({ 'Content-Type': 'application/json' });
  });

  it('returns an empty object for an empty body', async () => {
    fetchMock.mockResolvedValue(new Response('', { status: 200 }));

    await expect(client.post('/api/2.1/clusters/delete', { cluster_id: 'c-1' })).resolves.toEqual({});
  });

  it('throws DatabricksApiError with the remote error code and Retry-After', async () => {
    fetchMock.mockResolvedValue(
      jsonResponse(
        { error_code: 'REQUEST_LIMIT_EXCEEDED', message: 'Too many requests' },
        { status: 429, headers: { 'Retry-After': '7' } }
      )
    );

    const error = await client.get('/api/2.1/jobs/list').catch((e: unknown) => e);

    expect(error).toBeInstanceOf(DatabricksApiError);
    expect(error).toMatchObject({
      status: 429,
      errorCode: 'REQUEST_LIMIT_EXCEEDED',
      message: 'Too many requests',
      retryAfterMs: 7000,
      method: 'GET',
      path: '/api/2.1/jobs/list',
    });
  });

  it('wraps connection failures in DatabricksTransportError with the system code', async () => {
    fetchMock.mockRejectedValue(
      new TypeError('fetch failed', {
        cause: Object.assign(new Error('connect ECONNREFUSED'), { code: 'ECONNREFUSED' }),
      })
    );

    const error = await client.get('/api/2.1/clusters/list').catch((e: unknown) => e);

    expect(error).toBeInstanceOf(DatabricksTransportError);
    expect(error).toMatchObject({ code: 'ECONNREFUSED' });
  });

  it('aborts requests that exceed the per-request timeout', async () => {
    vi.useFakeTimers();
    fetchMock.mockImplementation(
      (_url, init) =>
        new Promise<Response>((_resolve, reject) => {
          init?.signal?.addEventListener('abort', () => {
            reject(Object.assign(new Error('aborted'), { name: 'AbortError' }));
          });
        })
    );

    const pending = client.get('/api/2.0/sql/warehouses').catch((e: unknown) => e);
    await vi.advanceTimersByTimeAsync(1000);
    const error = await pending;

    expect(error).toBeInstanceOf(DatabricksTransportError);
    expect(error).toMatchObject({
      code: 'ETIMEDOUT',
      message: 'Request timeout after 1000ms: GET /api/2.0/sql/warehouses',
    });
  });

  it('rethrows the abort untouched when the caller cancels', async () => {
    const controller = new AbortController();
    const abortError = Object.assign(new Error('aborted'), { name: 'AbortError' });
    fetchMock.mockImplementation(
      (_url, init) =>
        new Promise<Response>((_resolve, reject) => {
          init?.signal?.addEventListener('abort', () => {
            reject(abortError);
          });
        })
    );

    const pending = client.get('/api/2.1/jobs/list', { signal: controller.signal }).catch((e: unknown) => e);
    controller.abort();

    expect(await pending).toBe(abortError);
  });

  describe('accountPath', () => {
    it('prefixes the account id', () => {
      const account = new DatabricksClient({
        host: 'https://accounts.cloud.databricks.com',
        token: 't',
        accountId: 'acct-1',
      });
      expect(account.accountPath('/workspaces')).toBe('/api/2.0/accounts/acct-1/workspaces');
    });

    it('throws a BadRequestError without an account id', () => {
      let thrown: unknown;
      try {
        client.accountPath('/workspaces');
      } catch (e) {
        thrown = e;
      }
      expect(thrown).toMatchObject({ kind: 'BadRequestError' });
    });
  });
});
