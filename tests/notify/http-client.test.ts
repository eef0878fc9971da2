import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { HttpClient, HttpClientError } from '../../src/notify/http-client.js';

describe('HttpClient', () => {
  let originalFetch: typeof globalThis.fetch;

  beforeEach(() => {
    originalFetch = globalThis.fetch;
  });

  afterEach(() => {
    globalThis.fetch = originalFetch;
  });

  function mockFetch(status: number, body: string, ok = true) {
    const fetchMock = vi.fn().mockResolvedValue({
      ok,
      status,
      statusText: ok ? 'OK' : 'Bad Gateway',
      text: () => Promise.resolve(body),
    });
    globalThis.fetch = fetchMock;
    return fetchMock;
  }

  it('posts JSON with a bearer token', async () => {
    const fetchMock = mockFetch(202, 'queued');
    const client = new HttpClient({ token: 'test-token' });

    const response = await client.postJson('https://hooks.example.test/notify', { to: 'ops@example.com' });

    expect(response).toEqual({ status: 202, body: 'queued' });
    expect(fetchMock).toHaveBeenCalledWith(
      'https://hooks.example.test/notify',
      expect.objectContaining({
        method: 'POST',
        body: JSON.stringify({ to: 'ops@example.com' }),
        headers: { 'Content-Type': 'application/json', Authorization: 'Bearer test-token' },
      }),
    );
  });

  it('omits the authorization header without a token', async () => {
    const fetchMock = mockFetch(200, '');
    await new HttpClient().postJson('https://hooks.example.test/notify', {});

    expect(fetchMock.mock.calls[0]?.[1]).toMatchObject({ headers: { 'Content-Type': 'application/json' } });
  });

  it('throws HttpClientError with the status on a non-ok response', async () => {
    mockFetch(502, 'upstream down', false);
    const client = new HttpClient();

    await expect(client.postJson('https://hooks.example.test/notify', {})).rejects.toMatchObject({
      name: 'HttpClientError',
      status: 502,
      message: 'HTTP 502: Bad Gateway',
    });
  });

  it('wraps network failures', async () => {
    globalThis.fetch = vi.fn().mockRejectedValue(new Error('ECONNREFUSED'));

    const error = await new HttpClient().postJson('https://hooks.example.test/notify', {}).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(HttpClientError);
    expect(error).toMatchObject({ status: 0, message: 'ECONNREFUSED' });
  });

  it('reports an aborted request as a timeout', async () => {
    const abort = new Error('This operation was aborted');
    abort.name = 'AbortError';
    globalThis.fetch = vi.fn().mockRejectedValue(abort);

    await expect(new HttpClient({ defaultTimeoutMs: 50 }).postJson('https://hooks.example.test/notify', {})).rejects.toThrow(
      'Request timed out after 50ms',
    );
  });
});
