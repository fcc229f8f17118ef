import { describe, expect, it } from 'vitest';
import { GroundworkClient } from '../../src/client.js';
import { GroundworkServerError } from '../../src/errors.js';
import { createFetchMock, jsonResponse, requestHeaders } from '../fixtures/fetch.js';

const emptyList = { data: [], meta: { limit: 20, offset: 0, count: 0 } };

describe('GroundworkClient', () => {
  it('requires a non-empty token', () => {
    expect(() => {
      new GroundworkClient({ token: ' ', baseUrl: 'https://chat.example.test' });
    }).toThrow('GroundworkClient requires a non-empty token');
  });

  it('requires a base url', () => {
    expect(() => {
      new GroundworkClient({ token: 'test-token', baseUrl: '' });
    }).toThrow('GroundworkClient requires a baseUrl');
  });

  it('sends the token as a bearer authorization header', async () => {
    const { fetchMock, requests } = createFetchMock(() => jsonResponse(emptyList));
    const client = new GroundworkClient({
      token: 'test-token',
      baseUrl: 'https://chat.example.test',
      fetch: fetchMock,
    });

    await client.listSessions();

    expect(requests).toHaveLength(1);
    expect(requestHeaders(requests[0]).get('authorization')).toBe('Bearer test-token');
  });

  it('lets default headers replace the authorization header', async () => {
    const { fetchMock, requests } = createFetchMock(() => jsonResponse(emptyList));
    const client = new GroundworkClient({
      token: 'test-token',
      baseUrl: 'https://chat.example.test',
      fetch: fetchMock,
      defaultHeaders: { Authorization: 'Bearer other-token', 'x-test-user-id': 'user-1' },
    });

    await client.listSessions();

    const headers = requestHeaders(requests[0]);
    expect(headers.get('authorization')).toBe('Bearer other-token');
    expect(headers.get('x-test-user-id')).toBe('user-1');
  });

  it('strips trailing slashes from the base url', async () => {
    const { fetchMock, requests } = createFetchMock(() => jsonResponse(emptyList));
    const client = new GroundworkClient({
      token: 'test-token',
      baseUrl: 'https://chat.example.test/api//',
      fetch: fetchMock,
    });

    await client.listSessions();

    expect(requests[0].url).toBe('https://chat.example.test/api/sessions');
  });

  it('reports a timeout when the request outlives timeoutMs', async () => {
    const fetchMock: typeof globalThis.fetch = (_input, init) =>
      new Promise((_resolve, reject) => {
        init?.signal?.addEventListener('abort', () => {
          reject(new DOMException('The operation was aborted.', 'AbortError'));
        });
      });
    const client = new GroundworkClient({
      token: 'test-token',
      baseUrl: 'https://chat.example.test',
      fetch: fetchMock,
      timeoutMs: 5,
    });

    const error = await client.listSessions().catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(GroundworkServerError);
    if (!(error instanceof GroundworkServerError)) return;
    expect(error.code).toBe('TIMEOUT');
    expect(error.status).toBe(408);
    expect(error.message).toBe('Request timed out after 5ms');
  });

  it('reports an abort from the caller signal', async () => {
    const fetchMock: typeof globalThis.fetch = (_input, init) =>
      new Promise((_resolve, reject) => {
        if (init?.signal?.aborted) {
          reject(new DOMException('The operation was aborted.', 'AbortError'));
        }
      });
    const client = new GroundworkClient({
      token: 'test-token',
      baseUrl: 'https://chat.example.test',
      fetch: fetchMock,
    });
    const controller = new AbortController();
    controller.abort();

    const error = await client
      .chat({ message: 'hello', signal: controller.signal })
      .catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(GroundworkServerError);
    if (!(error instanceof GroundworkServerError)) return;
    expect(error.code).toBe('ABORTED');
  });

  it('rejects a non-JSON success body', async () => {
    const { fetchMock } = createFetchMock(() => new Response('ok', { status: 200 }));
    const client = new GroundworkClient({
      token: 'test-token',
      baseUrl: 'https://chat.example.test',
      fetch: fetchMock,
    });

    await expect(client.listSessions()).rejects.toMatchObject({
      code: 'INVALID_RESPONSE',
      message: 'Groundwork API returned a non-JSON body',
    });
  });
});
