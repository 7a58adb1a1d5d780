import { getEventListeners } from 'node:events';
import { fetch, Headers, Response } from 'undici';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { AbortError } from '../error/abortError.js';
import { ConnectionError } from '../error/connectionError.js';
import { TimeoutError } from '../error/timeoutError.js';
import { FetchClient } from './client.js';

vi.mock('undici', async (importOriginal) => {
  const actual = await importOriginal<typeof import('undici')>();
  return { ...actual, fetch: vi.fn() };
});

const mockedFetch = vi.mocked(fetch);

/** Returns the init object passed to the nth fetch call. */
function requestInit(call = 0) {
  const init = mockedFetch.mock.calls[call]?.[1];
  if (!init) {
    throw new Error(`fetch call ${call} has no init`);
  }

  return init;
}

/** Returns the headers passed to the nth fetch call. */
function requestHeaders(call = 0): Headers {
  const { headers } = requestInit(call);
  if (!(headers instanceof Headers)) {
    throw new Error('expected a Headers instance');
  }

  return headers;
}

describe('FetchClient', () => {
  let client: FetchClient;

  beforeEach(() => {
    mockedFetch.mockReset();
    client = new FetchClient('https://adc.test', {
      headers: { 'Content-Type': 'application/json', Accept: 'application/json' },
      timeout: false,
    });
  });

  afterEach(async () => {
    await client.close();
  });

  describe('GET', () => {
    it('requests the joined URL with default headers and query params', async () => {
      const ok = new Response('{"payload":[]}', { status: 200 });
      mockedFetch.mockResolvedValueOnce(ok);

      const [err, response] = await client.get('/api/load_balance_pool', { params: { vdom: 'root', pkey: null } });

      expect(err).toBeNull();
      expect(response).toBe(ok);
      expect(mockedFetch).toHaveBeenCalledTimes(1);
      expect(mockedFetch.mock.calls[0]?.[0]).toBe('https://adc.test/api/load_balance_pool?vdom=root');
      expect(requestInit().method).toBe('GET');
      expect(requestInit().body).toBeUndefined();
      expect(requestHeaders().get('accept')).toBe('application/json');
      expect(requestHeaders().get('content-type')).toBe('application/json');
    });

    it('returns non-2xx responses without turning them into errors', async () => {
      mockedFetch.mockResolvedValueOnce(new Response(null, { status: 404 }));

      const [err, response] = await client.get('/api/missing');

      expect(err).toBeNull();
      expect(response?.status).toBe(404);
    });
  });

  describe('POST/PUT/DELETE', () => {
    it('sends the body as given on POST', async () => {
      mockedFetch.mockResolvedValueOnce(new Response('{}', { status: 200 }));

      await client.post('/api/user/login', { body: '{"username":"admin"}' });

      expect(requestInit().method).toBe('POST');
      expect(requestInit().body).toBe('{"username":"admin"}');
    });

    it('sends the body as given on PUT', async () => {
      mockedFetch.mockResolvedValueOnce(new Response('{}', { status: 200 }));

      await client.put('/api/x', { params: { mkey: 'vs1' }, body: '{"status":"enable"}' });

      expect(mockedFetch.mock.calls[0]?.[0]).toBe('https://adc.test/api/x?mkey=vs1');
      expect(requestInit().method).toBe('PUT');
      expect(requestInit().body).toBe('{"status":"enable"}');
    });

    it('never sends a body on DELETE', async () => {
      mockedFetch.mockResolvedValueOnce(new Response('{}', { status: 200 }));

      await client.delete('/api/x', { params: { mkey: 'vs1' } });

      expect(requestInit().method).toBe('DELETE');
      expect(requestInit().body).toBeUndefined();
    });
  });

  describe('config', () => {
    it('adds headers to every later request', async () => {
      mockedFetch.mockResolvedValue(new Response('{}', { status: 200 }));

      await client.get('/api/a');
      client.config({ headers: { Authorization: 'Bearer test-token' } });
      await client.get('/api/b');

      expect(requestHeaders(0).has('authorization')).toBe(false);
      expect(requestHeaders(1).get('authorization')).toBe('Bearer test-token');
      expect(requestHeaders(1).get('accept')).toBe('application/json');
    });

    it('removes headers set to null', async () => {
      mockedFetch.mockResolvedValue(new Response('{}', { status: 200 }));

      client.config({ headers: { Authorization: 'Bearer test-token' } });
      client.config({ headers: { Authorization: null } });
      await client.get('/api/a');

      expect(requestHeaders().has('authorization')).toBe(false);
    });

    it('lets per-request headers override defaults', async () => {
      mockedFetch.mockResolvedValueOnce(new Response('{}', { status: 200 }));

      await client.get('/api/a', { headers: { Accept: 'text/plain' } });

      expect(requestHeaders().get('accept')).toBe('text/plain');
    });
  });

  describe('transport failures', () => {
    it('wraps fetch rejections in a ConnectionError', async () => {
      const cause = new TypeError('fetch failed');
      mockedFetch.mockRejectedValueOnce(cause);

      const [err, response] = await client.get('/api/user/login');

      expect(response).toBeNull();
      expect(err).toBeInstanceOf(ConnectionError);
      expect(err?.message).toBe('error connecting to https://adc.test/api/user/login');
      expect(err?.cause).toBe(cause);
    });

    it('keeps timeouts apart from connection errors', async () => {
      const timeout = new TimeoutError(10);
      mockedFetch.mockRejectedValueOnce(timeout);

      const [err] = await client.get('/api/slow');

      expect(err).not.toBeInstanceOf(ConnectionError);
      expect(err?.message).toBe('error GET request to https://adc.test/api/slow aborted');
      expect(err?.cause).toBe(timeout);
    });

    it('aborts in-flight requests when the session is closed', async () => {
      mockedFetch.mockImplementationOnce(
        (_url, init) =>
          new Promise((_resolve, reject) => {
            init?.signal?.addEventListener('abort', () => reject(init.signal?.reason), { once: true });
          }),
      );

      const pending = client.get('/api/slow');
      await client.close();
      const [err, response] = await pending;

      expect(response).toBeNull();
      expect(err?.message).toBe('error GET request to https://adc.test/api/slow aborted');
      expect(err?.cause).toBeInstanceOf(AbortError);
    });

    it('leaves no abort listeners behind once requests settle', async () => {
      const addListener = vi.spyOn(EventTarget.prototype, 'addEventListener');
      client.config({ timeout: 5_000 });
      mockedFetch.mockImplementation(async () => new Response('{}', { status: 200 }));

      for (let i = 0; i < 25; i += 1) {
        await client.get('/api/a');
      }

      const targets = new Set(
        addListener.mock.contexts.filter((target): target is AbortSignal => target instanceof AbortSignal),
      );
      addListener.mockRestore();

      expect(targets.size).toBeGreaterThan(0);
      for (const target of targets) {
        expect(getEventListeners(target, 'abort')).toHaveLength(0);
      }
    });

    it('passes a timeout signal when a timeout is configured', async () => {
      client.config({ timeout: 5_000 });
      mockedFetch.mockResolvedValueOnce(new Response('{}', { status: 200 }));

      await client.get('/api/a');

      expect(requestInit().signal).toBeDefined();
      expect(requestInit().signal).not.toBeNull();
    });
  });

  describe('close', () => {
    it('can be called more than once', async () => {
      await client.close();
      await expect(client.close()).resolves.toBeUndefined();
    });
  });
});
