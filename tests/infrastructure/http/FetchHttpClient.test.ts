import { FetchHttpClient } from '../../../src/infrastructure/http/FetchHttpClient';
import { HttpStatusError, HttpTimeoutError, HttpTransportError } from '../../../src/infrastructure/http/HttpErrors';
import { InterruptedError } from '../../../src/domain/errors/InterruptedError';
import { recordingSleep } from '../../test-helpers';

const URL_BASE = 'https://example.com/used-cars/search/-/';

describe('FetchHttpClient', () => {
  let fetchSpy: jest.SpiedFunction<typeof fetch>;

  beforeEach(() => {
    fetchSpy = jest.spyOn(globalThis, 'fetch');
  });

  afterEach(() => {
    fetchSpy.mockRestore();
  });

  function createClient() {
    const { sleep, delays } = recordingSleep();
    const client = new FetchHttpClient({ retries: 3, backoffFactorMs: 1_000 }, sleep);
    return { client, delays };
  }

  it('merges the query into the URL and returns the body', async () => {
    fetchSpy.mockResolvedValueOnce(new Response('<html>ok</html>', { status: 200 }));
    const { client } = createClient();

    const response = await client.get(`${URL_BASE}?sort=price`, {
      headers: { 'Accept-Language': 'en-US,en;q=0.9' },
      query: { page: 4 },
      timeoutMs: 1_000,
    });

    expect(response.status).toBe(200);
    expect(response.body).toBe('<html>ok</html>');
    expect(fetchSpy).toHaveBeenCalledTimes(1);
    expect(fetchSpy.mock.calls[0][0]).toBe(`${URL_BASE}?sort=price&page=4`);
    expect(fetchSpy.mock.calls[0][1]?.headers).toEqual({ 'Accept-Language': 'en-US,en;q=0.9' });
  });

  it('retries retryable statuses with linear backoff', async () => {
    fetchSpy
      .mockResolvedValueOnce(new Response('busy', { status: 503 }))
      .mockResolvedValueOnce(new Response('slow down', { status: 429 }))
      .mockResolvedValueOnce(new Response('done', { status: 200 }));
    const { client, delays } = createClient();

    const response = await client.get(URL_BASE, { timeoutMs: 1_000 });

    expect(response.body).toBe('done');
    expect(fetchSpy).toHaveBeenCalledTimes(3);
    expect(delays).toEqual([1_000, 2_000]);
  });

  it('throws once the status retries are exhausted', async () => {
    fetchSpy.mockImplementation(async () => new Response('down', { status: 502 }));
    const { client, delays } = createClient();

    const error = await client.get(URL_BASE, { timeoutMs: 1_000 }).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(HttpStatusError);
    expect(error).toMatchObject({ status: 502, retriesExhausted: true });
    expect(fetchSpy).toHaveBeenCalledTimes(4);
    expect(delays).toEqual([1_000, 2_000, 3_000]);
  });

  it('throws immediately on a non-retryable status', async () => {
    fetchSpy.mockResolvedValueOnce(new Response('missing', { status: 404 }));
    const { client, delays } = createClient();

    const error = await client.get(URL_BASE, { timeoutMs: 1_000 }).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(HttpStatusError);
    expect(error).toMatchObject({ status: 404, retriesExhausted: false, message: 'HTTP 404' });
    expect(fetchSpy).toHaveBeenCalledTimes(1);
    expect(delays).toEqual([]);
  });

  it('wraps network failures as transport errors', async () => {
    fetchSpy.mockRejectedValueOnce(new TypeError('fetch failed', { cause: new Error('getaddrinfo ENOTFOUND example.com') }));
    const { client } = createClient();

    const error = await client.get(URL_BASE, { timeoutMs: 1_000 }).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(HttpTransportError);
    expect(error).toMatchObject({ message: 'Request failed: fetch failed (getaddrinfo ENOTFOUND example.com)' });
  });

  it('reports a request that outlives its timeout', async () => {
    fetchSpy.mockImplementation(
      (_input, init) =>
        new Promise<Response>((_resolve, reject) => {
          init?.signal?.addEventListener('abort', () => reject(new Error('This operation was aborted')));
        })
    );
    const { client } = createClient();

    const error = await client.get(URL_BASE, { timeoutMs: 20 }).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(HttpTimeoutError);
    expect(error).toMatchObject({ timeoutMs: 20, message: 'Request timed out after 20ms' });
  });

  it('reports an aborted run as an interruption', async () => {
    const controller = new AbortController();
    fetchSpy.mockImplementation(
      (_input, init) =>
        new Promise<Response>((_resolve, reject) => {
          init?.signal?.addEventListener('abort', () => reject(new Error('This operation was aborted')));
          controller.abort();
        })
    );
    const { client } = createClient();

    const error = await client.get(URL_BASE, { timeoutMs: 60_000, signal: controller.signal }).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(InterruptedError);
  });
});
