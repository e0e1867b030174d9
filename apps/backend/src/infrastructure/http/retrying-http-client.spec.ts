import { Logger } from '@nestjs/common';
import { RetryingHttpClient, RetryPolicy } from './retrying-http-client';
import { FetchFn, SleepFn } from './http.tokens';

describe('RetryingHttpClient', () => {
  const policy: RetryPolicy = {
    maxRetries: 3,
    backoffFactorMs: 1000,
    retryStatuses: [502, 503, 504],
  };

  let fetchFn: jest.MockedFunction<FetchFn>;
  let sleep: jest.MockedFunction<SleepFn>;
  let client: RetryingHttpClient;

  const status = (code: number) => new Response(`status ${code}`, { status: code });

  beforeEach(() => {
    fetchFn = jest.fn<ReturnType<FetchFn>, Parameters<FetchFn>>();
    sleep = jest.fn<ReturnType<SleepFn>, Parameters<SleepFn>>().mockResolvedValue(undefined);
    client = new RetryingHttpClient(fetchFn, sleep, policy);

    jest.spyOn(Logger.prototype, 'warn').mockImplementation();
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('should return the first response when it is not retryable', async () => {
    fetchFn.mockResolvedValueOnce(status(200));

    const response = await client.request('https://api.test/a', { timeoutMs: 1000 });

    expect(response.status).toBe(200);
    expect(fetchFn).toHaveBeenCalledTimes(1);
    expect(sleep).not.toHaveBeenCalled();
  });

  it('should pass method, headers and body through to fetch', async () => {
    fetchFn.mockResolvedValueOnce(status(200));

    await client.request('https://api.test/a', {
      method: 'POST',
      headers: { 'X-Test': '1' },
      body: 'payload',
      timeoutMs: 1000,
    });

    const [url, init] = fetchFn.mock.calls[0];
    expect(url).toBe('https://api.test/a');
    expect(init).toMatchObject({
      method: 'POST',
      headers: { 'X-Test': '1' },
      body: 'payload',
    });
    expect(init?.signal).toBeInstanceOf(AbortSignal);
  });

  it.each([502, 503, 504])('should retry a %i response', async (code) => {
    fetchFn.mockResolvedValueOnce(status(code)).mockResolvedValueOnce(status(200));

    const response = await client.request('https://api.test/a', { timeoutMs: 1000 });

    expect(response.status).toBe(200);
    expect(fetchFn).toHaveBeenCalledTimes(2);
    expect(sleep).toHaveBeenCalledWith(1000);
  });

  it.each([400, 404, 429, 500])('should not retry a %i response', async (code) => {
    fetchFn.mockResolvedValueOnce(status(code));

    const response = await client.request('https://api.test/a', { timeoutMs: 1000 });

    expect(response.status).toBe(code);
    expect(fetchFn).toHaveBeenCalledTimes(1);
  });

  it('should back off exponentially and return the last response when retries run out', async () => {
    fetchFn.mockImplementation(async () => status(503));

    const response = await client.request('https://api.test/a', { timeoutMs: 1000 });

    expect(response.status).toBe(503);
    expect(fetchFn).toHaveBeenCalledTimes(4);
    expect(sleep.mock.calls).toEqual([[1000], [2000], [4000]]);
  });

  it('should retry connection failures', async () => {
    fetchFn
      .mockRejectedValueOnce(new TypeError('fetch failed'))
      .mockResolvedValueOnce(status(200));

    const response = await client.request('https://api.test/a', { timeoutMs: 1000 });

    expect(response.status).toBe(200);
    expect(sleep).toHaveBeenCalledWith(1000);
  });

  it('should rethrow a connection failure once retries run out', async () => {
    fetchFn.mockRejectedValue(new TypeError('fetch failed'));

    await expect(
      client.request('https://api.test/a', { timeoutMs: 1000 }),
    ).rejects.toThrow('fetch failed');
    expect(fetchFn).toHaveBeenCalledTimes(4);
  });

  it('should not retry errors other than connection failures', async () => {
    const timeout = new Error('The operation was aborted due to timeout');
    timeout.name = 'TimeoutError';
    fetchFn.mockRejectedValueOnce(timeout);

    await expect(
      client.request('https://api.test/a', { timeoutMs: 1000 }),
    ).rejects.toBe(timeout);
    expect(fetchFn).toHaveBeenCalledTimes(1);
    expect(sleep).not.toHaveBeenCalled();
  });

  it('should honour a policy without retries', async () => {
    client = new RetryingHttpClient(fetchFn, sleep, { ...policy, maxRetries: 0 });
    fetchFn.mockResolvedValueOnce(status(503));

    const response = await client.request('https://api.test/a', { timeoutMs: 1000 });

    expect(response.status).toBe(503);
    expect(fetchFn).toHaveBeenCalledTimes(1);
  });

  it('should not treat an invalid timeout as a connection failure', async () => {
    await expect(
      client.request('https://api.test/a', { timeoutMs: Number.NaN }),
    ).rejects.toBeInstanceOf(TypeError);

    expect(fetchFn).not.toHaveBeenCalled();
    expect(sleep).not.toHaveBeenCalled();
  });

  it('should compute the backoff delay from the factor', () => {
    client = new RetryingHttpClient(fetchFn, sleep, { ...policy, backoffFactorMs: 250 });

    expect([1, 2, 3].map((n) => client.backoffDelay(n))).toEqual([250, 500, 1000]);
  });
});
