import { afterEach, describe, it, expect, vi } from 'vitest';
import { getWithRetry, postWithRetry } from '../src/utils/http';

function stubFetch(...statuses: Array<{ status: number; headers?: Record<string, string> }>) {
  const fetchMock = vi.fn<(url: string | URL | Request, init?: RequestInit) => Promise<Response>>();
  for (const { status, headers } of statuses) {
    fetchMock.mockImplementationOnce(async () => new Response(`status ${status}`, { status, headers }));
  }
  vi.stubGlobal('fetch', fetchMock);
  return fetchMock;
}

afterEach(() => {
  vi.useRealTimers();
  vi.restoreAllMocks();
  vi.unstubAllGlobals();
});

describe('http retry', () => {
  it('waits out Retry-After on a 429 and returns the next response', async () => {
    vi.useFakeTimers();
    const fetchMock = stubFetch({ status: 429, headers: { 'Retry-After': '1' } }, { status: 200 });

    const pending = getWithRetry('https://api.test/prices', { timeoutMs: 5_000, maxRetries: 2 });
    await vi.advanceTimersByTimeAsync(999);
    expect(fetchMock).toHaveBeenCalledTimes(1);
    await vi.advanceTimersByTimeAsync(1);
    expect(fetchMock).toHaveBeenCalledTimes(2);

    const res = await pending;
    expect(res.status).toBe(200);
  });

  it('backs off exponentially from the base delay without Retry-After', async () => {
    vi.useFakeTimers();
    vi.spyOn(Math, 'random').mockReturnValue(0);
    const fetchMock = stubFetch({ status: 502 }, { status: 503 }, { status: 200 });

    const pending = getWithRetry('https://api.test/prices', { timeoutMs: 5_000, maxRetries: 2, baseDelayMs: 100 });
    await vi.advanceTimersByTimeAsync(100);
    expect(fetchMock).toHaveBeenCalledTimes(2);
    await vi.advanceTimersByTimeAsync(199);
    expect(fetchMock).toHaveBeenCalledTimes(2);
    await vi.advanceTimersByTimeAsync(1);
    expect(fetchMock).toHaveBeenCalledTimes(3);

    expect((await pending).status).toBe(200);
  });

  it('gives up after maxRetries + 1 attempts and returns the last response', async () => {
    const fetchMock = stubFetch({ status: 503 }, { status: 503 }, { status: 503 }, { status: 200 });

    const res = await getWithRetry('https://api.test/prices', { timeoutMs: 5_000, maxRetries: 2, baseDelayMs: 0 });
    expect(res.status).toBe(503);
    expect(await res.text()).toBe('status 503');
    expect(fetchMock).toHaveBeenCalledTimes(3);
  });

  it('returns a client error without retrying', async () => {
    const fetchMock = stubFetch({ status: 400 }, { status: 200 });
    const res = await getWithRetry('https://api.test/prices', { timeoutMs: 5_000, baseDelayMs: 0 });
    expect(res.status).toBe(400);
    expect(fetchMock).toHaveBeenCalledTimes(1);
  });

  it('posts JSON with merged headers', async () => {
    const fetchMock = stubFetch({ status: 200 });
    await postWithRetry('https://api.test/swap', { amount: '10' }, { timeoutMs: 5_000, headers: { 'x-api-key': 'test-key' } });

    const [url, init] = fetchMock.mock.calls[0];
    expect(url).toBe('https://api.test/swap');
    expect(init?.method).toBe('POST');
    expect(init?.headers).toEqual({ 'Content-Type': 'application/json', 'x-api-key': 'test-key' });
    expect(init?.body).toBe('{"amount":"10"}');
    expect(init?.signal).toBeInstanceOf(AbortSignal);
  });
});
