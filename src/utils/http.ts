import { createLogger } from './logger';
import { backoffMs, sleep } from './timing';

const log = createLogger('http');

const BASE_DELAY_MS = 1_000;

export interface RequestOptions {
  timeoutMs: number;
  maxRetries?: number;
  headers?: Record<string, string>;
  baseDelayMs?: number;
}

function shouldRetry(status: number): boolean {
  return status === 429 || (status >= 500 && status < 600);
}

async function requestWithRetry(url: string, init: RequestInit, opts: RequestOptions): Promise<Response> {
  const maxRetries = opts.maxRetries ?? 2;
  const baseDelay = opts.baseDelayMs ?? BASE_DELAY_MS;
  let lastRes: Response | undefined;

  for (let i = 0; i <= maxRetries; i++) {
    lastRes = await fetch(url, { ...init, signal: AbortSignal.timeout(opts.timeoutMs) });
    if (!shouldRetry(lastRes.status)) return lastRes;

    const waitMs = backoffMs(i, baseDelay, lastRes.headers.get('retry-after'));
    log.warn('HTTP error, backing off', {
      method: init.method ?? 'GET',
      host: new URL(url).host,
      status: lastRes.status,
      backoffMs: waitMs,
      attempt: i + 1,
    });
    if (i < maxRetries) await sleep(waitMs);
  }

  if (!lastRes) throw new Error(`No response from ${url}`);
  return lastRes;
}

export function getWithRetry(url: string, opts: RequestOptions): Promise<Response> {
  return requestWithRetry(url, { headers: opts.headers }, opts);
}

export function postWithRetry(url: string, body: unknown, opts: RequestOptions): Promise<Response> {
  return requestWithRetry(
    url,
    {
      method: 'POST',
      headers: { 'Content-Type': 'application/json', ...opts.headers },
      body: JSON.stringify(body),
    },
    opts,
  );
}
