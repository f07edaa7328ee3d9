import { TimeoutError } from './errors';

export function sleep(ms: number): Promise<void> {
  return new Promise(r => setTimeout(r, ms));
}

export function withTimeout<T>(promise: Promise<T>, ms: number, label: string): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(new TimeoutError(label, ms)), ms);
  });
  return Promise.race([promise, timeout]).finally(() => clearTimeout(timer));
}

const MAX_BACKOFF_MS = 30_000;

// Exponential backoff with jitter; Retry-After (seconds) takes precedence when present
export function backoffMs(attempt: number, baseMs: number, retryAfterHeader?: string | null): number {
  if (retryAfterHeader) {
    const sec = parseInt(retryAfterHeader, 10);
    if (!isNaN(sec) && sec > 0) return Math.min(sec * 1000, MAX_BACKOFF_MS);
  }
  const exp = baseMs * Math.pow(2, attempt);
  return Math.min(exp, MAX_BACKOFF_MS) + Math.floor(Math.random() * Math.min(500, baseMs));
}
