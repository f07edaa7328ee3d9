import type { TradingPolicy } from './trading-policy';
import type { Admission, TradeSignal } from './types';

export const DAY_MS = 24 * 60 * 60_000;

/**
 * Trades executed in the current 24h window. The window resets lazily on read
 * once it is a full day old; there is no timer.
 */
export class DailyTradeCounter {
  private _count: number;
  private _windowStartedAt: number;

  constructor(now: number, count = 0) {
    this._count = count;
    this._windowStartedAt = now;
  }

  private roll(now: number) {
    if (now - this._windowStartedAt >= DAY_MS) {
      this._count = 0;
      this._windowStartedAt = now;
    }
  }

  count(now: number): number {
    this.roll(now);
    return this._count;
  }

  windowStartedAt(now: number): number {
    this.roll(now);
    return this._windowStartedAt;
  }

  increment(now: number): number {
    this.roll(now);
    return ++this._count;
  }
}

export function admit(
  signal: TradeSignal,
  policy: TradingPolicy,
  counter: DailyTradeCounter,
  now: number,
): Admission {
  if (!policy.tradingEnabled) {
    return { accepted: false, reason: 'trading-disabled' };
  }

  if (counter.count(now) >= policy.maxDailyTrades) {
    return { accepted: false, reason: 'daily-limit' };
  }

  if (signal.confidence < policy.minConfidence) {
    return { accepted: false, reason: 'low-confidence' };
  }

  return { accepted: true };
}
