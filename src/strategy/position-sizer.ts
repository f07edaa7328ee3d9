import type { TradingPolicy } from './trading-policy';
import type { TradeSignal } from './types';

/**
 * Trade size in SOL: the smallest of the signal's suggestion, the risk share of the
 * wallet and the per-trade cap. Zero means "do not trade".
 */
export function sizePosition(
  signal: TradeSignal,
  walletBalance: number | null | undefined,
  policy: Pick<TradingPolicy, 'riskFraction' | 'maxTradeAmount'>,
): number {
  if (walletBalance === null || walletBalance === undefined) return 0;
  if (!Number.isFinite(walletBalance) || walletBalance <= 0) return 0;

  const amount = Math.min(
    signal.suggestedAmount,
    walletBalance * policy.riskFraction,
    policy.maxTradeAmount,
  );
  return Number.isFinite(amount) ? Math.max(0, amount) : 0;
}
