import type { MarketSnapshot, SentimentScore } from '../analysis/types';
import type { TradeAction, TradeSignal } from './types';

export const BASE_CONFIDENCE = 0.5;
export const MOMENTUM_THRESHOLD_PCT = 5;
export const POSITIVE_SENTIMENT = 0.7;
export const NEGATIVE_SENTIMENT = 0.3;
export const FACTOR_WEIGHT = 0.2;
export const EMIT_THRESHOLD = 0.6;

export interface SignalOptions {
  suggestedAmount: number;
  now: number;
}

// 0.7 + 0.2 is 0.8999999999999999 in floating point; keep two decimals, capped at 1
function roundConfidence(value: number): number {
  return Math.min(1, Math.round(value * 100) / 100);
}

/**
 * Directional signal for one symbol, or null when there is no call (HOLD).
 * Only 24h momentum sets the direction; sentiment at either extreme adds conviction.
 */
export function evaluateSymbol(
  snapshot: MarketSnapshot,
  sentiment: SentimentScore | undefined,
  opts: SignalOptions,
): TradeSignal | null {
  let confidence = BASE_CONFIDENCE;
  let action: TradeAction | null = null;
  const reasoning: string[] = [];

  if (snapshot.priceChange24h > MOMENTUM_THRESHOLD_PCT) {
    confidence += FACTOR_WEIGHT;
    action = 'BUY';
    reasoning.push(`Strong 24h gain: ${snapshot.priceChange24h.toFixed(2)}%`);
  } else if (snapshot.priceChange24h < -MOMENTUM_THRESHOLD_PCT) {
    confidence += FACTOR_WEIGHT;
    action = 'SELL';
    reasoning.push(`Strong 24h loss: ${snapshot.priceChange24h.toFixed(2)}%`);
  }

  if (sentiment) {
    if (sentiment.score > POSITIVE_SENTIMENT) {
      confidence += FACTOR_WEIGHT;
      reasoning.push(`Positive sentiment: ${sentiment.score.toFixed(2)}`);
    } else if (sentiment.score < NEGATIVE_SENTIMENT) {
      confidence += FACTOR_WEIGHT;
      reasoning.push(`Negative sentiment: ${sentiment.score.toFixed(2)}`);
    }
  }

  confidence = roundConfidence(confidence);
  if (action === null || confidence <= EMIT_THRESHOLD) return null;

  return {
    symbol: snapshot.symbol,
    action,
    confidence,
    reasoning,
    suggestedAmount: opts.suggestedAmount,
    createdAt: opts.now,
  };
}

export function generateSignals(
  snapshots: readonly MarketSnapshot[],
  sentiment: readonly SentimentScore[],
  opts: SignalOptions,
): TradeSignal[] {
  const bySymbol = new Map(sentiment.map(s => [s.symbol, s]));
  const signals: TradeSignal[] = [];
  for (const snapshot of snapshots) {
    const signal = evaluateSymbol(snapshot, bySymbol.get(snapshot.symbol), opts);
    if (signal) signals.push(signal);
  }
  return signals;
}
