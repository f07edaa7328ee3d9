import { describe, it, expect } from 'vitest';
import { evaluateSymbol, generateSignals } from '../src/strategy/signal-generator';
import type { MarketSnapshot, SentimentScore } from '../src/analysis/types';

const NOW = 1_700_000_000_000;
const opts = { suggestedAmount: 0.01, now: NOW };

function snap(symbol: string, priceChange24h: number, price = 110): MarketSnapshot {
  return { symbol, price, volume: 1_000_000, priceChange24h, capturedAt: NOW };
}

function sentiment(symbol: string, score: number): SentimentScore {
  return { symbol, score, capturedAt: NOW };
}

describe('signal generator', () => {
  it('emits a BUY at 0.7 on +6% momentum without sentiment', () => {
    const [signal] = generateSignals([snap('SOL', 6)], [], opts);
    expect(signal).toEqual({
      symbol: 'SOL',
      action: 'BUY',
      confidence: 0.7,
      reasoning: ['Strong 24h gain: 6.00%'],
      suggestedAmount: 0.01,
      createdAt: NOW,
    });
  });

  it('stacks momentum and positive sentiment to exactly 0.9', () => {
    const [signal] = generateSignals([snap('SOL', 6)], [sentiment('SOL', 0.8)], opts);
    expect(signal.confidence).toBe(0.9);
    expect(signal.reasoning).toEqual(['Strong 24h gain: 6.00%', 'Positive sentiment: 0.80']);
  });

  it('emits a SELL on a drop, negative sentiment adds conviction', () => {
    const signal = evaluateSymbol(snap('JUP', -7.5), sentiment('JUP', 0.1), opts);
    expect(signal?.action).toBe('SELL');
    expect(signal?.confidence).toBe(0.9);
    expect(signal?.reasoning).toEqual(['Strong 24h loss: -7.50%', 'Negative sentiment: 0.10']);
  });

  it('sentiment alone never sets a direction', () => {
    expect(evaluateSymbol(snap('SOL', 2), sentiment('SOL', 0.95), opts)).toBeNull();
    expect(evaluateSymbol(snap('SOL', -1), sentiment('SOL', 0.05), opts)).toBeNull();
  });

  it('treats exactly +/-5% as no momentum', () => {
    expect(evaluateSymbol(snap('SOL', 5), undefined, opts)).toBeNull();
    expect(evaluateSymbol(snap('SOL', -5), undefined, opts)).toBeNull();
  });

  it('ignores sentiment between the thresholds', () => {
    const signal = evaluateSymbol(snap('BONK', 10), sentiment('BONK', 0.5), opts);
    expect(signal?.confidence).toBe(0.7);
    expect(signal?.reasoning).toHaveLength(1);
  });

  it('matches sentiment to snapshots by symbol', () => {
    const signals = generateSignals(
      [snap('SOL', 6), snap('JUP', 8), snap('JTO', 0)],
      [sentiment('JUP', 0.9)],
      opts,
    );
    expect(signals.map(s => [s.symbol, s.confidence])).toEqual([['SOL', 0.7], ['JUP', 0.9]]);
  });

  it('every emitted signal has a direction and confidence >= 0.5', () => {
    const changes = [-20, -6, -5, -1, 0, 3, 5, 5.01, 12];
    const scores = [0, 0.2, 0.3, 0.5, 0.7, 0.71, 1];
    for (const change of changes) {
      for (const score of scores) {
        const signal = evaluateSymbol(snap('SOL', change), sentiment('SOL', score), opts);
        if (!signal) continue;
        expect(['BUY', 'SELL']).toContain(signal.action);
        expect(signal.confidence).toBeGreaterThanOrEqual(0.5);
        expect(signal.confidence).toBeLessThanOrEqual(1);
      }
    }
  });

  it('is deterministic for identical inputs', () => {
    const a = generateSignals([snap('SOL', 6)], [sentiment('SOL', 0.8)], opts);
    const b = generateSignals([snap('SOL', 6)], [sentiment('SOL', 0.8)], opts);
    expect(a).toEqual(b);
  });
});
