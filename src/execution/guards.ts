import { createLogger } from '../utils';
import type { SwapQuote } from './types';

const log = createLogger('guards');

export interface GuardResult {
  passed: boolean;
  reason?: string;
}

export interface QuoteLimits {
  maxAgeMs: number;
  maxPriceImpactPct: number;
  slippageBps: number;
}

// Quotes are advisory: re-check one right before it is submitted
export function validateQuote(quote: SwapQuote, limits: QuoteLimits, now: number): GuardResult {
  const ageMs = now - quote.fetchedAt;
  if (ageMs > limits.maxAgeMs) {
    return {
      passed: false,
      reason: `Quote is stale: ${ageMs}ms old > max ${limits.maxAgeMs}ms`,
    };
  }

  if (quote.priceImpactPct > limits.maxPriceImpactPct) {
    return {
      passed: false,
      reason: `Route impact ${quote.priceImpactPct.toFixed(2)}% > max ${limits.maxPriceImpactPct}%`,
    };
  }

  if (quote.slippageBps !== limits.slippageBps) {
    return {
      passed: false,
      reason: `Quote slippage ${quote.slippageBps}bps != requested ${limits.slippageBps}bps`,
    };
  }

  if (!/^\d+$/.test(quote.outAmountRaw) || BigInt(quote.outAmountRaw) <= 0n) {
    return {
      passed: false,
      reason: 'Quote returned zero output amount',
    };
  }

  log.debug('Quote passed guards', {
    impact: quote.priceImpactPct.toFixed(2),
    slippageBps: quote.slippageBps,
    ageMs,
  });

  return { passed: true };
}
