import fs from 'fs';
import path from 'path';
import { findToken } from '../execution/tokens';
import { isRecord } from '../utils/json';
import type { PolicyOverrides } from '../utils/config';

export interface TradingPolicy {
  version: string;
  maxTradeAmount: number;      // SOL per trade
  maxDailyTrades: number;
  riskFraction: number;        // share of wallet balance per trade
  stopLossFraction: number;
  takeProfitFraction: number;
  minConfidence: number;
  tradingEnabled: boolean;
  suggestedAmount: number;     // SOL suggested by every emitted signal
  slippageBps: number;
  quoteMaxAgeMs: number;
  maxPriceImpactPct: number;
  universe: {
    symbols: string[];
    quoteToken: string;
  };
}

export const DEFAULT_POLICY_PATH = path.resolve(__dirname, '../../config/trading-policy.json');

function num(obj: Record<string, unknown>, key: string): number {
  const v = obj[key];
  if (typeof v !== 'number' || !Number.isFinite(v)) {
    throw new Error(`Trading policy: "${key}" must be a number`);
  }
  return v;
}

function parsePolicy(raw: unknown): TradingPolicy {
  if (!isRecord(raw)) throw new Error('Trading policy must be a JSON object');
  const universe = raw.universe;
  if (!isRecord(universe) || !Array.isArray(universe.symbols) || typeof universe.quoteToken !== 'string') {
    throw new Error('Trading policy: "universe" needs "symbols" and "quoteToken"');
  }
  if (typeof raw.tradingEnabled !== 'boolean') {
    throw new Error('Trading policy: "tradingEnabled" must be a boolean');
  }

  return {
    version: typeof raw.version === 'string' ? raw.version : '0',
    maxTradeAmount: num(raw, 'maxTradeAmount'),
    maxDailyTrades: num(raw, 'maxDailyTrades'),
    riskFraction: num(raw, 'riskFraction'),
    stopLossFraction: num(raw, 'stopLossFraction'),
    takeProfitFraction: num(raw, 'takeProfitFraction'),
    minConfidence: num(raw, 'minConfidence'),
    tradingEnabled: raw.tradingEnabled,
    suggestedAmount: num(raw, 'suggestedAmount'),
    slippageBps: num(raw, 'slippageBps'),
    quoteMaxAgeMs: num(raw, 'quoteMaxAgeMs'),
    maxPriceImpactPct: num(raw, 'maxPriceImpactPct'),
    universe: {
      symbols: universe.symbols.map(s => String(s).toUpperCase()),
      quoteToken: universe.quoteToken.toUpperCase(),
    },
  };
}

export function validatePolicy(p: TradingPolicy): TradingPolicy {
  const problems: string[] = [];

  if (!(p.riskFraction > 0 && p.riskFraction <= 1)) problems.push(`riskFraction ${p.riskFraction} not in (0, 1]`);
  if (!(p.minConfidence > 0 && p.minConfidence <= 1)) problems.push(`minConfidence ${p.minConfidence} not in (0, 1]`);
  if (!(p.maxTradeAmount > 0)) problems.push(`maxTradeAmount ${p.maxTradeAmount} must be > 0`);
  if (!(p.suggestedAmount > 0)) problems.push(`suggestedAmount ${p.suggestedAmount} must be > 0`);
  if (!Number.isInteger(p.maxDailyTrades) || p.maxDailyTrades < 0) {
    problems.push(`maxDailyTrades ${p.maxDailyTrades} must be an integer >= 0`);
  }
  if (!(p.stopLossFraction > 0 && p.stopLossFraction < 1)) problems.push(`stopLossFraction ${p.stopLossFraction} not in (0, 1)`);
  if (!(p.takeProfitFraction > 0 && p.takeProfitFraction < 1)) problems.push(`takeProfitFraction ${p.takeProfitFraction} not in (0, 1)`);
  if (!Number.isInteger(p.slippageBps) || p.slippageBps < 0) problems.push(`slippageBps ${p.slippageBps} must be an integer >= 0`);
  if (!(p.quoteMaxAgeMs > 0)) problems.push(`quoteMaxAgeMs ${p.quoteMaxAgeMs} must be > 0`);

  if (!findToken(p.universe.quoteToken)) problems.push(`unknown quote token ${p.universe.quoteToken}`);
  for (const symbol of p.universe.symbols) {
    if (!findToken(symbol)) problems.push(`unknown universe symbol ${symbol}`);
    if (symbol === p.universe.quoteToken) problems.push(`universe symbol ${symbol} is the quote token`);
  }

  if (problems.length > 0) {
    throw new Error(`Invalid trading policy: ${problems.join('; ')}`);
  }
  return p;
}

export function applyOverrides(p: TradingPolicy, overrides: PolicyOverrides): TradingPolicy {
  return {
    ...p,
    tradingEnabled: overrides.tradingEnabled ?? p.tradingEnabled,
    maxTradeAmount: overrides.maxTradeAmount ?? p.maxTradeAmount,
    maxDailyTrades: overrides.maxDailyTrades ?? p.maxDailyTrades,
    minConfidence: overrides.minConfidence ?? p.minConfidence,
  };
}

export function loadTradingPolicy(configPath = DEFAULT_POLICY_PATH, overrides: PolicyOverrides = {}): TradingPolicy {
  const raw: unknown = JSON.parse(fs.readFileSync(configPath, 'utf-8'));
  return validatePolicy(applyOverrides(parsePolicy(raw), overrides));
}
