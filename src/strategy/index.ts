export { loadTradingPolicy, validatePolicy, applyOverrides, DEFAULT_POLICY_PATH } from './trading-policy';
export type { TradingPolicy } from './trading-policy';
export { generateSignals, evaluateSymbol } from './signal-generator';
export type { SignalOptions } from './signal-generator';
export { admit, DailyTradeCounter, DAY_MS } from './risk-gate';
export { sizePosition } from './position-sizer';
export type { TradeAction, TradeSignal, Admission, RejectReason } from './types';
