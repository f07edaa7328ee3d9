export type TradeAction = 'BUY' | 'SELL';

export interface TradeSignal {
  symbol: string;
  action: TradeAction;
  confidence: number;    // 0.5..1
  reasoning: string[];   // contributing factors, in evaluation order
  suggestedAmount: number;
  createdAt: number;
}

export type RejectReason = 'trading-disabled' | 'daily-limit' | 'low-confidence';

export type Admission =
  | { accepted: true }
  | { accepted: false; reason: RejectReason };
