import type { FilledAmounts, TradeRecord } from './types';

export const MAX_RECENT_TRADES = 100;

/**
 * Receiving the quote token is a SELL of the input; anything else is a BUY of
 * the output. Price is always quote side per traded token.
 */
export function toTradeRecord(
  inputSymbol: string,
  outputSymbol: string,
  fill: FilledAmounts,
  quoteToken: string,
  signature: string,
  time: number,
): TradeRecord {
  if (outputSymbol === quoteToken) {
    return {
      pair: `${inputSymbol}/${outputSymbol}`,
      type: 'SELL',
      price: fill.outputAmount / fill.inputAmount,
      amount: fill.inputAmount,
      time,
      signature,
    };
  }
  return {
    pair: `${outputSymbol}/${inputSymbol}`,
    type: 'BUY',
    price: fill.inputAmount / fill.outputAmount,
    amount: fill.outputAmount,
    time,
    signature,
  };
}

// Newest first, bounded
export class TradeHistory {
  private readonly trades: TradeRecord[] = [];

  constructor(private readonly limit = MAX_RECENT_TRADES) {}

  record(trade: TradeRecord) {
    this.trades.unshift(trade);
    if (this.trades.length > this.limit) this.trades.length = this.limit;
  }

  recent(count = this.limit): TradeRecord[] {
    return this.trades.slice(0, Math.max(0, count));
  }

  get size(): number {
    return this.trades.length;
  }
}
