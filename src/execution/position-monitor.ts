import { createLogger } from '../utils';
import type { PositionBook } from './position-book';
import type { CloseReason, ClosedPosition, Position } from './types';

const log = createLogger('monitor');

export function exitReason(position: Position, price: number): CloseReason | null {
  if (position.action === 'BUY') {
    if (price <= position.stopLossPrice) return 'stop-loss';
    if (price >= position.takeProfitPrice) return 'take-profit';
  } else {
    if (price >= position.stopLossPrice) return 'stop-loss';
    if (price <= position.takeProfitPrice) return 'take-profit';
  }
  return null;
}

export class PositionMonitor {
  constructor(private readonly book: PositionBook) {}

  /**
   * One pass over every open position. Prices are keyed by symbol and expressed in
   * quote token per traded token; a position without a price is left alone.
   */
  sweep(prices: ReadonlyMap<string, number>, now: number): ClosedPosition[] {
    const closed: ClosedPosition[] = [];

    for (const position of this.book.openPositions()) {
      const price = prices.get(position.symbol);
      if (price === undefined || !Number.isFinite(price) || price <= 0) {
        log.debug('No price for open position', { symbol: position.symbol });
        continue;
      }

      const reason = exitReason(position, price);
      if (!reason) continue;

      const result = this.book.close(position.symbol, reason, price, now);
      if (result) closed.push(result);
    }

    return closed;
  }
}
