import { afterEach, beforeEach, describe, it, expect } from 'vitest';
import fs from 'fs';
import os from 'os';
import path from 'path';
import { PositionBook, POSITIONS_FILE, realizedPnl } from '../src/execution/position-book';
import { PositionMonitor, exitReason } from '../src/execution/position-monitor';
import { protectiveLevels } from '../src/execution/swap-executor';
import type { Position } from '../src/execution/types';
import type { TradeAction } from '../src/strategy/types';

const T0 = 1_700_000_000_000;
const FRACTIONS = { stopLossFraction: 0.05, takeProfitFraction: 0.1 };

function position(symbol: string, action: TradeAction, entryPrice: number, amount = 2): Position {
  return {
    id: `${symbol}-${T0}`,
    symbol,
    action,
    amount,
    entryPrice,
    openedAt: T0,
    ...protectiveLevels(action, entryPrice, FRACTIONS),
    entrySignature: `sig-${symbol}`,
    costBasis: entryPrice * amount,
  };
}

describe('position monitor', () => {
  it('closes a BUY at 94 when entry 100 puts the stop at 95', () => {
    const book = new PositionBook();
    book.add(position('SOL', 'BUY', 100));
    expect(book.get('SOL')?.stopLossPrice).toBe(95);

    const closed = new PositionMonitor(book).sweep(new Map([['SOL', 94]]), T0 + 60_000);
    expect(closed).toHaveLength(1);
    expect(closed[0].closeReason).toBe('stop-loss');
    expect(closed[0].exitPrice).toBe(94);
    expect(closed[0].realizedPnl).toBe(-12);
    expect(book.has('SOL')).toBe(false);
  });

  it('closes on take-profit and frees the symbol for re-entry', () => {
    const book = new PositionBook();
    book.add(position('JUP', 'BUY', 1));
    const [closed] = new PositionMonitor(book).sweep(new Map([['JUP', 1.2]]), T0);
    expect(closed.closeReason).toBe('take-profit');
    expect(book.reserve('JUP')).toBe(true);
  });

  it('mirrors the thresholds for SELL positions', () => {
    const sell = position('JTO', 'SELL', 100);
    expect(exitReason(sell, 106)).toBe('stop-loss');
    expect(exitReason(sell, 89)).toBe('take-profit');
    expect(exitReason(sell, 100)).toBeNull();
    expect(realizedPnl(sell, 90)).toBe(20);
  });

  it('leaves positions inside the band and positions without a price', () => {
    const book = new PositionBook();
    book.add(position('SOL', 'BUY', 100));
    book.add(position('JUP', 'BUY', 1));
    const closed = new PositionMonitor(book).sweep(new Map([['SOL', 100]]), T0);
    expect(closed).toEqual([]);
    expect(book.openPositions()).toHaveLength(2);
  });

  it('never leaves a crossed position open after a pass', () => {
    const book = new PositionBook();
    const symbols = ['SOL', 'JUP', 'BONK', 'JTO'];
    symbols.forEach((s, i) => book.add(position(s, i % 2 === 0 ? 'BUY' : 'SELL', 100)));
    const prices = new Map([['SOL', 80], ['JUP', 120], ['BONK', 111], ['JTO', 89]]);

    const closed = new PositionMonitor(book).sweep(prices, T0);
    expect(closed.map(c => [c.symbol, c.closeReason])).toEqual([
      ['SOL', 'stop-loss'],
      ['JUP', 'stop-loss'],
      ['BONK', 'take-profit'],
      ['JTO', 'take-profit'],
    ]);
    expect(book.openPositions()).toEqual([]);
  });

  it('refuses a second open position for the same symbol', () => {
    const book = new PositionBook();
    book.add(position('SOL', 'BUY', 100));
    expect(() => book.add(position('SOL', 'BUY', 101))).toThrow('Position already open for SOL');
  });
});

describe('position history', () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'positions-'));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('restores open positions and closed history from disk', () => {
    const book = new PositionBook();
    book.add(position('SOL', 'BUY', 100));
    book.add(position('JUP', 'BUY', 1));
    book.close('JUP', 'take-profit', 1.5, T0 + 1000);
    book.save(dir);

    const restored = new PositionBook();
    expect(restored.load(dir)).toBe(1);
    expect(restored.get('SOL')).toEqual(book.get('SOL'));
    expect(restored.closedPositions()).toHaveLength(1);
    expect(restored.totalRealizedPnl()).toBe(1);
  });

  it('starts empty without a file and skips malformed entries', () => {
    const book = new PositionBook();
    expect(book.load(dir)).toBe(0);

    fs.writeFileSync(path.join(dir, POSITIONS_FILE), JSON.stringify({ open: [{ symbol: 'SOL' }, position('JTO', 'SELL', 3)], closed: 'nope' }));
    expect(book.load(dir)).toBe(1);
    expect(book.has('JTO')).toBe(true);
    expect(book.has('SOL')).toBe(false);
  });

  it('keeps the newest closed positions while the stats cover all of them', () => {
    const book = new PositionBook(2);
    book.add(position('SOL', 'BUY', 100));
    book.close('SOL', 'take-profit', 101, T0 + 1);
    book.add(position('JUP', 'BUY', 1));
    book.close('JUP', 'take-profit', 1.5, T0 + 2);
    book.add(position('JTO', 'BUY', 10));
    book.close('JTO', 'stop-loss', 9, T0 + 3);

    expect(book.closedPositions().map(p => p.symbol)).toEqual(['JUP', 'JTO']);
    expect(book.totalClosed()).toBe(3);
    // 2 + 1 - 2
    expect(book.totalRealizedPnl()).toBe(1);

    book.save(dir);
    const saved: unknown = JSON.parse(fs.readFileSync(path.join(dir, POSITIONS_FILE), 'utf-8'));
    expect(saved).toMatchObject({ stats: { totalClosed: 3, wins: 2, realizedPnl: 1 } });

    const restored = new PositionBook(2);
    restored.load(dir);
    expect(restored.closedPositions()).toHaveLength(2);
    expect(restored.totalClosed()).toBe(3);
    expect(restored.totalRealizedPnl()).toBe(1);
  });

  it('restores pending exits so their symbols stay busy', () => {
    const book = new PositionBook();
    book.add(position('SOL', 'BUY', 100));
    const closed = book.close('SOL', 'stop-loss', 94, T0 + 1000);
    if (!closed) throw new Error('expected a closed position');
    book.markExitPending(closed);
    book.save(dir);

    const restored = new PositionBook();
    expect(restored.load(dir)).toBe(0);
    expect(restored.pendingExits()).toEqual([closed]);
    expect(restored.isBusy('SOL')).toBe(true);

    restored.settleExit('SOL');
    expect(restored.isBusy('SOL')).toBe(false);
  });

  it('survives an unreadable file', () => {
    fs.writeFileSync(path.join(dir, POSITIONS_FILE), '{not json');
    expect(new PositionBook().load(dir)).toBe(0);
  });
});
