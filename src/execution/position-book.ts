import fs from 'fs';
import path from 'path';
import { createLogger, isRecord } from '../utils';
import type { ClosedPosition, CloseReason, Position } from './types';

const log = createLogger('positions');

export const POSITIONS_FILE = 'positions.json';
export const MAX_CLOSED_HISTORY = 500;

export function realizedPnl(position: Position, exitPrice: number): number {
  const move = position.action === 'BUY'
    ? exitPrice - position.entryPrice
    : position.entryPrice - exitPrice;
  return move * position.amount;
}

function isPosition(value: unknown): value is Position {
  return isRecord(value)
    && typeof value.id === 'string'
    && typeof value.symbol === 'string'
    && (value.action === 'BUY' || value.action === 'SELL')
    && typeof value.amount === 'number'
    && typeof value.entryPrice === 'number'
    && typeof value.openedAt === 'number'
    && typeof value.stopLossPrice === 'number'
    && typeof value.takeProfitPrice === 'number'
    && typeof value.entrySignature === 'string'
    && typeof value.costBasis === 'number';
}

function isClosedPosition(value: unknown): value is ClosedPosition {
  return isRecord(value)
    && (value.closeReason === 'stop-loss' || value.closeReason === 'take-profit')
    && typeof value.exitPrice === 'number'
    && typeof value.closedAt === 'number'
    && typeof value.realizedPnl === 'number'
    && isPosition(value);
}

interface HistoryStats {
  totalClosed: number;
  wins: number;
  realizedPnl: number;
}

function isHistoryStats(value: unknown): value is HistoryStats {
  return isRecord(value)
    && typeof value.totalClosed === 'number'
    && typeof value.wins === 'number'
    && typeof value.realizedPnl === 'number';
}

/**
 * Open positions keyed by symbol. At most one per symbol; a symbol with a swap in
 * flight is reserved so a second signal for it cannot start another pipeline.
 * A closed position whose reverse swap has not landed stays exit-pending, and its
 * symbol stays busy until the exit settles.
 *
 * Closed history keeps the newest `historyLimit` entries; the stats cover all of it.
 */
export class PositionBook {
  private readonly open = new Map<string, Position>();
  private readonly closed: ClosedPosition[] = [];
  private readonly inFlight = new Set<string>();
  private readonly exitPending = new Map<string, ClosedPosition>();
  private stats: HistoryStats = { totalClosed: 0, wins: 0, realizedPnl: 0 };

  constructor(private readonly historyLimit = MAX_CLOSED_HISTORY) {}

  has(symbol: string): boolean {
    return this.open.has(symbol);
  }

  isBusy(symbol: string): boolean {
    return this.open.has(symbol) || this.inFlight.has(symbol) || this.exitPending.has(symbol);
  }

  get(symbol: string): Position | undefined {
    return this.open.get(symbol);
  }

  reserve(symbol: string): boolean {
    if (this.isBusy(symbol)) return false;
    this.inFlight.add(symbol);
    return true;
  }

  release(symbol: string) {
    this.inFlight.delete(symbol);
  }

  add(position: Position) {
    if (this.open.has(position.symbol)) {
      throw new Error(`Position already open for ${position.symbol}`);
    }
    this.open.set(position.symbol, position);
    log.info('Position opened', {
      id: position.id,
      symbol: position.symbol,
      action: position.action,
      amount: position.amount,
      entryPrice: position.entryPrice,
      stopLoss: position.stopLossPrice,
      takeProfit: position.takeProfitPrice,
    });
  }

  close(symbol: string, closeReason: CloseReason, exitPrice: number, now: number): ClosedPosition | null {
    const position = this.open.get(symbol);
    if (!position) return null;

    const closed: ClosedPosition = {
      ...position,
      closeReason,
      exitPrice,
      closedAt: now,
      realizedPnl: realizedPnl(position, exitPrice),
    };
    this.open.delete(symbol);
    this.record(closed);

    log.info('Position closed', {
      id: closed.id,
      symbol,
      reason: closeReason,
      exitPrice,
      pnl: closed.realizedPnl.toFixed(4),
      holdTime: `${Math.round((now - closed.openedAt) / 60_000)}m`,
    });
    return closed;
  }

  markExitPending(position: ClosedPosition) {
    this.exitPending.set(position.symbol, position);
    log.debug('Exit pending', { id: position.id, symbol: position.symbol, amount: position.amount });
  }

  settleExit(symbol: string) {
    if (this.exitPending.delete(symbol)) {
      log.debug('Exit settled', { symbol });
    }
  }

  pendingExits(): ClosedPosition[] {
    return Array.from(this.exitPending.values());
  }

  openPositions(): Position[] {
    return Array.from(this.open.values());
  }

  closedPositions(): readonly ClosedPosition[] {
    return this.closed;
  }

  totalClosed(): number {
    return this.stats.totalClosed;
  }

  totalRealizedPnl(): number {
    return this.stats.realizedPnl;
  }

  private record(closed: ClosedPosition) {
    this.closed.push(closed);
    this.stats.totalClosed++;
    if (closed.realizedPnl > 0) this.stats.wins++;
    this.stats.realizedPnl += closed.realizedPnl;
    this.trimHistory();
  }

  private trimHistory() {
    const excess = this.closed.length - this.historyLimit;
    if (excess > 0) this.closed.splice(0, excess);
  }

  save(dataDir: string) {
    if (!fs.existsSync(dataDir)) {
      fs.mkdirSync(dataDir, { recursive: true });
    }

    const data = {
      savedAt: new Date().toISOString(),
      open: this.openPositions(),
      pendingExits: this.pendingExits(),
      closed: this.closed,
      stats: this.stats,
    };

    const filePath = path.join(dataDir, POSITIONS_FILE);
    fs.writeFileSync(filePath, JSON.stringify(data, null, 2));
    log.debug('Position history saved', { path: filePath });
  }

  // Open positions and pending exits re-enter the book; closed ones are kept for PnL reporting
  load(dataDir: string): number {
    const filePath = path.join(dataDir, POSITIONS_FILE);
    if (!fs.existsSync(filePath)) return 0;

    let raw: unknown;
    try {
      raw = JSON.parse(fs.readFileSync(filePath, 'utf-8'));
    } catch (err) {
      log.warn('Position history unreadable, starting empty', { path: filePath, error: err });
      return 0;
    }
    if (!isRecord(raw)) return 0;

    const open = Array.isArray(raw.open) ? raw.open.filter(isPosition) : [];
    const pending = Array.isArray(raw.pendingExits) ? raw.pendingExits.filter(isClosedPosition) : [];
    const closed = Array.isArray(raw.closed) ? raw.closed.filter(isClosedPosition) : [];
    for (const p of open) {
      if (!this.open.has(p.symbol)) this.open.set(p.symbol, p);
    }
    for (const p of pending) {
      if (!this.exitPending.has(p.symbol)) this.exitPending.set(p.symbol, p);
    }

    const stats = isHistoryStats(raw.stats) ? raw.stats : {
      totalClosed: closed.length,
      wins: closed.filter(p => p.realizedPnl > 0).length,
      realizedPnl: closed.reduce((sum, p) => sum + p.realizedPnl, 0),
    };
    this.stats = {
      totalClosed: this.stats.totalClosed + stats.totalClosed,
      wins: this.stats.wins + stats.wins,
      realizedPnl: this.stats.realizedPnl + stats.realizedPnl,
    };
    this.closed.push(...closed);
    this.trimHistory();

    log.info('Position history loaded', {
      openRestored: open.length,
      pendingExits: pending.length,
      closedRestored: closed.length,
    });
    return open.length;
  }
}
