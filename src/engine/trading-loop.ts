import { createLogger, errorMessage, type WalletState } from '../utils';
import { priceMap, type MarketDataFeed } from '../analysis/market-data';
import type { DisplaySurface, SentimentProbe } from '../analysis/sentiment';
import type { DecisionJournal } from '../data/journal';
import type { PositionBook } from '../execution/position-book';
import type { PositionMonitor } from '../execution/position-monitor';
import type { SwapExecutor } from '../execution/swap-executor';
import { admit, type DailyTradeCounter } from '../strategy/risk-gate';
import { sizePosition } from '../strategy/position-sizer';
import { generateSignals } from '../strategy/signal-generator';
import type { TradingPolicy } from '../strategy/trading-policy';
import type { TradeSignal } from '../strategy/types';

const log = createLogger('loop');

export const DEFAULT_INTERVAL_MS = 5 * 60_000;
export const DEFAULT_ERROR_BACKOFF_MS = 60_000;

export type Sleeper = (ms: number, wake: AbortSignal) => Promise<void>;

// Resolves after `ms`, or early once `wake` fires
export const interruptibleSleep: Sleeper = (ms, wake) =>
  new Promise(resolve => {
    if (wake.aborted) return resolve();
    const timer = setTimeout(done, ms);
    function done() {
      clearTimeout(timer);
      wake.removeEventListener('abort', done);
      resolve();
    }
    wake.addEventListener('abort', done);
  });

export interface TradingLoopDeps {
  policy: TradingPolicy;
  counter: DailyTradeCounter;
  wallet: Pick<WalletState, 'balance'>;
  feed: Pick<MarketDataFeed, 'fetchSnapshots'>;
  sentiment: Pick<SentimentProbe, 'probe'>;
  executor: Pick<SwapExecutor, 'executeSignal' | 'unwind'>;
  monitor: Pick<PositionMonitor, 'sweep'>;
  book: Pick<PositionBook, 'isBusy' | 'save' | 'openPositions' | 'pendingExits'>;
  journal?: DecisionJournal;
  display?: DisplaySurface;
  dataDir?: string;
  intervalMs?: number;
  errorBackoffMs?: number;
  clock?: () => number;
  sleep?: Sleeper;
}

export interface CycleReport {
  snapshots: number;
  signals: number;
  rejected: number;
  skipped: number;
  confirmed: number;
  failed: number;
  closed: number;
  pendingExits: number;
}

/**
 * Fixed-interval cycle: market data and sentiment in, signals through the risk
 * gate and sizer into the executor, then a stop/take sweep over open positions.
 * One cycle at a time; stop() takes effect at the next cycle boundary.
 */
export class TradingLoop {
  private readonly clock: () => number;
  private readonly sleep: Sleeper;
  private readonly intervalMs: number;
  private readonly errorBackoffMs: number;

  private stopRequested = false;
  private wake: AbortController | null = null;
  private done: Promise<void> | null = null;
  private cycles = 0;

  constructor(private readonly deps: TradingLoopDeps) {
    this.clock = deps.clock ?? Date.now;
    this.sleep = deps.sleep ?? interruptibleSleep;
    this.intervalMs = deps.intervalMs ?? DEFAULT_INTERVAL_MS;
    this.errorBackoffMs = deps.errorBackoffMs ?? DEFAULT_ERROR_BACKOFF_MS;
  }

  get running(): boolean {
    return this.done !== null;
  }

  get cycleCount(): number {
    return this.cycles;
  }

  /** Starts the loop; the returned promise settles once the loop has stopped. */
  start(): Promise<void> {
    if (this.done) return this.done;
    this.stopRequested = false;
    this.done = this.run().finally(() => {
      this.done = null;
    });
    return this.done;
  }

  /** Requests a stop and waits for the in-flight cycle to finish. */
  async stop(): Promise<void> {
    this.stopRequested = true;
    this.wake?.abort();
    if (this.done) await this.done;
  }

  private async run() {
    log.info('Trading loop started', { intervalMs: this.intervalMs, tradingEnabled: this.deps.policy.tradingEnabled });

    while (!this.stopRequested) {
      let delay = this.intervalMs;
      try {
        await this.runCycle();
      } catch (err) {
        log.error('Cycle failed, backing off', { error: errorMessage(err), backoffMs: this.errorBackoffMs });
        delay = this.errorBackoffMs;
      }
      if (this.stopRequested) break;

      this.wake = new AbortController();
      await this.sleep(delay, this.wake.signal);
      this.wake = null;
    }

    log.info('Trading loop stopped', { cycles: this.cycles });
  }

  async runCycle(): Promise<CycleReport> {
    const { policy, feed, sentiment } = this.deps;
    const now = this.clock();
    this.cycles++;

    const universe = policy.universe.symbols;
    const priced = Array.from(new Set([...universe, 'SOL', policy.universe.quoteToken]));
    const snapshots = await feed.fetchSnapshots(priced);
    const usdPrices = priceMap(snapshots);
    const tradable = snapshots.filter(s => universe.includes(s.symbol));

    const scores = await sentiment.probe(tradable.map(s => s.symbol));
    const signals = generateSignals(tradable, scores, { suggestedAmount: policy.suggestedAmount, now });

    const report: CycleReport = {
      snapshots: snapshots.length,
      signals: signals.length,
      rejected: 0,
      skipped: 0,
      confirmed: 0,
      failed: 0,
      closed: 0,
      pendingExits: 0,
    };

    for (const signal of signals) {
      await this.handleSignal(signal, usdPrices, report);
    }

    // --- Stop-loss / take-profit sweep ---
    const quoteUsd = usdPrices.get(policy.universe.quoteToken) ?? 1;
    const quotePrices = new Map<string, number>();
    for (const [symbol, usd] of usdPrices) quotePrices.set(symbol, usd / quoteUsd);

    // Exits that failed in earlier cycles go first
    for (const position of this.deps.book.pendingExits()) {
      await this.deps.executor.unwind(position);
    }

    const closed = this.deps.monitor.sweep(quotePrices, this.clock());
    report.closed = closed.length;
    for (const position of closed) {
      await this.deps.executor.unwind(position);
    }
    report.pendingExits = this.deps.book.pendingExits().length;

    if (this.deps.dataDir) this.deps.book.save(this.deps.dataDir);

    log.info('Cycle complete', { cycle: this.cycles, ...report, open: this.deps.book.openPositions().length });
    await this.showSummary(report);
    return report;
  }

  private async handleSignal(signal: TradeSignal, usdPrices: ReadonlyMap<string, number>, report: CycleReport) {
    const { policy, counter, wallet, executor, book, journal } = this.deps;
    const base = {
      symbol: signal.symbol,
      action: signal.action,
      confidence: signal.confidence,
      reasoning: signal.reasoning,
    };

    if (book.isBusy(signal.symbol)) {
      report.skipped++;
      journal?.logSignal({ ...base, decision: 'skipped', rejectReason: 'position-open' });
      return;
    }

    const admission = admit(signal, policy, counter, this.clock());
    if (!admission.accepted) {
      report.rejected++;
      log.info('Signal rejected', { symbol: signal.symbol, reason: admission.reason });
      journal?.logSignal({ ...base, decision: 'rejected', rejectReason: admission.reason });
      return;
    }

    const reading = await wallet.balance();
    const amount = sizePosition(signal, reading.error ? null : reading.sol, policy);
    if (amount <= 0) {
      report.skipped++;
      log.info('Signal skipped, zero size', { symbol: signal.symbol, balanceError: reading.error });
      journal?.logSignal({ ...base, decision: 'skipped', rejectReason: 'zero-size' });
      return;
    }

    journal?.logSignal({ ...base, decision: 'accepted', sizedAmountSol: amount });

    try {
      const execution = await executor.executeSignal(signal, amount, usdPrices);
      if (execution.status === 'skipped') {
        report.skipped++;
        journal?.logSignal({ ...base, decision: 'skipped', rejectReason: execution.reason });
      } else if (execution.outcome.state === 'CONFIRMED') {
        report.confirmed++;
      } else {
        report.failed++;
      }
    } catch (err) {
      report.failed++;
      log.error('Signal execution error', { symbol: signal.symbol, error: errorMessage(err) });
    }
  }

  private async showSummary(report: CycleReport) {
    if (!this.deps.display) return;
    const text = `Cycle ${this.cycles}: ${report.signals} signals, ${report.confirmed} executed, `
      + `${report.failed} failed, ${report.closed} closed`;
    try {
      await this.deps.display.display(text);
    } catch (err) {
      log.warn('Display surface failed', { error: errorMessage(err) });
    }
  }
}
