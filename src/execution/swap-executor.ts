import { createLogger, errorMessage, withTimeout, ValidationError, type WalletState } from '../utils';
import type { DecisionJournal, ExecutionLogEntry } from '../data/journal';
import type { DailyTradeCounter } from '../strategy/risk-gate';
import type { TradingPolicy } from '../strategy/trading-policy';
import type { TradeAction, TradeSignal } from '../strategy/types';
import { validateQuote } from './guards';
import type { PositionBook } from './position-book';
import { resolveToken, toRawAmount, type TokenInfo } from './tokens';
import { toTradeRecord, type TradeHistory } from './trade-history';
import type {
  ClosedPosition,
  FailureReason,
  FilledAmounts,
  PipelineState,
  Position,
  StateTransition,
  SwapOutcome,
  SwapQuote,
  SwapQuoteService,
  SwapRequest,
  TransactionSubmitter,
} from './types';

const log = createLogger('executor');

export interface ExecutorTimeouts {
  requestMs: number;   // quote and transaction build
  confirmMs: number;   // submit through confirmation
}

export interface SwapExecutorDeps {
  wallet: WalletState;
  quotes: SwapQuoteService;
  submitter: TransactionSubmitter;
  book: PositionBook;
  counter: DailyTradeCounter;
  trades: TradeHistory;
  policy: TradingPolicy;
  timeouts: ExecutorTimeouts;
  journal?: DecisionJournal;
  clock?: () => number;
}

export type SignalExecution =
  | { status: 'skipped'; reason: 'position-open' | 'no-price' }
  | { status: 'executed'; outcome: SwapOutcome; position: Position | null };

type ExecutionKind = ExecutionLogEntry['kind'];

export function protectiveLevels(
  action: TradeAction,
  entryPrice: number,
  policy: Pick<TradingPolicy, 'stopLossFraction' | 'takeProfitFraction'>,
): { stopLossPrice: number; takeProfitPrice: number } {
  if (action === 'BUY') {
    return {
      stopLossPrice: entryPrice * (1 - policy.stopLossFraction),
      takeProfitPrice: entryPrice * (1 + policy.takeProfitFraction),
    };
  }
  return {
    stopLossPrice: entryPrice * (1 + policy.stopLossFraction),
    takeProfitPrice: entryPrice * (1 - policy.takeProfitFraction),
  };
}

// Records every state change of one swap attempt
class PipelineTrace {
  state: PipelineState = 'QUOTE_REQUESTED';
  readonly transitions: StateTransition[] = [];
  private readonly startedAt: number;

  constructor(private readonly clock: () => number) {
    this.startedAt = clock();
  }

  advance(to: PipelineState) {
    this.transitions.push({ from: this.state, to, at: this.clock() });
    this.state = to;
  }

  fail(reason: FailureReason, err: unknown, quote?: SwapQuote): SwapOutcome {
    const failedFrom = this.state;
    this.advance('FAILED');
    return {
      state: 'FAILED',
      reason,
      error: errorMessage(err),
      failedFrom,
      quote,
      transitions: this.transitions,
      latencyMs: this.clock() - this.startedAt,
    };
  }

  confirm(quote: SwapQuote, signature: string, filledAmounts: FilledAmounts): SwapOutcome {
    this.advance('CONFIRMED');
    return {
      state: 'CONFIRMED',
      quote,
      result: { signature, success: true, filledAmounts },
      transitions: this.transitions,
      latencyMs: this.clock() - this.startedAt,
    };
  }
}

/**
 * Drives quote -> prepare -> sign -> submit. A swap either confirms or fails with
 * nothing changed: positions and the daily counter move only after CONFIRMED.
 */
export class SwapExecutor {
  private readonly clock: () => number;

  constructor(private readonly deps: SwapExecutorDeps) {
    this.clock = deps.clock ?? Date.now;
  }

  get policy(): TradingPolicy {
    return this.deps.policy;
  }

  async execute(request: SwapRequest): Promise<SwapOutcome> {
    return this.run(request, 'manual');
  }

  private async run(request: SwapRequest, kind: ExecutionKind, symbol?: string): Promise<SwapOutcome> {
    const input = resolveToken(request.inputToken);
    const output = resolveToken(request.outputToken);
    if (input.mint === output.mint) throw new ValidationError('Input and output token are the same');
    if (!Number.isFinite(request.amount) || request.amount <= 0) {
      throw new ValidationError(`Amount must be > 0, got ${request.amount}`);
    }
    if (!Number.isInteger(request.slippageBps) || request.slippageBps < 0) {
      throw new ValidationError(`slippageBps must be an integer >= 0, got ${request.slippageBps}`);
    }
    const amountRaw = toRawAmount(request.amount, input.decimals);
    if (amountRaw <= 0n) {
      throw new ValidationError(`Amount ${request.amount} is below one unit of ${input.symbol}`);
    }

    const outcome = await this.pipeline(input, output, amountRaw, request.slippageBps);

    if (outcome.state === 'CONFIRMED') {
      this.deps.trades.record(toTradeRecord(
        input.symbol,
        output.symbol,
        outcome.result.filledAmounts,
        this.deps.policy.universe.quoteToken,
        outcome.result.signature,
        this.clock(),
      ));
      log.info('Swap confirmed', {
        pair: `${input.symbol}->${output.symbol}`,
        signature: outcome.result.signature,
        in: outcome.result.filledAmounts.inputAmount,
        out: outcome.result.filledAmounts.outputAmount,
        fill: outcome.result.filledAmounts.source,
        latencyMs: outcome.latencyMs,
      });
    } else {
      log.warn('Swap failed', {
        pair: `${input.symbol}->${output.symbol}`,
        reason: outcome.reason,
        failedFrom: outcome.failedFrom,
        error: outcome.error,
      });
    }

    this.deps.journal?.logExecution({
      kind,
      symbol,
      inputMint: input.mint,
      outputMint: output.mint,
      amount: request.amount,
      slippageBps: request.slippageBps,
      state: outcome.state,
      reason: outcome.state === 'FAILED' ? outcome.reason : undefined,
      error: outcome.state === 'FAILED' ? outcome.error : undefined,
      signature: outcome.state === 'CONFIRMED' ? outcome.result.signature : undefined,
      quotedImpactPct: outcome.quote?.priceImpactPct,
      latencyMs: outcome.latencyMs,
    });

    return outcome;
  }

  private async pipeline(input: TokenInfo, output: TokenInfo, amountRaw: bigint, slippageBps: number): Promise<SwapOutcome> {
    const { wallet, quotes, submitter, timeouts } = this.deps;
    const trace = new PipelineTrace(this.clock);
    const session = wallet.session;

    // --- Quote ---
    let quote: SwapQuote;
    try {
      quote = await withTimeout(
        quotes.getQuote({ inputMint: input.mint, outputMint: output.mint, amountRaw, slippageBps }),
        timeouts.requestMs,
        'quote',
      );
    } catch (err) {
      return trace.fail('quote-error', err);
    }
    if (!/^\d+$/.test(quote.outAmountRaw) || BigInt(quote.outAmountRaw) <= 0n) {
      return trace.fail('quote-error', 'Quote returned no output amount', quote);
    }
    trace.advance('QUOTE_RECEIVED');

    // --- Prepare ---
    const owner = wallet.publicAddress;
    if (!wallet.connected || owner === null) {
      return trace.fail('prepare-error', 'wallet-not-connected', quote);
    }
    let unsigned: Uint8Array;
    try {
      unsigned = await withTimeout(quotes.buildSwapTransaction(quote, owner), timeouts.requestMs, 'swap build');
    } catch (err) {
      return trace.fail('prepare-error', err, quote);
    }
    trace.advance('TX_PREPARED');

    // --- Sign ---
    if (wallet.session !== session) {
      return trace.fail('sign-error', 'Wallet changed during swap', quote);
    }
    let signed: Uint8Array;
    try {
      signed = wallet.sign(unsigned);
    } catch (err) {
      return trace.fail('sign-error', err, quote);
    }
    trace.advance('TX_SIGNED');

    // --- Submit ---
    const guard = validateQuote(
      quote,
      {
        maxAgeMs: this.deps.policy.quoteMaxAgeMs,
        maxPriceImpactPct: this.deps.policy.maxPriceImpactPct,
        slippageBps,
      },
      this.clock(),
    );
    if (!guard.passed) {
      return trace.fail('submit-error', guard.reason ?? 'Quote rejected', quote);
    }
    // A disconnect that landed while we were signing still wins: nothing is sent
    if (wallet.session !== session || !wallet.connected) {
      return trace.fail('sign-error', 'Wallet disconnected before submit', quote);
    }

    trace.advance('SUBMITTED');
    try {
      const receipt = await withTimeout(submitter.submit(signed, quote, owner), timeouts.confirmMs, 'submit');
      return trace.confirm(quote, receipt.signature, receipt.fill);
    } catch (err) {
      return trace.fail('submit-error', err, quote);
    }
  }

  /**
   * Converts a SOL-denominated size into the swap's input token using USD prices.
   * BUY spends the quote token, SELL spends the traded token.
   */
  inputAmountFor(signal: TradeSignal, amountSol: number, usdPrices: ReadonlyMap<string, number>): number | null {
    const quoteToken = this.deps.policy.universe.quoteToken;
    const solUsd = usdPrices.get('SOL');
    const inputSymbol = signal.action === 'BUY' ? quoteToken : signal.symbol;
    if (inputSymbol === 'SOL') return amountSol;

    const inputUsd = usdPrices.get(inputSymbol);
    if (solUsd === undefined || inputUsd === undefined || !(solUsd > 0) || !(inputUsd > 0)) return null;
    return (amountSol * solUsd) / inputUsd;
  }

  async executeSignal(signal: TradeSignal, amountSol: number, usdPrices: ReadonlyMap<string, number>): Promise<SignalExecution> {
    const { book, counter, policy } = this.deps;
    const quoteToken = policy.universe.quoteToken;

    const amount = this.inputAmountFor(signal, amountSol, usdPrices);
    if (amount === null) return { status: 'skipped', reason: 'no-price' };
    if (!book.reserve(signal.symbol)) return { status: 'skipped', reason: 'position-open' };

    let outcome: SwapOutcome;
    try {
      outcome = await this.run(
        {
          inputToken: signal.action === 'BUY' ? quoteToken : signal.symbol,
          outputToken: signal.action === 'BUY' ? signal.symbol : quoteToken,
          amount,
          slippageBps: policy.slippageBps,
        },
        'signal',
        signal.symbol,
      );
    } finally {
      book.release(signal.symbol);
    }

    if (outcome.state !== 'CONFIRMED') {
      return { status: 'executed', outcome, position: null };
    }

    const fill = outcome.result.filledAmounts;
    const tradedAmount = signal.action === 'BUY' ? fill.outputAmount : fill.inputAmount;
    const quoteAmount = signal.action === 'BUY' ? fill.inputAmount : fill.outputAmount;
    const entryPrice = quoteAmount / tradedAmount;
    const now = this.clock();

    const position: Position = {
      id: `${signal.symbol}-${now}`,
      symbol: signal.symbol,
      action: signal.action,
      amount: tradedAmount,
      entryPrice,
      openedAt: now,
      ...protectiveLevels(signal.action, entryPrice, policy),
      entrySignature: outcome.result.signature,
      costBasis: quoteAmount,
    };
    book.add(position);
    const tradesToday = counter.increment(now);
    log.info('Signal executed', { symbol: signal.symbol, action: signal.action, tradesToday });

    return { status: 'executed', outcome, position };
  }

  /**
   * Reverse swap for a position the monitor closed. Never opens a position and
   * does not count toward the daily cap. Until the swap confirms the position
   * stays exit-pending in the book, which keeps its symbol busy; call again to retry.
   */
  async unwind(closed: ClosedPosition): Promise<SwapOutcome | null> {
    const { book, policy } = this.deps;
    const quoteToken = policy.universe.quoteToken;
    const request: SwapRequest = closed.action === 'BUY'
      ? { inputToken: closed.symbol, outputToken: quoteToken, amount: closed.amount, slippageBps: policy.slippageBps }
      : { inputToken: quoteToken, outputToken: closed.symbol, amount: closed.amount * closed.exitPrice, slippageBps: policy.slippageBps };

    book.markExitPending(closed);
    try {
      const outcome = await this.run(request, 'unwind', closed.symbol);
      if (outcome.state === 'CONFIRMED') {
        book.settleExit(closed.symbol);
      } else {
        log.error('Unwind failed, exit stays pending', {
          id: closed.id,
          symbol: closed.symbol,
          reason: outcome.reason,
          error: outcome.error,
        });
      }
      return outcome;
    } catch (err) {
      log.error('Unwind rejected, exit stays pending', { id: closed.id, symbol: closed.symbol, error: errorMessage(err) });
      return null;
    }
  }
}
