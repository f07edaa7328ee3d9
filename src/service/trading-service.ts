import {
  createLogger,
  errorMessage,
  withTimeout,
  ValidationError,
  WalletError,
  type WalletState,
} from '../utils';
import type { MarketDataFeed } from '../analysis/market-data';
import type { MarketSnapshot } from '../analysis/types';
import { buildPortfolio, type PortfolioSnapshot, type TokenBalanceProvider } from '../execution/portfolio';
import type { PositionBook } from '../execution/position-book';
import type { SwapExecutor } from '../execution/swap-executor';
import { listTokens, resolveToken, toRawAmount } from '../execution/tokens';
import { toTradeRecord, type TradeHistory } from '../execution/trade-history';
import type { SwapQuoteService, SwapRequest } from '../execution/types';
import type { TradeAction } from '../strategy/types';

const log = createLogger('service');

export type ServiceResult<T> = ({ success: true } & T) | { error: string };

export interface SwapInput {
  inputToken: string;
  outputToken: string;
  amount: number;
  slippageBps: number;
}

export interface TradeView {
  pair: string;
  type: TradeAction;
  price: number;
  amount: number;
  time: number;
}

interface TokenLeg {
  token: string;
  amount: number;
  valueUsd: number;
}

export interface QuoteView {
  inputToken: string;
  outputToken: string;
  inputAmount: number;
  outputAmount: number;
  priceImpactPct: number;
  slippageBps: number;
  routeLabels: string[];
}

export interface TradingServiceDeps {
  wallet: WalletState;
  executor: Pick<SwapExecutor, 'execute' | 'policy'>;
  quotes: SwapQuoteService;
  feed: Pick<MarketDataFeed, 'fetchSnapshots' | 'getTokenPrice'>;
  tokenBalances: TokenBalanceProvider;
  book: Pick<PositionBook, 'openPositions' | 'totalRealizedPnl'>;
  trades: Pick<TradeHistory, 'recent'>;
  requestTimeoutMs: number;
}

export function validateSwapInput(input: SwapInput): SwapRequest {
  const inputToken = resolveToken(input.inputToken).symbol;
  const outputToken = resolveToken(input.outputToken).symbol;
  if (inputToken === outputToken) {
    throw new ValidationError('Input and output token must differ');
  }
  if (typeof input.amount !== 'number' || !Number.isFinite(input.amount) || input.amount <= 0) {
    throw new ValidationError('Amount must be a finite number > 0');
  }
  if (!Number.isInteger(input.slippageBps) || input.slippageBps < 0) {
    throw new ValidationError('slippageBps must be an integer >= 0');
  }
  return { inputToken, outputToken, amount: input.amount, slippageBps: input.slippageBps };
}

function toError(op: string, err: unknown): { error: string } {
  if (err instanceof ValidationError || err instanceof WalletError) {
    return { error: err.message };
  }
  log.error(`${op} failed`, { error: errorMessage(err) });
  return { error: errorMessage(err) };
}

/**
 * Operations offered to an outer transport (HTTP routes, a desktop shell).
 * Every method resolves; failures come back as `{ error }`.
 */
export class TradingService {
  constructor(private readonly deps: TradingServiceDeps) {}

  connectWallet(input: { privateKeyMaterial?: string }): { success: boolean; address?: string; error?: string } {
    const result = this.deps.wallet.connect(input.privateKeyMaterial);
    return result.success
      ? { success: true, address: result.address }
      : { success: false, error: result.reason };
  }

  disconnectWallet(): { success: true } {
    return this.deps.wallet.disconnect();
  }

  async walletBalance(): Promise<ServiceResult<{ address: string; sol: number; usdValue: number | null }>> {
    const { wallet, feed } = this.deps;
    const address = wallet.publicAddress;
    if (!address) return { error: 'Wallet not connected' };

    const reading = await wallet.balance();
    if (reading.error) return { error: reading.error };
    const solUsd = await feed.getTokenPrice('SOL');
    return {
      success: true,
      address,
      sol: reading.sol,
      usdValue: solUsd === null ? null : reading.sol * solUsd,
    };
  }

  async executeSwap(input: SwapInput): Promise<ServiceResult<{ trade: TradeView; input: TokenLeg; output: TokenLeg }>> {
    try {
      const request = validateSwapInput(input);
      if (!this.deps.wallet.connected) return { error: 'Wallet not connected' };

      const outcome = await this.deps.executor.execute(request);
      if (outcome.state === 'FAILED') {
        return { error: `Swap failed (${outcome.reason}): ${outcome.error}` };
      }

      const fill = outcome.result.filledAmounts;
      const record = toTradeRecord(
        request.inputToken,
        request.outputToken,
        fill,
        this.deps.executor.policy.universe.quoteToken,
        outcome.result.signature,
        Date.now(),
      );
      const [inUsd, outUsd] = await Promise.all([
        this.deps.feed.getTokenPrice(request.inputToken),
        this.deps.feed.getTokenPrice(request.outputToken),
      ]);

      return {
        success: true,
        trade: { pair: record.pair, type: record.type, price: record.price, amount: record.amount, time: record.time },
        input: { token: request.inputToken, amount: fill.inputAmount, valueUsd: fill.inputAmount * (inUsd ?? 0) },
        output: { token: request.outputToken, amount: fill.outputAmount, valueUsd: fill.outputAmount * (outUsd ?? 0) },
      };
    } catch (err) {
      return toError('executeSwap', err);
    }
  }

  async getQuote(input: SwapInput): Promise<ServiceResult<{ quote: QuoteView }>> {
    try {
      const request = validateSwapInput(input);
      const inputToken = resolveToken(request.inputToken);
      const outputToken = resolveToken(request.outputToken);
      const quote = await withTimeout(
        this.deps.quotes.getQuote({
          inputMint: inputToken.mint,
          outputMint: outputToken.mint,
          amountRaw: toRawAmount(request.amount, inputToken.decimals),
          slippageBps: request.slippageBps,
        }),
        this.deps.requestTimeoutMs,
        'quote',
      );
      return {
        success: true,
        quote: {
          inputToken: inputToken.symbol,
          outputToken: outputToken.symbol,
          inputAmount: quote.inputAmount,
          outputAmount: quote.outputAmount,
          priceImpactPct: quote.priceImpactPct,
          slippageBps: quote.slippageBps,
          routeLabels: quote.routeLabels,
        },
      };
    } catch (err) {
      return toError('getQuote', err);
    }
  }

  async getPortfolio(): Promise<ServiceResult<PortfolioSnapshot>> {
    const { wallet, feed, tokenBalances, book } = this.deps;
    try {
      const owner = wallet.requireAddress();
      const reading = await wallet.balance();
      if (reading.error) return { error: reading.error };

      const [balances, snapshots] = await Promise.all([
        tokenBalances.tokenBalances(owner),
        feed.fetchSnapshots(listTokens().map(t => t.symbol)),
      ]);

      return {
        success: true,
        ...buildPortfolio({
          solBalance: reading.sol,
          tokenBalances: balances,
          usdPrices: new Map(snapshots.map(s => [s.symbol, s.price])),
          openPositions: book.openPositions(),
          realizedPnl: book.totalRealizedPnl(),
          quoteToken: this.deps.executor.policy.universe.quoteToken,
        }),
      };
    } catch (err) {
      return toError('getPortfolio', err);
    }
  }

  getRecentTrades(limit?: number): TradeView[] {
    return this.deps.trades.recent(limit).map(t => ({
      pair: t.pair,
      type: t.type,
      price: t.price,
      amount: t.amount,
      time: t.time,
    }));
  }

  async getMarketData(symbols?: string[]): Promise<ServiceResult<{ snapshots: MarketSnapshot[] }>> {
    try {
      const wanted = symbols ?? this.deps.executor.policy.universe.symbols;
      const resolved = wanted.map(s => resolveToken(s).symbol);
      return { success: true, snapshots: await this.deps.feed.fetchSnapshots(resolved) };
    } catch (err) {
      return toError('getMarketData', err);
    }
  }

  async getTokenPrice(symbol: string): Promise<ServiceResult<{ symbol: string; price: number }>> {
    try {
      const token = resolveToken(symbol);
      const price = await this.deps.feed.getTokenPrice(token.symbol);
      if (price === null) return { error: `No price available for ${token.symbol}` };
      return { success: true, symbol: token.symbol, price };
    } catch (err) {
      return toError('getTokenPrice', err);
    }
  }
}
