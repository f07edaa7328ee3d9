import { Keypair, PublicKey, TransactionMessage, VersionedTransaction } from '@solana/web3.js';
import { findToken } from '../src/execution/tokens';
import type {
  QuoteParams,
  SubmitReceipt,
  SwapQuote,
  SwapQuoteService,
  TransactionSubmitter,
} from '../src/execution/types';
import type { TradingPolicy } from '../src/strategy/trading-policy';
import type { BalanceProvider } from '../src/utils/wallet';

export function makePolicy(overrides: Partial<TradingPolicy> = {}): TradingPolicy {
  return {
    version: 'test',
    maxTradeAmount: 0.01,
    maxDailyTrades: 10,
    riskFraction: 0.02,
    stopLossFraction: 0.05,
    takeProfitFraction: 0.1,
    minConfidence: 0.6,
    tradingEnabled: true,
    suggestedAmount: 0.01,
    slippageBps: 100,
    quoteMaxAgeMs: 30_000,
    maxPriceImpactPct: 2,
    universe: { symbols: ['SOL', 'JUP', 'BONK', 'JTO'], quoteToken: 'USDC' },
    ...overrides,
  };
}

// Unsigned v0 transaction paying from `payer`, built offline
export function unsignedTx(payer: PublicKey): Uint8Array {
  const message = new TransactionMessage({
    payerKey: payer,
    recentBlockhash: Keypair.generate().publicKey.toBase58(),
    instructions: [],
  }).compileToV0Message();
  return new VersionedTransaction(message).serialize();
}

export class FixedBalance implements BalanceProvider {
  calls = 0;
  constructor(public lamports: number, public fail = false) {}

  async getBalance(): Promise<number> {
    this.calls++;
    if (this.fail) throw new Error('rpc down');
    return this.lamports;
  }
}

export interface FakeQuoteOptions {
  // human amounts returned for every quote
  inputAmount?: number;
  outputAmount?: number;
  priceImpactPct?: number;
  fetchedAt?: () => number;
  quoteError?: Error;
  buildError?: Error;
  onBuild?: () => void;
}

export class FakeQuoteService implements SwapQuoteService {
  readonly quoteCalls: QuoteParams[] = [];
  buildCalls = 0;

  constructor(private readonly opts: FakeQuoteOptions = {}) {}

  async getQuote(params: QuoteParams): Promise<SwapQuote> {
    this.quoteCalls.push(params);
    if (this.opts.quoteError) throw this.opts.quoteError;

    const inputDecimals = findToken(params.inputMint)?.decimals ?? 9;
    const outputDecimals = findToken(params.outputMint)?.decimals ?? 9;
    const inputAmount = this.opts.inputAmount ?? Number(params.amountRaw) / 10 ** inputDecimals;
    const outputAmount = this.opts.outputAmount ?? 1;

    return {
      inputMint: params.inputMint,
      outputMint: params.outputMint,
      inAmountRaw: params.amountRaw.toString(),
      outAmountRaw: Math.round(outputAmount * 10 ** outputDecimals).toString(),
      inputAmount,
      outputAmount,
      inputDecimals,
      outputDecimals,
      priceImpactPct: this.opts.priceImpactPct ?? 0.1,
      slippageBps: params.slippageBps,
      routeLabels: ['TestAMM'],
      fetchedAt: this.opts.fetchedAt ? this.opts.fetchedAt() : Date.now(),
      raw: {},
    };
  }

  async buildSwapTransaction(_quote: SwapQuote, userPublicKey: string): Promise<Uint8Array> {
    this.buildCalls++;
    if (this.opts.buildError) throw this.opts.buildError;
    this.opts.onBuild?.();
    return unsignedTx(new PublicKey(userPublicKey));
  }
}

export class FakeSubmitter implements TransactionSubmitter {
  readonly name = 'fake';
  readonly submitted: Uint8Array[] = [];

  // Set or clear between calls to fail later submissions
  constructor(public fail?: Error) {}

  async submit(signedTransaction: Uint8Array, quote: SwapQuote): Promise<SubmitReceipt> {
    this.submitted.push(signedTransaction);
    if (this.fail) throw this.fail;
    return {
      signature: `sig-${this.submitted.length}`,
      fill: { inputAmount: quote.inputAmount, outputAmount: quote.outputAmount, source: 'onchain' },
      feeSol: 0.000005,
    };
  }
}
