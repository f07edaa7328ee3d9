import type { TradeAction } from '../strategy/types';

export interface SwapRequest {
  inputToken: string;   // symbol or mint
  outputToken: string;
  amount: number;       // input token, human units
  slippageBps: number;
}

export interface SwapQuote {
  inputMint: string;
  outputMint: string;
  inAmountRaw: string;  // smallest units
  outAmountRaw: string;
  inputAmount: number;  // human-readable (decimal-adjusted)
  outputAmount: number;
  inputDecimals: number;
  outputDecimals: number;
  priceImpactPct: number;
  slippageBps: number;
  routeLabels: string[];
  fetchedAt: number;
  raw: unknown;         // full quote response, passed back to the swap builder
}

export type FillSource = 'onchain' | 'quote_fallback' | 'paper';

export interface FilledAmounts {
  inputAmount: number;
  outputAmount: number;
  source: FillSource;
}

export interface SubmitReceipt {
  signature: string;
  fill: FilledAmounts;
  feeSol: number;
}

export interface SwapResult {
  signature: string;
  success: boolean;
  filledAmounts: FilledAmounts;
}

export type PipelineState =
  | 'QUOTE_REQUESTED'
  | 'QUOTE_RECEIVED'
  | 'TX_PREPARED'
  | 'TX_SIGNED'
  | 'SUBMITTED'
  | 'CONFIRMED'
  | 'FAILED';

export type FailureReason = 'quote-error' | 'prepare-error' | 'sign-error' | 'submit-error';

export interface StateTransition {
  from: PipelineState;
  to: PipelineState;
  at: number;
}

export type SwapOutcome =
  | {
    state: 'CONFIRMED';
    quote: SwapQuote;
    result: SwapResult;
    transitions: StateTransition[];
    latencyMs: number;
  }
  | {
    state: 'FAILED';
    reason: FailureReason;
    error: string;
    failedFrom: PipelineState;
    quote?: SwapQuote;
    transitions: StateTransition[];
    latencyMs: number;
  };

export interface Position {
  id: string;
  symbol: string;
  action: TradeAction;
  amount: number;       // traded token, human units
  entryPrice: number;   // quote token per traded token
  openedAt: number;
  stopLossPrice: number;
  takeProfitPrice: number;
  entrySignature: string;
  costBasis: number;    // quote token spent (BUY) or received (SELL)
}

export type CloseReason = 'stop-loss' | 'take-profit';

export interface ClosedPosition extends Position {
  closeReason: CloseReason;
  exitPrice: number;
  closedAt: number;
  realizedPnl: number;  // quote token
}

export interface TradeRecord {
  pair: string;
  type: TradeAction;
  price: number;
  amount: number;
  time: number;
  signature: string;
}

export interface QuoteParams {
  inputMint: string;
  outputMint: string;
  amountRaw: bigint;
  slippageBps: number;
}

// External swap-quoting service (quote + unsigned transaction build)
export interface SwapQuoteService {
  getQuote(params: QuoteParams): Promise<SwapQuote>;
  buildSwapTransaction(quote: SwapQuote, userPublicKey: string): Promise<Uint8Array>;
}

// Sends signed bytes to the network and waits for confirmation
export interface TransactionSubmitter {
  readonly name: string;
  submit(signedTransaction: Uint8Array, quote: SwapQuote, owner: string): Promise<SubmitReceipt>;
}
