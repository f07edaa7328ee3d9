export { validateQuote } from './guards';
export type { GuardResult, QuoteLimits } from './guards';
export { JupiterSwapService } from './jupiter-swap';
export type { JupiterOptions } from './jupiter-swap';
export { RpcTransactionSubmitter } from './submitter';
export { PaperTransactionSubmitter } from './paper-submitter';
export { SwapExecutor, protectiveLevels } from './swap-executor';
export type { SwapExecutorDeps, SignalExecution, ExecutorTimeouts } from './swap-executor';
export { PositionBook, realizedPnl } from './position-book';
export { PositionMonitor, exitReason } from './position-monitor';
export { TradeHistory, toTradeRecord, MAX_RECENT_TRADES } from './trade-history';
export { buildPortfolio, rpcTokenBalanceProvider } from './portfolio';
export type { Holding, PortfolioSnapshot, TokenBalanceProvider } from './portfolio';
export { findToken, resolveToken, listTokens, symbolForMint, toRawAmount, rawToHuman, SOL_MINT, USDC_MINT } from './tokens';
export type { TokenInfo } from './tokens';
export type {
  SwapRequest,
  SwapQuote,
  SwapResult,
  SwapOutcome,
  PipelineState,
  FailureReason,
  Position,
  ClosedPosition,
  CloseReason,
  TradeRecord,
  SwapQuoteService,
  TransactionSubmitter,
} from './types';
