import type { Connection } from '@solana/web3.js';
import { createLogger, rpcBalanceProvider, RpcPool, WalletState, type AppConfig } from './utils';
import {
  CoinGeckoPriceSource,
  MarketDataFeed,
  NeutralSentimentSource,
  SearchSentimentSource,
  SentimentProbe,
  selectSentimentSource,
  type DisplaySurface,
  type SearchCapability,
} from './analysis';
import { DecisionJournal } from './data';
import { TradingLoop } from './engine/trading-loop';
import {
  JupiterSwapService,
  PaperTransactionSubmitter,
  PositionBook,
  PositionMonitor,
  RpcTransactionSubmitter,
  SwapExecutor,
  TradeHistory,
  rpcTokenBalanceProvider,
  type TransactionSubmitter,
} from './execution';
import { DailyTradeCounter, type TradingPolicy } from './strategy';
import { TradingService } from './service/trading-service';

const log = createLogger('context');

export interface Capabilities {
  search?: SearchCapability | null;
  display?: DisplaySurface;
}

/**
 * Every long-lived component, built once from configuration and handed to its
 * consumers through constructors. init() and close() bracket its lifetime.
 */
export class TradingContext {
  readonly pool: RpcPool<Connection>;
  readonly wallet: WalletState;
  readonly feed: MarketDataFeed;
  readonly sentiment: SentimentProbe;
  readonly book = new PositionBook();
  readonly monitor: PositionMonitor;
  readonly trades = new TradeHistory();
  readonly counter: DailyTradeCounter;
  readonly journal: DecisionJournal;
  readonly submitter: TransactionSubmitter;
  readonly executor: SwapExecutor;
  readonly loop: TradingLoop;
  readonly service: TradingService;

  constructor(
    readonly config: AppConfig,
    readonly policy: TradingPolicy,
    capabilities: Capabilities = {},
  ) {
    this.pool = RpcPool.create(config.rpc);
    this.wallet = new WalletState(rpcBalanceProvider(this.pool));
    this.feed = new MarketDataFeed(new CoinGeckoPriceSource({
      baseUrl: config.marketData.baseUrl,
      timeoutMs: config.timeouts.requestMs,
    }));
    this.sentiment = new SentimentProbe(selectSentimentSource([
      new SearchSentimentSource(capabilities.search ?? null),
      new NeutralSentimentSource(),
    ]));
    this.monitor = new PositionMonitor(this.book);
    this.counter = new DailyTradeCounter(Date.now());
    this.journal = new DecisionJournal(config.dataDir);

    const quotes = new JupiterSwapService({
      baseUrl: config.jupiter.baseUrl,
      apiKey: config.jupiter.apiKey,
      timeoutMs: config.timeouts.requestMs,
    });
    this.submitter = config.trading.paperTrading
      ? new PaperTransactionSubmitter()
      : new RpcTransactionSubmitter(this.pool);

    this.executor = new SwapExecutor({
      wallet: this.wallet,
      quotes,
      submitter: this.submitter,
      book: this.book,
      counter: this.counter,
      trades: this.trades,
      policy,
      timeouts: config.timeouts,
      journal: this.journal,
    });

    this.loop = new TradingLoop({
      policy,
      counter: this.counter,
      wallet: this.wallet,
      feed: this.feed,
      sentiment: this.sentiment,
      executor: this.executor,
      monitor: this.monitor,
      book: this.book,
      journal: this.journal,
      display: capabilities.display,
      dataDir: config.dataDir,
      intervalMs: config.loop.intervalMs,
      errorBackoffMs: config.loop.errorBackoffMs,
    });

    this.service = new TradingService({
      wallet: this.wallet,
      executor: this.executor,
      quotes,
      feed: this.feed,
      tokenBalances: rpcTokenBalanceProvider(this.pool),
      book: this.book,
      trades: this.trades,
      requestTimeoutMs: config.timeouts.requestMs,
    });
  }

  /** Connects the wallet and restores open positions. Bad credentials are fatal. */
  init() {
    const { wallet: walletCfg, trading } = this.config;
    const result = walletCfg.privateKey
      ? this.wallet.connect(walletCfg.privateKey)
      : trading.paperTrading
        ? this.wallet.connectEphemeral()
        : { success: false as const, reason: 'WALLET_PRIVATE_KEY is required for live trading' };
    if (!result.success) {
      throw new Error(`Wallet connect failed: ${result.reason}`);
    }

    const restored = this.book.load(this.config.dataDir);
    log.info('Context ready', {
      wallet: result.address,
      submitter: this.submitter.name,
      sentiment: this.sentiment.sourceName,
      journal: this.journal.enabled,
      rpcEndpoints: this.pool.endpoints.length,
      restoredPositions: restored,
    });
  }

  startLoop(): Promise<void> {
    return this.loop.start();
  }

  async close() {
    await this.loop.stop();
    this.book.save(this.config.dataDir);
    this.wallet.disconnect();
    log.info('Context closed');
  }
}
