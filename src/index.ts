import { createLogger, loadAppConfig, loadEnvFile } from './utils';
import { loadTradingPolicy } from './strategy';
import { TradingContext } from './context';

const log = createLogger('main');

async function main() {
  loadEnvFile();
  const config = loadAppConfig();
  const policy = loadTradingPolicy(config.trading.policyPath, config.trading.policyOverrides);

  log.info('Signal trader starting', {
    policyVersion: policy.version,
    paperTrading: config.trading.paperTrading,
    tradingEnabled: policy.tradingEnabled,
    universe: policy.universe.symbols,
    maxTradeAmount: policy.maxTradeAmount,
    maxDailyTrades: policy.maxDailyTrades,
    minConfidence: policy.minConfidence,
  });

  const ctx = new TradingContext(config, policy);
  ctx.init();

  let shuttingDown = false;
  const shutdown = async () => {
    if (shuttingDown) return;
    shuttingDown = true;
    log.info('Shutting down, waiting for the current cycle...');
    try {
      await ctx.close();
      log.info('Goodbye');
      process.exit(0);
    } catch (err) {
      log.error('Shutdown failed', err);
      process.exit(1);
    }
  };

  process.on('SIGINT', () => void shutdown());
  process.on('SIGTERM', () => void shutdown());

  log.info('Trading loop running. Press Ctrl+C to stop.');
  await ctx.startLoop();
}

main().catch((err) => {
  log.error('Fatal error', err);
  process.exit(1);
});
