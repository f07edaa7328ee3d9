import dotenv from 'dotenv';
import path from 'path';

export const ROOT_DIR = path.resolve(__dirname, '../..');

const PUBLIC_MAINNET_RPC = 'https://api.mainnet-beta.solana.com';

type Env = Record<string, string | undefined>;

export interface PolicyOverrides {
  tradingEnabled?: boolean;
  maxTradeAmount?: number;
  maxDailyTrades?: number;
  minConfidence?: number;
}

export interface AppConfig {
  rpc: {
    endpoints: string[];
    maxAttemptsPerEndpoint: number;
    backoffMs: number;
  };
  wallet: {
    privateKey: string;
  };
  trading: {
    paperTrading: boolean;
    policyPath: string;
    policyOverrides: PolicyOverrides;
  };
  jupiter: {
    baseUrl: string;
    apiKey?: string;
  };
  marketData: {
    baseUrl: string;
  };
  loop: {
    intervalMs: number;
    errorBackoffMs: number;
  };
  timeouts: {
    requestMs: number;
    confirmMs: number;
  };
  dataDir: string;
}

export function loadEnvFile(file = path.join(ROOT_DIR, '.env')) {
  dotenv.config({ path: file });
}

export function loadAppConfig(env: Env = process.env): AppConfig {
  function required(key: string): string {
    const val = env[key];
    if (!val) throw new Error(`Missing required env var: ${key}`);
    return val;
  }

  function optional(key: string, fallback: string): string {
    return env[key] || fallback;
  }

  function number(key: string, fallback: number): number {
    const raw = env[key];
    if (!raw) return fallback;
    const val = Number(raw);
    if (!Number.isFinite(val)) throw new Error(`Env var ${key} must be a number, got "${raw}"`);
    return val;
  }

  function maybeNumber(key: string): number | undefined {
    return env[key] ? number(key, 0) : undefined;
  }

  function maybeBool(key: string): boolean | undefined {
    const raw = env[key];
    if (!raw) return undefined;
    return raw.toLowerCase() === 'true';
  }

  const isPaperMode = optional('PAPER_TRADING', 'true').toLowerCase() === 'true';

  const endpoints = [
    env.SOLANA_RPC_URL,
    ...(env.SOLANA_RPC_FALLBACK_URLS ?? '').split(','),
    PUBLIC_MAINNET_RPC,
  ]
    .map(u => (u ?? '').trim())
    .filter(u => u.length > 0);

  return {
    rpc: {
      endpoints: Array.from(new Set(endpoints)),
      maxAttemptsPerEndpoint: Math.max(1, Math.floor(number('RPC_MAX_ATTEMPTS', 2))),
      backoffMs: number('RPC_BACKOFF_MS', 500),
    },
    wallet: {
      privateKey: isPaperMode ? optional('WALLET_PRIVATE_KEY', '') : required('WALLET_PRIVATE_KEY'),
    },
    trading: {
      paperTrading: isPaperMode,
      policyPath: path.resolve(ROOT_DIR, optional('TRADING_POLICY_PATH', 'config/trading-policy.json')),
      policyOverrides: {
        tradingEnabled: maybeBool('TRADING_ENABLED'),
        maxTradeAmount: maybeNumber('MAX_TRADE_AMOUNT'),
        maxDailyTrades: maybeNumber('MAX_DAILY_TRADES'),
        minConfidence: maybeNumber('MIN_CONFIDENCE'),
      },
    },
    jupiter: {
      baseUrl: optional('JUPITER_API_URL', 'https://lite-api.jup.ag/swap/v1'),
      apiKey: env.JUPITER_API_KEY || undefined,
    },
    marketData: {
      baseUrl: optional('COINGECKO_API_URL', 'https://api.coingecko.com/api/v3'),
    },
    loop: {
      intervalMs: number('LOOP_INTERVAL_MS', 5 * 60_000),
      errorBackoffMs: number('LOOP_ERROR_BACKOFF_MS', 60_000),
    },
    timeouts: {
      requestMs: number('REQUEST_TIMEOUT_MS', 10_000),
      confirmMs: number('CONFIRM_TIMEOUT_MS', 60_000),
    },
    dataDir: path.resolve(ROOT_DIR, optional('DATA_DIR', 'data')),
  };
}
