export { loadAppConfig, loadEnvFile, ROOT_DIR } from './config';
export type { AppConfig, PolicyOverrides } from './config';
export { createLogger, redactUrl } from './logger';
export type { Logger } from './logger';
export { RpcPool } from './rpc';
export type { RpcPoolOptions, ConnectionFactory } from './rpc';
export { WalletState, rpcBalanceProvider, decodeSecretKey, LAMPORTS_PER_SOL } from './wallet';
export type { BalanceProvider, BalanceReading, ConnectResult, WalletSnapshot } from './wallet';
export { WalletError, ValidationError, TimeoutError, errorMessage } from './errors';
export type { WalletErrorCode } from './errors';
export { sleep, withTimeout, backoffMs } from './timing';
export { getWithRetry, postWithRetry } from './http';
export type { RequestOptions } from './http';
export { isRecord, asString, asNumber } from './json';
