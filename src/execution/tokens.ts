import { ValidationError } from '../utils/errors';

export interface TokenInfo {
  symbol: string;
  mint: string;
  decimals: number;
  coingeckoId: string;
}

export const SOL_MINT = 'So11111111111111111111111111111111111111112';
export const USDC_MINT = 'EPjFWdd5AufqSSqeM2qN1xzybapC8G4wEGGkZwyTDt1v';

const TOKENS: readonly TokenInfo[] = [
  { symbol: 'SOL', mint: SOL_MINT, decimals: 9, coingeckoId: 'solana' },
  { symbol: 'USDC', mint: USDC_MINT, decimals: 6, coingeckoId: 'usd-coin' },
  { symbol: 'BONK', mint: 'DezXAZ8z7PnrnRJjz3wXBoRgixCa6xjnB7YaB1pPB263', decimals: 5, coingeckoId: 'bonk' },
  { symbol: 'JUP', mint: 'JUPyiwrYJFskUPiHa7hkeR8VUtAeFoSYbKedZNsDvCN', decimals: 6, coingeckoId: 'jupiter-exchange-solana' },
  { symbol: 'JTO', mint: 'jtojtomepa8beP8AuQc6eXt5FriJwfFMwQx2v2f9mCL', decimals: 9, coingeckoId: 'jito-governance-token' },
];

const bySymbol = new Map(TOKENS.map(t => [t.symbol, t]));
const byMint = new Map(TOKENS.map(t => [t.mint, t]));

export function findToken(symbolOrMint: string): TokenInfo | undefined {
  return bySymbol.get(symbolOrMint.toUpperCase()) ?? byMint.get(symbolOrMint);
}

export function resolveToken(symbolOrMint: string): TokenInfo {
  const token = findToken(symbolOrMint);
  if (!token) throw new ValidationError(`Unknown token: ${symbolOrMint}`);
  return token;
}

export function symbolForMint(mint: string): string {
  return byMint.get(mint)?.symbol ?? `${mint.slice(0, 4)}...${mint.slice(-4)}`;
}

export function listTokens(): readonly TokenInfo[] {
  return TOKENS;
}

export function toRawAmount(amount: number, decimals: number): bigint {
  return BigInt(Math.round(amount * Math.pow(10, decimals)));
}

export function rawToHuman(raw: string | bigint, decimals: number): number {
  return Number(raw) / Math.pow(10, decimals);
}
