import { PublicKey, type Connection } from '@solana/web3.js';
import { isRecord, asNumber, asString, type RpcPool } from '../utils';
import { realizedPnl } from './position-book';
import { findToken } from './tokens';
import type { Position } from './types';

const TOKEN_PROGRAM_ID = new PublicKey('TokenkegQfeZyiNwAJbNbGKPFXCWuBvf9Ss623VQ5DA');

export interface Holding {
  token: string;
  amount: number;
  value: number;   // USD
  pnl: number;     // unrealised, quote token
}

export interface PortfolioSnapshot {
  totalValue: number;
  totalPnL: number;
  pnlPercentage: number;
  holdings: Holding[];
}

// SPL balances by symbol for the known token table
export interface TokenBalanceProvider {
  tokenBalances(owner: PublicKey): Promise<Map<string, number>>;
}

type TokenAccountConnection = Pick<Connection, 'getParsedTokenAccountsByOwner'>;

export function rpcTokenBalanceProvider<C extends TokenAccountConnection>(pool: RpcPool<C>): TokenBalanceProvider {
  return {
    async tokenBalances(owner) {
      const res = await pool.run(
        conn => conn.getParsedTokenAccountsByOwner(owner, { programId: TOKEN_PROGRAM_ID }),
        'getParsedTokenAccountsByOwner',
      );

      const balances = new Map<string, number>();
      for (const { account } of res.value) {
        const parsed: unknown = account.data.parsed;
        const info = isRecord(parsed) && isRecord(parsed.info) ? parsed.info : null;
        if (!info || !isRecord(info.tokenAmount)) continue;
        const mint = asString(info.mint);
        const token = mint ? findToken(mint) : undefined;
        const amount = asNumber(info.tokenAmount.uiAmount);
        if (!token || amount === undefined) continue;
        balances.set(token.symbol, (balances.get(token.symbol) ?? 0) + amount);
      }
      return balances;
    },
  };
}

export interface PortfolioInputs {
  solBalance: number;
  tokenBalances: ReadonlyMap<string, number>;
  usdPrices: ReadonlyMap<string, number>;
  openPositions: readonly Position[];
  realizedPnl: number;
  quoteToken: string;
}

export function buildPortfolio(inputs: PortfolioInputs): PortfolioSnapshot {
  const { usdPrices, quoteToken } = inputs;
  const quoteUsd = usdPrices.get(quoteToken) ?? 1;

  const amounts = new Map<string, number>([['SOL', inputs.solBalance]]);
  for (const [symbol, amount] of inputs.tokenBalances) {
    amounts.set(symbol, (amounts.get(symbol) ?? 0) + amount);
  }

  // Unrealised PnL per symbol, marked at the current price in quote token
  const openPnl = new Map<string, number>();
  for (const position of inputs.openPositions) {
    const priceUsd = usdPrices.get(position.symbol);
    if (priceUsd === undefined || !(priceUsd > 0)) continue;
    openPnl.set(position.symbol, realizedPnl(position, priceUsd / quoteUsd));
  }

  const holdings: Holding[] = [];
  for (const [symbol, amount] of amounts) {
    if (!(amount > 0)) continue;
    const priceUsd = usdPrices.get(symbol) ?? 0;
    holdings.push({ token: symbol, amount, value: amount * priceUsd, pnl: openPnl.get(symbol) ?? 0 });
  }

  const totalValue = holdings.reduce((sum, h) => sum + h.value, 0);
  const unrealized = Array.from(openPnl.values()).reduce((sum, v) => sum + v, 0);
  const totalPnL = unrealized + inputs.realizedPnl;
  const basis = totalValue - totalPnL;

  return {
    totalValue,
    totalPnL,
    pnlPercentage: basis > 0 ? (totalPnL / basis) * 100 : 0,
    holdings,
  };
}
