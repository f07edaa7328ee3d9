import { describe, it, expect } from 'vitest';
import { PublicKey } from '@solana/web3.js';
import { buildPortfolio, rpcTokenBalanceProvider } from '../src/execution/portfolio';
import { USDC_MINT } from '../src/execution/tokens';
import type { Position } from '../src/execution/types';
import { RpcPool } from '../src/utils/rpc';

const JUP_MINT = 'JUPyiwrYJFskUPiHa7hkeR8VUtAeFoSYbKedZNsDvCN';

function position(symbol: string, entryPrice: number, amount: number): Position {
  return {
    id: `${symbol}-1`,
    symbol,
    action: 'BUY',
    amount,
    entryPrice,
    openedAt: 1,
    stopLossPrice: entryPrice * 0.5,
    takeProfitPrice: entryPrice * 2,
    entrySignature: 'sig',
    costBasis: entryPrice * amount,
  };
}

describe('portfolio', () => {
  it('values holdings in USD and marks open positions', () => {
    const snapshot = buildPortfolio({
      solBalance: 2,
      tokenBalances: new Map([['JUP', 100], ['USDC', 50]]),
      usdPrices: new Map([['SOL', 150], ['JUP', 0.5], ['USDC', 1]]),
      openPositions: [position('JUP', 0.25, 100)],
      realizedPnl: 0,
      quoteToken: 'USDC',
    });

    // 300 + 50 + 50, with 25 USDC of open gain on JUP
    expect(snapshot).toEqual({
      totalValue: 400,
      totalPnL: 25,
      pnlPercentage: 25 / 375 * 100,
      holdings: [
        { token: 'SOL', amount: 2, value: 300, pnl: 0 },
        { token: 'JUP', amount: 100, value: 50, pnl: 25 },
        { token: 'USDC', amount: 50, value: 50, pnl: 0 },
      ],
    });
  });

  it('adds realised PnL and drops empty balances', () => {
    const snapshot = buildPortfolio({
      solBalance: 0,
      tokenBalances: new Map([['USDC', 10], ['JTO', 0]]),
      usdPrices: new Map([['USDC', 1]]),
      openPositions: [],
      realizedPnl: -2,
      quoteToken: 'USDC',
    });
    expect(snapshot.holdings).toEqual([{ token: 'USDC', amount: 10, value: 10, pnl: 0 }]);
    expect(snapshot.totalPnL).toBe(-2);
    expect(snapshot.pnlPercentage).toBe(-2 / 12 * 100);
  });

  it('reports zero percent for an empty wallet', () => {
    const snapshot = buildPortfolio({
      solBalance: 0,
      tokenBalances: new Map(),
      usdPrices: new Map(),
      openPositions: [],
      realizedPnl: 0,
      quoteToken: 'USDC',
    });
    expect(snapshot).toEqual({ totalValue: 0, totalPnL: 0, pnlPercentage: 0, holdings: [] });
  });
});

describe('token balances over rpc', () => {
  it('sums parsed token accounts by known symbol', async () => {
    const account = (mint: string, uiAmount: number | null) => ({
      pubkey: PublicKey.default,
      account: {
        executable: false,
        owner: PublicKey.default,
        lamports: 2_039_280,
        rentEpoch: 0,
        data: { program: 'spl-token', space: 165, parsed: { info: { mint, tokenAmount: { uiAmount } } } },
      },
    });
    const conn = {
      getParsedTokenAccountsByOwner: async () => ({
        context: { slot: 1 },
        value: [
          account(USDC_MINT, 5),
          account(USDC_MINT, 2.5),
          account(JUP_MINT, null),
          account('UnknownMint1111111111111111111111111111111', 9),
        ],
      }),
    };
    const pool = new RpcPool({ endpoints: ['https://rpc.test'], maxAttemptsPerEndpoint: 1, backoffMs: 0 }, () => conn);

    const balances = await rpcTokenBalanceProvider(pool).tokenBalances(PublicKey.default);
    expect(balances).toEqual(new Map([['USDC', 7.5]]));
  });
});
