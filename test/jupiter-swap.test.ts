import { afterEach, describe, it, expect, vi } from 'vitest';
import { JupiterSwapService } from '../src/execution/jupiter-swap';
import { CoinGeckoPriceSource } from '../src/analysis/market-data';
import { listTokens, SOL_MINT, USDC_MINT } from '../src/execution/tokens';

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), { status, headers: { 'Content-Type': 'application/json' } });
}

function stubFetch(...responses: Response[]) {
  const fetchMock = vi.fn<(url: string | URL | Request, init?: RequestInit) => Promise<Response>>();
  for (const res of responses) fetchMock.mockResolvedValueOnce(res);
  vi.stubGlobal('fetch', fetchMock);
  return fetchMock;
}

const service = new JupiterSwapService({ baseUrl: 'https://quote.test/swap/v1', apiKey: 'test-key', timeoutMs: 1_000, maxRetries: 0 });
const params = { inputMint: SOL_MINT, outputMint: USDC_MINT, amountRaw: 10_000_000n, slippageBps: 50 };

afterEach(() => {
  vi.unstubAllGlobals();
});

describe('jupiter quotes', () => {
  it('parses amounts, impact and route labels', async () => {
    const fetchMock = stubFetch(jsonResponse({
      inAmount: '10000000',
      outAmount: '1500000',
      priceImpactPct: '0.0123',
      routePlan: [{ swapInfo: { label: 'Whirlpool' } }, { swapInfo: {} }, 'junk'],
    }));

    const quote = await service.getQuote(params);
    expect(quote).toMatchObject({
      inAmountRaw: '10000000',
      outAmountRaw: '1500000',
      inputAmount: 0.01,
      outputAmount: 1.5,
      inputDecimals: 9,
      outputDecimals: 6,
      priceImpactPct: 0.0123,
      slippageBps: 50,
      routeLabels: ['Whirlpool'],
    });

    const [url, init] = fetchMock.mock.calls[0];
    expect(String(url)).toBe(
      `https://quote.test/swap/v1/quote?inputMint=${SOL_MINT}&outputMint=${USDC_MINT}&amount=10000000&slippageBps=50`,
    );
    expect(init?.headers).toEqual({ 'x-api-key': 'test-key' });
  });

  it('fails on an HTTP error', async () => {
    stubFetch(new Response('bad request', { status: 400 }));
    await expect(service.getQuote(params)).rejects.toThrow('Jupiter quote HTTP 400');
  });

  it('fails on an error body or missing amounts', async () => {
    stubFetch(jsonResponse({ error: 'No routes found' }));
    await expect(service.getQuote(params)).rejects.toThrow('Jupiter quote error: No routes found');

    stubFetch(jsonResponse({ inAmount: '10000000', outAmount: 1500000 }));
    await expect(service.getQuote(params)).rejects.toThrow('Jupiter quote: missing amounts');
  });
});

describe('jupiter swap build', () => {
  it('posts the raw quote and decodes the base64 transaction', async () => {
    const rawQuote = { inAmount: '10000000', outAmount: '1500000' };
    const fetchMock = stubFetch(
      jsonResponse(rawQuote),
      jsonResponse({ swapTransaction: Buffer.from([1, 2, 3]).toString('base64') }),
    );
    const quote = await service.getQuote(params);
    expect(quote.routeLabels).toEqual([]);
    expect(quote.priceImpactPct).toBe(0);

    const tx = await service.buildSwapTransaction(quote, 'owner-address');
    expect(Array.from(tx)).toEqual([1, 2, 3]);

    const [url, init] = fetchMock.mock.calls[1];
    expect(String(url)).toBe('https://quote.test/swap/v1/swap');
    expect(init?.method).toBe('POST');
    expect(JSON.parse(String(init?.body))).toEqual({
      quoteResponse: rawQuote,
      userPublicKey: 'owner-address',
      wrapAndUnwrapSol: true,
      dynamicComputeUnitLimit: true,
      prioritizationFeeLamports: 'auto',
    });
  });

  it('reports the build error message', async () => {
    stubFetch(
      jsonResponse({ inAmount: '10000000', outAmount: '1500000' }),
      jsonResponse({ error: 'Invalid quote' }, 400),
    );
    const quote = await service.getQuote(params);
    await expect(service.buildSwapTransaction(quote, 'owner')).rejects.toThrow('Jupiter swap build failed: Invalid quote');
  });
});

describe('coingecko prices', () => {
  it('maps ids back to symbols and skips missing prices', async () => {
    const fetchMock = stubFetch(jsonResponse({
      solana: { usd: 150, usd_24h_change: 6.5, usd_24h_vol: 2e9, usd_market_cap: 7e10 },
      'usd-coin': { usd: 1 },
      bonk: { usd: 0 },
    }));
    const source = new CoinGeckoPriceSource({ baseUrl: 'https://prices.test/api/v3', timeoutMs: 1_000, maxRetries: 0 });
    const tokens = listTokens().filter(t => ['SOL', 'USDC', 'BONK'].includes(t.symbol));

    const prices = await source.fetchPrices(tokens);
    expect(prices).toEqual(new Map([
      ['SOL', { priceUsd: 150, volume24hUsd: 2e9, change24hPct: 6.5, marketCapUsd: 7e10 }],
      ['USDC', { priceUsd: 1, volume24hUsd: 0, change24hPct: 0, marketCapUsd: undefined }],
    ]));
    expect(String(fetchMock.mock.calls[0][0])).toContain('ids=solana%2Cusd-coin%2Cbonk');
  });

  it('throws on an HTTP error so the feed can fall back', async () => {
    stubFetch(new Response('', { status: 404 }));
    const source = new CoinGeckoPriceSource({ baseUrl: 'https://prices.test/api/v3', timeoutMs: 1_000, maxRetries: 0 });
    await expect(source.fetchPrices(listTokens())).rejects.toThrow('CoinGecko HTTP 404');
  });
});
