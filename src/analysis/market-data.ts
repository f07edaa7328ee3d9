import { createLogger, errorMessage, getWithRetry, isRecord, asNumber } from '../utils';
import { findToken, type TokenInfo } from '../execution/tokens';
import type { MarketSnapshot } from './types';

const log = createLogger('market-data');

export interface PriceQuote {
  priceUsd: number;
  volume24hUsd: number;
  change24hPct: number;
  marketCapUsd?: number;
}

// Async price lookup; keyed by token symbol. Tokens the source has no data for are left out.
export interface PriceSource {
  readonly name: string;
  fetchPrices(tokens: readonly TokenInfo[]): Promise<Map<string, PriceQuote>>;
}

export interface CoinGeckoOptions {
  baseUrl: string;
  timeoutMs: number;
  maxRetries?: number;
}

export class CoinGeckoPriceSource implements PriceSource {
  readonly name = 'coingecko';

  constructor(private readonly opts: CoinGeckoOptions) {}

  async fetchPrices(tokens: readonly TokenInfo[]): Promise<Map<string, PriceQuote>> {
    const prices = new Map<string, PriceQuote>();
    if (tokens.length === 0) return prices;

    const params = new URLSearchParams({
      ids: tokens.map(t => t.coingeckoId).join(','),
      vs_currencies: 'usd',
      include_24hr_change: 'true',
      include_24hr_vol: 'true',
      include_market_cap: 'true',
    });
    const res = await getWithRetry(`${this.opts.baseUrl}/simple/price?${params}`, {
      timeoutMs: this.opts.timeoutMs,
      maxRetries: this.opts.maxRetries,
    });
    if (!res.ok) throw new Error(`CoinGecko HTTP ${res.status}`);

    const json: unknown = await res.json();
    if (!isRecord(json)) throw new Error('CoinGecko: unexpected response');

    for (const token of tokens) {
      const entry = json[token.coingeckoId];
      if (!isRecord(entry)) continue;
      const priceUsd = asNumber(entry.usd);
      if (priceUsd === undefined || priceUsd <= 0) continue;
      prices.set(token.symbol, {
        priceUsd,
        volume24hUsd: asNumber(entry.usd_24h_vol) ?? 0,
        change24hPct: asNumber(entry.usd_24h_change) ?? 0,
        marketCapUsd: asNumber(entry.usd_market_cap),
      });
    }
    return prices;
  }
}

const PRICE_CACHE_TTL_MS = 60_000;

/**
 * Turns a price source into immutable per-cycle snapshots. A failing source
 * yields no snapshots; the cycle carries on without market data.
 */
export class MarketDataFeed {
  private readonly priceCache = new Map<string, { price: number; fetchedAt: number }>();

  constructor(
    private readonly source: PriceSource,
    private readonly clock: () => number = Date.now,
  ) {}

  async fetchSnapshots(symbols: readonly string[]): Promise<MarketSnapshot[]> {
    const tokens: TokenInfo[] = [];
    for (const symbol of symbols) {
      const token = findToken(symbol);
      if (token) tokens.push(token);
      else log.warn('Unknown symbol skipped', { symbol });
    }

    let prices: Map<string, PriceQuote>;
    try {
      prices = await this.source.fetchPrices(tokens);
    } catch (err) {
      log.warn('Price source failed', { source: this.source.name, error: errorMessage(err) });
      return [];
    }

    const capturedAt = this.clock();
    const snapshots: MarketSnapshot[] = [];
    for (const token of tokens) {
      const quote = prices.get(token.symbol);
      if (!quote) continue;
      this.priceCache.set(token.symbol, { price: quote.priceUsd, fetchedAt: capturedAt });
      snapshots.push(Object.freeze({
        symbol: token.symbol,
        price: quote.priceUsd,
        volume: quote.volume24hUsd,
        priceChange24h: quote.change24hPct,
        marketCap: quote.marketCapUsd,
        capturedAt,
      }));
    }

    log.debug('Snapshots fetched', { requested: tokens.length, received: snapshots.length });
    return snapshots;
  }

  async getTokenPrice(symbol: string): Promise<number | null> {
    const token = findToken(symbol);
    if (!token) return null;

    const cached = this.priceCache.get(token.symbol);
    if (cached && this.clock() - cached.fetchedAt < PRICE_CACHE_TTL_MS) return cached.price;

    const [snapshot] = await this.fetchSnapshots([token.symbol]);
    return snapshot ? snapshot.price : null;
  }
}

export function priceMap(snapshots: readonly MarketSnapshot[]): Map<string, number> {
  return new Map(snapshots.map(s => [s.symbol, s.price]));
}
