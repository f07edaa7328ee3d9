export interface MarketSnapshot {
  readonly symbol: string;
  readonly price: number;           // USD
  readonly volume: number;          // 24h volume, USD
  readonly priceChange24h: number;  // percent, e.g. 6 = +6%
  readonly marketCap?: number;
  readonly capturedAt: number;      // unix ms
}

export interface SentimentScore {
  readonly symbol: string;
  readonly score: number;           // 0..1
  readonly capturedAt: number;
}
