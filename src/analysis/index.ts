export { MarketDataFeed, CoinGeckoPriceSource, priceMap } from './market-data';
export type { PriceSource, PriceQuote, CoinGeckoOptions } from './market-data';
export {
  SentimentProbe,
  SearchSentimentSource,
  NeutralSentimentSource,
  selectSentimentSource,
  toUnitScore,
} from './sentiment';
export type { SentimentSource, SearchCapability, DisplaySurface } from './sentiment';
export type { MarketSnapshot, SentimentScore } from './types';
