import { PorterStemmer, SentimentAnalyzer, WordTokenizer } from 'natural';
import { createLogger, errorMessage } from '../utils';
import type { SentimentScore } from './types';

const log = createLogger('sentiment');

// External browsing/search capability: returns page text gathered for a topic
export interface SearchCapability {
  search(topic: string): Promise<string[]>;
}

// Optional clipboard/display surface for cycle summaries
export interface DisplaySurface {
  display(text: string): Promise<void>;
}

export interface SentimentSource {
  readonly name: string;
  isAvailable(): boolean;
  /** Score in [0, 1], or null for "no opinion". */
  scoreTopic(topic: string): Promise<number | null>;
}

export function toUnitScore(raw: number): number {
  return Math.min(1, Math.max(0, (raw + 1) / 2));
}

export class SearchSentimentSource implements SentimentSource {
  readonly name = 'search';
  private readonly analyzer = new SentimentAnalyzer('English', PorterStemmer, 'afinn');
  private readonly tokenizer = new WordTokenizer();

  constructor(private readonly search: SearchCapability | null) {}

  isAvailable(): boolean {
    return this.search !== null;
  }

  scoreText(text: string): number | null {
    const words = this.tokenizer.tokenize(text.toLowerCase());
    if (words.length === 0) return null;
    return this.analyzer.getSentiment(words);
  }

  async scoreTopic(topic: string): Promise<number | null> {
    if (!this.search) return null;
    const pages = await this.search.search(`${topic} crypto news sentiment`);

    const scores: number[] = [];
    for (const page of pages) {
      const score = this.scoreText(page);
      if (score !== null) scores.push(score);
    }
    if (scores.length === 0) return null;

    const mean = scores.reduce((a, b) => a + b, 0) / scores.length;
    return toUnitScore(mean);
  }
}

export class NeutralSentimentSource implements SentimentSource {
  readonly name = 'neutral';

  isAvailable(): boolean {
    return true;
  }

  async scoreTopic(): Promise<number | null> {
    return null;
  }
}

// Chosen once at startup; first available candidate wins
export function selectSentimentSource(candidates: readonly SentimentSource[]): SentimentSource {
  const chosen = candidates.find(c => c.isAvailable()) ?? new NeutralSentimentSource();
  log.info('Sentiment source selected', { source: chosen.name });
  return chosen;
}

export class SentimentProbe {
  constructor(
    private readonly source: SentimentSource,
    private readonly clock: () => number = Date.now,
  ) {}

  get sourceName(): string {
    return this.source.name;
  }

  /** Partial results are valid: a symbol whose lookup fails simply has no score. */
  async probe(symbols: readonly string[]): Promise<SentimentScore[]> {
    const results: SentimentScore[] = [];
    for (const symbol of symbols) {
      try {
        const score = await this.source.scoreTopic(symbol);
        if (score === null || !Number.isFinite(score)) continue;
        results.push(Object.freeze({ symbol, score: Math.min(1, Math.max(0, score)), capturedAt: this.clock() }));
      } catch (err) {
        log.warn('Sentiment lookup failed', { symbol, error: errorMessage(err) });
      }
    }
    return results;
  }
}
