import { createLogger, getWithRetry, postWithRetry, isRecord, asString, asNumber } from '../utils';
import { findToken, rawToHuman } from './tokens';
import type { QuoteParams, SwapQuote, SwapQuoteService } from './types';

const log = createLogger('jupiter');

export interface JupiterOptions {
  baseUrl: string;
  apiKey?: string;
  timeoutMs: number;
  maxRetries?: number;
}

const DIGITS = /^\d+$/;

function decimalsFor(mint: string): number {
  const token = findToken(mint);
  if (!token) throw new Error(`No decimals known for mint ${mint}`);
  return token.decimals;
}

export class JupiterSwapService implements SwapQuoteService {
  constructor(private readonly opts: JupiterOptions) {}

  private get headers(): Record<string, string> {
    return this.opts.apiKey ? { 'x-api-key': this.opts.apiKey } : {};
  }

  async getQuote({ inputMint, outputMint, amountRaw, slippageBps }: QuoteParams): Promise<SwapQuote> {
    const params = new URLSearchParams({
      inputMint,
      outputMint,
      amount: amountRaw.toString(),
      slippageBps: slippageBps.toString(),
    });

    const res = await getWithRetry(`${this.opts.baseUrl}/quote?${params}`, {
      timeoutMs: this.opts.timeoutMs,
      maxRetries: this.opts.maxRetries,
      headers: this.headers,
    });
    if (!res.ok) {
      const body = await res.text().catch(() => '');
      log.error('Jupiter quote HTTP error', { status: res.status, body: body.slice(0, 200) });
      throw new Error(`Jupiter quote HTTP ${res.status}`);
    }

    const json: unknown = await res.json();
    if (!isRecord(json)) throw new Error('Jupiter quote: unexpected response');
    if (json.error) throw new Error(`Jupiter quote error: ${String(json.error)}`);

    const inAmountRaw = asString(json.inAmount);
    const outAmountRaw = asString(json.outAmount);
    if (!inAmountRaw || !DIGITS.test(inAmountRaw) || !outAmountRaw || !DIGITS.test(outAmountRaw)) {
      throw new Error('Jupiter quote: missing amounts');
    }

    const inputDecimals = decimalsFor(inputMint);
    const outputDecimals = decimalsFor(outputMint);

    const routePlan = Array.isArray(json.routePlan) ? json.routePlan : [];
    const routeLabels = routePlan
      .map(r => (isRecord(r) && isRecord(r.swapInfo) ? asString(r.swapInfo.label) : undefined))
      .filter((l): l is string => l !== undefined);

    return {
      inputMint,
      outputMint,
      inAmountRaw,
      outAmountRaw,
      inputAmount: rawToHuman(inAmountRaw, inputDecimals),
      outputAmount: rawToHuman(outAmountRaw, outputDecimals),
      inputDecimals,
      outputDecimals,
      priceImpactPct: asNumber(json.priceImpactPct) ?? 0,
      slippageBps,
      routeLabels,
      fetchedAt: Date.now(),
      raw: json,
    };
  }

  async buildSwapTransaction(quote: SwapQuote, userPublicKey: string): Promise<Uint8Array> {
    const res = await postWithRetry(
      `${this.opts.baseUrl}/swap`,
      {
        quoteResponse: quote.raw,
        userPublicKey,
        wrapAndUnwrapSol: true,
        dynamicComputeUnitLimit: true,
        prioritizationFeeLamports: 'auto',
      },
      { timeoutMs: this.opts.timeoutMs, maxRetries: this.opts.maxRetries, headers: this.headers },
    );

    const json: unknown = await res.json().catch(() => null);
    const swapTransaction = isRecord(json) ? asString(json.swapTransaction) : undefined;
    if (!res.ok || !swapTransaction) {
      const error = isRecord(json) && json.error ? String(json.error) : `HTTP ${res.status}`;
      throw new Error(`Jupiter swap build failed: ${error}`);
    }

    return new Uint8Array(Buffer.from(swapTransaction, 'base64'));
  }
}
