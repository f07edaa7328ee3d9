import { createLogger } from '../utils';
import type { SubmitReceipt, SwapQuote, TransactionSubmitter } from './types';

const log = createLogger('paper');

// Simulated network fee per swap, in SOL
const PAPER_FEE_SOL = 0.000005;

/**
 * Paper trading: the transaction is quoted, built and signed for real, then
 * never sent. The fill is the quote.
 */
export class PaperTransactionSubmitter implements TransactionSubmitter {
  readonly name = 'paper';
  private sequence = 0;

  async submit(signedTransaction: Uint8Array, quote: SwapQuote, owner: string): Promise<SubmitReceipt> {
    const signature = `paper-${Date.now()}-${++this.sequence}`;

    log.info('PAPER SWAP', {
      owner,
      inputMint: quote.inputMint,
      outputMint: quote.outputMint,
      inputAmount: quote.inputAmount,
      outputAmount: quote.outputAmount,
      impact: quote.priceImpactPct.toFixed(2),
      txBytes: signedTransaction.length,
    });

    return {
      signature,
      fill: { inputAmount: quote.inputAmount, outputAmount: quote.outputAmount, source: 'paper' },
      feeSol: PAPER_FEE_SOL,
    };
  }
}
