import type { Connection, ParsedTransactionWithMeta } from '@solana/web3.js';
import { createLogger, errorMessage, type RpcPool } from '../utils';
import { SOL_MINT } from './tokens';
import type { FilledAmounts, SubmitReceipt, SwapQuote, TransactionSubmitter } from './types';

const log = createLogger('submitter');

export type SubmitConnection = Pick<Connection, 'sendRawTransaction' | 'confirmTransaction' | 'getParsedTransaction'>;

// Absolute balance change for `owner` in `mint`, human units. Native SOL comes from lamports.
function balanceDelta(tx: ParsedTransactionWithMeta, owner: string, mint: string): number | null {
  const meta = tx.meta;
  if (!meta) return null;

  if (mint === SOL_MINT) {
    const idx = tx.transaction.message.accountKeys.findIndex(k => k.pubkey.toBase58() === owner);
    if (idx < 0) return null;
    // Fee is paid by the signer on top of the swap; take it back out of the delta
    const delta = Math.abs(meta.postBalances[idx] - meta.preBalances[idx] + meta.fee) / 1e9;
    return delta > 0 ? delta : null;
  }

  const pre = meta.preTokenBalances ?? [];
  const post = meta.postTokenBalances ?? [];
  const postBal = post.find(b => b.mint === mint && b.owner === owner);
  if (!postBal) return null;
  const preBal = pre.find(b => b.mint === mint && b.owner === owner);
  const delta = Math.abs((postBal.uiTokenAmount.uiAmount ?? 0) - (preBal?.uiTokenAmount.uiAmount ?? 0));
  return delta > 0 ? delta : null;
}

export class RpcTransactionSubmitter<C extends SubmitConnection = SubmitConnection> implements TransactionSubmitter {
  readonly name = 'rpc';

  constructor(private readonly pool: RpcPool<C>) {}

  async submit(signedTransaction: Uint8Array, quote: SwapQuote, owner: string): Promise<SubmitReceipt> {
    const signature = await this.pool.run(
      conn => conn.sendRawTransaction(signedTransaction, { skipPreflight: true, maxRetries: 2 }),
      'sendRawTransaction',
    );

    const confirmation = await this.pool.run(
      conn => conn.confirmTransaction(signature, 'confirmed'),
      'confirmTransaction',
    );
    if (confirmation.value.err) {
      throw new Error(`Tx confirmed with error: ${JSON.stringify(confirmation.value.err)}`);
    }

    // --- Actual fill from on-chain balance deltas ---
    let fill: FilledAmounts = {
      inputAmount: quote.inputAmount,
      outputAmount: quote.outputAmount,
      source: 'quote_fallback',
    };
    let feeSol = 0;

    try {
      const parsed = await this.pool.run(
        conn => conn.getParsedTransaction(signature, { maxSupportedTransactionVersion: 0, commitment: 'confirmed' }),
        'getParsedTransaction',
      );
      if (parsed?.meta) {
        feeSol = parsed.meta.fee / 1e9;
        const inputDelta = balanceDelta(parsed, owner, quote.inputMint);
        const outputDelta = balanceDelta(parsed, owner, quote.outputMint);
        if (inputDelta !== null && outputDelta !== null) {
          fill = { inputAmount: inputDelta, outputAmount: outputDelta, source: 'onchain' };
        }
      }
    } catch (err) {
      log.warn('Could not verify fill on-chain, using quote amounts', { signature, error: errorMessage(err) });
    }

    return { signature, fill, feeSol };
  }
}
