import fs from 'fs';
import path from 'path';
import { createLogger } from '../utils';
import type { FailureReason, PipelineState } from '../execution/types';
import type { RejectReason, TradeAction } from '../strategy/types';

const log = createLogger('journal');

function getDateStr(ts: number): string {
  return new Date(ts).toISOString().split('T')[0];
}

// --- Signal decisions ---

export type SignalDecision = 'accepted' | 'rejected' | 'skipped';

export interface SignalLogEntry {
  symbol: string;
  action: TradeAction;
  confidence: number;
  reasoning: string[];
  decision: SignalDecision;
  rejectReason?: RejectReason | 'position-open' | 'zero-size' | 'no-price';
  sizedAmountSol?: number;
}

// --- Pipeline outcomes ---

export interface ExecutionLogEntry {
  kind: 'signal' | 'manual' | 'unwind';
  symbol?: string;
  inputMint: string;
  outputMint: string;
  amount: number;
  slippageBps: number;
  state: PipelineState;
  reason?: FailureReason;
  error?: string;
  signature?: string;
  quotedImpactPct?: number;
  latencyMs: number;
}

/**
 * Append-only JSONL journal, one file per UTC day under signals/ and executions/.
 * Constructed without a directory it records nothing.
 */
export class DecisionJournal {
  constructor(
    private readonly dataDir: string | null,
    private readonly clock: () => number = Date.now,
  ) {}

  get enabled(): boolean {
    return this.dataDir !== null;
  }

  private append(subdir: string, obj: Record<string, unknown>) {
    if (this.dataDir === null) return;
    const ts = this.clock();
    const dir = path.join(this.dataDir, subdir);
    try {
      fs.mkdirSync(dir, { recursive: true });
      fs.appendFileSync(path.join(dir, `${getDateStr(ts)}.jsonl`), JSON.stringify({ ts, ...obj }) + '\n');
    } catch (err) {
      log.warn('Journal write failed', { subdir, error: err });
    }
  }

  logSignal(entry: SignalLogEntry) {
    this.append('signals', { ...entry });
  }

  logExecution(entry: ExecutionLogEntry) {
    this.append('executions', { ...entry });
  }
}
