import { identityKey } from './normalizer.js';
import type { RemoteAction } from './actions.js';
import type { RowOutcome, RunSummary, SuppressionRecord } from './types.js';

export function emptySummary(): RunSummary {
  return {
    checked: 0,
    goodRecips: 0,
    badRecips: 0,
    duplicateRecips: 0,
    doneRecips: 0,
    flagsGood: 0,
    flagsDefaulted: 0
  };
}

/**
 * Dedups and batches one pass over a file. The seen-set and the counters live
 * exactly as long as the instance.
 */
export class BatchAccumulator {
  private readonly seen = new Set<string>();
  private batch: SuppressionRecord[] = [];
  private batches = 0;
  private readonly summary = emptySummary();

  constructor(
    private readonly action: RemoteAction,
    private readonly batchSize: number
  ) {
    if (!Number.isInteger(batchSize) || batchSize < 1) {
      throw new RangeError(`batchSize must be a positive integer, got ${batchSize}`);
    }
  }

  async add(outcome: RowOutcome): Promise<void> {
    this.summary.checked++;
    if (!outcome.valid) {
      this.summary.badRecips++;
      return;
    }

    if (outcome.flagsDefaulted) this.summary.flagsDefaulted++;
    else this.summary.flagsGood++;

    const key = identityKey(outcome.record);
    if (this.seen.has(key)) {
      console.warn(`Line ${outcome.line}: duplicate ${outcome.record.recipient} (${outcome.record.type ?? 'no type'})`);
      this.summary.duplicateRecips++;
      return;
    }
    this.seen.add(key);
    this.summary.goodRecips++;

    this.batch.push(outcome.record);
    if (this.batch.length >= this.batchSize) await this.flush();
  }

  async finish(): Promise<RunSummary> {
    if (this.batch.length > 0) await this.flush();
    return { ...this.summary };
  }

  private async flush(): Promise<void> {
    const batch = this.batch;
    this.batch = [];
    this.batches++;
    const done = await this.action.apply(batch);
    this.summary.doneRecips += done;
    if (this.action.name !== 'check') {
      console.log(`📨 Batch ${this.batches} (${this.action.name}): OK=${done}/${batch.length}`);
    }
  }
}

export async function runPipeline(
  outcomes: AsyncIterable<RowOutcome>,
  action: RemoteAction,
  batchSize: number
): Promise<RunSummary> {
  const acc = new BatchAccumulator(action, batchSize);
  for await (const outcome of outcomes) await acc.add(outcome);
  return acc.finish();
}
