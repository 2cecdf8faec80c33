import { describeError, type SuppressionApi } from './api.js';
import type { DeleteExecutor } from './pool.js';
import { chunk } from './utils.js';
import type { SuppressionRecord } from './types.js';

export type ActionName = 'check' | 'update' | 'delete';

export interface RemoteAction {
  readonly name: ActionName;
  /** Returns how many entries were actually transacted on the remote list. */
  apply(batch: SuppressionRecord[]): Promise<number>;
}

export class NoopAction implements RemoteAction {
  readonly name = 'check';

  async apply(_batch: SuppressionRecord[]): Promise<number> {
    return 0;
  }
}

/**
 * PUTs the batch in one call. A rejected batch is halved and each half sent
 * again until the bad entries are isolated as single records.
 */
export class UpsertAction implements RemoteAction {
  readonly name = 'update';

  constructor(private readonly api: Pick<SuppressionApi, 'upsert'>) {}

  async apply(batch: SuppressionRecord[]): Promise<number> {
    let done = 0;
    // [start, end) ranges; left half on top so rows go out in file order
    const stack: Array<[number, number]> = batch.length ? [[0, batch.length]] : [];
    while (stack.length) {
      const range = stack.pop();
      if (!range) break;
      const [start, end] = range;
      const part = batch.slice(start, end);
      const res = await this.api.upsert(part);
      if (res.ok) {
        done += part.length;
        continue;
      }
      if (part.length === 1) {
        console.error(`🚫 ${part[0].recipient}: rejected (${res.status}) ${describeError(res.body)}`);
        continue;
      }
      const mid = start + Math.floor(part.length / 2);
      console.log(`✂️  Batch of ${part.length} rejected, retrying as ${mid - start} + ${end - mid}`);
      stack.push([mid, end], [start, mid]);
    }
    return done;
  }
}

/** One DELETE per record, run in pool-sized sub-batches one after another. */
export class DeleteAction implements RemoteAction {
  readonly name = 'delete';

  constructor(private readonly executor: Pick<DeleteExecutor, 'dispatch' | 'size'>) {}

  async apply(batch: SuppressionRecord[]): Promise<number> {
    let done = 0;
    for (const sub of chunk(batch, this.executor.size)) {
      done += await this.executor.dispatch(sub);
    }
    return done;
  }
}
