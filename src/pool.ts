/**
 * Bounded concurrency for deletes: one in-flight call per session slot.
 *
 * @module pool
 */

import { Agent, type Dispatcher } from 'undici';
import { describeError, type SuppressionApi } from './api.js';
import { TimeoutError } from './utils.js';
import type { SuppressionRecord } from './types.js';

export const DEFAULT_POOL_SIZE = 10;

/** Extra time given to a worker beyond the per-call network timeout. */
const JOIN_GRACE_MS = 10_000;

/**
 * Fixed set of keep-alive sessions, one per worker slot. Created once by the
 * caller and closed at the end of the run.
 */
export class SessionPool {
  private readonly sessions: Dispatcher[];
  private closed = false;

  constructor(
    readonly size: number = DEFAULT_POOL_SIZE,
    factory: () => Dispatcher = () => new Agent({ connections: 1, keepAliveTimeout: 90_000 })
  ) {
    if (!Number.isInteger(size) || size < 1) throw new RangeError(`pool size must be a positive integer, got ${size}`);
    this.sessions = Array.from({ length: size }, factory);
  }

  session(slot: number): Dispatcher {
    if (this.closed) throw new Error('Session pool is closed');
    const s = this.sessions[slot];
    if (!s) throw new RangeError(`no session in slot ${slot} (pool size ${this.size})`);
    return s;
  }

  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    await Promise.all(this.sessions.map(s => s.close()));
  }
}

export class DeleteExecutor {
  private readonly joinTimeoutMs: number;

  constructor(
    private readonly api: SuppressionApi,
    private readonly sessions: SessionPool,
    joinTimeoutMs?: number
  ) {
    this.joinTimeoutMs = joinTimeoutMs ?? api.callTimeoutMs + JOIN_GRACE_MS;
  }

  get size(): number {
    return this.sessions.size;
  }

  /**
   * Deletes every record of `batch` concurrently and waits for all of them,
   * even when one fails the run. Returns how many came back 204.
   */
  async dispatch(batch: SuppressionRecord[]): Promise<number> {
    if (batch.length > this.sessions.size) {
      throw new RangeError(`sub-batch of ${batch.length} exceeds pool size ${this.sessions.size}`);
    }
    const outcomes = await Promise.allSettled(batch.map((record, slot) => this.deleteOne(record, slot)));
    let done = 0;
    for (const o of outcomes) {
      if (o.status === 'rejected') throw o.reason;
      if (o.value) done++;
    }
    return done;
  }

  private async deleteOne(record: SuppressionRecord, slot: number): Promise<boolean> {
    const session = this.sessions.session(slot);
    // the call is cancelled, not just abandoned, so the slot is free once this returns
    const cancel = new AbortController();
    const timer = setTimeout(() => cancel.abort(new TimeoutError(this.joinTimeoutMs)), this.joinTimeoutMs);
    try {
      const res = await this.api.remove(record, session, cancel.signal);
      if (res.ok) return true;
      console.error(`🚫 ${record.recipient}: not deleted (${res.status}) ${describeError(res.body)}`);
      return false;
    } catch (e) {
      // FatalError (connection failure) ends the run
      if (!(e instanceof TimeoutError)) throw e;
      console.error(`🚫 ${record.recipient}: not deleted, ${e.message}`);
      return false;
    } finally {
      clearTimeout(timer);
    }
  }
}
