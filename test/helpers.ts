import { afterEach, beforeEach, vi } from 'vitest';
import { Headers, Response } from 'undici';
import type { FetchLike } from '../src/api.js';
import type { RowOutcome, SuppressionRecord } from '../src/types.js';

export type Call = {
  url: string;
  method: string;
  body?: string;
  headers: Record<string, string>;
};

/**
 * In-process stand-in for the HTTP layer; records every call it answers.
 * Like undici, a call rejects with the signal's reason once it is aborted.
 */
export function fakeFetch(handler: (call: Call, index: number) => Response | Promise<Response>) {
  const calls: Call[] = [];
  const fetch: FetchLike = async (url, init) => {
    const call: Call = {
      url,
      method: init.method ?? 'GET',
      body: typeof init.body === 'string' ? init.body : undefined,
      headers: Object.fromEntries(new Headers(init.headers).entries())
    };
    const signal = init.signal;
    signal?.throwIfAborted();
    calls.push(call);
    const index = calls.length - 1;
    return new Promise<Response>((resolve, reject) => {
      if (signal) signal.addEventListener('abort', () => reject(signal.reason), { once: true });
      Promise.resolve()
        .then(() => handler(call, index))
        .then(resolve, reject);
    });
  };
  return { fetch, calls };
}

export function json(status: number, body: unknown): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'content-type': 'application/json' }
  });
}

export function empty(status: number): Response {
  return new Response(null, { status });
}

export const RATE_LIMITED = { errors: [{ message: 'Too many requests' }] };

export function silenceConsole(): void {
  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'warn').mockImplementation(() => {});
    vi.spyOn(console, 'error').mockImplementation(() => {});
  });
  afterEach(() => {
    vi.restoreAllMocks();
  });
}

export function rec(recipient: string, type: SuppressionRecord['type'] = 'non_transactional'): SuppressionRecord {
  return { recipient, type, description: 'test' };
}

export function good(record: SuppressionRecord, line = 1, flagsDefaulted = false): RowOutcome {
  return { valid: true, record, flagsDefaulted, line };
}

export async function collect<T>(it: AsyncIterable<T>): Promise<T[]> {
  const out: T[] = [];
  for await (const v of it) out.push(v);
  return out;
}

export async function* fromArray<T>(items: T[]): AsyncGenerator<T> {
  for (const item of items) yield item;
}
