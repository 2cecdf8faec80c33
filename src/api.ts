import { fetch as undiciFetch, type Dispatcher, type RequestInit, type Response } from 'undici';
import { z } from 'zod';
import { FatalError } from './errors.js';
import { sleep } from './utils.js';
import type { RemoteEntry, SuppressionRecord } from './types.js';

export type FetchLike = (url: string, init: RequestInit) => Promise<Response>;

export type CallKind = 'list' | 'upsert' | 'delete';

export type ApiResult = { ok: boolean; status: number; body: string };

export const CALL_TIMEOUT_MS = 60_000;

export const DEFAULT_BACKOFF_MS: Record<CallKind, number> = {
  list: 120_000,
  upsert: 20_000,
  delete: 10_000
};

const SUPPRESSION_PATH = '/api/v1/suppression-list';

const ErrorPayloadSchema = z.object({
  errors: z.array(z.object({ message: z.string(), description: z.string().optional() })).min(1)
});

const LinkSchema = z.object({ rel: z.string(), href: z.string() });
export type PageLink = z.infer<typeof LinkSchema>;

const ListPageSchema = z.object({
  results: z.array(z.record(z.unknown())),
  total_count: z.number().optional(),
  links: z.array(LinkSchema).default([])
});

export type ListPage = {
  results: RemoteEntry[];
  totalCount?: number;
  links: PageLink[];
};

export type ListParams = {
  cursor: string;
  perPage: number;
  from?: string;
  to?: string;
};

export type ApiOptions = {
  baseUri: string;
  apiKey: string;
  subaccount?: number;
  timeoutMs?: number;
  backoffMs?: Partial<Record<CallKind, number>>;
  fetch?: FetchLike;
};

function parseJson(body: string): unknown {
  try {
    return JSON.parse(body);
  } catch {
    return undefined;
  }
}

function isRateLimited(body: string): boolean {
  const parsed = ErrorPayloadSchema.safeParse(parseJson(body));
  return parsed.success && parsed.data.errors.some(e => /too many requests/i.test(e.message));
}

/** Best-effort text for an error body; non-JSON bodies come back as-is. */
export function describeError(body: string): string {
  const parsed = ErrorPayloadSchema.safeParse(parseJson(body));
  if (!parsed.success) return body.trim() || '(empty body)';
  return parsed.data.errors
    .map(e => (e.description ? `${e.message}: ${e.description}` : e.message))
    .join('; ');
}

function isTimeout(e: unknown): boolean {
  return e instanceof Error && e.name === 'TimeoutError';
}

/**
 * SparkPost suppression-list client. Every call retries on rate limiting
 * (429 "Too many requests") after a fixed pause, without a retry cap.
 * Connection failures throw FatalError; any other status is handed back.
 * Aborting the caller's signal ends the call and any pause, rejecting with
 * the signal's reason.
 */
export class SuppressionApi {
  private readonly fetch: FetchLike;
  private readonly timeoutMs: number;
  private readonly backoff: Record<CallKind, number>;

  constructor(private readonly opts: ApiOptions) {
    this.fetch = opts.fetch ?? undiciFetch;
    this.timeoutMs = opts.timeoutMs ?? CALL_TIMEOUT_MS;
    this.backoff = { ...DEFAULT_BACKOFF_MS, ...opts.backoffMs };
  }

  get callTimeoutMs(): number {
    return this.timeoutMs;
  }

  private headers(withBody: boolean): Record<string, string> {
    const h: Record<string, string> = {
      Authorization: this.opts.apiKey,
      Accept: 'application/json'
    };
    if (withBody) h['Content-Type'] = 'application/json';
    if (this.opts.subaccount) h['X-MSYS-SUBACCOUNT'] = String(this.opts.subaccount);
    return h;
  }

  private async send(
    kind: CallKind,
    url: string,
    init: { method: string; body?: string; dispatcher?: Dispatcher; signal?: AbortSignal },
    success: number
  ): Promise<ApiResult> {
    const { signal } = init;
    while (true) {
      signal?.throwIfAborted();
      const perCall = AbortSignal.timeout(this.timeoutMs);
      let status: number;
      let body: string;
      try {
        const res = await this.fetch(url, {
          method: init.method,
          body: init.body,
          dispatcher: init.dispatcher,
          headers: this.headers(init.body !== undefined),
          signal: signal ? AbortSignal.any([signal, perCall]) : perCall
        });
        status = res.status;
        body = await res.text();
      } catch (e) {
        // cancelled by the caller: hand back the caller's reason
        if (signal?.aborted) throw signal.reason;
        if (isTimeout(e)) {
          body = `request timed out after ${this.timeoutMs} ms`;
          console.error(`❌ ${kind} ${url}: ${body}`);
          return { ok: false, status: 0, body };
        }
        const cause = e instanceof Error && e.cause instanceof Error ? ` (${e.cause.message})` : '';
        throw new FatalError(`Connection error on ${init.method} ${url}: ${e instanceof Error ? e.message : String(e)}${cause}`);
      }

      if (status === success) return { ok: true, status, body };

      if (status === 429 && isRateLimited(body)) {
        const snooze = this.backoff[kind];
        console.log(`⏳ .. pausing ${snooze / 1000} seconds for rate-limiting`);
        await sleep(snooze, signal);
        continue;
      }

      console.error(`❌ Error (${kind}): ${status} : ${body}`);
      return { ok: false, status, body };
    }
  }

  /** Any HTTP answer counts; only a connection failure is fatal. */
  async probe(): Promise<void> {
    const url = `${this.opts.baseUri}${SUPPRESSION_PATH}`;
    try {
      await this.fetch(url, { method: 'HEAD', signal: AbortSignal.timeout(this.timeoutMs) });
    } catch (e) {
      throw new FatalError(`Host ${this.opts.baseUri} is not reachable: ${e instanceof Error ? e.message : String(e)}`);
    }
  }

  async list(params: ListParams): Promise<ListPage> {
    const url = new URL(SUPPRESSION_PATH, this.opts.baseUri);
    url.searchParams.set('cursor', params.cursor);
    url.searchParams.set('per_page', String(params.perPage));
    if (params.from !== undefined && params.to !== undefined) {
      url.searchParams.set('from', params.from);
      url.searchParams.set('to', params.to);
    }

    const res = await this.send('list', url.toString(), { method: 'GET' }, 200);
    if (!res.ok) throw new FatalError(`Suppression list retrieval failed with status ${res.status}`);

    const parsed = ListPageSchema.safeParse(parseJson(res.body));
    if (!parsed.success) throw new FatalError(`Unexpected suppression list response: ${parsed.error.message}`);
    return {
      results: parsed.data.results,
      totalCount: parsed.data.total_count,
      links: parsed.data.links
    };
  }

  async upsert(records: SuppressionRecord[]): Promise<ApiResult> {
    const recipients = records.map(r => {
      const entry: { recipient: string; type?: string; description?: string } = { recipient: r.recipient };
      if (r.type !== undefined) entry.type = r.type;
      if (r.description !== undefined) entry.description = r.description;
      return entry;
    });
    return this.send(
      'upsert',
      `${this.opts.baseUri}${SUPPRESSION_PATH}`,
      { method: 'PUT', body: JSON.stringify({ recipients }) },
      200
    );
  }

  /**
   * Deletes one entry. The type goes in the body only when the row named it;
   * without one, every entry for the recipient is removed.
   */
  async remove(record: SuppressionRecord, dispatcher?: Dispatcher, signal?: AbortSignal): Promise<ApiResult> {
    const typed = record.type !== undefined && !record.typeDefaulted;
    return this.send(
      'delete',
      `${this.opts.baseUri}${SUPPRESSION_PATH}/${encodeURIComponent(record.recipient)}`,
      {
        method: 'DELETE',
        body: typed ? JSON.stringify({ type: record.type }) : undefined,
        dispatcher,
        signal
      },
      204
    );
  }
}
