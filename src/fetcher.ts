import { FatalError } from './errors.js';
import { seconds } from './utils.js';
import type { ListPage, ListParams, PageLink } from './api.js';
import type { EntrySink } from './sink.js';

export type Lister = { list(params: ListParams): Promise<ListPage> };

export type FetchOptions = {
  perPage: number;
  from?: string;
  to?: string;
};

export type FetchStats = {
  pages: number;
  rows: number;
  totalCount?: number;
};

const IGNORED_RELS = new Set(['first', 'last', 'previous']);

/** Cursor of the `next` link, or null when there is no further page. */
export function nextCursor(links: PageLink[]): string | null {
  let cursor: string | null = null;
  for (const l of links) {
    if (l.rel === 'next') {
      const c = new URL(l.href, 'https://placeholder.invalid').searchParams.get('cursor');
      if (!c) throw new FatalError(`Next link without a cursor: ${JSON.stringify(l)}`);
      cursor = c;
    } else if (!IGNORED_RELS.has(l.rel)) {
      throw new FatalError(`Unexpected link in response: ${JSON.stringify(l)}`);
    }
  }
  return cursor;
}

/**
 * Walks the listing page by page, writing each page's results to `sink`
 * before asking for the next one.
 */
export async function fetchAll(api: Lister, sink: EntrySink, opts: FetchOptions): Promise<FetchStats> {
  const params: ListParams = { cursor: 'initial', perPage: opts.perPage };
  if (opts.from !== undefined && opts.to !== undefined) {
    params.from = opts.from;
    params.to = opts.to;
  }

  const stats: FetchStats = { pages: 0, rows: 0 };
  let cursor: string | null = 'initial';
  while (cursor !== null) {
    const startT = Date.now();
    const page = await api.list({ ...params, cursor });
    for (const entry of page.results) await sink.write(entry);
    stats.pages++;
    stats.rows += page.results.length;

    if (stats.pages === 1) {
      stats.totalCount = page.totalCount;
      console.log(`📚 Total entries to fetch: ${page.totalCount ?? 'unknown'}`);
    }
    console.log(`Page ${String(stats.pages).padStart(8)}: got ${String(page.results.length).padStart(6)} entries in ${seconds(startT)} seconds`);

    cursor = nextCursor(page.links);
  }
  return stats;
}
