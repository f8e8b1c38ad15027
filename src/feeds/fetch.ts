import type { Logger } from '../logger.js';
import { createSnapshot, type FeedEntry, type FeedSnapshot } from '../reputation/snapshot.js';
import type { FeedDescriptor, FeedFormat } from './catalog.js';
import {
  extractRegionCidrs,
  parseCsvLine,
  parseEntry,
  parseNetsetLine,
  parsePlainLine,
  regionsDocumentSchema,
  type RowResult
} from './parse.js';

export type FeedFetchErrorKind = 'transport' | 'parse';

export class FeedFetchError extends Error {
  readonly feedId: string;
  readonly kind: FeedFetchErrorKind;

  constructor(feedId: string, kind: FeedFetchErrorKind, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'FeedFetchError';
    this.feedId = feedId;
    this.kind = kind;
  }
}

export type FetchResult = { ok: true; snapshot: FeedSnapshot } | { ok: false; error: FeedFetchError };

export type FetchOptions = {
  timeoutMs: number;
  maxBytes: number;
  logger: Logger;
};

export type FeedFetcher = (feed: FeedDescriptor) => Promise<FetchResult>;

const USER_AGENT = 'ip-reputation-dns/0.1';

// Per-row diagnostics beyond this many are only counted.
const MAX_ROW_DIAGNOSTICS = 20;

const LINE_PARSERS: Record<Exclude<FeedFormat, 'json-regions'>, (line: string) => RowResult> = {
  netset: parseNetsetLine,
  plain: parsePlainLine,
  csv: parseCsvLine
};

function describeError(e: unknown): string {
  if (e instanceof Error) {
    const cause = e.cause instanceof Error ? `: ${e.cause.message}` : '';
    return `${e.message}${cause}`;
  }
  return String(e);
}

async function* downloadText(feed: FeedDescriptor, timeoutMs: number, maxBytes: number): AsyncGenerator<string> {
  const ac = new AbortController();
  const timer = setTimeout(() => ac.abort(), timeoutMs);
  const transportError = (e: unknown): FeedFetchError =>
    e instanceof FeedFetchError
      ? e
      : new FeedFetchError(feed.id, 'transport', ac.signal.aborted ? `TIMEOUT after ${timeoutMs}ms` : describeError(e), {
          cause: e
        });

  try {
    let res: Response;
    try {
      res = await fetch(feed.url, {
        method: 'GET',
        headers: { 'user-agent': USER_AGENT },
        signal: ac.signal
      });
    } catch (e) {
      throw transportError(e);
    }
    if (!res.ok) throw new FeedFetchError(feed.id, 'transport', `HTTP_${res.status}`);
    if (!res.body) return;

    // fatal: a body that is not UTF-8 text is a broken container, not a list with bad rows.
    const decoder = new TextDecoder('utf-8', { fatal: true });
    const decode = (bytes?: Uint8Array): string => {
      try {
        return bytes ? decoder.decode(bytes, { stream: true }) : decoder.decode();
      } catch (e) {
        throw new FeedFetchError(feed.id, 'parse', 'body is not valid UTF-8', { cause: e });
      }
    };

    const reader = res.body.getReader();
    const read = async () => {
      try {
        return await reader.read();
      } catch (e) {
        throw transportError(e);
      }
    };

    let seenBytes = 0;
    for (;;) {
      const chunk = await read();
      if (chunk.done) break;

      const value = chunk.value;
      if (!(value instanceof Uint8Array)) throw new FeedFetchError(feed.id, 'parse', 'unexpected body chunk');
      seenBytes += value.byteLength;
      if (seenBytes > maxBytes) throw new FeedFetchError(feed.id, 'transport', 'TOO_LARGE');

      const text = decode(value);
      if (text) yield text;
    }

    const tail = decode();
    if (tail) yield tail;
  } finally {
    clearTimeout(timer);
    // Releases the connection when the consumer stops early.
    ac.abort();
  }
}

async function* splitLines(chunks: AsyncIterable<string>): AsyncGenerator<string> {
  let buffered = '';
  for await (const chunk of chunks) {
    buffered += chunk;
    let idx: number;
    while ((idx = buffered.indexOf('\n')) >= 0) {
      const line = buffered.slice(0, idx);
      buffered = buffered.slice(idx + 1);
      yield line.endsWith('\r') ? line.slice(0, -1) : line;
    }
  }
  if (buffered.length) yield buffered.endsWith('\r') ? buffered.slice(0, -1) : buffered;
}

async function* jsonRegionRows(feed: FeedDescriptor, chunks: AsyncIterable<string>): AsyncGenerator<RowResult> {
  let text = '';
  for await (const chunk of chunks) text += chunk;

  let doc: unknown;
  try {
    doc = JSON.parse(text);
  } catch (e) {
    throw new FeedFetchError(feed.id, 'parse', `malformed JSON: ${describeError(e)}`, { cause: e });
  }

  const parsed = regionsDocumentSchema.safeParse(doc);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue ? `${issue.path.join('.') || '<root>'}: ${issue.message}` : 'schema mismatch';
    throw new FeedFetchError(feed.id, 'parse', `unexpected JSON shape (${where})`, { cause: parsed.error });
  }

  for (const cidr of extractRegionCidrs(parsed.data)) {
    const entry = parseEntry(cidr.trim());
    yield entry ? { kind: 'entry', entry } : { kind: 'invalid', row: cidr };
  }
}

async function* rowsFor(feed: FeedDescriptor, chunks: AsyncIterable<string>): AsyncGenerator<RowResult> {
  if (feed.format === 'json-regions') {
    yield* jsonRegionRows(feed, chunks);
    return;
  }
  const parseLine = LINE_PARSERS[feed.format];
  for await (const line of splitLines(chunks)) yield parseLine(line);
}

/**
 * Downloads and parses one feed. Never retries and never throws: transport and container
 * failures come back as `{ ok: false }`, unreadable rows are skipped and counted.
 */
export async function fetchFeed(feed: FeedDescriptor, opts: FetchOptions): Promise<FetchResult> {
  const log = opts.logger;
  const entries: FeedEntry[] = [];
  let skipped = 0;

  try {
    for await (const row of rowsFor(feed, downloadText(feed, opts.timeoutMs, opts.maxBytes))) {
      if (row.kind === 'entry') {
        entries.push(row.entry);
      } else if (row.kind === 'invalid') {
        skipped += 1;
        if (skipped <= MAX_ROW_DIAGNOSTICS) log.debug({ feed: feed.id, row: row.row }, 'skipping unparseable feed row');
      }
    }
  } catch (e) {
    const error = e instanceof FeedFetchError ? e : new FeedFetchError(feed.id, 'transport', describeError(e), { cause: e });
    return { ok: false, error };
  }

  if (skipped > 0) log.warn({ feed: feed.id, skipped, loaded: entries.length }, 'feed contained unparseable rows');

  return {
    ok: true,
    snapshot: createSnapshot({ feedId: feed.id, category: feed.category, entries, skipped })
  };
}

export function createFeedFetcher(opts: FetchOptions): FeedFetcher {
  return (feed) => fetchFeed(feed, opts);
}
