import { afterEach, describe, expect, it, vi } from 'vitest';
import { fetchFeed, type FetchResult } from '../../src/feeds/fetch.js';
import { snapshotContains } from '../../src/reputation/snapshot.js';
import { addr, createTestLogger, feed, streamFromChunks, stubFetch } from './_helpers.js';

const URL_ = 'https://feeds.example.invalid/list';

function opts(overrides: { timeoutMs?: number; maxBytes?: number } = {}) {
  return { timeoutMs: 5_000, maxBytes: 1024 * 1024, logger: createTestLogger(), ...overrides };
}

function expectOk(result: FetchResult) {
  if (!result.ok) throw new Error(`expected ok, got ${result.error.kind}: ${result.error.message}`);
  return result.snapshot;
}

function expectError(result: FetchResult) {
  if (result.ok) throw new Error('expected a failed fetch');
  return result.error;
}

describe('fetchFeed', () => {
  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it('streams a netset and skips comments and bad rows', async () => {
    stubFetch({
      [URL_]: {
        body: ['# FireHOL\n10.0.0.0/8\n192.0.', '2.1\nnot-an-entry\n\n', '2001:db8::/32\r\n198.51.100.0/24']
      }
    });
    const o = opts();

    const snap = expectOk(await fetchFeed(feed({ id: 'fh', url: URL_ }), o));

    expect(snap.feedId).toBe('fh');
    expect(snap.category).toBe('FLAGGED');
    expect(snap.entries).toHaveLength(4);
    expect(snap.skipped).toBe(1);
    expect(snapshotContains(snap, addr('10.9.9.9'))).toBe(true);
    expect(snapshotContains(snap, addr('192.0.2.1'))).toBe(true);
    expect(snapshotContains(snap, addr('198.51.100.200'))).toBe(true);
    expect(snapshotContains(snap, addr('2001:db8:ffff::1'))).toBe(true);
    expect(snapshotContains(snap, addr('192.0.2.2'))).toBe(false);

    expect(o.logger.debug).toHaveBeenCalledWith({ feed: 'fh', row: 'not-an-entry' }, 'skipping unparseable feed row');
    expect(o.logger.warn).toHaveBeenCalledWith({ feed: 'fh', skipped: 1, loaded: 4 }, 'feed contained unparseable rows');
  });

  it('sends a GET carrying an abort signal', async () => {
    const fetchMock = stubFetch({ [URL_]: { body: '192.0.2.1\n' } });

    await fetchFeed(feed({ url: URL_, format: 'plain' }), opts());

    expect(fetchMock).toHaveBeenCalledTimes(1);
    const init = fetchMock.mock.calls[0]?.[1];
    expect(init?.method).toBe('GET');
    expect(init?.signal).toBeInstanceOf(AbortSignal);
  });

  it('returns a transport error for non-2xx responses', async () => {
    stubFetch({ [URL_]: { status: 500, body: 'oops' } });

    const error = expectError(await fetchFeed(feed({ id: 'dc', url: URL_ }), opts()));

    expect(error.kind).toBe('transport');
    expect(error.feedId).toBe('dc');
    expect(error.message).toBe('HTTP_500');
  });

  it('returns a transport error when the request fails', async () => {
    stubFetch({ [URL_]: new TypeError('fetch failed') });

    const error = expectError(await fetchFeed(feed({ url: URL_ }), opts()));

    expect(error.kind).toBe('transport');
    expect(error.message).toBe('fetch failed');
  });

  it('aborts a request that exceeds the timeout', async () => {
    vi.stubGlobal(
      'fetch',
      vi.fn(
        (_url: string, init?: RequestInit) =>
          new Promise<Response>((_resolve, reject) => {
            init?.signal?.addEventListener('abort', () => reject(new Error('This operation was aborted')));
          })
      )
    );

    const error = expectError(await fetchFeed(feed({ url: URL_ }), opts({ timeoutMs: 20 })));

    expect(error.kind).toBe('transport');
    expect(error.message).toBe('TIMEOUT after 20ms');
  });

  it('refuses bodies over the byte limit', async () => {
    stubFetch({ [URL_]: { body: ['10.0.0.0/8\n', '11.0.0.0/8\n', '12.0.0.0/8\n'] } });

    const error = expectError(await fetchFeed(feed({ url: URL_ }), opts({ maxBytes: 16 })));

    expect(error.kind).toBe('transport');
    expect(error.message).toBe('TOO_LARGE');
  });

  it('treats a body that is not UTF-8 as a container parse error', async () => {
    vi.stubGlobal(
      'fetch',
      vi.fn(async () => new Response(streamFromChunks(['10.0.0.0/8\n', new Uint8Array([0xff, 0xfe, 0x0a])]), { status: 200 }))
    );

    const error = expectError(await fetchFeed(feed({ url: URL_ }), opts()));

    expect(error.kind).toBe('parse');
  });

  it('reads plain address lists and rejects ranges in them', async () => {
    stubFetch({ [URL_]: { body: '# tor exits\n192.0.2.99\n203.0.113.0/24\n2001:db8::99\n' } });

    const snap = expectOk(await fetchFeed(feed({ url: URL_, format: 'plain', category: 'TOR_EXIT' }), opts()));

    expect(snap.entries).toHaveLength(2);
    expect(snap.skipped).toBe(1);
    expect(snapshotContains(snap, addr('192.0.2.99'))).toBe(true);
    expect(snapshotContains(snap, addr('2001:db8::99'))).toBe(true);
    expect(snapshotContains(snap, addr('203.0.113.5'))).toBe(false);
  });

  it('reads the first CSV column', async () => {
    stubFetch({ [URL_]: { body: '192.0.2.0/24,NL,NL-NH,Amsterdam,\n198.51.100.0/24,US,US-NY,New York,\n' } });

    const snap = expectOk(await fetchFeed(feed({ url: URL_, format: 'csv', category: 'DATACENTER' }), opts()));

    expect(snap.entries).toHaveLength(2);
    expect(snapshotContains(snap, addr('198.51.100.9'))).toBe(true);
  });

  it('reads nested regions JSON split across chunks', async () => {
    const doc = JSON.stringify({
      regions: [
        { region: 'r1', cidrs: [{ cidr: '192.0.2.0/24' }, { cidr: 'bogus' }] },
        { region: 'r2', cidrs: [{ cidr: '2001:db8::/32' }] }
      ]
    });
    stubFetch({ [URL_]: { body: [doc.slice(0, 20), doc.slice(20)] } });

    const snap = expectOk(await fetchFeed(feed({ url: URL_, format: 'json-regions', category: 'DATACENTER' }), opts()));

    expect(snap.entries).toHaveLength(2);
    expect(snap.skipped).toBe(1);
    expect(snapshotContains(snap, addr('2001:db8::1'))).toBe(true);
  });

  it('returns a parse error for malformed JSON', async () => {
    stubFetch({ [URL_]: { body: '{"regions": [' } });

    const error = expectError(await fetchFeed(feed({ url: URL_, format: 'json-regions' }), opts()));

    expect(error.kind).toBe('parse');
    expect(error.message.startsWith('malformed JSON: ')).toBe(true);
  });

  it('returns a parse error for JSON of the wrong shape', async () => {
    stubFetch({ [URL_]: { body: '{"regions": [{"cidrs": "nope"}]}' } });

    const error = expectError(await fetchFeed(feed({ url: URL_, format: 'json-regions' }), opts()));

    expect(error.kind).toBe('parse');
    expect(error.message.startsWith('unexpected JSON shape (regions.0.cidrs: ')).toBe(true);
  });

  it('produces an empty snapshot for an empty body', async () => {
    stubFetch({ [URL_]: { body: '' } });

    const snap = expectOk(await fetchFeed(feed({ url: URL_ }), opts()));

    expect(snap.entries).toHaveLength(0);
    expect(snap.skipped).toBe(0);
  });
});
