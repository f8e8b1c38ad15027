import type { FeedCategory } from './verdict.js';
import { addressKey, contains, type IpAddress, type NetworkRange } from './network.js';

export type FeedEntry = { readonly type: 'network'; readonly range: NetworkRange } | { readonly type: 'address'; readonly address: IpAddress };

export type FeedSnapshot = {
  readonly feedId: string;
  readonly category: FeedCategory;
  readonly capturedAt: Date;
  readonly entries: readonly FeedEntry[];
  // Rows the parser could not read.
  readonly skipped: number;
  readonly networks: readonly NetworkRange[];
  readonly addresses: ReadonlySet<string>;
};

export function createSnapshot(input: {
  feedId: string;
  category: FeedCategory;
  entries: readonly FeedEntry[];
  skipped?: number;
  capturedAt?: Date;
}): FeedSnapshot {
  const entries = Object.freeze([...input.entries]);
  const networks: NetworkRange[] = [];
  const addresses = new Set<string>();
  for (const entry of entries) {
    if (entry.type === 'network') networks.push(entry.range);
    else addresses.add(addressKey(entry.address));
  }

  return Object.freeze({
    feedId: input.feedId,
    category: input.category,
    capturedAt: input.capturedAt ?? new Date(),
    entries,
    skipped: input.skipped ?? 0,
    networks: Object.freeze(networks),
    addresses
  });
}

export function snapshotContains(snapshot: FeedSnapshot, addr: IpAddress): boolean {
  if (snapshot.addresses.size > 0 && snapshot.addresses.has(addressKey(addr))) return true;
  for (const range of snapshot.networks) {
    if (contains(range, addr)) return true;
  }
  return false;
}
