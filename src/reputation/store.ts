import type { IpAddress } from './network.js';
import { snapshotContains, type FeedSnapshot } from './snapshot.js';
import { VERDICT_PRECEDENCE, type FeedCategory, type Verdict } from './verdict.js';

/**
 * Current snapshot per feed, grouped by category.
 *
 * Snapshots are immutable and installed by swapping the map value, so replace() never copies
 * entries. classify() is synchronous: a scan runs to completion on the event loop before any
 * replace() can run, which means a reader sees one whole snapshot per feed, old or new.
 * Different feeds are replaced independently with no ordering between them.
 */
export class ReputationStore {
  private readonly slots = new Map<FeedCategory, Map<string, FeedSnapshot>>(
    VERDICT_PRECEDENCE.map((category) => [category, new Map<string, FeedSnapshot>()] as const)
  );

  private readonly categoryByFeed = new Map<string, FeedCategory>();

  replace(feedId: string, snapshot: FeedSnapshot): void {
    if (snapshot.feedId !== feedId) {
      throw new Error(`snapshot for "${snapshot.feedId}" cannot be installed as "${feedId}"`);
    }

    // A feed moved to another category must not linger in the old one.
    const previousCategory = this.categoryByFeed.get(feedId);
    if (previousCategory && previousCategory !== snapshot.category) {
      this.slots.get(previousCategory)?.delete(feedId);
    }

    this.slotFor(snapshot.category).set(feedId, snapshot);
    this.categoryByFeed.set(feedId, snapshot.category);
  }

  get(feedId: string): FeedSnapshot | undefined {
    const category = this.categoryByFeed.get(feedId);
    return category ? this.slots.get(category)?.get(feedId) : undefined;
  }

  snapshots(): FeedSnapshot[] {
    const out: FeedSnapshot[] = [];
    for (const category of VERDICT_PRECEDENCE) out.push(...this.slotFor(category).values());
    return out;
  }

  matches(category: FeedCategory, addr: IpAddress): boolean {
    for (const snapshot of this.slotFor(category).values()) {
      if (snapshotContains(snapshot, addr)) return true;
    }
    return false;
  }

  classify(addr: IpAddress): Verdict {
    for (const category of VERDICT_PRECEDENCE) {
      if (this.matches(category, addr)) return category;
    }
    return 'SAFE';
  }

  private slotFor(category: FeedCategory): Map<string, FeedSnapshot> {
    let slot = this.slots.get(category);
    if (!slot) {
      slot = new Map();
      this.slots.set(category, slot);
    }
    return slot;
  }
}
