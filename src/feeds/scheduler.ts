import type { Logger } from '../logger.js';
import type { ReputationStore } from '../reputation/store.js';
import type { FeedCategory } from '../reputation/verdict.js';
import type { FeedDescriptor, FeedFormat } from './catalog.js';
import { FeedFetchError, type FeedFetcher, type FetchResult } from './fetch.js';

export type StartupMode = 'blocking' | 'background';

export type SchedulerOptions = {
  feeds: FeedDescriptor[];
  store: ReputationStore;
  fetcher: FeedFetcher;
  logger: Logger;
  refreshIntervalMs: number;
  retryInitialMs: number;
  retryMaxMs: number;
  startupMode?: StartupMode;
  // start() rejects when fewer feeds than this loaded during the initial pass.
  startupMinFeeds?: number;
};

export type FeedPhase = 'pending' | 'fetching' | 'idle' | 'backoff' | 'stopped';

export type FeedStatus = {
  id: string;
  name: string;
  category: FeedCategory;
  format: FeedFormat;
  url: string;
  phase: FeedPhase;
  consecutiveFailures: number;
  lastAttemptAt: string | null;
  lastSuccessAt: string | null;
  lastError: { kind: string; message: string; at: string } | null;
  nextAttemptAt: string | null;
  entries: number;
  skipped: number;
  // When the installed snapshot was fetched.
  capturedAt: string | null;
};

type FeedState = {
  feed: FeedDescriptor;
  phase: FeedPhase;
  consecutiveFailures: number;
  lastAttemptAt: Date | null;
  lastSuccessAt: Date | null;
  lastError: { kind: string; message: string; at: Date } | null;
  nextAttemptAt: Date | null;
  timer: NodeJS.Timeout | null;
};

export class StartupError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'StartupError';
  }
}

/** Delay before the next attempt after `failures` consecutive failures (1-based). */
export function computeRetryDelay(initialMs: number, maxMs: number, failures: number): number {
  if (failures <= 0) return initialMs;
  // Capped exponent keeps 2 ** n finite for long outages.
  const exp = Math.min(failures - 1, 30);
  return Math.min(initialMs * 2 ** exp, maxMs);
}

/**
 * Keeps every feed fresh on its own timer. A failed attempt never touches the store, so the
 * last good snapshot stays authoritative while the feed backs off.
 */
export class RefreshScheduler {
  private readonly states: FeedState[];
  private started = false;
  private stopped = false;

  constructor(private readonly opts: SchedulerOptions) {
    this.states = opts.feeds.map((feed) => ({
      feed,
      phase: 'pending',
      consecutiveFailures: 0,
      lastAttemptAt: null,
      lastSuccessAt: null,
      lastError: null,
      nextAttemptAt: null,
      timer: null
    }));
  }

  /**
   * Runs the first attempt of every feed in parallel. In blocking mode the returned promise
   * settles once each feed succeeded or failed once; failed feeds keep retrying in the background.
   */
  async start(): Promise<void> {
    if (this.started) throw new Error('scheduler already started');
    this.started = true;

    const initialPass = Promise.all(this.states.map((state) => this.run(state)));
    if (this.opts.startupMode === 'background') {
      if ((this.opts.startupMinFeeds ?? 0) > 0) {
        this.opts.logger.warn(
          { startupMinFeeds: this.opts.startupMinFeeds },
          'minimum feed count is not enforced in background startup mode'
        );
      }
      void initialPass.then(
        () => this.logInitialPass(),
        (e: unknown) => this.opts.logger.error({ err: e }, 'initial feed pass failed')
      );
      return;
    }

    await initialPass;
    const loaded = this.logInitialPass();
    const required = this.opts.startupMinFeeds ?? 0;
    if (loaded < required) {
      this.stop();
      throw new StartupError(`only ${loaded} of ${this.states.length} feeds loaded, ${required} required`);
    }
  }

  stop(): void {
    this.stopped = true;
    for (const state of this.states) {
      if (state.timer) clearTimeout(state.timer);
      state.timer = null;
      state.nextAttemptAt = null;
      state.phase = 'stopped';
    }
  }

  status(): FeedStatus[] {
    return this.states.map((state) => {
      const snapshot = this.opts.store.get(state.feed.id);
      return {
        id: state.feed.id,
        name: state.feed.name,
        category: state.feed.category,
        format: state.feed.format,
        url: state.feed.url,
        phase: state.phase,
        consecutiveFailures: state.consecutiveFailures,
        lastAttemptAt: state.lastAttemptAt?.toISOString() ?? null,
        lastSuccessAt: state.lastSuccessAt?.toISOString() ?? null,
        lastError: state.lastError ? { ...state.lastError, at: state.lastError.at.toISOString() } : null,
        nextAttemptAt: state.nextAttemptAt?.toISOString() ?? null,
        entries: snapshot?.entries.length ?? 0,
        skipped: snapshot?.skipped ?? 0,
        capturedAt: snapshot?.capturedAt.toISOString() ?? null
      };
    });
  }

  private logInitialPass(): number {
    const loaded = this.states.filter((s) => s.lastSuccessAt !== null).length;
    const entries = this.opts.store.snapshots().reduce((sum, snap) => sum + snap.entries.length, 0);
    this.opts.logger.info({ loaded, total: this.states.length, entries }, 'initial feed pass complete');
    return loaded;
  }

  private async runFetcher(feed: FeedDescriptor): Promise<FetchResult> {
    try {
      return await this.opts.fetcher(feed);
    } catch (e) {
      const message = e instanceof Error ? e.message : String(e);
      return { ok: false, error: new FeedFetchError(feed.id, 'transport', message, { cause: e }) };
    }
  }

  // Never rejects: an attempt that throws past the fetcher counts as a failure and is retried.
  private run(state: FeedState): Promise<void> {
    return this.attempt(state).catch((e: unknown) => this.crashed(state, e));
  }

  private crashed(state: FeedState, e: unknown): void {
    if (this.stopped) return;
    if (state.timer) clearTimeout(state.timer);
    state.consecutiveFailures += 1;
    state.lastError = { kind: 'internal', message: e instanceof Error ? e.message : String(e), at: new Date() };
    state.phase = 'backoff';
    const delayMs = computeRetryDelay(this.opts.retryInitialMs, this.opts.retryMaxMs, state.consecutiveFailures);
    this.opts.logger.error(
      { feed: state.feed.id, err: e, failures: state.consecutiveFailures, retryInMs: delayMs },
      'feed refresh crashed'
    );
    this.schedule(state, delayMs);
  }

  private async attempt(state: FeedState): Promise<void> {
    const { feed } = state;
    state.timer = null;
    state.nextAttemptAt = null;
    state.phase = 'fetching';
    state.lastAttemptAt = new Date();

    const result = await this.runFetcher(feed);
    if (this.stopped) return;

    if (result.ok) {
      this.opts.store.replace(feed.id, result.snapshot);
      state.consecutiveFailures = 0;
      state.lastSuccessAt = new Date();
      state.lastError = null;
      state.phase = 'idle';
      this.opts.logger.info(
        { feed: feed.id, entries: result.snapshot.entries.length, skipped: result.snapshot.skipped },
        'feed refreshed'
      );
      this.schedule(state, this.opts.refreshIntervalMs);
      return;
    }

    state.consecutiveFailures += 1;
    state.lastError = { kind: result.error.kind, message: result.error.message, at: new Date() };
    state.phase = 'backoff';
    const delayMs = computeRetryDelay(this.opts.retryInitialMs, this.opts.retryMaxMs, state.consecutiveFailures);
    this.opts.logger.warn(
      {
        feed: feed.id,
        kind: result.error.kind,
        err: result.error.message,
        failures: state.consecutiveFailures,
        retryInMs: delayMs,
        keepingSnapshot: this.opts.store.get(feed.id) !== undefined
      },
      'feed refresh failed'
    );
    this.schedule(state, delayMs);
  }

  private schedule(state: FeedState, delayMs: number): void {
    if (this.stopped) return;
    state.nextAttemptAt = new Date(Date.now() + delayMs);
    state.timer = setTimeout(() => {
      void this.run(state);
    }, delayMs);
    // Background refresh alone must not keep the process alive.
    state.timer.unref();
  }
}
