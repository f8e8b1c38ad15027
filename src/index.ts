import { buildApp } from './app.js';
import { loadConfig } from './config.js';
import { startDnsServer } from './dns/dnsServer.js';
import { defaultFeeds } from './feeds/catalog.js';
import { createFeedFetcher } from './feeds/fetch.js';
import { RefreshScheduler } from './feeds/scheduler.js';
import { createClassifier } from './reputation/classifier.js';
import { ReputationStore } from './reputation/store.js';

async function main(): Promise<void> {
  const config = loadConfig();

  const store = new ReputationStore();
  const classifier = createClassifier(store);

  // The scheduler needs app.log before it exists; status is only read once routes are hit.
  let scheduler: RefreshScheduler | null = null;
  const app = await buildApp(config, {
    classifier,
    feeds: { status: () => scheduler?.status() ?? [] }
  });

  const feeds = defaultFeeds(config);
  scheduler = new RefreshScheduler({
    feeds,
    store,
    fetcher: createFeedFetcher({ timeoutMs: config.FEED_TIMEOUT_MS, maxBytes: config.FEED_MAX_BYTES, logger: app.log }),
    logger: app.log,
    refreshIntervalMs: config.REFRESH_INTERVAL_MINUTES * 60_000,
    retryInitialMs: config.RETRY_INITIAL_MS,
    retryMaxMs: config.RETRY_MAX_MS,
    startupMode: config.STARTUP_MODE,
    startupMinFeeds: config.STARTUP_MIN_FEEDS
  });

  app.log.info({ feeds: feeds.map((f) => f.id), startupMode: config.STARTUP_MODE }, 'loading reputation feeds');
  await scheduler.start();

  // Will throw if binding fails.
  const dns = await startDnsServer(
    config,
    classifier,
    { ttl: config.ANSWER_TTL_SECONDS, safeAddress: config.SAFE_ADDRESS, flaggedAddress: config.FLAGGED_ADDRESS },
    app.log
  );

  if (config.ENABLE_HTTP) {
    await app.listen({ host: config.HOST, port: config.PORT });
  }

  const shutdown = async (signal: string): Promise<void> => {
    app.log.info({ signal }, 'shutting down');
    scheduler?.stop();
    await dns.close();
    await app.close();
    process.exit(0);
  };

  const onSignal = (signal: NodeJS.Signals): void => {
    shutdown(signal).catch((err: unknown) => {
      app.log.error({ err }, 'shutdown failed');
      process.exit(1);
    });
  };
  process.once('SIGINT', onSignal);
  process.once('SIGTERM', onSignal);
}

main().catch((err) => {
  // eslint-disable-next-line no-console
  console.error(err);
  process.exit(1);
});
