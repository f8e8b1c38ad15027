import Fastify, { type FastifyInstance } from 'fastify';
import rateLimit from '@fastify/rate-limit';

import { resolveLogLevel, type AppConfig } from './config.js';
import type { Classifier } from './reputation/classifier.js';
import { registerDnsRoutes } from './routes/dns.js';
import { registerFeedRoutes, type FeedStatusSource } from './routes/feeds.js';
import { registerHealthRoutes } from './routes/health.js';
import { registerLookupRoutes } from './routes/lookup.js';
import { registerVersionRoutes } from './routes/version.js';

export type AppDeps = {
  classifier: Classifier;
  feeds: FeedStatusSource;
};

/**
 * Builds the status API. The instance's logger is also the process logger, so it is built
 * even when HTTP is disabled; only listen() is skipped then.
 */
export async function buildApp(config: AppConfig, deps: AppDeps): Promise<FastifyInstance> {
  const app = Fastify({
    logger: { level: resolveLogLevel(config) }
  });

  await app.register(rateLimit, {
    global: false,
    max: 200,
    timeWindow: '1 minute'
  });

  await registerHealthRoutes(app, config, deps.feeds);
  await registerVersionRoutes(app);
  await registerFeedRoutes(app, deps.feeds);
  await registerLookupRoutes(app, deps.classifier);
  await registerDnsRoutes(app);

  return app;
}
