import type { FastifyInstance } from 'fastify';
import type { AppConfig } from '../config.js';
import type { FeedStatusSource } from './feeds.js';

export async function registerHealthRoutes(app: FastifyInstance, config: AppConfig, feeds: FeedStatusSource): Promise<void> {
  app.get('/api/health', async () => {
    const items = feeds.status();
    const loaded = items.filter((f) => f.capturedAt !== null).length;
    const failing = items.filter((f) => f.consecutiveFailures > 0).length;

    return {
      ok: true,
      env: config.NODE_ENV,
      // true once every feed has either loaded or failed at least once.
      ready: items.every((f) => f.lastSuccessAt !== null || f.lastError !== null),
      feeds: { total: items.length, loaded, failing },
      time: new Date().toISOString()
    };
  });
}
