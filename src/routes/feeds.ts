import type { FastifyInstance } from 'fastify';
import type { FeedStatus } from '../feeds/scheduler.js';

export type FeedStatusSource = {
  status: () => FeedStatus[];
};

export async function registerFeedRoutes(app: FastifyInstance, feeds: FeedStatusSource): Promise<void> {
  app.get(
    '/api/feeds',
    {
      config: {
        rateLimit: { max: 60, timeWindow: '1 minute' }
      }
    },
    async (_request, reply) => {
      reply.header('cache-control', 'no-store');
      return { items: feeds.status() };
    }
  );
}
