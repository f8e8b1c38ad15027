import type { FastifyInstance } from 'fastify';
import type { Classifier } from '../reputation/classifier.js';

export async function registerLookupRoutes(app: FastifyInstance, classifier: Classifier): Promise<void> {
  app.get<{ Params: { ip: string } }>(
    '/api/lookup/:ip',
    {
      config: {
        rateLimit: { max: 120, timeWindow: '1 minute' }
      }
    },
    async (request, reply) => {
      const ip = String(request.params.ip ?? '').trim();
      const verdict = classifier.classifyText(ip);
      if (!verdict) {
        reply.code(400);
        return { error: 'INVALID_IP' };
      }
      return { ip, verdict };
    }
  );
}
