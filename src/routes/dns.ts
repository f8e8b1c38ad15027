import type { FastifyInstance } from 'fastify';
import { dnsRuntimeStats } from '../dns/dnsServer.js';

export async function registerDnsRoutes(app: FastifyInstance): Promise<void> {
  app.get('/api/dns/stats', async () => {
    return { ...dnsRuntimeStats };
  });
}
