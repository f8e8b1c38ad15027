import type { FastifyBaseLogger } from 'fastify';

// The subset of Fastify's pino logger the background jobs and the DNS listener use.
export type Logger = Pick<FastifyBaseLogger, 'debug' | 'info' | 'warn' | 'error'>;
