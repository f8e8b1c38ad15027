import { z } from 'zod';
import dotenv from 'dotenv';
import ipaddr from 'ipaddr.js';

dotenv.config({ path: process.env.DOTENV_CONFIG_PATH || undefined });

// z.coerce.boolean() turns "false" into true; accept the usual spellings instead.
const envBoolean = (fallback: boolean) =>
  z
    .enum(['true', 'false', '1', '0', 'yes', 'no'])
    .optional()
    .transform((v) => (v === undefined ? fallback : v === 'true' || v === '1' || v === 'yes'));

const ipv4 = z.string().refine((v) => ipaddr.IPv4.isValidFourPartDecimal(v), 'must be a dotted-quad IPv4 address');

const schema = z
  .object({
    NODE_ENV: z.enum(['development', 'test', 'production']).optional().default('development'),
    LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).optional(),

    // Status API (health, feed status, lookups).
    HOST: z.string().optional().default('0.0.0.0'),
    PORT: z.coerce.number().int().positive().optional().default(8080),
    ENABLE_HTTP: envBoolean(true),

    DNS_HOST: z.string().optional().default('0.0.0.0'),
    // 0 binds an ephemeral port (tests).
    DNS_PORT: z.coerce.number().int().min(0).max(65535).optional().default(53),

    // How long resolvers may cache a verdict.
    ANSWER_TTL_SECONDS: z.coerce.number().int().min(0).optional().default(3600),
    SAFE_ADDRESS: ipv4.optional().default('127.0.0.1'),
    FLAGGED_ADDRESS: ipv4.optional().default('127.0.0.2'),

    REFRESH_INTERVAL_MINUTES: z.coerce.number().int().min(1).optional().default(360),
    RETRY_INITIAL_MS: z.coerce.number().int().min(100).optional().default(5000),
    RETRY_MAX_MS: z.coerce.number().int().min(100).optional().default(300_000),

    FEED_TIMEOUT_MS: z.coerce.number().int().min(250).optional().default(15_000),
    FEED_MAX_BYTES: z.coerce.number().int().positive().optional().default(25 * 1024 * 1024),

    // blocking: answer queries only after every feed had its first fetch attempt.
    // background: bind immediately and backfill as feeds arrive.
    STARTUP_MODE: z.enum(['blocking', 'background']).optional().default('blocking'),
    // Fatal when fewer feeds than this loaded during the initial pass.
    STARTUP_MIN_FEEDS: z.coerce.number().int().min(0).optional().default(0),

    FEEDS_DISABLED: z
      .string()
      .optional()
      .default('')
      .transform((v) =>
        v
          .split(',')
          .map((s) => s.trim())
          .filter(Boolean)
      ),

    FEED_FIREHOL_URL: z.string().url().optional().default('https://iplists.firehol.org/files/firehol_level1.netset'),
    FEED_IPSUM_URL: z.string().url().optional().default('https://raw.githubusercontent.com/stamparm/ipsum/master/levels/3.txt'),
    FEED_TOR_URL: z.string().url().optional().default('https://check.torproject.org/torbulkexitlist'),
    FEED_DATACENTERS_URL: z
      .string()
      .url()
      .optional()
      .default('https://raw.githubusercontent.com/jhassine/server-ip-addresses/master/data/datacenters.txt'),
    FEED_OCI_URL: z.string().url().optional().default('https://docs.cloud.oracle.com/en-us/iaas/tools/public_ip_ranges.json'),
    FEED_DIGITALOCEAN_URL: z.string().url().optional().default('https://www.digitalocean.com/geo/google.csv')
  })
  .refine((cfg) => cfg.RETRY_MAX_MS >= cfg.RETRY_INITIAL_MS, {
    message: 'RETRY_MAX_MS must be >= RETRY_INITIAL_MS',
    path: ['RETRY_MAX_MS']
  })
  .refine((cfg) => cfg.SAFE_ADDRESS !== cfg.FLAGGED_ADDRESS, {
    message: 'SAFE_ADDRESS and FLAGGED_ADDRESS must differ',
    path: ['FLAGGED_ADDRESS']
  });

export type AppConfig = z.infer<typeof schema>;

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  return schema.parse(env);
}

export function resolveLogLevel(config: AppConfig): string {
  if (config.LOG_LEVEL) return config.LOG_LEVEL;
  if (config.NODE_ENV === 'test') return 'silent';
  return config.NODE_ENV === 'production' ? 'info' : 'debug';
}
