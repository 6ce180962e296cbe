/**
 * Configuration schema using Zod
 */

import { z } from 'zod';

/**
 * Application configuration schema
 */
export const configSchema = z.object({
  app: z
    .object({
      name: z.string().default('tapecache'),
      version: z.string().default('0.1.0'),
      stats: z.boolean().default(false),
    })
    .default({}),

  logging: z
    .object({
      level: z.enum(['error', 'warn', 'info', 'debug']).default('warn'),
      format: z.enum(['json', 'pretty']).default('pretty'),
      filePath: z.coerce.string().min(1).optional(),
    })
    .default({}),

  source: z
    .object({
      tradesPath: z.coerce.string().min(1).default('trades.csv'),
      timezone: z.string().default('UTC'),
      // Seconds of simulated delay per second of requested range
      latencyScale: z.number().nonnegative().finite().default(0.00001),
    })
    .default({}),

  cache: z
    .object({
      verifyInvariants: z.boolean().default(true),
    })
    .default({}),
});

/**
 * Inferred configuration type
 */
export type Config = z.infer<typeof configSchema>;

/**
 * Environment variable mapping
 */
export const envMapping: Record<string, string> = {
  LOG_LEVEL: 'logging.level',
  LOG_FORMAT: 'logging.format',
  LOG_FILE: 'logging.filePath',
  TRADES_PATH: 'source.tradesPath',
  TRADES_TIMEZONE: 'source.timezone',
  FETCH_LATENCY_SCALE: 'source.latencyScale',
  CACHE_VERIFY_INVARIANTS: 'cache.verifyInvariants',
  TAPECACHE_STATS: 'app.stats',
};
