/**
 * Configuration schema using Zod
 */

import moment from 'moment-timezone';
import { z } from 'zod';

/** Env values arrive as strings; accept the usual spellings of a flag. */
const flag = z
  .union([z.boolean(), z.enum(['true', 'false', '1', '0', 'yes', 'no'])])
  .transform((value) => value === true || value === 'true' || value === '1' || value === 'yes');

/**
 * Application configuration schema
 */
export const configSchema = z.object({
  app: z.object({
    env: z.enum(['development', 'test', 'production']).default('development'),
    verbose: flag.default(false),
    /** Exit 1 on login failures and empty results instead of 0 */
    strictExit: flag.default(false),
  }),

  logging: z.object({
    level: z.enum(['error', 'warn', 'info', 'debug']).default('warn'),
    format: z.enum(['json', 'pretty']).default('pretty'),
    filePath: z.string().min(1).optional(),
  }),

  provider: z.object({
    type: z.enum(['baostock', 'fixture']).default('baostock'),
    baseUrl: z.string().url().default('http://127.0.0.1:8686'),
    userId: z.string().min(1).default('anonymous'),
    password: z.string().default('123456'),
    timeout: z.coerce.number().int().positive().default(30_000),
  }),

  market: z.object({
    timezone: z
      .string()
      .min(1)
      .refine((tz) => moment.tz.zone(tz) !== null, (tz) => ({ message: `Unknown time zone "${tz}"` }))
      .default('Asia/Shanghai'),
  }),

  watchlist: z.object({
    path: z.string().min(1).default('stocks.txt'),
  }),
});

/**
 * Inferred configuration type
 */
export type Config = z.infer<typeof configSchema>;

type Section = keyof Config;

/**
 * Environment variable mapping: env name → [section, key]
 */
export const envMapping: Readonly<Record<string, readonly [Section, string]>> = {
  NODE_ENV: ['app', 'env'],
  VERBOSE: ['app', 'verbose'],
  STRICT_EXIT: ['app', 'strictExit'],
  LOG_LEVEL: ['logging', 'level'],
  LOG_FORMAT: ['logging', 'format'],
  LOG_FILE: ['logging', 'filePath'],
  PROVIDER_TYPE: ['provider', 'type'],
  BAOSTOCK_GATEWAY_URL: ['provider', 'baseUrl'],
  BAOSTOCK_USER_ID: ['provider', 'userId'],
  BAOSTOCK_PASSWORD: ['provider', 'password'],
  PROVIDER_TIMEOUT: ['provider', 'timeout'],
  MARKET_TIMEZONE: ['market', 'timezone'],
  WATCHLIST_PATH: ['watchlist', 'path'],
};
