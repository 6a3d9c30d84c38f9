/**
 * Configuration loading and management
 */

import { configSchema, envMapping, type Config } from './schema.js';

/**
 * Load configuration from environment and defaults
 *
 * Empty env values count as unset.
 *
 * @throws Error listing one validation issue per line
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  const rawConfig: Record<string, Record<string, string>> = {
    app: {},
    logging: {},
    provider: {},
    market: {},
    watchlist: {},
  };

  for (const [envKey, [section, key]] of Object.entries(envMapping)) {
    const value = env[envKey]?.trim();
    if (value) {
      rawConfig[section] = { ...rawConfig[section], [key]: value };
    }
  }

  const result = configSchema.safeParse(rawConfig);

  if (!result.success) {
    const errors = result.error.errors.map((e) => `${e.path.join('.')}: ${e.message}`);
    throw new Error(`Configuration validation failed:\n${errors.join('\n')}`);
  }

  return result.data;
}

/**
 * Get configuration summary for logging. Credentials are left out.
 */
export function getConfigSummary(config: Config): Record<string, unknown> {
  return {
    environment: config.app.env,
    verbose: config.app.verbose,
    strictExit: config.app.strictExit,
    provider: {
      type: config.provider.type,
      baseUrl: config.provider.baseUrl,
      userId: config.provider.userId,
      timeout: config.provider.timeout,
    },
    logging: {
      level: config.logging.level,
      format: config.logging.format,
      file: config.logging.filePath ?? null,
    },
    timezone: config.market.timezone,
    watchlist: config.watchlist.path,
  };
}

export { configSchema, envMapping } from './schema.js';
export type { Config } from './schema.js';
