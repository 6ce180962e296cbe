/**
 * Configuration loading and management
 */

import { configSchema, envMapping, type Config } from './schema.js';

type RawConfig = { [key: string]: RawValue };
type RawValue = string | number | boolean | RawConfig;

/**
 * Load configuration from environment, overrides and defaults.
 *
 * Overrides use the same dotted paths as `envMapping` values and win over
 * the environment.
 *
 * @throws Error listing every invalid path
 *
 * @example
 * ```typescript
 * const config = loadConfig(process.env, { 'source.latencyScale': 0 });
 * ```
 */
export function loadConfig(
  env: NodeJS.ProcessEnv = process.env,
  overrides: Record<string, string | number | boolean | undefined> = {}
): Config {
  const rawConfig: RawConfig = {};

  // Load from environment variables
  for (const [envKey, configPath] of Object.entries(envMapping)) {
    const value = env[envKey];
    if (value !== undefined && value !== '') {
      setNestedProperty(rawConfig, configPath, parseEnvValue(value));
    }
  }

  for (const [configPath, value] of Object.entries(overrides)) {
    if (value !== undefined) {
      setNestedProperty(rawConfig, configPath, value);
    }
  }

  // Parse and validate
  const result = configSchema.safeParse(rawConfig);

  if (!result.success) {
    const errors = result.error.errors.map((e) => `${e.path.join('.')}: ${e.message}`);
    throw new Error(`Configuration validation failed:\n${errors.join('\n')}`);
  }

  return result.data;
}

/**
 * Set nested property in object
 */
function setNestedProperty(obj: RawConfig, path: string, value: RawValue): void {
  const keys = path.split('.');
  let current = obj;

  for (let i = 0; i < keys.length - 1; i++) {
    const key = keys[i];
    if (!key) continue;
    const next = current[key];
    if (typeof next === 'object') {
      current = next;
    } else {
      const created: RawConfig = {};
      current[key] = created;
      current = created;
    }
  }

  const lastKey = keys[keys.length - 1];
  if (lastKey) {
    current[lastKey] = value;
  }
}

/**
 * Parse environment variable value to appropriate type
 */
function parseEnvValue(value: string): string | number | boolean {
  // Boolean
  if (value === 'true') return true;
  if (value === 'false') return false;

  // Number
  const num = Number(value);
  if (!isNaN(num) && value.trim() !== '') return num;

  // String
  return value;
}

/**
 * Get configuration summary for logging
 */
export function getConfigSummary(config: Config): Record<string, unknown> {
  return {
    version: config.app.version,
    trades: config.source.tradesPath,
    timezone: config.source.timezone,
    latencyScale: config.source.latencyScale,
    verifyInvariants: config.cache.verifyInvariants,
    logging: {
      level: config.logging.level,
      format: config.logging.format,
      file: config.logging.filePath ?? null,
    },
  };
}

// Re-export types
export type { Config } from './schema.js';
