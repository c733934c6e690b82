import { ConfigSchema, type Config } from './schema.js';

/**
 * Parse an integer from environment variable with a default value
 */
export function parseIntWithDefault(value: string | undefined, defaultValue: number): number {
  if (!value) return defaultValue;
  const parsed = parseInt(value, 10);
  return isNaN(parsed) ? defaultValue : parsed;
}

/**
 * Load and validate configuration from environment variables
 *
 * @throws Error listing every invalid setting
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  const rawConfig = {
    harness: {
      caseTimeoutMs: parseIntWithDefault(env.TOOLCHECK_CASE_TIMEOUT_MS, 5000),
    },
    suite: {
      catalogPath: env.TOOLCHECK_CATALOG_PATH || undefined,
    },
    logging: {
      level: env.LOG_LEVEL?.toLowerCase(),
      logFile: env.TOOLCHECK_LOG_FILE || undefined,
    },
  };

  const result = ConfigSchema.safeParse(rawConfig);

  if (!result.success) {
    const errors = result.error.errors
      .map((e) => `  - ${e.path.join('.')}: ${e.message}`)
      .join('\n');
    throw new Error(`Configuration validation failed:\n${errors}`);
  }

  return result.data;
}

let cached: Config | null = null;

/**
 * Configuration from the process environment, loaded on first use
 */
export function getConfig(): Config {
  cached ??= loadConfig();
  return cached;
}

export { type Config } from './schema.js';
