/**
 * Runtime configuration
 *
 * Read once at startup from the environment and validated with zod so a bad
 * deployment fails before the server starts listening.
 */

import { z } from 'zod';
import type { LogLevel } from '@kakeibo/observability';

const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const satisfies readonly LogLevel[];

// Treat `FOO=` the same as an unset variable
const optional = <T extends z.ZodTypeAny>(schema: T) =>
  z.preprocess((value) => (value === '' ? undefined : value), schema);

const EnvSchema = z.object({
  NODE_ENV: optional(z.enum(['development', 'test', 'production']).default('development')),
  HOST: optional(z.string().min(1).default('0.0.0.0')),
  PORT: optional(z.coerce.number().int().min(1).max(65535).default(3000)),
  LOG_LEVEL: optional(z.enum(LOG_LEVELS).default('info')),
  LEDGER_MAX_RECORDS: optional(z.coerce.number().int().positive().default(10_000)),
  WEB_APP_URL: optional(z.string().url().default('http://localhost:5173')),
  npm_package_version: optional(z.string().default('0.0.0')),
});

export type AppConfig = {
  env: 'development' | 'test' | 'production';
  host: string;
  port: number;
  logLevel: LogLevel;
  maxRecords: number;
  webAppUrl: string;
  version: string;
};

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

/**
 * Parse and validate configuration from environment variables
 *
 * @throws {ConfigError} Listing every invalid variable
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const result = EnvSchema.safeParse(env);

  if (!result.success) {
    const problems = result.error.errors
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join(', ');
    throw new ConfigError(`Invalid environment configuration: ${problems}`);
  }

  const parsed = result.data;
  return {
    env: parsed.NODE_ENV,
    host: parsed.HOST,
    port: parsed.PORT,
    logLevel: parsed.LOG_LEVEL,
    maxRecords: parsed.LEDGER_MAX_RECORDS,
    webAppUrl: parsed.WEB_APP_URL,
    version: parsed.npm_package_version,
  };
}
