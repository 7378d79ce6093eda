import { z } from 'zod';
import { ConfigurationError } from './errors.js';
import type { LogLevel } from './logging.js';

const envSchema = z.object({
  DATABASE_URL: z.string().url(),
  DATABASE_MAX_CONNECTIONS: z.coerce.number().int().positive().default(10),
  LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error', 'silent']).default('info'),
});

export type SupportDeskConfig = {
  databaseUrl: string;
  maxConnections: number;
  logLevel: LogLevel;
};

/**
 * Read and validate configuration from environment variables.
 *
 * @throws ConfigurationError listing every invalid or missing variable
 */
export function loadConfig(
  env: Record<string, string | undefined> = process.env
): SupportDeskConfig {
  const parsed = envSchema.safeParse(env);

  if (!parsed.success) {
    throw new ConfigurationError(
      parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`)
    );
  }

  return {
    databaseUrl: parsed.data.DATABASE_URL,
    maxConnections: parsed.data.DATABASE_MAX_CONNECTIONS,
    logLevel: parsed.data.LOG_LEVEL,
  };
}
