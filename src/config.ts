/**
 * Server configuration using Zod for validation.
 */

import { z } from 'zod';
import dotenv from 'dotenv';
import { fileURLToPath } from 'url';
import { dirname, join } from 'path';
import { existsSync } from 'fs';
import { ConfigurationError, parseEnvConfig, type TableTalkConfig } from 'tabletalk';

// Get directory name in ES modules
const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);
const rootDir = join(__dirname, '..');

// Load .env file if it exists
const envPath = join(rootDir, '.env');
if (existsSync(envPath)) {
  dotenv.config({ path: envPath });
}

/**
 * Server-only settings; everything else is parsed by tabletalk itself.
 */
const ServerSchema = z.object({
  PORT: z.coerce.number().int().positive().default(8000),
  HOST: z.string().default('0.0.0.0'),
  LOG_LEVEL: z
    .enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent'])
    .default('info'),
  NODE_ENV: z.string().optional(),
});

export interface Config {
  PORT: number;
  HOST: string;
  LOG_LEVEL: z.infer<typeof ServerSchema>['LOG_LEVEL'];
  PRETTY_LOGS: boolean;
  TABLETALK: TableTalkConfig;
}

/**
 * Parse and validate configuration from environment variables.
 * @throws ConfigurationError
 */
export function parseConfig(env: Record<string, string | undefined>): Config {
  const parsed = ServerSchema.safeParse({ ...env, LOG_LEVEL: env.LOG_LEVEL?.toLowerCase() });
  if (!parsed.success) {
    throw new ConfigurationError(
      'Configuration validation failed',
      parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`)
    );
  }

  return {
    PORT: parsed.data.PORT,
    HOST: parsed.data.HOST,
    LOG_LEVEL: parsed.data.LOG_LEVEL,
    PRETTY_LOGS: parsed.data.NODE_ENV !== 'production',
    TABLETALK: parseEnvConfig(env),
  };
}

function loadConfig(): Config {
  try {
    return parseConfig(process.env);
  } catch (error) {
    if (error instanceof ConfigurationError) {
      console.error(error.describe());
      process.exit(1);
    }
    throw error;
  }
}

/**
 * Global configuration instance.
 */
export const config = loadConfig();
