/**
 * Configuration from environment variables, validated with Zod.
 *
 * Components never read the environment themselves; this module turns it into
 * an explicit TableTalkConfig that is passed to their constructors.
 */

import { z } from 'zod';
import type { TableTalkConfig } from './types.js';
import { ConfigurationError } from './errors.js';
import {
  apiKeyVariable,
  DEFAULT_MODELS,
  validateDatabaseClient,
} from './validation.js';

const booleanFlag = z
  .enum(['true', 'false', '1', '0'])
  .default('false')
  .transform((value) => value === 'true' || value === '1');

/**
 * Configuration schema with validation and defaults.
 */
export const EnvSchema = z.object({
  // Database Configuration
  DB_BACKEND: z.enum(['knex', 'memory']).default('knex'),
  DB_CLIENT: z.string().default('mysql2'),
  DB_HOST: z.string().default('localhost'),
  DB_PORT: z.coerce.number().int().positive().optional(),
  DB_USER: z.string().optional(),
  DB_PASSWORD: z.string().optional(),
  DB_NAME: z.string().min(1).default('test_db'),
  DB_PATH: z.string().optional(),

  // LLM Provider Configuration
  LLM_PROVIDER: z.enum(['anthropic', 'openai']).default('anthropic'),
  LLM_MODEL: z.string().optional(),
  ANTHROPIC_API_KEY: z.string().optional(),
  OPENAI_API_KEY: z.string().optional(),
  LLM_MAX_TOKENS: z.coerce.number().int().positive().default(1024),
  LLM_TEMPERATURE: z.coerce.number().min(0).max(2).default(0.1),

  // Pagination, caching and safety
  PAGE_SIZE: z.coerce.number().int().positive().default(5),
  MAX_SESSIONS: z.coerce.number().int().positive().default(1000),
  SCHEMA_TTL_MS: z.coerce.number().int().min(0).default(0),
  SENSITIVE_COLUMN_POLICY: booleanFlag,
});

export type EnvConfig = z.infer<typeof EnvSchema>;

/**
 * Parse and validate configuration from environment variables.
 * @throws ConfigurationError listing every invalid or missing variable
 */
export function parseEnvConfig(env: Record<string, string | undefined>): TableTalkConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigurationError(
      'Configuration validation failed',
      parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`)
    );
  }
  const base = parsed.data;

  const client = validateDatabaseClient(base.DB_CLIENT);
  if (base.DB_BACKEND === 'knex' && client === 'better-sqlite3' && !base.DB_PATH) {
    throw new ConfigurationError('DB_PATH is required when DB_CLIENT is better-sqlite3');
  }

  // A missing model key is fatal: no request could ever be translated.
  const apiKey =
    base.LLM_PROVIDER === 'anthropic' ? base.ANTHROPIC_API_KEY : base.OPENAI_API_KEY;
  if (!apiKey) {
    const variable = apiKeyVariable(base.LLM_PROVIDER);
    throw new ConfigurationError(
      `${variable} is required when LLM_PROVIDER is ${base.LLM_PROVIDER}`,
      [`Set ${variable} in your environment or .env file`]
    );
  }

  return {
    database: {
      backend: base.DB_BACKEND,
      client,
      host: base.DB_HOST,
      port: base.DB_PORT,
      user: base.DB_USER,
      password: base.DB_PASSWORD,
      filename: base.DB_PATH,
      defaultDatabase: base.DB_NAME,
    },
    llm: {
      provider: base.LLM_PROVIDER,
      model: base.LLM_MODEL ?? DEFAULT_MODELS[base.LLM_PROVIDER],
      apiKey,
      maxTokens: base.LLM_MAX_TOKENS,
      temperature: base.LLM_TEMPERATURE,
    },
    pagination: {
      pageSize: base.PAGE_SIZE,
      maxSessions: base.MAX_SESSIONS,
    },
    schema: {
      ttlMs: base.SCHEMA_TTL_MS,
    },
    safety: {
      sensitiveColumnPolicy: base.SENSITIVE_COLUMN_POLICY,
    },
  };
}
