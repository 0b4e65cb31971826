/**
 * Configuration validation and helpful error messages
 */

import { ConfigurationError } from './errors.js';
import type { DatabaseClient, LLMProvider, SqlDialect } from './types.js';

/**
 * Valid Knex client names
 */
export const VALID_CLIENTS = ['mysql2', 'pg', 'better-sqlite3', 'mssql'] as const;

/**
 * Common mistakes and their corrections
 */
const CLIENT_ALIASES: Record<string, DatabaseClient> = {
  mysql: 'mysql2',
  mariadb: 'mysql2',
  postgres: 'pg',
  postgresql: 'pg',
  sqlite: 'better-sqlite3',
  sqlite3: 'better-sqlite3',
  sqlserver: 'mssql',
  'sql-server': 'mssql',
};

const DIALECTS: Record<DatabaseClient, SqlDialect> = {
  mysql2: 'mysql',
  pg: 'postgres',
  'better-sqlite3': 'sqlite',
  mssql: 'mssql',
};

export const DEFAULT_MODELS: Record<LLMProvider, string> = {
  anthropic: 'claude-sonnet-4-5-20250929',
  openai: 'gpt-4o',
};

const API_KEY_VARIABLES: Record<LLMProvider, string> = {
  anthropic: 'ANTHROPIC_API_KEY',
  openai: 'OPENAI_API_KEY',
};

function isDatabaseClient(value: string): value is DatabaseClient {
  return VALID_CLIENTS.some((client) => client === value);
}

/**
 * Validate and normalize a database client name.
 * @throws ConfigurationError for unknown clients
 */
export function validateDatabaseClient(client: string): DatabaseClient {
  if (isDatabaseClient(client)) {
    return client;
  }

  const normalized = CLIENT_ALIASES[client.toLowerCase()];
  if (normalized) {
    return normalized;
  }

  throw new ConfigurationError(`Invalid database client: "${client}"`, [
    `Valid options: ${VALID_CLIENTS.join(', ')}`,
    'Use "mysql2" not "mysql", "pg" not "postgres", "better-sqlite3" not "sqlite"',
  ]);
}

/**
 * SQL dialect a client speaks, for identifier quoting in prompts.
 */
export function dialectFor(client: DatabaseClient): SqlDialect {
  return DIALECTS[client];
}

/**
 * Name of the environment variable holding a provider's key.
 */
export function apiKeyVariable(provider: LLMProvider): string {
  return API_KEY_VARIABLES[provider];
}
