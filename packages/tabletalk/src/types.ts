/**
 * TypeScript types for tabletalk
 */

import type { Logger } from 'pino';
import type { ErrorCode } from './errors.js';
import type { Row } from './utils.js';

export type { Row } from './utils.js';

/**
 * Metadata of one column, as introspected.
 */
export interface ColumnDescriptor {
  readonly name: string;
  /** Declared type, e.g. `varchar(255)` */
  readonly type: string;
  readonly nullable: boolean;
  readonly keyRole: 'NONE' | 'PRIMARY';
  readonly default?: string;
  /** Extra attributes such as `auto_increment`; empty when none */
  readonly extra: string;
}

/**
 * Columns of one table, in declaration order.
 */
export type TableSchema = readonly ColumnDescriptor[];

/**
 * One schema snapshot of a database.
 */
export interface DatabaseSchema {
  readonly databaseName: string;
  readonly tables: Readonly<Record<string, TableSchema>>;
}

/**
 * Whether a statement was written by hand or produced by the translator.
 */
export type QueryOrigin = 'DIRECT' | 'GENERATED';

export interface QueryRequest {
  rawSql: string;
  origin: QueryOrigin;
  /**
   * Target database identifier
   * @default the configured default database
   */
  databaseId?: string;
}

export interface QuerySuccess {
  success: true;
  rows: Row[];
  rowCount: number;
}

export interface QueryFailure {
  success: false;
  rows: [];
  rowCount: 0;
  error: string;
  errorCode: ErrorCode;
}

/**
 * Outcome of one executed request. Never mutated after creation.
 */
export type QueryResult = QuerySuccess | QueryFailure;

export interface TranslationResult {
  sql: string;
  /** Model's own estimate, 0..100. A hint, not a guarantee. */
  confidence: number;
  tablesUsed: string[];
  error?: string;
}

/**
 * One served page, or the end-of-pages signal.
 * `page` is the 1-based index of the page just served; on `done` it is the
 * unchanged current page.
 */
export type PageResult =
  | { done: false; rows: Row[]; page: number }
  | { done: true; page: number };

export interface AskResult {
  question: string;
  translation: TranslationResult;
  /** `null` when translation failed and nothing was executed */
  result: QueryResult | null;
}

/**
 * SQL dialects the prompt knows identifier quoting for.
 */
export type SqlDialect = 'mysql' | 'postgres' | 'sqlite' | 'mssql';

export type DatabaseClient = 'mysql2' | 'pg' | 'better-sqlite3' | 'mssql';

export type LLMProvider = 'anthropic' | 'openai';

/**
 * Database connection settings.
 */
export interface DatabaseConfig {
  /**
   * Which backend answers queries
   * - `knex`: a real database through Knex.js
   * - `memory`: the bundled demo tables, no database needed
   */
  backend: 'knex' | 'memory';

  /**
   * Knex client
   * @default "mysql2"
   */
  client: DatabaseClient;

  host?: string;
  port?: number;
  user?: string;
  password?: string;

  /**
   * SQLite file, only for better-sqlite3
   */
  filename?: string;

  /**
   * Default database identifier
   * @example "test_db"
   */
  defaultDatabase: string;
}

/**
 * LLM configuration
 */
export interface LLMConfig {
  provider: LLMProvider;

  /**
   * Model name
   * @example "claude-sonnet-4-5-20250929"
   * @example "gpt-4o"
   */
  model: string;

  apiKey: string;

  /**
   * Maximum tokens for LLM responses
   * @default 1024
   */
  maxTokens?: number;

  /**
   * Sampling temperature; kept low for deterministic SQL
   * @default 0.1
   */
  temperature?: number;

  /**
   * Attempts per call before giving up
   * @default 3
   */
  maxRetries?: number;

  /**
   * Base delay of the exponential backoff between attempts
   * @default 1000
   */
  retryDelayMs?: number;
}

/**
 * tabletalk configuration
 */
export interface TableTalkConfig {
  database: DatabaseConfig;
  llm: LLMConfig;

  pagination?: {
    /**
     * Rows per page
     * @default 5
     */
    pageSize?: number;

    /**
     * Sessions kept before the least recently used is evicted
     * @default 1000
     */
    maxSessions?: number;
  };

  schema?: {
    /**
     * Age after which a cached schema is introspected again; 0 never expires
     * @default 0
     */
    ttlMs?: number;
  };

  safety?: {
    /**
     * Reject statements (and instruct the model to avoid columns) matching
     * sensitive-looking names
     * @default false
     */
    sensitiveColumnPolicy?: boolean;

    /**
     * Terms treated as sensitive when the policy is on
     * @default ["password", "passwd", "salary", "ssn", "secret"]
     */
    sensitiveTerms?: string[];
  };

  /**
   * Parent logger; components log through child loggers
   */
  logger?: Logger;
}

export type { ErrorCode } from './errors.js';
