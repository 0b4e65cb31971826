/**
 * Main tabletalk class - programmatic API for natural language questions
 * against a database, behind a read-only safety gate.
 */

import pino, { type Logger } from 'pino';
import type {
  AskResult,
  DatabaseConfig,
  DatabaseSchema,
  PageResult,
  QueryRequest,
  QueryResult,
  TableTalkConfig,
  TranslationResult,
} from './types.js';
import type { QueryBackend } from './backends/types.js';
import { KnexBackend } from './backends/knex.js';
import { loadDemoDatabase, MemoryBackend } from './backends/memory.js';
import { SchemaRegistry, type SchemaRegistryStats } from './schema-registry.js';
import { SafetyValidator, type SafetyVerdict } from './safety.js';
import { QueryExecutor } from './executor.js';
import { LLMService, type CompletionClient } from './llm.js';
import { Translator } from './translator.js';
import { type Session, SessionStore } from './sessions.js';
import { parseEnvConfig } from './config.js';
import { dialectFor } from './validation.js';
import { errorMessage } from './utils.js';

/**
 * Collaborators that replace the defaults built from config.
 */
export interface TableTalkDependencies {
  backend?: QueryBackend;
  completion?: CompletionClient;
}

export interface TargetOptions {
  /**
   * @default the configured default database
   */
  databaseId?: string;
}

export interface SessionOptions extends TargetOptions {
  /**
   * Store successful rows in this session's page cursor
   */
  sessionId?: string;
}

function createBackend(config: DatabaseConfig, logger: Logger): QueryBackend {
  if (config.backend === 'memory') {
    return new MemoryBackend([loadDemoDatabase()]);
  }
  return KnexBackend.fromConfig(config, logger);
}

/**
 * tabletalk - ask a database in plain language
 *
 * @example
 * ```typescript
 * const tt = new TableTalk({
 *   database: {
 *     backend: 'knex',
 *     client: 'mysql2',
 *     host: 'localhost',
 *     user: 'reader',
 *     password: process.env.DB_PASSWORD,
 *     defaultDatabase: 'shop'
 *   },
 *   llm: {
 *     provider: 'anthropic',
 *     model: 'claude-sonnet-4-5-20250929',
 *     apiKey: process.env.ANTHROPIC_API_KEY
 *   }
 * });
 *
 * const { sessionId } = tt.openSession();
 * const answer = await tt.ask('list all users', { sessionId });
 * const firstPage = await tt.nextPage(sessionId);
 * ```
 */
export class TableTalk {
  readonly defaultDatabase: string;
  private logger: Logger;
  private backend: QueryBackend;
  private validator: SafetyValidator;
  private registry: SchemaRegistry;
  private executor: QueryExecutor;
  private translator: Translator;
  private sessions: SessionStore;

  constructor(config: TableTalkConfig, deps: TableTalkDependencies = {}) {
    this.defaultDatabase = config.database.defaultDatabase;
    this.logger = config.logger ?? pino({ level: 'silent' });

    this.backend =
      deps.backend ?? createBackend(config.database, this.logger.child({ component: 'database' }));

    this.validator = new SafetyValidator({
      sensitiveColumnPolicy: config.safety?.sensitiveColumnPolicy,
      sensitiveTerms: config.safety?.sensitiveTerms,
    });

    this.registry = new SchemaRegistry(this.backend, {
      ttlMs: config.schema?.ttlMs,
      logger: this.logger.child({ component: 'schema-registry' }),
    });

    this.executor = new QueryExecutor(
      this.backend,
      this.validator,
      this.defaultDatabase,
      this.logger.child({ component: 'executor' })
    );

    const completion =
      deps.completion ?? new LLMService(config.llm, this.logger.child({ component: 'llm' }));

    this.translator = new Translator(completion, {
      // The demo tables mirror a MySQL database
      dialect: this.backend.kind === 'memory' ? 'mysql' : dialectFor(config.database.client),
      sensitiveTerms: this.validator.blockedTerms,
      temperature: config.llm.temperature,
      maxOutputTokens: config.llm.maxTokens,
      logger: this.logger.child({ component: 'translator' }),
    });

    this.sessions = new SessionStore({
      pageSize: config.pagination?.pageSize ?? 5,
      maxSessions: config.pagination?.maxSessions,
      logger: this.logger.child({ component: 'sessions' }),
    });
  }

  /**
   * Build from environment variables (see `.env.example`).
   * @throws ConfigurationError when the environment is invalid
   */
  static fromEnv(
    env: Record<string, string | undefined> = process.env,
    options: { logger?: Logger } & TableTalkDependencies = {}
  ): TableTalk {
    const { logger, ...deps } = options;
    return new TableTalk({ ...parseEnvConfig(env), logger }, deps);
  }

  /**
   * Cached or freshly introspected schema.
   * @throws SchemaUnavailableError
   */
  async getSchema(databaseId: string = this.defaultDatabase): Promise<DatabaseSchema> {
    return this.registry.getSchema(databaseId);
  }

  /**
   * @throws SchemaUnavailableError
   */
  async listTables(databaseId: string = this.defaultDatabase): Promise<string[]> {
    return this.registry.listTables(databaseId);
  }

  invalidateSchema(databaseId: string = this.defaultDatabase): boolean {
    return this.registry.invalidate(databaseId);
  }

  /**
   * Classify a statement without running it.
   */
  classify(sql: string): SafetyVerdict {
    return this.validator.classify(sql);
  }

  /**
   * Run hand-written SQL through the safety gate and the executor.
   *
   * @example
   * ```typescript
   * const result = await tt.runQuery('SELECT * FROM users');
   * if (result.success) console.log(result.rowCount);
   * ```
   * @throws SessionNotFoundError for an unknown `sessionId`
   */
  async runQuery(sql: string, options: SessionOptions = {}): Promise<QueryResult> {
    const request: QueryRequest = {
      rawSql: sql,
      origin: 'DIRECT',
      databaseId: options.databaseId,
    };

    if (!options.sessionId) {
      return this.executor.execute(request);
    }

    const session = this.sessions.get(options.sessionId);
    return session.exclusive(() => this.executeInto(session, request));
  }

  /**
   * Translate a question into SQL without executing it.
   */
  async translate(question: string, options: TargetOptions = {}): Promise<TranslationResult> {
    let schema: DatabaseSchema;
    try {
      schema = await this.getSchema(options.databaseId);
    } catch (error) {
      return { sql: '', confidence: 0, tablesUsed: [], error: errorMessage(error) };
    }
    return this.translator.translate(question, schema);
  }

  /**
   * Full pipeline: schema → translate → validate → execute, strictly in order.
   * Nothing is executed when translation reports an error.
   *
   * @throws SessionNotFoundError for an unknown `sessionId`
   */
  async ask(question: string, options: SessionOptions = {}): Promise<AskResult> {
    const session = options.sessionId ? this.sessions.get(options.sessionId) : undefined;

    const pipeline = async (): Promise<AskResult> => {
      const translation = await this.translate(question, options);
      if (translation.error) {
        return { question, translation, result: null };
      }

      const request: QueryRequest = {
        rawSql: translation.sql,
        origin: 'GENERATED',
        databaseId: options.databaseId,
      };
      const result = session
        ? await this.executeInto(session, request)
        : await this.executor.execute(request);
      return { question, translation, result };
    };

    return session ? session.exclusive(pipeline) : pipeline();
  }

  openSession(): { sessionId: string; pageSize: number } {
    const session = this.sessions.open();
    return { sessionId: session.id, pageSize: session.cursor.pageSize };
  }

  /**
   * Next page of the session's last successful result.
   * @throws SessionNotFoundError
   */
  async nextPage(sessionId: string): Promise<PageResult> {
    const session = this.sessions.get(sessionId);
    return session.exclusive(() => session.cursor.nextPage());
  }

  closeSession(sessionId: string): boolean {
    return this.sessions.close(sessionId);
  }

  getStats(): { schema: SchemaRegistryStats; sessions: number } {
    return {
      schema: this.registry.getStats(),
      sessions: this.sessions.size,
    };
  }

  /**
   * Close database connections and cleanup.
   */
  async close(): Promise<void> {
    await this.backend.close();
  }

  private async executeInto(session: Session, request: QueryRequest): Promise<QueryResult> {
    const result = await this.executor.execute(request);
    if (result.success) {
      session.cursor.storeResult(result.rows);
    }
    return result;
  }
}
