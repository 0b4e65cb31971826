/**
 * Error taxonomy for tabletalk.
 *
 * Every error carries a stable `code` so surfaces (HTTP, MCP, CLI) can map it
 * without string matching, plus a list of suggestions shown to humans.
 */

export type ErrorCode =
  | 'SCHEMA_UNAVAILABLE'
  | 'UNSAFE_QUERY'
  | 'TABLE_NOT_FOUND'
  | 'EXECUTION_FAILED'
  | 'TRANSLATION_FAILED'
  | 'LLM_ERROR'
  | 'SESSION_NOT_FOUND'
  | 'CONFIGURATION_ERROR';

/**
 * Base class for all tabletalk errors.
 */
export abstract class TableTalkError extends Error {
  abstract readonly code: ErrorCode;
  public readonly suggestions: string[];

  constructor(message: string, suggestions: string[]) {
    super(message);
    this.suggestions = suggestions;
  }

  /**
   * Message followed by the suggestion list, for terminal output.
   */
  describe(): string {
    if (this.suggestions.length === 0) {
      return this.message;
    }
    return `${this.message}\n\nSuggested fixes:\n${this.suggestions.map((s) => `  • ${s}`).join('\n')}`;
  }
}

/**
 * Error thrown when a database cannot be reached or introspected.
 *
 * Common causes:
 * - Wrong host, port or credentials
 * - The database identifier does not exist on the server
 * - The user lacks permission to read the information schema
 */
export class SchemaUnavailableError extends TableTalkError {
  readonly code = 'SCHEMA_UNAVAILABLE';
  public readonly databaseId: string;

  constructor(databaseId: string, message: string, suggestions?: string[]) {
    super(message, suggestions ?? [
      'Verify DB_HOST, DB_PORT, DB_USER and DB_PASSWORD',
      `Check that the database "${databaseId}" exists`,
      'Ensure the database user can read table metadata',
    ]);
    this.name = 'SchemaUnavailableError';
    this.databaseId = databaseId;
    Object.setPrototypeOf(this, SchemaUnavailableError.prototype);
  }
}

/**
 * Error raised when a statement fails the safety gate.
 */
export class UnsafeQueryError extends TableTalkError {
  readonly code = 'UNSAFE_QUERY';
  public readonly reason: string;

  constructor(reason: string) {
    super(
      `Potentially unsafe query detected. Only simple SELECT queries are allowed. (${reason})`,
      [
        'Start the statement with SELECT',
        'Remove any INSERT, UPDATE, DELETE, DROP, ALTER, TRUNCATE or CREATE text, including inside values and column names',
      ]
    );
    this.name = 'UnsafeQueryError';
    this.reason = reason;
    Object.setPrototypeOf(this, UnsafeQueryError.prototype);
  }
}

/**
 * Error raised when a statement references a table the database does not have.
 */
export class TableNotFoundError extends TableTalkError {
  readonly code = 'TABLE_NOT_FOUND';
  public readonly table: string;

  constructor(table: string) {
    super(`Table '${table}' not found.`, [
      'List the available tables first',
      'Check the spelling and case of the table name',
    ]);
    this.name = 'TableNotFoundError';
    this.table = table;
    Object.setPrototypeOf(this, TableNotFoundError.prototype);
  }
}

/**
 * Error raised when the database rejects a statement.
 * The surrounding transaction has always been rolled back.
 */
export class ExecutionFailedError extends TableTalkError {
  readonly code = 'EXECUTION_FAILED';
  public readonly sql?: string;

  constructor(message: string, sql?: string) {
    super(message, [
      'Ensure the schema matches the actual database structure',
      'Check the database user has SELECT permission on the table',
      'Examine the SQL for syntax errors',
    ]);
    this.name = 'ExecutionFailedError';
    this.sql = sql;
    Object.setPrototypeOf(this, ExecutionFailedError.prototype);
  }
}

/**
 * Error describing a failed natural-language translation.
 */
export class TranslationFailedError extends TableTalkError {
  readonly code = 'TRANSLATION_FAILED';

  constructor(message: string) {
    super(message, [
      'Rephrase the question in terms of a single table',
      'Ensure table and column names in the question match the schema',
    ]);
    this.name = 'TranslationFailedError';
    Object.setPrototypeOf(this, TranslationFailedError.prototype);
  }
}

/**
 * Error thrown when LLM API calls fail after all retries.
 *
 * Common causes:
 * - Invalid or expired API key
 * - Rate limit or quota exceeded
 * - Network connectivity issues
 */
export class LLMError extends TableTalkError {
  readonly code = 'LLM_ERROR';

  constructor(message: string) {
    super(message, [
      'Verify the API key (ANTHROPIC_API_KEY or OPENAI_API_KEY)',
      'Check API quota and rate limits with your provider',
      'Wait a moment and retry (automatic backoff already applied)',
    ]);
    this.name = 'LLMError';
    Object.setPrototypeOf(this, LLMError.prototype);
  }
}

export class SessionNotFoundError extends TableTalkError {
  readonly code = 'SESSION_NOT_FOUND';
  public readonly sessionId: string;

  constructor(sessionId: string) {
    super(`Session not found: ${sessionId}`, ['Open a new session and run the query again']);
    this.name = 'SessionNotFoundError';
    this.sessionId = sessionId;
    Object.setPrototypeOf(this, SessionNotFoundError.prototype);
  }
}

/**
 * Error thrown for invalid configuration. Fatal at startup.
 */
export class ConfigurationError extends TableTalkError {
  readonly code = 'CONFIGURATION_ERROR';

  constructor(message: string, suggestions?: string[]) {
    super(message, suggestions ?? ['Check your .env file against .env.example']);
    this.name = 'ConfigurationError';
    Object.setPrototypeOf(this, ConfigurationError.prototype);
  }
}
