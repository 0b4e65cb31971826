/**
 * tabletalk - ask a relational database questions in plain language,
 * with only read-only single-table SELECTs ever reaching it.
 */

export { TableTalk } from './TableTalk.js';
export type { TableTalkDependencies, TargetOptions, SessionOptions } from './TableTalk.js';
export type {
  AskResult,
  ColumnDescriptor,
  DatabaseClient,
  DatabaseConfig,
  DatabaseSchema,
  ErrorCode,
  LLMConfig,
  LLMProvider,
  PageResult,
  QueryFailure,
  QueryOrigin,
  QueryRequest,
  QueryResult,
  QuerySuccess,
  Row,
  SqlDialect,
  TableSchema,
  TableTalkConfig,
  TranslationResult,
} from './types.js';
export {
  TableTalkError,
  SchemaUnavailableError,
  UnsafeQueryError,
  TableNotFoundError,
  ExecutionFailedError,
  TranslationFailedError,
  LLMError,
  SessionNotFoundError,
  ConfigurationError,
} from './errors.js';
export { SafetyValidator, DENYLISTED_KEYWORDS, DEFAULT_SENSITIVE_TERMS } from './safety.js';
export type { SafetyVerdict, SafetyValidatorOptions } from './safety.js';
export { SchemaRegistry } from './schema-registry.js';
export type { SchemaRegistryStats } from './schema-registry.js';
export { QueryExecutor } from './executor.js';
export { Translator, renderSchema, cleanSql } from './translator.js';
export { LLMService } from './llm.js';
export type { CompletionClient, CompletionRequest } from './llm.js';
export { PageCursor } from './pagination.js';
export { Session, SessionStore } from './sessions.js';
export { KnexBackend } from './backends/knex.js';
export { MemoryBackend, loadDemoDatabase, parseMemoryDatabase } from './backends/memory.js';
export type { MemoryDatabase } from './backends/memory.js';
export type { QueryBackend } from './backends/types.js';
export { parseEnvConfig } from './config.js';
