import type { DatabaseSchema, Row } from '../types.js';

/**
 * Capability behind the Schema Registry and the Query Executor.
 *
 * Implementations acquire a connection for the duration of one call and
 * release it on every exit path; nothing is held between calls.
 */
export interface QueryBackend {
  readonly kind: 'knex' | 'memory';

  /**
   * One introspection pass: every table with its column metadata.
   */
  introspect(databaseId: string): Promise<DatabaseSchema>;

  /**
   * Run an already-validated statement inside a read-only transaction and
   * return every fetched row. Rolls back and rethrows on failure.
   */
  run(databaseId: string, sql: string): Promise<Row[]>;

  close(): Promise<void>;
}
