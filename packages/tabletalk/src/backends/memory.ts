/**
 * In-memory query backend, used when no real database is attached.
 *
 * Answers only `SELECT * FROM <table>` with an optional `LIMIT <n>` found by
 * text search.
 */

import { readFileSync } from 'fs';
import { z } from 'zod';
import type { QueryBackend } from './types.js';
import type { ColumnDescriptor, DatabaseSchema, Row, TableSchema } from '../types.js';
import { ExecutionFailedError, TableNotFoundError } from '../errors.js';

const ColumnSchema = z.object({
  name: z.string(),
  type: z.string(),
  nullable: z.boolean(),
  keyRole: z.enum(['NONE', 'PRIMARY']),
  default: z.string().optional(),
  extra: z.string().default(''),
});

const MemoryDatabaseSchema = z.object({
  databaseName: z.string().min(1),
  tables: z.record(
    z.object({
      columns: z.array(ColumnSchema),
      rows: z.array(z.record(z.unknown())),
    })
  ),
});

export type MemoryDatabase = z.infer<typeof MemoryDatabaseSchema>;

const SELECT_ALL_PATTERN = /^select\s+\*\s+from\s+([`"[]?)([\w.]+)[`"\]]?/;
const LIMIT_PATTERN = /\blimit\s+(\d+)/;

/**
 * Load the bundled demo database (`test_db` with `users` and `products`).
 */
export function loadDemoDatabase(): MemoryDatabase {
  const file = new URL('../../data/demo-database.json', import.meta.url);
  return parseMemoryDatabase(JSON.parse(readFileSync(file, 'utf-8')));
}

/**
 * Validate a table map read from JSON or built in code.
 */
export function parseMemoryDatabase(input: unknown): MemoryDatabase {
  return MemoryDatabaseSchema.parse(input);
}

export class MemoryBackend implements QueryBackend {
  readonly kind = 'memory';
  private databases: Map<string, MemoryDatabase> = new Map();

  constructor(databases: MemoryDatabase[]) {
    for (const database of databases) {
      this.databases.set(database.databaseName, database);
    }
  }

  async introspect(databaseId: string): Promise<DatabaseSchema> {
    const database = this.databases.get(databaseId);
    if (!database) {
      throw new Error(`Unknown database: ${databaseId}`);
    }

    const tables: Record<string, TableSchema> = Object.fromEntries(
      Object.entries(database.tables).map(([name, table]) => [
        name,
        table.columns.map((column): ColumnDescriptor => ({ ...column })),
      ])
    );
    return { databaseName: database.databaseName, tables };
  }

  async run(databaseId: string, sql: string): Promise<Row[]> {
    const database = this.databases.get(databaseId);
    if (!database) {
      throw new ExecutionFailedError(`Unknown database: ${databaseId}`, sql);
    }

    const normalized = sql.trim().toLowerCase();
    const match = SELECT_ALL_PATTERN.exec(normalized);
    if (!match) {
      throw new ExecutionFailedError('Failed to parse table name from SQL.', sql);
    }

    const tableName = match[2];
    // Own keys only: `constructor` or `__proto__` are not tables.
    const table = Object.hasOwn(database.tables, tableName) ? database.tables[tableName] : undefined;
    if (!table) {
      throw new TableNotFoundError(tableName);
    }

    const limitMatch = LIMIT_PATTERN.exec(normalized);
    const rows = limitMatch ? table.rows.slice(0, Number(limitMatch[1])) : table.rows;
    return structuredClone(rows);
  }

  async close(): Promise<void> {
    this.databases.clear();
  }
}
