/**
 * Database backend using Knex.js for multi-database support.
 * Supports MySQL, PostgreSQL, SQLite and SQL Server.
 */

import knexLib, { Knex } from 'knex';
const knex = knexLib.default || knexLib;
import { SchemaInspector } from 'knex-schema-inspector';
import type { Logger } from 'pino';
import type { QueryBackend } from './types.js';
import type {
  ColumnDescriptor,
  DatabaseConfig,
  DatabaseSchema,
  Row,
  TableSchema,
} from '../types.js';
import { isRecord, toRows } from '../utils.js';

const DEFAULT_PORTS: Record<string, number> = {
  mysql2: 3306,
  pg: 5432,
  mssql: 1433,
};

/**
 * The subset of knex-schema-inspector's column info this backend reads.
 */
interface InspectedColumn {
  name: string;
  data_type: string;
  default_value: unknown;
  max_length: number | null;
  is_nullable: boolean;
  is_primary_key: boolean;
  has_auto_increment: boolean;
  is_generated?: boolean;
}

/**
 * Map inspector output onto the column descriptor shape.
 */
export function toColumnDescriptor(column: InspectedColumn): ColumnDescriptor {
  const extra: string[] = [];
  if (column.has_auto_increment) extra.push('auto_increment');
  if (column.is_generated) extra.push('generated');

  const hasLength = column.max_length !== null && column.max_length > 0;

  return {
    name: column.name,
    type: hasLength ? `${column.data_type}(${column.max_length})` : column.data_type,
    nullable: column.is_nullable,
    keyRole: column.is_primary_key ? 'PRIMARY' : 'NONE',
    default:
      column.default_value === null || column.default_value === undefined
        ? undefined
        : String(column.default_value),
    extra: extra.join(' '),
  };
}

/**
 * Knex returns different result structures per dialect.
 * Order matters: check more specific structures first.
 */
export function normalizeRawResult(result: unknown): Row[] {
  if (Array.isArray(result)) {
    // MySQL: [[rows], [fields]]
    if (result.length === 2 && Array.isArray(result[0])) {
      return toRows(result[0]);
    }
    // SQLite, SQL Server: rows directly
    return toRows(result);
  }

  if (isRecord(result)) {
    // PostgreSQL: { rows: [...] }
    if (Array.isArray(result.rows)) return toRows(result.rows);
    // SQL Server (tedious): { recordset: [...] }
    if (Array.isArray(result.recordset)) return toRows(result.recordset);
  }

  return [];
}

/**
 * Escape literal `?` for clients that rewrite `?` into numbered parameters
 * (`$1`, `@p0`). Those clients turn `\?` back into `?`; the others send the
 * text as is, so it must stay untouched there.
 */
export function escapePlaceholders(client: unknown, sql: string): string {
  if (client === 'pg' || client === 'mssql') {
    return sql.replace(/\?/g, '\\?');
  }
  return sql;
}

/**
 * Build the Knex config for one database identifier, or `undefined` when the
 * configuration cannot reach that database.
 */
export function knexConfigFor(
  config: DatabaseConfig,
  databaseId: string
): Knex.Config | undefined {
  if (config.client === 'better-sqlite3') {
    // A SQLite file is a single database.
    if (databaseId !== config.defaultDatabase || !config.filename) {
      return undefined;
    }
    // better-sqlite3 ignores knex's readOnly transactions; open the file read-only instead.
    const connection = { filename: config.filename, options: { readonly: true } };
    return {
      client: 'better-sqlite3',
      connection,
      useNullAsDefault: true,
    };
  }

  return {
    client: config.client,
    connection: {
      host: config.host ?? 'localhost',
      port: config.port ?? DEFAULT_PORTS[config.client],
      user: config.user,
      password: config.password,
      database: databaseId,
    },
    pool: { min: 0, max: 10 },
  };
}

export class KnexBackend implements QueryBackend {
  readonly kind = 'knex';
  private instances: Map<string, Knex> = new Map();
  private clients: Map<string, Knex.Config['client']> = new Map();

  /**
   * @param configFor resolves a database identifier to its Knex config
   */
  constructor(
    private configFor: (databaseId: string) => Knex.Config | undefined,
    private logger: Logger
  ) {}

  static fromConfig(config: DatabaseConfig, logger: Logger): KnexBackend {
    return new KnexBackend((databaseId) => knexConfigFor(config, databaseId), logger);
  }

  /**
   * Get (or lazily create) the pooled Knex instance for a database.
   */
  private connection(databaseId: string): Knex {
    const existing = this.instances.get(databaseId);
    if (existing) {
      return existing;
    }

    const config = this.configFor(databaseId);
    if (!config) {
      throw new Error(`No connection configured for database "${databaseId}"`);
    }

    const db = knex({
      ...config,
      log: {
        warn: (message: unknown) => this.logger.warn({ databaseId, message }, 'knex warning'),
        error: (message: unknown) => this.logger.error({ databaseId, message }, 'knex error'),
        deprecate: (method: unknown, alternative: unknown) =>
          this.logger.warn({ databaseId, method, alternative }, 'knex deprecation'),
        debug: (message: unknown) => this.logger.debug({ databaseId, message }, 'knex debug'),
      },
    });
    this.instances.set(databaseId, db);
    this.clients.set(databaseId, config.client);
    this.logger.info({ databaseId, client: config.client }, 'Created database connection pool');
    return db;
  }

  /**
   * List tables and their columns over one pinned connection.
   */
  async introspect(databaseId: string): Promise<DatabaseSchema> {
    const trx = await this.connection(databaseId).transaction(null, { readOnly: true });

    try {
      const inspector = SchemaInspector(trx);
      const tableNames = [...(await inspector.tables())].sort();
      const entries: [string, TableSchema][] = [];

      for (const table of tableNames) {
        const columns: InspectedColumn[] = await inspector.columnInfo(table);
        entries.push([table, columns.map(toColumnDescriptor)]);
      }

      await trx.commit();
      return { databaseName: databaseId, tables: Object.fromEntries(entries) };
    } catch (error) {
      await this.rollbackQuietly(trx, databaseId);
      throw error;
    }
  }

  /**
   * Execute one statement in an explicit read-only transaction.
   */
  async run(databaseId: string, sql: string): Promise<Row[]> {
    const trx = await this.connection(databaseId).transaction(null, { readOnly: true });

    try {
      const result: unknown = await trx.raw(escapePlaceholders(this.clients.get(databaseId), sql));
      const rows = normalizeRawResult(result);
      await trx.commit();
      return rows;
    } catch (error) {
      await this.rollbackQuietly(trx, databaseId);
      throw error;
    }
  }

  /**
   * Roll back without masking the error that caused it.
   */
  private async rollbackQuietly(trx: Knex.Transaction, databaseId: string): Promise<void> {
    try {
      await trx.rollback();
    } catch (rollbackError) {
      this.logger.error({ databaseId, err: rollbackError }, 'Rollback failed');
    }
  }

  /**
   * Destroy every pool.
   */
  async close(): Promise<void> {
    const instances = [...this.instances.values()];
    this.instances.clear();
    this.clients.clear();
    await Promise.all(instances.map((db) => db.destroy()));
  }
}
