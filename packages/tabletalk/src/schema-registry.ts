/**
 * Schema registry: introspects and caches table/column metadata per database.
 */

import type { Logger } from 'pino';
import type { QueryBackend } from './backends/types.js';
import type { DatabaseSchema } from './types.js';
import { SchemaUnavailableError } from './errors.js';
import { errorMessage } from './utils.js';

interface CacheEntry {
  schema: DatabaseSchema;
  fetchedAt: number;
}

export interface SchemaRegistryOptions {
  logger: Logger;

  /**
   * Age after which an entry is introspected again; 0 never expires
   * @default 0
   */
  ttlMs?: number;

  /**
   * Time source, replaceable in tests
   */
  now?: () => number;
}

export interface SchemaRegistryStats {
  cachedDatabases: number;
  hits: number;
  misses: number;
}

/**
 * Cache keyed by database identifier.
 *
 * Reads are lock-free. Concurrent misses for one key share a single in-flight
 * introspection, and a failed introspection never populates the cache.
 */
export class SchemaRegistry {
  private cache: Map<string, CacheEntry> = new Map();
  private inflight: Map<string, Promise<DatabaseSchema>> = new Map();
  private hits = 0;
  private misses = 0;
  private readonly ttlMs: number;
  private readonly now: () => number;
  private readonly logger: Logger;

  constructor(private backend: QueryBackend, options: SchemaRegistryOptions) {
    this.ttlMs = options.ttlMs ?? 0;
    this.now = options.now ?? Date.now;
    this.logger = options.logger;
  }

  /**
   * Cached schema, or a fresh introspection on a miss.
   * @throws SchemaUnavailableError
   */
  async getSchema(databaseId: string): Promise<DatabaseSchema> {
    const entry = this.cache.get(databaseId);
    if (entry && !this.isExpired(entry)) {
      this.hits += 1;
      return entry.schema;
    }

    const pending = this.inflight.get(databaseId);
    if (pending) {
      return pending;
    }

    this.misses += 1;
    const fill: Promise<DatabaseSchema> = this.backend
      .introspect(databaseId)
      .then(
        (schema) => {
          // An invalidate() during the fill discards its result.
          if (this.inflight.get(databaseId) === fill) {
            this.cache.set(databaseId, { schema, fetchedAt: this.now() });
            this.logger.info(
              { databaseId, tables: Object.keys(schema.tables).length },
              'Cached schema'
            );
          }
          return schema;
        },
        (error: unknown) => {
          this.logger.error({ databaseId, err: error }, 'Schema introspection failed');
          if (error instanceof SchemaUnavailableError) {
            throw error;
          }
          throw new SchemaUnavailableError(
            databaseId,
            `Schema unavailable for "${databaseId}": ${errorMessage(error)}`
          );
        }
      )
      .finally(() => {
        if (this.inflight.get(databaseId) === fill) {
          this.inflight.delete(databaseId);
        }
      });

    this.inflight.set(databaseId, fill);
    return fill;
  }

  /**
   * Table names of a database, sorted.
   * @throws SchemaUnavailableError
   */
  async listTables(databaseId: string): Promise<string[]> {
    const schema = await this.getSchema(databaseId);
    return Object.keys(schema.tables).sort();
  }

  /**
   * Drop a cached schema so the next request introspects again.
   */
  invalidate(databaseId: string): boolean {
    this.inflight.delete(databaseId);
    const deleted = this.cache.delete(databaseId);
    if (deleted) {
      this.logger.info({ databaseId }, 'Invalidated schema');
    }
    return deleted;
  }

  has(databaseId: string): boolean {
    const entry = this.cache.get(databaseId);
    return entry !== undefined && !this.isExpired(entry);
  }

  getStats(): SchemaRegistryStats {
    return {
      cachedDatabases: this.cache.size,
      hits: this.hits,
      misses: this.misses,
    };
  }

  private isExpired(entry: CacheEntry): boolean {
    return this.ttlMs > 0 && this.now() - entry.fetchedAt >= this.ttlMs;
  }
}
