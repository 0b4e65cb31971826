/**
 * Query execution behind the safety gate.
 */

import type { Logger } from 'pino';
import type { QueryBackend } from './backends/types.js';
import type { QueryFailure, QueryRequest, QueryResult } from './types.js';
import type { SafetyValidator } from './safety.js';
import { TableTalkError, UnsafeQueryError } from './errors.js';
import { errorMessage } from './utils.js';

export class QueryExecutor {
  constructor(
    private backend: QueryBackend,
    private validator: SafetyValidator,
    private defaultDatabase: string,
    private logger: Logger
  ) {}

  /**
   * Validate, then run in a read-only transaction.
   * Never throws: every failure comes back as `success: false`.
   */
  async execute(request: QueryRequest): Promise<QueryResult> {
    const databaseId = request.databaseId ?? this.defaultDatabase;
    const startTime = Date.now();

    const verdict = this.validator.classify(request.rawSql);
    if (!verdict.safe) {
      this.logger.warn(
        { databaseId, origin: request.origin, reason: verdict.reason },
        'Rejected unsafe query'
      );
      return failure(new UnsafeQueryError(verdict.reason));
    }

    try {
      const rows = await this.backend.run(databaseId, request.rawSql);
      this.logger.info(
        {
          databaseId,
          origin: request.origin,
          rowCount: rows.length,
          latency: Date.now() - startTime,
        },
        'Query executed'
      );
      return { success: true, rows, rowCount: rows.length };
    } catch (error) {
      this.logger.warn(
        { databaseId, origin: request.origin, err: error },
        'Query execution failed'
      );
      return failure(error);
    }
  }
}

/**
 * Build the failure shape; a taxonomy error keeps its code.
 */
function failure(error: unknown): QueryFailure {
  const message = errorMessage(error) || 'Query failed';
  return {
    success: false,
    rows: [],
    rowCount: 0,
    error: message,
    errorCode: error instanceof TableTalkError ? error.code : 'EXECUTION_FAILED',
  };
}
