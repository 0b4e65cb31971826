/**
 * fastify-tabletalk - Fastify plugin for tabletalk
 * Adds natural language database question endpoints to your Fastify app
 */

import type { FastifyError, FastifyInstance, FastifyPluginAsync } from 'fastify';
import fp from 'fastify-plugin';
// Route schema fields such as `tags` and `hide`
import type {} from '@fastify/swagger';
import { TableTalk, TableTalkError, type ErrorCode, type TableTalkConfig } from 'tabletalk';

export interface TableTalkPluginOptions {
  /**
   * Existing instance to expose. Its lifecycle stays with the caller.
   */
  tableTalk?: TableTalk;

  /**
   * Used to build an instance when `tableTalk` is absent; closed with the server.
   */
  config?: TableTalkConfig;

  /**
   * Route prefix for tabletalk endpoints
   * @default "/tabletalk"
   */
  prefix?: string;

  /**
   * List the routes in Swagger documentation
   * @default true
   */
  swagger?: boolean;
}

interface DatabaseQuery {
  databaseId?: string;
}

interface QueryBody {
  sql: string;
  databaseId?: string;
  sessionId?: string;
}

interface QuestionBody {
  question: string;
  databaseId?: string;
  sessionId?: string;
}

const STATUS_BY_CODE: Record<ErrorCode, number> = {
  SCHEMA_UNAVAILABLE: 503,
  UNSAFE_QUERY: 400,
  TABLE_NOT_FOUND: 404,
  EXECUTION_FAILED: 500,
  TRANSLATION_FAILED: 422,
  LLM_ERROR: 502,
  SESSION_NOT_FOUND: 404,
  CONFIGURATION_ERROR: 500,
};

/**
 * HTTP status for an error thrown by a tabletalk operation.
 */
export function statusForError(error: unknown): number {
  if (error instanceof TableTalkError) {
    return STATUS_BY_CODE[error.code];
  }
  return 500;
}

/**
 * JSON body for an error response.
 */
export function errorBody(error: Error): { error: string; code?: ErrorCode; message: string; suggestions?: string[] } {
  if (error instanceof TableTalkError) {
    return {
      error: error.name,
      code: error.code,
      message: error.message,
      suggestions: error.suggestions,
    };
  }
  return { error: error.name, message: error.message || 'An unexpected error occurred' };
}

const databaseQuerystring = {
  type: 'object',
  properties: {
    databaseId: { type: 'string', description: 'Database identifier (default: configured database)' },
  },
};

const sessionParams = {
  type: 'object',
  required: ['id'],
  properties: { id: { type: 'string' } },
};

async function routes(scope: FastifyInstance, tt: TableTalk, hide: boolean): Promise<void> {
  scope.setErrorHandler((error: FastifyError, request, reply) => {
    // Schema validation failures carry their own status
    const status = error.validation ? 400 : statusForError(error);
    if (status >= 500) {
      request.log.error({ err: error }, 'tabletalk request failed');
    }
    reply.status(status).send(errorBody(error));
  });

  // GET /schema - Introspected schema of a database
  scope.get<{ Querystring: DatabaseQuery }>(
    '/schema',
    {
      schema: {
        description: 'Get the introspected schema of a database',
        tags: ['tabletalk'],
        hide,
        querystring: databaseQuerystring,
      },
    },
    async (request) => tt.getSchema(request.query.databaseId)
  );

  // GET /tables - Table names
  scope.get<{ Querystring: DatabaseQuery }>(
    '/tables',
    {
      schema: {
        description: 'List the tables of a database',
        tags: ['tabletalk'],
        hide,
        querystring: databaseQuerystring,
      },
    },
    async (request) => {
      const tables = await tt.listTables(request.query.databaseId);
      return { tables, total: tables.length };
    }
  );

  // DELETE /schema - Drop the cached schema
  scope.delete<{ Querystring: DatabaseQuery }>(
    '/schema',
    {
      schema: {
        description: 'Invalidate the cached schema so the next request introspects again',
        tags: ['tabletalk'],
        hide,
        querystring: databaseQuerystring,
      },
    },
    async (request) => ({ invalidated: tt.invalidateSchema(request.query.databaseId) })
  );

  // POST /query - Run SQL through the safety gate
  scope.post<{ Body: QueryBody }>(
    '/query',
    {
      schema: {
        description: 'Run a SELECT statement. Rejections come back as success: false with an errorCode.',
        tags: ['tabletalk'],
        hide,
        body: {
          type: 'object',
          required: ['sql'],
          properties: {
            sql: { type: 'string', examples: ['SELECT * FROM users;'] },
            databaseId: { type: 'string' },
            sessionId: { type: 'string', description: 'Store the rows for paging' },
          },
        },
      },
    },
    async (request) => {
      const { sql, databaseId, sessionId } = request.body;
      return tt.runQuery(sql, { databaseId, sessionId });
    }
  );

  // POST /translate - Question to SQL, not executed
  scope.post<{ Body: QuestionBody }>(
    '/translate',
    {
      schema: {
        description: 'Translate a question into SQL without executing it',
        tags: ['tabletalk'],
        hide,
        body: {
          type: 'object',
          required: ['question'],
          properties: {
            question: { type: 'string', examples: ['list all users'] },
            databaseId: { type: 'string' },
          },
        },
      },
    },
    async (request) => tt.translate(request.body.question, { databaseId: request.body.databaseId })
  );

  // POST /ask - Full pipeline
  scope.post<{ Body: QuestionBody }>(
    '/ask',
    {
      schema: {
        description: 'Translate a question, validate the SQL and execute it',
        tags: ['tabletalk'],
        hide,
        body: {
          type: 'object',
          required: ['question'],
          properties: {
            question: { type: 'string', examples: ['list all users'] },
            databaseId: { type: 'string' },
            sessionId: { type: 'string', description: 'Store the rows for paging' },
          },
        },
      },
    },
    async (request) => {
      const { question, databaseId, sessionId } = request.body;
      return tt.ask(question, { databaseId, sessionId });
    }
  );

  // POST /sessions - Open a paging session
  scope.post(
    '/sessions',
    {
      schema: {
        description: 'Open a session holding one result for paging',
        tags: ['tabletalk'],
        hide,
      },
    },
    async (_request, reply) => {
      reply.code(201);
      return tt.openSession();
    }
  );

  // GET /sessions/:id/next - Next page
  scope.get<{ Params: { id: string } }>(
    '/sessions/:id/next',
    {
      schema: {
        description: 'Next page of the last successful result in a session',
        tags: ['tabletalk'],
        hide,
        params: sessionParams,
      },
    },
    async (request) => tt.nextPage(request.params.id)
  );

  // DELETE /sessions/:id - Close a session
  scope.delete<{ Params: { id: string } }>(
    '/sessions/:id',
    {
      schema: {
        description: 'Close a session',
        tags: ['tabletalk'],
        hide,
        params: sessionParams,
      },
    },
    async (request, reply) => {
      if (!tt.closeSession(request.params.id)) {
        reply.code(404);
        return { error: 'SessionNotFoundError', code: 'SESSION_NOT_FOUND', message: `Session not found: ${request.params.id}` };
      }
      return { message: 'Session closed' };
    }
  );
}

const tableTalkPlugin: FastifyPluginAsync<TableTalkPluginOptions> = async (fastify, options) => {
  const { prefix = '/tabletalk', swagger = true, tableTalk, config } = options;

  let tt: TableTalk;
  if (tableTalk) {
    tt = tableTalk;
  } else if (config) {
    tt = new TableTalk(config);
    // Add lifecycle hook to close tabletalk on shutdown
    fastify.addHook('onClose', async () => {
      await tt.close();
    });
  } else {
    throw new Error('fastify-tabletalk requires either a tableTalk instance or a config');
  }

  // Decorate Fastify instance with tabletalk
  fastify.decorate('tableTalk', tt);

  await fastify.register(async (scope) => routes(scope, tt, !swagger), { prefix });
};

// Export as Fastify plugin
export default fp(tableTalkPlugin, {
  fastify: '4.x',
  name: 'fastify-tabletalk',
});

// Type augmentation for TypeScript
declare module 'fastify' {
  interface FastifyInstance {
    tableTalk: TableTalk;
  }
}
