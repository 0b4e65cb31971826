/**
 * Fastify application: CORS, Swagger docs and the tabletalk routes.
 */

import Fastify, { type FastifyInstance } from 'fastify';
import cors from '@fastify/cors';
import swagger from '@fastify/swagger';
import swaggerUi from '@fastify/swagger-ui';
import type { TableTalk } from 'tabletalk';
import tableTalkPlugin, { errorBody, statusForError } from 'fastify-tabletalk';
import { loggerConfig, type LoggerOptions } from './utils/logger.js';

export interface ServerOptions {
  /**
   * `false` disables request logging
   */
  log: LoggerOptions | false;
  /**
   * Serve Swagger UI at /docs
   * @default true
   */
  docs?: boolean;
}

export async function buildServer(tt: TableTalk, options: ServerOptions): Promise<FastifyInstance> {
  const { log, docs = true } = options;
  const fastify = Fastify({
    logger: log ? loggerConfig(log) : false,
  });

  await fastify.register(cors, {
    origin: '*',
  });

  if (docs) {
    await fastify.register(swagger, {
      openapi: {
        info: {
          title: 'tabletalk API',
          description: 'Ask a relational database questions in plain language (read-only)',
          version: '0.1.0',
        },
      },
    });

    await fastify.register(swaggerUi, {
      routePrefix: '/docs',
    });
  }

  await fastify.register(tableTalkPlugin, { tableTalk: tt, swagger: docs });

  fastify.get('/health', async () => ({ status: 'ok', ...tt.getStats() }));

  /**
   * Errors outside the tabletalk routes.
   */
  fastify.setErrorHandler((error, request, reply) => {
    const status = error.validation ? 400 : error.statusCode ?? statusForError(error);
    if (status >= 500) {
      request.log.error({ err: error }, 'request failed');
    }
    reply.status(status).send(errorBody(error));
  });

  fastify.addHook('onClose', async () => {
    fastify.log.info('Shutting down tabletalk API server...');
    await tt.close();
  });

  return fastify;
}
