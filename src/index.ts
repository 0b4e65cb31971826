/**
 * tabletalk HTTP server - Main Entry Point
 */

import { TableTalk } from 'tabletalk';
import { config } from './config.js';
import { createLogger, type LoggerOptions } from './utils/logger.js';
import { buildServer } from './server.js';

const log: LoggerOptions = { level: config.LOG_LEVEL, pretty: config.PRETTY_LOGS };
const logger = createLogger(log);

const tt = new TableTalk({ ...config.TABLETALK, logger });
const fastify = await buildServer(tt, { log });

for (const signal of ['SIGINT', 'SIGTERM'] as const) {
  process.once(signal, () => {
    fastify.close().then(
      () => process.exit(0),
      (err: unknown) => {
        logger.error({ err }, 'Shutdown failed');
        process.exit(1);
      }
    );
  });
}

/**
 * Start the server.
 */
const start = async () => {
  try {
    await fastify.listen({ port: config.PORT, host: config.HOST });
    logger.info(`Server running at http://localhost:${config.PORT}`);
    logger.info(`API docs at http://localhost:${config.PORT}/docs`);
  } catch (err) {
    fastify.log.error(err);
    process.exit(1);
  }
};

await start();
