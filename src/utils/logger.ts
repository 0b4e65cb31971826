/**
 * Logging configuration using Pino.
 */

import pino, { type Logger, type TransportSingleOptions } from 'pino';

export interface LoggerOptions {
  level: string;
  pretty: boolean;
  /**
   * Write to stderr; required when stdout carries a protocol
   */
  stderr?: boolean;
}

/**
 * Pino options, shared by the Fastify logger and standalone loggers.
 */
export function loggerConfig(options: LoggerOptions): { level: string; transport?: TransportSingleOptions } {
  if (!options.pretty) {
    return { level: options.level };
  }
  return {
    level: options.level,
    transport: {
      target: 'pino-pretty',
      options: {
        colorize: true,
        translateTime: 'SYS:standard',
        ignore: 'pid,hostname',
        destination: options.stderr ? 2 : 1,
      },
    },
  };
}

export function createLogger(options: LoggerOptions): Logger {
  const config = loggerConfig(options);
  if (config.transport) {
    return pino(config);
  }
  return pino(config, pino.destination(options.stderr ? 2 : 1));
}
