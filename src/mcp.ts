/**
 * tabletalk MCP server over stdio.
 * stdout carries the protocol, so every log line goes to stderr.
 */

import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { TableTalk } from 'tabletalk';
import { config } from './config.js';
import { createLogger } from './utils/logger.js';
import { createMcpServer } from './mcp/server.js';

const logger = createLogger({ level: config.LOG_LEVEL, pretty: config.PRETTY_LOGS, stderr: true });

const tt = new TableTalk({ ...config.TABLETALK, logger });
const server = createMcpServer(tt);

async function shutdown(code: number): Promise<void> {
  await server.close();
  await tt.close();
  process.exit(code);
}

async function main(): Promise<void> {
  const transport = new StdioServerTransport();
  await server.connect(transport);
  logger.info({ database: tt.defaultDatabase }, 'tabletalk MCP server running on stdio');
}

main().catch((error: unknown) => {
  logger.fatal({ err: error }, 'Fatal error');
  process.exit(1);
});

for (const signal of ['SIGINT', 'SIGTERM'] as const) {
  process.once(signal, () => {
    shutdown(0).catch((error: unknown) => {
      logger.error({ err: error }, 'Shutdown failed');
      process.exit(1);
    });
  });
}
