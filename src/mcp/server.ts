/**
 * MCP server exposing tabletalk as resources and tools.
 */

import { McpServer, ResourceTemplate } from '@modelcontextprotocol/sdk/server/mcp.js';
import type { CallToolResult, ReadResourceResult } from '@modelcontextprotocol/sdk/types.js';
import { z } from 'zod';
import type { TableTalk } from 'tabletalk';

function jsonResult(value: unknown): CallToolResult {
  return { content: [{ type: 'text', text: JSON.stringify(value, null, 2) }] };
}

function errorResult(error: unknown): CallToolResult {
  return {
    content: [{ type: 'text', text: `Error: ${error instanceof Error ? error.message : 'Unknown'}` }],
    isError: true,
  };
}

function jsonResource(uri: URL, value: unknown): ReadResourceResult {
  return {
    contents: [{ uri: uri.href, mimeType: 'application/json', text: JSON.stringify(value, null, 2) }],
  };
}

/**
 * Template variables may be repeated; the first value wins.
 */
function variable(value: string | string[] | undefined, fallback: string): string {
  const first = Array.isArray(value) ? value[0] : value;
  return first ? decodeURIComponent(first) : fallback;
}

export function createMcpServer(tt: TableTalk): McpServer {
  const server = new McpServer({
    name: 'tabletalk',
    version: '0.1.0',
  });

  // ============================================================================
  // RESOURCES
  // ============================================================================

  server.resource(
    'schema',
    new ResourceTemplate('tabletalk://{databaseId}/schema', { list: undefined }),
    { description: 'Introspected schema of a database', mimeType: 'application/json' },
    async (uri, { databaseId }) =>
      jsonResource(uri, await tt.getSchema(variable(databaseId, tt.defaultDatabase)))
  );

  server.resource(
    'tables',
    new ResourceTemplate('tabletalk://{databaseId}/tables', { list: undefined }),
    { description: 'Table names of a database', mimeType: 'application/json' },
    async (uri, { databaseId }) =>
      jsonResource(uri, await tt.listTables(variable(databaseId, tt.defaultDatabase)))
  );

  // ============================================================================
  // TOOLS
  // ============================================================================

  server.tool(
    'query_data',
    'Run a read-only single-table SELECT statement',
    {
      sql: z.string().describe('SQL SELECT statement'),
      databaseId: z.string().optional().describe('Database identifier (default: configured database)'),
      sessionId: z.string().optional().describe('Store the rows in this session for next_page'),
    },
    async ({ sql, databaseId, sessionId }) => {
      try {
        const result = await tt.runQuery(sql, { databaseId, sessionId });
        return { ...jsonResult(result), isError: !result.success };
      } catch (error) {
        return errorResult(error);
      }
    }
  );

  server.tool(
    'translate',
    'Translate a natural language question into SQL without executing it',
    {
      question: z.string().describe('Question about the data'),
      databaseId: z.string().optional().describe('Database identifier (default: configured database)'),
    },
    async ({ question, databaseId }) => {
      const translation = await tt.translate(question, { databaseId });
      return { ...jsonResult(translation), isError: translation.error !== undefined };
    }
  );

  server.tool(
    'ask',
    'Answer a natural language question: translate it, check the SQL and run it',
    {
      question: z.string().describe('Question about the data'),
      databaseId: z.string().optional().describe('Database identifier (default: configured database)'),
      sessionId: z.string().optional().describe('Store the rows in this session for next_page'),
    },
    async ({ question, databaseId, sessionId }) => {
      try {
        return jsonResult(await tt.ask(question, { databaseId, sessionId }));
      } catch (error) {
        return errorResult(error);
      }
    }
  );

  server.tool('open_session', 'Open a session that holds one result for paging', async () =>
    jsonResult(tt.openSession())
  );

  server.tool(
    'next_page',
    'Next page of the last successful result in a session',
    {
      sessionId: z.string().describe('Session from open_session'),
    },
    async ({ sessionId }) => {
      try {
        return jsonResult(await tt.nextPage(sessionId));
      } catch (error) {
        return errorResult(error);
      }
    }
  );

  return server;
}
