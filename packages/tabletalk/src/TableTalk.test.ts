import { describe, expect, it } from 'vitest';
import { TableTalk } from './TableTalk.js';
import { ConfigurationError, SchemaUnavailableError, SessionNotFoundError } from './errors.js';
import type { CompletionClient, CompletionRequest } from './llm.js';
import type { TableTalkConfig } from './types.js';

/**
 * Answers every question with the same statement.
 */
class FixedCompletion implements CompletionClient {
  requests: CompletionRequest[] = [];

  constructor(private readonly response: object) {}

  async complete(request: CompletionRequest): Promise<string> {
    this.requests.push(request);
    return JSON.stringify(this.response);
  }
}

const CONFIG: TableTalkConfig = {
  database: { backend: 'memory', client: 'pg', defaultDatabase: 'test_db' },
  llm: { provider: 'anthropic', model: 'claude-test', apiKey: 'test-secret' },
  pagination: { pageSize: 2 },
};

function create(response: object = { sql: 'SELECT * FROM users', confidence: 90, tablesUsed: ['users'] }) {
  const completion = new FixedCompletion(response);
  return { completion, tt: new TableTalk(CONFIG, { completion }) };
}

describe('TableTalk', () => {
  it('lists tables of the default database', async () => {
    const { tt } = create();
    expect(await tt.listTables()).toEqual(['products', 'users']);
    expect(tt.defaultDatabase).toBe('test_db');
  });

  it('throws SchemaUnavailableError for an unknown database', async () => {
    const { tt } = create();
    const schema = tt.getSchema('nope');

    await expect(schema).rejects.toBeInstanceOf(SchemaUnavailableError);
    await expect(schema).rejects.toThrow('Schema unavailable for "nope": Unknown database: nope');
  });

  it('runs direct SQL through the safety gate', async () => {
    const { tt } = create();

    expect(await tt.runQuery('SELECT * FROM users')).toMatchObject({ success: true, rowCount: 3 });
    expect(await tt.runQuery('UPDATE users SET age = 1')).toMatchObject({
      success: false,
      errorCode: 'UNSAFE_QUERY',
    });
  });

  it('pages through a stored result', async () => {
    const { tt } = create();
    const { sessionId, pageSize } = tt.openSession();
    expect(pageSize).toBe(2);

    await tt.runQuery('SELECT * FROM users', { sessionId });

    expect(await tt.nextPage(sessionId)).toEqual({
      done: false,
      rows: [
        { id: 1, name: 'Alice', age: 30 },
        { id: 2, name: 'Bob', age: 25 },
      ],
      page: 1,
    });
    expect(await tt.nextPage(sessionId)).toEqual({
      done: false,
      rows: [{ id: 3, name: 'Charlie', age: 35 }],
      page: 2,
    });
    expect(await tt.nextPage(sessionId)).toEqual({ done: true, page: 2 });
  });

  it('keeps the stored result when a later query fails', async () => {
    const { tt } = create();
    const { sessionId } = tt.openSession();

    await tt.runQuery('SELECT * FROM products', { sessionId });
    const failed = await tt.runQuery('SELECT * FROM orders', { sessionId });

    expect(failed).toMatchObject({ success: false, errorCode: 'TABLE_NOT_FOUND' });
    expect(await tt.nextPage(sessionId)).toMatchObject({ done: false, page: 1 });
  });

  it('keeps sessions apart', async () => {
    const { tt } = create();
    const a = tt.openSession().sessionId;
    const b = tt.openSession().sessionId;

    await tt.runQuery('SELECT * FROM users', { sessionId: a });

    expect(await tt.nextPage(b)).toEqual({ done: true, page: 0 });
    expect(await tt.nextPage(a)).toMatchObject({ done: false, page: 1 });
  });

  it('answers a question end to end', async () => {
    const { tt, completion } = create({ sql: 'SELECT * FROM products', confidence: 88, tablesUsed: ['products'] });
    const { sessionId } = tt.openSession();

    const answer = await tt.ask('list all products', { sessionId });

    expect(answer.question).toBe('list all products');
    expect(answer.translation).toEqual({
      sql: 'SELECT * FROM products;',
      confidence: 88,
      tablesUsed: ['products'],
    });
    expect(answer.result).toMatchObject({ success: true, rowCount: 2 });
    expect(await tt.nextPage(sessionId)).toMatchObject({ done: false, page: 1 });
    // The bundled demo tables are prompted as MySQL whatever the client
    expect(completion.requests[0].system).toContain('for mysql databases');
  });

  it('does not execute when translation reports an error', async () => {
    const { tt } = create({ sql: '', confidence: 0, tablesUsed: [], error: 'No such data' });
    const { sessionId } = tt.openSession();
    await tt.runQuery('SELECT * FROM users', { sessionId });

    const answer = await tt.ask('list invoices', { sessionId });

    expect(answer.result).toBeNull();
    expect(answer.translation.error).toBe('No such data');
    expect(await tt.nextPage(sessionId)).toMatchObject({ rows: [{ name: 'Alice' }, { name: 'Bob' }] });
  });

  it('gates generated SQL like hand-written SQL', async () => {
    const { tt } = create({ sql: 'DELETE FROM users', confidence: 99, tablesUsed: ['users'] });
    const answer = await tt.ask('remove everyone');

    expect(answer.result).toMatchObject({ success: false, errorCode: 'UNSAFE_QUERY' });
    expect(await tt.runQuery('SELECT * FROM users')).toMatchObject({ rowCount: 3 });
  });

  it('reports schema failures inside the translation', async () => {
    const { tt, completion } = create();
    const translation = await tt.translate('list users', { databaseId: 'nope' });

    expect(translation).toEqual({
      sql: '',
      confidence: 0,
      tablesUsed: [],
      error: 'Schema unavailable for "nope": Unknown database: nope',
    });
    expect(completion.requests).toHaveLength(0);
  });

  it('rejects unknown sessions', async () => {
    const { tt } = create();

    await expect(tt.nextPage('missing')).rejects.toBeInstanceOf(SessionNotFoundError);
    await expect(tt.runQuery('SELECT * FROM users', { sessionId: 'missing' })).rejects.toThrow(
      'Session not found: missing'
    );
    await expect(tt.ask('q', { sessionId: 'missing' })).rejects.toBeInstanceOf(SessionNotFoundError);
  });

  it('closes sessions', async () => {
    const { tt } = create();
    const { sessionId } = tt.openSession();

    expect(tt.getStats().sessions).toBe(1);
    expect(tt.closeSession(sessionId)).toBe(true);
    expect(tt.getStats().sessions).toBe(0);
    await expect(tt.nextPage(sessionId)).rejects.toBeInstanceOf(SessionNotFoundError);
  });

  it('serves the schema from cache until invalidated', async () => {
    const { tt } = create();

    await tt.getSchema();
    await tt.listTables();
    expect(tt.getStats().schema).toEqual({ cachedDatabases: 1, hits: 1, misses: 1 });

    expect(tt.invalidateSchema()).toBe(true);
    await tt.getSchema();
    expect(tt.getStats().schema).toEqual({ cachedDatabases: 1, hits: 1, misses: 2 });
  });

  it('builds from environment variables', async () => {
    const completion = new FixedCompletion({ sql: 'SELECT 1', confidence: 1, tablesUsed: [] });
    const tt = TableTalk.fromEnv(
      { DB_BACKEND: 'memory', DB_NAME: 'test_db', ANTHROPIC_API_KEY: 'test-secret', PAGE_SIZE: '3' },
      { completion }
    );

    expect(tt.openSession().pageSize).toBe(3);
    expect(await tt.listTables()).toEqual(['products', 'users']);
    expect(() => TableTalk.fromEnv({ DB_BACKEND: 'memory' })).toThrow(ConfigurationError);
  });
});
