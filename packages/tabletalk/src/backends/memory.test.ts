import { describe, expect, it } from 'vitest';
import { loadDemoDatabase, MemoryBackend, parseMemoryDatabase } from './memory.js';
import { ExecutionFailedError, TableNotFoundError } from '../errors.js';

describe('MemoryBackend', () => {
  const backend = () => new MemoryBackend([loadDemoDatabase()]);

  it('introspects the demo database', async () => {
    const schema = await backend().introspect('test_db');

    expect(schema.databaseName).toBe('test_db');
    expect(Object.keys(schema.tables).sort()).toEqual(['products', 'users']);
    expect(schema.tables.users).toEqual([
      { name: 'id', type: 'int', nullable: false, keyRole: 'PRIMARY', extra: '' },
      { name: 'name', type: 'varchar(255)', nullable: true, keyRole: 'NONE', extra: '' },
      { name: 'age', type: 'int', nullable: true, keyRole: 'NONE', extra: '' },
    ]);
  });

  it('rejects an unknown database on introspection', async () => {
    await expect(backend().introspect('nope')).rejects.toThrow('Unknown database: nope');
  });

  it('answers SELECT * with every row', async () => {
    const rows = await backend().run('test_db', 'SELECT * FROM users;');
    expect(rows).toEqual([
      { id: 1, name: 'Alice', age: 30 },
      { id: 2, name: 'Bob', age: 25 },
      { id: 3, name: 'Charlie', age: 35 },
    ]);
  });

  it('accepts quoted table names and applies LIMIT', async () => {
    const rows = await backend().run('test_db', 'select * from `products` limit 1');
    expect(rows).toEqual([{ id: 101, product_name: 'Phone', price: 699 }]);
  });

  it('returns nothing for LIMIT 0', async () => {
    await expect(backend().run('test_db', 'SELECT * FROM users LIMIT 0')).resolves.toEqual([]);
  });

  it('returns copies of its rows', async () => {
    const memory = backend();
    const rows = await memory.run('test_db', 'SELECT * FROM users');
    rows[0].name = 'Mallory';

    const again = await memory.run('test_db', 'SELECT * FROM users');
    expect(again[0].name).toBe('Alice');
  });

  it('raises TableNotFoundError for an unknown table', async () => {
    const run = backend().run('test_db', 'SELECT * FROM orders');
    await expect(run).rejects.toBeInstanceOf(TableNotFoundError);
    await expect(run).rejects.toThrow("Table 'orders' not found.");
  });

  it.each(['constructor', '__proto__', 'tostring'])(
    'treats the inherited key %s as an unknown table',
    async (name) => {
      const run = backend().run('test_db', `SELECT * FROM ${name}`);
      await expect(run).rejects.toBeInstanceOf(TableNotFoundError);
      await expect(run).rejects.toThrow(`Table '${name}' not found.`);
    }
  );

  it('raises ExecutionFailedError for statements it cannot read', async () => {
    const run = backend().run('test_db', 'SELECT name FROM users');
    await expect(run).rejects.toBeInstanceOf(ExecutionFailedError);
    await expect(run).rejects.toThrow('Failed to parse table name from SQL.');
  });

  it('validates hand-built databases', () => {
    expect(() => parseMemoryDatabase({ databaseName: '', tables: {} })).toThrow();

    const parsed = parseMemoryDatabase({
      databaseName: 'tiny',
      tables: {
        t: {
          columns: [{ name: 'x', type: 'int', nullable: true, keyRole: 'NONE' }],
          rows: [{ x: 1 }],
        },
      },
    });
    expect(parsed.tables.t.columns[0].extra).toBe('');
  });
});
