import { mkdtempSync, rmSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import pino from 'pino';
import { escapePlaceholders, KnexBackend, knexConfigFor, normalizeRawResult, toColumnDescriptor } from './knex.js';
import type { DatabaseConfig } from '../types.js';

const inspector = vi.hoisted(() => ({
  tables: vi.fn(),
  columnInfo: vi.fn(),
}));

vi.mock('knex-schema-inspector', () => ({
  SchemaInspector: () => inspector,
}));

const logger = pino({ level: 'silent' });

function column(overrides: Partial<Parameters<typeof toColumnDescriptor>[0]>) {
  return {
    name: 'id',
    data_type: 'integer',
    default_value: null,
    max_length: null,
    is_nullable: false,
    is_primary_key: false,
    has_auto_increment: false,
    ...overrides,
  };
}

describe('toColumnDescriptor', () => {
  it('maps a primary key with auto increment', () => {
    expect(
      toColumnDescriptor(column({ is_primary_key: true, has_auto_increment: true }))
    ).toEqual({
      name: 'id',
      type: 'integer',
      nullable: false,
      keyRole: 'PRIMARY',
      default: undefined,
      extra: 'auto_increment',
    });
  });

  it('appends the length and stringifies defaults', () => {
    expect(
      toColumnDescriptor(
        column({
          name: 'status',
          data_type: 'varchar',
          max_length: 32,
          is_nullable: true,
          default_value: 'active',
          is_generated: true,
        })
      )
    ).toEqual({
      name: 'status',
      type: 'varchar(32)',
      nullable: true,
      keyRole: 'NONE',
      default: 'active',
      extra: 'generated',
    });
    expect(toColumnDescriptor(column({ default_value: 0 })).default).toBe('0');
  });
});

describe('normalizeRawResult', () => {
  const rows = [{ id: 1 }, { id: 2 }];

  it.each([
    ['mysql', [rows, [{ name: 'id' }]]],
    ['sqlite', rows],
    ['postgres', { rows, rowCount: 2 }],
    ['mssql', { recordset: rows }],
  ])('reads %s results', (_dialect, raw) => {
    expect(normalizeRawResult(raw)).toEqual(rows);
  });

  it('returns no rows for write results', () => {
    expect(normalizeRawResult({ changes: 1, lastInsertRowid: 3 })).toEqual([]);
    expect(normalizeRawResult(undefined)).toEqual([]);
  });
});

describe('escapePlaceholders', () => {
  const sql = "SELECT * FROM faq WHERE question = 'why?'";

  it.each(['pg', 'mssql'])('escapes question marks for %s', (client) => {
    expect(escapePlaceholders(client, sql)).toBe("SELECT * FROM faq WHERE question = 'why\\?'");
  });

  it.each(['mysql2', 'better-sqlite3'])('leaves %s statements untouched', (client) => {
    expect(escapePlaceholders(client, sql)).toBe(sql);
  });
});

describe('knexConfigFor', () => {
  const base: DatabaseConfig = {
    backend: 'knex',
    client: 'mysql2',
    user: 'reader',
    password: 'test-secret',
    defaultDatabase: 'shop',
  };

  it('targets the requested database on a server', () => {
    expect(knexConfigFor(base, 'archive')).toEqual({
      client: 'mysql2',
      connection: {
        host: 'localhost',
        port: 3306,
        user: 'reader',
        password: 'test-secret',
        database: 'archive',
      },
      pool: { min: 0, max: 10 },
    });
  });

  it('uses the dialect default port unless one is given', () => {
    expect(knexConfigFor({ ...base, client: 'pg' }, 'shop')).toMatchObject({
      connection: { port: 5432 },
    });
    expect(knexConfigFor({ ...base, client: 'pg', port: 6543 }, 'shop')).toMatchObject({
      connection: { port: 6543 },
    });
  });

  it('maps only the default database to a SQLite file', () => {
    const sqlite: DatabaseConfig = { ...base, client: 'better-sqlite3', filename: './app.sqlite' };

    expect(knexConfigFor(sqlite, 'shop')).toEqual({
      client: 'better-sqlite3',
      connection: { filename: './app.sqlite', options: { readonly: true } },
      useNullAsDefault: true,
    });
    expect(knexConfigFor(sqlite, 'archive')).toBeUndefined();
  });
});

describe('KnexBackend (better-sqlite3)', () => {
  let backend: KnexBackend;

  beforeEach(async () => {
    backend = new KnexBackend(
      (databaseId) =>
        databaseId === 'main'
          ? {
              client: 'better-sqlite3',
              connection: { filename: ':memory:' },
              useNullAsDefault: true,
              pool: { min: 1, max: 1 },
            }
          : undefined,
      logger
    );
    await backend.run('main', 'CREATE TABLE users (id INTEGER PRIMARY KEY, name TEXT NOT NULL)');
    await backend.run('main', "INSERT INTO users (id, name) VALUES (1, 'Alice'), (2, 'Bob')");
    inspector.tables.mockReset();
    inspector.columnInfo.mockReset();
  });

  afterEach(async () => {
    await backend.close();
  });

  it('returns rows of a SELECT', async () => {
    await expect(backend.run('main', 'SELECT id, name FROM users ORDER BY id')).resolves.toEqual([
      { id: 1, name: 'Alice' },
      { id: 2, name: 'Bob' },
    ]);
  });

  it('keeps literal question marks intact', async () => {
    await backend.run('main', "INSERT INTO users (id, name) VALUES (3, 'who?')");
    await expect(
      backend.run('main', "SELECT id FROM users WHERE name = 'who?'")
    ).resolves.toEqual([{ id: 3 }]);
  });

  it('surfaces database errors', async () => {
    await expect(backend.run('main', 'SELECT nope FROM users')).rejects.toThrow('no such column');
  });

  it('rolls back a failing statement and frees the connection', async () => {
    await expect(
      backend.run(
        'main',
        "INSERT INTO users (id, name) SELECT id + 10, name FROM users UNION ALL SELECT 1, 'Dup'"
      )
    ).rejects.toThrow();

    // With a single pooled connection, a leaked transaction would block this read.
    await expect(backend.run('main', 'SELECT COUNT(*) AS n FROM users')).resolves.toEqual([{ n: 2 }]);
  });

  it('refuses databases it has no connection for', async () => {
    await expect(backend.run('other', 'SELECT 1')).rejects.toThrow(
      'No connection configured for database "other"'
    );
  });

  it('introspects sorted tables with their columns', async () => {
    inspector.tables.mockResolvedValue(['users', 'accounts']);
    inspector.columnInfo.mockImplementation(async (table: string) =>
      table === 'users'
        ? [column({ is_primary_key: true }), column({ name: 'name', data_type: 'text' })]
        : [column({ name: 'iban', data_type: 'varchar', max_length: 34, is_nullable: true })]
    );

    const schema = await backend.introspect('main');

    expect(schema.databaseName).toBe('main');
    expect(Object.keys(schema.tables)).toEqual(['accounts', 'users']);
    expect(schema.tables.accounts).toEqual([
      { name: 'iban', type: 'varchar(34)', nullable: true, keyRole: 'NONE', default: undefined, extra: '' },
    ]);
    expect(schema.tables.users.map((c) => c.keyRole)).toEqual(['PRIMARY', 'NONE']);
  });

  it('keeps a table named __proto__ as an own key', async () => {
    inspector.tables.mockResolvedValue(['users', '__proto__']);
    inspector.columnInfo.mockResolvedValue([column({ is_primary_key: true })]);

    const schema = await backend.introspect('main');

    expect(Object.keys(schema.tables)).toEqual(['__proto__', 'users']);
    expect(Object.hasOwn(schema.tables, '__proto__')).toBe(true);
    expect(Object.getPrototypeOf(schema.tables)).toBe(Object.prototype);
  });

  it('releases the connection when introspection fails', async () => {
    inspector.tables.mockRejectedValue(new Error('permission denied for information_schema'));

    await expect(backend.introspect('main')).rejects.toThrow('permission denied for information_schema');
    await expect(backend.run('main', 'SELECT COUNT(*) AS n FROM users')).resolves.toEqual([{ n: 2 }]);
  });
});

describe('KnexBackend (SQLite file)', () => {
  let dir: string;
  let filename: string;

  beforeEach(async () => {
    dir = mkdtempSync(join(tmpdir(), 'tabletalk-'));
    filename = join(dir, 'shop.sqlite');

    const writer = new KnexBackend(
      () => ({ client: 'better-sqlite3', connection: { filename }, useNullAsDefault: true }),
      logger
    );
    await writer.run('shop', 'CREATE TABLE users (id INTEGER PRIMARY KEY, name TEXT NOT NULL)');
    await writer.run('shop', "INSERT INTO users (id, name) VALUES (1, 'Alice')");
    await writer.close();
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('opens the configured file read-only', async () => {
    const backend = KnexBackend.fromConfig(
      { backend: 'knex', client: 'better-sqlite3', filename, defaultDatabase: 'shop' },
      logger
    );

    try {
      await expect(backend.run('shop', 'SELECT id, name FROM users')).resolves.toEqual([
        { id: 1, name: 'Alice' },
      ]);
      await expect(
        backend.run('shop', "INSERT INTO users (id, name) VALUES (2, 'Bob')")
      ).rejects.toThrow('readonly database');
      await expect(backend.run('shop', 'SELECT COUNT(*) AS n FROM users')).resolves.toEqual([{ n: 1 }]);
    } finally {
      await backend.close();
    }
  });
});
