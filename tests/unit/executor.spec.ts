import { describe, it, expect, vi, beforeAll, afterAll } from 'vitest';
import {
  QueryExecutor,
  countPlaceholders,
  describeColumns,
  extractRows,
  inferColumnType,
  type Connection,
} from '../../src/services/database.js';
import { QueryExecutionError } from '../../src/types/errors.js';
import { silentLogger } from '../../src/utils/logger.js';
import { createTempDatabase, type TempDatabase } from '../helpers/sqlite.js';

function fakeConnection(raw: Connection['raw']) {
  const destroy = vi.fn(async () => undefined);
  const connection: Connection = { raw, destroy };
  const factory = vi.fn(() => connection);
  return { factory, destroy };
}

describe('countPlaceholders', () => {
  it('counts positional placeholders', () => {
    expect(countPlaceholders('SELECT 1')).toBe(0);
    expect(countPlaceholders('SELECT * FROM Courses WHERE course_id = ?')).toBe(1);
    expect(countPlaceholders('WHERE a = ? AND b >= ? AND c <= ?')).toBe(3);
  });

  it('ignores question marks inside string literals', () => {
    expect(countPlaceholders("SELECT 'why?' AS q, ? AS a")).toBe(1);
  });

  it('counts an identifier binding once', () => {
    expect(countPlaceholders('SELECT ?? FROM t WHERE id = ?')).toBe(2);
  });
});

describe('extractRows', () => {
  it('reads plain row arrays', () => {
    expect(extractRows([{ x: 1 }, { x: 2 }])).toEqual([{ x: 1 }, { x: 2 }]);
  });

  it('reads recordsets', () => {
    expect(extractRows({ recordset: [{ x: 1 }] })).toEqual([{ x: 1 }]);
  });

  it('treats unknown shapes as empty', () => {
    expect(extractRows(undefined)).toEqual([]);
    expect(extractRows({ affectedRows: 1 })).toEqual([]);
  });
});

describe('describeColumns', () => {
  it('takes names from the first row and types from the first non-null value', () => {
    const rows = [
      { id: 1, score: null, seen_at: new Date(2024, 0, 1) },
      { id: 2, score: 7.5, seen_at: null },
    ];

    expect(describeColumns(rows)).toEqual([
      { name: 'id', type: 'integer' },
      { name: 'score', type: 'float' },
      { name: 'seen_at', type: 'timestamp' },
    ]);
  });

  it('reports no columns for an empty row set', () => {
    expect(describeColumns([])).toEqual([]);
  });

  it('infers boolean and string columns', () => {
    expect(inferColumnType(true)).toBe('boolean');
    expect(inferColumnType('Math')).toBe('string');
    expect(inferColumnType(10n)).toBe('integer');
    expect(inferColumnType(null)).toBe('unknown');
  });
});

describe('QueryExecutor connection lifecycle', () => {
  it('opens a single-connection instance and releases it after success', async () => {
    const { factory, destroy } = fakeConnection(async () => [{ total_users: 12 }]);
    const executor = new QueryExecutor({ client: 'mssql' }, silentLogger, factory);

    const result = await executor.execute('SELECT COUNT(*) AS total_users FROM Users');

    expect(result).toEqual({
      columns: [{ name: 'total_users', type: 'integer' }],
      rows: [{ total_users: 12 }],
    });
    expect(factory).toHaveBeenCalledWith({ client: 'mssql', pool: { min: 0, max: 1 } });
    expect(destroy).toHaveBeenCalledTimes(1);
  });

  it('keeps pool hooks while capping the pool at one connection', async () => {
    const afterCreate = vi.fn();
    const { factory } = fakeConnection(async () => []);
    const executor = new QueryExecutor(
      { client: 'mssql', pool: { min: 2, max: 10, afterCreate } },
      silentLogger,
      factory
    );

    await executor.execute('SELECT 1');

    expect(factory).toHaveBeenCalledWith({
      client: 'mssql',
      pool: { min: 0, max: 1, afterCreate },
    });
  });

  it('releases the connection and wraps the driver message on failure', async () => {
    const { factory, destroy } = fakeConnection(async () => {
      throw new Error("Login failed for user 'reporting'.");
    });
    const executor = new QueryExecutor({ client: 'mssql' }, silentLogger, factory);

    const attempt = executor.execute('SELECT 1');

    await expect(attempt).rejects.toBeInstanceOf(QueryExecutionError);
    await expect(attempt).rejects.toThrow("Login failed for user 'reporting'.");
    expect(destroy).toHaveBeenCalledTimes(1);
  });

  it('binds parameters in order', async () => {
    const raw = vi.fn(async () => []);
    const { factory } = fakeConnection(raw);
    const executor = new QueryExecutor({ client: 'mssql' }, silentLogger, factory);

    await executor.execute('SELECT * FROM t WHERE a = ? AND b = ?', ['Math', 3]);

    expect(raw).toHaveBeenCalledWith('SELECT * FROM t WHERE a = ? AND b = ?', ['Math', 3]);
  });

  it('rejects a binding count mismatch before connecting', async () => {
    const { factory } = fakeConnection(async () => []);
    const executor = new QueryExecutor({ client: 'mssql' }, silentLogger, factory);

    await expect(executor.execute('SELECT * FROM Courses WHERE course_id = ?')).rejects.toThrow(
      'Expected 1 bound values, received 0'
    );
    expect(factory).not.toHaveBeenCalled();
  });

  it('pings with SELECT 1', async () => {
    const raw = vi.fn(async () => [{ '': 1 }]);
    const { factory, destroy } = fakeConnection(raw);
    const executor = new QueryExecutor({ client: 'mssql' }, silentLogger, factory);

    await executor.ping();

    expect(raw).toHaveBeenCalledWith('SELECT 1', []);
    expect(destroy).toHaveBeenCalledTimes(1);
  });
});

describe('QueryExecutor against SQLite', () => {
  let database: TempDatabase;

  beforeAll(async () => {
    database = await createTempDatabase(async (db) => {
      await db.schema.createTable('learners', (table) => {
        table.integer('id').primary();
        table.string('name');
        table.string('cohort');
        table.float('score');
      });
      await db('learners').insert([
        { id: 1, name: 'Ada', cohort: 'A', score: 91.5 },
        { id: 2, name: 'Alan', cohort: 'B', score: 78.25 },
        { id: 3, name: 'Grace', cohort: 'A', score: null },
      ]);
    });
  });

  afterAll(() => {
    database.cleanup();
  });

  it('returns rows and column metadata for a bound query', async () => {
    const executor = new QueryExecutor(database.config, silentLogger);

    const result = await executor.execute(
      'SELECT name, cohort, score FROM learners WHERE cohort = ? ORDER BY id',
      ['A']
    );

    expect(result.rows).toEqual([
      { name: 'Ada', cohort: 'A', score: 91.5 },
      { name: 'Grace', cohort: 'A', score: null },
    ]);
    expect(result.columns).toEqual([
      { name: 'name', type: 'string' },
      { name: 'cohort', type: 'string' },
      { name: 'score', type: 'float' },
    ]);
  });

  it('returns no columns for an empty result', async () => {
    const executor = new QueryExecutor(database.config, silentLogger);

    const result = await executor.execute('SELECT name FROM learners WHERE cohort = ?', ['Z']);

    expect(result).toEqual({ columns: [], rows: [] });
  });

  it('surfaces SQL errors as QueryExecutionError', async () => {
    const executor = new QueryExecutor(database.config, silentLogger);

    const attempt = executor.execute('SELECT * FROM missing_table');

    await expect(attempt).rejects.toBeInstanceOf(QueryExecutionError);
    await expect(attempt).rejects.toThrow('no such table: missing_table');
  });

  it('surfaces connection failures as QueryExecutionError', async () => {
    const executor = new QueryExecutor(
      {
        client: 'better-sqlite3',
        connection: { filename: '/nonexistent-lms-reports-dir/lms.db' },
        useNullAsDefault: true,
      },
      silentLogger
    );

    await expect(executor.ping()).rejects.toBeInstanceOf(QueryExecutionError);
  });
});
