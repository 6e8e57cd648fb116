/**
 * Query executor using Knex.js.
 *
 * Every call opens its own connection and releases it before returning,
 * whether the statement succeeded or not. Nothing is pooled across calls.
 */

import knex, { type Knex } from 'knex';
import type { Logger } from 'pino';
import type { ColumnMeta, ColumnType, QueryRunner, RawResult } from '../types/models.js';
import { QueryExecutionError, errorMessage } from '../types/errors.js';
import { type BindValue, type RawRow, isRecord, isRowArray } from '../types/utils.js';

/**
 * The slice of a Knex instance the executor relies on.
 */
export interface Connection {
  raw(sql: string, bindings: readonly BindValue[]): PromiseLike<unknown>;
  destroy(): Promise<void>;
}

/**
 * Opens a connection for one call.
 */
export type ConnectionFactory = (config: Knex.Config) => Connection;

const defaultFactory: ConnectionFactory = (config) => knex(config);

/**
 * Count positional placeholders outside single-quoted literals.
 * Knex reads `??` as a single identifier binding.
 */
export function countPlaceholders(sql: string): number {
  let count = 0;
  let quoted = false;

  for (let i = 0; i < sql.length; i++) {
    const char = sql[i];
    if (char === "'") {
      quoted = !quoted;
    } else if (char === '?' && !quoted) {
      count++;
      if (sql[i + 1] === '?') {
        i++;
      }
    }
  }

  return count;
}

/**
 * Infer a column type from a driver value.
 */
export function inferColumnType(value: unknown): ColumnType {
  if (value === null || value === undefined) {
    return 'unknown';
  } else if (value instanceof Date) {
    return 'timestamp';
  } else if (typeof value === 'boolean') {
    return 'boolean';
  } else if (typeof value === 'bigint') {
    return 'integer';
  } else if (typeof value === 'number') {
    return Number.isInteger(value) ? 'integer' : 'float';
  } else if (typeof value === 'string') {
    return 'string';
  }
  return 'unknown';
}

/**
 * Knex hands back the row array for SQL Server and SQLite; a raw tedious
 * request yields `{ recordset }`.
 */
export function extractRows(result: unknown): RawRow[] {
  if (isRowArray(result)) {
    return result;
  }

  if (isRecord(result) && isRowArray(result.recordset)) {
    return result.recordset;
  }

  return [];
}

/**
 * Column metadata for a row set: names in the key order of the first row,
 * type from the first non-null value.
 */
export function describeColumns(rows: RawRow[]): ColumnMeta[] {
  const names = rows.length > 0 ? Object.keys(rows[0]) : [];

  return names.map((name) => {
    const sample = rows.find((row) => row[name] !== null && row[name] !== undefined);
    return { name, type: sample ? inferColumnType(sample[name]) : 'unknown' };
  });
}

/**
 * Runs vetted SQL templates against the configured database.
 */
export class QueryExecutor implements QueryRunner {
  private readonly knexConfig: Knex.Config;

  constructor(
    knexConfig: Knex.Config,
    private readonly logger: Logger,
    private readonly connect: ConnectionFactory = defaultFactory
  ) {
    // One connection per executor call; released when the call ends.
    this.knexConfig = { ...knexConfig, pool: { ...knexConfig.pool, min: 0, max: 1 } };
  }

  /**
   * Execute a statement with positional bindings and return the full row set.
   *
   * @throws QueryExecutionError on a binding mismatch, connection failure or
   * statement failure
   */
  async execute(sql: string, params: readonly BindValue[] = []): Promise<RawResult> {
    const expected = countPlaceholders(sql);
    if (expected !== params.length) {
      throw new QueryExecutionError(
        `Expected ${expected} bound values, received ${params.length}`,
        { sql }
      );
    }

    const startTime = Date.now();
    const result = await this.withConnection(sql, (db) => db.raw(sql, params));
    const rows = extractRows(result);

    this.logger.debug(
      { rows: rows.length, durationMs: Date.now() - startTime },
      'Query executed'
    );

    return { columns: describeColumns(rows), rows };
  }

  /**
   * Connectivity probe.
   */
  async ping(): Promise<void> {
    await this.withConnection('SELECT 1', (db) => db.raw('SELECT 1', []));
  }

  private async withConnection(
    sql: string,
    run: (db: Connection) => PromiseLike<unknown>
  ): Promise<unknown> {
    let db: Connection;
    try {
      db = this.connect(this.knexConfig);
    } catch (error) {
      throw new QueryExecutionError(errorMessage(error), { sql, cause: error });
    }

    try {
      return await run(db);
    } catch (error) {
      throw new QueryExecutionError(errorMessage(error), { sql, cause: error });
    } finally {
      await db.destroy();
    }
  }
}
