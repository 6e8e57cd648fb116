/**
 * Result normalization: driver row sets to JSON-ready records.
 *
 * Every null-equivalent a driver can hand back collapses to `null`, so no
 * sentinel value reaches a response body.
 */

import { format, isValid } from 'date-fns';
import type { RawResult, ResultRecord } from '../types/models.js';
import { NormalizationError } from '../types/errors.js';
import type { JsonPrimitive } from '../types/utils.js';

/**
 * Output pattern for timestamp cells.
 */
export const TIMESTAMP_FORMAT = 'yyyy-MM-dd HH:mm:ss';

/**
 * Not-a-time marker some drivers and export tools emit in text columns.
 */
const NOT_A_TIME = 'NaT';

/**
 * Normalize a single cell.
 *
 * @throws NormalizationError for values with no scalar JSON form
 */
export function normalizeValue(column: string, value: unknown): JsonPrimitive {
  if (value === null || value === undefined) {
    return null;
  }

  if (value instanceof Date) {
    return isValid(value) ? format(value, TIMESTAMP_FORMAT) : null;
  }

  switch (typeof value) {
    case 'number':
      return Number.isFinite(value) ? value : null;
    case 'string':
      return value === NOT_A_TIME ? null : value;
    case 'boolean':
      return value;
    case 'bigint':
      return Number.isSafeInteger(Number(value)) ? Number(value) : value.toString();
    default:
      break;
  }

  const shape = Buffer.isBuffer(value)
    ? 'binary data'
    : Array.isArray(value)
      ? 'array'
      : typeof value;
  throw new NormalizationError(column, `unsupported ${shape} value`);
}

/**
 * Normalize a row set. Keys follow the column order, every record carries
 * every column, and row order is preserved.
 */
export function normalizeResult(result: RawResult): ResultRecord[] {
  const names = result.columns.map((column) => column.name);

  return result.rows.map((row) => {
    const record: ResultRecord = {};
    for (const name of names) {
      record[name] = normalizeValue(name, row[name]);
    }
    return record;
  });
}
