/**
 * Data models for the reporting API.
 */

import type { FastifyRequest } from 'fastify';
import type { BindValue, JsonPrimitive, RawRow } from './utils.js';

/**
 * Inferred type of a result column.
 */
export type ColumnType =
  | 'string'
  | 'integer'
  | 'float'
  | 'boolean'
  | 'timestamp'
  | 'unknown';

/**
 * Column metadata reported alongside a row set.
 */
export interface ColumnMeta {
  name: string;
  type: ColumnType;
}

/**
 * Row set returned by the executor, before normalization.
 */
export interface RawResult {
  columns: ColumnMeta[];
  rows: RawRow[];
}

/**
 * One output row: column name to plain scalar, in projection order.
 */
export type ResultRecord = Record<string, JsonPrimitive>;

/**
 * Anything that can run a statement and answer a connectivity probe.
 * The knex-backed executor implements it; tests supply stand-ins.
 */
export interface QueryRunner {
  execute(sql: string, params?: readonly BindValue[]): Promise<RawResult>;
  ping(): Promise<void>;
}

/**
 * Parameterized query ready for execution.
 */
export interface BoundQuery {
  sql: string;
  params: BindValue[];
}

/**
 * Filters accepted by the filtered enrollment listing.
 */
export interface EnrollmentFilters {
  category?: string;
  status?: string;
  date_from?: string;
  date_to?: string;
}

/**
 * Declarative description of one report endpoint.
 */
export interface ReportRoute<TName extends string = string> {
  /** Key used in the endpoint listing. */
  key: string;
  /** Fastify path, e.g. `/api/courses/:courseId`. */
  path: string;
  /** Path as advertised to dashboard authors, e.g. `/api/courses/<course_id>`. */
  displayPath: string;
  summary: string;
  template: TName;
  /** Integer path parameters, validated before the handler runs. */
  idParams?: readonly string[];
  /** Optional query-string filters. */
  queryParams?: readonly string[];
  /** Builds the bound query from the request; defaults to the bare template. */
  bind?: (request: FastifyRequest, sql: string) => BoundQuery;
}

/**
 * Health endpoint body.
 */
export type HealthResponse =
  | { status: 'healthy'; database: 'connected'; timestamp: string }
  | { status: 'unhealthy'; error: string; timestamp: string };

/**
 * Error body returned for every failed request.
 */
export interface ErrorResponse {
  error: string;
}
