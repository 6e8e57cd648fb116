/**
 * Filtered enrollment listing.
 *
 * The WHERE clause is assembled only from the fixed fragments below, in
 * table order; request values are always bound, never spliced into SQL.
 */

import { z } from 'zod';
import type { BoundQuery, EnrollmentFilters } from '../types/models.js';

/**
 * Filter name to clause fragment. Each fragment carries one placeholder.
 */
export const ENROLLMENT_FILTER_CLAUSES = [
  ['category', 'c.category = ?'],
  ['status', 'e.status = ?'],
  ['date_from', 'e.enrollment_date >= ?'],
  ['date_to', 'e.enrollment_date <= ?'],
] as const satisfies ReadonlyArray<readonly [keyof EnrollmentFilters, string]>;

export const ENROLLMENT_FILTER_ORDER = 'ORDER BY e.enrollment_date DESC';

const DATE_PATTERN = /^\d{4}-\d{2}-\d{2}( \d{2}:\d{2}:\d{2})?$/;

/**
 * Empty query-string values count as absent.
 */
const optionalText = z
  .string()
  .trim()
  .optional()
  .transform((value) => (value ? value : undefined));

const optionalDate = optionalText.refine(
  (value) => value === undefined || DATE_PATTERN.test(value),
  { message: 'must be YYYY-MM-DD or YYYY-MM-DD HH:MM:SS' }
);

/**
 * Query-string schema for the filtered listing.
 */
export const EnrollmentFilterSchema = z.object({
  category: optionalText,
  status: optionalText,
  date_from: optionalDate,
  date_to: optionalDate,
});

/**
 * Compose the filtered listing from its base template (ending in
 * `WHERE 1=1`) and the present filters.
 */
export function buildEnrollmentFilter(
  baseSql: string,
  filters: EnrollmentFilters
): BoundQuery {
  const clauses: string[] = [baseSql];
  const params: string[] = [];

  for (const [name, clause] of ENROLLMENT_FILTER_CLAUSES) {
    const value = filters[name];
    if (value) {
      clauses.push(`AND ${clause}`);
      params.push(value);
    }
  }

  clauses.push(ENROLLMENT_FILTER_ORDER);
  return { sql: clauses.join('\n'), params };
}
