/**
 * Column metadata for the known LMS tables, read from INFORMATION_SCHEMA.
 */

import type { BoundQuery } from '../types/models.js';

/**
 * Tables the dashboard is allowed to see.
 */
export const LMS_TABLES = [
  'Courses',
  'Enrollments',
  'Lessons',
  'Modules',
  'Quizzes',
  'UserProgress',
  'UserQuizAttempts',
  'Users',
] as const;

/**
 * Bind the table list to the `table-metadata` template, which carries one
 * placeholder per known table.
 */
export function bindTableMetadata(sql: string): BoundQuery {
  return { sql, params: [...LMS_TABLES] };
}
