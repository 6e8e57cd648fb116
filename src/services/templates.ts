/**
 * Query templates: fixed T-SQL statements read from `sql/` at startup.
 */

import { readFileSync } from 'fs';
import { join } from 'path';
import { rootDir } from '../config.js';

/**
 * Every template the routes reference. One `<name>.sql` file each.
 */
export const TEMPLATE_NAMES = [
  'dashboard-summary',
  'courses',
  'course-detail',
  'enrollments',
  'enrollment-trends',
  'enrollments-filter',
  'students',
  'student-progress',
  'progress-detailed',
  'category-performance',
  'quiz-performance',
  'engagement-metrics',
  'completion-funnel',
  'time-analysis',
  'table-metadata',
] as const;

export type TemplateName = (typeof TEMPLATE_NAMES)[number];

export type TemplateSet = Readonly<Record<TemplateName, string>>;

export const DEFAULT_TEMPLATE_DIR = join(rootDir, 'sql');

/**
 * Keywords that have no place in a reporting statement.
 */
const WRITE_KEYWORDS = [
  'UPDATE',
  'DELETE',
  'DROP',
  'ALTER',
  'INSERT',
  'CREATE',
  'TRUNCATE',
  'MERGE',
  'EXEC',
  'GRANT',
];

/**
 * Reject anything that is not a single read-only statement.
 *
 * @throws Error naming the template and the offending keyword
 */
export function assertReadOnly(name: string, sql: string): void {
  const sqlUpper = sql.toUpperCase().trim();

  if (!sqlUpper.startsWith('SELECT') && !sqlUpper.startsWith('WITH')) {
    throw new Error(`Template "${name}" must start with SELECT or WITH`);
  }

  for (const keyword of WRITE_KEYWORDS) {
    if (new RegExp(`\\b${keyword}\\b`).test(sqlUpper)) {
      throw new Error(`Template "${name}" contains forbidden keyword ${keyword}`);
    }
  }

  if (sqlUpper.replace(/;\s*$/, '').includes(';')) {
    throw new Error(`Template "${name}" must contain a single statement`);
  }
}

/**
 * Read and vet every template. A missing file fails startup.
 */
export function loadTemplates(dir: string = DEFAULT_TEMPLATE_DIR): TemplateSet {
  const templates: Partial<Record<TemplateName, string>> = {};

  for (const name of TEMPLATE_NAMES) {
    const sql = readFileSync(join(dir, `${name}.sql`), 'utf-8').trim();
    assertReadOnly(name, sql);
    templates[name] = sql;
  }

  if (!isComplete(templates)) {
    throw new Error('Template set is incomplete');
  }
  return templates;
}

function isComplete(
  templates: Partial<Record<TemplateName, string>>
): templates is Record<TemplateName, string> {
  return TEMPLATE_NAMES.every((name) => typeof templates[name] === 'string');
}
