/**
 * Report endpoints, declared as a route table.
 */

import type { FastifyPluginAsync, FastifyRequest } from 'fastify';
import { z } from 'zod';
import type { BoundQuery, ReportRoute } from '../types/models.js';
import type { ReportService } from '../services/reports.js';
import type { TemplateName, TemplateSet } from '../services/templates.js';
import {
  ENROLLMENT_FILTER_CLAUSES,
  EnrollmentFilterSchema,
  buildEnrollmentFilter,
} from '../services/enrollment-filter.js';

export interface ReportRouteOptions {
  reports: ReportService;
  templates: TemplateSet;
}

/**
 * Bind a single positive integer path parameter.
 */
function bindId(param: string): (request: FastifyRequest, sql: string) => BoundQuery {
  const schema = z.object({ [param]: z.coerce.number().int().positive() });
  return (request, sql) => {
    const params = schema.parse(request.params);
    return { sql, params: [params[param]] };
  };
}

function bindEnrollmentFilter(request: FastifyRequest, sql: string): BoundQuery {
  return buildEnrollmentFilter(sql, EnrollmentFilterSchema.parse(request.query));
}

/**
 * Every report endpoint, in the order the endpoint listing advertises them.
 */
export const REPORT_ROUTES: ReadonlyArray<ReportRoute<TemplateName>> = [
  {
    key: 'dashboard_summary',
    path: '/api/dashboard/summary',
    displayPath: '/api/dashboard/summary',
    summary: 'Overall LMS totals and completion rate',
    template: 'dashboard-summary',
  },
  {
    key: 'courses',
    path: '/api/courses',
    displayPath: '/api/courses',
    summary: 'Active courses with enrollment statistics',
    template: 'courses',
  },
  {
    key: 'course_detail',
    path: '/api/courses/:courseId',
    displayPath: '/api/courses/<course_id>',
    summary: 'One course with module, lesson and enrollment counts',
    template: 'course-detail',
    idParams: ['courseId'],
    bind: bindId('courseId'),
  },
  {
    key: 'enrollments',
    path: '/api/enrollments',
    displayPath: '/api/enrollments',
    summary: 'All enrollments with student and course details',
    template: 'enrollments',
  },
  {
    key: 'enrollment_trends',
    path: '/api/enrollments/trends',
    displayPath: '/api/enrollments/trends',
    summary: 'Enrollments by month and category',
    template: 'enrollment-trends',
  },
  {
    key: 'students',
    path: '/api/students',
    displayPath: '/api/students',
    summary: 'Active students with enrollment statistics',
    template: 'students',
  },
  {
    key: 'student_progress',
    path: '/api/students/:studentId/progress',
    displayPath: '/api/students/<student_id>/progress',
    summary: 'Per-course progress for one student',
    template: 'student-progress',
    idParams: ['studentId'],
    bind: bindId('studentId'),
  },
  {
    key: 'detailed_progress',
    path: '/api/progress/detailed',
    displayPath: '/api/progress/detailed',
    summary: 'Lesson-level progress for all students',
    template: 'progress-detailed',
  },
  {
    key: 'category_performance',
    path: '/api/categories/performance',
    displayPath: '/api/categories/performance',
    summary: 'Performance metrics by course category',
    template: 'category-performance',
  },
  {
    key: 'quiz_performance',
    path: '/api/quiz/performance',
    displayPath: '/api/quiz/performance',
    summary: 'Quiz attempt statistics',
    template: 'quiz-performance',
  },
  {
    key: 'engagement_metrics',
    path: '/api/engagement/metrics',
    displayPath: '/api/engagement/metrics',
    summary: 'Student engagement and activity recency',
    template: 'engagement-metrics',
  },
  {
    key: 'completion_funnel',
    path: '/api/completion/funnel',
    displayPath: '/api/completion/funnel',
    summary: 'Course completion funnel',
    template: 'completion-funnel',
  },
  {
    key: 'time_analysis',
    path: '/api/time/analysis',
    displayPath: '/api/time/analysis',
    summary: 'Learning activity over the last six months',
    template: 'time-analysis',
  },
  {
    key: 'filter_enrollments',
    path: '/api/enrollments/filter',
    displayPath: '/api/enrollments/filter',
    summary: 'Enrollments filtered by category, status and date range',
    template: 'enrollments-filter',
    queryParams: ENROLLMENT_FILTER_CLAUSES.map(([name]) => name),
    bind: bindEnrollmentFilter,
  },
];

/**
 * Swagger schema for one route.
 */
function routeSchema(route: ReportRoute) {
  const params = route.idParams
    ? {
        type: 'object',
        properties: Object.fromEntries(
          route.idParams.map((name) => [name, { type: 'integer', minimum: 1 }])
        ),
        required: [...route.idParams],
      }
    : undefined;

  const querystring = route.queryParams
    ? {
        type: 'object',
        properties: Object.fromEntries(
          route.queryParams.map((name) => [name, { type: 'string' }])
        ),
      }
    : undefined;

  return {
    summary: route.summary,
    tags: ['Reports'],
    params,
    querystring,
    response: {
      200: {
        type: 'array',
        items: { type: 'object', additionalProperties: true },
      },
    },
  };
}

export const reportRoutes: FastifyPluginAsync<ReportRouteOptions> = async (
  fastify,
  { reports, templates }
) => {
  for (const route of REPORT_ROUTES) {
    const sql = templates[route.template];

    fastify.get(route.path, { schema: routeSchema(route) }, async (request) => {
      const query = route.bind ? route.bind(request, sql) : { sql, params: [] };
      return reports.run(query);
    });
  }
};
