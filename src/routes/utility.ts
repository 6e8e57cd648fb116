/**
 * Utility endpoints (health, metadata, endpoint listing).
 */

import type { FastifyPluginAsync } from 'fastify';
import type { ReportService } from '../services/reports.js';
import type { TemplateSet } from '../services/templates.js';
import { REPORT_ROUTES } from './reports.js';

export interface UtilityRouteOptions {
  reports: ReportService;
  templates: TemplateSet;
}

/**
 * Endpoint key to advertised path, in listing order. Built from the route
 * table, so it never needs the database.
 */
export function listEndpoints(): Record<string, string> {
  return {
    health: '/api/health',
    ...Object.fromEntries(REPORT_ROUTES.map((route) => [route.key, route.displayPath])),
    table_metadata: '/api/metadata/tables',
    endpoints_list: '/api/metadata/endpoints',
  };
}

export const utilityRoutes: FastifyPluginAsync<UtilityRouteOptions> = async (
  fastify,
  { reports, templates }
) => {
  // GET /api/health - Health check
  fastify.get(
    '/api/health',
    { schema: { summary: 'Verify API and database connectivity', tags: ['Utility'] } },
    async (_request, reply) => {
      const health = await reports.health();
      reply.status(health.status === 'healthy' ? 200 : 500);
      return health;
    }
  );

  // GET /api/metadata/tables - Column metadata for the LMS tables
  fastify.get(
    '/api/metadata/tables',
    { schema: { summary: 'Columns of the known LMS tables', tags: ['Metadata'] } },
    async () => reports.tableMetadata(templates['table-metadata'])
  );

  // GET /api/metadata/endpoints - Endpoint listing
  fastify.get(
    '/api/metadata/endpoints',
    { schema: { summary: 'List all available API endpoints', tags: ['Metadata'] } },
    async () => listEndpoints()
  );
};
