/**
 * Fastify server assembly.
 */

import Fastify, { type FastifyInstance, type FastifyServerOptions } from 'fastify';
import cors from '@fastify/cors';
import swagger from '@fastify/swagger';
import swaggerUi from '@fastify/swagger-ui';
import { ZodError } from 'zod';
import { reportRoutes } from './routes/reports.js';
import { utilityRoutes } from './routes/utility.js';
import type { ReportService } from './services/reports.js';
import type { TemplateSet } from './services/templates.js';
import { NormalizationError, QueryExecutionError } from './types/errors.js';
import type { ErrorResponse } from './types/models.js';

export interface ServerOptions {
  reports: ReportService;
  templates: TemplateSet;
  corsOrigin?: string;
  logger?: FastifyServerOptions['logger'];
  /** Serve OpenAPI docs at /docs. */
  docs?: boolean;
}

/**
 * Create and configure the Fastify server. Does not listen.
 */
export async function buildServer(options: ServerOptions): Promise<FastifyInstance> {
  const { reports, templates, corsOrigin = '*', logger = false, docs = true } = options;

  const fastify = Fastify({ logger });

  /**
   * Register CORS plugin so the dashboard can call from its own origin.
   */
  await fastify.register(cors, {
    origin: corsOrigin,
  });

  /**
   * Register Swagger documentation.
   */
  if (docs) {
    await fastify.register(swagger, {
      openapi: {
        info: {
          title: 'LMS Reporting API',
          description: 'Read-only LMS analytics for BI dashboards',
          version: '1.0.0',
        },
      },
    });

    await fastify.register(swaggerUi, {
      routePrefix: '/docs',
    });
  }

  /**
   * Global error handler: validation problems are the caller's, as is any
   * other Fastify 4xx; everything else is a 500 with the message text.
   */
  fastify.setErrorHandler((error, request, reply) => {
    if (error.validation || error instanceof ZodError) {
      const body: ErrorResponse = { error: validationMessage(error) };
      reply.status(400).send(body);
      return;
    }

    if (error.statusCode !== undefined && error.statusCode >= 400 && error.statusCode < 500) {
      const body: ErrorResponse = { error: error.message };
      reply.status(error.statusCode).send(body);
      return;
    }

    if (error instanceof QueryExecutionError) {
      request.log.error({ err: error, sql: error.sql }, 'Query execution failed');
    } else if (error instanceof NormalizationError) {
      request.log.error({ err: error, column: error.column }, 'Result normalization failed');
    } else {
      request.log.error({ err: error }, 'Unhandled error');
    }

    const body: ErrorResponse = { error: error.message || 'An unexpected error occurred' };
    reply.status(500).send(body);
  });

  fastify.setNotFoundHandler((request, reply) => {
    const body: ErrorResponse = { error: `Not found: ${request.method} ${request.url}` };
    reply.status(404).send(body);
  });

  /**
   * Register route handlers after the handlers above so every route
   * context inherits them.
   */
  await fastify.register(reportRoutes, { reports, templates });
  await fastify.register(utilityRoutes, { reports, templates });

  return fastify;
}

function validationMessage(error: Error): string {
  if (error instanceof ZodError) {
    return error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
  }
  return error.message;
}
