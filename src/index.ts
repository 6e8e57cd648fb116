/**
 * LMS Reporting API - Main Entry Point
 */

import type { FastifyInstance } from 'fastify';
import { loadConfig, type Config } from './config.js';
import { buildServer } from './server.js';
import { QueryExecutor } from './services/database.js';
import { ReportService } from './services/reports.js';
import { loadTemplates } from './services/templates.js';
import { createLogger, loggerOptions } from './utils/logger.js';
import { errorMessage } from './types/errors.js';

/**
 * Wire the executor, report service and routes from an explicit config.
 */
export async function createApp(config: Config): Promise<FastifyInstance> {
  const logger = createLogger(config.LOG_LEVEL);
  const executor = new QueryExecutor(config.KNEX_CONFIG, logger);
  const reports = new ReportService(executor, logger);

  const fastify = await buildServer({
    reports,
    templates: loadTemplates(),
    corsOrigin: config.CORS_ORIGIN,
    logger: loggerOptions(config.LOG_LEVEL),
  });

  /**
   * Lifecycle hooks. A failed connectivity check is reported, not fatal.
   */
  fastify.addHook('onReady', async () => {
    const { server, database } = config.DATABASE_TARGET;
    try {
      await executor.ping();
      logger.info(`Successfully connected to database: ${database} on ${server}`);
    } catch (error) {
      logger.error(`Database connection failed: ${errorMessage(error)}`);
      logger.error('Check the database configuration and make sure SQL Server is running.');
    }
  });

  fastify.addHook('onClose', async () => {
    logger.info('Shutting down LMS Reporting API...');
  });

  return fastify;
}

/**
 * Start the server.
 */
export async function start(config: Config = loadConfig()): Promise<FastifyInstance> {
  const fastify = await createApp(config);
  const { HOST: host, PORT: port } = config;

  try {
    await fastify.listen({ port, host });
  } catch (err) {
    fastify.log.error(err);
    process.exit(1);
  }

  fastify.log.info(`Database: ${config.DATABASE_TARGET.database}`);
  fastify.log.info(`Server: ${config.DATABASE_TARGET.server}`);
  fastify.log.info(`API running on: http://localhost:${port}`);
  fastify.log.info(`API documentation: http://localhost:${port}/docs`);
  fastify.log.info(`Endpoint listing: http://localhost:${port}/api/metadata/endpoints`);

  for (const signal of ['SIGINT', 'SIGTERM'] as const) {
    process.once(signal, () => {
      fastify
        .close()
        .then(() => process.exit(0))
        .catch((error: unknown) => {
          fastify.log.error(error);
          process.exit(1);
        });
    });
  }

  return fastify;
}
