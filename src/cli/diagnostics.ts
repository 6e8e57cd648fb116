/**
 * Connectivity diagnostics for the configured database.
 */

import type { Config } from '../config.js';
import { QueryExecutor } from '../services/database.js';
import { errorMessage } from '../types/errors.js';
import type { QueryRunner } from '../types/models.js';
import { silentLogger } from '../utils/logger.js';
import * as logger from './logger.js';

export interface CheckResult {
  passed: boolean;
  message: string;
  durationMs: number;
}

/**
 * Probe the database once.
 */
export async function checkConnection(runner: QueryRunner): Promise<CheckResult> {
  const startTime = Date.now();
  try {
    await runner.ping();
    return { passed: true, message: 'connected', durationMs: Date.now() - startTime };
  } catch (error) {
    return { passed: false, message: errorMessage(error), durationMs: Date.now() - startTime };
  }
}

/**
 * Print the configured target and the probe outcome.
 * Resolves to false when the database is unreachable.
 */
export async function runDiagnostics(
  config: Config,
  runner: QueryRunner = new QueryExecutor(config.KNEX_CONFIG, silentLogger)
): Promise<boolean> {
  const { server, database, authentication } = config.DATABASE_TARGET;

  logger.section('Database');
  logger.row('Server', server);
  logger.row('Database', database);
  logger.row('Authentication', authentication);
  logger.newline();

  const result = await checkConnection(runner);
  if (result.passed) {
    logger.success(`Successfully connected to database: ${database} (${result.durationMs}ms)`);
  } else {
    logger.error(
      `Database connection failed: ${result.message}`,
      'Check your database configuration and ensure SQL Server is running.'
    );
  }
  return result.passed;
}
