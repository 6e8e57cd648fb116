/**
 * Report pipeline: execute a bound query, then normalize its rows.
 */

import type { Logger } from 'pino';
import type { BoundQuery, HealthResponse, QueryRunner, ResultRecord } from '../types/models.js';
import { errorMessage } from '../types/errors.js';
import { normalizeResult } from './normalizer.js';
import { bindTableMetadata } from './metadata.js';

export class ReportService {
  constructor(
    private readonly runner: QueryRunner,
    private readonly logger: Logger
  ) {}

  /**
   * Run one report.
   *
   * @throws QueryExecutionError when the statement cannot run
   * @throws NormalizationError when a cell has no JSON scalar form
   */
  async run(query: BoundQuery): Promise<ResultRecord[]> {
    const raw = await this.runner.execute(query.sql, query.params);
    const records = normalizeResult(raw);
    this.logger.debug({ records: records.length }, 'Report normalized');
    return records;
  }

  /**
   * Column metadata for the known LMS tables: tables by name, columns by
   * ordinal position.
   */
  async tableMetadata(sql: string): Promise<ResultRecord[]> {
    return this.run(bindTableMetadata(sql));
  }

  /**
   * Probe connectivity. Never throws; failures become an unhealthy body.
   */
  async health(now: () => Date = () => new Date()): Promise<HealthResponse> {
    try {
      await this.runner.ping();
      return { status: 'healthy', database: 'connected', timestamp: now().toISOString() };
    } catch (error) {
      this.logger.warn({ err: error }, 'Health check failed');
      return { status: 'unhealthy', error: errorMessage(error), timestamp: now().toISOString() };
    }
  }
}
