#!/usr/bin/env node
/**
 * lms-reports CLI
 */

import { cac } from 'cac';
import Table from 'cli-table3';
import { loadConfig } from './config.js';
import { start } from './index.js';
import { runDiagnostics } from './cli/diagnostics.js';
import { listEndpoints } from './routes/utility.js';
import { errorMessage } from './types/errors.js';
import * as logger from './cli/logger.js';

const cli = cac('lms-reports');

cli.version('1.0.0');
cli.help();

/**
 * lms-reports serve
 * Start the HTTP server
 */
cli
  .command('serve', 'Start the reporting API server')
  .option('-p, --port <port>', 'Server port (overrides PORT)')
  .action(async (options: { port?: string | number }) => {
    logger.printBanner();
    const config = loadConfig();
    const port = options.port === undefined ? config.PORT : Number(options.port);
    if (!Number.isInteger(port) || port < 1 || port > 65535) {
      logger.error(`Invalid port: ${options.port}`);
      process.exit(1);
    }
    await start({ ...config, PORT: port });
  });

/**
 * lms-reports check
 * Verify database connectivity
 */
cli
  .command('check', 'Verify connectivity to the configured database')
  .action(async () => {
    logger.printBanner();
    const passed = await runDiagnostics(loadConfig());
    process.exit(passed ? 0 : 1);
  });

/**
 * lms-reports endpoints
 * Print the endpoint listing
 */
cli
  .command('endpoints', 'List all available API endpoints')
  .action(() => {
    const table = new Table({ head: ['Endpoint', 'Path'] });
    for (const [key, path] of Object.entries(listEndpoints())) {
      table.push([key, path]);
    }
    console.log(table.toString());
  });

// Parse CLI arguments
cli.parse(process.argv, { run: false });

cli.runMatchedCommand()?.catch((error: unknown) => {
  logger.error('Command failed', errorMessage(error));
  process.exit(1);
});
