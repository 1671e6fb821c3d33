#!/usr/bin/env node
/**
 * sqlgate CLI
 * Ask analytics questions, check SQL and run the HTTP server
 */

import { cac } from 'cac';
import { runAsk, OutputFormatSchema } from './cli/ask.js';
import { runCheck } from './cli/check.js';
import * as logger from './cli/logger.js';
import { DEFAULT_MAX_ROWS } from './types/models.js';
import { errorMessage } from './types/errors.js';

const cli = cac('sqlgate');

cli.version('1.0.0');

// Help text
cli.help();

interface ServeFlags {
  port?: number;
  host?: string;
}

interface AskFlags {
  language?: unknown;
  maxRows?: unknown;
  format?: unknown;
}

interface CheckFlags {
  maxRows?: unknown;
}

/**
 * sqlgate serve
 * Start the HTTP server in this process
 */
cli
  .command('serve', 'Start the HTTP server')
  .option('-p, --port <port>', 'Server port (default: PORT or 8000)')
  .option('--host <host>', 'Bind address (default: HOST or 0.0.0.0)')
  .action(async (options: ServeFlags) => {
    logger.printBanner();
    const { startServer } = await import('./index.js');
    try {
      await startServer({
        port: options.port === undefined ? undefined : Number(options.port),
        host: options.host,
      });
    } catch (error) {
      logger.error('Failed to start server', errorMessage(error));
      process.exit(1);
    }
  });

/**
 * sqlgate ask <question>
 * Run one question through the pipeline
 */
cli
  .command('ask <question>', 'Answer a natural language question')
  .option('-l, --language <code>', 'Language of the question', { default: 'en' })
  .option('-n, --max-rows <n>', 'Row cap (default: DEFAULT_MAX_ROWS)')
  .option('-f, --format <format>', 'Output format: table or json', { default: 'table' })
  .action(async (question: string, options: AskFlags) => {
    const format = OutputFormatSchema.safeParse(options.format);
    if (!format.success) {
      logger.error('`--format` must be "table" or "json".');
      process.exit(1);
    }

    process.exitCode = await runAsk(question, {
      language: options.language,
      maxRows: options.maxRows,
      format: format.data,
    });
  });

/**
 * sqlgate check <sql>
 * Validate a statement without running it
 */
cli
  .command('check <sql>', 'Validate and bound a SQL statement offline')
  .option('-n, --max-rows <n>', 'Row cap', { default: DEFAULT_MAX_ROWS })
  .action((sql: string, options: CheckFlags) => {
    process.exitCode = runCheck(sql, Number(options.maxRows));
  });

// Parse CLI arguments and wait for the command to finish
try {
  cli.parse(process.argv, { run: false });
  await cli.runMatchedCommand();
} catch (error) {
  logger.error(errorMessage(error));
  process.exit(1);
}
