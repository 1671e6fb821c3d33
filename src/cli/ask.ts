/**
 * Answer one question from the command line, in-process.
 */

import { z } from 'zod';
import { closeDb } from '../services/database.js';
import { getQueryPipeline, resetQueryPipeline } from '../services/pipeline.js';
import { ConfigError, InputError, errorMessage } from '../types/errors.js';
import { parseQueryRequest, type QueryRequest, type ResponseEnvelope } from '../types/models.js';
import * as logger from './logger.js';

export const OutputFormatSchema = z.enum(['json', 'table']);
export type OutputFormat = z.infer<typeof OutputFormatSchema>;

export interface AskOptions {
  /** Raw CLI value */
  language?: unknown;
  /** Raw CLI value; validated like the HTTP field */
  maxRows?: unknown;
  format: OutputFormat;
}

function printEnvelope(envelope: ResponseEnvelope, format: OutputFormat): void {
  if (format === 'json') {
    console.log(JSON.stringify(envelope, null, 2));
    return;
  }

  if (envelope.status === 'error') {
    logger.errorBox(envelope.message, `Failed at ${envelope.stage}`);
    return;
  }

  logger.section('SQL');
  logger.code(envelope.sql, 'sql');
  logger.section('Results');
  console.log(logger.renderTable(envelope.columns, envelope.rows));
}

/**
 * @returns process exit code: 0 on success, 1 on an error envelope or
 * setup failure
 */
export async function runAsk(question: string, options: AskOptions): Promise<number> {
  let request: QueryRequest;
  try {
    request = parseQueryRequest({
      question,
      language: options.language,
      max_rows: options.maxRows,
    });
  } catch (error) {
    if (error instanceof InputError) {
      logger.error(error.message);
      return 1;
    }
    throw error;
  }

  const spinner = logger.spinner('Connecting to database...');
  try {
    const pipeline = await getQueryPipeline();
    spinner.text = 'Generating and running SQL...';

    const envelope = await pipeline.run(request);
    if (envelope.status === 'ok') {
      spinner.succeed(
        `Query complete (${envelope.rows.length} rows in ${envelope.execution_ms.toFixed(1)}ms)`
      );
    } else {
      spinner.fail(`Query failed at ${envelope.stage}`);
    }

    printEnvelope(envelope, options.format);
    return envelope.status === 'ok' ? 0 : 1;
  } catch (error) {
    spinner.fail('Could not start the pipeline');
    logger.error(
      errorMessage(error),
      error instanceof ConfigError ? 'Check your .env file (see .env.example)' : undefined
    );
    return 1;
  } finally {
    resetQueryPipeline();
    await closeDb();
  }
}
