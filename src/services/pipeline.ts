/**
 * Pipeline Orchestrator.
 *
 * Drives one question through generation → validation → execution →
 * formatting. Failures become data on the state record and funnel through
 * the error node; only malformed input aborts before a record exists.
 */

import type { Knex } from 'knex';
import { getConfig, type Config } from '../config.js';
import {
  PipelineNode,
  mergeMetadata,
  routeAfterError,
  routeAfterExecution,
  routeAfterGeneration,
  routeAfterValidation,
  setIfAbsent,
  type ErroredState,
  type ExecutedState,
  type ExecutionFailedState,
  type FailedState,
  type FormattedState,
  type GeneratedState,
  type GenerationFailedState,
  type ReceivedState,
  type StateBase,
  type Step,
  type ValidatedState,
  type ValidationFailedState,
} from '../pipeline/state.js';
import { GenerationError, SQLValidationError, errorMessage } from '../types/errors.js';
import { parseQueryRequest, type QueryInput, type ResponseEnvelope } from '../types/models.js';
import type { Metadata } from '../types/utils.js';
import { logger as rootLogger, type Logger } from '../utils/logger.js';
import { initDb } from './database.js';
import { QueryExecutor, type ExecutionResult } from './executor.js';
import { formatResponse } from './formatter.js';
import { SqlGenerator, loadSchemaContext, type GenerationRequest, type GenerationResult } from './generator.js';
import { LLMService } from './llm.js';
import { sanitizeSql } from './sql-safety.js';

/**
 * The pieces of the generation adapter the pipeline uses.
 */
export interface SqlSource {
  generate(request: GenerationRequest): Promise<GenerationResult>;
}

/**
 * The pieces of the executor the pipeline uses.
 */
export interface SqlRunner {
  execute(sql: string, maxRows: number): Promise<ExecutionResult>;
}

export interface QueryPipelineDeps {
  generator: SqlSource;
  executor: SqlRunner;
  /** Cap used when a request names none */
  defaultMaxRows: number;
  logger?: Logger;
}

export interface RunOptions {
  /** Correlates log lines with the HTTP request */
  requestId?: string;
}

/**
 * Carry the shared fields into the next record, replacing metadata and stage.
 */
function carry(state: StateBase, stage: PipelineNode, metadata: Metadata = state.metadata): StateBase {
  return {
    question: state.question,
    language: state.language,
    maxRows: state.maxRows,
    metadata,
    stage,
  };
}

export class QueryPipeline {
  private readonly generator: SqlSource;
  private readonly executor: SqlRunner;
  private readonly defaultMaxRows: number;
  private readonly logger: Logger;

  constructor(deps: QueryPipelineDeps) {
    this.generator = deps.generator;
    this.executor = deps.executor;
    this.defaultMaxRows = deps.defaultMaxRows;
    this.logger = (deps.logger ?? rootLogger).child({ component: 'pipeline' });
  }

  /**
   * Answer one question.
   *
   * @throws InputError when the request is malformed (blank question, bad
   * max_rows); every other failure comes back as an error envelope
   */
  async run(input: QueryInput, options: RunOptions = {}): Promise<ResponseEnvelope> {
    const final = await this.invoke(input, options);
    return final.response;
  }

  /**
   * Like run(), but returns the final state record.
   */
  async invoke(input: QueryInput, options: RunOptions = {}): Promise<FormattedState> {
    const request = parseQueryRequest(input);
    const log = options.requestId
      ? this.logger.child({ requestId: options.requestId })
      : this.logger;

    const received: ReceivedState = {
      status: 'received',
      question: request.question,
      language: request.language,
      maxRows: request.max_rows ?? this.defaultMaxRows,
      metadata: request.metadata,
      stage: 'received',
    };

    let step: Step = { node: PipelineNode.Generation, state: received };
    for (;;) {
      log.debug({ stage: step.node }, 'Entering stage');
      switch (step.node) {
        case PipelineNode.Generation:
          step = routeAfterGeneration(await this.generation(step.state, log));
          break;
        case PipelineNode.ValidateSql:
          step = routeAfterValidation(this.validateSql(step.state, log));
          break;
        case PipelineNode.ExecuteSql:
          step = routeAfterExecution(await this.executeSql(step.state, log));
          break;
        case PipelineNode.Error:
          step = routeAfterError(this.handleError(step.state, log));
          break;
        case PipelineNode.FormatResponse:
          return formatResponse(step.state);
      }
    }
  }

  /**
   * Ask the generation adapter for SQL.
   */
  async generation(
    state: ReceivedState,
    log: Logger = this.logger
  ): Promise<GeneratedState | GenerationFailedState> {
    try {
      const result = await this.generator.generate({
        question: state.question,
        language: state.language,
      });
      log.info({ stage: PipelineNode.Generation, model: result.metadata.model }, 'SQL generated');
      return {
        ...carry(state, PipelineNode.Generation, mergeMetadata(state.metadata, result.metadata)),
        status: 'generated',
        sql: result.sql,
      };
    } catch (error) {
      if (!(error instanceof GenerationError)) {
        throw error;
      }
      log.warn({ stage: PipelineNode.Generation, err: error }, 'Generation failed');
      return {
        ...carry(state, PipelineNode.Generation),
        status: 'generation_failed',
        errorMessage: error.message,
      };
    }
  }

  /**
   * Apply the safety validator. Records the enforced cap as `max_rows`.
   */
  validateSql(state: GeneratedState, log: Logger = this.logger): ValidatedState | ValidationFailedState {
    const metadata = mergeMetadata(state.metadata, { max_rows: state.maxRows });
    try {
      const sql = sanitizeSql(state.sql, state.maxRows);
      log.info({ stage: PipelineNode.ValidateSql }, 'SQL accepted');
      return {
        ...carry(state, PipelineNode.ValidateSql, metadata),
        status: 'validated',
        sql,
      };
    } catch (error) {
      if (!(error instanceof SQLValidationError)) {
        throw error;
      }
      log.warn({ stage: PipelineNode.ValidateSql, reason: error.message }, 'SQL rejected');
      return {
        ...carry(state, PipelineNode.ValidateSql, metadata),
        status: 'validation_failed',
        sql: state.sql,
        validationError: error.message,
      };
    }
  }

  /**
   * Run the validated statement. Any failure, including a lost connection,
   * becomes an execution failure.
   */
  async executeSql(
    state: ValidatedState,
    log: Logger = this.logger
  ): Promise<ExecutedState | ExecutionFailedState> {
    try {
      const result = await this.executor.execute(state.sql, state.maxRows);
      const metadata = setIfAbsent(
        mergeMetadata(state.metadata, {
          row_count: result.rows.length,
          ...(result.truncated ? { truncated: true } : {}),
        }),
        'max_rows',
        state.maxRows
      );
      log.info(
        { stage: PipelineNode.ExecuteSql, rowCount: result.rows.length, executionMs: result.executionMs },
        'SQL executed'
      );
      return {
        ...carry(state, PipelineNode.ExecuteSql, metadata),
        status: 'executed',
        sql: result.sql,
        columns: result.columns,
        rows: result.rows,
        executionMs: result.executionMs,
      };
    } catch (error) {
      log.warn({ stage: PipelineNode.ExecuteSql, err: error }, 'Execution failed');
      return {
        ...carry(state, PipelineNode.ExecuteSql),
        status: 'execution_failed',
        sql: state.sql,
        errorMessage: errorMessage(error),
      };
    }
  }

  /**
   * Record which stage failed and why.
   */
  handleError(state: FailedState, log: Logger = this.logger): ErroredState {
    const errored = captureFailure(state);
    log.info({ stage: PipelineNode.Error, errorStage: errored.errorStage }, 'Pipeline failed');
    return errored;
  }
}

function captureFailure(state: FailedState): ErroredState {
  const base = carry(state, PipelineNode.Error);
  switch (state.status) {
    case 'generation_failed':
      return { ...base, status: 'errored', errorMessage: state.errorMessage, errorStage: 'generation' };
    case 'validation_failed':
      return {
        ...base,
        status: 'errored',
        errorMessage: state.validationError,
        errorStage: 'validate_sql',
        sql: state.sql,
      };
    case 'execution_failed':
      return {
        ...base,
        status: 'errored',
        errorMessage: state.errorMessage,
        errorStage: 'execute_sql',
        sql: state.sql,
      };
  }
}

/**
 * Wire a pipeline from configuration and an open database.
 */
export function createQueryPipeline(config: Config, db: Knex): QueryPipeline {
  const generator = new SqlGenerator({
    client: new LLMService(config.LLM_CONFIG),
    schema: loadSchemaContext(config.SCHEMA_CONTEXT_PATH),
    dialect: config.DATABASE_TYPE,
  });
  const executor = new QueryExecutor(db, {
    statementTimeoutMs: config.STATEMENT_TIMEOUT_MS,
  });
  return new QueryPipeline({
    generator,
    executor,
    defaultMaxRows: config.DEFAULT_MAX_ROWS,
  });
}

async function buildDefaultPipeline(): Promise<QueryPipeline> {
  const config = getConfig();
  const db = await initDb(config.KNEX_CONFIG);
  return createQueryPipeline(config, db);
}

/**
 * Process-wide pipeline (lazy-loaded).
 * The construction promise is shared, so concurrent first callers get the
 * same instance.
 */
let pipelinePromise: Promise<QueryPipeline> | null = null;

export function getQueryPipeline(
  factory: () => Promise<QueryPipeline> = buildDefaultPipeline
): Promise<QueryPipeline> {
  if (!pipelinePromise) {
    pipelinePromise = factory().catch((error: unknown) => {
      pipelinePromise = null;
      throw error;
    });
  }
  return pipelinePromise;
}

export function resetQueryPipeline(): void {
  pipelinePromise = null;
}
