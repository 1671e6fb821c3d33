/**
 * SQL generation: question in, raw SQL text out.
 *
 * The generator owns the prompt and the cleanup of whatever the model sends
 * back. It never validates the SQL; that is the safety validator's job.
 */

import { readFileSync } from 'fs';
import type { DatabaseType } from '../config.js';
import { GenerationError, LLMError, errorMessage } from '../types/errors.js';
import type { Metadata } from '../types/utils.js';
import { logger as rootLogger, type Logger } from '../utils/logger.js';
import type { GenerationReply, TextGenerator } from './llm.js';

/**
 * System prompt for SQL generation.
 */
const SQL_GENERATION_SYSTEM_PROMPT = `You translate analytics questions into a single SQL query.

<context>
Database dialect: {dialect}
The query runs inside a read-only transaction. Only one SELECT statement is accepted.
</context>

<schema>
{schema}
</schema>

<rules>
- Answer with the SQL statement only: no explanation, no markdown, no trailing semicolon.
- Use only tables and columns that appear in the schema.
- Never write INSERT, UPDATE, DELETE, DDL or more than one statement.
- Prefer explicit column lists over SELECT *.
- Add ORDER BY when the question implies a ranking or "latest"/"top" rows.
</rules>`;

const START_WRAPPER = /^(?:```(?:[\w+-]*[ \t]*\r?\n)?|<s>|<sql>|\[sql\])/i;
const END_WRAPPER = /(?:```|<\/s>|<\/sql>|\[\/sql\])$/i;

/**
 * Collapse a structured reply into one string.
 *
 * Parts typed as anything other than `text` (reasoning, tool calls) are
 * dropped.
 */
export function collapseReply(reply: GenerationReply): string {
  if (typeof reply === 'string') {
    return reply;
  }
  if (Array.isArray(reply)) {
    return reply.map(collapseReply).join('');
  }
  if ((reply.type === undefined || reply.type === 'text') && typeof reply.text === 'string') {
    return reply.text;
  }
  if (reply.content !== undefined) {
    return collapseReply(reply.content);
  }
  return '';
}

/**
 * Strip code fences, sentinel tokens and whitespace from both ends until
 * nothing more comes off.
 */
export function stripWrappers(text: string): string {
  let current = text.trim();
  for (;;) {
    const next = current.replace(START_WRAPPER, '').trim().replace(END_WRAPPER, '').trim();
    if (next === current) {
      return current;
    }
    current = next;
  }
}

/**
 * Reduce a raw model reply to bare SQL text (possibly empty).
 */
export function normalizeReply(reply: GenerationReply): string {
  return stripWrappers(collapseReply(reply));
}

export interface GenerationRequest {
  question: string;
  language: string;
}

export interface GenerationResult {
  sql: string;
  /** Provenance: model, endpoint, generation_ms */
  metadata: Metadata;
}

export interface SqlGeneratorOptions {
  client: TextGenerator;
  /** Schema description handed to the model verbatim */
  schema: string;
  dialect: DatabaseType;
  logger?: Logger;
}

/**
 * Read the static schema context from disk.
 */
export function loadSchemaContext(path: string): string {
  try {
    return readFileSync(path, 'utf-8').trim();
  } catch (error) {
    throw new Error(`Cannot read schema context at ${path}: ${errorMessage(error)}`);
  }
}

/**
 * Turns questions into SQL through a text-generation client.
 */
export class SqlGenerator {
  private readonly client: TextGenerator;
  private readonly systemPrompt: string;
  private readonly logger: Logger;

  constructor(options: SqlGeneratorOptions) {
    this.client = options.client;
    this.systemPrompt = SQL_GENERATION_SYSTEM_PROMPT.replace(
      '{dialect}',
      options.dialect === 'pg' ? 'PostgreSQL' : 'SQLite'
    ).replace('{schema}', options.schema);
    this.logger = (options.logger ?? rootLogger).child({ component: 'generator' });
  }

  /**
   * Generate SQL for one question.
   *
   * @throws GenerationError when the service fails or returns no SQL
   */
  async generate(request: GenerationRequest): Promise<GenerationResult> {
    const prompt =
      `Question: ${request.question}\n` +
      `The question is written in language "${request.language}".`;

    const started = performance.now();
    let reply: GenerationReply;
    try {
      reply = await this.client.complete({ system: this.systemPrompt, prompt });
    } catch (error) {
      if (error instanceof LLMError) {
        throw new GenerationError(error.message);
      }
      throw new GenerationError(`Generation failed: ${errorMessage(error)}`);
    }
    const generationMs = performance.now() - started;

    const sql = normalizeReply(reply);
    if (!sql) {
      throw new GenerationError('Generated SQL is empty.');
    }

    this.logger.debug({ sql, model: this.client.modelId }, 'Generated SQL');

    return {
      sql,
      metadata: {
        model: this.client.modelId,
        endpoint: this.client.endpoint,
        generation_ms: generationMs,
      },
    };
  }
}
