/**
 * Request schema and response envelope types.
 * The request schema is shared by the HTTP route, the CLI and the pipeline
 * entry point so that every surface rejects the same inputs the same way.
 */

import { z } from 'zod';
import { InputError, type ErrorStage } from './errors.js';
import { isPlainObject } from './utils.js';
import type { JsonObject, JsonValue, Metadata } from './utils.js';

/**
 * Row cap applied when a request does not name one.
 */
export const DEFAULT_MAX_ROWS = 200;

/**
 * Locale hint used when a request does not name one.
 */
export const DEFAULT_LANGUAGE = 'en';

/**
 * Longest accepted locale hint.
 */
export const MAX_LANGUAGE_LENGTH = 10;

// ============================================================================
// REQUEST
// ============================================================================

const JsonValueSchema: z.ZodType<JsonValue> = z.lazy(() =>
  z.union([
    z.string(),
    z.number(),
    z.boolean(),
    z.null(),
    z.array(JsonValueSchema),
    z.record(JsonValueSchema),
  ])
);

/**
 * JSON null is treated the same as an absent field.
 */
const nullAsMissing = (value: unknown): unknown => value ?? undefined;

const QuestionSchema = z.preprocess(
  nullAsMissing,
  z
    .string({
      required_error: '`question` is required.',
      invalid_type_error: '`question` must be a string.',
    })
    .trim()
    .min(1, '`question` is required.')
);

const LanguageSchema = z.preprocess(
  nullAsMissing,
  z
    .string({ invalid_type_error: '`language` must be a string.' })
    .trim()
    .max(MAX_LANGUAGE_LENGTH, '`language` value is too long.')
    .optional()
    .transform((value) => value || DEFAULT_LANGUAGE)
);

const MaxRowsSchema = z.preprocess(
  (value) =>
    typeof value === 'string' && /^\s*-?\d+\s*$/.test(value)
      ? Number(value)
      : nullAsMissing(value),
  z
    .number({ invalid_type_error: '`max_rows` must be an integer.' })
    .int('`max_rows` must be an integer.')
    .positive('`max_rows` must be greater than zero.')
    .optional()
);

const MetadataSchema = z.preprocess(
  nullAsMissing,
  z
    .record(JsonValueSchema, { invalid_type_error: '`metadata` must be an object.' })
    .default({})
);

/**
 * Inbound analytics question.
 */
export const QueryRequestSchema = z.object({
  question: QuestionSchema,
  language: LanguageSchema,
  max_rows: MaxRowsSchema,
  metadata: MetadataSchema,
});

/**
 * Request after validation and defaulting. `max_rows` stays optional here;
 * the pipeline resolves it against its configured default.
 */
export type QueryRequest = z.output<typeof QueryRequestSchema>;

/**
 * Raw request shape accepted by the pipeline entry point.
 */
export interface QueryInput {
  question: string;
  language?: string;
  max_rows?: number;
  metadata?: JsonObject;
}

/**
 * Validate an untrusted request body.
 *
 * @throws InputError naming the first offending field
 */
export function parseQueryRequest(body: unknown): QueryRequest {
  if (!isPlainObject(body)) {
    throw new InputError('JSON payload must be an object.');
  }

  const result = QueryRequestSchema.safeParse(body);
  if (!result.success) {
    const [issue] = result.error.issues;
    throw new InputError(issue ? issue.message : 'Invalid request.');
  }
  return result.data;
}

// ============================================================================
// RESPONSE ENVELOPES
// ============================================================================

/**
 * Successful pipeline run.
 */
export interface SuccessEnvelope {
  status: 'ok';
  sql: string;
  columns: string[];
  rows: JsonObject[];
  execution_ms: number;
  metadata?: Metadata;
}

/**
 * Failed pipeline run or rejected request.
 */
export interface ErrorEnvelope {
  status: 'error';
  message: string;
  stage: ErrorStage;
  metadata?: Metadata;
}

export type ResponseEnvelope = SuccessEnvelope | ErrorEnvelope;

/**
 * Error envelope for failures outside the pipeline (request parsing,
 * unexpected faults).
 */
export function errorEnvelope(message: string, stage: ErrorStage): ErrorEnvelope {
  return { status: 'error', message, stage };
}
