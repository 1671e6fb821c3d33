/**
 * Pipeline state machine: nodes, transitions and the per-request state record.
 *
 * The state record is a tagged union keyed on `status`. Each node accepts
 * only the variants it can act on and returns a fresh record; nothing is
 * mutated in place.
 */

import type { ErrorStage } from '../types/errors.js';
import type { ResponseEnvelope } from '../types/models.js';
import type { JsonObject, JsonValue, Metadata } from '../types/utils.js';

// ============================================================================
// NODES AND TRANSITIONS
// ============================================================================

export const PipelineNode = {
  Generation: 'generation',
  ValidateSql: 'validate_sql',
  ExecuteSql: 'execute_sql',
  Error: 'error',
  FormatResponse: 'format_response',
} as const;

export type PipelineNode = (typeof PipelineNode)[keyof typeof PipelineNode];

/**
 * Legal successors of every node. Format is terminal.
 */
export const TRANSITIONS = {
  generation: ['validate_sql', 'error'],
  validate_sql: ['execute_sql', 'error'],
  execute_sql: ['format_response', 'error'],
  error: ['format_response'],
  format_response: [],
} as const satisfies Record<PipelineNode, readonly PipelineNode[]>;

export type Successor<N extends PipelineNode> = (typeof TRANSITIONS)[N][number];

// ============================================================================
// STATE RECORD
// ============================================================================

/**
 * Node that last touched the record, or `received` before the first one.
 */
export type StageName = PipelineNode | 'received';

export interface StateBase {
  question: string;
  language: string;
  maxRows: number;
  metadata: Metadata;
  stage: StageName;
}

export interface ReceivedState extends StateBase {
  status: 'received';
}

export interface GeneratedState extends StateBase {
  status: 'generated';
  sql: string;
}

export interface GenerationFailedState extends StateBase {
  status: 'generation_failed';
  errorMessage: string;
}

export interface ValidatedState extends StateBase {
  status: 'validated';
  /** Sanitized statement */
  sql: string;
}

export interface ValidationFailedState extends StateBase {
  status: 'validation_failed';
  sql: string;
  validationError: string;
}

export interface ExecutedState extends StateBase {
  status: 'executed';
  /** Statement as executed */
  sql: string;
  columns: string[];
  rows: JsonObject[];
  executionMs: number;
}

export interface ExecutionFailedState extends StateBase {
  status: 'execution_failed';
  sql: string;
  errorMessage: string;
}

export interface ErroredState extends StateBase {
  status: 'errored';
  errorMessage: string;
  errorStage: ErrorStage;
  sql?: string;
}

export interface FormattedState extends StateBase {
  status: 'formatted';
  response: ResponseEnvelope;
}

export type FailedState = GenerationFailedState | ValidationFailedState | ExecutionFailedState;

export type PipelineState =
  | ReceivedState
  | GeneratedState
  | GenerationFailedState
  | ValidatedState
  | ValidationFailedState
  | ExecutedState
  | ExecutionFailedState
  | ErroredState
  | FormattedState;

/**
 * What each node accepts.
 */
export interface NodeInputs {
  generation: ReceivedState;
  validate_sql: GeneratedState;
  execute_sql: ValidatedState;
  error: FailedState;
  format_response: ExecutedState | ErroredState;
}

/**
 * A node paired with a record it can accept. Routers return these, so a
 * transition outside TRANSITIONS or a mismatched record does not compile.
 */
export type Step<N extends PipelineNode = PipelineNode> = N extends PipelineNode
  ? { node: N; state: NodeInputs[N] }
  : never;

// ============================================================================
// ROUTERS
// ============================================================================

export function routeAfterGeneration(
  state: GeneratedState | GenerationFailedState
): Step<Successor<'generation'>> {
  return state.status === 'generation_failed'
    ? { node: PipelineNode.Error, state }
    : { node: PipelineNode.ValidateSql, state };
}

export function routeAfterValidation(
  state: ValidatedState | ValidationFailedState
): Step<Successor<'validate_sql'>> {
  return state.status === 'validation_failed'
    ? { node: PipelineNode.Error, state }
    : { node: PipelineNode.ExecuteSql, state };
}

export function routeAfterExecution(
  state: ExecutedState | ExecutionFailedState
): Step<Successor<'execute_sql'>> {
  return state.status === 'execution_failed'
    ? { node: PipelineNode.Error, state }
    : { node: PipelineNode.FormatResponse, state };
}

export function routeAfterError(state: ErroredState): Step<Successor<'error'>> {
  return { node: PipelineNode.FormatResponse, state };
}

// ============================================================================
// METADATA
// ============================================================================

/**
 * Merge stage metadata into the record's metadata. Later keys win.
 */
export function mergeMetadata(base: Metadata, update: Metadata): Metadata {
  return { ...base, ...update };
}

/**
 * Write `key` only if no earlier stage has. Used for `max_rows`, whose
 * first writer (validation) wins over execution.
 */
export function setIfAbsent(metadata: Metadata, key: string, value: JsonValue): Metadata {
  return Object.hasOwn(metadata, key) ? metadata : { ...metadata, [key]: value };
}
