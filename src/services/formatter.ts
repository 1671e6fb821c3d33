/**
 * Response Formatter: the terminal node. Shapes the final record into the
 * public envelope and never throws.
 */

import type { ExecutedState, ErroredState, FormattedState } from '../pipeline/state.js';
import type { ResponseEnvelope } from '../types/models.js';
import type { Metadata } from '../types/utils.js';

function withMetadata<T extends ResponseEnvelope>(envelope: T, metadata: Metadata): T {
  return Object.keys(metadata).length > 0 ? { ...envelope, metadata } : envelope;
}

/**
 * Build the envelope for a finished run.
 */
export function buildEnvelope(state: ExecutedState | ErroredState): ResponseEnvelope {
  if (state.status === 'errored') {
    return withMetadata(
      { status: 'error', message: state.errorMessage, stage: state.errorStage },
      state.metadata
    );
  }

  return withMetadata(
    {
      status: 'ok',
      sql: state.sql,
      columns: state.columns,
      rows: state.rows,
      execution_ms: Number.isFinite(state.executionMs) ? state.executionMs : 0,
    },
    state.metadata
  );
}

export function formatResponse(state: ExecutedState | ErroredState): FormattedState {
  return {
    question: state.question,
    language: state.language,
    maxRows: state.maxRows,
    metadata: state.metadata,
    stage: 'format_response',
    status: 'formatted',
    response: buildEnvelope(state),
  };
}
