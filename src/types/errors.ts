/**
 * Custom error classes for sqlgate.
 * Every pipeline-facing error carries the stage tag that ends up in the
 * error envelope.
 */

/**
 * Stages an error envelope can be attributed to.
 */
export type ErrorStage =
  | 'request'
  | 'generation'
  | 'validate_sql'
  | 'execute_sql'
  | 'server';

/**
 * Error thrown when the inbound request is malformed (blank question,
 * non-object body, out-of-range max_rows).
 *
 * This is a caller-contract violation: it is raised before a pipeline
 * state record exists and never travels through the pipeline.
 */
export class InputError extends Error {
  public readonly stage = 'request' as const;

  constructor(message: string) {
    super(message);
    this.name = 'InputError';
    Object.setPrototypeOf(this, InputError.prototype);
  }
}

/**
 * Error thrown when SQL generation produced nothing usable.
 */
export class GenerationError extends Error {
  public readonly stage = 'generation' as const;

  constructor(message: string) {
    super(message);
    this.name = 'GenerationError';
    Object.setPrototypeOf(this, GenerationError.prototype);
  }
}

/**
 * Error thrown when the text-generation service call fails.
 *
 * Common causes:
 * - Invalid or missing API key
 * - Local model server (e.g. Ollama) not running
 * - Request deadline exceeded
 */
export class LLMError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'LLMError';
    Object.setPrototypeOf(this, LLMError.prototype);
  }
}

/**
 * Error thrown when a SQL statement fails the read-only safety checks.
 */
export class SQLValidationError extends Error {
  public readonly stage = 'validate_sql' as const;

  constructor(message: string) {
    super(message);
    this.name = 'SQLValidationError';
    Object.setPrototypeOf(this, SQLValidationError.prototype);
  }
}

/**
 * Error thrown when the data store rejects or fails to run a statement.
 */
export class SQLExecutionError extends Error {
  public readonly stage = 'execute_sql' as const;
  public readonly sql?: string;

  constructor(message: string, sql?: string) {
    super(message);
    this.name = 'SQLExecutionError';
    this.sql = sql;
    Object.setPrototypeOf(this, SQLExecutionError.prototype);
  }
}

/**
 * Error thrown when environment configuration is invalid.
 */
export class ConfigError extends Error {
  public readonly issues: string[];

  constructor(issues: string[]) {
    super(`Configuration validation failed:\n${issues.map((i) => `  - ${i}`).join('\n')}`);
    this.name = 'ConfigError';
    this.issues = issues;
    Object.setPrototypeOf(this, ConfigError.prototype);
  }
}

/**
 * Extract a human-readable message from anything thrown.
 */
export function errorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
