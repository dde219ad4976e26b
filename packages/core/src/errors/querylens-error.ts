/**
 * Errors raised by QueryLens packages. Each carries a stable code whose
 * table entry supplies the default message and a suggestion.
 */

import { ERROR_CODES, type ErrorCode } from './error-codes.js';

export interface QueryLensErrorDetails {
  /** Replaces the code's default message */
  message?: string;
  context?: Record<string, unknown>;
  cause?: Error;
}

export class QueryLensError extends Error {
  readonly code: ErrorCode;
  readonly suggestion: string;
  /** Values that identify the failing input: a path, an index, a sequence */
  readonly context: Record<string, unknown>;
  override readonly cause?: Error;

  constructor(code: ErrorCode, details: QueryLensErrorDetails = {}) {
    super(details.message ?? ERROR_CODES[code].message, { cause: details.cause });

    this.name = 'QueryLensError';
    this.code = code;
    this.suggestion = ERROR_CODES[code].suggestion;
    this.context = details.context ?? {};
    this.cause = details.cause;
  }

  /**
   * Multi-line form printed by `querylens --debug`:
   *
   * ```
   * [QLENS_S300] Query log not found: ./queries.jsonl
   * Context: {"path":"./queries.jsonl"}
   * Suggestion: Check the path passed to the analyze command.
   * ```
   */
  format(): string {
    const lines = [`[${this.code}] ${this.message}`];
    if (Object.keys(this.context).length > 0) {
      lines.push(`Context: ${JSON.stringify(this.context)}`);
    }
    lines.push(`Suggestion: ${this.suggestion}`);
    return lines.join('\n');
  }
}

/**
 * A log entry that failed validation. Skipped and counted by the ingestor.
 */
export class MalformedRecordError extends QueryLensError {
  /** Zero-based position of the entry in its source */
  readonly index: number;
  readonly issues: string[];

  constructor(index: number, issues: string[], options: { code?: ErrorCode; cause?: Error } = {}) {
    super(options.code ?? 'QLENS_I100', {
      message: `Malformed record at index ${index}: ${issues.join('; ')}`,
      context: { index, issues },
      cause: options.cause,
    });

    this.name = 'MalformedRecordError';
    this.index = index;
    this.issues = issues;
  }
}

/**
 * Invalid advisor or CLI configuration. With a cause, the file itself
 * could not be read.
 */
export class ConfigError extends QueryLensError {
  readonly issues: string[];

  constructor(issues: string[], context?: Record<string, unknown>, cause?: Error) {
    super(cause ? 'QLENS_C201' : 'QLENS_C200', {
      message: `Invalid configuration: ${issues.join('; ')}`,
      context: { ...context, issues },
      cause,
    });

    this.name = 'ConfigError';
    this.issues = issues;
  }
}

export class LogSourceError extends QueryLensError {
  readonly path: string;

  constructor(path: string, code: 'QLENS_S300' | 'QLENS_S301' = 'QLENS_S300', cause?: Error) {
    super(code, {
      message:
        code === 'QLENS_S300'
          ? `Query log not found: ${path}`
          : `Query log could not be read: ${path}${cause ? ` (${cause.message})` : ''}`,
      context: { path },
      cause,
    });

    this.name = 'LogSourceError';
    this.path = path;
  }
}

/**
 * Turn anything thrown into a QueryLensError, keeping the original
 * message and, for `Error` values, the original as `cause`.
 */
export function ensureQueryLensError(error: unknown): QueryLensError {
  if (error instanceof QueryLensError) return error;
  if (error instanceof Error) {
    return new QueryLensError('QLENS_X900', { message: error.message, cause: error });
  }
  return new QueryLensError('QLENS_X900', { message: String(error) });
}
