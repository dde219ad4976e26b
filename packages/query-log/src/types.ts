/**
 * Type definitions for query log ingestion.
 *
 * @module @querylens/query-log/types
 */

import type { MalformedRecordError, QueryLensLogger } from '@querylens/core';

/**
 * One executed statement as it arrives from an external log source,
 * after validation. Raw input may be an object with these keys
 * (or `row_count` / `duration_ms`), or a `[timestamp, sql, rowCount, durationMs]` tuple.
 */
export interface RawQueryEntry {
  /** Epoch milliseconds */
  timestamp: number;
  sql: string;
  rowCount: number;
  durationMs: number;
}

/**
 * An ingested statement. Frozen on creation and owned by exactly one
 * ingestion session.
 */
export interface QueryRecord {
  readonly sessionId: string;
  /** Monotonic position within the session, starting at 1 */
  readonly sequence: number;
  /** Normalized statement shape with literals replaced by `?` */
  readonly shape: string;
  /** The statement exactly as logged */
  readonly statement: string;
  readonly rowCount: number;
  readonly durationMs: number;
  readonly timestamp: number;
}

export interface IngestionOptions {
  /** How many skip errors to retain (default: 100). Skips are always counted. */
  maxErrors?: number;
  /** Called for every skipped entry */
  onMalformed?: (error: MalformedRecordError) => void;
  logger?: QueryLensLogger;
}

export interface IngestionStats {
  readonly accepted: number;
  readonly skipped: number;
  readonly errors: readonly MalformedRecordError[];
}
