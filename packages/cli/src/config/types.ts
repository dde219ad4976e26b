/**
 * @querylens/cli - Configuration Types
 *
 * Type definitions for querylens.config.json.
 *
 * @module @querylens/cli/config
 */

import type { PatternKind } from '@querylens/query-advisor';

/**
 * Report output format
 */
export type ReportFormat = 'text' | 'json';

/**
 * QueryLens CLI configuration
 */
export interface QueryLensConfig {
  /** Report format (default: 'text') */
  format?: ReportFormat;
  /** Minimum same-shape run after a parent to report N+1 */
  minRunLength?: number;
  /** OFFSET values above this are flagged */
  offsetThreshold?: number;
  /** Unfiltered SELECTs returning at least this many rows are flagged */
  fullScanRowThreshold?: number;
  /** Duration that raises full-scan confidence, in ms */
  slowQueryThresholdMs?: number;
  /** Rules to run */
  enabledKinds?: PatternKind[];
  /** Malformed entries kept in the report */
  maxErrors?: number;
  /** Shapes listed in the report */
  topShapes?: number;
  /** Exit with code 2 when anything was found */
  failOnFindings?: boolean;
}
