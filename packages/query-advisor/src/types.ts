/**
 * @querylens/query-advisor — Types for pattern detection and recommendations.
 *
 * @module @querylens/query-advisor
 */

import type { QueryLensLogger, MalformedRecordError } from '@querylens/core';
import type { QueryRecord } from '@querylens/query-log';

// ── Pattern Types ─────────────────────────────────────────

export type PatternKind = 'n_plus_one' | 'offset_pagination' | 'full_scan';

export const PATTERN_KINDS: readonly PatternKind[] = ['n_plus_one', 'offset_pagination', 'full_scan'];

export interface NPlusOneDetails {
  parentTable: string | null;
  childTable: string | null;
  /** Column the child queries filter on, when a simple `col = ?` predicate exists */
  filterColumn: string | null;
  childCount: number;
}

export interface OffsetPaginationDetails {
  table: string | null;
  offset: number;
  limit: number | null;
  orderColumn: string | null;
  threshold: number;
}

export interface FullScanDetails {
  table: string | null;
  rowCount: number;
  threshold: number;
}

interface PatternOf<K extends PatternKind, D> {
  kind: K;
  /** The session's own records, ordered by sequence */
  evidence: readonly QueryRecord[];
  /** 0..1, two decimals */
  confidence: number;
  details: D;
}

export type NPlusOnePattern = PatternOf<'n_plus_one', NPlusOneDetails>;
export type OffsetPaginationPattern = PatternOf<'offset_pagination', OffsetPaginationDetails>;
export type FullScanPattern = PatternOf<'full_scan', FullScanDetails>;

export type DetectedPattern = NPlusOnePattern | OffsetPaginationPattern | FullScanPattern;

export interface DetectorConfig {
  /** Minimum consecutive same-shape records after a parent (default: 2) */
  minRunLength?: number;
  /** OFFSET values above this are flagged (default: 1000) */
  offsetThreshold?: number;
  /** Unfiltered SELECTs returning at least this many rows are flagged (default: 10000) */
  fullScanRowThreshold?: number;
  /** Duration that raises full-scan confidence (ms, default: 100) */
  slowQueryThresholdMs?: number;
  /** Rules to run (default: all) */
  enabledKinds?: readonly PatternKind[];
}

// ── Recommendation Types ──────────────────────────────────

export type Severity = 'critical' | 'warning' | 'info';

export interface Recommendation {
  kind: PatternKind;
  severity: Severity;
  title: string;
  text: string;
  suggestedAction?: string;
  indexSuggestion?: string;
  relatedSequences: number[];
}

// ── Report Types ──────────────────────────────────────────

export interface Finding {
  pattern: DetectedPattern;
  recommendation: Recommendation;
}

export interface ShapeStats {
  shape: string;
  count: number;
  totalDurationMs: number;
  avgDurationMs: number;
  maxDurationMs: number;
}

export interface MalformedSummary {
  index: number;
  code: string;
  issues: string[];
}

export interface AdvisoryReport {
  sessionId: string;
  generatedAt: number;
  totalRecords: number;
  skippedRecords: number;
  malformed: MalformedSummary[];
  findings: Finding[];
  summary: Record<PatternKind, number>;
  topShapes: ShapeStats[];
}

export interface QueryAdvisorConfig extends DetectorConfig {
  /** Retained malformed-entry details (default: 100) */
  maxErrors?: number;
  /** Shapes listed in the report (default: 10) */
  topShapes?: number;
  logger?: QueryLensLogger;
}

export type AdvisorEvent =
  | { type: 'record_skipped'; error: MalformedRecordError }
  | { type: 'pattern_detected'; finding: Finding }
  | { type: 'analysis_complete'; report: AdvisoryReport };
