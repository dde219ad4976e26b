/**
 * @querylens/query-advisor — Pattern detector.
 *
 * Single pass over a session's records in sequence order. Tracks the
 * current run of same-shape records and the record before it; a run long
 * enough after a differently shaped parent is an N+1 sequence. OFFSET and
 * full-scan rules look at one record at a time.
 *
 * @module @querylens/query-advisor
 */

import { QueryLensError } from '@querylens/core';
import type { QueryRecord } from '@querylens/query-log';
import { type ResolvedDetectorConfig, resolveDetectorConfig } from './config.js';
import {
  extractFilterColumn,
  extractOrderColumn,
  extractPagination,
  extractTable,
  hasOffsetClause,
  isKeyLikeColumn,
  isUnboundedSelect,
} from './sql-facts.js';
import type {
  DetectedPattern,
  DetectorConfig,
  FullScanPattern,
  NPlusOnePattern,
  OffsetPaginationPattern,
  PatternKind,
} from './types.js';

function round2(value: number): number {
  return Math.round(value * 100) / 100;
}

function anchorOf(pattern: DetectedPattern): number {
  return pattern.evidence[0]?.sequence ?? 0;
}

/**
 * Streaming detector. Feed records with {@link push}, end the stream with
 * {@link flush}. Patterns come out ordered by the sequence of their first
 * evidence record; a pattern is held back only while the open run could
 * still produce an N+1 pattern anchored before it.
 */
export class PatternDetector {
  private readonly config: ResolvedDetectorConfig;
  private readonly enabled: ReadonlySet<PatternKind>;
  private parent: QueryRecord | null = null;
  private run: QueryRecord[] = [];
  private pending: DetectedPattern[] = [];
  private sessionId: string | null = null;
  private lastSequence = 0;

  constructor(config: DetectorConfig = {}) {
    this.config = resolveDetectorConfig(config);
    this.enabled = new Set(this.config.enabledKinds);
  }

  /**
   * Add the next record. Returns the patterns that can be released.
   */
  push(record: QueryRecord): DetectedPattern[] {
    this.checkOrder(record);

    const head = this.run[0];
    if (head && head.shape === record.shape) {
      this.run.push(record);
    } else {
      this.closeRun();
      this.parent = this.run[this.run.length - 1] ?? null;
      this.run = [record];
    }

    this.detectOffsetPagination(record);
    this.detectFullScan(record);

    return this.release();
  }

  /**
   * End of input: close the open run and release everything.
   */
  flush(): DetectedPattern[] {
    this.closeRun();
    this.parent = null;
    this.run = [];

    const released = this.pending;
    this.pending = [];
    return released;
  }

  /**
   * Run the detector over a whole sequence, lazily.
   */
  *scan(records: Iterable<QueryRecord>): Generator<DetectedPattern, void, undefined> {
    for (const record of records) {
      yield* this.push(record);
    }
    yield* this.flush();
  }

  // ── Rules ─────────────────────────────────────────────

  private closeRun(): void {
    const parent = this.parent;
    const children = this.run;
    if (!this.enabled.has('n_plus_one') || !parent) return;
    if (children.length < this.config.minRunLength) return;

    const first = children[0];
    const filterColumn = first ? extractFilterColumn(first.statement) : null;

    const pattern: NPlusOnePattern = {
      kind: 'n_plus_one',
      evidence: [parent, ...children],
      confidence: this.nPlusOneConfidence(parent, children, filterColumn),
      details: {
        parentTable: extractTable(parent.statement),
        childTable: first ? extractTable(first.statement) : null,
        filterColumn,
        childCount: children.length,
      },
    };
    this.insert(pattern);
  }

  private nPlusOneConfidence(
    parent: QueryRecord,
    children: readonly QueryRecord[],
    filterColumn: string | null
  ): number {
    let score = 0.5;
    const childCount = children.length;

    if (parent.rowCount === childCount) {
      score += 0.3;
    } else if (parent.rowCount > 0) {
      const ratio = childCount / parent.rowCount;
      if (ratio >= 0.8 && ratio <= 1.2) score += 0.15;
    }

    if (new Set(children.map((c) => c.statement)).size === childCount) {
      score += 0.1;
    }

    if (filterColumn && isKeyLikeColumn(filterColumn)) {
      score += 0.1;
    }

    return round2(Math.min(score, 1));
  }

  private detectOffsetPagination(record: QueryRecord): void {
    if (!this.enabled.has('offset_pagination') || !hasOffsetClause(record.shape)) return;

    const page = extractPagination(record.statement);
    const threshold = this.config.offsetThreshold;
    if (!page || page.offset <= threshold) return;

    const pattern: OffsetPaginationPattern = {
      kind: 'offset_pagination',
      evidence: [record],
      confidence: round2(Math.min(1, 0.5 + (0.05 * page.offset) / Math.max(threshold, 1))),
      details: {
        table: extractTable(record.statement),
        offset: page.offset,
        limit: page.limit,
        orderColumn: extractOrderColumn(record.statement),
        threshold,
      },
    };
    this.pending.push(pattern);
  }

  private detectFullScan(record: QueryRecord): void {
    const threshold = this.config.fullScanRowThreshold;
    if (!this.enabled.has('full_scan') || record.rowCount < threshold) return;
    if (!isUnboundedSelect(record.shape)) return;

    let score = 0.6;
    if (record.durationMs >= this.config.slowQueryThresholdMs) score += 0.2;
    if (record.rowCount >= threshold * 10) score += 0.2;

    const pattern: FullScanPattern = {
      kind: 'full_scan',
      evidence: [record],
      confidence: round2(Math.min(score, 1)),
      details: {
        table: extractTable(record.statement),
        rowCount: record.rowCount,
        threshold,
      },
    };
    this.pending.push(pattern);
  }

  // ── Ordering ──────────────────────────────────────────

  /** Insert keeping anchor order; equal anchors keep detection order */
  private insert(pattern: DetectedPattern): void {
    const anchor = anchorOf(pattern);
    let index = this.pending.length;
    while (index > 0) {
      const previous = this.pending[index - 1];
      if (previous && anchorOf(previous) <= anchor) break;
      index--;
    }
    this.pending.splice(index, 0, pattern);
  }

  private release(): DetectedPattern[] {
    const horizon =
      this.enabled.has('n_plus_one') && this.parent ? this.parent.sequence : Number.POSITIVE_INFINITY;

    let count = 0;
    while (count < this.pending.length) {
      const pattern = this.pending[count];
      if (!pattern || anchorOf(pattern) > horizon) break;
      count++;
    }
    return this.pending.splice(0, count);
  }

  private checkOrder(record: QueryRecord): void {
    if (this.sessionId === null) {
      this.sessionId = record.sessionId;
    } else if (record.sessionId !== this.sessionId) {
      throw new QueryLensError('QLENS_I102', {
        context: { expected: this.sessionId, received: record.sessionId },
      });
    }

    if (record.sequence <= this.lastSequence) {
      throw new QueryLensError('QLENS_D400', {
        context: { previous: this.lastSequence, received: record.sequence },
      });
    }
    this.lastSequence = record.sequence;
  }
}

/**
 * Detect every pattern in a finished sequence of records.
 */
export function detectPatterns(
  records: Iterable<QueryRecord>,
  config?: DetectorConfig
): DetectedPattern[] {
  return Array.from(new PatternDetector(config).scan(records));
}
