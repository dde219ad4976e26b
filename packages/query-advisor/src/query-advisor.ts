/**
 * @querylens/query-advisor — Query advisor.
 *
 * Wires an ingestion session, the pattern detector and the recommendation
 * engine into one analysis pass that produces an {@link AdvisoryReport}.
 *
 * @module @querylens/query-advisor
 */

import { type QueryLensLogger, createLogger } from '@querylens/core';
import { IngestionSession, type QueryRecord } from '@querylens/query-log';
import { Subject } from 'rxjs';
import { type ResolvedAdvisorConfig, resolveAdvisorConfig } from './config.js';
import { PatternDetector } from './pattern-detector.js';
import { recommend } from './recommender.js';
import type {
  AdvisorEvent,
  AdvisoryReport,
  DetectedPattern,
  Finding,
  PatternKind,
  QueryAdvisorConfig,
  ShapeStats,
} from './types.js';

interface ShapeAccumulator {
  count: number;
  totalDurationMs: number;
  maxDurationMs: number;
}

/** State of one analyze() call */
interface AnalysisRun {
  session: IngestionSession;
  detector: PatternDetector;
  findings: Finding[];
  shapes: Map<string, ShapeAccumulator>;
  done: (context?: Record<string, unknown>) => void;
}

/**
 * Analyzes query logs for N+1 sequences, deep OFFSET pagination and
 * unfiltered full scans, and attaches a remediation to each finding.
 *
 * @example
 * ```ts
 * const advisor = createQueryAdvisor({ offsetThreshold: 500 });
 * advisor.events$.subscribe((event) => {
 *   if (event.type === 'pattern_detected') console.log(event.finding.recommendation.title);
 * });
 * const report = advisor.analyze(entries);
 * ```
 */
export class QueryAdvisor {
  private readonly config: ResolvedAdvisorConfig;
  private readonly logger: QueryLensLogger;
  private readonly events$$ = new Subject<AdvisorEvent>();
  private lastReport: AdvisoryReport | null = null;

  readonly events$ = this.events$$.asObservable();

  constructor(config: QueryAdvisorConfig = {}) {
    const { logger, ...settings } = config;
    this.config = resolveAdvisorConfig(settings);
    this.logger = logger ?? createLogger({ module: 'query-advisor' });
  }

  /**
   * Analyze an in-memory log.
   */
  analyze(entries: Iterable<unknown>): AdvisoryReport {
    const run = this.startRun();
    for (const record of run.session.ingest(entries)) {
      this.handleRecord(run, record);
    }
    return this.finishRun(run);
  }

  /**
   * Analyze a streamed log.
   */
  async analyzeAsync(entries: AsyncIterable<unknown> | Iterable<unknown>): Promise<AdvisoryReport> {
    const run = this.startRun();
    for await (const record of run.session.ingestAsync(entries)) {
      this.handleRecord(run, record);
    }
    return this.finishRun(run);
  }

  /** Get the most recent report */
  getLastReport(): AdvisoryReport | null {
    return this.lastReport;
  }

  /** Complete the event stream */
  destroy(): void {
    this.events$$.complete();
  }

  // ── Analysis Internals ────────────────────────────────

  private startRun(): AnalysisRun {
    const session = new IngestionSession({
      maxErrors: this.config.maxErrors,
      logger: this.logger,
      onMalformed: (error) => {
        this.events$$.next({ type: 'record_skipped', error });
      },
    });

    return {
      session,
      detector: new PatternDetector({
        minRunLength: this.config.minRunLength,
        offsetThreshold: this.config.offsetThreshold,
        fullScanRowThreshold: this.config.fullScanRowThreshold,
        slowQueryThresholdMs: this.config.slowQueryThresholdMs,
        enabledKinds: this.config.enabledKinds,
      }),
      findings: [],
      shapes: new Map(),
      done: this.logger.time('analysis'),
    };
  }

  private handleRecord(run: AnalysisRun, record: QueryRecord): void {
    const stats = run.shapes.get(record.shape);
    if (stats) {
      stats.count++;
      stats.totalDurationMs += record.durationMs;
      stats.maxDurationMs = Math.max(stats.maxDurationMs, record.durationMs);
    } else {
      run.shapes.set(record.shape, {
        count: 1,
        totalDurationMs: record.durationMs,
        maxDurationMs: record.durationMs,
      });
    }

    this.addFindings(run, run.detector.push(record));
  }

  private addFindings(run: AnalysisRun, patterns: DetectedPattern[]): void {
    for (const pattern of patterns) {
      const finding: Finding = { pattern, recommendation: recommend(pattern) };
      run.findings.push(finding);
      this.events$$.next({ type: 'pattern_detected', finding });
    }
  }

  private finishRun(run: AnalysisRun): AdvisoryReport {
    this.addFindings(run, run.detector.flush());

    const stats = run.session.stats;
    const summary: Record<PatternKind, number> = {
      n_plus_one: 0,
      offset_pagination: 0,
      full_scan: 0,
    };
    for (const finding of run.findings) {
      summary[finding.pattern.kind]++;
    }

    const report: AdvisoryReport = {
      sessionId: run.session.id,
      generatedAt: Date.now(),
      totalRecords: stats.accepted,
      skippedRecords: stats.skipped,
      malformed: stats.errors.map((error) => ({
        index: error.index,
        code: error.code,
        issues: [...error.issues],
      })),
      findings: run.findings,
      summary,
      topShapes: this.topShapes(run.shapes),
    };

    run.done({ records: report.totalRecords, findings: report.findings.length });
    if (report.skippedRecords > 0) {
      this.logger.warn('Skipped malformed records', { count: report.skippedRecords });
    }

    this.lastReport = report;
    this.events$$.next({ type: 'analysis_complete', report });
    return report;
  }

  private topShapes(shapes: Map<string, ShapeAccumulator>): ShapeStats[] {
    return Array.from(shapes.entries())
      .map(([shape, acc]) => ({
        shape,
        count: acc.count,
        totalDurationMs: acc.totalDurationMs,
        avgDurationMs: Math.round((acc.totalDurationMs / acc.count) * 100) / 100,
        maxDurationMs: acc.maxDurationMs,
      }))
      .sort((a, b) => b.count - a.count || b.totalDurationMs - a.totalDurationMs)
      .slice(0, this.config.topShapes);
  }
}

// ── Factory ───────────────────────────────────────────────

/** Create a query advisor */
export function createQueryAdvisor(config?: QueryAdvisorConfig): QueryAdvisor {
  return new QueryAdvisor(config);
}
