/**
 * @querylens/query-advisor — Query log advisor for QueryLens.
 *
 * Detects N+1 query sequences, deep OFFSET pagination and unfiltered full
 * scans in a log of executed statements, and maps each finding to a
 * remediation (JOIN FETCH or batched loading, keyset pagination, indexes).
 *
 * @example
 * ```ts
 * import { createQueryAdvisor } from '@querylens/query-advisor';
 *
 * const advisor = createQueryAdvisor({ offsetThreshold: 1000 });
 *
 * const report = advisor.analyze([
 *   { timestamp: 1, sql: 'SELECT * FROM authors', rowCount: 2, durationMs: 3 },
 *   { timestamp: 2, sql: 'SELECT * FROM books WHERE author_id = 1', rowCount: 4, durationMs: 1 },
 *   { timestamp: 3, sql: 'SELECT * FROM books WHERE author_id = 2', rowCount: 1, durationMs: 1 },
 * ]);
 *
 * console.log(report.findings[0]?.recommendation.text);
 * ```
 *
 * @module @querylens/query-advisor
 */

// Types
export type {
  AdvisorEvent,
  AdvisoryReport,
  DetectedPattern,
  DetectorConfig,
  Finding,
  FullScanDetails,
  FullScanPattern,
  MalformedSummary,
  NPlusOneDetails,
  NPlusOnePattern,
  OffsetPaginationDetails,
  OffsetPaginationPattern,
  PatternKind,
  QueryAdvisorConfig,
  Recommendation,
  Severity,
  ShapeStats,
} from './types.js';
export { PATTERN_KINDS } from './types.js';

// Configuration
export {
  advisorConfigSchema,
  detectorConfigSchema,
  resolveAdvisorConfig,
  resolveDetectorConfig,
  type ResolvedAdvisorConfig,
  type ResolvedDetectorConfig,
} from './config.js';

// Detection
export { PatternDetector, detectPatterns } from './pattern-detector.js';
export {
  extractFilterColumn,
  extractOrderColumn,
  extractPagination,
  extractTable,
  type Pagination,
} from './sql-facts.js';

// Recommendations
export { indexName, recommend } from './recommender.js';
export { RECOMMENDATION_TEMPLATES, type RecommendationTemplate } from './recommendation-templates.js';

// Advisor
export { QueryAdvisor, createQueryAdvisor } from './query-advisor.js';
