/**
 * @querylens/query-log — Query log ingestion for QueryLens.
 *
 * Validates raw `(timestamp, sql, rowCount, durationMs)` entries, reduces
 * each statement to a shape fingerprint and assigns monotonic sequence
 * numbers. Malformed entries are skipped and counted.
 *
 * @example
 * ```ts
 * import { createIngestionSession, readQueryLog } from '@querylens/query-log';
 *
 * const session = createIngestionSession();
 * for await (const record of session.ingestAsync(readQueryLog('./queries.jsonl'))) {
 *   console.log(record.sequence, record.shape);
 * }
 * console.log(session.stats.skipped);
 * ```
 *
 * @module @querylens/query-log
 */

export type { IngestionOptions, IngestionStats, QueryRecord, RawQueryEntry } from './types.js';

export { isSameShape, maskLiterals, normalizeStatement } from './normalize.js';
export { parseRawEntry, type EntryParseResult } from './schema.js';
export { UnparseableLine, parseLogLine } from './log-line.js';
export { IngestionSession, createIngestionSession, ingestQueryLog } from './ingestion-session.js';
export { openQueryLog, readQueryLog, readQueryLogArray } from './log-source.js';
