/**
 * @querylens/query-log — Ingestion session.
 *
 * Validates raw log entries, fingerprints their statements and hands out
 * immutable, sequenced records. Malformed entries are skipped and counted.
 *
 * @module @querylens/query-log
 */

import { MalformedRecordError, type QueryLensLogger, createLogger } from '@querylens/core';
import { UnparseableLine } from './log-line.js';
import { normalizeStatement } from './normalize.js';
import { parseRawEntry } from './schema.js';
import type { IngestionOptions, IngestionStats, QueryRecord, RawQueryEntry } from './types.js';

let sessionIdCounter = 0;

const DEFAULT_MAX_ERRORS = 100;

/**
 * One pass over one log source. Sequence numbers start at 1 and stay
 * contiguous across skipped entries.
 */
export class IngestionSession {
  readonly id: string;

  private readonly maxErrors: number;
  private readonly onMalformed?: (error: MalformedRecordError) => void;
  private readonly logger: QueryLensLogger;
  private readonly errors: MalformedRecordError[] = [];
  private sequence = 0;
  private position = 0;
  private skipped = 0;

  constructor(options: IngestionOptions = {}) {
    this.id = `ses_${++sessionIdCounter}`;
    this.maxErrors = options.maxErrors ?? DEFAULT_MAX_ERRORS;
    this.onMalformed = options.onMalformed;
    this.logger = (options.logger ?? createLogger({ module: 'query-log' })).child('ingest');
  }

  /**
   * Lazily ingest a synchronous sequence of raw entries.
   */
  *ingest(entries: Iterable<unknown>): Generator<QueryRecord, void, undefined> {
    for (const value of entries) {
      const record = this.accept(value);
      if (record) yield record;
    }
  }

  /**
   * Lazily ingest a streamed sequence of raw entries.
   */
  async *ingestAsync(
    entries: AsyncIterable<unknown> | Iterable<unknown>
  ): AsyncGenerator<QueryRecord, void, undefined> {
    for await (const value of entries) {
      const record = this.accept(value);
      if (record) yield record;
    }
  }

  /**
   * Ingest a single raw entry. Returns `null` when the entry is malformed.
   */
  accept(value: unknown): QueryRecord | null {
    const index = this.position++;

    if (value instanceof UnparseableLine) {
      this.skip(new MalformedRecordError(index, [value.reason], { code: 'QLENS_I101' }));
      return null;
    }

    const parsed = parseRawEntry(value);
    if (!parsed.success) {
      this.skip(new MalformedRecordError(index, parsed.issues));
      return null;
    }

    return this.createRecord(parsed.entry);
  }

  /** True when the record was produced by this session */
  owns(record: QueryRecord): boolean {
    return record.sessionId === this.id;
  }

  get stats(): IngestionStats {
    return {
      accepted: this.sequence,
      skipped: this.skipped,
      errors: [...this.errors],
    };
  }

  // ── Internals ─────────────────────────────────────────

  private createRecord(entry: RawQueryEntry): QueryRecord {
    return Object.freeze({
      sessionId: this.id,
      sequence: ++this.sequence,
      shape: normalizeStatement(entry.sql),
      statement: entry.sql,
      rowCount: entry.rowCount,
      durationMs: entry.durationMs,
      timestamp: entry.timestamp,
    });
  }

  private skip(error: MalformedRecordError): void {
    this.skipped++;
    if (this.errors.length < this.maxErrors) {
      this.errors.push(error);
    }
    this.logger.debug('Skipped malformed record', {
      index: error.index,
      code: error.code,
      issues: error.issues,
    });
    this.onMalformed?.(error);
  }
}

/** Open a new ingestion session */
export function createIngestionSession(options?: IngestionOptions): IngestionSession {
  return new IngestionSession(options);
}

/**
 * Ingest a whole in-memory log in one call.
 */
export function ingestQueryLog(
  entries: Iterable<unknown>,
  options?: IngestionOptions
): { sessionId: string; records: QueryRecord[]; stats: IngestionStats } {
  const session = new IngestionSession(options);
  const records = Array.from(session.ingest(entries));
  return { sessionId: session.id, records, stats: session.stats };
}
