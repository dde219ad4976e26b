import { type QueryRecord, ingestQueryLog } from '@querylens/query-log';
import { describe, expect, it } from 'vitest';
import { detectPatterns } from '../pattern-detector.js';
import { indexName, recommend } from '../recommender.js';
import type { DetectedPattern, NPlusOnePattern } from '../types.js';

function q(sql: string, rowCount = 1, durationMs = 1) {
  return { timestamp: 1_000, sql, rowCount, durationMs };
}

function records(...entries: ReturnType<typeof q>[]): QueryRecord[] {
  return ingestQueryLog(entries).records;
}

function onlyPattern(...entries: ReturnType<typeof q>[]): DetectedPattern {
  const [pattern] = detectPatterns(records(...entries));
  if (!pattern) throw new Error('expected a pattern');
  return pattern;
}

describe('recommend', () => {
  describe('n_plus_one', () => {
    const pattern = onlyPattern(
      q('SELECT * FROM authors', 3),
      q('SELECT * FROM books WHERE author_id = 1'),
      q('SELECT * FROM books WHERE author_id = 2'),
      q('SELECT * FROM books WHERE author_id = 3')
    );

    it('should suggest batched loading and an index on the foreign key', () => {
      const rec = recommend(pattern);

      expect(rec).toEqual({
        kind: 'n_plus_one',
        severity: 'warning',
        title: 'N+1 queries on books',
        text:
          'Statement #1 read 3 row(s) from authors and was followed by 3 queries of the same shape ' +
          'on books, one per parent row. Load the children in one round trip: JOIN FETCH them with ' +
          'the parent query, or run a single batched query with author_id IN (...) over the parent keys.',
        suggestedAction: 'SELECT * FROM books WHERE author_id IN (:parentKeys)',
        indexSuggestion: 'CREATE INDEX idx_books_author_id ON books (author_id)',
        relatedSequences: [1, 2, 3, 4],
      });
    });

    it('should be deterministic', () => {
      expect(recommend(pattern)).toEqual(recommend(pattern));
    });

    it('should escalate long runs to critical', () => {
      const entries = [q('SELECT * FROM authors', 10)];
      for (let i = 1; i <= 10; i++) entries.push(q(`SELECT * FROM books WHERE author_id = ${i}`));

      expect(recommend(onlyPattern(...entries)).severity).toBe('critical');
    });

    it('should fall back to generic wording when tables are unknown', () => {
      const evidence = records(q('SELECT 1'), q('SELECT 2'), q('SELECT 3'));
      const unknown: NPlusOnePattern = {
        kind: 'n_plus_one',
        evidence,
        confidence: 0.5,
        details: { parentTable: null, childTable: null, filterColumn: null, childCount: 2 },
      };

      const rec = recommend(unknown);

      expect(rec.title).toBe('N+1 queries on the child table');
      expect(rec.text).toContain('run a single batched query with the foreign key IN (...)');
      expect(rec.suggestedAction).toBeUndefined();
      expect(rec.indexSuggestion).toBeUndefined();
    });
  });

  describe('offset_pagination', () => {
    it('should suggest a keyset rewrite on the order column', () => {
      const rec = recommend(onlyPattern(q('SELECT * FROM events ORDER BY created_at LIMIT 50 OFFSET 12000')));

      expect(rec.severity).toBe('critical');
      expect(rec.title).toBe('Deep OFFSET pagination on events');
      expect(rec.text).toBe(
        'Statement #1 skips 12000 rows with OFFSET (threshold 1000). The database reads and discards ' +
          'every skipped row, so each later page is slower. Use keyset pagination: keep the last ' +
          'created_at of the previous page and filter on it.'
      );
      expect(rec.suggestedAction).toBe(
        'SELECT * FROM events WHERE created_at > :lastSeen ORDER BY created_at LIMIT 50'
      );
      expect(rec.indexSuggestion).toBe('CREATE INDEX idx_events_created_at ON events (created_at)');
    });

    it('should use a page size placeholder when there is no LIMIT', () => {
      const rec = recommend(onlyPattern(q('SELECT * FROM events ORDER BY id OFFSET 3000')));

      expect(rec.severity).toBe('warning');
      expect(rec.suggestedAction).toBe(
        'SELECT * FROM events WHERE id > :lastSeen ORDER BY id LIMIT :pageSize'
      );
    });

    it('should omit the rewrite when there is no ORDER BY', () => {
      const rec = recommend(onlyPattern(q('SELECT * FROM events LIMIT 10 OFFSET 3000')));

      expect(rec.text).toContain('keep the last sort key of the previous page');
      expect(rec.suggestedAction).toBeUndefined();
      expect(rec.indexSuggestion).toBeUndefined();
    });
  });

  describe('full_scan', () => {
    it('should suggest filtering or paging', () => {
      const rec = recommend(onlyPattern(q('SELECT * FROM audit_log', 20_000)));

      expect(rec).toEqual({
        kind: 'full_scan',
        severity: 'warning',
        title: 'Unfiltered read of audit_log',
        text:
          'Statement #1 returned 20000 rows from audit_log with no WHERE or LIMIT clause ' +
          '(threshold 10000). Add a selective WHERE on an indexed column, or page through the rows ' +
          'with keyset pagination.',
        suggestedAction: 'SELECT * FROM audit_log WHERE id > :lastSeen ORDER BY id LIMIT :pageSize',
        relatedSequences: [1],
      });
    });
  });
});

describe('indexName', () => {
  it('should build a lowercase identifier', () => {
    expect(indexName('public.Orders', 'customerId')).toBe('idx_public_orders_customerid');
  });

  it('should return null when a part is unknown', () => {
    expect(indexName(null, 'id')).toBeNull();
  });
});
