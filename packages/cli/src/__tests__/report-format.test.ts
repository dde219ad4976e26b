import { createQueryAdvisor } from '@querylens/query-advisor';
import { describe, expect, it } from 'vitest';
import { formatJsonReport, formatTextReport } from '../report/format.js';

function analyzeLog(entries: unknown[]) {
  const advisor = createQueryAdvisor();
  try {
    return advisor.analyze(entries);
  } finally {
    advisor.destroy();
  }
}

const FULL_SCAN_LOG = [
  { timestamp: 1, sql: 'SELECT * FROM audit_log', rowCount: 20_000, durationMs: 150 },
  { timestamp: 2, sql: '  ', rowCount: 1, durationMs: 1 },
];

describe('formatTextReport', () => {
  it('should list findings, skipped records and top shapes', () => {
    const report = analyzeLog(FULL_SCAN_LOG);

    expect(formatTextReport(report).split('\n')).toEqual([
      `QueryLens report (session ${report.sessionId})`,
      'Records: 1 analyzed, 1 skipped',
      'Findings: 1 (n_plus_one 0, offset_pagination 0, full_scan 1)',
      '',
      '[WARNING] Unfiltered read of audit_log (confidence 0.8)',
      '  Statement #1 returned 20000 rows from audit_log with no WHERE or LIMIT clause (threshold 10000). ' +
        'Add a selective WHERE on an indexed column, or page through the rows with keyset pagination.',
      '  Statements: 1',
      '  Suggested: SELECT * FROM audit_log WHERE id > :lastSeen ORDER BY id LIMIT :pageSize',
      '',
      'Skipped records:',
      '  #1 QLENS_I100 sql: SQL text is empty',
      '',
      'Top shapes:',
      `${' '.repeat(7)}1  avg 150ms  max 150ms  SELECT * FROM AUDIT_LOG`,
      '',
    ]);
  });

  it('should say so when nothing was found', () => {
    const report = analyzeLog([{ timestamp: 1, sql: 'SELECT 1', rowCount: 1, durationMs: 1 }]);

    expect(formatTextReport(report)).toContain('\nNo problematic patterns found.\n');
  });

  it('should include index suggestions', () => {
    const report = analyzeLog([
      { timestamp: 1, sql: 'SELECT * FROM events ORDER BY id LIMIT 20 OFFSET 2000', rowCount: 20, durationMs: 5 },
    ]);

    expect(formatTextReport(report).split('\n')).toContain(
      '  Index: CREATE INDEX idx_events_id ON events (id)'
    );
  });
});

describe('formatJsonReport', () => {
  it('should list evidence by sequence', () => {
    const report = analyzeLog(FULL_SCAN_LOG);
    const parsed: unknown = JSON.parse(formatJsonReport(report));

    expect(parsed).toMatchObject({
      sessionId: report.sessionId,
      generatedAt: new Date(report.generatedAt).toISOString(),
      totalRecords: 1,
      skippedRecords: 1,
      summary: { n_plus_one: 0, offset_pagination: 0, full_scan: 1 },
      findings: [
        {
          kind: 'full_scan',
          confidence: 0.8,
          evidence: [1],
          details: { table: 'audit_log', rowCount: 20_000, threshold: 10_000 },
          recommendation: { severity: 'warning', relatedSequences: [1] },
        },
      ],
    });
  });
});
