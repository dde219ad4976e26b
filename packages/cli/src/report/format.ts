/**
 * @querylens/cli - Report formatting
 *
 * @module @querylens/cli/report
 */

import type { AdvisoryReport, Finding, ShapeStats } from '@querylens/query-advisor';

function formatFinding(finding: Finding): string[] {
  const { pattern, recommendation } = finding;
  const lines = [
    `[${recommendation.severity.toUpperCase()}] ${recommendation.title} (confidence ${pattern.confidence})`,
    `  ${recommendation.text}`,
    `  Statements: ${recommendation.relatedSequences.join(', ')}`,
  ];
  if (recommendation.suggestedAction) {
    lines.push(`  Suggested: ${recommendation.suggestedAction}`);
  }
  if (recommendation.indexSuggestion) {
    lines.push(`  Index: ${recommendation.indexSuggestion}`);
  }
  return lines;
}

function formatShape(stats: ShapeStats): string {
  return `  ${String(stats.count).padStart(6)}  avg ${stats.avgDurationMs}ms  max ${stats.maxDurationMs}ms  ${stats.shape}`;
}

/**
 * Human-readable report
 */
export function formatTextReport(report: AdvisoryReport): string {
  const { summary } = report;
  const lines = [
    `QueryLens report (session ${report.sessionId})`,
    `Records: ${report.totalRecords} analyzed, ${report.skippedRecords} skipped`,
    `Findings: ${report.findings.length} (n_plus_one ${summary.n_plus_one}, offset_pagination ${summary.offset_pagination}, full_scan ${summary.full_scan})`,
    '',
  ];

  if (report.findings.length === 0) {
    lines.push('No problematic patterns found.', '');
  }
  for (const finding of report.findings) {
    lines.push(...formatFinding(finding), '');
  }

  if (report.malformed.length > 0) {
    lines.push('Skipped records:');
    for (const entry of report.malformed) {
      lines.push(`  #${entry.index} ${entry.code} ${entry.issues.join('; ')}`);
    }
    lines.push('');
  }

  if (report.topShapes.length > 0) {
    lines.push('Top shapes:');
    lines.push(...report.topShapes.map(formatShape));
    lines.push('');
  }

  return lines.join('\n');
}

/**
 * Machine-readable report. Evidence is listed by sequence number.
 */
export function formatJsonReport(report: AdvisoryReport): string {
  return JSON.stringify(
    {
      ...report,
      generatedAt: new Date(report.generatedAt).toISOString(),
      findings: report.findings.map(({ pattern, recommendation }) => ({
        kind: pattern.kind,
        confidence: pattern.confidence,
        evidence: pattern.evidence.map((record) => record.sequence),
        details: pattern.details,
        recommendation,
      })),
    },
    null,
    2
  );
}
