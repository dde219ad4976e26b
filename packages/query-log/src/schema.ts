/**
 * Validation of raw log entries.
 *
 * @module @querylens/query-log/schema
 */

import { z } from 'zod';
import type { RawQueryEntry } from './types.js';

const timestampSchema = z.union(
  [
    z.number().finite().nonnegative(),
    z
      .string()
      .datetime({ offset: true })
      .transform((value) => Date.parse(value)),
    z.date().transform((value) => value.getTime()),
  ],
  { required_error: 'Required' }
);

const sqlSchema = z.string().refine((value) => value.trim().length > 0, 'SQL text is empty');
const rowCountSchema = z.number().int().nonnegative();
const durationSchema = z.number().finite().nonnegative();

const objectEntrySchema = z.object({
  timestamp: timestampSchema,
  sql: sqlSchema,
  rowCount: rowCountSchema,
  durationMs: durationSchema,
});

const tupleEntrySchema = z
  .tuple([timestampSchema, sqlSchema, rowCountSchema, durationSchema])
  .transform(([timestamp, sql, rowCount, durationMs]) => ({ timestamp, sql, rowCount, durationMs }));

export type EntryParseResult =
  | { success: true; entry: RawQueryEntry }
  | { success: false; issues: string[] };

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** Accept snake_case metadata keys as emitted by most SQL loggers */
function withCamelCaseKeys(value: Record<string, unknown>): Record<string, unknown> {
  return {
    ...value,
    rowCount: value['rowCount'] ?? value['row_count'],
    durationMs: value['durationMs'] ?? value['duration_ms'],
  };
}

function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => {
    const path = issue.path.length > 0 ? issue.path.join('.') : '(root)';
    return `${path}: ${issue.message}`;
  });
}

/**
 * Validate one raw log entry (object or 4-tuple).
 */
export function parseRawEntry(value: unknown): EntryParseResult {
  const result = Array.isArray(value)
    ? tupleEntrySchema.safeParse(value)
    : objectEntrySchema.safeParse(isRecord(value) ? withCamelCaseKeys(value) : value);

  if (!result.success) {
    return { success: false, issues: formatIssues(result.error) };
  }
  return { success: true, entry: result.data };
}
