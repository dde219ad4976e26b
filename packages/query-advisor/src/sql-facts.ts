/**
 * Lightweight facts pulled from SQL text with regular expressions.
 * Good enough for log statements; not a parser. Every extractor reads the
 * statement with string literals and comments masked out.
 *
 * @module @querylens/query-advisor/sql-facts
 */

import { maskLiterals } from '@querylens/query-log';

const IDENT = '[`"\\[]?([\\w$]+(?:\\.[\\w$]+)*)[`"\\]]?';

const TABLE_RE = new RegExp(`\\b(?:FROM|UPDATE|INTO)\\s+${IDENT}`, 'i');
const FILTER_RE = /\bWHERE\s+(?:[\w$]+\.)?[`"[]?([\w$]+)[`"\]]?\s*(?:=|\bIN\b)/i;
const ORDER_RE = /\bORDER\s+BY\s+(?:[\w$]+\.)?[`"[]?([\w$]+)/i;
const OFFSET_RE = /\bOFFSET\s+(\d+)/i;
const MYSQL_LIMIT_RE = /\bLIMIT\s+(\d+)\s*,\s*(\d+)/i;
const LIMIT_RE = /\bLIMIT\s+(\d+)\b(?!\s*,)/i;
const FETCH_RE = /\bFETCH\s+(?:FIRST|NEXT)\s+(\d+)/i;

/** First table named after FROM, UPDATE or INTO, without quoting */
export function extractTable(sql: string): string | null {
  return TABLE_RE.exec(maskLiterals(sql))?.[1] ?? null;
}

/** Column of the first `col = …` or `col IN (…)` predicate after WHERE */
export function extractFilterColumn(sql: string): string | null {
  return FILTER_RE.exec(maskLiterals(sql))?.[1] ?? null;
}

/** First ORDER BY column */
export function extractOrderColumn(sql: string): string | null {
  return ORDER_RE.exec(maskLiterals(sql))?.[1] ?? null;
}

export interface Pagination {
  offset: number;
  limit: number | null;
}

/**
 * Literal OFFSET and page size of a raw statement. Handles
 * `LIMIT n OFFSET m`, `OFFSET m ROWS FETCH NEXT n ROWS ONLY` and MySQL's
 * `LIMIT m, n`. Returns `null` when the offset is not a literal.
 */
export function extractPagination(sql: string): Pagination | null {
  const code = maskLiterals(sql);
  const mysql = MYSQL_LIMIT_RE.exec(code);
  if (mysql?.[1] !== undefined && mysql[2] !== undefined) {
    return { offset: Number(mysql[1]), limit: Number(mysql[2]) };
  }

  const offset = OFFSET_RE.exec(code)?.[1];
  if (offset === undefined) return null;

  const limit = LIMIT_RE.exec(code)?.[1] ?? FETCH_RE.exec(code)?.[1];
  return { offset: Number(offset), limit: limit === undefined ? null : Number(limit) };
}

/** Shape carries an OFFSET clause (`OFFSET ?` or `LIMIT ?, ?`) */
export function hasOffsetClause(shape: string): boolean {
  return /\bOFFSET\s+\?/.test(shape) || /\bLIMIT\s+\?\s*,\s*\?/.test(shape);
}

/** SELECT with neither a WHERE nor any row cap */
export function isUnboundedSelect(shape: string): boolean {
  if (!/^SELECT\b/.test(shape)) return false;
  return !/\b(?:WHERE|LIMIT|TOP)\b/.test(shape) && !/\bFETCH\s+(?:FIRST|NEXT)\b/.test(shape);
}

/** `id`, `author_id`, `authorId` */
export function isKeyLikeColumn(column: string): boolean {
  return /^id$|_id$/i.test(column) || /[a-z0-9]Id$/.test(column);
}
