/**
 * Statement fingerprinting.
 *
 * @module @querylens/query-log/normalize
 */

/** String literals and comments, matched in one pass so each hides the other's quotes */
const LITERAL_OR_COMMENT = /'(?:[^']|'')*'|--[^\n]*|\/\*[\s\S]*?\*\//g;
const NUMERIC_LITERAL = /(?<![\w$])\d+(?:\.\d+)?(?:e[+-]?\d+)?\b/gi;
const POSITIONAL_PARAM = /\$\d+/g;
/**
 * `:name` binds, but not `::type` casts or the upper bound of a slice such
 * as `[1:n]`, whose lower bound may already be a `?`
 */
const NAMED_PARAM = /(?<![:\w?]):[A-Za-z_]\w*/g;
const IN_LIST = /\bIN\s*\(\s*\?(?:\s*,\s*\?)*\s*\)/gi;
const TRAILING = /[\s;]+$/;

/**
 * Replace string literals with `?` and comments with a space, leaving the
 * rest of the statement as written. Keywords and numbers that only appear
 * inside quotes or comments are gone afterwards.
 */
export function maskLiterals(sql: string): string {
  return sql.replace(LITERAL_OR_COMMENT, (match) => (match.startsWith("'") ? '?' : ' '));
}

/**
 * Reduce a SQL statement to its shape: literals and bind parameters become
 * `?`, comments are dropped, `IN` lists collapse to `IN (?)`, whitespace is
 * collapsed and the result is uppercased.
 *
 * Idempotent: a shape normalizes to itself.
 *
 * @example
 * ```ts
 * normalizeStatement("select * from orders where customer_id = 42");
 * // => 'SELECT * FROM ORDERS WHERE CUSTOMER_ID = ?'
 * ```
 */
export function normalizeStatement(sql: string): string {
  return maskLiterals(sql)
    .replace(POSITIONAL_PARAM, '?')
    .replace(NUMERIC_LITERAL, '?')
    .replace(NAMED_PARAM, '?')
    .replace(IN_LIST, 'IN (?)')
    .replace(/\s+/g, ' ')
    .replace(TRAILING, '')
    .trim()
    .toUpperCase();
}

/**
 * True when two statements differ only in literal values.
 */
export function isSameShape(a: string, b: string): boolean {
  return normalizeStatement(a) === normalizeStatement(b);
}
