/**
 * Remediation text per pattern kind. `{name}` placeholders are filled
 * from the pattern's details and evidence.
 */

import type { PatternKind } from './types.js';

export interface RecommendationTemplate {
  title: string;
  text: string;
  /** Rendered only when every placeholder it uses is known */
  action: string;
  index?: string;
}

export const RECOMMENDATION_TEMPLATES: Record<PatternKind, RecommendationTemplate> = {
  n_plus_one: {
    title: 'N+1 queries on {childTable}',
    text:
      'Statement #{sequence} read {parentRows} row(s) from {parentTable} and was followed by ' +
      '{childCount} queries of the same shape on {childTable}, one per parent row. ' +
      'Load the children in one round trip: JOIN FETCH them with the parent query, ' +
      'or run a single batched query with {filterColumn} IN (...) over the parent keys.',
    action: 'SELECT * FROM {childTable} WHERE {filterColumn} IN (:parentKeys)',
    index: 'CREATE INDEX {indexName} ON {childTable} ({filterColumn})',
  },
  offset_pagination: {
    title: 'Deep OFFSET pagination on {table}',
    text:
      'Statement #{sequence} skips {offset} rows with OFFSET (threshold {threshold}). ' +
      'The database reads and discards every skipped row, so each later page is slower. ' +
      'Use keyset pagination: keep the last {orderColumn} of the previous page and filter on it.',
    action: 'SELECT * FROM {table} WHERE {orderColumn} > :lastSeen ORDER BY {orderColumn} LIMIT {limit}',
    index: 'CREATE INDEX {indexName} ON {table} ({orderColumn})',
  },
  full_scan: {
    title: 'Unfiltered read of {table}',
    text:
      'Statement #{sequence} returned {rowCount} rows from {table} with no WHERE or LIMIT clause ' +
      '(threshold {threshold}). Add a selective WHERE on an indexed column, ' +
      'or page through the rows with keyset pagination.',
    action: 'SELECT * FROM {table} WHERE id > :lastSeen ORDER BY id LIMIT :pageSize',
  },
};
