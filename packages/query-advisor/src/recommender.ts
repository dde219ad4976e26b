/**
 * @querylens/query-advisor — Recommendation engine.
 *
 * Pure mapping from a detected pattern to remediation text. The same kind
 * and evidence always render the same recommendation.
 *
 * @module @querylens/query-advisor
 */

import { RECOMMENDATION_TEMPLATES } from './recommendation-templates.js';
import type { DetectedPattern, Recommendation, Severity } from './types.js';

type TemplateValues = Record<string, string | number | null>;

const PLACEHOLDER = /\{(\w+)\}/g;

/** Text fallbacks for facts the statement did not reveal */
const FALLBACKS: Record<string, string> = {
  parentTable: 'the parent table',
  childTable: 'the child table',
  table: 'the table',
  filterColumn: 'the foreign key',
  orderColumn: 'sort key',
};

function render(template: string, values: TemplateValues): string {
  return template.replace(PLACEHOLDER, (match, key: string) => {
    const value = values[key];
    if (value === null || value === undefined) return FALLBACKS[key] ?? match;
    return String(value);
  });
}

/** Render only when every placeholder has a known value */
function renderStrict(template: string | undefined, values: TemplateValues): string | undefined {
  if (!template) return undefined;
  for (const [, key] of template.matchAll(PLACEHOLDER)) {
    if (key === undefined || values[key] === null || values[key] === undefined) return undefined;
  }
  return render(template, values);
}

/** `idx_public_orders_customer_id` */
export function indexName(table: string | null, column: string | null): string | null {
  if (!table || !column) return null;
  return `idx_${table}_${column}`.replace(/\W+/g, '_').toLowerCase();
}

function valuesFor(pattern: DetectedPattern): { values: TemplateValues; severity: Severity } {
  const first = pattern.evidence[0];
  const sequence = first?.sequence ?? null;

  switch (pattern.kind) {
    case 'n_plus_one': {
      const { details } = pattern;
      return {
        severity: details.childCount >= 10 ? 'critical' : 'warning',
        values: {
          sequence,
          parentRows: first?.rowCount ?? null,
          parentTable: details.parentTable,
          childTable: details.childTable,
          childCount: details.childCount,
          filterColumn: details.filterColumn,
          indexName: indexName(details.childTable, details.filterColumn),
        },
      };
    }
    case 'offset_pagination': {
      const { details } = pattern;
      return {
        severity: details.offset >= details.threshold * 10 ? 'critical' : 'warning',
        values: {
          sequence,
          table: details.table,
          offset: details.offset,
          threshold: details.threshold,
          orderColumn: details.orderColumn,
          limit: details.limit ?? ':pageSize',
          indexName: indexName(details.table, details.orderColumn),
        },
      };
    }
    case 'full_scan': {
      const { details } = pattern;
      return {
        severity: details.rowCount >= details.threshold * 10 ? 'critical' : 'warning',
        values: {
          sequence,
          table: details.table,
          rowCount: details.rowCount,
          threshold: details.threshold,
        },
      };
    }
  }
}

/**
 * Map a detected pattern to its remediation.
 */
export function recommend(pattern: DetectedPattern): Recommendation {
  const template = RECOMMENDATION_TEMPLATES[pattern.kind];
  const { values, severity } = valuesFor(pattern);

  const recommendation: Recommendation = {
    kind: pattern.kind,
    severity,
    title: render(template.title, values),
    text: render(template.text, values),
    relatedSequences: pattern.evidence.map((record) => record.sequence),
  };

  const action = renderStrict(template.action, values);
  if (action) recommendation.suggestedAction = action;

  const index = renderStrict(template.index, values);
  if (index) recommendation.indexSuggestion = index;

  return recommendation;
}
