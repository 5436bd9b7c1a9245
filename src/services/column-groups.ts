/**
 * Column group classification helpers
 */

import { Column, ColumnGroup } from '../types/index.js';

/**
 * Display rank of each group; columns of an artifact are listed by
 * (rank, order, id)
 */
export const GROUP_RANK: Record<ColumnGroup, number> = {
  surrogate_key: 0,
  business_key: 1,
  attribute: 2,
  unclassified: 3,
  technical: 4
};

const GROUP_ALIASES: Record<string, ColumnGroup> = {
  surrogate_key: 'surrogate_key',
  surrogate_keys: 'surrogate_key',
  sk: 'surrogate_key',
  sks: 'surrogate_key',
  business_key: 'business_key',
  business_keys: 'business_key',
  bk: 'business_key',
  bks: 'business_key',
  primary_key: 'business_key',
  primary_keys: 'business_key',
  pk: 'business_key',
  attribute: 'attribute',
  attributes: 'attribute',
  source_field: 'attribute',
  source_fields: 'attribute',
  fact: 'attribute',
  facts: 'attribute',
  measure: 'attribute',
  measures: 'attribute',
  technical: 'technical',
  technical_field: 'technical',
  technical_fields: 'technical',
  partition_field: 'technical',
  partition_fields: 'technical',
  unclassified: 'unclassified'
};

/**
 * Map a group label as found in a store ("SKs", "business key",
 * "technical field", ...) onto the closed group set
 */
export function normalizeColumnGroup(label: string | undefined): ColumnGroup {
  if (!label) {
    return 'unclassified';
  }
  const key = label.trim().toLowerCase().replace(/[\s-]+/g, '_');
  return Object.hasOwn(GROUP_ALIASES, key) ? GROUP_ALIASES[key] : 'unclassified';
}

export function isKeyGroup(group: ColumnGroup): boolean {
  return group === 'surrogate_key' || group === 'business_key';
}

/**
 * Effective group of a column. Unclassified columns named *_sk or *_bk
 * count as surrogate and business keys.
 */
export function classifyColumn(column: Pick<Column, 'name' | 'group'>): ColumnGroup {
  if (column.group !== 'unclassified') {
    return column.group;
  }
  const name = column.name.trim().toLowerCase();
  if (name.endsWith('_sk')) {
    return 'surrogate_key';
  }
  if (name.endsWith('_bk')) {
    return 'business_key';
  }
  return 'unclassified';
}

/**
 * Order columns by group rank only; ties keep their current sequence
 */
export function compareColumnsByRank(a: Column, b: Column): number {
  return GROUP_RANK[classifyColumn(a)] - GROUP_RANK[classifyColumn(b)];
}

/**
 * Comparator for the rendered column sequence of an artifact
 */
export function compareColumnsForDisplay(a: Column, b: Column): number {
  const rankDiff = compareColumnsByRank(a, b);
  if (rankDiff !== 0) {
    return rankDiff;
  }
  if (a.order !== b.order) {
    return a.order - b.order;
  }
  return a.id - b.id;
}
