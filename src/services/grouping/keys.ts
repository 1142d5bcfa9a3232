/**
 * Label and field-key helpers shared by the smoother and the grouper.
 *
 * @module services/grouping/keys
 */

import type { PageResult } from '../../models/index.js';

/** A page's document-type label; null when absent */
export type DocLabel = string | null;

export function isEmptyLabel(label: DocLabel | undefined): label is null | undefined {
  return label === null || label === undefined || label.trim() === '';
}

/**
 * Union of a page's canonical and extra field keys.
 */
export function pageKeySet(page: PageResult): Set<string> {
  return new Set([...Object.keys(page.fields), ...Object.keys(page.extraFields)]);
}

/**
 * Number of keys present in both sets.
 */
export function countOverlap(a: ReadonlySet<string>, b: ReadonlySet<string>): number {
  let count = 0;
  for (const key of a) {
    if (b.has(key)) count++;
  }
  return count;
}

/**
 * Number of keys in `current` that `previous` does not have.
 */
export function countNovel(current: ReadonlySet<string>, previous: ReadonlySet<string>): number {
  let count = 0;
  for (const key of current) {
    if (!previous.has(key)) count++;
  }
  return count;
}
