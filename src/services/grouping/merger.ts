/**
 * Group Merger
 *
 * First-non-empty-wins: pages are visited in ascending order and the earliest
 * non-blank value for a key is kept. Later pages never overwrite it, whatever
 * their confidence. A key seen only with blank values keeps its first blank
 * entry. Canonical and extra fields are merged independently.
 *
 * @module services/grouping/merger
 */

import type { FieldMap, PageResult } from '../../models/index.js';

export interface MergedFields {
  mergedFields: FieldMap;
  mergedExtraFields: FieldMap;
}

/**
 * Merge the field maps of a group's member pages.
 *
 * @param pages - Member pages in ascending page order
 */
export function mergeGroupFields(pages: readonly PageResult[]): MergedFields {
  const mergedFields: FieldMap = {};
  const mergedExtraFields: FieldMap = {};

  for (const page of pages) {
    mergeInto(mergedFields, page.fields);
    mergeInto(mergedExtraFields, page.extraFields);
  }

  return { mergedFields, mergedExtraFields };
}

function mergeInto(dest: FieldMap, src: FieldMap): void {
  for (const [key, field] of Object.entries(src)) {
    const existing = Object.prototype.hasOwnProperty.call(dest, key) ? dest[key] : undefined;
    // a blank placeholder yields to the first non-blank value
    if (existing !== undefined && (existing.value.trim() !== '' || field.value.trim() === '')) continue;
    dest[key] = { value: field.value, confidence: field.confidence };
  }
}
