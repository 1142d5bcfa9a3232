/**
 * Multi-page grouping and merge engine
 *
 * Turns an ordered list of page results into logical documents:
 *   page key sets -> smoothed labels -> page partition -> merged records.
 *
 * Pure and synchronous: no I/O, no clock, no shared state. The same pages and
 * config always produce the same groups.
 *
 * @module services/grouping
 */

import type { DocumentGroup, PageResult } from '../../models/index.js';
import { DEFAULT_GROUPING_CONFIG, type GroupingConfig } from './config.js';
import { groupPages } from './grouper.js';
import { pageKeySet } from './keys.js';
import { mergeGroupFields } from './merger.js';
import { smoothDocTypes } from './smoother.js';

/**
 * Group pages into logical documents and merge each group's fields.
 *
 * Pages must already be sorted by pageIndex (see assertWellFormedPages).
 */
export function groupAndMerge(
  pages: readonly PageResult[],
  config: GroupingConfig = DEFAULT_GROUPING_CONFIG
): DocumentGroup[] {
  const keySets = pages.map(pageKeySet);
  const smoothed = smoothDocTypes(
    pages.map((p) => p.docType),
    keySets,
    config
  );

  return groupPages(smoothed, keySets, config).map((group, groupId) => {
    const members = group.positions.map((pos) => pages[pos]);
    return {
      groupId,
      docType: group.docType,
      pageIndices: members.map((p) => p.pageIndex),
      ...mergeGroupFields(members),
    };
  });
}

export {
  GroupingConfigSchema,
  DEFAULT_GROUPING_CONFIG,
  resolveGroupingConfig,
  loadGroupingConfig,
  type GroupingConfig,
} from './config.js';
export { smoothDocTypes } from './smoother.js';
export { groupPages, type PageGroup } from './grouper.js';
export { mergeGroupFields, type MergedFields } from './merger.js';
export { pageKeySet, isEmptyLabel, countOverlap, countNovel, type DocLabel } from './keys.js';
export { assertWellFormedPages } from './pages.js';
