/**
 * Page Grouper
 *
 * Cuts a smoothed label sequence into contiguous groups, one per logical
 * document. A new group starts before page i when:
 *
 *   - page i carries a label and the open group already has a different one, or
 *   - page i is still unlabeled after smoothing, introduces at least
 *     `minFieldsForNewDoc` keys the previous page lacks, AND shares fewer than
 *     `minKeyOverlapForContinuation` keys with it.
 *
 * Both conditions of the second rule are required so that continuation pages
 * using a slightly different vocabulary are not split off.
 *
 * @module services/grouping/grouper
 */

import type { GroupingConfig } from './config.js';
import { countNovel, countOverlap, isEmptyLabel, type DocLabel } from './keys.js';

/**
 * A contiguous run of page positions plus the label attributed to it.
 */
export interface PageGroup {
  /** Positions into the input sequence, ascending */
  positions: number[];
  /** First non-empty label among the members, null if none */
  docType: DocLabel;
}

/**
 * Partition page positions into groups.
 *
 * Every position in [0, labels.length) lands in exactly one group; groups are
 * returned in page order. An empty input yields no groups.
 */
export function groupPages(
  labels: readonly DocLabel[],
  keySets: readonly ReadonlySet<string>[],
  config: GroupingConfig
): PageGroup[] {
  if (labels.length !== keySets.length) {
    throw new RangeError(
      `labels and keySets must have the same length (${labels.length} vs ${keySets.length})`
    );
  }

  const groups: PageGroup[] = [];
  let open: PageGroup | null = null;

  for (let i = 0; i < labels.length; i++) {
    const label = isEmptyLabel(labels[i]) ? null : labels[i];

    if (open === null || startsNewGroup(open, label, i, keySets, config)) {
      open = { positions: [i], docType: label };
      groups.push(open);
      continue;
    }

    open.positions.push(i);
    if (open.docType === null && label !== null) {
      open.docType = label;
    }
  }

  return groups;
}

function startsNewGroup(
  open: PageGroup,
  label: DocLabel,
  index: number,
  keySets: readonly ReadonlySet<string>[],
  config: GroupingConfig
): boolean {
  if (label !== null) {
    return open.docType !== null && open.docType !== label;
  }

  const current = keySets[index];
  const previous = keySets[index - 1];
  return (
    countNovel(current, previous) >= config.minFieldsForNewDoc &&
    countOverlap(current, previous) < config.minKeyOverlapForContinuation
  );
}
