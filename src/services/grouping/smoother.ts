/**
 * DocType Smoother
 *
 * Repairs missing document-type labels across an ordered page sequence:
 *
 *   1. Forward fill: an unlabeled page inherits the previous page's label when
 *      the two pages share at least `minKeyOverlapForContinuation` field keys.
 *   2. Novelty override: forward fill is skipped for a page that introduces
 *      `minFieldsForNewDoc` or more keys the previous page lacks. The override
 *      wins even when the overlap condition also holds.
 *   3. Gap bridging: a single unlabeled page between two pages carrying the same
 *      label takes that label, regardless of keys (A, -, A -> A, A, A).
 *
 * The first page has no predecessor and is never forward-filled. Runs of two or
 * more unlabeled pages are never bridged.
 *
 * @module services/grouping/smoother
 */

import type { GroupingConfig } from './config.js';
import { countNovel, countOverlap, isEmptyLabel, type DocLabel } from './keys.js';

/**
 * Return a new label sequence with missing labels repaired.
 *
 * @param labels - Raw labels in page order
 * @param keySets - Field-key set of each page, same order and length as labels
 * @param config - Grouping thresholds
 * @returns Same-length sequence; blank labels come back as null
 */
export function smoothDocTypes(
  labels: readonly DocLabel[],
  keySets: readonly ReadonlySet<string>[],
  config: GroupingConfig
): DocLabel[] {
  if (labels.length !== keySets.length) {
    throw new RangeError(
      `labels and keySets must have the same length (${labels.length} vs ${keySets.length})`
    );
  }

  const out: DocLabel[] = labels.map((label) => (isEmptyLabel(label) ? null : label));

  if (config.forwardFill) {
    forwardFill(out, keySets, config);
  }
  if (config.bridgeGap) {
    bridgeGaps(out);
  }

  return out;
}

function forwardFill(
  out: DocLabel[],
  keySets: readonly ReadonlySet<string>[],
  config: GroupingConfig
): void {
  for (let i = 1; i < out.length; i++) {
    const previous = out[i - 1];
    if (!isEmptyLabel(out[i]) || isEmptyLabel(previous)) continue;

    if (countNovel(keySets[i], keySets[i - 1]) >= config.minFieldsForNewDoc) continue;

    if (countOverlap(keySets[i], keySets[i - 1]) >= config.minKeyOverlapForContinuation) {
      out[i] = previous;
    }
  }
}

function bridgeGaps(out: DocLabel[]): void {
  for (let i = 1; i < out.length - 1; i++) {
    const before = out[i - 1];
    if (isEmptyLabel(out[i]) && !isEmptyLabel(before) && out[i + 1] === before) {
      out[i] = before;
    }
  }
}
