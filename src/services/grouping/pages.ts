/**
 * Shape checks callers run before handing pages to the grouping engine.
 *
 * @module services/grouping/pages
 */

import type { PageResult } from '../../models/index.js';
import { ValidationError } from '../../utils/validation.js';

/**
 * Reject page lists the engine does not accept: empty lists, invalid or
 * duplicate page indices, and pages out of ascending order.
 *
 * @throws ValidationError describing the first problem found
 */
export function assertWellFormedPages(pages: readonly PageResult[]): void {
  if (pages.length === 0) {
    throw new ValidationError('At least one page is required');
  }

  let previous = -1;
  for (const [position, page] of pages.entries()) {
    if (!Number.isInteger(page.pageIndex) || page.pageIndex < 0) {
      throw new ValidationError(
        `Page at position ${position} has invalid page_index ${page.pageIndex}`
      );
    }
    if (page.pageIndex === previous) {
      throw new ValidationError(`Duplicate page_index ${page.pageIndex}`);
    }
    if (page.pageIndex < previous) {
      throw new ValidationError(
        `Pages must be in ascending page_index order (${page.pageIndex} after ${previous})`
      );
    }
    previous = page.pageIndex;
  }
}
