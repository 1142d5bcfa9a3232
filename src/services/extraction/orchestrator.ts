/**
 * Multi-document extraction orchestration
 *
 * Pipeline:
 *   1. Extract every page concurrently (one model call per page).
 *   2. Replace failed pages with empty results so grouping still sees them.
 *   3. Group and merge (services/grouping).
 *   4. Attach meta: request id, counts, wall time, failed pages.
 *
 * @module services/extraction/orchestrator
 */

import { v4 as uuidv4 } from 'uuid';

import {
  emptyPageResult,
  type MultiExtractionResult,
  type PageResult,
} from '../../models/index.js';
import { groupAndMerge, loadGroupingConfig, type GroupingConfig } from '../grouping/index.js';
import { getSharedClient, type FileRef } from '../vision/client.js';
import { extractPage, type PageAnalyzer } from './page-extractor.js';
import { loadCanonicalFieldKeys } from './prompts.js';

export interface MultiExtractionOptions {
  /** Defaults to the shared VisionClient */
  client?: PageAnalyzer;
  /** Defaults to GROUPING_* environment settings */
  groupingConfig?: GroupingConfig;
}

/**
 * Extract, group and merge an ordered list of page images.
 * Page i of `pages` gets pageIndex i. A page whose extraction fails never fails
 * the request; it is grouped as an empty page and listed in meta.failedPages.
 */
export async function extractMultiDocument(
  pages: readonly FileRef[],
  options: MultiExtractionOptions = {}
): Promise<MultiExtractionResult> {
  const start = Date.now();
  const requestId = uuidv4();
  const client = options.client ?? getSharedClient();
  const groupingConfig = options.groupingConfig ?? loadGroupingConfig();
  const allowedKeys = loadCanonicalFieldKeys();

  console.error(`[MultiDoc] request=${requestId} pages=${pages.length} start`);

  const settled = await Promise.allSettled(
    pages.map((file, pageIndex) => extractPage(client, file, pageIndex, { allowedKeys }))
  );

  const failedPages: number[] = [];
  const pageResults: PageResult[] = settled.map((outcome, pageIndex) => {
    if (outcome.status === 'fulfilled') {
      return outcome.value;
    }
    const reason: unknown = outcome.reason;
    console.error(
      `[MultiDoc] request=${requestId} page=${pageIndex} extraction failed: ${reason instanceof Error ? reason.message : String(reason)}`
    );
    failedPages.push(pageIndex);
    return emptyPageResult(pageIndex);
  });
  pageResults.sort((a, b) => a.pageIndex - b.pageIndex);

  const documents = groupAndMerge(pageResults, groupingConfig);
  const elapsedMs = Date.now() - start;

  console.error(
    `[MultiDoc] request=${requestId} pages=${pages.length} groups=${documents.length} failed=${failedPages.length} elapsed_ms=${elapsedMs}`
  );

  return {
    documents,
    meta: {
      requestId,
      totalPages: pages.length,
      totalGroups: documents.length,
      elapsedMs,
      failedPages,
    },
  };
}

/**
 * Single-document path: one image, one normalized result, no grouping.
 */
export async function extractSingleDocument(
  file: FileRef,
  docTypeHint?: string,
  client: PageAnalyzer = getSharedClient()
): Promise<PageResult> {
  return extractPage(client, file, 0, { docTypeHint });
}
