/**
 * Single-page extraction: prompt -> vision model -> normalized PageResult
 *
 * @module services/extraction/page-extractor
 */

import type { PageResult } from '../../models/index.js';
import type { FileRef, VisionClient } from '../vision/client.js';
import { normalizeModelText } from './normalizer.js';
import { buildPrompt, loadCanonicalFieldKeys } from './prompts.js';

/** The slice of VisionClient page extraction needs */
export type PageAnalyzer = Pick<VisionClient, 'analyzeImage' | 'getConfig'>;

export interface ExtractPageOptions {
  /** Canonical keys to offer the model (default: data/canonical-fields.json) */
  allowedKeys?: readonly string[];
  docTypeHint?: string;
}

/**
 * Run the vision model on one page image and normalize its answer.
 *
 * @throws VisionError subclasses from the client, ExtractionError on bad output
 */
export async function extractPage(
  client: PageAnalyzer,
  file: FileRef,
  pageIndex: number,
  options: ExtractPageOptions = {}
): Promise<PageResult> {
  const prompt = buildPrompt(options.allowedKeys ?? loadCanonicalFieldKeys(), options.docTypeHint);
  const response = await client.analyzeImage(prompt, file);

  const config = client.getConfig();
  const page = normalizeModelText(response.text, pageIndex, config);

  if (config.debugExtraction) {
    console.error(
      `[PageExtractor] page=${pageIndex} doc_type=${page.docType ?? 'null'} fields=${Object.keys(page.fields).length} extra_fields=${Object.keys(page.extraFields).length} latency_ms=${response.processingTimeMs}`
    );
  }
  return page;
}
