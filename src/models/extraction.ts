/**
 * Extraction data models
 *
 * Page-level results produced by the vision model (after normalization) and the
 * grouped, merged document records built from them.
 *
 * @module models/extraction
 */

/**
 * A single extracted value with the model's confidence in it (0..1).
 * Confidence is carried through untouched; grouping and merging never rank by it.
 */
export interface FieldValue {
  value: string;
  confidence: number;
}

/** Field key -> value map. Keys are unique within a page. */
export type FieldMap = Record<string, FieldValue>;

/**
 * Normalized extraction result for one rasterized page.
 */
export interface PageResult {
  /** 0-based position of the page in the uploaded file */
  pageIndex: number;
  /** Document type label, null when the model could not or did not classify the page */
  docType: string | null;
  /** Canonical field values */
  fields: FieldMap;
  /** Free-form labeled values outside the canonical key set */
  extraFields: FieldMap;
}

/**
 * One logical document: a contiguous run of pages with their fields merged.
 */
export interface DocumentGroup {
  /** Discovery order, starting at 0 */
  groupId: number;
  /** First non-empty smoothed label among member pages, null if none */
  docType: string | null;
  /** Ascending, contiguous, never empty */
  pageIndices: number[];
  mergedFields: FieldMap;
  mergedExtraFields: FieldMap;
}

export interface MultiExtractionMeta {
  requestId: string;
  totalPages: number;
  totalGroups: number;
  elapsedMs: number;
  /** Pages whose model call failed and were grouped as empty results */
  failedPages: number[];
}

export interface MultiExtractionResult {
  documents: DocumentGroup[];
  meta: MultiExtractionMeta;
}

/**
 * Build an empty page result (used for pages whose model call failed).
 */
export function emptyPageResult(pageIndex: number): PageResult {
  return { pageIndex, docType: null, fields: {}, extraFields: {} };
}
