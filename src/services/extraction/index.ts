/**
 * Page extraction services
 *
 * @module services/extraction
 */

export { extractMultiDocument, extractSingleDocument, type MultiExtractionOptions } from './orchestrator.js';
export { extractPage, type ExtractPageOptions, type PageAnalyzer } from './page-extractor.js';
export {
  resolvePageFiles,
  PAGE_IMAGE_EXTENSIONS,
  type PageSource,
  type ResolvedPages,
} from './page-loader.js';
export {
  parseModelJson,
  flattenValue,
  fieldValueFromAny,
  normalizeRawExtraction,
  normalizeModelText,
  RawExtractionSchema,
  type RawExtraction,
  type ConfidenceBounds,
} from './normalizer.js';
export { buildPrompt, loadCanonicalFieldKeys, EXTRACTION_SYSTEM_PROMPT } from './prompts.js';
