/**
 * KYC Extraction MCP Tools
 *
 * Multi-document extraction over page images, single-page extraction, and
 * model-free regrouping of page results a client already holds.
 *
 * CRITICAL: NEVER use console.log() - stdout is reserved for JSON-RPC protocol.
 * Use console.error() for all logging.
 *
 * @module tools/extraction
 */

import { z } from 'zod';

import type { DocumentGroup, MultiExtractionMeta, PageResult } from '../models/index.js';
import { configurationError } from '../server/errors.js';
import {
  successResult,
  type WireDocument,
  type WireMultiMeta,
  type WirePageResult,
} from '../server/types.js';
import {
  assertWellFormedPages,
  groupAndMerge,
  loadGroupingConfig,
  type GroupingConfig,
} from '../services/grouping/index.js';
import { extractMultiDocument, extractSingleDocument } from '../services/extraction/orchestrator.js';
import { resolvePageFiles, type PageSource } from '../services/extraction/page-loader.js';
import { getSharedClient, VisionClient } from '../services/vision/client.js';
import {
  GroupingOverridesInput,
  PageResultInput,
  validateInput,
  type PageResultWire,
} from '../utils/validation.js';
import { formatResponse, handleError, type ToolDefinition, type ToolResponse } from './shared.js';

// ═══════════════════════════════════════════════════════════════════════════════
// VALIDATION SCHEMAS
// ═══════════════════════════════════════════════════════════════════════════════

const ExtractMultiInput = z
  .object({
    file_paths: z.array(z.string().min(1)).min(1).optional(),
    directory: z.string().min(1).optional(),
    ...GroupingOverridesInput,
  })
  .refine((input) => (input.file_paths === undefined) !== (input.directory === undefined), {
    message: 'Provide exactly one of file_paths or directory',
  });

const ExtractDocumentInput = z
  .object({
    file_path: z.string().min(1).optional(),
    file_paths: z.array(z.string().min(1)).min(1).optional(),
    doc_type_hint: z.string().min(1).optional(),
  })
  .refine((input) => input.file_path !== undefined || input.file_paths !== undefined, {
    message: 'Provide file_path or file_paths',
  });

const GroupPagesInput = z.object({
  pages: z.array(PageResultInput).min(1),
  ...GroupingOverridesInput,
});

type GroupingOverridesWire = {
  forward_fill?: boolean;
  bridge_gap?: boolean;
  min_fields_for_new_doc?: number;
  min_key_overlap_for_continuation?: number;
};

// ═══════════════════════════════════════════════════════════════════════════════
// WIRE CONVERSION
// ═══════════════════════════════════════════════════════════════════════════════

export function toPageResult(wire: PageResultWire): PageResult {
  return {
    pageIndex: wire.page_index,
    docType: wire.doc_type?.trim() || null,
    fields: wire.fields,
    extraFields: wire.extra_fields,
  };
}

export function toWirePage(page: PageResult): WirePageResult {
  return {
    page_index: page.pageIndex,
    doc_type: page.docType,
    fields: page.fields,
    extra_fields: page.extraFields,
  };
}

export function toWireDocument(doc: DocumentGroup): WireDocument {
  return {
    group_id: doc.groupId,
    doc_type: doc.docType,
    page_indices: doc.pageIndices,
    merged_fields: doc.mergedFields,
    merged_extra_fields: doc.mergedExtraFields,
  };
}

function toWireMeta(meta: MultiExtractionMeta): WireMultiMeta {
  return {
    request_id: meta.requestId,
    total_pages: meta.totalPages,
    total_groups: meta.totalGroups,
    elapsed_ms: meta.elapsedMs,
    failed_pages: meta.failedPages,
  };
}

/**
 * Request overrides win over GROUPING_* environment settings.
 * A malformed environment value is a configuration problem, not a bad request.
 */
function groupingConfigFor(input: GroupingOverridesWire): GroupingConfig {
  try {
    return loadGroupingConfig({
      forwardFill: input.forward_fill,
      bridgeGap: input.bridge_gap,
      minFieldsForNewDoc: input.min_fields_for_new_doc,
      minKeyOverlapForContinuation: input.min_key_overlap_for_continuation,
    });
  } catch (error) {
    throw configurationError(
      `Invalid grouping configuration: ${error instanceof Error ? error.message : String(error)}`
    );
  }
}

function visionClient(): VisionClient {
  try {
    return getSharedClient();
  } catch (error) {
    throw configurationError(
      `Invalid vision configuration: ${error instanceof Error ? error.message : String(error)}`
    );
  }
}

// ═══════════════════════════════════════════════════════════════════════════════
// TOOL HANDLERS
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Handle kyc_extract_multi - Extract, group and merge a set of page images
 */
export async function handleExtractMulti(params: Record<string, unknown>): Promise<ToolResponse> {
  try {
    const input = validateInput(ExtractMultiInput, params);
    const groupingConfig = groupingConfigFor(input);
    const client = visionClient();

    const source: PageSource =
      input.file_paths !== undefined
        ? { filePaths: input.file_paths }
        : { directory: input.directory ?? '' };
    const resolved = resolvePageFiles(source, client.getConfig().multiMaxPages);
    const maxBytes = client.maxFileBytes();
    const files = resolved.paths.map((p) => VisionClient.fileRefFromPath(p, maxBytes));

    const result = await extractMultiDocument(files, { client, groupingConfig });

    return formatResponse(
      successResult({
        documents: result.documents.map(toWireDocument),
        meta: toWireMeta(result.meta),
        page_files: resolved.paths,
        ...(resolved.truncated && {
          truncated: { pages_found: resolved.totalFound, pages_processed: resolved.paths.length },
        }),
      })
    );
  } catch (error) {
    return handleError(error);
  }
}

/**
 * Handle kyc_extract_document - Extract one or more single-page documents
 * without grouping. Files run concurrently; results keep input order.
 */
export async function handleExtractDocument(params: Record<string, unknown>): Promise<ToolResponse> {
  try {
    const input = validateInput(ExtractDocumentInput, params);
    const client = visionClient();

    // file_path is appended to file_paths when both are given
    const requested = [...(input.file_paths ?? []), ...(input.file_path !== undefined ? [input.file_path] : [])];
    const { paths } = resolvePageFiles({ filePaths: requested }, requested.length);
    const maxBytes = client.maxFileBytes();
    const files = paths.map((p) => VisionClient.fileRefFromPath(p, maxBytes));

    const start = Date.now();
    const pages = await Promise.all(
      files.map((file) => extractSingleDocument(file, input.doc_type_hint, client))
    );

    return formatResponse(
      successResult({
        results: pages.map((page, i) => ({ ...toWirePage(page), file_path: paths[i] })),
        meta: { total_files: paths.length, elapsed_ms: Date.now() - start },
      })
    );
  } catch (error) {
    return handleError(error);
  }
}

/**
 * Handle kyc_group_pages - Group and merge page results without calling the model
 */
export async function handleGroupPages(params: Record<string, unknown>): Promise<ToolResponse> {
  try {
    const input = validateInput(GroupPagesInput, params);
    const groupingConfig = groupingConfigFor(input);

    const pages = input.pages.map(toPageResult).sort((a, b) => a.pageIndex - b.pageIndex);
    assertWellFormedPages(pages);

    const documents = groupAndMerge(pages, groupingConfig);

    return formatResponse(
      successResult({
        documents: documents.map(toWireDocument),
        meta: { total_pages: pages.length, total_groups: documents.length },
      })
    );
  } catch (error) {
    return handleError(error);
  }
}

// ═══════════════════════════════════════════════════════════════════════════════
// TOOL DEFINITIONS EXPORT
// ═══════════════════════════════════════════════════════════════════════════════

const groupingOverrideShape = {
  forward_fill: GroupingOverridesInput.forward_fill.describe(
    'Inherit the previous page label on unlabeled continuation pages (default: GROUPING_FORWARD_FILL or true)'
  ),
  bridge_gap: GroupingOverridesInput.bridge_gap.describe(
    'Fill a single unlabeled page between two pages with the same label (default: GROUPING_BRIDGE_GAP or true)'
  ),
  min_fields_for_new_doc: GroupingOverridesInput.min_fields_for_new_doc.describe(
    'Novel keys on an unlabeled page that signal a new document (default: 3)'
  ),
  min_key_overlap_for_continuation: GroupingOverridesInput.min_key_overlap_for_continuation.describe(
    'Keys shared with the previous page that signal a continuation (default: 1)'
  ),
};

export const extractionTools: Record<string, ToolDefinition> = {
  kyc_extract_multi: {
    description:
      '[PROCESSING] Use to split a multi-page upload into logical documents. Pass page images as file_paths (in page order) or a directory (natural filename order). Each page goes through the vision model; pages are grouped by document type and their fields merged. Requires a running Ollama server.',
    inputSchema: {
      file_paths: z
        .array(z.string().min(1))
        .min(1)
        .optional()
        .describe('Page image paths in page order (png, jpg, jpeg, webp, gif)'),
      directory: z
        .string()
        .min(1)
        .optional()
        .describe('Directory of page images; used instead of file_paths'),
      ...groupingOverrideShape,
    },
    handler: handleExtractMulti,
  },

  kyc_extract_document: {
    description:
      '[PROCESSING] Use to extract fields from single-page documents (a one-page document or one side of an ID card), one result per image, no grouping. Pass file_path or several file_paths; they are extracted concurrently. Returns doc_type, fields and extra_fields with confidences per file. Requires a running Ollama server.',
    inputSchema: {
      file_path: z.string().min(1).optional().describe('Path to one page image'),
      file_paths: z
        .array(z.string().min(1))
        .min(1)
        .optional()
        .describe('Paths to several page images, each extracted as its own document'),
      doc_type_hint: z
        .string()
        .min(1)
        .optional()
        .describe('Expected document type, e.g. "passport"'),
    },
    handler: handleExtractDocument,
  },

  kyc_group_pages: {
    description:
      '[ANALYSIS] Use to regroup page results you already have (e.g. with different thresholds). No model calls. Pages are sorted by page_index; indices must be unique.',
    inputSchema: {
      pages: z
        .array(PageResultInput)
        .min(1)
        .describe('Page results: {page_index, doc_type, fields, extra_fields}'),
      ...groupingOverrideShape,
    },
    handler: handleGroupPages,
  },
};
