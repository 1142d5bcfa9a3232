/**
 * MCP Server Type Definitions
 *
 * Tool result envelopes and the snake_case wire shapes returned to clients.
 *
 * @module server/types
 */

import type { FieldMap } from '../models/index.js';

// ═══════════════════════════════════════════════════════════════════════════════
// TOOL RESULT TYPES
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Successful tool result
 */
interface ToolResultSuccess<T = unknown> {
  success: true;
  data: T;
}

/**
 * Helper to create success result
 */
export function successResult<T>(data: T): ToolResultSuccess<T> {
  return { success: true, data };
}

// ═══════════════════════════════════════════════════════════════════════════════
// WIRE SHAPES
// ═══════════════════════════════════════════════════════════════════════════════

/** Field maps keep their keys as extracted; only the envelope is snake_case */
export interface WirePageResult {
  page_index: number;
  doc_type: string | null;
  fields: FieldMap;
  extra_fields: FieldMap;
}

export interface WireDocument {
  group_id: number;
  doc_type: string | null;
  page_indices: number[];
  merged_fields: FieldMap;
  merged_extra_fields: FieldMap;
}

export interface WireMultiMeta {
  request_id: string;
  total_pages: number;
  total_groups: number;
  elapsed_ms: number;
  failed_pages: number[];
}
