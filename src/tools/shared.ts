/**
 * Shared Tool Utilities
 *
 * Common types, formatters, and error handlers used across all tool modules.
 *
 * CRITICAL: NEVER use console.log() - stdout is reserved for JSON-RPC protocol.
 * Use console.error() for all logging.
 *
 * @module tools/shared
 */

import { z } from 'zod';
import { MCPError, formatErrorResponse } from '../server/errors.js';

// ═══════════════════════════════════════════════════════════════════════════════
// TYPE DEFINITIONS
// ═══════════════════════════════════════════════════════════════════════════════

/** MCP tool response format */
export type ToolResponse = { content: Array<{ type: 'text'; text: string }>; isError?: boolean };

/** Tool handler function signature */
type ToolHandler = (params: Record<string, unknown>) => Promise<ToolResponse>;

/** Tool definition with description, schema, and handler */
export interface ToolDefinition {
  description: string;
  inputSchema: Record<string, z.ZodTypeAny>;
  handler: ToolHandler;
}

// ═══════════════════════════════════════════════════════════════════════════════
// HELPER FUNCTIONS
// ═══════════════════════════════════════════════════════════════════════════════

/** Max response size in bytes (700KB) */
const MAX_RESPONSE_BYTES = 700 * 1024;

/**
 * Format tool result as MCP content response.
 *
 * Grouped documents are never cut short: a partial partition would silently
 * lose pages. An oversized result becomes an error telling the caller to send
 * fewer pages.
 */
export function formatResponse(result: unknown): ToolResponse {
  const json = JSON.stringify(result, null, 2);
  if (json.length <= MAX_RESPONSE_BYTES) {
    return { content: [{ type: 'text', text: json }] };
  }

  return handleError(
    new MCPError(
      'VALIDATION_ERROR',
      `Response of ${Math.round(json.length / 1024)}KB exceeds the ${Math.round(MAX_RESPONSE_BYTES / 1024)}KB limit. Split the request into fewer pages.`,
      { response_bytes: json.length, limit_bytes: MAX_RESPONSE_BYTES }
    )
  );
}

/**
 * Handle errors uniformly - FAIL FAST
 */
export function handleError(error: unknown): ToolResponse {
  const mcpError = MCPError.fromUnknown(error);
  console.error(`[ERROR] ${mcpError.category}: ${mcpError.message}`);
  return {
    content: [{ type: 'text', text: JSON.stringify(formatErrorResponse(mcpError), null, 2) }],
    isError: true,
  };
}
