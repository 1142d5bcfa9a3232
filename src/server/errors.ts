/**
 * MCP Server Error Handling
 *
 * FAIL FAST: All errors throw immediately with descriptive context.
 * Per-page model failures are the one exception; they are reported in
 * meta.failed_pages by the orchestrator instead of failing the request.
 *
 * @module server/errors
 */

import { VisionError } from '../services/vision/errors.js';

// ═══════════════════════════════════════════════════════════════════════════════
// ERROR CATEGORIES
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Error categories for MCP tool errors
 */
export type ErrorCategory =
  // Validation errors
  | 'VALIDATION_ERROR'

  // Input file errors
  | 'UNSUPPORTED_FILE_TYPE'
  | 'FILE_TOO_LARGE'

  // Vision model errors
  | 'VLM_API_ERROR'
  | 'VLM_TIMEOUT'
  | 'EXTRACTION_FAILED'

  // File system errors
  | 'PATH_NOT_FOUND'
  | 'PATH_NOT_DIRECTORY'

  // Configuration errors
  | 'CONFIGURATION_ERROR'

  // Internal errors
  | 'INTERNAL_ERROR';

// ═══════════════════════════════════════════════════════════════════════════════
// ERROR NAME TO CATEGORY MAPPING
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Map error class names without their own category to MCPError categories.
 * VisionError and its subclasses carry `.category` and bypass this table.
 */
const ERROR_NAME_TO_CATEGORY: Record<string, ErrorCategory> = {
  ValidationError: 'VALIDATION_ERROR',
  ZodError: 'VALIDATION_ERROR',
  RangeError: 'VALIDATION_ERROR',
  CircuitBreakerOpenError: 'VLM_API_ERROR',
};

// ═══════════════════════════════════════════════════════════════════════════════
// MCP ERROR CLASS
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * MCPError - Structured error class for all MCP tool failures
 */
export class MCPError extends Error {
  public readonly category: ErrorCategory;
  public readonly details?: Record<string, unknown>;

  constructor(category: ErrorCategory, message: string, details?: Record<string, unknown>) {
    super(message);
    this.name = 'MCPError';
    this.category = category;
    this.details = details;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, MCPError);
    }
  }

  /**
   * Create error from unknown caught value
   * FAIL FAST: Always produces a typed error
   */
  static fromUnknown(error: unknown, defaultCategory: ErrorCategory = 'INTERNAL_ERROR'): MCPError {
    if (error instanceof MCPError) {
      return error;
    }

    if (error instanceof VisionError) {
      return new MCPError(error.category, error.message, {
        originalName: error.name,
        stack: error.stack,
      });
    }

    if (error instanceof Error) {
      const category = ERROR_NAME_TO_CATEGORY[error.name] ?? defaultCategory;
      const code = 'code' in error && typeof error.code === 'string' ? error.code : undefined;
      return new MCPError(category, error.message, {
        originalName: error.name,
        ...(code && { errorCode: code }),
        stack: error.stack,
      });
    }

    return new MCPError(defaultCategory, String(error), {
      originalValue: error,
    });
  }

  /**
   * Convert to JSON for logging/serialization
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      category: this.category,
      message: this.message,
      details: this.details,
      stack: this.stack,
    };
  }
}

// ═══════════════════════════════════════════════════════════════════════════════
// RECOVERY HINTS
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Recovery hint for AI agents to self-correct after errors.
 */
export interface RecoveryHint {
  tool: string;
  hint: string;
}

const RECOVERY_HINTS: Record<ErrorCategory, RecoveryHint> = {
  VALIDATION_ERROR: { tool: 'kyc_group_pages', hint: 'Check parameter types and required fields' },
  UNSUPPORTED_FILE_TYPE: {
    tool: 'kyc_extract_multi',
    hint: 'Pass page images (png, jpg, jpeg, webp, gif); rasterize PDFs to one image per page first',
  },
  FILE_TOO_LARGE: {
    tool: 'kyc_vision_status',
    hint: 'Downscale the page image or raise MAX_FILE_MB',
  },
  VLM_API_ERROR: {
    tool: 'kyc_vision_status',
    hint: 'Check that Ollama is running at OLLAMA_BASE_URL and check circuit breaker state',
  },
  VLM_TIMEOUT: {
    tool: 'kyc_vision_status',
    hint: 'Retry with fewer pages or raise VISION_REQUEST_TIMEOUT_MS',
  },
  EXTRACTION_FAILED: {
    tool: 'kyc_extract_document',
    hint: 'Retry the page; if it keeps failing try a different VISION_MODEL',
  },
  PATH_NOT_FOUND: { tool: 'kyc_extract_multi', hint: 'Verify the file path exists on the filesystem' },
  PATH_NOT_DIRECTORY: { tool: 'kyc_extract_multi', hint: 'Provide a directory path, not a file path' },
  CONFIGURATION_ERROR: {
    tool: 'kyc_vision_status',
    hint: 'Check environment variable configuration (OLLAMA_BASE_URL, VISION_MODEL, GROUPING_*)',
  },
  INTERNAL_ERROR: { tool: 'kyc_vision_status', hint: 'Run kyc_vision_status for diagnostics' },
};

export function getRecoveryHint(category: ErrorCategory): RecoveryHint {
  return RECOVERY_HINTS[category];
}

// ═══════════════════════════════════════════════════════════════════════════════
// ERROR RESPONSE FORMATTING
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Format MCPError for tool response.
 * The recovery field tells AI agents which tool to call next and how to fix the issue.
 */
export function formatErrorResponse(error: MCPError): {
  success: false;
  error: {
    category: ErrorCategory;
    message: string;
    recovery: RecoveryHint;
    details?: Record<string, unknown>;
  };
} {
  return {
    success: false,
    error: {
      category: error.category,
      message: error.message,
      recovery: RECOVERY_HINTS[error.category],
      details: error.details,
    },
  };
}

// ═══════════════════════════════════════════════════════════════════════════════
// ERROR FACTORY FUNCTIONS
// ═══════════════════════════════════════════════════════════════════════════════

export function validationError(message: string, details?: Record<string, unknown>): MCPError {
  return new MCPError('VALIDATION_ERROR', message, details);
}

/**
 * Create configuration error for malformed environment variables or setup issues
 */
export function configurationError(message: string, details?: Record<string, unknown>): MCPError {
  return new MCPError('CONFIGURATION_ERROR', message, details);
}

export function pathNotFoundError(path: string): MCPError {
  return new MCPError('PATH_NOT_FOUND', `Path does not exist: ${path}`, {
    path,
  });
}

export function pathNotDirectoryError(path: string): MCPError {
  return new MCPError('PATH_NOT_DIRECTORY', `Path is not a directory: ${path}`, {
    path,
  });
}
