/**
 * Unit tests for MCP Server Error Handling
 *
 * Tests MCPError class, error factories, and error response formatting.
 *
 * @module tests/unit/server/errors
 */

import { describe, it, expect } from 'vitest';
import { z } from 'zod';
import {
  MCPError,
  formatErrorResponse,
  getRecoveryHint,
  validationError,
  configurationError,
  pathNotFoundError,
  pathNotDirectoryError,
  type ErrorCategory,
} from '../../../src/server/errors.js';
import {
  ExtractionError,
  FileTooLargeError,
  UnsupportedFileTypeError,
  VisionAPIError,
  VisionTimeoutError,
  CircuitBreakerOpenError,
} from '../../../src/services/vision/index.js';
import { ValidationError } from '../../../src/utils/validation.js';

// ═══════════════════════════════════════════════════════════════════════════════
// MCPError CLASS TESTS
// ═══════════════════════════════════════════════════════════════════════════════

describe('MCPError', () => {
  it('should create error with category, message and details', () => {
    const error = new MCPError('VALIDATION_ERROR', 'Invalid input', { field: 'pages' });

    expect(error).toBeInstanceOf(Error);
    expect(error.name).toBe('MCPError');
    expect(error.category).toBe('VALIDATION_ERROR');
    expect(error.message).toBe('Invalid input');
    expect(error.details).toEqual({ field: 'pages' });
  });

  it('should serialize with toJSON', () => {
    const json = new MCPError('INTERNAL_ERROR', 'boom').toJSON();
    expect(json.name).toBe('MCPError');
    expect(json.category).toBe('INTERNAL_ERROR');
    expect(json.message).toBe('boom');
    expect(typeof json.stack).toBe('string');
  });

  describe('fromUnknown', () => {
    it('should return an MCPError unchanged', () => {
      const original = validationError('bad');
      expect(MCPError.fromUnknown(original)).toBe(original);
    });

    it.each<[Error, ErrorCategory]>([
      [new VisionAPIError('Ollama API error 500: Internal Server Error. ', 500), 'VLM_API_ERROR'],
      [new VisionTimeoutError('Ollama request timed out after 10ms', 10), 'VLM_TIMEOUT'],
      [new UnsupportedFileTypeError('PDF input is not supported: a.pdf', '/tmp/a.pdf'), 'UNSUPPORTED_FILE_TYPE'],
      [new FileTooLargeError('Page image too large', 30, 20), 'FILE_TOO_LARGE'],
      [new ExtractionError('Vision model returned an empty response'), 'EXTRACTION_FAILED'],
    ])('should keep the category of %s', (error, category) => {
      const mcp = MCPError.fromUnknown(error);
      expect(mcp.category).toBe(category);
      expect(mcp.message).toBe(error.message);
      expect(mcp.details?.originalName).toBe(error.name);
    });

    it('should map ValidationError to VALIDATION_ERROR', () => {
      expect(MCPError.fromUnknown(new ValidationError('pages must not be empty')).category).toBe(
        'VALIDATION_ERROR'
      );
    });

    it('should map ZodError to VALIDATION_ERROR', () => {
      const result = z.object({ page_index: z.number() }).safeParse({ page_index: 'x' });
      expect(result.success).toBe(false);
      if (!result.success) {
        expect(MCPError.fromUnknown(result.error).category).toBe('VALIDATION_ERROR');
      }
    });

    it('should map an open circuit breaker to VLM_API_ERROR', () => {
      const error = new CircuitBreakerOpenError('Circuit breaker is OPEN', 5000);
      expect(MCPError.fromUnknown(error).category).toBe('VLM_API_ERROR');
    });

    it('should keep a string error code', () => {
      const error = Object.assign(new Error('no such file'), { code: 'ENOENT' });
      const mcp = MCPError.fromUnknown(error);
      expect(mcp.category).toBe('INTERNAL_ERROR');
      expect(mcp.details?.errorCode).toBe('ENOENT');
    });

    it('should use the default category for unknown errors', () => {
      expect(MCPError.fromUnknown(new Error('x'), 'EXTRACTION_FAILED').category).toBe(
        'EXTRACTION_FAILED'
      );
    });

    it('should wrap non-Error values', () => {
      const mcp = MCPError.fromUnknown(42);
      expect(mcp.category).toBe('INTERNAL_ERROR');
      expect(mcp.message).toBe('42');
      expect(mcp.details).toEqual({ originalValue: 42 });
    });
  });
});

// ═══════════════════════════════════════════════════════════════════════════════
// FACTORIES
// ═══════════════════════════════════════════════════════════════════════════════

describe('error factories', () => {
  it('validationError', () => {
    const error = validationError('Provide exactly one of file_paths or directory');
    expect(error.category).toBe('VALIDATION_ERROR');
    expect(error.details).toBeUndefined();
  });

  it('configurationError', () => {
    const error = configurationError('Invalid grouping configuration', { field: 'GROUPING_BRIDGE_GAP' });
    expect(error.category).toBe('CONFIGURATION_ERROR');
    expect(error.details).toEqual({ field: 'GROUPING_BRIDGE_GAP' });
  });

  it('pathNotFoundError', () => {
    const error = pathNotFoundError('/scans/missing');
    expect(error.category).toBe('PATH_NOT_FOUND');
    expect(error.message).toBe('Path does not exist: /scans/missing');
    expect(error.details).toEqual({ path: '/scans/missing' });
  });

  it('pathNotDirectoryError', () => {
    const error = pathNotDirectoryError('/scans/page1.png');
    expect(error.category).toBe('PATH_NOT_DIRECTORY');
    expect(error.message).toBe('Path is not a directory: /scans/page1.png');
  });
});

// ═══════════════════════════════════════════════════════════════════════════════
// RESPONSE FORMATTING
// ═══════════════════════════════════════════════════════════════════════════════

describe('formatErrorResponse', () => {
  it('should include the recovery hint for the category', () => {
    const response = formatErrorResponse(pathNotFoundError('/scans/missing'));

    expect(response).toEqual({
      success: false,
      error: {
        category: 'PATH_NOT_FOUND',
        message: 'Path does not exist: /scans/missing',
        recovery: { tool: 'kyc_extract_multi', hint: 'Verify the file path exists on the filesystem' },
        details: { path: '/scans/missing' },
      },
    });
  });

  it('should point vision failures at kyc_vision_status', () => {
    expect(getRecoveryHint('VLM_API_ERROR').tool).toBe('kyc_vision_status');
    expect(getRecoveryHint('VLM_TIMEOUT').tool).toBe('kyc_vision_status');
  });
});
