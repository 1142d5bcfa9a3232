/**
 * Vision Extraction Error Classes
 *
 * Each error carries a category that the MCP layer surfaces to clients as-is.
 *
 * @module services/vision/errors
 */

export type VisionErrorCategory =
  | 'VLM_API_ERROR'
  | 'VLM_TIMEOUT'
  | 'UNSUPPORTED_FILE_TYPE'
  | 'FILE_TOO_LARGE'
  | 'EXTRACTION_FAILED';

export class VisionError extends Error {
  constructor(
    message: string,
    public readonly category: VisionErrorCategory
  ) {
    super(message);
    this.name = 'VisionError';
  }
}

/**
 * Non-2xx answer from the Ollama HTTP API
 */
export class VisionAPIError extends VisionError {
  constructor(
    message: string,
    public readonly statusCode: number
  ) {
    super(message, 'VLM_API_ERROR');
    this.name = 'VisionAPIError';
  }
}

export class VisionTimeoutError extends VisionError {
  constructor(
    message: string,
    public readonly timeoutMs: number
  ) {
    super(message, 'VLM_TIMEOUT');
    this.name = 'VisionTimeoutError';
  }
}

export class UnsupportedFileTypeError extends VisionError {
  constructor(
    message: string,
    public readonly filePath: string
  ) {
    super(message, 'UNSUPPORTED_FILE_TYPE');
    this.name = 'UnsupportedFileTypeError';
  }
}

export class FileTooLargeError extends VisionError {
  constructor(
    message: string,
    public readonly sizeBytes: number,
    public readonly maxBytes: number
  ) {
    super(message, 'FILE_TOO_LARGE');
    this.name = 'FileTooLargeError';
  }
}

/**
 * The model answered but its output could not be turned into a page result
 */
export class ExtractionError extends VisionError {
  constructor(
    message: string,
    public readonly preview?: string
  ) {
    super(message, 'EXTRACTION_FAILED');
    this.name = 'ExtractionError';
  }
}
