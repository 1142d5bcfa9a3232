/**
 * Vision model services
 *
 * @module services/vision
 */

export {
  VisionClient,
  getSharedClient,
  resetSharedClient,
  type FileRef,
  type TokenUsage,
  type VisionResponse,
  type VisionClientStatus,
} from './client.js';

export {
  loadVisionConfig,
  maxFileBytes,
  VisionConfigSchema,
  OLLAMA_VISION_MODELS,
  ALLOWED_MIME_TYPES,
  type AllowedMimeType,
  type VisionConfig,
  type VisionConfigOverrides,
} from './config.js';

export {
  CircuitBreaker,
  CircuitBreakerOpenError,
  CircuitState,
  isServerError,
  type CircuitBreakerConfig,
  type CircuitBreakerStatus,
} from './circuit-breaker.js';

export {
  VisionError,
  VisionAPIError,
  VisionTimeoutError,
  UnsupportedFileTypeError,
  FileTooLargeError,
  ExtractionError,
  type VisionErrorCategory,
} from './errors.js';
