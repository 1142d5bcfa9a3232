/**
 * Ollama Vision Model Configuration
 *
 * One vision-capable model served by a local Ollama instance is called once per
 * page image. No API key required.
 *
 * @module services/vision/config
 */

import { z } from 'zod';
import { parseBoolEnv, parseFloatEnv, parseIntEnv, parseStringEnv } from '../../utils/env.js';

export const OLLAMA_VISION_MODELS = {
  LLAVA: 'llava',
  LLAVA_LLAMA3: 'llava-llama3',
  MINICPM_V: 'minicpm-v',
  LLAMA_VISION: 'llama3.2-vision',
} as const;

// Allowed MIME types for page images
export const ALLOWED_MIME_TYPES = ['image/jpeg', 'image/png', 'image/webp', 'image/gif'] as const;

export type AllowedMimeType = (typeof ALLOWED_MIME_TYPES)[number];

export const VisionConfigSchema = z.object({
  // Ollama server
  baseUrl: z.string().url().default('http://localhost:11434'),

  // Must support image input (e.g. llava, minicpm-v, llama3.2-vision)
  model: z.string().min(1).default(OLLAMA_VISION_MODELS.LLAVA),

  // Generation defaults
  maxOutputTokens: z.number().int().positive().default(8192),
  temperature: z.number().min(0).max(2).default(0.1),
  requestTimeoutMs: z.number().int().positive().default(120_000),

  // Ingestion limits
  maxFileMb: z.number().positive().default(15),
  multiMaxPages: z.number().int().min(1).default(40),

  // Confidence normalization
  defaultConfidence: z.number().min(0).max(1).default(0.8),
  minConfidence: z.number().min(0).max(1).default(0),
  maxConfidence: z.number().min(0).max(1).default(1),

  // Verbose extraction logs on stderr
  debugExtraction: z.boolean().default(true),

  // Retry configuration
  retry: z
    .object({
      maxAttempts: z.number().int().min(1).default(3),
      baseDelayMs: z.number().int().min(0).default(500),
      maxDelayMs: z.number().int().min(0).default(10000),
    })
    .default({}),

  // Circuit breaker
  circuitBreaker: z
    .object({
      failureThreshold: z.number().int().min(1).default(5),
      recoveryTimeMs: z.number().int().min(0).default(60000),
    })
    .default({}),
});

export type VisionConfig = z.infer<typeof VisionConfigSchema>;
export type VisionConfigOverrides = Partial<VisionConfig>;

/**
 * Load vision configuration from environment variables, then apply overrides.
 *
 * Environment variables:
 *   OLLAMA_BASE_URL           — Ollama server URL (default: http://localhost:11434)
 *   VISION_MODEL              — Vision model name (default: llava)
 *   VISION_TEMPERATURE        — Generation temperature (default: 0.1)
 *   VISION_MAX_OUTPUT_TOKENS  — Max generated tokens (default: 8192)
 *   VISION_REQUEST_TIMEOUT_MS — Per-call timeout (default: 120000)
 *   MAX_FILE_MB               — Page image size cap in MB (default: 15)
 *   MULTI_MAX_PAGES           — Pages processed per request (default: 40)
 *   DEFAULT_CONFIDENCE        — Confidence used when the model gives none (default: 0.8)
 *   MIN_CONFIDENCE / MAX_CONFIDENCE — Clamp bounds (default: 0 / 1)
 *   DEBUG_EXTRACTION          — Verbose logs (default: true)
 *
 * @throws Error on malformed numeric/boolean env values, ZodError on out-of-range values
 */
export function loadVisionConfig(overrides: VisionConfigOverrides = {}): VisionConfig {
  const envConfig = {
    baseUrl: parseStringEnv('OLLAMA_BASE_URL'),
    model: parseStringEnv('VISION_MODEL'),
    temperature: parseFloatEnv('VISION_TEMPERATURE'),
    maxOutputTokens: parseIntEnv('VISION_MAX_OUTPUT_TOKENS'),
    requestTimeoutMs: parseIntEnv('VISION_REQUEST_TIMEOUT_MS'),
    maxFileMb: parseFloatEnv('MAX_FILE_MB'),
    multiMaxPages: parseIntEnv('MULTI_MAX_PAGES'),
    defaultConfidence: parseFloatEnv('DEFAULT_CONFIDENCE'),
    minConfidence: parseFloatEnv('MIN_CONFIDENCE'),
    maxConfidence: parseFloatEnv('MAX_CONFIDENCE'),
    debugExtraction: parseBoolEnv('DEBUG_EXTRACTION'),
  };

  const config = VisionConfigSchema.parse({ ...envConfig, ...overrides });
  if (config.minConfidence > config.maxConfidence) {
    throw new Error(
      `MIN_CONFIDENCE (${config.minConfidence}) must not exceed MAX_CONFIDENCE (${config.maxConfidence})`
    );
  }
  return config;
}

/**
 * Size cap for a single page image, in bytes
 */
export function maxFileBytes(config: VisionConfig): number {
  return Math.round(config.maxFileMb * 1024 * 1024);
}
