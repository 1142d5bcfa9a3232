/**
 * Ollama Vision Client
 *
 * Sends one page image plus an instruction prompt to a locally running Ollama
 * vision model and returns the raw text answer. Transient failures are retried
 * with backoff; a shared circuit breaker stops hammering a dead server.
 *
 * Start Ollama and pull a vision model before use:
 *   ollama serve
 *   ollama pull llava          # or: minicpm-v, llama3.2-vision
 *
 * @module services/vision/client
 */

import * as fs from 'fs';
import * as path from 'path';
import { z } from 'zod';

import { withRetry } from '../../utils/backoff.js';
import {
  type VisionConfig,
  type VisionConfigOverrides,
  type AllowedMimeType,
  loadVisionConfig,
  maxFileBytes,
  ALLOWED_MIME_TYPES,
} from './config.js';
import { CircuitBreaker, isServerError, type CircuitBreakerStatus } from './circuit-breaker.js';
import {
  FileTooLargeError,
  UnsupportedFileTypeError,
  VisionAPIError,
  VisionTimeoutError,
} from './errors.js';

// ---- Shared singletons ----
let _sharedClient: VisionClient | null = null;
let _sharedCircuitBreaker: CircuitBreaker | null = null;

function getSharedCircuitBreaker(config: VisionConfig['circuitBreaker']): CircuitBreaker {
  if (!_sharedCircuitBreaker) {
    _sharedCircuitBreaker = new CircuitBreaker(config);
  }
  return _sharedCircuitBreaker;
}

/**
 * Get the process-wide VisionClient, configured from the environment.
 */
export function getSharedClient(): VisionClient {
  if (!_sharedClient) {
    _sharedClient = new VisionClient();
  }
  return _sharedClient;
}

/** Reset all shared state (for testing) */
export function resetSharedClient(): void {
  _sharedCircuitBreaker = null;
  _sharedClient = null;
}

export interface TokenUsage {
  inputTokens: number;
  outputTokens: number;
  totalTokens: number;
}

export interface VisionResponse {
  text: string;
  usage: TokenUsage;
  model: string;
  processingTimeMs: number;
}

/**
 * A page image ready to send: base64 data plus its MIME type
 */
export interface FileRef {
  mimeType: AllowedMimeType;
  data: string;
  sizeBytes: number;
  /** Where the image came from, for logs */
  source?: string;
}

export interface VisionClientStatus {
  model: string;
  baseUrl: string;
  circuitBreaker: CircuitBreakerStatus;
}

/**
 * Ollama /api/chat response (non-streaming); unknown keys are ignored
 */
const OllamaChatResponseSchema = z.object({
  model: z.string().optional(),
  message: z
    .object({
      role: z.string(),
      content: z.string(),
    })
    .optional(),
  done: z.boolean().optional(),
  eval_count: z.number().optional(),
  prompt_eval_count: z.number().optional(),
});

const OllamaTagsResponseSchema = z.object({
  models: z.array(z.object({ name: z.string() })).default([]),
});

const EXTENSION_MIME_TYPES: Record<string, AllowedMimeType> = {
  png: 'image/png',
  jpg: 'image/jpeg',
  jpeg: 'image/jpeg',
  gif: 'image/gif',
  webp: 'image/webp',
};

const USER_INSTRUCTION = 'Extract the document data visible on this page image.';

export class VisionClient {
  private readonly config: VisionConfig;
  private readonly circuitBreaker: CircuitBreaker;

  constructor(configOverrides?: VisionConfigOverrides) {
    this.config = loadVisionConfig(configOverrides);
    this.circuitBreaker = getSharedCircuitBreaker(this.config.circuitBreaker);
  }

  getConfig(): Readonly<VisionConfig> {
    return this.config;
  }

  /**
   * Analyze one page image. The prompt goes in as the system message; the model
   * is asked for JSON output.
   */
  async analyzeImage(prompt: string, file: FileRef): Promise<VisionResponse> {
    const startTime = Date.now();

    if (this.config.debugExtraction) {
      console.error(
        `[VisionClient] analyze start model=${this.config.model} source=${file.source ?? 'buffer'} bytes=${file.sizeBytes} prompt_chars=${prompt.length}`
      );
    }

    const response = await this.circuitBreaker.execute(() =>
      withRetry(
        () => this.callOllamaChat(prompt, file.data),
        isServerError,
        this.config.retry,
        'VisionClient'
      )
    );

    const processingTimeMs = Date.now() - startTime;
    if (this.config.debugExtraction) {
      console.error(
        `[VisionClient] analyze done latency_ms=${processingTimeMs} tokens=${response.usage.totalTokens} preview=${response.text.slice(0, 200).replace(/\s+/g, ' ')}`
      );
    }

    return { ...response, processingTimeMs };
  }

  private async callOllamaChat(
    prompt: string,
    imageBase64: string
  ): Promise<Omit<VisionResponse, 'processingTimeMs'>> {
    const url = `${this.config.baseUrl.replace(/\/+$/, '')}/api/chat`;
    const timeoutMs = this.config.requestTimeoutMs;
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), timeoutMs);

    let rawResponse: Response;
    try {
      rawResponse = await fetch(url, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify({
          model: this.config.model,
          messages: [
            { role: 'system', content: prompt },
            { role: 'user', content: USER_INSTRUCTION, images: [imageBase64] },
          ],
          format: 'json',
          stream: false,
          options: {
            temperature: this.config.temperature,
            num_predict: this.config.maxOutputTokens,
          },
        }),
        signal: controller.signal,
      });
    } catch (error) {
      if (controller.signal.aborted) {
        throw new VisionTimeoutError(
          `Ollama request timed out after ${timeoutMs}ms (model: ${this.config.model})`,
          timeoutMs
        );
      }
      throw error;
    } finally {
      clearTimeout(timeoutId);
    }

    if (!rawResponse.ok) {
      const body = await rawResponse.text().catch(() => '');
      throw new VisionAPIError(
        `Ollama API error ${rawResponse.status}: ${rawResponse.statusText}. ${body.slice(0, 200)}`,
        rawResponse.status
      );
    }

    const parsed = OllamaChatResponseSchema.safeParse(await rawResponse.json());
    if (!parsed.success) {
      throw new VisionAPIError(
        `Unexpected Ollama response shape: ${parsed.error.message.slice(0, 200)}`,
        rawResponse.status
      );
    }
    const data = parsed.data;
    const inputTokens = data.prompt_eval_count ?? 0;
    const outputTokens = data.eval_count ?? 0;

    return {
      text: data.message?.content ?? '',
      model: data.model ?? this.config.model,
      usage: {
        inputTokens,
        outputTokens,
        totalTokens: inputTokens + outputTokens,
      },
    };
  }

  /**
   * Models pulled on the Ollama server (GET /api/tags). Bypasses retry and the
   * circuit breaker: it is a one-shot reachability probe.
   *
   * @throws VisionTimeoutError, VisionAPIError, or the fetch error when unreachable
   */
  async listModels(): Promise<string[]> {
    const url = `${this.config.baseUrl.replace(/\/+$/, '')}/api/tags`;
    const timeoutMs = Math.min(this.config.requestTimeoutMs, 10_000);
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), timeoutMs);

    let rawResponse: Response;
    try {
      rawResponse = await fetch(url, { signal: controller.signal });
    } catch (error) {
      if (controller.signal.aborted) {
        throw new VisionTimeoutError(`Ollama did not answer within ${timeoutMs}ms`, timeoutMs);
      }
      throw error;
    } finally {
      clearTimeout(timeoutId);
    }

    if (!rawResponse.ok) {
      throw new VisionAPIError(
        `Ollama API error ${rawResponse.status}: ${rawResponse.statusText}`,
        rawResponse.status
      );
    }
    const parsed = OllamaTagsResponseSchema.safeParse(await rawResponse.json());
    if (!parsed.success) {
      throw new VisionAPIError('Unexpected Ollama /api/tags response shape', rawResponse.status);
    }
    return parsed.data.models.map((m) => m.name);
  }

  /**
   * Build a FileRef from an image on disk.
   *
   * @throws UnsupportedFileTypeError for anything but png/jpg/jpeg/gif/webp
   * @throws FileTooLargeError above maxBytes
   */
  static fileRefFromPath(filePath: string, maxBytes: number): FileRef {
    const ext = path.extname(filePath).toLowerCase().slice(1);
    const mimeType = EXTENSION_MIME_TYPES[ext];
    if (!mimeType) {
      throw new UnsupportedFileTypeError(
        `Unsupported page image format '${ext}' (file: ${path.basename(filePath)}). ` +
          `Accepted: ${Object.keys(EXTENSION_MIME_TYPES).join(', ')}. ` +
          `Rasterize PDFs to one image per page first.`,
        filePath
      );
    }

    const buffer = fs.readFileSync(filePath);
    return { ...VisionClient.fileRefFromBuffer(buffer, mimeType, maxBytes), source: filePath };
  }

  static fileRefFromBuffer(buffer: Buffer, mimeType: AllowedMimeType, maxBytes: number): FileRef {
    if (!ALLOWED_MIME_TYPES.includes(mimeType)) {
      throw new UnsupportedFileTypeError(
        `Unsupported MIME type: ${mimeType}. Allowed: ${ALLOWED_MIME_TYPES.join(', ')}`,
        '(buffer)'
      );
    }
    if (buffer.length > maxBytes) {
      throw new FileTooLargeError(
        `Page image too large: ${buffer.length} bytes. Max: ${maxBytes}`,
        buffer.length,
        maxBytes
      );
    }
    return { mimeType, data: buffer.toString('base64'), sizeBytes: buffer.length };
  }

  /**
   * Size cap for page images under this client's configuration
   */
  maxFileBytes(): number {
    return maxFileBytes(this.config);
  }

  getStatus(): VisionClientStatus {
    return {
      model: this.config.model,
      baseUrl: this.config.baseUrl,
      circuitBreaker: this.circuitBreaker.getStatus(),
    };
  }

  reset(): void {
    this.circuitBreaker.reset();
  }
}
