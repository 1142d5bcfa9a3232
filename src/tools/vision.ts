/**
 * Vision Model Status MCP Tool
 *
 * CRITICAL: NEVER use console.log() - stdout is reserved for JSON-RPC protocol.
 * Use console.error() for all logging.
 *
 * @module tools/vision
 */

import { z } from 'zod';

import { configurationError } from '../server/errors.js';
import { successResult } from '../server/types.js';
import { loadGroupingConfig, type GroupingConfig } from '../services/grouping/index.js';
import { getSharedClient, type VisionClient } from '../services/vision/client.js';
import { validateInput } from '../utils/validation.js';
import { formatResponse, handleError, type ToolDefinition, type ToolResponse } from './shared.js';

const VisionStatusInput = z.object({
  check_server: z.boolean().default(true),
});

/** Ollama reports "llava:latest" for a configured "llava" */
function modelIsPulled(configured: string, available: string[]): boolean {
  return available.some((name) => name === configured || name.startsWith(`${configured}:`));
}

/**
 * Handle kyc_vision_status - Report vision client state and effective configuration
 */
export async function handleVisionStatus(params: Record<string, unknown>): Promise<ToolResponse> {
  try {
    const input = validateInput(VisionStatusInput, params);

    let client: VisionClient;
    let grouping: GroupingConfig;
    try {
      client = getSharedClient();
      grouping = loadGroupingConfig();
    } catch (error) {
      throw configurationError(
        `Invalid configuration: ${error instanceof Error ? error.message : String(error)}`
      );
    }

    const config = client.getConfig();
    const status = client.getStatus();

    let server: Record<string, unknown> | undefined;
    if (input.check_server) {
      try {
        const models = await client.listModels();
        server = {
          reachable: true,
          model_available: modelIsPulled(config.model, models),
          models,
        };
      } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        console.error(`[VisionStatus] Ollama probe failed: ${message}`);
        server = { reachable: false, error: message };
      }
    }

    return formatResponse(
      successResult({
        model: status.model,
        base_url: status.baseUrl,
        ...(server && { server }),
        circuit_breaker: {
          state: status.circuitBreaker.state,
          failure_count: status.circuitBreaker.failureCount,
          time_to_recovery: status.circuitBreaker.timeToRecovery,
        },
        limits: {
          max_file_mb: config.maxFileMb,
          multi_max_pages: config.multiMaxPages,
          request_timeout_ms: config.requestTimeoutMs,
        },
        confidence: {
          default: config.defaultConfidence,
          min: config.minConfidence,
          max: config.maxConfidence,
        },
        grouping: {
          forward_fill: grouping.forwardFill,
          bridge_gap: grouping.bridgeGap,
          min_fields_for_new_doc: grouping.minFieldsForNewDoc,
          min_key_overlap_for_continuation: grouping.minKeyOverlapForContinuation,
        },
        next_steps: [
          { tool: 'kyc_extract_multi', description: 'Extract and group a multi-page upload' },
          { tool: 'kyc_extract_document', description: 'Extract one or more single-page documents' },
        ],
      })
    );
  } catch (error) {
    return handleError(error);
  }
}

export const visionTools: Record<string, ToolDefinition> = {
  kyc_vision_status: {
    description:
      '[STATUS] Use to check the vision model setup: Ollama reachability, whether the configured model is pulled, circuit breaker state, limits and grouping thresholds.',
    inputSchema: {
      check_server: z
        .boolean()
        .default(true)
        .describe('Probe the Ollama server for reachability and pulled models'),
    },
    handler: handleVisionStatus,
  },
};
