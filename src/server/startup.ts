/**
 * Startup Validation
 *
 * Loads vision and grouping configuration once at boot so malformed
 * environment values show up in the server log before the first tool call.
 *
 * CRITICAL: NEVER use console.log() - stdout may be reserved for JSON-RPC protocol.
 *
 * @module server/startup
 */

import { loadGroupingConfig } from '../services/grouping/index.js';
import { loadCanonicalFieldKeys } from '../services/extraction/prompts.js';
import { loadVisionConfig } from '../services/vision/config.js';

/**
 * Check configuration and data files. Warnings only: tools report the same
 * problems as CONFIGURATION_ERROR when called.
 *
 * @returns The warnings printed, empty when everything loaded
 */
export function validateStartupDependencies(): string[] {
  const warnings: string[] = [];
  const describe = (error: unknown): string => (error instanceof Error ? error.message : String(error));

  try {
    const vision = loadVisionConfig();
    console.error(
      `[Config] vision model=${vision.model} base_url=${vision.baseUrl} max_pages=${vision.multiMaxPages} max_file_mb=${vision.maxFileMb}`
    );
  } catch (error) {
    warnings.push(`Vision configuration is invalid, extraction tools will fail: ${describe(error)}`);
  }

  try {
    const grouping = loadGroupingConfig();
    console.error(
      `[Config] grouping forward_fill=${grouping.forwardFill} bridge_gap=${grouping.bridgeGap} min_fields_for_new_doc=${grouping.minFieldsForNewDoc} min_key_overlap=${grouping.minKeyOverlapForContinuation}`
    );
  } catch (error) {
    warnings.push(`Grouping configuration is invalid: ${describe(error)}`);
  }

  try {
    loadCanonicalFieldKeys();
  } catch (error) {
    warnings.push(`Canonical field list could not be loaded: ${describe(error)}`);
  }

  if (warnings.length > 0) {
    console.error('=== STARTUP WARNINGS ===');
    for (const w of warnings) {
      console.error(`  - ${w}`);
    }
    console.error('========================');
  }

  return warnings;
}
