/**
 * Page Grouping Configuration
 *
 * Thresholds for repairing missing document-type labels and cutting the page
 * sequence into logical documents. Passed explicitly into the grouping
 * functions; nothing in the engine reads process state.
 *
 * Tuning:
 *   - Raise minFieldsForNewDoc if documents often share only a handful of keys.
 *   - Raise minKeyOverlapForContinuation to be stricter about joining pages.
 *   - Disable forwardFill when doc_type hallucinations cascade across pages.
 *   - Disable bridgeGap if single stray pages should stay isolated for auditing.
 *
 * @module services/grouping/config
 */

import { z } from 'zod';
import { validateInput } from '../../utils/validation.js';
import { parseBoolEnv, parseIntEnv } from '../../utils/env.js';

export const GroupingConfigSchema = z.object({
  /** Inherit the previous page's label on continuation pages */
  forwardFill: z.boolean().default(true),
  /** Fill the middle of an A, (none), A sandwich with A */
  bridgeGap: z.boolean().default(true),
  /** Novel keys on a page that signal a structurally different document */
  minFieldsForNewDoc: z.number().int().min(1).default(3),
  /** Shared keys needed to treat a page as a continuation of the previous one */
  minKeyOverlapForContinuation: z.number().int().min(0).default(1),
});

export type GroupingConfig = z.infer<typeof GroupingConfigSchema>;

export const DEFAULT_GROUPING_CONFIG: Readonly<GroupingConfig> = Object.freeze(
  GroupingConfigSchema.parse({})
);

/**
 * Validate overrides and fill the rest from defaults.
 *
 * @throws ValidationError when a threshold is out of range
 */
export function resolveGroupingConfig(overrides: Partial<GroupingConfig> = {}): GroupingConfig {
  return validateInput(GroupingConfigSchema, overrides);
}

/**
 * Load grouping configuration from environment variables, then apply overrides.
 *
 * Environment variables:
 *   GROUPING_FORWARD_FILL            — true/false (default: true)
 *   GROUPING_BRIDGE_GAP              — true/false (default: true)
 *   GROUPING_MIN_FIELDS_FOR_NEW_DOC  — integer >= 1 (default: 3)
 *   GROUPING_MIN_KEY_OVERLAP         — integer >= 0 (default: 1)
 */
export function loadGroupingConfig(overrides: Partial<GroupingConfig> = {}): GroupingConfig {
  return resolveGroupingConfig({
    forwardFill: overrides.forwardFill ?? parseBoolEnv('GROUPING_FORWARD_FILL'),
    bridgeGap: overrides.bridgeGap ?? parseBoolEnv('GROUPING_BRIDGE_GAP'),
    minFieldsForNewDoc:
      overrides.minFieldsForNewDoc ?? parseIntEnv('GROUPING_MIN_FIELDS_FOR_NEW_DOC'),
    minKeyOverlapForContinuation:
      overrides.minKeyOverlapForContinuation ?? parseIntEnv('GROUPING_MIN_KEY_OVERLAP'),
  });
}
