/**
 * KYC Multi-Document Extraction - Zod Validation Schemas
 *
 * Input validation shared by the MCP tools: the validation error type, the
 * schema runner, path sanitization, and the wire shapes of page results and
 * grouping overrides.
 *
 * @module utils/validation
 */

import { z } from 'zod';
import * as path from 'path';
import { homedir, tmpdir } from 'os';

// ═══════════════════════════════════════════════════════════════════════════════
// CUSTOM ERROR CLASS
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Custom validation error with descriptive message
 */
export class ValidationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ValidationError';
  }
}

// ═══════════════════════════════════════════════════════════════════════════════
// HELPER FUNCTIONS
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Validate input against schema and throw descriptive error if invalid
 *
 * @param schema - Zod schema to validate against
 * @param input - Input value to validate
 * @returns Validated and typed input data (defaults applied)
 * @throws ValidationError listing every failing path
 */
export function validateInput<S extends z.ZodTypeAny>(schema: S, input: unknown): z.output<S> {
  const result = schema.safeParse(input);
  if (!result.success) {
    const errors = result.error.errors.map((e) => {
      const path = e.path.length > 0 ? `${e.path.join('.')}: ` : '';
      return `${path}${e.message}`;
    });
    throw new ValidationError(errors.join('; '));
  }
  return result.data;
}

// ═══════════════════════════════════════════════════════════════════════════════
// PATH SANITIZATION
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Directories page images may be read from.
 * KYC_MULTIDOC_ALLOWED_DIRS (comma-separated) extends the defaults.
 */
export function getDefaultAllowedBaseDirs(): string[] {
  const dirs = [homedir(), tmpdir(), process.cwd()].map((d) => path.resolve(d));

  const extra = process.env.KYC_MULTIDOC_ALLOWED_DIRS;
  if (extra) {
    for (const dir of extra.split(',')) {
      const trimmed = dir.trim();
      if (trimmed) {
        dirs.push(path.resolve(trimmed));
      }
    }
  }

  return dirs;
}

/**
 * Resolve a user-supplied path and make sure it stays inside the allowed directories.
 *
 * @throws ValidationError if the path contains null bytes, is a Windows path on a
 *   POSIX host, or escapes every allowed base directory
 */
export function sanitizePath(filePath: string, allowedBaseDirs?: string[]): string {
  if (filePath.includes('\0')) {
    throw new ValidationError('Path contains null bytes');
  }

  if (process.platform !== 'win32' && /^[a-zA-Z]:[/\\]/.test(filePath)) {
    throw new ValidationError(
      `Windows-style path detected: "${filePath}". ` +
        `Use the path as seen from the server host (e.g. a mounted directory).`
    );
  }

  const resolved = path.resolve(filePath);

  const baseDirs =
    allowedBaseDirs && allowedBaseDirs.length > 0 ? allowedBaseDirs : getDefaultAllowedBaseDirs();

  const resolvedBases = baseDirs.map((d) => path.resolve(d));
  const withinAllowed = resolvedBases.some(
    (base) => resolved === base || resolved.startsWith(base + path.sep)
  );
  if (!withinAllowed) {
    throw new ValidationError(
      `Path "${resolved}" is outside allowed directories: ${resolvedBases.join(', ')}. ` +
        `To allow this path, set KYC_MULTIDOC_ALLOWED_DIRS (comma-separated list of directories).`
    );
  }

  return resolved;
}

// ═══════════════════════════════════════════════════════════════════════════════
// WIRE SCHEMAS
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * A normalized field value as exchanged with MCP clients
 */
export const FieldValueInput = z.object({
  value: z.string(),
  confidence: z.number().min(0).max(1),
});

/**
 * One page result in snake_case wire format
 */
export const PageResultInput = z.object({
  page_index: z.number().int().min(0),
  doc_type: z.string().nullable().optional(),
  fields: z.record(FieldValueInput).default({}),
  extra_fields: z.record(FieldValueInput).default({}),
});

export type PageResultWire = z.output<typeof PageResultInput>;

/**
 * Optional per-request overrides for the grouping thresholds
 */
export const GroupingOverridesInput = {
  forward_fill: z.boolean().optional(),
  bridge_gap: z.boolean().optional(),
  min_fields_for_new_doc: z.number().int().min(1).optional(),
  min_key_overlap_for_continuation: z.number().int().min(0).optional(),
};
