/**
 * Model Output Normalization
 *
 * Turns the vision model's text answer into a PageResult. The model is asked
 * for `{value, confidence}` objects but routinely returns bare strings, arrays,
 * nested objects or confidence as a string; every shape converges here.
 *
 * @module services/extraction/normalizer
 */

import { z } from 'zod';

import type { FieldMap, FieldValue, PageResult } from '../../models/index.js';
import { ExtractionError } from '../vision/errors.js';

export interface ConfidenceBounds {
  defaultConfidence: number;
  minConfidence: number;
  maxConfidence: number;
}

export const RawExtractionSchema = z.object({
  doc_type: z.string().nullable().optional(),
  fields: z.record(z.string(), z.unknown()).nullable().optional(),
  extra_fields: z.record(z.string(), z.unknown()).nullable().optional(),
});

export type RawExtraction = z.infer<typeof RawExtractionSchema>;

const VALUE_KEYS = ['value', 'VALUE', 'val'] as const;

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isScalar(value: unknown): value is string | number | boolean {
  return typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean';
}

/**
 * Parse the model's text as JSON: whole text after stripping markdown fences,
 * then the outermost `{...}` block.
 *
 * @throws ExtractionError on blank or unparseable output
 */
export function parseModelJson(text: string): unknown {
  if (!text || text.trim().length === 0) {
    throw new ExtractionError('Vision model returned an empty response');
  }

  const clean = text.replace(/```(?:json)?\n?|\n?```/g, '').trim();
  try {
    return JSON.parse(clean);
  } catch (error) {
    console.error(
      `[Normalizer] Full response is not JSON, trying embedded object: ${error instanceof Error ? error.message : String(error)}`
    );
  }

  const firstBrace = clean.indexOf('{');
  const lastBrace = clean.lastIndexOf('}');
  if (firstBrace !== -1 && lastBrace > firstBrace) {
    try {
      return JSON.parse(clean.slice(firstBrace, lastBrace + 1));
    } catch (error) {
      console.error(
        `[Normalizer] Embedded object is not JSON either: ${error instanceof Error ? error.message : String(error)}`
      );
    }
  }

  throw new ExtractionError(
    `Vision model output is not valid JSON (${text.length} chars)`,
    text.slice(0, 200)
  );
}

/**
 * Flatten any model-returned value into a plain string.
 */
export function flattenValue(raw: unknown): string {
  if (raw === null || raw === undefined) {
    return '';
  }
  if (Array.isArray(raw)) {
    return raw
      .filter((item) => item !== null && item !== undefined)
      .map((item) => flattenValue(item))
      .join(' ');
  }
  if (isPlainObject(raw)) {
    for (const key of VALUE_KEYS) {
      const candidate = raw[key];
      if (candidate !== null && candidate !== undefined) {
        return flattenValue(candidate);
      }
    }
    const firstScalar = Object.values(raw).find(isScalar);
    return firstScalar === undefined ? '' : String(firstScalar);
  }
  return isScalar(raw) ? String(raw) : '';
}

function parseConfidence(raw: unknown): number | undefined {
  if (typeof raw === 'number') {
    return Number.isFinite(raw) ? raw : undefined;
  }
  if (typeof raw === 'string' && raw.trim() !== '') {
    const parsed = Number(raw.trim());
    return Number.isFinite(parsed) ? parsed : undefined;
  }
  return undefined;
}

function clamp(value: number, min: number, max: number): number {
  return Math.min(max, Math.max(min, value));
}

/**
 * Coerce one raw field into a FieldValue. Confidence comes from the object's
 * `confidence` key when numeric, else the default, and is clamped into bounds.
 */
export function fieldValueFromAny(raw: unknown, bounds: ConfidenceBounds): FieldValue {
  const rawConfidence = isPlainObject(raw) ? parseConfidence(raw.confidence) : undefined;
  return {
    value: flattenValue(raw).trim(),
    confidence: clamp(rawConfidence ?? bounds.defaultConfidence, bounds.minConfidence, bounds.maxConfidence),
  };
}

function normalizeFieldMap(
  src: Record<string, unknown> | null | undefined,
  bounds: ConfidenceBounds
): FieldMap {
  const out: FieldMap = {};
  for (const [key, value] of Object.entries(src ?? {})) {
    out[key] = fieldValueFromAny(value, bounds);
  }
  return out;
}

/**
 * Convert a schema-checked model answer into the PageResult for `pageIndex`.
 */
export function normalizeRawExtraction(
  raw: RawExtraction,
  pageIndex: number,
  bounds: ConfidenceBounds
): PageResult {
  const docType = raw.doc_type?.trim();
  return {
    pageIndex,
    docType: docType ? docType : null,
    fields: normalizeFieldMap(raw.fields, bounds),
    extraFields: normalizeFieldMap(raw.extra_fields, bounds),
  };
}

/**
 * Parse and normalize the model's text answer in one step.
 *
 * @throws ExtractionError when the text is not JSON or not an extraction object
 */
export function normalizeModelText(text: string, pageIndex: number, bounds: ConfidenceBounds): PageResult {
  const parsed = RawExtractionSchema.safeParse(parseModelJson(text));
  if (!parsed.success) {
    throw new ExtractionError(
      `Vision model output does not match the extraction shape: ${parsed.error.errors
        .map((e) => `${e.path.join('.') || '(root)'}: ${e.message}`)
        .join('; ')}`,
      text.slice(0, 200)
    );
  }
  return normalizeRawExtraction(parsed.data, pageIndex, bounds);
}
