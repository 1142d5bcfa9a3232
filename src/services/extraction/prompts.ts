/**
 * Extraction Prompts for Identity and KYC Document Pages
 *
 * One consolidated system prompt per page. The canonical key list is
 * enumerated inline so the model anchors extractions to known field names.
 *
 * @module services/extraction/prompts
 */

import * as fs from 'fs';
import * as path from 'path';
import { fileURLToPath } from 'url';
import { z } from 'zod';

const __dirname = path.dirname(fileURLToPath(import.meta.url));

/** data/ sits at the project root, three levels above src/services/extraction and dist/services/extraction */
const CANONICAL_FIELDS_PATH = path.resolve(__dirname, '..', '..', '..', 'data', 'canonical-fields.json');

const CanonicalFieldsFileSchema = z.object({
  description: z.string().optional(),
  keys: z.array(z.string().min(1)).min(1),
});

export const EXTRACTION_SYSTEM_PROMPT = `You extract structured data from a single page of an identity, KYC or supporting document.

OBJECTIVE:
Report only what is printed or written on this page. Accuracy beats completeness.

RULES:
- Extract a field only when its value is legible on the page.
- Never infer, complete or reformat hidden or cut-off data.
- If you are unsure about a value, leave it out.
- Use the canonical keys below for standard information (names, dates, document numbers, addresses).
- Put any other clearly labeled value in extra_fields under a descriptive snake_case name.
- Give every value as an object {"value": "...", "confidence": 0.0-1.0}.
- Use a confidence below 0.6 for text that is partly unclear.

OUTPUT FORMAT:
Return one JSON object with exactly the keys doc_type, fields and extra_fields.
doc_type is a short lowercase label such as "passport", "utility_bill" or "bank_statement", or null when the page alone does not show what document it belongs to.
No markdown. No explanations.

CONTINUATION PAGES:
When a page continues a document that started on an earlier page of the same upload (back side, signature page, terms, restrictions, attestation), repeat the doc_type used for that document word for word. Emit a different doc_type only when layout and content clearly show a different document.`;

let _canonicalKeys: readonly string[] | null = null;

/**
 * Canonical field keys offered to the model, read once from data/canonical-fields.json.
 *
 * @throws Error when the file is missing or malformed
 */
export function loadCanonicalFieldKeys(): readonly string[] {
  if (_canonicalKeys) {
    return _canonicalKeys;
  }

  const raw: unknown = JSON.parse(fs.readFileSync(CANONICAL_FIELDS_PATH, 'utf-8'));
  const parsed = CanonicalFieldsFileSchema.safeParse(raw);
  if (!parsed.success) {
    throw new Error(
      `Invalid canonical field list at ${CANONICAL_FIELDS_PATH}: ${parsed.error.errors.map((e) => e.message).join('; ')}`
    );
  }

  _canonicalKeys = Object.freeze([...new Set(parsed.data.keys)]);
  return _canonicalKeys;
}

/**
 * Build the system prompt for one page.
 *
 * @param allowedKeys - Canonical keys the model may use in `fields`
 * @param docTypeHint - Expected document type, when the caller already knows it
 */
export function buildPrompt(allowedKeys: readonly string[], docTypeHint?: string): string {
  const hint = docTypeHint?.trim()
    ? `Document type hint: this page is expected to belong to a "${docTypeHint.trim()}". Use that doc_type unless the page clearly shows otherwise.`
    : 'Infer doc_type from the visual layout and headings.';

  return [
    EXTRACTION_SYSTEM_PROMPT,
    `Canonical keys: [${allowedKeys.join(', ')}].`,
    hint,
    'Always include fields and extra_fields, as empty objects when nothing applies.',
    'Minimal valid answer: {"doc_type": null, "fields": {}, "extra_fields": {}}',
  ].join('\n');
}
