/**
 * Unit tests for first-non-empty-wins field merging
 */

import { describe, it, expect } from 'vitest';
import { mergeGroupFields } from '../../../src/services/grouping/index.js';
import type { PageResult } from '../../../src/models/index.js';

function pageWith(
  pageIndex: number,
  fields: PageResult['fields'],
  extraFields: PageResult['extraFields'] = {}
): PageResult {
  return { pageIndex, docType: 'passport', fields, extraFields };
}

describe('mergeGroupFields', () => {
  it('keeps the earliest value even when a later page is more confident', () => {
    const merged = mergeGroupFields([
      pageWith(0, { name: { value: 'DOE', confidence: 0.5 } }),
      pageWith(1, { name: { value: 'D0E', confidence: 0.99 } }),
    ]);
    expect(merged.mergedFields).toEqual({ name: { value: 'DOE', confidence: 0.5 } });
  });

  it('skips blank values so a later page can supply the key', () => {
    const merged = mergeGroupFields([
      pageWith(0, { surname: { value: '   ', confidence: 0.9 } }),
      pageWith(1, { surname: { value: 'OKAFOR', confidence: 0.7 } }),
    ]);
    expect(merged.mergedFields).toEqual({ surname: { value: 'OKAFOR', confidence: 0.7 } });
  });

  it('keeps a key seen only with blank values', () => {
    const merged = mergeGroupFields([
      pageWith(0, { middle_names: { value: '', confidence: 0.3 }, surname: { value: 'DOE', confidence: 0.9 } }),
      pageWith(1, { middle_names: { value: ' ', confidence: 0.6 } }, { remarks: { value: '', confidence: 0.2 } }),
    ]);
    expect(merged.mergedFields).toEqual({
      middle_names: { value: '', confidence: 0.3 },
      surname: { value: 'DOE', confidence: 0.9 },
    });
    expect(merged.mergedExtraFields).toEqual({ remarks: { value: '', confidence: 0.2 } });
  });

  it('merges canonical and extra fields independently', () => {
    const merged = mergeGroupFields([
      pageWith(0, { surname: { value: 'DOE', confidence: 0.8 } }, {}),
      pageWith(1, {}, { surname: { value: 'DOE J', confidence: 0.6 } }),
    ]);
    expect(merged.mergedFields).toEqual({ surname: { value: 'DOE', confidence: 0.8 } });
    expect(merged.mergedExtraFields).toEqual({ surname: { value: 'DOE J', confidence: 0.6 } });
  });

  it('unions keys across pages', () => {
    const merged = mergeGroupFields([
      pageWith(0, { surname: { value: 'DOE', confidence: 0.8 } }),
      pageWith(1, { date_of_expiry: { value: '2031-01-01', confidence: 0.7 } }),
    ]);
    expect(Object.keys(merged.mergedFields)).toEqual(['surname', 'date_of_expiry']);
  });

  it('returns empty maps for pages without fields', () => {
    expect(mergeGroupFields([pageWith(0, {}), pageWith(1, {})])).toEqual({
      mergedFields: {},
      mergedExtraFields: {},
    });
  });

  it('is deterministic and does not share objects with its input', () => {
    const pages = [
      pageWith(0, { surname: { value: 'DOE', confidence: 0.8 } }, { note: { value: 'x', confidence: 0.4 } }),
      pageWith(1, { surname: { value: 'ROE', confidence: 0.9 } }),
    ];
    const first = mergeGroupFields(pages);
    const second = mergeGroupFields(pages);

    expect(JSON.stringify(first)).toBe(JSON.stringify(second));
    expect(first.mergedFields.surname).not.toBe(pages[0].fields.surname);
  });
});
