/**
 * Unit tests for multi-document orchestration with a stubbed vision client
 */

import { describe, it, expect, vi, type Mock } from 'vitest';
import {
  extractMultiDocument,
  extractSingleDocument,
  type PageAnalyzer,
} from '../../../src/services/extraction/index.js';
import { DEFAULT_GROUPING_CONFIG } from '../../../src/services/grouping/index.js';
import { loadVisionConfig, type FileRef, type VisionResponse } from '../../../src/services/vision/index.js';

const config = loadVisionConfig({
  debugExtraction: false,
  defaultConfidence: 0.8,
  minConfidence: 0,
  maxConfidence: 1,
});

function fileRef(source: string): FileRef {
  return { mimeType: 'image/png', data: 'aW1n', sizeBytes: 3, source };
}

function answer(text: string): VisionResponse {
  return {
    text,
    model: 'llava',
    usage: { inputTokens: 0, outputTokens: 0, totalTokens: 0 },
    processingTimeMs: 1,
  };
}

function stubClient(
  impl: (prompt: string, file: FileRef) => Promise<VisionResponse>
): PageAnalyzer & { analyzeImage: Mock<PageAnalyzer['analyzeImage']> } {
  return {
    analyzeImage: vi.fn<PageAnalyzer['analyzeImage']>(impl),
    getConfig: () => config,
  };
}

const ANSWERS: Record<string, string> = {
  'p0.png': JSON.stringify({
    doc_type: 'passport',
    fields: {
      surname: { value: 'DOE', confidence: 0.9 },
      passport_number: { value: 'P123', confidence: 0.95 },
    },
    extra_fields: {},
  }),
  'p2.png': JSON.stringify({
    doc_type: 'passport',
    fields: { date_of_expiry: '2030-05-01' },
    extra_fields: {},
  }),
};

describe('extractMultiDocument', () => {
  it('groups pages and reports a failed page without failing the request', async () => {
    const client = stubClient((_prompt, file) => {
      const text = ANSWERS[file.source ?? ''];
      return text === undefined
        ? Promise.reject(new Error('Ollama API error 500: Internal Server Error'))
        : Promise.resolve(answer(text));
    });

    const result = await extractMultiDocument([fileRef('p0.png'), fileRef('p1.png'), fileRef('p2.png')], {
      client,
      groupingConfig: DEFAULT_GROUPING_CONFIG,
    });

    expect(result.documents).toEqual([
      {
        groupId: 0,
        docType: 'passport',
        pageIndices: [0, 1, 2],
        mergedFields: {
          surname: { value: 'DOE', confidence: 0.9 },
          passport_number: { value: 'P123', confidence: 0.95 },
          date_of_expiry: { value: '2030-05-01', confidence: 0.8 },
        },
        mergedExtraFields: {},
      },
    ]);
    expect(result.meta.totalPages).toBe(3);
    expect(result.meta.totalGroups).toBe(1);
    expect(result.meta.failedPages).toEqual([1]);
    expect(result.meta.requestId).toMatch(
      /^[0-9a-f]{8}-[0-9a-f]{4}-4[0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/
    );
    expect(result.meta.elapsedMs).toBeGreaterThanOrEqual(0);
  });

  it('issues every page call before any completes', async () => {
    const releases: Array<() => void> = [];
    const client = stubClient(
      () =>
        new Promise<VisionResponse>((resolve) => {
          releases.push(() => resolve(answer('{"doc_type": "id_card", "fields": {}, "extra_fields": {}}')));
        })
    );

    const pending = extractMultiDocument([fileRef('a'), fileRef('b'), fileRef('c')], {
      client,
      groupingConfig: DEFAULT_GROUPING_CONFIG,
    });
    expect(client.analyzeImage).toHaveBeenCalledTimes(3);

    // complete out of order
    for (const release of [...releases].reverse()) release();
    const result = await pending;

    expect(result.documents.map((d) => [d.docType, d.pageIndices])).toEqual([['id_card', [0, 1, 2]]]);
  });

  it('treats unparseable output as a failed page', async () => {
    const client = stubClient((_prompt, file) =>
      Promise.resolve(answer(file.source === 'bad' ? 'I cannot read this image.' : ANSWERS['p0.png']))
    );

    const result = await extractMultiDocument([fileRef('p0.png'), fileRef('bad')], {
      client,
      groupingConfig: DEFAULT_GROUPING_CONFIG,
    });

    expect(result.meta.failedPages).toEqual([1]);
    expect(result.documents.map((d) => d.pageIndices)).toEqual([[0, 1]]);
  });

  it('returns one unlabeled group when every page fails', async () => {
    const client = stubClient(() => Promise.reject(new Error('fetch failed')));

    const result = await extractMultiDocument([fileRef('a'), fileRef('b')], {
      client,
      groupingConfig: DEFAULT_GROUPING_CONFIG,
    });

    expect(result.documents).toEqual([
      { groupId: 0, docType: null, pageIndices: [0, 1], mergedFields: {}, mergedExtraFields: {} },
    ]);
    expect(result.meta.failedPages).toEqual([0, 1]);
  });

  it('sends the canonical key list in every prompt', async () => {
    const client = stubClient(() => Promise.resolve(answer('{}')));
    await extractMultiDocument([fileRef('a')], { client, groupingConfig: DEFAULT_GROUPING_CONFIG });

    const prompt = client.analyzeImage.mock.calls[0][0];
    expect(prompt).toContain('Canonical keys: [surname, given_names, first_name,');
    expect(prompt).toContain('Infer doc_type from the visual layout and headings.');
  });
});

describe('extractSingleDocument', () => {
  it('passes the doc type hint and returns page 0', async () => {
    const client = stubClient(() => Promise.resolve(answer(ANSWERS['p2.png'])));

    const page = await extractSingleDocument(fileRef('p2.png'), 'passport', client);

    expect(page).toEqual({
      pageIndex: 0,
      docType: 'passport',
      fields: { date_of_expiry: { value: '2030-05-01', confidence: 0.8 } },
      extraFields: {},
    });
    expect(client.analyzeImage.mock.calls[0][0]).toContain(
      'Document type hint: this page is expected to belong to a "passport".'
    );
  });

  it('propagates extraction errors', async () => {
    const client = stubClient(() => Promise.resolve(answer('')));
    await expect(extractSingleDocument(fileRef('x'), undefined, client)).rejects.toThrow(
      'Vision model returned an empty response'
    );
  });
});
