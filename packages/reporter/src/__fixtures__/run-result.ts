import type { BatchRunResult } from '@varimodel/core';

export const FIXED_NOW = (): Date => new Date('2026-01-02T03:04:05.000Z');

export function sampleRunResult(): BatchRunResult {
  return {
    reports: [
      {
        documentId: 'a.yaml#0',
        status: 'ok',
        valid: true,
        violations: [],
        unmappedKeys: [],
        elapsedMs: 2,
      },
      {
        documentId: 'b.yaml#0',
        status: 'ok',
        valid: false,
        violations: ['mandatory:Pod.spec.containers'],
        unmappedKeys: ['foo.bar'],
        elapsedMs: 1.5,
        selection: {
          selectedFeatureIds: ['Model', 'Pod', 'Pod.spec'],
          attributeValues: {},
          unmappedKeys: ['foo.bar'],
        },
      },
      {
        documentId: 'c.yaml#0',
        status: 'templated',
        valid: false,
        violations: [],
        unmappedKeys: [],
        elapsedMs: 0,
      },
      {
        documentId: 'd.yaml#1',
        status: 'timeout',
        valid: false,
        violations: [],
        unmappedKeys: [],
        elapsedMs: 5000,
        error: 'Translation exceeded its time budget at spec',
      },
    ],
    diagnostics: [
      {
        code: 'UNMAPPED_KEY',
        canonPath: 'foo.bar',
        phase: 'translate',
        details: { documentId: 'b.yaml#0' },
      },
      {
        code: 'DOCUMENT_SKIPPED',
        canonPath: 'c.yaml#0',
        phase: 'batch',
        details: { status: 'templated' },
      },
      {
        code: 'TRANSLATION_TIMEOUT',
        canonPath: 'd.yaml#1',
        phase: 'batch',
        details: { budgetMs: 5000 },
      },
    ],
    summary: {
      documents: 4,
      valid: 1,
      invalid: 1,
      skipped: 1,
      failed: 1,
      batchesCompleted: 2,
      batchesSkipped: 0,
      cancelled: false,
      diagnostics: { DOCUMENT_SKIPPED: 1, TRANSLATION_TIMEOUT: 1, UNMAPPED_KEY: 1 },
    },
  };
}
