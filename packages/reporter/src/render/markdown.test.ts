import { describe, expect, it } from 'vitest';

import type { ModelDiff } from '@varimodel/core';

import { FIXED_NOW, sampleRunResult } from '../__fixtures__/run-result.js';
import { buildBatchReport, buildDiffReport } from '../engine/report-builder.js';
import { renderMarkdownDiff, renderMarkdownReport } from './markdown.js';

describe('renderMarkdownReport', () => {
  it('renders summary, diagnostics, documents and findings', () => {
    const report = buildBatchReport(sampleRunResult(), {
      modelPath: 'model.uvl',
      mappingPath: 'map.tsv',
      now: FIXED_NOW,
    });

    expect(renderMarkdownReport(report)).toBe(
      [
        '# Validation Report',
        '',
        '- Tool: @varimodel/reporter 0.1.0',
        '- Generated: 2026-01-02T03:04:05.000Z',
        '- Model: model.uvl',
        '- Mapping: map.tsv',
        '',
        '## Summary',
        '',
        '| Documents | Valid | Invalid | Skipped | Failed |',
        '|---|---|---|---|---|',
        '| 4 | 1 | 1 | 1 | 1 |',
        '',
        '- Batches: 2 completed, 0 skipped from checkpoint',
        '',
        '## Diagnostics',
        '',
        '| Code | Count |',
        '|---|---|',
        '| DOCUMENT_SKIPPED | 1 |',
        '| TRANSLATION_TIMEOUT | 1 |',
        '| UNMAPPED_KEY | 1 |',
        '',
        '## Documents',
        '',
        '| Document | Status | Result | Time (ms) |',
        '|---|---|---|---|',
        '| a.yaml#0 | ok | valid | 2 |',
        '| b.yaml#0 | ok | invalid | 1.50 |',
        '| c.yaml#0 | templated | skipped | 0 |',
        '| d.yaml#1 | timeout | failed | 5000 |',
        '',
        '## Findings',
        '',
        '### b.yaml#0',
        '',
        '- Violations:',
        '  - `mandatory:Pod.spec.containers`',
        '- Unmapped keys:',
        '  - `foo.bar`',
        '',
        '### d.yaml#1',
        '',
        '- Error: Translation exceeded its time budget at spec',
        '',
      ].join('\n')
    );
  });

  it('handles an empty run and escapes table cells', () => {
    const result = sampleRunResult();
    const empty = buildBatchReport(
      {
        reports: [],
        diagnostics: [],
        summary: { ...result.summary, documents: 0, valid: 0, invalid: 0, skipped: 0, failed: 0, cancelled: true, diagnostics: {} },
      },
      { now: FIXED_NOW }
    );
    const markdown = renderMarkdownReport(empty);
    expect(markdown).toContain('- Cancelled before every batch was submitted\n');
    expect(markdown).toContain('## Diagnostics\n\nNo diagnostics.\n');
    expect(markdown).toContain('## Documents\n\nNo documents found.\n');
    expect(markdown.endsWith('## Findings\n\nNo findings.\n')).toBe(true);

    const piped = buildBatchReport(
      {
        ...result,
        reports: [
          { documentId: 'x|y.yaml#0', status: 'ok', valid: true, violations: [], unmappedKeys: [], elapsedMs: 3 },
        ],
      },
      { now: FIXED_NOW }
    );
    expect(renderMarkdownReport(piped)).toContain('| x\\|y.yaml#0 | ok | valid | 3 |\n');
  });
});

describe('renderMarkdownDiff', () => {
  it('lists only the non-empty sections', () => {
    const diff: ModelDiff = {
      addedFeatures: ['A.w'],
      removedFeatures: ['A.z'],
      changedFeatures: [{ id: 'A.x', changes: ['type: "String" -> "Integer"'] }],
      addedConstraints: ['A.y => A.x'],
      removedConstraints: [],
    };
    const report = buildDiffReport(diff, { before: 'v1.uvl', after: 'v2.uvl' }, { now: FIXED_NOW });

    expect(renderMarkdownDiff(report)).toBe(
      [
        '# Model Changes',
        '',
        '- Before: v1.uvl',
        '- After: v2.uvl',
        '- Generated: 2026-01-02T03:04:05.000Z',
        '',
        '## Added features',
        '',
        '- `A.w`',
        '',
        '## Removed features',
        '',
        '- `A.z`',
        '',
        '## Changed features',
        '',
        '- `A.x`',
        '  - type: "String" -> "Integer"',
        '',
        '## Added constraints',
        '',
        '- `A.y => A.x`',
        '',
      ].join('\n')
    );
  });

  it('says so when nothing changed', () => {
    const report = buildDiffReport(
      {
        addedFeatures: [],
        removedFeatures: [],
        changedFeatures: [],
        addedConstraints: [],
        removedConstraints: [],
      },
      { before: 'a.uvl', after: 'b.uvl' },
      { now: FIXED_NOW }
    );
    expect(renderMarkdownDiff(report)).toBe(
      '# Model Changes\n\n- Before: a.uvl\n- After: b.uvl\n- Generated: 2026-01-02T03:04:05.000Z\n\nNo changes.\n'
    );
  });
});
