import { describe, expect, it } from 'vitest';

import { MetricsCollector } from '@varimodel/core';

import { FIXED_NOW, sampleRunResult } from './__fixtures__/run-result.js';
import { buildBatchReport } from './engine/report-builder.js';
import { checkReportShape, isBatchReport } from './report-shape.js';

describe('batch report schema', () => {
  const report = buildBatchReport(sampleRunResult(), {
    modelPath: 'model.uvl',
    metrics: new MetricsCollector({ now: () => 0 }).snapshotMetrics(),
    now: FIXED_NOW,
  });

  it('accepts built reports, also after a JSON round trip', () => {
    expect(checkReportShape(report)).toEqual([]);
    expect(checkReportShape(JSON.parse(JSON.stringify(report)))).toEqual([]);
    expect(isBatchReport(report)).toBe(true);
  });

  it('reports missing sections', () => {
    const { summary: _summary, ...withoutSummary } = report;
    expect(checkReportShape(withoutSummary)).toEqual(["/ must have required property 'summary'"]);
    expect(isBatchReport(withoutSummary)).toBe(false);
  });

  it('reports unknown document statuses by path', () => {
    const [first, ...rest] = report.documents;
    const broken = { ...report, documents: [{ ...first, status: 'lost' }, ...rest] };
    expect(checkReportShape(broken)).toEqual([
      '/documents/0/status must be equal to one of the allowed values',
    ]);
  });
});
