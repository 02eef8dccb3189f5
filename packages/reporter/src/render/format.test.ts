import { describe, expect, it } from 'vitest';

import { FIXED_NOW, sampleRunResult } from '../__fixtures__/run-result.js';
import { buildBatchReport } from '../engine/report-builder.js';
import { formatBatchReport, parseFormats } from './format.js';

describe('parseFormats', () => {
  it('defaults to json', () => {
    expect(parseFormats(undefined)).toEqual(['json']);
    expect(parseFormats('')).toEqual(['json']);
  });

  it('normalizes and dedupes', () => {
    expect(parseFormats('Markdown, csv,markdown')).toEqual(['markdown', 'csv']);
  });

  it('rejects empty lists and unknown formats', () => {
    expect(() => parseFormats(' , ')).toThrow('At least one format must be provided.');
    expect(() => parseFormats('json,html')).toThrow(
      'Unsupported format(s): html. Expected one of json, markdown, csv.'
    );
  });
});

describe('formatBatchReport', () => {
  const report = buildBatchReport(sampleRunResult(), { now: FIXED_NOW });

  it('renders json that parses back to the report', () => {
    const text = formatBatchReport(report, 'json');
    expect(text.endsWith('}\n')).toBe(true);
    expect(JSON.parse(text)).toEqual(report);
  });

  it('renders csv summary rows', () => {
    const lines = formatBatchReport(report, 'csv').split('\n');
    expect(lines[0]).toBe('filename,source,result,time');
    expect(lines[1]).toBe('a.yaml#0,varimodel,true,0.002');
    expect(lines).toHaveLength(6);
  });

  it('renders markdown', () => {
    expect(formatBatchReport(report, 'markdown').startsWith('# Validation Report\n')).toBe(true);
  });
});
