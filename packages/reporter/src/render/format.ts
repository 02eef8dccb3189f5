import { toSummaryRows } from '@varimodel/core';

import type { BatchReport } from '../model/report.js';
import { renderSummaryCsv } from './csv.js';
import { renderMarkdownReport } from './markdown.js';

export const REPORT_FORMATS = ['json', 'markdown', 'csv'] as const;
export type ReportFormat = (typeof REPORT_FORMATS)[number];

export const REPORT_EXTENSIONS: Record<ReportFormat, string> = {
  json: '.json',
  markdown: '.md',
  csv: '.csv',
};

function isReportFormat(value: string): value is ReportFormat {
  return REPORT_FORMATS.some((format) => format === value);
}

/** Comma-separated format list; defaults to json */
export function parseFormats(flagValue: string | undefined): ReportFormat[] {
  if (!flagValue) return ['json'];
  const requested = flagValue
    .split(',')
    .map((value) => value.trim().toLowerCase())
    .filter(Boolean);
  if (!requested.length) {
    throw new Error('At least one format must be provided.');
  }
  const invalid = requested.filter((format) => !isReportFormat(format));
  if (invalid.length) {
    throw new Error(
      `Unsupported format(s): ${invalid.join(', ')}. Expected one of ${REPORT_FORMATS.join(', ')}.`
    );
  }
  return [...new Set(requested.filter(isReportFormat))];
}

export function renderJsonReport(report: BatchReport): string {
  return `${JSON.stringify(report, null, 2)}\n`;
}

export function formatBatchReport(report: BatchReport, format: ReportFormat): string {
  switch (format) {
    case 'json':
      return renderJsonReport(report);
    case 'markdown':
      return renderMarkdownReport(report);
    case 'csv':
      return renderSummaryCsv(toSummaryRows(report.documents));
  }
}
