import type { SummaryRow } from '@varimodel/core';

export const SUMMARY_CSV_HEADER = 'filename,source,result,time';

function csvField(value: string): string {
  return /[",\n\r]/.test(value) ? `"${value.replace(/"/g, '""')}"` : value;
}

/** Cross-tool comparison table, one row per document */
export function renderSummaryCsv(rows: readonly SummaryRow[]): string {
  const lines = [SUMMARY_CSV_HEADER];
  for (const row of rows) {
    lines.push(
      [csvField(row.filename), csvField(row.source), String(row.result), String(row.time)].join(',')
    );
  }
  return `${lines.join('\n')}\n`;
}
