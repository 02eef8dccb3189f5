import {
  type BatchReport,
  type DiffReport,
  type DocumentEntry,
  outcomeOf,
} from '../model/report.js';

function escapeCell(value: string): string {
  return value.replace(/\|/g, '\\|');
}

function formatMs(value: number): string {
  return Number.isInteger(value) ? String(value) : value.toFixed(2);
}

function renderMeta(report: BatchReport): string[] {
  const { meta } = report;
  const lines = [
    `- Tool: ${meta.toolName} ${meta.toolVersion}`,
    `- Generated: ${meta.timestamp}`,
  ];
  if (meta.modelPath) lines.push(`- Model: ${meta.modelPath}`);
  if (meta.mappingPath) lines.push(`- Mapping: ${meta.mappingPath}`);
  return lines;
}

function renderSummary(report: BatchReport): string[] {
  const s = report.summary;
  const lines = [
    '| Documents | Valid | Invalid | Skipped | Failed |',
    '|---|---|---|---|---|',
    `| ${s.documents} | ${s.valid} | ${s.invalid} | ${s.skipped} | ${s.failed} |`,
    '',
    `- Batches: ${s.batchesCompleted} completed, ${s.batchesSkipped} skipped from checkpoint`,
  ];
  if (s.cancelled) lines.push('- Cancelled before every batch was submitted');
  return lines;
}

function renderDiagnosticCounts(report: BatchReport): string[] {
  const entries = Object.entries(report.summary.diagnostics);
  if (!entries.length) return ['No diagnostics.'];
  return [
    '| Code | Count |',
    '|---|---|',
    ...entries.map(([code, count]) => `| ${code} | ${count ?? 0} |`),
  ];
}

function renderDocumentTable(documents: DocumentEntry[]): string[] {
  if (!documents.length) return ['No documents found.'];
  return [
    '| Document | Status | Result | Time (ms) |',
    '|---|---|---|---|',
    ...documents.map(
      (doc) =>
        `| ${escapeCell(doc.documentId)} | ${doc.status} | ${outcomeOf(doc)} | ${formatMs(doc.elapsedMs)} |`
    ),
  ];
}

function renderFindings(documents: DocumentEntry[]): string[] {
  const lines: string[] = [];
  for (const doc of documents) {
    if (!doc.violations.length && !doc.unmappedKeys.length && doc.error === undefined) {
      continue;
    }
    lines.push(`### ${doc.documentId}`, '');
    if (doc.violations.length) {
      lines.push('- Violations:');
      doc.violations.forEach((v) => lines.push(`  - \`${v}\``));
    }
    if (doc.unmappedKeys.length) {
      lines.push('- Unmapped keys:');
      doc.unmappedKeys.forEach((k) => lines.push(`  - \`${k}\``));
    }
    if (doc.error !== undefined) lines.push(`- Error: ${doc.error}`);
    lines.push('');
  }
  if (!lines.length) return ['No findings.', ''];
  return lines;
}

export function renderMarkdownReport(report: BatchReport): string {
  const lines: string[] = ['# Validation Report', ''];
  lines.push(...renderMeta(report), '');
  lines.push('## Summary', '', ...renderSummary(report), '');
  lines.push('## Diagnostics', '', ...renderDiagnosticCounts(report), '');
  lines.push('## Documents', '', ...renderDocumentTable(report.documents), '');
  lines.push('## Findings', '', ...renderFindings(report.documents));
  return lines.join('\n');
}

function renderList(title: string, items: string[]): string[] {
  if (!items.length) return [];
  return [`## ${title}`, '', ...items.map((item) => `- \`${item}\``), ''];
}

export function renderMarkdownDiff(report: DiffReport): string {
  const { diff } = report;
  const lines: string[] = [
    '# Model Changes',
    '',
    `- Before: ${report.beforePath}`,
    `- After: ${report.afterPath}`,
    `- Generated: ${report.meta.timestamp}`,
    '',
  ];
  const sections = [
    ...renderList('Added features', diff.addedFeatures),
    ...renderList('Removed features', diff.removedFeatures),
  ];
  if (diff.changedFeatures.length) {
    sections.push('## Changed features', '');
    for (const change of diff.changedFeatures) {
      sections.push(`- \`${change.id}\``);
      change.changes.forEach((c) => sections.push(`  - ${c}`));
    }
    sections.push('');
  }
  sections.push(
    ...renderList('Added constraints', diff.addedConstraints),
    ...renderList('Removed constraints', diff.removedConstraints)
  );
  if (!sections.length) sections.push('No changes.', '');
  return [...lines, ...sections].join('\n');
}
