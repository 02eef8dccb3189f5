export {
  REPORT_FORMAT,
  outcomeOf,
  type BatchReport,
  type DiffReport,
  type DocumentEntry,
  type DocumentOutcome,
  type ReportMeta,
} from './model/report.js';
export { buildBatchReport, buildDiffReport, type ReportContext } from './engine/report-builder.js';
export { renderMarkdownReport, renderMarkdownDiff } from './render/markdown.js';
export { renderSummaryCsv, SUMMARY_CSV_HEADER } from './render/csv.js';
export {
  REPORT_FORMATS,
  REPORT_EXTENSIONS,
  type ReportFormat,
  parseFormats,
  renderJsonReport,
  formatBatchReport,
} from './render/format.js';
export { checkReportShape, isBatchReport } from './report-shape.js';
