/**
 * Data model for the reporting layer. Core result types are re-exported
 * unchanged; the report adds run metadata and drops per-document
 * selections, which belong to debugging output rather than reports.
 */
import type {
  BatchSummary,
  DiagnosticEnvelope,
  DocumentReport,
  MetricsSnapshot,
  ModelDiff,
} from '@varimodel/core';

export type { BatchSummary, DiagnosticEnvelope, MetricsSnapshot, ModelDiff };

export const REPORT_FORMAT = 'varimodel-batch-report/v1';

export interface ReportMeta {
  toolName: string;
  toolVersion: string;
  /** ISO-8601 */
  timestamp: string;
  modelPath?: string;
  mappingPath?: string;
}

export type DocumentEntry = Omit<DocumentReport, 'selection'>;

export interface BatchReport {
  format: typeof REPORT_FORMAT;
  meta: ReportMeta;
  summary: BatchSummary;
  documents: DocumentEntry[];
  diagnostics: DiagnosticEnvelope[];
  metrics?: MetricsSnapshot;
}

export interface DiffReport {
  meta: ReportMeta;
  beforePath: string;
  afterPath: string;
  diff: ModelDiff;
}

export type DocumentOutcome = 'valid' | 'invalid' | 'skipped' | 'failed';

const SKIPPED_STATUSES: ReadonlySet<DocumentEntry['status']> = new Set([
  'templated',
  'no-kind',
  'custom-resource',
]);

/** Same buckets as the batch summary counts */
export function outcomeOf(entry: DocumentEntry): DocumentOutcome {
  if (entry.status === 'ok') return entry.valid ? 'valid' : 'invalid';
  return SKIPPED_STATUSES.has(entry.status) ? 'skipped' : 'failed';
}
