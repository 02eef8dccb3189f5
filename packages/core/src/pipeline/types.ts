import type { DiagnosticEnvelope, DiagnosticSummary } from '../diag/envelope.js';
import type { FeatureModel } from '../model/feature-model.js';
import type { DocumentStatus } from '../translate/document-loader.js';
import type { ConfigurationSelection } from '../translate/translator.js';
import type { MetricsSnapshot } from '../util/metrics.js';

export type PipelineStageName = 'build' | 'translate' | 'validate';

export interface BuildModelResult {
  model: FeatureModel;
  /** Definitions expanded as kinds */
  roots: string[];
  /** Serialized model */
  text: string;
  /** Serialized id → description side file */
  descriptions: string;
  diagnostics: DiagnosticEnvelope[];
  summary: DiagnosticSummary;
  metrics: MetricsSnapshot;
}

/**
 * Outcome of one document. `valid` is only meaningful when `status` is
 * `ok`; every other status means the document was not validated.
 */
export interface DocumentReport {
  documentId: string;
  status: DocumentStatus | 'timeout' | 'unreadable';
  valid: boolean;
  violations: string[];
  unmappedKeys: string[];
  elapsedMs: number;
  error?: string;
  selection?: ConfigurationSelection;
}

export interface BatchSummary {
  documents: number;
  valid: number;
  invalid: number;
  skipped: number;
  failed: number;
  batchesCompleted: number;
  batchesSkipped: number;
  cancelled: boolean;
  diagnostics: DiagnosticSummary;
}

export interface BatchRunResult {
  reports: DocumentReport[];
  diagnostics: DiagnosticEnvelope[];
  summary: BatchSummary;
}

/** One row of the cross-tool comparison table */
export interface SummaryRow {
  filename: string;
  source: string;
  result: boolean;
  /** Seconds */
  time: number;
}
