import type { BatchRunResult, DocumentReport, MetricsSnapshot, ModelDiff } from '@varimodel/core';

import reporterPkg from '../../package.json';
import {
  type BatchReport,
  type DiffReport,
  type DocumentEntry,
  REPORT_FORMAT,
  type ReportMeta,
} from '../model/report.js';

const TOOL_NAME = reporterPkg.name;
const TOOL_VERSION = reporterPkg.version;

export interface ReportContext {
  modelPath?: string;
  mappingPath?: string;
  metrics?: MetricsSnapshot;
  now?: () => Date;
}

function buildMeta(context: ReportContext): ReportMeta {
  const now = context.now ?? (() => new Date());
  return {
    toolName: TOOL_NAME,
    toolVersion: TOOL_VERSION,
    timestamp: now().toISOString(),
    ...(context.modelPath !== undefined ? { modelPath: context.modelPath } : {}),
    ...(context.mappingPath !== undefined ? { mappingPath: context.mappingPath } : {}),
  };
}

function toEntry(report: DocumentReport): DocumentEntry {
  const { selection: _selection, ...entry } = report;
  return entry;
}

export function buildBatchReport(result: BatchRunResult, context: ReportContext = {}): BatchReport {
  return {
    format: REPORT_FORMAT,
    meta: buildMeta(context),
    summary: result.summary,
    documents: result.reports.map(toEntry),
    diagnostics: result.diagnostics,
    ...(context.metrics !== undefined ? { metrics: context.metrics } : {}),
  };
}

export function buildDiffReport(
  diff: ModelDiff,
  paths: { before: string; after: string },
  context: Pick<ReportContext, 'now'> = {}
): DiffReport {
  return {
    meta: buildMeta(context),
    beforePath: paths.before,
    afterPath: paths.after,
    diff,
  };
}
