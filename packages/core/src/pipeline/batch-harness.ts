/**
 * Corpus validation: translate and validate every document under a set of
 * paths against one model and key mapping.
 *
 * Files are sorted and cut into batches of `batchSize` files
 * (`batch-1`, `batch-2`, ...). A checkpoint file records each completed batch
 * with its files; a restarted run skips a batch only while it still covers
 * the same files, and reprocesses it with a `CHECKPOINT_STALE` diagnostic
 * otherwise. Files are processed on a bounded pool; aborting
 * the signal stops submission and lets in-flight files finish.
 */

import type { Dirent } from 'node:fs';
import { readdir, stat } from 'node:fs/promises';
import { extname, join } from 'node:path';

import { DIAGNOSTIC_CODES, DIAGNOSTIC_PHASES } from '../diag/codes.js';
import {
  type DiagnosticEnvelope,
  makeDiagnostic,
  summarizeDiagnostics,
} from '../diag/envelope.js';
import { ErrorCode } from '../errors/codes.js';
import type { KeyMapper } from '../mapping/key-mapper.js';
import { type FeatureModel, type ModelIndex, indexModel } from '../model/feature-model.js';
import { type LoadedDocument, readDocumentFile } from '../translate/document-loader.js';
import { findKindFeature, translateDocument } from '../translate/translator.js';
import type { BatchOptions } from '../types/options.js';
import { resolveOptions } from '../types/options.js';
import { MetricsCollector } from '../util/metrics.js';
import { validateSelection } from '../validate/model-validator.js';
import { Checkpoint } from './checkpoint.js';
import type { BatchRunResult, BatchSummary, DocumentReport, SummaryRow } from './types.js';
import { WorkPool } from './work-pool.js';

const DOCUMENT_EXTENSIONS = new Set(['.yaml', '.yml', '.json']);

export interface ValidationBatchOptions {
  /** Files or directories; directories are walked recursively */
  paths: string[];
  model: FeatureModel | ModelIndex;
  mapper: KeyMapper;
  batch?: BatchOptions;
  signal?: AbortSignal;
  now?: () => number;
  metrics?: MetricsCollector;
  /** Keep each document's selection on its report */
  keepSelections?: boolean;
  onReport?: (report: DocumentReport) => void;
  onBatchComplete?: (batchId: string, reports: DocumentReport[]) => void;
}

function isFsError(error: unknown): boolean {
  return error instanceof Error && 'code' in error && typeof error.code === 'string';
}

async function walkDir(dir: string, onFile: (filePath: string) => void): Promise<void> {
  let dirents: Dirent[];
  try {
    dirents = await readdir(dir, { withFileTypes: true });
  } catch (error) {
    if (!isFsError(error)) throw error;
    // Surfaces as an unreadable unit when the batch reads it
    onFile(dir);
    return;
  }
  for (const dirent of dirents) {
    const fullPath = join(dir, dirent.name);
    if (dirent.isDirectory()) {
      await walkDir(fullPath, onFile);
    } else if (DOCUMENT_EXTENSIONS.has(extname(fullPath).toLowerCase())) {
      onFile(fullPath);
    }
  }
}

/**
 * Every document file under `paths`, sorted, without duplicates. Paths that
 * cannot be listed are kept as they are so the batch reports them unreadable.
 */
export async function discoverDocumentFiles(paths: readonly string[]): Promise<string[]> {
  const files = new Set<string>();
  for (const path of paths) {
    let isDirectory = false;
    try {
      isDirectory = (await stat(path)).isDirectory();
    } catch (error) {
      if (!isFsError(error)) throw error;
    }
    if (isDirectory) {
      await walkDir(path, (file) => files.add(file));
    } else {
      files.add(path);
    }
  }
  return [...files].sort();
}

function isModelIndex(value: FeatureModel | ModelIndex): value is ModelIndex {
  return 'nodes' in value && 'order' in value;
}

interface DocumentOutcome {
  report: DocumentReport;
  diagnostics: DiagnosticEnvelope[];
}

function skippedReport(doc: LoadedDocument): DocumentOutcome {
  const parseError = doc.status === 'parse-error';
  const report: DocumentReport = {
    documentId: doc.id,
    status: doc.status,
    valid: false,
    violations: [],
    unmappedKeys: [],
    elapsedMs: 0,
    ...(doc.error !== undefined ? { error: doc.error } : {}),
  };
  const diagnostic = parseError
    ? makeDiagnostic(DIAGNOSTIC_CODES.DOCUMENT_PARSE_FAILED, DIAGNOSTIC_PHASES.BATCH, doc.id, {
        error: doc.error,
      })
    : makeDiagnostic(DIAGNOSTIC_CODES.DOCUMENT_SKIPPED, DIAGNOSTIC_PHASES.BATCH, doc.id, {
        status: doc.status,
      });
  return { report, diagnostics: [diagnostic] };
}

interface DocumentContext {
  index: ModelIndex;
  mapper: KeyMapper;
  timeBudgetMs: number;
  now: () => number;
  metrics: MetricsCollector;
  keepSelections: boolean;
}

function processDocument(doc: LoadedDocument, ctx: DocumentContext): DocumentOutcome {
  if (doc.status !== 'ok') return skippedReport(doc);

  const started = ctx.now();
  const translated = translateDocument(doc.content, ctx.index, ctx.mapper, {
    deadline: started + ctx.timeBudgetMs,
    now: ctx.now,
  });
  const translatedAt = ctx.now();
  ctx.metrics.recordDuration('TRANSLATE', translatedAt - started);

  if (translated.isErr()) {
    const timeout = translated.error.errorCode === ErrorCode.TRANSLATION_TIMEOUT;
    return {
      report: {
        documentId: doc.id,
        status: timeout ? 'timeout' : 'parse-error',
        valid: false,
        violations: [],
        unmappedKeys: [],
        elapsedMs: translatedAt - started,
        error: translated.error.message,
      },
      diagnostics: [
        makeDiagnostic(
          timeout ? DIAGNOSTIC_CODES.TRANSLATION_TIMEOUT : DIAGNOSTIC_CODES.DOCUMENT_PARSE_FAILED,
          DIAGNOSTIC_PHASES.BATCH,
          doc.id,
          { budgetMs: ctx.timeBudgetMs }
        ),
      ],
    };
  }

  const selection = translated.value;
  const result = validateSelection(ctx.index, selection);
  const finished = ctx.now();
  ctx.metrics.recordDuration('VALIDATE', finished - translatedAt);

  const diagnostics = selection.unmappedKeys.map((key) =>
    makeDiagnostic(DIAGNOSTIC_CODES.UNMAPPED_KEY, DIAGNOSTIC_PHASES.TRANSLATE, key, {
      documentId: doc.id,
    })
  );
  return {
    report: {
      documentId: doc.id,
      status: 'ok',
      valid: result.valid,
      violations: result.violations,
      unmappedKeys: selection.unmappedKeys,
      elapsedMs: finished - started,
      ...(ctx.keepSelections ? { selection } : {}),
    },
    diagnostics,
  };
}

interface BatchState {
  id: string;
  files: string[];
  done: number;
  reports: DocumentReport[];
}

export function summarizeReports(
  reports: readonly DocumentReport[],
  diagnostics: readonly DiagnosticEnvelope[],
  counts: { batchesCompleted: number; batchesSkipped: number; cancelled: boolean }
): BatchSummary {
  let valid = 0;
  let invalid = 0;
  let skipped = 0;
  let failed = 0;
  for (const r of reports) {
    if (r.status === 'ok') {
      if (r.valid) valid += 1;
      else invalid += 1;
    } else if (r.status === 'templated' || r.status === 'no-kind' || r.status === 'custom-resource') {
      skipped += 1;
    } else {
      failed += 1;
    }
  }
  return {
    documents: reports.length,
    valid,
    invalid,
    skipped,
    failed,
    ...counts,
    diagnostics: summarizeDiagnostics(diagnostics),
  };
}

export async function runValidationBatch(
  options: ValidationBatchOptions
): Promise<BatchRunResult> {
  const { batch } = resolveOptions({ batch: options.batch });
  const index = isModelIndex(options.model) ? options.model : indexModel(options.model);
  const metrics = options.metrics ?? new MetricsCollector();
  const ctx: DocumentContext = {
    index,
    mapper: options.mapper,
    timeBudgetMs: batch.timeBudgetMs,
    now: options.now ?? Date.now,
    metrics,
    keepSelections: options.keepSelections ?? false,
  };
  const knownKinds = (apiVersion: string, kind: string): boolean =>
    findKindFeature(index, apiVersion, kind) !== undefined;

  let checkpoint: Checkpoint | undefined;
  if (batch.checkpointPath !== undefined) {
    const opened = await Checkpoint.open(batch.checkpointPath);
    if (opened.isErr()) throw opened.error;
    checkpoint = opened.value;
  }

  const files = await discoverDocumentFiles(options.paths);
  const ordinal = new Map(files.map((f, i): [string, number] => [f, i]));
  const reports: DocumentReport[] = [];
  const diagnostics: DiagnosticEnvelope[] = [];
  const pool = new WorkPool({ concurrency: batch.concurrency, maxQueue: batch.maxQueue });
  let batchesCompleted = 0;
  let batchesSkipped = 0;
  let cancelled = false;

  const finishBatch = async (state: BatchState): Promise<void> => {
    batchesCompleted += 1;
    if (checkpoint) await checkpoint.markCompleted(state.id, state.files);
    options.onBatchComplete?.(state.id, state.reports);
  };

  const processFile = async (file: string, state: BatchState): Promise<void> => {
    const loaded = await readDocumentFile(file, { knownKinds });
    const outcomes: DocumentOutcome[] = loaded.isErr()
      ? [
          {
            report: {
              documentId: `${file}#0`,
              status: 'unreadable',
              valid: false,
              violations: [],
              unmappedKeys: [],
              elapsedMs: 0,
              error: loaded.error.message,
            },
            diagnostics: [
              makeDiagnostic(DIAGNOSTIC_CODES.DOCUMENT_SKIPPED, DIAGNOSTIC_PHASES.BATCH, file, {
                status: 'unreadable',
              }),
            ],
          },
        ]
      : loaded.value.map((doc) => processDocument(doc, ctx));

    for (const outcome of outcomes) {
      reports.push(outcome.report);
      state.reports.push(outcome.report);
      diagnostics.push(...outcome.diagnostics);
      options.onReport?.(outcome.report);
    }
    metrics.addCount('documentsProcessed', outcomes.length);
    state.done += 1;
    if (state.done === state.files.length) await finishBatch(state);
  };

  submission: for (let start = 0; start < files.length; start += batch.batchSize) {
    const batchFiles = files.slice(start, start + batch.batchSize);
    const state: BatchState = {
      id: `batch-${start / batch.batchSize + 1}`,
      files: batchFiles,
      done: 0,
      reports: [],
    };
    const status = checkpoint?.status(state.id, batchFiles) ?? 'pending';
    if (status === 'done') {
      batchesSkipped += 1;
      continue;
    }
    if (status === 'changed') {
      const recorded = new Set(checkpoint?.filesOf(state.id));
      const current = new Set(batchFiles);
      diagnostics.push(
        makeDiagnostic(DIAGNOSTIC_CODES.CHECKPOINT_STALE, DIAGNOSTIC_PHASES.BATCH, state.id, {
          added: batchFiles.filter((f) => !recorded.has(f)),
          removed: [...recorded].filter((f) => !current.has(f)),
        })
      );
    }
    for (const file of batchFiles) {
      if (options.signal?.aborted) {
        cancelled = true;
        break submission;
      }
      await pool.submit(() => processFile(file, state));
    }
  }
  await pool.drain();
  metrics.observeMemoryPeak(process.memoryUsage().heapUsed / (1024 * 1024));

  const position = (id: string): [number, number] => {
    const hash = id.lastIndexOf('#');
    return [ordinal.get(id.slice(0, hash)) ?? Number.MAX_SAFE_INTEGER, Number(id.slice(hash + 1))];
  };
  reports.sort((a, b) => {
    const [fa, da] = position(a.documentId);
    const [fb, db] = position(b.documentId);
    return fa - fb || da - db;
  });

  return {
    reports,
    diagnostics,
    summary: summarizeReports(reports, diagnostics, {
      batchesCompleted,
      batchesSkipped,
      cancelled,
    }),
  };
}

/** Reports as cross-tool comparison rows, time in seconds */
export function toSummaryRows(reports: readonly DocumentReport[]): SummaryRow[] {
  return reports.map((r) => ({
    filename: r.documentId,
    source: 'varimodel',
    result: r.status === 'ok' && r.valid,
    time: Number((r.elapsedMs / 1000).toFixed(6)),
  }));
}
