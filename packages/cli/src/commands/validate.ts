import { join } from 'node:path';

import type { Command } from 'commander';

import {
  type BatchRunResult,
  ConfigError,
  type DocumentReport,
  MetricsCollector,
  ValidationError,
  runValidationBatch,
} from '@varimodel/core';
import {
  REPORT_EXTENSIONS,
  buildBatchReport,
  formatBatchReport,
  parseFormats,
} from '@varimodel/reporter';

import { type BatchFlags, toBatchOptions } from '../flags.js';
import { readMapper, readModel, writeOutput } from '../io.js';
import { createLogger, logDiagnostics } from '../log.js';

/**
 * Validates every document under `paths` and renders the report. Resolves
 * to the process exit code: 1 when any document is invalid or failed.
 *
 * @throws {ValidationError} under `--fail-fast`, for the first invalid document
 */
export async function runValidate(
  modelPath: string,
  paths: string[],
  flags: BatchFlags
): Promise<number> {
  const logger = createLogger(flags.verbose === true);
  const formats = parseFormats(flags.format);
  if (flags.reportDir === undefined && formats.length !== 1) {
    throw new ConfigError({
      message: 'Printing to stdout takes exactly one format; pass --report-dir to write several',
      context: { setting: 'format', value: formats },
    });
  }
  const batch = toBatchOptions(flags);
  const model = await readModel(modelPath);
  const mapper = await readMapper(model, flags.mapping, logger);
  const metrics = new MetricsCollector();

  const controller = new AbortController();
  const onInterrupt = (): void => {
    logger.warn('interrupted, letting in-flight documents finish');
    controller.abort();
  };
  process.once('SIGINT', onInterrupt);
  const stopped: { first?: DocumentReport } = {};
  let result: BatchRunResult;
  try {
    result = await runValidationBatch({
      paths,
      model,
      mapper,
      batch,
      metrics,
      signal: controller.signal,
      onReport: (report) => {
        if (report.status === 'ok' && !report.valid) {
          logger.debug(`validate: ${report.documentId} ${report.violations.join(', ')}`);
          if (flags.failFast === true && stopped.first === undefined) {
            stopped.first = report;
            controller.abort();
          }
        }
      },
      onBatchComplete: (batchId, reports) =>
        logger.debug(`validate: ${batchId} done, ${reports.length} document(s)`),
    });
  } finally {
    process.off('SIGINT', onInterrupt);
  }

  logDiagnostics(logger, result.diagnostics, result.summary.diagnostics);
  const { summary } = result;
  logger.warn(
    `validated ${summary.documents} document(s): ${summary.valid} valid, ${summary.invalid} invalid, ${summary.skipped} skipped, ${summary.failed} failed`
  );
  if (flags.printMetrics) logger.warn(`metrics: ${JSON.stringify(metrics.snapshotMetrics())}`);
  const { first } = stopped;
  if (first !== undefined) {
    throw new ValidationError({
      message: `${first.documentId} violates the model: ${first.violations.join(', ')}`,
      violations: first.violations,
      context: { file: first.documentId },
    });
  }

  const report = buildBatchReport(result, {
    modelPath,
    ...(flags.mapping !== undefined ? { mappingPath: flags.mapping } : {}),
    metrics: metrics.snapshotMetrics(),
  });
  if (flags.reportDir === undefined) {
    const [format = 'json'] = formats;
    await writeOutput(undefined, formatBatchReport(report, format));
  } else {
    for (const format of formats) {
      const target = join(flags.reportDir, `report${REPORT_EXTENSIONS[format]}`);
      await writeOutput(target, formatBatchReport(report, format));
      process.stdout.write(`Wrote ${target}\n`);
    }
  }
  return summary.invalid + summary.failed > 0 ? 1 : 0;
}

export function registerValidateCommand(program: Command): void {
  program
    .command('validate')
    .description('Validate configuration documents against a model')
    .argument('<model>', 'Model file written by `varimodel build`')
    .argument('<paths...>', 'Document files or directories')
    .option('--mapping <table>', 'Curated mapping table (default: derived from the model)')
    .option('--concurrency <n>', 'Documents processed at once')
    .option('--max-queue <n>', 'Pending documents before enumeration waits')
    .option('--batch-size <n>', 'Files per checkpointed batch')
    .option('--time-budget <ms>', 'Per-document translation budget')
    .option('--checkpoint <file>', 'Resume from and record completed batches in this file')
    .option('--format <list>', 'Comma-separated report formats: json,markdown,csv (default: json)')
    .option('--report-dir <dir>', 'Write report.<ext> per format here instead of stdout')
    .option('--fail-fast', 'Stop at the first invalid document and exit with its violations', false)
    .option('--print-metrics', 'Print stage timings and counts to stderr', false)
    .option('-v, --verbose', 'Log diagnostics and per-batch progress to stderr', false)
    .action(async (model: string, paths: string[], flags: BatchFlags) => {
      const code = await runValidate(model, paths, flags);
      if (code !== 0) process.exitCode = code;
    });
}
