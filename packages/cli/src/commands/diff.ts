import type { Command } from 'commander';

import { ConfigError, diffModels, isEmptyDiff } from '@varimodel/core';
import { buildDiffReport, renderMarkdownDiff } from '@varimodel/reporter';

import type { CommonFlags } from '../flags.js';
import { readModel, writeOutput } from '../io.js';
import { createLogger } from '../log.js';

export interface DiffFlags extends CommonFlags {
  format?: string;
  out?: string;
}

export async function runDiff(beforePath: string, afterPath: string, flags: DiffFlags): Promise<void> {
  const format = flags.format ?? 'markdown';
  if (format !== 'markdown' && format !== 'json') {
    throw new ConfigError({
      message: `Unsupported diff format '${format}'. Expected markdown or json.`,
      context: { setting: 'format', value: format },
    });
  }
  const logger = createLogger(flags.verbose === true);
  const [before, after] = await Promise.all([readModel(beforePath), readModel(afterPath)]);
  const diff = diffModels(before, after);
  if (isEmptyDiff(diff)) logger.debug('diff: models are equivalent');

  const report = buildDiffReport(diff, { before: beforePath, after: afterPath });
  const text =
    format === 'json' ? `${JSON.stringify(report, null, 2)}\n` : renderMarkdownDiff(report);
  await writeOutput(flags.out, text);
}

export function registerDiffCommand(program: Command): void {
  program
    .command('diff')
    .description('Compare two model versions')
    .argument('<before>', 'Older model file')
    .argument('<after>', 'Newer model file')
    .option('--format <format>', 'markdown or json', 'markdown')
    .option('-o, --out <file>', 'Changelog file (default: stdout)')
    .option('-v, --verbose', 'Log details to stderr', false)
    .action(async (before: string, after: string, flags: DiffFlags) => {
      await runDiff(before, after, flags);
    });
}
