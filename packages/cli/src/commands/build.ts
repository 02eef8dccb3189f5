import type { Command } from 'commander';

import { buildModelFromFile, schemaErrorOf } from '@varimodel/core';

import { type BuildFlags, toBuildOptions } from '../flags.js';
import { writeOutput } from '../io.js';
import { createLogger, logDiagnostics } from '../log.js';

export async function runBuild(schemaPath: string, flags: BuildFlags): Promise<void> {
  const logger = createLogger(flags.verbose === true);
  const result = await buildModelFromFile(schemaPath, { build: toBuildOptions(flags) });
  if (result.isErr()) throw result.error;
  const built = result.value;

  logger.debug(`build: kinds ${built.roots.join(', ')}`);
  logger.debug(
    `build: ${built.metrics.featuresEmitted} feature(s), ${built.metrics.constraintsDerived} constraint(s)`
  );
  logDiagnostics(logger, built.diagnostics, built.summary);
  if (flags.strict === true) {
    const failure = schemaErrorOf(built.diagnostics);
    if (failure) throw failure;
  }

  await writeOutput(flags.out, built.text);
  if (flags.descriptions !== undefined) {
    await writeOutput(flags.descriptions, built.descriptions);
  }
  if (flags.printMetrics) logger.warn(`metrics: ${JSON.stringify(built.metrics)}`);
}

export function registerBuildCommand(program: Command): void {
  program
    .command('build')
    .description('Convert a schema document into a feature model')
    .argument('<schema>', 'JSON or YAML schema document')
    .option('-o, --out <file>', 'Model file (default: stdout)')
    .option('--descriptions <file>', 'Write the feature id → description JSON side file')
    .option('--namespace <name>', 'Model namespace and root feature id')
    .option('--root <names>', 'Comma-separated definitions to expand as kinds')
    .option('--strict', 'Fail instead of dropping unresolved or unsupported schema branches', false)
    .option('--print-metrics', 'Print stage timings and counts to stderr', false)
    .option('-v, --verbose', 'Log every diagnostic to stderr', false)
    .action(async (schema: string, flags: BuildFlags) => {
      await runBuild(schema, flags);
    });
}
