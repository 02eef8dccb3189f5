import type { Command } from 'commander';

import { formatMappingTable } from '@varimodel/core';

import type { CommonFlags } from '../flags.js';
import { readMapper, readModel, writeOutput } from '../io.js';
import { createLogger } from '../log.js';

export interface MappingFlags extends CommonFlags {
  out?: string;
  check?: string;
}

/**
 * Writes the key mapping table derived from a model. With --check, loads a
 * curated table against the model instead and writes it back normalized.
 */
export async function runMapping(modelPath: string, flags: MappingFlags): Promise<void> {
  const logger = createLogger(flags.verbose === true);
  const model = await readModel(modelPath);
  const mapper = await readMapper(model, flags.check, logger);
  await writeOutput(flags.out, formatMappingTable(mapper.entries()));
}

export function registerMappingCommand(program: Command): void {
  program
    .command('mapping')
    .description('Derive or check the key path → feature mapping table of a model')
    .argument('<model>', 'Model file written by `varimodel build`')
    .option('-o, --out <file>', 'Mapping table (default: stdout)')
    .option('--check <table>', 'Load a curated table and verify it against the model')
    .option('-v, --verbose', 'Log mapping details to stderr', false)
    .action(async (model: string, flags: MappingFlags) => {
      await runMapping(model, flags);
    });
}
