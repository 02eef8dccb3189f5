#!/usr/bin/env tsx
// varimodel command line
// - build:     schema document → model file (+ descriptions side file)
// - mapping:   model → key mapping table, or check a curated one
// - translate: documents → feature selections
// - validate:  document corpus → batch report (json, markdown, csv)
// - diff:      two model versions → changelog

import fs from 'node:fs';
import { fileURLToPath } from 'node:url';

import { Command } from 'commander';

import {
  ErrorCode,
  ErrorPresenter,
  FatalError,
  type VarimodelError,
  isVarimodelError,
  renderCLIErrorView,
} from '@varimodel/core';

import cliPkg from '../package.json';
import { registerBuildCommand } from './commands/build.js';
import { registerDiffCommand } from './commands/diff.js';
import { registerMappingCommand } from './commands/mapping.js';
import { registerTranslateCommand } from './commands/translate.js';
import { registerValidateCommand } from './commands/validate.js';

export function createProgram(): Command {
  const program = new Command();
  program
    .name('varimodel')
    .description('Schema documents to feature models, and configurations validated against them')
    .version(cliPkg.version);

  registerBuildCommand(program);
  registerMappingCommand(program);
  registerTranslateCommand(program);
  registerValidateCommand(program);
  registerDiffCommand(program);
  return program;
}

function asVarimodelError(error: unknown): VarimodelError {
  if (isVarimodelError(error)) return error;
  const message = error instanceof Error ? error.message : String(error);
  return new FatalError({
    message: message || 'Unexpected error',
    errorCode: ErrorCode.INTERNAL_ERROR,
    ...(error instanceof Error ? { cause: error } : {}),
  });
}

/** Writes the error view to stderr and returns the exit code */
export function reportCliError(error: unknown): number {
  const env = process.env.NODE_ENV === 'production' ? 'prod' : 'dev';
  const presenter = new ErrorPresenter(env, { colors: process.stderr.isTTY === true });
  const failure = asVarimodelError(error);
  process.stderr.write(`${renderCLIErrorView(presenter.formatForCLI(failure))}\n`);
  return failure.getExitCode();
}

export async function main(argv: string[] = process.argv): Promise<void> {
  try {
    await createProgram().parseAsync(argv);
  } catch (error) {
    process.exit(reportCliError(error));
  }
}

const entryFile = typeof process.argv[1] === 'string' ? fs.realpathSync(process.argv[1]) : '';
const moduleFile = fileURLToPath(import.meta.url);

if (entryFile === moduleFile) {
  await main();
}
