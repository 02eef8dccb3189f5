import { type BatchOptions, type BuildOptions, ConfigError } from '@varimodel/core';

export interface CommonFlags {
  verbose?: boolean;
  printMetrics?: boolean;
}

export interface BuildFlags extends CommonFlags {
  out?: string;
  descriptions?: string;
  namespace?: string;
  root?: string;
  strict?: boolean;
}

export interface BatchFlags extends CommonFlags {
  mapping?: string;
  concurrency?: string;
  maxQueue?: string;
  batchSize?: string;
  timeBudget?: string;
  checkpoint?: string;
  format?: string;
  reportDir?: string;
  failFast?: boolean;
}

const INTEGER = /^-?\d+$/;

/**
 * @throws {ConfigError} when the value is present but not an integer
 */
export function parseIntegerFlag(name: string, value: string | undefined): number | undefined {
  if (value === undefined) return undefined;
  const trimmed = value.trim();
  if (!INTEGER.test(trimmed)) {
    throw new ConfigError({
      message: `--${name} must be an integer, got '${value}'`,
      context: { setting: name, value },
    });
  }
  return Number.parseInt(trimmed, 10);
}

/** Comma-separated definition names */
export function parseRootList(value: string | undefined): string[] | undefined {
  if (value === undefined) return undefined;
  return value
    .split(',')
    .map((name) => name.trim())
    .filter(Boolean);
}

export function toBuildOptions(flags: BuildFlags): BuildOptions {
  return {
    namespace: flags.namespace,
    roots: parseRootList(flags.root),
  };
}

export function toBatchOptions(flags: BatchFlags): BatchOptions {
  return {
    concurrency: parseIntegerFlag('concurrency', flags.concurrency),
    maxQueue: parseIntegerFlag('max-queue', flags.maxQueue),
    batchSize: parseIntegerFlag('batch-size', flags.batchSize),
    timeBudgetMs: parseIntegerFlag('time-budget', flags.timeBudget),
    checkpointPath: flags.checkpoint,
  };
}
