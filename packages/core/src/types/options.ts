/**
 * Configuration options for the varimodel pipeline
 *
 * All options are optional with conservative defaults. Model building and
 * batch validation are configured separately; the CLI maps its flags onto
 * these groups.
 */

import { ConfigError } from './errors.js';

/**
 * Model build configuration
 */
export interface BuildOptions {
  /** Namespace written at the top of the model and used as the root feature id (default: 'Model') */
  namespace?: string;
  /** Definition names to treat as kinds; empty means auto-detect (default: []) */
  roots?: string[];
}

/**
 * Batch validation configuration
 */
export interface BatchOptions {
  /** Documents processed concurrently (default: 4) */
  concurrency?: number;
  /** Pending units allowed before enumeration waits (default: 256) */
  maxQueue?: number;
  /** Files per checkpointed batch (default: 100) */
  batchSize?: number;
  /** Per-document translation budget in ms (default: 5000) */
  timeBudgetMs?: number;
  /** Checkpoint file listing completed batch ids (default: undefined, no checkpointing) */
  checkpointPath?: string;
}

export interface VarimodelOptions {
  build?: BuildOptions;
  batch?: BatchOptions;
}

export interface ResolvedOptions {
  build: Required<BuildOptions>;
  batch: Required<Omit<BatchOptions, 'checkpointPath'>> &
    Pick<BatchOptions, 'checkpointPath'>;
}

export const DEFAULT_OPTIONS: Readonly<ResolvedOptions> = Object.freeze({
  build: Object.freeze({
    namespace: 'Model',
    roots: [],
  }),
  batch: Object.freeze({
    concurrency: 4,
    maxQueue: 256,
    batchSize: 100,
    timeBudgetMs: 5000,
  }),
});

const NAMESPACE_PATTERN = /^[A-Za-z_][A-Za-z0-9_]*$/;

/**
 * Merge user options over the defaults and validate the result
 *
 * @throws {ConfigError} When a setting is out of range
 */
export function resolveOptions(
  userOptions: VarimodelOptions = {}
): ResolvedOptions {
  const resolved: ResolvedOptions = {
    build: {
      ...DEFAULT_OPTIONS.build,
      ...stripUndefined(userOptions.build ?? {}),
    },
    batch: {
      ...DEFAULT_OPTIONS.batch,
      ...stripUndefined(userOptions.batch ?? {}),
    },
  };
  resolved.build.roots = [...resolved.build.roots];

  validateOptions(resolved);
  return resolved;
}

function stripUndefined<T extends object>(value: T): Partial<T> {
  const out: Partial<T> = {};
  for (const key of Object.keys(value)) {
    if (!isKeyOf(value, key)) continue;
    if (value[key] !== undefined) {
      out[key] = value[key];
    }
  }
  return out;
}

function isKeyOf<T extends object>(value: T, key: PropertyKey): key is keyof T {
  return key in value;
}

function requirePositiveInteger(value: number, setting: string): void {
  if (!Number.isInteger(value) || value <= 0) {
    throw new ConfigError({
      message: `${setting} must be a positive integer`,
      context: { setting, value },
    });
  }
}

/**
 * Validates resolved options for invalid values and combinations
 */
function validateOptions(options: ResolvedOptions): void {
  const { build, batch } = options;

  if (!NAMESPACE_PATTERN.test(build.namespace)) {
    throw new ConfigError({
      message: 'build.namespace must be a plain identifier',
      context: { setting: 'build.namespace', value: build.namespace },
    });
  }
  if (!Array.isArray(build.roots) || build.roots.some((r) => r === '')) {
    throw new ConfigError({
      message: 'build.roots must be a list of definition names',
      context: { setting: 'build.roots', value: build.roots },
    });
  }

  requirePositiveInteger(batch.concurrency, 'batch.concurrency');
  requirePositiveInteger(batch.maxQueue, 'batch.maxQueue');
  requirePositiveInteger(batch.batchSize, 'batch.batchSize');

  if (!Number.isFinite(batch.timeBudgetMs) || batch.timeBudgetMs <= 0) {
    throw new ConfigError({
      message: 'batch.timeBudgetMs must be a positive finite number',
      context: { setting: 'batch.timeBudgetMs', value: batch.timeBudgetMs },
    });
  }
  if (batch.maxQueue < batch.concurrency) {
    throw new ConfigError({
      message: 'batch.maxQueue must be at least batch.concurrency',
      context: { setting: 'batch.maxQueue', value: batch.maxQueue },
    });
  }
  if (batch.checkpointPath !== undefined && batch.checkpointPath === '') {
    throw new ConfigError({
      message: 'batch.checkpointPath must not be empty when provided',
      context: { setting: 'batch.checkpointPath' },
    });
  }
}
