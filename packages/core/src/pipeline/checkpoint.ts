import { readFile, rename, writeFile } from 'node:fs/promises';

import { ErrorCode } from '../errors/codes.js';
import { FatalError, toError } from '../types/errors.js';
import { type Result, err, ok } from '../types/result.js';

/** Completed batch id → the files it covered */
export interface CheckpointFile {
  completedBatches: Record<string, string[]>;
}

export type BatchStatus = 'done' | 'changed' | 'pending';

function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.every((f) => typeof f === 'string');
}

function isCheckpointFile(value: unknown): value is CheckpointFile {
  if (typeof value !== 'object' || value === null || !('completedBatches' in value)) {
    return false;
  }
  const { completedBatches } = value;
  return (
    typeof completedBatches === 'object' &&
    completedBatches !== null &&
    !Array.isArray(completedBatches) &&
    Object.values(completedBatches).every(isStringArray)
  );
}

function sameFiles(a: readonly string[], b: readonly string[]): boolean {
  return a.length === b.length && a.every((f, i) => f === b[i]);
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

/**
 * Completed batches persisted between runs, each with the files it covered.
 * A batch counts as done only while it still covers the same files. Writes go
 * to a temporary file renamed over the real one, one at a time, so a crash
 * leaves either the old or the new list.
 */
export class Checkpoint {
  private readonly completed: Map<string, string[]>;
  private writing: Promise<void> = Promise.resolve();

  private constructor(
    readonly path: string,
    completed: Record<string, string[]>
  ) {
    this.completed = new Map(Object.entries(completed));
  }

  /** Missing file means a fresh run */
  static async open(path: string): Promise<Result<Checkpoint, FatalError>> {
    let text: string;
    try {
      text = await readFile(path, 'utf8');
    } catch (error) {
      if (isMissingFile(error)) return ok(new Checkpoint(path, {}));
      return err(
        new FatalError({
          message: `Failed to read checkpoint ${path}: ${toError(error).message}`,
          errorCode: ErrorCode.CONFIGURATION_ERROR,
          context: { file: path },
          cause: toError(error),
        })
      );
    }
    let parsed: unknown;
    try {
      parsed = JSON.parse(text);
    } catch (error) {
      parsed = undefined;
      if (!(error instanceof SyntaxError)) throw error;
    }
    if (!isCheckpointFile(parsed)) {
      return err(
        new FatalError({
          message: `Checkpoint ${path} is not a {"completedBatches": {...}} file`,
          errorCode: ErrorCode.CONFIGURATION_ERROR,
          context: { file: path },
        })
      );
    }
    return ok(new Checkpoint(path, parsed.completedBatches));
  }

  status(batchId: string, files: readonly string[]): BatchStatus {
    const recorded = this.completed.get(batchId);
    if (recorded === undefined) return 'pending';
    return sameFiles(recorded, files) ? 'done' : 'changed';
  }

  /** Files recorded for a completed batch */
  filesOf(batchId: string): readonly string[] | undefined {
    return this.completed.get(batchId);
  }

  get size(): number {
    return this.completed.size;
  }

  async markCompleted(batchId: string, files: readonly string[]): Promise<void> {
    this.completed.set(batchId, [...files]);
    const ids = [...this.completed.keys()].sort();
    const snapshot: CheckpointFile = {
      completedBatches: Object.fromEntries(
        ids.map((id): [string, string[]] => [id, this.completed.get(id) ?? []])
      ),
    };
    const next = this.writing.then(async () => {
      const tmp = `${this.path}.tmp`;
      await writeFile(tmp, `${JSON.stringify(snapshot, null, 2)}\n`, 'utf8');
      await rename(tmp, this.path);
    });
    this.writing = next;
    await next;
  }
}
