import { mkdtemp, readFile, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';

import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { ErrorCode } from '../../errors/codes.js';
import { Checkpoint } from '../checkpoint.js';

describe('Checkpoint', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'varimodel-ckpt-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('starts empty when the file does not exist', async () => {
    const opened = await Checkpoint.open(join(dir, 'ckpt.json'));
    expect(opened.isOk() && opened.value.size).toBe(0);
  });

  it('persists completed batches sorted and reads them back', async () => {
    const path = join(dir, 'ckpt.json');
    const opened = await Checkpoint.open(path);
    if (opened.isErr()) throw opened.error;
    await Promise.all([
      opened.value.markCompleted('batch-2', ['c.yaml']),
      opened.value.markCompleted('batch-1', ['a.yaml', 'b.yaml']),
    ]);
    expect(await readFile(path, 'utf8')).toBe(
      '{\n  "completedBatches": {\n    "batch-1": [\n      "a.yaml",\n      "b.yaml"\n    ],\n    "batch-2": [\n      "c.yaml"\n    ]\n  }\n}\n'
    );

    const reopened = await Checkpoint.open(path);
    if (reopened.isErr()) throw reopened.error;
    expect(reopened.value.status('batch-1', ['a.yaml', 'b.yaml'])).toBe('done');
    expect(reopened.value.status('batch-3', ['d.yaml'])).toBe('pending');
  });

  it('marks a batch changed when its files differ from the recorded ones', async () => {
    const path = join(dir, 'ckpt.json');
    await writeFile(path, '{"completedBatches": {"batch-1": ["a.yaml", "b.yaml"]}}', 'utf8');
    const opened = await Checkpoint.open(path);
    if (opened.isErr()) throw opened.error;
    expect(opened.value.status('batch-1', ['a.yaml', 'a2.yaml'])).toBe('changed');
    expect(opened.value.status('batch-1', ['a.yaml'])).toBe('changed');
    expect(opened.value.filesOf('batch-1')).toEqual(['a.yaml', 'b.yaml']);
  });

  it('rejects a file of the wrong shape', async () => {
    const path = join(dir, 'ckpt.json');
    await writeFile(path, '{"completedBatches": ["batch-1"]}', 'utf8');
    const opened = await Checkpoint.open(path);
    expect(opened.isErr()).toBe(true);
    if (opened.isErr()) {
      expect(opened.error.errorCode).toBe(ErrorCode.CONFIGURATION_ERROR);
      expect(opened.error.message).toBe(`Checkpoint ${path} is not a {"completedBatches": {...}} file`);
    }
  });

  it('rejects a file that is not JSON', async () => {
    const path = join(dir, 'ckpt.json');
    await writeFile(path, 'not json', 'utf8');
    const opened = await Checkpoint.open(path);
    expect(opened.isErr() && opened.error.context).toEqual({ file: path });
  });
});
