import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { ErrorCode } from '../../errors/codes.js';
import { buildModelFromFile } from '../../pipeline/orchestrator.js';
import { checkSchemaDocument, isExternalRef, loadSchemaDocument } from '../loader.js';

describe('checkSchemaDocument', () => {
  it('accepts a well-formed definitions map', () => {
    const r = checkSchemaDocument({ definitions: { A: { type: 'object', required: ['x'] } } });
    expect(r.isOk()).toBe(true);
  });

  it('lists shape problems', () => {
    const r = checkSchemaDocument({ definitions: { A: { type: 'object', required: 'x' } } }, 'a.json');
    expect(r.isErr()).toBe(true);
    if (r.isErr()) {
      expect(r.error.errorCode).toBe(ErrorCode.INVALID_SCHEMA_DOCUMENT);
      expect(r.error.context?.problems).toEqual(['/A/required must be array']);
      expect(r.error.context?.file).toBe('a.json');
    }
  });
});

describe('isExternalRef', () => {
  it.each([
    ['#/definitions/Pod', false],
    ['PodSpec', false],
    ['io.k8s.api.core.v1.PodSpec', false],
    ['common.json#/definitions/Meta', true],
    ['common.yaml', true],
    ['./shared/meta', true],
    ['https://example.test/schema.json', true],
  ])('%s -> %s', (ref, expected) => {
    expect(isExternalRef(ref)).toBe(expected);
  });
});

describe('loadSchemaDocument', () => {
  let dir: string;
  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'varimodel-schema-'));
  });
  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('loads YAML documents', async () => {
    const file = join(dir, 'schema.yaml');
    await writeFile(
      file,
      ['definitions:', '  Pod:', '    type: object', '    properties:', '      name:', '        type: string', ''].join('\n')
    );
    const r = await loadSchemaDocument(file);
    expect(r.isOk()).toBe(true);
    if (r.isOk()) expect(Object.keys(r.value.definitions)).toEqual(['Pod']);
  });

  it('returns SCHEMA_LOAD_FAILED for a missing file', async () => {
    const r = await loadSchemaDocument(join(dir, 'absent.json'));
    expect(r.isErr()).toBe(true);
    if (r.isErr()) expect(r.error.errorCode).toBe(ErrorCode.SCHEMA_LOAD_FAILED);
  });

  it('keeps a missing local target as an unresolved reference', async () => {
    const file = join(dir, 'schema.json');
    await writeFile(
      file,
      JSON.stringify({
        definitions: {
          Pod: {
            type: 'object',
            properties: {
              name: { type: 'string' },
              extra: { $ref: '#/definitions/Missing' },
            },
          },
        },
      })
    );
    const r = await loadSchemaDocument(file);
    expect(r.isOk()).toBe(true);
    if (r.isOk()) {
      expect(r.value.definitions.Pod?.properties).toEqual({
        name: { type: 'string' },
        extra: { $ref: '#/definitions/Missing' },
      });
    }

    const built = await buildModelFromFile(file);
    if (built.isErr()) throw built.error;
    expect(
      built.value.diagnostics
        .filter((d) => d.code === 'UNRESOLVED_REFERENCE')
        .map((d) => d.details)
    ).toEqual([{ ref: 'Missing' }]);
  });

  it('leaves bare-name references to the graph', async () => {
    const file = join(dir, 'schema.json');
    await writeFile(
      file,
      JSON.stringify({
        definitions: {
          Pod: { type: 'object', properties: { spec: { $ref: 'PodSpec' } } },
          PodSpec: { type: 'object', properties: { name: { type: 'string' } } },
        },
      })
    );
    const built = await buildModelFromFile(file);
    if (built.isErr()) throw built.error;
    expect(built.value.roots).toEqual(['Pod']);
    expect(built.value.diagnostics).toEqual([]);
  });

  it('inlines references into other files', async () => {
    await writeFile(
      join(dir, 'common.json'),
      JSON.stringify({
        definitions: { Meta: { type: 'object', properties: { name: { type: 'string' } } } },
      })
    );
    const file = join(dir, 'schema.json');
    await writeFile(
      file,
      JSON.stringify({
        definitions: {
          Pod: {
            type: 'object',
            properties: {
              meta: { $ref: 'common.json#/definitions/Meta' },
              spec: { $ref: '#/definitions/Spec' },
            },
          },
          Spec: { type: 'object' },
        },
      })
    );
    const r = await loadSchemaDocument(file);
    expect(r.isOk()).toBe(true);
    if (r.isOk()) {
      expect(r.value.definitions.Pod?.properties).toEqual({
        meta: { type: 'object', properties: { name: { type: 'string' } } },
        spec: { $ref: '#/definitions/Spec' },
      });
    }
  });
});
