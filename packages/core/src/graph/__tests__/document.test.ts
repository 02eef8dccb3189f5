import { describe, expect, it } from 'vitest';
import { ErrorCode } from '../../errors/codes.js';
import { detectRoots, extractDefinitions } from '../document.js';

describe('extractDefinitions', () => {
  it('reads each envelope', () => {
    const a = { type: 'object' };
    const cases: Array<[unknown, string]> = [
      [{ definitions: { A: a, junk: 5 } }, 'definitions'],
      [{ $defs: { A: a } }, '$defs'],
      [{ components: { schemas: { A: a } } }, 'components.schemas'],
      [{ A: a }, 'flat'],
    ];
    for (const [doc, envelope] of cases) {
      const r = extractDefinitions(doc);
      expect(r.isOk()).toBe(true);
      if (r.isOk()) {
        expect(r.value.envelope).toBe(envelope);
        expect(r.value.definitions).toEqual({ A: a });
      }
    }
  });

  it('keeps a definition named __proto__ as an ordinary entry', () => {
    const doc: unknown = JSON.parse(
      '{"definitions": {"__proto__": {"type": "string"}, "A": {"type": "object"}}}'
    );
    const r = extractDefinitions(doc);
    expect(r.isOk()).toBe(true);
    if (r.isOk()) {
      expect(Object.keys(r.value.definitions)).toEqual(['__proto__', 'A']);
      expect(Object.getPrototypeOf(r.value.definitions)).toBeNull();
      expect(Object.getOwnPropertyDescriptor(r.value.definitions, '__proto__')?.value).toEqual({
        type: 'string',
      });
    }
  });

  it('rejects a single schema and non-objects', () => {
    for (const doc of [{ type: 'object', properties: {} }, [1, 2], 'x', {}]) {
      const r = extractDefinitions(doc);
      expect(r.isErr()).toBe(true);
      if (r.isErr()) expect(r.error.errorCode).toBe(ErrorCode.INVALID_SCHEMA_DOCUMENT);
    }
  });
});

describe('detectRoots', () => {
  it('prefers group-version-kind annotations', () => {
    expect(
      detectRoots({
        Pod: { 'x-kubernetes-group-version-kind': [{ group: '', version: 'v1', kind: 'Pod' }] },
        Other: { properties: { kind: {}, apiVersion: {} } },
      })
    ).toEqual(['Pod']);
  });

  it('falls back to definitions declaring kind and apiVersion', () => {
    expect(
      detectRoots({
        Spec: { type: 'object' },
        Thing: { properties: { kind: { type: 'string' }, apiVersion: { type: 'string' } } },
      })
    ).toEqual(['Thing']);
  });

  it('falls back to unreferenced definitions', () => {
    expect(
      detectRoots({
        Top: { properties: { child: { $ref: '#/definitions/Child' } } },
        Child: { properties: { self: { $ref: '#/definitions/Child' } } },
        Loose: { type: 'string' },
      })
    ).toEqual(['Top', 'Loose']);
  });
});
