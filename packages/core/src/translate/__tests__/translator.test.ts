import { describe, expect, it } from 'vitest';
import { buildFixture } from '../../__fixtures__/models.js';
import { KUBE_SCHEMA, POD_SCHEMA, SHARED_META_SCHEMA } from '../../__fixtures__/schemas.js';
import { ErrorCode } from '../../errors/codes.js';
import { findKindFeature, markerId, parseMarkerId, translateDocument } from '../translator.js';

const pod = buildFixture(POD_SCHEMA.definitions, ['Pod']);
const kube = buildFixture(KUBE_SCHEMA.definitions, ['io.k8s.api.core.v1.Pod']);
const shared = buildFixture(SHARED_META_SCHEMA.definitions, ['A', 'B']);

function translate(content: unknown, fixture = pod) {
  const result = translateDocument(content, fixture.index, fixture.mapper);
  if (result.isErr()) throw result.error;
  return result.value;
}

const TARGET_PORT = 'Pod.spec.containers.element.ports.element.targetPort';

describe('translateDocument', () => {
  it('selects mapped features with their ancestors in document order', () => {
    const selection = translate({
      apiVersion: 'v1',
      kind: 'Pod',
      spec: { containers: [{ name: 'web', image: 'nginx' }] },
    });
    expect(selection.selectedFeatureIds).toEqual([
      'Model',
      'Pod',
      'Pod.spec',
      'Pod.spec.containers',
      'Pod.spec.containers.element',
      'Pod.spec.containers.element.name',
      'Pod.spec.containers.element.image',
    ]);
    expect(selection.attributeValues).toEqual({
      'Pod.spec.containers.element.name': ['web'],
      'Pod.spec.containers.element.image': ['nginx'],
    });
    expect(selection.unmappedKeys).toEqual([]);
  });

  it('lists unmapped leaves and marks empty values', () => {
    const selection = translate({ kind: 'Pod', foo: { bar: 1 }, extra: [], spec: {} });
    expect(selection.unmappedKeys).toEqual(['foo.bar', 'extra']);
    expect(selection.selectedFeatureIds).toEqual(['Model', 'Pod', 'Pod.spec', 'Pod.spec.isEmpty']);
  });

  it('marks null values', () => {
    const selection = translate({ kind: 'Pod', spec: { containers: null } });
    expect(selection.selectedFeatureIds).toEqual([
      'Model',
      'Pod',
      'Pod.spec',
      'Pod.spec.containers',
      'Pod.spec.containers.isNull',
    ]);
  });

  it('maps nothing for a kind the model lacks', () => {
    const selection = translate({ kind: 'Nope', spec: {} });
    expect(selection.selectedFeatureIds).toEqual(['Model']);
    expect(selection.unmappedKeys).toEqual(['spec']);
  });

  it('picks the union branch matching the value type', () => {
    const doc = (targetPort: string | number) => ({
      apiVersion: 'v1',
      kind: 'Pod',
      spec: { containers: [{ name: 'a', ports: [{ containerPort: 80, targetPort }] }] },
    });
    const named = translate(doc('http'), kube);
    expect(named.selectedFeatureIds).toContain(`${TARGET_PORT}.asString`);
    expect(named.selectedFeatureIds).not.toContain(`${TARGET_PORT}.asInteger`);
    expect(named.attributeValues[TARGET_PORT]).toEqual(['http']);

    const numbered = translate(doc(8080), kube);
    expect(numbered.selectedFeatureIds).toContain(`${TARGET_PORT}.asInteger`);
    expect(numbered.attributeValues['Pod.spec.containers.element.ports.element.containerPort']).toEqual([80]);
  });

  it('gives up once the deadline passes', () => {
    let t = 0;
    const result = translateDocument({ kind: 'Pod', a: 1, b: 2, c: 3 }, pod.index, pod.mapper, {
      deadline: 1,
      now: () => t++,
    });
    expect(result.isErr()).toBe(true);
    if (result.isErr()) {
      expect(result.error.errorCode).toBe(ErrorCode.TRANSLATION_TIMEOUT);
      expect(result.error.message).toBe('Translation exceeded its time budget at b');
      expect(result.error.context).toEqual({ keyPath: 'b' });
    }
  });
});

describe('translateDocument through shared definitions', () => {
  it('selects the shared expansion under the stub, not the other kind', () => {
    const selection = translate(
      { kind: 'B', meta: { name: 'x', labels: { app: 'web' } } },
      shared
    );
    expect(selection.selectedFeatureIds).toEqual([
      'Model',
      'B',
      'B.meta',
      'A.meta',
      'A.meta.name',
      'A.meta.labels',
      'A.meta.labels.entry',
    ]);
    expect(selection.attributeValues).toEqual({
      'A.meta.name': ['x'],
      'A.meta.labels.entry': ['web'],
    });
    expect(selection.unmappedKeys).toEqual([]);
  });

  it('selects the owning kind for its own documents', () => {
    expect(translate({ kind: 'A', meta: { name: 'x' } }, shared).selectedFeatureIds).toEqual([
      'Model',
      'A',
      'A.meta',
      'A.meta.name',
    ]);
  });
});

describe('kind lookup and markers', () => {
  it('prefers the gvk and falls back to the id', () => {
    expect(findKindFeature(kube.index, 'v1', 'Pod')?.id).toBe('Pod');
    expect(findKindFeature(kube.index, 'apps/v1', 'Pod')?.id).toBe('Pod');
    expect(findKindFeature(kube.index, 'v1', 'Nope')).toBeUndefined();
    expect(findKindFeature(kube.index, 'v1', 7)).toBeUndefined();
  });

  it('round-trips marker ids', () => {
    expect(markerId('Pod.spec', 'isNull')).toBe('Pod.spec.isNull');
    expect(parseMarkerId('Pod.spec.isEmpty')).toEqual({ featureId: 'Pod.spec', marker: 'isEmpty' });
    expect(parseMarkerId('Pod.spec')).toBeUndefined();
    expect(parseMarkerId('.isNull')).toBeUndefined();
  });
});
