import { describe, expect, it } from 'vitest';
import { POD_SCHEMA, KUBE_SCHEMA } from '../../__fixtures__/schemas.js';
import { resolveGraph } from '../../graph/schema-graph.js';
import { type FeatureNode, indexFeatures } from '../../model/feature-model.js';
import { formatGvk, synthesizeKind } from '../synthesizer.js';

const ref = (name: string): { $ref: string } => ({ $ref: `#/definitions/${name}` });

function kind(definitions: Record<string, unknown>, root: string, kindId = root) {
  const { graph } = resolveGraph(definitions, [root]);
  return synthesizeKind(graph, root, kindId);
}

function node(root: FeatureNode, id: string): FeatureNode {
  const found = indexFeatures(root).nodes.get(id);
  if (!found) throw new Error(`no feature ${id}`);
  return found;
}

describe('synthesizeKind', () => {
  it('expands the Pod scenario with mandatory spec and containers', () => {
    const tree = kind(POD_SCHEMA.definitions, 'Pod');
    expect(indexFeatures(tree.root).order).toEqual([
      'Pod',
      'Pod.spec',
      'Pod.spec.containers',
      'Pod.spec.containers.element',
      'Pod.spec.containers.element.name',
      'Pod.spec.containers.element.image',
    ]);
    expect(node(tree.root, 'Pod.spec').cardinality).toBe('mandatory');
    expect(node(tree.root, 'Pod.spec.containers').cardinality).toBe('mandatory');
    const element = node(tree.root, 'Pod.spec.containers.element');
    expect(element.cardinality).toBe('optional');
    expect(element.multiplicity).toEqual({ lower: 0, upper: '*' });
    expect(element.attributes).toEqual({
      key: '[*]',
      provenance: 'PodSpec/properties/containers/items',
    });
    expect(node(tree.root, 'Pod.spec.containers.element.name')).toMatchObject({
      cardinality: 'mandatory',
      valueType: 'String',
    });
    expect(tree.bindings.map((b) => b.definition.name)).toEqual(['Pod', 'PodSpec', 'Container']);
    expect(tree.diagnostics).toEqual([]);
  });

  it('cuts direct and indirect recursion into terminal stubs', () => {
    const direct = kind(
      { Node: { properties: { value: { type: 'string' }, next: ref('Node') } } },
      'Node'
    );
    expect(indexFeatures(direct.root).order).toEqual(['Node', 'Node.value', 'Node.next']);
    expect(node(direct.root, 'Node.next').attributes.recursive).toBe('Node');
    expect(direct.diagnostics).toEqual([
      {
        code: 'RECURSION_CUT',
        canonPath: 'Node.next',
        phase: 'synthesize',
        details: { definition: 'Node' },
      },
    ]);

    const indirect = kind(
      { A: { properties: { b: ref('B') } }, B: { properties: { a: ref('A') } } },
      'A'
    );
    expect(indexFeatures(indirect.root).order).toEqual(['A', 'A.b', 'A.b.a']);
    expect(node(indirect.root, 'A.b.a').children).toEqual([]);
  });

  it('escapes reserved words and suffixes colliding segments', () => {
    const tree = kind(
      {
        Obj: {
          properties: {
            features: { type: 'string' },
            'a-b': { type: 'string' },
            a_b: { type: 'string' },
          },
        },
      },
      'Obj'
    );
    expect(tree.root.children.map((c) => [c.id, c.attributes.key])).toEqual([
      ['Obj._features', 'features'],
      ['Obj.a_b', 'a-b'],
      ['Obj.a_b_2', 'a_b'],
    ]);
    expect(tree.diagnostics.map((d) => [d.code, d.details])).toEqual([
      ['RESERVED_NAME_ESCAPED', { name: 'features', segment: '_features' }],
      ['FEATURE_ID_COLLISION', { name: 'a_b', segment: 'a_b_2' }],
    ]);
  });

  it('turns a scalar union into an alternative group of typed branches', () => {
    const tree = kind(
      { Port: { properties: { target: { oneOf: [{ type: 'string' }, { type: 'integer' }] } } } },
      'Port'
    );
    const target = node(tree.root, 'Port.target');
    expect(target.group).toBe('alternative');
    expect(target.children.map((c) => [c.id, c.valueType, c.attributes.branch])).toEqual([
      ['Port.target.asString', 'String', true],
      ['Port.target.asInteger', 'Integer', true],
    ]);
  });

  it('puts a composition next to properties under an abstract variant', () => {
    const tree = kind(
      {
        Vol: { properties: { name: { type: 'string' } }, oneOf: [ref('Secret'), ref('ConfigMap')] },
        Secret: { properties: { secretName: { type: 'string' } } },
        ConfigMap: { properties: { configMapName: { type: 'string' } } },
      },
      'Vol'
    );
    const variant = node(tree.root, 'Vol.variant');
    expect(variant).toMatchObject({
      cardinality: 'mandatory',
      group: 'alternative',
      attributes: { abstract: true, branch: true, provenance: 'Vol' },
    });
    expect(indexFeatures(variant).order).toEqual([
      'Vol.variant',
      'Vol.variant.Secret',
      'Vol.variant.Secret.secretName',
      'Vol.variant.ConfigMap',
      'Vol.variant.ConfigMap.configMapName',
    ]);
    expect(node(tree.root, 'Vol.variant.Secret').attributes.provenance).toBe('Vol/oneOf/0');
  });

  it('merges allOf members and records aliases', () => {
    const tree = kind(
      {
        Base: { properties: { name: { type: 'string' } } },
        Derived: {
          allOf: [ref('Base')],
          properties: { name: { type: 'string' }, extra: { type: 'integer' } },
          required: ['name'],
        },
      },
      'Derived'
    );
    expect(tree.root.children.map((c) => c.id)).toEqual(['Derived.name', 'Derived.extra']);
    expect(node(tree.root, 'Derived.name').attributes.aliases).toEqual(['Base/properties/name']);
    expect(tree.diagnostics).toEqual([
      {
        code: 'FEATURE_ALIASED',
        canonPath: 'Derived',
        phase: 'synthesize',
        details: { key: 'name', kept: 'Derived/properties/name', alias: 'Base/properties/name' },
      },
    ]);
  });

  it('adds a map entry only to objects without members', () => {
    const tree = kind({ Labels: { type: 'object', additionalProperties: { type: 'string' } } }, 'Labels');
    const entry = node(tree.root, 'Labels.entry');
    expect(entry).toMatchObject({
      valueType: 'String',
      multiplicity: { lower: 0, upper: '*' },
      attributes: { key: '*' },
    });
  });

  it('copies scalar facts onto leaf attributes', () => {
    const tree = kind(
      {
        Obj: {
          properties: {
            policy: { type: 'string', enum: ['A', 'B'] },
            port: { type: 'integer', minimum: 1, maximum: 65535, description: 'Port. Defaults to 80.' },
            odd: { type: 'object', not: {} },
          },
        },
      },
      'Obj'
    );
    expect(node(tree.root, 'Obj.policy').attributes).toMatchObject({ values: ['A', 'B'], default: 'A' });
    expect(node(tree.root, 'Obj.port').attributes).toMatchObject({
      default: 80,
      min: 1,
      max: 65535,
      doc: 'Port. Defaults to 80.',
    });
    expect(node(tree.root, 'Obj.odd').attributes.opaque).toBe(true);
  });

  it('annotates kind roots with their group-version-kind', () => {
    const tree = kind(KUBE_SCHEMA.definitions, 'io.k8s.api.core.v1.Pod', 'Pod');
    expect(tree.root.attributes.gvk).toBe('v1 Pod');
    expect(
      formatGvk({
        name: 'Deployment',
        deprecated: false,
        kind: 'object',
        properties: [],
        required: [],
        allOf: [],
        gvk: [{ group: 'apps', version: 'v1', kind: 'Deployment' }],
        unions: [],
      })
    ).toBe('apps/v1 Deployment');
  });
});
