import { requires } from '../constraints/expression.js';
import { resolveGraph } from '../graph/schema-graph.js';
import { deriveKeyMappings } from '../mapping/derive.js';
import type { KeyMapper } from '../mapping/key-mapper.js';
import { assembleModel } from '../model/assembler.js';
import {
  type FeatureModel,
  type FeatureNode,
  type ModelIndex,
  createFeatureNode,
  indexModel,
} from '../model/feature-model.js';

function leaf(
  id: string,
  cardinality: FeatureNode['cardinality'],
  key: string,
  valueType: FeatureNode['valueType']
): FeatureNode {
  const node = createFeatureNode(id, cardinality, { key });
  node.valueType = valueType;
  return node;
}

/** One kind with mandatory, optional, mandatory members and one constraint */
export function sampleModel(): FeatureModel {
  const kind = createFeatureNode('A', 'mandatory', { doc: 'Kind A.' });
  kind.children = [
    leaf('A.x', 'mandatory', 'x', 'String'),
    leaf('A.y', 'optional', 'y', 'Boolean'),
    leaf('A.z', 'mandatory', 'z', 'String'),
  ];
  const root = createFeatureNode('Model', 'mandatory', { abstract: true });
  root.group = 'or';
  root.children = [kind];
  return {
    namespace: 'Model',
    root,
    constraints: [requires('A.y', 'A.z', { rule: 'r', definition: 'D' })],
    descriptions: { A: 'Kind A.' },
    warnings: [],
  };
}

export const SAMPLE_TEXT = [
  'namespace Model',
  '',
  'features',
  '\tModel {abstract}',
  '\t\tor',
  "\t\t\tA {doc 'Kind A.'}",
  '\t\t\t\tmandatory',
  "\t\t\t\t\tString \"A.x\" {key 'x'}",
  '\t\t\t\toptional',
  "\t\t\t\t\tBoolean \"A.y\" {key 'y'}",
  '\t\t\t\tmandatory',
  "\t\t\t\t\tString \"A.z\" {key 'z'}",
  '',
  'constraints',
  '\t"A.y" => "A.z" // rule:r def:D',
  '',
].join('\n');

export interface BuiltFixture {
  model: FeatureModel;
  index: ModelIndex;
  mapper: KeyMapper;
}

/** Assemble definitions under the `Model` namespace with derived key mappings */
export function buildFixture(definitions: Record<string, unknown>, roots: string[]): BuiltFixture {
  const { graph } = resolveGraph(definitions, roots);
  const model = assembleModel(graph, { namespace: 'Model' });
  return { model, index: indexModel(model), mapper: deriveKeyMappings(model).mapper };
}
