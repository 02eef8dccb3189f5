/**
 * Feature tree and model types shared by every stage after resolution.
 */

import type { Constraint } from '../constraints/expression.js';
import type { DiagnosticEnvelope } from '../diag/envelope.js';
import type { Literal } from '../graph/definition.js';

export type GroupType = 'and' | 'or' | 'alternative';
export type Cardinality = 'mandatory' | 'optional';
export type ValueType = 'Boolean' | 'String' | 'Integer' | 'Real';

export interface Multiplicity {
  lower: number;
  upper: number | '*';
}

export interface FeatureAttributes {
  abstract?: boolean;
  /** Union branch or grouping node: consumes no document key */
  branch?: boolean;
  /** Document key this node consumes: a property name, `[*]` or `*` */
  key?: string;
  /** `group/version Kind` for kind roots */
  gvk?: string;
  default?: Literal;
  values?: Literal[];
  format?: string;
  min?: number;
  max?: number;
  deprecated?: boolean;
  /** Definition whose expansion was cut here */
  recursive?: string;
  /** Feature id of an earlier kind's expansion of the same definition */
  shared?: string;
  /** Node built from vocabulary outside the supported subset */
  opaque?: boolean;
  provenance?: string;
  aliases?: string[];
  doc?: string;
}

export interface FeatureNode {
  id: string;
  cardinality: Cardinality;
  group: GroupType;
  children: FeatureNode[];
  valueType?: ValueType;
  multiplicity?: Multiplicity;
  attributes: FeatureAttributes;
}

export interface FeatureModel {
  namespace: string;
  root: FeatureNode;
  constraints: Constraint[];
  /** feature id → description */
  descriptions: Record<string, string>;
  warnings: DiagnosticEnvelope[];
}

export function createFeatureNode(
  id: string,
  cardinality: Cardinality,
  attributes: FeatureAttributes = {}
): FeatureNode {
  return { id, cardinality, group: 'and', children: [], attributes };
}

/** Last dotted segment of a feature id */
export function featureName(id: string): string {
  const dot = id.lastIndexOf('.');
  return dot === -1 ? id : id.slice(dot + 1);
}

/**
 * Pre-order traversal without call recursion. `visit` receives the node and
 * its parent (undefined for the start node).
 */
export function walkFeatures(
  start: FeatureNode,
  visit: (node: FeatureNode, parent: FeatureNode | undefined) => void
): void {
  const stack: Array<[FeatureNode, FeatureNode | undefined]> = [
    [start, undefined],
  ];
  while (stack.length > 0) {
    const entry = stack.pop();
    if (entry === undefined) break;
    const [node, parent] = entry;
    visit(node, parent);
    for (let i = node.children.length - 1; i >= 0; i -= 1) {
      const child = node.children[i];
      if (child !== undefined) stack.push([child, node]);
    }
  }
}

export interface FeatureIndex {
  nodes: Map<string, FeatureNode>;
  parents: Map<string, FeatureNode>;
  /** feature ids in pre-order */
  order: string[];
}

export function indexFeatures(root: FeatureNode): FeatureIndex {
  const nodes = new Map<string, FeatureNode>();
  const parents = new Map<string, FeatureNode>();
  const order: string[] = [];
  walkFeatures(root, (node, parent) => {
    nodes.set(node.id, node);
    order.push(node.id);
    if (parent) parents.set(node.id, parent);
  });
  return { nodes, parents, order };
}

export function countFeatures(root: FeatureNode): number {
  let count = 0;
  walkFeatures(root, () => {
    count += 1;
  });
  return count;
}

/** A model plus its lookup tables, built once per validation run */
export interface ModelIndex extends FeatureIndex {
  model: FeatureModel;
}

export function indexModel(model: FeatureModel): ModelIndex {
  return { model, ...indexFeatures(model.root) };
}
