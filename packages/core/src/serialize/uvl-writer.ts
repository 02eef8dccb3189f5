/**
 * Deterministic UVL-style rendering.
 *
 *   namespace <ns>
 *
 *   features
 *   \t<root> {abstract}
 *   \t\tor
 *   \t\t\t<Kind> {gvk 'v1 Pod'}
 *   \t\t\t\tmandatory
 *   \t\t\t\t\t"Pod.spec" {key 'spec'}
 *
 *   constraints
 *   \t"a" => "b" // rule:<rule> def:<definition>
 *
 * Children keep declaration order. An and-group is written as consecutive
 * `mandatory` / `optional` sections, opening a new one whenever the
 * cardinality changes, so the order survives a parse.
 */

import { type Constraint, renderExpr } from '../constraints/expression.js';
import type { Literal } from '../graph/definition.js';
import type {
  FeatureAttributes,
  FeatureModel,
  FeatureNode,
} from '../model/feature-model.js';

const PLAIN_ID = /^[A-Za-z_][A-Za-z0-9_]*$/;

const KEYWORDS = new Set([
  'namespace',
  'features',
  'constraints',
  'mandatory',
  'optional',
  'alternative',
  'or',
  'cardinality',
  'true',
  'false',
  'String',
  'Integer',
  'Boolean',
  'Real',
]);

export function quoteId(id: string): string {
  if (PLAIN_ID.test(id) && !KEYWORDS.has(id)) return id;
  return `"${id.replace(/\\/g, '\\\\').replace(/"/g, '\\"')}"`;
}

export function quoteString(value: string): string {
  const escaped = value
    .replace(/\\/g, '\\\\')
    .replace(/'/g, "\\'")
    .replace(/\n/g, '\\n')
    .replace(/\r/g, '\\r')
    .replace(/\t/g, '\\t');
  return `'${escaped}'`;
}

function literal(value: Literal): string {
  if (typeof value === 'string') return quoteString(value);
  return String(value);
}

type AttributeKey = keyof FeatureAttributes;

/** Fixed attribute order */
export const ATTRIBUTE_ORDER: readonly AttributeKey[] = [
  'abstract',
  'branch',
  'key',
  'gvk',
  'default',
  'values',
  'format',
  'min',
  'max',
  'deprecated',
  'recursive',
  'shared',
  'opaque',
  'provenance',
  'aliases',
  'doc',
];

function renderAttribute(key: AttributeKey, attrs: FeatureAttributes): string | undefined {
  const value = attrs[key];
  if (value === undefined || value === false) return undefined;
  if (value === true) return key;
  if (Array.isArray(value)) {
    const items: Literal[] = value;
    return `${key} [${items.map(literal).join(', ')}]`;
  }
  return `${key} ${literal(value)}`;
}

export function renderFeatureLine(node: FeatureNode): string {
  const parts: string[] = [];
  if (node.valueType !== undefined) parts.push(node.valueType);
  parts.push(quoteId(node.id));
  if (node.multiplicity) {
    parts.push(`cardinality [${node.multiplicity.lower}..${node.multiplicity.upper}]`);
  }
  const attrs = ATTRIBUTE_ORDER.map((k) => renderAttribute(k, node.attributes)).filter(
    (a): a is string => a !== undefined
  );
  if (attrs.length > 0) parts.push(`{${attrs.join(', ')}}`);
  return parts.join(' ');
}

function sections(node: FeatureNode): Array<{ keyword: string; members: FeatureNode[] }> {
  if (node.children.length === 0) return [];
  if (node.group !== 'and') {
    return [{ keyword: node.group, members: node.children }];
  }
  const out: Array<{ keyword: string; members: FeatureNode[] }> = [];
  for (const child of node.children) {
    const last = out[out.length - 1];
    if (last && last.keyword === child.cardinality) {
      last.members.push(child);
    } else {
      out.push({ keyword: child.cardinality, members: [child] });
    }
  }
  return out;
}

type TreeItem =
  | { type: 'feature'; node: FeatureNode; depth: number }
  | { type: 'section'; keyword: string; depth: number };

function writeTree(root: FeatureNode, lines: string[]): void {
  const stack: TreeItem[] = [{ type: 'feature', node: root, depth: 1 }];
  while (stack.length > 0) {
    const item = stack.pop();
    if (item === undefined) break;
    const indent = '\t'.repeat(item.depth);
    if (item.type === 'section') {
      lines.push(`${indent}${item.keyword}`);
      continue;
    }
    lines.push(`${indent}${renderFeatureLine(item.node)}`);

    const pending: TreeItem[] = [];
    for (const section of sections(item.node)) {
      pending.push({ type: 'section', keyword: section.keyword, depth: item.depth + 1 });
      for (const member of section.members) {
        pending.push({ type: 'feature', node: member, depth: item.depth + 2 });
      }
    }
    stack.push(...pending.reverse());
  }
}

export function renderConstraint(constraint: Constraint): string {
  const body = renderExpr(constraint.expr, quoteId);
  return `${body} // rule:${constraint.trace.rule} def:${constraint.trace.definition}`;
}

export function serializeModel(model: FeatureModel): string {
  const lines: string[] = [`namespace ${quoteId(model.namespace)}`, '', 'features'];
  writeTree(model.root, lines);
  if (model.constraints.length > 0) {
    lines.push('', 'constraints');
    for (const constraint of model.constraints) {
      lines.push(`\t${renderConstraint(constraint)}`);
    }
  }
  return `${lines.join('\n')}\n`;
}

/** The id → description side file, keys in tree order */
export function serializeDescriptions(model: FeatureModel): string {
  return `${JSON.stringify(model.descriptions, null, 2)}\n`;
}
