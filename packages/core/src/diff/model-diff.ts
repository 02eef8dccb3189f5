/**
 * Structural comparison of two model versions, keyed by feature id.
 * Constraints compare by their rendered expression.
 */

import { renderExpr } from '../constraints/expression.js';
import type { FeatureModel, FeatureNode } from '../model/feature-model.js';
import { indexFeatures } from '../model/feature-model.js';
import { ATTRIBUTE_ORDER } from '../serialize/uvl-writer.js';

export interface FeatureChange {
  id: string;
  /** Human-readable field changes, e.g. `group: and -> alternative` */
  changes: string[];
}

export interface ModelDiff {
  addedFeatures: string[];
  removedFeatures: string[];
  changedFeatures: FeatureChange[];
  addedConstraints: string[];
  removedConstraints: string[];
}

function show(value: unknown): string {
  return value === undefined ? '-' : JSON.stringify(value);
}

function compareNodes(
  before: FeatureNode,
  after: FeatureNode,
  parentGroupBefore: FeatureNode['group'] | undefined,
  parentGroupAfter: FeatureNode['group'] | undefined
): string[] {
  const changes: string[] = [];
  // Cardinality only means something inside an and-group
  const cardinalityMatters = parentGroupBefore === 'and' && parentGroupAfter === 'and';
  if (cardinalityMatters && before.cardinality !== after.cardinality) {
    changes.push(`cardinality: ${before.cardinality} -> ${after.cardinality}`);
  }
  if (before.children.length > 0 && after.children.length > 0 && before.group !== after.group) {
    changes.push(`group: ${before.group} -> ${after.group}`);
  }
  if (before.valueType !== after.valueType) {
    changes.push(`type: ${show(before.valueType)} -> ${show(after.valueType)}`);
  }
  if (show(before.multiplicity) !== show(after.multiplicity)) {
    changes.push(`multiplicity: ${show(before.multiplicity)} -> ${show(after.multiplicity)}`);
  }
  for (const key of ATTRIBUTE_ORDER) {
    if (key === 'doc' || key === 'provenance') continue;
    const a = show(before.attributes[key]);
    const b = show(after.attributes[key]);
    if (a !== b) changes.push(`${key}: ${a} -> ${b}`);
  }
  return changes;
}

function constraintTexts(model: FeatureModel): Set<string> {
  return new Set(model.constraints.map((c) => renderExpr(c.expr)));
}

export function diffModels(before: FeatureModel, after: FeatureModel): ModelDiff {
  const a = indexFeatures(before.root);
  const b = indexFeatures(after.root);

  const addedFeatures = b.order.filter((id) => !a.nodes.has(id));
  const removedFeatures = a.order.filter((id) => !b.nodes.has(id));
  const changedFeatures: FeatureChange[] = [];
  for (const id of b.order) {
    const oldNode = a.nodes.get(id);
    const newNode = b.nodes.get(id);
    if (!oldNode || !newNode) continue;
    const changes = compareNodes(
      oldNode,
      newNode,
      a.parents.get(id)?.group,
      b.parents.get(id)?.group
    );
    if (changes.length > 0) changedFeatures.push({ id, changes });
  }

  const oldConstraints = constraintTexts(before);
  const newConstraints = constraintTexts(after);
  return {
    addedFeatures,
    removedFeatures,
    changedFeatures,
    addedConstraints: [...newConstraints].filter((c) => !oldConstraints.has(c)),
    removedConstraints: [...oldConstraints].filter((c) => !newConstraints.has(c)),
  };
}

export function isEmptyDiff(diff: ModelDiff): boolean {
  return (
    diff.addedFeatures.length === 0 &&
    diff.removedFeatures.length === 0 &&
    diff.changedFeatures.length === 0 &&
    diff.addedConstraints.length === 0 &&
    diff.removedConstraints.length === 0
  );
}
