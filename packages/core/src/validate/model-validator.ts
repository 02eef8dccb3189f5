/**
 * Selection validation against the feature tree and the constraint list.
 *
 * The report is an ordered list of violated rule ids so a failing document
 * can be diagnosed from the report alone:
 *
 *   parent:<id>       selected feature whose parent is not selected, unless
 *                     a selected `shared` stub stands in for the parent
 *   mandatory:<id>    mandatory child of a selected and-group missing
 *   or:<id>           selected or-group with no member selected
 *   alternative:<id>  selected alternative group without exactly one member
 *   enum:<id>         value outside the feature's value set
 *   unknown:<id>      selected id the model does not contain
 *   constraint:<n>    constraint n evaluates false
 *
 * Tree violations come first in pre-order, then enum, unknown and
 * constraint violations.
 */

import { evaluate, renderExpr } from '../constraints/expression.js';
import type { Literal } from '../graph/definition.js';
import type { FeatureNode, ModelIndex } from '../model/feature-model.js';
import { type ConfigurationSelection, NULL_MARKER, parseMarkerId } from '../translate/translator.js';

export type ViolationRule =
  | 'parent'
  | 'mandatory'
  | 'or'
  | 'alternative'
  | 'enum'
  | 'unknown'
  | 'constraint';

export interface Violation {
  /** `<rule>:<target>` */
  id: string;
  rule: ViolationRule;
  target: string;
  message: string;
}

export interface ValidationResult {
  valid: boolean;
  violations: string[];
  details: Violation[];
}

function violation(rule: ViolationRule, target: string, message: string): Violation {
  return { id: `${rule}:${target}`, rule, target, message };
}

function inValueSet(value: Literal, values: readonly Literal[]): boolean {
  return values.some((allowed) => String(allowed) === String(value));
}

function checkGroup(node: FeatureNode, isSelected: (id: string) => boolean): Violation[] {
  const out: Violation[] = [];
  if (node.children.length === 0) return out;
  switch (node.group) {
    case 'and':
      for (const child of node.children) {
        if (child.cardinality === 'mandatory' && !isSelected(child.id)) {
          out.push(
            violation('mandatory', child.id, `${node.id} is selected but mandatory ${child.id} is not`)
          );
        }
      }
      break;
    case 'or':
      if (!node.children.some((c) => isSelected(c.id))) {
        out.push(violation('or', node.id, `${node.id} needs at least one member selected`));
      }
      break;
    case 'alternative': {
      const count = node.children.filter((c) => isSelected(c.id)).length;
      if (count !== 1) {
        out.push(
          violation('alternative', node.id, `${node.id} needs exactly one member selected, found ${count}`)
        );
      }
      break;
    }
  }
  return out;
}

/** Shared expansion root → stubs pointing at it */
function stubsByTarget(index: ModelIndex): Map<string, string[]> {
  const out = new Map<string, string[]>();
  for (const id of index.order) {
    const target = index.nodes.get(id)?.attributes.shared;
    if (target === undefined) continue;
    out.set(target, [...(out.get(target) ?? []), id]);
  }
  return out;
}

export function validateSelection(
  index: ModelIndex,
  selection: ConfigurationSelection
): ValidationResult {
  const rootId = index.model.root.id;
  const selected = new Set(selection.selectedFeatureIds);
  selected.add(rootId);
  const isSelected = (id: string): boolean => selected.has(id);

  const unknown: string[] = [];
  const nulled = new Set<string>();
  for (const id of selected) {
    if (index.nodes.has(id)) continue;
    const marker = parseMarkerId(id);
    if (marker && index.nodes.has(marker.featureId)) {
      if (marker.marker === NULL_MARKER) nulled.add(marker.featureId);
      continue;
    }
    unknown.push(id);
  }

  const details: Violation[] = [];
  const missingMandatory = new Set<string>();
  const stubs = stubsByTarget(index);
  const mounted = (id: string): boolean => (stubs.get(id) ?? []).some(isSelected);

  for (const id of index.order) {
    const node = index.nodes.get(id);
    if (!node || !selected.has(id)) continue;

    const parent = index.parents.get(id);
    if (
      parent &&
      !selected.has(parent.id) &&
      !missingMandatory.has(parent.id) &&
      !mounted(id)
    ) {
      details.push(violation('parent', id, `${id} is selected but its parent ${parent.id} is not`));
    }
    if (nulled.has(id)) continue;

    for (const v of checkGroup(node, isSelected)) {
      if (v.rule === 'mandatory') missingMandatory.add(v.target);
      details.push(v);
    }
  }

  for (const id of index.order) {
    const allowed = index.nodes.get(id)?.attributes.values;
    const values = selection.attributeValues[id];
    if (allowed === undefined || values === undefined) continue;
    const bad = values.find((value) => !inValueSet(value, allowed));
    if (bad !== undefined) {
      details.push(violation('enum', id, `${String(bad)} is not one of ${allowed.map(String).join(', ')}`));
    }
  }

  for (const id of [...unknown].sort()) {
    details.push(violation('unknown', id, `${id} is not a feature of the model`));
  }

  index.model.constraints.forEach((constraint, i) => {
    if (!evaluate(constraint.expr, isSelected)) {
      details.push(
        violation('constraint', String(i), `${renderExpr(constraint.expr)} (${constraint.trace.rule})`)
      );
    }
  });

  return {
    valid: details.length === 0,
    violations: details.map((d) => d.id),
    details,
  };
}
