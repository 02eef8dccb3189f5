/**
 * Model assembly: one feature tree per kind under a synthetic abstract root,
 * one constraint list, one description map.
 */

import { deriveConstraints, findConflicts } from '../constraints/deriver.js';
import { type Constraint, variables } from '../constraints/expression.js';
import { DIAGNOSTIC_CODES, DIAGNOSTIC_PHASES } from '../diag/codes.js';
import { type DiagnosticEnvelope, makeDiagnostic } from '../diag/envelope.js';
import { ErrorCode } from '../errors/codes.js';
import { type Definition, shortName } from '../graph/definition.js';
import type { SchemaGraph } from '../graph/schema-graph.js';
import { SiblingNames, toSegment } from '../synth/naming.js';
import {
  type Binding,
  type KindTree,
  type SharedExpansions,
  synthesizeKind,
} from '../synth/synthesizer.js';
import { FatalError } from '../types/errors.js';
import type { MetricsCollector } from '../util/metrics.js';
import {
  type FeatureModel,
  type FeatureNode,
  countFeatures,
  createFeatureNode,
  walkFeatures,
} from './feature-model.js';

export interface AssembleOptions {
  namespace: string;
  metrics?: MetricsCollector;
}

export interface KindPlan {
  definition: string;
  kindId: string;
  /** Other root definitions folded into this kind */
  aliases: string[];
}

/**
 * A root that is only a reference to another definition (`{$ref: X}`)
 * stands for X.
 */
function canonicalDefinition(graph: SchemaGraph, name: string): string {
  let current = name;
  const seen = new Set<string>();
  for (;;) {
    const def: Definition | undefined = graph.get(current);
    if (!def || def.kind !== 'intersection' || def.branches.length !== 1) {
      return current;
    }
    const [next] = def.branches;
    if (next === undefined || seen.has(next)) return current;
    seen.add(current);
    current = next;
  }
}

function qualifiedKindSegment(graph: SchemaGraph, name: string): string {
  const def = graph.get(name);
  const base = shortName(name);
  if (def?.kind === 'object') {
    const [gvk] = def.gvk;
    if (gvk !== undefined) {
      return `${base}_${gvk.group === '' ? 'core' : gvk.group}_${gvk.version}`;
    }
  }
  return name;
}

/**
 * Choose kind ids. Kinds resolving to the same definition are merged;
 * short names that clash are qualified with group and version.
 */
export function planKinds(
  graph: SchemaGraph,
  roots: readonly string[],
  namespace: string,
  diagnostics: DiagnosticEnvelope[] = []
): KindPlan[] {
  const byCanonical = new Map<string, KindPlan>();
  const plans: KindPlan[] = [];
  for (const root of roots) {
    if (!graph.has(root)) continue;
    const canonical = canonicalDefinition(graph, root);
    const existing = byCanonical.get(canonical);
    if (existing) {
      existing.aliases.push(root);
      diagnostics.push(
        makeDiagnostic(
          DIAGNOSTIC_CODES.KIND_MERGED,
          DIAGNOSTIC_PHASES.ASSEMBLE,
          root,
          { mergedInto: existing.definition }
        )
      );
      continue;
    }
    const plan: KindPlan = { definition: root, kindId: '', aliases: [] };
    byCanonical.set(canonical, plan);
    plans.push(plan);
  }

  const shortCounts = new Map<string, number>();
  for (const plan of plans) {
    const short = shortName(plan.definition);
    shortCounts.set(short, (shortCounts.get(short) ?? 0) + 1);
  }

  const names = new SiblingNames();
  names.claim(namespace);
  for (const plan of plans) {
    const short = shortName(plan.definition);
    const raw =
      (shortCounts.get(short) ?? 0) > 1
        ? qualifiedKindSegment(graph, plan.definition)
        : short;
    plan.kindId = names.claim(toSegment(raw).segment).segment;
  }
  return plans;
}

/**
 * Drop constraints over ids the tree does not contain.
 */
export function dropDanglingConstraints(
  constraints: readonly Constraint[],
  known: ReadonlySet<string>
): { kept: Constraint[]; diagnostics: DiagnosticEnvelope[] } {
  const kept: Constraint[] = [];
  const diagnostics: DiagnosticEnvelope[] = [];
  for (const constraint of constraints) {
    const missing = variables(constraint.expr).filter((id) => !known.has(id));
    if (missing.length === 0) {
      kept.push(constraint);
      continue;
    }
    diagnostics.push(
      makeDiagnostic(
        DIAGNOSTIC_CODES.CONSTRAINT_DANGLING_REFERENCE,
        DIAGNOSTIC_PHASES.ASSEMBLE,
        constraint.trace.definition,
        { rule: constraint.trace.rule, missing: [...new Set(missing)] }
      )
    );
  }
  return { kept, diagnostics };
}

function collectIds(root: FeatureNode): Set<string> {
  const ids = new Set<string>();
  walkFeatures(root, (node) => {
    if (ids.has(node.id)) {
      throw new FatalError({
        message: `Duplicate feature id ${node.id}`,
        errorCode: ErrorCode.DUPLICATE_FEATURE_ID,
        context: { featureId: node.id },
      });
    }
    ids.add(node.id);
  });
  return ids;
}

export function collectDescriptions(root: FeatureNode): Record<string, string> {
  const out: Record<string, string> = {};
  walkFeatures(root, (node) => {
    if (node.attributes.doc !== undefined) out[node.id] = node.attributes.doc;
  });
  return out;
}

export function assembleModel(
  graph: SchemaGraph,
  options: AssembleOptions
): FeatureModel {
  const { namespace, metrics } = options;
  const warnings: DiagnosticEnvelope[] = [];
  const plans = planKinds(graph, graph.roots, namespace, warnings);

  const trees: KindTree[] = [];
  const shared: SharedExpansions = new Map();
  metrics?.begin('SYNTHESIZE');
  try {
    for (const plan of plans) {
      const tree = synthesizeKind(graph, plan.definition, plan.kindId, shared);
      if (plan.aliases.length > 0) tree.root.attributes.aliases = [...plan.aliases];
      trees.push(tree);
      warnings.push(...tree.diagnostics);
    }
  } finally {
    metrics?.end('SYNTHESIZE');
  }

  const bindings: Binding[] = trees.flatMap((t) => t.bindings);
  const derived = metrics
    ? metrics.measure('DERIVE', () => deriveConstraints(bindings))
    : deriveConstraints(bindings);
  warnings.push(...derived.diagnostics);

  const assemble = (): FeatureModel => {
    const root = createFeatureNode(namespace, 'mandatory', { abstract: true });
    root.group = 'or';
    root.children = trees.map((t) => t.root);

    const ids = collectIds(root);
    const { kept, diagnostics } = dropDanglingConstraints(derived.constraints, ids);
    warnings.push(...diagnostics, ...findConflicts(kept));

    return {
      namespace,
      root,
      constraints: kept,
      descriptions: collectDescriptions(root),
      warnings,
    };
  };
  const model = metrics ? metrics.measure('ASSEMBLE', assemble) : assemble();

  metrics?.addCount('featuresEmitted', countFeatures(model.root));
  metrics?.addCount('constraintsDerived', model.constraints.length);
  return model;
}
