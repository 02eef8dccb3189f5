import { DIAGNOSTIC_CODES, DIAGNOSTIC_PHASES } from '../diag/codes.js';
import { type DiagnosticEnvelope, makeDiagnostic } from '../diag/envelope.js';
import { type FeatureModel, type FeatureNode, indexFeatures } from '../model/feature-model.js';
import { KeyMapper, type KeyMappingEntry, type ValueKind } from './key-mapper.js';
import { type PatternSegment, formatPattern } from './key-path.js';

export interface DerivedMapping {
  mapper: KeyMapper;
  /** Every candidate entry, including the ones dropped as ambiguous */
  candidates: KeyMappingEntry[];
  diagnostics: DiagnosticEnvelope[];
}

function keySegment(key: string): PatternSegment {
  if (key === '[*]') return { type: 'anyIndex' };
  if (key === '*') return { type: 'anyKey' };
  return { type: 'key', key };
}

function hasScalarBranches(node: FeatureNode): boolean {
  return node.children.some((c) => c.attributes.branch === true && c.valueType !== undefined);
}

export function valueKindOf(node: FeatureNode): ValueKind {
  if (node.attributes.values !== undefined) return 'enumerated';
  if (
    node.attributes.recursive !== undefined ||
    node.attributes.shared !== undefined ||
    node.attributes.opaque === true
  ) {
    return 'boolean-presence';
  }
  if (node.children.length === 0 || hasScalarBranches(node)) return 'verbatim';
  return 'boolean-presence';
}

/**
 * One pattern per keyed feature, scoped to its kind: the feature's key
 * preceded by the keys of its ancestors. Branch and variant nodes consume no
 * key, so their children extend the parent's path. Below a `shared` stub the
 * walk continues into the shared expansion, still scoped to the kind.
 */
export function deriveKeyMappings(model: FeatureModel): DerivedMapping {
  const { nodes } = indexFeatures(model.root);
  const candidates: KeyMappingEntry[] = [];
  for (const kind of model.root.children) {
    const stack: Array<{ node: FeatureNode; path: PatternSegment[]; mounts: string[] }> = [
      { node: kind, path: [], mounts: [] },
    ];
    while (stack.length > 0) {
      const item = stack.pop();
      if (item === undefined) break;
      const { node, mounts } = item;
      let path = item.path;
      const key = node.attributes.key;
      if (key !== undefined && node !== kind) {
        path = [...path, keySegment(key)];
        candidates.push({
          pattern: { scope: kind.id, segments: path },
          featureId: node.id,
          valueKind: valueKindOf(node),
        });
      }
      let children = node.children;
      let childMounts = mounts;
      const target = node.attributes.shared;
      if (target !== undefined && !mounts.includes(target)) {
        children = nodes.get(target)?.children ?? [];
        childMounts = [...mounts, target];
      }
      for (let i = children.length - 1; i >= 0; i -= 1) {
        const child = children[i];
        if (child !== undefined) stack.push({ node: child, path, mounts: childMounts });
      }
    }
  }

  const mapper = KeyMapper.fromEntries(candidates, { onConflict: 'exclude' });
  const diagnostics = mapper.conflicts.map((c) =>
    makeDiagnostic(
      DIAGNOSTIC_CODES.AMBIGUOUS_KEY_PATH,
      DIAGNOSTIC_PHASES.MAPPING,
      formatPattern(c.second.pattern),
      { features: [c.first.featureId, c.second.featureId] }
    )
  );
  return { mapper, candidates, diagnostics };
}
