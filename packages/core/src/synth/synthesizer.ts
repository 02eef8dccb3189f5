/**
 * Feature synthesis: schema graph → one feature tree per kind.
 *
 * Ids are dotted document paths from the kind (`Pod.spec.containers`), so
 * they stay stable for an unchanged schema. Each definition variant has one
 * handler in `FILLERS`. A reference back into a definition already being
 * expanded on the current path becomes a terminal stub. So does an object
 * definition an earlier kind already expanded: the stub's `shared`
 * attribute names that expansion, and keys below it resolve there.
 */

import { DIAGNOSTIC_CODES, DIAGNOSTIC_PHASES } from '../diag/codes.js';
import { type DiagnosticEnvelope, makeDiagnostic } from '../diag/envelope.js';
import {
  type CompositionMode,
  type Definition,
  type DefinitionKind,
  type ObjectDefinition,
  shortName,
} from '../graph/definition.js';
import { isDeprecatedDescription } from '../graph/classify.js';
import type { SchemaGraph } from '../graph/schema-graph.js';
import {
  type FeatureNode,
  createFeatureNode,
} from '../model/feature-model.js';
import { SiblingNames, toSegment, toValueType } from './naming.js';

/** A definition together with the feature node it was expanded into */
export interface Binding {
  definition: Definition;
  node: FeatureNode;
}

export interface KindTree {
  kindId: string;
  definition: string;
  root: FeatureNode;
  bindings: Binding[];
  diagnostics: DiagnosticEnvelope[];
}

/** Definition name → first node it was expanded into, across kinds */
export type SharedExpansions = Map<string, FeatureNode>;

interface SynthContext {
  graph: SchemaGraph;
  kindId: string;
  shared: SharedExpansions;
  path: Set<string>;
  bindings: Binding[];
  diagnostics: DiagnosticEnvelope[];
}

interface Member {
  key: string;
  target: string;
  mandatory: boolean;
  description?: string;
  provenance: string;
}

interface ObjectShape {
  members: Member[];
  additional?: { target: string; provenance: string };
  compositions: Array<{
    owner: string;
    mode: CompositionMode;
    branches: string[];
  }>;
}

function diag(
  ctx: SynthContext,
  code:
    | typeof DIAGNOSTIC_CODES.FEATURE_ALIASED
    | typeof DIAGNOSTIC_CODES.FEATURE_ID_COLLISION
    | typeof DIAGNOSTIC_CODES.RESERVED_NAME_ESCAPED
    | typeof DIAGNOSTIC_CODES.RECURSION_CUT
    | typeof DIAGNOSTIC_CODES.FEATURE_SHARED,
  canonPath: string,
  details: Record<string, unknown>
): void {
  ctx.diagnostics.push(
    makeDiagnostic(code, DIAGNOSTIC_PHASES.SYNTHESIZE, canonPath, details)
  );
}

function childId(
  ctx: SynthContext,
  parent: FeatureNode,
  names: SiblingNames,
  rawName: string
): string {
  const { segment, escaped } = toSegment(rawName);
  if (escaped) {
    diag(ctx, DIAGNOSTIC_CODES.RESERVED_NAME_ESCAPED, parent.id, {
      name: rawName,
      segment,
    });
  }
  const claimed = names.claim(segment);
  if (claimed.collided) {
    diag(ctx, DIAGNOSTIC_CODES.FEATURE_ID_COLLISION, parent.id, {
      name: rawName,
      segment: claimed.segment,
    });
  }
  return `${parent.id}.${claimed.segment}`;
}

/**
 * Gather the properties of an object and of everything it intersects with,
 * in declaration order. A key seen twice keeps its first declaration.
 */
function collectShape(
  ctx: SynthContext,
  node: FeatureNode,
  start: Definition
): { shape: ObjectShape; aliases: Map<string, string[]> } {
  const shape: ObjectShape = { members: [], compositions: [] };
  const aliases = new Map<string, string[]>();
  const byKey = new Map<string, Member>();
  const visited = new Set<string>();
  const pending: Definition[] = [start];

  while (pending.length > 0) {
    const def = pending.shift();
    if (def === undefined || visited.has(def.name)) continue;
    visited.add(def.name);

    let branchNames: string[] = [];
    if (def.kind === 'object') {
      addObjectMembers(ctx, node, def, shape, byKey, aliases);
      branchNames = def.allOf;
    } else if (def.kind === 'intersection') {
      branchNames = def.branches;
    } else if (def.kind === 'union') {
      shape.compositions.push({
        owner: def.name,
        mode: def.mode,
        branches: def.branches,
      });
    }

    const resolved = branchNames.flatMap((name) => {
      const branch = ctx.graph.get(name);
      return branch ? [branch] : [];
    });
    pending.unshift(...resolved);
  }

  return { shape, aliases };
}

function addObjectMembers(
  ctx: SynthContext,
  node: FeatureNode,
  def: ObjectDefinition,
  shape: ObjectShape,
  byKey: Map<string, Member>,
  aliases: Map<string, string[]>
): void {
  const required = new Set(def.required);
  for (const prop of def.properties) {
    const provenance = `${def.name}/properties/${prop.name}`;
    const existing = byKey.get(prop.name);
    if (existing) {
      const list = aliases.get(prop.name) ?? [];
      list.push(provenance);
      aliases.set(prop.name, list);
      diag(ctx, DIAGNOSTIC_CODES.FEATURE_ALIASED, node.id, {
        key: prop.name,
        kept: existing.provenance,
        alias: provenance,
      });
      if (required.has(prop.name)) existing.mandatory = true;
      continue;
    }
    const target = ctx.graph.get(prop.target);
    const description = prop.description ?? target?.description;
    const member: Member = {
      key: prop.name,
      target: prop.target,
      mandatory: required.has(prop.name) || prop.requiredByDescription,
      ...(description !== undefined ? { description } : {}),
      provenance,
    };
    byKey.set(prop.name, member);
    shape.members.push(member);
  }
  if (def.additional !== undefined && shape.additional === undefined) {
    shape.additional = {
      target: def.additional,
      provenance: `${def.name}/additionalProperties`,
    };
  }
  if (def.composition) {
    shape.compositions.push({ owner: def.name, ...def.composition });
  }
}

function branchLabel(
  ctx: SynthContext,
  owner: string,
  branch: string,
  index: number
): string {
  const def = ctx.graph.get(branch);
  const inline = branch.startsWith(`${owner}/`);
  if (inline && def?.kind === 'scalar' && def.valueType !== undefined) {
    return `as${toValueType(def.valueType)}`;
  }
  if (!inline) return shortName(branch);
  return `option${index}`;
}

function fillComposition(
  ctx: SynthContext,
  node: FeatureNode,
  names: SiblingNames,
  composition: ObjectShape['compositions'][number]
): void {
  node.group = composition.mode === 'exclusive' ? 'alternative' : 'or';
  const keyword = composition.mode === 'exclusive' ? 'oneOf' : 'anyOf';
  composition.branches.forEach((branch, index) => {
    if (!ctx.graph.has(branch)) return;
    const label = branchLabel(ctx, composition.owner, branch, index);
    const child = createFeatureNode(childId(ctx, node, names, label), 'optional', {
      branch: true,
      provenance: `${composition.owner}/${keyword}/${index}`,
    });
    node.children.push(child);
    fill(ctx, child, branch);
  });
}

function fillObjectLike(
  ctx: SynthContext,
  node: FeatureNode,
  def: Definition
): void {
  const { shape, aliases } = collectShape(ctx, node, def);
  const names = new SiblingNames();

  // A pure composition with nothing else to hold becomes the node's own group
  const [onlyComposition, ...moreCompositions] = shape.compositions;
  if (
    shape.members.length === 0 &&
    shape.additional === undefined &&
    onlyComposition !== undefined &&
    moreCompositions.length === 0
  ) {
    fillComposition(ctx, node, names, onlyComposition);
    return;
  }

  node.group = 'and';
  for (const member of shape.members) {
    if (!ctx.graph.has(member.target)) continue;
    const child = createFeatureNode(
      childId(ctx, node, names, member.key),
      member.mandatory ? 'mandatory' : 'optional',
      { key: member.key, provenance: member.provenance }
    );
    if (member.description !== undefined) {
      child.attributes.doc = member.description;
      if (isDeprecatedDescription(member.description)) {
        child.attributes.deprecated = true;
      }
    }
    const memberAliases = aliases.get(member.key);
    if (memberAliases) child.attributes.aliases = memberAliases;
    node.children.push(child);
    fill(ctx, child, member.target);
  }

  if (shape.additional && shape.members.length === 0) {
    if (ctx.graph.has(shape.additional.target)) {
      const entry = createFeatureNode(
        childId(ctx, node, names, 'entry'),
        'optional',
        { key: '*', provenance: shape.additional.provenance }
      );
      entry.multiplicity = { lower: 0, upper: '*' };
      node.children.push(entry);
      fill(ctx, entry, shape.additional.target);
    }
  }

  for (const composition of shape.compositions) {
    const variant = createFeatureNode(
      childId(ctx, node, names, 'variant'),
      'mandatory',
      { abstract: true, branch: true, provenance: composition.owner }
    );
    node.children.push(variant);
    fillComposition(ctx, variant, new SiblingNames(), composition);
  }
}

type Filler = (ctx: SynthContext, node: FeatureNode, def: Definition) => void;

const FILLERS: Record<DefinitionKind, Filler> = {
  object: fillObjectLike,
  intersection: fillObjectLike,
  union: fillObjectLike,

  array: (ctx, node, def) => {
    if (def.kind !== 'array' || def.items === undefined) return;
    if (!ctx.graph.has(def.items)) return;
    const element = createFeatureNode(`${node.id}.element`, 'optional', {
      key: '[*]',
      provenance: `${def.name}/items`,
    });
    element.multiplicity = { lower: 0, upper: '*' };
    node.children.push(element);
    fill(ctx, element, def.items);
  },

  scalar: (_ctx, node, def) => {
    if (def.kind !== 'scalar') return;
    if (def.valueType !== undefined) node.valueType = toValueType(def.valueType);
    const attrs = node.attributes;
    if (def.default !== undefined) attrs.default = def.default;
    if (def.enum !== undefined) attrs.values = [...def.enum];
    if (def.format !== undefined) attrs.format = def.format;
    if (def.minimum !== undefined) attrs.min = def.minimum;
    if (def.maximum !== undefined) attrs.max = def.maximum;
  },

  unknown: (_ctx, node) => {
    node.attributes.opaque = true;
  },
};

/**
 * Point `node` at another kind's expansion of object definition `name`
 * when there is one. Kind roots never share, and neither do two nodes of
 * the same kind.
 */
function shareEarlierExpansion(ctx: SynthContext, node: FeatureNode, name: string): boolean {
  const first = ctx.shared.get(name);
  if (first === undefined) {
    ctx.shared.set(name, node);
    return false;
  }
  if (first.id.startsWith(`${ctx.kindId}.`)) return false;
  node.attributes.shared = first.id;
  first.attributes.aliases = [...(first.attributes.aliases ?? []), node.id];
  diag(ctx, DIAGNOSTIC_CODES.FEATURE_SHARED, node.id, {
    definition: name,
    sharedWith: first.id,
  });
  return true;
}

function fill(ctx: SynthContext, node: FeatureNode, name: string): void {
  const def = ctx.graph.get(name);
  if (def === undefined) return;

  if (node.attributes.doc === undefined && def.description !== undefined) {
    node.attributes.doc = def.description;
  }
  if (def.deprecated) node.attributes.deprecated = true;

  if (ctx.path.has(name)) {
    node.attributes.recursive = shortName(name);
    diag(ctx, DIAGNOSTIC_CODES.RECURSION_CUT, node.id, { definition: name });
    return;
  }

  if (def.kind === 'object' || def.kind === 'union' || def.kind === 'intersection') {
    if (def.kind === 'object' && node.id !== ctx.kindId && shareEarlierExpansion(ctx, node, name)) {
      return;
    }
    ctx.bindings.push({ definition: def, node });
  }
  ctx.path.add(name);
  try {
    FILLERS[def.kind](ctx, node, def);
  } finally {
    ctx.path.delete(name);
  }
}

export function formatGvk(def: Definition): string | undefined {
  if (def.kind !== 'object') return undefined;
  const [gvk] = def.gvk;
  if (gvk === undefined) return undefined;
  const groupVersion = gvk.group === '' ? gvk.version : `${gvk.group}/${gvk.version}`;
  return `${groupVersion} ${gvk.kind}`;
}

/**
 * Expand one kind into its feature tree.
 *
 * @param kindId feature id of the kind root, chosen by the assembler
 * @param shared expansions of earlier kinds in the same build; updated in place
 */
export function synthesizeKind(
  graph: SchemaGraph,
  definition: string,
  kindId: string,
  shared: SharedExpansions = new Map()
): KindTree {
  const ctx: SynthContext = {
    graph,
    kindId,
    shared,
    path: new Set(),
    bindings: [],
    diagnostics: [],
  };
  const root = createFeatureNode(kindId, 'mandatory', {
    provenance: definition,
  });
  const def = graph.get(definition);
  const gvk = def ? formatGvk(def) : undefined;
  if (gvk !== undefined) root.attributes.gvk = gvk;
  fill(ctx, root, definition);

  return {
    kindId,
    definition,
    root,
    bindings: ctx.bindings,
    diagnostics: ctx.diagnostics,
  };
}
