/**
 * Definition variants held by the schema graph arena.
 *
 * References between definitions are plain qualified names; the arena owns
 * every Definition and lookups go through `SchemaGraph.get`.
 */

export type Literal = string | number | boolean;

export type ScalarType = 'string' | 'integer' | 'number' | 'boolean';

export type CompositionMode = 'exclusive' | 'inclusive';

export interface GroupVersionKind {
  group: string;
  version: string;
  kind: string;
}

/** `x-kubernetes-unions` style discriminator hint */
export interface UnionHint {
  discriminator?: string;
  /** member property name → discriminator value */
  fieldsToDiscriminateBy: Record<string, string>;
}

export interface PropertyRef {
  name: string;
  target: string;
  /** Description given on the property itself, which wins over the target's */
  description?: string;
  /** Set when the description ends in "Required." */
  requiredByDescription: boolean;
}

interface DefinitionBase {
  name: string;
  description?: string;
  deprecated: boolean;
}

export interface ObjectDefinition extends DefinitionBase {
  kind: 'object';
  properties: PropertyRef[];
  required: string[];
  allOf: string[];
  /** Value definition of a map (`additionalProperties` schema) */
  additional?: string;
  /** oneOf/anyOf declared next to properties */
  composition?: { mode: CompositionMode; branches: string[] };
  /** oneOf/anyOf whose branches only list required property names */
  requiredSets?: { mode: CompositionMode; sets: string[][] };
  gvk: GroupVersionKind[];
  unions: UnionHint[];
}

export interface ArrayDefinition extends DefinitionBase {
  kind: 'array';
  items?: string;
}

export interface ScalarDefinition extends DefinitionBase {
  kind: 'scalar';
  valueType?: ScalarType;
  enum?: Literal[];
  default?: Literal;
  format?: string;
  minimum?: number;
  maximum?: number;
}

export interface UnionDefinition extends DefinitionBase {
  kind: 'union';
  mode: CompositionMode;
  branches: string[];
}

export interface IntersectionDefinition extends DefinitionBase {
  kind: 'intersection';
  branches: string[];
}

export interface UnknownDefinition extends DefinitionBase {
  kind: 'unknown';
  keywords: string[];
}

export type Definition =
  | ObjectDefinition
  | ArrayDefinition
  | ScalarDefinition
  | UnionDefinition
  | IntersectionDefinition
  | UnknownDefinition;

export type DefinitionKind = Definition['kind'];

/**
 * Last dotted segment of a qualified definition name
 * (`io.k8s.api.core.v1.Pod` → `Pod`); inline names keep their own tail.
 */
export function shortName(name: string): string {
  const slash = name.indexOf('/');
  const head = slash === -1 ? name : name.slice(0, slash);
  const dot = head.lastIndexOf('.');
  return dot === -1 ? head : head.slice(dot + 1);
}
