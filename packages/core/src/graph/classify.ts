/**
 * Raw schema node → Definition.
 *
 * Dispatch goes through a fixed rule table: the first matching rule decides
 * the variant, and one builder per variant fills it in. Nested inline nodes
 * are not classified here; they are returned so the resolver can queue them
 * under their qualified names.
 */

import type {
  CompositionMode,
  Definition,
  DefinitionKind,
  GroupVersionKind,
  Literal,
  ObjectDefinition,
  PropertyRef,
  ScalarDefinition,
  ScalarType,
  UnionHint,
} from './definition.js';

export type RawNode = Record<string, unknown>;

export interface InlineNode {
  name: string;
  node: RawNode;
}

export interface ClassifyResult {
  definition: Definition;
  /** Inline sub-nodes to materialize under their qualified names */
  inline: InlineNode[];
  /** Names referenced through `$ref` (not inline) */
  refs: string[];
  /** Keywords outside the supported subset found on this node */
  unsupported: string[];
  /** `$ref` values that do not point into the local document */
  foreignRefs: string[];
}

export const UNSUPPORTED_KEYWORDS = [
  'not',
  'if',
  'then',
  'else',
  'patternProperties',
  'dependentSchemas',
  'dependentRequired',
  'dependencies',
  '$dynamicRef',
  '$recursiveRef',
  'unevaluatedProperties',
  'unevaluatedItems',
  'contains',
  'prefixItems',
  'propertyNames',
] as const;

const REF_PREFIXES = ['#/definitions/', '#/$defs/', '#/components/schemas/'];

const SCALAR_TYPES: readonly ScalarType[] = [
  'string',
  'integer',
  'number',
  'boolean',
];

export function isRawNode(value: unknown): value is RawNode {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Map a `$ref` string onto a definition name. Local pointers into any of the
 * definition envelopes and bare names are accepted; anything else is foreign.
 */
export function refTarget(ref: string): string | undefined {
  for (const prefix of REF_PREFIXES) {
    if (ref.startsWith(prefix)) {
      const rest = ref.slice(prefix.length);
      if (rest === '' || rest.includes('/')) return undefined;
      return rest.replace(/~1/g, '/').replace(/~0/g, '~');
    }
  }
  if (ref !== '' && !ref.includes('#') && !ref.includes('/')) {
    return ref;
  }
  return undefined;
}

export function isDeprecatedDescription(description: string): boolean {
  return (
    /\bdeprecated\s*[.:,]/i.test(description) ||
    /\bdeprecated field\b/i.test(description)
  );
}

export function isRequiredByDescription(description: string): boolean {
  return description.trim().endsWith('Required.');
}

const DEFAULT_IN_DESCRIPTION =
  /\b[Dd]efaults? (?:to|is) (?:"([^"]*)"|'([^']*)'|`([^`]*)`|([Tt]rue|[Ff]alse)\b|(-?\d+(?:\.\d+)?)(?![\w.]*[A-Za-z])|([A-Z][\w-]*))/;

/**
 * Pull a default value out of prose such as "Defaults to 80." or
 * `Defaults to "Always".`
 */
export function defaultFromDescription(
  description: string,
  valueType: ScalarType | undefined
): Literal | undefined {
  const match = DEFAULT_IN_DESCRIPTION.exec(description);
  if (!match) return undefined;
  const [, dq, sq, bq, bool, num, word] = match;
  const quoted = dq ?? sq ?? bq;
  if (quoted !== undefined) return quoted;
  if (bool !== undefined) {
    const value = bool.toLowerCase() === 'true';
    return valueType === 'string' ? String(value) : value;
  }
  if (num !== undefined) {
    return valueType === 'string' ? num : Number(num);
  }
  if (word === undefined || valueType === 'integer' || valueType === 'number') {
    return undefined;
  }
  return valueType === 'boolean' ? undefined : word;
}

function isLiteral(value: unknown): value is Literal {
  return (
    typeof value === 'string' ||
    typeof value === 'boolean' ||
    (typeof value === 'number' && Number.isFinite(value))
  );
}

function readString(node: RawNode, key: string): string | undefined {
  const value = node[key];
  return typeof value === 'string' ? value : undefined;
}

function readNumber(node: RawNode, key: string): number | undefined {
  const value = node[key];
  return typeof value === 'number' && Number.isFinite(value)
    ? value
    : undefined;
}

function readStringList(node: RawNode, key: string): string[] {
  const value = node[key];
  if (!Array.isArray(value)) return [];
  return value.filter((v): v is string => typeof v === 'string');
}

function readNodeList(node: RawNode, key: string): RawNode[] {
  const value = node[key];
  if (!Array.isArray(value)) return [];
  return value.filter(isRawNode);
}

function declaredTypes(node: RawNode): string[] {
  const type = node.type;
  if (typeof type === 'string') return [type];
  if (Array.isArray(type)) {
    return type.filter(
      (t): t is string => typeof t === 'string' && t !== 'null'
    );
  }
  return [];
}

function scalarType(node: RawNode): ScalarType | undefined {
  for (const t of declaredTypes(node)) {
    const found = SCALAR_TYPES.find((s) => s === t);
    if (found) return found;
  }
  if (node['x-kubernetes-int-or-string'] === true) return 'string';
  return undefined;
}

/**
 * A child node that is nothing but a reference (optionally wrapped in a
 * single-entry allOf and carrying a description) is not materialized inline.
 */
function directRef(node: RawNode): string | undefined {
  const ref = readString(node, '$ref');
  if (ref !== undefined) return ref;
  const allOf = readNodeList(node, 'allOf');
  if (allOf.length !== 1 || hasStructure(node, ['allOf'])) return undefined;
  const [only] = allOf;
  if (only === undefined || Object.keys(only).length !== 1) return undefined;
  return readString(only, '$ref');
}

const STRUCTURAL_KEYWORDS = [
  'type',
  'properties',
  'items',
  'additionalProperties',
  'oneOf',
  'anyOf',
  'allOf',
  'enum',
  '$ref',
];

function hasStructure(node: RawNode, ignore: string[]): boolean {
  return STRUCTURAL_KEYWORDS.some(
    (k) => !ignore.includes(k) && node[k] !== undefined
  );
}

function hasProperties(node: RawNode): boolean {
  return isRawNode(node.properties);
}

function isMapNode(node: RawNode): boolean {
  const additional = node.additionalProperties;
  return (
    isRawNode(additional) ||
    additional === true ||
    node['x-kubernetes-preserve-unknown-fields'] === true
  );
}

/** Branches that only list `required` names are presence constraints */
function isRequiredOnlyBranch(node: RawNode): boolean {
  const keys = Object.keys(node).filter((k) => k !== 'description');
  return keys.length === 1 && keys[0] === 'required';
}

interface Rule {
  kind: DefinitionKind;
  test: (node: RawNode, unsupported: string[]) => boolean;
}

const CLASSIFY_RULES: readonly Rule[] = [
  { kind: 'unknown', test: (_node, unsupported) => unsupported.length > 0 },
  {
    kind: 'union',
    test: (node) =>
      !hasProperties(node) &&
      (readNodeList(node, 'oneOf').length > 0 ||
        readNodeList(node, 'anyOf').length > 0),
  },
  {
    kind: 'object',
    test: (node) =>
      declaredTypes(node).includes('object') ||
      hasProperties(node) ||
      isMapNode(node),
  },
  {
    kind: 'array',
    test: (node) =>
      declaredTypes(node).includes('array') || node.items !== undefined,
  },
  {
    kind: 'intersection',
    test: (node) =>
      readNodeList(node, 'allOf').length > 0 ||
      readString(node, '$ref') !== undefined,
  },
  { kind: 'scalar', test: () => true },
];

class Collector {
  readonly inline: InlineNode[] = [];
  readonly refs: string[] = [];
  readonly foreignRefs: string[] = [];

  constructor(private readonly owner: string) {}

  /** Resolve a child node to the name the parent should reference */
  child(node: RawNode, path: string): string | undefined {
    const ref = directRef(node);
    if (ref !== undefined) {
      const target = refTarget(ref);
      if (target === undefined) {
        this.foreignRefs.push(ref);
        return undefined;
      }
      this.refs.push(target);
      return target;
    }
    const name = `${this.owner}/${path}`;
    this.inline.push({ name, node });
    return name;
  }

  children(nodes: RawNode[], keyword: string): string[] {
    const out: string[] = [];
    nodes.forEach((node, i) => {
      const name = this.child(node, `${keyword}/${i}`);
      if (name !== undefined) out.push(name);
    });
    return out;
  }
}

function readGvk(node: RawNode): GroupVersionKind[] {
  return readNodeList(node, 'x-kubernetes-group-version-kind').flatMap(
    (entry) => {
      const kind = readString(entry, 'kind');
      const version = readString(entry, 'version');
      if (kind === undefined || version === undefined) return [];
      return [{ group: readString(entry, 'group') ?? '', version, kind }];
    }
  );
}

function readUnions(node: RawNode): UnionHint[] {
  return readNodeList(node, 'x-kubernetes-unions').map((entry) => {
    const fields: Record<string, string> = {};
    const raw = entry.fields_to_discriminateBy ?? entry.fieldsToDiscriminateBy;
    if (isRawNode(raw)) {
      for (const [field, value] of Object.entries(raw)) {
        if (typeof value === 'string') fields[field] = value;
      }
    }
    const discriminator = readString(entry, 'discriminator');
    return discriminator === undefined
      ? { fieldsToDiscriminateBy: fields }
      : { discriminator, fieldsToDiscriminateBy: fields };
  });
}

function compositionOf(
  node: RawNode
): { mode: CompositionMode; nodes: RawNode[]; keyword: string } | undefined {
  const oneOf = readNodeList(node, 'oneOf');
  if (oneOf.length > 0) return { mode: 'exclusive', nodes: oneOf, keyword: 'oneOf' };
  const anyOf = readNodeList(node, 'anyOf');
  if (anyOf.length > 0) return { mode: 'inclusive', nodes: anyOf, keyword: 'anyOf' };
  return undefined;
}

type Builder = (
  name: string,
  node: RawNode,
  base: { name: string; description?: string; deprecated: boolean },
  collect: Collector,
  unsupported: string[]
) => Definition;

const BUILDERS: Record<DefinitionKind, Builder> = {
  unknown: (_name, _node, base, _collect, unsupported) => ({
    ...base,
    kind: 'unknown',
    keywords: unsupported,
  }),

  union: (_name, node, base, collect) => {
    const composition = compositionOf(node);
    return {
      ...base,
      kind: 'union',
      mode: composition?.mode ?? 'exclusive',
      branches: composition
        ? collect.children(composition.nodes, composition.keyword)
        : [],
    };
  },

  object: (_name, node, base, collect) => {
    const properties: PropertyRef[] = [];
    const rawProps = node.properties;
    if (isRawNode(rawProps)) {
      for (const [prop, child] of Object.entries(rawProps)) {
        if (!isRawNode(child)) continue;
        const target = collect.child(child, `properties/${prop}`);
        if (target === undefined) continue;
        const description = readString(child, 'description');
        properties.push({
          name: prop,
          target,
          ...(description !== undefined ? { description } : {}),
          requiredByDescription:
            description !== undefined && isRequiredByDescription(description),
        });
      }
    }

    const definition: ObjectDefinition = {
      ...base,
      kind: 'object',
      properties,
      required: readStringList(node, 'required'),
      allOf: collect.children(readNodeList(node, 'allOf'), 'allOf'),
      gvk: readGvk(node),
      unions: readUnions(node),
    };

    const additional = node.additionalProperties;
    if (isRawNode(additional)) {
      const target = collect.child(additional, 'additionalProperties');
      if (target !== undefined) definition.additional = target;
    } else if (
      additional === true ||
      node['x-kubernetes-preserve-unknown-fields'] === true
    ) {
      if (properties.length === 0) {
        const target = collect.child({}, 'additionalProperties');
        if (target !== undefined) definition.additional = target;
      }
    }

    const composition = compositionOf(node);
    if (composition) {
      if (composition.nodes.every(isRequiredOnlyBranch)) {
        definition.requiredSets = {
          mode: composition.mode,
          sets: composition.nodes.map((n) => readStringList(n, 'required')),
        };
      } else {
        definition.composition = {
          mode: composition.mode,
          branches: collect.children(composition.nodes, composition.keyword),
        };
      }
    }
    return definition;
  },

  array: (_name, node, base, collect) => {
    const items = node.items;
    const target = isRawNode(items) ? collect.child(items, 'items') : undefined;
    return target === undefined
      ? { ...base, kind: 'array' }
      : { ...base, kind: 'array', items: target };
  },

  intersection: (_name, node, base, collect) => {
    const branches = collect.children(readNodeList(node, 'allOf'), 'allOf');
    const ref = readString(node, '$ref');
    if (ref !== undefined) {
      const target = refTarget(ref);
      if (target === undefined) {
        collect.foreignRefs.push(ref);
      } else {
        collect.refs.push(target);
        branches.unshift(target);
      }
    }
    return { ...base, kind: 'intersection', branches };
  },

  scalar: (_name, node, base) => {
    const valueType = scalarType(node);
    const rawEnum = node.enum;
    const values = Array.isArray(rawEnum) ? rawEnum.filter(isLiteral) : [];
    const definition: ScalarDefinition = { ...base, kind: 'scalar' };
    if (valueType !== undefined) definition.valueType = valueType;
    if (values.length > 0) definition.enum = values;

    const rawDefault = node.default;
    const fromDescription =
      base.description !== undefined
        ? defaultFromDescription(base.description, valueType)
        : undefined;
    const defaultValue = isLiteral(rawDefault)
      ? rawDefault
      : (fromDescription ?? values[0]);
    if (defaultValue !== undefined) definition.default = defaultValue;

    const format = readString(node, 'format');
    if (format !== undefined) definition.format = format;
    else if (node['x-kubernetes-int-or-string'] === true) {
      definition.format = 'int-or-string';
    }
    const minimum = readNumber(node, 'minimum');
    if (minimum !== undefined) definition.minimum = minimum;
    const maximum = readNumber(node, 'maximum');
    if (maximum !== undefined) definition.maximum = maximum;
    return definition;
  },
};

export function classifyNode(name: string, node: RawNode): ClassifyResult {
  const unsupported = UNSUPPORTED_KEYWORDS.filter((k) => node[k] !== undefined);
  const description = readString(node, 'description');
  const base = {
    name,
    ...(description !== undefined ? { description } : {}),
    deprecated:
      node.deprecated === true ||
      (description !== undefined && isDeprecatedDescription(description)),
  };

  const rule = CLASSIFY_RULES.find((r) => r.test(node, unsupported));
  const kind = rule?.kind ?? 'scalar';
  const collect = new Collector(name);
  const definition = BUILDERS[kind](name, node, base, collect, unsupported);

  return {
    definition,
    inline: collect.inline,
    refs: collect.refs,
    unsupported,
    foreignRefs: collect.foreignRefs,
  };
}
