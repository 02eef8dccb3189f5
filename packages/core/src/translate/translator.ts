/**
 * Configuration document → feature selection.
 *
 * Every key path in the document is looked up in the key mapper under the
 * document's kind. Hits select the feature (and its model ancestors); misses
 * are listed in `unmappedKeys`, never dropped. A container without a mapping
 * is still descended so its mapped or unmapped leaves are reported one by one.
 * Keys below a `shared` stub land in another kind's expansion; selecting them
 * climbs back out through the stub rather than into that kind.
 */

import { ErrorCode } from '../errors/codes.js';
import type { Literal } from '../graph/definition.js';
import type { KeyMapper } from '../mapping/key-mapper.js';
import { type PathSegment, formatPath } from '../mapping/key-path.js';
import type { FeatureNode, ModelIndex, ValueType } from '../model/feature-model.js';
import { FatalError } from '../types/errors.js';
import { type Result, err, ok } from '../types/result.js';
import { isRecord } from './document-loader.js';

export interface ConfigurationSelection {
  /** Selection order: ancestors before descendants, then document order */
  selectedFeatureIds: string[];
  attributeValues: Record<string, Literal[]>;
  unmappedKeys: string[];
}

export const NULL_MARKER = 'isNull';
export const EMPTY_MARKER = 'isEmpty';

export type PresenceMarker = typeof NULL_MARKER | typeof EMPTY_MARKER;

export function markerId(featureId: string, marker: PresenceMarker): string {
  return `${featureId}.${marker}`;
}

/** Split `<feature>.isNull` / `<feature>.isEmpty` into feature id and marker */
export function parseMarkerId(
  id: string
): { featureId: string; marker: PresenceMarker } | undefined {
  for (const marker of [NULL_MARKER, EMPTY_MARKER] as const) {
    const suffix = `.${marker}`;
    if (id.endsWith(suffix) && id.length > suffix.length) {
      return { featureId: id.slice(0, -suffix.length), marker };
    }
  }
  return undefined;
}

export interface TranslateOptions {
  /** Epoch milliseconds after which translation gives up */
  deadline?: number;
  now?: () => number;
}

const KIND_KEYS = new Set(['apiVersion', 'kind']);

/**
 * Kind feature for a document: by `gvk` attribute first, then by id.
 */
export function findKindFeature(
  index: ModelIndex,
  apiVersion: unknown,
  kind: unknown
): FeatureNode | undefined {
  if (typeof kind !== 'string') return undefined;
  const kinds = index.model.root.children;
  if (typeof apiVersion === 'string') {
    const gvk = `${apiVersion} ${kind}`;
    const byGvk = kinds.find((k) => k.attributes.gvk === gvk);
    if (byGvk) return byGvk;
  }
  return kinds.find((k) => k.id === kind || k.attributes.aliases?.includes(kind));
}

function runtimeValueType(value: Literal): ValueType {
  if (typeof value === 'string') return 'String';
  if (typeof value === 'boolean') return 'Boolean';
  return Number.isInteger(value) ? 'Integer' : 'Real';
}

/** Union branch a scalar literal lands in, by its runtime type */
function pickScalarBranch(node: FeatureNode, value: Literal): FeatureNode | undefined {
  const branches = node.children.filter(
    (c) => c.attributes.branch === true && c.valueType !== undefined
  );
  const wanted = runtimeValueType(value);
  const exact = branches.find((b) => b.valueType === wanted);
  if (exact) return exact;
  if (wanted === 'Integer') return branches.find((b) => b.valueType === 'Real');
  return undefined;
}

function isLiteral(value: unknown): value is Literal {
  return typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean';
}

function isEmptyContainer(value: unknown): boolean {
  if (Array.isArray(value)) return value.length === 0;
  return isRecord(value) && Object.keys(value).length === 0;
}

interface WalkItem {
  path: PathSegment[];
  value: unknown;
  /** `shared` stubs crossed on the way here, outermost first */
  mounts: string[];
}

function childItems(path: PathSegment[], value: unknown, mounts: string[] = []): WalkItem[] {
  if (Array.isArray(value)) {
    return value.map((item, index): WalkItem => ({
      path: [...path, { type: 'index', index }],
      value: item,
      mounts,
    }));
  }
  if (isRecord(value)) {
    return Object.entries(value).map(([key, item]): WalkItem => ({
      path: [...path, { type: 'key', key }],
      value: item,
      mounts,
    }));
  }
  return [];
}

class SelectionBuilder {
  private readonly selected = new Set<string>();
  readonly order: string[] = [];
  readonly values: Record<string, Literal[]> = {};

  constructor(private readonly index: ModelIndex) {}

  add(id: string): void {
    if (this.selected.has(id)) return;
    this.selected.add(id);
    this.order.push(id);
  }

  /**
   * Select a feature together with every unselected ancestor. Reaching the
   * target of the innermost pending mount continues at that stub instead of
   * the target's own parent.
   */
  select(id: string, mounts: readonly string[] = []): void {
    const chain: string[] = [];
    const pending = [...mounts];
    let current: string | undefined = id;
    while (current !== undefined) {
      if (!this.selected.has(current)) chain.push(current);
      else if (pending.length === 0) break;
      const stub = pending[pending.length - 1];
      if (stub !== undefined && this.index.nodes.get(stub)?.attributes.shared === current) {
        pending.pop();
        current = stub;
        continue;
      }
      current = this.index.parents.get(current)?.id;
    }
    for (let i = chain.length - 1; i >= 0; i -= 1) {
      const next = chain[i];
      if (next !== undefined) this.add(next);
    }
  }

  record(id: string, value: Literal): void {
    const list = this.values[id] ?? [];
    list.push(value);
    this.values[id] = list;
  }
}

export function translateDocument(
  content: unknown,
  index: ModelIndex,
  mapper: KeyMapper,
  options: TranslateOptions = {}
): Result<ConfigurationSelection, FatalError> {
  const now = options.now ?? Date.now;
  const builder = new SelectionBuilder(index);
  const unmappedKeys: string[] = [];
  builder.add(index.model.root.id);

  const top: Record<string, unknown> = isRecord(content) ? content : {};
  const kindNode = findKindFeature(index, top['apiVersion'], top['kind']);
  if (kindNode) builder.select(kindNode.id);

  const stack: WalkItem[] = childItems([], content).reverse();
  while (stack.length > 0) {
    const item = stack.pop();
    if (item === undefined) break;
    if (options.deadline !== undefined && now() > options.deadline) {
      return err(
        new FatalError({
          message: `Translation exceeded its time budget at ${formatPath(item.path)}`,
          errorCode: ErrorCode.TRANSLATION_TIMEOUT,
          context: { keyPath: formatPath(item.path) },
        })
      );
    }

    const { path, value, mounts } = item;
    const entry = kindNode ? mapper.lookup(path, kindNode.id) : undefined;
    const node = entry ? index.nodes.get(entry.featureId) : undefined;

    if (entry === undefined || node === undefined) {
      const [first] = path;
      if (path.length === 1 && first?.type === 'key' && KIND_KEYS.has(first.key)) continue;
      if (!isEmptyContainer(value) && (Array.isArray(value) || isRecord(value))) {
        stack.push(...childItems(path, value, mounts).reverse());
      } else {
        unmappedKeys.push(formatPath(path));
      }
      continue;
    }

    builder.select(node.id, mounts);
    if (value === null || value === undefined) {
      builder.add(markerId(node.id, NULL_MARKER));
      continue;
    }
    if (isEmptyContainer(value)) {
      builder.add(markerId(node.id, EMPTY_MARKER));
      continue;
    }
    if (Array.isArray(value) || isRecord(value)) {
      // A terminal feature takes its whole value
      if (node.attributes.shared !== undefined) {
        stack.push(...childItems(path, value, [...mounts, node.id]).reverse());
      } else if (node.children.length > 0) {
        stack.push(...childItems(path, value, mounts).reverse());
      }
      continue;
    }
    const literal: Literal = isLiteral(value) ? value : String(value);
    if (entry.valueKind !== 'boolean-presence') builder.record(node.id, literal);
    const branch = pickScalarBranch(node, literal);
    if (branch) builder.select(branch.id, mounts);
  }

  return ok({
    selectedFeatureIds: builder.order,
    attributeValues: builder.values,
    unmappedKeys,
  });
}
