import { ErrorCode } from '../errors/codes.js';
import { MappingError } from '../types/errors.js';
import {
  type KeyPattern,
  type PathSegment,
  type PatternSegment,
  formatPattern,
} from './key-path.js';

export type ValueKind = 'verbatim' | 'boolean-presence' | 'enumerated';

export const VALUE_KINDS: readonly ValueKind[] = ['verbatim', 'boolean-presence', 'enumerated'];

export function isValueKind(value: string): value is ValueKind {
  return VALUE_KINDS.some((k) => k === value);
}

export interface KeyMappingEntry {
  pattern: KeyPattern;
  featureId: string;
  valueKind: ValueKind;
}

export interface KeyMappingConflict {
  first: KeyMappingEntry;
  second: KeyMappingEntry;
}

export interface KeyMapperOptions {
  /**
   * `throw` rejects the whole table on the first ambiguity report;
   * `exclude` drops every entry involved in one and keeps the rest.
   */
  onConflict?: 'throw' | 'exclude';
}

interface TrieNode {
  keys: Map<string, TrieNode>;
  anyKey?: TrieNode;
  anyIndex?: TrieNode;
  entries: KeyMappingEntry[];
}

function createTrieNode(): TrieNode {
  return { keys: new Map(), entries: [] };
}

function descend(node: TrieNode, segment: PatternSegment): TrieNode {
  switch (segment.type) {
    case 'anyIndex':
      node.anyIndex ??= createTrieNode();
      return node.anyIndex;
    case 'anyKey':
      node.anyKey ??= createTrieNode();
      return node.anyKey;
    case 'key': {
      let next = node.keys.get(segment.key);
      if (!next) {
        next = createTrieNode();
        node.keys.set(segment.key, next);
      }
      return next;
    }
  }
}

/** Trie children that a pattern segment could share a concrete key with */
function overlappingChildren(node: TrieNode, segment: PatternSegment): TrieNode[] {
  const out: TrieNode[] = [];
  if (segment.type === 'anyIndex') {
    if (node.anyIndex) out.push(node.anyIndex);
    return out;
  }
  if (node.anyKey) out.push(node.anyKey);
  if (segment.type === 'anyKey') {
    out.push(...node.keys.values());
  } else {
    const exact = node.keys.get(segment.key);
    if (exact) out.push(exact);
  }
  return out;
}

function findOverlaps(root: TrieNode, segments: readonly PatternSegment[]): KeyMappingEntry[] {
  const found: KeyMappingEntry[] = [];
  let frontier: TrieNode[] = [root];
  for (const segment of segments) {
    frontier = frontier.flatMap((node) => overlappingChildren(node, segment));
    if (frontier.length === 0) return found;
  }
  for (const node of frontier) found.push(...node.entries);
  return found;
}

function sameEntry(a: KeyMappingEntry, b: KeyMappingEntry): boolean {
  return (
    a.featureId === b.featureId &&
    a.valueKind === b.valueKind &&
    formatPattern(a.pattern) === formatPattern(b.pattern)
  );
}

export function describeConflict(conflict: KeyMappingConflict): string {
  return `${formatPattern(conflict.first.pattern)} -> ${conflict.first.featureId} overlaps ${formatPattern(conflict.second.pattern)} -> ${conflict.second.featureId}`;
}

const UNSCOPED = '';

/**
 * Key path → feature lookup table. Patterns are held in one trie per kind
 * scope; no two accepted patterns can match the same concrete key.
 */
export class KeyMapper {
  private readonly tries = new Map<string, TrieNode>();
  private readonly byFeature = new Map<string, KeyMappingEntry>();
  private readonly accepted: KeyMappingEntry[] = [];

  private constructor(readonly conflicts: readonly KeyMappingConflict[]) {}

  /**
   * @throws {MappingError} AMBIGUOUS_KEY_PATH when `onConflict` is `throw`
   *   (the default) and two patterns can match the same key
   */
  static fromEntries(
    entries: Iterable<KeyMappingEntry>,
    options: KeyMapperOptions = {}
  ): KeyMapper {
    const onConflict = options.onConflict ?? 'throw';
    const staged = new Map<string, TrieNode>();
    const unique: KeyMappingEntry[] = [];
    const conflicts: KeyMappingConflict[] = [];

    for (const entry of entries) {
      const scope = entry.pattern.scope ?? UNSCOPED;
      const tries =
        scope === UNSCOPED
          ? [...staged.values()]
          : [staged.get(scope), staged.get(UNSCOPED)].filter(
              (t): t is TrieNode => t !== undefined
            );
      const overlaps = tries.flatMap((t) => findOverlaps(t, entry.pattern.segments));
      if (overlaps.some((o) => sameEntry(o, entry))) continue;
      for (const other of overlaps) conflicts.push({ first: other, second: entry });

      let root = staged.get(scope);
      if (!root) {
        root = createTrieNode();
        staged.set(scope, root);
      }
      const leaf = entry.pattern.segments.reduce(descend, root);
      leaf.entries.push(entry);
      unique.push(entry);
    }

    if (conflicts.length > 0 && onConflict === 'throw') {
      const described = conflicts.map(describeConflict);
      throw new MappingError({
        message: `Ambiguous key mapping: ${described.length} overlapping pattern pair(s), first: ${described[0] ?? ''}`,
        errorCode: ErrorCode.AMBIGUOUS_KEY_PATH,
        conflicts: described,
      });
    }

    const excluded = new Set<KeyMappingEntry>();
    for (const c of conflicts) {
      excluded.add(c.first);
      excluded.add(c.second);
    }
    const mapper = new KeyMapper(conflicts);
    for (const entry of unique) {
      if (!excluded.has(entry)) mapper.insert(entry);
    }
    return mapper;
  }

  private insert(entry: KeyMappingEntry): void {
    const scope = entry.pattern.scope ?? UNSCOPED;
    let root = this.tries.get(scope);
    if (!root) {
      root = createTrieNode();
      this.tries.set(scope, root);
    }
    entry.pattern.segments.reduce(descend, root).entries.push(entry);
    if (!this.byFeature.has(entry.featureId)) this.byFeature.set(entry.featureId, entry);
    this.accepted.push(entry);
  }

  get size(): number {
    return this.accepted.length;
  }

  entries(): readonly KeyMappingEntry[] {
    return this.accepted;
  }

  /**
   * Entry for a concrete path, trying the kind's own patterns before the
   * unscoped ones.
   */
  lookup(path: readonly PathSegment[], scope?: string): KeyMappingEntry | undefined {
    const scopes = scope === undefined ? [UNSCOPED] : [scope, UNSCOPED];
    for (const s of scopes) {
      const root = this.tries.get(s);
      if (!root) continue;
      const hit = lookupIn(root, path);
      if (hit) return hit;
    }
    return undefined;
  }

  /** Reverse lookup: the pattern mapped onto a feature */
  patternFor(featureId: string): KeyPattern | undefined {
    return this.byFeature.get(featureId)?.pattern;
  }
}

function lookupIn(root: TrieNode, path: readonly PathSegment[]): KeyMappingEntry | undefined {
  let frontier: TrieNode[] = [root];
  for (const segment of path) {
    const next: TrieNode[] = [];
    for (const node of frontier) {
      if (segment.type === 'index') {
        if (node.anyIndex) next.push(node.anyIndex);
        continue;
      }
      const exact = node.keys.get(segment.key);
      if (exact) next.push(exact);
      if (node.anyKey) next.push(node.anyKey);
    }
    if (next.length === 0) return undefined;
    frontier = next;
  }
  for (const node of frontier) {
    const [entry] = node.entries;
    if (entry) return entry;
  }
  return undefined;
}
