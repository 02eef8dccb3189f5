/**
 * Schema graph: an arena of Definitions keyed by qualified name.
 *
 * Resolution is a breadth-first pass over an explicit work queue. A name is
 * marked as seen when it is queued (its placeholder), so a definition that
 * references itself, directly or through others, is expanded exactly once.
 * Only names reachable from the roots are ever materialized.
 */

import { DIAGNOSTIC_CODES, DIAGNOSTIC_PHASES } from '../diag/codes.js';
import { type DiagnosticEnvelope, makeDiagnostic } from '../diag/envelope.js';
import { type RawNode, classifyNode, isRawNode } from './classify.js';
import type { Definition } from './definition.js';

export class SchemaGraph {
  private readonly arena = new Map<string, Definition>();
  private readonly unresolved = new Set<string>();

  constructor(public readonly roots: readonly string[]) {}

  get(name: string): Definition | undefined {
    return this.arena.get(name);
  }

  has(name: string): boolean {
    return this.arena.has(name);
  }

  /** True when `name` was referenced but no definition exists for it */
  isUnresolved(name: string): boolean {
    return this.unresolved.has(name);
  }

  get size(): number {
    return this.arena.size;
  }

  names(): string[] {
    return [...this.arena.keys()];
  }

  /** @internal used by the resolver */
  add(definition: Definition): void {
    this.arena.set(definition.name, definition);
  }

  /** @internal used by the resolver */
  markUnresolved(name: string): void {
    this.unresolved.add(name);
  }
}

export interface ResolveResult {
  graph: SchemaGraph;
  diagnostics: DiagnosticEnvelope[];
}

interface WorkItem {
  name: string;
  node: RawNode;
}

export function resolveGraph(
  definitions: Readonly<Record<string, unknown>>,
  roots: readonly string[]
): ResolveResult {
  const graph = new SchemaGraph(roots);
  const diagnostics: DiagnosticEnvelope[] = [];
  const queue: WorkItem[] = [];
  const seen = new Set<string>();
  const reported = new Set<string>();

  const lookup = (name: string): RawNode | undefined => {
    if (!Object.prototype.hasOwnProperty.call(definitions, name)) {
      return undefined;
    }
    const node = definitions[name];
    return isRawNode(node) ? node : undefined;
  };

  const unresolved = (from: string, ref: string): void => {
    graph.markUnresolved(ref);
    const key = `${from}\u0000${ref}`;
    if (reported.has(key)) return;
    reported.add(key);
    diagnostics.push(
      makeDiagnostic(
        DIAGNOSTIC_CODES.UNRESOLVED_REFERENCE,
        DIAGNOSTIC_PHASES.RESOLVE,
        from,
        { ref }
      )
    );
  };

  const enqueueRef = (from: string, target: string): void => {
    if (seen.has(target)) return;
    const node = lookup(target);
    if (node === undefined) {
      unresolved(from, target);
      return;
    }
    seen.add(target);
    queue.push({ name: target, node });
  };

  for (const root of roots) {
    enqueueRef('#', root);
  }

  // Index-based dequeue keeps this linear on large documents
  for (let head = 0; head < queue.length; head += 1) {
    const item = queue[head];
    if (item === undefined) break;
    const result = classifyNode(item.name, item.node);
    graph.add(result.definition);

    if (result.unsupported.length > 0) {
      diagnostics.push(
        makeDiagnostic(
          DIAGNOSTIC_CODES.UNSUPPORTED_CONSTRUCT,
          DIAGNOSTIC_PHASES.RESOLVE,
          item.name,
          { keywords: result.unsupported }
        )
      );
    }
    for (const ref of result.foreignRefs) {
      unresolved(item.name, ref);
    }
    for (const inline of result.inline) {
      if (seen.has(inline.name)) continue;
      seen.add(inline.name);
      queue.push(inline);
    }
    for (const ref of result.refs) {
      enqueueRef(item.name, ref);
    }
  }

  return { graph, diagnostics };
}
