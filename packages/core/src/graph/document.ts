import { ErrorCode } from '../errors/codes.js';
import { FatalError } from '../types/errors.js';
import { type Result, err, ok } from '../types/result.js';
import { type RawNode, isRawNode, refTarget } from './classify.js';

export type DefinitionMap = Record<string, RawNode>;

export type EnvelopeKind =
  | 'definitions'
  | '$defs'
  | 'components.schemas'
  | 'flat';

export interface SchemaDocument {
  envelope: EnvelopeKind;
  definitions: DefinitionMap;
}

const SCHEMA_NODE_KEYS = ['type', 'properties', '$ref', 'allOf', 'oneOf'];

/** Prototype-free so a definition named `__proto__` stays a definition */
function onlyNodes(value: RawNode): DefinitionMap {
  const out: DefinitionMap = Object.create(null);
  for (const [name, node] of Object.entries(value)) {
    if (isRawNode(node)) out[name] = node;
  }
  return out;
}

/**
 * Find the definition map inside a schema document. Accepts Swagger
 * `definitions`, JSON Schema `$defs`, OpenAPI `components.schemas`, or a
 * bare name → node map.
 */
export function extractDefinitions(
  document: unknown
): Result<SchemaDocument, FatalError> {
  if (!isRawNode(document)) {
    return err(
      new FatalError({
        message: 'Schema document must be a JSON object',
        errorCode: ErrorCode.INVALID_SCHEMA_DOCUMENT,
      })
    );
  }
  if (isRawNode(document.definitions)) {
    return ok({
      envelope: 'definitions',
      definitions: onlyNodes(document.definitions),
    });
  }
  if (isRawNode(document.$defs)) {
    return ok({ envelope: '$defs', definitions: onlyNodes(document.$defs) });
  }
  const components = document.components;
  if (isRawNode(components) && isRawNode(components.schemas)) {
    return ok({
      envelope: 'components.schemas',
      definitions: onlyNodes(components.schemas),
    });
  }

  const looksLikeSingleSchema = SCHEMA_NODE_KEYS.some(
    (k) => document[k] !== undefined
  );
  const entries = Object.values(document);
  if (!looksLikeSingleSchema && entries.length > 0 && entries.every(isRawNode)) {
    return ok({ envelope: 'flat', definitions: onlyNodes(document) });
  }
  return err(
    new FatalError({
      message:
        'No definitions found: expected definitions, $defs, components.schemas or a name → schema map',
      errorCode: ErrorCode.INVALID_SCHEMA_DOCUMENT,
    })
  );
}

function hasGvk(node: RawNode): boolean {
  const gvk = node['x-kubernetes-group-version-kind'];
  return Array.isArray(gvk) && gvk.length > 0;
}

function declaresKindAndApiVersion(node: RawNode): boolean {
  const props = node.properties;
  return isRawNode(props) && isRawNode(props.kind) && isRawNode(props.apiVersion);
}

function collectRefTargets(root: unknown, into: Set<string>): void {
  const stack: unknown[] = [root];
  while (stack.length > 0) {
    const current = stack.pop();
    if (Array.isArray(current)) {
      stack.push(...current);
      continue;
    }
    if (!isRawNode(current)) continue;
    for (const [key, value] of Object.entries(current)) {
      if (key === '$ref' && typeof value === 'string') {
        const target = refTarget(value);
        if (target !== undefined) into.add(target);
      } else if (typeof value === 'object' && value !== null) {
        stack.push(value);
      }
    }
  }
}

/**
 * Pick the definitions that become kinds, in declaration order: those with a
 * group-version-kind annotation, else those declaring both `kind` and
 * `apiVersion`, else every definition nothing else references.
 */
export function detectRoots(definitions: DefinitionMap): string[] {
  const names = Object.keys(definitions);
  const annotated = names.filter((n) => {
    const node = definitions[n];
    return node !== undefined && hasGvk(node);
  });
  if (annotated.length > 0) return annotated;

  const typed = names.filter((n) => {
    const node = definitions[n];
    return node !== undefined && declaresKindAndApiVersion(node);
  });
  if (typed.length > 0) return typed;

  const referenced = new Set<string>();
  for (const [name, node] of Object.entries(definitions)) {
    const targets = new Set<string>();
    collectRefTargets(node, targets);
    targets.delete(name);
    for (const t of targets) referenced.add(t);
  }
  return names.filter((n) => !referenced.has(n));
}
