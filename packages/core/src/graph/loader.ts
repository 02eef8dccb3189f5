import { readFile } from 'node:fs/promises';

import { JSONParserErrorGroup, bundle } from '@apidevtools/json-schema-ref-parser';
import Ajv, { type ErrorObject } from 'ajv';
import { parse as parseYaml } from 'yaml';

import { ErrorCode } from '../errors/codes.js';
import { FatalError, toError } from '../types/errors.js';
import { type Result, err, ok } from '../types/result.js';
import { isRawNode, refTarget } from './classify.js';
import { type SchemaDocument, extractDefinitions } from './document.js';

/**
 * Shape check for the definitions map. Deliberately shallow: it only pins
 * down the keywords the resolver reads, so vendor extensions pass through.
 */
const DEFINITION_MAP_SCHEMA = {
  type: 'object',
  additionalProperties: { $ref: '#/definitions/node' },
  definitions: {
    node: {
      type: 'object',
      properties: {
        type: {
          anyOf: [
            { type: 'string' },
            { type: 'array', items: { type: 'string' } },
          ],
        },
        properties: {
          type: 'object',
          additionalProperties: { type: 'object' },
        },
        required: { type: 'array', items: { type: 'string' } },
        items: { type: ['object', 'array'] },
        additionalProperties: { type: ['object', 'boolean'] },
        oneOf: { type: 'array', items: { type: 'object' } },
        anyOf: { type: 'array', items: { type: 'object' } },
        allOf: { type: 'array', items: { type: 'object' } },
        enum: { type: 'array' },
        $ref: { type: 'string' },
        description: { type: 'string' },
      },
    },
  },
};

function formatAjvErrors(errors: ErrorObject[] | null | undefined): string[] {
  return (errors ?? []).map(
    (e) => `${e.instancePath === '' ? '/' : e.instancePath} ${e.message ?? 'is invalid'}`
  );
}

/**
 * Validate an already-parsed schema document and extract its definitions.
 */
export function checkSchemaDocument(
  document: unknown,
  file?: string
): Result<SchemaDocument, FatalError> {
  const extracted = extractDefinitions(document);
  if (extracted.isErr()) return err(extracted.error);

  const ajv = new Ajv({ allErrors: true, strict: false });
  const validate = ajv.compile(DEFINITION_MAP_SCHEMA);
  if (!validate(extracted.value.definitions)) {
    const problems = formatAjvErrors(validate.errors);
    return err(
      new FatalError({
        message: `Schema document does not fit the supported subset: ${problems.slice(0, 5).join('; ')}`,
        errorCode: ErrorCode.INVALID_SCHEMA_DOCUMENT,
        context: { file, problems },
      })
    );
  }
  return ok(extracted.value);
}

const FILE_REF = /\.(?:json|ya?ml)(?:#.*)?$/i;
const PARKED_REF = 'x-varimodel-ref';

/** A reference into another file or URL, as opposed to a local pointer or bare name */
export function isExternalRef(ref: string): boolean {
  if (ref.startsWith('#')) return false;
  return refTarget(ref) === undefined || FILE_REF.test(ref);
}

/** Copy of `value` with every `$ref` for which `pick` holds moved from key `from` to `to` */
function moveRefs(
  value: unknown,
  from: string,
  to: string,
  pick: (ref: string) => boolean
): unknown {
  if (Array.isArray(value)) return value.map((v) => moveRefs(v, from, to, pick));
  if (!isRawNode(value)) return value;
  const out: Record<string, unknown> = {};
  for (const [key, child] of Object.entries(value)) {
    if (key === from && typeof child === 'string' && pick(child)) {
      out[to] = child;
    } else {
      out[key] = moveRefs(child, from, to, pick);
    }
  }
  return out;
}

function hasExternalRef(value: unknown): boolean {
  if (Array.isArray(value)) return value.some(hasExternalRef);
  if (!isRawNode(value)) return false;
  return Object.entries(value).some(([key, child]) =>
    key === '$ref' && typeof child === 'string' ? isExternalRef(child) : hasExternalRef(child)
  );
}

/**
 * Inline references to other files. Local pointers and bare names are parked
 * under another key while the bundler runs, so a missing local target stays
 * an unresolved reference for the graph instead of failing the load. An
 * external target that cannot be read is left as its `$ref`.
 */
async function inlineExternalRefs(path: string, document: unknown): Promise<unknown> {
  const parked = moveRefs(document, '$ref', PARKED_REF, (ref) => !isExternalRef(ref));
  let bundled: unknown;
  try {
    bundled = await bundle(path, parked, { continueOnError: true });
  } catch (error) {
    if (!(error instanceof JSONParserErrorGroup)) throw error;
    bundled = error.files.schema ?? parked;
  }
  return moveRefs(bundled, PARKED_REF, '$ref', () => true);
}

/**
 * Load a schema document from disk (JSON or YAML). References to other files
 * are inlined; everything else is left for the graph resolver.
 */
export async function loadSchemaDocument(
  path: string
): Promise<Result<SchemaDocument, FatalError>> {
  let document: unknown;
  try {
    document = parseYaml(await readFile(path, 'utf8'));
    if (hasExternalRef(document)) {
      document = await inlineExternalRefs(path, document);
    }
  } catch (error) {
    return err(
      new FatalError({
        message: `Failed to load schema document ${path}: ${toError(error).message}`,
        errorCode: ErrorCode.SCHEMA_LOAD_FAILED,
        context: { file: path },
        cause: toError(error),
      })
    );
  }
  return checkSchemaDocument(document, path);
}
