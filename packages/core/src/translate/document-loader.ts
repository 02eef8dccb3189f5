/**
 * Configuration document intake: one file may hold several YAML documents,
 * and each is classified before translation.
 */

import { readFile } from 'node:fs/promises';
import { extname } from 'node:path';

import { parseAllDocuments } from 'yaml';

import { ErrorCode } from '../errors/codes.js';
import { FatalError, toError } from '../types/errors.js';
import { type Result, err, ok } from '../types/result.js';

export type DocumentStatus =
  | 'ok'
  | 'templated'
  | 'no-kind'
  | 'custom-resource'
  | 'parse-error';

export interface LoadedDocument {
  /** `<source>#<index>` */
  id: string;
  source: string;
  index: number;
  status: DocumentStatus;
  content?: unknown;
  apiVersion?: string;
  kind?: string;
  error?: string;
}

export interface LoadDocumentsOptions {
  /** Kinds outside the model are classified as custom resources */
  knownKinds?: (apiVersion: string, kind: string) => boolean;
}

const TEMPLATE_MARKERS = /\{\{|\}\}|^\s*#@/m;
const CUSTOM_RESOURCE_DEFINITION = 'CustomResourceDefinition';

export function isTemplated(text: string): boolean {
  return TEMPLATE_MARKERS.test(text);
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function typeField(content: Record<string, unknown>, key: string): string | undefined {
  const value = content[key];
  return typeof value === 'string' && value !== '' && value !== 'N/A' ? value : undefined;
}

function classify(
  content: unknown,
  base: Omit<LoadedDocument, 'status'>,
  options: LoadDocumentsOptions
): LoadedDocument {
  if (!isRecord(content)) return { ...base, status: 'no-kind', content };
  const apiVersion = typeField(content, 'apiVersion');
  const kind = typeField(content, 'kind');
  if (apiVersion === undefined || kind === undefined) {
    return { ...base, status: 'no-kind', content };
  }
  const custom =
    kind === CUSTOM_RESOURCE_DEFINITION ||
    (options.knownKinds !== undefined && !options.knownKinds(apiVersion, kind));
  return {
    ...base,
    status: custom ? 'custom-resource' : 'ok',
    content,
    apiVersion,
    kind,
  };
}

/**
 * Split and classify the documents in one file's text. Templated text is
 * rejected as a whole: its documents are not meaningful before rendering.
 */
export function loadDocuments(
  text: string,
  source: string,
  options: LoadDocumentsOptions = {}
): LoadedDocument[] {
  if (isTemplated(text)) {
    return [{ id: `${source}#0`, source, index: 0, status: 'templated' }];
  }

  if (extname(source).toLowerCase() === '.json') {
    const base = { id: `${source}#0`, source, index: 0 };
    try {
      const content: unknown = JSON.parse(text);
      return [classify(content, base, options)];
    } catch (error) {
      return [{ ...base, status: 'parse-error', error: toError(error).message }];
    }
  }

  const out: LoadedDocument[] = [];
  let index = 0;
  for (const doc of parseAllDocuments(text)) {
    const base = { id: `${source}#${index}`, source, index };
    index += 1;
    const [firstError] = doc.errors;
    if (firstError) {
      out.push({ ...base, status: 'parse-error', error: firstError.message });
      continue;
    }
    const content: unknown = doc.toJS();
    if (content === null || content === undefined) {
      index -= 1;
      continue;
    }
    out.push(classify(content, base, options));
  }
  return out;
}

export async function readDocumentFile(
  path: string,
  options: LoadDocumentsOptions = {}
): Promise<Result<LoadedDocument[], FatalError>> {
  let text: string;
  try {
    text = await readFile(path, 'utf8');
  } catch (error) {
    return err(
      new FatalError({
        message: `Failed to read ${path}: ${toError(error).message}`,
        errorCode: ErrorCode.DOCUMENT_UNREADABLE,
        context: { file: path },
        cause: toError(error),
      })
    );
  }
  return ok(loadDocuments(text, path, options));
}
