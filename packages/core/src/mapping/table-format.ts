/**
 * Curated key mapping tables: `key-path<TAB>feature-id<TAB>value-kind` per
 * line, `#` comments. Comma-separated files are accepted too, with
 * double-quoted fields where a key path contains a comma.
 */

import { readFile } from 'node:fs/promises';

import { ErrorCode } from '../errors/codes.js';
import { MappingError, toError } from '../types/errors.js';
import { type Result, err, ok } from '../types/result.js';
import { type KeyMappingEntry, isValueKind } from './key-mapper.js';
import { KeyPathSyntaxError, formatPattern, parsePattern } from './key-path.js';

export const MAPPING_TABLE_HEADER = '# key-path\tfeature-id\tvalue-kind';

function splitCsv(line: string): string[] {
  const fields: string[] = [];
  let current = '';
  let quoted = false;
  for (let i = 0; i < line.length; i += 1) {
    const ch = line.charAt(i);
    if (quoted) {
      if (ch === '"' && line.charAt(i + 1) === '"') {
        current += '"';
        i += 1;
      } else if (ch === '"') {
        quoted = false;
      } else {
        current += ch;
      }
    } else if (ch === '"') {
      quoted = true;
    } else if (ch === ',') {
      fields.push(current);
      current = '';
    } else {
      current += ch;
    }
  }
  fields.push(current);
  return fields.map((f) => f.trim());
}

function splitRow(line: string): string[] {
  return line.includes('\t') ? line.split('\t').map((f) => f.trim()) : splitCsv(line);
}

function isHeaderRow(fields: readonly string[]): boolean {
  return fields[1] === 'feature-id' && fields[2] === 'value-kind';
}

function tableError(message: string, line: number, source?: string, cause?: Error): MappingError {
  return new MappingError({
    message: `${source ?? 'mapping table'}:${line}: ${message}`,
    errorCode: ErrorCode.MAPPING_TABLE_INVALID,
    context: { line, ...(source !== undefined ? { file: source } : {}) },
    cause,
  });
}

/**
 * Parse table text into entries. Duplicate and overlapping patterns are
 * left for `KeyMapper.fromEntries` to judge.
 */
export function parseMappingTable(
  text: string,
  source?: string
): Result<KeyMappingEntry[], MappingError> {
  const entries: KeyMappingEntry[] = [];
  const lines = text.split(/\r?\n/);
  for (const [i, raw] of lines.entries()) {
    const line = raw.trim();
    if (line === '' || line.startsWith('#')) continue;
    const fields = splitRow(line);
    if (entries.length === 0 && isHeaderRow(fields)) continue;
    const [path, featureId, valueKind, ...extra] = fields;
    if (path === undefined || featureId === undefined || valueKind === undefined || extra.length > 0) {
      return err(tableError(`expected 3 columns, got ${fields.length}`, i + 1, source));
    }
    if (featureId === '') return err(tableError('empty feature id', i + 1, source));
    if (!isValueKind(valueKind)) {
      return err(tableError(`unknown value kind '${valueKind}'`, i + 1, source));
    }
    try {
      entries.push({ pattern: parsePattern(path), featureId, valueKind });
    } catch (error) {
      if (error instanceof KeyPathSyntaxError) {
        return err(tableError(error.message, i + 1, source, error));
      }
      throw error;
    }
  }
  return ok(entries);
}

export function formatMappingTable(entries: readonly KeyMappingEntry[]): string {
  const rows = entries.map(
    (e) => `${formatPattern(e.pattern)}\t${e.featureId}\t${e.valueKind}`
  );
  return `${[MAPPING_TABLE_HEADER, ...rows].join('\n')}\n`;
}

export async function loadMappingTable(
  path: string
): Promise<Result<KeyMappingEntry[], MappingError>> {
  let text: string;
  try {
    text = await readFile(path, 'utf8');
  } catch (error) {
    return err(
      new MappingError({
        message: `Failed to read mapping table ${path}: ${toError(error).message}`,
        errorCode: ErrorCode.MAPPING_TABLE_INVALID,
        context: { file: path },
        cause: toError(error),
      })
    );
  }
  return parseMappingTable(text, path);
}
