/**
 * Configuration key paths.
 *
 * Concrete paths address one value in a document (`spec.containers[0].name`);
 * patterns may use `*` for any map key and `[*]` for any array index, and may
 * carry a kind scope (`Pod:spec.containers[*].name`). Keys that would not
 * read back unambiguously are written in brackets as JSON strings:
 * `metadata.annotations["app.kubernetes.io/name"]`.
 */

export type PathSegment = { type: 'key'; key: string } | { type: 'index'; index: number };

export type PatternSegment =
  | { type: 'key'; key: string }
  | { type: 'anyKey' }
  | { type: 'anyIndex' };

export interface KeyPattern {
  /** Kind feature id the pattern applies to; undefined applies to every kind */
  scope?: string;
  segments: PatternSegment[];
}

const BARE_KEY = /^[^.[\]"*:\s]+$/;
const SCOPE_PREFIX = /^([A-Za-z_][A-Za-z0-9_]*):/;

function formatKey(key: string, first: boolean): string {
  if (BARE_KEY.test(key)) return first ? key : `.${key}`;
  return `[${JSON.stringify(key)}]`;
}

export function formatPath(segments: readonly PathSegment[]): string {
  return segments
    .map((s, i) => (s.type === 'index' ? `[${s.index}]` : formatKey(s.key, i === 0)))
    .join('');
}

export function formatPattern(pattern: KeyPattern): string {
  const body = pattern.segments
    .map((s, i) => {
      switch (s.type) {
        case 'anyIndex':
          return '[*]';
        case 'anyKey':
          return i === 0 ? '*' : '.*';
        case 'key':
          return formatKey(s.key, i === 0);
      }
    })
    .join('');
  return pattern.scope === undefined ? body : `${pattern.scope}:${body}`;
}

export class KeyPathSyntaxError extends Error {
  constructor(
    readonly text: string,
    readonly column: number,
    reason: string
  ) {
    super(`Invalid key path '${text}' at column ${column}: ${reason}`);
    this.name = 'KeyPathSyntaxError';
  }
}

/**
 * Parse a pattern. Concrete `[n]` indices are rejected: a pattern addresses
 * array elements only through `[*]`.
 */
export function parsePattern(text: string): KeyPattern {
  let rest = text;
  let offset = 0;
  let scope: string | undefined;
  const scoped = SCOPE_PREFIX.exec(text);
  if (scoped && scoped[1] !== undefined) {
    scope = scoped[1];
    rest = text.slice(scoped[0].length);
    offset = scoped[0].length;
  }

  const segments: PatternSegment[] = [];
  let pos = 0;
  const fail = (reason: string): never => {
    throw new KeyPathSyntaxError(text, offset + pos + 1, reason);
  };

  if (rest === '') fail('empty path');
  while (pos < rest.length) {
    const ch = rest.charAt(pos);
    if (ch === '[') {
      if (rest.startsWith('[*]', pos)) {
        segments.push({ type: 'anyIndex' });
        pos += 3;
        continue;
      }
      if (rest.charAt(pos + 1) !== '"') fail("expected '[*]' or a quoted key");
      const end = findClosingQuote(rest, pos + 2);
      if (end === -1 || rest.charAt(end + 1) !== ']') fail('unterminated quoted key');
      const raw = rest.slice(pos + 1, end + 1);
      let key: unknown;
      try {
        key = JSON.parse(raw);
      } catch (error) {
        if (!(error instanceof SyntaxError)) throw error;
        fail('invalid quoted key');
      }
      if (typeof key !== 'string') fail('quoted key is not a string');
      segments.push({ type: 'key', key: String(key) });
      pos = end + 2;
      continue;
    }
    if (segments.length > 0) {
      if (ch !== '.') fail("expected '.' or '['");
      pos += 1;
    }
    if (rest.charAt(pos) === '*') {
      segments.push({ type: 'anyKey' });
      pos += 1;
      continue;
    }
    const match = /^[^.[\]"*:\s]+/.exec(rest.slice(pos));
    if (!match) fail('expected a key');
    const key = match ? match[0] : '';
    segments.push({ type: 'key', key });
    pos += key.length;
  }
  return scope === undefined ? { segments } : { scope, segments };
}

function findClosingQuote(text: string, from: number): number {
  for (let i = from; i < text.length; i += 1) {
    const ch = text.charAt(i);
    if (ch === '\\') {
      i += 1;
      continue;
    }
    if (ch === '"') return i;
  }
  return -1;
}

export function segmentMatches(pattern: PatternSegment, segment: PathSegment): boolean {
  switch (pattern.type) {
    case 'anyIndex':
      return segment.type === 'index';
    case 'anyKey':
      return segment.type === 'key';
    case 'key':
      return segment.type === 'key' && segment.key === pattern.key;
  }
}

export function matches(pattern: KeyPattern, path: readonly PathSegment[]): boolean {
  if (pattern.segments.length !== path.length) return false;
  return pattern.segments.every((p, i) => {
    const segment = path[i];
    return segment !== undefined && segmentMatches(p, segment);
  });
}
