import type { ScalarType } from '../graph/definition.js';
import type { ValueType } from '../model/feature-model.js';

export const RESERVED_WORDS: ReadonlySet<string> = new Set([
  'namespace',
  'features',
  'constraints',
  'mandatory',
  'optional',
  'alternative',
  'or',
  'and',
  'imports',
  'include',
  'true',
  'false',
  'cardinality',
  'abstract',
  'String',
  'Integer',
  'Boolean',
  'Real',
]);

export const ESCAPE_PREFIX = '_';

export interface SegmentName {
  segment: string;
  escaped: boolean;
}

/**
 * Turn a schema key into an id segment: non-identifier characters become
 * `_`, a leading digit gets a `_` prefix, reserved words get the escape prefix.
 */
export function toSegment(name: string): SegmentName {
  let segment = name.replace(/[^A-Za-z0-9_]/g, '_');
  if (segment === '') segment = '_';
  if (/^[0-9]/.test(segment)) segment = `_${segment}`;
  if (RESERVED_WORDS.has(segment)) {
    return { segment: `${ESCAPE_PREFIX}${segment}`, escaped: true };
  }
  return { segment, escaped: false };
}

export function toValueType(type: ScalarType): ValueType {
  switch (type) {
    case 'string':
      return 'String';
    case 'integer':
      return 'Integer';
    case 'number':
      return 'Real';
    case 'boolean':
      return 'Boolean';
  }
}

/**
 * Hands out sibling segments, suffixing `_2`, `_3`, ... on collision.
 */
export class SiblingNames {
  private readonly taken = new Set<string>();

  claim(segment: string): { segment: string; collided: boolean } {
    if (!this.taken.has(segment)) {
      this.taken.add(segment);
      return { segment, collided: false };
    }
    let n = 2;
    while (this.taken.has(`${segment}_${n}`)) n += 1;
    const unique = `${segment}_${n}`;
    this.taken.add(unique);
    return { segment: unique, collided: true };
  }
}
