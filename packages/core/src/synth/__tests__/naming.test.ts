import { describe, expect, it } from 'vitest';
import { SiblingNames, toSegment, toValueType } from '../naming.js';

describe('toSegment', () => {
  it.each([
    ['containers', 'containers', false],
    ['x-kubernetes.io', 'x_kubernetes_io', false],
    ['8080', '_8080', false],
    ['', '_', false],
    ['features', '_features', true],
    ['String', '_String', true],
  ])('%j -> %j', (name, segment, escaped) => {
    expect(toSegment(name)).toEqual({ segment, escaped });
  });
});

describe('SiblingNames', () => {
  it('suffixes repeated segments', () => {
    const names = new SiblingNames();
    expect(names.claim('a')).toEqual({ segment: 'a', collided: false });
    expect(names.claim('a')).toEqual({ segment: 'a_2', collided: true });
    expect(names.claim('a_2')).toEqual({ segment: 'a_2_2', collided: true });
    expect(names.claim('a')).toEqual({ segment: 'a_3', collided: true });
  });
});

describe('toValueType', () => {
  it('maps schema scalar types', () => {
    expect(toValueType('string')).toBe('String');
    expect(toValueType('integer')).toBe('Integer');
    expect(toValueType('number')).toBe('Real');
    expect(toValueType('boolean')).toBe('Boolean');
  });
});
