import fc from 'fast-check';
import { describe, expect, it } from 'vitest';
import { indexFeatures, walkFeatures } from '../../model/feature-model.js';
import { buildModel } from '../../pipeline/orchestrator.js';
import { parseModel } from '../../serialize/uvl-parser.js';
import { serializeModel } from '../../serialize/uvl-writer.js';

const numRuns = Number(process.env.FC_NUM_RUNS ?? 100);
const NAMES = ['D0', 'D1', 'D2', 'D3', 'D4'] as const;

const ref = (name: string): { $ref: string } => ({ $ref: `#/definitions/${name}` });

const propertyArb = fc.oneof(
  fc.constantFrom(...NAMES).map((name): Record<string, unknown> => ref(name)),
  fc.constantFrom(...NAMES).map((name): Record<string, unknown> => ({ type: 'array', items: ref(name) })),
  fc.constant<Record<string, unknown>>({ type: 'string' })
);

const definitionArb = fc
  .dictionary(fc.constantFrom('a', 'b', 'c'), propertyArb, { minKeys: 1, maxKeys: 3 })
  .map((properties) => ({ properties, required: Object.keys(properties).slice(0, 1) }));

/** Five definitions referencing each other at random, cycles included */
const graphArb = fc
  .tuple(definitionArb, definitionArb, definitionArb, definitionArb, definitionArb)
  .map((defs) => Object.fromEntries(NAMES.map((name, i) => [name, defs[i]])));

describe('synthesis over cyclic schema graphs', () => {
  it('terminates with a finite tree of unique ids that round-trips', () => {
    fc.assert(
      fc.property(graphArb, (definitions) => {
        const result = buildModel({ definitions }, { build: { roots: ['D0'] } });
        if (result.isErr()) return false;
        const { model, text } = result.value;

        let count = 0;
        let stubsAreLeaves = true;
        walkFeatures(model.root, (node) => {
          count += 1;
          if (node.attributes.recursive !== undefined && node.children.length > 0) {
            stubsAreLeaves = false;
          }
        });
        return (
          stubsAreLeaves &&
          indexFeatures(model.root).nodes.size === count &&
          serializeModel(parseModel(text)) === text
        );
      }),
      { numRuns }
    );
  });

  it('cuts a self reference into a recursive stub', () => {
    const result = buildModel(
      { definitions: { D0: { properties: { next: ref('D0') } } } },
      { build: { roots: ['D0'] } }
    );
    if (result.isErr()) throw result.error;
    const next = indexFeatures(result.value.model.root).nodes.get('D0.next');
    expect(next?.attributes.recursive).toBe('D0');
    expect(next?.children).toEqual([]);
  });
});
