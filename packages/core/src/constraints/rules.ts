/**
 * Constraint derivation rules.
 *
 * Every rule sees one (definition, feature node) binding and returns the
 * constraints it can justify from structure or from the prose of
 * descriptions. Rules are independent; the deriver runs all of them.
 */

import type { FeatureNode } from '../model/feature-model.js';
import type { Binding } from '../synth/synthesizer.js';
import {
  type Constraint,
  type DerivationTrace,
  type Expr,
  and,
  conjunction,
  disjunction,
  excludes,
  expression,
  implies,
  not,
  requires,
  v,
} from './expression.js';

export interface RuleNote {
  featureId: string;
  rule: string;
  missing: string[];
}

export interface RuleContext {
  note(note: RuleNote): void;
}

export interface DerivationRule {
  name: string;
  derive(binding: Binding, ctx: RuleContext): Constraint[];
}

/** Members of an and-group, keyed by the document key they consume */
function membersByKey(scope: FeatureNode): Map<string, FeatureNode> {
  const out = new Map<string, FeatureNode>();
  for (const child of scope.children) {
    const key = child.attributes.key;
    if (key !== undefined && child.attributes.branch !== true) {
      out.set(key, child);
    }
  }
  return out;
}

function sentences(text: string): string[] {
  return text
    .split(/(?<=[.;])\s+/)
    .map((s) => s.trim())
    .filter((s) => s !== '');
}

const BACKTICKED = /`([^`]+)`/g;
const WORD = /[A-Za-z_][A-Za-z0-9_]*/g;

/**
 * Names mentioned in `fragment`: backticked tokens when there are any,
 * otherwise bare words that name a member of the scope.
 */
export function mentionedNames(
  fragment: string,
  known: ReadonlySet<string>
): string[] {
  const quoted = [...fragment.matchAll(BACKTICKED)].flatMap((m) => {
    const token = m[1];
    if (token === undefined) return [];
    const head = token.split('.')[0] ?? token;
    return [head.trim()];
  });
  const candidates =
    quoted.length > 0
      ? quoted
      : [...fragment.matchAll(WORD)]
          .map((m) => m[0])
          .filter((w) => known.has(w));
  return [...new Set(candidates)];
}

function pairs<T>(items: T[]): Array<[T, T]> {
  const out: Array<[T, T]> = [];
  for (let i = 0; i < items.length; i += 1) {
    for (let j = i + 1; j < items.length; j += 1) {
      const a = items[i];
      const b = items[j];
      if (a !== undefined && b !== undefined) out.push([a, b]);
    }
  }
  return out;
}

interface Mention {
  /** Feature the prose belongs to (a member) or the scope itself */
  owner: FeatureNode;
  sentence: string;
  /** Text following the trigger phrase */
  tail: string;
}

/**
 * Sentences of the definition's own description and of each member's
 * description that match `trigger`.
 */
function findMentions(binding: Binding, trigger: RegExp): Mention[] {
  const out: Mention[] = [];
  const scan = (owner: FeatureNode, text: string | undefined): void => {
    if (text === undefined) return;
    for (const sentence of sentences(text)) {
      const match = trigger.exec(sentence);
      if (!match) continue;
      out.push({
        owner,
        sentence,
        tail: sentence.slice(match.index + match[0].length),
      });
    }
  };
  scan(binding.node, binding.definition.description);
  for (const child of binding.node.children) {
    scan(child, child.attributes.doc);
  }
  return out;
}

/**
 * Resolve mentioned names to sibling features. When any name is missing it
 * is noted and nothing resolves, so the sentence derives nothing.
 */
function resolveMentioned(
  ctx: RuleContext,
  rule: string,
  scope: FeatureNode,
  names: string[]
): FeatureNode[] | undefined {
  const members = membersByKey(scope);
  const found: FeatureNode[] = [];
  const missing: string[] = [];
  for (const name of names) {
    const member = members.get(name);
    if (member) found.push(member);
    else missing.push(name);
  }
  if (missing.length > 0) {
    ctx.note({ featureId: scope.id, rule, missing });
    return undefined;
  }
  return found;
}

function trace(rule: string, binding: Binding, detail?: string): DerivationTrace {
  return detail === undefined
    ? { rule, definition: binding.definition.name }
    : { rule, definition: binding.definition.name, detail };
}

function pairwiseExcludes(
  members: FeatureNode[],
  t: DerivationTrace
): Constraint[] {
  return pairs(members).map(([a, b]) => excludes(a.id, b.id, t));
}

const unionExclusion: DerivationRule = {
  name: 'union-exclusion',
  derive(binding) {
    const groups = [binding.node, ...binding.node.children].filter(
      (n) =>
        n.group === 'alternative' &&
        (n === binding.node || n.attributes.abstract === true)
    );
    return groups.flatMap((group) =>
      pairwiseExcludes(group.children, trace('union-exclusion', binding))
    );
  },
};

/**
 * Members named in a group-style sentence. Prose on the definition refers to
 * its own members; prose on a member refers to its siblings.
 */
function groupMembers(
  ctx: RuleContext,
  rule: string,
  binding: Binding,
  mention: Mention
): FeatureNode[] {
  const known = new Set(membersByKey(binding.node).keys());
  return (
    resolveMentioned(ctx, rule, binding.node, mentionedNames(mention.tail, known)) ?? []
  );
}

const EXACTLY_ONE =
  /\b(?:exactly one of|one and only one of|only one of the following)\b/i;

const exactlyOneOf: DerivationRule = {
  name: 'exactly-one-of',
  derive(binding, ctx) {
    return findMentions(binding, EXACTLY_ONE).flatMap((mention) => {
      const members = groupMembers(ctx, 'exactly-one-of', binding, mention);
      if (members.length < 2) return [];
      const ids = members.map((m) => v(m.id));
      const exclusive = pairs(ids).map(([a, b]) => not(and(a, b)));
      const t = trace('exactly-one-of', binding, mention.sentence);
      return [
        expression(
          implies(v(binding.node.id), and(disjunction(ids), conjunction(exclusive))),
          t
        ),
        ...pairwiseExcludes(members, t),
      ];
    });
  },
};

const AT_LEAST_ONE = /\b(?:at least one of)\b/i;

const atLeastOneOf: DerivationRule = {
  name: 'at-least-one-of',
  derive(binding, ctx) {
    return findMentions(binding, AT_LEAST_ONE).flatMap((mention) => {
      const members = groupMembers(ctx, 'at-least-one-of', binding, mention);
      if (members.length < 2) return [];
      return [
        expression(
          implies(v(binding.node.id), disjunction(members.map((m) => v(m.id)))),
          trace('at-least-one-of', binding, mention.sentence)
        ),
      ];
    });
  },
};

const MUTUALLY_EXCLUSIVE_WITH = /\bmutually exclusive with\b/i;
const ARE_MUTUALLY_EXCLUSIVE = /\bare mutually exclusive\b/i;

const mutuallyExclusive: DerivationRule = {
  name: 'mutually-exclusive',
  derive(binding, ctx) {
    const out: Constraint[] = [];
    const known = new Set(membersByKey(binding.node).keys());

    for (const mention of findMentions(binding, MUTUALLY_EXCLUSIVE_WITH)) {
      if (mention.owner === binding.node) continue;
      const others = (
        resolveMentioned(
          ctx,
          'mutually-exclusive',
          binding.node,
          mentionedNames(mention.tail, known)
        ) ?? []
      ).filter((m) => m !== mention.owner);
      const t = trace('mutually-exclusive', binding, mention.sentence);
      for (const other of others) {
        out.push(excludes(mention.owner.id, other.id, t));
      }
    }

    for (const mention of findMentions(binding, ARE_MUTUALLY_EXCLUSIVE)) {
      const head = mention.sentence.slice(
        0,
        mention.sentence.length - mention.tail.length
      );
      const members =
        resolveMentioned(
          ctx,
          'mutually-exclusive',
          binding.node,
          mentionedNames(head, known)
        ) ?? [];
      out.push(
        ...pairwiseExcludes(
          members,
          trace('mutually-exclusive', binding, mention.sentence)
        )
      );
    }
    return out;
  },
};

const SINGLE_MEMBER = /\bonly one of its members may be specified\b/i;

const singleMember: DerivationRule = {
  name: 'single-member',
  derive(binding) {
    const text = binding.definition.description;
    if (text === undefined || !SINGLE_MEMBER.test(text)) return [];
    const optional = binding.node.children.filter(
      (c) => c.cardinality === 'optional' && c.attributes.branch !== true
    );
    return pairwiseExcludes(optional, trace('single-member', binding));
  },
};

const CONDITIONAL_REQUIRED =
  /\b(?:required (?:when|if)|must be (?:set|specified|provided) (?:when|if))\b/i;

const conditionalRequired: DerivationRule = {
  name: 'conditional-required',
  derive(binding, ctx) {
    const known = new Set(membersByKey(binding.node).keys());
    return findMentions(binding, CONDITIONAL_REQUIRED).flatMap((mention) => {
      if (mention.owner === binding.node) return [];
      const [first] = mentionedNames(mention.tail, known);
      if (first === undefined) return [];
      const [condition] =
        resolveMentioned(ctx, 'conditional-required', binding.node, [first]) ?? [];
      if (condition === undefined || condition === mention.owner) return [];
      return [
        requires(
          condition.id,
          mention.owner.id,
          trace('conditional-required', binding, mention.sentence)
        ),
      ];
    });
  },
};

const CANNOT_BE_SET =
  /\b(?:cannot be (?:set|specified|used) (?:when|if|with)|(?:may|must) not be (?:set|specified) (?:when|if|with)|must be empty (?:when|if))\b/i;

const cannotBeSetWhen: DerivationRule = {
  name: 'cannot-be-set-when',
  derive(binding, ctx) {
    const known = new Set(membersByKey(binding.node).keys());
    return findMentions(binding, CANNOT_BE_SET).flatMap((mention) => {
      if (mention.owner === binding.node) return [];
      const [first] = mentionedNames(mention.tail, known);
      if (first === undefined) return [];
      const [other] =
        resolveMentioned(ctx, 'cannot-be-set-when', binding.node, [first]) ?? [];
      if (other === undefined || other === mention.owner) return [];
      return [
        excludes(
          mention.owner.id,
          other.id,
          trace('cannot-be-set-when', binding, mention.sentence)
        ),
      ];
    });
  },
};

const INDICATES_WHICH = /\bindicates which one of\b/i;

const discriminatedUnion: DerivationRule = {
  name: 'discriminated-union',
  derive(binding, ctx) {
    const out: Constraint[] = [];
    const members = membersByKey(binding.node);
    const def = binding.definition;

    if (def.kind === 'object') {
      for (const hint of def.unions) {
        if (hint.discriminator === undefined) continue;
        const [discriminator] =
          resolveMentioned(ctx, 'discriminated-union', binding.node, [
            hint.discriminator,
          ]) ?? [];
        if (discriminator === undefined) continue;
        const fields =
          resolveMentioned(
            ctx,
            'discriminated-union',
            binding.node,
            Object.keys(hint.fieldsToDiscriminateBy)
          ) ?? [];
        const t = trace('discriminated-union', binding, hint.discriminator);
        for (const field of fields) {
          out.push(requires(field.id, discriminator.id, t));
        }
      }
    }

    for (const mention of findMentions(binding, INDICATES_WHICH)) {
      if (mention.owner === binding.node) continue;
      const discriminator = mention.owner;
      const named = resolveMentioned(
        ctx,
        'discriminated-union',
        binding.node,
        mentionedNames(mention.tail, new Set(members.keys()))
      );
      if (named === undefined) continue;
      const fields = (
        named.length > 0
          ? named
          : [...members.values()].filter((m) => m.cardinality === 'optional')
      ).filter((m) => m !== discriminator);
      const t = trace('discriminated-union', binding, mention.sentence);
      for (const field of fields) {
        out.push(requires(field.id, discriminator.id, t));
      }
    }
    return out;
  },
};

const requiredSets: DerivationRule = {
  name: 'required-sets',
  derive(binding, ctx) {
    const def = binding.definition;
    if (def.kind !== 'object' || def.requiredSets === undefined) return [];
    const { mode, sets } = def.requiredSets;
    const terms: Expr[] = [];
    for (const set of sets) {
      const members = resolveMentioned(ctx, 'required-sets', binding.node, set) ?? [];
      if (members.length !== set.length || members.length === 0) return [];
      terms.push(conjunction(members.map((m) => v(m.id))));
    }
    if (terms.length === 0) return [];
    const t = trace('required-sets', binding, mode);
    const body =
      mode === 'exclusive' && terms.length > 1
        ? and(
            disjunction(terms),
            conjunction(pairs(terms).map(([a, b]) => not(and(a, b))))
          )
        : disjunction(terms);
    return [expression(implies(v(binding.node.id), body), t)];
  },
};

export const DERIVATION_RULES: readonly DerivationRule[] = [
  unionExclusion,
  exactlyOneOf,
  atLeastOneOf,
  mutuallyExclusive,
  singleMember,
  conditionalRequired,
  cannotBeSetWhen,
  discriminatedUnion,
  requiredSets,
];
