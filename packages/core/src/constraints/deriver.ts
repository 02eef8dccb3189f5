import { DIAGNOSTIC_CODES, DIAGNOSTIC_PHASES } from '../diag/codes.js';
import { type DiagnosticEnvelope, makeDiagnostic } from '../diag/envelope.js';
import type { Binding } from '../synth/synthesizer.js';
import { type Constraint, renderExpr } from './expression.js';
import { DERIVATION_RULES, type DerivationRule } from './rules.js';

export interface DerivationResult {
  constraints: Constraint[];
  diagnostics: DiagnosticEnvelope[];
}

function pairKey(a: string, b: string): string {
  return a < b ? `${a}\u0000${b}` : `${b}\u0000${a}`;
}

/**
 * Flag every feature pair that is both required and excluded. Both
 * constraints stay in the model; which one reflects intent is unknowable here.
 */
export function findConflicts(constraints: readonly Constraint[]): DiagnosticEnvelope[] {
  const requiresAt = new Map<string, number>();
  const excludesAt = new Map<string, number>();
  constraints.forEach((c, index) => {
    const e = c.expr;
    if (c.kind === 'requires' && e.type === 'implies' && e.left.type === 'var' && e.right.type === 'var') {
      const key = pairKey(e.left.id, e.right.id);
      if (!requiresAt.has(key)) requiresAt.set(key, index);
    }
    if (
      c.kind === 'excludes' &&
      e.type === 'not' &&
      e.operand.type === 'and' &&
      e.operand.left.type === 'var' &&
      e.operand.right.type === 'var'
    ) {
      const key = pairKey(e.operand.left.id, e.operand.right.id);
      if (!excludesAt.has(key)) excludesAt.set(key, index);
    }
  });

  const out: DiagnosticEnvelope[] = [];
  for (const [key, requiresIndex] of requiresAt) {
    const excludesIndex = excludesAt.get(key);
    if (excludesIndex === undefined) continue;
    const [a = '', b = ''] = key.split('\u0000');
    out.push(
      makeDiagnostic(
        DIAGNOSTIC_CODES.CONSTRAINT_CONFLICT,
        DIAGNOSTIC_PHASES.DERIVE,
        a,
        { features: [a, b], requires: requiresIndex, excludes: excludesIndex }
      )
    );
  }
  return out;
}

/**
 * Run every rule over every binding and union the results. Identical
 * constraints (same rendered expression) are kept once, first derivation wins.
 * Conflicts are checked by the assembler on the final list.
 */
export function deriveConstraints(
  bindings: readonly Binding[],
  rules: readonly DerivationRule[] = DERIVATION_RULES
): DerivationResult {
  const diagnostics: DiagnosticEnvelope[] = [];
  const constraints: Constraint[] = [];
  const seen = new Set<string>();

  const ctx = {
    note(note: { featureId: string; rule: string; missing: string[] }): void {
      diagnostics.push(
        makeDiagnostic(
          DIAGNOSTIC_CODES.CONSTRAINT_TARGET_MISSING,
          DIAGNOSTIC_PHASES.DERIVE,
          note.featureId,
          { rule: note.rule, missing: note.missing }
        )
      );
    },
  };

  for (const binding of bindings) {
    for (const rule of rules) {
      for (const constraint of rule.derive(binding, ctx)) {
        const key = renderExpr(constraint.expr);
        if (seen.has(key)) continue;
        seen.add(key);
        constraints.push(constraint);
      }
    }
  }

  return { constraints, diagnostics };
}
