/**
 * Propositional expressions over feature ids.
 *
 * Operator precedence, tightest first: `!`, `&`, `|`, `=>`, `<=>`.
 * `=>` and `<=>` associate to the right, `&` and `|` to the left.
 */

export type Expr =
  | { type: 'var'; id: string }
  | { type: 'not'; operand: Expr }
  | { type: 'and'; left: Expr; right: Expr }
  | { type: 'or'; left: Expr; right: Expr }
  | { type: 'implies'; left: Expr; right: Expr }
  | { type: 'iff'; left: Expr; right: Expr };

export type ConstraintKind = 'requires' | 'excludes' | 'expression';

export interface DerivationTrace {
  rule: string;
  /** Definition (or feature id, for parsed models) the rule fired on */
  definition: string;
  detail?: string;
}

export interface Constraint {
  kind: ConstraintKind;
  expr: Expr;
  trace: DerivationTrace;
}

export const v = (id: string): Expr => ({ type: 'var', id });
export const not = (operand: Expr): Expr => ({ type: 'not', operand });
export const and = (left: Expr, right: Expr): Expr => ({
  type: 'and',
  left,
  right,
});
export const or = (left: Expr, right: Expr): Expr => ({
  type: 'or',
  left,
  right,
});
export const implies = (left: Expr, right: Expr): Expr => ({
  type: 'implies',
  left,
  right,
});

/** Left fold of `&` / `|` over one or more operands */
export function conjunction(operands: Expr[]): Expr {
  return fold(operands, and);
}

export function disjunction(operands: Expr[]): Expr {
  return fold(operands, or);
}

function fold(operands: Expr[], join: (l: Expr, r: Expr) => Expr): Expr {
  const [first, ...rest] = operands;
  if (first === undefined) {
    throw new Error('Cannot fold an empty operand list');
  }
  return rest.reduce(join, first);
}

export function requires(
  from: string,
  to: string,
  trace: DerivationTrace
): Constraint {
  return { kind: 'requires', expr: implies(v(from), v(to)), trace };
}

export function excludes(
  a: string,
  b: string,
  trace: DerivationTrace
): Constraint {
  return { kind: 'excludes', expr: not(and(v(a), v(b))), trace };
}

export function expression(expr: Expr, trace: DerivationTrace): Constraint {
  return { kind: classify(expr), expr, trace };
}

/**
 * Kind is a property of the expression's shape: `a => b` is requires,
 * `!(a & b)` is excludes, anything else is a general expression.
 */
export function classify(expr: Expr): ConstraintKind {
  if (
    expr.type === 'implies' &&
    expr.left.type === 'var' &&
    expr.right.type === 'var'
  ) {
    return 'requires';
  }
  if (
    expr.type === 'not' &&
    expr.operand.type === 'and' &&
    expr.operand.left.type === 'var' &&
    expr.operand.right.type === 'var'
  ) {
    return 'excludes';
  }
  return 'expression';
}

export function variables(expr: Expr): string[] {
  const out: string[] = [];
  const stack: Expr[] = [expr];
  while (stack.length > 0) {
    const e = stack.pop();
    if (e === undefined) break;
    switch (e.type) {
      case 'var':
        out.push(e.id);
        break;
      case 'not':
        stack.push(e.operand);
        break;
      default:
        stack.push(e.right, e.left);
    }
  }
  return out;
}

export function evaluate(expr: Expr, selected: (id: string) => boolean): boolean {
  switch (expr.type) {
    case 'var':
      return selected(expr.id);
    case 'not':
      return !evaluate(expr.operand, selected);
    case 'and':
      return evaluate(expr.left, selected) && evaluate(expr.right, selected);
    case 'or':
      return evaluate(expr.left, selected) || evaluate(expr.right, selected);
    case 'implies':
      return !evaluate(expr.left, selected) || evaluate(expr.right, selected);
    case 'iff':
      return evaluate(expr.left, selected) === evaluate(expr.right, selected);
  }
}

const PRECEDENCE: Record<Expr['type'], number> = {
  iff: 1,
  implies: 2,
  or: 3,
  and: 4,
  not: 5,
  var: 6,
};

const SYMBOL = {
  iff: '<=>',
  implies: '=>',
  or: '|',
  and: '&',
} as const;

/**
 * Render with the minimum parentheses that parse back to the same tree.
 */
export function renderExpr(expr: Expr, quote: (id: string) => string = (id) => id): string {
  switch (expr.type) {
    case 'var':
      return quote(expr.id);
    case 'not': {
      const inner = renderExpr(expr.operand, quote);
      return PRECEDENCE[expr.operand.type] < PRECEDENCE.not
        ? `!(${inner})`
        : `!${inner}`;
    }
    default: {
      const p = PRECEDENCE[expr.type];
      const rightAssoc = expr.type === 'implies' || expr.type === 'iff';
      const leftNeeds = rightAssoc
        ? PRECEDENCE[expr.left.type] <= p
        : PRECEDENCE[expr.left.type] < p;
      const rightNeeds = rightAssoc
        ? PRECEDENCE[expr.right.type] < p
        : PRECEDENCE[expr.right.type] <= p;
      const l = renderExpr(expr.left, quote);
      const r = renderExpr(expr.right, quote);
      return `${leftNeeds ? `(${l})` : l} ${SYMBOL[expr.type]} ${rightNeeds ? `(${r})` : r}`;
    }
  }
}

export function exprEquals(a: Expr, b: Expr): boolean {
  if (a.type === 'var' || b.type === 'var') {
    return a.type === 'var' && b.type === 'var' && a.id === b.id;
  }
  if (a.type === 'not' || b.type === 'not') {
    return a.type === 'not' && b.type === 'not' && exprEquals(a.operand, b.operand);
  }
  return (
    a.type === b.type && exprEquals(a.left, b.left) && exprEquals(a.right, b.right)
  );
}
