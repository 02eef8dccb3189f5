/**
 * Reader for the grammar written by `serializeModel`.
 */

import { readFile } from 'node:fs/promises';

import {
  type Constraint,
  type DerivationTrace,
  type Expr,
  expression,
} from '../constraints/expression.js';
import { ErrorCode } from '../errors/codes.js';
import type { Literal } from '../graph/definition.js';
import {
  type Cardinality,
  type FeatureAttributes,
  type FeatureModel,
  type FeatureNode,
  type GroupType,
  type Multiplicity,
  type ValueType,
  createFeatureNode,
} from '../model/feature-model.js';
import { collectDescriptions } from '../model/assembler.js';
import { FatalError, toError } from '../types/errors.js';
import { type Result, err, ok } from '../types/result.js';

const VALUE_TYPES: readonly ValueType[] = ['Boolean', 'String', 'Integer', 'Real'];
const SECTION_KEYWORDS = ['mandatory', 'optional', 'or', 'alternative'] as const;
type SectionKeyword = (typeof SECTION_KEYWORDS)[number];

function fail(message: string, line: number): never {
  throw new FatalError({
    message: `Model parse error on line ${line}: ${message}`,
    errorCode: ErrorCode.MODEL_PARSE_FAILED,
    context: { line },
  });
}

/**
 * Character cursor over one line.
 */
class Cursor {
  pos = 0;

  constructor(
    readonly text: string,
    readonly line: number
  ) {}

  get done(): boolean {
    return this.pos >= this.text.length;
  }

  peek(): string {
    return this.text.charAt(this.pos);
  }

  skipSpaces(): void {
    while (!this.done && /\s/.test(this.peek())) this.pos += 1;
  }

  startsWith(token: string): boolean {
    return this.text.startsWith(token, this.pos);
  }

  expect(token: string): void {
    this.skipSpaces();
    if (!this.startsWith(token)) {
      fail(`expected '${token}' at column ${this.pos + 1}`, this.line);
    }
    this.pos += token.length;
  }

  word(): string {
    this.skipSpaces();
    const match = /^[A-Za-z_][A-Za-z0-9_]*/.exec(this.text.slice(this.pos));
    if (!match) fail(`expected a name at column ${this.pos + 1}`, this.line);
    this.pos += match[0].length;
    return match[0];
  }

  /** Quoted id or plain identifier */
  id(): string {
    this.skipSpaces();
    if (this.peek() !== '"') return this.word();
    this.pos += 1;
    let out = '';
    while (!this.done) {
      const ch = this.peek();
      this.pos += 1;
      if (ch === '"') return out;
      if (ch === '\\') {
        out += this.peek();
        this.pos += 1;
      } else {
        out += ch;
      }
    }
    return fail('unterminated quoted id', this.line);
  }

  string(): string {
    this.expect("'");
    let out = '';
    while (!this.done) {
      const ch = this.peek();
      this.pos += 1;
      if (ch === "'") return out;
      if (ch !== '\\') {
        out += ch;
        continue;
      }
      const next = this.peek();
      this.pos += 1;
      out += next === 'n' ? '\n' : next === 'r' ? '\r' : next === 't' ? '\t' : next;
    }
    return fail('unterminated string', this.line);
  }

  literal(): Literal {
    this.skipSpaces();
    if (this.peek() === "'") return this.string();
    const match = /^(true|false|-?\d+(?:\.\d+)?(?:[eE][+-]?\d+)?)/.exec(
      this.text.slice(this.pos)
    );
    if (!match) fail(`expected a value at column ${this.pos + 1}`, this.line);
    this.pos += match[0].length;
    if (match[0] === 'true') return true;
    if (match[0] === 'false') return false;
    return Number(match[0]);
  }
}

function parseAttributes(cursor: Cursor): FeatureAttributes {
  const attrs: FeatureAttributes = {};
  cursor.expect('{');
  cursor.skipSpaces();
  if (cursor.startsWith('}')) {
    cursor.pos += 1;
    return attrs;
  }
  for (;;) {
    const name = cursor.word();
    cursor.skipSpaces();
    const bare = cursor.startsWith(',') || cursor.startsWith('}');
    if (bare) {
      setFlag(attrs, name, cursor.line);
    } else if (cursor.startsWith('[')) {
      cursor.pos += 1;
      const items: Literal[] = [];
      cursor.skipSpaces();
      while (!cursor.startsWith(']')) {
        items.push(cursor.literal());
        cursor.skipSpaces();
        if (cursor.startsWith(',')) cursor.pos += 1;
        cursor.skipSpaces();
        if (cursor.done) fail('unterminated list', cursor.line);
      }
      cursor.pos += 1;
      setList(attrs, name, items, cursor.line);
    } else {
      setValue(attrs, name, cursor.literal(), cursor.line);
    }
    cursor.skipSpaces();
    if (cursor.startsWith('}')) {
      cursor.pos += 1;
      return attrs;
    }
    cursor.expect(',');
  }
}

function setFlag(attrs: FeatureAttributes, name: string, line: number): void {
  switch (name) {
    case 'abstract':
    case 'branch':
    case 'deprecated':
    case 'opaque':
      attrs[name] = true;
      return;
    default:
      fail(`unknown flag attribute '${name}'`, line);
  }
}

function setList(
  attrs: FeatureAttributes,
  name: string,
  items: Literal[],
  line: number
): void {
  if (name === 'values') {
    attrs.values = items;
    return;
  }
  if (name === 'aliases') {
    attrs.aliases = items.map(String);
    return;
  }
  fail(`attribute '${name}' does not take a list`, line);
}

function setValue(
  attrs: FeatureAttributes,
  name: string,
  value: Literal,
  line: number
): void {
  switch (name) {
    case 'default':
      attrs.default = value;
      return;
    case 'min':
    case 'max':
      if (typeof value !== 'number') fail(`${name} must be a number`, line);
      attrs[name] = value;
      return;
    case 'key':
    case 'gvk':
    case 'format':
    case 'recursive':
    case 'shared':
    case 'provenance':
    case 'doc':
      if (typeof value !== 'string') fail(`${name} must be a string`, line);
      attrs[name] = value;
      return;
    default:
      fail(`unknown attribute '${name}'`, line);
  }
}

function isValueType(word: string): word is ValueType {
  return VALUE_TYPES.some((t) => t === word);
}

function isSectionKeyword(word: string): word is SectionKeyword {
  return SECTION_KEYWORDS.some((k) => k === word);
}

function parseFeatureLine(text: string, line: number): FeatureNode {
  const cursor = new Cursor(text, line);
  cursor.skipSpaces();
  let valueType: ValueType | undefined;
  if (cursor.peek() !== '"') {
    const save = cursor.pos;
    const first = cursor.word();
    if (isValueType(first)) valueType = first;
    else cursor.pos = save;
  }
  const id = cursor.id();
  const node = createFeatureNode(id, 'optional');
  if (valueType !== undefined) node.valueType = valueType;

  cursor.skipSpaces();
  if (cursor.startsWith('cardinality')) {
    cursor.pos += 'cardinality'.length;
    cursor.expect('[');
    const match = /^\s*(\d+)\.\.(\d+|\*)\s*\]/.exec(cursor.text.slice(cursor.pos));
    if (!match || match[1] === undefined || match[2] === undefined) {
      fail('malformed cardinality', line);
    }
    cursor.pos += match[0].length;
    const multiplicity: Multiplicity = {
      lower: Number(match[1]),
      upper: match[2] === '*' ? '*' : Number(match[2]),
    };
    node.multiplicity = multiplicity;
  }
  cursor.skipSpaces();
  if (cursor.startsWith('{')) node.attributes = parseAttributes(cursor);
  cursor.skipSpaces();
  if (!cursor.done) fail(`unexpected text at column ${cursor.pos + 1}`, line);
  return node;
}

/* Expression grammar, loosest first: iff, implies, or, and, not, atom */

type Token =
  | { type: 'id'; value: string }
  | { type: 'op'; value: '!' | '&' | '|' | '=>' | '<=>' | '(' | ')' };

function tokenize(text: string, line: number): Token[] {
  const cursor = new Cursor(text, line);
  const tokens: Token[] = [];
  for (;;) {
    cursor.skipSpaces();
    if (cursor.done) return tokens;
    const ch = cursor.peek();
    if (cursor.startsWith('<=>')) {
      tokens.push({ type: 'op', value: '<=>' });
      cursor.pos += 3;
    } else if (cursor.startsWith('=>')) {
      tokens.push({ type: 'op', value: '=>' });
      cursor.pos += 2;
    } else if (ch === '!' || ch === '&' || ch === '|' || ch === '(' || ch === ')') {
      tokens.push({ type: 'op', value: ch });
      cursor.pos += 1;
    } else {
      tokens.push({ type: 'id', value: cursor.id() });
    }
  }
}

class ExprParser {
  private index = 0;

  constructor(
    private readonly tokens: Token[],
    private readonly line: number
  ) {}

  parse(): Expr {
    const expr = this.iff();
    if (this.index < this.tokens.length) fail('trailing tokens in constraint', this.line);
    return expr;
  }

  private accept(op: string): boolean {
    const token = this.tokens[this.index];
    if (token?.type === 'op' && token.value === op) {
      this.index += 1;
      return true;
    }
    return false;
  }

  private iff(): Expr {
    const left = this.implies();
    if (this.accept('<=>')) return { type: 'iff', left, right: this.iff() };
    return left;
  }

  private implies(): Expr {
    const left = this.or();
    if (this.accept('=>')) return { type: 'implies', left, right: this.implies() };
    return left;
  }

  private or(): Expr {
    let left = this.and();
    while (this.accept('|')) left = { type: 'or', left, right: this.and() };
    return left;
  }

  private and(): Expr {
    let left = this.not();
    while (this.accept('&')) left = { type: 'and', left, right: this.not() };
    return left;
  }

  private not(): Expr {
    if (this.accept('!')) return { type: 'not', operand: this.not() };
    return this.atom();
  }

  private atom(): Expr {
    if (this.accept('(')) {
      const inner = this.iff();
      if (!this.accept(')')) fail("expected ')'", this.line);
      return inner;
    }
    const token = this.tokens[this.index];
    if (token?.type !== 'id') fail('expected a feature id', this.line);
    this.index += 1;
    return { type: 'var', id: token.value };
  }
}

export function parseExpr(text: string, line = 1): Expr {
  return new ExprParser(tokenize(text, line), line).parse();
}

const TRACE_COMMENT = /\s\/\/\s*rule:(\S+)\s+def:(.*)$/;

function parseConstraintLine(text: string, line: number): Constraint {
  const match = TRACE_COMMENT.exec(text);
  const body = match ? text.slice(0, match.index) : text;
  const trace: DerivationTrace =
    match && match[1] !== undefined && match[2] !== undefined
      ? { rule: match[1], definition: match[2].trim() }
      : { rule: 'parsed', definition: '' };
  return expression(parseExpr(body, line), trace);
}

interface OpenFeature {
  node: FeatureNode;
  depth: number;
  section?: { keyword: SectionKeyword; depth: number };
}

function groupFor(keyword: SectionKeyword): GroupType {
  return keyword === 'or' || keyword === 'alternative' ? keyword : 'and';
}

function cardinalityFor(keyword: SectionKeyword): Cardinality {
  return keyword === 'mandatory' ? 'mandatory' : 'optional';
}

/**
 * Parse model text back into a FeatureModel.
 *
 * @throws {FatalError} MODEL_PARSE_FAILED with the offending line
 */
export function parseModel(text: string): FeatureModel {
  const lines = text.split(/\r?\n/);
  let namespace: string | undefined;
  let block: 'header' | 'features' | 'constraints' = 'header';
  let root: FeatureNode | undefined;
  const open: OpenFeature[] = [];
  const constraints: Constraint[] = [];

  for (const [i, raw] of lines.entries()) {
    const lineNo = i + 1;
    if (raw.trim() === '') continue;
    const depth = /^\t*/.exec(raw)?.[0].length ?? 0;
    const content = raw.slice(depth);

    if (depth === 0) {
      if (content.startsWith('namespace ')) {
        const cursor = new Cursor(content.slice('namespace '.length), lineNo);
        namespace = cursor.id();
        continue;
      }
      if (content === 'features') {
        block = 'features';
        continue;
      }
      if (content === 'constraints') {
        block = 'constraints';
        continue;
      }
      fail(`unexpected top-level line '${content}'`, lineNo);
    }

    if (block === 'constraints') {
      constraints.push(parseConstraintLine(content, lineNo));
      continue;
    }
    if (block !== 'features') fail('content before features block', lineNo);

    while (open.length > 0) {
      const top = open[open.length - 1];
      if (top === undefined || top.depth < depth) break;
      open.pop();
    }
    const parent = open[open.length - 1];

    if (isSectionKeyword(content)) {
      if (!parent || parent.depth !== depth - 1) fail('group keyword without a feature', lineNo);
      const group = groupFor(content);
      if (parent.node.children.length > 0 && parent.node.group !== group) {
        fail(`feature ${parent.node.id} mixes group types`, lineNo);
      }
      parent.node.group = group;
      parent.section = { keyword: content, depth };
      continue;
    }

    const node = parseFeatureLine(content, lineNo);
    if (!parent) {
      if (root) fail('more than one root feature', lineNo);
      node.cardinality = 'mandatory';
      root = node;
    } else {
      const section = parent.section;
      if (!section || section.depth !== depth - 1) {
        fail(`feature ${node.id} is not inside a group section`, lineNo);
      }
      node.cardinality = cardinalityFor(section.keyword);
      parent.node.children.push(node);
    }
    open.push({ node, depth });
  }

  if (namespace === undefined) fail('missing namespace', 1);
  if (!root) fail('missing root feature', 1);

  return {
    namespace,
    root,
    constraints,
    descriptions: collectDescriptions(root),
    warnings: [],
  };
}

/**
 * Read and parse a model file. Descriptions come from the `doc` attributes.
 */
export async function loadModel(path: string): Promise<Result<FeatureModel, FatalError>> {
  let text: string;
  try {
    text = await readFile(path, 'utf8');
  } catch (error) {
    return err(
      new FatalError({
        message: `Failed to read model ${path}: ${toError(error).message}`,
        errorCode: ErrorCode.MODEL_PARSE_FAILED,
        context: { file: path },
        cause: toError(error),
      })
    );
  }
  try {
    return ok(parseModel(text));
  } catch (error) {
    if (error instanceof FatalError) {
      return err(
        new FatalError({
          message: error.message,
          errorCode: error.errorCode,
          context: { ...error.context, file: path },
          cause: error,
        })
      );
    }
    throw error;
  }
}
