/**
 * Guard expressions
 *
 * Boolean conditions over the execution context that decide whether a step
 * runs. Grammar, loosest binding first:
 *
 *   expr       := and ('||' and)*
 *   and        := unary ('&&' unary)*
 *   unary      := '!' unary | comparison
 *   comparison := primary (('==' | '!=' | '>' | '>=' | '<' | '<=') primary)?
 *   primary    := '(' expr ')' | 'exists' '(' path ')' | path | literal
 *
 * Paths are dotted (`quality.score`); the first segment is a context key.
 * Literals are numbers, quoted strings, true, false and null.
 */

import { ConfigError } from '../errors.js';

export type ComparisonOperator = '==' | '!=' | '>' | '>=' | '<' | '<=';

export type GuardLiteral = string | number | boolean | null;

export type GuardNode =
  | { type: 'or' | 'and'; left: GuardNode; right: GuardNode }
  | { type: 'not'; operand: GuardNode }
  | { type: 'compare'; operator: ComparisonOperator; left: GuardNode; right: GuardNode }
  | { type: 'exists'; path: string[] }
  | { type: 'path'; path: string[] }
  | { type: 'literal'; value: GuardLiteral };

export interface CompiledGuard {
  source: string;
  ast: GuardNode;
  /** Context keys the guard reads */
  references: string[];
}

type Token =
  | { kind: 'op'; value: string; pos: number }
  | { kind: 'path'; value: string[]; pos: number }
  | { kind: 'literal'; value: GuardLiteral; pos: number }
  | { kind: 'end'; pos: number };

const OPERATORS = ['||', '&&', '==', '!=', '>=', '<=', '>', '<', '!', '(', ')'];
const COMPARISONS: readonly string[] = ['==', '!=', '>', '>=', '<', '<='];
const IDENT_START = /[A-Za-z_]/;
const SEGMENT = /[A-Za-z0-9_-]/;

/**
 * Parse and validate a guard
 * @throws ConfigError on a syntax error
 */
export function compileGuard(source: string): CompiledGuard {
  const ast = new GuardParser(source).parse();
  return { source, ast, references: guardReferences(ast) };
}

export function parseGuard(source: string): GuardNode {
  return new GuardParser(source).parse();
}

/**
 * Evaluate against a context snapshot. Any comparison touching an absent
 * path is false; ordering comparisons require two numbers.
 */
export function evaluateGuard(node: GuardNode, context: Readonly<Record<string, unknown>>): boolean {
  return isTruthy(evaluateNode(node, context));
}

export function guardReferences(node: GuardNode): string[] {
  const keys = new Set<string>();
  const visit = (n: GuardNode): void => {
    switch (n.type) {
      case 'or':
      case 'and':
      case 'compare':
        visit(n.left);
        visit(n.right);
        break;
      case 'not':
        visit(n.operand);
        break;
      case 'exists':
      case 'path':
        keys.add(n.path[0]);
        break;
      case 'literal':
        break;
    }
  };
  visit(node);
  return Array.from(keys);
}

// Marker for a path that does not resolve
const ABSENT: unique symbol = Symbol('absent');

function evaluateNode(node: GuardNode, context: Readonly<Record<string, unknown>>): unknown {
  switch (node.type) {
    case 'or':
      return isTruthy(evaluateNode(node.left, context)) || isTruthy(evaluateNode(node.right, context));
    case 'and':
      return isTruthy(evaluateNode(node.left, context)) && isTruthy(evaluateNode(node.right, context));
    case 'not':
      return !isTruthy(evaluateNode(node.operand, context));
    case 'compare':
      return compare(node.operator, evaluateNode(node.left, context), evaluateNode(node.right, context));
    case 'exists': {
      const value = lookup(node.path, context);
      return value !== ABSENT && value !== undefined && value !== null;
    }
    case 'path':
      return lookup(node.path, context);
    case 'literal':
      return node.value;
  }
}

function compare(operator: ComparisonOperator, left: unknown, right: unknown): boolean {
  if (left === ABSENT || right === ABSENT) return false;

  switch (operator) {
    case '==':
      return left === right;
    case '!=':
      return left !== right;
    default:
      if (typeof left !== 'number' || typeof right !== 'number') return false;
      if (operator === '>') return left > right;
      if (operator === '>=') return left >= right;
      if (operator === '<') return left < right;
      return left <= right;
  }
}

function lookup(path: string[], context: Readonly<Record<string, unknown>>): unknown {
  let value: unknown = context;
  for (const segment of path) {
    if (typeof value !== 'object' || value === null || !Object.hasOwn(value, segment)) {
      return ABSENT;
    }
    value = Reflect.get(value, segment);
  }
  return value;
}

function isTruthy(value: unknown): boolean {
  return value !== ABSENT && Boolean(value);
}

class GuardParser {
  private tokens: Token[];
  private index = 0;

  constructor(private source: string) {
    this.tokens = this.tokenize();
  }

  parse(): GuardNode {
    if (this.peek().kind === 'end') {
      this.fail('guard is empty', 0);
    }
    const node = this.parseOr();
    const next = this.peek();
    if (next.kind !== 'end') {
      this.fail(`unexpected ${describe(next)}`, next.pos);
    }
    return node;
  }

  private parseOr(): GuardNode {
    let left = this.parseAnd();
    while (this.acceptOp('||')) {
      left = { type: 'or', left, right: this.parseAnd() };
    }
    return left;
  }

  private parseAnd(): GuardNode {
    let left = this.parseUnary();
    while (this.acceptOp('&&')) {
      left = { type: 'and', left, right: this.parseUnary() };
    }
    return left;
  }

  private parseUnary(): GuardNode {
    if (this.acceptOp('!')) {
      return { type: 'not', operand: this.parseUnary() };
    }
    return this.parseComparison();
  }

  private parseComparison(): GuardNode {
    const left = this.parsePrimary();
    const next = this.peek();
    if (next.kind === 'op' && isComparison(next.value)) {
      this.index++;
      return { type: 'compare', operator: next.value, left, right: this.parsePrimary() };
    }
    return left;
  }

  private parsePrimary(): GuardNode {
    const token = this.peek();
    this.index++;

    if (token.kind === 'op' && token.value === '(') {
      const inner = this.parseOr();
      this.expectOp(')');
      return inner;
    }

    if (token.kind === 'path') {
      if (token.value.length === 1 && token.value[0] === 'exists' && this.acceptOp('(')) {
        const target = this.peek();
        if (target.kind !== 'path') {
          return this.fail(`exists() takes a context path, got ${describe(target)}`, target.pos);
        }
        this.index++;
        this.expectOp(')');
        return { type: 'exists', path: target.value };
      }
      return { type: 'path', path: token.value };
    }

    if (token.kind === 'literal') {
      return { type: 'literal', value: token.value };
    }

    return this.fail(`unexpected ${describe(token)}`, token.pos);
  }

  private peek(): Token {
    return this.tokens[Math.min(this.index, this.tokens.length - 1)];
  }

  private acceptOp(value: string): boolean {
    const token = this.peek();
    if (token.kind === 'op' && token.value === value) {
      this.index++;
      return true;
    }
    return false;
  }

  private expectOp(value: string): void {
    if (!this.acceptOp(value)) {
      const token = this.peek();
      this.fail(`expected '${value}' but found ${describe(token)}`, token.pos);
    }
  }

  private tokenize(): Token[] {
    const tokens: Token[] = [];
    const src = this.source;
    let i = 0;

    while (i < src.length) {
      const ch = src[i];

      if (/\s/.test(ch)) {
        i++;
        continue;
      }

      const op = OPERATORS.find(o => src.startsWith(o, i));
      if (op) {
        tokens.push({ kind: 'op', value: op, pos: i });
        i += op.length;
        continue;
      }

      if (ch === '"' || ch === "'") {
        const start = i;
        let value = '';
        i++;
        while (i < src.length && src[i] !== ch) {
          if (src[i] === '\\' && i + 1 < src.length) i++;
          value += src[i];
          i++;
        }
        if (i >= src.length) {
          this.fail('unterminated string literal', start);
        }
        i++;
        tokens.push({ kind: 'literal', value, pos: start });
        continue;
      }

      const number = /^-?\d+(\.\d+)?/.exec(src.slice(i));
      if (number) {
        tokens.push({ kind: 'literal', value: Number(number[0]), pos: i });
        i += number[0].length;
        continue;
      }

      if (IDENT_START.test(ch)) {
        const start = i;
        const segments: string[] = [];
        let segment = '';
        while (i < src.length && (SEGMENT.test(src[i]) || src[i] === '.')) {
          if (src[i] === '.') {
            if (!segment) this.fail('empty path segment', i);
            segments.push(segment);
            segment = '';
          } else {
            segment += src[i];
          }
          i++;
        }
        if (!segment) this.fail('path ends with a dot', i - 1);
        segments.push(segment);

        if (segments.length === 1 && (segment === 'true' || segment === 'false')) {
          tokens.push({ kind: 'literal', value: segment === 'true', pos: start });
        } else if (segments.length === 1 && segment === 'null') {
          tokens.push({ kind: 'literal', value: null, pos: start });
        } else {
          tokens.push({ kind: 'path', value: segments, pos: start });
        }
        continue;
      }

      this.fail(`unexpected character '${ch}'`, i);
    }

    tokens.push({ kind: 'end', pos: src.length });
    return tokens;
  }

  private fail(problem: string, pos: number): never {
    throw new ConfigError(`Invalid guard '${this.source}'`, [`${problem} at position ${pos}`]);
  }
}

function isComparison(value: string): value is ComparisonOperator {
  return COMPARISONS.includes(value);
}

function describe(token: Token): string {
  switch (token.kind) {
    case 'op':
      return `'${token.value}'`;
    case 'path':
      return `'${token.value.join('.')}'`;
    case 'literal':
      return `literal ${JSON.stringify(token.value)}`;
    case 'end':
      return 'end of expression';
  }
}
