/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

/**
 * Restricted arithmetic evaluator used by the calculate tool.
 *
 * Expressions are tokenized and parsed into a small AST before evaluation, so
 * nothing in the input is ever executed as code. The only names in scope are
 * the functions in {@link ALLOWED_FUNCTION_NAMES}.
 */

/**
 * Raised for any expression that cannot be evaluated: bad syntax, unknown
 * names, wrong argument types, division by zero, overflow.
 */
export class ExpressionError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ExpressionError';
  }
}

/**
 * A single value. Integer literals and the integers derived from them are
 * exact bigints; anything involving a decimal literal or true division is a
 * float.
 */
export type Scalar = number | bigint;

/** Result of an evaluation: a scalar or a flat sequence of scalars. */
export type ExpressionValue = Scalar | Scalar[];

export const ALLOWED_FUNCTION_NAMES = [
  'abs',
  'round',
  'min',
  'max',
  'sum',
  'pow',
] as const;

export type AllowedFunctionName = (typeof ALLOWED_FUNCTION_NAMES)[number];

const MAX_NESTING_DEPTH = 64;

// Integers stay exact up to the range a float can hold.
const MAX_INTEGER_BITS = 1024;
const INTEGER_LIMIT = 1n << BigInt(MAX_INTEGER_BITS);
const INTEGER_LIMIT_DIGITS = INTEGER_LIMIT.toString().length;

type Token =
  | {kind: 'number'; value: Scalar; pos: number}
  | {kind: 'name'; value: string; pos: number}
  | {kind: 'op'; value: string; pos: number}
  | {kind: 'eof'; pos: number};

type ExpressionNode =
  | {type: 'number'; value: Scalar}
  | {type: 'name'; name: string}
  | {type: 'unary'; op: '+' | '-'; operand: ExpressionNode}
  | {type: 'binary'; op: BinaryOperator; left: ExpressionNode; right: ExpressionNode}
  | {type: 'call'; callee: string; args: ExpressionNode[]}
  | {type: 'sequence'; items: ExpressionNode[]};

type BinaryOperator = '+' | '-' | '*' | '/' | '//' | '%' | '**';

const NUMBER_PATTERN = /(?:\d+\.?\d*|\.\d+)(?:[eE][+-]?\d+)?/y;
const NAME_PATTERN = /[A-Za-z_][A-Za-z0-9_]*/y;
const TWO_CHAR_OPERATORS = new Set(['**', '//']);
const MULTIPLICATIVE_OPERATORS = new Set(['*', '/', '//', '%']);
const ONE_CHAR_OPERATORS = new Set(['+', '-', '*', '/', '%', '(', ')', '[', ']', ',']);

function isMultiplicativeOperator(value: string): value is '*' | '/' | '//' | '%' {
  return MULTIPLICATIVE_OPERATORS.has(value);
}

function tokenize(source: string): Token[] {
  const tokens: Token[] = [];
  let pos = 0;

  while (pos < source.length) {
    const ch = source[pos];
    if (/\s/.test(ch)) {
      pos++;
      continue;
    }

    NUMBER_PATTERN.lastIndex = pos;
    const numberMatch = NUMBER_PATTERN.exec(source);
    if (numberMatch) {
      const text = numberMatch[0];
      tokens.push({kind: 'number', value: /^\d+$/.test(text) ? BigInt(text) : Number(text), pos});
      pos += text.length;
      continue;
    }

    NAME_PATTERN.lastIndex = pos;
    const nameMatch = NAME_PATTERN.exec(source);
    if (nameMatch) {
      tokens.push({kind: 'name', value: nameMatch[0], pos});
      pos += nameMatch[0].length;
      continue;
    }

    const pair = source.slice(pos, pos + 2);
    if (TWO_CHAR_OPERATORS.has(pair)) {
      tokens.push({kind: 'op', value: pair, pos});
      pos += 2;
      continue;
    }
    if (ONE_CHAR_OPERATORS.has(ch)) {
      tokens.push({kind: 'op', value: ch, pos});
      pos++;
      continue;
    }

    throw new ExpressionError(`invalid character '${ch}' at position ${pos}`);
  }

  tokens.push({kind: 'eof', pos});
  return tokens;
}

function describeToken(token: Token): string {
  switch (token.kind) {
    case 'eof':
      return 'end of expression';
    case 'number':
      return `number ${token.value}`;
    default:
      return `'${token.value}'`;
  }
}

class ExpressionParser {
  private index = 0;
  private depth = 0;
  private lastListHadTrailingComma = false;

  constructor(private readonly tokens: Token[]) {}

  parse(): ExpressionNode {
    if (this.peek().kind === 'eof') {
      throw new ExpressionError('empty expression');
    }
    const node = this.parseAdditive();
    const trailing = this.peek();
    if (trailing.kind !== 'eof') {
      throw new ExpressionError(
          `invalid syntax: unexpected ${describeToken(trailing)} at position ${trailing.pos}`);
    }
    return node;
  }

  private peek(): Token {
    return this.tokens[this.index];
  }

  private next(): Token {
    const token = this.tokens[this.index];
    if (token.kind !== 'eof') {
      this.index++;
    }
    return token;
  }

  private isOp(value: string): boolean {
    const token = this.peek();
    return token.kind === 'op' && token.value === value;
  }

  private expectOp(value: string): void {
    const token = this.next();
    if (token.kind !== 'op' || token.value !== value) {
      throw new ExpressionError(
          `invalid syntax: expected '${value}' but found ${describeToken(token)}`);
    }
  }

  private enter(): void {
    this.depth++;
    if (this.depth > MAX_NESTING_DEPTH) {
      throw new ExpressionError('expression is too deeply nested');
    }
  }

  private leave(): void {
    this.depth--;
  }

  private parseAdditive(): ExpressionNode {
    let left = this.parseMultiplicative();
    while (this.isOp('+') || this.isOp('-')) {
      const op = this.next();
      const right = this.parseMultiplicative();
      left = {type: 'binary', op: op.kind === 'op' && op.value === '+' ? '+' : '-', left, right};
    }
    return left;
  }

  private parseMultiplicative(): ExpressionNode {
    let left = this.parseUnary();
    for (;;) {
      const token = this.peek();
      const op = token.kind === 'op' ? token.value : '';
      if (!isMultiplicativeOperator(op)) {
        return left;
      }
      this.next();
      const right = this.parseUnary();
      left = {type: 'binary', op, left, right};
    }
  }

  // Unary minus binds looser than '**' on its right: -2 ** 2 == -4.
  private parseUnary(): ExpressionNode {
    if (this.isOp('+') || this.isOp('-')) {
      const op = this.isOp('+') ? '+' : '-';
      this.next();
      this.enter();
      const operand = this.parseUnary();
      this.leave();
      return {type: 'unary', op, operand};
    }
    return this.parsePower();
  }

  private parsePower(): ExpressionNode {
    const base = this.parsePrimary();
    if (this.isOp('**')) {
      this.next();
      this.enter();
      const exponent = this.parseUnary();
      this.leave();
      return {type: 'binary', op: '**', left: base, right: exponent};
    }
    return base;
  }

  private parsePrimary(): ExpressionNode {
    const token = this.next();

    if (token.kind === 'number') {
      return {type: 'number', value: token.value};
    }

    if (token.kind === 'name') {
      if (this.isOp('(')) {
        this.next();
        const args = this.parseItems(')');
        return {type: 'call', callee: token.value, args};
      }
      return {type: 'name', name: token.value};
    }

    if (token.kind === 'op' && token.value === '(') {
      const items = this.parseItems(')');
      // A single parenthesized expression without a trailing comma is a group.
      if (items.length === 1 && !this.lastListHadTrailingComma) {
        return items[0];
      }
      return {type: 'sequence', items};
    }

    if (token.kind === 'op' && token.value === '[') {
      return {type: 'sequence', items: this.parseItems(']')};
    }

    throw new ExpressionError(
        `invalid syntax: unexpected ${describeToken(token)}` +
        (token.kind === 'eof' ? '' : ` at position ${token.pos}`));
  }

  /**
   * Parses comma separated expressions up to and including `closing`.
   */
  private parseItems(closing: ')' | ']'): ExpressionNode[] {
    this.enter();
    const items: ExpressionNode[] = [];
    let trailingComma = false;

    while (!this.isOp(closing)) {
      items.push(this.parseAdditive());
      trailingComma = false;
      if (this.isOp(',')) {
        this.next();
        trailingComma = true;
        continue;
      }
      break;
    }
    this.expectOp(closing);
    this.leave();

    this.lastListHadTrailingComma = trailingComma;
    return items;
  }
}

function typeName(value: ExpressionValue): string {
  return Array.isArray(value) ? 'sequence' : 'number';
}

function requireScalar(value: ExpressionValue, context: string): Scalar {
  if (Array.isArray(value)) {
    throw new ExpressionError(`unsupported operand type for ${context}: 'sequence'`);
  }
  return value;
}

function requireInteger(value: ExpressionValue, context: string): bigint {
  const n = requireScalar(value, context);
  if (typeof n !== 'bigint') {
    throw new ExpressionError(`${context} requires integer arguments`);
  }
  return n;
}

function toFloat(value: Scalar): number {
  return typeof value === 'bigint' ? Number(value) : value;
}

function tooLarge(): ExpressionError {
  return new ExpressionError('result is too large or undefined');
}

function checkInteger(value: bigint): bigint {
  if (value >= INTEGER_LIMIT || value <= -INTEGER_LIMIT) {
    throw tooLarge();
  }
  return value;
}

function bitLength(value: bigint): number {
  return (value < 0n ? -value : value).toString(2).length;
}

/** Quotient rounded towards negative infinity. */
function floorDivide(a: bigint, b: bigint): bigint {
  const quotient = a / b;
  return a % b !== 0n && a < 0n !== b < 0n ? quotient - 1n : quotient;
}

/** Remainder with the sign of the divisor. */
function floorModulo(a: bigint, b: bigint): bigint {
  return a - b * floorDivide(a, b);
}

function power(base: number, exponent: number): number {
  if (base === 0 && exponent < 0) {
    throw new ExpressionError('0 cannot be raised to a negative power');
  }
  if (base < 0 && !Number.isInteger(exponent)) {
    throw new ExpressionError('negative number cannot be raised to a fractional power');
  }
  return base ** exponent;
}

function integerPower(base: bigint, exponent: bigint): bigint {
  if (base === 0n || base === 1n) {
    return exponent === 0n ? 1n : base;
  }
  if (base === -1n) {
    return exponent % 2n === 0n ? 1n : -1n;
  }
  // |base| >= 2 ** (bits - 1), so this bounds the result from below.
  if (BigInt(bitLength(base) - 1) * exponent > BigInt(MAX_INTEGER_BITS)) {
    throw tooLarge();
  }
  return checkInteger(base ** exponent);
}

function modularPower(base: bigint, exponent: bigint, modulus: bigint): bigint {
  if (modulus === 0n) {
    throw new ExpressionError('pow() 3rd argument cannot be 0');
  }
  if (exponent < 0n) {
    throw new ExpressionError('pow() negative exponent is not supported with a modulus');
  }
  let result = 1n;
  let b = base % modulus;
  let e = exponent;
  while (e > 0n) {
    if (e & 1n) {
      result = (result * b) % modulus;
    }
    b = (b * b) % modulus;
    e >>= 1n;
  }
  return floorModulo(result, modulus);
}

/**
 * Rounds half to even, optionally at a number of decimal digits.
 */
export function roundHalfEven(value: number, digits = 0): number {
  const factor = 10 ** digits;
  const scaled = value * factor;
  const floor = Math.floor(scaled);
  const rounded =
      scaled - floor === 0.5 ? (floor % 2 === 0 ? floor : floor + 1) : Math.round(scaled);
  return rounded / factor;
}

function roundIntegerHalfEven(value: bigint, digits: bigint): bigint {
  if (digits >= 0n) {
    return value;
  }
  if (-digits > BigInt(INTEGER_LIMIT_DIGITS)) {
    return 0n;
  }
  const factor = 10n ** -digits;
  const quotient = floorDivide(value, factor);
  const twiceRemainder = 2n * (value - quotient * factor);
  const roundUp =
      twiceRemainder > factor || (twiceRemainder === factor && quotient % 2n !== 0n);
  return (roundUp ? quotient + 1n : quotient) * factor;
}

function applyIntegerBinary(op: BinaryOperator, a: bigint, b: bigint): Scalar {
  switch (op) {
    case '+':
      return checkInteger(a + b);
    case '-':
      return checkInteger(a - b);
    case '*':
      return checkInteger(a * b);
    case '/':
      if (b === 0n) {
        throw new ExpressionError('division by zero');
      }
      return Number(a) / Number(b);
    case '//':
      if (b === 0n) {
        throw new ExpressionError('integer division or modulo by zero');
      }
      return floorDivide(a, b);
    case '%':
      if (b === 0n) {
        throw new ExpressionError('integer modulo by zero');
      }
      return floorModulo(a, b);
    case '**':
      return b < 0n ? power(Number(a), Number(b)) : integerPower(a, b);
    default:
      throw new ExpressionError(`unsupported operator '${op}'`);
  }
}

function applyFloatBinary(op: BinaryOperator, a: number, b: number): number {
  switch (op) {
    case '+':
      return a + b;
    case '-':
      return a - b;
    case '*':
      return a * b;
    case '/':
      if (b === 0) {
        throw new ExpressionError('division by zero');
      }
      return a / b;
    case '//':
      if (b === 0) {
        throw new ExpressionError('integer division or modulo by zero');
      }
      return Math.floor(a / b);
    case '%':
      if (b === 0) {
        throw new ExpressionError('integer modulo by zero');
      }
      return a - b * Math.floor(a / b);
    case '**':
      return power(a, b);
    default:
      throw new ExpressionError(`unsupported operator '${op}'`);
  }
}

function applyBinary(op: BinaryOperator, leftValue: ExpressionValue, rightValue: ExpressionValue): Scalar {
  if (Array.isArray(leftValue) || Array.isArray(rightValue)) {
    throw new ExpressionError(
        `unsupported operand type(s) for ${op}: '${typeName(leftValue)}' and '${typeName(rightValue)}'`);
  }
  if (typeof leftValue === 'bigint' && typeof rightValue === 'bigint') {
    return applyIntegerBinary(op, leftValue, rightValue);
  }
  return applyFloatBinary(op, toFloat(leftValue), toFloat(rightValue));
}

function negate(value: Scalar): Scalar {
  return typeof value === 'bigint' ? -value : -value;
}

function sequenceArgument(name: string, args: ExpressionValue[]): Scalar[] {
  if (args.length === 0) {
    throw new ExpressionError(`${name} expected at least 1 argument, got 0`);
  }
  if (args.length === 1) {
    const only = args[0];
    if (!Array.isArray(only)) {
      throw new ExpressionError(`${name}() argument must be a sequence or at least two numbers`);
    }
    return only;
  }
  return args.map((arg) => requireScalar(arg, `${name}()`));
}

function expectArgCount(name: string, args: ExpressionValue[], min: number, max: number): void {
  if (args.length < min || args.length > max) {
    const expected = min === max ? `${min}` : `${min} to ${max}`;
    throw new ExpressionError(
        `${name}() takes ${expected} argument${max === 1 ? '' : 's'} (${args.length} given)`);
  }
}

function pickExtreme(
    name: 'min' | 'max', args: ExpressionValue[], better: (a: Scalar, b: Scalar) => boolean): Scalar {
  const values = sequenceArgument(name, args);
  if (values.length === 0) {
    throw new ExpressionError(`${name}() arg is an empty sequence`);
  }
  return values.reduce((best, value) => (better(value, best) ? value : best));
}

const FUNCTIONS: Record<AllowedFunctionName, (args: ExpressionValue[]) => ExpressionValue> = {
  abs: (args) => {
    expectArgCount('abs', args, 1, 1);
    const value = requireScalar(args[0], 'abs()');
    return typeof value === 'bigint' ? (value < 0n ? -value : value) : Math.abs(value);
  },
  round: (args) => {
    expectArgCount('round', args, 1, 2);
    const value = requireScalar(args[0], 'round()');
    const digits = args.length === 2 ? requireInteger(args[1], 'round()') : 0n;
    if (typeof value === 'bigint') {
      return checkInteger(roundIntegerHalfEven(value, digits));
    }
    return roundHalfEven(value, Number(digits));
  },
  min: (args) => pickExtreme('min', args, (a, b) => a < b),
  max: (args) => pickExtreme('max', args, (a, b) => a > b),
  sum: (args) => {
    expectArgCount('sum', args, 1, 2);
    const values = args[0];
    if (!Array.isArray(values)) {
      throw new ExpressionError('sum() argument must be a sequence');
    }
    const start = args.length === 2 ? requireScalar(args[1], 'sum()') : 0n;
    return values.reduce<Scalar>((total, value) => applyBinary('+', total, value), start);
  },
  pow: (args) => {
    expectArgCount('pow', args, 2, 3);
    if (args.length === 3) {
      return modularPower(
          requireInteger(args[0], 'pow()'),
          requireInteger(args[1], 'pow()'),
          requireInteger(args[2], 'pow()'));
    }
    return applyBinary('**', requireScalar(args[0], 'pow()'), requireScalar(args[1], 'pow()'));
  },
};

function isAllowedFunction(name: string): name is AllowedFunctionName {
  return (ALLOWED_FUNCTION_NAMES as readonly string[]).includes(name);
}

function evaluateNode(node: ExpressionNode): ExpressionValue {
  switch (node.type) {
    case 'number':
      return node.value;
    case 'name':
      if (isAllowedFunction(node.name)) {
        throw new ExpressionError(`'${node.name}' is a function and must be called`);
      }
      throw new ExpressionError(`name '${node.name}' is not defined`);
    case 'unary': {
      const operand = requireScalar(evaluateNode(node.operand), `unary ${node.op}`);
      return node.op === '-' ? negate(operand) : operand;
    }
    case 'binary':
      return applyBinary(node.op, evaluateNode(node.left), evaluateNode(node.right));
    case 'call': {
      if (!isAllowedFunction(node.callee)) {
        throw new ExpressionError(`name '${node.callee}' is not defined`);
      }
      const args = node.args.map(evaluateNode);
      return FUNCTIONS[node.callee](args);
    }
    case 'sequence':
      return node.items.map((item) => {
        const value = evaluateNode(item);
        if (Array.isArray(value)) {
          throw new ExpressionError('nested sequences are not supported');
        }
        return value;
      });
    default:
      throw new ExpressionError('unsupported expression');
  }
}

function checkFinite(value: ExpressionValue): ExpressionValue {
  const values = Array.isArray(value) ? value : [value];
  for (const v of values) {
    if (typeof v === 'number' && !Number.isFinite(v)) {
      throw tooLarge();
    }
  }
  return value;
}

/**
 * Evaluates an arithmetic expression.
 *
 * @throws ExpressionError if the expression is invalid or cannot be evaluated.
 */
export function evaluateExpression(expression: string): ExpressionValue {
  const ast = new ExpressionParser(tokenize(expression)).parse();
  return checkFinite(evaluateNode(ast));
}

function formatScalar(value: Scalar): string {
  // Normalize negative zero.
  return typeof value === 'number' && value === 0 ? '0' : String(value);
}

/**
 * Renders an evaluation result for display.
 */
export function formatExpressionValue(value: ExpressionValue): string {
  if (Array.isArray(value)) {
    return `[${value.map(formatScalar).join(', ')}]`;
  }
  return formatScalar(value);
}
