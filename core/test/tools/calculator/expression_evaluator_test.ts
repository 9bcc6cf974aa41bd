/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import {describe, expect, it} from 'vitest';

import {
  ExpressionError,
  type Scalar,
  evaluateExpression,
  formatExpressionValue,
  roundHalfEven,
} from '../../../src/tools/calculator/expression_evaluator.js';

describe('evaluateExpression', () => {
  describe('arithmetic', () => {
    it.each<[string, Scalar]>([
      ['2 + 2', 4n],
      ['10 * 5', 50n],
      ['100 / 4', 25],
      ['5 / 2', 2.5],
      ['10 - 3 - 2', 5n],
      ['(1 + 2) * 3', 9n],
      ['1 + 2 * 3', 7n],
      ['7 // 2', 3n],
      ['-7 // 2', -4n],
      ['-7 % 3', 2n],
      ['7 % -3', -2n],
      ['7.5 // 2', 3],
      ['-7.5 % 2', 0.5],
      ['2 ** 10', 1024n],
      ['2 ** 3 ** 2', 512n],
      ['-2 ** 2', -4n],
      ['2 ** -1', 0.5],
      ['(-1) ** 7', -1n],
      ['0 ** 0', 1n],
      ['--3', 3n],
      ['+4', 4n],
      ['1e3 + 1', 1001],
      ['.5 * 4', 2],
      ['2.0 ** 3', 8],
    ])('evaluates %s', (expression, expected) => {
      expect(evaluateExpression(expression)).toBe(expected);
    });

    it('keeps integers beyond 2 ** 53 exact', () => {
      expect(evaluateExpression('2 ** 64')).toBe(18446744073709551616n);
      expect(evaluateExpression('9007199254740992 + 1')).toBe(9007199254740993n);
      expect(evaluateExpression('12345678901234567890 * 10 // 10')).toBe(
        12345678901234567890n
      );
      expect(formatExpressionValue(evaluateExpression('2 ** 64 - 1'))).toBe(
        '18446744073709551615'
      );
    });

    it('switches to floats when a float takes part', () => {
      expect(evaluateExpression('2 ** 64 + 0.5')).toBe(18446744073709552000);
    });
  });

  describe('functions', () => {
    it.each<[string, Scalar]>([
      ['abs(-5)', 5n],
      ['abs(-2.5)', 2.5],
      ['round(2.5)', 2],
      ['round(3.5)', 4],
      ['round(3.14159, 2)', 3.14],
      ['round(1250, -2)', 1200n],
      ['round(1350, -2)', 1400n],
      ['round(-150, -2)', -200n],
      ['round(7)', 7n],
      ['min(3, 1, 2)', 1n],
      ['min(2, 1.5)', 1.5],
      ['max([4, 9, 2])', 9n],
      ['sum([1, 2, 3])', 6n],
      ['sum((1, 2), 10)', 13n],
      ['sum([1, 0.5])', 1.5],
      ['pow(2, 3)', 8n],
      ['pow(2, 10, 1000)', 24n],
      ['pow(2, 3, -5)', -2n],
      ['pow(-2, 3, 5)', 2n],
      ['pow(3, 4, -7)', -3n],
      ['pow(5, 0, 1)', 0n],
      ['abs(min(-3, 4)) + max(1, 2)', 5n],
    ])('evaluates %s', (expression, expected) => {
      expect(evaluateExpression(expression)).toBe(expected);
    });
  });

  describe('sequences', () => {
    it('evaluates list literals', () => {
      expect(evaluateExpression('[1, 2 + 3]')).toEqual([1n, 5n]);
    });

    it('treats a parenthesized expression with a trailing comma as a tuple', () => {
      expect(evaluateExpression('(1,)')).toEqual([1n]);
      expect(evaluateExpression('(5)')).toBe(5n);
    });
  });

  describe('errors', () => {
    it.each([
      ['', 'empty expression'],
      ['1 / 0', 'division by zero'],
      ['5 // 0', 'integer division or modulo by zero'],
      ['5 % 0', 'integer modulo by zero'],
      ['x + 1', "name 'x' is not defined"],
      ['open(1)', "name 'open' is not defined"],
      ['abs', "'abs' is a function and must be called"],
      ['__import__("os")', 'invalid character \'"\' at position 11'],
      ['2 +', 'invalid syntax: unexpected end of expression'],
      ['1 2', 'invalid syntax: unexpected number 2 at position 2'],
      ['(1 + 2', "invalid syntax: expected ')' but found end of expression"],
      ['10 ** 400', 'result is too large or undefined'],
      ['2 ** 1024', 'result is too large or undefined'],
      ['9 ** 9 ** 9', 'result is too large or undefined'],
      ['10.0 ** 400', 'result is too large or undefined'],
      ['[1, 2] + 1', "unsupported operand type(s) for +: 'sequence' and 'number'"],
      ['[[1]]', 'nested sequences are not supported'],
      ['sum(5)', 'sum() argument must be a sequence'],
      ['min()', 'min expected at least 1 argument, got 0'],
      ['max([])', 'max() arg is an empty sequence'],
      ['abs(1, 2)', 'abs() takes 1 argument (2 given)'],
      ['round(1, 2, 3)', 'round() takes 1 to 2 arguments (3 given)'],
      ['pow(2, 0.5, 3)', 'pow() requires integer arguments'],
      ['round(2.5, 1.0)', 'round() requires integer arguments'],
      ['pow(2, 3, 0)', 'pow() 3rd argument cannot be 0'],
      ['(-8) ** 0.5', 'negative number cannot be raised to a fractional power'],
      ['0 ** -1', '0 cannot be raised to a negative power'],
    ])('rejects %j', (expression, message) => {
      expect(() => evaluateExpression(expression)).toThrow(
        new ExpressionError(message)
      );
    });

    it('rejects deeply nested expressions', () => {
      const expression = '('.repeat(100) + '1' + ')'.repeat(100);

      expect(() => evaluateExpression(expression)).toThrow(
        'expression is too deeply nested'
      );
    });

    it('throws ExpressionError instances', () => {
      expect(() => evaluateExpression('1 / 0')).toThrow(ExpressionError);
    });
  });
});

describe('roundHalfEven', () => {
  it('rounds ties to the even neighbour', () => {
    expect(roundHalfEven(0.5)).toBe(0);
    expect(roundHalfEven(1.5)).toBe(2);
    expect(roundHalfEven(-2.5)).toBe(-2);
  });

  it('rounds other values to the nearest', () => {
    expect(roundHalfEven(2.4)).toBe(2);
    expect(roundHalfEven(2.6)).toBe(3);
  });
});

describe('formatExpressionValue', () => {
  it('formats numbers', () => {
    expect(formatExpressionValue(4)).toBe('4');
    expect(formatExpressionValue(2.5)).toBe('2.5');
    expect(formatExpressionValue(-0)).toBe('0');
    expect(formatExpressionValue(-12n)).toBe('-12');
  });

  it('formats sequences', () => {
    expect(formatExpressionValue([1n, 2.5, -0])).toBe('[1, 2.5, 0]');
  });
});
