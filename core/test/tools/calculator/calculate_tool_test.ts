/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import {describe, expect, it} from 'vitest';

import {
  CALCULATE_TOOL_NAME,
  calculate,
  calculateTool,
} from '../../../src/tools/calculator/calculate_tool.js';

describe('calculate', () => {
  it('reports the result of a valid expression', () => {
    expect(calculate('2 + 2')).toBe('The result is: 4');
    expect(calculate('10 * 7')).toBe('The result is: 70');
    expect(calculate('100 / 8')).toBe('The result is: 12.5');
    expect(calculate('max([3, 8, 1])')).toBe('The result is: 8');
    expect(calculate('2 ** 64 + 1')).toBe('The result is: 18446744073709551617');
  });

  it('reports errors instead of throwing', () => {
    expect(calculate('1 / 0')).toBe(
      'Error calculating expression: division by zero'
    );
    expect(calculate('process.exit(1)')).toBe(
      "Error calculating expression: invalid character '.' at position 7"
    );
    expect(calculate('')).toBe('Error calculating expression: empty expression');
  });

  it('formats sequence results', () => {
    expect(calculate('[1, 2 * 2]')).toBe('The result is: [1, 4]');
  });
});

describe('calculateTool', () => {
  it('is registered under the calculate name', () => {
    expect(calculateTool.name).toBe(CALCULATE_TOOL_NAME);
    expect(calculateTool.name).toBe('calculate');
  });

  it('describes the supported operators', () => {
    expect(calculateTool.description).toContain('+ - * / // % **');
  });
});
