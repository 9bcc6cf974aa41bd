/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import {FunctionTool} from '@google/adk';
import {z} from 'zod';

import {evaluateExpression, formatExpressionValue} from './expression_evaluator.js';

export const CALCULATE_TOOL_NAME = 'calculate';

/**
 * Evaluates a mathematical expression and describes the outcome.
 *
 * Never throws: any failure is reported in the returned string.
 *
 * @param expression A mathematical expression, e.g. "2 + 2" or "10 * 5".
 * @returns "The result is: <value>" or "Error calculating expression: <reason>".
 */
export function calculate(expression: string): string {
  try {
    const value = evaluateExpression(String(expression));
    return `The result is: ${formatExpressionValue(value)}`;
  } catch (e: unknown) {
    const reason = e instanceof Error ? e.message : String(e);
    return `Error calculating expression: ${reason}`;
  }
}

export const calculateTool = new FunctionTool({
  name: CALCULATE_TOOL_NAME,
  description:
      'Evaluate a mathematical expression safely. Supports + - * / // % **, ' +
      'parentheses and the functions abs, round, min, max, sum and pow.',
  parameters: z.object({
    expression: z.string().describe(
        'A mathematical expression, e.g. "2 + 2" or "10 * 5".'),
  }),
  execute: ({expression}) => calculate(expression),
});
