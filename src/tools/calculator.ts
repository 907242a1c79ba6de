/**
 * @file src/tools/calculator.ts
 * @description Stateless arithmetic tools.
 */

import { z } from 'zod';
import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import type { CallToolResult } from '@modelcontextprotocol/sdk/types.js';
import { McpError, ErrorCode } from '@modelcontextprotocol/sdk/types.js';
import { toolCallCounter } from '../metrics.js';

export const CALCULATOR_OPERATIONS = ['add', 'subtract', 'multiply', 'divide'] as const;

export type CalculatorOperation = (typeof CALCULATOR_OPERATIONS)[number];

export const binaryOperandsSchema = z.object({
  a: z.number().describe('First operand'),
  b: z.number().describe('Second operand'),
});

export type BinaryOperands = z.infer<typeof binaryOperandsSchema>;

const SYMBOLS: Record<CalculatorOperation, string> = {
  add: '+',
  subtract: '-',
  multiply: '*',
  divide: '/',
};

const DESCRIPTIONS: Record<CalculatorOperation, string> = {
  add: 'Adds two numbers together',
  subtract: 'Subtracts the second number from the first number',
  multiply: 'Multiplies two numbers together',
  divide: 'Divides the first number by the second number',
};

/**
 * @throws {McpError} with code `InvalidParams` on division by zero.
 */
export function calculate(op: CalculatorOperation, a: number, b: number): number {
  switch (op) {
    case 'add':
      return a + b;
    case 'subtract':
      return a - b;
    case 'multiply':
      return a * b;
    case 'divide':
      if (b === 0) {
        throw new McpError(ErrorCode.InvalidParams, 'Division by zero is not allowed.');
      }
      return a / b;
  }
}

export function formatCalculation(op: CalculatorOperation, a: number, b: number, result: number): string {
  return `${a} ${SYMBOLS[op]} ${b} = ${result}`;
}

export function registerCalculatorTools(server: McpServer): void {
  for (const op of CALCULATOR_OPERATIONS) {
    const name = `calculator_${op}`;
    server.tool(name, DESCRIPTIONS[op], binaryOperandsSchema.shape, async ({ a, b }: BinaryOperands): Promise<CallToolResult> => {
      toolCallCounter.inc({ tool: name });
      const result = calculate(op, a, b);
      return {
        content: [{ type: 'text', text: formatCalculation(op, a, b, result) }],
      };
    });
  }
}
