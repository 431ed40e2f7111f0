// Calculation Tool
// Evaluates restricted arithmetic expressions with a locked-down mathjs instance.
// The character and keyword filters are a best-effort guard, not a sandbox.

import { create, all, type MathNode } from 'mathjs';
import { z } from 'zod';
import type { CalculationToolDescriptor, ToolHandler } from './types.js';

const ALLOWED_EXPRESSION = /^[0-9A-Za-z_+\-*/(). ]+$/;

export const FORBIDDEN_CALCULATION_KEYWORDS = ['import', 'exec', 'eval', 'open', 'file', '__'] as const;

export const ALLOWED_FUNCTIONS = new Set([
  'abs', 'min', 'max', 'sum', 'round', 'floor', 'ceil', 'fix', 'sign', 'mod',
  'sqrt', 'cbrt', 'pow', 'exp', 'log', 'log10', 'log2', 'hypot',
  'sin', 'cos', 'tan', 'asin', 'acos', 'atan', 'sinh', 'cosh', 'tanh',
  'mean', 'median',
]);

export const ALLOWED_CONSTANTS = new Set(['pi', 'e', 'tau']);

const ALLOWED_NODE_TYPES = new Set([
  'ConstantNode',
  'SymbolNode',
  'OperatorNode',
  'ParenthesisNode',
  'FunctionNode',
]);

const math = create(all);
const limitedParse = math.parse;

// Functions an expression could use to escape the arithmetic subset
math.import(
  {
    import: disabled('import'),
    createUnit: disabled('createUnit'),
    evaluate: disabled('evaluate'),
    parse: disabled('parse'),
    simplify: disabled('simplify'),
    derivative: disabled('derivative'),
    resolve: disabled('resolve'),
    reviver: disabled('reviver'),
  },
  { override: true },
);

function disabled(name: string) {
  return () => {
    throw new Error(`Function ${name} is disabled`);
  };
}

const VariablesSchema = z.record(z.number());

export interface RestrictedEvaluationOptions {
  allowedSymbols: Set<string>;
  allowedNodeTypes?: Set<string>;
}

/**
 * Parses `expression` and rejects it unless every node type and identifier is allowed.
 * Returns the parsed tree ready to compile.
 */
export function parseRestricted(expression: string, options: RestrictedEvaluationOptions): MathNode {
  const nodeTypes = options.allowedNodeTypes ?? ALLOWED_NODE_TYPES;
  const root = limitedParse(expression);

  root.traverse((node: MathNode) => {
    if (!nodeTypes.has(node.type)) {
      throw new Error(`Unsupported syntax in expression: ${node.type}`);
    }
    // Function names are the `fn` SymbolNode of their FunctionNode, so this covers calls too
    if (math.isSymbolNode(node) && !options.allowedSymbols.has(node.name)) {
      throw new Error(`Unknown identifier in expression: ${node.name}`);
    }
  });

  return root;
}

/**
 * Rewrites the alternative spellings callers use into mathjs syntax: `**` becomes `^`, a `math.`
 * prefix is dropped and `//` becomes `./`, which {@link applyFloorDivision} turns into floor(a / b).
 * Runs after validation, so `^` is only reachable through `**`.
 */
export function normalizeExpression(expression: string): string {
  return expression
    .replace(/\bmath\.(?=[A-Za-z_])/g, '')
    .replace(/\*\*/g, '^')
    .split('//')
    .map(part => part.replace(/\.\//g, '.0/'))
    .join(' ./ ');
}

export function applyFloorDivision(node: MathNode): MathNode {
  return node.transform((child: MathNode) => {
    if (math.isOperatorNode(child) && child.fn === 'dotDivide') {
      return new math.FunctionNode('floor', [
        new math.OperatorNode('/', 'divide', child.args.map(arg => applyFloorDivision(arg))),
      ]);
    }
    return child;
  });
}

// Infinity would serialize as null and complex values as strings like "i"
export function checkMathResult(result: unknown): unknown {
  if (math.isComplex(result) || (typeof result === 'number' && Number.isNaN(result))) {
    throw new Error('math domain error');
  }
  if (typeof result === 'number' && !Number.isFinite(result)) {
    throw new Error('division by zero or overflow');
  }
  if (typeof result === 'number' || typeof result === 'boolean') {
    return result;
  }
  return math.format(result);
}

export function validateCalculationExpression(expression: string): void {
  if (!ALLOWED_EXPRESSION.test(expression)) {
    throw new Error('Expression contains forbidden characters');
  }
  for (const keyword of FORBIDDEN_CALCULATION_KEYWORDS) {
    if (expression.includes(keyword)) {
      throw new Error(`Expression contains forbidden keyword: ${keyword}`);
    }
  }
}

export const executeCalculation: ToolHandler<CalculationToolDescriptor> = async (_descriptor, parameters) => {
  const expression = typeof parameters.expression === 'string' ? parameters.expression.trim() : '';
  if (!expression) {
    throw new Error('Expression is required for calculations');
  }

  const parsedVariables = VariablesSchema.safeParse(parameters.variables ?? {});
  if (!parsedVariables.success) {
    throw new Error('Variables must be a map of numbers');
  }
  const variables = parsedVariables.data;

  // Validation happens before anything is parsed or evaluated
  validateCalculationExpression(expression);

  const allowedSymbols = new Set([...ALLOWED_FUNCTIONS, ...ALLOWED_CONSTANTS, ...Object.keys(variables)]);

  let result: unknown;
  try {
    const node = applyFloorDivision(parseRestricted(normalizeExpression(expression), { allowedSymbols }));
    result = checkMathResult(node.compile().evaluate({ ...variables }));
  } catch (error) {
    throw new Error(`Calculation error: ${error instanceof Error ? error.message : String(error)}`);
  }

  return {
    expression,
    result,
    variablesUsed: variables,
  };
};
