// Condition evaluation
// Boolean expressions over the numeric and boolean bindings of a workflow context

import {
  ALLOWED_CONSTANTS,
  ALLOWED_FUNCTIONS,
  parseRestricted,
} from '../tools/calculation-tool.js';
import { renderTemplate } from './template.js';
import type { WorkflowContext } from './types.js';

const LITERALS = ['true', 'false'];

function conditionScope(context: WorkflowContext): Record<string, number | boolean> {
  const scope: Record<string, number | boolean> = {};
  for (const [key, value] of Object.entries(context)) {
    if (typeof value === 'number' || typeof value === 'boolean') {
      scope[key] = value;
    }
  }
  return scope;
}

/**
 * Evaluates `expression` (e.g. `score > 5 and approved`) after resolving any {{placeholders}}.
 * Identifiers must be top-level numeric or boolean context keys, whitelisted math functions or constants.
 */
export function evaluateCondition(expression: string, context: WorkflowContext): boolean {
  const rendered = renderTemplate(expression, context).trim();
  if (!rendered) {
    throw new Error('Condition expression is empty');
  }

  const scope = conditionScope(context);
  const allowedSymbols = new Set([...ALLOWED_FUNCTIONS, ...ALLOWED_CONSTANTS, ...LITERALS, ...Object.keys(scope)]);
  const node = parseRestricted(rendered, { allowedSymbols });
  const value: unknown = node.compile().evaluate({ ...scope });

  if (typeof value === 'boolean') return value;
  if (typeof value === 'number') return value !== 0;
  throw new Error(`Condition must evaluate to a boolean or number, got ${typeof value}`);
}
