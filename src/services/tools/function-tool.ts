// Function Tool
// Executes caller-registered JavaScript through the worker sandbox.
// Disabled unless FUNCTION_TOOLS_ENABLED is set.

import type { FunctionToolDescriptor, ToolHandler, ToolParameters } from './types.js';
import { runInSandbox, type SandboxLimits } from './function-sandbox.js';

// Substring match, checked before the worker starts
export const FORBIDDEN_FUNCTION_KEYWORDS = [
  'eval',
  'Function',
  'require',
  'import',
  'process',
  'globalThis',
  'constructor',
  '__proto__',
  'prototype',
  'child_process',
  'Reflect',
  'Proxy',
  'WebAssembly',
  'SharedArrayBuffer',
  'Atomics',
] as const;

export interface FunctionToolOptions extends SandboxLimits {
  enabled: boolean;
}

export function checkFunctionSource(source: string): void {
  for (const keyword of FORBIDDEN_FUNCTION_KEYWORDS) {
    if (source.includes(keyword)) {
      throw new Error(`Forbidden keyword '${keyword}' found in function code`);
    }
  }
}

function functionParams(parameters: ToolParameters): Record<string, unknown> {
  const explicit = parameters.functionParams;
  if (typeof explicit === 'object' && explicit !== null && !Array.isArray(explicit)) {
    return { ...explicit };
  }
  return { ...parameters };
}

export function createFunctionHandler(options: FunctionToolOptions): ToolHandler<FunctionToolDescriptor> {
  return async (descriptor, parameters) => {
    if (!options.enabled) {
      throw new Error('Function tools are disabled on this server');
    }

    const source = descriptor.config.source;
    if (!source) {
      throw new Error('No function code provided in tool configuration');
    }
    checkFunctionSource(source);

    const params = functionParams(parameters);
    try {
      const result = await runInSandbox(
        { source, entry: descriptor.config.entry || 'main', params },
        { timeoutMs: options.timeoutMs, memoryMb: options.memoryMb },
      );
      return {
        functionExecuted: true,
        result,
        functionParams: params,
      };
    } catch (error) {
      throw new Error(`Function execution error: ${error instanceof Error ? error.message : String(error)}`);
    }
  };
}
