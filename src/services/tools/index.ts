// Tool System Initialization
// Registers the built-in tools into a registry owned by the service bootstrap

import { logger } from '../../utils/logger.js';
import type { ToolRegistry } from './registry.js';
import type { CalculationToolDescriptor, DatabaseToolDescriptor } from './types.js';

export { ToolRegistry, DEFAULT_SCOPE } from './registry.js';
export { ToolExecutor, executeRequest, type ToolExecutorOptions } from './executor.js';
export { parseToolDescriptor, ToolDescriptorSchema } from './schemas.js';
export type {
  ExecuteOptions,
  OpenAIFunctionTool,
  ToolDescriptor,
  ToolInfo,
  ToolKind,
  ToolParameters,
  ToolRequest,
  ToolResponse,
} from './types.js';

const log = logger.child({ module: 'tools' });

export const calculatorTool: CalculationToolDescriptor = {
  name: 'calculator',
  description:
    'Evaluate an arithmetic expression. Supports + - * / ( ), ** for powers, // for floor division, functions such as sqrt, abs, round, log, sin, cos and the constants pi and e (optionally written math.sqrt, math.pi). Named numeric variables can be passed in "variables".',
  kind: 'calculation',
  parameterSchema: {
    type: 'object',
    properties: {
      expression: { type: 'string', description: 'Expression to evaluate, e.g. "(2 + 3) * x"' },
      variables: { type: 'object', description: 'Numeric values for names used in the expression' },
    },
    required: ['expression'],
  },
  config: {},
};

export const sqlQueryTool: DatabaseToolDescriptor = {
  name: 'sql_query',
  description: 'Run one parameterized SQL statement against the service database. Use ? (SQLite) or $1 (PostgreSQL) placeholders.',
  kind: 'database',
  parameterSchema: {
    type: 'object',
    properties: {
      query: { type: 'string', description: 'SQL statement' },
      params: { type: 'array', description: 'Positional parameters' },
    },
    required: ['query'],
  },
  config: {},
};

export interface BuiltinToolOptions {
  toolsEnabled: boolean;
  databaseUrl: string;
}

export function initializeTools(registry: ToolRegistry, options: BuiltinToolOptions): void {
  if (!options.toolsEnabled) {
    log.info('Tools disabled, no built-in tools registered');
    return;
  }

  registry.register(calculatorTool);

  // An in-memory SQLite database is discarded after every call, so it is not worth advertising
  if (options.databaseUrl && !options.databaseUrl.includes(':memory:')) {
    registry.register(sqlQueryTool);
  }

  const names = registry.list().map(t => t.name);
  log.info({ tools: names }, `Tool system initialized with ${names.length} tool(s)`);
}
