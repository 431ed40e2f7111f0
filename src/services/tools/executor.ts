// Tool Executor
// Dispatches a descriptor to the handler for its kind and folds every outcome into a ToolResponse

import { errorMessage } from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';
import { executeApiCall } from './api-tool.js';
import { executeCalculation } from './calculation-tool.js';
import { createDatabaseHandler } from './database-tool.js';
import { createFunctionHandler } from './function-tool.js';
import { DEFAULT_SCOPE, type ToolRegistry } from './registry.js';
import type {
  DatabaseToolDescriptor,
  ExecuteOptions,
  FunctionToolDescriptor,
  ToolDescriptor,
  ToolHandler,
  ToolParameters,
  ToolRequest,
  ToolResponse,
} from './types.js';

const log = logger.child({ module: 'tool-executor' });

export interface ToolExecutorOptions {
  databaseUrl: string;
  functionToolsEnabled: boolean;
  functionTimeoutMs: number;
  functionMemoryMb: number;
}

export class ToolExecutor {
  private runFunction: ToolHandler<FunctionToolDescriptor>;
  private runDatabase: ToolHandler<DatabaseToolDescriptor>;

  constructor(options: ToolExecutorOptions) {
    this.runFunction = createFunctionHandler({
      enabled: options.functionToolsEnabled,
      timeoutMs: options.functionTimeoutMs,
      memoryMb: options.functionMemoryMb,
    });
    this.runDatabase = createDatabaseHandler(options.databaseUrl);
  }

  /**
   * Runs one tool. Never rejects: validation, handler and transport failures
   * all come back as `{ success: false, errorMessage }`.
   */
  async execute(descriptor: ToolDescriptor, parameters: ToolParameters, options: ExecuteOptions = {}): Promise<ToolResponse> {
    const startTime = Date.now();

    try {
      const missing = missingParameter(descriptor, parameters);
      if (missing !== undefined) {
        throw new Error(`Invalid parameters provided: missing ${missing}`);
      }

      const result = await this.dispatch(descriptor, parameters, options);
      const executionTimeMs = Date.now() - startTime;
      log.debug({ tool: descriptor.name, kind: descriptor.kind, executionTimeMs }, 'Tool executed');
      return { success: true, result, executionTimeMs };
    } catch (error) {
      const executionTimeMs = Date.now() - startTime;
      const message = errorMessage(error);
      log.warn({ tool: descriptor.name, kind: descriptor.kind, executionTimeMs, error: message }, 'Tool failed');
      return { success: false, errorMessage: message, executionTimeMs };
    }
  }

  private dispatch(descriptor: ToolDescriptor, parameters: ToolParameters, options: ExecuteOptions): Promise<unknown> {
    switch (descriptor.kind) {
      case 'api':
        return executeApiCall(descriptor, parameters, options);
      case 'calculation':
        return executeCalculation(descriptor, parameters, options);
      case 'function':
        return this.runFunction(descriptor, parameters, options);
      case 'database':
        return this.runDatabase(descriptor, parameters, options);
      default:
        return Promise.reject(new Error(`Unknown tool kind: ${unknownKind(descriptor)}`));
    }
  }
}

function missingParameter(descriptor: ToolDescriptor, parameters: ToolParameters): string | undefined {
  const required = descriptor.parameterSchema.required ?? [];
  return required.find(key => !(key in parameters));
}

// Reachable only when an untyped descriptor slips past registration
function unknownKind(descriptor: never): string {
  const value: unknown = descriptor;
  if (typeof value === 'object' && value !== null && 'kind' in value) {
    return String(value.kind);
  }
  return 'undefined';
}

/**
 * Looks up `request.toolName` in the given scope and executes it.
 * A missing tool is reported as a failed response, not thrown.
 */
export async function executeRequest(
  registry: ToolRegistry,
  executor: ToolExecutor,
  request: ToolRequest,
  clientId: string = DEFAULT_SCOPE,
  options: ExecuteOptions = {},
): Promise<ToolResponse> {
  const descriptor = registry.get(request.toolName, clientId);
  if (!descriptor) {
    return { success: false, errorMessage: `Tool '${request.toolName}' not found`, executionTimeMs: 0 };
  }
  return executor.execute(descriptor, request.parameters, options);
}
