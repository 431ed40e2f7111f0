// Tool Registry - Holds tool descriptors, optionally namespaced per client
// Constructed once by the service bootstrap and passed to whoever needs it

import { z } from 'zod';
import { AppError } from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';
import { ApiConfigSchema, DatabaseConfigSchema, FunctionConfigSchema } from './schemas.js';
import { TOOL_KINDS } from './types.js';
import type { OpenAIFunctionTool, ToolDescriptor, ToolInfo } from './types.js';

export const DEFAULT_SCOPE = 'default';

const log = logger.child({ module: 'tool-registry' });

export class ToolRegistry {
  // Every method is synchronous, so a call never interleaves with another request's call.
  // Descriptors are copied on the way in and out; only updateConfig changes a stored one.
  private scopes: Map<string, Map<string, ToolDescriptor>> = new Map();

  register(tool: ToolDescriptor, clientId: string = DEFAULT_SCOPE): void {
    if (!TOOL_KINDS.includes(tool.kind)) {
      throw AppError.invalidToolKind(String(tool.kind), TOOL_KINDS);
    }

    const tools = this.scope(clientId, true);
    if (tools.has(tool.name)) {
      throw AppError.duplicateTool(tool.name, clientId);
    }

    tools.set(tool.name, structuredClone(tool));
    log.info({ tool: tool.name, kind: tool.kind, clientId }, 'Tool registered');
  }

  get(name: string, clientId: string = DEFAULT_SCOPE): ToolDescriptor | undefined {
    const tool = this.scope(clientId)?.get(name);
    return tool ? structuredClone(tool) : undefined;
  }

  has(name: string, clientId: string = DEFAULT_SCOPE): boolean {
    return this.scope(clientId)?.has(name) ?? false;
  }

  list(clientId: string = DEFAULT_SCOPE): ToolDescriptor[] {
    return Array.from(this.scope(clientId)?.values() ?? [], tool => structuredClone(tool));
  }

  remove(name: string, clientId: string = DEFAULT_SCOPE): boolean {
    const tools = this.scope(clientId);
    if (!tools) return false;

    const removed = tools.delete(name);
    if (tools.size === 0 && clientId !== DEFAULT_SCOPE) {
      this.scopes.delete(clientId);
    }
    if (removed) {
      log.info({ tool: name, clientId }, 'Tool removed');
    }
    return removed;
  }

  getInfo(name: string, clientId: string = DEFAULT_SCOPE): ToolInfo | undefined {
    const tool = this.get(name, clientId);
    if (!tool) return undefined;

    return {
      name: tool.name,
      description: tool.description,
      parameterSchema: tool.parameterSchema,
      kind: tool.kind,
      config: tool.config,
    };
  }

  /**
   * Merges `patch` into a tool's config. The kind never changes; the descriptor is
   * replaced rather than mutated so snapshots handed out earlier stay intact.
   */
  updateConfig(name: string, patch: Record<string, unknown>, clientId: string = DEFAULT_SCOPE): ToolDescriptor | undefined {
    const tools = this.scope(clientId);
    const tool = tools?.get(name);
    if (!tools || !tool) return undefined;

    const updated = mergeConfig(tool, patch);
    tools.set(name, updated);
    return structuredClone(updated);
  }

  toOpenAITools(names?: string[], clientId: string = DEFAULT_SCOPE): OpenAIFunctionTool[] {
    const tools = names
      ? names.map(n => this.get(n, clientId)).filter((t): t is ToolDescriptor => t !== undefined)
      : this.list(clientId);

    return tools.map(tool => ({
      type: 'function',
      function: {
        name: tool.name,
        description: tool.description,
        parameters: tool.parameterSchema,
      },
    }));
  }

  clients(): string[] {
    return Array.from(this.scopes.keys());
  }

  private scope(clientId: string, create: true): Map<string, ToolDescriptor>;
  private scope(clientId: string, create?: false): Map<string, ToolDescriptor> | undefined;
  private scope(clientId: string, create = false): Map<string, ToolDescriptor> | undefined {
    let tools = this.scopes.get(clientId);
    if (!tools && create) {
      tools = new Map();
      this.scopes.set(clientId, tools);
    }
    return tools;
  }
}

function mergeConfig(tool: ToolDescriptor, patch: Record<string, unknown>): ToolDescriptor {
  switch (tool.kind) {
    case 'api':
      return { ...tool, config: { ...tool.config, ...parsePatch(ApiConfigSchema.partial(), patch) } };
    case 'function':
      return { ...tool, config: { ...tool.config, ...parsePatch(FunctionConfigSchema.partial(), patch) } };
    case 'database':
      return { ...tool, config: { ...tool.config, ...parsePatch(DatabaseConfigSchema.partial(), patch) } };
    case 'calculation':
      return tool;
  }
}

function parsePatch<T extends z.ZodTypeAny>(schema: T, patch: Record<string, unknown>): z.infer<T> {
  const parsed = schema.safeParse(patch);
  if (!parsed.success) {
    throw AppError.validationError('Invalid tool config', parsed.error.issues);
  }
  return parsed.data;
}
