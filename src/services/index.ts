// Service bootstrap
// Builds the registries and engines once per process and hands them to the routes

import { env } from '../env.js';
import { createProvider } from '../providers/index.js';
import type { Provider } from '../providers/types.js';
import { AgentRegistry, AgentService } from './agents/index.js';
import { ToolExecutor, ToolRegistry, initializeTools, type ToolExecutorOptions } from './tools/index.js';
import { WorkflowManager } from './workflows/index.js';

export interface Services {
  provider: Provider;
  tools: ToolRegistry;
  executor: ToolExecutor;
  agents: AgentRegistry;
  agentService: AgentService;
  workflows: WorkflowManager;
}

export interface ServiceOverrides {
  provider?: Provider;
  executor?: Partial<ToolExecutorOptions>;
  registerBuiltinTools?: boolean;
}

export function createServices(overrides: ServiceOverrides = {}): Services {
  const provider = overrides.provider ?? createProvider();
  const tools = new ToolRegistry();
  const executor = new ToolExecutor({
    databaseUrl: env.DATABASE_URL,
    functionToolsEnabled: env.FUNCTION_TOOLS_ENABLED,
    functionTimeoutMs: env.FUNCTION_TIMEOUT_MS,
    functionMemoryMb: env.FUNCTION_MEMORY_MB,
    ...overrides.executor,
  });
  const agents = new AgentRegistry(tools);
  const agentService = new AgentService({
    provider,
    agents,
    tools,
    executor,
    defaultMaxToolCalls: env.DEFAULT_MAX_TOOL_CALLS,
    toolsEnabled: env.TOOLS_ENABLED,
  });
  const workflows = new WorkflowManager({ tools, executor, agents: agentService });

  if (overrides.registerBuiltinTools ?? true) {
    initializeTools(tools, { toolsEnabled: env.TOOLS_ENABLED, databaseUrl: env.DATABASE_URL });
  }

  return { provider, tools, executor, agents, agentService, workflows };
}
