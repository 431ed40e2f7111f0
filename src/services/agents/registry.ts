// Agent Registry
// Named agents and the tools assigned to them; every assigned tool must already be registered

import { AppError } from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';
import type { ToolRegistry } from '../tools/registry.js';
import type { AgentDefinition } from './types.js';

const log = logger.child({ module: 'agent-registry' });

export class AgentRegistry {
  private agents: Map<string, AgentDefinition> = new Map();

  constructor(private tools: ToolRegistry) {}

  register(agent: AgentDefinition): AgentDefinition {
    if (this.agents.has(agent.name)) {
      throw AppError.duplicateAgent(agent.name);
    }
    this.assertToolsExist(agent.tools);

    const stored = { ...agent, tools: dedupe(agent.tools) };
    this.agents.set(agent.name, stored);
    log.info({ agent: agent.name, tools: stored.tools }, 'Agent registered');
    return { ...stored, tools: [...stored.tools] };
  }

  get(name: string): AgentDefinition | undefined {
    const agent = this.agents.get(name);
    return agent ? { ...agent, tools: [...agent.tools] } : undefined;
  }

  list(): AgentDefinition[] {
    return Array.from(this.agents.values(), agent => ({ ...agent, tools: [...agent.tools] }));
  }

  remove(name: string): boolean {
    const removed = this.agents.delete(name);
    if (removed) log.info({ agent: name }, 'Agent removed');
    return removed;
  }

  /** Replaces the agent's tool list. */
  assignTools(name: string, toolNames: string[]): AgentDefinition {
    const agent = this.agents.get(name);
    if (!agent) {
      throw AppError.agentNotFound(name);
    }
    this.assertToolsExist(toolNames);

    const updated = { ...agent, tools: dedupe(toolNames) };
    this.agents.set(name, updated);
    log.info({ agent: name, tools: updated.tools }, 'Agent tools assigned');
    return { ...updated, tools: [...updated.tools] };
  }

  private assertToolsExist(toolNames: string[]): void {
    const missing = toolNames.filter(t => !this.tools.has(t));
    if (missing.length > 0) {
      throw AppError.badRequest(`Unknown tool(s): ${missing.join(', ')}`, { missing });
    }
  }
}

function dedupe(names: string[]): string[] {
  return Array.from(new Set(names));
}
