// Agent Service
// Entry point for agent invocation and plain generation against the chat backend

import type { Provider } from '../../providers/types.js';
import { AppError, BackendUnavailableError } from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';
import type { ToolExecutor } from '../tools/executor.js';
import type { ToolRegistry } from '../tools/registry.js';
import { buildFallbackResponse } from '../orchestrator/fallback.js';
import { ToolCallingOrchestrator } from '../orchestrator/orchestrator.js';
import { TextToolOrchestrator, type TextToolRun } from '../orchestrator/text-orchestrator.js';
import type { AgentInvocationResult, GenerationOptions, OrchestratorRun, TextGenerationResult } from '../orchestrator/types.js';
import type { AgentRegistry } from './registry.js';
import type { InvokeAgentOptions } from './types.js';

const log = logger.child({ module: 'agent-service' });

export const DEFAULT_MAX_TOKENS = 1024;
export const DEFAULT_TEMPERATURE = 0.7;

export interface AgentServiceOptions {
  provider: Provider;
  agents: AgentRegistry;
  tools: ToolRegistry;
  executor: ToolExecutor;
  defaultMaxToolCalls?: number;
  toolsEnabled?: boolean;
}

export interface GenerationResult {
  text: string;
  model: string;
  fallback: boolean;
}

/** The part of the service a workflow's agent steps depend on. */
export interface AgentInvoker {
  invokeAgent(agentName: string, options: InvokeAgentOptions): Promise<AgentInvocationResult>;
}

export class AgentService implements AgentInvoker {
  private provider: Provider;
  private agents: AgentRegistry;
  private orchestrator: ToolCallingOrchestrator;
  private textOrchestrator: TextToolOrchestrator;
  private defaultMaxToolCalls: number;
  private toolsEnabled: boolean;

  constructor(options: AgentServiceOptions) {
    this.provider = options.provider;
    this.agents = options.agents;
    this.orchestrator = new ToolCallingOrchestrator(options.provider, options.tools, options.executor);
    this.textOrchestrator = new TextToolOrchestrator(options.provider, options.tools, options.executor);
    this.defaultMaxToolCalls = options.defaultMaxToolCalls ?? 3;
    this.toolsEnabled = options.toolsEnabled ?? true;
  }

  /**
   * Invokes a registered agent. Throws AGENT_NOT_FOUND for an unknown name; backend
   * failures never throw and are reported through `metadata.mode`.
   */
  async invokeAgent(agentName: string, options: InvokeAgentOptions): Promise<AgentInvocationResult> {
    const agent = this.agents.get(agentName);
    if (!agent) {
      throw AppError.agentNotFound(agentName);
    }

    const toolNames = options.toolsForUse
      ? agent.tools.filter(t => options.toolsForUse?.includes(t))
      : agent.tools;
    const useTools = (options.useTools ?? true) && this.toolsEnabled && toolNames.length > 0;

    const run: OrchestratorRun = {
      agentName,
      systemPrompt: agent.rolePrompt,
      prompt: options.prompt,
      maxTokens: options.maxTokens ?? DEFAULT_MAX_TOKENS,
      temperature: options.temperature ?? DEFAULT_TEMPERATURE,
      stop: options.stop,
      maxToolCalls: options.maxToolCalls ?? this.defaultMaxToolCalls,
      toolNames,
    };

    log.info({ agent: agentName, useTools, tools: toolNames, maxToolCalls: run.maxToolCalls }, 'Invoking agent');
    const result = useTools ? await this.orchestrator.run(run) : await this.orchestrator.runBasic(run);

    if (options.sessionId) {
      result.metadata.sessionId = options.sessionId;
    }
    return result;
  }

  /** One user message, no tools. Backend unavailability yields the fallback answer. */
  async generate(prompt: string, options: Partial<GenerationOptions> = {}): Promise<GenerationResult> {
    try {
      const response = await this.provider.sendChat([{ role: 'user', content: prompt }], {
        maxTokens: options.maxTokens ?? DEFAULT_MAX_TOKENS,
        temperature: options.temperature ?? DEFAULT_TEMPERATURE,
        stop: options.stop,
      });
      return { text: response.content, model: this.provider.model, fallback: false };
    } catch (error) {
      if (error instanceof BackendUnavailableError) {
        log.warn({ error: error.message }, 'Model backend unavailable, answering in fallback mode');
        return { text: buildFallbackResponse(prompt, this.provider.model), model: this.provider.model, fallback: true };
      }
      throw error;
    }
  }

  generateWithTools(
    run: Pick<TextToolRun, 'prompt' | 'clientId'> & Partial<Omit<TextToolRun, 'prompt' | 'clientId'>>,
  ): Promise<TextGenerationResult> {
    return this.textOrchestrator.generateWithTools({
      prompt: run.prompt,
      clientId: run.clientId,
      maxToolCalls: run.maxToolCalls ?? this.defaultMaxToolCalls,
      maxTokens: run.maxTokens ?? DEFAULT_MAX_TOKENS,
      temperature: run.temperature ?? DEFAULT_TEMPERATURE,
      stop: run.stop,
    });
  }
}
