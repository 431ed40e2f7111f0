// Tool-Calling Orchestrator
// Drives a bounded conversation between the chat backend and the tool executor

import type { Provider, ProviderMessage, ProviderOptions, ToolCall } from '../../providers/types.js';
import { BackendUnavailableError, errorMessage } from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';
import type { ToolExecutor } from '../tools/executor.js';
import { DEFAULT_SCOPE, type ToolRegistry } from '../tools/registry.js';
import type { ToolDescriptor } from '../tools/types.js';
import { buildFallbackResponse } from './fallback.js';
import { parseToolArguments } from './parser.js';
import type { AgentInvocationResult, OrchestratorRun, ToolResultRecord } from './types.js';

const log = logger.child({ module: 'orchestrator' });

export class ToolCallingOrchestrator {
  constructor(
    private provider: Provider,
    private registry: ToolRegistry,
    private executor: ToolExecutor,
  ) {}

  /**
   * Runs up to `maxToolCalls` tool-requesting turns. When the budget is spent while the model
   * still asks for tools, one last completion is requested without tools, so the backend sees
   * at most `maxToolCalls + 1` calls. A budget of zero is a basic run.
   */
  async run(request: OrchestratorRun): Promise<AgentInvocationResult> {
    if (request.maxToolCalls <= 0) {
      return this.runBasic(request);
    }

    const clientId = request.clientId ?? DEFAULT_SCOPE;
    const available = this.resolveTools(request.toolNames, clientId);
    const tools = this.registry.toOpenAITools(Array.from(available.keys()), clientId);
    const toolsAvailable = Array.from(available.keys());

    const messages: ProviderMessage[] = [
      { role: 'system', content: request.systemPrompt },
      { role: 'user', content: request.prompt },
    ];
    const used = new Set<string>();
    const toolResults: ToolResultRecord[] = [];

    const baseOptions: ProviderOptions = {
      maxTokens: request.maxTokens,
      temperature: request.temperature,
      stop: request.stop,
    };

    const partial = () => ({ toolsUsed: Array.from(used), toolResults });

    try {
      for (let iteration = 1; iteration <= request.maxToolCalls; iteration++) {
        log.debug({ agent: request.agentName, iteration, max: request.maxToolCalls }, 'Function calling iteration');

        const response = await this.provider.sendChat(messages, {
          ...baseOptions,
          tools: tools.length > 0 ? tools : undefined,
          tool_choice: tools.length > 0 ? 'auto' : undefined,
        });

        if (response.toolCalls.length === 0) {
          return {
            text: response.content,
            ...partial(),
            metadata: {
              agentName: request.agentName,
              mode: 'function_calling',
              iterations: iteration,
              toolsAvailable,
            },
          };
        }

        messages.push({ role: 'assistant', content: response.content, tool_calls: response.toolCalls });

        for (const call of response.toolCalls) {
          const record = await this.executeCall(call, available);
          used.add(record.tool);
          toolResults.push(record);
          messages.push({
            role: 'tool',
            tool_call_id: call.id,
            name: call.name,
            content: record.success ? serializeResult(record.result) : `Error: ${record.error}`,
          });
        }
      }

      log.info({ agent: request.agentName, maxToolCalls: request.maxToolCalls }, 'Tool budget exhausted, requesting final answer');
      const final = await this.provider.sendChat(messages, baseOptions);
      return {
        text: final.content,
        ...partial(),
        metadata: {
          agentName: request.agentName,
          mode: 'function_calling',
          iterations: request.maxToolCalls,
          toolsAvailable,
          status: 'max_iterations_reached',
        },
      };
    } catch (error) {
      return this.recover(error, request, partial());
    }
  }

  /** Single backend call with a system and a user message, no tools advertised. */
  async runBasic(request: OrchestratorRun): Promise<AgentInvocationResult> {
    try {
      const response = await this.provider.sendChat(
        [
          { role: 'system', content: request.systemPrompt },
          { role: 'user', content: request.prompt },
        ],
        { maxTokens: request.maxTokens, temperature: request.temperature, stop: request.stop },
      );
      return {
        text: response.content,
        toolsUsed: [],
        toolResults: [],
        metadata: { agentName: request.agentName, mode: 'basic' },
      };
    } catch (error) {
      return this.recover(error, request, { toolsUsed: [], toolResults: [] });
    }
  }

  private resolveTools(names: string[], clientId: string): Map<string, ToolDescriptor> {
    const available = new Map<string, ToolDescriptor>();
    for (const name of names) {
      const tool = this.registry.get(name, clientId);
      if (tool) {
        available.set(name, tool);
      } else {
        log.warn({ tool: name, clientId }, 'Assigned tool is not registered, not advertising it');
      }
    }
    return available;
  }

  private async executeCall(call: ToolCall, available: Map<string, ToolDescriptor>): Promise<ToolResultRecord> {
    const args = parseToolArguments(call.arguments);
    const tool = available.get(call.name);
    if (!tool) {
      return { tool: call.name, arguments: args, success: false, error: `Tool '${call.name}' not found` };
    }

    const response = await this.executor.execute(tool, args);
    return response.success
      ? { tool: call.name, arguments: args, success: true, result: response.result }
      : { tool: call.name, arguments: args, success: false, error: response.errorMessage };
  }

  private recover(
    error: unknown,
    request: OrchestratorRun,
    gathered: Pick<AgentInvocationResult, 'toolsUsed' | 'toolResults'>,
  ): AgentInvocationResult {
    const message = errorMessage(error);

    if (error instanceof BackendUnavailableError) {
      log.warn({ agent: request.agentName, error: message }, 'Model backend unavailable, answering in fallback mode');
      return {
        text: buildFallbackResponse(request.prompt, this.provider.model),
        ...gathered,
        metadata: { agentName: request.agentName, mode: 'fallback', error: message },
      };
    }

    log.error({ agent: request.agentName, error: message }, 'Agent invocation failed');
    return {
      text: `Agent invocation failed: ${message}`,
      ...gathered,
      metadata: { agentName: request.agentName, mode: 'error', error: message },
    };
  }
}

export function serializeResult(result: unknown): string {
  if (result === null || result === undefined) return '';
  if (typeof result === 'string') return result;
  return JSON.stringify(result);
}
