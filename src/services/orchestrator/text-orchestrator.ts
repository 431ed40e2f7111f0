// Text-Marker Orchestrator
// Tool loop for backends without native function calling. The model asks for a tool with
// <tool_call>{"tool_name": ..., "arguments": {...}}</tool_call> and answers with <final>...</final>.

import type { Provider } from '../../providers/types.js';
import { BackendUnavailableError } from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';
import type { ToolExecutor } from '../tools/executor.js';
import { DEFAULT_SCOPE, type ToolRegistry } from '../tools/registry.js';
import type { ToolDescriptor } from '../tools/types.js';
import { buildFallbackResponse } from './fallback.js';
import { serializeResult } from './orchestrator.js';
import { parseTextDirective } from './parser.js';
import type { GenerationOptions, TextGenerationResult, ToolResultRecord } from './types.js';

const log = logger.child({ module: 'text-orchestrator' });

const SYSTEM_INSTRUCTIONS =
  'You are a helpful assistant that can use tools. Decide whether a tool is needed. ' +
  'If so, emit a tool call. Otherwise, output the final answer.';

export function buildToolsPrompt(tools: ToolDescriptor[]): string {
  if (tools.length === 0) return '';
  const lines = [
    'You have access to the following tools. To call a tool, output exactly a JSON object wrapped in <tool_call> tags.',
    'Use this format: <tool_call>{"tool_name": "name", "arguments": { ... }}</tool_call>',
    'If you are ready to provide the final answer, wrap it in <final> ... </final>.',
    'Tools:',
  ];
  for (const tool of tools) {
    lines.push(`- name: ${tool.name}`);
    lines.push(`  description: ${tool.description}`);
    lines.push('  json_input_schema:');
    lines.push(JSON.stringify(tool.parameterSchema));
  }
  return lines.join('\n');
}

export interface TextToolRun extends GenerationOptions {
  prompt: string;
  clientId?: string;
  maxToolCalls: number;
}

export class TextToolOrchestrator {
  constructor(
    private provider: Provider,
    private registry: ToolRegistry,
    private executor: ToolExecutor,
  ) {}

  /**
   * Never rejects on model output: a reply without markers, or with an unparseable tool call,
   * is returned as raw text. Backend unavailability yields the fallback answer.
   */
  async generateWithTools(run: TextToolRun): Promise<TextGenerationResult> {
    const clientId = run.clientId ?? DEFAULT_SCOPE;
    const toolsUsed = new Set<string>();
    const toolResults: ToolResultRecord[] = [];
    const done = (text: string, fallback = false): TextGenerationResult => ({
      text,
      toolsUsed: Array.from(toolsUsed),
      toolResults,
      fallback,
    });

    let transcript =
      `System:\n${SYSTEM_INSTRUCTIONS}\n\n${buildToolsPrompt(this.registry.list(clientId))}\n\nUser:\n${run.prompt}\n`;

    try {
      for (let iteration = 1; iteration <= run.maxToolCalls; iteration++) {
        const directive = parseTextDirective(await this.complete(transcript, run));
        if (directive.type !== 'tool_call') {
          return done(directive.text);
        }

        const record = await this.executeCall(directive.toolName, directive.arguments, clientId);
        toolsUsed.add(record.tool);
        toolResults.push(record);

        const output = record.success ? serializeResult(record.result) : `Error: ${record.error}`;
        transcript +=
          `\nTool '${record.tool}' result:\n${output}\n` +
          'Now, based on the tool result, either call another tool or provide the final answer.\n';
      }

      const finalOutput = await this.complete(
        `${transcript}\nPlease provide the final answer wrapped in <final> ... </final>.`,
        run,
      );
      const directive = parseTextDirective(finalOutput);
      return done(directive.type === 'final' ? directive.text : finalOutput.trim());
    } catch (error) {
      if (error instanceof BackendUnavailableError) {
        log.warn({ error: error.message }, 'Model backend unavailable, answering in fallback mode');
        return done(buildFallbackResponse(run.prompt, this.provider.model), true);
      }
      throw error;
    }
  }

  private async complete(prompt: string, run: TextToolRun): Promise<string> {
    const response = await this.provider.sendChat([{ role: 'user', content: prompt }], {
      maxTokens: run.maxTokens,
      temperature: run.temperature,
      stop: run.stop,
    });
    return response.content;
  }

  private async executeCall(toolName: string, args: Record<string, unknown>, clientId: string): Promise<ToolResultRecord> {
    const tool = this.registry.get(toolName, clientId);
    if (!tool) {
      return { tool: toolName, arguments: args, success: false, error: `Tool '${toolName}' not found` };
    }
    const response = await this.executor.execute(tool, args);
    return response.success
      ? { tool: toolName, arguments: args, success: true, result: response.result }
      : { tool: toolName, arguments: args, success: false, error: response.errorMessage };
  }
}
