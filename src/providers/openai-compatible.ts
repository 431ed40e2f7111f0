// OpenAI-Compatible Provider
// Talks to any chat completions endpoint speaking the OpenAI wire format (vLLM, LM Studio, OpenAI)

import OpenAI from 'openai';
import { BackendUnavailableError } from '../utils/errors.js';
import type { Provider, ProviderMessage, ProviderOptions, ProviderResponse, ToolCall } from './types.js';

export interface OpenAICompatibleConfig {
  baseUrl: string;
  apiKey: string;
  model: string;
  timeoutMs?: number;
}

function normalizeBaseUrl(baseUrl: string): string {
  const trimmed = baseUrl.replace(/\/+$/, '');
  return trimmed.endsWith('/v1') ? trimmed : `${trimmed}/v1`;
}

export class OpenAICompatibleProvider implements Provider {
  name = 'openai-compatible';
  readonly model: string;
  private client: OpenAI;

  constructor(config: OpenAICompatibleConfig) {
    this.model = config.model;
    this.client = new OpenAI({
      baseURL: normalizeBaseUrl(config.baseUrl),
      apiKey: config.apiKey || 'EMPTY',
      timeout: config.timeoutMs ?? 60000,
      maxRetries: 0, // Retry policy belongs to callers, not the loop
    });
  }

  async sendChat(messages: ProviderMessage[], options: ProviderOptions): Promise<ProviderResponse> {
    const params: OpenAI.ChatCompletionCreateParamsNonStreaming = {
      model: this.model,
      messages: messages.map(toOpenAIMessage),
      max_tokens: options.maxTokens,
      temperature: options.temperature,
      ...(options.stop && options.stop.length > 0 ? { stop: options.stop } : {}),
      ...(options.tools && options.tools.length > 0
        ? { tools: options.tools, tool_choice: options.tool_choice ?? 'auto' }
        : {}),
    };

    let completion: OpenAI.ChatCompletion;
    try {
      completion = await this.client.chat.completions.create(params);
    } catch (error) {
      if (error instanceof OpenAI.APIConnectionError) {
        // APIConnectionTimeoutError extends APIConnectionError
        throw new BackendUnavailableError(`Chat backend unavailable: ${error.message}`);
      }
      throw error;
    }

    const choice = completion.choices[0];
    if (!choice) {
      return { content: '', toolCalls: [], usage: toUsage(completion.usage) };
    }

    const toolCalls: ToolCall[] = (choice.message.tool_calls || []).map(tc => ({
      id: tc.id,
      name: tc.function.name,
      arguments: tc.function.arguments,
    }));

    return {
      content: choice.message.content || '',
      toolCalls,
      finishReason: choice.finish_reason === 'tool_calls'
        ? 'tool_calls'
        : choice.finish_reason === 'length' ? 'length' : 'stop',
      usage: toUsage(completion.usage),
    };
  }
}

function toOpenAIMessage(m: ProviderMessage): OpenAI.ChatCompletionMessageParam {
  if (m.role === 'tool') {
    return { role: 'tool', tool_call_id: m.tool_call_id || '', content: m.content };
  }
  if (m.role === 'assistant') {
    if (m.tool_calls && m.tool_calls.length > 0) {
      return {
        role: 'assistant',
        content: m.content || null,
        tool_calls: m.tool_calls.map(tc => ({
          id: tc.id,
          type: 'function' as const,
          function: { name: tc.name, arguments: tc.arguments },
        })),
      };
    }
    return { role: 'assistant', content: m.content };
  }
  if (m.role === 'system') {
    return { role: 'system', content: m.content };
  }
  return { role: 'user', content: m.content };
}

function toUsage(usage: OpenAI.ChatCompletion['usage']) {
  return {
    promptTokens: usage?.prompt_tokens || 0,
    completionTokens: usage?.completion_tokens || 0,
    totalTokens: usage?.total_tokens || 0,
  };
}
