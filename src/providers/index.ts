// Provider factory
// Builds the chat backend the orchestration layer talks to

import { env } from '../env.js';
import { OpenAICompatibleProvider } from './openai-compatible.js';
import type { Provider } from './types.js';

export function createProvider(overrides: Partial<{ baseUrl: string; apiKey: string; model: string; timeoutMs: number }> = {}): Provider {
  return new OpenAICompatibleProvider({
    baseUrl: overrides.baseUrl ?? env.LLM_BASE_URL,
    apiKey: overrides.apiKey ?? env.LLM_API_KEY,
    model: overrides.model ?? env.LLM_MODEL,
    timeoutMs: overrides.timeoutMs ?? env.LLM_TIMEOUT_MS,
  });
}

export { OpenAICompatibleProvider } from './openai-compatible.js';
export type {
  Provider,
  ProviderMessage,
  ProviderOptions,
  ProviderResponse,
  ProviderTool,
  ToolCall,
} from './types.js';
