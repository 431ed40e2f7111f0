// Provider Interface for the Toolflow API
// Common interface for OpenAI-compatible chat completion backends

export interface ToolCall {
  id: string;
  name: string;
  arguments: string; // JSON string
}

export interface ProviderTool {
  type: 'function';
  function: {
    name: string;
    description: string;
    parameters: Record<string, unknown>;
  };
}

export interface ProviderMessage {
  role: 'user' | 'assistant' | 'system' | 'tool';
  content: string;
  tool_calls?: ToolCall[]; // For assistant messages with tool calls
  tool_call_id?: string; // For tool result messages
  name?: string; // Tool name for tool messages
}

export interface ProviderOptions {
  maxTokens?: number;
  temperature?: number;
  stop?: string[];
  tools?: ProviderTool[];
  tool_choice?: 'auto' | 'none';
}

export interface ProviderUsage {
  promptTokens: number;
  completionTokens: number;
  totalTokens: number;
}

export interface ProviderResponse {
  content: string;
  toolCalls: ToolCall[];
  finishReason?: 'stop' | 'tool_calls' | 'length';
  usage: ProviderUsage;
}

export interface Provider {
  name: string;
  model: string;
  /**
   * Sends one chat completion request.
   * Rejects with BackendUnavailableError when the server cannot be reached or times out.
   */
  sendChat(messages: ProviderMessage[], options: ProviderOptions): Promise<ProviderResponse>;
}
