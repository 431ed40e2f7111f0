// Agent types

export interface AgentDefinition {
  name: string;
  description: string;
  rolePrompt: string; // Sent as the system message
  tools: string[];
}

export interface InvokeAgentOptions {
  prompt: string;
  maxTokens?: number;
  temperature?: number;
  stop?: string[];
  useTools?: boolean;
  maxToolCalls?: number;
  toolsForUse?: string[]; // Narrows the agent's tools for this request
  sessionId?: string;
}
