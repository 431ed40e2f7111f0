// Orchestrator Types

import type { ProviderMessage } from '../../providers/types.js';

export type ConversationMessage = ProviderMessage;

export interface ToolResultRecord {
  tool: string;
  arguments: Record<string, unknown>;
  success: boolean;
  result?: unknown;
  error?: string;
}

export type InvocationMode = 'basic' | 'function_calling' | 'fallback' | 'error';

export interface InvocationMetadata {
  agentName: string;
  mode: InvocationMode;
  iterations?: number;
  toolsAvailable?: string[];
  status?: 'max_iterations_reached';
  sessionId?: string;
  error?: string;
}

export interface AgentInvocationResult {
  text: string;
  toolsUsed: string[]; // Deduplicated, in order of first use
  toolResults: ToolResultRecord[];
  metadata: InvocationMetadata;
}

export interface GenerationOptions {
  maxTokens: number;
  temperature: number;
  stop?: string[];
}

export interface OrchestratorRun extends GenerationOptions {
  agentName: string;
  systemPrompt: string;
  prompt: string;
  maxToolCalls: number;
  clientId?: string;
  toolNames: string[];
}

export interface TextGenerationResult {
  text: string;
  toolsUsed: string[];
  toolResults: ToolResultRecord[];
  fallback: boolean;
}
