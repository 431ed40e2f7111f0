// Orchestrator Module - Main exports

export { ToolCallingOrchestrator, serializeResult } from './orchestrator.js';
export { TextToolOrchestrator, buildToolsPrompt, type TextToolRun } from './text-orchestrator.js';
export { parseToolArguments, parseTextDirective, type TextDirective } from './parser.js';
export { buildFallbackResponse, detectTopic, stableHash } from './fallback.js';
export type {
  AgentInvocationResult,
  ConversationMessage,
  GenerationOptions,
  InvocationMetadata,
  InvocationMode,
  OrchestratorRun,
  TextGenerationResult,
  ToolResultRecord,
} from './types.js';
