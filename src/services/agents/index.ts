export { AgentRegistry } from './registry.js';
export {
  AgentService,
  DEFAULT_MAX_TOKENS,
  DEFAULT_TEMPERATURE,
  type AgentInvoker,
  type AgentServiceOptions,
  type GenerationResult,
} from './agent-service.js';
export type { AgentDefinition, InvokeAgentOptions } from './types.js';
