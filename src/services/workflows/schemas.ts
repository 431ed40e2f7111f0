// Zod schemas for workflow definitions

import { z } from 'zod';

const stepName = z.string().min(1).max(128).optional();

export const ToolCallStepSchema = z.object({
  type: z.literal('tool_call'),
  name: stepName,
  toolName: z.string().min(1),
  parameters: z.record(z.unknown()).default({}),
});

export const AgentCallStepSchema = z.object({
  type: z.literal('agent_call'),
  name: stepName,
  agentName: z.string().min(1),
  promptTemplate: z.string().min(1),
});

export const ConditionStepSchema = z.object({
  type: z.literal('condition'),
  name: stepName,
  expression: z.string().min(1),
});

export const WorkflowStepSchema = z.discriminatedUnion('type', [
  ToolCallStepSchema,
  AgentCallStepSchema,
  ConditionStepSchema,
]);

export const DefineWorkflowSchema = z.object({
  name: z.string().min(1).max(128),
  steps: z.array(WorkflowStepSchema).min(1),
});
