// Workflow types

export type WorkflowContext = Record<string, unknown>;

interface StepBase {
  name?: string; // Defaults to step_<n>, 1-based
}

export interface ToolCallStep extends StepBase {
  type: 'tool_call';
  toolName: string;
  parameters: Record<string, unknown>; // May contain {{placeholders}} at any depth
}

export interface AgentCallStep extends StepBase {
  type: 'agent_call';
  agentName: string;
  promptTemplate: string;
}

export interface ConditionStep extends StepBase {
  type: 'condition';
  expression: string;
}

export type WorkflowStep = ToolCallStep | AgentCallStep | ConditionStep;

export type StepType = WorkflowStep['type'];

export type WorkflowStatus = 'defined' | 'running' | 'completed' | 'failed';

export type ExecutionStatus = 'running' | 'completed' | 'failed';

export interface StepResult {
  stepName: string;
  stepType: StepType;
  success: boolean;
  output?: Record<string, unknown>;
  error?: string;
  startTime: string;
  endTime: string;
}

export interface WorkflowExecution {
  executionId: string;
  workflowName: string;
  status: ExecutionStatus;
  steps: StepResult[];
  context: WorkflowContext;
  error?: string;
  startTime: string;
  endTime?: string;
}

export interface WorkflowDefinition {
  name: string;
  steps: WorkflowStep[];
  status: WorkflowStatus;
  createdAt: string;
}

export type WorkflowStatusInfo =
  | { name: string; status: WorkflowStatus; stepsCount: number; createdAt: string }
  | { name: string; status: 'not_found' };
