// Workflow Manager
// Stores workflow definitions and runs their steps in order against a shared context.
// A run stops at the first failing step; finished runs are appended to an in-memory history.

import { randomUUID } from 'node:crypto';
import { AppError, errorMessage } from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';
import type { AgentInvoker } from '../agents/agent-service.js';
import type { ToolExecutor } from '../tools/executor.js';
import { DEFAULT_SCOPE, type ToolRegistry } from '../tools/registry.js';
import { evaluateCondition } from './condition.js';
import { renderTemplate, resolveTemplate } from './template.js';
import type {
  AgentCallStep,
  ConditionStep,
  StepResult,
  ToolCallStep,
  WorkflowContext,
  WorkflowDefinition,
  WorkflowExecution,
  WorkflowStatusInfo,
  WorkflowStep,
} from './types.js';

const log = logger.child({ module: 'workflow-manager' });

export interface WorkflowManagerOptions {
  tools: ToolRegistry;
  executor: ToolExecutor;
  agents?: AgentInvoker; // Without it, agent_call steps fail
  clientId?: string; // Tool scope for tool_call steps
}

type StepOutcome = { success: true; output: Record<string, unknown> } | { success: false; error: string };

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export class WorkflowManager {
  private workflows: Map<string, WorkflowDefinition> = new Map();
  private history: WorkflowExecution[] = [];
  private tools: ToolRegistry;
  private executor: ToolExecutor;
  private agents?: AgentInvoker;
  private clientId: string;

  constructor(options: WorkflowManagerOptions) {
    this.tools = options.tools;
    this.executor = options.executor;
    this.agents = options.agents;
    this.clientId = options.clientId ?? DEFAULT_SCOPE;
  }

  defineWorkflow(name: string, steps: WorkflowStep[]): WorkflowDefinition {
    const definition: WorkflowDefinition = {
      name,
      steps: steps.map(step => ({ ...step })),
      status: 'defined',
      createdAt: new Date().toISOString(),
    };
    if (this.workflows.has(name)) {
      log.info({ workflow: name }, 'Replacing existing workflow definition');
    }
    this.workflows.set(name, definition);
    log.info({ workflow: name, steps: steps.length }, 'Workflow defined');
    return structuredClone(definition);
  }

  getWorkflow(name: string): WorkflowDefinition | undefined {
    const definition = this.workflows.get(name);
    return definition ? structuredClone(definition) : undefined;
  }

  getWorkflowStatus(name: string): WorkflowStatusInfo {
    const definition = this.workflows.get(name);
    if (!definition) {
      return { name, status: 'not_found' };
    }
    return {
      name,
      status: definition.status,
      stepsCount: definition.steps.length,
      createdAt: definition.createdAt,
    };
  }

  listWorkflows(): WorkflowDefinition[] {
    return Array.from(this.workflows.values(), definition => structuredClone(definition));
  }

  /** Copies of finished runs, oldest first, optionally filtered by workflow name. */
  getExecutionHistory(name?: string): WorkflowExecution[] {
    return this.history
      .filter(execution => name === undefined || execution.workflowName === name)
      .map(execution => structuredClone(execution));
  }

  async executeWorkflow(name: string, context: WorkflowContext = {}): Promise<WorkflowExecution> {
    const definition = this.workflows.get(name);
    if (!definition) {
      throw AppError.workflowNotFound(name);
    }

    const execution: WorkflowExecution = {
      executionId: randomUUID(),
      workflowName: name,
      status: 'running',
      steps: [],
      context: structuredClone(context),
      startTime: new Date().toISOString(),
    };
    definition.status = 'running';
    log.info({ workflow: name, executionId: execution.executionId }, 'Workflow started');

    for (const [index, step] of definition.steps.entries()) {
      const stepName = step.name ?? `step_${index + 1}`;
      const startTime = new Date().toISOString();
      const outcome = await this.runStep(step, execution.context);
      const endTime = new Date().toISOString();

      if (!outcome.success) {
        execution.steps.push({ stepName, stepType: step.type, success: false, error: outcome.error, startTime, endTime });
        execution.status = 'failed';
        execution.error = `Step '${stepName}' failed: ${outcome.error}`;
        log.warn({ workflow: name, step: stepName, error: outcome.error }, 'Workflow step failed');
        break;
      }

      const result: StepResult = { stepName, stepType: step.type, success: true, output: outcome.output, startTime, endTime };
      execution.steps.push(result);
      Object.assign(execution.context, outcome.output);
      if (step.name) {
        execution.context[step.name] = outcome.output;
      }
    }

    if (execution.status === 'running') {
      execution.status = 'completed';
    }
    execution.endTime = new Date().toISOString();
    definition.status = execution.status;
    this.history.push(execution);

    log.info({ workflow: name, executionId: execution.executionId, status: execution.status }, 'Workflow finished');
    return structuredClone(execution);
  }

  private async runStep(step: WorkflowStep, context: WorkflowContext): Promise<StepOutcome> {
    try {
      switch (step.type) {
        case 'tool_call':
          return await this.runToolStep(step, context);
        case 'agent_call':
          return await this.runAgentStep(step, context);
        case 'condition':
          return this.runConditionStep(step, context);
      }
    } catch (error) {
      return { success: false, error: errorMessage(error) };
    }
  }

  private async runToolStep(step: ToolCallStep, context: WorkflowContext): Promise<StepOutcome> {
    const tool = this.tools.get(step.toolName, this.clientId);
    if (!tool) {
      return { success: false, error: `Tool '${step.toolName}' not found` };
    }

    const resolved = resolveTemplate(step.parameters, context);
    const parameters = isRecord(resolved) ? resolved : {};
    const response = await this.executor.execute(tool, parameters);
    if (!response.success) {
      return { success: false, error: response.errorMessage };
    }
    return { success: true, output: isRecord(response.result) ? response.result : { result: response.result } };
  }

  private async runAgentStep(step: AgentCallStep, context: WorkflowContext): Promise<StepOutcome> {
    if (!this.agents) {
      return { success: false, error: 'No agent service is attached to the workflow manager' };
    }

    const result = await this.agents.invokeAgent(step.agentName, { prompt: renderTemplate(step.promptTemplate, context) });
    if (result.metadata.mode === 'error') {
      return { success: false, error: result.metadata.error ?? result.text };
    }
    return { success: true, output: { agentResponse: result.text, toolsUsed: result.toolsUsed } };
  }

  private runConditionStep(step: ConditionStep, context: WorkflowContext): StepOutcome {
    return { success: true, output: { conditionResult: evaluateCondition(step.expression, context) } };
  }
}
