export { WorkflowManager, type WorkflowManagerOptions } from './workflow-manager.js';
export { DefineWorkflowSchema, WorkflowStepSchema } from './schemas.js';
export { evaluateCondition } from './condition.js';
export { lookupPath, parsePath, renderTemplate, resolveTemplate } from './template.js';
export type {
  StepResult,
  WorkflowContext,
  WorkflowDefinition,
  WorkflowExecution,
  WorkflowStatus,
  WorkflowStatusInfo,
  WorkflowStep,
} from './types.js';
