import { describe, it, expect, beforeEach, vi } from 'vitest';
import { WorkflowManager } from '../workflow-manager.js';
import { evaluateCondition } from '../condition.js';
import { ToolExecutor } from '../../tools/executor.js';
import { ToolRegistry } from '../../tools/registry.js';
import { calculatorTool } from '../../tools/index.js';
import type { AgentInvoker } from '../../agents/agent-service.js';
import { ErrorCode } from '../../../utils/errors.js';

describe('Workflow Manager', () => {
  let tools: ToolRegistry;
  let executor: ToolExecutor;
  let manager: WorkflowManager;

  beforeEach(() => {
    tools = new ToolRegistry();
    tools.register(calculatorTool);
    tools.register({
      name: 'echo',
      description: 'Returns its msg parameter',
      kind: 'function',
      parameterSchema: { type: 'object', properties: { msg: { type: 'string' } }, required: ['msg'] },
      config: { source: 'function main(params) { return params.msg; }' },
    });
    executor = new ToolExecutor({
      databaseUrl: 'sqlite::memory:',
      functionToolsEnabled: true,
      functionTimeoutMs: 1000,
      functionMemoryMb: 32,
    });
    manager = new WorkflowManager({ tools, executor });
  });

  it('should echo a context value through a function tool', async () => {
    manager.defineWorkflow('echo-flow', [{ type: 'tool_call', toolName: 'echo', parameters: { msg: '{{input}}' } }]);

    const execution = await manager.executeWorkflow('echo-flow', { input: 'hi' });

    expect(execution.status).toBe('completed');
    expect(execution.steps).toHaveLength(1);
    expect(execution.steps[0]).toMatchObject({ stepName: 'step_1', stepType: 'tool_call', success: true });
    expect(execution.steps[0].output).toMatchObject({ result: 'hi' });
    expect(execution.context).toMatchObject({ input: 'hi', result: 'hi' });
  });

  it('should stop at the first failing step', async () => {
    manager.defineWorkflow('fail-fast', [
      { type: 'tool_call', toolName: 'calculator', parameters: { expression: '1 + 1' } },
      { type: 'tool_call', toolName: 'calculator', parameters: { expression: '2 ^ 2' } },
      { type: 'tool_call', toolName: 'calculator', parameters: { expression: '3 + 3' } },
    ]);

    const execution = await manager.executeWorkflow('fail-fast');

    expect(execution.status).toBe('failed');
    expect(execution.steps.map(s => [s.stepName, s.success])).toEqual([
      ['step_1', true],
      ['step_2', false],
    ]);
    expect(execution.steps[1].error).toBe('Expression contains forbidden characters');
    expect(execution.error).toBe("Step 'step_2' failed: Expression contains forbidden characters");
    expect(execution.context).toMatchObject({ result: 2 });
    expect(manager.getWorkflowStatus('fail-fast')).toMatchObject({ status: 'failed', stepsCount: 3 });
  });

  it('should thread outputs into later steps and bind named steps', async () => {
    manager.defineWorkflow('threaded', [
      {
        type: 'tool_call',
        name: 'sum',
        toolName: 'calculator',
        parameters: { expression: 'x + 1', variables: { x: '{{x}}' } },
      },
      { type: 'condition', name: 'big', expression: 'result > 4 and sum_ok' },
      { type: 'tool_call', toolName: 'echo', parameters: { msg: 'sum was {{sum.result}}' } },
    ]);

    const execution = await manager.executeWorkflow('threaded', { x: 4, sum_ok: true });

    expect(execution.status).toBe('completed');
    expect(execution.context.sum).toEqual({ expression: 'x + 1', result: 5, variablesUsed: { x: 4 } });
    expect(execution.context.big).toEqual({ conditionResult: true });
    expect(execution.steps[2].output).toMatchObject({ result: 'sum was 5' });
  });

  it('should treat a false condition as a successful step', async () => {
    manager.defineWorkflow('cond', [{ type: 'condition', expression: 'level >= 10' }]);

    const execution = await manager.executeWorkflow('cond', { level: 3 });

    expect(execution.status).toBe('completed');
    expect(execution.steps[0].output).toEqual({ conditionResult: false });
  });

  it('should fail a condition over unknown names', async () => {
    manager.defineWorkflow('cond', [{ type: 'condition', expression: 'label == 1' }]);

    const execution = await manager.executeWorkflow('cond', { label: 'text' });

    expect(execution.status).toBe('failed');
    expect(execution.steps[0].error).toBe('Unknown identifier in expression: label');
  });

  it('should fail tool steps for unknown tools', async () => {
    manager.defineWorkflow('ghost', [{ type: 'tool_call', toolName: 'ghost', parameters: {} }]);

    const execution = await manager.executeWorkflow('ghost');

    expect(execution.steps[0]).toMatchObject({ success: false, error: "Tool 'ghost' not found" });
  });

  it('should fail agent steps when no agent service is attached', async () => {
    manager.defineWorkflow('agentless', [{ type: 'agent_call', agentName: 'writer', promptTemplate: 'Hi' }]);

    const execution = await manager.executeWorkflow('agentless');

    expect(execution.status).toBe('failed');
    expect(execution.steps[0].error).toBe('No agent service is attached to the workflow manager');
  });

  it('should render the prompt for agent steps', async () => {
    const invokeAgent = vi.fn<AgentInvoker['invokeAgent']>(async (agentName) => ({
      text: 'Pumps are fine',
      toolsUsed: ['calculator'],
      toolResults: [],
      metadata: { agentName, mode: 'basic' as const },
    }));
    const withAgents = new WorkflowManager({ tools, executor, agents: { invokeAgent } });
    withAgents.defineWorkflow('report', [
      { type: 'agent_call', name: 'summary', agentName: 'writer', promptTemplate: 'Summarize {{topic}}' },
    ]);

    const execution = await withAgents.executeWorkflow('report', { topic: 'pumps' });

    expect(invokeAgent).toHaveBeenCalledWith('writer', { prompt: 'Summarize pumps' });
    expect(execution.context.summary).toEqual({ agentResponse: 'Pumps are fine', toolsUsed: ['calculator'] });
    expect(execution.context.agentResponse).toBe('Pumps are fine');
  });

  it('should fail agent steps whose invocation errored', async () => {
    const withAgents = new WorkflowManager({
      tools,
      executor,
      agents: {
        invokeAgent: async (agentName) => ({
          text: 'Agent invocation failed: model not loaded',
          toolsUsed: [],
          toolResults: [],
          metadata: { agentName, mode: 'error', error: 'model not loaded' },
        }),
      },
    });
    withAgents.defineWorkflow('broken', [{ type: 'agent_call', agentName: 'writer', promptTemplate: 'Hi' }]);

    const execution = await withAgents.executeWorkflow('broken');

    expect(execution.steps[0]).toMatchObject({ success: false, error: 'model not loaded' });
  });

  it('should throw for unknown workflows', async () => {
    await expect(manager.executeWorkflow('nope')).rejects.toMatchObject({
      code: ErrorCode.WORKFLOW_NOT_FOUND,
      statusCode: 404,
    });
    expect(manager.getWorkflowStatus('nope')).toEqual({ name: 'nope', status: 'not_found' });
  });

  it('should keep an append-only history and hand out copies', async () => {
    manager.defineWorkflow('a', [{ type: 'condition', expression: 'true' }]);
    manager.defineWorkflow('b', [{ type: 'condition', expression: '1' }]);
    await manager.executeWorkflow('a');
    await manager.executeWorkflow('b');
    await manager.executeWorkflow('a');

    expect(manager.getExecutionHistory().map(e => e.workflowName)).toEqual(['a', 'b', 'a']);
    expect(manager.getExecutionHistory('a')).toHaveLength(2);

    const [first] = manager.getExecutionHistory('a');
    first.status = 'failed';
    first.steps.length = 0;
    expect(manager.getExecutionHistory('a')[0]).toMatchObject({ status: 'completed' });
    expect(manager.getExecutionHistory('a')[0].steps).toHaveLength(1);
  });

  it('should give each run a fresh execution id and leave the caller context alone', async () => {
    manager.defineWorkflow('calc', [{ type: 'tool_call', toolName: 'calculator', parameters: { expression: '2 * 3' } }]);
    const input = { seed: 1 };

    const first = await manager.executeWorkflow('calc', input);
    const second = await manager.executeWorkflow('calc', input);

    expect(first.executionId).not.toBe(second.executionId);
    expect(input).toEqual({ seed: 1 });
    expect(manager.listWorkflows().map(w => w.name)).toEqual(['calc']);
  });
});

describe('evaluateCondition', () => {
  it('should resolve placeholders before evaluating', () => {
    expect(evaluateCondition('{{stats.count}} > 2', { stats: { count: 5 } })).toBe(true);
  });

  it('should coerce numbers to booleans', () => {
    expect(evaluateCondition('flag * 0', { flag: 7 })).toBe(false);
  });

  it('should refuse assignments', () => {
    expect(() => evaluateCondition('x = 1', { x: 0 })).toThrow('Unsupported syntax in expression: AssignmentNode');
  });
});
