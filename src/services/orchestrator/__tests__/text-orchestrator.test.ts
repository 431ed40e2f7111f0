import { describe, it, expect, beforeEach } from 'vitest';
import { TextToolOrchestrator, buildToolsPrompt } from '../text-orchestrator.js';
import { ToolExecutor } from '../../tools/executor.js';
import { ToolRegistry } from '../../tools/registry.js';
import { calculatorTool } from '../../tools/index.js';
import { BackendUnavailableError } from '../../../utils/errors.js';
import { FakeProvider, reply } from './fake-provider.js';

const TOOL_CALL = '<tool_call>{"tool_name": "calculator", "arguments": {"expression": "6 * 7"}}</tool_call>';

describe('Text-marker tool loop', () => {
  let tools: ToolRegistry;
  let executor: ToolExecutor;

  beforeEach(() => {
    tools = new ToolRegistry();
    tools.register(calculatorTool, 'client-a');
    executor = new ToolExecutor({
      databaseUrl: 'sqlite::memory:',
      functionToolsEnabled: false,
      functionTimeoutMs: 1000,
      functionMemoryMb: 32,
    });
  });

  const run = (provider: FakeProvider, maxToolCalls = 3) =>
    new TextToolOrchestrator(provider, tools, executor).generateWithTools({
      prompt: 'What is 6 times 7?',
      clientId: 'client-a',
      maxToolCalls,
      maxTokens: 256,
      temperature: 0,
    });

  it('should return the <final> block', async () => {
    const provider = new FakeProvider(reply('thinking... <final> 42 </final>'));

    const result = await run(provider);

    expect(result).toEqual({ text: '42', toolsUsed: [], toolResults: [], fallback: false });
    expect(provider.calls).toHaveLength(1);
    expect(provider.calls[0].messages[0].content).toContain('- name: calculator');
  });

  it('should run a tool call and feed the result into the next prompt', async () => {
    const provider = new FakeProvider(reply(TOOL_CALL), reply('<final>The answer is 42</final>'));

    const result = await run(provider);

    expect(result.text).toBe('The answer is 42');
    expect(result.toolsUsed).toEqual(['calculator']);
    expect(result.toolResults[0]).toMatchObject({ success: true, result: { result: 42 } });
    expect(provider.calls[1].messages[0].content).toContain(
      "Tool 'calculator' result:\n{\"expression\":\"6 * 7\",\"result\":42,\"variablesUsed\":{}}\n",
    );
  });

  it('should return raw text when there are no markers', async () => {
    const provider = new FakeProvider(reply('  just an answer \n'));

    await expect(run(provider)).resolves.toMatchObject({ text: 'just an answer' });
  });

  it('should return raw text when the tool call is not valid JSON', async () => {
    const provider = new FakeProvider(reply('<tool_call>{oops}</tool_call>'));

    await expect(run(provider)).resolves.toMatchObject({ text: '<tool_call>{oops}</tool_call>', toolsUsed: [] });
  });

  it('should ask for a final answer once the budget is spent', async () => {
    const provider = new FakeProvider(reply(TOOL_CALL), reply('<final>done</final>'));

    const result = await run(provider, 1);

    expect(provider.calls).toHaveLength(2);
    expect(provider.calls[1].messages[0].content).toMatch(/Please provide the final answer wrapped in <final> \.\.\. <\/final>\.$/);
    expect(result.text).toBe('done');
  });

  it('should record tools missing from the client scope as failures', async () => {
    const provider = new FakeProvider(
      reply('<tool_call>{"tool_name": "ghost", "arguments": {}}</tool_call>'),
      reply('<final>no luck</final>'),
    );

    const result = await run(provider);

    expect(result.toolResults).toEqual([{ tool: 'ghost', arguments: {}, success: false, error: "Tool 'ghost' not found" }]);
    expect(result.text).toBe('no luck');
  });

  it('should fall back when the backend is unavailable', async () => {
    const provider = new FakeProvider(new BackendUnavailableError('connect ECONNREFUSED'));

    const result = await run(provider);

    expect(result.fallback).toBe(true);
    expect(result.text).toContain('(fallback mode)');
  });
});

describe('buildToolsPrompt', () => {
  it('should be empty without tools', () => {
    expect(buildToolsPrompt([])).toBe('');
  });
});
