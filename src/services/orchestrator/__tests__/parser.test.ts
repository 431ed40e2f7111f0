import { describe, it, expect } from 'vitest';
import { parseTextDirective, parseToolArguments } from '../parser.js';
import { buildFallbackResponse, detectTopic, stableHash } from '../fallback.js';

describe('parseToolArguments', () => {
  it('should parse JSON objects', () => {
    expect(parseToolArguments('{"a": 1, "b": [2]}')).toEqual({ a: 1, b: [2] });
  });

  it('should return an empty map for anything else', () => {
    expect(parseToolArguments('{broken')).toEqual({});
    expect(parseToolArguments('[1, 2]')).toEqual({});
    expect(parseToolArguments('')).toEqual({});
    expect(parseToolArguments(undefined)).toEqual({});
  });
});

describe('parseTextDirective', () => {
  it('should prefer <final> over a tool call', () => {
    expect(parseTextDirective('<tool_call>{"tool_name":"x"}</tool_call><final>a</final>')).toEqual({
      type: 'final',
      text: 'a',
    });
  });

  it('should read tool calls with nested arguments', () => {
    expect(
      parseTextDirective('<tool_call>\n{"tool_name": "lookup", "arguments": {"filter": {"id": 3}}}\n</tool_call>'),
    ).toEqual({ type: 'tool_call', toolName: 'lookup', arguments: { filter: { id: 3 } } });
  });

  it('should accept "name" in place of "tool_name"', () => {
    expect(parseTextDirective('<tool_call>{"name": "lookup"}</tool_call>')).toEqual({
      type: 'tool_call',
      toolName: 'lookup',
      arguments: {},
    });
  });

  it('should degrade to raw text when the call has no tool name', () => {
    expect(parseTextDirective(' <tool_call>{"arguments": {}}</tool_call> ')).toEqual({
      type: 'raw',
      text: '<tool_call>{"arguments": {}}</tool_call>',
    });
  });
});

describe('Fallback responses', () => {
  it('should pick the topic from keywords', () => {
    expect(detectTopic('Pressure spike on line 2')).toBe('pressure');
    expect(detectTopic('temperature drift')).toBe('temperature');
    expect(detectTopic('shift handover')).toBe('general');
  });

  it('should hash deterministically', () => {
    expect(stableHash('')).toBe(0x811c9dc5);
    expect(stableHash('abc')).toBe(stableHash('abc'));
  });

  it('should produce the same answer for the same prompt', () => {
    expect(buildFallbackResponse('check temperature', 'm')).toBe(buildFallbackResponse('check temperature', 'm'));
    expect(buildFallbackResponse('check temperature', 'm')).toContain('Model: m (fallback mode, backend unavailable)');
  });
});
