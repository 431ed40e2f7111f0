// Output Parser
// Reads tool-call arguments and the <tool_call>/<final> text markers out of model output

import { z } from 'zod';

const ArgumentsSchema = z.record(z.unknown());

const TextToolCallSchema = z
  .object({
    tool_name: z.string().min(1).optional(),
    name: z.string().min(1).optional(),
    arguments: ArgumentsSchema.optional(),
  })
  .refine(call => call.tool_name !== undefined || call.name !== undefined);

/** Parses a function-call arguments string. Anything other than a JSON object yields `{}`. */
export function parseToolArguments(raw: string | undefined): Record<string, unknown> {
  if (!raw || !raw.trim()) return {};
  try {
    const parsed = ArgumentsSchema.safeParse(JSON.parse(raw));
    return parsed.success ? parsed.data : {};
  } catch {
    return {};
  }
}

export type TextDirective =
  | { type: 'final'; text: string }
  | { type: 'tool_call'; toolName: string; arguments: Record<string, unknown> }
  | { type: 'raw'; text: string };

const FINAL_PATTERN = /<final>([\s\S]*?)<\/final>/;
const TOOL_CALL_PATTERN = /<tool_call>([\s\S]*?)<\/tool_call>/;

/**
 * Classifies one model reply. A `<final>` block wins over a `<tool_call>`;
 * a missing or unparseable tool call degrades to the raw (trimmed) text.
 */
export function parseTextDirective(output: string): TextDirective {
  const final = FINAL_PATTERN.exec(output);
  if (final) {
    return { type: 'final', text: final[1].trim() };
  }

  const call = TOOL_CALL_PATTERN.exec(output);
  if (!call) {
    return { type: 'raw', text: output.trim() };
  }

  let json: unknown;
  try {
    json = JSON.parse(call[1].trim());
  } catch {
    return { type: 'raw', text: output.trim() };
  }

  const parsed = TextToolCallSchema.safeParse(json);
  if (!parsed.success) {
    return { type: 'raw', text: output.trim() };
  }

  return {
    type: 'tool_call',
    toolName: parsed.data.tool_name ?? parsed.data.name ?? '',
    arguments: parsed.data.arguments ?? {},
  };
}
