// Zod schemas for tool registration input
// Routes and bootstrap code parse untyped descriptors through these before registering

import { z } from 'zod';
import { TOOL_KINDS, type ToolDescriptor } from './types.js';
import { AppError } from '../../utils/errors.js';

const ParameterSchemaSchema = z
  .object({
    type: z.string().optional(),
    properties: z.record(z.unknown()).optional(),
    required: z.array(z.string()).optional(),
  })
  .passthrough();

const base = {
  name: z.string().min(1).max(128).regex(/^[A-Za-z0-9_.-]+$/, 'Tool names may only contain letters, digits, _ . -'),
  description: z.string().min(1),
  parameterSchema: ParameterSchemaSchema.default({ type: 'object', properties: {} }),
};

export const ApiConfigSchema = z.object({
  url: z.string().url().optional(),
  method: z.enum(['GET', 'POST', 'PUT', 'PATCH', 'DELETE']).optional(),
  headers: z.record(z.string()).optional(),
  timeoutSeconds: z.number().positive().max(300).optional(),
});

export const FunctionConfigSchema = z.object({
  source: z.string().min(1),
  entry: z.string().optional(),
});

export const DatabaseConfigSchema = z.object({
  databaseUrl: z.string().optional(),
});

export const ApiToolSchema = z.object({
  ...base,
  kind: z.literal('api'),
  config: ApiConfigSchema.default({}),
});

export const CalculationToolSchema = z.object({
  ...base,
  kind: z.literal('calculation'),
  config: z.object({}).strip().default({}),
});

export const FunctionToolSchema = z.object({
  ...base,
  kind: z.literal('function'),
  config: FunctionConfigSchema,
});

export const DatabaseToolSchema = z.object({
  ...base,
  kind: z.literal('database'),
  config: DatabaseConfigSchema.default({}),
});

export const ToolDescriptorSchema = z.discriminatedUnion('kind', [
  ApiToolSchema,
  CalculationToolSchema,
  FunctionToolSchema,
  DatabaseToolSchema,
]);

/**
 * Parses an untyped registration payload into a ToolDescriptor.
 * An unrecognised `kind` is reported as INVALID_TOOL_KIND rather than a generic validation error.
 */
export function parseToolDescriptor(input: unknown): ToolDescriptor {
  const kind = typeof input === 'object' && input !== null && 'kind' in input ? input.kind : undefined;
  if (typeof kind !== 'string' || !TOOL_KINDS.some(k => k === kind)) {
    throw AppError.invalidToolKind(String(kind), TOOL_KINDS);
  }

  const parsed = ToolDescriptorSchema.safeParse(input);
  if (!parsed.success) {
    throw AppError.validationError('Invalid tool descriptor', parsed.error.issues);
  }

  const data = parsed.data;
  if (data.kind === 'calculation') {
    return { ...data, config: {} };
  }
  return data;
}
