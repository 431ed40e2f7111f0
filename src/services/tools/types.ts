// Tool system types and interfaces
// A tool is a named, schema-described operation backed by one of four invocation kinds

export const TOOL_KINDS = ['api', 'calculation', 'function', 'database'] as const;

export type ToolKind = (typeof TOOL_KINDS)[number];

export type HttpMethod = 'GET' | 'POST' | 'PUT' | 'PATCH' | 'DELETE';

/** JSON-schema-like description of the arguments a tool accepts. */
export interface ParameterSchema {
  type?: string;
  properties?: Record<string, unknown>;
  required?: string[];
  [key: string]: unknown;
}

interface ToolDescriptorBase {
  name: string;
  description: string; // Read by the model to decide relevance
  parameterSchema: ParameterSchema;
}

export interface ApiToolConfig {
  url?: string;
  method?: HttpMethod;
  headers?: Record<string, string>;
  timeoutSeconds?: number;
}

export interface FunctionToolConfig {
  source: string;
  entry?: string;
}

export interface DatabaseToolConfig {
  databaseUrl?: string;
}

export interface ApiToolDescriptor extends ToolDescriptorBase {
  kind: 'api';
  config: ApiToolConfig;
}

export interface CalculationToolDescriptor extends ToolDescriptorBase {
  kind: 'calculation';
  config: Record<string, never>;
}

export interface FunctionToolDescriptor extends ToolDescriptorBase {
  kind: 'function';
  config: FunctionToolConfig;
}

export interface DatabaseToolDescriptor extends ToolDescriptorBase {
  kind: 'database';
  config: DatabaseToolConfig;
}

export type ToolDescriptor =
  | ApiToolDescriptor
  | CalculationToolDescriptor
  | FunctionToolDescriptor
  | DatabaseToolDescriptor;

export type ToolParameters = Record<string, unknown>;

export interface ToolRequest {
  toolName: string;
  parameters: ToolParameters;
}

export type ToolResponse =
  | { success: true; result: unknown; executionTimeMs: number }
  | { success: false; errorMessage: string; executionTimeMs: number };

export interface ToolInfo {
  name: string;
  description: string;
  parameterSchema: ParameterSchema;
  kind: ToolKind;
  config: ToolDescriptor['config'];
}

export interface ExecuteOptions {
  headers?: Record<string, string>; // Call-time headers for api tools
}

/** The side effect behind one tool kind. Handlers throw; the executor captures. */
export type ToolHandler<D extends ToolDescriptor> = (
  descriptor: D,
  parameters: ToolParameters,
  options: ExecuteOptions,
) => Promise<unknown>;

export interface OpenAIFunctionTool {
  type: 'function';
  function: {
    name: string;
    description: string;
    parameters: ParameterSchema;
  };
}
