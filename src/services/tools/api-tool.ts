// API Tool
// Calls an HTTP endpoint described by the tool config

import { z } from 'zod';
import type { ApiToolDescriptor, HttpMethod, ToolHandler, ToolParameters } from './types.js';

const DEFAULT_TIMEOUT_SECONDS = 30;
const MAX_ERROR_BODY = 500;

const MethodSchema = z
  .string()
  .transform(m => m.toUpperCase())
  .pipe(z.enum(['GET', 'POST', 'PUT', 'PATCH', 'DELETE']));

// Parameters that steer the request rather than travel with it
const CONTROL_KEYS = new Set(['url', 'method', 'data']);

function buildPayload(parameters: ToolParameters): Record<string, unknown> {
  const data = parameters.data;
  if (typeof data === 'object' && data !== null && !Array.isArray(data)) {
    return { ...data };
  }
  const payload: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(parameters)) {
    if (!CONTROL_KEYS.has(key)) payload[key] = value;
  }
  return payload;
}

function appendQuery(url: URL, payload: Record<string, unknown>): void {
  for (const [key, value] of Object.entries(payload)) {
    if (value === undefined || value === null) continue;
    if (Array.isArray(value)) {
      for (const item of value) url.searchParams.append(key, String(item));
    } else if (typeof value === 'object') {
      url.searchParams.set(key, JSON.stringify(value));
    } else {
      url.searchParams.set(key, String(value));
    }
  }
}

function parseBody(text: string): unknown {
  if (!text) return '';
  try {
    return JSON.parse(text);
  } catch {
    return text;
  }
}

export const executeApiCall: ToolHandler<ApiToolDescriptor> = async (descriptor, parameters, options) => {
  const { config } = descriptor;

  const rawUrl = typeof parameters.url === 'string' && parameters.url ? parameters.url : config.url;
  if (!rawUrl) {
    throw new Error('URL is required for API calls');
  }

  const methodResult = MethodSchema.safeParse(parameters.method ?? config.method ?? 'GET');
  if (!methodResult.success) {
    throw new Error(`Unsupported HTTP method: ${String(parameters.method ?? config.method)}`);
  }
  const method: HttpMethod = methodResult.data;

  const url = new URL(rawUrl);
  const payload = buildPayload(parameters);
  const headers: Record<string, string> = { ...(config.headers ?? {}), ...(options.headers ?? {}) };

  let body: string | undefined;
  if (method === 'GET' || method === 'DELETE') {
    appendQuery(url, payload);
  } else {
    body = JSON.stringify(payload);
    if (!Object.keys(headers).some(h => h.toLowerCase() === 'content-type')) {
      headers['Content-Type'] = 'application/json';
    }
  }

  const timeoutSeconds = config.timeoutSeconds ?? DEFAULT_TIMEOUT_SECONDS;
  const signal = AbortSignal.timeout(timeoutSeconds * 1000);

  let response: Response;
  try {
    response = await fetch(url, { method, headers, body, signal });
  } catch (error) {
    if (error instanceof Error && error.name === 'TimeoutError') {
      throw new Error(`API call timed out after ${timeoutSeconds}s`);
    }
    throw new Error(`API call failed: ${error instanceof Error ? error.message : String(error)}`);
  }

  const text = await response.text();
  if (!response.ok) {
    throw new Error(`API call failed: HTTP ${response.status}: ${text.slice(0, MAX_ERROR_BODY)}`);
  }

  return {
    statusCode: response.status,
    data: parseBody(text),
    headers: Object.fromEntries(response.headers.entries()),
  };
};
