// Environment configuration for the Toolflow API
// Loads server, model backend and tool sandbox settings from environment variables

import { logger } from './utils/logger.js';

const log = logger.child({ module: 'env' });

const strEnv = (value: string | undefined, fallback = '') => (value ?? fallback).trim();

function parsePort(value: string | undefined, defaultPort: number): number {
  if (!value) return defaultPort;
  const parsed = parseInt(value, 10);
  if (isNaN(parsed) || parsed < 1 || parsed > 65535) {
    log.error(`Invalid PORT "${value}", using default ${defaultPort}`);
    return defaultPort;
  }
  return parsed;
}

function parsePositiveInt(value: string | undefined, defaultValue: number, name: string): number {
  if (!value) return defaultValue;
  const parsed = parseInt(value, 10);
  if (isNaN(parsed) || parsed < 0) {
    log.error(`Invalid ${name} "${value}", using default ${defaultValue}`);
    return defaultValue;
  }
  return parsed;
}

export const env = {
  // Server
  PORT: parsePort(process.env.PORT, 3737),
  HOST: process.env.HOST || '127.0.0.1',
  NODE_ENV: process.env.NODE_ENV || 'development',

  // OpenAI-compatible chat completion backend (vLLM, LM Studio, OpenAI...)
  LLM_BASE_URL: strEnv(process.env.LLM_BASE_URL, 'http://localhost:8001/v1'),
  LLM_API_KEY: strEnv(process.env.LLM_API_KEY, 'EMPTY'),
  LLM_MODEL: strEnv(process.env.LLM_MODEL, 'Qwen/Qwen3-14B'),
  LLM_TIMEOUT_MS: parsePositiveInt(process.env.LLM_TIMEOUT_MS, 60000, 'LLM_TIMEOUT_MS'),

  // Shared database handle for `database` tools
  DATABASE_URL: strEnv(process.env.DATABASE_URL, 'sqlite::memory:'),

  // Tools
  TOOLS_ENABLED: process.env.TOOLS_ENABLED !== 'false', // Default true
  FUNCTION_TOOLS_ENABLED: process.env.FUNCTION_TOOLS_ENABLED === 'true', // Default false for security
  FUNCTION_TIMEOUT_MS: parsePositiveInt(process.env.FUNCTION_TIMEOUT_MS, 2000, 'FUNCTION_TIMEOUT_MS'),
  FUNCTION_MEMORY_MB: parsePositiveInt(process.env.FUNCTION_MEMORY_MB, 32, 'FUNCTION_MEMORY_MB'),
  DEFAULT_MAX_TOOL_CALLS: parsePositiveInt(process.env.DEFAULT_MAX_TOOL_CALLS, 3, 'DEFAULT_MAX_TOOL_CALLS'),

  // Logging
  LOG_LEVEL: process.env.LOG_LEVEL || 'info',
};

// Log configuration on startup (redact secrets)
export function logConfiguration() {
  log.info(
    {
      environment: env.NODE_ENV,
      server: `${env.HOST}:${env.PORT}`,
      backend: env.LLM_BASE_URL,
      model: env.LLM_MODEL,
      apiKeySet: env.LLM_API_KEY !== 'EMPTY' && !!env.LLM_API_KEY,
      toolsEnabled: env.TOOLS_ENABLED,
      defaultMaxToolCalls: env.DEFAULT_MAX_TOOL_CALLS,
    },
    'Toolflow API configuration',
  );
  if (env.FUNCTION_TOOLS_ENABLED) {
    log.warn('FUNCTION TOOLS ENABLED - caller-supplied code runs in a worker sandbox, use with caution!');
  }
}
