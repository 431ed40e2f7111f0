// Standardized error handling utilities
// Registration and lookup failures surface as AppError; tool failures never do

export enum ErrorCode {
  NOT_FOUND = 'not_found',
  BAD_REQUEST = 'bad_request',
  INTERNAL_ERROR = 'internal_error',
  VALIDATION_ERROR = 'validation_error',
  DUPLICATE_TOOL = 'duplicate_tool',
  INVALID_TOOL_KIND = 'invalid_tool_kind',
  TOOL_NOT_FOUND = 'tool_not_found',
  DUPLICATE_AGENT = 'duplicate_agent',
  AGENT_NOT_FOUND = 'agent_not_found',
  WORKFLOW_NOT_FOUND = 'workflow_not_found',
  BACKEND_UNAVAILABLE = 'backend_unavailable',
}

export class AppError extends Error {
  constructor(
    public code: ErrorCode,
    message: string,
    public statusCode: number = 500,
    public details?: unknown
  ) {
    super(message);
    this.name = 'AppError';
  }

  static notFound(message: string = 'Resource not found', details?: unknown): AppError {
    return new AppError(ErrorCode.NOT_FOUND, message, 404, details);
  }

  static badRequest(message: string = 'Bad request', details?: unknown): AppError {
    return new AppError(ErrorCode.BAD_REQUEST, message, 400, details);
  }

  static validationError(message: string, details?: unknown): AppError {
    return new AppError(ErrorCode.VALIDATION_ERROR, message, 400, details);
  }

  static duplicateTool(name: string, scope: string): AppError {
    return new AppError(
      ErrorCode.DUPLICATE_TOOL,
      `Tool with name '${name}' is already registered for client '${scope}'`,
      409,
    );
  }

  static invalidToolKind(kind: string, allowed: readonly string[]): AppError {
    return new AppError(
      ErrorCode.INVALID_TOOL_KIND,
      `Invalid tool kind '${kind}'. Must be one of: ${allowed.join(', ')}`,
      400,
    );
  }

  static toolNotFound(name: string): AppError {
    return new AppError(ErrorCode.TOOL_NOT_FOUND, `Tool '${name}' not found`, 404);
  }

  static duplicateAgent(name: string): AppError {
    return new AppError(ErrorCode.DUPLICATE_AGENT, `Agent with name '${name}' is already registered`, 409);
  }

  static agentNotFound(name: string): AppError {
    return new AppError(ErrorCode.AGENT_NOT_FOUND, `Agent '${name}' not found`, 404);
  }

  static workflowNotFound(name: string): AppError {
    return new AppError(ErrorCode.WORKFLOW_NOT_FOUND, `Workflow '${name}' not found`, 404);
  }

  static internal(message: string = 'Internal server error', details?: unknown): AppError {
    return new AppError(ErrorCode.INTERNAL_ERROR, message, 500, details);
  }
}

/**
 * Raised by chat backends when the model server cannot be reached or times out.
 * The orchestration layer turns it into a fallback answer instead of failing the request.
 */
export class BackendUnavailableError extends AppError {
  constructor(message: string, details?: unknown) {
    super(ErrorCode.BACKEND_UNAVAILABLE, message, 503, details);
    this.name = 'BackendUnavailableError';
  }
}

export interface ErrorResponse {
  error: ErrorCode;
  message: string;
  statusCode: number;
  details?: unknown;
}

export function formatErrorResponse(error: AppError, includeDetails: boolean = false): ErrorResponse {
  const response: ErrorResponse = {
    error: error.code,
    message: error.message,
    statusCode: error.statusCode,
  };

  if (includeDetails && error.details) {
    response.details = error.details;
  }

  return response;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
