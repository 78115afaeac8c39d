// Standardized error handling utilities
// AppError is what routes render; the domain errors below are raised by the agent core

export enum ErrorCode {
  VALIDATION_ERROR = 'validation_error',
  UPSTREAM_ERROR = 'upstream_error',
  INTERNAL_ERROR = 'internal_error',
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

  static validationError(message: string, details?: unknown): AppError {
    return new AppError(ErrorCode.VALIDATION_ERROR, message, 400, details);
  }

  static upstream(message: string = 'Upstream service failed', details?: unknown): AppError {
    return new AppError(ErrorCode.UPSTREAM_ERROR, message, 502, details);
  }

  static internal(message: string = 'Internal server error', details?: unknown): AppError {
    return new AppError(ErrorCode.INTERNAL_ERROR, message, 500, details);
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

/**
 * The language-model backend could not produce a response: transport failure,
 * non-success status, or an empty/unusable body.
 */
export class InferenceError extends Error {
  constructor(
    message: string,
    public readonly status?: number,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'InferenceError';
  }
}

/**
 * The decision model's output held no usable plan.
 */
export class PlanParseError extends Error {
  constructor(message: string, public readonly rawOutput: string) {
    super(message);
    this.name = 'PlanParseError';
  }
}

/**
 * A single tool invocation failed: bad arguments, unreachable data source or
 * malformed upstream payload.
 */
export class ToolExecutionError extends Error {
  constructor(
    public readonly tool: string,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'ToolExecutionError';
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
