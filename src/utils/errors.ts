// Standardized error handling utilities

export enum ErrorCode {
  NOT_FOUND = 'not_found',
  BAD_REQUEST = 'bad_request',
  VALIDATION_ERROR = 'validation_error',
  INTERNAL_ERROR = 'internal_error',
  PROVIDER_ERROR = 'provider_error',
  PROVIDER_NOT_CONFIGURED = 'provider_not_configured',
  TOOL_NOT_FOUND = 'tool_not_found',
  TOOL_FAILED = 'tool_failed',
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

  static internal(message: string = 'Internal server error', details?: unknown): AppError {
    return new AppError(ErrorCode.INTERNAL_ERROR, message, 500, details);
  }

  /** The upstream model API failed (transport, auth, rate limit, bad payload). */
  static providerError(message: string, details?: unknown): AppError {
    return new AppError(ErrorCode.PROVIDER_ERROR, message, 502, details);
  }

  static providerNotConfigured(provider: string): AppError {
    return new AppError(
      ErrorCode.PROVIDER_NOT_CONFIGURED,
      `Model provider "${provider}" is not available or not configured`,
      503,
    );
  }

  static toolNotFound(name: string): AppError {
    return new AppError(ErrorCode.TOOL_NOT_FOUND, `Tool '${name}' not found`, 404);
  }

  static toolFailed(message: string, details?: unknown): AppError {
    return new AppError(ErrorCode.TOOL_FAILED, message, 500, details);
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
