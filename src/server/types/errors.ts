/**
 * Centralized error type definitions for the procurement intake API
 * Provides a consistent error hierarchy and error codes
 */

/**
 * Error code enumeration for consistent error handling
 */
export enum ErrorCode {
  // Client errors
  BAD_REQUEST = 'BAD_REQUEST',
  NOT_FOUND = 'NOT_FOUND',
  PAYLOAD_TOO_LARGE = 'PAYLOAD_TOO_LARGE',
  REQUEST_TIMEOUT = 'REQUEST_TIMEOUT',
  OPERATION_CANCELLED = 'OPERATION_CANCELLED',

  // Server errors
  INTERNAL_SERVER_ERROR = 'INTERNAL_SERVER_ERROR',
  EXTERNAL_SERVICE_ERROR = 'EXTERNAL_SERVICE_ERROR',
  MODEL_ARTIFACT_ERROR = 'MODEL_ARTIFACT_ERROR',
}

/**
 * Base error class for all application errors
 */
export class AppError extends Error {
  public readonly code: string;
  public readonly statusCode: number;
  public readonly isOperational: boolean;
  public readonly context?: Record<string, unknown>;

  constructor(
    message: string,
    code: string,
    statusCode: number = 500,
    isOperational: boolean = true,
    context?: Record<string, unknown>
  ) {
    super(message);
    this.name = this.constructor.name;
    this.code = code;
    this.statusCode = statusCode;
    this.isOperational = isOperational;
    this.context = context;

    // Maintains proper stack trace for where our error was thrown
    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * Domain-specific error types
 */
export class NotFoundError extends AppError {
  constructor(resource: string, identifier?: string, additionalContext?: Record<string, unknown>) {
    const message = identifier ? `${resource} with identifier '${identifier}' not found` : `${resource} not found`;
    super(message, ErrorCode.NOT_FOUND, 404, true, { resource, identifier, ...additionalContext });
  }
}

export class BadRequestError extends AppError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, ErrorCode.BAD_REQUEST, 400, true, context);
  }
}

export class PayloadTooLargeError extends AppError {
  constructor(message: string = 'Uploaded file is too large', context?: Record<string, unknown>) {
    super(message, ErrorCode.PAYLOAD_TOO_LARGE, 413, true, context);
  }
}

export class ExternalServiceError extends AppError {
  constructor(service: string, message: string, context?: Record<string, unknown>) {
    super(
      `External service error (${service}): ${message}`,
      ErrorCode.EXTERNAL_SERVICE_ERROR,
      502,
      true,
      { service, ...context }
    );
  }
}

export class RequestTimeoutError extends AppError {
  constructor(message: string = 'Request timeout', context?: Record<string, unknown>) {
    super(message, ErrorCode.REQUEST_TIMEOUT, 408, true, context);
  }
}

/**
 * Raised when the caller abandons an operation (client disconnect, explicit abort)
 */
export class OperationCancelledError extends AppError {
  constructor(message: string = 'Operation cancelled', context?: Record<string, unknown>) {
    super(message, ErrorCode.OPERATION_CANCELLED, 499, true, context);
  }
}


/**
 * Trained classifier artifacts are missing, malformed or do not fit together.
 * Not operational: the server refuses to start.
 */
export class ModelArtifactError extends AppError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, ErrorCode.MODEL_ARTIFACT_ERROR, 500, false, context);
  }
}

/**
 * Standardized error response format
 */
export interface ErrorResponse {
  error: string;
  code: string;
  message: string;
  statusCode: number;
  timestamp: string;
  path?: string;
  context?: Record<string, unknown>;
  stack?: string; // Only in development
}

/**
 * Type guard to check if error is an AppError
 */
export function isAppError(error: unknown): error is AppError {
  return error instanceof AppError;
}

/**
 * Convert any error to AppError
 */
export function toAppError(error: unknown, defaultMessage: string = 'An unexpected error occurred'): AppError {
  if (isAppError(error)) {
    return error;
  }

  if (error instanceof Error) {
    return new AppError(error.message, ErrorCode.INTERNAL_SERVER_ERROR, 500, false);
  }

  return new AppError(defaultMessage, ErrorCode.INTERNAL_SERVER_ERROR, 500, false);
}
