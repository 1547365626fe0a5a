import { ErrorCode, type ApiError } from '@skien/shared';

export class AppError extends Error {
  constructor(
    public readonly code: ErrorCode,
    message: string,
    public readonly statusCode: number = 500,
    public readonly details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'AppError';
  }

  toApiError(requestId: string): ApiError {
    return {
      error: {
        code: this.code,
        message: this.message,
        requestId,
        ...(this.details && { details: this.details }),
      },
    };
  }
}

export class ValidationError extends AppError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(ErrorCode.VALIDATION_ERROR, message, 400, details);
    this.name = 'ValidationError';
  }
}

export class NotFoundError extends AppError {
  constructor(resource: string, id: string) {
    super(ErrorCode.NOT_FOUND, `${resource} not found: ${id}`, 404);
    this.name = 'NotFoundError';
  }
}

export class ConflictError extends AppError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(ErrorCode.CONFLICT, message, 409, details);
    this.name = 'ConflictError';
  }
}

export class InvalidStateTransitionError extends AppError {
  constructor(from: string, to: string) {
    super(
      ErrorCode.INVALID_STATE_TRANSITION,
      `Invalid state transition from ${from} to ${to}`,
      400
    );
    this.name = 'InvalidStateTransitionError';
  }
}

// Merge target vanished between matching and writing
export class IndexConsistencyError extends AppError {
  constructor(storyId: string) {
    super(
      ErrorCode.INDEX_CONSISTENCY,
      `Story no longer exists: ${storyId}`,
      409,
      { storyId }
    );
    this.name = 'IndexConsistencyError';
  }
}

// Persistence is unavailable; fatal for the whole batch
export class StorageFailureError extends AppError {
  constructor(operation: string, cause?: unknown) {
    super(
      ErrorCode.STORAGE_FAILURE,
      `Storage failure during ${operation}: ${cause instanceof Error ? cause.message : 'unknown error'}`,
      503,
      { operation }
    );
    this.name = 'StorageFailureError';
    this.cause = cause;
  }
}

export class ReadOnlyModeError extends AppError {
  constructor() {
    super(
      ErrorCode.FORBIDDEN,
      'System is in read-only mode',
      503
    );
    this.name = 'ReadOnlyModeError';
  }
}
