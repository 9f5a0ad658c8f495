/**
 * Application error types
 * Each error type maps to an HTTP status code and a stable error code
 */

export class AppError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly statusCode: number,
    public readonly details?: unknown
  ) {
    super(message);
    this.name = this.constructor.name;
    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * Source file could not be read or is not a supported format (422)
 * File-level: the file's import run fails, the batch continues
 */
export class FileError extends AppError {
  constructor(
    message: string,
    public readonly reason: 'unreadable' | 'unsupported_format' | 'empty',
    details: Record<string, unknown> = {}
  ) {
    super(message, 'FILE_ERROR', 422, { reason, ...details });
  }
}

/**
 * Transactional failure while persisting (500 Internal Server Error)
 */
export class StorageError extends AppError {
  constructor(message: string, details?: unknown) {
    super(message, 'STORAGE_ERROR', 500, details);
  }
}

/**
 * Moving a committed source file into the archive failed
 * Post-commit: reported as a warning, never rolls back transactions
 */
export class ArchiveError extends AppError {
  constructor(message: string, details?: unknown) {
    super(message, 'ARCHIVE_ERROR', 500, details);
  }
}

/**
 * A bounded file or storage operation did not finish in time (504)
 */
export class TimeoutError extends AppError {
  constructor(operation: string, timeoutMs: number) {
    super(`${operation} timed out after ${timeoutMs}ms`, 'TIMEOUT', 504, {
      operation,
      timeoutMs,
    });
  }
}

export class ImportCanceledError extends AppError {
  constructor() {
    super('Import canceled', 'IMPORT_CANCELED', 499);
  }
}

/**
 * Validation errors from user input (400 Bad Request)
 */
export class ValidationError extends AppError {
  constructor(message: string, details?: unknown) {
    super(message, 'VALIDATION_ERROR', 400, details);
  }
}

/**
 * Resource not found errors (404 Not Found)
 */
export class NotFoundError extends AppError {
  constructor(resource: string, id: string) {
    super(`${resource} with id ${id} not found`, 'NOT_FOUND', 404, { resource, id });
  }
}

/**
 * Resource already exists (409 Conflict)
 */
export class ConflictError extends AppError {
  constructor(message: string, details?: unknown) {
    super(message, 'CONFLICT', 409, details);
  }
}

/**
 * Client exceeded the API request limit (429 Too Many Requests)
 */
export class RateLimitError extends AppError {
  constructor(retryAfterSeconds: number) {
    super('Too many requests. Please retry later.', 'RATE_LIMITED', 429, { retryAfterSeconds });
  }
}

/**
 * Configuration errors - fail fast on startup (500 Internal Server Error)
 */
export class ConfigError extends AppError {
  constructor(message: string, details?: unknown) {
    super(message, 'CONFIG_ERROR', 500, details);
  }
}

/**
 * Type guard to check if error is an AppError
 */
export function isAppError(error: unknown): error is AppError {
  return error instanceof AppError;
}

export function errorMessage(error: unknown): string {
  if (error instanceof Error && error.message.trim().length > 0) {
    return error.message;
  }
  return 'Unexpected error';
}
