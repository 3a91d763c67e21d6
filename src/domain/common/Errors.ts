/**
 * Base application error.
 */
export class AppError extends Error {
  constructor(
    public readonly statusCode: number,
    public readonly code: string,
    message: string,
    public readonly details?: unknown
  ) {
    super(message);
    this.name = this.constructor.name;
    Error.captureStackTrace(this, this.constructor);
  }

  toJSON() {
    return {
      error: true,
      statusCode: this.statusCode,
      code: this.code,
      message: this.message,
      details: this.details
    };
  }
}

/**
 * Validation error (400).
 */
export class ValidationError extends AppError {
  constructor(message: string, details?: unknown) {
    super(400, 'VALIDATION_ERROR', message, details);
  }
}

/**
 * Not found error (404).
 */
export class NotFoundError extends AppError {
  constructor(resource: string, id?: string | number) {
    const message = id !== undefined ? `${resource} with id '${id}' not found` : `${resource} not found`;
    super(404, 'NOT_FOUND', message);
  }
}

/**
 * Conflict with current state (409), e.g. a second active session.
 */
export class ConflictError extends AppError {
  constructor(message: string, details?: unknown) {
    super(409, 'CONFLICT', message, details);
  }
}

/**
 * Business rule violation error (422).
 */
export class BusinessRuleError extends AppError {
  constructor(message: string, details?: unknown) {
    super(422, 'BUSINESS_RULE_ERROR', message, details);
  }
}

/**
 * Storage kept failing with transient errors after all retries (503).
 */
export class StorageUnavailableError extends AppError {
  constructor(operation: string, lastError?: Error) {
    super(503, 'STORAGE_UNAVAILABLE', `Storage unavailable during ${operation}`, lastError ? { lastError: lastError.message } : undefined);
  }
}

/**
 * Database file failed the integrity check (500).
 */
export class StorageCorruptionError extends AppError {
  constructor(message: string, details?: unknown) {
    super(500, 'STORAGE_CORRUPTION', message, details);
  }
}

/**
 * Configuration error (500).
 */
export class ConfigError extends AppError {
  constructor(message: string) {
    super(500, 'CONFIG_ERROR', message);
  }
}

/**
 * Normalize anything thrown into an Error instance.
 */
export function toError(err: unknown): Error {
  return err instanceof Error ? err : new Error(String(err));
}
