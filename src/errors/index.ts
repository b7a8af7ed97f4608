/**
 * Error types for cluster session and resource operations.
 *
 * Every failure surfaced by the core is one of these kinds, so callers can
 * branch on the class (or `code`) instead of parsing messages.
 */

/**
 * Base error class for all application errors
 */
export abstract class ApplicationError extends Error {
  public readonly timestamp: Date;
  public readonly context: Record<string, unknown>;
  public override readonly cause?: Error | undefined;

  constructor(
    message: string,
    public readonly code: string,
    context?: Record<string, unknown>,
    cause?: Error,
  ) {
    super(message);
    this.name = this.constructor.name;
    this.timestamp = new Date();
    this.context = context ?? {};
    this.cause = cause;
    Error.captureStackTrace(this, this.constructor);
  }

  toJSON(): {
    name: string;
    message: string;
    code: string;
    timestamp: Date;
    context: Record<string, unknown>;
    stack?: string;
  } {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      timestamp: this.timestamp,
      context: this.context,
      stack: this.stack,
    };
  }
}

/**
 * Missing, unreadable or malformed connection descriptor
 */
export class ConfigError extends ApplicationError {
  constructor(
    message: string,
    public readonly path?: string,
    cause?: Error,
    context?: Record<string, unknown>,
  ) {
    super(message, 'CONFIG_ERROR', { ...context, path }, cause);
    this.name = 'ConfigError';
  }
}

/**
 * Unreachable cluster, rejected credentials, or no cluster registered at all
 */
export class ConnectionError extends ApplicationError {
  constructor(
    message: string,
    public readonly cluster?: string,
    cause?: Error,
    context?: Record<string, unknown>,
  ) {
    super(message, 'CONNECTION_ERROR', { ...context, cluster }, cause);
    this.name = 'ConnectionError';
  }
}

/**
 * A cluster, namespace, pod, container or resource is absent
 */
export class NotFoundError extends ApplicationError {
  constructor(
    message: string,
    public readonly resourceType?: string,
    public readonly resourceId?: string,
    context?: Record<string, unknown>,
  ) {
    super(message, 'NOT_FOUND', { ...context, resourceType, resourceId });
    this.name = 'NotFoundError';
  }
}

/**
 * Caller input or remote state does not satisfy a precondition
 */
export class ValidationError extends ApplicationError {
  constructor(
    message: string,
    public readonly fields?: string[],
    context?: Record<string, unknown>,
  ) {
    super(message, 'VALIDATION_ERROR', { ...context, fields });
    this.name = 'ValidationError';
  }
}

/**
 * Retryable failure that outlived its retry budget
 */
export class TransientError extends ApplicationError {
  constructor(
    message: string,
    public readonly operation: string,
    public readonly attempts: number,
    cause?: Error,
  ) {
    super(message, 'TRANSIENT_ERROR', { operation, attempts }, cause);
    this.name = 'TransientError';
  }
}

/**
 * Error thrown when an operation exceeds its deadline
 */
export class TimeoutError extends ApplicationError {
  constructor(
    message: string,
    public readonly timeoutMs?: number,
    public readonly operation?: string,
  ) {
    super(message, 'TIMEOUT', { timeoutMs, operation });
    this.name = 'TimeoutError';
  }
}

/**
 * The caller aborted the operation
 */
export class CancelledError extends ApplicationError {
  constructor(
    message: string,
    public readonly operation?: string,
  ) {
    super(message, 'CANCELLED', { operation });
    this.name = 'CancelledError';
  }
}

export function isApplicationError(error: unknown): error is ApplicationError {
  return error instanceof ApplicationError;
}

export function isNotFoundError(error: unknown): error is NotFoundError {
  return error instanceof NotFoundError;
}

export function isValidationError(error: unknown): error is ValidationError {
  return error instanceof ValidationError;
}

export function isConfigError(error: unknown): error is ConfigError {
  return error instanceof ConfigError;
}

export function isConnectionError(error: unknown): error is ConnectionError {
  return error instanceof ConnectionError;
}

export function isCancelledError(error: unknown): error is CancelledError {
  return error instanceof CancelledError;
}

/**
 * Extract a message from anything that was thrown
 */
export function errorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return typeof error === 'string' ? error : 'Unknown error';
}

/**
 * Default retry predicate: everything is transient except terminal error
 * kinds and messages reporting that something was not found.
 */
export function isRetryableError(error: unknown): boolean {
  if (
    error instanceof NotFoundError ||
    error instanceof ValidationError ||
    error instanceof ConfigError ||
    error instanceof CancelledError ||
    error instanceof TimeoutError
  ) {
    return false;
  }
  return !errorMessage(error).toLowerCase().includes('not found');
}

/**
 * Helper function to convert unknown errors to our error types
 */
export function normalizeError(
  error: unknown,
  defaultMessage = 'An unexpected error occurred',
): ApplicationError {
  if (isApplicationError(error)) {
    return error;
  }

  if (error instanceof Error) {
    const message = error.message.toLowerCase();

    if (message.includes('timeout') || message.includes('timed out')) {
      return new TimeoutError(error.message);
    }

    if (message.includes('not found') || message.includes('404')) {
      return new NotFoundError(error.message);
    }

    if (message.includes('econnrefused') || message.includes('unauthorized')) {
      return new ConnectionError(error.message, undefined, error);
    }

    return new TransientError(error.message, 'unknown', 1, error);
  }

  return new ValidationError(typeof error === 'string' ? error : defaultMessage, undefined, {
    originalError: error,
  });
}
