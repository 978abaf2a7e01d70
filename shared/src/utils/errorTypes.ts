/**
 * Common Error Type Definitions
 *
 * Domain errors raised by the metrics pipeline and process helpers, plus
 * helpers for reading properties off Node.js and gRPC errors.
 */

/**
 * Extended error interface for Node.js/network errors
 */
export interface NetworkError extends Error {
  /** Node.js error code (e.g., ENOENT, ECONNREFUSED) or numeric gRPC status */
  code?: string | number;
  /** Details string carried by gRPC service errors */
  details?: string;
}

/**
 * Type guard to check if an error carries a `code` property.
 */
export function isNetworkError(error: unknown): error is NetworkError {
  return error instanceof Error && 'code' in error;
}

/**
 * Get the error code from an error, if available.
 * Numeric codes (gRPC status codes) are returned as strings.
 */
export function getErrorCode(error: unknown): string | undefined {
  if (!isNetworkError(error)) {
    return undefined;
  }
  const { code } = error;
  if (typeof code === 'string' || typeof code === 'number') {
    return String(code);
  }
  return undefined;
}

/**
 * Turn anything thrown into a readable message.
 */
export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}

// =============================================================================
// DOMAIN ERRORS
// =============================================================================

/**
 * Error type discriminator for domain errors.
 * Used in discriminated unions for exhaustive error handling.
 */
export type DomainErrorType =
  | 'CONFIGURATION_ERROR'
  | 'TRANSPORT_ERROR'
  | 'DEADLINE_EXCEEDED'
  | 'ALREADY_SHUT_DOWN'
  | 'COMMAND_ERROR';

/**
 * Base class for domain-specific errors.
 */
export abstract class DomainError extends Error {
  abstract readonly type: DomainErrorType;

  constructor(
    message: string,
    public readonly context?: Record<string, unknown>,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = this.constructor.name;
    // Maintains proper stack trace for where our error was thrown (only available on V8)
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  toJSON(): { type: DomainErrorType; message: string; context?: Record<string, unknown> } {
    return {
      type: this.type,
      message: this.message,
      ...(this.context && { context: this.context }),
    };
  }
}

/**
 * Invalid configuration handed to a component. Raised synchronously,
 * before any resource is acquired, so the caller can fix and retry.
 *
 * @example
 * throw ConfigurationError.required('endpoint');
 * throw ConfigurationError.invalid('intervalMs', 'must be a positive number', { value: 0 });
 */
export class ConfigurationError extends DomainError {
  readonly type = 'CONFIGURATION_ERROR' as const;

  constructor(
    message: string,
    public readonly field?: string,
    context?: Record<string, unknown>
  ) {
    super(message, { ...context, ...(field && { field }) });
  }

  static required(field: string): ConfigurationError {
    return new ConfigurationError(`${field} is required`, field);
  }

  static invalid(field: string, reason: string, context?: Record<string, unknown>): ConfigurationError {
    return new ConfigurationError(`Invalid ${field}: ${reason}`, field, context);
  }
}

/**
 * The collector could not be reached, refused the data, or failed while
 * the transport was being closed. Never retried internally.
 */
export class TransportError extends DomainError {
  readonly type = 'TRANSPORT_ERROR' as const;
  readonly code?: string;

  constructor(
    message: string,
    public readonly endpoint: string,
    cause?: unknown,
    context?: Record<string, unknown>
  ) {
    const code = getErrorCode(cause);
    super(message, { ...context, endpoint, ...(code && { code }) }, { cause });
    this.code = code;
  }
}

/**
 * The caller's deadline expired before the operation finished.
 * Distinct from TransportError so callers can retry with a longer deadline.
 */
export class DeadlineExceededError extends DomainError {
  readonly type = 'DEADLINE_EXCEEDED' as const;

  constructor(
    public readonly operation: string,
    cause?: unknown,
    context?: Record<string, unknown>
  ) {
    super(`Deadline exceeded during ${operation}`, { ...context, operation }, { cause });
  }
}

/**
 * Shutdown was requested on something that has already been shut down.
 */
export class AlreadyShutdownError extends DomainError {
  readonly type = 'ALREADY_SHUT_DOWN' as const;

  constructor(public readonly resource: string) {
    super(`${resource} has already been shut down`, { resource });
  }
}

/**
 * An external command failed to launch or exited with a non-zero status.
 */
export class CommandError extends DomainError {
  readonly type = 'COMMAND_ERROR' as const;

  constructor(
    message: string,
    public readonly command: string,
    public readonly args: readonly string[],
    public readonly stderr: string,
    cause?: unknown
  ) {
    super(message, { command, args: [...args], exitCode: getErrorCode(cause) }, { cause });
  }
}

// =============================================================================
// TYPE GUARDS
// =============================================================================

export type AnyDomainError =
  | ConfigurationError
  | TransportError
  | DeadlineExceededError
  | AlreadyShutdownError
  | CommandError;

export function isDomainError(error: unknown): error is AnyDomainError {
  return error instanceof DomainError;
}

export function isConfigurationError(error: unknown): error is ConfigurationError {
  return error instanceof ConfigurationError;
}

export function isTransportError(error: unknown): error is TransportError {
  return error instanceof TransportError;
}

export function isDeadlineExceededError(error: unknown): error is DeadlineExceededError {
  return error instanceof DeadlineExceededError;
}

export function isAlreadyShutdownError(error: unknown): error is AlreadyShutdownError {
  return error instanceof AlreadyShutdownError;
}

export function isCommandError(error: unknown): error is CommandError {
  return error instanceof CommandError;
}
