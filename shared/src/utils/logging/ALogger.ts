/**
 * Abstract Logger
 *
 * Base class for structured logging. Components accept an ALogger so the
 * host process can route their output wherever it wants.
 *
 * @see Logger for the console implementation
 */

/**
 * Context metadata attached to log entries.
 */
export interface LogContext {
  /** Component name (e.g., 'MetricsPipeline', 'ShutdownManager') */
  component?: string;
  /** Additional context fields */
  [key: string]: unknown;
}

/**
 * Abstract logger.
 */
export abstract class ALogger {
  /**
   * Log a debug message.
   */
  abstract debug(message: string, context?: LogContext): void;

  /**
   * Log an info message.
   */
  abstract info(message: string, context?: LogContext): void;

  /**
   * Log a warning message.
   */
  abstract warn(message: string, context?: LogContext): void;

  /**
   * Log an error message.
   */
  abstract error(message: string, error?: Error | unknown, context?: LogContext): void;
}
