/**
 * Timing Utilities
 *
 * Sleep and deadline helpers. A deadline merges an optional caller
 * AbortSignal with an optional timeout into one signal plus a promise that
 * rejects when either fires.
 */

import { ConfigurationError, DeadlineExceededError } from './errorTypes.js';

/**
 * Sleep for a specified number of milliseconds.
 *
 * @example
 * ```typescript
 * await sleep(1000); // Wait 1 second
 * ```
 */
export function sleep(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}

/**
 * Options describing when an operation must give up.
 */
export interface DeadlineOptions {
  /** Caller-owned cancellation; aborting it expires the deadline */
  signal?: AbortSignal;
  /** Relative timeout in milliseconds */
  timeoutMs?: number;
}

export interface Deadline {
  /** Aborted once the deadline expires */
  readonly signal: AbortSignal;
  /** Whether the deadline had already expired */
  expired(): boolean;
  /**
   * Race `work` against the deadline. Rejects with DeadlineExceededError
   * naming `operation` if the deadline wins.
   */
  race<T>(work: Promise<T>, operation: string): Promise<T>;
  /** Release the timer and the listener on the caller's signal */
  dispose(): void;
}

/**
 * Create a deadline from a caller signal and/or a timeout.
 * With neither, the deadline never expires. A timeout of zero or less has
 * already expired.
 *
 * @throws ConfigurationError if `timeoutMs` is not a finite number
 */
export function createDeadline(options: DeadlineOptions = {}): Deadline {
  const { signal: parent, timeoutMs } = options;
  if (timeoutMs !== undefined && !Number.isFinite(timeoutMs)) {
    throw ConfigurationError.invalid('timeoutMs', 'must be a finite number of milliseconds', {
      value: timeoutMs,
    });
  }

  const controller = new AbortController();

  let timeoutId: NodeJS.Timeout | undefined;

  const onParentAbort = (): void => {
    controller.abort(parent?.reason);
  };

  if (parent) {
    if (parent.aborted) {
      controller.abort(parent.reason);
    } else {
      parent.addEventListener('abort', onParentAbort, { once: true });
    }
  }

  if (timeoutMs !== undefined && !controller.signal.aborted) {
    if (timeoutMs <= 0) {
      controller.abort(new Error(`Timed out after ${timeoutMs}ms`));
    } else {
      timeoutId = setTimeout(() => controller.abort(new Error(`Timed out after ${timeoutMs}ms`)), timeoutMs);
    }
  }

  const dispose = (): void => {
    if (timeoutId !== undefined) {
      clearTimeout(timeoutId);
      timeoutId = undefined;
    }
    parent?.removeEventListener('abort', onParentAbort);
  };

  return {
    signal: controller.signal,
    expired: () => controller.signal.aborted,
    dispose,
    race<T>(work: Promise<T>, operation: string): Promise<T> {
      const { signal } = controller;
      return new Promise<T>((resolve, reject) => {
        const onAbort = (): void => {
          reject(new DeadlineExceededError(operation, signal.reason));
        };
        if (signal.aborted) {
          onAbort();
        } else {
          signal.addEventListener('abort', onAbort, { once: true });
        }
        // Settling after the deadline has won is a no-op, but the work's
        // outcome is still observed.
        work.then(
          (value) => {
            signal.removeEventListener('abort', onAbort);
            resolve(value);
          },
          (error: unknown) => {
            signal.removeEventListener('abort', onAbort);
            reject(error);
          }
        );
      });
    },
  };
}
