/**
 * Shutdown handler contract
 *
 * Anything with a `shutdown()` that should run when the process winds
 * down: a metrics pipeline, an intake loop, a background timer.
 */

/**
 * Run order for handlers. Lower values run first.
 */
export enum ShutdownPriority {
  /** Stop taking new work */
  STOP_ACCEPTING = 100,
  /** Stop timers and background loops */
  STOP_BACKGROUND = 200,
  /** Release connections and temporary resources */
  CLEANUP = 600,
  /** Flush telemetry after everything it measures has stopped */
  FLUSH_TELEMETRY = 800,
}

export interface ShutdownContext {
  /** Aborted when the handler's deadline passes */
  signal?: AbortSignal;
}

export interface IShutdownHandler {
  /** Appears in logs and in the shutdown report */
  readonly name: string;
  /** Defaults to ShutdownPriority.CLEANUP */
  readonly priority?: number;
  shutdown(context?: ShutdownContext): Promise<void>;
}

/**
 * Wrap a cleanup function as a handler. The function receives the
 * handler's deadline signal.
 *
 * @example
 * ```typescript
 * shutdownManager.register(
 *   createShutdownHandler('poller', () => clearInterval(timer), ShutdownPriority.STOP_BACKGROUND)
 * );
 * ```
 */
export function createShutdownHandler(
  name: string,
  cleanup: (signal?: AbortSignal) => void | Promise<void>,
  priority: number = ShutdownPriority.CLEANUP
): IShutdownHandler {
  return {
    name,
    priority,
    async shutdown(context?: ShutdownContext): Promise<void> {
      await cleanup(context?.signal);
    },
  };
}
