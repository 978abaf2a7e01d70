import { ShutdownPriority } from './shutdownHandler.js';
import { SHUTDOWN_TIMEOUT_MS } from '../config/env.js';
import { logger as defaultLogger } from '../utils/logging/logger.js';
import { createDeadline } from '../utils/timing.js';
import { AlreadyShutdownError, getErrorMessage, isDeadlineExceededError } from '../utils/errorTypes.js';

import type { IShutdownHandler } from './shutdownHandler.js';
import type { ALogger } from '../utils/logging/ALogger.js';

const DEFAULT_HANDLER_TIMEOUT_MS = 5000;

export interface ShutdownOptions {
  /** Budget for the whole run. Default: SHUTDOWN_TIMEOUT_MS */
  totalTimeoutMs?: number;
  /** Upper bound for one handler. Default: 5000 */
  handlerTimeoutMs?: number;
}

export interface HandlerOutcome {
  name: string;
  priority: number;
  durationMs: number;
  /** Set when the handler rejected or ran out of time */
  error?: string;
  timedOut: boolean;
}

export interface ShutdownReport {
  /** Every handler ran and none failed */
  success: boolean;
  durationMs: number;
  /** In run order */
  outcomes: HandlerOutcome[];
  /** Handlers not started because the total budget was spent */
  skipped: string[];
}

function priorityOf(handler: IShutdownHandler): number {
  return handler.priority ?? ShutdownPriority.CLEANUP;
}

/**
 * Runs registered handlers once, lowest priority first and in registration
 * order within a priority.
 *
 * Each handler's deadline is the smaller of `handlerTimeoutMs` and what is
 * left of `totalTimeoutMs`. The handler's signal aborts when it passes.
 * A handler that fails or times out does not stop the ones after it.
 */
export class ShutdownManager {
  private readonly handlers: IShutdownHandler[] = [];
  private run: Promise<ShutdownReport> | null = null;

  constructor(private readonly logger: ALogger = defaultLogger) {}

  /**
   * @throws AlreadyShutdownError once a shutdown has started
   */
  register(handler: IShutdownHandler): void {
    if (this.run !== null) {
      throw new AlreadyShutdownError('Shutdown manager');
    }
    this.handlers.push(handler);
  }

  isShuttingDown(): boolean {
    return this.run !== null;
  }

  /**
   * Never rejects. Later calls return the first call's report.
   */
  shutdown(reason: string, options: ShutdownOptions = {}): Promise<ShutdownReport> {
    this.run ??= this.runHandlers(reason, options);
    return this.run;
  }

  private async runHandlers(reason: string, options: ShutdownOptions): Promise<ShutdownReport> {
    const totalTimeoutMs = options.totalTimeoutMs ?? SHUTDOWN_TIMEOUT_MS;
    const handlerTimeoutMs = options.handlerTimeoutMs ?? DEFAULT_HANDLER_TIMEOUT_MS;
    const ordered = [...this.handlers].sort((a, b) => priorityOf(a) - priorityOf(b));
    const startTime = Date.now();

    this.logger.info('Shutting down', {
      component: 'ShutdownManager',
      reason,
      handlers: ordered.length,
    });

    const outcomes: HandlerOutcome[] = [];
    const skipped: string[] = [];
    for (const handler of ordered) {
      const remainingMs = totalTimeoutMs - (Date.now() - startTime);
      if (remainingMs <= 0) {
        skipped.push(handler.name);
      } else {
        outcomes.push(await this.runHandler(handler, Math.min(handlerTimeoutMs, remainingMs)));
      }
    }

    const report: ShutdownReport = {
      success: skipped.length === 0 && outcomes.every((outcome) => outcome.error === undefined),
      durationMs: Date.now() - startTime,
      outcomes,
      skipped,
    };

    if (skipped.length > 0) {
      this.logger.warn('Shutdown budget spent before every handler ran', {
        component: 'ShutdownManager',
        skipped: skipped.join(', '),
      });
    }
    this.logger.info('Shutdown finished', {
      component: 'ShutdownManager',
      reason,
      success: report.success,
      durationMs: report.durationMs,
    });

    return report;
  }

  private async runHandler(handler: IShutdownHandler, timeoutMs: number): Promise<HandlerOutcome> {
    const deadline = createDeadline({ timeoutMs });
    const priority = priorityOf(handler);
    const startTime = Date.now();

    try {
      await deadline.race(handler.shutdown({ signal: deadline.signal }), `shutdown of ${handler.name}`);
      return { name: handler.name, priority, durationMs: Date.now() - startTime, timedOut: false };
    } catch (error) {
      const timedOut = isDeadlineExceededError(error);
      this.logger.error(timedOut ? 'Shutdown handler timed out' : 'Shutdown handler failed', error, {
        component: 'ShutdownManager',
        handler: handler.name,
      });
      return {
        name: handler.name,
        priority,
        durationMs: Date.now() - startTime,
        error: getErrorMessage(error),
        timedOut,
      };
    } finally {
      deadline.dispose();
    }
  }
}

/**
 * Process-level manager for hosts that want one. Components never reach for
 * it themselves; the host registers them explicitly.
 */
export const shutdownManager = new ShutdownManager();
