/**
 * Lifecycle Management
 *
 * Deadline-bounded, priority-ordered shutdown of long-lived components.
 */

export { ShutdownManager, shutdownManager } from './shutdownManager.js';
export { ShutdownPriority, createShutdownHandler } from './shutdownHandler.js';

export type { HandlerOutcome, ShutdownOptions, ShutdownReport } from './shutdownManager.js';
export type { IShutdownHandler, ShutdownContext } from './shutdownHandler.js';
