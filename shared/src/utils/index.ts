/**
 * Shared utilities
 * @module utils
 */

export * from './logging/index.js';
export * from './errorTypes.js';
export { sleep, createDeadline } from './timing.js';
export type { Deadline, DeadlineOptions } from './timing.js';
export { readFromCommand, execFileExecutor } from './command.js';
export type { CommandExecutor, CommandOutcome } from './command.js';
