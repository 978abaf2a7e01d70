/**
 * Logging utilities
 * @module utils/logging
 */

export { ALogger, type LogContext } from './ALogger.js';
export { logger, silentLogger } from './logger.js';
