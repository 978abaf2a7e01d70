/**
 * Metrics lifecycle for long-running edge components
 */

// =============================================================================
// UTILITIES - Logging, errors, deadlines, subprocesses
// =============================================================================
export * from './utils/index.js';

// =============================================================================
// DOMAIN MODULES
// =============================================================================

// Configuration
export * from './config/index.js';

// Graceful shutdown
export * from './lifecycle/index.js';

// Metrics pipeline
export * from './telemetry/index.js';
