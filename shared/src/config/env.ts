/**
 * Centralized Environment Configuration
 *
 * This module is the SINGLE SOURCE OF TRUTH for environment variables.
 * All environment variable access MUST go through this module.
 *
 * Features:
 * - Zod schema validation with type safety
 * - Default values for every optional setting
 * - Clear error messages for missing/invalid config
 *
 * Usage:
 *   import { LOG_LEVEL, METRICS_ENDPOINT } from '@edge-telemetry/shared';
 *
 * DO NOT use process.env directly elsewhere in the codebase.
 */

import { z } from 'zod';

// =============================================================================
// SCHEMA DEFINITIONS
// =============================================================================

/**
 * Helper to parse optional boolean env vars with default
 */
export const optionalBoolean = (defaultValue: boolean) =>
  z
    .enum(['true', 'false', '1', '0', ''])
    .optional()
    .transform((val) => (val === undefined || val === '' ? defaultValue : val === 'true' || val === '1'));

/**
 * Helper to parse integer env vars with default
 */
export const integerWithDefault = (defaultValue: number) =>
  z
    .string()
    .optional()
    .transform((val) => (val ? Number(val) : defaultValue))
    .refine((val) => Number.isInteger(val), { message: 'Must be a valid integer' });

/**
 * Helper for optional string with default
 */
export const optionalString = (defaultValue: string) =>
  z
    .string()
    .optional()
    .transform((val) => val || defaultValue);

/**
 * Main environment configuration schema
 */
export const envSchema = z.object({
  // -------------------------------------------------------------------------
  // Node Environment
  // -------------------------------------------------------------------------
  NODE_ENV: optionalString('development'),

  // -------------------------------------------------------------------------
  // Logging
  // -------------------------------------------------------------------------
  VERBOSE_MODE: z.enum(['off', 'on', 'debug']).optional().default('off'),
  LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error']).optional(), // Computed below if not set

  // -------------------------------------------------------------------------
  // Service identity (attached to exported metrics)
  // -------------------------------------------------------------------------
  SERVICE_NAME: optionalString('edge-agent'),
  SERVICE_VERSION: optionalString('0.0.0'),

  // -------------------------------------------------------------------------
  // Metrics export
  // -------------------------------------------------------------------------
  METRICS_ENDPOINT: optionalString(''),
  METRICS_INTERVAL_MS: integerWithDefault(60000), // 1 minute
  METRICS_EXPORT_TIMEOUT_MS: integerWithDefault(10000),
  METRICS_HOST_ENABLED: optionalBoolean(true),

  // -------------------------------------------------------------------------
  // Graceful Shutdown
  // -------------------------------------------------------------------------
  SHUTDOWN_TIMEOUT_MS: integerWithDefault(30000),
});

export type EnvConfig = z.infer<typeof envSchema>;

// =============================================================================
// PARSE AND VALIDATE
// =============================================================================

const parseResult = envSchema.safeParse(process.env);

if (!parseResult.success) {
  console.error('Environment validation failed:');
  for (const error of parseResult.error.errors) {
    console.error(`  ${error.path.join('.')}: ${error.message}`);
  }
}

// Fall back to schema defaults when the environment is invalid
const parsedEnv: EnvConfig = parseResult.success ? parseResult.data : envSchema.parse({});

// =============================================================================
// EXPORTED CONFIGURATION VALUES
// =============================================================================

export const NODE_ENV = parsedEnv.NODE_ENV;

export const VERBOSE_MODE = parsedEnv.VERBOSE_MODE;
export const LOG_LEVEL = parsedEnv.LOG_LEVEL ?? (VERBOSE_MODE === 'debug' ? 'debug' : 'info');

export const SERVICE_NAME = parsedEnv.SERVICE_NAME;
export const SERVICE_VERSION = parsedEnv.SERVICE_VERSION;

export const METRICS_ENDPOINT = parsedEnv.METRICS_ENDPOINT;
export const METRICS_INTERVAL_MS = parsedEnv.METRICS_INTERVAL_MS;
export const METRICS_EXPORT_TIMEOUT_MS = parsedEnv.METRICS_EXPORT_TIMEOUT_MS;
export const METRICS_HOST_ENABLED = parsedEnv.METRICS_HOST_ENABLED;

export const SHUTDOWN_TIMEOUT_MS = parsedEnv.SHUTDOWN_TIMEOUT_MS;

/**
 * The whole parsed environment, for modules that take it as one object.
 */
export const config: Readonly<EnvConfig> = Object.freeze({ ...parsedEnv });

// =============================================================================
// HELPERS
// =============================================================================

export function isVerbose(): boolean {
  return VERBOSE_MODE !== 'off';
}

export function isDebugLevel(): boolean {
  return VERBOSE_MODE === 'debug' || LOG_LEVEL === 'debug';
}

export function isProduction(): boolean {
  return NODE_ENV === 'production';
}

/**
 * Validate an arbitrary environment object against the schema without
 * touching the process-wide values. Returns the list of problems found.
 */
export function validateEnv(env: NodeJS.ProcessEnv): { valid: boolean; errors: string[] } {
  const result = envSchema.safeParse(env);
  if (result.success) {
    return { valid: true, errors: [] };
  }
  return {
    valid: false,
    errors: result.error.errors.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
  };
}
