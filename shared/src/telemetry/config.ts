/**
 * Metrics Configuration
 *
 * Turns environment settings into `initMetrics()` options.
 *
 * Environment variables:
 * - METRICS_ENDPOINT: collector endpoint (unix://, grpc://, grpcs://, http://, https://)
 * - METRICS_INTERVAL_MS: export cadence (default: 60000)
 * - METRICS_EXPORT_TIMEOUT_MS: per-export timeout (default: 10000)
 * - METRICS_HOST_ENABLED: collect host/process metrics (default: true)
 * - SERVICE_NAME / SERVICE_VERSION: identity attached to every data point
 */

import { config as processConfig, envSchema } from '../config/env.js';
import { ConfigurationError } from '../utils/errorTypes.js';
import { logger } from '../utils/logging/logger.js';

import type { EnvConfig } from '../config/env.js';
import type { InitMetricsOptions } from './metricsPipeline.doc.js';

export type MetricsConfig = Required<
  Pick<InitMetricsOptions, 'endpoint' | 'intervalMs' | 'componentName' | 'componentVersion' | 'exportTimeoutMillis' | 'hostMetrics'>
>;

/**
 * Load metrics configuration.
 *
 * @param env - Environment to read; defaults to the already-validated process environment
 * @throws ConfigurationError when a variable is malformed or no endpoint is set
 */
export function loadMetricsConfig(env?: NodeJS.ProcessEnv): MetricsConfig {
  let settings: EnvConfig;

  if (env === undefined) {
    settings = processConfig;
  } else {
    const result = envSchema.safeParse(env);
    if (!result.success) {
      const issue = result.error.errors[0];
      throw ConfigurationError.invalid(issue.path.join('.'), issue.message, {
        issues: result.error.errors.length,
      });
    }
    settings = result.data;
  }

  if (settings.METRICS_ENDPOINT === '') {
    throw new ConfigurationError(
      'No metrics endpoint provided, metrics will not be collected',
      'METRICS_ENDPOINT'
    );
  }

  return {
    endpoint: settings.METRICS_ENDPOINT,
    intervalMs: settings.METRICS_INTERVAL_MS,
    componentName: settings.SERVICE_NAME,
    componentVersion: settings.SERVICE_VERSION,
    exportTimeoutMillis: settings.METRICS_EXPORT_TIMEOUT_MS,
    hostMetrics: settings.METRICS_HOST_ENABLED,
  };
}

/**
 * Log the current metrics configuration
 */
export function logMetricsConfig(metricsConfig: MetricsConfig): void {
  logger.info('Metrics configuration', {
    component: 'MetricsConfig',
    service: `${metricsConfig.componentName} v${metricsConfig.componentVersion}`,
    endpoint: metricsConfig.endpoint,
    intervalMs: metricsConfig.intervalMs,
    exportTimeoutMs: metricsConfig.exportTimeoutMillis,
    hostMetrics: metricsConfig.hostMetrics,
  });
}
