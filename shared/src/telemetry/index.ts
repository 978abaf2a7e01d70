/**
 * OpenTelemetry Metrics Pipeline
 *
 * ## Quick Start
 *
 * ```typescript
 * import { initMetrics, loadMetricsConfig, shutdownManager } from '@edge-telemetry/shared';
 *
 * const pipeline = initMetrics(loadMetricsConfig());
 * shutdownManager.register(pipeline);
 *
 * const updates = pipeline.getMeter('updater').createCounter('updates.applied');
 * updates.add(1);
 *
 * // at teardown: flush, close, report
 * await shutdownManager.shutdown('SIGTERM');
 * ```
 *
 * A pipeline never touches the OpenTelemetry global unless it is given
 * `registry: globalMeterProviderRegistry`.
 */

export { initMetrics, MetricsPipeline, DEFAULT_EXPORT_TIMEOUT_MS } from './metricsPipeline.js';
export { AMetricsPipeline } from './AMetricsPipeline.js';
export { parseMetricsEndpoint } from './endpoint.js';
export { ObservedMetricExporter, createOtlpMetricExporter, type ExportCounters } from './exporter.js';
export { createGlobalMeterProviderRegistry, globalMeterProviderRegistry } from './registry.js';
export { loadMetricsConfig, logMetricsConfig, type MetricsConfig } from './config.js';

export type {
  InitMetricsOptions,
  MeterProviderRegistry,
  MetricsEndpoint,
  MetricsPipelineState,
  MetricsPipelineStats,
  MetricsShutdownOptions,
  MetricsTransport,
} from './AMetricsPipeline.js';
