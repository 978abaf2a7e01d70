import type { Meter } from '@opentelemetry/api';

import type { IShutdownHandler } from '../lifecycle/shutdownHandler.js';
import type { IMetricsPipelineDocumentation } from './metricsPipeline.doc.js';
import type { MetricsShutdownOptions } from './metricsPipeline.doc.js';
import type { MetricsPipelineStats } from './metricsPipeline.doc.js';

export type {
  InitMetricsOptions,
  MeterProviderRegistry,
  MetricsEndpoint,
  MetricsPipelineState,
  MetricsPipelineStats,
  MetricsShutdownOptions,
  MetricsTransport,
} from './metricsPipeline.doc.js';

/**
 * A pipeline is also a shutdown handler, so hosts can hand it straight to a
 * ShutdownManager.
 */
export abstract class AMetricsPipeline implements IMetricsPipelineDocumentation, IShutdownHandler {
  abstract readonly name: string;

  abstract readonly priority: number;

  abstract readonly resourceAttributes: Readonly<Record<string, string>>;

  abstract getMeter(name: string, version?: string): Meter;

  abstract shutdown(options?: MetricsShutdownOptions): Promise<void>;

  abstract isShutdown(): boolean;

  abstract getStats(): MetricsPipelineStats;
}
