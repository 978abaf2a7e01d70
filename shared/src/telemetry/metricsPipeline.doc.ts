/**
 * Metrics Pipeline Documentation Interface
 *
 * A metrics pipeline owns one exporter, one meter provider and one periodic
 * reader. It is created by `initMetrics()` and torn down through its own
 * `shutdown()`; nothing about it is global unless the caller passes a
 * registry that makes it so.
 *
 * @see AMetricsPipeline for the abstract base class
 * @see MetricsPipeline for the concrete implementation
 */

import type { Meter, MeterProvider } from '@opentelemetry/api';

import type { ALogger } from '../utils/logging/ALogger.js';
import type { ShutdownContext } from '../lifecycle/shutdownHandler.js';

/**
 * Wire transport used to reach the collector.
 */
export type MetricsTransport = 'grpc' | 'http';

/**
 * Endpoint after scheme parsing.
 */
export interface MetricsEndpoint {
  /** Endpoint exactly as configured */
  raw: string;
  /** Lower-cased scheme without the trailing colon (e.g. 'unix', 'grpcs') */
  scheme: string;
  transport: MetricsTransport;
  /** URL the transport sends to */
  url: string;
}

/**
 * Makes a pipeline's meter provider "the" process provider, and undoes it.
 */
export interface MeterProviderRegistry {
  register(provider: MeterProvider): void;
  unregister(provider: MeterProvider): void;
}

/**
 * Options accepted by `initMetrics()`.
 */
export interface InitMetricsOptions {
  /**
   * Collector endpoint with a scheme selecting the transport:
   * `unix:///path`, `grpc://host:port`, `grpcs://host:port`,
   * `http://host:port[/path]` or `https://host:port[/path]`.
   */
  endpoint: string;
  /** Export cadence in milliseconds. Must be positive. */
  intervalMs: number;
  /** Becomes the `service.name` resource attribute */
  componentName: string;
  /** Becomes the `service.version` resource attribute */
  componentVersion: string;
  /**
   * Upper bound for a single export. Capped at `intervalMs`.
   * Default: 10000
   */
  exportTimeoutMillis?: number;
  /**
   * Collect process and host metrics (CPU, memory, network).
   * Default: true
   */
  hostMetrics?: boolean;
  /** Process-wide registration; omitted means none */
  registry?: MeterProviderRegistry;
  /** Cancels initialization if already aborted */
  signal?: AbortSignal;
  logger?: ALogger;
}

/**
 * Options accepted by `shutdown()`.
 */
export interface MetricsShutdownOptions extends ShutdownContext {
  /** Relative deadline in milliseconds, combined with `signal` */
  timeoutMs?: number;
}

export type MetricsPipelineState = 'running' | 'shutting_down' | 'shut_down';

export interface MetricsPipelineStats {
  state: MetricsPipelineState;
  transport: MetricsTransport;
  endpoint: string;
  /** Exports attempted so far, periodic and final */
  exportCount: number;
  failedExportCount: number;
  lastExportError: string | null;
}

export interface IMetricsPipelineDocumentation {
  /**
   * Identity attributes (`service.name`, `service.version`) attached to
   * every exported data point, on top of the SDK's default resource.
   */
  readonly resourceAttributes: Readonly<Record<string, string>>;

  /**
   * Get a meter bound to this pipeline only.
   * Meters obtained after shutdown record nothing.
   *
   * @example
   * ```typescript
   * const counter = pipeline.getMeter('updater').createCounter('updates.applied');
   * counter.add(1);
   * ```
   */
  getMeter(name: string, version?: string): Meter;

  /**
   * Stop the periodic trigger, flush buffered readings, then close the
   * transport.
   *
   * Resolves only when flush and close both succeed before the deadline.
   * Rejects with TransportError when the collector is unreachable or
   * refuses the data, DeadlineExceededError when `signal` aborts or
   * `timeoutMs` elapses first, and AlreadyShutdownError on any call after
   * the first.
   */
  shutdown(options?: MetricsShutdownOptions): Promise<void>;

  isShutdown(): boolean;

  getStats(): MetricsPipelineStats;
}
