import { HostMetrics } from '@opentelemetry/host-metrics';
import { Resource } from '@opentelemetry/resources';
import { MeterProvider, PeriodicExportingMetricReader } from '@opentelemetry/sdk-metrics';
import { ATTR_SERVICE_NAME, ATTR_SERVICE_VERSION } from '@opentelemetry/semantic-conventions';

import { AMetricsPipeline } from './AMetricsPipeline.js';
import { parseMetricsEndpoint } from './endpoint.js';
import { ObservedMetricExporter, createOtlpMetricExporter } from './exporter.js';
import { ShutdownPriority } from '../lifecycle/shutdownHandler.js';
import { logger as defaultLogger } from '../utils/logging/logger.js';
import { createDeadline } from '../utils/timing.js';
import {
  AlreadyShutdownError,
  ConfigurationError,
  DeadlineExceededError,
  TransportError,
  getErrorMessage,
  isDeadlineExceededError,
} from '../utils/errorTypes.js';

import type { Meter } from '@opentelemetry/api';
import type { ALogger } from '../utils/logging/ALogger.js';
import type {
  InitMetricsOptions,
  MeterProviderRegistry,
  MetricsEndpoint,
  MetricsPipelineState,
  MetricsPipelineStats,
  MetricsShutdownOptions,
} from './AMetricsPipeline.js';

export const DEFAULT_EXPORT_TIMEOUT_MS = 10000;

interface MetricsPipelineParts {
  endpoint: MetricsEndpoint;
  componentName: string;
  componentVersion: string;
  meterProvider: MeterProvider;
  exporter: ObservedMetricExporter;
  registry?: MeterProviderRegistry;
  logger: ALogger;
}

export class MetricsPipeline extends AMetricsPipeline {
  readonly name: string;
  readonly priority: number = ShutdownPriority.FLUSH_TELEMETRY;
  readonly resourceAttributes: Readonly<Record<string, string>>;

  private state: MetricsPipelineState = 'running';
  private readonly endpoint: MetricsEndpoint;
  private readonly meterProvider: MeterProvider;
  private readonly exporter: ObservedMetricExporter;
  private readonly registry?: MeterProviderRegistry;
  private readonly logger: ALogger;

  constructor(parts: MetricsPipelineParts) {
    super();
    this.name = `metrics:${parts.componentName}`;
    this.resourceAttributes = Object.freeze({
      [ATTR_SERVICE_NAME]: parts.componentName,
      [ATTR_SERVICE_VERSION]: parts.componentVersion,
    });
    this.endpoint = parts.endpoint;
    this.meterProvider = parts.meterProvider;
    this.exporter = parts.exporter;
    this.registry = parts.registry;
    this.logger = parts.logger;
  }

  getMeter(name: string, version?: string): Meter {
    return this.meterProvider.getMeter(name, version);
  }

  async shutdown(options: MetricsShutdownOptions = {}): Promise<void> {
    if (this.state !== 'running') {
      throw new AlreadyShutdownError(`Metrics pipeline ${this.name}`);
    }
    // Invalid options leave the pipeline running
    const deadline = createDeadline(options);
    this.state = 'shutting_down';
    const startTime = Date.now();

    try {
      this.registry?.unregister(this.meterProvider);

      const failuresBefore = this.exporter.getCounters().failedExportCount;

      // The reader clears its interval before its first await, so no
      // periodic tick starts once this call returns.
      const flushed = this.meterProvider.shutdown();

      let failure: unknown = null;
      try {
        await deadline.race(flushed, 'metrics flush');
      } catch (error) {
        failure = error;
      }

      if (isDeadlineExceededError(failure)) {
        // Closing the transport cancels the flush still in flight.
        void this.exporter.shutdown().catch((error: unknown) => {
          this.logger.debug('Metrics transport close after deadline failed', {
            component: 'MetricsPipeline',
            endpoint: this.endpoint.raw,
            error: getErrorMessage(error),
          });
        });
        throw failure;
      }

      try {
        await deadline.race(this.exporter.shutdown(), 'metrics transport close');
      } catch (error) {
        if (failure === null || isDeadlineExceededError(error)) {
          failure = error;
        }
      }

      if (isDeadlineExceededError(failure)) {
        throw failure;
      }

      // The reader reports a failed final export to the diag logger and
      // resolves anyway; the exporter's counters are what tell.
      const counters = this.exporter.getCounters();
      if (failure === null && counters.failedExportCount > failuresBefore) {
        failure = counters.lastExportError;
      }
      if (failure !== null) {
        throw this.toTransportError(failure);
      }

      this.logger.info('Metrics pipeline shut down', {
        component: 'MetricsPipeline',
        endpoint: this.endpoint.raw,
        durationMs: Date.now() - startTime,
        exports: this.exporter.getCounters().exportCount,
      });
    } catch (error) {
      this.logger.warn('Metrics pipeline shutdown failed', {
        component: 'MetricsPipeline',
        endpoint: this.endpoint.raw,
        durationMs: Date.now() - startTime,
        error: getErrorMessage(error),
      });
      throw error;
    } finally {
      this.state = 'shut_down';
      deadline.dispose();
    }
  }

  isShutdown(): boolean {
    return this.state !== 'running';
  }

  getStats(): MetricsPipelineStats {
    const counters = this.exporter.getCounters();
    return {
      state: this.state,
      transport: this.endpoint.transport,
      endpoint: this.endpoint.raw,
      exportCount: counters.exportCount,
      failedExportCount: counters.failedExportCount,
      lastExportError: counters.lastExportError ? counters.lastExportError.message : null,
    };
  }

  /**
   * Tear down a pipeline that never made it out of `initMetrics()`.
   * Its outcome is only logged; the caller is already handling an error.
   */
  abandon(): void {
    this.state = 'shut_down';
    void this.meterProvider
      .shutdown()
      .catch((error: unknown) => {
        this.logger.debug('Abandoned metrics pipeline failed to flush', {
          component: 'MetricsPipeline',
          error: getErrorMessage(error),
        });
      })
      .finally(() => this.exporter.shutdown())
      .catch((error: unknown) => {
        this.logger.debug('Abandoned metrics pipeline failed to close its transport', {
          component: 'MetricsPipeline',
          error: getErrorMessage(error),
        });
      });
  }

  private toTransportError(failure: unknown): TransportError {
    const underlying = this.exporter.getCounters().lastExportError ?? failure;
    return new TransportError(
      `Failed to flush metrics to ${this.endpoint.raw}: ${getErrorMessage(underlying)}`,
      this.endpoint.raw,
      underlying,
      { transport: this.endpoint.transport }
    );
  }
}

function validateInterval(intervalMs: number): void {
  if (!Number.isFinite(intervalMs) || intervalMs <= 0) {
    throw ConfigurationError.invalid('intervalMs', 'must be a positive number of milliseconds', {
      value: intervalMs,
    });
  }
}

function resolveExportTimeout(exportTimeoutMillis: number | undefined, intervalMs: number): number {
  const timeout = exportTimeoutMillis ?? DEFAULT_EXPORT_TIMEOUT_MS;
  if (!Number.isFinite(timeout) || timeout <= 0) {
    throw ConfigurationError.invalid('exportTimeoutMillis', 'must be a positive number of milliseconds', {
      value: timeout,
    });
  }
  // The reader refuses an export timeout longer than its interval
  return Math.min(timeout, intervalMs);
}

/**
 * Build and start a metrics pipeline.
 *
 * Validation happens before anything is created and fails with
 * ConfigurationError. The collector is not contacted here: an unreachable
 * endpoint only shows up on the first export, at a periodic tick or at
 * `shutdown()`.
 *
 * @example
 * ```typescript
 * const pipeline = initMetrics({
 *   endpoint: 'unix:///run/otelcol/otelcol.sock',
 *   intervalMs: 10_000,
 *   componentName: 'node-agent',
 *   componentVersion: '1.4.2',
 * });
 *
 * // at teardown
 * await pipeline.shutdown({ timeoutMs: 5000 });
 * ```
 */
export function initMetrics(options: InitMetricsOptions): MetricsPipeline {
  const log = options.logger ?? defaultLogger;

  if (options.signal?.aborted) {
    throw new DeadlineExceededError('metrics initialization', options.signal.reason);
  }

  const endpoint = parseMetricsEndpoint(options.endpoint);
  validateInterval(options.intervalMs);
  const exportTimeoutMillis = resolveExportTimeout(options.exportTimeoutMillis, options.intervalMs);

  const resource = Resource.default().merge(
    new Resource({
      [ATTR_SERVICE_NAME]: options.componentName,
      [ATTR_SERVICE_VERSION]: options.componentVersion,
    })
  );

  const exporter = new ObservedMetricExporter(
    createOtlpMetricExporter(endpoint, exportTimeoutMillis),
    endpoint.raw,
    log
  );

  const meterProvider = new MeterProvider({
    resource,
    readers: [
      new PeriodicExportingMetricReader({
        exporter,
        exportIntervalMillis: options.intervalMs,
        exportTimeoutMillis,
      }),
    ],
  });

  const pipeline = new MetricsPipeline({
    endpoint,
    componentName: options.componentName,
    componentVersion: options.componentVersion,
    meterProvider,
    exporter,
    registry: options.registry,
    logger: log,
  });

  // Always have one reading to export, so every flush exercises the transport
  meterProvider
    .getMeter(options.componentName, options.componentVersion)
    .createObservableGauge('process.uptime', {
      description: 'Seconds since the process started',
      unit: 's',
    })
    .addCallback((result) => {
      result.observe(process.uptime());
    });

  if (options.hostMetrics ?? true) {
    try {
      new HostMetrics({ meterProvider, name: `${options.componentName}-host-metrics` }).start();
    } catch (error) {
      pipeline.abandon();
      throw error;
    }
  }

  options.registry?.register(meterProvider);

  log.info('Metrics pipeline started', {
    component: 'MetricsPipeline',
    endpoint: endpoint.raw,
    transport: endpoint.transport,
    intervalMs: options.intervalMs,
    exportTimeoutMs: exportTimeoutMillis,
    service: options.componentName,
    version: options.componentVersion,
  });

  return pipeline;
}
