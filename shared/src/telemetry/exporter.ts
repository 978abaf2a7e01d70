/**
 * Metric exporters
 *
 * Builds the OTLP exporter for a parsed endpoint and wraps it so export
 * outcomes are logged and counted per pipeline.
 */

import { ExportResultCode } from '@opentelemetry/core';
import { AggregationTemporality } from '@opentelemetry/sdk-metrics';
import { OTLPMetricExporterBase } from '@opentelemetry/exporter-metrics-otlp-http';
import { createOtlpNetworkExportDelegate } from '@opentelemetry/otlp-exporter-base';
import { JsonMetricsSerializer, ProtobufMetricsSerializer } from '@opentelemetry/otlp-transformer';

import { HttpExportTransport, createGrpcExportTransport } from './transport.js';
import { getErrorMessage } from '../utils/errorTypes.js';

import type { ExportResult } from '@opentelemetry/core';
import type { OtlpSharedConfiguration } from '@opentelemetry/otlp-exporter-base';
import type {
  InstrumentType,
  PushMetricExporter,
  ResourceMetrics,
} from '@opentelemetry/sdk-metrics';
import type { ALogger } from '../utils/logging/ALogger.js';
import type { MetricsEndpoint } from './metricsPipeline.doc.js';

export interface ExportCounters {
  exportCount: number;
  failedExportCount: number;
  lastExportError: Error | null;
}

/**
 * Create the OTLP exporter for an endpoint. Construction never dials the
 * collector; the first connection attempt happens on the first export.
 *
 * The stock OTLP exporters wrap their transport in a retrying one. These
 * are assembled from the same delegate without it, so every export is a
 * single request.
 */
export function createOtlpMetricExporter(endpoint: MetricsEndpoint, timeoutMillis: number): PushMetricExporter {
  const config: OtlpSharedConfiguration = {
    timeoutMillis,
    concurrencyLimit: 30,
    compression: 'none',
  };

  switch (endpoint.transport) {
    case 'grpc':
      return new OTLPMetricExporterBase(
        createOtlpNetworkExportDelegate(config, ProtobufMetricsSerializer, createGrpcExportTransport(endpoint))
      );
    case 'http':
      return new OTLPMetricExporterBase(
        createOtlpNetworkExportDelegate(config, JsonMetricsSerializer, new HttpExportTransport(endpoint.url))
      );
  }
}

/**
 * Decorates an exporter with logging and counters.
 *
 * Periodic ticks run inside the reader's timer, where a rejected export
 * would otherwise only reach the OpenTelemetry global error handler. Here
 * each failure is logged at warn level and remembered so `shutdown()` can
 * report the underlying transport error.
 *
 * `shutdown()` is idempotent: the reader closes the exporter after a
 * successful flush, the pipeline closes it again unconditionally.
 */
export class ObservedMetricExporter implements PushMetricExporter {
  private readonly counters: ExportCounters = {
    exportCount: 0,
    failedExportCount: 0,
    lastExportError: null,
  };
  private closing: Promise<void> | null = null;

  constructor(
    private readonly inner: PushMetricExporter,
    private readonly endpoint: string,
    private readonly logger: ALogger
  ) {}

  export(metrics: ResourceMetrics, resultCallback: (result: ExportResult) => void): void {
    this.counters.exportCount++;
    this.inner.export(metrics, (result) => {
      if (result.code !== ExportResultCode.SUCCESS) {
        const error = result.error ?? new Error('Metrics export failed');
        this.counters.failedExportCount++;
        this.counters.lastExportError = error;
        this.logger.warn('Metrics export failed', {
          component: 'MetricsExporter',
          endpoint: this.endpoint,
          error: getErrorMessage(error),
          failedExports: this.counters.failedExportCount,
        });
      } else {
        this.logger.debug('Metrics exported', {
          component: 'MetricsExporter',
          endpoint: this.endpoint,
          scopes: metrics.scopeMetrics.length,
        });
      }
      resultCallback(result);
    });
  }

  forceFlush(): Promise<void> {
    return this.inner.forceFlush();
  }

  shutdown(): Promise<void> {
    this.closing ??= this.inner.shutdown();
    return this.closing;
  }

  selectAggregationTemporality(instrumentType: InstrumentType): AggregationTemporality {
    if (this.inner.selectAggregationTemporality) {
      return this.inner.selectAggregationTemporality(instrumentType);
    }
    return AggregationTemporality.CUMULATIVE;
  }

  getCounters(): Readonly<ExportCounters> {
    return { ...this.counters };
  }
}
