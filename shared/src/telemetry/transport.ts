/**
 * OTLP transports
 *
 * Each `send()` is exactly one request. Failures come back with status
 * `failure`, never `retryable`, so an export is a single attempt and the
 * pipeline owns what happens after a failed one.
 */

import { Client, Metadata, credentials } from '@grpc/grpc-js';
import { OTLPExporterError } from '@opentelemetry/otlp-exporter-base';

import { getErrorMessage } from '../utils/errorTypes.js';

import type { ServiceError } from '@grpc/grpc-js';
import type { ExportResponse, IExporterTransport } from '@opentelemetry/otlp-exporter-base';
import type { MetricsEndpoint } from './metricsPipeline.doc.js';

const GRPC_EXPORT_METHOD = '/opentelemetry.proto.collector.metrics.v1.MetricsService/Export';

/**
 * OTLP/HTTP with JSON bodies over `fetch`.
 */
export class HttpExportTransport implements IExporterTransport {
  private readonly inFlight = new Set<AbortController>();

  constructor(private readonly url: string) {}

  async send(data: Uint8Array, timeoutMillis: number): Promise<ExportResponse> {
    const controller = new AbortController();
    const timer = setTimeout(
      () => controller.abort(new Error(`Export request timed out after ${timeoutMillis}ms`)),
      timeoutMillis
    );
    this.inFlight.add(controller);

    try {
      const response = await fetch(this.url, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: data,
        signal: controller.signal,
      });
      const body = new Uint8Array(await response.arrayBuffer());

      if (!response.ok) {
        return {
          status: 'failure',
          error: new OTLPExporterError(
            `Collector responded with HTTP ${response.status}`,
            response.status,
            new TextDecoder().decode(body)
          ),
        };
      }
      return { status: 'success', data: body };
    } catch (error) {
      return { status: 'failure', error: describeRequestError(error) };
    } finally {
      clearTimeout(timer);
      this.inFlight.delete(controller);
    }
  }

  shutdown(): void {
    for (const controller of this.inFlight) {
      controller.abort(new Error('Export transport shut down'));
    }
  }
}

/**
 * OTLP/gRPC unary export. The channel is created on the first send, so
 * building the transport never dials.
 */
export class GrpcExportTransport implements IExporterTransport {
  private client: Client | null = null;

  constructor(
    readonly target: string,
    readonly secure: boolean
  ) {}

  send(data: Uint8Array, timeoutMillis: number): Promise<ExportResponse> {
    const client = this.connect();

    return new Promise<ExportResponse>((resolve) => {
      client.makeUnaryRequest(
        GRPC_EXPORT_METHOD,
        (request: Uint8Array) => Buffer.from(request),
        (response: Buffer) => response,
        data,
        new Metadata(),
        { deadline: Date.now() + timeoutMillis },
        (error: ServiceError | null, response?: Buffer) => {
          if (error) {
            resolve({ status: 'failure', error });
          } else {
            resolve({ status: 'success', data: response });
          }
        }
      );
    });
  }

  shutdown(): void {
    this.client?.close();
    this.client = null;
  }

  private connect(): Client {
    this.client ??= new Client(
      this.target,
      this.secure ? credentials.createSsl() : credentials.createInsecure()
    );
    return this.client;
  }
}

/**
 * gRPC target for an endpoint: unix sockets pass through, `http:` URLs
 * dial in plaintext and `https:` URLs over TLS.
 */
export function createGrpcExportTransport(endpoint: MetricsEndpoint): GrpcExportTransport {
  if (endpoint.scheme === 'unix') {
    return new GrpcExportTransport(endpoint.url, false);
  }
  const url = new URL(endpoint.url);
  const secure = url.protocol === 'https:';
  const port = url.port === '' ? (secure ? '443' : '80') : url.port;
  return new GrpcExportTransport(`${url.hostname}:${port}`, secure);
}

function describeRequestError(error: unknown): Error {
  // fetch wraps socket errors as "fetch failed" and keeps the reason in `cause`
  if (error instanceof Error && error.cause !== undefined) {
    return new Error(`${error.message}: ${getErrorMessage(error.cause)}`, { cause: error });
  }
  return error instanceof Error ? error : new Error(getErrorMessage(error));
}
