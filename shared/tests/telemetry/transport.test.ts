/**
 * Tests for the single-attempt OTLP transports.
 */

import { describe, it } from 'node:test';
import assert from 'node:assert';

import { status as grpcStatus } from '@grpc/grpc-js';
import { OTLPExporterError } from '@opentelemetry/otlp-exporter-base';

import {
  GrpcExportTransport,
  HttpExportTransport,
  createGrpcExportTransport,
} from '../../src/telemetry/transport.js';
import { parseMetricsEndpoint } from '../../src/telemetry/endpoint.js';
import { startHttpCollector } from '../helpers/collectors.js';

const PAYLOAD = new TextEncoder().encode('{"resourceMetrics":[]}');

describe('HttpExportTransport', () => {
  it('should post the payload once and return the response body', async () => {
    const collector = await startHttpCollector();
    try {
      const transport = new HttpExportTransport(`${collector.url}/v1/metrics`);

      const response = await transport.send(PAYLOAD, 1000);

      if (response.status !== 'success') {
        assert.fail(`expected success, got ${response.status}`);
      }
      assert.strictEqual(new TextDecoder().decode(response.data), '{}');
      assert.deepStrictEqual(collector.requests, [
        {
          method: 'POST',
          url: '/v1/metrics',
          contentType: 'application/json',
          body: '{"resourceMetrics":[]}',
        },
      ]);
    } finally {
      await collector.close();
    }
  });

  it('should not retry a 503', async () => {
    const collector = await startHttpCollector(503);
    try {
      const transport = new HttpExportTransport(`${collector.url}/v1/metrics`);

      const response = await transport.send(PAYLOAD, 5000);

      if (response.status !== 'failure') {
        assert.fail(`expected failure, got ${response.status}`);
      }
      assert.ok(response.error instanceof OTLPExporterError);
      assert.strictEqual(response.error.message, 'Collector responded with HTTP 503');
      assert.strictEqual(response.error.code, 503);
      assert.strictEqual(collector.requests.length, 1);
    } finally {
      await collector.close();
    }
  });

  it('should report a refused connection as a failure', async () => {
    const collector = await startHttpCollector();
    const url = `${collector.url}/v1/metrics`;
    await collector.close();

    const response = await new HttpExportTransport(url).send(PAYLOAD, 1000);

    if (response.status !== 'failure') {
      assert.fail(`expected failure, got ${response.status}`);
    }
    assert.ok(response.error.message.startsWith('fetch failed: '));
  });
});

describe('GrpcExportTransport', () => {
  it('should fail once with UNAVAILABLE when the socket is missing', async () => {
    const transport = new GrpcExportTransport('unix:///dummy', false);
    try {
      const response = await transport.send(PAYLOAD, 2000);

      if (response.status !== 'failure') {
        assert.fail(`expected failure, got ${response.status}`);
      }
      assert.ok('code' in response.error);
      assert.strictEqual(response.error.code, grpcStatus.UNAVAILABLE);
    } finally {
      transport.shutdown();
    }
  });
});

describe('createGrpcExportTransport', () => {
  it('should dial unix sockets by their endpoint', () => {
    const transport = createGrpcExportTransport(parseMetricsEndpoint('unix:///run/otelcol/otelcol.sock'));

    assert.strictEqual(transport.target, 'unix:///run/otelcol/otelcol.sock');
    assert.strictEqual(transport.secure, false);
  });

  it('should dial grpc endpoints in plaintext', () => {
    const transport = createGrpcExportTransport(parseMetricsEndpoint('grpc://collector.internal:4317'));

    assert.strictEqual(transport.target, 'collector.internal:4317');
    assert.strictEqual(transport.secure, false);
  });

  it('should dial grpcs endpoints over TLS on 443 by default', () => {
    const transport = createGrpcExportTransport(parseMetricsEndpoint('grpcs://collector.internal'));

    assert.strictEqual(transport.target, 'collector.internal:443');
    assert.strictEqual(transport.secure, true);
  });
});
