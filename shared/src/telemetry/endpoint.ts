import { ConfigurationError } from '../utils/errorTypes.js';

import type { MetricsEndpoint, MetricsTransport } from './metricsPipeline.doc.js';

const SCHEME_PATTERN = /^([a-zA-Z][a-zA-Z0-9+.-]*):\/\//;

const OTLP_HTTP_METRICS_PATH = '/v1/metrics';

/**
 * Split a collector endpoint into the transport to use and the URL the
 * OTLP exporter expects.
 *
 * | scheme            | transport | exporter URL                        |
 * |-------------------|-----------|-------------------------------------|
 * | unix://<path>     | grpc      | unchanged                           |
 * | grpc://host:port  | grpc      | http://host:port (plaintext)        |
 * | grpcs://host:port | grpc      | https://host:port (TLS)             |
 * | http(s)://host    | http      | unchanged, /v1/metrics if no path   |
 *
 * @throws ConfigurationError for empty, scheme-less or unsupported endpoints
 */
export function parseMetricsEndpoint(endpoint: string): MetricsEndpoint {
  const raw = endpoint.trim();
  if (raw === '') {
    throw ConfigurationError.required('endpoint');
  }

  const match = SCHEME_PATTERN.exec(raw);
  if (!match) {
    throw ConfigurationError.invalid('endpoint', 'missing scheme (expected e.g. unix://, grpc://, http://)', {
      endpoint: raw,
    });
  }

  const scheme = match[1].toLowerCase();
  const rest = raw.slice(match[0].length);

  switch (scheme) {
    case 'unix': {
      if (rest === '' || rest === '/') {
        throw ConfigurationError.invalid('endpoint', 'unix socket path is empty', { endpoint: raw });
      }
      return build(raw, scheme, 'grpc', raw);
    }
    case 'grpc':
    case 'grpcs': {
      const target = parseUrl(raw, `${scheme === 'grpcs' ? 'https' : 'http'}://${rest}`);
      return build(raw, scheme, 'grpc', `${target.protocol}//${target.host}`);
    }
    case 'http':
    case 'https': {
      const target = parseUrl(raw, raw);
      if (target.pathname === '' || target.pathname === '/') {
        target.pathname = OTLP_HTTP_METRICS_PATH;
      }
      return build(raw, scheme, 'http', target.toString());
    }
    default:
      throw ConfigurationError.invalid('endpoint', `unsupported scheme "${scheme}"`, { endpoint: raw });
  }
}

function parseUrl(raw: string, candidate: string): URL {
  let target: URL;
  try {
    target = new URL(candidate);
  } catch (error) {
    throw ConfigurationError.invalid('endpoint', 'not a valid URL', {
      endpoint: raw,
      reason: error instanceof Error ? error.message : String(error),
    });
  }
  if (target.hostname === '') {
    throw ConfigurationError.invalid('endpoint', 'host is empty', { endpoint: raw });
  }
  return target;
}

function build(raw: string, scheme: string, transport: MetricsTransport, url: string): MetricsEndpoint {
  return { raw, scheme, transport, url };
}
