import { metrics } from '@opentelemetry/api';

import { logger as defaultLogger } from '../utils/logging/logger.js';

import type { MeterProvider } from '@opentelemetry/api';
import type { ALogger } from '../utils/logging/ALogger.js';
import type { MeterProviderRegistry } from './metricsPipeline.doc.js';

/**
 * Registry backed by the OpenTelemetry API global, for hosts whose
 * instrumented libraries call `metrics.getMeter()` directly.
 *
 * Only one provider can hold the global at a time. A second registration
 * keeps the first provider and warns through `logger`. Unregistering a
 * provider that is not the current global leaves the global untouched.
 */
export function createGlobalMeterProviderRegistry(logger: ALogger = defaultLogger): MeterProviderRegistry {
  return {
    register(provider: MeterProvider): void {
      if (!metrics.setGlobalMeterProvider(provider)) {
        logger.warn('A global meter provider is already registered; keeping the existing one', {
          component: 'MeterProviderRegistry',
        });
      }
    },

    unregister(provider: MeterProvider): void {
      if (metrics.getMeterProvider() === provider) {
        metrics.disable();
      }
    },
  };
}

/** Global registry logging through the default logger */
export const globalMeterProviderRegistry: MeterProviderRegistry = createGlobalMeterProviderRegistry();
