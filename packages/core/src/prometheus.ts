/**
 * Prometheus telemetry entry point for Node.js environments.
 *
 * Kept apart from the main entry so hosts that never export metrics do not
 * load prom-client.
 *
 * @example
 * import { setTelemetry } from '@icon-dimmer/core';
 * import { createPrometheusTelemetry } from '@icon-dimmer/core/prometheus';
 *
 * const promTelemetry = createPrometheusTelemetry();
 * setTelemetry(promTelemetry);
 */

export {
  createPrometheusTelemetry,
  type PrometheusTelemetryOptions,
  type PrometheusTelemetryFacade,
} from './telemetry-prometheus.js';
