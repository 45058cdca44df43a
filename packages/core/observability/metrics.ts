/**
 * Helps to bootstrap the metrics for the routing packages
 */

import opentelemetry, { createNoopMeter, type Meter } from "@opentelemetry/api"
import { URLMAP_VERSION } from "../version.js"

let _metricsEnabled = false
let _meter: Meter = createNoopMeter()

/**
 * Get the current {@link Meter}, which is a NO_OP unless
 * {@link enableUrlMapMetrics} has been invoked
 */
export function getUrlMapMeter(): Meter {
  return _meter
}

/**
 * @returns True if {@link enableUrlMapMetrics} has been called
 */
export function isMetricsEnabled(): boolean {
  return _metricsEnabled
}

/**
 * Enable the routing metrics against the globally registered meter provider
 */
export function enableUrlMapMetrics(): void {
  if (!_metricsEnabled) {
    _meter = opentelemetry.metrics
      .getMeterProvider()
      .getMeter("urlmap-routing-metrics", URLMAP_VERSION)
  }
  _metricsEnabled = true
}
