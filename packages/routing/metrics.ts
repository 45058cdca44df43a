/**
 * Routing metrics
 */

import {
  ValueType,
  type Counter,
  type Histogram,
  type Meter,
} from "@opentelemetry/api"
import { getUrlMapMeter } from "@urlmap/core/observability/metrics.js"
import type { Optional } from "@urlmap/core/type/utils.js"

/**
 * Instruments recorded while matching and building
 */
export interface RoutingMetrics {
  /** Match calls by outcome type */
  matchOutcome: Counter
  /** Time spent building a new matcher in seconds */
  matcherRebuildDuration: Histogram
  /** Build calls that ended in a BuildError */
  buildFailures: Counter
}

let _current: Optional<{ meter: Meter; metrics: RoutingMetrics }>

/**
 * Get the routing instruments for the current meter, recreated once metrics
 * are enabled
 */
export function getRoutingMetrics(): RoutingMetrics {
  const meter = getUrlMapMeter()
  let current = _current
  if (current === undefined || current.meter !== meter) {
    current = { meter, metrics: createRoutingMetrics(meter) }
    _current = current
  }

  return current.metrics
}

function createRoutingMetrics(meter: Meter): RoutingMetrics {
  return {
    matchOutcome: meter.createCounter("routing_match_outcome", {
      description: "The number of match calls by outcome",
      valueType: ValueType.INT,
    }),
    matcherRebuildDuration: meter.createHistogram(
      "routing_matcher_rebuild_duration",
      {
        description: "The amount of time spent building the matcher",
        valueType: ValueType.DOUBLE,
        unit: "seconds",
        advice: {
          explicitBucketBoundaries: [
            0.0001, 0.0005, 0.001, 0.005, 0.01, 0.05, 0.1, 0.5, 1,
          ],
        },
      },
    ),
    buildFailures: meter.createCounter("routing_build_failures", {
      description: "The number of URLs that could not be built",
      valueType: ValueType.INT,
    }),
  }
}
