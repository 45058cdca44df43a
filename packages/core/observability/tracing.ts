import {
  SpanStatusCode,
  trace as Tracing,
  type Span,
  type Tracer,
} from "@opentelemetry/api"
import { getErrorMessage } from "../errors.js"
import type { Optional } from "../type/utils.js"
import { URLMAP_VERSION } from "../version.js"

let ROUTING_TRACER: Optional<Tracer>

/**
 * Return the routing {@link Tracer}
 */
export function getTracer(): Tracer {
  return (
    ROUTING_TRACER ??
    (ROUTING_TRACER = Tracing.getTracer("urlmap-routing", URLMAP_VERSION))
  )
}

/**
 * Run a synchronous operation inside a new active span, marking the span as
 * failed when the operation throws
 *
 * @param name The name of the span
 * @param operation The work to run
 * @returns The result of the operation
 */
export function withSpan<T>(name: string, operation: (span: Span) => T): T {
  return getTracer().startActiveSpan(name, (span) => {
    try {
      return operation(span)
    } catch (err) {
      span.setStatus({
        code: SpanStatusCode.ERROR,
        message: getErrorMessage(err),
      })
      throw err
    } finally {
      span.end()
    }
  })
}
