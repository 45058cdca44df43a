/**
 * Errors raised while configuring rules, matching requests and building URLs
 */

import type { Optional } from "@urlmap/core/type/utils.js"
import type { Rule } from "./rule.js"

/**
 * Base class for everything the routing packages throw
 */
export class RoutingError extends Error {
  constructor(message?: string, options?: ErrorOptions) {
    super(message, options)
    this.name = new.target.name
  }
}

/**
 * Check if the value is a {@link RoutingError}
 */
export function isRoutingError(error: unknown): error is RoutingError {
  return error instanceof RoutingError
}

/**
 * Raised by a converter when the captured text (or the value to build) is not
 * acceptable. The matcher and builder recover from it by trying the next rule.
 */
export class ValidationError extends RoutingError {}

/**
 * A rule template, converter reference or converter argument list could not
 * be compiled
 */
export class RuleSyntaxError extends RoutingError {
  constructor(
    message: string,
    readonly template?: string,
    options?: ErrorOptions,
  ) {
    super(
      template !== undefined ? `${message}: '${template}'` : message,
      options,
    )
  }
}

/**
 * A rule could not be attached to a map
 */
export class RuleBindingError extends RoutingError {}

/**
 * Two rules would match exactly the same requests
 */
export class DuplicateRuleError extends RoutingError {
  constructor(
    readonly rule: Rule,
    readonly existing: Rule,
  ) {
    super(
      `${rule.toString()} duplicates the existing rule ${existing.toString()}`,
    )
  }
}

/**
 * Base for the request time signals a dispatcher converts into a response
 */
export abstract class HttpRoutingError extends RoutingError {
  abstract readonly code: number
}

/**
 * Check if the value carries an HTTP status for the dispatcher
 */
export function isHttpRoutingError(error: unknown): error is HttpRoutingError {
  return error instanceof HttpRoutingError
}

export class NotFoundError extends HttpRoutingError {
  readonly code = 404

  constructor(message = "The requested URL was not found on the server.") {
    super(message)
  }
}

export class MethodNotAllowedError extends HttpRoutingError {
  readonly code = 405

  constructor(readonly allowedMethods: readonly string[]) {
    super(
      `The method is not allowed for the requested URL, expected one of: ${allowedMethods.join(", ")}`,
    )
  }
}

export class RequestRedirectError extends HttpRoutingError {
  readonly code = 308

  constructor(readonly newUrl: string) {
    super(`The request should be redirected to ${newUrl}`)
  }
}

export class BadRequestError extends HttpRoutingError {
  readonly code = 400

  constructor(
    message = "The browser (or proxy) sent a request that this server could not understand.",
  ) {
    super(message)
  }
}

/**
 * The path matched a rule that only differs in whether it expects a
 * websocket handshake
 */
export class WebsocketMismatchError extends BadRequestError {
  constructor() {
    super("The requested URL only accepts a different websocket state.")
  }
}

/**
 * No rule for the endpoint could be built with the given values and method
 */
export class BuildError extends RoutingError {
  /** The rule of the map that looks the most like what was requested */
  readonly suggested: Optional<Rule>

  constructor(
    readonly endpoint: string,
    readonly values: Readonly<Record<string, unknown>>,
    readonly method: Optional<string>,
    rules: readonly Rule[] = [],
  ) {
    const suggested = closestRule(endpoint, values, method, rules)
    super(describeBuildFailure(endpoint, values, method, suggested))
    this.suggested = suggested
  }
}

/**
 * Score each rule by endpoint similarity, then whether it takes the provided
 * values, then whether it accepts the method, returning the best scoring one
 */
function closestRule(
  endpoint: string,
  values: Readonly<Record<string, unknown>>,
  method: Optional<string>,
  rules: readonly Rule[],
): Optional<Rule> {
  const keys = Object.keys(values)
  let best: Optional<Rule>
  let bestScore = -1

  for (const rule of rules) {
    const score =
      0.98 * similarity(rule.endpoint, endpoint) +
      0.01 * (keys.every((key) => rule.arguments.has(key)) ? 1 : 0) +
      0.01 *
        (rule.methods !== undefined &&
        method !== undefined &&
        rule.methods.has(method)
          ? 1
          : 0)

    if (score > bestScore) {
      best = rule
      bestScore = score
    }
  }

  return best
}

function describeBuildFailure(
  endpoint: string,
  values: Readonly<Record<string, unknown>>,
  method: Optional<string>,
  suggested: Optional<Rule>,
): string {
  const message = [`Could not build url for endpoint '${endpoint}'`]

  if (method !== undefined) {
    message.push(` ('${method}')`)
  }

  const keys = Object.keys(values).sort()
  if (keys.length > 0) {
    message.push(` with values ${formatList(keys)}`)
  }

  message.push(".")

  if (suggested !== undefined) {
    if (suggested.endpoint === endpoint) {
      if (
        method !== undefined &&
        suggested.methods !== undefined &&
        !suggested.methods.has(method)
      ) {
        message.push(
          ` Did you mean to use methods ${formatList([...suggested.methods].sort())}?`,
        )
      }

      const defaults = suggested.defaults ?? {}
      const missing = [...suggested.arguments]
        .filter((name) => !keys.includes(name) && !(name in defaults))
        .sort()
      if (missing.length > 0) {
        message.push(
          ` Did you forget to specify values ${formatList(missing)}?`,
        )
      }
    } else {
      message.push(` Did you mean '${suggested.endpoint}' instead?`)
    }
  }

  return message.join("")
}

function formatList(items: readonly string[]): string {
  return `[${items.map((item) => `'${item}'`).join(", ")}]`
}

/**
 * Similarity ratio in [0, 1] of two strings based on the total length of
 * their recursively matched common blocks
 */
export function similarity(left: string, right: string): number {
  const total = left.length + right.length
  return total === 0 ? 1 : (2 * matchingCharacters(left, right)) / total
}

function matchingCharacters(left: string, right: string): number {
  if (left.length === 0 || right.length === 0) {
    return 0
  }

  // Longest common substring, earliest in left on ties
  let length = 0
  let leftStart = 0
  let rightStart = 0
  let previous = new Array<number>(right.length + 1).fill(0)

  for (let i = 1; i <= left.length; ++i) {
    const current = new Array<number>(right.length + 1).fill(0)
    for (let j = 1; j <= right.length; ++j) {
      if (left[i - 1] === right[j - 1]) {
        current[j] = previous[j - 1] + 1
        if (current[j] > length) {
          length = current[j]
          leftStart = i - length
          rightStart = j - length
        }
      }
    }
    previous = current
  }

  if (length === 0) {
    return 0
  }

  return (
    length +
    matchingCharacters(left.slice(0, leftStart), right.slice(0, rightStart)) +
    matchingCharacters(
      left.slice(leftStart + length),
      right.slice(rightStart + length),
    )
  )
}
