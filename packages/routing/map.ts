/**
 * The map owns every rule, the converter registry and the settings used to
 * compile them. Matching and building happen through a {@link MapAdapter}.
 */

import { describeError } from "@urlmap/core/errors.js"
import {
  DefaultLogger,
  type Logger,
  type LogLevel,
} from "@urlmap/core/logging.js"
import { withSpan } from "@urlmap/core/observability/tracing.js"
import { Timer } from "@urlmap/core/time.js"
import type { Optional } from "@urlmap/core/type/utils.js"
import { MapAdapter } from "./adapter.js"
import { DEFAULT_CONVERTERS, type ConverterFactory } from "./converters.js"
import { DuplicateRuleError, RuleBindingError } from "./errors.js"
import { StateMachineMatcher } from "./matcher.js"
import { getRoutingMetrics } from "./metrics.js"
import {
  compareLists,
  compileRule,
  type Rule,
  type RuleBindingContext,
  type RuleFactory,
} from "./rule.js"
import { encodeHost, type QueryArgs, type QuerySortKey } from "./urls.js"

const ROUTING_LOGGER: Logger = new DefaultLogger({
  name: "urlmap.routing",
})

/**
 * Change the level of the default routing logger
 *
 * @param level The new {@link LogLevel}
 */
export function setRoutingLogLevel(level: LogLevel): void {
  ROUTING_LOGGER.setLevel(level)
}

/**
 * Settings for a {@link UrlMap}
 */
export interface UrlMapOptions {
  /** Redirect between the slash and no slash form of a rule, default true */
  strictSlashes?: boolean
  /** Collapse repeated slashes and redirect to the result, default true */
  mergeSlashes?: boolean
  /** Redirect to a rule of the same endpoint that provides the values as defaults, default true */
  redirectDefaults?: boolean
  /** Match the full host of the request, default false */
  hostMatching?: boolean
  /** Match the subdomain of the request relative to the server name, default false */
  subdomainMatching?: boolean
  /** The subdomain for rules without one, default "" */
  defaultSubdomain?: string
  /** Converters added to (or replacing) the defaults */
  converters?: Readonly<Record<string, ConverterFactory>>
  /** Sort the query parameters of built URLs, default false */
  sortParameters?: boolean
  /** Key for sorting the query parameters */
  sortKey?: QuerySortKey
  /** The logger to use, defaults to the `urlmap.routing` logger */
  logger?: Logger
}

/**
 * Options for {@link UrlMap.bind}
 */
export interface BindOptions {
  /** The subdomain of the request, defaults to the map default subdomain */
  subdomain?: string
  /** The mount point of the application, default "/" */
  scriptName?: string
  /** The scheme used for external URLs, default "http" */
  urlScheme?: string
  /** The path used when {@link MapAdapter.match} is called without one, default "/" */
  pathInfo?: string
  /** The method used when none is given, default "GET" */
  defaultMethod?: string
  /** Query arguments kept on redirects */
  queryArgs?: QueryArgs
}

/**
 * The parts of an incoming request used to bind an adapter
 */
export interface RoutingRequest {
  /** The Host header, optionally with a port */
  host: string
  /** "http" or "https", default "http" */
  scheme?: string
  /** The request path, default "/" */
  path?: string
  method?: string
  scriptName?: string
  query?: QueryArgs
  /** True when the request asks for a websocket upgrade */
  websocket?: boolean
}

/**
 * A matcher and build index that stay valid until the map changes
 */
export interface RoutingSnapshot {
  readonly matcher: StateMachineMatcher
  /** Rules of each endpoint in build priority order */
  readonly rulesByEndpoint: ReadonlyMap<string, readonly Rule[]>
}

/**
 * The subdomain used when the request host is not below the server name
 */
export const INVALID_SUBDOMAIN = "<invalid>"

/**
 * A collection of rules
 *
 * @example
 * ```ts
 * const map = new UrlMap([
 *   new Rule("/", { endpoint: "index" }),
 *   new Rule("/users/<int:id>", { endpoint: "user" }),
 * ])
 *
 * const adapter = map.bind("example.com")
 * adapter.match("/users/42") // { type: "matched", endpoint: "user", values: { id: 42 }, ... }
 * adapter.build("user", { id: 7 }) // "/users/7"
 * ```
 */
export class UrlMap {
  readonly strictSlashes: boolean
  readonly mergeSlashes: boolean
  readonly redirectDefaults: boolean
  readonly hostMatching: boolean
  readonly subdomainMatching: boolean
  readonly defaultSubdomain: string
  readonly sortParameters: boolean
  readonly sortKey: Optional<QuerySortKey>
  readonly converters: ReadonlyMap<string, ConverterFactory>
  readonly logger: Logger

  private readonly _rules: Rule[] = []
  private readonly _signatures = new Map<string, Rule[]>()
  private _snapshot: Optional<RoutingSnapshot>
  private _modifying = false

  constructor(rules: Iterable<RuleFactory> = [], options: UrlMapOptions = {}) {
    if (options.hostMatching && options.subdomainMatching) {
      throw new RuleBindingError(
        "host matching and subdomain matching cannot both be enabled",
      )
    }

    this.strictSlashes = options.strictSlashes ?? true
    this.mergeSlashes = options.mergeSlashes ?? true
    this.redirectDefaults = options.redirectDefaults ?? true
    this.hostMatching = options.hostMatching ?? false
    this.subdomainMatching = options.subdomainMatching ?? false
    this.defaultSubdomain = options.defaultSubdomain ?? ""
    this.sortParameters = options.sortParameters ?? false
    this.sortKey = options.sortKey
    this.logger = options.logger ?? ROUTING_LOGGER
    this.converters = new Map([
      ...DEFAULT_CONVERTERS,
      ...Object.entries(options.converters ?? {}),
    ])

    for (const factory of rules) {
      this.add(factory)
    }
  }

  /** Every rule in insertion order */
  get rules(): readonly Rule[] {
    return this._rules
  }

  /**
   * Add the rules produced by the factory
   *
   * @param factory A {@link Rule} or any {@link RuleFactory}
   * @throws {@link RuleSyntaxError}, {@link RuleBindingError} or
   * {@link DuplicateRuleError} when a rule cannot be added, rules produced
   * before the failing one stay in the map
   */
  add(factory: RuleFactory): void {
    if (this._modifying) {
      throw new RuleBindingError("the map is already being modified")
    }

    this._modifying = true
    try {
      for (const rule of factory.getRules()) {
        this._bind(rule)
      }
    } finally {
      this._modifying = false
    }
  }

  /**
   * Iterate the rules, optionally only those of one endpoint
   */
  *iterRules(endpoint?: string): IterableIterator<Rule> {
    for (const rule of this._rules) {
      if (endpoint === undefined || rule.endpoint === endpoint) {
        yield rule
      }
    }
  }

  /**
   * @returns True if any rule of the endpoint takes the argument
   */
  isEndpointExpectingArgument(endpoint: string, argument: string): boolean {
    for (const rule of this.iterRules(endpoint)) {
      if (rule.arguments.has(argument)) {
        return true
      }
    }

    return false
  }

  /**
   * Build a fresh matcher and build index now instead of on the next request
   */
  update(): void {
    this._rebuild()
  }

  /**
   * Get the current matcher and build index, building them if necessary
   */
  getSnapshot(): RoutingSnapshot {
    return this._snapshot ?? this._rebuild()
  }

  /**
   * Create an adapter for a server name
   *
   * @param serverName The host of the server (may include a port)
   * @param options The request specific {@link BindOptions}
   */
  bind(serverName: string, options: BindOptions = {}): MapAdapter {
    if (this.hostMatching && options.subdomain !== undefined) {
      throw new RuleBindingError(
        "a subdomain cannot be bound when the map matches on hosts",
      )
    }

    const scriptName = options.scriptName ?? "/"
    return new MapAdapter(this, {
      serverName: encodeHost(serverName),
      subdomain: options.subdomain ?? this.defaultSubdomain,
      scriptName: scriptName.endsWith("/") ? scriptName : `${scriptName}/`,
      urlScheme: options.urlScheme ?? "http",
      pathInfo: options.pathInfo ?? "/",
      defaultMethod: (options.defaultMethod ?? "GET").toUpperCase(),
      queryArgs: options.queryArgs,
    })
  }

  /**
   * Create an adapter for an incoming request
   *
   * @param request The {@link RoutingRequest}
   * @param serverName The configured server name, defaults to the request
   * host. With subdomain matching the subdomain is taken from the part of the
   * request host in front of it.
   */
  bindToRequest(request: RoutingRequest, serverName?: string): MapAdapter {
    const secure = request.scheme === "https" || request.scheme === "wss"
    const scheme = request.websocket
      ? secure
        ? "wss"
        : "ws"
      : (request.scheme ?? "http")
    const host = stripDefaultPort(request.host.toLowerCase(), secure)
    const configured =
      serverName !== undefined
        ? stripDefaultPort(serverName.toLowerCase(), secure)
        : host

    let subdomain: Optional<string>
    if (this.subdomainMatching) {
      const current = host.split(".")
      const expected = configured.split(".")
      const suffix = current.slice(current.length - expected.length)

      if (
        current.length < expected.length ||
        suffix.join(".") !== expected.join(".")
      ) {
        this.logger.warn(
          `Current server name '${host}' doesn't match configured server name '${configured}'`,
        )
        subdomain = INVALID_SUBDOMAIN
      } else {
        subdomain = current
          .slice(0, current.length - expected.length)
          .filter((label) => label.length > 0)
          .join(".")
      }
    }

    return this.bind(configured, {
      subdomain,
      scriptName: request.scriptName,
      urlScheme: scheme,
      pathInfo: request.path,
      defaultMethod: request.method,
      queryArgs: request.query,
    })
  }

  private get _context(): RuleBindingContext {
    return {
      converters: this.converters,
      strictSlashes: this.strictSlashes,
      mergeSlashes: this.mergeSlashes,
      hostMatching: this.hostMatching,
      subdomainMatching: this.subdomainMatching,
      defaultSubdomain: this.defaultSubdomain,
    }
  }

  private _bind(rule: Rule): void {
    if (rule.isBound) {
      throw new RuleBindingError(`${rule.toString()} is already bound to a map`)
    }

    try {
      const compiled = compileRule(rule, this._context)

      if (!rule.buildOnly) {
        const duplicate = this._signatures
          .get(compiled.signature)
          ?.find(
            (existing) =>
              existing.websocket === rule.websocket &&
              methodsOverlap(existing.methods, rule.methods),
          )
        if (duplicate !== undefined) {
          throw new DuplicateRuleError(rule, duplicate)
        }
      }

      rule.bind(compiled, this._rules.length)
    } catch (err) {
      this.logger.warn(`Rejected ${rule.toString()}`, {
        error: describeError(err),
      })
      throw err
    }

    this._rules.push(rule)
    if (!rule.buildOnly) {
      const matching = this._signatures.get(rule.signature)
      if (matching !== undefined) {
        matching.push(rule)
      } else {
        this._signatures.set(rule.signature, [rule])
      }
    }
    this._snapshot = undefined
    this.logger.debug(`Registered ${rule.toString()}`)
  }

  private _rebuild(): RoutingSnapshot {
    return withSpan("urlmap.matcher.rebuild", (span) => {
      const timer = Timer.startNew()

      const matcher = new StateMachineMatcher(
        this.mergeSlashes ||
          this._rules.some((rule) => !rule.buildOnly && rule.mergeSlashes),
      )
      const rulesByEndpoint = new Map<string, Rule[]>()

      for (const rule of this._rules) {
        if (!rule.buildOnly) {
          matcher.add(rule)
        }

        const rules = rulesByEndpoint.get(rule.endpoint)
        if (rules !== undefined) {
          rules.push(rule)
        } else {
          rulesByEndpoint.set(rule.endpoint, [rule])
        }
      }

      matcher.update()
      for (const rules of rulesByEndpoint.values()) {
        rules.sort((a, b) =>
          compareLists(a.buildPriorityKey, b.buildPriorityKey, (x, y) => x - y),
        )
      }

      const snapshot: RoutingSnapshot = { matcher, rulesByEndpoint }
      this._snapshot = snapshot

      const duration = timer.stop()
      span.setAttribute("urlmap.rules", this._rules.length)
      getRoutingMetrics().matcherRebuildDuration.record(duration.seconds())
      this.logger.debug(
        `Rebuilt the matcher for ${this._rules.length} rules in ${duration.milliseconds()}ms`,
      )

      return snapshot
    })
  }
}

function methodsOverlap(
  left: Optional<ReadonlySet<string>>,
  right: Optional<ReadonlySet<string>>,
): boolean {
  if (left === undefined || right === undefined) {
    return true
  }

  for (const method of left) {
    if (right.has(method)) {
      return true
    }
  }

  return false
}

function stripDefaultPort(host: string, secure: boolean): string {
  const port = secure ? ":443" : ":80"
  return host.endsWith(port) ? host.slice(0, -port.length) : host
}
