/**
 * A map bound to the server name, subdomain, mount point and scheme of a
 * request. Matches paths and builds URLs.
 */

import type { Optional } from "@urlmap/core/type/utils.js"
import {
  BuildError,
  MethodNotAllowedError,
  NotFoundError,
  RequestRedirectError,
  WebsocketMismatchError,
} from "./errors.js"
import type { UrlMap } from "./map.js"
import { getRoutingMetrics } from "./metrics.js"
import type { BuildValues, RouteValues, Rule } from "./rule.js"
import {
  PATH_SAFE,
  encodeQuery,
  joinUrl,
  quote,
  type QueryArgs,
} from "./urls.js"

/**
 * The resolved settings of an adapter, see {@link UrlMap.bind}
 */
export interface MapAdapterSettings {
  serverName: string
  subdomain: string
  /** Always ends with a slash */
  scriptName: string
  urlScheme: string
  pathInfo: string
  defaultMethod: string
  queryArgs: Optional<QueryArgs>
}

/**
 * A successful match
 */
export interface MatchedOutcome {
  type: "matched"
  endpoint: string
  values: RouteValues
  rule: Rule
}

/**
 * What happened to a request, misses are values rather than exceptions
 */
export type MatchOutcome =
  | MatchedOutcome
  | { type: "redirect"; newUrl: string; code: 308 }
  | { type: "notFound" }
  | { type: "methodNotAllowed"; allowedMethods: string[] }
  | { type: "websocketMismatch" }

/**
 * Per call overrides for {@link MapAdapter.match}
 */
export interface MatchOptions {
  /** Query arguments kept on redirects, defaults to the bound ones */
  queryArgs?: QueryArgs
  /** Match websocket rules, defaults to the bound scheme being ws or wss */
  websocket?: boolean
}

/**
 * Options for {@link MapAdapter.build}
 */
export interface BuildOptions {
  /** Only use rules accepting the method */
  method?: string
  /** Always return an absolute URL */
  forceExternal?: boolean
  /** The scheme for absolute URLs, defaults to the bound scheme */
  urlScheme?: string
  /** Add values that are not rule arguments to the query string, default true */
  appendUnknown?: boolean
}

/**
 * Values for {@link MapAdapter.build}, arrays provide repeated query values
 */
export type BuildInput =
  | Readonly<Record<string, unknown>>
  | ReadonlyMap<string, unknown>

const OUTCOME_LABELS: Readonly<Record<MatchOutcome["type"], string>> = {
  matched: "matched",
  redirect: "redirect",
  notFound: "not_found",
  methodNotAllowed: "method_not_allowed",
  websocketMismatch: "websocket_mismatch",
}

interface Candidate {
  domain: string
  path: string
  websocket: boolean
}

export class MapAdapter {
  readonly serverName: string
  readonly subdomain: string
  readonly scriptName: string
  readonly urlScheme: string
  readonly pathInfo: string
  readonly defaultMethod: string
  readonly queryArgs: Optional<QueryArgs>
  /** True when bound with the ws or wss scheme */
  readonly websocket: boolean

  constructor(
    readonly map: UrlMap,
    settings: MapAdapterSettings,
  ) {
    this.serverName = settings.serverName
    this.subdomain = settings.subdomain
    this.scriptName = settings.scriptName
    this.urlScheme = settings.urlScheme
    this.pathInfo = settings.pathInfo
    this.defaultMethod = settings.defaultMethod
    this.queryArgs = settings.queryArgs
    this.websocket = settings.urlScheme === "ws" || settings.urlScheme === "wss"
  }

  /**
   * Match the path and method against the rules of the map
   *
   * @param path The path to match, defaults to the bound path
   * @param method The method, defaults to the bound default method
   * @param options Per call {@link MatchOptions}
   * @returns The {@link MatchOutcome}, converter errors other than
   * {@link ValidationError} propagate
   */
  match(
    path: string = this.pathInfo,
    method?: string,
    options: MatchOptions = {},
  ): MatchOutcome {
    const outcome = this._match(
      path,
      (method ?? this.defaultMethod).toUpperCase(),
      options,
    )

    getRoutingMetrics().matchOutcome.add(1, {
      outcome: OUTCOME_LABELS[outcome.type],
    })

    return outcome
  }

  /**
   * Unwrap a matched outcome or throw the matching {@link HttpRoutingError}
   *
   * @throws {@link NotFoundError}, {@link MethodNotAllowedError},
   * {@link RequestRedirectError} or {@link WebsocketMismatchError}
   */
  requireMatch(outcome: MatchOutcome): MatchedOutcome {
    switch (outcome.type) {
      case "matched":
        return outcome
      case "redirect":
        throw new RequestRedirectError(outcome.newUrl)
      case "methodNotAllowed":
        throw new MethodNotAllowedError(outcome.allowedMethods)
      case "websocketMismatch":
        throw new WebsocketMismatchError()
      case "notFound":
        throw new NotFoundError()
    }
  }

  /**
   * @returns True if the path matches or redirects
   */
  test(path?: string, method?: string): boolean {
    const { type } = this.match(path, method)
    return type === "matched" || type === "redirect"
  }

  /**
   * @returns The methods accepted at the path, empty when the path does not
   * match or a rule accepts every method
   */
  allowedMethods(path: string = this.pathInfo): string[] {
    const outcome = this._match(path, "--", {})
    return outcome.type === "methodNotAllowed" ? outcome.allowedMethods : []
  }

  /**
   * Build a URL for the endpoint
   *
   * @param endpoint The endpoint of the rules to build from
   * @param values Values for the rule arguments, the rest end up in the query
   * @param options The {@link BuildOptions}
   * @returns A path relative to the server when the rule is on the bound
   * domain, otherwise an absolute URL
   * @throws {@link BuildError} when no rule can be built
   */
  build(
    endpoint: string,
    values: BuildInput = {},
    options: BuildOptions = {},
  ): string {
    const prepared = prepareBuildValues(values)
    const method = options.method?.toUpperCase()
    const built = this._partialBuild(
      endpoint,
      prepared,
      method,
      options.appendUnknown ?? true,
    )

    if (built === undefined) {
      getRoutingMetrics().buildFailures.add(1)
      this.map.logger.debug(`Could not build a URL for '${endpoint}'`)
      throw new BuildError(
        endpoint,
        Object.fromEntries(prepared),
        method,
        this.map.rules,
      )
    }

    const host = this.getHost(built.domain)
    let scheme = options.urlScheme ?? this.urlScheme
    let external = options.forceExternal ?? false
    const secure = scheme === "https" || scheme === "wss"

    if (built.websocket) {
      external = true
      scheme = secure ? "wss" : "ws"
    } else if (scheme === "ws" || scheme === "wss") {
      scheme = secure ? "https" : "http"
    }

    // Only the separator is shared, rules may start with repeated slashes
    const path = `${this.scriptName.slice(0, -1)}/${built.path.replace(/^\//, "")}`
    if (!external && this._isLocal(built.domain, host)) {
      return path
    }

    return `${scheme.length > 0 ? `${scheme}:` : ""}//${host}${path}`
  }

  /**
   * Resolve the host for a built domain part
   *
   * @param domainPart The built host (host matching) or subdomain, the bound
   * one when missing
   */
  getHost(domainPart?: string): string {
    if (this.map.hostMatching) {
      return domainPart !== undefined && domainPart.length > 0
        ? domainPart
        : this.serverName
    }

    const subdomain =
      this.map.subdomainMatching && domainPart !== undefined
        ? domainPart
        : this.subdomain

    return subdomain.length > 0
      ? `${subdomain}.${this.serverName}`
      : this.serverName
  }

  /**
   * Create the absolute URL used for a redirect
   *
   * @param pathInfo The already quoted path below the mount point
   * @param queryArgs Query arguments to append
   * @param domainPart The built domain part, the bound one when missing
   */
  makeRedirectUrl(
    pathInfo: string,
    queryArgs?: QueryArgs,
    domainPart?: string,
  ): string {
    const query = queryArgs !== undefined ? encodeQuery(queryArgs) : ""
    const root = this.scriptName.replace(/^\/+|\/+$/g, "")
    const path = `${root.length > 0 ? `${root}/` : ""}${pathInfo.replace(/^\//, "")}`
    const suffix = query.length > 0 ? `?${query}` : ""

    return `${this.urlScheme || "http"}://${this.getHost(domainPart)}/${path}${suffix}`
  }

  private get _domainPart(): string {
    if (this.map.hostMatching) {
      return this.serverName
    }

    return this.map.subdomainMatching ? this.subdomain : ""
  }

  private _isLocal(domain: string, host: string): boolean {
    if (this.map.hostMatching) {
      return host === this.serverName
    }

    return !this.map.subdomainMatching || domain === this.subdomain
  }

  private _match(
    path: string,
    method: string,
    options: MatchOptions,
  ): MatchOutcome {
    const { matcher, rulesByEndpoint } = this.map.getSnapshot()
    const queryArgs = options.queryArgs ?? this.queryArgs
    const result = matcher.match(
      this._domainPart,
      path.length === 0 || path.startsWith("/") ? path : `/${path}`,
      method,
      options.websocket ?? this.websocket,
    )

    switch (result.type) {
      case "redirect":
        return redirect(
          this.makeRedirectUrl(quote(result.path, PATH_SAFE), queryArgs),
        )
      case "miss":
        if (result.allowedMethods.size > 0) {
          return {
            type: "methodNotAllowed",
            allowedMethods: [...result.allowedMethods].sort(),
          }
        }

        return result.websocketMismatch
          ? { type: "websocketMismatch" }
          : { type: "notFound" }
    }

    const { rule, values } = result

    if (this.map.redirectDefaults) {
      if (rule.alias) {
        return redirect(this._aliasTarget(rule, values, method, queryArgs))
      }

      const target = this._defaultsTarget(
        rule,
        values,
        method,
        queryArgs,
        rulesByEndpoint.get(rule.endpoint) ?? [],
      )
      if (target !== undefined) {
        return redirect(target)
      }
    }

    if (rule.redirectTo !== undefined) {
      return redirect(this._redirectTarget(rule, values))
    }

    return { type: "matched", endpoint: rule.endpoint, values, rule }
  }

  /**
   * The canonical URL for a request that matched an alias rule
   */
  private _aliasTarget(
    rule: Rule,
    values: RouteValues,
    method: string,
    queryArgs: Optional<QueryArgs>,
  ): string {
    const url = this.build(rule.endpoint, values, {
      method,
      appendUnknown: false,
      forceExternal: true,
    })

    const query = queryArgs !== undefined ? encodeQuery(queryArgs) : ""
    return query.length > 0 ? `${url}?${query}` : url
  }

  /**
   * Find a rule with a higher build priority whose defaults provide the
   * matched values and return its URL
   */
  private _defaultsTarget(
    rule: Rule,
    values: RouteValues,
    method: string,
    queryArgs: Optional<QueryArgs>,
    candidates: readonly Rule[],
  ): Optional<string> {
    const prepared = prepareBuildValues(values)

    for (const candidate of candidates) {
      // Everything after the matched rule has a lower priority
      if (candidate === rule) {
        break
      }

      if (
        candidate.providesDefaultsFor(rule) &&
        candidate.suitableFor(prepared, method)
      ) {
        const built = candidate.build(
          prepareBuildValues({ ...values, ...candidate.defaults }),
          { appendUnknown: true },
        )

        if (built !== undefined) {
          return this.makeRedirectUrl(built.path, queryArgs, built.domain)
        }
      }
    }

    return
  }

  private _redirectTarget(rule: Rule, values: RouteValues): string {
    let target: string
    if (typeof rule.redirectTo === "function") {
      target = rule.redirectTo(this, values)
    } else {
      target = (rule.redirectTo ?? "").replace(
        /<([^>]+)>/g,
        (_placeholder, name: string) => {
          const converter = rule.converters.get(name)
          return converter !== undefined
            ? converter.toUrl(values[name])
            : quote(String(values[name] ?? ""), PATH_SAFE)
        },
      )
    }

    const netloc =
      !this.map.hostMatching && this.subdomain.length > 0
        ? `${this.subdomain}.${this.serverName}`
        : this.serverName

    return joinUrl(
      `${this.urlScheme || "http"}://${netloc}${this.scriptName}`,
      target,
    )
  }

  /**
   * Try the rules of the endpoint in build priority order
   */
  private _partialBuild(
    endpoint: string,
    values: BuildValues,
    method: Optional<string>,
    appendUnknown: boolean,
  ): Optional<Candidate> {
    // Prefer rules for the default method when none was requested
    if (method === undefined) {
      const preferred = this._partialBuild(
        endpoint,
        values,
        this.defaultMethod,
        appendUnknown,
      )
      if (preferred !== undefined) {
        return preferred
      }
    }

    const { rulesByEndpoint } = this.map.getSnapshot()
    let first: Optional<Candidate>

    for (const rule of rulesByEndpoint.get(endpoint) ?? []) {
      if (!rule.suitableFor(values, method)) {
        continue
      }

      const built = rule.build(values, {
        appendUnknown,
        sortParameters: this.map.sortParameters,
        sortKey: this.map.sortKey,
      })
      if (built === undefined) {
        continue
      }

      const candidate = { ...built, websocket: rule.websocket }
      if (!this.map.hostMatching || built.domain === this.serverName) {
        return candidate
      }

      first ??= candidate
    }

    return first
  }
}

function redirect(newUrl: string): MatchOutcome {
  return { type: "redirect", newUrl, code: 308 }
}

function isValueMap(
  values: BuildInput,
): values is ReadonlyMap<string, unknown> {
  return values instanceof Map
}

/**
 * Drop missing values and turn every entry into a non empty list
 */
export function prepareBuildValues(values: BuildInput): BuildValues {
  const entries = isValueMap(values)
    ? [...values.entries()]
    : Object.entries(values)
  const prepared = new Map<string, unknown[]>()

  for (const [name, value] of entries) {
    const items: unknown[] = Array.isArray(value) ? [...value] : [value]
    const present = items.filter((item) => item !== null && item !== undefined)
    if (present.length > 0) {
      prepared.set(name, present)
    }
  }

  return prepared
}
