/**
 * Rules describe a URL pattern, the endpoint it resolves to and how the URL is
 * rebuilt from values
 */

import { describeError } from "@urlmap/core/errors.js"
import type { Optional } from "@urlmap/core/type/utils.js"
import type { MapAdapter } from "./adapter.js"
import {
  escapeRegExp,
  type Converter,
  type ConverterFactory,
} from "./converters.js"
import {
  RoutingError,
  RuleBindingError,
  RuleSyntaxError,
  ValidationError,
} from "./errors.js"
import {
  parseConverterArgs,
  parseRuleTemplate,
  type TemplateToken,
} from "./parser.js"
import {
  PATH_SAFE,
  encodePairs,
  quote,
  type QueryPair,
  type QuerySortKey,
} from "./urls.js"

/**
 * Values extracted by a match or provided to a build
 */
export type RouteValues = Record<string, unknown>

/**
 * Values prepared for building: `null`/`undefined` removed and every entry
 * turned into a non empty list. The first item feeds a rule argument, all of
 * them may end up in the query string.
 */
export type BuildValues = ReadonlyMap<string, readonly unknown[]>

/**
 * Computes the target of a redirect rule from the adapter and matched values
 */
export type RedirectCallback = (
  adapter: MapAdapter,
  values: Readonly<RouteValues>,
) => string

/**
 * Options for a {@link Rule}, only the endpoint is required
 */
export interface RuleOptions {
  /** The identifier returned when the rule matches */
  endpoint: string
  /** Values merged into the match result, also satisfy arguments when building */
  defaults?: Readonly<RouteValues>
  /** Subdomain template, requires subdomain matching on the map */
  subdomain?: string
  /** Host template, requires host matching on the map */
  host?: string
  /** Accepted methods, all methods when missing or empty */
  methods?: Iterable<string>
  /** The rule is only used to build URLs, never to match */
  buildOnly?: boolean
  /** Override the map setting for trailing slash redirects */
  strictSlashes?: boolean
  /** Override the map setting for collapsing repeated slashes */
  mergeSlashes?: boolean
  /** A matching request is redirected to this template or computed URL */
  redirectTo?: string | RedirectCallback
  /** Requests for this rule are redirected to the canonical rule of the endpoint */
  alias?: boolean
  /** Only match websocket handshakes */
  websocket?: boolean
}

/**
 * Produces rules to add to a map
 */
export interface RuleFactory {
  getRules(): Iterable<Rule>
}

/**
 * The map settings a rule is compiled against
 */
export interface RuleBindingContext {
  readonly converters: ReadonlyMap<string, ConverterFactory>
  readonly strictSlashes: boolean
  readonly mergeSlashes: boolean
  readonly hostMatching: boolean
  readonly subdomainMatching: boolean
  readonly defaultSubdomain: string
}

/**
 * Priority of a part, compared field by field, lower sorts first
 */
export interface Weighting {
  /** Negated number of static pieces */
  readonly staticCount: number
  /** Position and negated length of each static piece */
  readonly staticWeights: readonly (readonly [index: number, length: number])[]
  /** Negated number of converters */
  readonly converterCount: number
  /** The weight of each converter in order */
  readonly converterWeights: readonly number[]
}

export interface StaticRulePart {
  readonly static: true
  readonly content: string
  readonly weight: Weighting
}

export interface DynamicRulePart {
  readonly static: false
  /** Regular expression source for the part */
  readonly content: string
  readonly regex: RegExp
  /** Absorbs every remaining segment of the path */
  readonly final: boolean
  /** Final part ending with an optional captured slash */
  readonly suffixed: boolean
  /** Number of converter groups (named `__c0`, `__c1`...) */
  readonly groups: number
  readonly weight: Weighting
}

/**
 * A compiled piece of the domain or one path segment
 */
export type RulePart = StaticRulePart | DynamicRulePart

/**
 * Steps to produce a built domain or path
 */
export type BuildOperation =
  | { type: "literal"; text: string }
  | { type: "variable"; name: string }

/**
 * The output of compiling a rule against a map
 */
export interface CompiledRule {
  readonly strictSlashes: boolean
  readonly mergeSlashes: boolean
  readonly parts: readonly RulePart[]
  readonly converters: ReadonlyMap<string, Converter>
  readonly domainOperations: readonly BuildOperation[]
  readonly pathOperations: readonly BuildOperation[]
  /** Identifies rules that match the same URLs regardless of variable names */
  readonly signature: string
}

/**
 * Options for {@link Rule.build}
 */
export interface RuleBuildOptions {
  /** Append values that are not rule arguments as a query string */
  appendUnknown: boolean
  sortParameters?: boolean
  sortKey?: QuerySortKey
}

export interface BuiltRule {
  readonly domain: string
  /** The path including a query string when one was appended */
  readonly path: string
}

const NO_DEFAULTS: Readonly<RouteValues> = Object.freeze({})

const WEBSOCKET_METHODS: ReadonlySet<string> = new Set([
  "GET",
  "HEAD",
  "OPTIONS",
])

/**
 * A URL pattern bound to an endpoint
 *
 * Placeholders take the form `<converter(arguments):name>` where the converter
 * and arguments are optional, e.g. `/users/<int:id>` or `/files/<path:name>`.
 * A rule whose path ends with `/` is a branch, otherwise it is a leaf.
 */
export class Rule implements RuleFactory {
  readonly path: string
  readonly endpoint: string
  readonly defaults: Optional<Readonly<RouteValues>>
  readonly subdomain: Optional<string>
  readonly host: Optional<string>
  readonly methods: Optional<ReadonlySet<string>>
  readonly buildOnly: boolean
  readonly alias: boolean
  readonly websocket: boolean
  readonly redirectTo: Optional<string | RedirectCallback>

  /** Variable names of the templates plus the default keys */
  readonly arguments: ReadonlySet<string>

  /** Per rule strict slash setting, the map setting applies when missing */
  readonly strictSlashesOverride: Optional<boolean>
  /** Per rule merge slash setting, the map setting applies when missing */
  readonly mergeSlashesOverride: Optional<boolean>

  private _binding: Optional<{ id: number; compiled: CompiledRule }>

  constructor(path: string, options: RuleOptions) {
    if (!path.startsWith("/")) {
      throw new RuleSyntaxError("urls must start with a leading slash", path)
    }

    this.path = path
    this.endpoint = options.endpoint
    this.defaults = options.defaults
    this.subdomain = options.subdomain
    this.host = options.host
    this.buildOnly = options.buildOnly ?? false
    this.alias = options.alias ?? false
    this.websocket = options.websocket ?? false
    this.redirectTo = options.redirectTo
    this.strictSlashesOverride = options.strictSlashes
    this.mergeSlashesOverride = options.mergeSlashes
    this.methods = normalizeMethods(path, options.methods, this.websocket)

    const names = new Set<string>(Object.keys(options.defaults ?? {}))
    for (const template of [path, options.host, options.subdomain]) {
      if (template !== undefined) {
        for (const token of parseRuleTemplate(template)) {
          if (token.type === "variable") {
            names.add(token.name)
          }
        }
      }
    }
    this.arguments = names
  }

  /** True when the path does not end with a slash */
  get isLeaf(): boolean {
    return !this.path.endsWith("/")
  }

  get isBranch(): boolean {
    return !this.isLeaf
  }

  get isBound(): boolean {
    return this._binding !== undefined
  }

  /** Insertion order within the map the rule is bound to */
  get id(): number {
    return this._bound().id
  }

  get strictSlashes(): boolean {
    return this._bound().compiled.strictSlashes
  }

  get mergeSlashes(): boolean {
    return this._bound().compiled.mergeSlashes
  }

  get parts(): readonly RulePart[] {
    return this._bound().compiled.parts
  }

  get converters(): ReadonlyMap<string, Converter> {
    return this._bound().compiled.converters
  }

  get signature(): string {
    return this._bound().compiled.signature
  }

  /** The weight of each part, used to order alternatives while matching */
  get priorityKey(): readonly Weighting[] {
    return this.parts.map((part) => part.weight)
  }

  /**
   * Ordering used when choosing a rule to build from: regular rules before
   * aliases, then more arguments, then more defaults, then insertion order
   */
  get buildPriorityKey(): readonly number[] {
    return [
      this.alias ? 1 : 0,
      -this.arguments.size,
      -Object.keys(this.defaults ?? NO_DEFAULTS).length,
      this.id,
    ]
  }

  /**
   * Attach the compiled form of this rule, a rule can only be bound once
   *
   * @param compiled The output of {@link compileRule}
   * @param id The insertion order in the owning map
   */
  bind(compiled: CompiledRule, id: number): void {
    if (this._binding !== undefined) {
      throw new RuleBindingError(
        `${this.toString()} is already bound to a map`,
      )
    }

    this._binding = { id, compiled }
  }

  *getRules(): Iterable<Rule> {
    yield this
  }

  /**
   * Create an unbound copy of this rule
   *
   * @param overrides Values to replace in the copy
   */
  clone(overrides: Partial<RuleOptions> & { path?: string } = {}): Rule {
    return new Rule(overrides.path ?? this.path, {
      endpoint: overrides.endpoint ?? this.endpoint,
      defaults: overrides.defaults ?? this.defaults,
      subdomain: overrides.subdomain ?? this.subdomain,
      host: overrides.host ?? this.host,
      methods: overrides.methods ?? this.methods,
      buildOnly: overrides.buildOnly ?? this.buildOnly,
      strictSlashes: overrides.strictSlashes ?? this.strictSlashesOverride,
      mergeSlashes: overrides.mergeSlashes ?? this.mergeSlashesOverride,
      redirectTo: overrides.redirectTo ?? this.redirectTo,
      alias: overrides.alias ?? this.alias,
      websocket: overrides.websocket ?? this.websocket,
    })
  }

  /**
   * @returns True if the rule accepts the method (or all methods)
   */
  acceptsMethod(method: string): boolean {
    return this.methods === undefined || this.methods.has(method)
  }

  /**
   * Convert the captured texts into the match values, merging the defaults
   *
   * @param captured The captured texts in converter order
   * @returns The values or undefined when a converter rejected its text
   */
  convert(captured: readonly string[]): Optional<RouteValues> {
    const values: RouteValues = {}
    let index = 0
    for (const [name, converter] of this.converters) {
      try {
        values[name] = converter.toValue(captured[index++] ?? "")
      } catch (err) {
        if (err instanceof ValidationError) {
          return
        }
        throw err
      }
    }

    return { ...values, ...this.defaults }
  }

  /**
   * Check if this rule can build a URL from the values and method
   *
   * Every argument needs a value or a default and provided values must agree
   * with the defaults.
   */
  suitableFor(values: BuildValues, method?: string): boolean {
    if (method !== undefined && !this.acceptsMethod(method)) {
      return false
    }

    const defaults = this.defaults ?? NO_DEFAULTS
    for (const name of this.arguments) {
      if (!(name in defaults) && !values.has(name)) {
        return false
      }
    }

    for (const [name, value] of Object.entries(defaults)) {
      const provided = values.get(name)
      if (provided !== undefined && provided[0] !== value) {
        return false
      }
    }

    return true
  }

  /**
   * Another rule of the same endpoint with the same arguments and defaults
   * can redirect requests of `rule` to itself
   */
  providesDefaultsFor(rule: Rule): boolean {
    return (
      !this.buildOnly &&
      this.defaults !== undefined &&
      Object.keys(this.defaults).length > 0 &&
      this !== rule &&
      this.endpoint === rule.endpoint &&
      this.arguments.size === rule.arguments.size &&
      [...this.arguments].every((name) => rule.arguments.has(name))
    )
  }

  /**
   * Build the domain and path for the values
   *
   * @returns The built URL pieces or undefined when a converter rejected a
   * value
   */
  build(values: BuildValues, options: RuleBuildOptions): Optional<BuiltRule> {
    const { compiled } = this._bound()
    let domain: string
    let path: string

    try {
      domain = this._render(compiled.domainOperations, values)
      path = this._render(compiled.pathOperations, values)
    } catch (err) {
      if (err instanceof ValidationError) {
        return
      }
      throw err
    }

    if (options.appendUnknown) {
      const pairs: QueryPair[] = []
      for (const [name, items] of values) {
        if (!this.arguments.has(name)) {
          for (const item of items) {
            pairs.push([name, String(item)])
          }
        }
      }

      if (pairs.length > 0) {
        path = `${path}?${encodePairs(pairs, options.sortParameters, options.sortKey)}`
      }
    }

    return { domain, path }
  }

  toString(): string {
    const methods =
      this.methods !== undefined
        ? ` (${[...this.methods].sort().join(", ")})`
        : ""
    return `<Rule '${this.path}'${methods} -> ${this.endpoint}>`
  }

  private _render(
    operations: readonly BuildOperation[],
    values: BuildValues,
  ): string {
    let rendered = ""
    for (const operation of operations) {
      if (operation.type === "literal") {
        rendered += operation.text
        continue
      }

      const provided = values.get(operation.name)
      const converter = this.converters.get(operation.name)
      if (provided === undefined || converter === undefined) {
        throw new ValidationError(`no value for '${operation.name}'`)
      }

      rendered += converter.toUrl(provided[0])
    }

    return rendered
  }

  private _bound(): { id: number; compiled: CompiledRule } {
    if (this._binding === undefined) {
      throw new RuleBindingError(`${this.toString()} is not bound to a map`)
    }

    return this._binding
  }
}

function normalizeMethods(
  path: string,
  methods: Optional<Iterable<string>>,
  websocket: boolean,
): Optional<ReadonlySet<string>> {
  if (typeof methods === "string") {
    throw new TypeError(
      `methods for '${path}' should be a list of strings, not a string`,
    )
  }

  const normalized = new Set<string>()
  for (const method of methods ?? []) {
    normalized.add(method.toUpperCase())
  }

  if (normalized.has("GET")) {
    normalized.add("HEAD")
  }

  if (websocket) {
    if (normalized.size === 0) {
      return WEBSOCKET_METHODS
    }

    for (const method of normalized) {
      if (!WEBSOCKET_METHODS.has(method)) {
        throw new RuleSyntaxError(
          "websocket rules can only use the GET, HEAD and OPTIONS methods",
          path,
        )
      }
    }
  }

  return normalized.size > 0 ? normalized : undefined
}

/**
 * Compile the rule against the settings of a map
 *
 * @param rule The rule to compile
 * @param context The map settings and converter registry
 * @returns The compiled parts, converters and build operations
 * @throws {@link RuleSyntaxError} for template or converter problems
 * @throws {@link RuleBindingError} when the rule needs a domain mode the map
 * does not use
 */
export function compileRule(
  rule: Rule,
  context: RuleBindingContext,
): CompiledRule {
  const mergeSlashes = rule.mergeSlashesOverride ?? context.mergeSlashes
  const compiler = new RuleCompiler(rule, context)

  compiler.compileDomain(domainTemplate(rule, context))
  compiler.compilePath(
    mergeSlashes ? rule.path.replace(/\/{2,}/g, "/") : rule.path,
  )

  return {
    strictSlashes: rule.strictSlashesOverride ?? context.strictSlashes,
    mergeSlashes,
    parts: compiler.parts,
    converters: compiler.converters,
    domainOperations: compiler.domainOperations,
    pathOperations: compiler.pathOperations,
    signature: compiler.signature.join(""),
  }
}

function domainTemplate(rule: Rule, context: RuleBindingContext): string {
  if (context.hostMatching) {
    if (rule.subdomain !== undefined) {
      throw new RuleBindingError(
        `${rule.toString()} sets a subdomain but the map matches on hosts`,
      )
    }
    return rule.host ?? ""
  }

  if (context.subdomainMatching) {
    if (rule.host !== undefined) {
      throw new RuleBindingError(
        `${rule.toString()} sets a host but the map matches on subdomains`,
      )
    }
    return rule.subdomain ?? context.defaultSubdomain
  }

  if (rule.host !== undefined || rule.subdomain !== undefined) {
    throw new RuleBindingError(
      `${rule.toString()} sets a host or subdomain but the map has neither host nor subdomain matching enabled`,
    )
  }

  return ""
}

const EMPTY_WEIGHT: Weighting = {
  staticCount: 0,
  staticWeights: [],
  converterCount: 0,
  converterWeights: [],
}

/**
 * Walks the template tokens producing parts, converters and build operations
 */
class RuleCompiler {
  readonly parts: RulePart[] = []
  readonly converters = new Map<string, Converter>()
  readonly domainOperations: BuildOperation[] = []
  readonly pathOperations: BuildOperation[] = []
  readonly signature: string[] = []

  constructor(
    private readonly rule: Rule,
    private readonly context: RuleBindingContext,
  ) {}

  compileDomain(template: string): void {
    if (template.length === 0) {
      this.parts.push({ static: true, content: "", weight: EMPTY_WEIGHT })
    } else {
      this._compile(template, this.domainOperations)
    }

    this.signature.push("|")
  }

  compilePath(template: string): void {
    this._compile(template, this.pathOperations)
  }

  private _compile(template: string, operations: BuildOperation[]): void {
    let segment = new SegmentBuilder(template)

    for (const token of parseRuleTemplate(template)) {
      switch (token.type) {
        case "static":
          segment.addStatic(token.text)
          this._literal(operations, quote(token.text, PATH_SAFE))
          this.signature.push(token.text)
          break
        case "variable": {
          const converter = this._converter(template, token)
          segment.addVariable(converter)
          this._variable(operations, template, token.name, converter)
          this.signature.push(
            `<${converter.regex}:${converter.weight}(${token.args?.trim() ?? ""})>`,
          )
          break
        }
        case "slash":
          this._literal(operations, "/")
          this.signature.push("/")
          if (segment.final) {
            segment.addSlash()
          } else {
            this.parts.push(segment.finish(false))
            segment = new SegmentBuilder(template)
          }
          break
      }
    }

    const suffixed = segment.final && segment.endsWithSlash
    const last = segment.finish(suffixed)
    this.parts.push(last)

    // Keep the trailing slash semantics for parts that absorb the path
    if (suffixed) {
      this.parts.push({ static: true, content: "", weight: last.weight })
    }
  }

  private _converter(
    template: string,
    token: Extract<TemplateToken, { type: "variable" }>,
  ): Converter {
    const name = token.converter ?? "default"
    const factory = this.context.converters.get(name)
    if (factory === undefined) {
      throw new RuleSyntaxError(`the converter '${name}' does not exist`, template)
    }

    if (this.converters.has(token.name)) {
      throw new RuleSyntaxError(
        `variable name '${token.name}' used more than once`,
        template,
      )
    }

    const { args, kwargs } =
      token.args !== undefined
        ? parseConverterArgs(token.args)
        : { args: [], kwargs: {} }

    let converter: Converter
    try {
      converter = factory({ template, variable: token.name }, args, kwargs)
    } catch (err) {
      if (err instanceof RoutingError) {
        throw err
      }

      throw new RuleSyntaxError(
        `converter '${name}' rejected its arguments (${describeError(err)})`,
        template,
        { cause: err },
      )
    }

    this.converters.set(token.name, converter)
    return converter
  }

  private _variable(
    operations: BuildOperation[],
    template: string,
    name: string,
    converter: Converter,
  ): void {
    const defaults = this.rule.defaults
    if (defaults === undefined || !(name in defaults)) {
      operations.push({ type: "variable", name })
      return
    }

    // A variable with a default always builds the same text
    try {
      this._literal(operations, converter.toUrl(defaults[name]))
    } catch (err) {
      if (err instanceof ValidationError) {
        throw new RuleSyntaxError(
          `the default for '${name}' cannot be converted (${err.message})`,
          template,
          { cause: err },
        )
      }
      throw err
    }
  }

  private _literal(operations: BuildOperation[], text: string): void {
    const previous = operations[operations.length - 1]
    if (previous?.type === "literal") {
      operations[operations.length - 1] = {
        type: "literal",
        text: previous.text + text,
      }
    } else {
      operations.push({ type: "literal", text })
    }
  }
}

/**
 * Accumulates the content and weight of one part
 */
class SegmentBuilder {
  private _content = ""
  private _static = true
  private _final = false
  private _groups = 0
  private readonly _staticWeights: [number, number][] = []
  private readonly _converterWeights: number[] = []

  constructor(private readonly template: string) {}

  get final(): boolean {
    return this._final
  }

  get endsWithSlash(): boolean {
    return this._content.endsWith("/")
  }

  addStatic(text: string): void {
    this._staticWeights.push([this._staticWeights.length, -text.length])
    this._content += this._static ? text : escapeRegExp(text)
  }

  addVariable(converter: Converter): void {
    if (this._static) {
      // The content becomes a regular expression from here on
      this._content = escapeRegExp(this._content)
      this._static = false
    }

    if (!converter.partIsolating) {
      this._final = true
    }

    this._content += `(?<__c${this._groups++}>${converter.regex})`
    this._converterWeights.push(converter.weight)
  }

  addSlash(): void {
    this._content += "/"
  }

  finish(suffixed: boolean): RulePart {
    const weight: Weighting = {
      staticCount: -this._staticWeights.length,
      staticWeights: this._staticWeights,
      converterCount: -this._converterWeights.length,
      converterWeights: this._converterWeights,
    }

    if (this._static) {
      return { static: true, content: this._content, weight }
    }

    const content = suffixed
      ? `${this._content.slice(0, -1)}(?<!/)(/?)`
      : this._content

    let regex: RegExp
    try {
      regex = new RegExp(`^(?:${content})$`)
    } catch (err) {
      throw new RuleSyntaxError(
        `invalid converter expression (${describeError(err)})`,
        this.template,
        { cause: err },
      )
    }

    return {
      static: false,
      content,
      regex,
      final: this._final,
      suffixed,
      groups: this._groups,
      weight,
    }
  }
}

/**
 * Compare two part weights, negative when `left` should be tried first
 */
export function compareWeighting(left: Weighting, right: Weighting): number {
  return (
    left.staticCount - right.staticCount ||
    compareLists(left.staticWeights, right.staticWeights, (a, b) =>
      a[0] - b[0] || a[1] - b[1],
    ) ||
    left.converterCount - right.converterCount ||
    compareLists(left.converterWeights, right.converterWeights, (a, b) => a - b)
  )
}

/**
 * Compare two lists element wise, a shorter prefix sorts first
 */
export function compareLists<T>(
  left: readonly T[],
  right: readonly T[],
  compare: (a: T, b: T) => number,
): number {
  const length = Math.min(left.length, right.length)
  for (let i = 0; i < length; ++i) {
    const result = compare(left[i], right[i])
    if (result !== 0) {
      return result
    }
  }

  return left.length - right.length
}
