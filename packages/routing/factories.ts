/**
 * Factories that produce groups of rules sharing a path prefix, subdomain,
 * endpoint prefix or template variables
 */

import type { Optional } from "@urlmap/core/type/utils.js"
import { RuleSyntaxError } from "./errors.js"
import type { RouteValues, Rule, RuleFactory } from "./rule.js"

/**
 * Prefix the path of every rule
 *
 * @example
 * ```ts
 * new Submount("/blog", [
 *   new Rule("/", { endpoint: "blog.index" }),
 *   new Rule("/entry/<slug>", { endpoint: "blog.entry" }),
 * ])
 * ```
 */
export class Submount implements RuleFactory {
  readonly path: string

  constructor(
    path: string,
    readonly factories: Iterable<RuleFactory>,
  ) {
    this.path = path.replace(/\/+$/, "")
  }

  *getRules(): Iterable<Rule> {
    for (const factory of this.factories) {
      for (const rule of factory.getRules()) {
        yield rule.clone({ path: `${this.path}${rule.path}` })
      }
    }
  }
}

/**
 * Set the subdomain of every rule, the map needs subdomain matching
 */
export class Subdomain implements RuleFactory {
  constructor(
    readonly subdomain: string,
    readonly factories: Iterable<RuleFactory>,
  ) {}

  *getRules(): Iterable<Rule> {
    for (const factory of this.factories) {
      for (const rule of factory.getRules()) {
        yield rule.clone({ subdomain: this.subdomain })
      }
    }
  }
}

/**
 * Prefix the endpoint of every rule
 */
export class EndpointPrefix implements RuleFactory {
  constructor(
    readonly prefix: string,
    readonly factories: Iterable<RuleFactory>,
  ) {}

  *getRules(): Iterable<Rule> {
    for (const factory of this.factories) {
      for (const rule of factory.getRules()) {
        yield rule.clone({ endpoint: `${this.prefix}${rule.endpoint}` })
      }
    }
  }
}

/**
 * Values substituted into a {@link RuleTemplate}
 */
export type TemplateVariables = Readonly<Record<string, string | number>>

/**
 * A reusable group of rules with `$name` or `${name}` placeholders in the
 * path, endpoint, subdomain, host, string redirect target and string defaults.
 * `$$` produces a literal `$`.
 *
 * @example
 * ```ts
 * const resource = new RuleTemplate([
 *   new Rule("/$name/", { endpoint: "$name.list" }),
 *   new Rule("/$name/<int:id>", { endpoint: "$name.show" }),
 * ])
 *
 * new UrlMap([resource.instantiate({ name: "users" })])
 * ```
 */
export class RuleTemplate {
  constructor(readonly factories: Iterable<RuleFactory>) {}

  /**
   * Create a factory producing the rules with the variables substituted
   */
  instantiate(variables: TemplateVariables): RuleFactory {
    return new RuleTemplateFactory(this.factories, variables)
  }
}

/**
 * The rules of a {@link RuleTemplate} with its variables applied
 */
export class RuleTemplateFactory implements RuleFactory {
  constructor(
    readonly factories: Iterable<RuleFactory>,
    readonly variables: TemplateVariables,
  ) {}

  *getRules(): Iterable<Rule> {
    for (const factory of this.factories) {
      for (const rule of factory.getRules()) {
        yield rule.clone({
          path: this._substitute(rule.path),
          endpoint: this._substitute(rule.endpoint),
          subdomain: this._optional(rule.subdomain),
          host: this._optional(rule.host),
          redirectTo:
            typeof rule.redirectTo === "string"
              ? this._substitute(rule.redirectTo)
              : rule.redirectTo,
          defaults: this._defaults(rule.defaults),
        })
      }
    }
  }

  private _defaults(
    defaults: Optional<Readonly<RouteValues>>,
  ): Optional<RouteValues> {
    if (defaults === undefined) {
      return
    }

    const substituted: RouteValues = {}
    for (const [name, value] of Object.entries(defaults)) {
      substituted[name] =
        typeof value === "string" ? this._substitute(value) : value
    }

    return substituted
  }

  private _optional(text: Optional<string>): Optional<string> {
    return text !== undefined ? this._substitute(text) : undefined
  }

  private _substitute(text: string): string {
    return text.replace(
      /\$(?:(\$)|([_a-zA-Z][_a-zA-Z0-9]*)|\{([_a-zA-Z][_a-zA-Z0-9]*)\})/g,
      (placeholder, escaped?: string, bare?: string, braced?: string) => {
        if (escaped !== undefined) {
          return "$"
        }

        const name = bare ?? braced ?? ""
        const value = this.variables[name]
        if (value === undefined) {
          throw new RuleSyntaxError(
            `no value for the template variable '${name}' in ${placeholder}`,
            text,
          )
        }

        return String(value)
      },
    )
  }
}
