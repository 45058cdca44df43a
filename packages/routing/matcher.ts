/**
 * State machine that walks the domain and path segments of a request through
 * the compiled parts of every rule
 */

import type { Optional } from "@urlmap/core/type/utils.js"
import {
  compareWeighting,
  type DynamicRulePart,
  type RouteValues,
  type Rule,
} from "./rule.js"

/**
 * Methods that may be answered with a trailing slash redirect
 */
export const REDIRECTABLE_METHODS: ReadonlySet<string> = new Set([
  "GET",
  "HEAD",
  "OPTIONS",
])

/**
 * The result of walking the state machine
 */
export type MatcherResult =
  | { type: "match"; rule: Rule; values: RouteValues }
  | { type: "redirect"; path: string }
  | {
      type: "miss"
      /** Methods accepted by rules that matched everything else */
      allowedMethods: ReadonlySet<string>
      /** A rule matched everything except the websocket flag */
      websocketMismatch: boolean
    }

interface State {
  readonly static: Map<string, State>
  readonly dynamic: [DynamicRulePart, State][]
  readonly rules: Rule[]
}

function newState(): State {
  return { static: new Map(), dynamic: [], rules: [] }
}

type Traversal =
  | { type: "match"; rule: Rule; values: RouteValues }
  | { type: "slash"; append: boolean }

/**
 * Rules sharing the same sequence of parts share the same states, so a
 * request only walks each distinct prefix once
 */
export class StateMachineMatcher {
  private readonly _root: State = newState()
  private readonly _mergeSlashes: boolean

  constructor(mergeSlashes: boolean) {
    this._mergeSlashes = mergeSlashes
  }

  /**
   * Add the bound rule to the state machine
   */
  add(rule: Rule): void {
    let state = this._root
    for (const part of rule.parts) {
      if (part.static) {
        let next = state.static.get(part.content)
        if (next === undefined) {
          next = newState()
          state.static.set(part.content, next)
        }
        state = next
      } else {
        const existing = state.dynamic.find(([candidate]) =>
          samePart(candidate, part),
        )
        if (existing !== undefined) {
          state = existing[1]
        } else {
          const next = newState()
          state.dynamic.push([part, next])
          state = next
        }
      }
    }

    state.rules.push(rule)
  }

  /**
   * Order the dynamic transitions of every state by their weight, must be
   * called after the last {@link add}
   */
  update(): void {
    const pending: State[] = [this._root]
    for (let state = pending.pop(); state !== undefined; state = pending.pop()) {
      // Array.prototype.sort is stable so equal weights keep insertion order
      state.dynamic.sort((a, b) => compareWeighting(a[0].weight, b[0].weight))
      pending.push(...state.static.values())
      pending.push(...state.dynamic.map(([, next]) => next))
    }
  }

  /**
   * Match the request
   *
   * @param domain The host (host matching), subdomain (subdomain matching) or
   * the empty string
   * @param path The path including the leading slash
   * @param method The upper cased request method
   * @param websocket True for websocket handshakes
   */
  match(
    domain: string,
    path: string,
    method: string,
    websocket: boolean,
  ): MatcherResult {
    const search = new MatchSearch(method, websocket)

    const exact = search.run(this._root, [domain, ...path.split("/")])
    if (exact !== undefined) {
      return exact.type === "slash"
        ? { type: "redirect", path: slashTarget(path, exact.append) }
        : exact
    }

    if (this._mergeSlashes) {
      const merged = path.replace(/\/{2,}/g, "/")
      if (merged !== path) {
        const retry = search.run(this._root, [domain, ...merged.split("/")])
        if (retry?.type === "slash") {
          return { type: "redirect", path: slashTarget(merged, retry.append) }
        }

        if (retry?.type === "match" && retry.rule.mergeSlashes) {
          return { type: "redirect", path: merged }
        }
      }
    }

    return {
      type: "miss",
      allowedMethods: search.allowedMethods,
      websocketMismatch: search.websocketMismatch,
    }
  }
}

function slashTarget(path: string, append: boolean): string {
  return append ? `${path}/` : path.replace(/\/$/, "")
}

function samePart(left: DynamicRulePart, right: DynamicRulePart): boolean {
  return (
    left.content === right.content &&
    left.final === right.final &&
    left.suffixed === right.suffixed &&
    compareWeighting(left.weight, right.weight) === 0
  )
}

/**
 * Depth first search state for a single request
 */
class MatchSearch {
  readonly allowedMethods = new Set<string>()
  websocketMismatch = false

  constructor(
    private readonly method: string,
    private readonly websocket: boolean,
  ) {}

  run(root: State, parts: readonly string[]): Optional<Traversal> {
    return this._visit(root, parts, [])
  }

  private _visit(
    state: State,
    parts: readonly string[],
    captured: readonly string[],
  ): Optional<Traversal> {
    if (parts.length === 0) {
      const match = this._accept(state.rules, captured)
      if (match !== undefined) {
        return match
      }

      // The path stopped where a branch rule (trailing slash) is waiting
      const branch = state.static.get("")
      if (branch !== undefined) {
        return this._slash(branch.rules, captured, true)
      }

      return
    }

    const [head, ...rest] = parts

    const next = state.static.get(head)
    if (next !== undefined) {
      const result = this._visit(next, rest, captured)
      if (result !== undefined) {
        return result
      }
    }

    for (const [part, target] of state.dynamic) {
      const text = part.final ? parts.join("/") : head
      const match = part.regex.exec(text)
      if (match === null) {
        continue
      }

      const values = [...captured]
      for (let n = 0; n < part.groups; ++n) {
        values.push(match.groups?.[`__c${n}`] ?? "")
      }

      // A suffixed part leaves its trailing slash for the empty static part
      const remaining = part.final
        ? part.suffixed && match[match.length - 1] === "/"
          ? [""]
          : []
        : rest

      const result = this._visit(target, remaining, values)
      if (result !== undefined) {
        return result
      }
    }

    // Only the trailing slash is left, a leaf rule may still apply
    if (parts.length === 1 && head === "") {
      return this._slash(state.rules, captured, false)
    }

    return
  }

  private _accept(
    rules: readonly Rule[],
    captured: readonly string[],
  ): Optional<Traversal> {
    for (const rule of rules) {
      const values = rule.convert(captured)
      if (values === undefined) {
        continue
      }

      if (!rule.acceptsMethod(this.method)) {
        this._allow(rule)
        continue
      }

      if (rule.websocket !== this.websocket) {
        this.websocketMismatch = true
        continue
      }

      return { type: "match", rule, values }
    }

    return
  }

  /**
   * Handle a request that differs from the rules only by a trailing slash
   *
   * @param append True when the slash is missing from the request
   */
  private _slash(
    rules: readonly Rule[],
    captured: readonly string[],
    append: boolean,
  ): Optional<Traversal> {
    for (const rule of rules) {
      if (rule.isLeaf === append) {
        continue
      }

      const values = rule.convert(captured)
      if (values === undefined) {
        continue
      }

      if (!rule.acceptsMethod(this.method)) {
        this._allow(rule)
        continue
      }

      if (rule.websocket !== this.websocket) {
        this.websocketMismatch = true
        continue
      }

      if (!rule.strictSlashes) {
        return { type: "match", rule, values }
      }

      if (REDIRECTABLE_METHODS.has(this.method)) {
        return { type: "slash", append }
      }
    }

    return
  }

  private _allow(rule: Rule): void {
    for (const method of rule.methods ?? []) {
      this.allowedMethods.add(method)
    }
  }
}
