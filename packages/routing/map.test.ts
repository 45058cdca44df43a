import { DefaultLogger, LogLevel, MemoryLogWriter } from "@urlmap/core/logging.js"
import type { ConverterFactory } from "./converters.js"
import {
  DuplicateRuleError,
  MethodNotAllowedError,
  NotFoundError,
  RequestRedirectError,
  RuleBindingError,
  ValidationError,
  WebsocketMismatchError,
} from "./errors.js"
import { INVALID_SUBDOMAIN, UrlMap } from "./map.js"
import { Rule, type RuleFactory } from "./rule.js"

function createMap(): UrlMap {
  return new UrlMap([
    new Rule("/", { endpoint: "index" }),
    new Rule("/foo", { endpoint: "foo", methods: ["GET"] }),
    new Rule("/bar/", { endpoint: "bar" }),
    new Rule("/users/<int:id>", { endpoint: "user" }),
    new Rule("/users/<name>", { endpoint: "userByName" }),
    new Rule("/files/<path:file>", { endpoint: "file" }),
    new Rule("/submit", { endpoint: "submit", methods: ["POST"] }),
  ])
}

describe("Matching requests against a map", () => {
  const adapter = createMap().bind("example.org")

  it("Should match static and dynamic rules", () => {
    expect(adapter.match("/")).toMatchObject({
      type: "matched",
      endpoint: "index",
      values: {},
    })
    expect(adapter.match("/users/42")).toMatchObject({
      endpoint: "user",
      values: { id: 42 },
    })
    expect(adapter.match("/users/bob")).toMatchObject({
      endpoint: "userByName",
      values: { name: "bob" },
    })
    expect(adapter.match("/files/a/b.txt")).toMatchObject({
      endpoint: "file",
      values: { file: "a/b.txt" },
    })
  })

  it("Should accept HEAD wherever GET is accepted", () => {
    expect(adapter.match("/foo", "head")).toMatchObject({ endpoint: "foo" })
  })

  it("Should redirect between the slash and no slash forms", () => {
    expect(adapter.match("/foo/")).toEqual({
      type: "redirect",
      newUrl: "http://example.org/foo",
      code: 308,
    })
    expect(adapter.match("/bar")).toEqual({
      type: "redirect",
      newUrl: "http://example.org/bar/",
      code: 308,
    })
    expect(adapter.match("/bar", "POST")).toEqual({ type: "notFound" })
  })

  it("Should redirect the empty path to the root", () => {
    expect(adapter.match("")).toEqual({
      type: "redirect",
      newUrl: "http://example.org/",
      code: 308,
    })
  })

  it("Should redirect repeated slashes", () => {
    expect(adapter.match("//foo")).toEqual({
      type: "redirect",
      newUrl: "http://example.org/foo",
      code: 308,
    })
    expect(adapter.match("//bar")).toEqual({
      type: "redirect",
      newUrl: "http://example.org/bar/",
      code: 308,
    })
  })

  it("Should keep the query on redirects", () => {
    const bound = createMap().bind("example.org", { queryArgs: { q: "x y" } })

    expect(bound.match("/foo/")).toMatchObject({
      newUrl: "http://example.org/foo?q=x+y",
    })
    expect(bound.match("/foo/", "GET", { queryArgs: "a=1" })).toMatchObject({
      newUrl: "http://example.org/foo?a=1",
    })
  })

  it("Should report misses", () => {
    expect(adapter.match("/submit")).toEqual({
      type: "methodNotAllowed",
      allowedMethods: ["POST"],
    })
    expect(adapter.match("/missing")).toEqual({ type: "notFound" })
    expect(adapter.allowedMethods("/submit")).toEqual(["POST"])
    expect(adapter.allowedMethods("/bar/")).toEqual([])
    expect(adapter.test("/foo")).toBeTruthy()
    expect(adapter.test("/foo/")).toBeTruthy()
    expect(adapter.test("/missing")).toBeFalsy()
  })

  it("Should raise the outcome as an error on request", () => {
    expect(adapter.requireMatch(adapter.match("/users/1")).values).toEqual({
      id: 1,
    })
    expect(() => adapter.requireMatch(adapter.match("/missing"))).toThrow(
      NotFoundError,
    )
    expect(() => adapter.requireMatch(adapter.match("/foo/"))).toThrow(
      RequestRedirectError,
    )

    let error: unknown
    try {
      adapter.requireMatch(adapter.match("/submit"))
    } catch (err) {
      error = err
    }

    expect(error).toBeInstanceOf(MethodNotAllowedError)
    expect(error).toMatchObject({ code: 405, allowedMethods: ["POST"] })
  })

  it("Should not redirect when slashes are not strict", () => {
    const bound = new UrlMap([new Rule("/bar/", { endpoint: "bar" })], {
      strictSlashes: false,
    }).bind("example.org")

    expect(bound.match("/bar")).toMatchObject({ endpoint: "bar" })
    expect(bound.match("/bar/")).toMatchObject({ endpoint: "bar" })
  })
})

describe("Redirect rules", () => {
  const map = new UrlMap([
    new Rule("/page/", { endpoint: "page", defaults: { n: 1 } }),
    new Rule("/page/<int:n>", { endpoint: "page" }),
    new Rule("/users/<int:id>", { endpoint: "user" }),
    new Rule("/u/<int:id>", { endpoint: "user", alias: true }),
    new Rule("/old/<int:id>", { endpoint: "old", redirectTo: "/new/<id>" }),
    new Rule("/moved", { endpoint: "moved", redirectTo: "moved-here" }),
    new Rule("/away/<int:id>", {
      endpoint: "away",
      redirectTo: (_adapter, values) =>
        `https://elsewhere.test/items/${String(values.id)}`,
    }),
  ])
  const adapter = map.bind("example.org", { scriptName: "/app" })

  it("Should redirect to the rule providing the values as defaults", () => {
    expect(adapter.match("/page/1")).toEqual({
      type: "redirect",
      newUrl: "http://example.org/app/page/",
      code: 308,
    })
    expect(adapter.match("/page/2")).toMatchObject({
      endpoint: "page",
      values: { n: 2 },
    })
    expect(adapter.match("/page/")).toMatchObject({
      endpoint: "page",
      values: { n: 1 },
    })
  })

  it("Should not redirect defaults when disabled", () => {
    const bound = new UrlMap(
      [
        new Rule("/page/", { endpoint: "page", defaults: { n: 1 } }),
        new Rule("/page/<int:n>", { endpoint: "page" }),
      ],
      { redirectDefaults: false },
    ).bind("example.org")

    expect(bound.match("/page/1")).toMatchObject({
      endpoint: "page",
      values: { n: 1 },
    })
  })

  it("Should redirect aliases to the canonical rule", () => {
    expect(adapter.match("/u/3")).toEqual({
      type: "redirect",
      newUrl: "http://example.org/app/users/3",
      code: 308,
    })
  })

  it("Should redirect to templates and computed targets", () => {
    expect(adapter.match("/old/5")).toMatchObject({
      newUrl: "http://example.org/new/5",
    })
    expect(adapter.match("/moved")).toMatchObject({
      newUrl: "http://example.org/app/moved-here",
    })
    expect(adapter.match("/away/7")).toMatchObject({
      newUrl: "https://elsewhere.test/items/7",
    })
  })
})

describe("Domain matching", () => {
  it("Should match subdomains", () => {
    const map = new UrlMap(
      [
        new Rule("/", { endpoint: "index" }),
        new Rule("/", { endpoint: "api", subdomain: "api" }),
        new Rule("/", { endpoint: "profile", subdomain: "<user>" }),
      ],
      { subdomainMatching: true },
    )

    expect(map.bind("example.org").match("/")).toMatchObject({
      endpoint: "index",
    })
    expect(map.bind("example.org", { subdomain: "api" }).match("/")).toMatchObject(
      { endpoint: "api" },
    )
    expect(
      map.bind("example.org", { subdomain: "alice" }).match("/"),
    ).toMatchObject({ endpoint: "profile", values: { user: "alice" } })
    expect(
      map
        .bindToRequest({ host: "API.example.org:80" }, "example.org")
        .match("/"),
    ).toMatchObject({ endpoint: "api" })
  })

  it("Should log requests outside the server name", () => {
    const writer = new MemoryLogWriter()
    const map = new UrlMap([new Rule("/", { endpoint: "index" })], {
      subdomainMatching: true,
      logger: new DefaultLogger({ level: LogLevel.WARN, writer }),
    })

    const adapter = map.bindToRequest({ host: "other.test" }, "example.org")

    expect(adapter.subdomain).toBe(INVALID_SUBDOMAIN)
    expect(adapter.match("/")).toEqual({ type: "notFound" })
    expect(writer.entries.map((e) => e.message)).toEqual([
      "Current server name 'other.test' doesn't match configured server name 'example.org'",
    ])
  })

  it("Should match hosts", () => {
    const map = new UrlMap(
      [
        new Rule("/", { endpoint: "a", host: "a.example.org" }),
        new Rule("/", { endpoint: "b", host: "<name>.example.com" }),
      ],
      { hostMatching: true },
    )

    expect(map.bind("a.example.org").match("/")).toMatchObject({
      endpoint: "a",
    })
    expect(map.bind("x.example.com").match("/")).toMatchObject({
      endpoint: "b",
      values: { name: "x" },
    })
    expect(map.bind("c.example.net").match("/")).toEqual({ type: "notFound" })
    expect(() => map.bind("a.example.org", { subdomain: "x" })).toThrow(
      RuleBindingError,
    )
  })

  it("Should reject conflicting domain settings", () => {
    expect(
      () => new UrlMap([], { hostMatching: true, subdomainMatching: true }),
    ).toThrow(RuleBindingError)
    expect(
      () => new UrlMap([new Rule("/", { endpoint: "x", subdomain: "api" })]),
    ).toThrow(RuleBindingError)
  })

  it("Should encode international server names", () => {
    expect(new UrlMap().bind("Bücher.example").serverName).toBe(
      "xn--bcher-kva.example",
    )
  })
})

describe("Websocket rules", () => {
  const map = new UrlMap([new Rule("/ws", { endpoint: "ws", websocket: true })])

  it("Should only match websocket requests", () => {
    const adapter = map.bind("example.org")

    expect(adapter.match("/ws")).toEqual({ type: "websocketMismatch" })
    expect(() => adapter.requireMatch(adapter.match("/ws"))).toThrow(
      WebsocketMismatchError,
    )
    expect(adapter.match("/ws", "GET", { websocket: true })).toMatchObject({
      endpoint: "ws",
    })
    expect(
      map.bind("example.org", { urlScheme: "wss" }).match("/ws"),
    ).toMatchObject({ endpoint: "ws" })
    expect(
      map
        .bindToRequest({ host: "example.org", scheme: "https", websocket: true })
        .match("/ws"),
    ).toMatchObject({ endpoint: "ws" })
  })
})

describe("Managing the rules of a map", () => {
  it("Should reject duplicate rules", () => {
    expect(
      () =>
        new UrlMap([
          new Rule("/x/<int:a>", { endpoint: "one" }),
          new Rule("/x/<int:b>", { endpoint: "two" }),
        ]),
    ).toThrow(
      new DuplicateRuleError(
        new Rule("/x/<int:b>", { endpoint: "two" }),
        new Rule("/x/<int:a>", { endpoint: "one" }),
      ).message,
    )
  })

  it("Should reject rules that only differ by how the converter is named", () => {
    expect(
      () =>
        new UrlMap([
          new Rule("/x/<a>", { endpoint: "one" }),
          new Rule("/x/<string:b>", { endpoint: "two" }),
        ]),
    ).toThrow(DuplicateRuleError)
    expect(
      () =>
        new UrlMap([
          new Rule("/x/<int:a>", { endpoint: "one" }),
          new Rule("/x/<int(max=9):b>", { endpoint: "two" }),
        ]),
    ).not.toThrow()
  })

  it("Should allow rules that differ by method or are build only", () => {
    const map = new UrlMap([
      new Rule("/x", { endpoint: "read", methods: ["GET"] }),
      new Rule("/x", { endpoint: "write", methods: ["POST"] }),
      new Rule("/x", { endpoint: "link", buildOnly: true }),
    ])
    const adapter = map.bind("example.org")

    expect(map.rules).toHaveLength(3)
    expect(adapter.match("/x", "POST")).toMatchObject({ endpoint: "write" })
    expect(adapter.match("/x", "GET")).toMatchObject({ endpoint: "read" })
    expect(adapter.match("/x", "DELETE")).toEqual({
      type: "methodNotAllowed",
      allowedMethods: ["GET", "HEAD", "POST"],
    })
  })

  it("Should keep rules added before a failing one", () => {
    const map = new UrlMap([new Rule("/a", { endpoint: "a" })])

    expect(() =>
      map.add({
        *getRules() {
          yield new Rule("/b", { endpoint: "b" })
          yield new Rule("/a", { endpoint: "again" })
        },
      }),
    ).toThrow(DuplicateRuleError)
    expect(map.rules.map((rule) => rule.endpoint)).toEqual(["a", "b"])
    expect(map.bind("example.org").match("/b")).toMatchObject({
      endpoint: "b",
    })
  })

  it("Should reject rules bound to another map", () => {
    const rule = new Rule("/a", { endpoint: "a" })
    new UrlMap([rule])

    expect(() => new UrlMap([rule])).toThrow(RuleBindingError)
  })

  it("Should reject changes while adding", () => {
    const map = new UrlMap()
    const reentrant: RuleFactory = {
      *getRules() {
        map.add(new Rule("/b", { endpoint: "b" }))
        yield new Rule("/a", { endpoint: "a" })
      },
    }

    expect(() => map.add(reentrant)).toThrow(
      "the map is already being modified",
    )
  })

  it("Should answer questions about endpoints", () => {
    const map = createMap()

    expect(map.isEndpointExpectingArgument("user", "id")).toBeTruthy()
    expect(map.isEndpointExpectingArgument("user", "name")).toBeFalsy()
    expect(map.isEndpointExpectingArgument("unknown", "id")).toBeFalsy()
    expect([...map.iterRules("file")].map((rule) => rule.path)).toEqual([
      "/files/<path:file>",
    ])
  })

  it("Should rebuild the matcher only when rules change", () => {
    const map = createMap()
    const first = map.getSnapshot()

    expect(map.getSnapshot()).toBe(first)

    map.add(new Rule("/later", { endpoint: "later" }))
    expect(map.getSnapshot()).not.toBe(first)
    expect(map.bind("example.org").match("/later")).toMatchObject({
      endpoint: "later",
    })

    const current = map.getSnapshot()
    map.update()
    expect(map.getSnapshot()).not.toBe(current)
  })

  it("Should log registrations and rejections", () => {
    const writer = new MemoryLogWriter()
    const map = new UrlMap([], {
      logger: new DefaultLogger({ level: LogLevel.DEBUG, writer }),
    })

    map.add(new Rule("/", { endpoint: "index" }))
    expect(() => map.add(new Rule("/<nope:x>", { endpoint: "bad" }))).toThrow()

    expect(writer.entries.map((e) => [e.level, e.message])).toEqual([
      [LogLevel.DEBUG, "Registered <Rule '/' -> index>"],
      [LogLevel.WARN, "Rejected <Rule '/<nope:x>' -> bad>"],
    ])
    expect(writer.entries[1].context).toEqual({
      error: "the converter 'nope' does not exist: '/<nope:x>'",
    })
  })
})

describe("Repeated slashes", () => {
  it("Should merge slashes for rules that ask for it", () => {
    const adapter = new UrlMap(
      [new Rule("/a/b", { endpoint: "ab", mergeSlashes: true })],
      { mergeSlashes: false },
    ).bind("example.org")

    expect(adapter.match("//a///b")).toEqual({
      type: "redirect",
      newUrl: "http://example.org/a/b",
      code: 308,
    })
  })

  it("Should keep repeated slashes when merging is off", () => {
    const map = new UrlMap(
      [
        new Rule("/a", { endpoint: "single" }),
        new Rule("//a", { endpoint: "double" }),
      ],
      { mergeSlashes: false },
    )
    const adapter = map.bind("example.org")

    expect(adapter.match("/a")).toMatchObject({ endpoint: "single" })
    expect(adapter.match("//a")).toMatchObject({
      type: "matched",
      endpoint: "double",
    })
    expect(
      new UrlMap([new Rule("/a", { endpoint: "single" })], {
        mergeSlashes: false,
      })
        .bind("example.org")
        .match("//a"),
    ).toEqual({ type: "notFound" })
  })

  it("Should prefer an exact match over merging", () => {
    const adapter = new UrlMap([
      new Rule("/a", { endpoint: "single" }),
      new Rule("//a", { endpoint: "double", mergeSlashes: false }),
    ]).bind("example.org")

    expect(adapter.match("//a")).toMatchObject({
      type: "matched",
      endpoint: "double",
    })
    expect(adapter.match("///a")).toEqual({
      type: "redirect",
      newUrl: "http://example.org/a",
      code: 308,
    })
  })

  it("Should build rules that start with repeated slashes", () => {
    const map = new UrlMap(
      [
        new Rule("/a", { endpoint: "single" }),
        new Rule("//a", { endpoint: "double" }),
      ],
      { mergeSlashes: false },
    )

    expect(map.bind("example.org").build("double")).toBe("//a")
    expect(map.bind("example.org", { scriptName: "/app" }).build("double")).toBe(
      "/app//a",
    )
    expect(
      map.bind("example.org").build("double", {}, { forceExternal: true }),
    ).toBe("http://example.org//a")
  })
})

describe("Large integers", () => {
  const adapter = new UrlMap([new Rule("/n/<int:n>", { endpoint: "n" })]).bind(
    "example.org",
  )

  it("Should round trip the largest safe integer", () => {
    const outcome = adapter.match("/n/9007199254740991")

    expect(outcome).toMatchObject({ values: { n: 9007199254740991 } })
    expect(adapter.build("n", { n: 9007199254740991 })).toBe(
      "/n/9007199254740991",
    )
  })

  it("Should not match integers that cannot be represented", () => {
    expect(adapter.match("/n/9007199254740993")).toEqual({ type: "notFound" })
  })
})

describe("Custom converters", () => {
  // Lower case words, "v" is rejected and "e" fails
  const createWordConverter: ConverterFactory = () => ({
    regex: "[a-z]+",
    partIsolating: true,
    weight: 10,
    toValue(text: string): string {
      if (text === "e") {
        throw new TypeError("the word converter failed")
      }
      if (text === "v") {
        throw new ValidationError("v is not a word")
      }
      return text.toUpperCase()
    },
    toUrl(value: unknown): string {
      if (value === "skip") {
        throw new ValidationError("skip cannot be built")
      }
      return String(value).toLowerCase()
    },
  })

  const map = new UrlMap(
    [
      new Rule("/c/<word:x>", { endpoint: "word" }),
      new Rule("/c/<y>", { endpoint: "fallback" }),
      new Rule("/d/<word:x>", { endpoint: "pick" }),
      new Rule("/d/other/<x>", { endpoint: "pick" }),
    ],
    { converters: { word: createWordConverter } },
  )
  const adapter = map.bind("example.org")

  it("Should match with registered converters", () => {
    expect(adapter.match("/c/ok")).toMatchObject({
      endpoint: "word",
      values: { x: "OK" },
    })
  })

  it("Should try the next rule when the converter rejects the text", () => {
    expect(adapter.match("/c/v")).toMatchObject({
      endpoint: "fallback",
      values: { y: "v" },
    })
  })

  it("Should raise other converter errors", () => {
    expect(() => adapter.match("/c/e")).toThrow(TypeError)
  })

  it("Should skip rules whose converter cannot build the value", () => {
    expect(adapter.build("pick", { x: "AB" })).toBe("/d/ab")
    expect(adapter.build("pick", { x: "skip" })).toBe("/d/other/skip")
  })
})
