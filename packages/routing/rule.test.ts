import { DEFAULT_CONVERTERS } from "./converters.js"
import { RuleBindingError, RuleSyntaxError } from "./errors.js"
import {
  Rule,
  compareWeighting,
  compileRule,
  type RuleBindingContext,
} from "./rule.js"

const CONTEXT: RuleBindingContext = {
  converters: DEFAULT_CONVERTERS,
  strictSlashes: true,
  mergeSlashes: true,
  hostMatching: false,
  subdomainMatching: false,
  defaultSubdomain: "",
}

function bound(rule: Rule, id: number = 0): Rule {
  rule.bind(compileRule(rule, CONTEXT), id)
  return rule
}

describe("Rules should validate their options", () => {
  it("Should require a leading slash", () => {
    expect(() => new Rule("foo", { endpoint: "foo" })).toThrow(
      "urls must start with a leading slash: 'foo'",
    )
  })

  it("Should normalize methods", () => {
    const rule = new Rule("/", { endpoint: "index", methods: ["get", "post"] })

    expect([...(rule.methods ?? [])].sort()).toEqual(["GET", "HEAD", "POST"])
    expect(new Rule("/", { endpoint: "index", methods: [] }).methods).toBeUndefined()
    expect(() => new Rule("/", { endpoint: "index", methods: "GET" })).toThrow(
      TypeError,
    )
  })

  it("Should restrict websocket methods", () => {
    const rule = new Rule("/ws", { endpoint: "ws", websocket: true })

    expect([...(rule.methods ?? [])].sort()).toEqual(["GET", "HEAD", "OPTIONS"])
    expect(
      () =>
        new Rule("/ws", { endpoint: "ws", websocket: true, methods: ["POST"] }),
    ).toThrow(RuleSyntaxError)
  })

  it("Should collect the arguments of every template and the defaults", () => {
    const rule = new Rule("/<a>/<int:b>", {
      endpoint: "x",
      defaults: { c: 1 },
    })

    expect([...rule.arguments].sort()).toEqual(["a", "b", "c"])
    expect(rule.isLeaf).toBeTruthy()
    expect(new Rule("/a/", { endpoint: "a" }).isBranch).toBeTruthy()
    expect(rule.toString()).toBe("<Rule '/<a>/<int:b>' -> x>")
  })

  it("Should only be usable once bound", () => {
    const rule = new Rule("/", { endpoint: "index" })

    expect(rule.isBound).toBeFalsy()
    expect(() => rule.id).toThrow(RuleBindingError)

    bound(rule, 3)
    expect(rule.id).toBe(3)
    expect(() => bound(rule)).toThrow(RuleBindingError)
    expect(rule.clone().isBound).toBeFalsy()
  })
})

describe("Rules should compile against the map settings", () => {
  it("Should split the path into parts", () => {
    const compiled = compileRule(
      new Rule("/users/<int:id>", { endpoint: "user" }),
      CONTEXT,
    )

    expect(compiled.parts.map((part) => part.content)).toEqual([
      "",
      "",
      "users",
      "(?<__c0>\\d+)",
    ])
    expect(compiled.domainOperations).toEqual([])
    expect(compiled.pathOperations).toEqual([
      { type: "literal", text: "/users/" },
      { type: "variable", name: "id" },
    ])
    expect(compiled.signature).toBe("|/users/<\\d+:50()>")
  })

  it("Should describe converters by what they accept", () => {
    const implicit = compileRule(new Rule("/<a>", { endpoint: "a" }), CONTEXT)
    const explicit = compileRule(
      new Rule("/<string:b>", { endpoint: "b" }),
      CONTEXT,
    )

    expect(implicit.signature).toBe(explicit.signature)
    expect(implicit.signature).toBe("|/<[^/]{1,}:100()>")
  })

  it("Should ignore variable names in the signature", () => {
    const left = compileRule(new Rule("/<int:a>", { endpoint: "a" }), CONTEXT)
    const right = compileRule(new Rule("/<int:b>", { endpoint: "b" }), CONTEXT)
    const other = compileRule(
      new Rule("/<int(fixedDigits=2):b>", { endpoint: "b" }),
      CONTEXT,
    )

    expect(left.signature).toBe(right.signature)
    expect(other.signature).toBe("|/<\\d+:50(fixedDigits=2)>")
  })

  it("Should fold defaults into literals", () => {
    const compiled = compileRule(
      new Rule("/page/<int:page>", { endpoint: "page", defaults: { page: 1 } }),
      CONTEXT,
    )

    expect(compiled.pathOperations).toEqual([{ type: "literal", text: "/page/1" }])
  })

  it("Should keep the optional trailing slash of a path converter", () => {
    const { parts } = compileRule(
      new Rule("/<path:p>/", { endpoint: "p" }),
      CONTEXT,
    )

    expect(parts).toHaveLength(4)
    expect(parts[2]).toMatchObject({
      static: false,
      content: "(?<__c0>[^/].*?)(?<!/)(/?)",
      final: true,
      suffixed: true,
      groups: 1,
    })
    expect(parts[3]).toMatchObject({ static: true, content: "" })
  })

  it("Should merge repeated slashes", () => {
    const compiled = compileRule(new Rule("//a//b", { endpoint: "ab" }), CONTEXT)

    expect(compiled.pathOperations).toEqual([{ type: "literal", text: "/a/b" }])
    expect(compiled.mergeSlashes).toBeTruthy()
    expect(compiled.strictSlashes).toBeTruthy()
  })

  it("Should report template problems", () => {
    expect(() =>
      compileRule(new Rule("/<foo:x>", { endpoint: "x" }), CONTEXT),
    ).toThrow("the converter 'foo' does not exist: '/<foo:x>'")
    expect(() =>
      compileRule(new Rule("/<a>/<a>", { endpoint: "x" }), CONTEXT),
    ).toThrow("variable name 'a' used more than once: '/<a>/<a>'")
    expect(() =>
      compileRule(new Rule("/<int(bad=1):x>", { endpoint: "x" }), CONTEXT),
    ).toThrow(
      "converter 'int' rejected its arguments (int() got an unexpected argument 'bad'): '/<int(bad=1):x>'",
    )
    expect(() =>
      compileRule(
        new Rule("/<int:n>", { endpoint: "x", defaults: { n: "abc" } }),
        CONTEXT,
      ),
    ).toThrow(
      "the default for 'n' cannot be converted (abc cannot be used as a number): '/<int:n>'",
    )
  })

  it("Should reject domains the map does not match on", () => {
    expect(() =>
      compileRule(new Rule("/", { endpoint: "x", host: "a.test" }), CONTEXT),
    ).toThrow(RuleBindingError)
    expect(() =>
      compileRule(new Rule("/", { endpoint: "x", subdomain: "api" }), {
        ...CONTEXT,
        hostMatching: true,
      }),
    ).toThrow(RuleBindingError)
  })

  it("Should order static parts before converters", () => {
    const staticPart = compileRule(new Rule("/a", { endpoint: "a" }), CONTEXT)
      .parts[2]
    const intPart = compileRule(new Rule("/<int:a>", { endpoint: "a" }), CONTEXT)
      .parts[2]
    const stringPart = compileRule(new Rule("/<a>", { endpoint: "a" }), CONTEXT)
      .parts[2]

    expect(compareWeighting(intPart.weight, stringPart.weight)).toBeLessThan(0)
    expect(compareWeighting(staticPart.weight, intPart.weight)).toBeLessThan(0)
  })
})

describe("Bound rules should convert and build values", () => {
  it("Should convert captured text and merge defaults", () => {
    const rule = bound(
      new Rule("/<int(fixedDigits=2):n>", {
        endpoint: "n",
        defaults: { extra: true },
      }),
    )

    expect(rule.convert(["07"])).toEqual({ n: 7, extra: true })
    expect(rule.convert(["123"])).toBeUndefined()
  })

  it("Should build the path and append unknown values", () => {
    const rule = bound(new Rule("/users/<int:id>", { endpoint: "user" }))

    expect(
      rule.build(
        new Map<string, unknown[]>([
          ["id", [42]],
          ["q", ["a b"]],
        ]),
        { appendUnknown: true },
      ),
    ).toEqual({ domain: "", path: "/users/42?q=a+b" })
    expect(
      rule.build(new Map([["id", [42]]]), { appendUnknown: false }),
    ).toEqual({ domain: "", path: "/users/42" })
    expect(
      rule.build(new Map([["id", ["x"]]]), { appendUnknown: true }),
    ).toBeUndefined()
  })

  it("Should check if the values are suitable", () => {
    const rule = new Rule("/<a>", { endpoint: "a", defaults: { b: "x" } })
    const post = new Rule("/<a>", { endpoint: "a", methods: ["POST"] })

    expect(rule.suitableFor(new Map([["a", ["1"]]]))).toBeTruthy()
    expect(
      rule.suitableFor(
        new Map([
          ["a", ["1"]],
          ["b", ["y"]],
        ]),
      ),
    ).toBeFalsy()
    expect(rule.suitableFor(new Map([["b", ["x"]]]))).toBeFalsy()
    expect(post.suitableFor(new Map([["a", ["1"]]]), "GET")).toBeFalsy()
  })

  it("Should detect rules providing defaults for each other", () => {
    const withDefault = new Rule("/page/", {
      endpoint: "page",
      defaults: { n: 1 },
    })
    const withValue = new Rule("/page/<int:n>", { endpoint: "page" })

    expect(withDefault.providesDefaultsFor(withValue)).toBeTruthy()
    expect(withValue.providesDefaultsFor(withDefault)).toBeFalsy()
    expect(withDefault.providesDefaultsFor(withDefault)).toBeFalsy()
  })
})
