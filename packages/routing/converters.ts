/**
 * Converters translate between the text captured from a URL and the values
 * handed to the application
 */

import type { Optional } from "@urlmap/core/type/utils.js"
import { ValidationError } from "./errors.js"
import { PATH_SAFE, quote } from "./urls.js"

/**
 * A literal accepted in a converter argument list
 */
export type ConverterArgument = string | number | boolean | null

export type ConverterKeywords = Readonly<Record<string, ConverterArgument>>

/**
 * Describes how a placeholder is matched and converted
 */
export interface Converter<T = unknown> {
  /** Regular expression source for the text this converter accepts */
  readonly regex: string

  /** False when the regex may span `/` characters */
  readonly partIsolating: boolean

  /** Relative priority, lower weights are tried first */
  readonly weight: number

  /**
   * Convert the captured text
   *
   * @throws {@link ValidationError} to reject the text so matching continues
   * with the next rule
   */
  toValue(text: string): T

  /**
   * Convert a value into its URL representation
   *
   * @throws {@link ValidationError} when the value cannot be represented, the
   * rule is then skipped while building
   */
  toUrl(value: unknown): string
}

/**
 * Information about the placeholder a converter is created for
 */
export interface ConverterContext {
  /** The template of the rule being compiled */
  readonly template: string
  /** The variable name of the placeholder */
  readonly variable: string
}

/**
 * Creates a converter from the arguments given in the rule template
 */
export type ConverterFactory = (
  context: ConverterContext,
  args: readonly ConverterArgument[],
  kwargs: ConverterKeywords,
) => Converter

export interface StringConverterOptions {
  minLength?: number
  maxLength?: number
  length?: number
}

/**
 * Accepts a single path segment, optionally restricted in length
 */
export class StringConverter implements Converter<string> {
  readonly regex: string
  readonly partIsolating = true
  readonly weight = 100

  constructor(options: StringConverterOptions = {}) {
    if (options.length !== undefined) {
      this.regex = `[^/]{${options.length}}`
    } else {
      this.regex = `[^/]{${options.minLength ?? 1},${options.maxLength ?? ""}}`
    }
  }

  toValue(text: string): string {
    return text
  }

  toUrl(value: unknown): string {
    return quote(String(value), PATH_SAFE)
  }
}

/**
 * Accepts the rest of the path including slashes
 */
export class PathConverter implements Converter<string> {
  readonly regex = "[^/].*?"
  readonly partIsolating = false
  readonly weight = 200

  toValue(text: string): string {
    return text
  }

  toUrl(value: unknown): string {
    return quote(String(value), PATH_SAFE)
  }
}

/**
 * Accepts exactly one of a fixed list of segments
 */
export class AnyConverter implements Converter<string> {
  readonly regex: string
  readonly partIsolating = true
  readonly weight = 100
  readonly items: readonly string[]

  constructor(items: readonly string[]) {
    if (items.length === 0) {
      throw new TypeError("any() requires at least one item")
    }

    this.items = items
    this.regex = `(?:${items.map(escapeRegExp).join("|")})`
  }

  toValue(text: string): string {
    return text
  }

  toUrl(value: unknown): string {
    const text = String(value)
    if (!this.items.includes(text)) {
      throw new ValidationError(
        `'${text}' is not one of ${this.items.map((i) => `'${i}'`).join(", ")}`,
      )
    }

    return quote(text, PATH_SAFE)
  }
}

export interface NumberConverterOptions {
  fixedDigits?: number
  min?: number
  max?: number
  signed?: boolean
}

/**
 * Shared range, padding and sign handling for the numeric converters
 */
abstract class NumberConverter implements Converter<number> {
  readonly partIsolating = true
  readonly weight = 50
  abstract readonly regex: string

  constructor(protected readonly options: NumberConverterOptions) {}

  protected abstract parse(text: string): number
  protected abstract format(value: number): Optional<string>

  toValue(text: string): number {
    const { fixedDigits, min, max } = this.options
    const digits = text.replace(/^-/, "")
    if (fixedDigits !== undefined && digits.length !== fixedDigits) {
      throw new ValidationError(`expected ${fixedDigits} digits`)
    }

    const value = this.parse(text)
    if (
      (min !== undefined && value < min) ||
      (max !== undefined && value > max)
    ) {
      throw new ValidationError(`${value} is out of range`)
    }

    return value
  }

  toUrl(value: unknown): string {
    const number =
      typeof value === "number"
        ? value
        : typeof value === "bigint" ||
            (typeof value === "string" && value.trim().length > 0)
          ? Number(value)
          : Number.NaN

    if (!Number.isFinite(number) || (!this.options.signed && number < 0)) {
      throw new ValidationError(`${String(value)} cannot be used as a number`)
    }

    const text = this.format(number)
    if (text === undefined) {
      throw new ValidationError(`${String(value)} cannot be formatted`)
    }

    const { fixedDigits } = this.options
    if (fixedDigits === undefined) {
      return text
    }

    return number < 0
      ? `-${text.slice(1).padStart(fixedDigits, "0")}`
      : text.padStart(fixedDigits, "0")
  }
}

/**
 * Accepts whole numbers, optionally signed, padded or limited to a range
 */
export class IntegerConverter extends NumberConverter {
  readonly regex: string

  constructor(options: NumberConverterOptions = {}) {
    super(options)
    this.regex = options.signed ? "-?\\d+" : "\\d+"
  }

  protected parse(text: string): number {
    const value = Number.parseInt(text, 10)
    if (!Number.isSafeInteger(value)) {
      throw new ValidationError(`${text} is not a safe integer`)
    }

    return value
  }

  protected format(value: number): Optional<string> {
    return Number.isSafeInteger(value) ? value.toFixed(0) : undefined
  }
}

/**
 * Accepts decimal numbers that always carry a fractional part
 */
export class FloatConverter extends NumberConverter {
  readonly regex: string

  constructor(options: Omit<NumberConverterOptions, "fixedDigits"> = {}) {
    super(options)
    this.regex = options.signed ? "-?\\d+\\.\\d+" : "\\d+\\.\\d+"
  }

  protected parse(text: string): number {
    return Number.parseFloat(text)
  }

  protected format(value: number): Optional<string> {
    const text = Number.isInteger(value) ? value.toFixed(1) : String(value)
    return /^-?\d+\.\d+$/.test(text) ? text : undefined
  }
}

const UUID_REGEX =
  "[A-Fa-f0-9]{8}-[A-Fa-f0-9]{4}-[A-Fa-f0-9]{4}-[A-Fa-f0-9]{4}-[A-Fa-f0-9]{12}"

/**
 * Accepts a UUID in its canonical hyphenated form, values are lower cased
 */
export class UuidConverter implements Converter<string> {
  readonly regex = UUID_REGEX
  readonly partIsolating = true
  readonly weight = 100

  toValue(text: string): string {
    return text.toLowerCase()
  }

  toUrl(value: unknown): string {
    const text = String(value).toLowerCase()
    if (!new RegExp(`^${UUID_REGEX}$`).test(text)) {
      throw new ValidationError(`'${text}' is not a UUID`)
    }

    return text
  }
}

/**
 * Escape text so it matches literally inside a regular expression
 */
export function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, "\\$&")
}

/**
 * Assign positional arguments to their names and reject anything unexpected
 *
 * @param converter The converter name for error messages
 * @param names The accepted argument names in positional order
 * @param args The positional arguments
 * @param kwargs The keyword arguments
 * @returns The arguments keyed by name
 */
export function bindConverterArguments(
  converter: string,
  names: readonly string[],
  args: readonly ConverterArgument[],
  kwargs: ConverterKeywords,
): Map<string, ConverterArgument> {
  if (args.length > names.length) {
    throw new TypeError(
      `${converter}() takes at most ${names.length} positional arguments`,
    )
  }

  const bound = new Map<string, ConverterArgument>()
  args.forEach((value, index) => bound.set(names[index], value))

  for (const [name, value] of Object.entries(kwargs)) {
    if (!names.includes(name)) {
      throw new TypeError(`${converter}() got an unexpected argument '${name}'`)
    }

    if (bound.has(name)) {
      throw new TypeError(`${converter}() got multiple values for '${name}'`)
    }

    bound.set(name, value)
  }

  return bound
}

function integerArgument(
  bound: ReadonlyMap<string, ConverterArgument>,
  name: string,
): Optional<number> {
  const value = bound.get(name)
  if (value === undefined || value === null) {
    return
  }

  if (typeof value !== "number" || !Number.isInteger(value) || value < 0) {
    throw new TypeError(`${name} must be a non negative integer`)
  }

  return value
}

function numberArgument(
  bound: ReadonlyMap<string, ConverterArgument>,
  name: string,
): Optional<number> {
  const value = bound.get(name)
  if (value === undefined || value === null) {
    return
  }

  if (typeof value !== "number") {
    throw new TypeError(`${name} must be a number`)
  }

  return value
}

function booleanArgument(
  bound: ReadonlyMap<string, ConverterArgument>,
  name: string,
): boolean {
  const value = bound.get(name) ?? false
  if (typeof value !== "boolean") {
    throw new TypeError(`${name} must be True or False`)
  }

  return value
}

const createStringConverter: ConverterFactory = (_context, args, kwargs) => {
  const bound = bindConverterArguments(
    "string",
    ["minLength", "maxLength", "length"],
    args,
    kwargs,
  )

  return new StringConverter({
    minLength: integerArgument(bound, "minLength"),
    maxLength: integerArgument(bound, "maxLength"),
    length: integerArgument(bound, "length"),
  })
}

const createNumberOptions = (
  converter: string,
  names: readonly string[],
  args: readonly ConverterArgument[],
  kwargs: ConverterKeywords,
): NumberConverterOptions => {
  const bound = bindConverterArguments(converter, names, args, kwargs)
  return {
    fixedDigits: integerArgument(bound, "fixedDigits"),
    min: numberArgument(bound, "min"),
    max: numberArgument(bound, "max"),
    signed: booleanArgument(bound, "signed"),
  }
}

/**
 * The converters every map knows about, keyed by the name used in templates
 */
export const DEFAULT_CONVERTERS: ReadonlyMap<string, ConverterFactory> =
  new Map<string, ConverterFactory>([
    ["default", createStringConverter],
    ["string", createStringConverter],
    [
      "any",
      (_context, args, kwargs) => {
        if (Object.keys(kwargs).length > 0) {
          throw new TypeError("any() only takes positional items")
        }

        return new AnyConverter(args.map((item) => String(item)))
      },
    ],
    [
      "path",
      (_context, args, kwargs) => {
        bindConverterArguments("path", [], args, kwargs)
        return new PathConverter()
      },
    ],
    [
      "int",
      (_context, args, kwargs) =>
        new IntegerConverter(
          createNumberOptions(
            "int",
            ["fixedDigits", "min", "max", "signed"],
            args,
            kwargs,
          ),
        ),
    ],
    [
      "float",
      (_context, args, kwargs) =>
        new FloatConverter(
          createNumberOptions("float", ["min", "max", "signed"], args, kwargs),
        ),
    ],
    [
      "uuid",
      (_context, args, kwargs) => {
        bindConverterArguments("uuid", [], args, kwargs)
        return new UuidConverter()
      },
    ],
  ])
