/**
 * Tokenizer for rule templates such as `/users/<int(min=1):id>/` and the
 * argument lists given to converters
 */

import type { Optional } from "@urlmap/core/type/utils.js"
import type { ConverterArgument } from "./converters.js"
import { RuleSyntaxError } from "./errors.js"

/**
 * A piece of a rule template
 */
export type TemplateToken =
  | { type: "slash" }
  | { type: "static"; text: string }
  | {
      type: "variable"
      name: string
      converter: Optional<string>
      args: Optional<string>
    }

const TEMPLATE_TOKEN =
  /(?<slash>\/)|(?<static>[^</]+)|<(?:(?<converter>[a-zA-Z_][a-zA-Z0-9_]*)(?:\((?<args>.*?)\))?:)?(?<variable>[a-zA-Z_][a-zA-Z0-9_]*)>/y

/**
 * Split a template into slash, static text and variable tokens
 *
 * @param template The rule template
 * @returns The tokens in template order
 * @throws {@link RuleSyntaxError} when a `<...>` placeholder is malformed
 */
export function parseRuleTemplate(template: string): TemplateToken[] {
  const tokens: TemplateToken[] = []
  const pattern = new RegExp(TEMPLATE_TOKEN)

  while (pattern.lastIndex < template.length) {
    const match = pattern.exec(template)
    if (match === null || match.groups === undefined) {
      throw new RuleSyntaxError("malformed url rule", template)
    }

    const { slash, converter, args, variable } = match.groups
    if (slash !== undefined) {
      tokens.push({ type: "slash" })
    } else if (variable !== undefined) {
      tokens.push({ type: "variable", name: variable, converter, args })
    } else {
      tokens.push({ type: "static", text: match[0] })
    }
  }

  return tokens
}

/**
 * The parsed arguments of a converter reference
 */
export interface ConverterArguments {
  args: ConverterArgument[]
  kwargs: Record<string, ConverterArgument>
}

const CONVERTER_ARGUMENT =
  /\s*(?:(?<name>\w+)\s*=\s*)?(?<value>True|False|None|[+-]?\d+\.\d*(?:[eE][+-]?\d+)?|[+-]?\d+|[\w.]+|[urUR]?(?<quoted>"[^"]*"|'[^']*'))\s*,/y

/**
 * Parse the text between the parentheses of `<converter(...):name>`
 *
 * @param text The raw argument text, e.g. `2, maxLength=5, name='x'`
 * @returns Positional and keyword arguments with literals converted
 * @throws {@link RuleSyntaxError} on anything outside the argument grammar
 */
export function parseConverterArgs(text: string): ConverterArguments {
  const parsed: ConverterArguments = { args: [], kwargs: {} }
  const source = `${text},`
  const pattern = new RegExp(CONVERTER_ARGUMENT)

  let position = 0
  for (
    let match = pattern.exec(source);
    match !== null && match.groups !== undefined;
    match = pattern.exec(source)
  ) {
    const { name, value, quoted } = match.groups
    const converted =
      quoted !== undefined ? quoted.slice(1, -1) : toArgument(value)

    if (name === undefined) {
      if (Object.keys(parsed.kwargs).length > 0) {
        throw new RuleSyntaxError(
          "positional converter argument after keyword argument",
          text,
        )
      }
      parsed.args.push(converted)
    } else {
      parsed.kwargs[name] = converted
    }

    position = pattern.lastIndex
  }

  // Only the comma appended above (for a trailing comma) may remain
  if (!/^\s*,?\s*$/.test(source.slice(position))) {
    throw new RuleSyntaxError(
      `cannot parse converter argument '${source.slice(position, -1).trim()}'`,
      text,
    )
  }

  return parsed
}

function toArgument(value: string): ConverterArgument {
  switch (value) {
    case "True":
      return true
    case "False":
      return false
    case "None":
      return null
  }

  if (/^[+-]?\d+(?:\.\d*(?:[eE][+-]?\d+)?)?$/.test(value)) {
    return Number(value)
  }

  return value
}
