/**
 * Percent encoding, query string and host helpers used while building URLs
 */

import { domainToASCII } from "url"

const ALWAYS_SAFE = new Set(
  "abcdefghijklmnopqrstuvwxyzABCDEFGHIJKLMNOPQRSTUVWXYZ0123456789-._~",
)

/** Characters left as is in path segments */
export const PATH_SAFE = "!$&'()*+,/:;=@"

/** Characters left as is in query keys and values, space becomes `+` */
const QUERY_SAFE = "!$'()*,;"

/**
 * Percent encode the UTF-8 bytes of every character that is neither
 * unreserved nor listed in `safe`
 *
 * @param value The text to quote
 * @param safe Additional characters to keep, default `/`
 */
export function quote(value: string, safe: string = "/"): string {
  let quoted = ""
  for (const ch of value) {
    if (ALWAYS_SAFE.has(ch) || safe.includes(ch)) {
      quoted += ch
    } else {
      for (const byte of Buffer.from(ch, "utf8")) {
        quoted += `%${byte.toString(16).toUpperCase().padStart(2, "0")}`
      }
    }
  }

  return quoted
}

/**
 * Quote for the query string, encoding spaces as `+`
 */
export function quotePlus(value: string): string {
  return quote(value, `${QUERY_SAFE} `).replace(/ /g, "+")
}

export type QueryValue = string | number | boolean | bigint

/** A single key/value pair of a query string */
export type QueryPair = readonly [key: string, value: string]

/**
 * Query arguments as an already encoded string, a multi valued map or a
 * record. `null`/`undefined` entries are skipped.
 */
export type QueryArgs = string | QueryMap | QueryRecord

export type QueryArgValue = QueryValue | readonly QueryValue[] | null | undefined
export type QueryMap = ReadonlyMap<string, QueryArgValue>
export type QueryRecord = Readonly<Record<string, QueryArgValue>>

/**
 * Key used to order query parameters when sorting is enabled
 */
export type QuerySortKey = (pair: QueryPair) => string | number

const BY_KEY: QuerySortKey = (pair) => pair[0]

/**
 * Flatten the arguments into key/value pairs, expanding arrays into repeated
 * keys in their original order
 */
export function queryPairs(args: QueryMap | QueryRecord): QueryPair[] {
  const entries: [string, QueryArgValue][] = isQueryMap(args)
    ? [...args.entries()]
    : Object.entries(args)
  const pairs: QueryPair[] = []

  for (const [key, value] of entries) {
    for (const item of asList(value)) {
      pairs.push([key, String(item)])
    }
  }

  return pairs
}

function isQueryMap(args: QueryMap | QueryRecord): args is QueryMap {
  return args instanceof Map
}

function asList(value: QueryArgValue): readonly QueryValue[] {
  if (value === null || value === undefined) {
    return []
  }

  return isValueList(value) ? value : [value]
}

function isValueList(
  value: QueryValue | readonly QueryValue[],
): value is readonly QueryValue[] {
  return Array.isArray(value)
}

/**
 * Encode query arguments as `application/x-www-form-urlencoded`
 *
 * @param args The arguments to encode, strings are returned untouched
 * @param sort Order the pairs with `key` (stable), default false
 * @param key The ordering for sorted pairs, default the parameter name
 */
export function encodeQuery(
  args: QueryArgs,
  sort: boolean = false,
  key: QuerySortKey = BY_KEY,
): string {
  if (typeof args === "string") {
    return args
  }

  return encodePairs(queryPairs(args), sort, key)
}

/**
 * Encode already flattened pairs
 */
export function encodePairs(
  pairs: readonly QueryPair[],
  sort: boolean = false,
  key: QuerySortKey = BY_KEY,
): string {
  const ordered = sort
    ? [...pairs].sort((a, b) => compareKeys(key(a), key(b)))
    : pairs
  return ordered
    .map(([name, value]) => `${quotePlus(name)}=${quotePlus(value)}`)
    .join("&")
}

function compareKeys(left: string | number, right: string | number): number {
  if (typeof left === "number" && typeof right === "number") {
    return left - right
  }

  const a = String(left)
  const b = String(right)
  return a < b ? -1 : a > b ? 1 : 0
}

/**
 * Lower case the host and convert any international labels to their ASCII
 * (punycode) form, keeping a trailing port
 *
 * @param host The host, optionally with a `:port`
 * @returns The encoded host or the lower cased input when it cannot be encoded
 */
export function encodeHost(host: string): string {
  const lowered = host.toLowerCase()
  const match = /^(.*?)(:\d+)?$/.exec(lowered)
  const name = match?.[1] ?? lowered
  const port = match?.[2] ?? ""

  if (/^[\x21-\x7e]*$/.test(name)) {
    return lowered
  }

  const encoded = domainToASCII(name)
  return encoded.length > 0 ? `${encoded}${port}` : lowered
}

/**
 * Resolve a possibly relative target against an absolute base URL
 */
export function joinUrl(base: string, target: string): string {
  return new URL(target, base).href
}
