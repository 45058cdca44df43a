import type { Optional } from "./type/utils.js"

/**
 * Try to extract the message field of the error
 *
 * @param error The error object to extract from
 * @returns The error message if it exists or undefined
 */
export function getErrorMessage(error: unknown): Optional<string> {
  if (
    typeof error === "object" &&
    error !== null &&
    "message" in error &&
    typeof error.message === "string"
  ) {
    return error.message
  }

  return
}

/**
 * Describe an unknown thrown value for a log line or a wrapped error message
 *
 * @param error The value that was thrown
 * @returns The message when one exists, otherwise the value as a string
 */
export function describeError(error: unknown): string {
  return getErrorMessage(error) ?? String(error)
}
